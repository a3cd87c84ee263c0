import type { AppConfig } from "./config.js";
import { createTelegramMessenger, type Messenger } from "./deliver/telegram.js";
import { createChatCompletionClient, type CompletionClient } from "./llm/client.js";
import type { Logger } from "./logger.js";
import { retryPolicyFromConfig, withRetry, type RetryPolicy } from "./retry.js";
import { createSerperProvider } from "./search/providers/serper.js";
import { createTavilyProvider } from "./search/providers/tavily.js";
import type { ImageSearchProvider, SearchProvider } from "./search/types.js";
import { sleep, type Sleep } from "./utils.js";

/**
 * Everything a stage may touch during one run. Built once by the entry point
 * (or by a test) and passed explicitly; no stage reads globals.
 */
export type RunContext = {
  cfg: AppConfig;
  logger: Logger;
  llm: CompletionClient;
  /** Provider A wins ties in the merged result list. */
  searchProviders: [SearchProvider, SearchProvider];
  images: ImageSearchProvider | null;
  messenger: Messenger;
  retry: RetryPolicy;
  sleep: Sleep;
  now: () => Date;
  /** Attempts per call-site label; copied into the run report. */
  attempts: Map<string, number>;
};

export function attemptsFor(ctx: RunContext, prefix: string): number {
  let total = 0;
  for (const [label, n] of ctx.attempts) {
    if (label === prefix || label.startsWith(`${prefix}.`)) total += n;
  }
  return total;
}

/** The shared retry policy, applied at an external call site. */
export function callWithRetry<T>(ctx: RunContext, label: string, fn: (attempt: number) => Promise<T>): Promise<T> {
  return withRetry(fn, {
    policy: ctx.retry,
    label,
    logger: ctx.logger,
    sleep: ctx.sleep,
    onAttempt: () => ctx.attempts.set(label, (ctx.attempts.get(label) ?? 0) + 1)
  });
}

/** Production wiring: Tavily then Serper for news, Serper for charts, Groq for completions. */
export function createRunContext(cfg: AppConfig, logger: Logger): RunContext {
  const serper = createSerperProvider({ apiKey: cfg.SERPER_API_KEY, timeoutMs: cfg.HTTP_TIMEOUT_MS });
  return {
    cfg,
    logger,
    llm: createChatCompletionClient({ apiKey: cfg.GROQ_API_KEY, baseUrl: cfg.LLM_BASE_URL, timeoutMs: cfg.LLM_TIMEOUT_MS }),
    searchProviders: [createTavilyProvider({ apiKey: cfg.TAVILY_API_KEY, timeoutMs: cfg.HTTP_TIMEOUT_MS }), serper],
    images: serper,
    messenger: createTelegramMessenger({
      botToken: cfg.TELEGRAM_BOT_TOKEN,
      chatId: cfg.TELEGRAM_CHAT_ID,
      timeoutMs: cfg.HTTP_TIMEOUT_MS
    }),
    retry: retryPolicyFromConfig(cfg),
    sleep,
    now: () => new Date(),
    attempts: new Map()
  };
}
