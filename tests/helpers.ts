import { vi } from "vitest";
import { loadConfig, type AppConfig } from "../src/config.js";
import type { RunContext } from "../src/context.js";
import type { Messenger } from "../src/deliver/telegram.js";
import type { CompletionClient, CompletionRequest } from "../src/llm/client.js";
import { createLogger, type Logger } from "../src/logger.js";
import { CONTENT_BEGIN, CONTENT_END } from "../src/prompts.js";
import { retryPolicyFromConfig } from "../src/retry.js";
import type { ImageResult, ImageSearchProvider, NewsDocument, SearchProvider, SearchProviderId } from "../src/search/types.js";

export const TEST_ENV: NodeJS.ProcessEnv = {
  GROQ_API_KEY: "test-groq-key",
  TAVILY_API_KEY: "test-tavily-key",
  SERPER_API_KEY: "test-serper-key",
  TELEGRAM_BOT_TOKEN: "test-bot-token",
  TELEGRAM_CHAT_ID: "-100123",
  REPORT_TIMEZONE: "UTC",
  SEARCH_PAUSE_MS: "0",
  TRANSLATION_PAUSE_MS: "0",
  DELIVERY_PAUSE_MS: "0",
  LOG_FILE: ""
};

export function testConfig(overrides: Partial<AppConfig> = {}): AppConfig {
  return { ...loadConfig(TEST_ENV), ...overrides };
}

export type LogEntry = Record<string, unknown>;

function isRecord(v: unknown): v is LogEntry {
  return typeof v === "object" && v !== null && !Array.isArray(v);
}

export function captureLogger(level: "debug" | "info" = "debug"): { logger: Logger; entries: LogEntry[] } {
  const entries: LogEntry[] = [];
  const logger = createLogger({
    level,
    write: (line) => {
      const parsed: unknown = JSON.parse(line);
      if (isRecord(parsed)) entries.push(parsed);
    }
  });
  return { logger, entries };
}

export function messagesOf(entries: LogEntry[], msg: string): LogEntry[] {
  return entries.filter((e) => e.msg === msg);
}

// ---- fetch ----

export type FetchRoute = {
  match: RegExp;
  status?: number;
  body: unknown;
  headers?: Record<string, string>;
};

export type RecordedRequest = { url: string; method: string; headers: Headers; body: unknown };

/** Replaces globalThis.fetch; restore it in afterEach. */
export function mockFetchRouter(routes: FetchRoute[]): RecordedRequest[] {
  const requests: RecordedRequest[] = [];
  globalThis.fetch = vi.fn(async (input: string | URL | Request, init?: RequestInit) => {
    const url = String(input);
    const raw = typeof init?.body === "string" ? init.body : undefined;
    requests.push({
      url,
      method: init?.method ?? "GET",
      headers: new Headers(init?.headers),
      body: raw === undefined ? undefined : JSON.parse(raw)
    });

    const r = routes.find((x) => x.match.test(url));
    if (!r) throw new Error(`unexpected url: ${url}`);
    const text = typeof r.body === "string" ? r.body : JSON.stringify(r.body);
    return new Response(text, { status: r.status ?? 200, headers: r.headers });
  });
  return requests;
}

// ---- fakes ----

export function doc(n: number, provider: SearchProviderId = "tavily", extra: Partial<NewsDocument> = {}): NewsDocument {
  return {
    title: `Market story ${n}`,
    source: "news.example.com",
    url: `https://news.example.com/story-${n}`,
    snippet: `Snippet for story ${n}`,
    provider,
    ...extra
  };
}

export type FakeSearchProvider = SearchProvider & { calls: string[] };

export function fakeProvider(
  id: SearchProviderId,
  answer: (query: string, call: number) => NewsDocument[] | Error
): FakeSearchProvider {
  const calls: string[] = [];
  return {
    id,
    calls,
    async search(query: string) {
      calls.push(query);
      const out = answer(query, calls.length);
      if (out instanceof Error) throw out;
      return out;
    }
  };
}

export type FakeImages = ImageSearchProvider & { calls: string[] };

export function fakeImages(answer: (query: string) => ImageResult[] | Error): FakeImages {
  const calls: string[] = [];
  return {
    calls,
    async searchImages(query: string) {
      calls.push(query);
      const out = answer(query);
      if (out instanceof Error) throw out;
      return out;
    }
  };
}

export type FakeLlm = CompletionClient & { calls: CompletionRequest[] };

export function fakeLlm(answer: (req: CompletionRequest, call: number) => string | Error): FakeLlm {
  const calls: CompletionRequest[] = [];
  return {
    calls,
    async complete(req: CompletionRequest) {
      calls.push(req);
      const out = answer(req, calls.length);
      if (out instanceof Error) throw out;
      return out;
    }
  };
}

export type FakeMessenger = Messenger & { sent: string[]; attempts: string[] };

/** Message ids start at 100 and increase per successful send. */
export function fakeMessenger(fail: (html: string, attempt: number) => Error | null = () => null): FakeMessenger {
  const sent: string[] = [];
  const attempts: string[] = [];
  return {
    sent,
    attempts,
    async sendMessage(html: string) {
      attempts.push(html);
      const err = fail(html, attempts.filter((a) => a === html).length);
      if (err) throw err;
      sent.push(html);
      return 99 + sent.length;
    },
    async whoami() {
      return "digest_test_bot";
    }
  };
}

export const ANALYSIS_JSON = JSON.stringify({
  indices: [
    { name: "S&P 500", value: "6460.26", change_pct: "+0.64" },
    { name: "NASDAQ", value: "21455.55", change_pct: "+0.80" }
  ],
  headlines: ["Fed holds rates steady - yields ease", "Chipmakers lead gains - semis rally"],
  movers: {
    gainers: [{ symbol: "NVDA", change_pct: "+3.10", reason: "AI demand" }],
    losers: [{ symbol: "TSLA", change_pct: "-2.40", reason: "delivery miss" }]
  },
  outlook: ["CPI report on Thursday"]
});

/** The text between the content markers of a translation prompt. */
export function promptContent(user: string): string {
  const start = user.indexOf(CONTENT_BEGIN);
  const end = user.indexOf(CONTENT_END);
  if (start < 0 || end < start) return "";
  return user.slice(start + CONTENT_BEGIN.length, end).trim();
}

/** "Hebrew" for a translation request, null otherwise. */
export function translationLanguage(req: CompletionRequest): string | null {
  return req.system.match(/expert (\w+) translator/)?.[1] ?? null;
}

/**
 * Analysis requests get ANALYSIS_JSON; translation requests echo the source
 * prefixed with "[Language]" so each variant is distinguishable.
 */
export function scriptedLlm(): FakeLlm {
  return fakeLlm((req) => {
    const language = translationLanguage(req);
    if (language) return `[${language}] ${promptContent(req.user)}`;
    if (req.maxTokens === 5) return "OK";
    return ANALYSIS_JSON;
  });
}

export type TestContext = RunContext & { sleeps: number[] };

export function testContext(overrides: Partial<RunContext> = {}): TestContext {
  const cfg = overrides.cfg ?? testConfig();
  const sleeps: number[] = [];
  return {
    cfg,
    logger: captureLogger().logger,
    llm: scriptedLlm(),
    searchProviders: [
      fakeProvider("tavily", () => [doc(1), doc(2), doc(3)]),
      fakeProvider("serper", () => [doc(4, "serper"), doc(5, "serper")])
    ],
    images: fakeImages((query) => [{ url: "https://img.example.com/chart.png", title: query }]),
    messenger: fakeMessenger(),
    retry: retryPolicyFromConfig(cfg),
    now: () => new Date("2026-10-18T14:05:00Z"),
    attempts: new Map(),
    ...overrides,
    sleeps,
    sleep: overrides.sleep ?? (async (ms: number) => {
      sleeps.push(ms);
    })
  };
}
