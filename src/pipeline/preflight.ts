import type { RunContext } from "../context.js";
import { errorMessage } from "../errors.js";

export type ServiceName = "telegram" | "llm" | "tavily" | "serper";

export type PingResult = { service: ServiceName; ok: boolean; detail: string };

export type PreflightResult = {
  ok: boolean;
  checks: PingResult[];
  /** Why the run must not start, when `ok` is false. */
  reason?: string;
};

async function ping(service: ServiceName, fn: () => Promise<string>): Promise<PingResult> {
  try {
    return { service, ok: true, detail: await fn() };
  } catch (err) {
    return { service, ok: false, detail: errorMessage(err) };
  }
}

/**
 * One call per service, no retries. Telegram and the completion endpoint are
 * both required; search needs at least one of its two providers.
 */
export async function runPreflight(ctx: RunContext): Promise<PreflightResult> {
  const [providerA, providerB] = ctx.searchProviders;

  const checks: PingResult[] = [
    await ping("telegram", async () => `@${await ctx.messenger.whoami()}`),
    await ping("llm", async () => {
      await ctx.llm.complete({
        model: ctx.cfg.TRANSLATION_MODEL,
        system: "Reply with OK.",
        user: "ping",
        maxTokens: 5,
        temperature: 0
      });
      return ctx.cfg.TRANSLATION_MODEL;
    }),
    await ping(providerA.id, async () => `${(await providerA.search("stock market", 1)).length} result(s)`),
    await ping(providerB.id, async () => `${(await providerB.search("stock market", 1)).length} result(s)`)
  ];

  for (const c of checks) {
    if (c.ok) ctx.logger.info("preflight.ok", { service: c.service, detail: c.detail });
    else ctx.logger.warn("preflight.failed", { service: c.service, error: c.detail });
  }

  const down = (service: ServiceName) => checks.some((c) => c.service === service && !c.ok);
  const searchDown = checks.filter((c) => (c.service === providerA.id || c.service === providerB.id) && !c.ok);

  let reason: string | undefined;
  if (down("telegram")) reason = "telegram is unreachable";
  else if (down("llm")) reason = "completion endpoint is unreachable";
  else if (searchDown.length === 2) reason = "both search providers are unreachable";

  if (reason) return { ok: false, checks, reason };
  if (searchDown.length === 1) {
    ctx.logger.warn("preflight.degraded", { service: searchDown[0]?.service, note: "continuing with one search provider" });
  }
  return { ok: true, checks };
}
