import { z } from "zod";
import { callWithRetry, type RunContext } from "../context.js";
import { ValidationError, errorMessage } from "../errors.js";
import { ANALYST_SYSTEM_PROMPT, buildAnalysisCorrection, buildAnalysisPrompt } from "../prompts.js";
import type { NewsDocument } from "../search/types.js";
import type { MarketSummary } from "../types.js";
import { extractJsonObject, safeJsonParse } from "../utils.js";

// Models sometimes emit numbers instead of strings; keep whichever form as text.
const Numeral = z
  .union([z.string(), z.number()])
  .transform((v) => String(v).trim())
  .refine((v) => /\d/.test(v), { message: "expected a number" });

const MoverSchema = z.object({
  symbol: z.string().trim().min(1),
  change_pct: Numeral,
  reason: z.string().trim().optional()
});

const MarketSummaryPayloadSchema = z.object({
  indices: z
    .array(
      z.object({
        name: z.string().trim().min(1),
        value: Numeral,
        change_pct: Numeral
      })
    )
    .min(1),
  headlines: z.array(z.string().trim().min(1)).min(1),
  movers: z
    .object({
      gainers: z.array(MoverSchema).default([]),
      losers: z.array(MoverSchema).default([])
    })
    .default({}),
  outlook: z.array(z.string().trim().min(1)).default([])
});

export type AnalysisResult = {
  summary: MarketSummary;
  /** True when the summary was rebuilt from headlines after the model failed validation twice. */
  degraded: boolean;
};

const DEGRADED_OUTLOOK = "Automated market analysis was unavailable for this run; headlines are listed as published.";

/**
 * Parse model output into a MarketSummary; throws ValidationError listing what was wrong.
 */
export function parseMarketSummary(text: string): MarketSummary {
  const json = extractJsonObject(text);
  if (!json) throw new ValidationError("analysis response contained no JSON object", ["no JSON object found"]);

  const raw = safeJsonParse(json);
  if (raw === undefined) throw new ValidationError("analysis response was not valid JSON", ["JSON did not parse"]);

  const parsed = MarketSummaryPayloadSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`);
    throw new ValidationError(`analysis response has the wrong shape: ${issues[0] ?? "unknown"}`, issues);
  }

  const d = parsed.data;
  const mover = (m: z.infer<typeof MoverSchema>) => ({
    symbol: m.symbol,
    changePct: m.change_pct,
    ...(m.reason ? { reason: m.reason } : {})
  });

  return {
    indices: d.indices.map((ix) => ({ name: ix.name, value: ix.value, changePct: ix.change_pct })),
    headlines: d.headlines,
    movers: { gainers: d.movers.gainers.map(mover), losers: d.movers.losers.map(mover) },
    outlook: d.outlook
  };
}

export function degradedSummary(docs: NewsDocument[]): MarketSummary {
  return {
    indices: [],
    headlines: docs.slice(0, 4).map((d) => d.title),
    movers: { gainers: [], losers: [] },
    outlook: [DEGRADED_OUTLOOK]
  };
}

export async function runAnalysisStage(ctx: RunContext, docs: NewsDocument[]): Promise<AnalysisResult> {
  const prompt = buildAnalysisPrompt(docs);
  const request = (user: string) => ({
    model: ctx.cfg.ANALYSIS_MODEL,
    system: ANALYST_SYSTEM_PROMPT,
    user,
    maxTokens: 2000,
    temperature: 0.3
  });

  // Transport failures that outlast the retry policy escape: this stage is mandatory.
  const first = await callWithRetry(ctx, "analysis.complete", () => ctx.llm.complete(request(prompt)));

  let issues: string[] = [];
  try {
    return { summary: parseMarketSummary(first), degraded: false };
  } catch (err) {
    if (!(err instanceof ValidationError)) throw err;
    issues = err.issues.length ? err.issues : [err.message];
    ctx.logger.warn("analysis.invalid_response", { attempt: 1, issues });
  }

  const second = await callWithRetry(ctx, "analysis.correct", () =>
    ctx.llm.complete(request(buildAnalysisCorrection(prompt, first, issues)))
  );

  try {
    return { summary: parseMarketSummary(second), degraded: false };
  } catch (err) {
    if (!(err instanceof ValidationError)) throw err;
    ctx.logger.warn("analysis.degraded", { attempt: 2, error: errorMessage(err), headlines: Math.min(docs.length, 4) });
    return { summary: degradedSummary(docs), degraded: true };
  }
}
