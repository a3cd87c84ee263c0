import crypto from "node:crypto";
import { mkdir, writeFile } from "node:fs/promises";
import path from "node:path";
import { attemptsFor, type RunContext } from "../context.js";
import { errorMessage } from "../errors.js";
import { runAnalysisStage, type AnalysisResult } from "../stages/analysis.js";
import { runDistributionStage } from "../stages/distribute.js";
import { runFormattingStage } from "../stages/format.js";
import { runSearchStage } from "../stages/search.js";
import { runTranslationStage } from "../stages/translate.js";
import type { DeliveryResult } from "../types.js";
import { RunStateMachine, type RunState, type RunStatus, type Transition } from "./state.js";

export type StageName = "search" | "analysis" | "formatting" | "translation" | "distribution";

export type StageRecord = {
  stage: StageName;
  status: "ok" | "degraded" | "failed";
  durationMs: number;
  attempts: number;
  error?: string;
};

export type RunReport = {
  runId: string;
  status: RunStatus;
  startedAt: string;
  finishedAt: string;
  documents: number;
  stages: StageRecord[];
  transitions: Transition[];
  deliveries: DeliveryResult[];
  error?: string;
};

const STAGE_PREFIX: Record<StageName, string> = {
  search: "search",
  analysis: "analysis",
  formatting: "format",
  translation: "translate",
  distribution: "deliver"
};

export function newRunId(now: Date): string {
  return `${now.toISOString().replace(/[-:]/g, "").slice(0, 15)}-${crypto.randomBytes(3).toString("hex")}`;
}

export function exitCodeFor(status: RunStatus): number {
  if (status === "Done") return 0;
  if (status === "PartialFailure") return 2;
  return 1;
}

async function writeReport(filePath: string, report: RunReport): Promise<void> {
  const p = path.isAbsolute(filePath) ? filePath : path.resolve(process.cwd(), filePath);
  await mkdir(path.dirname(p), { recursive: true });
  await writeFile(p, JSON.stringify(report, null, 2), "utf8");
}

/**
 * One forward pass: search, analysis, formatting, translation, distribution.
 * Only search and analysis can fail the run; everything after them degrades.
 */
export async function runPipeline(baseCtx: RunContext): Promise<RunReport> {
  const startedAt = baseCtx.now();
  const runId = newRunId(startedAt);
  const ctx: RunContext = { ...baseCtx, logger: baseCtx.logger.child({ runId }) };
  const machine = new RunStateMachine(ctx.now);
  const stages: StageRecord[] = [];

  async function stage<T>(
    name: StageName,
    state: RunState,
    fn: () => Promise<T>,
    isDegraded: (out: T) => boolean = () => false
  ): Promise<T> {
    machine.transition(state);
    ctx.logger.info("stage.start", { stage: name, state });
    const t0 = Date.now();
    try {
      const out = await fn();
      const record: StageRecord = {
        stage: name,
        status: isDegraded(out) ? "degraded" : "ok",
        durationMs: Date.now() - t0,
        attempts: attemptsFor(ctx, STAGE_PREFIX[name])
      };
      stages.push(record);
      ctx.logger.info("stage.end", { ...record });
      return out;
    } catch (err) {
      const record: StageRecord = {
        stage: name,
        status: "failed",
        durationMs: Date.now() - t0,
        attempts: attemptsFor(ctx, STAGE_PREFIX[name]),
        error: errorMessage(err)
      };
      stages.push(record);
      ctx.logger.error("stage.end", { ...record });
      throw err;
    }
  }

  const finish = async (status: RunStatus, documents: number, deliveries: DeliveryResult[], error?: string) => {
    machine.transition(status);
    const report: RunReport = {
      runId,
      status,
      startedAt: startedAt.toISOString(),
      finishedAt: ctx.now().toISOString(),
      documents,
      stages,
      transitions: machine.transitions,
      deliveries,
      ...(error ? { error } : {})
    };

    const log = status === "Done" ? ctx.logger.info : status === "PartialFailure" ? ctx.logger.warn : ctx.logger.error;
    log("run.finished", {
      status,
      delivered: deliveries.filter((d) => d.success).map((d) => d.locale),
      failed: deliveries.filter((d) => !d.success).map((d) => ({ locale: d.locale, error: d.error })),
      ...(error ? { error } : {})
    });

    if (ctx.cfg.RUN_REPORT_PATH) {
      try {
        await writeReport(ctx.cfg.RUN_REPORT_PATH, report);
      } catch (err) {
        // Best effort: the run status never depends on the file.
        ctx.logger.error("run.report_failed", { path: ctx.cfg.RUN_REPORT_PATH, error: errorMessage(err) });
      }
    }
    return report;
  };

  let documents = 0;
  let analysis: AnalysisResult;
  try {
    const docs = await stage("search", "Searching", () => runSearchStage(ctx));
    documents = docs.length;
    analysis = await stage("analysis", "Analyzing", () => runAnalysisStage(ctx, docs), (out) => out.degraded);
  } catch (err) {
    return finish("Failed", documents, [], errorMessage(err));
  }

  const summary = analysis.summary;
  const formatted = await stage("formatting", "Formatting", () => runFormattingStage(ctx, summary));
  const translation = await stage(
    "translation",
    "Translating",
    () => runTranslationStage(ctx, formatted),
    (out) => out.outcomes.some((o) => o.status !== "translated")
  );
  const deliveries = await stage(
    "distribution",
    "Distributing",
    () => runDistributionStage(ctx, formatted, translation),
    (out) => out.some((d) => !d.success || d.degraded)
  );

  const partial = analysis.degraded || stages.some((s) => s.status !== "ok");
  return finish(partial ? "PartialFailure" : "Done", documents, deliveries);
}
