import { loadConfig, type AppConfig } from "../config.js";
import { createRunContext, type RunContext } from "../context.js";
import { ConfigError, errorMessage } from "../errors.js";
import { createLogger, logger as bootLogger, type Logger } from "../logger.js";
import { runPreflight } from "../pipeline/preflight.js";
import { exitCodeFor, runPipeline } from "../pipeline/run.js";

export type MainOptions = {
  env?: NodeJS.ProcessEnv;
  /** Logger used before config is loaded and for config errors. */
  bootLogger?: Logger;
  createLogger?: (cfg: AppConfig) => Logger;
  createContext?: (cfg: AppConfig, logger: Logger) => RunContext;
};

/** Returns the process exit code: 0 Done, 2 PartialFailure, 1 anything fatal. */
export async function main(opts: MainOptions = {}): Promise<number> {
  const boot = opts.bootLogger ?? bootLogger;

  let cfg: AppConfig;
  try {
    cfg = loadConfig(opts.env);
  } catch (err) {
    if (err instanceof ConfigError) {
      boot.error("config.invalid", { error: err.message, missing: err.missing });
      return 1;
    }
    throw err;
  }

  const log = opts.createLogger
    ? opts.createLogger(cfg)
    : createLogger({ level: cfg.LOG_LEVEL, filePath: cfg.LOG_FILE || undefined });
  const ctx = (opts.createContext ?? createRunContext)(cfg, log);

  log.info("market-digest starting", {
    analysisModel: cfg.ANALYSIS_MODEL,
    translationModel: cfg.TRANSLATION_MODEL,
    dryRun: cfg.DRY_RUN,
    charts: cfg.CHARTS_ENABLED,
    translationFallback: cfg.TRANSLATION_FALLBACK
  });

  if (cfg.PREFLIGHT_ENABLED) {
    const preflight = await runPreflight(ctx);
    if (!preflight.ok) {
      log.error("preflight.aborted", { reason: preflight.reason });
      return 1;
    }
  }

  try {
    const report = await runPipeline(ctx);
    return exitCodeFor(report.status);
  } catch (err) {
    log.error("run.crashed", { error: errorMessage(err) });
    return 1;
  }
}
