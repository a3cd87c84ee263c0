import { appendFileSync, mkdirSync } from "node:fs";
import path from "node:path";

export type LogLevel = "debug" | "info" | "warn" | "error";

export type LogMeta = Record<string, unknown>;

export type Logger = {
  debug(msg: string, meta?: LogMeta): void;
  info(msg: string, meta?: LogMeta): void;
  warn(msg: string, meta?: LogMeta): void;
  error(msg: string, meta?: LogMeta): void;
  child(bindings: LogMeta): Logger;
};

export type LoggerOptions = {
  level?: LogLevel;
  /** Every line is also appended here (JSON lines). */
  filePath?: string;
  bindings?: LogMeta;
  /** Replaces stdout; tests use it to capture lines. */
  write?: (line: string) => void;
};

const levelOrder: LogLevel[] = ["debug", "info", "warn", "error"];

function ts() {
  return new Date().toISOString();
}

export function createLogger(opts: LoggerOptions = {}): Logger {
  const min = levelOrder.indexOf(opts.level ?? "info");
  const bindings = opts.bindings ?? {};
  let fileReady = false;

  function sink(line: string) {
    if (opts.write) {
      opts.write(line);
    } else {
      // eslint-disable-next-line no-console
      console.log(line);
    }

    if (opts.filePath) {
      if (!fileReady) {
        mkdirSync(path.dirname(opts.filePath), { recursive: true });
        fileReady = true;
      }
      appendFileSync(opts.filePath, line + "\n", "utf8");
    }
  }

  function log(level: LogLevel, msg: string, meta?: LogMeta) {
    if (levelOrder.indexOf(level) < min) return;
    const base = { ts: ts(), level, msg, ...bindings };
    const out = meta ? { ...base, ...meta } : base;
    // Keep it simple: JSON line logs.
    sink(JSON.stringify(out));
  }

  return {
    debug: (msg, meta) => log("debug", msg, meta),
    info: (msg, meta) => log("info", msg, meta),
    warn: (msg, meta) => log("warn", msg, meta),
    error: (msg, meta) => log("error", msg, meta),
    child: (extra) => createLogger({ ...opts, bindings: { ...bindings, ...extra } })
  };
}

/** Process-wide logger for code that runs before config is loaded. */
export const logger = createLogger();
