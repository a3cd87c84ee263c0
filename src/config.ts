import * as dotenv from "dotenv";
import { existsSync } from "node:fs";
import path from "node:path";
import { z } from "zod";
import { ConfigError } from "./errors.js";

// Load env from project dir first, then fall back to the parent dir (.env) if present.
const localEnvPath = path.join(process.cwd(), ".env");
if (existsSync(localEnvPath)) dotenv.config({ path: localEnvPath });
const parentEnvPath = path.resolve(process.cwd(), "..", ".env");
if (existsSync(parentEnvPath)) dotenv.config({ path: parentEnvPath, override: false });

const BoolFromString = z
  .enum(["true", "false"])
  .transform((v) => v === "true");

const LogLevel = z.enum(["debug", "info", "warn", "error"]);
const TranslationFallback = z.enum(["skip", "notice"]);

/** Secrets the run cannot start without. */
export const REQUIRED_KEYS = [
  "GROQ_API_KEY",
  "TAVILY_API_KEY",
  "SERPER_API_KEY",
  "TELEGRAM_BOT_TOKEN",
  "TELEGRAM_CHAT_ID"
] as const;

export type RequiredKey = (typeof REQUIRED_KEYS)[number];

const envSchema = z.object({
  // Secrets (presence checked separately so every missing key is reported at once)
  GROQ_API_KEY: z.string().default(""),
  TAVILY_API_KEY: z.string().default(""),
  SERPER_API_KEY: z.string().default(""),
  TELEGRAM_BOT_TOKEN: z.string().default(""),
  TELEGRAM_CHAT_ID: z.string().default(""),

  // LLM
  LLM_BASE_URL: z.string().url().default("https://api.groq.com/openai/v1"),
  ANALYSIS_MODEL: z.string().min(1).default("llama3-70b-8192"),
  TRANSLATION_MODEL: z.string().min(1).default("llama3-8b-8192"),
  LLM_TIMEOUT_MS: z.coerce.number().int().positive().default(60_000),

  // HTTP + retry policy
  HTTP_TIMEOUT_MS: z.coerce.number().int().positive().default(30_000),
  RETRY_MAX_ATTEMPTS: z.coerce.number().int().min(1).max(10).default(3),
  RETRY_BASE_DELAY_MS: z.coerce.number().int().min(0).default(1_000),
  RATE_LIMIT_BASE_DELAY_MS: z.coerce.number().int().min(0).default(5_000),

  // Search
  SEARCH_RESULTS_PER_QUERY: z.coerce.number().int().min(1).max(20).default(5),
  SEARCH_MAX_DOCUMENTS: z.coerce.number().int().min(1).max(100).default(20),
  SEARCH_PAUSE_MS: z.coerce.number().int().min(0).default(1_000),

  // Formatting + translation
  CHARTS_ENABLED: BoolFromString.default("true"),
  TRANSLATION_FALLBACK: TranslationFallback.default("skip"),
  TRANSLATION_PAUSE_MS: z.coerce.number().int().min(0).default(5_000),
  REPORT_TIMEZONE: z.string().min(1).default("Asia/Kolkata"),

  // Delivery
  DELIVERY_PAUSE_MS: z.coerce.number().int().min(0).default(3_000),
  DRY_RUN: BoolFromString.default("false"),

  // Driver
  PREFLIGHT_ENABLED: BoolFromString.default("true"),
  LOG_LEVEL: LogLevel.default("info"),
  LOG_FILE: z.string().default("logs/market-digest.jsonl"),
  RUN_REPORT_PATH: z.string().optional()
});

export type AppConfig = z.infer<typeof envSchema>;

function isValidTimeZone(tz: string): boolean {
  try {
    new Intl.DateTimeFormat("en-GB", { timeZone: tz });
    return true;
  } catch {
    return false;
  }
}

export function missingRequiredKeys(cfg: AppConfig): RequiredKey[] {
  return REQUIRED_KEYS.filter((key) => !cfg[key].trim());
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const lines = parsed.error.issues.map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`);
    throw new ConfigError(`Config validation errors:\n${lines.map((e) => `  - ${e}`).join("\n")}`);
  }

  const cfg = parsed.data;

  const missing = missingRequiredKeys(cfg);
  if (missing.length > 0) {
    throw new ConfigError(
      `Missing required configuration:\n${missing.map((k) => `  - ${k}`).join("\n")}`,
      missing
    );
  }

  if (!isValidTimeZone(cfg.REPORT_TIMEZONE)) {
    throw new ConfigError(`REPORT_TIMEZONE is not a valid IANA time zone: ${cfg.REPORT_TIMEZONE}`);
  }

  return cfg;
}
