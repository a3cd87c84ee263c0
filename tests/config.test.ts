import { describe, it, expect } from "vitest";
import { loadConfig, missingRequiredKeys, REQUIRED_KEYS } from "../src/config.js";
import { ConfigError } from "../src/errors.js";
import { TEST_ENV } from "./helpers.js";

function withEnv(overrides: Record<string, string | undefined>): NodeJS.ProcessEnv {
  return { ...TEST_ENV, ...overrides };
}

describe("Config validation", () => {
  it("applies defaults when only the required keys are set", () => {
    const cfg = loadConfig({
      GROQ_API_KEY: "test-groq-key",
      TAVILY_API_KEY: "test-tavily-key",
      SERPER_API_KEY: "test-serper-key",
      TELEGRAM_BOT_TOKEN: "test-bot-token",
      TELEGRAM_CHAT_ID: "-100123"
    });

    expect(cfg.LLM_BASE_URL).toBe("https://api.groq.com/openai/v1");
    expect(cfg.ANALYSIS_MODEL).toBe("llama3-70b-8192");
    expect(cfg.TRANSLATION_MODEL).toBe("llama3-8b-8192");
    expect(cfg.RETRY_MAX_ATTEMPTS).toBe(3);
    expect(cfg.SEARCH_MAX_DOCUMENTS).toBe(20);
    expect(cfg.CHARTS_ENABLED).toBe(true);
    expect(cfg.DRY_RUN).toBe(false);
    expect(cfg.TRANSLATION_FALLBACK).toBe("skip");
    expect(cfg.REPORT_TIMEZONE).toBe("Asia/Kolkata");
    expect(cfg.RUN_REPORT_PATH).toBeUndefined();
  });

  it("coerces numbers and booleans from strings", () => {
    const cfg = loadConfig(withEnv({ RETRY_MAX_ATTEMPTS: "5", DRY_RUN: "true", CHARTS_ENABLED: "false" }));
    expect(cfg.RETRY_MAX_ATTEMPTS).toBe(5);
    expect(cfg.DRY_RUN).toBe(true);
    expect(cfg.CHARTS_ENABLED).toBe(false);
  });

  it("lists every missing required key in one ConfigError", () => {
    let caught: unknown;
    try {
      loadConfig({});
    } catch (err) {
      caught = err;
    }

    expect(caught).toBeInstanceOf(ConfigError);
    if (!(caught instanceof ConfigError)) return;
    expect(caught.missing).toEqual([...REQUIRED_KEYS]);
    expect(caught.message).toContain("  - TELEGRAM_CHAT_ID");
  });

  it("treats blank secrets as missing", () => {
    try {
      loadConfig(withEnv({ SERPER_API_KEY: "   ", TELEGRAM_CHAT_ID: undefined }));
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(ConfigError);
      if (err instanceof ConfigError) expect(err.missing).toEqual(["SERPER_API_KEY", "TELEGRAM_CHAT_ID"]);
    }
  });

  it("rejects out-of-range retry attempts", () => {
    expect(() => loadConfig(withEnv({ RETRY_MAX_ATTEMPTS: "0" }))).toThrow(/RETRY_MAX_ATTEMPTS/);
  });

  it("rejects non-boolean flags", () => {
    expect(() => loadConfig(withEnv({ DRY_RUN: "yes" }))).toThrow(ConfigError);
  });

  it("rejects an unknown translation fallback", () => {
    expect(() => loadConfig(withEnv({ TRANSLATION_FALLBACK: "english" }))).toThrow(/TRANSLATION_FALLBACK/);
  });

  it("rejects an unknown time zone", () => {
    expect(() => loadConfig(withEnv({ REPORT_TIMEZONE: "Mars/Olympus" }))).toThrow(/REPORT_TIMEZONE/);
  });

  it("missingRequiredKeys is empty for a complete config", () => {
    expect(missingRequiredKeys(loadConfig(TEST_ENV))).toEqual([]);
  });
});
