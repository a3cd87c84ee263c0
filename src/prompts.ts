import type { TargetLocale } from "./locales.js";
import { LOCALE_INFO } from "./locales.js";
import type { NewsDocument } from "./search/types.js";

export const CONTENT_BEGIN = "-----BEGIN CONTENT-----";
export const CONTENT_END = "-----END CONTENT-----";

export const ANALYST_SYSTEM_PROMPT = `
You are a senior financial analyst writing a daily US market summary for traders and investors.

Rules:
- Use only facts present in the provided news items. Do not invent numbers.
- If an index level or percentage is not in the news items, leave that index out.
- Write numbers with Western digits and no thousands separators (6460.26, not 6,460.26).
- Return ONLY valid JSON. No markdown, no commentary.
`.trim();

export const ANALYSIS_TASK = `
Create a professional financial summary (under 450 words in total) with this structure:

MARKET OVERVIEW: major indices (S&P 500, Dow Jones, NASDAQ) with level and percentage change.
KEY HEADLINES: the 3-4 most important financial stories today, each with a one-line market impact.
NOTABLE MOVERS: up to 3 gainers and 3 losers with percentage change and reason.
TOMORROW'S WATCH: upcoming earnings, economic data releases, key events.

JSON format:
{
  "indices": [{ "name": "S&P 500", "value": "6460.26", "change_pct": "+0.64" }],
  "headlines": ["Headline - impact"],
  "movers": {
    "gainers": [{ "symbol": "NVDA", "change_pct": "+3.10", "reason": "..." }],
    "losers": [{ "symbol": "TSLA", "change_pct": "-2.40", "reason": "..." }]
  },
  "outlook": ["Item to watch"]
}
`.trim();

function sanitizePromptField(s: string | undefined, maxLen: number): string {
  const raw = (s ?? "").replace(/\s+/g, " ").trim();
  // Strip characters that break the prompt's own formatting
  const cleaned = raw.replace(/[`$<>]/g, "");
  return cleaned.length > maxLen ? `${cleaned.slice(0, maxLen)}…` : cleaned;
}

export function buildAnalysisPrompt(docs: NewsDocument[]): string {
  const list = docs
    .map((d, i) =>
      [
        `[${i + 1}] ${sanitizePromptField(d.title, 220)}`,
        `Source: ${sanitizePromptField(d.source, 80)}`,
        d.publishedAt ? `Published: ${sanitizePromptField(d.publishedAt, 40)}` : "",
        d.snippet ? `Snippet: ${sanitizePromptField(d.snippet, 600)}` : ""
      ]
        .filter(Boolean)
        .join("\n")
    )
    .join("\n\n");

  return `${ANALYSIS_TASK}\n\nNews items:\n\n${list}\n\nReturn ONLY JSON.`;
}

export function buildAnalysisCorrection(originalPrompt: string, badOutput: string, issues: string[]): string {
  return [
    originalPrompt,
    "",
    "Your previous answer could not be used:",
    ...issues.map((i) => `- ${i}`),
    "",
    "Previous answer:",
    sanitizePromptField(badOutput, 2000),
    "",
    "Answer again with ONLY a JSON object matching the format above."
  ].join("\n");
}

export function translationSystemPrompt(locale: TargetLocale): string {
  const info = LOCALE_INFO[locale];
  return [
    `You are an expert ${info.language} translator of financial content.`,
    "Keep all HTML tags (<b>, <i>, <a href=...>) exactly as they are, including link targets.",
    "Keep every number, percentage, sign, ticker symbol and company name unchanged, written with Western digits.",
    info.scriptHint ?? "",
    "Return only the translated text, with no preamble."
  ]
    .filter(Boolean)
    .join("\n");
}

export function buildTranslationPrompt(locale: TargetLocale, html: string): string {
  const info = LOCALE_INFO[locale];
  return `Translate this financial summary to ${info.language}.\n\n${CONTENT_BEGIN}\n${html}\n${CONTENT_END}`;
}

export function buildTranslationCorrection(locale: TargetLocale, html: string, issues: string[]): string {
  return [
    buildTranslationPrompt(locale, html),
    "",
    "Your previous translation changed or dropped numbers. Problems:",
    ...issues.map((i) => `- ${i}`),
    "Translate again and copy every number exactly as written in the source."
  ].join("\n");
}
