/**
 * Shared helpers for the digest pipeline.
 */

/**
 * Sleep for a specified number of milliseconds.
 */
export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export type Sleep = (ms: number) => Promise<void>;

export type FetchedText = { response: Response; text: string };

/**
 * Fetch and read the whole body under one deadline. Once `timeoutMs` passes,
 * rejects with an AbortError whether headers or body were still pending.
 */
export async function fetchTextWithTimeout(url: string, init?: RequestInit, timeoutMs = 15000): Promise<FetchedText> {
  const controller = new AbortController();
  const t = setTimeout(() => controller.abort(), timeoutMs);
  try {
    const response = await fetch(url, { ...init, signal: controller.signal });
    const text = await response.text();
    return { response, text };
  } catch (err) {
    if (controller.signal.aborted) {
      throw Object.assign(new Error(`aborted after ${timeoutMs}ms`), { name: "AbortError" });
    }
    throw err;
  } finally {
    clearTimeout(t);
  }
}

export function safeJsonParse(s: string): unknown {
  try {
    return JSON.parse(s);
  } catch {
    return undefined;
  }
}

/**
 * Pull a JSON object out of model output (plain, fenced, or surrounded by prose).
 */
export function extractJsonObject(s: string): string | null {
  const trimmed = s.trim();

  // Common case: fenced code block
  const fenceMatch = trimmed.match(/```(?:json)?\s*([\s\S]*?)\s*```/i);
  if (fenceMatch?.[1]) {
    const candidate = fenceMatch[1].trim();
    if (candidate.startsWith("{") && candidate.endsWith("}")) return candidate;
  }

  // Fallback: first {...} block
  const first = trimmed.indexOf("{");
  const last = trimmed.lastIndexOf("}");
  if (first >= 0 && last > first) return trimmed.slice(first, last + 1);

  return null;
}

export function truncate(s: string, max: number): string {
  if (s.length <= max) return s;
  const suffix = "…";
  return s.slice(0, max - suffix.length).trimEnd() + suffix;
}

/** `2026-10-18 14:05 IST`-style stamp in the given IANA zone. */
export function formatReportStamp(now: Date, timeZone: string): string {
  const parts = new Intl.DateTimeFormat("en-GB", {
    timeZone,
    year: "numeric",
    month: "2-digit",
    day: "2-digit",
    hour: "2-digit",
    minute: "2-digit",
    hourCycle: "h23",
    timeZoneName: "short"
  }).formatToParts(now);

  const get = (type: Intl.DateTimeFormatPartTypes) => parts.find((p) => p.type === type)?.value ?? "";
  return `${get("year")}-${get("month")}-${get("day")} ${get("hour")}:${get("minute")} ${get("timeZoneName")}`.trim();
}
