import { RateLimitError, TransportError, errorMessage } from "./errors.js";
import { fetchTextWithTimeout, safeJsonParse, truncate, type FetchedText } from "./utils.js";

export type HttpResult = {
  status: number;
  ok: boolean;
  headers: Headers;
  raw: string;
  json: unknown;
};

/**
 * One HTTP exchange, body included. Network failures, cut-off bodies and
 * timeouts become a retryable TransportError; HTTP statuses are returned for
 * the caller to classify.
 */
export async function httpRequest(args: {
  service: string;
  url: string;
  method?: "GET" | "POST";
  headers?: Record<string, string>;
  body?: unknown;
  timeoutMs: number;
}): Promise<HttpResult> {
  const method = args.method ?? (args.body === undefined ? "GET" : "POST");
  const headers: Record<string, string> = { Accept: "application/json", ...args.headers };
  if (args.body !== undefined) headers["Content-Type"] = "application/json";

  let fetched: FetchedText;
  try {
    fetched = await fetchTextWithTimeout(
      args.url,
      {
        method,
        headers,
        body: args.body === undefined ? undefined : JSON.stringify(args.body)
      },
      args.timeoutMs
    );
  } catch (err) {
    const aborted = err instanceof Error && err.name === "AbortError";
    throw new TransportError(
      aborted ? `${args.service} timed out after ${args.timeoutMs}ms` : `${args.service} network error: ${errorMessage(err)}`,
      { cause: err }
    );
  }

  const { response: res, text: raw } = fetched;
  return { status: res.status, ok: res.ok, headers: res.headers, raw, json: safeJsonParse(raw) };
}

export function parseRetryAfterHeaderMs(headers: Headers): number | null {
  const raw = headers.get("retry-after");
  if (!raw) return null;
  const n = Number(raw.trim());
  if (!Number.isFinite(n) || n <= 0) return null;
  return Math.floor(n * 1000);
}

export function summarizeBody(raw: string): string {
  return truncate(raw.replace(/\s+/g, " ").trim(), 300);
}

/**
 * 429 -> RateLimitError, 5xx -> retryable TransportError, other non-2xx -> non-retryable TransportError.
 */
export function throwForStatus(service: string, res: HttpResult, retryAfterMs?: number | null): void {
  if (res.ok) return;

  if (res.status === 429) {
    throw new RateLimitError(
      `${service} rate limited (HTTP 429)`,
      retryAfterMs ?? parseRetryAfterHeaderMs(res.headers)
    );
  }

  const detail = summarizeBody(res.raw);
  const message = `${service} HTTP ${res.status}${detail ? `: ${detail}` : ""}`;
  throw new TransportError(message, { status: res.status, retryable: res.status >= 500 });
}
