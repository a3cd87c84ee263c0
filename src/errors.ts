/**
 * Error taxonomy shared by every stage.
 *
 * Mandatory stages (search, analysis) let these escape to the pipeline driver;
 * per-locale work catches them and records a failed result instead.
 */

export class ConfigError extends Error {
  public readonly missing: string[];

  constructor(message: string, missing: string[] = []) {
    super(message);
    this.name = "ConfigError";
    this.missing = missing;
  }
}

export class TransportError extends Error {
  public readonly status: number | null;
  public readonly retryable: boolean;

  constructor(message: string, opts?: { status?: number | null; retryable?: boolean; cause?: unknown }) {
    super(message, opts?.cause === undefined ? undefined : { cause: opts.cause });
    this.name = "TransportError";
    this.status = opts?.status ?? null;
    this.retryable = opts?.retryable ?? true;
  }
}

export class RateLimitError extends Error {
  public readonly retryAfterMs: number | null;

  constructor(message: string, retryAfterMs: number | null = null) {
    super(message);
    this.name = "RateLimitError";
    this.retryAfterMs = retryAfterMs;
  }
}

export class ValidationError extends Error {
  public readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super(message);
    this.name = "ValidationError";
    this.issues = issues;
  }
}

export class DeliveryError extends Error {
  public readonly locale: string;
  public readonly status: number | null;
  /** Parts of a split message that went out before the failure. */
  public readonly sentMessageIds: number[];

  constructor(locale: string, message: string, status: number | null = null, sentMessageIds: number[] = []) {
    super(message);
    this.name = "DeliveryError";
    this.locale = locale;
    this.status = status;
    this.sentMessageIds = sentMessageIds;
  }
}

/** Network, timeout, 5xx and 429 failures are worth another attempt. */
export function isRetryableError(err: unknown): boolean {
  if (err instanceof RateLimitError) return true;
  if (err instanceof TransportError) return err.retryable;
  return false;
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
