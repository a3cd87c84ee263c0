import type { AppConfig } from "./config.js";
import { RateLimitError, errorMessage, isRetryableError } from "./errors.js";
import type { Logger } from "./logger.js";
import { sleep as realSleep, type Sleep } from "./utils.js";

export type RetryPolicy = {
  maxAttempts: number;
  /** Delay before attempt `attempt + 1`, given the error that ended `attempt` (1-based). */
  backoffMs: (attempt: number, err: unknown) => number;
  isRetryable: (err: unknown) => boolean;
};

export type RetryOptions = {
  policy: RetryPolicy;
  label: string;
  logger?: Logger;
  sleep?: Sleep;
  /** Called once per attempt, before it starts. */
  onAttempt?: (attempt: number) => void;
};

/**
 * Exponential backoff: base, 2x base, 4x base...
 * Rate limits start from the longer base and honor a server-provided retry-after.
 */
export function exponentialBackoff(args: { baseMs: number; rateLimitBaseMs: number; maxMs?: number }) {
  const maxMs = args.maxMs ?? 60_000;
  return (attempt: number, err: unknown): number => {
    if (err instanceof RateLimitError) {
      const fromServer = err.retryAfterMs ?? 0;
      const ours = args.rateLimitBaseMs * Math.pow(2, attempt - 1);
      return Math.min(Math.max(fromServer, ours), maxMs);
    }
    return Math.min(args.baseMs * Math.pow(2, attempt - 1), maxMs);
  };
}

export function retryPolicyFromConfig(cfg: AppConfig): RetryPolicy {
  return {
    maxAttempts: cfg.RETRY_MAX_ATTEMPTS,
    backoffMs: exponentialBackoff({
      baseMs: cfg.RETRY_BASE_DELAY_MS,
      rateLimitBaseMs: cfg.RATE_LIMIT_BASE_DELAY_MS
    }),
    isRetryable: isRetryableError
  };
}

/**
 * Run `fn` until it succeeds, throws a non-retryable error, or `maxAttempts` is spent.
 * The last error is rethrown unchanged.
 */
export async function withRetry<T>(fn: (attempt: number) => Promise<T>, opts: RetryOptions): Promise<T> {
  const { policy, label } = opts;
  const sleep = opts.sleep ?? realSleep;

  let lastErr: unknown = null;
  for (let attempt = 1; attempt <= policy.maxAttempts; attempt++) {
    opts.onAttempt?.(attempt);
    try {
      return await fn(attempt);
    } catch (err) {
      lastErr = err;
      const retryable = policy.isRetryable(err);
      if (!retryable || attempt >= policy.maxAttempts) {
        opts.logger?.warn("retry.gave_up", {
          label,
          attempt,
          maxAttempts: policy.maxAttempts,
          retryable,
          error: errorMessage(err)
        });
        break;
      }

      const delayMs = policy.backoffMs(attempt, err);
      opts.logger?.info("retry.backoff", {
        label,
        attempt,
        delayMs,
        rateLimited: err instanceof RateLimitError,
        error: errorMessage(err)
      });
      await sleep(delayMs);
    }
  }
  throw lastErr instanceof Error ? lastErr : new Error(String(lastErr));
}
