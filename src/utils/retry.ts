import { NetworkError, TimeoutError } from "./errors.js";

export interface RetryConfig {
  maxAttempts: number;
  initialDelayMs: number;
  maxDelayMs: number;
  backoffMultiplier: number;
  jitter: boolean;
}

export const DEFAULT_RETRY_CONFIG: RetryConfig = {
  maxAttempts: 3,
  initialDelayMs: 1000,
  maxDelayMs: 30000,
  backoffMultiplier: 2,
  jitter: true,
};

/**
 * Retry a function with exponential backoff.
 *
 * @param fn          The async function to execute.
 * @param shouldRetry Predicate: return true to retry, false (or throw) to fail fast.
 * @param config      Partial overrides for retry timing.
 * @param onRetry     Optional callback invoked before each retry sleep.
 */
export async function withRetry<T>(
  fn: () => Promise<T>,
  shouldRetry: (err: unknown) => boolean,
  config?: Partial<RetryConfig>,
  onRetry?: (attempt: number, delay: number, err: unknown) => void,
): Promise<T> {
  const cfg: RetryConfig = { ...DEFAULT_RETRY_CONFIG, ...config };
  let lastError: unknown;

  for (let attempt = 0; attempt < cfg.maxAttempts; attempt++) {
    try {
      return await fn();
    } catch (err) {
      lastError = err;

      if (!shouldRetry(err)) throw err;
      if (attempt + 1 >= cfg.maxAttempts) break;

      const delay = computeDelay(attempt, cfg);
      onRetry?.(attempt + 1, delay, err);
      await sleep(delay);
    }
  }

  throw lastError;
}

/** Exponential backoff: min(initial * multiplier^attempt, maxDelay) ± 25% jitter */
export function computeDelay(attempt: number, config: RetryConfig): number {
  const base = Math.min(
    config.initialDelayMs * config.backoffMultiplier ** attempt,
    config.maxDelayMs,
  );
  if (!config.jitter) return base;
  const jitterFactor = 0.75 + Math.random() * 0.5; // ±25%
  return Math.round(base * jitterFactor);
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export interface FetchOptions {
  /** Label used in error messages and NetworkError.source */
  source: string;
  timeoutMs: number;
  method?: "GET" | "HEAD";
  retry?: Partial<RetryConfig>;
  onRetry?: (attempt: number, delay: number, err: unknown) => void;
}

/**
 * GET (or HEAD) a URL with a hard deadline per attempt.
 * Non-2xx responses become NetworkError; 429/5xx are retried with backoff.
 * A deadline hit becomes TimeoutError and is not retried.
 */
export async function fetchWithRetry(url: string, opts: FetchOptions): Promise<Response> {
  return withRetry(
    async () => {
      let res: Response;
      try {
        res = await fetch(url, {
          method: opts.method ?? "GET",
          signal: AbortSignal.timeout(opts.timeoutMs),
        });
      } catch (err) {
        if (isAbortTimeout(err)) throw new TimeoutError(`${opts.source} request`, opts.timeoutMs);
        throw new NetworkError(
          `${opts.source} request failed: ${err instanceof Error ? err.message : String(err)}`,
          undefined,
          opts.source,
        );
      }
      if (!res.ok) {
        throw new NetworkError(`${opts.source} request failed: HTTP ${res.status}`, res.status, opts.source);
      }
      return res;
    },
    (err) => err instanceof NetworkError && err.isRetryable,
    opts.retry,
    opts.onRetry,
  );
}

function isAbortTimeout(err: unknown): boolean {
  return err instanceof Error && (err.name === "TimeoutError" || err.name === "AbortError");
}
