import { sleep, type SleepFn } from "../time/sleep";

export type RetryDecision =
  | boolean
  | {
      retry: boolean;
      delayMs?: number;
    };

export type BackoffKind = "linear" | "exponential";

export type RetryOptions = {
  retries: number;          // max attempts after initial try (e.g. 2 means up to 3 total tries)
  minDelayMs: number;       // base delay for backoff
  maxDelayMs: number;       // max delay cap
  backoff?: BackoffKind;    // linear: base * n, exponential: base * 2^(n-1)
  shouldRetry: (err: unknown) => RetryDecision;
  onRetry?: (ctx: { attempt: number; maxAttempts: number; delayMs: number; error: unknown }) => void;
  onGiveUp?: (ctx: { attempt: number; maxAttempts: number; error: unknown; exhausted: boolean }) => void;
  randomFn?: () => number;
  jitterRatio?: number;
  sleepFn?: SleepFn;
};

/**
 * Thrown when the last allowed attempt fails with an error that would otherwise
 * have been retried. Errors rejected by `shouldRetry` are rethrown unchanged.
 */
export class RetryExhaustedError extends Error {
  readonly attempts: number;
  readonly lastError: unknown;

  constructor(attempts: number, lastError: unknown) {
    super(`Gave up after ${attempts} attempts: ${lastError instanceof Error ? lastError.message : String(lastError)}`);
    this.name = "RetryExhaustedError";
    this.attempts = attempts;
    this.lastError = lastError;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export const computeBackoffMs = (kind: BackoffKind, minDelayMs: number, retryNumber: number): number =>
  kind === "linear" ? minDelayMs * retryNumber : minDelayMs * Math.pow(2, retryNumber - 1);

export const retry = async <T>(fn: () => Promise<T>, opts: RetryOptions): Promise<T> => {
  const {
    retries,
    minDelayMs,
    maxDelayMs,
    backoff = "exponential",
    shouldRetry,
    onRetry,
    onGiveUp,
    randomFn = Math.random,
    jitterRatio = 0.2,
    sleepFn = sleep
  } = opts;

  let attempt = 0;
  const maxAttempts = retries + 1;
  // attempt=0 is first try, then up to retries extra
  while (true) {
    try {
      return await fn();
    } catch (err) {
      const decision = shouldRetry(err);
      const normalized =
        typeof decision === "boolean"
          ? { retry: decision, delayMs: undefined }
          : decision;
      if (!normalized.retry) {
        onGiveUp?.({ attempt: attempt + 1, maxAttempts, error: err, exhausted: false });
        throw err;
      }
      if (attempt >= retries) {
        onGiveUp?.({ attempt: attempt + 1, maxAttempts, error: err, exhausted: true });
        throw new RetryExhaustedError(maxAttempts, err);
      }

      const customDelayMs =
        typeof normalized.delayMs === "number" && Number.isFinite(normalized.delayMs) && normalized.delayMs >= 0
          ? normalized.delayMs
          : undefined;
      const base = customDelayMs != null
        ? Math.min(maxDelayMs, customDelayMs)
        : Math.min(maxDelayMs, computeBackoffMs(backoff, minDelayMs, attempt + 1));
      const normalizedJitterRatio = Math.min(1, Math.max(0, jitterRatio));
      const normalizedRandom = Math.min(1, Math.max(0, randomFn()));
      const jitter = Math.floor(base * normalizedJitterRatio * normalizedRandom);
      const waitMs = base + jitter;
      onRetry?.({ attempt: attempt + 1, maxAttempts, delayMs: waitMs, error: err });
      await sleepFn(waitMs);
      attempt += 1;
    }
  }
};
