import { setTimeout as delay } from "timers/promises";
import { ConfigurationError, MessageValidationError } from "../core/errors.js";

export interface RetryOptions {
  attempts?: number;
  initialDelayMs?: number;
  multiplier?: number;
  shouldRetry?: (err: unknown, attempt: number) => boolean;
  sleep?: (ms: number) => Promise<void>;
  onRetry?: (err: unknown, attempt: number, delayMs: number) => void;
}

export const DEFAULT_RETRY = { attempts: 3, initialDelayMs: 1500, multiplier: 1.5 } as const;

export function isRetryable(err: unknown): boolean {
  return !(err instanceof ConfigurationError) && !(err instanceof MessageValidationError);
}

/** Runs `op` up to `attempts` times, sleeping initialDelayMs * multiplier^(n-1) between tries. */
export async function retryWithBackoff<T>(op: (attempt: number) => Promise<T>, options: RetryOptions = {}): Promise<T> {
  const attempts = Math.max(1, options.attempts ?? DEFAULT_RETRY.attempts);
  const multiplier = options.multiplier ?? DEFAULT_RETRY.multiplier;
  const shouldRetry = options.shouldRetry ?? isRetryable;
  const sleep = options.sleep ?? ((ms: number) => delay(ms));
  let waitMs = options.initialDelayMs ?? DEFAULT_RETRY.initialDelayMs;

  for (let attempt = 1; ; attempt++) {
    try {
      return await op(attempt);
    } catch (err) {
      if (attempt >= attempts || !shouldRetry(err, attempt)) throw err;
      options.onRetry?.(err, attempt, waitMs);
      await sleep(waitMs);
      waitMs *= multiplier;
    }
  }
}
