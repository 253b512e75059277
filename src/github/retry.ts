/**
 * Bounded exponential backoff for TransientError only. Anything else propagates
 * on the first failure.
 */

import { TransientError } from "../errors.js";
import type { Logger } from "../log.js";

export const RETRY_DELAYS_MS = [1000, 2000, 4000, 8000, 16000];
export const DEFAULT_MAX_ATTEMPTS = 3;

export interface RetryOptions {
  maxAttempts?: number;
  /** Delay before retry n (0-based); the last entry repeats. */
  delaysMs?: number[];
  sleep?: (ms: number) => Promise<void>;
  random?: () => number;
  signal?: AbortSignal;
  logger?: Logger;
}

export function sleep(ms: number): Promise<void> {
  return new Promise((r) => setTimeout(r, ms));
}

export function jitter(ms: number, random: () => number = Math.random): number {
  const spread = Math.floor(ms * 0.2);
  return ms + Math.floor(random() * (2 * spread + 1)) - spread;
}

export function backoffDelay(attempt: number, delaysMs: number[] = RETRY_DELAYS_MS): number {
  if (delaysMs.length === 0) return 0;
  return delaysMs[Math.min(attempt, delaysMs.length - 1)] ?? 0;
}

export async function withRetry<T>(
  label: string,
  fn: () => Promise<T>,
  opts: RetryOptions = {},
): Promise<T> {
  const maxAttempts = Math.max(1, opts.maxAttempts ?? DEFAULT_MAX_ATTEMPTS);
  const delays = opts.delaysMs ?? RETRY_DELAYS_MS;
  const wait = opts.sleep ?? sleep;

  for (let attempt = 0; ; attempt++) {
    try {
      return await fn();
    } catch (err) {
      if (!(err instanceof TransientError)) throw err;
      if (attempt + 1 >= maxAttempts) {
        throw new TransientError(
          `${label} failed after ${maxAttempts} attempt(s): ${err.message}`,
          err.retryAfterMs,
          { cause: err },
        );
      }
      if (opts.signal?.aborted) throw err;

      const base = backoffDelay(attempt, delays);
      const ceiling = delays.length > 0 ? Math.max(...delays) : 0;
      const delay = err.retryAfterMs != null
        ? Math.min(err.retryAfterMs, ceiling)
        : jitter(base, opts.random);
      opts.logger?.warn(`${label}: ${err.message}; retry ${attempt + 1} in ${delay}ms`);
      await wait(delay);
    }
  }
}
