import type { BotConfig } from "../config.js";
import { NetworkError, RetryExhaustedError } from "../errors.js";
import { clamp, type RandomSource } from "../utils/math.js";
import { delay, type Sleeper } from "../utils/time.js";

export interface RetryPolicy {
  maxAttempts: number;
  /** Milliseconds to wait after failed attempt number `attempt` (1-based). */
  backoffMs(attempt: number): number;
  sleep: Sleeper;
}

/**
 * Jittered backoff that grows with the attempt number but never leaves the
 * ACTION_DELAY bounds.
 */
export function createRetryPolicy(
  config: Pick<BotConfig, "requestRetries" | "actionDelay">,
  random: RandomSource = Math.random,
  sleep: Sleeper = delay
): RetryPolicy {
  const [lo, hi] = config.actionDelay;
  return {
    maxAttempts: config.requestRetries,
    backoffMs: (attempt) => clamp(lo * attempt + (hi - lo) * random(), lo, hi) * 1000,
    sleep,
  };
}

export interface RetryHooks {
  signal?: AbortSignal;
  onRetry?: (attempt: number, error: NetworkError, waitMs: number) => void;
}

/**
 * Run `fn` until it succeeds or the policy is exhausted. Only NetworkError is
 * retried; anything else propagates on the first throw.
 */
export async function withRetry<T>(
  policy: RetryPolicy,
  endpoint: string,
  fn: () => Promise<T>,
  hooks: RetryHooks = {}
): Promise<T> {
  let lastError: NetworkError | null = null;

  for (let attempt = 1; attempt <= policy.maxAttempts; attempt++) {
    try {
      return await fn();
    } catch (error) {
      if (!(error instanceof NetworkError)) throw error;
      lastError = error;
      // No retries once shutdown has been requested
      if (hooks.signal?.aborted) throw error;
      if (attempt < policy.maxAttempts) {
        const waitMs = policy.backoffMs(attempt);
        hooks.onRetry?.(attempt, error, waitMs);
        await policy.sleep(waitMs, hooks.signal);
      }
    }
  }

  throw new RetryExhaustedError(
    endpoint,
    policy.maxAttempts,
    lastError ?? new NetworkError(endpoint, "no attempts made")
  );
}
