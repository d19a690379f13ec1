/**
 * Lock acquisition backoff
 *
 * Exponential backoff with jitter, expressed as a pure decision function so the
 * coordinator's retry loop can be tested without clocks or backends.
 */

import { setTimeout as delay } from 'timers/promises';
import type { BackoffPolicy } from '../types.js';

/**
 * Jitter applied around the capped delay (±25%)
 */
const JITTER_RATIO = 0.25;

export const DEFAULT_BACKOFF_POLICY: BackoffPolicy = {
  maxAttempts: 10,
  maxElapsed: null,
  backoffBase: 1000,
  backoffFactor: 2,
  backoffCapped: 30000,
};

export interface BackoffProgress {
  /** Acquire attempts made so far (1 after the first failure) */
  attempt: number;
  /** Milliseconds since the first attempt started */
  elapsedMs: number;
}

export type BackoffDecision =
  | { action: 'wait'; delayMs: number }
  | { action: 'give-up'; reason: 'attempts' | 'elapsed' };

/**
 * Decide whether to retry and how long to wait first
 *
 * @param progress - Attempts made and time spent so far
 * @param policy - Retry budget and backoff shape
 * @param random - Source of jitter in [0, 1)
 *
 * @example
 * ```typescript
 * nextBackoff({ attempt: 1, elapsedMs: 0 }, DEFAULT_BACKOFF_POLICY, () => 0.5);
 * // { action: 'wait', delayMs: 1000 }
 * ```
 */
export function nextBackoff(
  progress: BackoffProgress,
  policy: BackoffPolicy,
  random: () => number = Math.random
): BackoffDecision {
  const { attempt, elapsedMs } = progress;

  if (policy.maxAttempts !== null && attempt >= policy.maxAttempts) {
    return { action: 'give-up', reason: 'attempts' };
  }
  if (policy.maxElapsed !== null && elapsedMs >= policy.maxElapsed) {
    return { action: 'give-up', reason: 'elapsed' };
  }

  const exponential = policy.backoffBase * Math.pow(policy.backoffFactor, Math.max(attempt - 1, 0));
  const capped = Math.min(exponential, policy.backoffCapped);
  const jitter = capped * JITTER_RATIO * (random() * 2 - 1);
  let delayMs = Math.floor(Math.min(Math.max(capped + jitter, 0), policy.backoffCapped));

  if (policy.maxElapsed !== null) {
    delayMs = Math.min(delayMs, policy.maxElapsed - elapsedMs);
  }

  return { action: 'wait', delayMs };
}

/**
 * Sleep that rejects with an AbortError as soon as the signal fires
 */
export type Sleep = (ms: number, signal?: AbortSignal) => Promise<void>;

export const sleep: Sleep = async (ms, signal) => {
  await delay(ms, undefined, { signal });
};
