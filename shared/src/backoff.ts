import type { BackoffPolicy, TaskSpec } from "./types.js";

export const DEFAULT_BACKOFF: BackoffPolicy = { baseMs: 1000, capMs: 30_000, jitter: true };

export const DEFAULT_TIMEOUT_MS = 10_000;

/** Largest delay `setTimeout` honours; longer ones fire after 1ms. */
export const MAX_TIMER_DELAY_MS = 2_147_483_647;

export interface ResolvedRetryPolicy {
  maxRetries: number;
  backoff: BackoffPolicy;
}

export function resolveRetryPolicy(task: TaskSpec): ResolvedRetryPolicy {
  return {
    maxRetries: task.retry?.maxRetries ?? 0,
    backoff: { ...DEFAULT_BACKOFF, ...task.retry?.backoff }
  };
}

/** First attempt plus every permitted retry. */
export function maxAttempts(task: TaskSpec): number {
  return resolveRetryPolicy(task).maxRetries + 1;
}

export function resolveTimeoutMs(task: TaskSpec): number {
  return Math.min(task.timeoutMs ?? DEFAULT_TIMEOUT_MS, MAX_TIMER_DELAY_MS);
}

/**
 * Exponential delay after the given failed attempt, capped, with equal jitter
 * (half fixed, half random) when the policy asks for it.
 */
export function calculateBackoffMs(
  policy: BackoffPolicy,
  attemptNo: number,
  random: () => number = Math.random
): number {
  const factor = 2 ** Math.max(0, attemptNo - 1);
  const exponential = Math.min(policy.baseMs * factor, policy.capMs);
  if (!policy.jitter) return exponential;
  const half = exponential / 2;
  return Math.round(half + random() * half);
}
