import pRetry, { type FailedAttemptError } from "p-retry"

export interface BackoffPolicy {
  retries: number
  minTimeoutMs: number
  maxTimeoutMs: number
  factor?: number
}

export interface RetryHooks {
  onFailedAttempt?: (error: FailedAttemptError) => void
}

export interface BuiltRetryOptions {
  retries: number
  minTimeout: number
  maxTimeout: number
  factor: number
  randomize: boolean
  onFailedAttempt?: (error: FailedAttemptError) => void
}

export async function retryWithBackoff<T>(
  operation: () => Promise<T>,
  policy: BackoffPolicy,
  hooks: RetryHooks = {},
): Promise<T> {
  return pRetry(operation, buildRetryOptions(policy, hooks))
}

export function buildRetryOptions(policy: BackoffPolicy, hooks: RetryHooks = {}): BuiltRetryOptions {
  return {
    retries: policy.retries,
    minTimeout: policy.minTimeoutMs,
    maxTimeout: policy.maxTimeoutMs,
    factor: policy.factor ?? 2,
    randomize: false,
    onFailedAttempt: hooks.onFailedAttempt,
  }
}

/**
 * Delay before the retry that follows failed attempt number `attemptNumber` (1-based).
 * Same curve p-retry uses with `randomize: false`.
 */
export function computeBackoffDelay(policy: Omit<BackoffPolicy, "retries">, attemptNumber: number): number {
  const factor = policy.factor ?? 2
  const exponent = Math.max(0, attemptNumber - 1)
  return Math.min(Math.round(policy.minTimeoutMs * factor ** exponent), policy.maxTimeoutMs)
}
