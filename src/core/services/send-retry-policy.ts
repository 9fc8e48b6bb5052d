/**
 * Send Retry Policy
 * Turns the outcome of one send attempt into the job's next state.
 */

import { computeBackoffDelay } from "../../lib/retry"
import { ConfigurationError } from "../errors"
import type { SendOutcome } from "../ports/send-capability"
import type { JobError } from "../types"

export interface SendRetryPolicyOptions {
  maxAttempts: number
  baseDelayMs: number
  factor: number
  maxDelayMs: number
}

export type ExhaustReason = "permanent" | "attempts_exhausted"

export type RetryDecision =
  | { kind: "succeeded"; messageId: string | undefined }
  | { kind: "retry"; error: JobError; delayMs: number; nextEligibleAt: number }
  | { kind: "exhausted"; error: JobError; reason: ExhaustReason }

export class SendRetryPolicy {
  private readonly options: SendRetryPolicyOptions

  constructor(options: SendRetryPolicyOptions) {
    const { maxAttempts, baseDelayMs, factor, maxDelayMs } = options
    if (!Number.isInteger(maxAttempts) || maxAttempts < 1) {
      throw new ConfigurationError("retry maxAttempts must be a positive integer")
    }
    if (!Number.isFinite(baseDelayMs) || baseDelayMs < 0) {
      throw new ConfigurationError("retry baseDelayMs must be a non-negative number")
    }
    if (!Number.isFinite(maxDelayMs) || maxDelayMs < baseDelayMs) {
      throw new ConfigurationError("retry maxDelayMs must be a number no smaller than baseDelayMs")
    }
    if (!Number.isFinite(factor) || factor < 1) {
      throw new ConfigurationError("retry factor must be at least 1")
    }
    this.options = options
  }

  get maxAttempts(): number {
    return this.options.maxAttempts
  }

  /**
   * Decide what follows an attempt. `attemptCount` includes the attempt being judged.
   */
  decide(outcome: SendOutcome, attemptCount: number, now: number): RetryDecision {
    if (outcome.ok) {
      return { kind: "succeeded", messageId: outcome.messageId }
    }

    const { failure } = outcome
    const error: JobError = { kind: failure.kind, message: failure.message }
    if (failure.code !== undefined) error.code = failure.code

    if (failure.kind === "permanent") {
      return { kind: "exhausted", error, reason: "permanent" }
    }
    if (attemptCount >= this.options.maxAttempts) {
      return { kind: "exhausted", error, reason: "attempts_exhausted" }
    }

    const delayMs = this.backoffDelay(attemptCount)
    return { kind: "retry", error, delayMs, nextEligibleAt: now + delayMs }
  }

  backoffDelay(attemptCount: number): number {
    return computeBackoffDelay(
      {
        minTimeoutMs: this.options.baseDelayMs,
        maxTimeoutMs: this.options.maxDelayMs,
        factor: this.options.factor,
      },
      attemptCount,
    )
  }
}
