/**
 * Rate Limiter
 * Sliding-window admission gate shared by every dispatch worker.
 */

import type { Logger } from "pino"
import { ConfigurationError } from "../../core/errors"
import type { ThrottleGrant, ThrottlePort } from "../../core/ports/throttle"
import { delay } from "../../lib/delay"

export interface RateLimiterOptions {
  maxSends: number
  windowMs: number
  logger?: Logger
}

export class RateLimiter implements ThrottlePort {
  // Grant times of admitted sends still inside the window, oldest first.
  private readonly admitted: number[] = []
  private tail: Promise<void> = Promise.resolve()
  private readonly options: RateLimiterOptions

  constructor(options: RateLimiterOptions) {
    if (!Number.isInteger(options.maxSends) || options.maxSends < 1) {
      throw new ConfigurationError("rate limiter maxSends must be a positive integer")
    }
    if (!Number.isFinite(options.windowMs) || options.windowMs <= 0) {
      throw new ConfigurationError("rate limiter windowMs must be positive")
    }
    this.options = options
  }

  /**
   * Wait for a free slot. Concurrent callers are admitted in call order.
   */
  async acquire(): Promise<ThrottleGrant> {
    const requestedAt = Date.now()
    const turn = this.tail.then(() => this.admit(requestedAt))
    this.tail = turn.then(
      () => undefined,
      () => undefined,
    )
    return turn
  }

  private async admit(requestedAt: number): Promise<ThrottleGrant> {
    let now = Date.now()
    this.prune(now)

    while (this.admitted.length >= this.options.maxSends) {
      const waitMs = this.admitted[0] + this.options.windowMs - now
      this.options.logger?.debug(
        { waitMs, inWindow: this.admitted.length, maxSends: this.options.maxSends },
        "rate limit reached, waiting for window",
      )
      await delay(waitMs)
      now = Date.now()
      this.prune(now)
    }

    this.admitted.push(now)
    return { requestedAt, grantedAt: now, waitedMs: now - requestedAt }
  }

  private prune(now: number): void {
    const cutoff = now - this.options.windowMs
    let expired = 0
    while (expired < this.admitted.length && this.admitted[expired] <= cutoff) {
      expired += 1
    }
    if (expired > 0) {
      this.admitted.splice(0, expired)
    }
  }
}
