/**
 * Progress Tracker
 * Live per-status counters and a bounded failure log for one batch.
 */

import type { Logger } from "pino"
import { errorMessage } from "../errors"
import type { ProgressListener, ProgressSource } from "../ports/progress-observer"
import type { FailureEntry, JobError, ProgressSnapshot, SendJob, SendJobStatus, StatusCounts } from "../types"

export interface ProgressTrackerOptions {
  total: number
  failureLogSize: number
  logger?: Logger
}

export class ProgressTracker implements ProgressSource {
  private readonly total: number
  private readonly failureLogSize: number
  private readonly logger: Logger | undefined
  private readonly counts: StatusCounts
  private readonly failures: FailureEntry[] = []
  private readonly listeners = new Set<ProgressListener>()
  private retrying = 0
  private failedAttempts = 0
  private updatedAt = new Date().toISOString()

  constructor(options: ProgressTrackerOptions) {
    this.total = options.total
    this.failureLogSize = Math.max(0, options.failureLogSize)
    this.logger = options.logger
    this.counts = { pending: options.total, in_flight: 0, succeeded: 0, failed: 0, exhausted: 0 }
  }

  /**
   * Apply one job state transition and notify subscribers
   */
  recordTransition(job: SendJob, from: SendJobStatus, to: SendJobStatus): void {
    this.counts[from] -= 1
    this.counts[to] += 1

    if (from === "pending" && job.attemptCount > 0) this.retrying -= 1
    if (to === "pending" && job.attemptCount > 0) this.retrying += 1

    this.updatedAt = new Date().toISOString()
    this.notify()
  }

  /**
   * Log a failed attempt (or a job rejected before sending), newest first
   */
  recordFailure(job: SendJob, error: JobError): void {
    if (error.kind !== "validation") {
      this.failedAttempts += 1
    }
    if (this.failureLogSize === 0) return

    this.failures.unshift({
      jobID: job.id,
      phoneNumber: job.recipient.phoneNumber,
      name: job.recipient.name,
      error,
      attempt: job.attemptCount,
      at: new Date().toISOString(),
    })
    if (this.failures.length > this.failureLogSize) {
      this.failures.length = this.failureLogSize
    }
  }

  snapshot(): ProgressSnapshot {
    const terminal = this.counts.succeeded + this.counts.exhausted
    return {
      total: this.total,
      counts: { ...this.counts },
      retrying: this.retrying,
      failedAttempts: this.failedAttempts,
      completion: this.total === 0 ? 1 : terminal / this.total,
      recentFailures: this.failures.map((entry) => ({ ...entry, error: { ...entry.error } })),
      updatedAt: this.updatedAt,
    }
  }

  subscribe(listener: ProgressListener): () => void {
    this.listeners.add(listener)
    return () => {
      this.listeners.delete(listener)
    }
  }

  private notify(): void {
    if (this.listeners.size === 0) return

    const snapshot = this.snapshot()
    for (const listener of this.listeners) {
      try {
        listener(snapshot)
      } catch (error) {
        this.logger?.warn({ error: errorMessage(error) }, "progress listener threw")
      }
    }
  }
}
