/**
 * Dispatch Queue
 * Owns every SendJob of a batch and enforces its state machine.
 *
 * Never-attempted jobs sit in load order behind a cursor; jobs waiting for a
 * retry are kept apart with their eligibility time. Among eligible jobs the
 * one loaded first is dequeued next.
 */

import type { AttachmentRef, JobError, JobResult, Recipient, SendJob, SendJobStatus } from "../types"

export type DequeueResult =
  | { kind: "ready"; job: SendJob }
  | { kind: "waiting"; until: number }
  | { kind: "drained" }

export interface TransitionListener {
  (job: SendJob, from: SendJobStatus, to: SendJobStatus): void
}

export interface DispatchQueueOptions {
  recipients: readonly Recipient[]
  attachment?: AttachmentRef
  enqueuedAt: number
  onTransition?: TransitionListener
}

const TRANSITIONS: Record<SendJobStatus, readonly SendJobStatus[]> = {
  pending: ["in_flight"],
  in_flight: ["succeeded", "failed", "exhausted"],
  failed: ["pending", "exhausted"],
  succeeded: [],
  exhausted: [],
}

export class DispatchQueue {
  private readonly jobs: SendJob[]
  private readonly awaitingRetry: SendJob[] = []
  private readonly onTransition: TransitionListener | undefined
  private cursor = 0

  constructor(options: DispatchQueueOptions) {
    this.onTransition = options.onTransition
    this.jobs = options.recipients.map((recipient, index) => ({
      id: index + 1,
      recipient,
      attachment: options.attachment,
      renderedMessage: undefined,
      status: "pending",
      attemptCount: 0,
      lastError: undefined,
      nextEligibleAt: options.enqueuedAt,
    }))
  }

  get size(): number {
    return this.jobs.length
  }

  get pendingCount(): number {
    return this.jobs.length - this.cursor + this.awaitingRetry.length
  }

  /**
   * Take the next eligible job and mark it in flight in the same step
   */
  next(now: number): DequeueResult {
    const fresh = this.cursor < this.jobs.length ? this.jobs[this.cursor] : undefined

    let retryIndex = -1
    let earliest = Number.POSITIVE_INFINITY
    for (let i = 0; i < this.awaitingRetry.length; i++) {
      const job = this.awaitingRetry[i]
      if (job.nextEligibleAt <= now) {
        if (retryIndex === -1 || job.id < this.awaitingRetry[retryIndex].id) retryIndex = i
      } else if (job.nextEligibleAt < earliest) {
        earliest = job.nextEligibleAt
      }
    }

    const retry = retryIndex === -1 ? undefined : this.awaitingRetry[retryIndex]

    if (fresh && (!retry || fresh.id < retry.id)) {
      this.cursor += 1
      this.transition(fresh, "in_flight")
      return { kind: "ready", job: fresh }
    }

    if (retry) {
      this.awaitingRetry.splice(retryIndex, 1)
      this.transition(retry, "in_flight")
      return { kind: "ready", job: retry }
    }

    if (this.awaitingRetry.length > 0) {
      return { kind: "waiting", until: earliest }
    }

    return { kind: "drained" }
  }

  complete(job: SendJob): void {
    job.lastError = undefined
    this.transition(job, "succeeded")
  }

  /**
   * Finalize a job without further attempts
   */
  exhaust(job: SendJob, error: JobError): void {
    job.lastError = error
    this.transition(job, "exhausted")
  }

  /**
   * Record a failed attempt and put the job back as pending from `nextEligibleAt`
   */
  requeue(job: SendJob, error: JobError, nextEligibleAt: number): void {
    job.lastError = error
    this.transition(job, "failed")
    job.nextEligibleAt = nextEligibleAt
    this.transition(job, "pending")
    this.awaitingRetry.push(job)
  }

  /**
   * Per-recipient results in load order
   */
  results(): JobResult[] {
    return this.jobs.map((job) => ({
      jobID: job.id,
      phoneNumber: job.recipient.phoneNumber,
      name: job.recipient.name,
      status: job.status,
      attemptCount: job.attemptCount,
      lastError: job.lastError ? { ...job.lastError } : undefined,
    }))
  }

  private transition(job: SendJob, to: SendJobStatus): void {
    const from = job.status
    if (!TRANSITIONS[from].includes(to)) {
      throw new Error(`illegal job transition ${from} -> ${to} for job ${job.id}`)
    }
    job.status = to
    this.onTransition?.(job, from, to)
  }
}
