/**
 * Dispatch Engine
 *
 * Drains a batch of SendJobs with a bounded pool of workers. Each worker
 * dequeues a job, renders its message, waits for the shared throttle, calls
 * the send capability and routes the outcome through the retry policy.
 */

import type { Logger } from "pino"
import { ConfigurationError, TemplateError, ValidationError, toSendFailure } from "../errors"
import type { ProgressListener, ProgressSource } from "../ports/progress-observer"
import type { SendCapability, SendOutcome } from "../ports/send-capability"
import type { ThrottlePort } from "../ports/throttle"
import type { AttachmentRef, BatchReport, JobError, ProgressSnapshot, Recipient, SendJob } from "../types"
import { createWorkerPool, runWorkers } from "../../lib/task-queue"
import { delay } from "../../lib/delay"
import { DispatchQueue } from "./dispatch-queue"
import { ProgressTracker } from "./progress-tracker"
import type { SendRetryPolicy } from "./send-retry-policy"
import { TemplateRenderer } from "./template-renderer"

export interface DispatchEngineOptions {
  sendCapability: SendCapability
  throttle: ThrottlePort
  retryPolicy: SendRetryPolicy
  logger: Logger
  workers: number
  failureLogSize: number
  renderer?: TemplateRenderer
}

export interface BatchInput {
  recipients: readonly Recipient[]
  template: string
  attachment?: AttachmentRef
}

interface BatchDependencies {
  sendCapability: SendCapability
  throttle: ThrottlePort
  retryPolicy: SendRetryPolicy
  renderer: TemplateRenderer
  logger: Logger
  workers: number
}

export class DispatchEngine {
  private readonly options: DispatchEngineOptions
  private readonly renderer: TemplateRenderer

  constructor(options: DispatchEngineOptions) {
    if (!Number.isInteger(options.workers) || options.workers < 1) {
      throw new ConfigurationError("workers must be a positive integer")
    }
    if (!Number.isInteger(options.failureLogSize) || options.failureLogSize < 0) {
      throw new ConfigurationError("failureLogSize must be a non-negative integer")
    }
    this.options = options
    this.renderer = options.renderer ?? new TemplateRenderer()
  }

  /**
   * Prepare a batch without starting it
   */
  createBatch(input: BatchInput): DispatchBatch {
    if (!input.template.trim()) {
      throw new ConfigurationError("message template cannot be empty")
    }

    return new DispatchBatch(input, this.options.failureLogSize, {
      sendCapability: this.options.sendCapability,
      throttle: this.options.throttle,
      retryPolicy: this.options.retryPolicy,
      renderer: this.renderer,
      logger: this.options.logger,
      workers: this.options.workers,
    })
  }

  async run(input: BatchInput): Promise<BatchReport> {
    return this.createBatch(input).run()
  }
}

export class DispatchBatch implements ProgressSource {
  private readonly template: string
  private readonly deps: BatchDependencies
  private readonly tracker: ProgressTracker
  private readonly queue: DispatchQueue
  private controller: AbortController | undefined
  private active: Promise<BatchReport> | undefined

  constructor(input: BatchInput, failureLogSize: number, deps: BatchDependencies) {
    this.template = input.template
    this.deps = deps
    this.tracker = new ProgressTracker({
      total: input.recipients.length,
      failureLogSize,
      logger: deps.logger,
    })
    this.queue = new DispatchQueue({
      recipients: input.recipients,
      attachment: input.attachment,
      enqueuedAt: Date.now(),
      onTransition: (job, from, to) => this.tracker.recordTransition(job, from, to),
    })
  }

  get isRunning(): boolean {
    return this.active !== undefined
  }

  /**
   * Dispatch every pending job. On a stopped batch this resumes with the jobs left pending.
   */
  run(): Promise<BatchReport> {
    if (this.active) return this.active

    const controller = new AbortController()
    this.controller = controller
    this.active = this.execute(controller.signal).finally(() => {
      this.active = undefined
      this.controller = undefined
    })
    return this.active
  }

  /**
   * Stop dequeuing. In-flight sends finish; pending jobs stay pending.
   * A retry backoff wait ends at once, but a job already waiting on the
   * throttle still sends, so a stop can take up to one rate window to settle.
   */
  stop(): void {
    if (!this.controller || this.controller.signal.aborted) return
    this.deps.logger.info({ pending: this.queue.pendingCount }, "batch stop requested")
    this.controller.abort()
  }

  snapshot(): ProgressSnapshot {
    return this.tracker.snapshot()
  }

  subscribe(listener: ProgressListener): () => void {
    return this.tracker.subscribe(listener)
  }

  private async execute(signal: AbortSignal): Promise<BatchReport> {
    const startedAt = Date.now()
    const workers = Math.max(1, Math.min(this.deps.workers, this.queue.pendingCount))
    this.deps.logger.info(
      { total: this.queue.size, pending: this.queue.pendingCount, workers, maxAttempts: this.deps.retryPolicy.maxAttempts },
      "batch started",
    )

    const pool = createWorkerPool({ workers })
    await runWorkers(pool, workers, (workerID) => this.workerLoop(workerID, signal))

    const finishedAt = Date.now()
    const snapshot = this.tracker.snapshot()
    const status = signal.aborted && this.queue.pendingCount > 0 ? "stopped" : "completed"

    this.deps.logger.info(
      {
        status,
        succeeded: snapshot.counts.succeeded,
        exhausted: snapshot.counts.exhausted,
        pending: snapshot.counts.pending,
        durationMs: finishedAt - startedAt,
      },
      "batch finished",
    )

    return {
      status,
      startedAt: new Date(startedAt).toISOString(),
      finishedAt: new Date(finishedAt).toISOString(),
      durationMs: finishedAt - startedAt,
      snapshot,
      results: this.queue.results(),
    }
  }

  private async workerLoop(workerID: number, signal: AbortSignal): Promise<void> {
    while (!signal.aborted) {
      const next = this.queue.next(Date.now())
      if (next.kind === "drained") return

      if (next.kind === "waiting") {
        await delay(next.until - Date.now(), signal)
        continue
      }

      await this.process(next.job, workerID)
    }
  }

  private async process(job: SendJob, workerID: number): Promise<void> {
    const { logger, retryPolicy } = this.deps

    const message = this.prepare(job)
    if (message === undefined) return

    const outcome = await this.attempt(job, message)
    job.attemptCount += 1

    const decision = retryPolicy.decide(outcome, job.attemptCount, Date.now())
    const context = { workerID, jobID: job.id, phoneNumber: job.recipient.phoneNumber, attempt: job.attemptCount }

    switch (decision.kind) {
      case "succeeded":
        this.queue.complete(job)
        logger.debug({ ...context, messageId: decision.messageId }, "message sent")
        return
      case "retry":
        this.tracker.recordFailure(job, decision.error)
        this.queue.requeue(job, decision.error, decision.nextEligibleAt)
        logger.warn(
          { ...context, delayMs: decision.delayMs, error: decision.error.message },
          "send failed, scheduling retry",
        )
        return
      case "exhausted":
        this.tracker.recordFailure(job, decision.error)
        this.queue.exhaust(job, decision.error)
        logger.error(
          { ...context, reason: decision.reason, error: decision.error.message },
          "send failed, giving up",
        )
        return
    }
  }

  /**
   * Render the job's message once. Exhausts the job and returns undefined when it cannot be sent.
   */
  private prepare(job: SendJob): string | undefined {
    if (job.renderedMessage !== undefined) return job.renderedMessage

    try {
      if (!job.recipient.phoneNumber.trim()) {
        throw new ValidationError("recipient has no phone number")
      }
      job.renderedMessage = this.deps.renderer.render(this.template, job.recipient)
      return job.renderedMessage
    } catch (error) {
      if (!(error instanceof ValidationError)) throw error

      const jobError: JobError = { kind: "validation", message: error.message, code: error.code }
      this.tracker.recordFailure(job, jobError)
      this.queue.exhaust(job, jobError)
      this.deps.logger.warn(
        {
          jobID: job.id,
          phoneNumber: job.recipient.phoneNumber,
          field: error instanceof TemplateError ? error.field : undefined,
          error: error.message,
        },
        "job rejected before sending",
      )
      return undefined
    }
  }

  private async attempt(job: SendJob, text: string): Promise<SendOutcome> {
    try {
      await this.deps.throttle.acquire()
      return await this.deps.sendCapability.send({
        to: job.recipient.phoneNumber,
        text,
        attachment: job.attachment,
      })
    } catch (error) {
      return { ok: false, failure: toSendFailure(error) }
    }
  }
}
