/**
 * Dispatch Domain Types
 */

export interface Recipient {
  readonly phoneNumber: string
  readonly name: string
  readonly fields: Readonly<Record<string, string>>
}

/** Reference to media already known to the provider (uploaded id or public link). */
export type AttachmentRef =
  | { readonly kind: "media-id"; readonly id: string; readonly mimeType: string }
  | { readonly kind: "link"; readonly url: string }

export type SendJobStatus = "pending" | "in_flight" | "succeeded" | "failed" | "exhausted"

export type JobErrorKind = "validation" | "transient" | "permanent"

export interface JobError {
  kind: JobErrorKind
  message: string
  code?: string
}

export interface SendJob {
  readonly id: number
  readonly recipient: Recipient
  readonly attachment: AttachmentRef | undefined
  renderedMessage: string | undefined
  status: SendJobStatus
  attemptCount: number
  lastError: JobError | undefined
  nextEligibleAt: number
}

export interface FailureEntry {
  jobID: number
  phoneNumber: string
  name: string
  error: JobError
  attempt: number
  at: string
}

export interface StatusCounts {
  pending: number
  in_flight: number
  succeeded: number
  failed: number
  exhausted: number
}

export interface ProgressSnapshot {
  total: number
  counts: StatusCounts
  /** Pending jobs that already had at least one failed attempt. */
  retrying: number
  failedAttempts: number
  /** Share of jobs in a terminal state, 0..1. */
  completion: number
  recentFailures: FailureEntry[]
  updatedAt: string
}

export interface JobResult {
  jobID: number
  phoneNumber: string
  name: string
  status: SendJobStatus
  attemptCount: number
  lastError: JobError | undefined
}

export type BatchStatus = "completed" | "stopped"

export interface BatchReport {
  status: BatchStatus
  startedAt: string
  finishedAt: string
  durationMs: number
  snapshot: ProgressSnapshot
  results: JobResult[]
}
