/**
 * Core Services
 *
 * Template rendering, retry decisions, the job queue, progress aggregation
 * and the engine that drains a batch.
 */

export { TemplateRenderer, BUILTIN_FIELDS } from "./template-renderer"
export { SendRetryPolicy, type SendRetryPolicyOptions, type RetryDecision } from "./send-retry-policy"
export { DispatchQueue, type DispatchQueueOptions, type DequeueResult, type TransitionListener } from "./dispatch-queue"
export { ProgressTracker, type ProgressTrackerOptions } from "./progress-tracker"
export { DispatchEngine, DispatchBatch, type DispatchEngineOptions, type BatchInput } from "./dispatch-engine"
export { normalizePhoneNumber, normalizeRecipient, type NormalizeResult } from "./recipient-normalizer"
