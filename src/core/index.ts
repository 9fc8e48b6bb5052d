/**
 * Core Module Exports
 */

// Engine
export {
  DispatchEngine,
  DispatchBatch,
  DispatchQueue,
  ProgressTracker,
  SendRetryPolicy,
  TemplateRenderer,
  BUILTIN_FIELDS,
  normalizePhoneNumber,
  normalizeRecipient,
  type DispatchEngineOptions,
  type BatchInput,
  type SendRetryPolicyOptions,
  type RetryDecision,
} from "./services"

// Ports
export type {
  ThrottlePort,
  ThrottleGrant,
  SendCapability,
  SendRequest,
  SendOutcome,
  SendFailure,
  SendFailureKind,
  RecipientSource,
  RecipientLoadResult,
  RejectedRecord,
  ProgressSource,
  ProgressListener,
} from "./ports"

// Errors
export {
  DispatchError,
  ValidationError,
  TemplateError,
  TransientSendError,
  PermanentSendError,
  ConfigurationError,
  toSendFailure,
  errorMessage,
} from "./errors"

export type * from "./types"
