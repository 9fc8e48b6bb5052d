/**
 * Core Ports
 *
 * Contracts the dispatch engine depends on or exposes. Adapters implement
 * the consumed ones; presentation layers use the exposed ones.
 */

export type { ThrottlePort, ThrottleGrant } from "./throttle"
export type { SendCapability, SendRequest, SendOutcome, SendFailure, SendFailureKind } from "./send-capability"
export type { RecipientSource, RecipientLoadResult, RejectedRecord } from "./recipient-source"
export type { ProgressSource, ProgressListener } from "./progress-observer"
