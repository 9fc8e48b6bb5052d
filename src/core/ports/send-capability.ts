/**
 * Send Capability Port
 * Defines the contract for delivering one message to one recipient.
 */

import type { AttachmentRef } from "../types"

export interface SendRequest {
  to: string
  text: string
  attachment?: AttachmentRef
}

export type SendFailureKind = "transient" | "permanent"

export interface SendFailure {
  kind: SendFailureKind
  message: string
  code?: string
}

export type SendOutcome =
  | { ok: true; messageId?: string }
  | { ok: false; failure: SendFailure }

export interface SendCapability {
  /**
   * Deliver a message. Provider failures are reported as a classified outcome.
   */
  send(request: SendRequest): Promise<SendOutcome>
}
