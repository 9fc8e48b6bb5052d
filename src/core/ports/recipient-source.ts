/**
 * Recipient Source Port
 * Defines the contract for loading the ordered recipient list of a batch.
 */

import type { Recipient } from "../types"

export interface RejectedRecord {
  /** Zero-based position of the record in the source. */
  index: number
  reason: string
}

export interface RecipientLoadResult {
  recipients: Recipient[]
  rejected: RejectedRecord[]
}

export interface RecipientSource {
  load(): Promise<RecipientLoadResult>
}
