/**
 * Progress Observer Port
 * Push interface for presentation layers rendering batch progress.
 */

import type { ProgressSnapshot } from "../types"

export interface ProgressListener {
  (snapshot: ProgressSnapshot): void
}

export interface ProgressSource {
  snapshot(): ProgressSnapshot

  /**
   * Register a listener called after every job state transition.
   * Returns a function that removes the listener.
   */
  subscribe(listener: ProgressListener): () => void
}
