/**
 * Throttle Port
 * Defines the contract for the global send-rate gate shared by all workers.
 */

export interface ThrottleGrant {
  requestedAt: number
  grantedAt: number
  waitedMs: number
}

export interface ThrottlePort {
  /**
   * Wait until a send is permitted, then reserve one slot in the window
   */
  acquire(): Promise<ThrottleGrant>
}
