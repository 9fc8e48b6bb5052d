/**
 * WhatsApp Cloud API error classification.
 * Maps an HTTP status and Graph API error body to a transient or permanent failure.
 */

import type { SendFailure } from "../../../core/ports/send-capability"

export interface GraphApiError {
  message?: string
  type?: string
  code?: number
  error_subcode?: number
  fbtrace_id?: string
}

// Graph API codes that signal throttling or a temporary provider fault.
const TRANSIENT_ERROR_CODES = new Set([
  1, // unknown error
  2, // service temporarily unavailable
  4, // application request limit
  17, // user request limit
  341, // application limit
  80007, // business account rate limit
  130429, // throughput reached
  131000, // something went wrong
  131048, // spam rate limit
  131056, // business/consumer pair rate limit
  133004, // server temporarily unavailable
])

const TRANSIENT_STATUSES = new Set([408, 425, 429])

export function classifyGraphError(status: number, error: GraphApiError | undefined): SendFailure {
  const code = error?.code
  const message = error?.message ?? `WhatsApp API request failed with status ${status}`
  const failureCode = code === undefined ? `http_${status}` : String(code)

  const transient =
    status >= 500 || TRANSIENT_STATUSES.has(status) || (code !== undefined && TRANSIENT_ERROR_CODES.has(code))

  return { kind: transient ? "transient" : "permanent", message, code: failureCode }
}

export function parseGraphError(body: unknown): GraphApiError | undefined {
  if (typeof body !== "object" || body === null || !("error" in body)) return undefined
  const error = body.error
  if (typeof error !== "object" || error === null) return undefined

  const parsed: GraphApiError = {}
  if ("message" in error && typeof error.message === "string") parsed.message = error.message
  if ("type" in error && typeof error.type === "string") parsed.type = error.type
  if ("code" in error && typeof error.code === "number") parsed.code = error.code
  if ("error_subcode" in error && typeof error.error_subcode === "number") parsed.error_subcode = error.error_subcode
  if ("fbtrace_id" in error && typeof error.fbtrace_id === "string") parsed.fbtrace_id = error.fbtrace_id
  return parsed
}
