/**
 * Dispatch Errors
 * Error taxonomy shared by the engine and its adapters.
 */

import type { SendFailure } from "./ports/send-capability"

export type DispatchErrorCode =
  | "VALIDATION_ERROR"
  | "TEMPLATE_ERROR"
  | "TRANSIENT_SEND_ERROR"
  | "PERMANENT_SEND_ERROR"
  | "CONFIGURATION_ERROR"

export class DispatchError extends Error {
  readonly code: DispatchErrorCode

  constructor(code: DispatchErrorCode, message: string) {
    super(message)
    this.name = new.target.name
    this.code = code
  }
}

/**
 * Malformed recipient or template. The affected job is exhausted without a send.
 */
export class ValidationError extends DispatchError {
  constructor(message: string, code: DispatchErrorCode = "VALIDATION_ERROR") {
    super(code, message)
  }
}

export class TemplateError extends ValidationError {
  /** Placeholder that could not be resolved, when the failure is a missing field. */
  readonly field: string | undefined

  constructor(message: string, field?: string) {
    super(message, "TEMPLATE_ERROR")
    this.field = field
  }
}

export class TransientSendError extends DispatchError {
  readonly providerCode: string | undefined

  constructor(message: string, providerCode?: string) {
    super("TRANSIENT_SEND_ERROR", message)
    this.providerCode = providerCode
  }
}

export class PermanentSendError extends DispatchError {
  readonly providerCode: string | undefined

  constructor(message: string, providerCode?: string) {
    super("PERMANENT_SEND_ERROR", message)
    this.providerCode = providerCode
  }
}

/**
 * Invalid rate, retry or batch parameters. Raised before any send happens.
 */
export class ConfigurationError extends DispatchError {
  readonly issues: string[]

  constructor(message: string, issues: string[] = []) {
    super("CONFIGURATION_ERROR", issues.length > 0 ? `${message}: ${issues.join("; ")}` : message)
    this.issues = issues
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error)
}

/**
 * Classify an error thrown across the send boundary. Anything unrecognized is transient.
 */
export function toSendFailure(error: unknown): SendFailure {
  if (error instanceof PermanentSendError) {
    return withCode({ kind: "permanent", message: error.message }, error.providerCode)
  }
  if (error instanceof TransientSendError) {
    return withCode({ kind: "transient", message: error.message }, error.providerCode)
  }
  return { kind: "transient", message: errorMessage(error) }
}

function withCode(failure: SendFailure, code: string | undefined): SendFailure {
  return code === undefined ? failure : { ...failure, code }
}
