/**
 * WhatsApp Cloud API client
 *
 * Send capability over the Graph API messages endpoint, plus the media
 * upload used once per batch for an image attachment.
 */

import type { Logger } from "pino"
import { PermanentSendError, TransientSendError, errorMessage } from "../../../core/errors"
import type { SendCapability, SendFailure, SendOutcome, SendRequest } from "../../../core/ports/send-capability"
import type { AttachmentRef } from "../../../core/types"
import { classifyGraphError, parseGraphError } from "./error-classifier"

export interface WhatsAppCloudClientOptions {
  apiUrl: string
  accessToken: string
  phoneNumberId: string
  timeoutMs?: number
  logger: Logger
}

export interface MediaFile {
  fileName: string
  mimeType: string
  content: Blob
}

type TextPayload = { type: "text"; text: { body: string; preview_url: boolean } }
type ImagePayload = { type: "image"; image: { id: string; caption?: string } | { link: string; caption?: string } }

// Accepted destination length once everything but digits is removed.
const MIN_PHONE_DIGITS = 10
const MAX_PHONE_DIGITS = 15

export function toWhatsAppNumber(phoneNumber: string): string | undefined {
  const digits = phoneNumber.replace(/\D/g, "")
  if (digits.length < MIN_PHONE_DIGITS || digits.length > MAX_PHONE_DIGITS) return undefined
  return digits
}

export class WhatsAppCloudClient implements SendCapability {
  private readonly baseUrl: string
  private readonly accessToken: string
  private readonly phoneNumberId: string
  private readonly timeoutMs: number
  private readonly logger: Logger

  constructor(options: WhatsAppCloudClientOptions) {
    this.baseUrl = options.apiUrl.replace(/\/+$/, "")
    this.accessToken = options.accessToken
    this.phoneNumberId = options.phoneNumberId
    this.timeoutMs = options.timeoutMs ?? 15_000
    this.logger = options.logger
  }

  async send(request: SendRequest): Promise<SendOutcome> {
    const to = toWhatsAppNumber(request.to)
    if (!to) {
      return {
        ok: false,
        failure: { kind: "permanent", message: `invalid phone number ${request.to}`, code: "invalid_phone_number" },
      }
    }

    const body = {
      messaging_product: "whatsapp",
      recipient_type: "individual",
      to,
      ...this.buildContent(request),
    }

    const result = await this.request(`/${this.phoneNumberId}/messages`, {
      headers: { "Content-Type": "application/json" },
      body: JSON.stringify(body),
    })
    if (!result.ok) return result

    const messageId = extractMessageId(result.body)
    this.logger.debug({ to, messageId }, "whatsapp message accepted")
    return { ok: true, messageId }
  }

  /**
   * Upload media and return a reference usable by every message of a batch.
   * Throws TransientSendError or PermanentSendError.
   */
  async uploadMedia(file: MediaFile): Promise<AttachmentRef> {
    const form = new FormData()
    form.append("messaging_product", "whatsapp")
    form.append("type", file.mimeType)
    form.append("file", file.content, file.fileName)

    const result = await this.request(`/${this.phoneNumberId}/media`, { body: form })
    if (!result.ok) {
      const { failure } = result
      throw failure.kind === "permanent"
        ? new PermanentSendError(failure.message, failure.code)
        : new TransientSendError(failure.message, failure.code)
    }

    const id = extractField(result.body, "id")
    if (!id) {
      throw new PermanentSendError("WhatsApp media upload returned no id")
    }

    this.logger.info({ mediaId: id, fileName: file.fileName }, "whatsapp media uploaded")
    return { kind: "media-id", id, mimeType: file.mimeType }
  }

  private buildContent(request: SendRequest): TextPayload | ImagePayload {
    const attachment = request.attachment
    if (!attachment) {
      return { type: "text", text: { body: request.text, preview_url: false } }
    }

    const caption = request.text.trim() ? request.text : undefined
    return attachment.kind === "media-id"
      ? { type: "image", image: { id: attachment.id, caption } }
      : { type: "image", image: { link: attachment.url, caption } }
  }

  private async request(
    path: string,
    init: { headers?: Record<string, string>; body: string | FormData },
  ): Promise<{ ok: true; body: unknown } | { ok: false; failure: SendFailure }> {
    const controller = new AbortController()
    const timeout = setTimeout(() => controller.abort(), this.timeoutMs)

    try {
      const response = await fetch(`${this.baseUrl}${path}`, {
        method: "POST",
        signal: controller.signal,
        headers: {
          Authorization: `Bearer ${this.accessToken}`,
          ...init.headers,
        },
        body: init.body,
      })

      const body: unknown = await response.json().catch(() => undefined)
      if (!response.ok) {
        const failure = classifyGraphError(response.status, parseGraphError(body))
        this.logger.debug({ path, status: response.status, failure }, "whatsapp api request rejected")
        return { ok: false, failure }
      }

      return { ok: true, body }
    } catch (error) {
      if (error instanceof Error && error.name === "AbortError") {
        return {
          ok: false,
          failure: { kind: "transient", message: `WhatsApp API ${path} timed out after ${this.timeoutMs}ms`, code: "timeout" },
        }
      }
      return { ok: false, failure: { kind: "transient", message: errorMessage(error), code: "network" } }
    } finally {
      clearTimeout(timeout)
    }
  }
}

function extractMessageId(body: unknown): string | undefined {
  if (typeof body !== "object" || body === null || !("messages" in body)) return undefined
  const { messages } = body
  if (!Array.isArray(messages)) return undefined
  const first: unknown = messages[0]
  return extractField(first, "id")
}

function extractField(value: unknown, key: string): string | undefined {
  if (typeof value !== "object" || value === null) return undefined
  const field: unknown = Reflect.get(value, key)
  return typeof field === "string" ? field : undefined
}
