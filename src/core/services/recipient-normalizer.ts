/**
 * Recipient Normalizer
 * Turns raw contact records into immutable Recipients, one record at a time.
 */

import { z } from "zod"
import type { Recipient } from "../types"

const MIN_PHONE_DIGITS = 10
const MAX_PHONE_DIGITS = 15

const ScalarSchema = z.union([z.string(), z.number(), z.boolean(), z.null()])

const ContactRecordSchema = z
  .object({
    phone_number: z.union([z.string(), z.number()]),
    name: z.string().optional(),
  })
  .catchall(ScalarSchema)

export type NormalizeResult = { ok: true; recipient: Recipient } | { ok: false; reason: string }

/**
 * Digits-only number with a leading "+", or undefined when the length is outside 10-15 digits
 */
export function normalizePhoneNumber(raw: string): string | undefined {
  const trimmed = raw.trim()
  if (!/^\+?[\d\s().-]+$/.test(trimmed)) return undefined

  const digits = trimmed.replace(/\D/g, "")
  if (digits.length < MIN_PHONE_DIGITS || digits.length > MAX_PHONE_DIGITS) return undefined
  return `+${digits}`
}

export function normalizeRecipient(record: unknown): NormalizeResult {
  const parsed = ContactRecordSchema.safeParse(record)
  if (!parsed.success) {
    const issue = parsed.error.issues[0]
    const path = issue?.path.join(".")
    return { ok: false, reason: path ? `${path}: ${issue.message}` : (issue?.message ?? "invalid record") }
  }

  const { phone_number: rawPhone, name, ...rest } = parsed.data
  const phoneNumber = normalizePhoneNumber(String(rawPhone))
  if (!phoneNumber) {
    return { ok: false, reason: `phone_number: invalid phone number "${String(rawPhone)}"` }
  }

  const fields: Record<string, string> = {}
  for (const [key, value] of Object.entries(rest)) {
    if (value === null) continue
    fields[key] = String(value)
  }

  return {
    ok: true,
    recipient: Object.freeze({
      phoneNumber,
      name: name?.trim() ?? "",
      fields: Object.freeze(fields),
    }),
  }
}
