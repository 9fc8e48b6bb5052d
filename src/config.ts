/**
 * Application Configuration
 * Centralized configuration with schema validation.
 */

import { z } from "zod"
import { ConfigurationError } from "./core/errors"

const LOG_LEVEL_VALUES = ["fatal", "error", "warn", "info", "debug", "trace", "silent"] as const

export type LogLevel = (typeof LOG_LEVEL_VALUES)[number]

const DispatchConfigSchema = z
  .object({
    rateLimit: z
      .object({
        maxSends: z.number().int().positive().default(20),
        windowMs: z.number().int().positive().default(60_000),
      })
      .default({}),
    retry: z
      .object({
        maxAttempts: z.number().int().min(1).max(10).default(3),
        baseDelayMs: z.number().int().nonnegative().default(5_000),
        factor: z.number().min(1).default(2),
        maxDelayMs: z.number().int().nonnegative().default(60_000),
      })
      .default({}),
    workers: z.number().int().min(1).max(16).default(2),
    failureLogSize: z.number().int().nonnegative().default(50),
  })
  .superRefine((cfg, ctx) => {
    if (cfg.retry.maxDelayMs < cfg.retry.baseDelayMs) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["retry", "maxDelayMs"],
        message: "must be greater than or equal to retry.baseDelayMs",
      })
    }
  })

export type DispatchConfigInput = z.input<typeof DispatchConfigSchema>
export type DispatchConfig = z.output<typeof DispatchConfigSchema>

export interface WhatsAppConfig {
  apiUrl: string
  accessToken: string | undefined
  phoneNumberId: string | undefined
  timeoutMs: number
  mediaUploadRetries: number
}

export interface AppConfig {
  appName: string
  logLevel: LogLevel
  whatsApp: WhatsAppConfig
  dispatch: DispatchConfig
}

const DEFAULTS = {
  appName: "bulk-dispatch",
  logLevel: "info",
  whatsAppApiUrl: "https://graph.facebook.com/v17.0",
  httpTimeoutMs: 15_000,
  mediaUploadRetries: 2,
} as const

const AppSettingsSchema = z.object({
  appName: z.string().min(1),
  logLevel: z.enum(LOG_LEVEL_VALUES),
  whatsApp: z.object({
    apiUrl: z
      .string()
      .url("WHATSAPP_API_URL must be a valid URL")
      .refine((v) => v.startsWith("http://") || v.startsWith("https://"), {
        message: "WHATSAPP_API_URL must use http or https",
      }),
    accessToken: z.string().min(1).optional(),
    phoneNumberId: z.string().regex(/^\d+$/, "WHATSAPP_PHONE_NUMBER_ID must be numeric").optional(),
    timeoutMs: z.number().int().positive(),
    mediaUploadRetries: z.number().int().min(0).max(10),
  }),
})

/**
 * Fill defaults and validate engine settings
 */
export function resolveDispatchConfig(input: DispatchConfigInput = {}): DispatchConfig {
  const parsed = DispatchConfigSchema.safeParse(input)
  if (!parsed.success) {
    throw new ConfigurationError("invalid dispatch configuration", formatIssues(parsed.error))
  }
  return parsed.data
}

function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => {
    const path = issue.path.join(".")
    return path ? `${path}: ${issue.message}` : issue.message
  })
}

function envInt(value: string | undefined, fallback: number): number {
  return envNumber(value) ?? fallback
}

// Unparseable values map to NaN, which validation rejects.
function envNumber(value: string | undefined): number | undefined {
  if (!value || value.trim().length === 0) return undefined
  const n = Number(value.trim())
  return Number.isFinite(n) ? n : Number.NaN
}

function envString(value: string | undefined, fallback: string): string {
  return value?.trim() || fallback
}

function optionalTrimmed(value: string | undefined): string | undefined {
  const trimmed = value?.trim()
  return trimmed ? trimmed : undefined
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const dispatch = resolveDispatchConfig({
    rateLimit: {
      maxSends: envNumber(env.RATE_LIMIT_MAX_SENDS),
      windowMs: envNumber(env.RATE_LIMIT_WINDOW_MS),
    },
    retry: {
      maxAttempts: envNumber(env.RETRY_MAX_ATTEMPTS),
      baseDelayMs: envNumber(env.RETRY_BASE_DELAY_MS),
      factor: envNumber(env.RETRY_BACKOFF_FACTOR),
      maxDelayMs: envNumber(env.RETRY_MAX_DELAY_MS),
    },
    workers: envNumber(env.DISPATCH_WORKERS),
    failureLogSize: envNumber(env.FAILURE_LOG_SIZE),
  })

  const candidate = {
    appName: envString(env.APP_NAME, DEFAULTS.appName),
    logLevel: envString(env.LOG_LEVEL, DEFAULTS.logLevel),
    whatsApp: {
      apiUrl: envString(env.WHATSAPP_API_URL, DEFAULTS.whatsAppApiUrl).replace(/\/+$/, ""),
      accessToken: optionalTrimmed(env.WHATSAPP_ACCESS_TOKEN),
      phoneNumberId: optionalTrimmed(env.WHATSAPP_PHONE_NUMBER_ID),
      timeoutMs: envInt(env.HTTP_TIMEOUT_MS, DEFAULTS.httpTimeoutMs),
      mediaUploadRetries: envInt(env.MEDIA_UPLOAD_RETRIES, DEFAULTS.mediaUploadRetries),
    },
  }

  const parsed = AppSettingsSchema.safeParse(candidate)
  if (!parsed.success) {
    throw new ConfigurationError("invalid application configuration", formatIssues(parsed.error))
  }

  return {
    ...parsed.data,
    whatsApp: {
      ...parsed.data.whatsApp,
      accessToken: parsed.data.whatsApp.accessToken,
      phoneNumberId: parsed.data.whatsApp.phoneNumberId,
    },
    dispatch,
  }
}
