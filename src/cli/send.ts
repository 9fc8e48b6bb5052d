/**
 * Send CLI
 * Loads contacts, prepares the attachment and runs one batch headlessly.
 */

import { readFile } from "node:fs/promises"
import type { Logger } from "pino"
import { loadImageAttachment } from "../adapters/attachments/image-attachment"
import { FakeSendCapability } from "../adapters/channels/fake/send-capability"
import { WhatsAppCloudClient } from "../adapters/channels/whatsapp/cloud-api-client"
import { MediaUploader } from "../adapters/channels/whatsapp/media-uploader"
import { JsonRecipientSource } from "../adapters/contacts/json-recipient-source"
import type { AppConfig } from "../config"
import { createDispatchEngine } from "../dispatch"
import { ConfigurationError } from "../core/errors"
import type { SendCapability } from "../core/ports/send-capability"
import { BUILTIN_FIELDS, TemplateRenderer } from "../core/services/template-renderer"
import type { AttachmentRef, BatchReport, Recipient } from "../core/types"
import { formatProgress, formatReport } from "./report"

export const HELP_TEXT = `
Usage: bulk-dispatch --contacts <file.json> (--template <text> | --template-file <file>) [options]

Options:
  --contacts <file>       JSON array of contacts with phone_number, name and custom fields
  --template <text>       Message template, e.g. "Hi {name}, your code is {code}"
  --template-file <file>  Read the template from a file
  --image <file>          Attach a .jpg/.jpeg/.png image (max 5MB), uploaded once
  --image-url <url>       Attach an image by public link instead of uploading
  --dry-run               Render and pace messages without calling the API
  --json                  Print the final report as JSON
  --help, -h              Show this help message
`.trim()

export type TemplateArg = { kind: "text"; value: string } | { kind: "file"; path: string }

export interface SendArgs {
  contactsPath: string
  template: TemplateArg
  imagePath: string | undefined
  imageUrl: string | undefined
  dryRun: boolean
  json: boolean
}

export type ParsedArgs = { kind: "help" } | { kind: "send"; args: SendArgs }

const VALUE_FLAGS = ["--contacts", "--template", "--template-file", "--image", "--image-url"] as const
type ValueFlag = (typeof VALUE_FLAGS)[number]

const VALUE_FLAG_SET: ReadonlySet<string> = new Set(VALUE_FLAGS)

function isValueFlag(flag: string): flag is ValueFlag {
  return VALUE_FLAG_SET.has(flag)
}

export function parseSendArgs(argv: string[]): ParsedArgs {
  const values = new Map<ValueFlag, string>()
  let dryRun = false
  let json = false

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i]
    if (arg === "--help" || arg === "-h") return { kind: "help" }
    if (arg === "--dry-run") {
      dryRun = true
      continue
    }
    if (arg === "--json") {
      json = true
      continue
    }
    if (isValueFlag(arg)) {
      const value = argv[i + 1]
      if (value === undefined || value.startsWith("--")) {
        throw new ConfigurationError(`${arg} requires a value`)
      }
      values.set(arg, value)
      i += 1
      continue
    }
    throw new ConfigurationError(`unknown argument ${arg}`)
  }

  const contactsPath = values.get("--contacts")
  if (!contactsPath) {
    throw new ConfigurationError("--contacts is required")
  }

  const template = parseTemplateArg(values.get("--template"), values.get("--template-file"))

  const imagePath = values.get("--image")
  const imageUrl = values.get("--image-url")
  if (imagePath && imageUrl) {
    throw new ConfigurationError("--image and --image-url cannot be combined")
  }

  return {
    kind: "send",
    args: { contactsPath, template, imagePath, imageUrl, dryRun, json },
  }
}

function parseTemplateArg(text: string | undefined, path: string | undefined): TemplateArg {
  if (text !== undefined && path === undefined) return { kind: "text", value: text }
  if (path !== undefined && text === undefined) return { kind: "file", path }
  throw new ConfigurationError("exactly one of --template or --template-file is required")
}

/**
 * Template fields that no recipient can fill
 */
export function findUnfillableFields(template: string, recipients: readonly Recipient[]): string[] {
  const builtin: readonly string[] = BUILTIN_FIELDS
  return new TemplateRenderer()
    .placeholders(template)
    .filter(
      (field) =>
        !builtin.includes(field) &&
        !recipients.some((recipient) => Object.prototype.hasOwnProperty.call(recipient.fields, field)),
    )
}

export async function runSend(args: SendArgs, config: AppConfig, logger: Logger): Promise<BatchReport> {
  const template = args.template.kind === "text" ? args.template.value : await readFile(args.template.path, "utf8")

  const { recipients, rejected } = await new JsonRecipientSource({ filePath: args.contactsPath, logger }).load()
  if (recipients.length === 0) {
    throw new ConfigurationError(`no usable contacts in ${args.contactsPath}`, rejected.map((r) => `#${r.index}: ${r.reason}`))
  }

  const unfillable = findUnfillableFields(template, recipients)
  if (unfillable.length > 0) {
    logger.warn({ fields: unfillable }, "template fields missing from every contact")
  }

  const { sendCapability, client } = createSendCapability(args, config, logger)
  const attachment = await prepareAttachment(args, config, logger, client)

  const engine = createDispatchEngine(config.dispatch, { sendCapability, logger })
  const batch = engine.createBatch({ recipients, template, attachment })

  let lastLine = ""
  const unsubscribe = batch.subscribe((snapshot) => {
    const line = formatProgress(snapshot)
    if (line !== lastLine) {
      lastLine = line
      process.stderr.write(`${line}\n`)
    }
  })

  let interrupts = 0
  const onSigint = () => {
    interrupts += 1
    if (interrupts > 1) process.exit(130)
    process.stderr.write("stopping after in-flight messages, press Ctrl+C again to abort\n")
    batch.stop()
  }
  process.on("SIGINT", onSigint)

  try {
    return await batch.run()
  } finally {
    process.off("SIGINT", onSigint)
    unsubscribe()
  }
}

function createSendCapability(
  args: SendArgs,
  config: AppConfig,
  logger: Logger,
): { sendCapability: SendCapability; client: WhatsAppCloudClient | undefined } {
  if (args.dryRun) {
    return { sendCapability: new FakeSendCapability(logger), client: undefined }
  }

  const { accessToken, phoneNumberId } = config.whatsApp
  if (!accessToken || !phoneNumberId) {
    throw new ConfigurationError("WHATSAPP_ACCESS_TOKEN and WHATSAPP_PHONE_NUMBER_ID are required unless --dry-run is set")
  }

  const client = new WhatsAppCloudClient({
    apiUrl: config.whatsApp.apiUrl,
    accessToken,
    phoneNumberId,
    timeoutMs: config.whatsApp.timeoutMs,
    logger: logger.child({ component: "whatsapp" }),
  })
  return { sendCapability: client, client }
}

async function prepareAttachment(
  args: SendArgs,
  config: AppConfig,
  logger: Logger,
  client: WhatsAppCloudClient | undefined,
): Promise<AttachmentRef | undefined> {
  if (args.imageUrl) {
    return { kind: "link", url: args.imageUrl }
  }
  if (!args.imagePath) return undefined

  const file = await loadImageAttachment(args.imagePath)
  if (!client) {
    logger.info({ fileName: file.fileName }, "dry run: image validated, upload skipped")
    return { kind: "media-id", id: "dry-run", mimeType: file.mimeType }
  }

  const uploader = new MediaUploader({
    target: client,
    logger,
    retries: config.whatsApp.mediaUploadRetries,
  })
  return uploader.upload(file)
}

export async function main(argv: string[], config: AppConfig, logger: Logger): Promise<number> {
  const parsed = parseSendArgs(argv)
  if (parsed.kind === "help") {
    console.log(HELP_TEXT)
    return 0
  }

  const report = await runSend(parsed.args, config, logger)
  console.log(parsed.args.json ? JSON.stringify(report, null, 2) : formatReport(report))

  if (report.status === "stopped") return 130
  return report.snapshot.counts.exhausted > 0 ? 1 : 0
}
