/**
 * JSON Recipient Source
 * Reads an array of contact records from a JSON file.
 */

import { readFile } from "node:fs/promises"
import type { Logger } from "pino"
import { ConfigurationError, errorMessage } from "../../core/errors"
import type { RecipientLoadResult, RecipientSource } from "../../core/ports/recipient-source"
import { normalizeRecipient } from "../../core/services/recipient-normalizer"

export interface JsonRecipientSourceOptions {
  filePath: string
  logger: Logger
}

export class JsonRecipientSource implements RecipientSource {
  private readonly options: JsonRecipientSourceOptions

  constructor(options: JsonRecipientSourceOptions) {
    this.options = options
  }

  async load(): Promise<RecipientLoadResult> {
    const { filePath, logger } = this.options

    let records: unknown
    try {
      records = JSON.parse(await readFile(filePath, "utf8"))
    } catch (error) {
      throw new ConfigurationError(`cannot read contacts from ${filePath}`, [errorMessage(error)])
    }
    if (!Array.isArray(records)) {
      throw new ConfigurationError(`contacts file ${filePath} must contain a JSON array`)
    }

    const result: RecipientLoadResult = { recipients: [], rejected: [] }
    records.forEach((record: unknown, index) => {
      const normalized = normalizeRecipient(record)
      if (normalized.ok) {
        result.recipients.push(normalized.recipient)
      } else {
        result.rejected.push({ index, reason: normalized.reason })
        logger.warn({ filePath, index, reason: normalized.reason }, "contact record rejected")
      }
    })

    logger.info(
      { filePath, loaded: result.recipients.length, rejected: result.rejected.length },
      "contacts loaded",
    )
    return result
  }
}
