/**
 * Media Uploader
 * Uploads the batch attachment once, retrying transient upload failures.
 */

import { AbortError } from "p-retry"
import type { Logger } from "pino"
import { PermanentSendError } from "../../../core/errors"
import type { AttachmentRef } from "../../../core/types"
import { retryWithBackoff } from "../../../lib/retry"
import type { MediaFile } from "./cloud-api-client"

export interface MediaUploadTarget {
  uploadMedia(file: MediaFile): Promise<AttachmentRef>
}

export interface MediaUploaderOptions {
  target: MediaUploadTarget
  logger: Logger
  retries: number
  minTimeoutMs?: number
  maxTimeoutMs?: number
}

export class MediaUploader {
  private readonly options: MediaUploaderOptions

  constructor(options: MediaUploaderOptions) {
    this.options = options
  }

  async upload(file: MediaFile): Promise<AttachmentRef> {
    const { target, logger } = this.options

    return retryWithBackoff(
      async () => {
        try {
          return await target.uploadMedia(file)
        } catch (error) {
          if (error instanceof PermanentSendError) {
            throw new AbortError(error)
          }
          throw error
        }
      },
      {
        retries: this.options.retries,
        minTimeoutMs: this.options.minTimeoutMs ?? 1_000,
        maxTimeoutMs: this.options.maxTimeoutMs ?? 10_000,
      },
      {
        onFailedAttempt: (error) => {
          logger.warn(
            {
              fileName: file.fileName,
              attemptNumber: error.attemptNumber,
              retriesLeft: error.retriesLeft,
              message: error.message,
            },
            "media upload attempt failed",
          )
        },
      },
    )
  }
}
