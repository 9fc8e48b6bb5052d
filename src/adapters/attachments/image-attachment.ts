/**
 * Image Attachment
 * Loads and checks the image sent with a batch before any message goes out.
 */

import { openAsBlob } from "node:fs"
import { open, stat } from "node:fs/promises"
import { basename, extname } from "node:path"
import { ConfigurationError, errorMessage } from "../../core/errors"
import type { MediaFile } from "../channels/whatsapp/cloud-api-client"

export const MAX_IMAGE_BYTES = 5 * 1024 * 1024

const MIME_BY_EXTENSION: Record<string, string> = {
  ".jpg": "image/jpeg",
  ".jpeg": "image/jpeg",
  ".png": "image/png",
}

const SIGNATURES: Record<string, number[]> = {
  "image/jpeg": [0xff, 0xd8, 0xff],
  "image/png": [0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a],
}

export interface ImagePolicy {
  maxBytes: number
}

export async function loadImageAttachment(
  filePath: string,
  policy: ImagePolicy = { maxBytes: MAX_IMAGE_BYTES },
): Promise<MediaFile> {
  const extension = extname(filePath).toLowerCase()
  const mimeType = MIME_BY_EXTENSION[extension]
  if (!mimeType) {
    throw new ConfigurationError(
      `unsupported image type "${extension || basename(filePath)}", expected one of ${Object.keys(MIME_BY_EXTENSION).join(", ")}`,
    )
  }

  const info = await stat(filePath).catch((error: unknown) => {
    throw new ConfigurationError(`cannot read image ${filePath}`, [errorMessage(error)])
  })
  if (!info.isFile()) {
    throw new ConfigurationError(`${filePath} is not a file`)
  }
  if (info.size === 0) {
    throw new ConfigurationError(`${filePath} is empty`)
  }
  if (info.size > policy.maxBytes) {
    throw new ConfigurationError(`${filePath} is ${info.size} bytes, limit is ${policy.maxBytes}`)
  }

  const signature = SIGNATURES[mimeType]
  const head = await readHead(filePath, signature.length)
  if (!signature.every((byte, i) => head[i] === byte)) {
    throw new ConfigurationError(`${filePath} content does not match ${mimeType}`)
  }

  return {
    fileName: basename(filePath),
    mimeType,
    content: await openAsBlob(filePath, { type: mimeType }),
  }
}

async function readHead(filePath: string, length: number): Promise<Uint8Array> {
  const handle = await open(filePath, "r")
  try {
    const buffer = Buffer.alloc(length)
    const { bytesRead } = await handle.read(buffer, 0, length, 0)
    return buffer.subarray(0, bytesRead)
  } finally {
    await handle.close()
  }
}
