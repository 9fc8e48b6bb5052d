/**
 * Fake Send Capability
 * Records every request and always succeeds. Used for dry runs.
 */

import type { Logger } from "pino"
import type { SendCapability, SendOutcome, SendRequest } from "../../../core/ports/send-capability"

export class FakeSendCapability implements SendCapability {
  readonly sent: SendRequest[] = []
  private readonly logger: Logger | undefined

  constructor(logger?: Logger) {
    this.logger = logger
  }

  async send(request: SendRequest): Promise<SendOutcome> {
    this.sent.push(request)
    const messageId = `fake_${this.sent.length}`
    this.logger?.info(
      { to: request.to, messageId, attachment: request.attachment?.kind, text: request.text },
      "dry run: message not sent",
    )
    return { ok: true, messageId }
  }
}
