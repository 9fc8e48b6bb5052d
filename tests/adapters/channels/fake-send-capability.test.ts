import { describe, test, expect, vi } from "vitest"
import type { Logger } from "pino"
import { FakeSendCapability } from "../../../src/adapters/channels/fake/send-capability"

describe("FakeSendCapability", () => {
  test("records each request and returns sequential message ids", async () => {
    const info = vi.fn()
    const capability = new FakeSendCapability({ info } as unknown as Logger)

    const first = await capability.send({ to: "+15550001111", text: "one" })
    const second = await capability.send({ to: "+15550002222", text: "two" })

    expect(first).toEqual({ ok: true, messageId: "fake_1" })
    expect(second).toEqual({ ok: true, messageId: "fake_2" })
    expect(capability.sent.map((request) => request.to)).toEqual(["+15550001111", "+15550002222"])
    expect(info).toHaveBeenCalledWith(
      { to: "+15550001111", messageId: "fake_1", attachment: undefined, text: "one" },
      "dry run: message not sent",
    )
  })
})
