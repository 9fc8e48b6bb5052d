import { describe, test, expect } from "vitest"
import { classifyGraphError, parseGraphError } from "../../../../src/adapters/channels/whatsapp/error-classifier"

describe("classifyGraphError", () => {
  test("treats server errors and throttling statuses as transient", () => {
    expect(classifyGraphError(503, undefined)).toEqual({
      kind: "transient",
      message: "WhatsApp API request failed with status 503",
      code: "http_503",
    })
    expect(classifyGraphError(429, undefined).kind).toBe("transient")
    expect(classifyGraphError(408, undefined).kind).toBe("transient")
  })

  test("treats provider rate-limit codes as transient even on a 400", () => {
    expect(classifyGraphError(400, { code: 131056, message: "pair rate limit hit" })).toEqual({
      kind: "transient",
      message: "pair rate limit hit",
      code: "131056",
    })
  })

  test("treats other client errors as permanent", () => {
    expect(classifyGraphError(400, { code: 131026, message: "message undeliverable" })).toEqual({
      kind: "permanent",
      message: "message undeliverable",
      code: "131026",
    })
    expect(classifyGraphError(401, undefined).kind).toBe("permanent")
  })
})

describe("parseGraphError", () => {
  test("extracts the typed fields of a Graph error body", () => {
    expect(
      parseGraphError({
        error: { message: "Invalid parameter", type: "OAuthException", code: 100, error_subcode: 2494010, fbtrace_id: "trace" },
      }),
    ).toEqual({ message: "Invalid parameter", type: "OAuthException", code: 100, error_subcode: 2494010, fbtrace_id: "trace" })
  })

  test("ignores bodies without an error object and fields of the wrong type", () => {
    expect(parseGraphError(undefined)).toBeUndefined()
    expect(parseGraphError({ data: [] })).toBeUndefined()
    expect(parseGraphError({ error: "oops" })).toBeUndefined()
    expect(parseGraphError({ error: { code: "100" } })).toEqual({})
  })
})
