import { describe, test, expect } from "vitest"
import { ConfigurationError } from "../../src/core/errors"
import { SendRetryPolicy } from "../../src/core/services/send-retry-policy"

function createPolicy() {
  return new SendRetryPolicy({ maxAttempts: 3, baseDelayMs: 5_000, factor: 2, maxDelayMs: 60_000 })
}

describe("SendRetryPolicy", () => {
  test("success finalizes the job with the provider message id", () => {
    const decision = createPolicy().decide({ ok: true, messageId: "wamid.1" }, 1, 1_000)
    expect(decision).toEqual({ kind: "succeeded", messageId: "wamid.1" })
  })

  test("transient failure with attempts remaining schedules a retry", () => {
    const decision = createPolicy().decide(
      { ok: false, failure: { kind: "transient", message: "timeout", code: "timeout" } },
      1,
      1_000,
    )

    expect(decision).toEqual({
      kind: "retry",
      error: { kind: "transient", message: "timeout", code: "timeout" },
      delayMs: 5_000,
      nextEligibleAt: 6_000,
    })
  })

  test("backoff grows exponentially with the attempt count", () => {
    const decision = createPolicy().decide({ ok: false, failure: { kind: "transient", message: "busy" } }, 2, 0)
    expect(decision.kind === "retry" && decision.delayMs).toBe(10_000)
  })

  test("backoff is capped at maxDelayMs", () => {
    const policy = new SendRetryPolicy({ maxAttempts: 10, baseDelayMs: 5_000, factor: 2, maxDelayMs: 60_000 })

    expect(policy.backoffDelay(1)).toBe(5_000)
    expect(policy.backoffDelay(4)).toBe(40_000)
    expect(policy.backoffDelay(5)).toBe(60_000)
    expect(policy.backoffDelay(9)).toBe(60_000)
  })

  test("transient failure on the last attempt exhausts the job", () => {
    const decision = createPolicy().decide({ ok: false, failure: { kind: "transient", message: "busy" } }, 3, 0)
    expect(decision).toEqual({
      kind: "exhausted",
      error: { kind: "transient", message: "busy" },
      reason: "attempts_exhausted",
    })
  })

  test("permanent failure is never retried", () => {
    const decision = createPolicy().decide(
      { ok: false, failure: { kind: "permanent", message: "invalid number", code: "131026" } },
      1,
      0,
    )
    expect(decision).toEqual({
      kind: "exhausted",
      error: { kind: "permanent", message: "invalid number", code: "131026" },
      reason: "permanent",
    })
  })

  test("rejects settings that would break the attempt ceiling or the backoff curve", () => {
    const valid = { maxAttempts: 3, baseDelayMs: 5_000, factor: 2, maxDelayMs: 60_000 }

    expect(() => new SendRetryPolicy({ ...valid, maxAttempts: Number.NaN })).toThrow(
      "retry maxAttempts must be a positive integer",
    )
    expect(() => new SendRetryPolicy({ ...valid, maxAttempts: 0 })).toThrow(ConfigurationError)
    expect(() => new SendRetryPolicy({ ...valid, maxAttempts: 2.5 })).toThrow(ConfigurationError)
    expect(() => new SendRetryPolicy({ ...valid, baseDelayMs: -1 })).toThrow(
      "retry baseDelayMs must be a non-negative number",
    )
    expect(() => new SendRetryPolicy({ ...valid, maxDelayMs: Number.POSITIVE_INFINITY })).toThrow(
      "retry maxDelayMs must be a number no smaller than baseDelayMs",
    )
    expect(() => new SendRetryPolicy({ ...valid, maxDelayMs: 1_000 })).toThrow(ConfigurationError)
    expect(() => new SendRetryPolicy({ ...valid, factor: 0.5 })).toThrow("retry factor must be at least 1")
    expect(() => new SendRetryPolicy({ ...valid, factor: Number.NaN })).toThrow(ConfigurationError)
  })
})
