import { afterEach, beforeEach, describe, test, expect, vi } from "vitest"
import { RateLimiter } from "../../../src/adapters/channels/rate-limiter"
import { ConfigurationError } from "../../../src/core/errors"

describe("RateLimiter", () => {
  beforeEach(() => {
    vi.useFakeTimers()
    vi.setSystemTime(0)
  })

  afterEach(() => {
    vi.useRealTimers()
  })

  test("admits up to maxSends immediately", async () => {
    const limiter = new RateLimiter({ maxSends: 3, windowMs: 1_000 })

    const grants = await Promise.all([limiter.acquire(), limiter.acquire(), limiter.acquire()])

    expect(grants.map((grant) => grant.waitedMs)).toEqual([0, 0, 0])
  })

  test("holds the next caller until the oldest send leaves the window", async () => {
    const limiter = new RateLimiter({ maxSends: 2, windowMs: 1_000 })
    await limiter.acquire()
    await vi.advanceTimersByTimeAsync(400)
    await limiter.acquire()

    let granted = false
    const pending = limiter.acquire().then((grant) => {
      granted = true
      return grant
    })

    await vi.advanceTimersByTimeAsync(599)
    expect(granted).toBe(false)

    await vi.advanceTimersByTimeAsync(1)
    const grant = await pending
    expect(grant).toEqual({ requestedAt: 400, grantedAt: 1_000, waitedMs: 600 })
  })

  test("never admits more than the cap within any trailing window", async () => {
    const limiter = new RateLimiter({ maxSends: 5, windowMs: 1_000 })

    const all = Promise.all(Array.from({ length: 17 }, () => limiter.acquire()))
    await vi.runAllTimersAsync()
    const grantedAt = (await all).map((grant) => grant.grantedAt)

    for (const start of grantedAt) {
      const inWindow = grantedAt.filter((t) => t >= start && t < start + 1_000)
      expect(inWindow.length).toBeLessThanOrEqual(5)
    }
    expect(grantedAt.at(-1)).toBe(3_000)
  })

  test("serves waiting callers in call order", async () => {
    const limiter = new RateLimiter({ maxSends: 1, windowMs: 100 })
    const order: number[] = []

    const calls = [1, 2, 3, 4].map((n) => limiter.acquire().then(() => order.push(n)))
    await vi.runAllTimersAsync()
    await Promise.all(calls)

    expect(order).toEqual([1, 2, 3, 4])
  })

  test("a slot frees once its send is a full window old", async () => {
    const limiter = new RateLimiter({ maxSends: 1, windowMs: 60_000 })
    await limiter.acquire()
    await vi.advanceTimersByTimeAsync(60_000)

    const grant = await limiter.acquire()

    expect(grant).toEqual({ requestedAt: 60_000, grantedAt: 60_000, waitedMs: 0 })
  })

  test("rejects invalid limits", () => {
    expect(() => new RateLimiter({ maxSends: 0, windowMs: 1_000 })).toThrow(ConfigurationError)
    expect(() => new RateLimiter({ maxSends: 1, windowMs: 0 })).toThrow(ConfigurationError)
  })
})
