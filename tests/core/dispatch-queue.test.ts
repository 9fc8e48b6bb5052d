import { describe, test, expect, vi } from "vitest"
import { DispatchQueue } from "../../src/core/services/dispatch-queue"
import type { Recipient, SendJob } from "../../src/core/types"

function recipients(count: number): Recipient[] {
  return Array.from({ length: count }, (_, i) => ({
    phoneNumber: `+1555000${String(i).padStart(4, "0")}`,
    name: `Contact ${i + 1}`,
    fields: {},
  }))
}

function take(queue: DispatchQueue, now: number): SendJob {
  const next = queue.next(now)
  if (next.kind !== "ready") throw new Error(`expected a ready job, got ${next.kind}`)
  return next.job
}

const transient = { kind: "transient" as const, message: "busy" }

describe("DispatchQueue", () => {
  test("creates one pending job per recipient with the shared attachment", () => {
    const attachment = { kind: "link" as const, url: "https://example.com/a.png" }
    const queue = new DispatchQueue({ recipients: recipients(2), attachment, enqueuedAt: 0 })

    expect(queue.size).toBe(2)
    expect(queue.pendingCount).toBe(2)

    const job = take(queue, 0)
    expect(job).toMatchObject({ id: 1, status: "in_flight", attemptCount: 0, attachment })
  })

  test("dequeues in load order and reports drained when nothing is pending", () => {
    const queue = new DispatchQueue({ recipients: recipients(3), enqueuedAt: 0 })

    expect([take(queue, 0).id, take(queue, 0).id, take(queue, 0).id]).toEqual([1, 2, 3])
    expect(queue.next(0)).toEqual({ kind: "drained" })
  })

  test("a retried job waits until it is eligible", () => {
    const queue = new DispatchQueue({ recipients: recipients(1), enqueuedAt: 0 })
    const job = take(queue, 0)

    queue.requeue(job, transient, 5_000)

    expect(job.status).toBe("pending")
    expect(job.lastError).toEqual(transient)
    expect(queue.pendingCount).toBe(1)
    expect(queue.next(4_999)).toEqual({ kind: "waiting", until: 5_000 })
    expect(take(queue, 5_000)).toBe(job)
  })

  test("eligible retries go before later-loaded fresh jobs", () => {
    const queue = new DispatchQueue({ recipients: recipients(3), enqueuedAt: 0 })
    const first = take(queue, 0)
    queue.requeue(first, transient, 100)

    expect(take(queue, 50).id).toBe(2)
    expect(take(queue, 100).id).toBe(1)
    expect(take(queue, 100).id).toBe(3)
  })

  test("among eligible retries the job loaded first goes next", () => {
    const queue = new DispatchQueue({ recipients: recipients(2), enqueuedAt: 0 })
    const first = take(queue, 0)
    const second = take(queue, 0)
    queue.requeue(second, transient, 10)
    queue.requeue(first, transient, 20)

    expect(take(queue, 30).id).toBe(1)
    expect(take(queue, 30).id).toBe(2)
  })

  test("reports transitions to the listener", () => {
    const onTransition = vi.fn()
    const queue = new DispatchQueue({ recipients: recipients(1), enqueuedAt: 0, onTransition })
    const job = take(queue, 0)
    queue.requeue(job, transient, 0)
    take(queue, 0)
    queue.complete(job)

    expect(onTransition.mock.calls.map((call) => [call[1], call[2]])).toEqual([
      ["pending", "in_flight"],
      ["in_flight", "failed"],
      ["failed", "pending"],
      ["pending", "in_flight"],
      ["in_flight", "succeeded"],
    ])
    expect(job.lastError).toBeUndefined()
  })

  test("rejects transitions out of a terminal state", () => {
    const queue = new DispatchQueue({ recipients: recipients(1), enqueuedAt: 0 })
    const job = take(queue, 0)
    queue.exhaust(job, { kind: "permanent", message: "invalid number" })

    expect(() => queue.complete(job)).toThrow("illegal job transition exhausted -> succeeded for job 1")
  })

  test("results follow load order with status, attempts and last error", () => {
    const queue = new DispatchQueue({ recipients: recipients(2), enqueuedAt: 0 })
    const first = take(queue, 0)
    const second = take(queue, 0)
    second.attemptCount = 1
    queue.exhaust(second, { kind: "permanent", message: "blocked" })
    first.attemptCount = 1
    queue.complete(first)

    expect(queue.results()).toEqual([
      { jobID: 1, phoneNumber: "+15550000000", name: "Contact 1", status: "succeeded", attemptCount: 1, lastError: undefined },
      {
        jobID: 2,
        phoneNumber: "+15550000001",
        name: "Contact 2",
        status: "exhausted",
        attemptCount: 1,
        lastError: { kind: "permanent", message: "blocked" },
      },
    ])
  })
})
