import { describe, test, expect } from "vitest"
import { createWorkerPool, runWorkers } from "../../src/lib/task-queue"

describe("runWorkers", () => {
  test("runs every worker loop with its own id and waits for all of them", async () => {
    const pool = createWorkerPool({ workers: 3 })
    const finished: number[] = []

    await runWorkers(pool, 3, async (workerID) => {
      await Promise.resolve()
      finished.push(workerID)
    })

    expect(finished.sort()).toEqual([1, 2, 3])
    expect(pool.pending).toBe(0)
  })

  test("runs loops one after another when the pool has a single slot", async () => {
    const pool = createWorkerPool({ workers: 1 })
    const execution: string[] = []

    await runWorkers(pool, 2, async (workerID) => {
      execution.push(`start-${workerID}`)
      await new Promise((resolve) => setTimeout(resolve, 5))
      execution.push(`end-${workerID}`)
    })

    expect(execution).toEqual(["start-1", "end-1", "start-2", "end-2"])
  })

  test("caps concurrency at the pool size", async () => {
    const pool = createWorkerPool({ workers: 2 })
    let running = 0
    let peak = 0

    await runWorkers(pool, 5, async () => {
      running += 1
      peak = Math.max(peak, running)
      await new Promise((resolve) => setTimeout(resolve, 1))
      running -= 1
    })

    expect(peak).toBe(2)
  })

  test("a zero-sized pool still runs one worker at a time", () => {
    expect(createWorkerPool({ workers: 0 }).concurrency).toBe(1)
  })
})
