import PQueue from "p-queue"

export interface WorkerPoolPolicy {
  workers: number
}

export function createWorkerPool(policy: WorkerPoolPolicy): PQueue {
  return new PQueue({ concurrency: Math.max(1, policy.workers) })
}

/**
 * Start `count` copies of a worker loop on the pool and wait until every loop returns
 */
export async function runWorkers(
  pool: PQueue,
  count: number,
  worker: (workerID: number) => Promise<void>,
): Promise<void> {
  const loops = Array.from({ length: count }, (_, index) => pool.add(() => worker(index + 1)))
  await Promise.all(loops)
}
