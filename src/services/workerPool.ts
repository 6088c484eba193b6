const DEFAULT_CONCURRENCY = 5;

type TaskProcessor<T, R> = (task: T, index: number) => Promise<R>;

interface WorkerPoolOptions {
  /** Number of concurrent workers (default 5) */
  concurrency?: number;
}

/**
 * Run tasks through a bounded pool of workers.
 *
 * Workers pull the next index from a shared counter until the queue is empty.
 * Results are written by index, so they come back in input order no matter
 * which task finishes first. The first failure stops further claims and
 * rejects the pool once running tasks settle.
 */
export async function runWorkerPool<T, R>(
  tasks: readonly T[],
  processor: TaskProcessor<T, R>,
  options: WorkerPoolOptions = {}
): Promise<R[]> {
  if (tasks.length === 0) {
    return [];
  }

  const concurrency = Math.max(1, options.concurrency ?? DEFAULT_CONCURRENCY);
  const results: R[] = new Array<R>(tasks.length);

  let nextIndex = 0;
  const errors: unknown[] = [];

  async function worker(): Promise<void> {
    while (errors.length === 0) {
      const index = nextIndex++;
      if (index >= tasks.length) break;

      try {
        results[index] = await processor(tasks[index], index);
      } catch (error) {
        errors.push(error);
      }
    }
  }

  const workerCount = Math.min(concurrency, tasks.length);
  await Promise.all(Array.from({ length: workerCount }, () => worker()));

  if (errors.length > 0) {
    throw errors[0];
  }

  return results;
}
