import os from "node:os";

export const DEFAULT_CONCURRENCY_PERCENT = 50;

export interface WorkerCountOptions {
  concurrency?: number;
  concurrencyPercent?: number;
  cpuCount?: number;
}

export function availableCpuCount(): number {
  return typeof os.availableParallelism === "function" ? os.availableParallelism() : os.cpus().length;
}

export function resolveWorkerCount(options: WorkerCountOptions = {}): number {
  const explicit = Math.floor(options.concurrency ?? 0);
  if (explicit > 0) {
    return explicit;
  }

  let percent = options.concurrencyPercent ?? DEFAULT_CONCURRENCY_PERCENT;
  if (!Number.isFinite(percent) || percent <= 0) {
    percent = DEFAULT_CONCURRENCY_PERCENT;
  }
  percent = Math.min(100, percent);

  const cpus = Math.max(1, options.cpuCount ?? availableCpuCount());
  return Math.max(1, Math.floor((cpus * percent) / 100));
}

export interface PoolJob<T> {
  key: string;
  /** Exclusive jobs never overlap each other; they may overlap non-exclusive ones. */
  exclusive: boolean;
  run(): Promise<T>;
}

export type PoolOutcome<T> =
  | { key: string; started: false }
  | { key: string; started: true; ok: true; value: T }
  | { key: string; started: true; ok: false; error: unknown };

export interface PoolOptions {
  workers: number;
  signal?: AbortSignal;
  onStart?: (key: string) => void;
}

/**
 * Runs jobs in queue order with at most `workers` in flight. Once `signal` aborts no
 * further job starts; jobs still queued come back with `started: false`.
 * Outcomes are returned in job order.
 */
export async function runPool<T>(jobs: readonly PoolJob<T>[], options: PoolOptions): Promise<PoolOutcome<T>[]> {
  const workers = Math.max(1, Math.floor(options.workers));
  const outcomes: PoolOutcome<T>[] = jobs.map((job) => ({ key: job.key, started: false }));
  const queue: number[] = jobs.map((_job, index) => index);
  const inFlight = new Map<number, Promise<void>>();
  let exclusiveRunning = false;

  const start = (index: number): void => {
    const job = jobs[index];
    if (job.exclusive) exclusiveRunning = true;
    options.onStart?.(job.key);

    const settle = (async () => {
      try {
        // Deferred so a synchronous throw still settles after registration below.
        const value = await Promise.resolve().then(() => job.run());
        outcomes[index] = { key: job.key, started: true, ok: true, value };
      } catch (error) {
        outcomes[index] = { key: job.key, started: true, ok: false, error };
      } finally {
        inFlight.delete(index);
        if (job.exclusive) exclusiveRunning = false;
      }
    })();
    inFlight.set(index, settle);
  };

  for (;;) {
    if (options.signal?.aborted) {
      queue.length = 0;
    }

    let cursor = 0;
    while (cursor < queue.length && inFlight.size < workers) {
      const index = queue[cursor];
      if (jobs[index].exclusive && exclusiveRunning) {
        cursor += 1;
        continue;
      }
      queue.splice(cursor, 1);
      start(index);
    }

    if (inFlight.size === 0) {
      break;
    }
    await Promise.race(inFlight.values());
  }

  return outcomes;
}
