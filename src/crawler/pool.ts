import { sleep } from "../util/retry.js";

export interface PoolOptions {
  concurrency: number;
  /** Hard cap per task; the task's signal is aborted when it elapses. */
  taskTimeoutMs: number;
  /** Pause a worker takes between two of its tasks. */
  delayMs?: number;
  signal?: AbortSignal;
}

export type PoolOutcome<I, R> =
  | { item: I; ok: true; value: R }
  | { item: I; ok: false; error: Error };

export class TaskTimeoutError extends Error {
  constructor(readonly timeoutMs: number) {
    super(`Task timed out after ${timeoutMs}ms`);
    this.name = "TaskTimeoutError";
  }
}

async function runWithTimeout<R>(
  task: (signal: AbortSignal) => Promise<R>,
  timeoutMs: number,
  parent?: AbortSignal,
): Promise<R> {
  const controller = new AbortController();
  const onParentAbort = () => controller.abort(parent?.reason);
  parent?.addEventListener("abort", onParentAbort, { once: true });

  let timer: ReturnType<typeof setTimeout> | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      const err = new TaskTimeoutError(timeoutMs);
      controller.abort(err);
      reject(err);
    }, timeoutMs);
  });

  try {
    // The race keeps a task that ignores its signal from stalling the worker
    return await Promise.race([task(controller.signal), timeout]);
  } finally {
    clearTimeout(timer);
    parent?.removeEventListener("abort", onParentAbort);
  }
}

/**
 * Runs `task` over `items` with at most `concurrency` tasks in flight.
 * Outcomes come back in input order; a failing task never stops the others.
 */
export async function runPool<I, R>(
  items: readonly I[],
  task: (item: I, signal: AbortSignal) => Promise<R>,
  options: PoolOptions,
): Promise<PoolOutcome<I, R>[]> {
  const outcomes = new Array<PoolOutcome<I, R>>(items.length);
  const pending = items.map((item, index) => ({ item, index }));
  const workers = Math.max(1, Math.min(options.concurrency, items.length));

  async function worker(): Promise<void> {
    let first = true;
    for (let entry = pending.shift(); entry; entry = pending.shift()) {
      if (options.signal?.aborted) return;
      const { item, index } = entry;

      if (!first && options.delayMs) await sleep(options.delayMs);
      first = false;

      try {
        const value = await runWithTimeout(
          (signal) => task(item, signal),
          options.taskTimeoutMs,
          options.signal,
        );
        outcomes[index] = { item, ok: true, value };
      } catch (err) {
        outcomes[index] = {
          item,
          ok: false,
          error: err instanceof Error ? err : new Error(String(err)),
        };
      }
    }
  }

  await Promise.all(Array.from({ length: workers }, () => worker()));

  // Slots left empty by a cancelled run are dropped
  return outcomes.filter((o): o is PoolOutcome<I, R> => o !== undefined);
}
