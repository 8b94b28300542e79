/**
 * Detached-task scheduler.
 *
 * spawn() hands work to a later macrotask and returns immediately, so the
 * caller's synchronous path never waits on a sink. Every spawned task is
 * tracked until it settles; drain() is the shutdown hook that waits for them.
 */

import type { IDiagnosticsProvider } from '../providers/IDiagnosticsProvider.js';

export type Task = () => Promise<unknown>;

/** Resolve on the next macrotask, after pending I/O callbacks. */
export function nextTick(): Promise<void> {
  return new Promise((resolve) => setImmediate(resolve));
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => {
    setTimeout(resolve, ms);
  });
}

/** Resolve true if `promise` settles within `ms`, false otherwise. The timer never holds the process open. */
export async function raceTimeout(promise: Promise<unknown>, ms: number): Promise<boolean> {
  let timer: ReturnType<typeof setTimeout> | undefined;
  const timedOut = new Promise<boolean>((resolve) => {
    timer = setTimeout(() => resolve(false), ms);
    timer.unref();
  });
  try {
    return await Promise.race([promise.then(() => true), timedOut]);
  } finally {
    clearTimeout(timer);
  }
}

export class TaskScheduler {
  private readonly inFlight = new Set<Promise<void>>();

  constructor(private readonly diagnostics: IDiagnosticsProvider) {}

  /** Number of spawned tasks that have not settled yet. */
  get pending(): number {
    return this.inFlight.size;
  }

  /** Fire-and-forget. Rejections are reported to diagnostics, never thrown. */
  spawn(task: Task): void {
    const tracked: Promise<void> = nextTick()
      .then(task)
      .then(
        () => undefined,
        (err: unknown) => {
          this.diagnostics.report(
            `Detached task failed: ${err instanceof Error ? err.message : String(err)}`
          );
        }
      )
      .finally(() => {
        this.inFlight.delete(tracked);
      });
    this.inFlight.add(tracked);
  }

  /**
   * Wait until no task is in flight. Tasks spawned while draining are waited
   * for too. With a timeout, returns the number of tasks abandoned.
   */
  async drain(timeoutMs?: number): Promise<number> {
    const deadline = timeoutMs === undefined ? Infinity : Date.now() + timeoutMs;

    while (this.inFlight.size > 0) {
      const remaining = deadline - Date.now();
      if (remaining <= 0) break;

      const settled = Promise.all(this.inFlight);
      if (remaining === Infinity) {
        await settled;
        continue;
      }

      const done = await raceTimeout(settled, remaining);
      if (!done) break;
    }

    return this.inFlight.size;
  }
}
