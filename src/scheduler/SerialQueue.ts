/**
 * Single-slot mutual exclusion.
 * Tasks run one at a time, in the order run() was called.
 */

export class SerialQueue {
  private tail: Promise<void> = Promise.resolve();
  private queued = 0;

  /** Tasks waiting or running. */
  get size(): number {
    return this.queued;
  }

  run<T>(task: () => Promise<T>): Promise<T> {
    this.queued++;
    const result = this.tail.then(task).finally(() => {
      this.queued--;
    });
    // The chain only sequences; each task's outcome reaches its own caller through `result`
    this.tail = result.then(
      () => undefined,
      () => undefined
    );
    return result;
  }
}
