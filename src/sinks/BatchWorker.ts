/**
 * Background batching worker.
 * Buffers items and sends them in batches: when the buffer reaches
 * maxBatchSize, when the oldest item has waited maxLatencyMs, and once more
 * on close() within gracePeriodMs. Flushes never overlap.
 * A failed batch is reported and kept at the front of the buffer for the next flush.
 */

import type { IDiagnosticsProvider } from '../providers/IDiagnosticsProvider.js';
import { SerialQueue } from '../scheduler/SerialQueue.js';
import { raceTimeout } from '../scheduler/TaskScheduler.js';

export interface BatchWorkerOptions {
  /** Flush once this many items are buffered. Default: 32. */
  maxBatchSize?: number;
  /** Flush this long after the first buffered item. Default: 5_000 (5s). */
  maxLatencyMs?: number;
  /** How long close() waits for the final flush. Default: 5_000 (5s). */
  gracePeriodMs?: number;
  /** Oldest items are dropped beyond this. Default: 1_000. */
  maxQueueSize?: number;
}

export class BatchWorker<T> {
  private buffer: T[] = [];
  private readonly flushes = new SerialQueue();
  private flushTimer: ReturnType<typeof setTimeout> | null = null;
  private closed = false;
  /** Size of the batch currently being sent. */
  private sending = 0;
  private readonly maxBatchSize: number;
  private readonly maxLatencyMs: number;
  private readonly gracePeriodMs: number;
  private readonly maxQueueSize: number;

  constructor(
    private readonly name: string,
    private readonly send: (batch: T[]) => Promise<void>,
    private readonly diagnostics: IDiagnosticsProvider,
    options?: BatchWorkerOptions
  ) {
    this.maxBatchSize = Math.max(1, options?.maxBatchSize ?? 32);
    this.maxLatencyMs = options?.maxLatencyMs ?? 5_000;
    this.gracePeriodMs = options?.gracePeriodMs ?? 5_000;
    this.maxQueueSize = Math.max(this.maxBatchSize, options?.maxQueueSize ?? 1_000);
  }

  /** Items waiting to be sent. */
  get size(): number {
    return this.buffer.length;
  }

  enqueue(item: T): void {
    if (this.closed) {
      this.diagnostics.report(`${this.name}: worker is closed, dropping 1 record`);
      return;
    }

    this.buffer.push(item);
    this.trim();

    if (this.buffer.length >= this.maxBatchSize) {
      void this.flush();
    } else {
      this.schedule();
    }
  }

  /** Send everything buffered. Never rejects; failures go to diagnostics. */
  flush(): Promise<void> {
    return this.flushes.run(() => this.drainBuffer());
  }

  /** Stop the timer and give the final flush up to gracePeriodMs. */
  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    this.clearTimer();

    const finished = await raceTimeout(this.flush(), this.gracePeriodMs);
    const undelivered = this.buffer.length + this.sending;
    if (!finished || undelivered > 0) {
      this.diagnostics.report(`${this.name}: ${undelivered} record(s) not delivered before shutdown`);
    }
  }

  private async drainBuffer(): Promise<void> {
    this.clearTimer();

    while (this.buffer.length > 0) {
      const batch = this.buffer.splice(0, this.maxBatchSize);
      this.sending = batch.length;
      try {
        await this.send(batch);
      } catch (err) {
        // Retain for retry on the next flush
        this.buffer.unshift(...batch);
        this.trim();
        this.diagnostics.report(
          `${this.name}: batch of ${batch.length} failed: ${err instanceof Error ? err.message : String(err)}`
        );
        if (!this.closed) this.schedule();
        return;
      } finally {
        this.sending = 0;
      }
    }
  }

  private schedule(): void {
    if (this.flushTimer || this.buffer.length === 0) return;
    this.flushTimer = setTimeout(() => {
      this.flushTimer = null;
      void this.flush();
    }, this.maxLatencyMs);
    // Don't hold the process open for the timer
    this.flushTimer.unref();
  }

  private trim(): void {
    const overflow = this.buffer.length - this.maxQueueSize;
    if (overflow > 0) {
      this.buffer.splice(0, overflow);
      this.diagnostics.report(`${this.name}: buffer full, dropped ${overflow} oldest record(s)`);
    }
  }

  private clearTimer(): void {
    if (this.flushTimer) {
      clearTimeout(this.flushTimer);
      this.flushTimer = null;
    }
  }
}
