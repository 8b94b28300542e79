import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { BatchWorker } from '../../src/sinks/BatchWorker.js';
import { ConsoleDiagnosticsProvider } from '../../src/providers/ConsoleDiagnosticsProvider.js';

const wait = (ms: number) => new Promise((r) => setTimeout(r, ms));

describe('BatchWorker', () => {
  let diagnostics: ConsoleDiagnosticsProvider;
  let batches: string[][];
  let send: (batch: string[]) => Promise<void>;
  let worker: BatchWorker<string>;

  beforeEach(() => {
    diagnostics = new ConsoleDiagnosticsProvider({ outputToStderr: false });
    batches = [];
    send = async (batch) => {
      batches.push(batch);
    };
    worker = new BatchWorker('w', (batch) => send(batch), diagnostics, {
      maxBatchSize: 3,
      // Long enough that only count or explicit flushes fire during a test
      maxLatencyMs: 60_000,
      gracePeriodMs: 50,
    });
  });

  afterEach(async () => {
    await worker.close();
  });

  // --- buffering ---

  it('should buffer items without sending until a trigger', () => {
    worker.enqueue('a');
    worker.enqueue('b');
    expect(batches).toHaveLength(0);
    expect(worker.size).toBe(2);
  });

  // --- by count ---

  it('should flush when the buffer reaches maxBatchSize', async () => {
    worker.enqueue('a');
    worker.enqueue('b');
    worker.enqueue('c');
    await wait(10);
    expect(batches).toEqual([['a', 'b', 'c']]);
    expect(worker.size).toBe(0);
  });

  it('should split a large buffer into batches of maxBatchSize', async () => {
    send = async (batch) => {
      batches.push(batch);
      await wait(5);
    };
    for (const item of ['1', '2', '3', '4', '5']) worker.enqueue(item);
    await worker.flush();
    expect(batches).toEqual([
      ['1', '2', '3'],
      ['4', '5'],
    ]);
  });

  // --- by latency ---

  it('should flush after maxLatencyMs', async () => {
    const fast = new BatchWorker<string>('fast', (batch) => send(batch), diagnostics, {
      maxBatchSize: 100,
      maxLatencyMs: 20,
    });
    fast.enqueue('only');
    expect(batches).toHaveLength(0);

    await wait(60);
    expect(batches).toEqual([['only']]);
    await fast.close();
  });

  // --- explicit flush ---

  it('flush() should send everything buffered', async () => {
    worker.enqueue('x');
    await worker.flush();
    expect(batches).toEqual([['x']]);
  });

  it('flush() on an empty buffer should not call send', async () => {
    await worker.flush();
    expect(batches).toHaveLength(0);
  });

  // --- failures ---

  it('should report a failed batch and retain it for the next flush', async () => {
    send = vi.fn().mockRejectedValueOnce(new Error('quota exceeded')).mockImplementation(async (batch: string[]) => {
      batches.push(batch);
    });

    worker.enqueue('a');
    worker.enqueue('b');
    await worker.flush();

    expect(diagnostics.messages()).toEqual(['w: batch of 2 failed: quota exceeded']);
    expect(worker.size).toBe(2);

    await worker.flush();
    expect(batches).toEqual([['a', 'b']]);
    expect(worker.size).toBe(0);
  });

  it('should drop the oldest items beyond maxQueueSize', async () => {
    const bounded = new BatchWorker('bounded', async () => {
      throw new Error('down');
    }, diagnostics, { maxBatchSize: 2, maxQueueSize: 3, maxLatencyMs: 60_000, gracePeriodMs: 10 });

    bounded.enqueue('a');
    bounded.enqueue('b');
    await bounded.flush();
    bounded.enqueue('c');
    bounded.enqueue('d');
    await bounded.flush();

    expect(bounded.size).toBe(3);
    expect(diagnostics.messages()).toContain('bounded: buffer full, dropped 1 oldest record(s)');
    await bounded.close();
  });

  // --- close ---

  it('close() should flush remaining items', async () => {
    worker.enqueue('last');
    await worker.close();
    expect(batches).toEqual([['last']]);
  });

  it('should drop and report items enqueued after close()', async () => {
    await worker.close();
    worker.enqueue('late');
    expect(worker.size).toBe(0);
    expect(diagnostics.messages()).toEqual(['w: worker is closed, dropping 1 record']);
  });

  it('close() should give up after the grace period and report what was left', async () => {
    send = () => new Promise(() => {});
    worker.enqueue('stuck');

    await worker.close();
    expect(diagnostics.messages()).toEqual(['w: 1 record(s) not delivered before shutdown']);
  });
});
