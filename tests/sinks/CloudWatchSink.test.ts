import { describe, it, expect, beforeEach } from 'vitest';
import { CloudWatchSink } from '../../src/sinks/CloudWatchSink.js';
import { createRecord } from '../../src/services/RecordFactory.js';
import { JsonSerializer } from '../../src/serialization/JsonSerializer.js';
import { createContainer } from '../../src/container.js';
import { ConsoleDiagnosticsProvider } from '../../src/providers/ConsoleDiagnosticsProvider.js';
import { LogLevel, type LogRecord } from '../../src/types/models.js';
import { MockCloudWatchTransport } from '../mocks/MockCloudWatchTransport.js';

const serializer = new JsonSerializer();

function record(message: string): LogRecord {
  return createRecord(
    {
      loggerName: 'svc',
      level: LogLevel.INFO,
      message,
      context: {},
      timestamp: new Date('2026-01-15T12:00:00.000Z'),
    },
    serializer
  );
}

describe('CloudWatchSink', () => {
  let transport: MockCloudWatchTransport;
  let sink: CloudWatchSink;

  beforeEach(() => {
    transport = new MockCloudWatchTransport();
    sink = new CloudWatchSink(transport, { logGroupName: 'app', logStreamName: 'web-1' });
  });

  // ── continuation token ──

  it('should omit the token on the first call and send T1 on the second', async () => {
    expect(sink.lastToken).toBeUndefined();

    await sink.deliver('first', record('first'));
    expect('sequenceToken' in transport.calls[0]).toBe(false);
    expect(sink.lastToken).toBe('T1');

    await sink.deliver('second', record('second'));
    expect(transport.calls[1].sequenceToken).toBe('T1');
    expect(sink.lastToken).toBe('T2');
  });

  it('should send one event with the record time and the formatted line', async () => {
    await sink.deliver('{"message":"x"}', record('x'));

    expect(transport.calls[0]).toEqual({
      logGroupName: 'app',
      logStreamName: 'web-1',
      logEvents: [{ timestamp: Date.parse('2026-01-15T12:00:00.000Z'), message: '{"message":"x"}' }],
    });
  });

  it('should serialize concurrent deliveries so no call carries a stale token', async () => {
    transport.delayMs = 5;

    const results = await Promise.all([
      sink.deliver('a', record('a')),
      sink.deliver('b', record('b')),
      sink.deliver('c', record('c')),
    ]);

    expect(results.every((r) => r.ok)).toBe(true);
    expect(transport.calls.map((c) => c.sequenceToken)).toEqual([undefined, 'T1', 'T2']);
    expect(transport.calls.map((c) => c.logEvents[0].message)).toEqual(['a', 'b', 'c']);
    expect(sink.lastToken).toBe('T3');
  });

  // ── failures ──

  it('should keep the previous token when a call fails', async () => {
    await sink.deliver('ok', record('ok'));
    transport.failNext(new Error('InvalidSequenceTokenException'));

    const result = await sink.deliver('lost', record('lost'));
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.sink).toBe('cloudwatch');
      expect(result.error.message).toBe('InvalidSequenceTokenException');
    }
    expect(sink.lastToken).toBe('T1');

    await sink.deliver('next', record('next'));
    expect(transport.calls[2].sequenceToken).toBe('T1');
  });

  it('should not block later deliveries after a failure', async () => {
    transport.failNext(new Error('throttled'));
    const [first, second] = await Promise.all([
      sink.deliver('a', record('a')),
      sink.deliver('b', record('b')),
    ]);
    expect(first.ok).toBe(false);
    expect(second.ok).toBe(true);
  });

  it('should retry with backoff when maxAttempts > 1', async () => {
    const retrying = new CloudWatchSink(transport, {
      logGroupName: 'app',
      logStreamName: 'web-1',
      maxAttempts: 3,
      retryDelayMs: 1,
    });
    transport.failNext(new Error('throttled'));
    transport.failNext(new Error('throttled'));

    const result = await retrying.deliver('eventually', record('eventually'));
    expect(result.ok).toBe(true);
    expect(transport.calls).toHaveLength(3);
    expect(retrying.lastToken).toBe('T1');
  });

  it('should give up after maxAttempts', async () => {
    const retrying = new CloudWatchSink(transport, {
      logGroupName: 'app',
      logStreamName: 'web-1',
      maxAttempts: 2,
      retryDelayMs: 1,
    });
    transport.failNext(new Error('down'));
    transport.failNext(new Error('still down'));

    const result = await retrying.deliver('x', record('x'));
    expect(result.ok).toBe(false);
    if (!result.ok) expect(result.error.message).toBe('still down');
    expect(transport.calls).toHaveLength(2);
  });

  // ── close() ──

  it('close() should wait for queued deliveries', async () => {
    transport.delayMs = 5;
    const pending = sink.deliver('late', record('late'));
    await sink.close();
    expect(transport.calls).toHaveLength(1);
    await expect(pending).resolves.toEqual({ ok: true });
  });

  // ── through a logger ──

  it('should thread the token across records submitted by a logger', async () => {
    const container = createContainer({ diagnostics: new ConsoleDiagnosticsProvider({ outputToStderr: false }) });
    const logger = container.registry.getLogger('svc', LogLevel.INFO);
    logger.addDispatcher(container.createDispatcher(sink));

    logger.info('one');
    logger.info('two');
    await container.scheduler.drain();

    expect(transport.calls).toHaveLength(2);
    expect('sequenceToken' in transport.calls[0]).toBe(false);
    expect(transport.calls[1].sequenceToken).toBe('T1');
  });
});
