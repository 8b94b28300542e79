import { describe, it, expect } from 'vitest';
import { JsonFormatter } from '../../src/formatters/JsonFormatter.js';
import { createRecord, type RecordInput } from '../../src/services/RecordFactory.js';
import { JsonSerializer } from '../../src/serialization/JsonSerializer.js';
import { LogLevel } from '../../src/types/models.js';

const serializer = new JsonSerializer();
const formatter = new JsonFormatter(serializer);

function format(input: Partial<RecordInput>): string {
  return formatter.format(
    createRecord(
      {
        loggerName: 'svc',
        level: LogLevel.INFO,
        message: 'hello',
        context: {},
        timestamp: new Date('2026-01-15T12:00:00.000Z'),
        ...input,
      },
      serializer
    )
  );
}

describe('JsonFormatter', () => {
  it('should emit timestamp, level, logger and message in that order', () => {
    expect(format({})).toBe(
      '{"timestamp":"2026-01-15T12:00:00.000Z","level":"INFO","logger":"svc","message":"hello"}'
    );
  });

  it('should render positional args into the message', () => {
    const line = format({ message: 'user %s retried %d times', args: ['ana', 3] });
    const parsed: { message: string } = JSON.parse(line);
    expect(parsed.message).toBe('user ana retried 3 times');
  });

  it('should include context only when non-empty', () => {
    const line = format({ context: { requestId: 'r-1' }, extra: { attempt: 2 } });
    expect(line).toBe(
      '{"timestamp":"2026-01-15T12:00:00.000Z","level":"INFO","logger":"svc","message":"hello",' +
        '"context":{"requestId":"r-1","attempt":2}}'
    );
  });

  it('should include the exception', () => {
    const err = new TypeError('bad input');
    err.stack = 'TypeError: bad input\n    at handler';
    const parsed: Record<string, unknown> = JSON.parse(format({ level: LogLevel.ERROR, error: err }));

    expect(parsed.exception).toEqual({
      type: 'TypeError',
      value: 'bad input',
      trace: 'TypeError: bad input\n    at handler',
    });
  });
});
