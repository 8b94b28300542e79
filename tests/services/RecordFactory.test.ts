import { describe, it, expect } from 'vitest';
import { createRecord, getMessage, toExceptionInfo } from '../../src/services/RecordFactory.js';
import { JsonSerializer } from '../../src/serialization/JsonSerializer.js';
import { SerializationError } from '../../src/errors.js';
import { LogLevel } from '../../src/types/models.js';

const serializer = new JsonSerializer();

describe('createRecord', () => {
  it('should fill level name, timestamp and empty args', () => {
    const before = Date.now();
    const record = createRecord({ loggerName: 'svc', level: LogLevel.WARNING, message: 'm', context: {} }, serializer);

    expect(record.levelName).toBe('WARNING');
    expect(record.args).toEqual([]);
    expect(record.timestamp.getTime()).toBeGreaterThanOrEqual(before);
    expect(record.exception).toBeUndefined();
  });

  it('should copy args so later mutation of the caller array is not seen', () => {
    const args: unknown[] = [1];
    const record = createRecord({ loggerName: 'svc', level: LogLevel.INFO, message: '%d', args, context: {} }, serializer);
    args.push(2);
    expect(record.args).toEqual([1]);
  });

  it('should snapshot context so later mutation of the source is not seen', () => {
    const context: Record<string, unknown> = { a: 1 };
    const record = createRecord({ loggerName: 'svc', level: LogLevel.INFO, message: 'm', context }, serializer);
    context.a = 2;
    expect(record.context).toEqual({ a: 1 });
  });

  it('should store nested context values as a deep-frozen copy', () => {
    const nested = { tags: ['a'] };
    const record = createRecord(
      { loggerName: 'svc', level: LogLevel.INFO, message: 'm', context: { nested }, extra: { at: new Date('2026-05-01T00:00:00.000Z') } },
      serializer
    );
    nested.tags.push('b');

    expect(record.context).toEqual({ nested: { tags: ['a'] }, at: '2026-05-01T00:00:00.000Z' });
    expect(Object.isFrozen(record.context.nested)).toBe(true);
  });

  it('should keep its own copy of the timestamp', () => {
    const timestamp = new Date('2026-05-01T00:00:00.000Z');
    const record = createRecord({ loggerName: 'svc', level: LogLevel.INFO, message: 'm', context: {}, timestamp }, serializer);
    timestamp.setFullYear(2030);

    expect(record.timestamp.toISOString()).toBe('2026-05-01T00:00:00.000Z');
  });

  it('should reject bound context that became unencodable after bind', () => {
    const context: Record<string, unknown> = { ok: 1 };
    context.cb = () => 1;
    expect(() => createRecord({ loggerName: 'svc', level: LogLevel.INFO, message: 'm', context }, serializer)).toThrow(
      'Cannot serialize value of kind function at $.cb'
    );
  });

  it('should validate extra before building', () => {
    expect(() =>
      createRecord(
        { loggerName: 'svc', level: LogLevel.INFO, message: 'm', context: {}, extra: { s: Symbol('x') } },
        serializer
      )
    ).toThrow(SerializationError);
  });
});

describe('toExceptionInfo', () => {
  it('should describe non-Error throwables by type and text', () => {
    expect(toExceptionInfo('boom')).toEqual({ type: 'string', value: 'boom' });
  });

  it('should use the error name and message', () => {
    const info = toExceptionInfo(new RangeError('too far'));
    expect(info.type).toBe('RangeError');
    expect(info.value).toBe('too far');
  });
});

describe('getMessage', () => {
  it('should return the template untouched when there are no args', () => {
    const record = createRecord({ loggerName: 'svc', level: LogLevel.INFO, message: '100%', context: {} }, serializer);
    expect(getMessage(record)).toBe('100%');
  });

  it('should support %j for JSON args', () => {
    const record = createRecord(
      { loggerName: 'svc', level: LogLevel.INFO, message: 'payload %j', args: [{ a: 1 }], context: {} },
      serializer
    );
    expect(getMessage(record)).toBe('payload {"a":1}');
  });
});
