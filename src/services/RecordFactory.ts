/**
 * Record construction.
 * Merges call-site extra over the bound context and stores the serializer's
 * normalised, deep-frozen form, so later mutation of the caller's objects is
 * never seen by a sink.
 */

import { format } from 'node:util';
import { SerializationError } from '../errors.js';
import type { ISerializer } from '../serialization/ISerializer.js';
import { levelName, type ExceptionInfo, type LogContext, type LogLevel, type LogRecord } from '../types/models.js';

export interface RecordInput {
  loggerName: string;
  level: LogLevel;
  message: string;
  args?: readonly unknown[];
  /** Caller-supplied fields. Win over bound context on key collisions. */
  extra?: Record<string, unknown>;
  /** Logger-bound context at call time. */
  context: LogContext;
  error?: unknown;
  timestamp?: Date;
}

export function toExceptionInfo(err: unknown): ExceptionInfo {
  if (err instanceof Error) {
    return Object.freeze({
      type: err.name,
      value: err.message,
      ...(err.stack && { trace: err.stack }),
    });
  }
  return Object.freeze({ type: typeof err, value: String(err) });
}

function deepFreeze<T>(value: T): T {
  if (typeof value === 'object' && value !== null && !Object.isFrozen(value)) {
    for (const item of Object.values(value)) deepFreeze(item);
    Object.freeze(value);
  }
  return value;
}

function snapshotContext(merged: Record<string, unknown>, serializer: ISerializer): LogContext {
  const json = serializer.toJson(merged);
  if (json === null || typeof json !== 'object' || Array.isArray(json)) {
    throw new SerializationError('Context must encode to a JSON object', { path: '$' });
  }
  return deepFreeze(json);
}

/**
 * Build a frozen LogRecord. Throws SerializationError (via the serializer)
 * when `extra` or the bound context holds a value that cannot be encoded.
 */
export function createRecord(input: RecordInput, serializer: ISerializer): LogRecord {
  const context = snapshotContext({ ...input.context, ...input.extra }, serializer);

  const record: LogRecord = {
    loggerName: input.loggerName,
    level: input.level,
    levelName: levelName(input.level),
    message: input.message,
    args: Object.freeze([...(input.args ?? [])]),
    timestamp: input.timestamp ? new Date(input.timestamp.getTime()) : new Date(),
    context,
    ...(input.error !== undefined && { exception: toExceptionInfo(input.error) }),
  };
  return Object.freeze(record);
}

/** Render the message template with its positional args (%s, %d, %j, %o, %%). */
export function getMessage(record: LogRecord): string {
  if (record.args.length === 0) return record.message;
  return format(record.message, ...record.args);
}
