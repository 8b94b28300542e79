/**
 * Core models: the values that move through the delivery pipeline.
 */

import type { DeliveryError } from '../errors.js';

// ── Levels ──

export enum LogLevel {
  NOTSET = 0,
  DEBUG = 10,
  INFO = 20,
  WARNING = 30,
  ERROR = 40,
  CRITICAL = 50,
}

export type LevelName = 'NOTSET' | 'DEBUG' | 'INFO' | 'WARNING' | 'ERROR' | 'CRITICAL';

const LEVEL_NAMES: ReadonlyMap<LogLevel, LevelName> = new Map([
  [LogLevel.NOTSET, 'NOTSET'],
  [LogLevel.DEBUG, 'DEBUG'],
  [LogLevel.INFO, 'INFO'],
  [LogLevel.WARNING, 'WARNING'],
  [LogLevel.ERROR, 'ERROR'],
  [LogLevel.CRITICAL, 'CRITICAL'],
]);

const LEVEL_ALIASES: Record<string, LogLevel> = {
  NOTSET: LogLevel.NOTSET,
  DEBUG: LogLevel.DEBUG,
  INFO: LogLevel.INFO,
  WARN: LogLevel.WARNING,
  WARNING: LogLevel.WARNING,
  ERROR: LogLevel.ERROR,
  CRITICAL: LogLevel.CRITICAL,
  FATAL: LogLevel.CRITICAL,
};

export function levelName(level: LogLevel): LevelName {
  return LEVEL_NAMES.get(level) ?? 'NOTSET';
}

/** Parse a level name (case-insensitive, WARN/FATAL accepted). Returns null if unknown. */
export function parseLevel(text: string): LogLevel | null {
  return LEVEL_ALIASES[text.trim().toUpperCase()] ?? null;
}

// ── Records ──

export type LogContext = Readonly<Record<string, unknown>>;

export interface ExceptionInfo {
  /** Error class name, e.g. "TypeError". */
  readonly type: string;
  readonly value: string;
  readonly trace?: string;
}

/**
 * A captured log event. Frozen at construction; sinks only read it.
 */
export interface LogRecord {
  readonly loggerName: string;
  readonly level: LogLevel;
  readonly levelName: LevelName;
  /** Message template, rendered with `args` by getMessage(). */
  readonly message: string;
  readonly args: readonly unknown[];
  readonly timestamp: Date;
  /** Snapshot of bound context merged with call-site extra. */
  readonly context: LogContext;
  readonly exception?: ExceptionInfo;
}

// ── Delivery ──

export type DeliveryResult = { ok: true } | { ok: false; error: DeliveryError };
