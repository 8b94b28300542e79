/**
 * Logger: the call-site API.
 *
 * Level check first (no record is built below threshold), then record
 * construction, then one submit() per attached dispatcher. Dispatchers of
 * ancestors receive the record too while `propagate` is true.
 *
 * Context precedence: call-site `extra` wins; bound context only fills keys
 * that `extra` does not set.
 */

import type { IDiagnosticsProvider } from '../providers/IDiagnosticsProvider.js';
import type { ISerializer } from '../serialization/ISerializer.js';
import { LogLevel, levelName, type LogContext, type LogRecord } from '../types/models.js';
import type { Dispatcher } from './Dispatcher.js';
import { createRecord } from './RecordFactory.js';

export interface LogOptions {
  /** Per-call fields. Must be serializable. */
  extra?: Record<string, unknown>;
  /** Attached as exception info. */
  error?: unknown;
}

export interface LevelLogOptions extends LogOptions {
  /** Positional values for the message template. */
  args?: readonly unknown[];
}

export interface LoggerOptions {
  level?: LogLevel;
  context?: Record<string, unknown>;
  parent?: Logger | null;
}

export class Logger {
  level: LogLevel;
  propagate = true;
  readonly parent: Logger | null;
  private readonly context: Record<string, unknown> = {};
  private readonly attached: Dispatcher[] = [];

  constructor(
    readonly name: string,
    private readonly serializer: ISerializer,
    private readonly diagnostics: IDiagnosticsProvider,
    options?: LoggerOptions
  ) {
    this.level = options?.level ?? LogLevel.NOTSET;
    this.parent = options?.parent ?? null;
    if (options?.context) this.bind(options.context);
  }

  // ── Levels ──

  /** First non-NOTSET level walking up the parent chain. */
  get effectiveLevel(): LogLevel {
    for (let logger: Logger | null = this; logger; logger = logger.parent) {
      if (logger.level !== LogLevel.NOTSET) return logger.level;
    }
    return LogLevel.NOTSET;
  }

  isEnabledFor(level: LogLevel): boolean {
    return level >= this.effectiveLevel;
  }

  setLevel(level: LogLevel): void {
    this.level = level;
  }

  // ── Context ──

  /**
   * Merge values into the bound context. Every value is checked against the
   * serializer first; on failure nothing is merged. Records already issued
   * keep the snapshot they were built with.
   */
  bind(values: Record<string, unknown>): this {
    this.serializer.validate(values);
    Object.assign(this.context, values);
    return this;
  }

  /** Frozen copy of the current bound context. */
  getContext(): LogContext {
    return Object.freeze({ ...this.context });
  }

  // ── Dispatchers ──

  get dispatchers(): readonly Dispatcher[] {
    return this.attached;
  }

  /** Attach a dispatcher. Attaching the same instance twice is a no-op. */
  addDispatcher(dispatcher: Dispatcher): void {
    if (!this.attached.includes(dispatcher)) this.attached.push(dispatcher);
  }

  removeDispatcher(dispatcher: Dispatcher): boolean {
    const index = this.attached.indexOf(dispatcher);
    if (index === -1) return false;
    this.attached.splice(index, 1);
    return true;
  }

  // ── Emitting ──

  /**
   * Build a record and hand it to every dispatcher. Returns null when the
   * level is filtered out. Throws SerializationError for unencodable extra.
   */
  log(
    level: LogLevel,
    message: string,
    args: readonly unknown[] = [],
    options: LogOptions = {}
  ): LogRecord | null {
    if (!this.isEnabledFor(level)) return null;

    const record = createRecord(
      {
        loggerName: this.name,
        level,
        message,
        args,
        context: this.context,
        ...(options.extra && { extra: options.extra }),
        ...(options.error !== undefined && { error: options.error }),
      },
      this.serializer
    );

    this.handle(record);
    return record;
  }

  /** Submit an existing record to this logger's dispatchers and its ancestors'. */
  handle(record: LogRecord): void {
    const seen = new Set<Dispatcher>();
    for (let logger: Logger | null = this; logger; logger = logger.propagate ? logger.parent : null) {
      for (const dispatcher of logger.attached) {
        if (seen.has(dispatcher)) continue;
        seen.add(dispatcher);
        dispatcher.submit(record);
      }
    }
  }

  /* Convenience methods. They never throw or wait on delivery. */

  debug(message: string, options?: LevelLogOptions): void {
    this.safeLog(LogLevel.DEBUG, message, options);
  }

  info(message: string, options?: LevelLogOptions): void {
    this.safeLog(LogLevel.INFO, message, options);
  }

  warning(message: string, options?: LevelLogOptions): void {
    this.safeLog(LogLevel.WARNING, message, options);
  }

  error(message: string, options?: LevelLogOptions): void {
    this.safeLog(LogLevel.ERROR, message, options);
  }

  critical(message: string, options?: LevelLogOptions): void {
    this.safeLog(LogLevel.CRITICAL, message, options);
  }

  /** ERROR level with `error` attached as exception info. */
  exception(message: string, error: unknown, options?: LevelLogOptions): void {
    this.safeLog(LogLevel.ERROR, message, { ...options, error });
  }

  private safeLog(level: LogLevel, message: string, options: LevelLogOptions = {}): void {
    try {
      this.log(level, message, options.args ?? [], options);
    } catch (err) {
      // The logger itself failed, so report on the side-channel instead
      const name = levelName(level);
      this.diagnostics.report(
        `${name}: An error occurred while logging: ${err instanceof Error ? err.message : String(err)}`
      );
      this.diagnostics.report(`${name}: Message that failed to log: ${message}`);
    }
  }
}
