/**
 * Dispatcher: the non-blocking bridge between a Logger and one Sink.
 *
 * submit() schedules delivery as a detached task and returns immediately.
 * deliver() formats, calls the sink and turns every failure into a
 * diagnostics line; it never rejects, so one failing sink cannot affect
 * the caller or any other dispatcher.
 */

import { DeliveryError } from '../errors.js';
import type { IFormatter } from '../formatters/IFormatter.js';
import type { IDiagnosticsProvider } from '../providers/IDiagnosticsProvider.js';
import type { TaskScheduler } from '../scheduler/TaskScheduler.js';
import type { ISink } from '../sinks/ISink.js';
import { LogLevel, type DeliveryResult, type LogRecord } from '../types/models.js';

export interface DispatcherDeps {
  sink: ISink;
  formatter: IFormatter;
  scheduler: TaskScheduler;
  diagnostics: IDiagnosticsProvider;
  /** Records below this level are not submitted. Default: NOTSET. */
  level?: LogLevel;
}

export class Dispatcher {
  readonly sink: ISink;
  level: LogLevel;
  private readonly formatter: IFormatter;
  private readonly scheduler: TaskScheduler;
  private readonly diagnostics: IDiagnosticsProvider;
  private closing: Promise<void> | null = null;

  constructor(deps: DispatcherDeps) {
    this.sink = deps.sink;
    this.formatter = deps.formatter;
    this.scheduler = deps.scheduler;
    this.diagnostics = deps.diagnostics;
    this.level = deps.level ?? LogLevel.NOTSET;
  }

  get name(): string {
    return this.sink.name;
  }

  /** Schedule delivery. Fire-and-forget: the caller never sees the outcome. */
  submit(record: LogRecord): void {
    if (record.level < this.level) return;
    this.scheduler.spawn(() => this.deliver(record));
  }

  /** The scheduled unit of work. Resolves with the outcome, never rejects. */
  async deliver(record: LogRecord): Promise<DeliveryResult> {
    let result: DeliveryResult;

    try {
      const line = this.formatter.format(record);
      result = await this.sink.deliver(line, record);
    } catch (err) {
      result = { ok: false, error: DeliveryError.from(this.sink.name, err) };
    }

    if (!result.ok) {
      this.diagnostics.report(`${this.sink.name}: ${result.error.message}`, {
        logger: record.loggerName,
        level: record.levelName,
      });
    }
    return result;
  }

  /** Close the sink once, flushing anything it buffers. */
  close(): Promise<void> {
    if (!this.closing) {
      this.closing = this.sink.close().catch((err: unknown) => {
        this.diagnostics.report(
          `${this.sink.name}: close failed: ${err instanceof Error ? err.message : String(err)}`
        );
      });
    }
    return this.closing;
  }
}
