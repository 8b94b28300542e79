/**
 * Logger registry: one Logger per name, plus a root logger every named
 * logger propagates to.
 *
 * Construct once at process start and pass it to call sites (or use
 * getProductionContainer(), which caches one). Lookups are synchronous
 * get-or-create on the single JS thread, so two lookups for an unseen name
 * always yield the same instance.
 *
 * Binding context on a shared logger is a process-wide side effect: every
 * caller holding that name sees it.
 */

import type { IDiagnosticsProvider } from '../providers/IDiagnosticsProvider.js';
import type { TaskScheduler } from '../scheduler/TaskScheduler.js';
import type { ISerializer } from '../serialization/ISerializer.js';
import { LogLevel } from '../types/models.js';
import type { Dispatcher } from './Dispatcher.js';
import { Logger } from './Logger.js';

export const ROOT_LOGGER_NAME = 'root';

export interface LoggerRegistryDeps {
  serializer: ISerializer;
  diagnostics: IDiagnosticsProvider;
  scheduler: TaskScheduler;
  /** Level of the root logger. Default: WARNING. */
  rootLevel?: LogLevel;
}

export class LoggerRegistry {
  readonly root: Logger;
  private readonly loggers = new Map<string, Logger>();
  private readonly serializer: ISerializer;
  private readonly diagnostics: IDiagnosticsProvider;
  private readonly scheduler: TaskScheduler;
  private shuttingDown: Promise<number> | null = null;

  constructor(deps: LoggerRegistryDeps) {
    this.serializer = deps.serializer;
    this.diagnostics = deps.diagnostics;
    this.scheduler = deps.scheduler;
    this.root = new Logger(ROOT_LOGGER_NAME, this.serializer, this.diagnostics, {
      level: deps.rootLevel ?? LogLevel.WARNING,
    });
    this.loggers.set(ROOT_LOGGER_NAME, this.root);
  }

  /**
   * Return the logger for `name`, creating it on first lookup. `level` and
   * `context` only apply at creation; later calls ignore them.
   */
  getLogger(name: string, level: LogLevel = LogLevel.NOTSET, context?: Record<string, unknown>): Logger {
    const existing = this.loggers.get(name);
    if (existing) return existing;

    const logger = new Logger(name, this.serializer, this.diagnostics, {
      level,
      parent: this.root,
      ...(context && { context }),
    });
    this.loggers.set(name, logger);
    return logger;
  }

  has(name: string): boolean {
    return this.loggers.has(name);
  }

  /** Registered names, root included. */
  names(): string[] {
    return [...this.loggers.keys()];
  }

  /**
   * Wait for in-flight deliveries, then close every attached dispatcher once.
   * Resolves with the number of deliveries abandoned at the timeout.
   * Calling it again returns the same promise.
   */
  shutdown(timeoutMs?: number): Promise<number> {
    if (!this.shuttingDown) {
      this.shuttingDown = this.runShutdown(timeoutMs);
    }
    return this.shuttingDown;
  }

  private async runShutdown(timeoutMs?: number): Promise<number> {
    const abandoned = await this.scheduler.drain(timeoutMs);
    if (abandoned > 0) {
      this.diagnostics.report(`Shutdown abandoned ${abandoned} in-flight deliveries`);
    }

    const dispatchers = new Set<Dispatcher>();
    for (const logger of this.loggers.values()) {
      for (const dispatcher of logger.dispatchers) dispatchers.add(dispatcher);
    }
    await Promise.all([...dispatchers].map((d) => d.close()));
    return abandoned;
  }
}
