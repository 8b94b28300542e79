/**
 * Dependency wiring.
 * Builds the scheduler, serializer and registry that every logger shares.
 * Tests construct their own container with a quiet diagnostics provider;
 * production code goes through getProductionContainer().
 */

import type { IFormatter } from './formatters/IFormatter.js';
import { JsonFormatter } from './formatters/JsonFormatter.js';
import type { IDiagnosticsProvider } from './providers/IDiagnosticsProvider.js';
import { TaskScheduler } from './scheduler/TaskScheduler.js';
import type { ISerializer } from './serialization/ISerializer.js';
import { JsonSerializer } from './serialization/JsonSerializer.js';
import { Dispatcher } from './services/Dispatcher.js';
import { LoggerRegistry } from './services/LoggerRegistry.js';
import type { ISink } from './sinks/ISink.js';
import type { LogLevel } from './types/models.js';

export interface Container {
  registry: LoggerRegistry;
  scheduler: TaskScheduler;
  serializer: ISerializer;
  diagnostics: IDiagnosticsProvider;
  /** Default formatter for new dispatchers. */
  formatter: IFormatter;
  createDispatcher(sink: ISink, options?: { formatter?: IFormatter; level?: LogLevel }): Dispatcher;
}

export function createContainer(deps: {
  diagnostics: IDiagnosticsProvider;
  serializer?: ISerializer;
  formatter?: IFormatter;
  rootLevel?: LogLevel;
}): Container {
  const diagnostics = deps.diagnostics;
  const serializer = deps.serializer ?? new JsonSerializer();
  const formatter = deps.formatter ?? new JsonFormatter(serializer);
  const scheduler = new TaskScheduler(diagnostics);
  const registry = new LoggerRegistry({
    serializer,
    diagnostics,
    scheduler,
    ...(deps.rootLevel !== undefined && { rootLevel: deps.rootLevel }),
  });

  return {
    registry,
    scheduler,
    serializer,
    diagnostics,
    formatter,
    createDispatcher: (sink, options) =>
      new Dispatcher({
        sink,
        formatter: options?.formatter ?? formatter,
        scheduler,
        diagnostics,
        ...(options?.level !== undefined && { level: options.level }),
      }),
  };
}
