/**
 * Public API.
 */

import { getProductionContainer, resetProductionContainer } from './container.production.js';
import type { Logger } from './services/Logger.js';
import type { LogLevel } from './types/models.js';

/**
 * Logger for `name` from the process-wide registry. `level` and `context`
 * only apply the first time a name is looked up.
 */
export function getLogger(name: string, level?: LogLevel, context?: Record<string, unknown>): Logger {
  return getProductionContainer().registry.getLogger(name, level, context);
}

/** Drain pending deliveries and close every sink of the process-wide registry. */
export function shutdown(timeoutMs?: number): Promise<void> {
  return resetProductionContainer(timeoutMs);
}

export { LogLevel, levelName, parseLevel } from './types/models.js';
export type { DeliveryResult, ExceptionInfo, LevelName, LogContext, LogRecord } from './types/models.js';
export { LoggingError, SerializationError, DeliveryError, ConfigurationError } from './errors.js';
export { Logger, type LevelLogOptions, type LogOptions, type LoggerOptions } from './services/Logger.js';
export { LoggerRegistry, ROOT_LOGGER_NAME } from './services/LoggerRegistry.js';
export { Dispatcher, type DispatcherDeps } from './services/Dispatcher.js';
export { createRecord, getMessage } from './services/RecordFactory.js';
export { TaskScheduler } from './scheduler/TaskScheduler.js';
export { SerialQueue } from './scheduler/SerialQueue.js';
export { JsonSerializer, Complex } from './serialization/JsonSerializer.js';
export type { ISerializer, JsonValue } from './serialization/ISerializer.js';
export type { IFormatter } from './formatters/IFormatter.js';
export { JsonFormatter } from './formatters/JsonFormatter.js';
export { LineFormatter } from './formatters/LineFormatter.js';
export type { IDiagnosticsProvider, DiagnosticEvent } from './providers/IDiagnosticsProvider.js';
export { ConsoleDiagnosticsProvider } from './providers/ConsoleDiagnosticsProvider.js';
export * from './sinks/index.js';
export type { ICloudWatchTransport, PutLogEventsInput, PutLogEventsOutput } from './transports/ICloudWatchTransport.js';
export type { IGoogleLoggingTransport, GoogleLogEntry, GoogleSeverity } from './transports/IGoogleLoggingTransport.js';
export type { IAzureIngestionTransport } from './transports/IAzureIngestionTransport.js';
export { AwsCloudWatchTransport } from './transports/AwsCloudWatchTransport.js';
export { GoogleCloudLoggingTransport } from './transports/GoogleCloudLoggingTransport.js';
export { AzureMonitorTransport } from './transports/AzureMonitorTransport.js';
export { loadConfig, type LoggingConfig, type SinkKind } from './config.js';
export { createContainer, type Container } from './container.js';
export {
  createSink,
  getProductionContainer,
  resetProductionContainer,
  type TransportOverrides,
} from './container.production.js';
