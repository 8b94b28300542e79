/**
 * Google Cloud Logging sink.
 * deliver() only enqueues; batching and flush timing belong to the BatchWorker.
 */

import type { IDiagnosticsProvider } from '../providers/IDiagnosticsProvider.js';
import type {
  GoogleLogEntry,
  GoogleSeverity,
  IGoogleLoggingTransport,
} from '../transports/IGoogleLoggingTransport.js';
import { LogLevel, type DeliveryResult, type LogRecord } from '../types/models.js';
import { BatchWorker, type BatchWorkerOptions } from './BatchWorker.js';
import { DELIVERED, type ISink } from './ISink.js';

export interface GoogleCloudSinkOptions extends BatchWorkerOptions {
  /** Labels attached to every entry. */
  labels?: Record<string, string>;
}

function severityFor(level: LogLevel): GoogleSeverity {
  if (level >= LogLevel.CRITICAL) return 'CRITICAL';
  if (level >= LogLevel.ERROR) return 'ERROR';
  if (level >= LogLevel.WARNING) return 'WARNING';
  if (level >= LogLevel.INFO) return 'INFO';
  if (level >= LogLevel.DEBUG) return 'DEBUG';
  return 'DEFAULT';
}

export class GoogleCloudSink implements ISink {
  readonly name = 'gcp';
  private readonly worker: BatchWorker<GoogleLogEntry>;
  private readonly labels: Record<string, string> | undefined;

  constructor(
    transport: IGoogleLoggingTransport,
    diagnostics: IDiagnosticsProvider,
    options?: GoogleCloudSinkOptions
  ) {
    this.labels = options?.labels;
    this.worker = new BatchWorker(this.name, (batch) => transport.write(batch), diagnostics, options);
  }

  /** Records waiting in the worker. */
  get pending(): number {
    return this.worker.size;
  }

  async deliver(line: string, record: LogRecord): Promise<DeliveryResult> {
    this.worker.enqueue({
      severity: severityFor(record.level),
      timestamp: record.timestamp,
      payload: line,
      ...(this.labels && { labels: this.labels }),
    });
    return DELIVERED;
  }

  flush(): Promise<void> {
    return this.worker.flush();
  }

  close(): Promise<void> {
    return this.worker.close();
  }
}
