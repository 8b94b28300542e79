/**
 * Azure Monitor sink.
 * One upload per record to a fixed data collection rule and stream.
 */

import type { IAzureIngestionTransport } from '../transports/IAzureIngestionTransport.js';
import type { DeliveryResult, LogRecord } from '../types/models.js';
import { DELIVERED, failed, type ISink } from './ISink.js';

export interface AzureMonitorSinkOptions {
  /** Data collection rule immutable ID. */
  ruleId: string;
  /** Stream declared in the rule, e.g. "Custom-AppLogs". */
  streamName: string;
}

export class AzureMonitorSink implements ISink {
  readonly name = 'azure';
  readonly ruleId: string;
  readonly streamName: string;

  constructor(
    private readonly transport: IAzureIngestionTransport,
    options: AzureMonitorSinkOptions
  ) {
    this.ruleId = options.ruleId;
    this.streamName = options.streamName;
  }

  async deliver(line: string, record: LogRecord): Promise<DeliveryResult> {
    const body = [
      {
        Time: record.timestamp.toISOString(),
        Level: record.levelName,
        Message: line,
      },
    ];

    try {
      await this.transport.upload(this.ruleId, this.streamName, body);
      return DELIVERED;
    } catch (err) {
      return failed(this.name, err);
    }
  }

  async close(): Promise<void> {
    // Stateless: every upload completes inside deliver()
  }
}
