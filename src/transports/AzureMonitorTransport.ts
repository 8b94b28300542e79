/**
 * @azure/monitor-ingestion implementation of IAzureIngestionTransport.
 * Authenticates with DefaultAzureCredential unless a client is supplied.
 */

import { DefaultAzureCredential } from '@azure/identity';
import { LogsIngestionClient } from '@azure/monitor-ingestion';
import type { IAzureIngestionTransport } from './IAzureIngestionTransport.js';

export class AzureMonitorTransport implements IAzureIngestionTransport {
  private readonly client: LogsIngestionClient;

  constructor(opts: { endpoint: string; client?: LogsIngestionClient }) {
    this.client =
      opts.client ?? new LogsIngestionClient(opts.endpoint, new DefaultAzureCredential());
  }

  async upload(ruleId: string, streamName: string, logs: Record<string, unknown>[]): Promise<void> {
    await this.client.upload(ruleId, streamName, logs);
  }
}
