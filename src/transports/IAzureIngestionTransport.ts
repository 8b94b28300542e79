/**
 * Azure Monitor Logs Ingestion transport interface.
 */

export interface IAzureIngestionTransport {
  /** Upload rows to a data collection rule stream. */
  upload(ruleId: string, streamName: string, logs: Record<string, unknown>[]): Promise<void>;
}
