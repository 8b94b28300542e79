/**
 * @google-cloud/logging implementation of IGoogleLoggingTransport.
 * Credentials come from the environment (Application Default Credentials).
 */

import { Logging, type Log } from '@google-cloud/logging';
import type { GoogleLogEntry, IGoogleLoggingTransport } from './IGoogleLoggingTransport.js';

const DEFAULT_LOG_NAME = 'node';

export class GoogleCloudLoggingTransport implements IGoogleLoggingTransport {
  private readonly log: Log;

  constructor(opts?: { projectId?: string; logName?: string; logging?: Logging }) {
    const logging =
      opts?.logging ?? new Logging(opts?.projectId ? { projectId: opts.projectId } : undefined);
    this.log = logging.log(opts?.logName ?? DEFAULT_LOG_NAME);
  }

  async write(entries: GoogleLogEntry[]): Promise<void> {
    if (entries.length === 0) return;

    const batch = entries.map((e) =>
      this.log.entry(
        {
          severity: e.severity,
          timestamp: e.timestamp,
          ...(e.labels && { labels: e.labels }),
        },
        e.payload
      )
    );

    await this.log.write(batch);
  }
}
