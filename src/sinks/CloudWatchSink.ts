/**
 * AWS CloudWatch Logs sink.
 *
 * Carries the backend's continuation token from one call to the next. The
 * read-token → send → write-token sequence runs inside a SerialQueue, so
 * concurrent deliveries on one sink never send a stale token.
 */

import { SerialQueue } from '../scheduler/SerialQueue.js';
import { sleep } from '../scheduler/TaskScheduler.js';
import type { ICloudWatchTransport, PutLogEventsInput } from '../transports/ICloudWatchTransport.js';
import type { DeliveryResult, LogRecord } from '../types/models.js';
import { DELIVERED, failed, type ISink } from './ISink.js';

export interface CloudWatchSinkOptions {
  logGroupName: string;
  logStreamName: string;
  /** Attempts per record, including the first. Default: 1 (no retry). */
  maxAttempts?: number;
  /** Backoff before retry n is retryDelayMs * 2^(n-1). Default: 200. */
  retryDelayMs?: number;
}

export class CloudWatchSink implements ISink {
  readonly name = 'cloudwatch';
  private readonly queue = new SerialQueue();
  private readonly logGroupName: string;
  private readonly logStreamName: string;
  private readonly maxAttempts: number;
  private readonly retryDelayMs: number;
  private token: string | undefined;

  constructor(
    private readonly transport: ICloudWatchTransport,
    options: CloudWatchSinkOptions
  ) {
    this.logGroupName = options.logGroupName;
    this.logStreamName = options.logStreamName;
    this.maxAttempts = Math.max(1, options.maxAttempts ?? 1);
    this.retryDelayMs = options.retryDelayMs ?? 200;
  }

  /** Token that the next call will carry, if any. */
  get lastToken(): string | undefined {
    return this.token;
  }

  deliver(line: string, record: LogRecord): Promise<DeliveryResult> {
    return this.queue.run(() => this.put(line, record));
  }

  /** Wait for queued deliveries to finish. */
  async close(): Promise<void> {
    await this.queue.run(async () => undefined);
  }

  private async put(line: string, record: LogRecord): Promise<DeliveryResult> {
    let lastError: unknown;

    for (let attempt = 1; attempt <= this.maxAttempts; attempt++) {
      // Re-read on every attempt: the token only moves forward on success
      const input: PutLogEventsInput = {
        logGroupName: this.logGroupName,
        logStreamName: this.logStreamName,
        logEvents: [{ timestamp: record.timestamp.getTime(), message: line }],
        ...(this.token !== undefined && { sequenceToken: this.token }),
      };

      try {
        const response = await this.transport.putLogEvents(input);
        this.token = response.nextSequenceToken;
        return DELIVERED;
      } catch (err) {
        lastError = err;
        if (attempt < this.maxAttempts) {
          await sleep(this.retryDelayMs * 2 ** (attempt - 1));
        }
      }
    }

    return failed(this.name, lastError);
  }
}
