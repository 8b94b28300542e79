/**
 * Stream sink.
 * Writes each line plus a terminator to a fixed output handle. Stream
 * 'error' events are captured here so a broken handle fails deliveries
 * instead of raising an uncaught exception.
 */

import type { Writable } from 'node:stream';
import type { DeliveryResult, LogRecord } from '../types/models.js';
import { DELIVERED, failed, type ISink } from './ISink.js';

export interface StreamSinkOptions {
  /** Output handle. Default: process.stderr. */
  stream?: Writable;
  /** Appended to every line. Default: "\n". */
  terminator?: string;
}

export class StreamSink implements ISink {
  readonly name = 'stream';
  private readonly stream: Writable;
  private readonly terminator: string;
  /** Last error the stream emitted; once set, every delivery fails with it. */
  private streamError: Error | null = null;
  private readonly onError = (err: Error): void => {
    this.streamError = err;
  };

  constructor(options?: StreamSinkOptions) {
    this.stream = options?.stream ?? process.stderr;
    this.terminator = options?.terminator ?? '\n';
    this.stream.on('error', this.onError);
  }

  deliver(line: string, _record: LogRecord): Promise<DeliveryResult> {
    if (this.streamError) return Promise.resolve(failed(this.name, this.streamError));

    return new Promise((resolve) => {
      try {
        // The callback fires once the chunk has been handed to the underlying resource
        this.stream.write(`${line}${this.terminator}`, (err) => {
          resolve(err ? failed(this.name, err) : DELIVERED);
        });
      } catch (err) {
        resolve(failed(this.name, err));
      }
    });
  }

  /** Detach from the stream. The handle is shared with the process, so it stays open. */
  async close(): Promise<void> {
    this.stream.off('error', this.onError);
  }
}
