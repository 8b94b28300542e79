/**
 * Sink interface: one backend-specific delivery target.
 */

import { DeliveryError } from '../errors.js';
import type { DeliveryResult, LogRecord } from '../types/models.js';

export interface ISink {
  /** Short name used in diagnostics, e.g. "stream" or "cloudwatch". */
  readonly name: string;

  /**
   * Deliver one formatted record. Resolves with a failure result instead of
   * rejecting when the backend call fails.
   */
  deliver(line: string, record: LogRecord): Promise<DeliveryResult>;

  /** Flush anything buffered and release resources. */
  close(): Promise<void>;
}

export const DELIVERED: DeliveryResult = Object.freeze({ ok: true });

export function failed(sink: string, err: unknown): DeliveryResult {
  return { ok: false, error: DeliveryError.from(sink, err) };
}
