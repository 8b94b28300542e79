/**
 * In-memory sink.
 * Keeps every delivered line and record for inspection (useful in tests and REPLs).
 */

import type { DeliveryResult, LogRecord } from '../types/models.js';
import { DELIVERED, type ISink } from './ISink.js';

export interface MemorySinkEntry {
  line: string;
  record: LogRecord;
}

export class MemorySink implements ISink {
  readonly entries: MemorySinkEntry[] = [];
  closed = false;

  constructor(readonly name = 'memory') {}

  async deliver(line: string, record: LogRecord): Promise<DeliveryResult> {
    this.entries.push({ line, record });
    return DELIVERED;
  }

  async close(): Promise<void> {
    this.closed = true;
  }

  get lines(): string[] {
    return this.entries.map((e) => e.line);
  }

  get records(): LogRecord[] {
    return this.entries.map((e) => e.record);
  }

  clear(): void {
    this.entries.length = 0;
  }
}
