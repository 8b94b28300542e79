/**
 * Human-readable single-line format for console output:
 *   2026-01-15T12:00:00.000Z [INFO] svc: message {"requestId":"r-1"}
 */

import type { ISerializer } from '../serialization/ISerializer.js';
import { getMessage } from '../services/RecordFactory.js';
import type { LogRecord } from '../types/models.js';
import type { IFormatter } from './IFormatter.js';

export class LineFormatter implements IFormatter {
  constructor(private readonly serializer: ISerializer) {}

  format(record: LogRecord): string {
    const prefix = `${record.timestamp.toISOString()} [${record.levelName}] ${record.loggerName}:`;
    const contextStr =
      Object.keys(record.context).length > 0 ? ` ${this.serializer.encode(record.context)}` : '';
    const trace = record.exception
      ? `\n${record.exception.trace ?? `${record.exception.type}: ${record.exception.value}`}`
      : '';
    return `${prefix} ${getMessage(record)}${contextStr}${trace}`;
  }
}
