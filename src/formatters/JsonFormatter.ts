/**
 * One JSON object per record, encoded through the injected serializer.
 */

import type { ISerializer, JsonValue } from '../serialization/ISerializer.js';
import { getMessage } from '../services/RecordFactory.js';
import type { LogRecord } from '../types/models.js';
import type { IFormatter } from './IFormatter.js';

export class JsonFormatter implements IFormatter {
  constructor(private readonly serializer: ISerializer) {}

  format(record: LogRecord): string {
    const body: { [key: string]: JsonValue } = {
      timestamp: record.timestamp.toISOString(),
      level: record.levelName,
      logger: record.loggerName,
      message: getMessage(record),
    };

    if (Object.keys(record.context).length > 0) {
      body.context = this.serializer.toJson(record.context);
    }
    if (record.exception) {
      body.exception = this.serializer.toJson(record.exception);
    }

    return JSON.stringify(body);
  }
}
