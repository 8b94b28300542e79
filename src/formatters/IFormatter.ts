/**
 * Formatter interface. Turns a record into the text a sink ships.
 */

import type { LogRecord } from '../types/models.js';

export interface IFormatter {
  format(record: LogRecord): string;
}
