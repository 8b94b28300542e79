/**
 * Google Cloud Logging transport interface.
 * Writes one batch of entries per call.
 */

export type GoogleSeverity = 'DEFAULT' | 'DEBUG' | 'INFO' | 'WARNING' | 'ERROR' | 'CRITICAL';

export interface GoogleLogEntry {
  severity: GoogleSeverity;
  timestamp: Date;
  /** Formatted record text. */
  payload: string;
  labels?: Record<string, string>;
}

export interface IGoogleLoggingTransport {
  write(entries: GoogleLogEntry[]): Promise<void>;
}
