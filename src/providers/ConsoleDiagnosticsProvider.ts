/**
 * Console-based diagnostics provider.
 * Keeps the most recent events in memory for inspection (useful in tests)
 * and writes each one to stderr unless told otherwise.
 */

import type { DiagnosticEvent, IDiagnosticsProvider } from './IDiagnosticsProvider.js';

export interface ConsoleDiagnosticsProviderOptions {
  /** Write events to process.stderr as they arrive. Default: true. */
  outputToStderr?: boolean;
  /** Keep at most this many events in `events`. Default: 100. */
  maxEvents?: number;
}

export class ConsoleDiagnosticsProvider implements IDiagnosticsProvider {
  /** Inspectable buffer of recent events (most recent last). */
  readonly events: DiagnosticEvent[] = [];

  private readonly outputToStderr: boolean;
  private readonly maxEvents: number;

  constructor(options?: ConsoleDiagnosticsProviderOptions) {
    this.outputToStderr = options?.outputToStderr ?? true;
    this.maxEvents = options?.maxEvents ?? 100;
  }

  report(message: string, fields?: Record<string, unknown>): void {
    const event: DiagnosticEvent = {
      message,
      timestamp: new Date().toISOString(),
      ...(fields && { fields }),
    };
    this.events.push(event);
    if (this.events.length > this.maxEvents) {
      this.events.splice(0, this.events.length - this.maxEvents);
    }

    if (this.outputToStderr) {
      process.stderr.write(`${message}${this.describe(fields)}\n`);
    }
  }

  /** Messages of the buffered events, oldest first. */
  messages(): string[] {
    return this.events.map((e) => e.message);
  }

  /** Clear the event buffer. Useful between test cases. */
  clear(): void {
    this.events.length = 0;
  }

  private describe(fields?: Record<string, unknown>): string {
    if (!fields) return '';
    try {
      return ` ${JSON.stringify(fields)}`;
    } catch {
      // Unencodable diagnostic fields are dropped from the console line only
      return '';
    }
  }
}
