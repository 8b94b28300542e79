/**
 * Diagnostics side-channel.
 * Where the pipeline reports its own failures (serialization, delivery).
 * Implementations must never route back into a Logger.
 */

/** A diagnostic line reported by the pipeline. */
export interface DiagnosticEvent {
  message: string;
  /** ISO-8601 timestamp (auto-set). */
  timestamp: string;
  /** Arbitrary structured metadata. */
  fields?: Record<string, unknown>;
}

export interface IDiagnosticsProvider {
  /** Report a diagnostic line. Must not throw. */
  report(message: string, fields?: Record<string, unknown>): void;
}
