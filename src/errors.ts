/**
 * Error hierarchy.
 * Construction-time errors (bad payload, bad config) surface to the caller.
 * DeliveryError never leaves a Dispatcher; it is reported to diagnostics instead.
 */

export class LoggingError extends Error {
  constructor(
    public readonly code: string,
    message: string,
    public readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = new.target.name;
  }
}

/** A context or extra value the serializer cannot represent. */
export class SerializationError extends LoggingError {
  constructor(message: string, details?: Record<string, unknown>) {
    super('SERIALIZATION_ERROR', message, details);
  }
}

/** A sink's backend call failed (network, auth, rejection). */
export class DeliveryError extends LoggingError {
  readonly sink: string;

  constructor(sink: string, message: string, options?: { cause?: unknown }) {
    super('DELIVERY_ERROR', message, { sink });
    this.sink = sink;
    if (options?.cause !== undefined) {
      this.cause = options.cause;
    }
  }

  /** Wrap anything thrown by a transport. */
  static from(sink: string, err: unknown): DeliveryError {
    if (err instanceof DeliveryError) return err;
    const message = err instanceof Error ? err.message : String(err);
    return new DeliveryError(sink, message, { cause: err });
  }
}

/** Required environment or credential values are missing. */
export class ConfigurationError extends LoggingError {
  constructor(message: string, missing: string[] = []) {
    super('CONFIGURATION_ERROR', message, { missing });
  }

  get missing(): string[] {
    const value = this.details?.missing;
    return Array.isArray(value) ? value.filter((v): v is string => typeof v === 'string') : [];
  }
}
