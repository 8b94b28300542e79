/**
 * Serialization strategy interface.
 * Turns arbitrary payload values into JSON text, failing loudly on kinds it cannot represent.
 */

export type JsonValue =
  | null
  | boolean
  | number
  | string
  | JsonValue[]
  | { [key: string]: JsonValue };

export interface ISerializer {
  /** Encode a value as JSON text. Throws SerializationError for unsupported kinds. */
  encode(value: unknown): string;

  /** Convert a value to its JSON-compatible form without stringifying. */
  toJson(value: unknown): JsonValue;

  /** Throw SerializationError if the value cannot be encoded. */
  validate(value: unknown): void;
}
