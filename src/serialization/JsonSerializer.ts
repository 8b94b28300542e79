/**
 * JSON serializer with per-kind encoders.
 *
 * Built-in kinds:
 *   Date               → ISO-8601 text
 *   bigint             → number, or decimal text beyond Number.MAX_SAFE_INTEGER
 *   Set                → array (insertion order)
 *   Map                → object (primitive keys stringified; object keys and
 *                        keys that collide once stringified are rejected)
 *   Complex            → { real, imag }
 *   Uint8Array/Buffer  → base64 text (also ArrayBuffer, DataView)
 *   other typed arrays → array of numbers
 *   Error              → { name, message }
 *   objects with toJSON() → whatever toJSON returns
 *
 * Anything else that is not a plain object, array or primitive is rejected with
 * a SerializationError naming the path, rather than silently dropped.
 */

import { SerializationError } from '../errors.js';
import type { ISerializer, JsonValue } from './ISerializer.js';

/** Complex number value. */
export class Complex {
  constructor(
    readonly real: number,
    readonly imag: number
  ) {}
}

type NumericArray =
  | Int8Array
  | Uint8ClampedArray
  | Int16Array
  | Uint16Array
  | Int32Array
  | Uint32Array
  | Float32Array
  | Float64Array;

type BigIntArray = BigInt64Array | BigUint64Array;

interface KindEncoder {
  readonly name: string;
  tryEncode(value: unknown): { value: unknown } | null;
}

const NO_KINDS: ReadonlySet<KindEncoder> = new Set();

function isNumericArray(value: unknown): value is NumericArray {
  return (
    value instanceof Int8Array ||
    value instanceof Uint8ClampedArray ||
    value instanceof Int16Array ||
    value instanceof Uint16Array ||
    value instanceof Int32Array ||
    value instanceof Uint32Array ||
    value instanceof Float32Array ||
    value instanceof Float64Array
  );
}

function isBigIntArray(value: unknown): value is BigIntArray {
  return value instanceof BigInt64Array || value instanceof BigUint64Array;
}

function isPlainObject(value: object): value is Record<string, unknown> {
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

function hasToJson(value: object): value is { toJSON(): unknown } {
  return 'toJSON' in value && typeof value.toJSON === 'function';
}

function toBase64(value: Uint8Array | DataView | ArrayBuffer): string {
  if (value instanceof ArrayBuffer) return Buffer.from(value).toString('base64');
  return Buffer.from(value.buffer, value.byteOffset, value.byteLength).toString('base64');
}

function bigintToJson(value: bigint): number | string {
  const n = Number(value);
  return Number.isSafeInteger(n) ? n : value.toString();
}

function kindOf(value: unknown): string {
  if (value === null) return 'null';
  if (typeof value !== 'object') return typeof value;
  return value.constructor?.name ?? 'Object';
}

export class JsonSerializer implements ISerializer {
  private readonly kinds: KindEncoder[] = [];

  /**
   * Register an encoder for an additional kind. Registered kinds are tried
   * before the built-ins, in registration order. The encoder may return any
   * value the serializer can itself encode.
   */
  register<T>(name: string, test: (value: unknown) => value is T, encode: (value: T) => unknown): this {
    this.kinds.push({
      name,
      tryEncode: (value) => (test(value) ? { value: encode(value) } : null),
    });
    return this;
  }

  encode(value: unknown): string {
    return JSON.stringify(this.toJson(value));
  }

  toJson(value: unknown): JsonValue {
    if (value === undefined) {
      throw new SerializationError('Cannot serialize undefined', { path: '$', kind: 'undefined' });
    }
    return this.normalize(value, '$', new Set(), NO_KINDS);
  }

  validate(value: unknown): void {
    this.toJson(value);
  }

  /**
   * `applied` holds the registered kinds already used at this path; each is
   * tried at most once per value so an encoder returning its own kind terminates.
   */
  private normalize(
    value: unknown,
    path: string,
    ancestors: Set<object>,
    applied: ReadonlySet<KindEncoder>
  ): JsonValue {
    for (const kind of this.kinds) {
      if (applied.has(kind)) continue;
      const hit = kind.tryEncode(value);
      if (hit) return this.normalize(hit.value, path, ancestors, new Set([...applied, kind]));
    }

    switch (typeof value) {
      case 'string':
      case 'boolean':
        return value;
      case 'number':
        return Number.isFinite(value) ? value : null;
      case 'bigint':
        return bigintToJson(value);
      case 'undefined':
        return null;
      case 'function':
      case 'symbol':
        throw this.unsupported(value, path);
      default:
        break;
    }

    if (value === null) return null;
    if (typeof value !== 'object') throw this.unsupported(value, path);

    if (ancestors.has(value)) {
      throw new SerializationError(`Circular reference at ${path}`, { path, kind: kindOf(value) });
    }

    ancestors.add(value);
    try {
      return this.normalizeObject(value, path, ancestors);
    } finally {
      ancestors.delete(value);
    }
  }

  private normalizeObject(value: object, path: string, ancestors: Set<object>): JsonValue {
    if (value instanceof Date) {
      if (Number.isNaN(value.getTime())) {
        throw new SerializationError(`Invalid Date at ${path}`, { path, kind: 'Date' });
      }
      return value.toISOString();
    }

    if (value instanceof Complex) {
      return { real: value.real, imag: value.imag };
    }

    if (value instanceof Uint8Array || value instanceof DataView || value instanceof ArrayBuffer) {
      return toBase64(value);
    }

    if (isNumericArray(value)) return Array.from(value);
    if (isBigIntArray(value)) return Array.from(value, bigintToJson);

    if (Array.isArray(value)) {
      return value.map((item: unknown, i) => this.normalize(item, `${path}[${i}]`, ancestors, NO_KINDS));
    }

    if (value instanceof Set) {
      return Array.from(value, (item: unknown, i) =>
        this.normalize(item, `${path}[${i}]`, ancestors, NO_KINDS)
      );
    }

    if (value instanceof Map) {
      const out: { [key: string]: JsonValue } = {};
      for (const [key, item] of value) {
        const name = this.mapKey(key, path);
        if (Object.hasOwn(out, name)) {
          throw new SerializationError(`Duplicate map key "${name}" at ${path}`, { path, kind: 'Map' });
        }
        out[name] = this.normalize(item, `${path}.${name}`, ancestors, NO_KINDS);
      }
      return out;
    }

    if (value instanceof Error) {
      return { name: value.name, message: value.message };
    }

    if (isPlainObject(value)) {
      const out: { [key: string]: JsonValue } = {};
      for (const [key, item] of Object.entries(value)) {
        // JSON drops undefined properties
        if (item === undefined) continue;
        out[key] = this.normalize(item, `${path}.${key}`, ancestors, NO_KINDS);
      }
      return out;
    }

    if (hasToJson(value)) {
      return this.normalize(value.toJSON(), path, ancestors, NO_KINDS);
    }

    throw this.unsupported(value, path);
  }

  private mapKey(key: unknown, path: string): string {
    switch (typeof key) {
      case 'string':
        return key;
      case 'number':
      case 'boolean':
      case 'bigint':
        return String(key);
      default:
        throw new SerializationError(`Cannot use map key of kind ${kindOf(key)} at ${path}`, {
          path,
          kind: kindOf(key),
        });
    }
  }

  private unsupported(value: unknown, path: string): SerializationError {
    const kind = kindOf(value);
    return new SerializationError(`Cannot serialize value of kind ${kind} at ${path}`, { path, kind });
  }
}
