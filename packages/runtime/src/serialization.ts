import type { JsonObject, JsonValue, Jsonified } from '@jsonable/types';
import type { CanonicalizeOptions } from './canonicalize';
import {
  describeType,
  describeValue,
  isCustomSerializable,
  isTimestamped,
  jsonableHandler,
} from './canonicalize';
import { TypeConversionError } from './errors';

export type SerializationOptions = CanonicalizeOptions;

function isPlainObject(value: unknown): value is Record<string, unknown> {
  if (typeof value !== 'object' || value === null) return false;
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

function unbox(value: unknown): unknown {
  if (value instanceof Number || value instanceof String || value instanceof Boolean) {
    return value.valueOf();
  }
  return value;
}

/**
 * Encode a value into plain JSON data, using the canonicalizer for anything
 * JSON cannot express directly.
 *
 * `undefined` becomes `null` at the top level and inside arrays; object
 * properties holding `undefined` are dropped.
 *
 * @throws {TypeConversionError} for values with no known reduction, and for
 *   circular references.
 */
export function toJsonable(value: unknown, options: SerializationOptions = {}): JsonValue {
  return encode(value, options, new Set());
}

function encode(input: unknown, options: SerializationOptions, path: Set<object>): JsonValue {
  const value = unbox(input);

  if (value === undefined || value === null) return null;
  if (typeof value === 'string' || typeof value === 'boolean') return value;
  if (typeof value === 'number' && Number.isFinite(value)) return value;

  if (typeof value !== 'object' && typeof value !== 'function') {
    // NaN, Infinity, bigint, symbol
    return encode(jsonableHandler(value, options), options, path);
  }

  if (path.has(value)) {
    throw new TypeConversionError(describeType(value), describeValue(value), 'circular reference');
  }
  path.add(value);
  try {
    if (Array.isArray(value)) {
      return value.map(item => encode(item, options, path));
    }

    if (isPlainObject(value) && !isTimestamped(value) && !isCustomSerializable(value)) {
      const out: JsonObject = {};
      for (const [key, item] of Object.entries(value)) {
        if (item === undefined) continue;
        out[key] = encode(item, options, path);
      }
      return out;
    }

    return encode(jsonableHandler(value, options), options, path);
  } finally {
    path.delete(value);
  }
}

/**
 * Serialize a value to JSON text.
 */
export function stringify(value: unknown, options: SerializationOptions = {}): string {
  return JSON.stringify(toJsonable(value, options));
}

/**
 * Parse JSON text.
 */
export function parse(text: string): JsonValue {
  const value: JsonValue = JSON.parse(text);
  return value;
}

/**
 * Serialize a value and immediately parse it back.
 *
 * The result is plain JSON data. It is NOT guaranteed to equal the input:
 * whether a consumer treats both the same is exactly what
 * `assertRoundtripConsistent` checks. The return type is the approximate
 * `Jsonified<T>`; values it cannot describe (function properties, class
 * instances with no capability) throw `TypeConversionError` instead.
 */
export function roundtrip<T>(value: T, options?: SerializationOptions): Jsonified<T>;
export function roundtrip(value: unknown, options: SerializationOptions = {}): unknown {
  return parse(stringify(value, options));
}

/**
 * Serializer bound to a fixed set of options.
 */
export class JsonableSerializer {
  private readonly options: SerializationOptions;

  constructor(options: SerializationOptions = {}) {
    this.options = { ...options };
  }

  toJsonable(value: unknown): JsonValue {
    return toJsonable(value, this.options);
  }

  stringify(value: unknown): string {
    return stringify(value, this.options);
  }

  parse(text: string): JsonValue {
    return parse(text);
  }

  roundtrip<T>(value: T): Jsonified<T> {
    return roundtrip(value, this.options);
  }
}
