import { inspect } from 'util';
import type { CustomSerializable, Timestamped } from '@jsonable/types';
import { TypeConversionError } from './errors';

/**
 * Options for the canonicalizer.
 */
export interface CanonicalizeOptions {
  /**
   * Maximum number of elements to read from an iterable.
   * Unset means no limit, in which case an infinite iterable never finishes.
   */
  maxIterableLength?: number;
}

/**
 * What the canonicalizer knows about a value JSON cannot encode directly.
 */
export type Capability =
  | { kind: 'timestamped'; value: Timestamped }
  | { kind: 'custom'; value: CustomSerializable }
  | { kind: 'iterable'; value: Iterable<unknown> }
  | { kind: 'unsupported' };

function isObjectLike(value: unknown): value is object {
  return (typeof value === 'object' && value !== null) || typeof value === 'function';
}

export function isTimestamped(value: unknown): value is Timestamped {
  return isObjectLike(value) && 'toISOString' in value && typeof value.toISOString === 'function';
}

export function isCustomSerializable(value: unknown): value is CustomSerializable {
  return isObjectLike(value) && 'toJSON' in value && typeof value.toJSON === 'function';
}

export function isIterable(value: unknown): value is Iterable<unknown> {
  return isObjectLike(value) && Symbol.iterator in value && typeof value[Symbol.iterator] === 'function';
}

/**
 * Classify a value by the first capability it exposes, checked in order:
 * timestamped, custom-serializable, iterable.
 */
export function classifyCapability(value: unknown): Capability {
  if (isTimestamped(value)) {
    return { kind: 'timestamped', value };
  }
  if (isCustomSerializable(value)) {
    return { kind: 'custom', value };
  }
  if (isIterable(value)) {
    return { kind: 'iterable', value };
  }
  return { kind: 'unsupported' };
}

/**
 * Name of a value's type as shown in conversion errors.
 */
export function describeType(value: unknown): string {
  if (value === null) return 'null';
  if (typeof value === 'function') return 'function';
  if (typeof value !== 'object') return typeof value;

  const ctor: unknown = Object.getPrototypeOf(value)?.constructor;
  if (typeof ctor === 'function' && ctor.name) {
    return ctor.name;
  }
  return 'Object';
}

export function describeValue(value: unknown): string {
  const text = inspect(value, { depth: 1, breakLength: Infinity });
  return text.length > 120 ? `${text.slice(0, 117)}...` : text;
}

/**
 * Convert ONE value that JSON cannot encode directly into something it can.
 *
 * The result is not necessarily JSON-safe yet (an iterable's elements, or a
 * `toJSON()` result, may need converting too); the encoder re-encodes it.
 *
 * @throws {TypeConversionError} when the value has no known reduction.
 */
export function jsonableHandler(value: unknown, options: CanonicalizeOptions = {}): unknown {
  const capability = classifyCapability(value);

  switch (capability.kind) {
    case 'timestamped':
      try {
        return capability.value.toISOString();
      } catch {
        // Date#toISOString() throws RangeError for an invalid date
        throw new TypeConversionError(describeType(value), describeValue(value), 'invalid time value');
      }
    case 'custom':
      return capability.value.toJSON();
    case 'iterable':
      return materialize(capability.value, options.maxIterableLength);
    case 'unsupported':
      throw new TypeConversionError(describeType(value), describeValue(value));
  }
}

function materialize(iterable: Iterable<unknown>, limit: number | undefined): unknown[] {
  const items: unknown[] = [];
  for (const item of iterable) {
    if (limit !== undefined && items.length >= limit) {
      throw new TypeConversionError(
        describeType(iterable),
        describeValue(iterable),
        `iterable exceeds maxIterableLength of ${limit}`,
      );
    }
    items.push(item);
  }
  return items;
}
