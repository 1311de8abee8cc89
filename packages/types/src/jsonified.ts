import type { JsonPrimitive, JsonValue } from "./json.js";
import type { Timestamped } from "./capabilities.js";

type AnyFunction = (...args: never[]) => unknown;

/**
 * Approximate type of a value after a JSON round-trip through the jsonable
 * serializer, for values that serialize at all. Timestamps become strings,
 * `toJSON()` results replace their owner and iterables become arrays.
 *
 * Only an approximation: the serializer throws `TypeConversionError` for
 * function-valued properties and for class instances with no capability,
 * while this type drops function keys and maps instances to their fields.
 *
 * @example
 * ```ts
 * type A = Jsonified<Date>;                        // string
 * type B = Jsonified<Set<number>>;                 // number[]
 * type C = Jsonified<{ at: Date; tags?: string }>; // { at: string; tags?: string | null }
 * ```
 */
export type Jsonified<T> =
  unknown extends T ? JsonValue
  : T extends JsonPrimitive ? T
  : T extends undefined | void ? null
  : T extends Timestamped ? string
  : T extends { toJSON(): infer J } ? Jsonified<J>
  : T extends readonly (infer E)[] ? Jsonified<E>[]
  : T extends Iterable<infer E> ? Jsonified<E>[]
  : T extends AnyFunction ? never
  : T extends object ? { [K in keyof T as T[K] extends AnyFunction ? never : K]: Jsonified<T[K]> }
  : never;
