import { deepStrictEqual } from 'assert/strict';
import type { Jsonified } from '@jsonable/types';
import type { SerializationOptions } from './serialization';
import { roundtrip, stringify } from './serialization';

/**
 * Assert that a consumer respects the JSONable boundary:
 *
 * 1. `f(input)` equals `expectedOutput`;
 * 2. `f(roundtrip(input))` equals `expectedOutput`, i.e. the consumer cannot
 *    tell the value from its serialize-then-deserialize copy;
 * 3. a truthy `expectedOutput` serializes without error.
 *
 * Equality is deep and strict. Works under any test runner.
 *
 * @throws {AssertionError} when step 1 or 2 fails.
 * @throws {TypeConversionError} when step 3 fails.
 *
 * @example
 * ```ts
 * import { assertRoundtripConsistent } from '@jsonable/runtime/testing';
 *
 * it('doubles numbers', () => {
 *   assertRoundtripConsistent(double, 2, 4);
 * });
 * ```
 */
export function assertRoundtripConsistent<I, R>(
  f: (jsonable: I | Jsonified<I>) => R,
  input: I,
  expectedOutput: R,
  options: SerializationOptions = {},
): void {
  deepStrictEqual(f(input), expectedOutput, 'consumer output differs from the expected output');

  deepStrictEqual(
    f(roundtrip(input, options)),
    expectedOutput,
    'consumer output changes when its input is round-tripped through JSON',
  );

  if (expectedOutput) {
    stringify(expectedOutput, options);
  }
}
