import 'reflect-metadata';
import type { Consumer, JsonSchema } from '@jsonable/types';

/**
 * Metadata key under which @Schema() stores the bound JSON Schema.
 * Functions are keyed by identity; methods by prototype and property key.
 */
export const JSONABLE_SCHEMA = 'JSONABLE_SCHEMA';

/**
 * Decorator returned by {@link Schema}. Works on plain functions and on
 * class methods.
 */
export interface SchemaDecorator {
  <F extends Consumer>(fn: F): F;
  (target: object, propertyKey: string | symbol, descriptor: PropertyDescriptor): void;
}

function isJsonSchema(value: unknown): value is JsonSchema {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Binds a JSON Schema to a consumer without changing how it is called.
 *
 * Re-tagging replaces the previous schema. Must be applied before
 * `Validated()`, which reads the binding when it decorates.
 *
 * @example
 * ```ts
 * import { Schema, Validated } from '@jsonable/runtime';
 *
 * const double = Validated(true)(
 *   Schema({ type: 'number' })((jsonable: number) => jsonable * 2),
 * );
 *
 * class Ledger {
 *   @Validated(true)
 *   @Schema({ type: 'array', items: { type: 'number' } })
 *   total(amounts: number[]): number {
 *     return amounts.reduce((sum, n) => sum + n, 0);
 *   }
 * }
 * ```
 */
export function Schema(schema: JsonSchema): SchemaDecorator {
  function decorate<F extends Consumer>(fn: F): F;
  function decorate(target: object, propertyKey: string | symbol, descriptor: PropertyDescriptor): void;
  function decorate(target: object, propertyKey?: string | symbol, _descriptor?: PropertyDescriptor): object | void {
    if (propertyKey === undefined) {
      Reflect.defineMetadata(JSONABLE_SCHEMA, schema, target);
      return target;
    }
    Reflect.defineMetadata(JSONABLE_SCHEMA, schema, target, propertyKey);
  }
  return decorate;
}

/**
 * Read the schema bound to a function, or to a method when `propertyKey`
 * is given.
 */
export function getSchema(target: object, propertyKey?: string | symbol): JsonSchema | undefined {
  const schema: unknown = propertyKey === undefined
    ? Reflect.getOwnMetadata(JSONABLE_SCHEMA, target)
    : Reflect.getOwnMetadata(JSONABLE_SCHEMA, target, propertyKey);
  return isJsonSchema(schema) ? schema : undefined;
}

export function hasSchema(target: object, propertyKey?: string | symbol): boolean {
  return getSchema(target, propertyKey) !== undefined;
}
