import Ajv from 'ajv-draft-04';
import addFormats from 'ajv-formats';
import type { ErrorObject, ValidateFunction } from 'ajv';
import type { JsonSchema, JsonValue } from '@jsonable/types';
import type { JsonableConfig, ResolvedJsonableConfig } from './config';
import { resolveConfig } from './config';
import { toDraft04 } from './draft04';
import { MissingSchemaError, SchemaValidationError, ValidationErrorDetail } from './errors';
import { JSONABLE_SCHEMA, getSchema } from './schema';
import { JsonableSerializer } from './serialization';

type Guardable<T, A, R> = (this: T, jsonable: A) => R;

function isCallable(value: unknown): value is Guardable<unknown, unknown, unknown> {
  return typeof value === 'function';
}

/**
 * Decorator returned by {@link Validated}. Works on plain functions and on
 * class methods.
 */
export interface ValidatedDecorator {
  <A, R>(fn: (jsonable: A) => R): (jsonable: A) => R;
  (target: object, propertyKey: string | symbol, descriptor: PropertyDescriptor): PropertyDescriptor;
}

/**
 * Validates values crossing a boundary against JSON Schemas.
 *
 * Owns one schema validator (draft-04 dialect) and one serializer, both
 * configured once from the config given to the constructor. Compiled
 * schemas are cached per schema object.
 *
 * Usage:
 * ```ts
 * import { BoundaryValidator, configFromEnv } from '@jsonable/runtime';
 *
 * const boundaries = new BoundaryValidator(configFromEnv());
 * const validated = boundaries.decorator();
 *
 * export const double = validated(Schema({ type: 'number' })((n: number) => n * 2));
 * ```
 */
export class BoundaryValidator {
  readonly config: ResolvedJsonableConfig;
  private readonly serializer: JsonableSerializer;
  private readonly compiled = new WeakMap<JsonSchema, ValidateFunction>();
  private ajvInstance: Ajv | undefined;

  constructor(config: JsonableConfig = {}) {
    this.config = resolveConfig(config);
    this.serializer = new JsonableSerializer({
      maxIterableLength: this.config.maxIterableLength,
    });
  }

  get enabled(): boolean {
    return this.config.validation;
  }

  /**
   * Created on first use so that disabled validators never build one.
   */
  private get ajv(): Ajv {
    if (!this.ajvInstance) {
      const { allErrors, formats } = this.config.ajv;
      const ajv = new Ajv({ allErrors, verbose: true, validateFormats: formats });
      if (formats) {
        addFormats(ajv);
      }
      this.ajvInstance = ajv;
    }
    return this.ajvInstance;
  }

  /**
   * Compile a schema, reusing the result for the same schema object.
   * Numeric exclusive bounds (draft-06+, TypeBox) are lowered to draft-04
   * first. Throws if the schema itself is invalid.
   */
  compile(schema: JsonSchema): ValidateFunction {
    let validate = this.compiled.get(schema);
    if (!validate) {
      validate = this.ajv.compile(toDraft04(schema));
      this.compiled.set(schema, validate);
    }
    return validate;
  }

  /**
   * Validate plain JSON data against a schema.
   *
   * @throws {SchemaValidationError} when the instance does not conform.
   */
  validate(schema: JsonSchema, instance: JsonValue, consumer?: string): void {
    const validate = this.compile(schema);
    if (validate(instance)) {
      return;
    }

    const errors = (validate.errors ?? []).map(toErrorDetail);
    this.config.logger.warn('Boundary validation rejected', { consumer, errors });
    throw new SchemaValidationError(schema, instance, errors);
  }

  /**
   * Round-trip a value through JSON and validate the copy.
   * Returns the round-tripped copy.
   *
   * @throws {TypeConversionError} when the value cannot be serialized.
   * @throws {SchemaValidationError} when the copy does not conform.
   */
  check(schema: JsonSchema, value: unknown, consumer?: string): JsonValue {
    const copy = this.serializer.roundtrip(value);
    this.validate(schema, copy, consumer);
    return copy;
  }

  /**
   * Wrap a consumer so that every call is checked against `schema` first.
   *
   * When validation is disabled the consumer is returned as-is. The wrapper
   * always calls the consumer with the ORIGINAL argument, never the
   * round-tripped copy, so a one-shot iterator arrives exhausted.
   */
  guard<T, A, R>(
    fn: Guardable<T, A, R>,
    schema: JsonSchema | undefined,
    name: string,
  ): Guardable<T, A, R> {
    if (!schema) {
      throw new MissingSchemaError(name);
    }

    if (!this.config.validation) {
      this.config.logger.debug('Consumer left unwrapped, validation disabled', { consumer: name });
      return fn;
    }

    this.compile(schema);
    const validator = this;
    const wrapper = function (this: T, jsonable: A): R {
      validator.check(schema, jsonable, name);
      return fn.call(this, jsonable);
    };
    Object.defineProperty(wrapper, 'name', { value: fn.name, configurable: true });
    Reflect.defineMetadata(JSONABLE_SCHEMA, schema, wrapper);

    this.config.logger.debug('Consumer decorated', { consumer: name });
    return wrapper;
  }

  /**
   * A decorator bound to this validator, for functions and methods.
   */
  decorator(): ValidatedDecorator {
    const validator = this;

    function decorate<A, R>(fn: (jsonable: A) => R): (jsonable: A) => R;
    function decorate(target: object, propertyKey: string | symbol, descriptor: PropertyDescriptor): PropertyDescriptor;
    function decorate(target: object, propertyKey?: string | symbol, descriptor?: PropertyDescriptor): unknown {
      if (propertyKey === undefined || descriptor === undefined) {
        if (!isCallable(target)) {
          throw new TypeError('Validated() can only decorate functions and methods');
        }
        return validator.guard(target, getSchema(target), target.name || 'anonymous consumer');
      }

      const original: unknown = descriptor.value;
      if (!isCallable(original)) {
        throw new TypeError(`Validated() can only decorate methods, ${String(propertyKey)} is not one`);
      }
      const owner = typeof target === 'function' ? target.name : target.constructor.name;
      return {
        ...descriptor,
        value: validator.guard(original, getSchema(target, propertyKey), `${owner}.${String(propertyKey)}`),
      };
    }

    return decorate;
  }
}

/**
 * Options accepted by {@link Validated}: the enable flag alone, a full
 * config, or a validator to share between consumers.
 */
export type ValidatedOptions = boolean | JsonableConfig | BoundaryValidator;

/**
 * Decorator that round-trips the argument of a schema-tagged consumer and
 * validates it before every call.
 *
 * The enable flag is read once, here. Apply `Schema()` first:
 *
 * ```ts
 * class Prices {
 *   @Validated(true)                  // applied second
 *   @Schema({ type: 'number' })       // applied first
 *   double(price: number) { return price * 2; }
 * }
 * ```
 *
 * Validation reads the argument before the consumer does. A one-shot
 * iterator (a generator object, `map.values()`) is therefore already
 * exhausted when the consumer receives it; pass an array or a re-iterable
 * object instead.
 *
 * @throws {MissingSchemaError} at decoration time when no schema is bound.
 */
export function Validated(options: ValidatedOptions = {}): ValidatedDecorator {
  if (options instanceof BoundaryValidator) {
    return options.decorator();
  }
  const config = typeof options === 'boolean' ? { validation: options } : options;
  return new BoundaryValidator(config).decorator();
}

// ═══════════════════════════════════════════════════════════════════════════════
// Error details
// ═══════════════════════════════════════════════════════════════════════════════

const IDENTIFIER = /^[A-Za-z_$][\w$]*$/;

/**
 * Convert a JSON Pointer ("/items/0/name") into "input.items[0].name".
 */
export function formatInstancePath(pointer: string, extra?: string): string {
  const segments = pointer === '' ? [] : pointer.slice(1).split('/');
  if (extra !== undefined) {
    segments.push(extra);
  }

  let path = 'input';
  for (const raw of segments) {
    const segment = raw.replace(/~1/g, '/').replace(/~0/g, '~');
    if (/^\d+$/.test(segment)) {
      path += `[${segment}]`;
    } else if (IDENTIFIER.test(segment)) {
      path += `.${segment}`;
    } else {
      path += `[${JSON.stringify(segment)}]`;
    }
  }
  return path;
}

/**
 * JSON type name of a parsed value: "null", "array", "object", ...
 */
export function jsonTypeOf(value: unknown): string {
  if (value === null) return 'null';
  if (Array.isArray(value)) return 'array';
  if (typeof value === 'number' && Number.isInteger(value)) return 'integer';
  return typeof value;
}

function describeData(value: unknown): string {
  if (value === undefined) return 'undefined';
  const text = JSON.stringify(value);
  return text.length > 60 ? `${text.slice(0, 57)}...` : text;
}

function paramText(value: unknown): string | undefined {
  if (typeof value === 'string') return value;
  if (Array.isArray(value)) return value.join(' | ');
  return undefined;
}

function toErrorDetail(error: ErrorObject): ValidationErrorDetail {
  switch (error.keyword) {
    case 'type': {
      const expected = paramText(error.params.type) ?? 'valid type';
      const received = jsonTypeOf(error.data);
      return {
        path: formatInstancePath(error.instancePath),
        expected: expected.split(',').join(' | '),
        // "integer" only matters when the schema asked for one
        received: received === 'integer' && !expected.includes('integer') ? 'number' : received,
      };
    }
    case 'required':
      return {
        path: formatInstancePath(error.instancePath, paramText(error.params.missingProperty)),
        expected: 'required property',
        received: 'undefined',
      };
    case 'additionalProperties':
      return {
        path: formatInstancePath(error.instancePath, paramText(error.params.additionalProperty)),
        expected: 'no additional properties',
        received: 'additional property',
      };
    default:
      return {
        path: formatInstancePath(error.instancePath),
        expected: error.message ?? error.keyword,
        received: describeData(error.data),
      };
  }
}
