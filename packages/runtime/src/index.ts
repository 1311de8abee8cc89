// Config
export { defineConfig, resolveConfig, configFromEnv } from './config';
export type { JsonableConfig, ResolvedJsonableConfig } from './config';

// Errors
export { SchemaValidationError, TypeConversionError, MissingSchemaError } from './errors';
export type { ValidationErrorDetail } from './errors';

// Logging
export { silentLogger, consoleLogger } from './logger';
export type { BoundaryLogger } from './logger';

// Canonicalization
export {
  jsonableHandler,
  classifyCapability,
  isTimestamped,
  isCustomSerializable,
  isIterable,
} from './canonicalize';
export type { Capability, CanonicalizeOptions } from './canonicalize';

// Serialization
export { toJsonable, stringify, parse, roundtrip, JsonableSerializer } from './serialization';
export type { SerializationOptions } from './serialization';

// Schema tagging
export { Schema, getSchema, hasSchema, JSONABLE_SCHEMA } from './schema';
export type { SchemaDecorator } from './schema';

// Schema dialect
export { toDraft04 } from './draft04';

// Validation
export { Validated, BoundaryValidator, formatInstancePath } from './validation';
export type { ValidatedDecorator, ValidatedOptions } from './validation';

// Shared types
export type {
  JsonValue,
  JsonObject,
  JsonArray,
  JsonPrimitive,
  JsonSchema,
  Jsonified,
  Timestamped,
  CustomSerializable,
  Consumer,
} from '@jsonable/types';
