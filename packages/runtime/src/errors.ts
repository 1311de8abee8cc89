import type { JsonSchema } from '@jsonable/types';

/**
 * Validation error details for a single location in the instance.
 */
export interface ValidationErrorDetail {
  /** The path to the invalid value (e.g., "input[0]" or "input.name"). */
  path: string;
  /** The expected type or constraint. */
  expected: string;
  /** The received type or value description. */
  received: string;
}

/**
 * Error thrown when a round-tripped argument does not match the schema bound
 * to its consumer. The consumer has not run when this is thrown.
 */
export class SchemaValidationError extends Error {
  public readonly errors: ValidationErrorDetail[];
  public readonly schema: JsonSchema;
  /** The round-tripped value that failed validation. */
  public readonly instance: unknown;

  constructor(schema: JsonSchema, instance: unknown, errors: ValidationErrorDetail[]) {
    const message = `Validation failed: ${errors.length} error(s)\n` +
      errors.map(e => `  - ${e.path}: expected ${e.expected}, received ${e.received}`).join('\n');
    super(message);
    this.name = 'SchemaValidationError';
    this.schema = schema;
    this.instance = instance;
    this.errors = errors;
  }
}

/**
 * Error thrown when a value has no known reduction to JSON-safe data.
 */
export class TypeConversionError extends TypeError {
  /** Constructor name, or `typeof` for primitives. */
  public readonly valueType: string;
  public readonly representation: string;

  constructor(valueType: string, representation: string, reason?: string) {
    super(
      `Object of type ${valueType} with value of ${representation} is not JSON serializable` +
        (reason ? ` (${reason})` : ''),
    );
    this.name = 'TypeConversionError';
    this.valueType = valueType;
    this.representation = representation;
  }
}

/**
 * Error thrown when `@Validated()` is applied to a target that carries no
 * schema. Apply `@Schema()` first (i.e. below `@Validated()`).
 */
export class MissingSchemaError extends Error {
  public readonly target: string;

  constructor(target: string) {
    super(`No schema bound to ${target}; apply @Schema() before @Validated()`);
    this.name = 'MissingSchemaError';
    this.target = target;
  }
}
