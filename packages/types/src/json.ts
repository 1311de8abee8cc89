/**
 * JSON value and schema types shared by the jsonable packages.
 *
 * These types produce NO runtime code.
 */

// ═══════════════════════════════════════════════════════════════════════════════
// Values
// ═══════════════════════════════════════════════════════════════════════════════

export type JsonPrimitive = null | boolean | number | string;

export interface JsonObject {
  [key: string]: JsonValue;
}

export type JsonArray = JsonValue[];

/** Anything that survives `JSON.stringify` followed by `JSON.parse` unchanged. */
export type JsonValue = JsonPrimitive | JsonArray | JsonObject;

// ═══════════════════════════════════════════════════════════════════════════════
// Schemas (draft-04 structural subset)
// ═══════════════════════════════════════════════════════════════════════════════

export type JsonSchemaType =
  | 'null'
  | 'boolean'
  | 'number'
  | 'integer'
  | 'string'
  | 'array'
  | 'object';

/**
 * Structural JSON Schema, draft-04 keywords.
 *
 * Unknown keywords are allowed so that schemas built with TypeBox or loaded
 * from `.json` files can be passed as-is.
 */
export interface JsonSchema {
  $schema?: string;
  id?: string;
  title?: string;
  description?: string;
  type?: JsonSchemaType | JsonSchemaType[];
  enum?: JsonValue[];
  format?: string;
  // numbers
  minimum?: number;
  maximum?: number;
  // boolean in draft-04; the numeric form (later drafts, TypeBox) is lowered to draft-04 before compiling
  exclusiveMinimum?: boolean | number;
  exclusiveMaximum?: boolean | number;
  multipleOf?: number;
  // strings
  minLength?: number;
  maxLength?: number;
  pattern?: string;
  // arrays
  items?: JsonSchema | JsonSchema[];
  additionalItems?: boolean | JsonSchema;
  minItems?: number;
  maxItems?: number;
  uniqueItems?: boolean;
  // objects
  properties?: Record<string, JsonSchema>;
  required?: string[];
  additionalProperties?: boolean | JsonSchema;
  // combinators
  allOf?: JsonSchema[];
  anyOf?: JsonSchema[];
  oneOf?: JsonSchema[];
  not?: JsonSchema;
  [keyword: string]: unknown;
}
