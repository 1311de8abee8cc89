import type { JsonSchema } from '@jsonable/types';

/** Keywords whose value is a schema or an array of schemas. */
const SUBSCHEMA_KEYWORDS = ['items', 'additionalItems', 'additionalProperties', 'not', 'allOf', 'anyOf', 'oneOf'];

/** Keywords whose value maps names to schemas. */
const SCHEMA_MAP_KEYWORDS = ['properties', 'patternProperties', 'definitions', 'dependencies'];

function isSchemaObject(value: unknown): value is JsonSchema {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Rewrite draft-06+ numeric `exclusiveMinimum` / `exclusiveMaximum` into the
 * draft-04 form (`minimum` plus a boolean flag), at every depth.
 *
 * TypeBox emits the numeric form, so `Type.Number({ exclusiveMinimum: 0 })`
 * becomes `{ type: 'number', minimum: 0, exclusiveMinimum: true }`. When an
 * inclusive bound is also present the stricter of the two is kept. Schemas
 * already in draft-04 form come back unchanged. The input is never mutated.
 */
export function toDraft04(schema: JsonSchema): JsonSchema {
  const normalized = rewriteSchema(schema);
  return isSchemaObject(normalized) ? normalized : schema;
}

function rewriteSchema(schema: Record<string, unknown>): Record<string, unknown> {
  const out: Record<string, unknown> = { ...schema };

  lowerExclusiveBound(out, 'minimum', 'exclusiveMinimum', (inclusive, exclusive) => inclusive > exclusive);
  lowerExclusiveBound(out, 'maximum', 'exclusiveMaximum', (inclusive, exclusive) => inclusive < exclusive);

  for (const keyword of SUBSCHEMA_KEYWORDS) {
    if (keyword in out) {
      out[keyword] = rewriteSubschema(out[keyword]);
    }
  }
  for (const keyword of SCHEMA_MAP_KEYWORDS) {
    const map = out[keyword];
    if (isSchemaObject(map)) {
      const rewritten: Record<string, unknown> = {};
      for (const [name, value] of Object.entries(map)) {
        // `dependencies` may also hold arrays of property names
        rewritten[name] = keyword === 'dependencies' && Array.isArray(value) ? value : rewriteSubschema(value);
      }
      out[keyword] = rewritten;
    }
  }
  return out;
}

function rewriteSubschema(value: unknown): unknown {
  if (Array.isArray(value)) {
    return value.map(rewriteSubschema);
  }
  return isSchemaObject(value) ? rewriteSchema(value) : value;
}

function lowerExclusiveBound(
  schema: Record<string, unknown>,
  inclusiveKey: 'minimum' | 'maximum',
  exclusiveKey: 'exclusiveMinimum' | 'exclusiveMaximum',
  inclusiveIsStricter: (inclusive: number, exclusive: number) => boolean,
): void {
  const exclusive = schema[exclusiveKey];
  if (typeof exclusive !== 'number') {
    return;
  }

  const inclusive = schema[inclusiveKey];
  if (typeof inclusive === 'number' && inclusiveIsStricter(inclusive, exclusive)) {
    delete schema[exclusiveKey];
    return;
  }
  schema[inclusiveKey] = exclusive;
  schema[exclusiveKey] = true;
}
