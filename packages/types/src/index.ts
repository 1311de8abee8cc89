/**
 * @jsonable/types: Zero-runtime types for JSONable boundaries.
 *
 * @example
 * ```ts
 * import type { JsonSchema, JsonValue } from "@jsonable/types";
 *
 * const point: JsonSchema = {
 *   type: "object",
 *   properties: { x: { type: "number" }, y: { type: "number" } },
 *   required: ["x", "y"],
 * };
 * ```
 */
export type {
  JsonPrimitive,
  JsonObject,
  JsonArray,
  JsonValue,
  JsonSchemaType,
  JsonSchema,
} from "./json.js";
export type { Timestamped, CustomSerializable, Consumer } from "./capabilities.js";
export type { Jsonified } from "./jsonified.js";
