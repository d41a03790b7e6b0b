/**
 * Central type definitions export
 */

// Schema types
export type {
  UnionType,
  TypeTag,
  SchemaRef,
  InlineSchema,
  InlineSchemaFields,
  SchemaNode,
  JsonPrimitive,
  JsonValue,
  JsonObject,
  SchemaCodecOptions,
  SchemaIssue,
  SchemaLintResult,
} from "./schema";
export { SchemaType } from "./schema";

// Error envelope types
export type { ApiErrorDetail, ApiErrorResponse } from "./error";
