/**
 * Schema types - the subset of JSON Schema accepted by Structured Outputs
 */

/**
 * Primitive type markers a schema node can declare
 */
export enum SchemaType {
  STRING = "string",
  NUMBER = "number",
  INTEGER = "integer",
  BOOLEAN = "boolean",
  OBJECT = "object",
  ARRAY = "array",
  NULL = "null",
}

/**
 * A union of primitive types, encoded on the wire as an array of names.
 * Members are primitive by construction: unions never nest.
 */
export interface UnionType {
  readonly kind: "union";
  readonly members: readonly SchemaType[];
}

/**
 * Type tag of a schema node: a single primitive or a flat union
 */
export type TypeTag = SchemaType | UnionType;

/**
 * Reference to a reusable sub-schema, e.g. `#/$defs/Person`.
 * A reference is the node's entire wire representation.
 */
export interface SchemaRef {
  readonly kind: "ref";
  readonly ref: string;
}

/**
 * Inline schema description. Every field is optional and omitted from the
 * wire when absent.
 */
export interface InlineSchema {
  readonly kind: "inline";
  readonly type?: TypeTag;
  readonly description?: string;
  readonly properties?: Readonly<Record<string, SchemaNode>>;
  readonly items?: SchemaNode;
  /**
   * To use Structured Outputs every field must be listed here; optional
   * values are emulated with a union including `null`.
   */
  readonly required?: readonly string[];
  /** Set to `false` to opt into strict Structured Outputs */
  readonly additionalProperties?: boolean;
  readonly enum?: readonly string[];
  /** Reusable sub-schemas, addressed from `SchemaRef.ref` */
  readonly defs?: Readonly<Record<string, SchemaNode>>;
  readonly anyOf?: readonly SchemaNode[];
  readonly strict?: boolean;
}

/**
 * Recursive schema value
 */
export type SchemaNode = SchemaRef | InlineSchema;

/**
 * Fields accepted when building an inline schema
 */
export type InlineSchemaFields = Omit<InlineSchema, "kind">;

/**
 * Parsed JSON values produced by the encoder
 */
export type JsonPrimitive = string | number | boolean | null;
export type JsonValue = JsonPrimitive | JsonValue[] | JsonObject;
export interface JsonObject {
  [key: string]: JsonValue;
}

/**
 * Options for decoding schemas
 */
export interface SchemaCodecOptions {
  /** Maximum nesting depth below the root node (default: 64) */
  maxDepth?: number;
}

/**
 * A single finding from schema linting
 */
export interface SchemaIssue {
  /** Wire path of the offending node, e.g. `properties.address.required` */
  path: string;
  message: string;
}

/**
 * Result of linting a schema against Structured Outputs conventions
 */
export interface SchemaLintResult {
  valid: boolean;
  errors: SchemaIssue[];
  warnings: SchemaIssue[];
}
