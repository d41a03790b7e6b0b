/**
 * Schema builders and structural equality
 */

import { SchemaType } from "../types/schema";
import type {
  InlineSchema,
  InlineSchemaFields,
  SchemaNode,
  SchemaRef,
  TypeTag,
} from "../types/schema";
import { SchemaConstructionError } from "./errors";
import { optional, typeTagEquals } from "./TypeTag";

type SchemaMap = Readonly<Record<string, SchemaNode>>;

/**
 * Options shared by the typed builders
 */
export interface SchemaOptions {
  description?: string;
  strict?: boolean;
  defs?: SchemaMap;
}

export interface ObjectSchemaOptions extends SchemaOptions {
  /** Defaults to every property name, in insertion order */
  required?: readonly string[];
  /** Defaults to `false` (strict Structured Outputs) */
  additionalProperties?: boolean;
}

export function isRefSchema(node: SchemaNode): node is SchemaRef {
  return node.kind === "ref";
}

export function isInlineSchema(node: SchemaNode): node is InlineSchema {
  return node.kind === "inline";
}

/**
 * Reference a reusable sub-schema by its wire pointer
 */
export function refSchema(ref: string): SchemaRef {
  const node: SchemaRef = { kind: "ref", ref };
  return Object.freeze(node);
}

/**
 * Reference an entry of the document's `$defs` table by name
 *
 * @example
 * ```ts
 * defsRef("Person"); // { kind: "ref", ref: "#/$defs/Person" }
 * ```
 */
export function defsRef(name: string): SchemaRef {
  return refSchema(`#/$defs/${name}`);
}

type Draft<T> = { -readonly [K in keyof T]: T[K] };

/**
 * Build an inline schema from its fields. Fields set to `undefined` are
 * dropped; the result, its maps and its arrays are frozen.
 */
export function inlineSchema(fields: InlineSchemaFields = {}): InlineSchema {
  const node: Draft<InlineSchema> = { kind: "inline" };
  if (fields.type !== undefined) node.type = fields.type;
  if (fields.description !== undefined) node.description = fields.description;
  if (fields.properties !== undefined) {
    node.properties = Object.freeze({ ...fields.properties });
  }
  if (fields.items !== undefined) node.items = fields.items;
  if (fields.required !== undefined) {
    node.required = Object.freeze([...fields.required]);
  }
  if (fields.additionalProperties !== undefined) {
    node.additionalProperties = fields.additionalProperties;
  }
  if (fields.enum !== undefined) node.enum = Object.freeze([...fields.enum]);
  if (fields.defs !== undefined) node.defs = Object.freeze({ ...fields.defs });
  if (fields.anyOf !== undefined) node.anyOf = Object.freeze([...fields.anyOf]);
  if (fields.strict !== undefined) node.strict = fields.strict;
  return Object.freeze(node);
}

function typed(type: TypeTag, options: SchemaOptions = {}): InlineSchema {
  return inlineSchema({ type, ...options });
}

export function stringSchema(options?: SchemaOptions): InlineSchema {
  return typed(SchemaType.STRING, options);
}

export function numberSchema(options?: SchemaOptions): InlineSchema {
  return typed(SchemaType.NUMBER, options);
}

export function integerSchema(options?: SchemaOptions): InlineSchema {
  return typed(SchemaType.INTEGER, options);
}

export function booleanSchema(options?: SchemaOptions): InlineSchema {
  return typed(SchemaType.BOOLEAN, options);
}

/**
 * A primitive that may also be `null`, e.g. `["integer", "null"]`
 */
export function nullableSchema(
  type: TypeTag,
  options?: SchemaOptions
): InlineSchema {
  return typed(optional(type), options);
}

/**
 * Build an object schema. Unless overridden, every property is required and
 * additional properties are disallowed, as Structured Outputs expects.
 *
 * @throws SchemaConstructionError when `required` names an unknown property
 */
export function objectSchema(
  properties: SchemaMap,
  options: ObjectSchemaOptions = {}
): InlineSchema {
  const names = Object.keys(properties);
  const required = options.required ?? names;
  const unknown = required.filter((name) => !Object.hasOwn(properties, name));
  if (unknown.length > 0) {
    throw new SchemaConstructionError(
      `Required fields not declared in properties: ${unknown.join(", ")}`,
      ["required"]
    );
  }

  return inlineSchema({
    type: SchemaType.OBJECT,
    description: options.description,
    properties,
    required,
    additionalProperties: options.additionalProperties ?? false,
    defs: options.defs,
    strict: options.strict,
  });
}

export function arraySchema(
  items: SchemaNode,
  options: SchemaOptions = {}
): InlineSchema {
  return inlineSchema({ type: SchemaType.ARRAY, items, ...options });
}

/**
 * Values restricted to the given strings. Pass `type` to pin the primitive
 * as well; without it the node is enum-only.
 */
export function enumSchema(
  values: readonly string[],
  options: SchemaOptions & { type?: TypeTag } = {}
): InlineSchema {
  return inlineSchema({ enum: values, ...options });
}

/**
 * A value matching any one of the alternatives
 */
export function anyOfSchema(
  alternatives: readonly SchemaNode[],
  options: SchemaOptions = {}
): InlineSchema {
  return inlineSchema({ anyOf: alternatives, ...options });
}

function optionalEquals<T>(
  a: T | undefined,
  b: T | undefined,
  equals: (x: T, y: T) => boolean
): boolean {
  if (a === undefined || b === undefined) {
    return a === b;
  }
  return equals(a, b);
}

function listEquals<T>(
  a: readonly T[],
  b: readonly T[],
  equals: (x: T, y: T) => boolean
): boolean {
  return a.length === b.length && a.every((item, i) => equals(item, b[i]));
}

function mapEquals(a: SchemaMap, b: SchemaMap): boolean {
  const keys = Object.keys(a);
  if (keys.length !== Object.keys(b).length) {
    return false;
  }
  return keys.every(
    (key) => Object.hasOwn(b, key) && schemaEquals(a[key], b[key])
  );
}

const same = <T>(x: T, y: T): boolean => x === y;

/**
 * Deep structural equality. Mappings compare by key set regardless of key
 * order; sequences compare element-wise in order.
 */
export function schemaEquals(a: SchemaNode, b: SchemaNode): boolean {
  if (a === b) {
    return true;
  }
  if (isRefSchema(a) || isRefSchema(b)) {
    return isRefSchema(a) && isRefSchema(b) && a.ref === b.ref;
  }

  return (
    optionalEquals(a.type, b.type, typeTagEquals) &&
    a.description === b.description &&
    optionalEquals(a.properties, b.properties, mapEquals) &&
    optionalEquals(a.items, b.items, schemaEquals) &&
    optionalEquals(a.required, b.required, (x, y) => listEquals(x, y, same)) &&
    a.additionalProperties === b.additionalProperties &&
    optionalEquals(a.enum, b.enum, (x, y) => listEquals(x, y, same)) &&
    optionalEquals(a.defs, b.defs, mapEquals) &&
    optionalEquals(a.anyOf, b.anyOf, (x, y) => listEquals(x, y, schemaEquals)) &&
    a.strict === b.strict
  );
}
