/**
 * SchemaCodec - wire encoding and decoding of schema nodes
 *
 * A `$ref` node is its whole wire representation: encoding emits only the
 * reference, and decoding a `$ref` string ignores every sibling key.
 */

import type {
  InlineSchema,
  JsonObject,
  SchemaCodecOptions,
  SchemaNode,
  TypeTag,
} from "../types/schema";
import { logger } from "../utils/logger";
import {
  ExcessiveNestingError,
  formatPath,
  MalformedFieldShapeError,
  SchemaParseError,
} from "./errors";
import { inlineSchema, isRefSchema, refSchema } from "./Schema";
import { decodeTypeTag, encodeTypeTag } from "./TypeTag";

/**
 * Default limit on nesting below the root node
 */
export const DEFAULT_MAX_DEPTH = 64;

const REF_KEY = "$ref";
const DEFS_KEY = "$defs";

type Path = readonly string[];

function isJsonObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function encodeMap(
  map: Readonly<Record<string, SchemaNode>>,
  path: Path
): JsonObject {
  const result: JsonObject = {};
  for (const [name, child] of Object.entries(map)) {
    // defineProperty keeps a "__proto__" property name as an own key
    Object.defineProperty(result, name, {
      value: encodeNode(child, [...path, name]),
      enumerable: true,
      writable: true,
      configurable: true,
    });
  }
  return result;
}

function encodeNode(node: SchemaNode, path: Path): JsonObject {
  if (isRefSchema(node)) {
    return { [REF_KEY]: node.ref };
  }

  const wire: JsonObject = {};
  if (node.type !== undefined) {
    wire.type = encodeTypeTag(node.type, [...path, "type"]);
  }
  if (node.description !== undefined) {
    wire.description = node.description;
  }
  if (node.properties !== undefined) {
    wire.properties = encodeMap(node.properties, [...path, "properties"]);
  }
  if (node.items !== undefined) {
    wire.items = encodeNode(node.items, [...path, "items"]);
  }
  if (node.required !== undefined) {
    wire.required = [...node.required];
  }
  if (node.additionalProperties !== undefined) {
    wire.additionalProperties = node.additionalProperties;
  }
  if (node.enum !== undefined) {
    wire.enum = [...node.enum];
  }
  if (node.defs !== undefined) {
    wire[DEFS_KEY] = encodeMap(node.defs, [...path, DEFS_KEY]);
  }
  if (node.anyOf !== undefined) {
    wire.anyOf = node.anyOf.map((child, i) =>
      encodeNode(child, [...path, "anyOf", String(i)])
    );
  }
  if (node.strict !== undefined) {
    wire.strict = node.strict;
  }
  return wire;
}

/**
 * Encode a schema to its JSON wire object. Absent fields are omitted.
 *
 * @throws UnrepresentableUnionError when a type tag is not flat (untyped input only)
 */
export function encodeSchema(node: SchemaNode): JsonObject {
  return encodeNode(node, []);
}

/**
 * Encode a schema to JSON text
 */
export function stringifySchema(node: SchemaNode, space?: number): string {
  return JSON.stringify(encodeSchema(node), null, space);
}

class SchemaDecoder {
  constructor(private readonly maxDepth: number) {}

  decode(value: unknown, path: Path, depth: number): SchemaNode {
    if (depth > this.maxDepth) {
      throw new ExcessiveNestingError(this.maxDepth, path);
    }
    if (!isJsonObject(value)) {
      throw new MalformedFieldShapeError("an object", path);
    }

    const ref = value[REF_KEY];
    if (typeof ref === "string") {
      const ignored = Object.keys(value).filter((key) => key !== REF_KEY);
      if (ignored.length > 0) {
        logger.debug(
          `[SchemaCodec] Ignoring keys beside $ref at ${formatPath(path)}: ${ignored.join(", ")}`
        );
      }
      return refSchema(ref);
    }

    return this.decodeInline(value, path, depth);
  }

  private decodeInline(
    value: Record<string, unknown>,
    path: Path,
    depth: number
  ): InlineSchema {
    const at = (key: string): string[] => [...path, key];
    const child = (raw: unknown, childPath: Path): SchemaNode =>
      this.decode(raw, childPath, depth + 1);

    const type = this.present(value, "type", (raw): TypeTag =>
      decodeTypeTag(raw, at("type"))
    );
    const description = this.present(value, "description", (raw) =>
      this.string(raw, at("description"))
    );
    const properties = this.present(value, "properties", (raw) =>
      this.map(raw, at("properties"), child)
    );
    const items = this.present(value, "items", (raw) =>
      child(raw, at("items"))
    );
    const required = this.present(value, "required", (raw) =>
      this.strings(raw, at("required"))
    );
    const additionalProperties = this.present(
      value,
      "additionalProperties",
      (raw) => this.boolean(raw, at("additionalProperties"))
    );
    const enumValues = this.present(value, "enum", (raw) =>
      this.strings(raw, at("enum"))
    );
    const defs = this.present(value, DEFS_KEY, (raw) =>
      this.map(raw, at(DEFS_KEY), child)
    );
    const anyOf = this.present(value, "anyOf", (raw) => {
      if (!Array.isArray(raw)) {
        throw new MalformedFieldShapeError("an array of schemas", at("anyOf"));
      }
      return raw.map((entry: unknown, i) =>
        child(entry, [...at("anyOf"), String(i)])
      );
    });
    const strict = this.present(value, "strict", (raw) =>
      this.boolean(raw, at("strict"))
    );

    return inlineSchema({
      type,
      description,
      properties,
      items,
      required,
      additionalProperties,
      enum: enumValues,
      defs,
      anyOf,
      strict,
    });
  }

  /** Missing keys and explicit nulls both decode as absent */
  private present<T>(
    value: Record<string, unknown>,
    key: string,
    decode: (raw: unknown) => T
  ): T | undefined {
    if (!Object.hasOwn(value, key)) {
      return undefined;
    }
    const raw = value[key];
    return raw === null || raw === undefined ? undefined : decode(raw);
  }

  private string(raw: unknown, path: Path): string {
    if (typeof raw !== "string") {
      throw new MalformedFieldShapeError("a string", path);
    }
    return raw;
  }

  private boolean(raw: unknown, path: Path): boolean {
    if (typeof raw !== "boolean") {
      throw new MalformedFieldShapeError("a boolean", path);
    }
    return raw;
  }

  private strings(raw: unknown, path: Path): string[] {
    if (!Array.isArray(raw) || !raw.every((v) => typeof v === "string")) {
      throw new MalformedFieldShapeError("an array of strings", path);
    }
    return raw.map((v: string) => v);
  }

  private map(
    raw: unknown,
    path: Path,
    child: (raw: unknown, path: Path) => SchemaNode
  ): Record<string, SchemaNode> {
    if (!isJsonObject(raw)) {
      throw new MalformedFieldShapeError(
        "an object mapping names to schemas",
        path
      );
    }
    return Object.fromEntries(
      Object.entries(raw).map(
        ([name, entry]) => [name, child(entry, [...path, name])] as const
      )
    );
  }
}

/**
 * Decode a parsed JSON value into a schema
 *
 * @throws MalformedTypeTagError for unknown type names
 * @throws MalformedFieldShapeError for keys holding the wrong JSON shape
 * @throws ExcessiveNestingError when nesting exceeds `options.maxDepth`
 * @throws RangeError when `options.maxDepth` is not a non-negative integer
 */
export function decodeSchema(
  value: unknown,
  options: SchemaCodecOptions = {}
): SchemaNode {
  const maxDepth = options.maxDepth ?? DEFAULT_MAX_DEPTH;
  if (!Number.isInteger(maxDepth) || maxDepth < 0) {
    throw new RangeError(
      `maxDepth must be a non-negative integer, got ${maxDepth}`
    );
  }
  const decoder = new SchemaDecoder(maxDepth);
  return decoder.decode(value, [], 0);
}

/**
 * Decode a schema from JSON text
 *
 * @throws SchemaParseError when the text is not valid JSON
 */
export function parseSchema(
  text: string,
  options?: SchemaCodecOptions
): SchemaNode {
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (error) {
    throw new SchemaParseError(
      `Failed to parse schema JSON: ${error instanceof Error ? error.message : String(error)}`,
      error
    );
  }
  return decodeSchema(parsed, options);
}
