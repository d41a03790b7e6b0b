/**
 * TypeTag - primitive type markers and flat unions, with their wire codec
 */

import { SchemaType } from "../types/schema";
import type { TypeTag, UnionType } from "../types/schema";
import {
  MalformedFieldShapeError,
  MalformedTypeTagError,
  UnrepresentableUnionError,
} from "./errors";

const SCHEMA_TYPES: ReadonlySet<string> = new Set(Object.values(SchemaType));

/**
 * Check whether a value is one of the primitive type names
 */
export function isSchemaType(value: unknown): value is SchemaType {
  return typeof value === "string" && SCHEMA_TYPES.has(value);
}

/**
 * Check whether a type tag is a union
 */
export function isUnionType(tag: TypeTag): tag is UnionType {
  return typeof tag === "object" && tag !== null && tag.kind === "union";
}

function checkMembers(
  members: readonly unknown[],
  path: readonly string[]
): SchemaType[] {
  return members.map((member, index) => {
    if (!isSchemaType(member)) {
      throw new UnrepresentableUnionError(member, [...path, String(index)]);
    }
    return member;
  });
}

/**
 * Build a union of primitive types
 *
 * @example
 * ```ts
 * union(SchemaType.STRING, SchemaType.INTEGER); // ["string", "integer"]
 * ```
 */
export function union(...members: SchemaType[]): UnionType {
  return unionOf(members);
}

// No argument spread: long member lists exceed the engine's argument limit
function unionOf(members: readonly SchemaType[]): UnionType {
  const tag: UnionType = {
    kind: "union",
    members: Object.freeze(checkMembers(members, [])),
  };
  return Object.freeze(tag);
}

/**
 * The canonical "nullable" form of a type: `union([type, null])`.
 * Unions stay flat: `null` is appended to an existing union unless present.
 */
export function optional(type: TypeTag): UnionType {
  if (isUnionType(type)) {
    return type.members.includes(SchemaType.NULL)
      ? unionOf(type.members)
      : unionOf([...type.members, SchemaType.NULL]);
  }
  return unionOf([type, SchemaType.NULL]);
}

/**
 * Decode a wire value (a string or an array of strings) into a type tag
 */
export function decodeTypeTag(
  value: unknown,
  path: readonly string[] = []
): TypeTag {
  if (typeof value === "string") {
    if (!isSchemaType(value)) {
      throw new MalformedTypeTagError(value, path);
    }
    return value;
  }

  if (Array.isArray(value) && value.every((v) => typeof v === "string")) {
    const members = value.map((member: string) => {
      if (!isSchemaType(member)) {
        throw new MalformedTypeTagError(member, path, true);
      }
      return member;
    });
    return unionOf(members);
  }

  throw new MalformedFieldShapeError("a string or an array of strings", path);
}

/**
 * Encode a type tag to its wire value
 */
export function encodeTypeTag(
  tag: TypeTag,
  path: readonly string[] = []
): string | string[] {
  if (isUnionType(tag)) {
    return checkMembers(tag.members, path);
  }
  const raw: unknown = tag;
  if (typeof raw === "string" && !isSchemaType(raw)) {
    throw new MalformedTypeTagError(raw, path);
  }
  if (!isSchemaType(raw)) {
    throw new UnrepresentableUnionError(raw, path);
  }
  return raw;
}

/**
 * Structural equality: same primitive, or unions with the same members in order
 */
export function typeTagEquals(a: TypeTag, b: TypeTag): boolean {
  if (isUnionType(a) || isUnionType(b)) {
    if (!isUnionType(a) || !isUnionType(b)) {
      return false;
    }
    return (
      a.members.length === b.members.length &&
      a.members.every((member, i) => member === b.members[i])
    );
  }
  return a === b;
}
