/**
 * Schema lint - checks a schema description against Structured Outputs
 * conventions. Instance documents are never inspected.
 */

import type {
  SchemaIssue,
  SchemaLintResult,
  SchemaNode,
} from "../types/schema";
import { logger } from "../utils/logger";
import { formatPath } from "./errors";
import { isRefSchema } from "./Schema";

const DEFS_POINTER_PREFIX = "#/$defs/";

const unescapePointerSegment = (segment: string): string =>
  segment.replace(/~1/g, "/").replace(/~0/g, "~");

/**
 * Follow a `#/$defs/A/$defs/B` pointer through nested `$defs` tables.
 * Returns `undefined` for pointers of any other shape.
 */
function resolvesInDefs(root: SchemaNode, ref: string): boolean | undefined {
  if (!ref.startsWith(DEFS_POINTER_PREFIX)) {
    return undefined;
  }
  const segments = ref.slice(2).split("/").map(unescapePointerSegment);
  if (segments.length % 2 !== 0) {
    return undefined;
  }

  let node: SchemaNode | undefined = root;
  for (let i = 0; i < segments.length; i += 2) {
    if (segments[i] !== "$defs") {
      return undefined;
    }
    const defs: Readonly<Record<string, SchemaNode>> | undefined =
      node && !isRefSchema(node) ? node.defs : undefined;
    node =
      defs && Object.hasOwn(defs, segments[i + 1])
        ? defs[segments[i + 1]]
        : undefined;
  }
  return node !== undefined;
}

/**
 * Lint a schema tree.
 *
 * Errors: `required` names missing from `properties`, and `#/$defs/...`
 * references that do not resolve through the root's (nested) `$defs`.
 * Warnings: object nodes that do not set `additionalProperties: false`, and
 * properties left out of `required`.
 */
export function lintSchema(root: SchemaNode): SchemaLintResult {
  const errors: SchemaIssue[] = [];
  const warnings: SchemaIssue[] = [];

  const visit = (node: SchemaNode, path: string[]): void => {
    if (isRefSchema(node)) {
      if (resolvesInDefs(root, node.ref) === false) {
        errors.push({
          path: formatPath(path),
          message: `Reference ${node.ref} does not match any entry in $defs`,
        });
      }
      return;
    }

    if (node.properties) {
      const names = Object.keys(node.properties);
      const required = node.required ?? [];

      for (const name of required) {
        if (!names.includes(name)) {
          errors.push({
            path: formatPath([...path, "required"]),
            message: `Required field '${name}' is not defined in properties`,
          });
        }
      }
      for (const name of names) {
        if (!required.includes(name)) {
          warnings.push({
            path: formatPath([...path, "properties", name]),
            message: `Field '${name}' is not required; use a union with null to make it optional`,
          });
        }
      }
      if (node.additionalProperties !== false) {
        warnings.push({
          path: formatPath(path),
          message: "Object schema should set additionalProperties to false",
        });
      }

      for (const [name, child] of Object.entries(node.properties)) {
        visit(child, [...path, "properties", name]);
      }
    } else if (node.required && node.required.length > 0) {
      errors.push({
        path: formatPath([...path, "required"]),
        message: "Schema lists required fields but defines no properties",
      });
    }

    if (node.items) {
      visit(node.items, [...path, "items"]);
    }
    node.anyOf?.forEach((child, i) => visit(child, [...path, "anyOf", String(i)]));
    for (const [name, child] of Object.entries(node.defs ?? {})) {
      visit(child, [...path, "$defs", name]);
    }
  };

  visit(root, []);

  logger.debug(
    `[SchemaLint] ${errors.length} error(s), ${warnings.length} warning(s)`
  );

  return { valid: errors.length === 0, errors, warnings };
}
