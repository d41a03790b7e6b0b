/**
 * Errors raised while building, encoding and decoding schemas
 */

/**
 * Format a wire path for messages. The root renders as `<root>`.
 */
export function formatPath(path: readonly string[]): string {
  return path.length > 0 ? path.join(".") : "<root>";
}

/**
 * Base class for every schema codec failure
 */
export class SchemaCodecError extends Error {
  constructor(
    message: string,
    /** Wire path of the value that failed */
    public readonly path: readonly string[] = []
  ) {
    super(message);
    this.name = "SchemaCodecError";
  }

  /** Wire key of the failing value, or undefined at the root */
  get key(): string | undefined {
    return this.path[this.path.length - 1];
  }
}

/**
 * A type field names something other than a known primitive
 */
export class MalformedTypeTagError extends SchemaCodecError {
  constructor(
    public readonly value: string,
    path: readonly string[] = [],
    public readonly inUnion: boolean = false
  ) {
    super(
      inUnion
        ? `Unknown type in union at ${formatPath(path)}: ${value}`
        : `Unknown type at ${formatPath(path)}: ${value}`,
      path
    );
    this.name = "MalformedTypeTagError";
  }
}

/**
 * A field is present but has the wrong JSON shape
 */
export class MalformedFieldShapeError extends SchemaCodecError {
  constructor(
    /** Description of the shape that was expected, e.g. "an array of strings" */
    public readonly expected: string,
    path: readonly string[] = []
  ) {
    super(`Malformed value at ${formatPath(path)}: expected ${expected}`, path);
    this.name = "MalformedFieldShapeError";
  }
}

/**
 * A union member is not a primitive type name (only reachable from untyped input)
 */
export class UnrepresentableUnionError extends SchemaCodecError {
  constructor(public readonly member: unknown, path: readonly string[] = []) {
    super(
      `Union member at ${formatPath(path)} is not a primitive type: ${JSON.stringify(member) ?? String(member)}`,
      path
    );
    this.name = "UnrepresentableUnionError";
  }
}

/**
 * Input nests deeper than the configured limit
 */
export class ExcessiveNestingError extends SchemaCodecError {
  constructor(public readonly maxDepth: number, path: readonly string[] = []) {
    super(
      `Schema nesting exceeds maximum depth of ${maxDepth} at ${formatPath(path)}`,
      path
    );
    this.name = "ExcessiveNestingError";
  }
}

/**
 * Schema text is not valid JSON
 */
export class SchemaParseError extends SchemaCodecError {
  constructor(message: string, public readonly cause?: unknown) {
    super(message);
    this.name = "SchemaParseError";
  }
}

/**
 * A builder was asked to construct a schema that breaks an invariant
 */
export class SchemaConstructionError extends SchemaCodecError {
  constructor(message: string, path: readonly string[] = []) {
    super(message, path);
    this.name = "SchemaConstructionError";
  }
}
