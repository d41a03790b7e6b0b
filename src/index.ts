/**
 * structured-schema - schema value model and codec for LLM Structured Outputs
 *
 * Describe the JSON shape a model must answer with, encode it to the JSON
 * Schema subset the API accepts, and decode schemas the API echoes back.
 */

// Core
export {
  decodeTypeTag,
  encodeTypeTag,
  isSchemaType,
  isUnionType,
  optional,
  typeTagEquals,
  union,
} from "./core/TypeTag";
export {
  anyOfSchema,
  arraySchema,
  booleanSchema,
  defsRef,
  enumSchema,
  inlineSchema,
  integerSchema,
  isInlineSchema,
  isRefSchema,
  nullableSchema,
  numberSchema,
  objectSchema,
  refSchema,
  schemaEquals,
  stringSchema,
} from "./core/Schema";
export type { ObjectSchemaOptions, SchemaOptions } from "./core/Schema";
export {
  DEFAULT_MAX_DEPTH,
  decodeSchema,
  encodeSchema,
  parseSchema,
  stringifySchema,
} from "./core/SchemaCodec";
export { lintSchema } from "./core/SchemaLint";
export { decodeErrorResponse, describeApiError } from "./core/ErrorResponse";
export {
  ExcessiveNestingError,
  MalformedFieldShapeError,
  MalformedTypeTagError,
  SchemaCodecError,
  SchemaConstructionError,
  SchemaParseError,
  UnrepresentableUnionError,
} from "./core/errors";

// Providers
export {
  ApiRequestError,
  DEFAULT_RETRY_CONFIG,
  OpenAIProvider,
  StructuredOutputError,
  decodeFunctionParameters,
  toFunctionTool,
  toResponseFormat,
} from "./providers/OpenAIProvider";
export type {
  FunctionTool,
  FunctionToolDefinition,
  GenerateStructuredInput,
  GenerateStructuredOutput,
  OpenAIProviderOptions,
} from "./providers/OpenAIProvider";

// Utils
export { LoggerLevel, logger, setLogLevel } from "./utils/logger";

// Types
export * from "./types";
