/**
 * OpenAI Structured Outputs provider with retry and backup models
 */

import OpenAI from "openai";
import type { ClientOptions } from "openai";
import type {
  ChatCompletionCreateParamsNonStreaming,
  ChatCompletionMessageParam,
} from "openai/resources/chat/completions";
import type {
  FunctionDefinition,
  ResponseFormatJSONSchema,
} from "openai/resources/shared";

import { MalformedFieldShapeError } from "../core/errors";
import { decodeErrorResponse, describeApiError } from "../core/ErrorResponse";
import { isInlineSchema } from "../core/Schema";
import { decodeSchema, encodeSchema } from "../core/SchemaCodec";
import type { ApiErrorResponse } from "../types/error";
import type { SchemaCodecOptions, SchemaNode } from "../types/schema";
import { logger, parseJSONResponse, withTimeoutAndRetry } from "../utils";

export const DEFAULT_RETRY_CONFIG = {
  timeout: 60000,
  retries: 3,
};

/**
 * Configuration options for OpenAI provider
 */
export interface OpenAIProviderOptions {
  /** OpenAI API key */
  apiKey: string;
  /** Organization ID (optional) */
  organization?: string;
  /** Model to use (required) - e.g., "gpt-4o-2024-08-06" */
  model: string;
  /** Backup models to try if primary fails (default: []) */
  backupModels?: string[];
  /** Override the API base URL */
  baseURL?: string;
  /** Custom fetch implementation handed to the SDK */
  fetch?: ClientOptions["fetch"];
  /** Default parameters merged into every request */
  config?: Partial<
    Omit<
      ChatCompletionCreateParamsNonStreaming,
      "model" | "messages" | "response_format" | "stream"
    >
  >;
  /** Retry configuration */
  retryConfig?: {
    timeout?: number;
    retries?: number;
  };
}

/**
 * A function tool whose parameters are described by a schema
 */
export interface FunctionToolDefinition {
  name: string;
  description?: string;
  parameters: SchemaNode;
  strict?: boolean;
}

/**
 * Chat-completions tool entry on the wire
 */
export interface FunctionTool {
  type: "function";
  function: FunctionDefinition;
}

export interface GenerateStructuredInput {
  /** User prompt */
  prompt: string;
  /** Optional system instructions */
  system?: string;
  /** Schema the response must match */
  schema: SchemaNode;
  /** Schema name sent with the response format (default: "structured_output") */
  schemaName?: string;
  /** Maximum output tokens to generate */
  maxOutputTokens?: number;
}

export interface GenerateStructuredOutput {
  /** Parsed JSON response */
  data: unknown;
  /** Raw message content */
  raw: string;
  metadata: {
    model: string;
    finishReason?: string;
    tokensUsed?: number;
    promptTokens?: number;
    completionTokens?: number;
  };
}

/**
 * Request rejected by the API; carries the decoded error envelope
 */
export class ApiRequestError extends Error {
  constructor(
    message: string,
    public readonly status: number,
    public readonly response: ApiErrorResponse,
    public readonly cause?: unknown
  ) {
    super(message);
    this.name = "ApiRequestError";
  }
}

/**
 * The model answered without usable structured content
 */
export class StructuredOutputError extends Error {
  constructor(
    message: string,
    public readonly details?: { refusal?: string; raw?: string }
  ) {
    super(message);
    this.name = "StructuredOutputError";
  }
}

/**
 * Safely extract error message
 */
function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Convert SDK errors carrying an error envelope into ApiRequestError
 */
function toApiRequestError(error: unknown): unknown {
  if (!(error instanceof OpenAI.APIError) || error.status === undefined) {
    return error;
  }

  let envelope: ApiErrorResponse = { error: { message: error.message } };
  if (isRecord(error.error)) {
    try {
      envelope = decodeErrorResponse({ error: error.error });
    } catch (decodeError: unknown) {
      if (!(decodeError instanceof MalformedFieldShapeError)) {
        throw decodeError;
      }
      logger.warn(
        `[OPENAI] Unexpected error envelope shape: ${decodeError.message}`
      );
    }
  }
  return new ApiRequestError(
    describeApiError(envelope),
    error.status,
    envelope,
    error
  );
}

/**
 * Client errors are final; timeouts, rate limits and server errors are retried
 */
const isRetryable = (error: unknown): boolean => {
  if (error instanceof StructuredOutputError) {
    return false;
  }
  if (error instanceof ApiRequestError) {
    return (
      error.status === 408 || error.status === 429 || error.status >= 500
    );
  }
  return true;
};

/**
 * Determines if an error should trigger backup model usage
 */
const shouldUseBackupModel = (error: unknown): boolean => {
  if (error instanceof ApiRequestError) {
    if (error.status === 429 || error.status === 500 || error.status === 503) {
      return true;
    }
    const code = error.response.error.code;
    if (code === "model_not_found" || code === "model_overloaded") {
      return true;
    }
  }

  const message = getErrorMessage(error);
  return (
    message.includes("overloaded") ||
    message.includes("unavailable") ||
    message.toLowerCase().includes("internal error")
  );
};

/**
 * Build the chat-completions `response_format` for a schema. `strict` follows
 * the root node and defaults to true.
 */
export function toResponseFormat(
  schema: SchemaNode,
  name: string = "structured_output"
): ResponseFormatJSONSchema {
  const strict =
    isInlineSchema(schema) && schema.strict !== undefined
      ? schema.strict
      : true;
  return {
    type: "json_schema",
    json_schema: {
      name,
      ...(isInlineSchema(schema) &&
        schema.description !== undefined && {
          description: schema.description,
        }),
      schema: encodeSchema(schema),
      strict,
    },
  };
}

/**
 * Describe a function tool with schema-typed parameters
 */
export function toFunctionTool(definition: FunctionToolDefinition): FunctionTool {
  return {
    type: "function",
    function: {
      name: definition.name,
      description: definition.description,
      parameters: encodeSchema(definition.parameters),
      strict: definition.strict ?? true,
    },
  };
}

/**
 * Decode the parameters schema of a function tool, if it has one
 */
export function decodeFunctionParameters(
  tool: FunctionTool,
  options?: SchemaCodecOptions
): SchemaNode | undefined {
  const parameters = tool.function.parameters;
  return parameters === undefined ? undefined : decodeSchema(parameters, options);
}

/**
 * OpenAI provider implementation with backup models and retry logic
 */
export class OpenAIProvider {
  public readonly name = "openai";
  private client: OpenAI;
  private primaryModel: string;
  private backupModels: string[];
  private config?: OpenAIProviderOptions["config"];
  private retryConfig: { timeout: number; retries: number };

  constructor(options: OpenAIProviderOptions) {
    const {
      apiKey,
      organization,
      model,
      backupModels = [],
      baseURL,
      fetch,
      config,
      retryConfig,
    } = options;

    if (!apiKey) {
      throw new Error("OpenAI API key is required");
    }

    if (!model) {
      throw new Error("Model is required. Example: 'gpt-4o-2024-08-06'");
    }

    // Retries are handled by withTimeoutAndRetry
    this.client = new OpenAI({
      apiKey,
      organization,
      baseURL,
      fetch,
      maxRetries: 0,
    });
    this.primaryModel = model;
    this.backupModels = backupModels;
    this.config = config;
    this.retryConfig = {
      timeout: retryConfig?.timeout ?? DEFAULT_RETRY_CONFIG.timeout,
      retries: retryConfig?.retries ?? DEFAULT_RETRY_CONFIG.retries,
    };
  }

  /**
   * Generate a response constrained to `input.schema`
   */
  async generateStructured(
    input: GenerateStructuredInput
  ): Promise<GenerateStructuredOutput> {
    try {
      return await this.generateWithModel(this.primaryModel, input);
    } catch (primaryError: unknown) {
      const primaryErrMsg = getErrorMessage(primaryError);
      logger.warn(
        `[OPENAI] Primary model ${this.primaryModel} failed: ${primaryErrMsg}`
      );

      if (!shouldUseBackupModel(primaryError) || this.backupModels.length === 0) {
        throw primaryError;
      }

      logger.debug(`[OPENAI] Trying backup models`);

      let lastBackupError: unknown = primaryError;

      for (let i = 0; i < this.backupModels.length; i++) {
        const backupModel = this.backupModels[i];
        logger.debug(
          `[OPENAI] Trying backup model ${i + 1}/${this.backupModels.length}: ${backupModel}`
        );

        try {
          const result = await this.generateWithModel(backupModel, input);
          logger.debug(`[OPENAI] Backup model ${backupModel} succeeded`);
          return result;
        } catch (backupError: unknown) {
          logger.warn(
            `[OPENAI] Backup model ${backupModel} failed: ${getErrorMessage(backupError)}`
          );
          lastBackupError = backupError;

          if (!shouldUseBackupModel(backupError)) {
            logger.debug(
              `[OPENAI] Backup model error doesn't qualify for further attempts`
            );
            break;
          }
        }
      }

      logger.error(
        `[OPENAI] All models failed. Primary: ${primaryErrMsg}, Last backup: ${getErrorMessage(lastBackupError)}`
      );
      throw lastBackupError;
    }
  }

  private buildParams(
    model: string,
    input: GenerateStructuredInput
  ): ChatCompletionCreateParamsNonStreaming {
    const messages: ChatCompletionMessageParam[] = [];
    if (input.system) {
      messages.push({ role: "system", content: input.system });
    }
    messages.push({ role: "user", content: input.prompt });

    const params: ChatCompletionCreateParamsNonStreaming = {
      ...this.config,
      model,
      messages,
      response_format: toResponseFormat(input.schema, input.schemaName),
    };

    if (input.maxOutputTokens !== undefined) {
      params.max_completion_tokens = input.maxOutputTokens;
    }
    return params;
  }

  private async generateWithModel(
    model: string,
    input: GenerateStructuredInput
  ): Promise<GenerateStructuredOutput> {
    const operation = async (): Promise<GenerateStructuredOutput> => {
      const params = this.buildParams(model, input);

      const response = await this.client.chat.completions
        .create(params)
        .catch((error: unknown) => {
          throw toApiRequestError(error);
        });

      const choice = response.choices[0];
      const refusal = choice?.message.refusal;
      if (refusal) {
        throw new StructuredOutputError(`Model refused: ${refusal}`, {
          refusal,
        });
      }

      const raw = choice?.message.content;
      if (!raw) {
        throw new StructuredOutputError("No response from OpenAI");
      }

      let data: unknown;
      try {
        data = parseJSONResponse(raw);
      } catch (error: unknown) {
        throw new StructuredOutputError(getErrorMessage(error), { raw });
      }

      return {
        data,
        raw,
        metadata: {
          model: response.model,
          finishReason: choice.finish_reason,
          tokensUsed: response.usage?.total_tokens,
          promptTokens: response.usage?.prompt_tokens,
          completionTokens: response.usage?.completion_tokens,
        },
      };
    };

    return withTimeoutAndRetry(
      operation,
      this.retryConfig.timeout,
      this.retryConfig.retries,
      `OpenAI ${model}`,
      isRetryable
    );
  }
}
