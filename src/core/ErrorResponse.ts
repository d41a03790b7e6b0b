/**
 * Decoding of the API error envelope
 */

import type { ApiErrorDetail, ApiErrorResponse } from "../types/error";
import { MalformedFieldShapeError } from "./errors";

const DETAIL_FIELDS = ["message", "type", "param", "code"] as const;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Decode an error envelope. Every detail field is optional; `null` decodes
 * as absent.
 *
 * @throws MalformedFieldShapeError when `error` is missing or a field is not a string
 */
export function decodeErrorResponse(value: unknown): ApiErrorResponse {
  if (!isRecord(value)) {
    throw new MalformedFieldShapeError("an object", []);
  }
  const error = value.error;
  if (!isRecord(error)) {
    throw new MalformedFieldShapeError("an object", ["error"]);
  }

  const detail: ApiErrorDetail = {};
  for (const field of DETAIL_FIELDS) {
    const raw = error[field];
    if (raw === null || raw === undefined) {
      continue;
    }
    if (typeof raw !== "string") {
      throw new MalformedFieldShapeError("a string", ["error", field]);
    }
    detail[field] = raw;
  }
  return { error: detail };
}

/**
 * One-line summary, e.g. `invalid_request_error (param: messages.[2].role): Invalid parameter`
 */
export function describeApiError(response: ApiErrorResponse): string {
  const { message, type, param, code } = response.error;
  const kind = type ?? code ?? "api_error";
  const where = param ? ` (param: ${param})` : "";
  return `${kind}${where}: ${message ?? "Unknown error"}`;
}
