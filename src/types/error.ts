/**
 * API error envelope types
 */

/**
 * Error body returned by the API when a request fails.
 * `code` is frequently `null` on the wire; it decodes as absent.
 */
export interface ApiErrorDetail {
  message?: string;
  type?: string;
  param?: string;
  code?: string;
}

/**
 * Envelope wrapping {@link ApiErrorDetail}
 */
export interface ApiErrorResponse {
  error: ApiErrorDetail;
}
