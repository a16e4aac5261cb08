/**
 * Uniform response envelopes.
 * Every HTTP response body, success or failure, has one of these shapes.
 */

export interface SuccessResponse<T> {
  readonly success: true;
  readonly message: string;
  readonly data: T;
  readonly timestamp: string;
}

export interface ErrorDetails {
  readonly message: string;
  readonly code: string | null;
  readonly details?: unknown;
}

export interface ErrorResponse {
  readonly success: false;
  readonly message: string;
  readonly error: ErrorDetails;
  readonly timestamp: string;
}

export const DEFAULT_SUCCESS_MESSAGE = 'Operation completed successfully.';

export function createSuccessResponse<T>(
  data: T,
  message?: string,
  now: Date = new Date()
): SuccessResponse<T> {
  const response: SuccessResponse<T> = {
    success: true,
    message: message || DEFAULT_SUCCESS_MESSAGE,
    data,
    timestamp: now.toISOString(),
  };
  return Object.freeze(response);
}

export function createErrorResponse(
  message: string,
  code?: string,
  details?: unknown,
  now: Date = new Date()
): ErrorResponse {
  const error: ErrorDetails = details === undefined
    ? { message, code: code ?? null }
    : { message, code: code ?? null, details };

  const response: ErrorResponse = {
    success: false,
    message,
    error: Object.freeze(error),
    timestamp: now.toISOString(),
  };
  return Object.freeze(response);
}
