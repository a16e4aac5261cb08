import { ErrorCode } from './types/enums.js';

/**
 * Base class for every classified failure.
 * The HTTP layer renders these directly into error envelopes.
 */
export class AppError extends Error {
  readonly statusCode: number;
  readonly code: ErrorCode;
  readonly details?: unknown;

  constructor(message: string, statusCode: number, code: ErrorCode, details?: unknown) {
    super(message);
    this.name = new.target.name;
    this.statusCode = statusCode;
    this.code = code;
    this.details = details;
  }
}

export function isAppError(error: unknown): error is AppError {
  return error instanceof AppError;
}

// ==================== Client errors ====================

export class ValidationError extends AppError {
  constructor(message: string, details?: unknown, code: ErrorCode = ErrorCode.VALIDATION_ERROR) {
    super(message, 400, code, details);
  }
}

export class InvalidIdentifierError extends ValidationError {
  constructor(raw: string) {
    super(`The provided ID '${raw}' is not a valid ObjectId`, undefined, ErrorCode.INVALID_ID);
  }
}

export class InvalidSearchOperatorError extends ValidationError {
  constructor(operator: string, allowed: readonly string[]) {
    super(
      `Invalid search operator '${operator}'. The search operator must be one of ${allowed.join(', ')}.`,
      { allowed },
      ErrorCode.INVALID_SEARCH_OPERATOR
    );
  }
}

export class MissingSearchTermError extends ValidationError {
  constructor() {
    super('At least one search parameter must be provided.', undefined, ErrorCode.MISSING_SEARCH_TERM);
  }
}

export class NotFoundError extends AppError {
  constructor(message: string) {
    super(message, 404, ErrorCode.NOT_FOUND);
  }
}

/**
 * A capability the caller asked for is not configured on this server.
 * Reported as 400: the operator can fix it, nothing failed at runtime.
 */
export class ServiceUnavailableError extends AppError {
  constructor(message: string) {
    super(message, 400, ErrorCode.SERVICE_UNAVAILABLE);
  }
}

// ==================== Upstream (Voyage AI) ====================

export class VoyageAuthError extends AppError {
  constructor(message = 'Invalid Voyage AI API key. Please check your VOYAGE_API_KEY in the .env file') {
    super(message, 401, ErrorCode.VOYAGE_AUTH_ERROR);
  }
}

export class VoyageAPIError extends AppError {
  constructor(message: string, statusCode = 500) {
    super(message, statusCode, ErrorCode.VOYAGE_API_ERROR);
  }
}

export function isVoyageError(error: unknown): error is VoyageAuthError | VoyageAPIError {
  return error instanceof VoyageAuthError || error instanceof VoyageAPIError;
}

// ==================== Server errors ====================

export class DatabaseError extends AppError {
  constructor(
    message: string,
    details?: unknown,
    statusCode = 500,
    code: ErrorCode = ErrorCode.DATABASE_ERROR
  ) {
    super(message, statusCode, code, details);
  }
}

export class SearchExecutionError extends DatabaseError {
  constructor(message: string, details?: unknown) {
    super(message, details, 500, ErrorCode.SEARCH_ERROR);
  }
}

export class AggregationError extends DatabaseError {
  constructor(message: string, details?: unknown) {
    super(message, details, 500, ErrorCode.AGGREGATION_ERROR);
  }
}

export class InternalError extends AppError {
  constructor(message: string, details?: unknown) {
    super(message, 500, ErrorCode.INTERNAL_SERVER_ERROR, details);
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
