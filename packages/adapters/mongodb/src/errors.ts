import { MongoError, MongoServerError } from 'mongodb';
import { DatabaseError, ErrorCode, isAppError, AppError } from '@mflix/domain';

export const DUPLICATE_KEY_CODE = 11000;
export const DOCUMENT_VALIDATION_CODE = 121;

/**
 * Classify a driver failure.
 *
 * Errors that are already classified pass through untouched, so a decode
 * failure raised inside a repository call still reaches the caller as a 400.
 */
export function translateMongoError(error: unknown, message: string): AppError {
  if (isAppError(error)) {
    return error;
  }

  if (error instanceof MongoServerError) {
    if (error.code === DUPLICATE_KEY_CODE) {
      return new DatabaseError(
        'Duplicate key error occurred.',
        'A document with the same key already exists.',
        409,
        ErrorCode.DUPLICATE_KEY_ERROR
      );
    }
    if (error.code === DOCUMENT_VALIDATION_CODE) {
      return new DatabaseError(
        'Document validation failed.',
        error.message,
        400,
        ErrorCode.WRITE_ERROR
      );
    }
  }

  if (error instanceof MongoError) {
    return new DatabaseError(`${message}: ${error.message}`);
  }

  return new DatabaseError(`${message}: ${error instanceof Error ? error.message : String(error)}`);
}
