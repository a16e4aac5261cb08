import { describe, it, expect } from 'vitest';
import {
  AppError,
  ValidationError,
  InvalidIdentifierError,
  InvalidSearchOperatorError,
  MissingSearchTermError,
  NotFoundError,
  ServiceUnavailableError,
  VoyageAuthError,
  VoyageAPIError,
  DatabaseError,
  SearchExecutionError,
  AggregationError,
  InternalError,
  isAppError,
  isVoyageError,
  errorMessage,
} from './errors.js';
import { ErrorCode, SEARCH_OPERATORS } from './types/enums.js';

describe('error taxonomy', () => {
  it.each([
    [new ValidationError('bad input'), 400, ErrorCode.VALIDATION_ERROR],
    [new InvalidIdentifierError('x'), 400, ErrorCode.INVALID_ID],
    [new InvalidSearchOperatorError('x', SEARCH_OPERATORS), 400, ErrorCode.INVALID_SEARCH_OPERATOR],
    [new MissingSearchTermError(), 400, ErrorCode.MISSING_SEARCH_TERM],
    [new NotFoundError('gone'), 404, ErrorCode.NOT_FOUND],
    [new ServiceUnavailableError('off'), 400, ErrorCode.SERVICE_UNAVAILABLE],
    [new VoyageAuthError(), 401, ErrorCode.VOYAGE_AUTH_ERROR],
    [new VoyageAPIError('slow down', 429), 429, ErrorCode.VOYAGE_API_ERROR],
    [new DatabaseError('down'), 500, ErrorCode.DATABASE_ERROR],
    [new SearchExecutionError('failed'), 500, ErrorCode.SEARCH_ERROR],
    [new AggregationError('failed'), 500, ErrorCode.AGGREGATION_ERROR],
    [new InternalError('oops'), 500, ErrorCode.INTERNAL_SERVER_ERROR],
  ])('should give %s its status and code', (error, statusCode, code) => {
    expect(error).toBeInstanceOf(AppError);
    expect(error.statusCode).toBe(statusCode);
    expect(error.code).toBe(code);
  });

  it('should name errors after their class', () => {
    expect(new InvalidIdentifierError('x').name).toBe('InvalidIdentifierError');
    expect(new AggregationError('x').name).toBe('AggregationError');
  });

  it('should keep validation subclasses catchable as ValidationError', () => {
    expect(new MissingSearchTermError()).toBeInstanceOf(ValidationError);
    expect(new SearchExecutionError('x')).toBeInstanceOf(DatabaseError);
  });

  it('should list the allowed operators in the message and details', () => {
    const error = new InvalidSearchOperatorError('maybe', SEARCH_OPERATORS);

    expect(error.message).toBe(
      "Invalid search operator 'maybe'. The search operator must be one of must, should, mustNot, filter."
    );
    expect(error.details).toEqual({ allowed: ['must', 'should', 'mustNot', 'filter'] });
  });

  it('should default the Voyage auth message', () => {
    expect(new VoyageAuthError().message).toBe(
      'Invalid Voyage AI API key. Please check your VOYAGE_API_KEY in the .env file'
    );
  });

  it('should recognise Voyage errors only', () => {
    expect(isVoyageError(new VoyageAuthError())).toBe(true);
    expect(isVoyageError(new VoyageAPIError('x'))).toBe(true);
    expect(isVoyageError(new DatabaseError('x'))).toBe(false);
  });

  it('should tell classified errors from plain ones', () => {
    expect(isAppError(new NotFoundError('x'))).toBe(true);
    expect(isAppError(new Error('x'))).toBe(false);
  });

  it('should read a message from anything thrown', () => {
    expect(errorMessage(new Error('boom'))).toBe('boom');
    expect(errorMessage('plain')).toBe('plain');
  });
});
