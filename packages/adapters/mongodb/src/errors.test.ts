import { describe, it, expect } from 'vitest';
import { MongoError, MongoServerError } from 'mongodb';
import { DatabaseError, ErrorCode, NotFoundError } from '@mflix/domain';
import { translateMongoError } from './errors.js';

describe('translateMongoError', () => {
  it('should map a duplicate key to 409', () => {
    const error = translateMongoError(
      new MongoServerError({ message: 'E11000 duplicate key', code: 11000, keyValue: { title: 'Alien' } }),
      'Database error occurred'
    );

    expect(error).toBeInstanceOf(DatabaseError);
    expect(error).toMatchObject({
      statusCode: 409,
      code: ErrorCode.DUPLICATE_KEY_ERROR,
      message: 'Duplicate key error occurred.',
      details: 'A document with the same key already exists.',
    });
  });

  it('should map a document validation failure to 400', () => {
    const error = translateMongoError(
      new MongoServerError({ message: 'Document failed validation', code: 121 }),
      'Database error occurred'
    );

    expect(error).toMatchObject({
      statusCode: 400,
      code: ErrorCode.WRITE_ERROR,
      message: 'Document validation failed.',
      details: 'Document failed validation',
    });
  });

  it('should map other driver errors to 500 with the context message', () => {
    const error = translateMongoError(new MongoError('connection reset'), 'Database error occurred');

    expect(error).toMatchObject({
      statusCode: 500,
      code: ErrorCode.DATABASE_ERROR,
      message: 'Database error occurred: connection reset',
    });
  });

  it('should pass classified errors through', () => {
    const original = new NotFoundError('No movie found with ID: x');

    expect(translateMongoError(original, 'ignored')).toBe(original);
  });

  it('should wrap anything else as a database error', () => {
    expect(translateMongoError('boom', 'An error occurred while fetching movies').message).toBe(
      'An error occurred while fetching movies: boom'
    );
  });
});
