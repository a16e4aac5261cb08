import { ObjectId } from 'mongodb';
import { InvalidIdentifierError, isValidMovieId } from '@mflix/domain';

export function isValidId(raw: string): boolean {
  return isValidMovieId(raw);
}

/**
 * Convert an external identifier into an ObjectId.
 *
 * Only the 24-character hex form is accepted. ObjectId.isValid() would also
 * take any 12-character string, which is not an identifier a client can have
 * been given.
 */
export function decodeId(raw: string): ObjectId {
  if (!isValidId(raw)) {
    throw new InvalidIdentifierError(raw);
  }
  return new ObjectId(raw);
}

export function encodeId(id: ObjectId): string {
  return id.toHexString();
}
