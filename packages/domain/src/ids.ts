/**
 * External movie identifiers are the 24-character hex form of the store id.
 */
const MOVIE_ID_PATTERN = /^[0-9a-fA-F]{24}$/;

export function isValidMovieId(raw: string): boolean {
  return MOVIE_ID_PATTERN.test(raw);
}
