/**
 * Boolean combinators accepted by the compound search stage
 */
export enum SearchOperator {
  MUST = 'must',
  SHOULD = 'should',
  MUST_NOT = 'mustNot',
  FILTER = 'filter',
}

export const SEARCH_OPERATORS: readonly SearchOperator[] = [
  SearchOperator.MUST,
  SearchOperator.SHOULD,
  SearchOperator.MUST_NOT,
  SearchOperator.FILTER,
];

export function isSearchOperator(value: string): value is SearchOperator {
  return SEARCH_OPERATORS.some((operator) => operator === value);
}

export enum SortOrder {
  ASC = 'asc',
  DESC = 'desc',
}

/**
 * Input type hint sent to the embedding provider.
 * Queries and stored documents are embedded asymmetrically.
 */
export enum EmbeddingInputType {
  QUERY = 'query',
  DOCUMENT = 'document',
}

/**
 * Machine-readable codes carried in error envelopes
 */
export enum ErrorCode {
  VALIDATION_ERROR = 'VALIDATION_ERROR',
  INVALID_ID = 'INVALID_ID',
  INVALID_SEARCH_OPERATOR = 'INVALID_SEARCH_OPERATOR',
  MISSING_SEARCH_TERM = 'MISSING_SEARCH_TERM',
  NOT_FOUND = 'NOT_FOUND',
  VOYAGE_AUTH_ERROR = 'VOYAGE_AUTH_ERROR',
  VOYAGE_API_ERROR = 'VOYAGE_API_ERROR',
  SERVICE_UNAVAILABLE = 'SERVICE_UNAVAILABLE',
  DATABASE_ERROR = 'DATABASE_ERROR',
  DUPLICATE_KEY_ERROR = 'DUPLICATE_KEY_ERROR',
  WRITE_ERROR = 'WRITE_ERROR',
  SEARCH_ERROR = 'SEARCH_ERROR',
  AGGREGATION_ERROR = 'AGGREGATION_ERROR',
  INTERNAL_SERVER_ERROR = 'INTERNAL_SERVER_ERROR',
}
