/**
 * Closed filter model for batch update and delete.
 *
 * Callers never hand the store a raw query object. Their filter is parsed
 * into this shape first and anything that does not fit is rejected.
 */

export type FilterScalar = string | number | boolean;

export type FieldCondition =
  | { kind: 'equals'; value: FilterScalar }
  | { kind: 'in'; values: FilterScalar[] }
  | { kind: 'range'; gt?: number; gte?: number; lt?: number; lte?: number }
  | { kind: 'regex'; pattern: string; caseInsensitive: boolean };

export const FILTERABLE_FIELDS = [
  'title',
  'year',
  'plot',
  'fullplot',
  'genres',
  'directors',
  'writers',
  'cast',
  'countries',
  'languages',
  'rated',
  'runtime',
  'poster',
  'imdb.rating',
  'imdb.votes',
  'awards.wins',
] as const;

export type FilterableField = (typeof FILTERABLE_FIELDS)[number];

export function isFilterableField(value: string): value is FilterableField {
  return FILTERABLE_FIELDS.some((field) => field === value);
}

export interface MovieFilter {
  /** Restrict to these identifiers (string form) */
  ids?: string[];

  fields: Partial<Record<FilterableField, FieldCondition>>;
}

export function isEmptyFilter(filter: MovieFilter): boolean {
  return (filter.ids === undefined || filter.ids.length === 0)
    && Object.keys(filter.fields).length === 0;
}
