import { Document, Filter, Sort, SortDirection } from 'mongodb';
import {
  ListMoviesQuery,
  MovieFilter,
  FieldCondition,
  FilterScalar,
  SortOrder,
} from '@mflix/domain';
import { decodeId } from './ids.js';

export interface ListQuery {
  filter: Filter<Document>;
  sort: Sort;
  skip: number;
  limit: number;
}

export function escapeRegex(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Translate listing parameters into a find() filter, sort and window.
 *
 * title and genre are case-insensitive substring matches; the caller's text
 * is matched literally, not as a pattern.
 */
export function buildListQuery(query: ListMoviesQuery): ListQuery {
  const filter: Document = {};

  if (query.q) {
    filter.$text = { $search: query.q };
  }
  if (query.title) {
    filter.title = { $regex: escapeRegex(query.title), $options: 'i' };
  }
  if (query.genre) {
    filter.genres = { $regex: escapeRegex(query.genre), $options: 'i' };
  }
  if (query.year !== undefined) {
    filter.year = query.year;
  }
  if (query.minRating !== undefined || query.maxRating !== undefined) {
    const rating: { $gte?: number; $lte?: number } = {};
    if (query.minRating !== undefined) rating.$gte = query.minRating;
    if (query.maxRating !== undefined) rating.$lte = query.maxRating;
    filter['imdb.rating'] = rating;
  }

  const direction: SortDirection = query.sortOrder === SortOrder.DESC ? -1 : 1;

  return {
    filter,
    sort: { [query.sortBy]: direction },
    skip: query.skip,
    limit: query.limit,
  };
}

function toCondition(condition: FieldCondition): FilterScalar | Document {
  switch (condition.kind) {
    case 'equals':
      return condition.value;
    case 'in':
      return { $in: condition.values };
    case 'range': {
      const range: Record<string, number> = {};
      if (condition.gt !== undefined) range.$gt = condition.gt;
      if (condition.gte !== undefined) range.$gte = condition.gte;
      if (condition.lt !== undefined) range.$lt = condition.lt;
      if (condition.lte !== undefined) range.$lte = condition.lte;
      return range;
    }
    case 'regex':
      return condition.caseInsensitive
        ? { $regex: condition.pattern, $options: 'i' }
        : { $regex: condition.pattern };
  }
}

/**
 * Translate a parsed batch filter into a store filter.
 * Identifiers are decoded here, so one malformed id rejects the whole batch.
 */
export function toMongoFilter(movieFilter: MovieFilter): Filter<Document> {
  const filter: Document = {};

  if (movieFilter.ids && movieFilter.ids.length > 0) {
    filter._id = { $in: movieFilter.ids.map(decodeId) };
  }

  for (const [field, condition] of Object.entries(movieFilter.fields)) {
    if (condition) {
      filter[field] = toCondition(condition);
    }
  }

  return filter;
}
