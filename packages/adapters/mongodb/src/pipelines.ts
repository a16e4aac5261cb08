/**
 * Aggregation pipeline builders
 *
 * Pure functions: each takes validated parameters and returns the stage list
 * to hand to aggregate(). Nothing here talks to the database, so every
 * pipeline can be inspected in tests stage by stage.
 */

import { Document, ObjectId } from 'mongodb';
import {
  CompoundSearchQuery,
  InvalidSearchOperatorError,
  MissingSearchTermError,
  SEARCH_OPERATORS,
  isSearchOperator,
  DEFAULT_TEXT_INDEX,
  DEFAULT_VECTOR_INDEX,
  DEFAULT_EMBEDDING_PATH,
  DEFAULT_CANDIDATE_MULTIPLIER,
  DEFAULT_COMMENTS_COLLECTION,
} from '@mflix/domain';

/**
 * Every Movie field, used by the search result page
 */
export const MOVIE_PROJECTION = {
  _id: 1,
  title: 1,
  year: 1,
  plot: 1,
  fullplot: 1,
  released: 1,
  runtime: 1,
  poster: 1,
  genres: 1,
  directors: 1,
  writers: 1,
  cast: 1,
  countries: 1,
  languages: 1,
  rated: 1,
  awards: 1,
  imdb: 1,
} as const;

/** Fields searched with an exact phrase only */
const PHRASE_FIELDS = ['plot', 'fullplot'] as const;

/** Name-like fields searched with the phrase > text > fuzzy hierarchy */
const NAME_FIELDS = ['directors', 'writers', 'cast'] as const;

export const FUZZY_MAX_EDITS = 1;
export const FUZZY_PREFIX_LENGTH = 2;

// ==================== Compound search ====================

/**
 * Clause for a name-like field.
 *
 * Three should-clauses over the same text so that an exact phrase scores
 * above all terms spelled exactly, which scores above a typo-tolerant match.
 * Any one of them is enough to match.
 */
export function buildNameClause(path: string, query: string): Document {
  return {
    compound: {
      should: [
        { phrase: { query, path } },
        { text: { query, path, matchCriteria: 'all' } },
        {
          text: {
            query,
            path,
            matchCriteria: 'all',
            fuzzy: { maxEdits: FUZZY_MAX_EDITS, prefixLength: FUZZY_PREFIX_LENGTH },
          },
        },
      ],
      minimumShouldMatch: 1,
    },
  };
}

export function buildPhraseClause(path: string, query: string): Document {
  return { phrase: { query, path } };
}

/**
 * Build the $search clauses for the supplied fields, in field order
 */
export function buildSearchClauses(query: CompoundSearchQuery): Document[] {
  const clauses: Document[] = [];

  for (const field of PHRASE_FIELDS) {
    const value = query[field];
    if (value !== undefined) {
      clauses.push(buildPhraseClause(field, value));
    }
  }

  for (const field of NAME_FIELDS) {
    const value = query[field];
    if (value !== undefined) {
      clauses.push(buildNameClause(field, value));
    }
  }

  return clauses;
}

export interface CompoundSearchOptions {
  index?: string;
}

/**
 * Compound search followed by a count-and-page facet.
 *
 * The operator is checked before the fields, so an invalid operator is
 * reported even when no field was supplied.
 */
export function buildCompoundSearchPipeline(
  query: CompoundSearchQuery,
  options: CompoundSearchOptions = {}
): Document[] {
  const operator = query.searchOperator;
  if (!isSearchOperator(operator)) {
    throw new InvalidSearchOperatorError(operator, SEARCH_OPERATORS);
  }

  const clauses = buildSearchClauses(query);
  if (clauses.length === 0) {
    throw new MissingSearchTermError();
  }

  return [
    {
      $search: {
        index: options.index ?? DEFAULT_TEXT_INDEX,
        compound: {
          [operator]: clauses,
        },
      },
    },
    {
      $facet: {
        totalCount: [{ $count: 'count' }],
        results: [
          { $skip: query.skip },
          { $limit: query.limit },
          { $project: MOVIE_PROJECTION },
        ],
      },
    },
  ];
}

// ==================== Vector search ====================

export interface VectorSearchOptions {
  index?: string;
  path?: string;
  candidateMultiplier?: number;
}

/**
 * Nearest-neighbour search over the plot embeddings.
 *
 * The index is asked for limit × multiplier candidates before keeping the
 * best `limit`. year is passed through only when the stored value is
 * numeric, otherwise it is reported as null.
 */
export function buildVectorSearchPipeline(
  queryVector: number[],
  limit: number,
  options: VectorSearchOptions = {}
): Document[] {
  const multiplier = options.candidateMultiplier ?? DEFAULT_CANDIDATE_MULTIPLIER;

  return [
    {
      $vectorSearch: {
        index: options.index ?? DEFAULT_VECTOR_INDEX,
        path: options.path ?? DEFAULT_EMBEDDING_PATH,
        queryVector,
        numCandidates: limit * multiplier,
        limit,
      },
    },
    {
      $project: {
        _id: 1,
        title: 1,
        plot: 1,
        poster: 1,
        year: {
          $cond: {
            if: {
              $and: [
                { $ne: ['$year', null] },
                { $isNumber: '$year' },
              ],
            },
            then: '$year',
            else: null,
          },
        },
        genres: 1,
        directors: 1,
        cast: 1,
        score: { $meta: 'vectorSearchScore' },
      },
    },
  ];
}

// ==================== Reporting ====================

export const SINGLE_MOVIE_COMMENT_REPORT_CAP = 50;
export const ALL_MOVIES_COMMENT_REPORT_CAP = 20;

export interface RecentCommentsOptions {
  /** Restrict to one movie */
  movieId?: ObjectId;

  /** Comments kept per movie */
  limit: number;

  commentsCollection?: string;
}

/**
 * Movies joined with their comments, most recently discussed first.
 *
 * A single-movie report keeps up to 50 rows, the catalogue-wide one 20.
 */
export function buildRecentCommentsPipeline(options: RecentCommentsOptions): Document[] {
  const match: Document = { year: { $type: 'number' } };
  if (options.movieId) {
    match._id = options.movieId;
  }

  return [
    { $match: match },
    {
      $lookup: {
        from: options.commentsCollection ?? DEFAULT_COMMENTS_COLLECTION,
        localField: '_id',
        foreignField: 'movie_id',
        as: 'comments',
      },
    },
    { $match: { comments: { $ne: [] } } },
    {
      $addFields: {
        recentComments: {
          $slice: [
            { $sortArray: { input: '$comments', sortBy: { date: -1 } } },
            options.limit,
          ],
        },
        mostRecentCommentDate: { $max: '$comments.date' },
      },
    },
    { $sort: { mostRecentCommentDate: -1 } },
    {
      $limit: options.movieId
        ? SINGLE_MOVIE_COMMENT_REPORT_CAP
        : ALL_MOVIES_COMMENT_REPORT_CAP,
    },
    {
      $project: {
        title: 1,
        year: 1,
        genres: 1,
        _id: 1,
        imdbRating: '$imdb.rating',
        recentComments: {
          $map: {
            input: '$recentComments',
            as: 'comment',
            in: {
              userName: '$$comment.name',
              userEmail: '$$comment.email',
              text: '$$comment.text',
              date: '$$comment.date',
            },
          },
        },
        totalComments: { $size: '$comments' },
      },
    },
  ];
}

/**
 * imdb.rating when it is present, non-empty and numeric; removed otherwise
 * so $avg/$max/$min skip the document instead of counting it as zero.
 */
export const VALID_RATING_EXPRESSION: Document = {
  $cond: [
    {
      $and: [
        { $ne: ['$imdb.rating', null] },
        { $ne: ['$imdb.rating', ''] },
        { $isNumber: '$imdb.rating' },
      ],
    },
    '$imdb.rating',
    '$$REMOVE',
  ],
};

export function buildYearlyStatsPipeline(): Document[] {
  return [
    { $match: { year: { $type: 'number' } } },
    {
      $group: {
        _id: '$year',
        movieCount: { $sum: 1 },
        averageRating: { $avg: VALID_RATING_EXPRESSION },
        highestRating: { $max: VALID_RATING_EXPRESSION },
        lowestRating: { $min: VALID_RATING_EXPRESSION },
        totalVotes: { $sum: '$imdb.votes' },
      },
    },
    {
      $project: {
        year: '$_id',
        movieCount: 1,
        averageRating: { $round: ['$averageRating', 2] },
        highestRating: 1,
        lowestRating: 1,
        totalVotes: 1,
        _id: 0,
      },
    },
    { $sort: { year: -1 } },
  ];
}

/**
 * Directors ranked by number of credited movies.
 *
 * Unlike the yearly report the average is taken over imdb.rating as stored;
 * $avg ignores non-numeric values on its own.
 */
export function buildDirectorStatsPipeline(limit: number): Document[] {
  return [
    {
      $match: {
        directors: { $exists: true, $nin: [null, []] },
        year: { $type: 'number' },
      },
    },
    { $unwind: '$directors' },
    { $match: { directors: { $nin: [null, ''] } } },
    {
      $group: {
        _id: '$directors',
        movieCount: { $sum: 1 },
        averageRating: { $avg: '$imdb.rating' },
      },
    },
    { $sort: { movieCount: -1 } },
    { $limit: limit },
    {
      $project: {
        director: '$_id',
        movieCount: 1,
        averageRating: { $round: ['$averageRating', 2] },
        _id: 0,
      },
    },
  ];
}
