import { describe, it, expect } from 'vitest';
import {
  listMoviesQuerySchema,
  compoundSearchQuerySchema,
  vectorSearchQuerySchema,
  commentReportQuerySchema,
  directorReportQuerySchema,
  movieInputSchema,
  movieChangesSchema,
  movieBatchSchema,
  movieFilterSchema,
  batchUpdateBodySchema,
  batchDeleteBodySchema,
  formatZodError,
} from './schemas.js';

describe('request schemas', () => {
  // ==================== Query strings ====================

  describe('listMoviesQuerySchema', () => {
    it('should apply defaults', () => {
      expect(listMoviesQuerySchema.parse({})).toEqual({
        limit: 20,
        skip: 0,
        sortBy: 'title',
        sortOrder: 'asc',
      });
    });

    it('should coerce numeric parameters', () => {
      const query = listMoviesQuerySchema.parse({
        year: '1999',
        minRating: '7.5',
        limit: '5',
        skip: '10',
      });

      expect(query).toMatchObject({ year: 1999, minRating: 7.5, limit: 5, skip: 10 });
    });

    it('should treat blank parameters as absent', () => {
      expect(listMoviesQuerySchema.parse({ year: '', title: '' })).toEqual({
        limit: 20,
        skip: 0,
        sortBy: 'title',
        sortOrder: 'asc',
      });
    });

    it('should reject a limit above 100 and a negative skip', () => {
      expect(listMoviesQuerySchema.safeParse({ limit: '101' }).success).toBe(false);
      expect(listMoviesQuerySchema.safeParse({ limit: '0' }).success).toBe(false);
      expect(listMoviesQuerySchema.safeParse({ skip: '-1' }).success).toBe(false);
    });

    it('should reject a non-integer year', () => {
      expect(listMoviesQuerySchema.safeParse({ year: 'nineteen' }).success).toBe(false);
    });
  });

  describe('search query schemas', () => {
    it('should default the compound operator to must', () => {
      expect(compoundSearchQuerySchema.parse({ plot: 'war' })).toEqual({
        plot: 'war',
        limit: 20,
        skip: 0,
        searchOperator: 'must',
      });
    });

    it('should pass any operator through for the pipeline to check', () => {
      expect(compoundSearchQuerySchema.parse({ searchOperator: 'maybe' }).searchOperator).toBe('maybe');
    });

    it('should require a non-blank vector query', () => {
      const result = vectorSearchQuerySchema.safeParse({ q: '   ' });

      expect(result.success).toBe(false);
      if (!result.success) {
        expect(formatZodError(result.error)).toBe('q: Query parameter "q" is required');
      }
    });

    it('should cap vector results at 50', () => {
      expect(vectorSearchQuerySchema.parse({ q: 'space' })).toEqual({ q: 'space', limit: 10 });
      expect(vectorSearchQuerySchema.safeParse({ q: 'space', limit: '51' }).success).toBe(false);
    });

    it('should rename movie_id for the comment report', () => {
      expect(commentReportQuerySchema.parse({ movie_id: '573a1390f29313caabcd4135' })).toEqual({
        movieId: '573a1390f29313caabcd4135',
        limit: 10,
      });
    });

    it('should default the director report limit to 20', () => {
      expect(directorReportQuerySchema.parse({})).toEqual({ limit: 20 });
    });
  });

  // ==================== Movie bodies ====================

  describe('movie bodies', () => {
    it('should require a title', () => {
      const result = movieInputSchema.safeParse({ year: 1999 });

      expect(result.success).toBe(false);
      if (!result.success) {
        expect(formatZodError(result.error)).toBe('title: title is required');
      }
    });

    it('should reject unknown fields', () => {
      expect(movieInputSchema.safeParse({ title: 'Alien', budget: 11 }).success).toBe(false);
    });

    it('should accept a partial update but not an empty one', () => {
      expect(movieChangesSchema.parse({ year: 1980 })).toEqual({ year: 1980 });

      const empty = movieChangesSchema.safeParse({});
      expect(empty.success).toBe(false);
      if (!empty.success) {
        expect(formatZodError(empty.error)).toBe('No valid fields provided for update.');
      }
    });

    it('should require a non-empty list for batch creation', () => {
      const result = movieBatchSchema.safeParse([]);

      expect(result.success).toBe(false);
      if (!result.success) {
        expect(formatZodError(result.error)).toBe('Request body must be a non-empty list of movies.');
      }
    });
  });

  // ==================== Batch filters ====================

  describe('movieFilterSchema', () => {
    it('should parse every condition form', () => {
      const filter = movieFilterSchema.parse({
        rated: 'PG',
        genres: { $in: ['Drama'] },
        year: { $gte: 1990, $lt: 2000 },
        title: { $regex: '^The', $options: 'i' },
      });

      expect(filter).toEqual({
        fields: {
          rated: { kind: 'equals', value: 'PG' },
          genres: { kind: 'in', values: ['Drama'] },
          year: { kind: 'range', gte: 1990, lt: 2000 },
          title: { kind: 'regex', pattern: '^The', caseInsensitive: true },
        },
      });
    });

    it('should read a dotted field', () => {
      expect(movieFilterSchema.parse({ 'imdb.rating': { $gt: 8 } })).toEqual({
        fields: { 'imdb.rating': { kind: 'range', gt: 8 } },
      });
    });

    it('should accept one identifier or a list of them', () => {
      expect(movieFilterSchema.parse({ _id: 'abc' })).toEqual({ ids: ['abc'], fields: {} });
      expect(movieFilterSchema.parse({ _id: { $in: ['a', 'b'] } })).toEqual({
        ids: ['a', 'b'],
        fields: {},
      });
    });

    it('should reject fields outside the filterable set', () => {
      const result = movieFilterSchema.safeParse({ $where: 'sleep(1000)' });

      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.error.issues[0].message).toBe("Field '$where' cannot be used in a filter");
      }
    });

    it('should reject operators outside the closed set', () => {
      const result = movieFilterSchema.safeParse({ year: { $ne: 1999 } });

      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.error.issues[0]).toMatchObject({
          path: ['year'],
          message: "Unsupported condition for 'year'",
        });
      }
    });

    it('should reject an empty range', () => {
      expect(movieFilterSchema.safeParse({ year: {} }).success).toBe(false);
    });

    it('should reject an empty filter', () => {
      const result = movieFilterSchema.safeParse({});

      expect(result.success).toBe(false);
      if (!result.success) {
        expect(formatZodError(result.error)).toBe('Filter object is required and cannot be empty.');
      }
    });
  });

  describe('batch bodies', () => {
    it('should parse a batch update', () => {
      expect(
        batchUpdateBodySchema.parse({ filter: { year: 1999 }, update: { rated: 'R' } })
      ).toEqual({
        filter: { fields: { year: { kind: 'equals', value: 1999 } } },
        update: { rated: 'R' },
      });
    });

    it('should require a body for batch update', () => {
      const result = batchUpdateBodySchema.safeParse(undefined);

      expect(result.success).toBe(false);
      if (!result.success) {
        expect(formatZodError(result.error)).toBe('Both filter and update objects are required');
      }
    });

    it('should report an empty delete filter on its path', () => {
      const result = batchDeleteBodySchema.safeParse({ filter: {} });

      expect(result.success).toBe(false);
      if (!result.success) {
        expect(formatZodError(result.error)).toBe(
          'filter: Filter object is required and cannot be empty.'
        );
      }
    });
  });
});
