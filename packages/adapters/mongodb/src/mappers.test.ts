import { describe, it, expect } from 'vitest';
import { ObjectId } from 'mongodb';
import {
  normalizeYear,
  toMovie,
  toMovieList,
  toSearchMoviesResponse,
  toVectorSearchResult,
  toCommentReport,
  toYearlyStats,
  toDirectorStats,
} from './mappers.js';

const MOVIE_ID = new ObjectId('573a1390f29313caabcd4135');

describe('mappers', () => {
  // ==================== Year normalisation ====================

  describe('normalizeYear', () => {
    it('should pass integers through', () => {
      expect(normalizeYear(1999)).toBe(1999);
    });

    it('should strip stray characters from a string year', () => {
      expect(normalizeYear('1999è')).toBe(1999);
    });

    it('should return null when no digits remain', () => {
      expect(normalizeYear('unknown')).toBeNull();
      expect(normalizeYear(null)).toBeNull();
    });
  });

  // ==================== Movies ====================

  describe('toMovie', () => {
    it('should stringify the identifier and read the nested blocks', () => {
      const movie = toMovie({
        _id: MOVIE_ID,
        title: 'Alien',
        year: '1979è',
        genres: ['Horror', 42, 'Sci-Fi'],
        imdb: { rating: 8.5, votes: 'many' },
      });

      expect(movie._id).toBe('573a1390f29313caabcd4135');
      expect(movie.title).toBe('Alien');
      expect(movie.year).toBe(1979);
      expect(movie.genres).toEqual(['Horror', 'Sci-Fi']);
      expect(movie.imdb).toEqual({ rating: 8.5, votes: undefined, id: undefined });
    });

    it('should leave year undefined when the document has none', () => {
      expect(toMovie({ _id: MOVIE_ID, title: 'Alien' }).year).toBeUndefined();
    });

    it('should read an empty-string rating as absent', () => {
      expect(toMovie({ _id: MOVIE_ID, title: 'Alien', imdb: { rating: '' } }).imdb?.rating).toBeUndefined();
    });
  });

  describe('toMovieList', () => {
    it('should drop records without a string title', () => {
      const movies = toMovieList([
        { _id: MOVIE_ID, title: 'Alien' },
        { _id: new ObjectId(), year: 1980 },
        { _id: new ObjectId(), title: 1984 },
      ]);

      expect(movies).toHaveLength(1);
      expect(movies[0].title).toBe('Alien');
    });
  });

  // ==================== Search ====================

  describe('toSearchMoviesResponse', () => {
    it('should return an empty page when there is no facet', () => {
      expect(toSearchMoviesResponse([])).toEqual({ movies: [], totalCount: 0 });
    });

    it('should read the count and the result page', () => {
      const response = toSearchMoviesResponse([
        {
          totalCount: [{ count: 3 }],
          results: [{ _id: MOVIE_ID, title: 'Inception', year: 2010 }],
        },
      ]);

      expect(response.totalCount).toBe(3);
      expect(response.movies).toHaveLength(1);
      expect(response.movies[0]._id).toBe('573a1390f29313caabcd4135');
      expect(response.movies[0].year).toBe(2010);
    });

    it('should report zero when nothing matched', () => {
      expect(toSearchMoviesResponse([{ totalCount: [], results: [] }])).toEqual({
        movies: [],
        totalCount: 0,
      });
    });
  });

  describe('toVectorSearchResult', () => {
    it('should keep the score and null a non-numeric year', () => {
      const result = toVectorSearchResult({
        _id: MOVIE_ID,
        title: 'Alien',
        year: null,
        score: 0.87,
      });

      expect(result).toMatchObject({
        _id: '573a1390f29313caabcd4135',
        title: 'Alien',
        year: null,
        score: 0.87,
      });
    });
  });

  // ==================== Reporting ====================

  describe('report rows', () => {
    it('should map a comment report', () => {
      const date = new Date('2012-03-04T05:06:07Z');
      const report = toCommentReport({
        _id: MOVIE_ID,
        title: 'Alien',
        year: 1979,
        genres: ['Horror'],
        imdbRating: 8.5,
        recentComments: [{ userName: 'Ned', userEmail: 'ned@example.com', text: 'Great', date }],
        totalComments: 4,
      });

      expect(report).toEqual({
        _id: '573a1390f29313caabcd4135',
        title: 'Alien',
        year: 1979,
        genres: ['Horror'],
        imdbRating: 8.5,
        recentComments: [{ userName: 'Ned', userEmail: 'ned@example.com', text: 'Great', date }],
        totalComments: 4,
      });
    });

    it('should report a null average for a year without valid ratings', () => {
      expect(toYearlyStats({ year: 1921, movieCount: 2, averageRating: null, totalVotes: 0 })).toEqual({
        year: 1921,
        movieCount: 2,
        averageRating: null,
        highestRating: null,
        lowestRating: null,
        totalVotes: 0,
      });
    });

    it('should map a director row', () => {
      expect(toDirectorStats({ director: 'Woody Allen', movieCount: 40, averageRating: 6.95 })).toEqual({
        director: 'Woody Allen',
        movieCount: 40,
        averageRating: 6.95,
      });
    });
  });
});
