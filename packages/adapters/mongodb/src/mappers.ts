/**
 * Document → entity mappers
 *
 * The movie collection carries legacy data with inconsistent typing
 * (string years, empty-string ratings, missing titles). Every value read
 * from the store goes through these readers instead of being trusted.
 */

import { Document, ObjectId } from 'mongodb';
import {
  Awards,
  ImdbInfo,
  Movie,
  VectorSearchResult,
  MovieCommentReport,
  RecentComment,
  YearlyStats,
  DirectorStats,
  SearchMoviesResponse,
} from '@mflix/domain';
import { encodeId } from './ids.js';

// ==================== Readers ====================

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function readString(value: unknown): string | undefined {
  return typeof value === 'string' ? value : undefined;
}

function readNumber(value: unknown): number | undefined {
  return typeof value === 'number' && Number.isFinite(value) ? value : undefined;
}

function readDate(value: unknown): Date | undefined {
  return value instanceof Date ? value : undefined;
}

function readStringArray(value: unknown): string[] | undefined {
  if (!Array.isArray(value)) return undefined;
  return value.filter((item): item is string => typeof item === 'string');
}

export function readId(value: unknown): string {
  return value instanceof ObjectId ? encodeId(value) : String(value);
}

/**
 * Coerce a stored year into an integer.
 *
 * Integers pass through. Anything else is stripped of non-digits and
 * re-parsed ("1999è" → 1999); null when no digits remain.
 */
export function normalizeYear(value: unknown): number | null {
  if (typeof value === 'number' && Number.isInteger(value)) {
    return value;
  }

  const digits = String(value).replace(/\D/g, '');
  if (!digits) return null;

  const parsed = parseInt(digits, 10);
  return Number.isNaN(parsed) ? null : parsed;
}

export function hasTitle(doc: Document): boolean {
  return typeof doc.title === 'string';
}

// ==================== Movies ====================

function toAwards(value: unknown): Awards | undefined {
  if (!isRecord(value)) return undefined;
  return {
    wins: readNumber(value.wins),
    nominations: readNumber(value.nominations),
    text: readString(value.text),
  };
}

function toImdb(value: unknown): ImdbInfo | undefined {
  if (!isRecord(value)) return undefined;
  return {
    rating: readNumber(value.rating),
    votes: readNumber(value.votes),
    id: readNumber(value.id),
  };
}

export function toMovie(doc: Document): Movie {
  return {
    _id: readId(doc._id),
    title: readString(doc.title) ?? '',
    year: 'year' in doc ? normalizeYear(doc.year) : undefined,
    plot: readString(doc.plot),
    fullplot: readString(doc.fullplot),
    released: readDate(doc.released),
    runtime: readNumber(doc.runtime),
    poster: readString(doc.poster),
    genres: readStringArray(doc.genres),
    directors: readStringArray(doc.directors),
    writers: readStringArray(doc.writers),
    cast: readStringArray(doc.cast),
    countries: readStringArray(doc.countries),
    languages: readStringArray(doc.languages),
    rated: readString(doc.rated),
    awards: toAwards(doc.awards),
    imdb: toImdb(doc.imdb),
  };
}

/**
 * Shape a listing page: untitled records are dropped, not reported
 */
export function toMovieList(docs: Document[]): Movie[] {
  return docs.filter(hasTitle).map(toMovie);
}

// ==================== Search ====================

/**
 * Unpack the single document produced by the count-and-page $facet stage
 */
export function toSearchMoviesResponse(facets: Document[]): SearchMoviesResponse {
  const facet = facets[0];
  if (!facet) {
    return { movies: [], totalCount: 0 };
  }

  const counts: unknown[] = Array.isArray(facet.totalCount) ? facet.totalCount : [];
  const first = counts[0];
  const totalCount = isRecord(first) ? readNumber(first.count) ?? 0 : 0;

  const results: unknown[] = Array.isArray(facet.results) ? facet.results : [];
  const movies = results.filter(isRecord).map((doc) => toMovie(doc));

  return { movies, totalCount };
}

export function toVectorSearchResult(doc: Document): VectorSearchResult {
  return {
    _id: readId(doc._id),
    title: readString(doc.title) ?? '',
    plot: readString(doc.plot),
    poster: readString(doc.poster),
    year: readNumber(doc.year) ?? null,
    genres: readStringArray(doc.genres),
    directors: readStringArray(doc.directors),
    cast: readStringArray(doc.cast),
    score: readNumber(doc.score) ?? 0,
  };
}

// ==================== Reporting ====================

function toRecentComment(value: Record<string, unknown>): RecentComment {
  return {
    userName: readString(value.userName) ?? '',
    userEmail: readString(value.userEmail) ?? '',
    text: readString(value.text) ?? '',
    date: readDate(value.date) ?? null,
  };
}

export function toCommentReport(doc: Document): MovieCommentReport {
  const comments: unknown[] = Array.isArray(doc.recentComments) ? doc.recentComments : [];
  return {
    _id: readId(doc._id),
    title: readString(doc.title) ?? '',
    year: readNumber(doc.year) ?? null,
    genres: readStringArray(doc.genres) ?? [],
    imdbRating: readNumber(doc.imdbRating) ?? null,
    recentComments: comments.filter(isRecord).map(toRecentComment),
    totalComments: readNumber(doc.totalComments) ?? 0,
  };
}

export function toYearlyStats(doc: Document): YearlyStats {
  return {
    year: readNumber(doc.year) ?? 0,
    movieCount: readNumber(doc.movieCount) ?? 0,
    averageRating: readNumber(doc.averageRating) ?? null,
    highestRating: readNumber(doc.highestRating) ?? null,
    lowestRating: readNumber(doc.lowestRating) ?? null,
    totalVotes: readNumber(doc.totalVotes) ?? 0,
  };
}

export function toDirectorStats(doc: Document): DirectorStats {
  return {
    director: readString(doc.director) ?? '',
    movieCount: readNumber(doc.movieCount) ?? 0,
    averageRating: readNumber(doc.averageRating) ?? null,
  };
}
