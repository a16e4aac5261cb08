import { SearchOperator, SortOrder } from './enums.js';

/**
 * Award summary embedded in a movie document
 */
export interface Awards {
  wins?: number;
  nominations?: number;
  text?: string;
}

/**
 * IMDb rating block embedded in a movie document
 */
export interface ImdbInfo {
  /** Rating on a 0-10 scale; legacy records may lack it */
  rating?: number;
  votes?: number;
  id?: number;
}

/**
 * Movie as returned by the API
 */
export interface Movie {
  /** String form of the store-assigned identifier */
  _id: string;

  title: string;

  /** Release year; null when the stored value could not be read as a year */
  year?: number | null;

  plot?: string;
  fullplot?: string;
  released?: Date;

  /** Runtime in minutes */
  runtime?: number;

  poster?: string;
  genres?: string[];
  directors?: string[];
  writers?: string[];
  cast?: string[];
  countries?: string[];
  languages?: string[];

  /** Rating classification (e.g. PG-13) */
  rated?: string;

  awards?: Awards;
  imdb?: ImdbInfo;
}

/**
 * Fields a caller may set when creating a movie
 */
export interface MovieInput {
  title: string;
  year?: number;
  plot?: string;
  fullplot?: string;
  genres?: string[];
  directors?: string[];
  writers?: string[];
  cast?: string[];
  countries?: string[];
  languages?: string[];
  rated?: string;
  runtime?: number;
  poster?: string;
}

/**
 * Fields a caller may change on an existing movie
 */
export type MovieChanges = Partial<MovieInput>;

/**
 * Comment on a movie, read only through the reporting join
 */
export interface Comment {
  _id: string;
  movie_id: string;
  name: string;
  email: string;
  text: string;
  date: Date;
}

// ==================== Queries ====================

export interface ListMoviesQuery {
  q?: string;
  title?: string;
  genre?: string;
  year?: number;
  minRating?: number;
  maxRating?: number;
  limit: number;
  skip: number;
  sortBy: string;

  /** Anything other than desc sorts ascending */
  sortOrder: SortOrder | string;
}

export interface CompoundSearchQuery {
  plot?: string;
  fullplot?: string;
  directors?: string;
  writers?: string;
  cast?: string;
  limit: number;
  skip: number;

  /** Validated against SearchOperator by the pipeline builder */
  searchOperator: SearchOperator | string;
}

export interface VectorSearchQuery {
  q: string;
  limit: number;
}

export interface CommentReportQuery {
  movieId?: string;
  limit: number;
}

// ==================== Results ====================

export interface SearchMoviesResponse {
  movies: Movie[];
  totalCount: number;
}

export interface VectorSearchResult {
  _id: string;
  title: string;
  plot?: string;
  poster?: string;

  /** Present only when the stored year is numeric */
  year: number | null;

  genres?: string[];
  directors?: string[];
  cast?: string[];

  /** Similarity reported by the vector index, higher is closer */
  score: number;
}

export interface RecentComment {
  userName: string;
  userEmail: string;
  text: string;
  date: Date | null;
}

export interface MovieCommentReport {
  _id: string;
  title: string;
  year: number | null;
  genres: string[];
  imdbRating: number | null;
  recentComments: RecentComment[];
  totalComments: number;
}

export interface YearlyStats {
  year: number;
  movieCount: number;

  /** Null when no movie of the year has a numeric rating */
  averageRating: number | null;
  highestRating: number | null;
  lowestRating: number | null;
  totalVotes: number;
}

export interface DirectorStats {
  director: string;
  movieCount: number;
  averageRating: number | null;
}

export interface BatchInsertResult {
  insertedCount: number;
  insertedIds: string[];
}

export interface BatchUpdateResult {
  matchedCount: number;
  modifiedCount: number;
}

export interface DeleteResult {
  deletedCount: number;
}
