import {
  Movie,
  MovieInput,
  MovieChanges,
  ListMoviesQuery,
  CompoundSearchQuery,
  CommentReportQuery,
  SearchMoviesResponse,
  VectorSearchResult,
  MovieCommentReport,
  YearlyStats,
  DirectorStats,
  BatchInsertResult,
  BatchUpdateResult,
  DeleteResult,
} from '../types/entities.js';
import { MovieFilter } from '../types/filters.js';

/**
 * Movie repository port
 *
 * Production: MongoDB adapter (Atlas Search + Atlas Vector Search)
 *
 * Identifiers cross this boundary in string form. Implementations reject a
 * malformed identifier with InvalidIdentifierError before touching the
 * store, and raise classified errors (DatabaseError and subclasses) for
 * store failures.
 */
export interface MovieRepositoryPort {
  /**
   * Connect to the store
   */
  initialize(): Promise<void>;

  // ==================== Single records ====================

  /**
   * Get movie by ID, null when absent
   */
  findById(id: string): Promise<Movie | null>;

  /**
   * Insert a movie and return it as stored
   */
  create(input: MovieInput): Promise<Movie>;

  /**
   * Apply changes and return the updated movie, null when absent
   */
  update(id: string, changes: MovieChanges): Promise<Movie | null>;

  /**
   * Delete by ID
   */
  delete(id: string): Promise<DeleteResult>;

  /**
   * Atomically fetch and delete, null when absent
   */
  findAndDelete(id: string): Promise<Movie | null>;

  // ==================== Batches ====================

  createMany(inputs: MovieInput[]): Promise<BatchInsertResult>;

  updateMany(filter: MovieFilter, changes: MovieChanges): Promise<BatchUpdateResult>;

  deleteMany(filter: MovieFilter): Promise<DeleteResult>;

  // ==================== Listing & search ====================

  /**
   * Filtered, sorted, paginated listing. Untitled records are dropped.
   */
  list(query: ListMoviesQuery): Promise<Movie[]>;

  /**
   * Distinct non-empty genre names, sorted
   */
  distinctGenres(): Promise<string[]>;

  /**
   * Multi-field compound text search with a total count
   */
  searchCompound(query: CompoundSearchQuery): Promise<SearchMoviesResponse>;

  /**
   * Nearest neighbours of a query embedding
   */
  searchVector(queryEmbedding: number[], limit: number): Promise<VectorSearchResult[]>;

  // ==================== Reporting ====================

  reportRecentComments(query: CommentReportQuery): Promise<MovieCommentReport[]>;

  reportByYear(): Promise<YearlyStats[]>;

  reportByDirectors(limit: number): Promise<DirectorStats[]>;

  /**
   * Health check
   */
  healthCheck(): Promise<boolean>;

  /**
   * Close connection
   */
  close(): Promise<void>;
}
