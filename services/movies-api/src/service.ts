/**
 * Movie Service Implementation
 *
 * Orchestrates repository and embedding calls for each endpoint and wraps
 * the outcome in a success envelope. Failures are raised as classified
 * errors and rendered by the HTTP layer.
 */

import {
  EmbeddingInputType,
  Movie,
  MovieInput,
  MovieChanges,
  MovieFilter,
  ListMoviesQuery,
  CompoundSearchQuery,
  VectorSearchQuery,
  CommentReportQuery,
  SearchMoviesResponse,
  VectorSearchResult,
  MovieCommentReport,
  YearlyStats,
  DirectorStats,
  BatchInsertResult,
  BatchUpdateResult,
  DeleteResult,
  SuccessResponse,
  NotFoundError,
  ServiceUnavailableError,
  SearchExecutionError,
  ValidationError,
  createSuccessResponse,
  errorMessage,
  isEmptyFilter,
  isVoyageError,
} from '@mflix/domain';
import { Adapters, initializeAdapters, closeAdapters } from './adapters.js';

export const VECTOR_SEARCH_UNAVAILABLE_MESSAGE =
  'Vector search unavailable: VOYAGE_API_KEY not configured. Please add your API key to the .env file';

export class MovieService {
  private adapters: Adapters;

  constructor(adapters: Adapters) {
    this.adapters = adapters;
  }

  async initialize(): Promise<void> {
    await initializeAdapters(this.adapters);
    console.log('[MovieService] Service initialized');
  }

  // ==================== Search ====================

  async searchMovies(query: CompoundSearchQuery): Promise<SuccessResponse<SearchMoviesResponse>> {
    const result = await this.adapters.repository.searchCompound(query);
    return createSuccessResponse(
      result,
      `Found ${result.totalCount} movies matching the search criteria.`
    );
  }

  /**
   * Embed the query, then find the nearest plots.
   *
   * Voyage failures keep their own status; anything else in the flow is
   * reported as a search failure.
   */
  async vectorSearch(query: VectorSearchQuery): Promise<SuccessResponse<VectorSearchResult[]>> {
    const { embedding, repository } = this.adapters;

    if (!embedding.isConfigured()) {
      throw new ServiceUnavailableError(VECTOR_SEARCH_UNAVAILABLE_MESSAGE);
    }

    let results: VectorSearchResult[];
    try {
      const vector = await embedding.embed(query.q, EmbeddingInputType.QUERY);
      results = await repository.searchVector(vector, query.limit);
    } catch (error) {
      if (isVoyageError(error)) {
        throw error;
      }
      throw new SearchExecutionError(`Error performing vector search: ${errorMessage(error)}`);
    }

    return createSuccessResponse(
      results,
      `Found ${results.length} similar movies for query: '${query.q}'`
    );
  }

  // ==================== Reads ====================

  async getDistinctGenres(): Promise<SuccessResponse<string[]>> {
    const genres = await this.adapters.repository.distinctGenres();
    return createSuccessResponse(genres, `Found ${genres.length} distinct genres`);
  }

  async getMovieById(id: string): Promise<SuccessResponse<Movie>> {
    const movie = await this.adapters.repository.findById(id);
    if (!movie) {
      throw new NotFoundError(`No movie found with ID: ${id}`);
    }
    return createSuccessResponse(movie, 'Movie retrieved successfully');
  }

  async listMovies(query: ListMoviesQuery): Promise<SuccessResponse<Movie[]>> {
    const movies = await this.adapters.repository.list(query);
    return createSuccessResponse(movies, `Found ${movies.length} movies.`);
  }

  // ==================== Writes ====================

  async createMovie(input: MovieInput): Promise<SuccessResponse<Movie>> {
    const movie = await this.adapters.repository.create(input);
    return createSuccessResponse(movie, `Movie '${input.title}' created successfully`);
  }

  async createMovies(inputs: MovieInput[]): Promise<SuccessResponse<BatchInsertResult>> {
    if (inputs.length === 0) {
      throw new ValidationError('Request body must be a non-empty list of movies.');
    }

    const result = await this.adapters.repository.createMany(inputs);
    return createSuccessResponse(result, `Successfully created ${result.insertedCount} movies.`);
  }

  async updateMovie(id: string, changes: MovieChanges): Promise<SuccessResponse<Movie>> {
    const fieldCount = Object.keys(changes).length;
    if (fieldCount === 0) {
      throw new ValidationError('No valid fields provided for update.');
    }

    const movie = await this.adapters.repository.update(id, changes);
    if (!movie) {
      throw new NotFoundError(`No movie with that _id was found: ${id}`);
    }
    return createSuccessResponse(movie, `Movie updated successfully. Modified ${fieldCount} fields.`);
  }

  async updateMovies(
    filter: MovieFilter,
    changes: MovieChanges
  ): Promise<SuccessResponse<BatchUpdateResult>> {
    if (isEmptyFilter(filter) || Object.keys(changes).length === 0) {
      throw new ValidationError('Both filter and update objects are required');
    }

    const result = await this.adapters.repository.updateMany(filter, changes);
    return createSuccessResponse(
      result,
      `Update operation completed. Matched ${result.matchedCount} movie(s), modified ${result.modifiedCount} movie(s).`
    );
  }

  async deleteMovie(id: string): Promise<SuccessResponse<DeleteResult>> {
    const result = await this.adapters.repository.delete(id);
    if (result.deletedCount === 0) {
      return createSuccessResponse(result, `No movie found with ID: ${id}. Nothing was deleted.`);
    }
    return createSuccessResponse(result, 'Movie deleted successfully');
  }

  async deleteMovies(filter: MovieFilter): Promise<SuccessResponse<DeleteResult>> {
    if (isEmptyFilter(filter)) {
      throw new ValidationError('Filter object is required and cannot be empty.');
    }

    const result = await this.adapters.repository.deleteMany(filter);
    return createSuccessResponse(
      result,
      `Delete operation completed. Removed ${result.deletedCount} movies.`
    );
  }

  async findAndDeleteMovie(id: string): Promise<SuccessResponse<Movie>> {
    const movie = await this.adapters.repository.findAndDelete(id);
    if (!movie) {
      throw new NotFoundError(`No movie found with ID: ${id}`);
    }
    return createSuccessResponse(movie, 'Movie found and deleted successfully');
  }

  // ==================== Reporting ====================

  async reportRecentComments(
    query: CommentReportQuery
  ): Promise<SuccessResponse<MovieCommentReport[]>> {
    const reports = await this.adapters.repository.reportRecentComments(query);
    const totalComments = reports.reduce((sum, report) => sum + report.totalComments, 0);

    return createSuccessResponse(
      reports,
      `Found ${totalComments} comments from movie${reports.length !== 1 ? 's' : ''}`
    );
  }

  async reportByYear(): Promise<SuccessResponse<YearlyStats[]>> {
    const stats = await this.adapters.repository.reportByYear();
    return createSuccessResponse(stats, `Aggregated statistics for ${stats.length} years`);
  }

  async reportByDirectors(limit: number): Promise<SuccessResponse<DirectorStats[]>> {
    const stats = await this.adapters.repository.reportByDirectors(limit);
    return createSuccessResponse(stats, `Found ${stats.length} directors with most movies`);
  }

  // ==================== Lifecycle ====================

  async healthCheck(): Promise<boolean> {
    return this.adapters.repository.healthCheck();
  }

  async close(): Promise<void> {
    await closeAdapters(this.adapters);
  }
}
