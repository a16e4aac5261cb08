import { Collection, Document, MongoClient } from 'mongodb';
import {
  MovieRepositoryPort,
  Config,
  Movie,
  MovieInput,
  MovieChanges,
  MovieFilter,
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
  DatabaseError,
  SearchExecutionError,
  AggregationError,
  isAppError,
  errorMessage,
} from '@mflix/domain';
import { decodeId } from './ids.js';
import { buildListQuery, toMongoFilter } from './filters.js';
import {
  buildCompoundSearchPipeline,
  buildVectorSearchPipeline,
  buildRecentCommentsPipeline,
  buildYearlyStatsPipeline,
  buildDirectorStatsPipeline,
} from './pipelines.js';
import {
  readId,
  toMovie,
  toMovieList,
  toSearchMoviesResponse,
  toVectorSearchResult,
  toCommentReport,
  toYearlyStats,
  toDirectorStats,
} from './mappers.js';
import { translateMongoError } from './errors.js';
import { ensureSearchIndexes } from './indexes.js';

export * from './ids.js';
export * from './filters.js';
export * from './pipelines.js';
export * from './mappers.js';
export * from './errors.js';
export * from './indexes.js';

export interface MovieCollections {
  movies: Collection<Document>;
  embeddedMovies: Collection<Document>;
}

export interface MongoRepositoryOptions {
  textIndex?: string;
  vectorIndex?: string;
  embeddingPath?: string;
  candidateMultiplier?: number;
  commentsCollection?: string;

  /** Vector index dimension, used only when creating the index */
  dimensions?: number;

  /** Create missing search indexes during initialize() */
  ensureIndexes?: boolean;
}

/**
 * MongoDB adapter
 *
 * Plain queries go to the movies collection; compound search runs on its
 * Atlas Search index and vector search on embedded_movies.
 *
 * The client is optional so the repository can be driven by collections
 * alone. When one is given, initialize() connects it and close() ends it.
 */
export class MongoMovieRepository implements MovieRepositoryPort {
  constructor(
    private readonly collections: MovieCollections,
    private readonly options: MongoRepositoryOptions = {},
    private readonly client?: MongoClient
  ) {}

  async initialize(): Promise<void> {
    if (this.client) {
      await this.client.connect();
      console.log(`[Mongo] Connected to database ${this.collections.movies.dbName}`);
    }

    if (this.options.ensureIndexes) {
      await ensureSearchIndexes(this.collections, {
        textIndex: this.options.textIndex,
        vectorIndex: this.options.vectorIndex,
        embeddingPath: this.options.embeddingPath,
        dimensions: this.options.dimensions,
      });
    }
  }

  // ==================== Single records ====================

  async findById(id: string): Promise<Movie | null> {
    const _id = decodeId(id);

    return this.run('Database error occurred', async () => {
      const doc = await this.collections.movies.findOne({ _id });
      return doc ? toMovie(doc) : null;
    });
  }

  async create(input: MovieInput): Promise<Movie> {
    return this.run('Database error occurred', async () => {
      const result = await this.collections.movies.insertOne({ ...input });
      if (!result.acknowledged) {
        throw new DatabaseError('Failed to create movie');
      }

      const created = await this.collections.movies.findOne({ _id: result.insertedId });
      if (!created) {
        throw new DatabaseError('Movie was created but could not be retrieved for verification');
      }
      return toMovie(created);
    });
  }

  async update(id: string, changes: MovieChanges): Promise<Movie | null> {
    const _id = decodeId(id);

    return this.run('Database error occurred', async () => {
      const result = await this.collections.movies.updateOne({ _id }, { $set: { ...changes } });
      if (result.matchedCount === 0) {
        return null;
      }

      const updated = await this.collections.movies.findOne({ _id });
      return updated ? toMovie(updated) : null;
    });
  }

  async delete(id: string): Promise<DeleteResult> {
    const _id = decodeId(id);

    return this.run('Database error occurred', async () => {
      const result = await this.collections.movies.deleteOne({ _id });
      return { deletedCount: result.deletedCount };
    });
  }

  async findAndDelete(id: string): Promise<Movie | null> {
    const _id = decodeId(id);

    return this.run('Database error occurred', async () => {
      const deleted = await this.collections.movies.findOneAndDelete({ _id });
      return deleted ? toMovie(deleted) : null;
    });
  }

  // ==================== Batches ====================

  async createMany(inputs: MovieInput[]): Promise<BatchInsertResult> {
    return this.run('Database error occurred', async () => {
      const result = await this.collections.movies.insertMany(inputs.map((input) => ({ ...input })));
      const insertedIds = Object.values(result.insertedIds).map(readId);
      return { insertedCount: insertedIds.length, insertedIds };
    });
  }

  async updateMany(filter: MovieFilter, changes: MovieChanges): Promise<BatchUpdateResult> {
    const query = toMongoFilter(filter);

    return this.run('An error occurred while updating movies', async () => {
      const result = await this.collections.movies.updateMany(query, { $set: { ...changes } });
      return { matchedCount: result.matchedCount, modifiedCount: result.modifiedCount };
    });
  }

  async deleteMany(filter: MovieFilter): Promise<DeleteResult> {
    const query = toMongoFilter(filter);

    return this.run('An error occurred while deleting movies', async () => {
      const result = await this.collections.movies.deleteMany(query);
      return { deletedCount: result.deletedCount };
    });
  }

  // ==================== Listing & search ====================

  async list(query: ListMoviesQuery): Promise<Movie[]> {
    const { filter, sort, skip, limit } = buildListQuery(query);

    return this.run('An error occurred while fetching movies', async () => {
      const docs = await this.collections.movies
        .find(filter)
        .sort(sort)
        .skip(skip)
        .limit(limit)
        .toArray();
      return toMovieList(docs);
    });
  }

  async distinctGenres(): Promise<string[]> {
    return this.run('Database error occurred', async () => {
      const values: unknown[] = await this.collections.movies.distinct('genres');
      return values
        .filter((value): value is string => typeof value === 'string' && value.trim().length > 0)
        .sort();
    });
  }

  async searchCompound(query: CompoundSearchQuery): Promise<SearchMoviesResponse> {
    const pipeline = buildCompoundSearchPipeline(query, { index: this.options.textIndex });

    try {
      const facets = await this.collections.movies.aggregate<Document>(pipeline).toArray();
      return toSearchMoviesResponse(facets);
    } catch (error) {
      throw new SearchExecutionError(
        `An error occurred while performing the search: ${errorMessage(error)}`
      );
    }
  }

  async searchVector(queryEmbedding: number[], limit: number): Promise<VectorSearchResult[]> {
    const pipeline = buildVectorSearchPipeline(queryEmbedding, limit, {
      index: this.options.vectorIndex,
      path: this.options.embeddingPath,
      candidateMultiplier: this.options.candidateMultiplier,
    });

    return this.run('Vector search failed', async () => {
      const docs = await this.collections.embeddedMovies.aggregate<Document>(pipeline).toArray();
      return docs.map(toVectorSearchResult);
    });
  }

  // ==================== Reporting ====================

  async reportRecentComments(query: CommentReportQuery): Promise<MovieCommentReport[]> {
    const pipeline = buildRecentCommentsPipeline({
      movieId: query.movieId !== undefined ? decodeId(query.movieId) : undefined,
      limit: query.limit,
      commentsCollection: this.options.commentsCollection,
    });

    const docs = await this.aggregate(pipeline);
    return docs.map(toCommentReport);
  }

  async reportByYear(): Promise<YearlyStats[]> {
    const docs = await this.aggregate(buildYearlyStatsPipeline());
    return docs.map(toYearlyStats);
  }

  async reportByDirectors(limit: number): Promise<DirectorStats[]> {
    const docs = await this.aggregate(buildDirectorStatsPipeline(limit));
    return docs.map(toDirectorStats);
  }

  async healthCheck(): Promise<boolean> {
    try {
      await this.collections.movies.findOne({}, { projection: { _id: 1 } });
      return true;
    } catch {
      return false;
    }
  }

  async close(): Promise<void> {
    await this.client?.close();
  }

  // ==================== Helpers ====================

  private async run<T>(message: string, operation: () => Promise<T>): Promise<T> {
    try {
      return await operation();
    } catch (error) {
      throw translateMongoError(error, message);
    }
  }

  private async aggregate(pipeline: Document[]): Promise<Document[]> {
    try {
      return await this.collections.movies.aggregate<Document>(pipeline).toArray();
    } catch (error) {
      if (isAppError(error)) throw error;
      throw new AggregationError(
        `Database error occurred during aggregation: ${errorMessage(error)}`
      );
    }
  }
}

/**
 * Build a repository with its own client from configuration
 */
export function createMongoMovieRepository(config: Config): MongoMovieRepository {
  const client = new MongoClient(config.database.uri);
  const db = client.db(config.database.dbName);

  return new MongoMovieRepository(
    {
      movies: db.collection(config.database.collections.movies),
      embeddedMovies: db.collection(config.database.collections.embeddedMovies),
    },
    {
      textIndex: config.search.textIndex,
      vectorIndex: config.search.vectorIndex,
      embeddingPath: config.search.embeddingPath,
      candidateMultiplier: config.search.candidateMultiplier,
      commentsCollection: config.database.collections.comments,
      dimensions: config.embedding.dimension,
      ensureIndexes: config.database.ensureIndexes,
    },
    client
  );
}
