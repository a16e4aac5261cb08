/**
 * Configuration for the movies API
 *
 * Everything comes from environment variables. The HTTP service loads a
 * .env file into the environment before calling loadConfig().
 */

export interface Config {
  /** HTTP server configuration */
  server: ServerConfig;

  /** Document store configuration */
  database: DatabaseConfig;

  /** Embedding provider configuration */
  embedding: EmbeddingConfig;

  /** Search index configuration */
  search: SearchConfig;

  /** Logging configuration */
  logging: LoggingConfig;
}

export interface ServerConfig {
  port: number;
  host: string;

  /** Origins allowed by CORS */
  corsOrigins: string[];
}

export interface DatabaseConfig {
  /** MongoDB connection string */
  uri: string;

  /** Database holding the movie collections */
  dbName: string;

  collections: {
    movies: string;
    comments: string;
    /** Movies carrying precomputed plot embeddings */
    embeddedMovies: string;
  };

  /** Create the search and vector indexes on startup when missing */
  ensureIndexes: boolean;
}

export interface EmbeddingConfig {
  /** Voyage AI API key; vector search is unavailable without it */
  apiKey?: string;

  /** Voyage AI API base URL */
  endpoint: string;

  /** Embedding model name */
  model: string;

  /** Output dimension; must match the vector index */
  dimension: number;
}

export interface SearchConfig {
  /** Atlas Search index over the movie text fields */
  textIndex: string;

  /** Atlas Vector Search index over the plot embeddings */
  vectorIndex: string;

  /** Field holding the plot embedding */
  embeddingPath: string;

  /** Candidates considered per requested result */
  candidateMultiplier: number;
}

export interface LoggingConfig {
  level: string;
}

export const DEFAULT_MOVIES_COLLECTION = 'movies';
export const DEFAULT_COMMENTS_COLLECTION = 'comments';
export const DEFAULT_EMBEDDED_MOVIES_COLLECTION = 'embedded_movies';
export const DEFAULT_TEXT_INDEX = 'movieSearchIndex';
export const DEFAULT_VECTOR_INDEX = 'vector_index';
export const DEFAULT_EMBEDDING_PATH = 'plot_embedding_voyage_3_large';
export const DEFAULT_EMBEDDING_MODEL = 'voyage-3-large';
export const DEFAULT_EMBEDDING_DIMENSION = 2048;
export const DEFAULT_CANDIDATE_MULTIPLIER = 20;

/**
 * Load configuration from environment variables
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  return {
    server: {
      port: parseInt(env.PORT || '3001', 10),
      host: env.HOST || '0.0.0.0',
      corsOrigins: (env.CORS_ORIGINS || 'http://localhost:3000,http://localhost:3001')
        .split(',')
        .map((origin) => origin.trim())
        .filter((origin) => origin.length > 0),
    },

    database: {
      uri: requireEnv(env, 'MONGO_URI'),
      dbName: env.MONGO_DB || 'sample_mflix',
      collections: {
        movies: DEFAULT_MOVIES_COLLECTION,
        comments: DEFAULT_COMMENTS_COLLECTION,
        embeddedMovies: DEFAULT_EMBEDDED_MOVIES_COLLECTION,
      },
      ensureIndexes: env.MONGO_ENSURE_INDEXES !== 'false',
    },

    embedding: {
      apiKey: env.VOYAGE_API_KEY?.trim() || undefined,
      endpoint: env.VOYAGE_API_URL || 'https://api.voyageai.com/v1',
      model: env.VOYAGE_MODEL || DEFAULT_EMBEDDING_MODEL,
      dimension: parseInt(env.VOYAGE_OUTPUT_DIMENSION || String(DEFAULT_EMBEDDING_DIMENSION), 10),
    },

    search: {
      textIndex: DEFAULT_TEXT_INDEX,
      vectorIndex: DEFAULT_VECTOR_INDEX,
      embeddingPath: DEFAULT_EMBEDDING_PATH,
      candidateMultiplier: DEFAULT_CANDIDATE_MULTIPLIER,
    },

    logging: {
      level: env.LOG_LEVEL?.toLowerCase() || 'info',
    },
  };
}

function requireEnv(env: NodeJS.ProcessEnv, name: string): string {
  const value = env[name];
  if (!value) {
    throw new Error(`Required environment variable ${name} is not set`);
  }
  return value;
}
