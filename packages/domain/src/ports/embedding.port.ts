import { EmbeddingInputType } from '../types/enums.js';

/**
 * Embedding port interface for generating vector embeddings
 *
 * Production: Voyage AI embeddings API
 * Tests: in-process fakes
 *
 * Required for vector search. Implementations translate provider failures
 * into VoyageAuthError / VoyageAPIError.
 */
export interface EmbeddingPort {
  /**
   * Initialize the embedding service connection
   */
  initialize(): Promise<void>;

  /**
   * Whether credentials are present. Vector search refuses to run otherwise.
   */
  isConfigured(): boolean;

  /**
   * Get the embedding model name
   */
  getModel(): string;

  /**
   * Get the vector dimension
   */
  getDimension(): number;

  /**
   * Generate embedding for single text
   */
  embed(text: string, inputType: EmbeddingInputType): Promise<number[]>;

  /**
   * Generate embeddings for multiple texts (batch)
   */
  embedBatch(texts: string[], inputType: EmbeddingInputType): Promise<number[][]>;

  /**
   * Health check
   */
  healthCheck(): Promise<boolean>;

  /**
   * Close connection
   */
  close(): Promise<void>;
}

/**
 * Maximum batch size for embedding requests
 */
export const MAX_BATCH_SIZE = 128;
