/**
 * Adapter factory for the movies API
 */

import { Config, EmbeddingPort, MovieRepositoryPort } from '@mflix/domain';
import { createMongoMovieRepository } from '@mflix/mongodb';
import { createEmbeddingAdapter } from './embedding.js';

export interface Adapters {
  repository: MovieRepositoryPort;
  embedding: EmbeddingPort;
}

export function createAdapters(config: Config): Adapters {
  console.log(`[Adapters] Using MongoDB database ${config.database.dbName}`);
  return {
    repository: createMongoMovieRepository(config),
    embedding: createEmbeddingAdapter(config.embedding),
  };
}

export async function initializeAdapters(adapters: Adapters): Promise<void> {
  await Promise.all([
    adapters.repository.initialize(),
    adapters.embedding.initialize(),
  ]);
}

export async function closeAdapters(adapters: Adapters): Promise<void> {
  await Promise.all([
    adapters.repository.close(),
    adapters.embedding.close(),
  ]);
}
