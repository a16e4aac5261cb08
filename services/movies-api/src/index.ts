/**
 * MFlix Movies API Service
 *
 * CRUD, compound text search, semantic vector search and reporting
 * aggregations over the sample_mflix catalogue.
 *
 * Endpoints:
 * - /api/movies/...  (see routes.ts)
 * - GET /health
 * - GET /ready
 */

import 'dotenv/config';
import { loadConfig } from '@mflix/domain';
import { MovieService } from './service.js';
import { createAdapters } from './adapters.js';
import { buildServer } from './app.js';

async function main() {
  console.log('[MoviesAPI] Starting MFlix Movies API Service...');

  const config = loadConfig();
  const adapters = createAdapters(config);
  const movieService = new MovieService(adapters);

  await movieService.initialize();

  const server = await buildServer(movieService, {
    logLevel: config.logging.level,
    corsOrigins: config.server.corsOrigins,
  });

  await server.listen({ port: config.server.port, host: config.server.host });
  console.log(`[MoviesAPI] Server listening on ${config.server.host}:${config.server.port}`);

  const shutdown = async () => {
    console.log('[MoviesAPI] Shutting down...');
    await server.close();
    await movieService.close();
    process.exit(0);
  };

  process.on('SIGTERM', shutdown);
  process.on('SIGINT', shutdown);
}

main().catch((error) => {
  console.error('[MoviesAPI] Fatal error:', error);
  process.exit(1);
});
