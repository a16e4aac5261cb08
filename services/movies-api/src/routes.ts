/**
 * /api/movies routes
 *
 * Handlers parse their inputs with the zod schemas and delegate to
 * MovieService. Parse failures and service errors propagate to the error
 * handler installed in app.ts.
 */

import { FastifyPluginAsync } from 'fastify';
import { InvalidIdentifierError, isValidMovieId } from '@mflix/domain';
import { MovieService } from './service.js';
import {
  listMoviesQuerySchema,
  compoundSearchQuerySchema,
  vectorSearchQuerySchema,
  commentReportQuerySchema,
  directorReportQuerySchema,
  idParamsSchema,
  movieInputSchema,
  movieChangesSchema,
  movieBatchSchema,
  batchUpdateBodySchema,
  batchDeleteBodySchema,
} from './schemas.js';

export interface MovieRoutesOptions {
  service: MovieService;
}

/**
 * Read the :id parameter, rejecting a malformed identifier before any body
 * is looked at.
 */
function parseId(params: unknown): string {
  const { id } = idParamsSchema.parse(params);
  if (!isValidMovieId(id)) {
    throw new InvalidIdentifierError(id);
  }
  return id;
}

export const movieRoutes: FastifyPluginAsync<MovieRoutesOptions> = async (server, options) => {
  const { service } = options;

  // ==================== Search ====================

  server.get('/search', async (request) => {
    return service.searchMovies(compoundSearchQuerySchema.parse(request.query));
  });

  server.get('/vector-search', async (request) => {
    return service.vectorSearch(vectorSearchQuerySchema.parse(request.query));
  });

  // ==================== Reporting ====================

  server.get('/aggregations/reportingByComments', async (request) => {
    return service.reportRecentComments(commentReportQuerySchema.parse(request.query));
  });

  server.get('/aggregations/reportingByYear', async () => {
    return service.reportByYear();
  });

  server.get('/aggregations/reportingByDirectors', async (request) => {
    const { limit } = directorReportQuerySchema.parse(request.query);
    return service.reportByDirectors(limit);
  });

  // ==================== Reads ====================

  server.get('/genres', async () => {
    return service.getDistinctGenres();
  });

  server.get('/:id', async (request) => {
    const id = parseId(request.params);
    return service.getMovieById(id);
  });

  server.get('/', async (request) => {
    return service.listMovies(listMoviesQuerySchema.parse(request.query));
  });

  // ==================== Writes ====================

  server.post('/', async (request, reply) => {
    const input = movieInputSchema.parse(request.body);
    const response = await service.createMovie(input);
    reply.code(201);
    return response;
  });

  server.post('/batch', async (request, reply) => {
    const inputs = movieBatchSchema.parse(request.body);
    const response = await service.createMovies(inputs);
    reply.code(201);
    return response;
  });

  server.patch('/:id', async (request) => {
    const id = parseId(request.params);
    const changes = movieChangesSchema.parse(request.body);
    return service.updateMovie(id, changes);
  });

  server.patch('/', async (request) => {
    const { filter, update } = batchUpdateBodySchema.parse(request.body);
    return service.updateMovies(filter, update);
  });

  server.delete('/:id', async (request) => {
    const id = parseId(request.params);
    return service.deleteMovie(id);
  });

  server.delete('/', async (request) => {
    const { filter } = batchDeleteBodySchema.parse(request.body);
    return service.deleteMovies(filter);
  });

  server.delete('/:id/find-and-delete', async (request) => {
    const id = parseId(request.params);
    return service.findAndDeleteMovie(id);
  });
};
