export * from './types/enums.js';
export * from './types/entities.js';
export * from './types/filters.js';
export * from './ports/movie-repository.port.js';
export * from './ports/embedding.port.js';
export * from './ids.js';
export * from './errors.js';
export * from './response.js';
export * from './config.js';
