import { describe, it, expect, vi } from 'vitest';
import { Collection, Document } from 'mongodb';
import {
  ensureSearchIndex,
  ensureSearchIndexes,
  textIndexDescription,
  vectorIndexDescription,
} from './indexes.js';

function fakeCollection(existing: Document[], name = 'movies') {
  const collection = {
    collectionName: name,
    listSearchIndexes: vi.fn(() => ({ toArray: vi.fn().mockResolvedValue(existing) })),
    createSearchIndex: vi.fn().mockResolvedValue('created'),
  };
  return { collection, handle: collection as unknown as Collection<Document> };
}

describe('search index provisioning', () => {
  it('should describe the text index over the five searchable fields', () => {
    expect(textIndexDescription()).toEqual({
      name: 'movieSearchIndex',
      type: 'search',
      definition: {
        mappings: {
          dynamic: false,
          fields: {
            plot: { type: 'string', analyzer: 'lucene.standard' },
            fullplot: { type: 'string', analyzer: 'lucene.standard' },
            directors: { type: 'string', analyzer: 'lucene.standard' },
            writers: { type: 'string', analyzer: 'lucene.standard' },
            cast: { type: 'string', analyzer: 'lucene.standard' },
          },
        },
      },
    });
  });

  it('should describe a cosine vector index of the embedding dimension', () => {
    expect(vectorIndexDescription()).toEqual({
      name: 'vector_index',
      type: 'vectorSearch',
      definition: {
        fields: [
          {
            type: 'vector',
            path: 'plot_embedding_voyage_3_large',
            numDimensions: 2048,
            similarity: 'cosine',
          },
        ],
      },
    });
  });

  it('should skip an index that already exists', async () => {
    const { collection, handle } = fakeCollection([{ name: 'movieSearchIndex' }]);

    await expect(ensureSearchIndex(handle, textIndexDescription())).resolves.toBe(false);
    expect(collection.createSearchIndex).not.toHaveBeenCalled();
  });

  it('should create a missing index', async () => {
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
    const { collection, handle } = fakeCollection([]);

    await expect(ensureSearchIndex(handle, textIndexDescription())).resolves.toBe(true);
    expect(collection.createSearchIndex).toHaveBeenCalledWith(textIndexDescription());
  });

  it('should name the index when creation fails', async () => {
    const { collection, handle } = fakeCollection([]);
    collection.createSearchIndex.mockRejectedValueOnce(new Error('not supported on this tier'));

    await expect(ensureSearchIndex(handle, vectorIndexDescription())).rejects.toThrow(
      "Failed to create search index 'vector_index': not supported on this tier"
    );
  });

  it('should provision each index on its own collection', async () => {
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
    const movies = fakeCollection([{ name: 'movieSearchIndex' }]);
    const embedded = fakeCollection([], 'embedded_movies');

    await ensureSearchIndexes(
      { movies: movies.handle, embeddedMovies: embedded.handle },
      { dimensions: 1024 }
    );

    expect(movies.collection.createSearchIndex).not.toHaveBeenCalled();
    expect(embedded.collection.createSearchIndex).toHaveBeenCalledWith(
      vectorIndexDescription('vector_index', 'plot_embedding_voyage_3_large', 1024)
    );
  });
});
