import { fileURLToPath } from 'url';
import { Collection, Document, MongoClient, SearchIndexDescription } from 'mongodb';
import {
  loadConfig,
  errorMessage,
  DEFAULT_TEXT_INDEX,
  DEFAULT_VECTOR_INDEX,
  DEFAULT_EMBEDDING_PATH,
  DEFAULT_EMBEDDING_DIMENSION,
} from '@mflix/domain';

const TEXT_FIELDS = ['plot', 'fullplot', 'directors', 'writers', 'cast'] as const;

/**
 * Atlas Search index over the movie text fields
 */
export function textIndexDescription(name = DEFAULT_TEXT_INDEX): SearchIndexDescription {
  const fields: Document = {};
  for (const field of TEXT_FIELDS) {
    fields[field] = { type: 'string', analyzer: 'lucene.standard' };
  }

  return {
    name,
    type: 'search',
    definition: {
      mappings: {
        dynamic: false,
        fields,
      },
    },
  };
}

/**
 * Atlas Vector Search index over the plot embeddings.
 * numDimensions must match the embedding output dimension.
 */
export function vectorIndexDescription(
  name = DEFAULT_VECTOR_INDEX,
  path = DEFAULT_EMBEDDING_PATH,
  dimensions = DEFAULT_EMBEDDING_DIMENSION
): SearchIndexDescription {
  return {
    name,
    type: 'vectorSearch',
    definition: {
      fields: [
        {
          type: 'vector',
          path,
          numDimensions: dimensions,
          similarity: 'cosine',
        },
      ],
    },
  };
}

/**
 * Create a search index unless one with the same name exists.
 * Returns true when the index was created.
 */
export async function ensureSearchIndex(
  collection: Collection<Document>,
  description: SearchIndexDescription
): Promise<boolean> {
  const name = description.name ?? 'default';

  try {
    const existing = await collection.listSearchIndexes().toArray();
    if (existing.some((index) => index.name === name)) {
      return false;
    }

    await collection.createSearchIndex(description);
    console.log(`[Mongo] Created search index '${name}' on ${collection.collectionName}`);
    return true;
  } catch (error) {
    throw new Error(`Failed to create search index '${name}': ${errorMessage(error)}`, {
      cause: error,
    });
  }
}

export interface SearchIndexTargets {
  movies: Collection<Document>;
  embeddedMovies: Collection<Document>;
}

export interface SearchIndexOptions {
  textIndex?: string;
  vectorIndex?: string;
  embeddingPath?: string;
  dimensions?: number;
}

/**
 * Provision both search indexes the API queries
 */
export async function ensureSearchIndexes(
  targets: SearchIndexTargets,
  options: SearchIndexOptions = {}
): Promise<void> {
  await ensureSearchIndex(targets.movies, textIndexDescription(options.textIndex));
  await ensureSearchIndex(
    targets.embeddedMovies,
    vectorIndexDescription(options.vectorIndex, options.embeddingPath, options.dimensions)
  );
}

// CLI entry point
if (process.argv[1] === fileURLToPath(import.meta.url)) {
  const config = loadConfig();
  const client = new MongoClient(config.database.uri);
  const db = client.db(config.database.dbName);

  ensureSearchIndexes(
    {
      movies: db.collection(config.database.collections.movies),
      embeddedMovies: db.collection(config.database.collections.embeddedMovies),
    },
    {
      textIndex: config.search.textIndex,
      vectorIndex: config.search.vectorIndex,
      embeddingPath: config.search.embeddingPath,
      dimensions: config.embedding.dimension,
    }
  )
    .then(async () => {
      console.log('Search indexes are in place');
      await client.close();
      process.exit(0);
    })
    .catch(async (err) => {
      console.error('Index provisioning failed:', err);
      await client.close();
      process.exit(1);
    });
}
