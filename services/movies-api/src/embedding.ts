/**
 * Embedding adapter for the movies API
 * Turns vector search queries into Voyage AI embeddings.
 */

import { z } from 'zod';
import {
  EmbeddingPort,
  EmbeddingConfig,
  EmbeddingInputType,
  MAX_BATCH_SIZE,
  ValidationError,
  VoyageAuthError,
  VoyageAPIError,
  errorMessage,
} from '@mflix/domain';

export function createEmbeddingAdapter(config: EmbeddingConfig): EmbeddingPort {
  return new VoyageEmbeddingAdapter(config);
}

const embeddingResponseSchema = z.object({
  data: z.array(
    z.object({
      embedding: z.array(z.number()),
      index: z.number().optional(),
    })
  ),
});

const errorBodySchema = z.object({ detail: z.string() });

function parseJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}

async function readBody(response: Response): Promise<string> {
  try {
    return await response.text();
  } catch (error) {
    throw new VoyageAPIError(`Failed to generate embedding: ${errorMessage(error)}`, 500);
  }
}

/**
 * Upstream error text: Voyage's `detail` field when present, else the raw body
 */
async function readErrorDetail(response: Response): Promise<string> {
  const text = await readBody(response);
  const body = errorBodySchema.safeParse(parseJson(text));
  if (body.success) {
    return body.data.detail;
  }
  return text || response.statusText || `HTTP ${response.status}`;
}

/**
 * Map a failed Voyage response onto the upstream error classes
 */
export function toVoyageError(status: number, detail: string): VoyageAuthError | VoyageAPIError {
  switch (status) {
    case 401:
      return new VoyageAuthError();
    case 400:
      return new VoyageAPIError(`Invalid request to Voyage AI API: ${detail}`, 400);
    case 429:
      return new VoyageAPIError(`Voyage AI API rate limit exceeded: ${detail}`, 429);
    case 502:
    case 503:
    case 504:
      return new VoyageAPIError(`Voyage AI service unavailable: ${detail}`, 503);
    default:
      return new VoyageAPIError(`Voyage AI API error: ${detail}`, status || 500);
  }
}

export class VoyageEmbeddingAdapter implements EmbeddingPort {
  constructor(private readonly config: EmbeddingConfig) {}

  async initialize(): Promise<void> {
    if (!this.isConfigured()) {
      console.log('[Voyage] VOYAGE_API_KEY not set; vector search disabled');
      return;
    }
    console.log(`[Voyage] Initialized (model=${this.config.model}, dimension=${this.config.dimension})`);
  }

  isConfigured(): boolean {
    return Boolean(this.config.apiKey);
  }

  getModel(): string {
    return this.config.model;
  }

  getDimension(): number {
    return this.config.dimension;
  }

  async embed(text: string, inputType: EmbeddingInputType): Promise<number[]> {
    const [embedding] = await this.embedBatch([text], inputType);
    if (!embedding) {
      throw new VoyageAPIError('Failed to generate embedding: empty response from Voyage AI', 500);
    }
    return embedding;
  }

  async embedBatch(texts: string[], inputType: EmbeddingInputType): Promise<number[][]> {
    if (!this.config.apiKey) {
      throw new VoyageAuthError();
    }
    if (texts.length > MAX_BATCH_SIZE) {
      throw new ValidationError(`At most ${MAX_BATCH_SIZE} texts can be embedded per request`);
    }

    let response: Response;
    try {
      response = await fetch(`${this.config.endpoint}/embeddings`, {
        method: 'POST',
        headers: {
          'Authorization': `Bearer ${this.config.apiKey}`,
          'Content-Type': 'application/json',
        },
        body: JSON.stringify({
          input: texts,
          model: this.config.model,
          input_type: inputType,
          output_dimension: this.config.dimension,
        }),
      });
    } catch (error) {
      throw new VoyageAPIError(`Failed to generate embedding: ${errorMessage(error)}`, 500);
    }

    if (!response.ok) {
      throw toVoyageError(response.status, await readErrorDetail(response));
    }

    const parsed = embeddingResponseSchema.safeParse(parseJson(await readBody(response)));
    if (!parsed.success) {
      throw new VoyageAPIError('Failed to generate embedding: unexpected response from Voyage AI', 500);
    }

    return [...parsed.data.data]
      .sort((a, b) => (a.index ?? 0) - (b.index ?? 0))
      .map((item) => item.embedding);
  }

  async healthCheck(): Promise<boolean> {
    return this.isConfigured();
  }

  async close(): Promise<void> {}
}
