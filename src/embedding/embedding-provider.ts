import OpenAI from 'openai';

/**
 * Turns text into a dense vector for semantic tool search
 */
export interface EmbeddingProvider {
  readonly name: string;
  readonly model: string;

  embed(text: string): Promise<number[]>;
}

/**
 * Cosine similarity of two vectors; 0 when either is all zeros or the
 * dimensions differ.
 */
export function cosineSimilarity(a: ArrayLike<number>, b: ArrayLike<number>): number {
  if (a.length !== b.length || a.length === 0) return 0;

  let dot = 0;
  let normA = 0;
  let normB = 0;
  for (let i = 0; i < a.length; i++) {
    const x = a[i] ?? 0;
    const y = b[i] ?? 0;
    dot += x * y;
    normA += x * x;
    normB += y * y;
  }

  if (normA === 0 || normB === 0) return 0;
  return dot / (Math.sqrt(normA) * Math.sqrt(normB));
}

export interface OpenAIEmbeddingConfig {
  /** Embedding model, e.g. "text-embedding-3-small" */
  readonly model: string;
  readonly apiKey?: string;
  /** Any OpenAI-compatible endpoint, including the /v1 prefix */
  readonly baseUrl?: string;
}

/**
 * The part of the `openai` client the provider uses
 */
export interface OpenAIEmbeddingsLike {
  embeddings: {
    create(params: { model: string; input: string }): Promise<{ data: Array<{ embedding: number[] }> }>;
  };
}

/**
 * Embedding provider backed by an OpenAI-compatible /embeddings endpoint.
 */
export class OpenAIEmbeddingProvider implements EmbeddingProvider {
  readonly name = 'openai';
  readonly model: string;

  private readonly client: OpenAIEmbeddingsLike;

  constructor(config: OpenAIEmbeddingConfig, client?: OpenAIEmbeddingsLike) {
    this.model = config.model;
    this.client = client ?? new OpenAI({ apiKey: config.apiKey, baseURL: config.baseUrl });
  }

  async embed(text: string): Promise<number[]> {
    const response = await this.client.embeddings.create({ model: this.model, input: text });
    const first = response.data[0];
    if (!first) {
      throw new Error(`Embedding endpoint returned no vectors for model "${this.model}"`);
    }
    return first.embedding;
  }
}
