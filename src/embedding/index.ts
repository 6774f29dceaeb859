/**
 * Embeddings - vector providers for semantic tool search
 */

export {
  OpenAIEmbeddingProvider,
  cosineSimilarity,
  type EmbeddingProvider,
  type OpenAIEmbeddingConfig,
  type OpenAIEmbeddingsLike,
} from './embedding-provider.js';
