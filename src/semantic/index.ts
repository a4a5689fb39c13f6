export type {
  EmbeddingProvider,
  EmbeddingConfig,
  ScoreMode,
  SemanticAssertConfig,
  SimilarityResult,
} from "./types";
export { DEFAULT_MIN_SCORE, DEFAULT_EMBEDDING_MODEL, minScoreSchema } from "./types";

export { resolveEmbeddingConfig } from "./config";
export { cosineSimilarity, normalizeScore, normalizeText } from "./similarity";
export type { EmbeddingsClient, OpenAIEmbeddingProviderConfig } from "./openai-embeddings";
export { OpenAIEmbeddingProvider } from "./openai-embeddings";
export { SemanticAssert } from "./semantic-assert";
