// ============================================================================
// SEMANTIC TYPES — embedding oracle seam and scorer configuration
// ============================================================================

import { z } from "zod";
import type { Logger } from "../shared";

/** Threshold used by `assertSimilar` when the caller passes none. */
export const DEFAULT_MIN_SCORE = 0.8;

export const DEFAULT_EMBEDDING_MODEL = "text-embedding-3-small";

/**
 * The external scoring oracle. Returns one vector per input text, in input order.
 */
export interface EmbeddingProvider {
  embed(texts: string[]): Promise<number[][]>;
}

/**
 * How a cosine in [-1, 1] becomes a score in [0, 1].
 * - `clamp`: negative cosines score 0
 * - `rescale`: `(cos + 1) / 2`
 */
export type ScoreMode = "clamp" | "rescale";

export const minScoreSchema = z
  .number()
  .finite()
  .min(0, "minScore must be between 0 and 1")
  .max(1, "minScore must be between 0 and 1");

export interface SemanticAssertConfig {
  /** Defaults to an OpenAIEmbeddingProvider configured from the environment. */
  provider?: EmbeddingProvider;
  minScore?: number;
  scoreMode?: ScoreMode;
  logger?: Logger;
}

/** Outcome of one comparison. Not retained by the scorer. */
export interface SimilarityResult {
  readonly score: number;
}

export interface EmbeddingConfig {
  model: string;
  apiKey?: string;
}
