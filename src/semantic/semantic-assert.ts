// ============================================================================
// SEMANTIC ASSERT — soft assertions on meaning rather than wording
// ============================================================================

import { z } from "zod";
import type { Logger } from "../shared";
import { EmbeddingError, SimilarityAssertionError, consoleLogger, errorMessage } from "../shared";

import { OpenAIEmbeddingProvider } from "./openai-embeddings";
import { cosineSimilarity, normalizeScore, normalizeText } from "./similarity";
import { DEFAULT_MIN_SCORE, minScoreSchema } from "./types";
import type { EmbeddingProvider, ScoreMode, SemanticAssertConfig, SimilarityResult } from "./types";

const vectorsSchema = z.array(z.array(z.number().finite()).min(1, "empty embedding vector"));

/**
 * Scores two texts in [0, 1] by embedding similarity.
 *
 * Identical non-empty text scores exactly 1, whitespace included, and never
 * reaches the oracle; so does text equal after whitespace normalization. Text
 * that is empty after normalization scores 0 against anything else. Embeddings
 * are cached per text for the lifetime of the instance.
 *
 * A low score is never an error, but `score` rejects with EmbeddingError when the
 * oracle fails or answers with unusable vectors.
 */
export class SemanticAssert {
  readonly minScore: number;
  readonly scoreMode: ScoreMode;
  private readonly provider: EmbeddingProvider;
  private readonly logger: Logger;
  private readonly cache = new Map<string, number[]>();

  constructor(config: SemanticAssertConfig = {}) {
    this.minScore = minScoreSchema.parse(config.minScore ?? DEFAULT_MIN_SCORE);
    this.scoreMode = config.scoreMode ?? "clamp";
    this.provider = config.provider ?? new OpenAIEmbeddingProvider();
    this.logger = config.logger ?? consoleLogger;
  }

  async score(a: string, b: string): Promise<number> {
    if (a === b && a.length > 0) return 1;
    const left = normalizeText(a);
    const right = normalizeText(b);
    if (!left || !right) return 0;
    if (left === right) return 1;

    const [va, vb] = await this.embed([left, right]);
    return normalizeScore(cosineSimilarity(va, vb), this.scoreMode);
  }

  /**
   * Throws SimilarityAssertionError when `score(actual, expected) < minScore`.
   * Resolves with the score otherwise.
   */
  async assertSimilar(actual: string, expected: string, minScore: number = this.minScore): Promise<SimilarityResult> {
    const threshold = minScoreSchema.safeParse(minScore);
    if (!threshold.success) {
      throw new RangeError(`Invalid minScore ${minScore}: ${threshold.error.issues.map(i => i.message).join(", ")}`);
    }

    const score = await this.score(actual, expected);
    if (score < threshold.data) {
      this.logger.warn(`[SemanticAssert] Score ${score.toFixed(4)} below ${threshold.data}`);
      throw new SimilarityAssertionError({ score, minScore: threshold.data, actual, expected });
    }
    this.logger.log(`[SemanticAssert] Score ${score.toFixed(4)} >= ${threshold.data}`);
    return Object.freeze({ score });
  }

  private async embed(texts: [string, string]): Promise<[number[], number[]]> {
    const missing = [...new Set(texts.filter(text => !this.cache.has(text)))];
    if (missing.length > 0) {
      const vectors = await this.fetch(missing);
      missing.forEach((text, i) => {
        const vector = vectors[i];
        if (vector) this.cache.set(text, vector);
      });
    }
    return [this.cached(texts[0]), this.cached(texts[1])];
  }

  private async fetch(texts: string[]): Promise<number[][]> {
    let raw: unknown;
    try {
      raw = await this.provider.embed(texts);
    } catch (error) {
      if (error instanceof EmbeddingError) throw error;
      throw new EmbeddingError(`Embedding oracle failed: ${errorMessage(error)}`, { cause: error });
    }

    const parsed = vectorsSchema.safeParse(raw);
    if (!parsed.success) {
      throw new EmbeddingError(`Embedding oracle returned malformed vectors: ${parsed.error.issues[0]?.message ?? "unknown"}`);
    }
    if (parsed.data.length !== texts.length) {
      throw new EmbeddingError(`Embedding oracle returned ${parsed.data.length} vectors for ${texts.length} texts`);
    }
    return parsed.data;
  }

  private cached(text: string): number[] {
    const vector = this.cache.get(text);
    if (!vector) throw new EmbeddingError(`No embedding available for "${text.slice(0, 40)}"`);
    return vector;
  }
}
