// ============================================================================
// SIMILARITY — vector math and text normalization
// ============================================================================

import { EmbeddingError } from "../shared";
import type { ScoreMode } from "./types";

/**
 * Cosine of the angle between two vectors, in [-1, 1]. A zero vector has no
 * direction and scores 0 against anything.
 */
export function cosineSimilarity(a: readonly number[], b: readonly number[]): number {
  if (a.length === 0 || a.length !== b.length) {
    throw new EmbeddingError(`Embedding dimensions do not match (${a.length} vs ${b.length})`);
  }
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

/** Map a cosine into [0, 1]. */
export function normalizeScore(cosine: number, mode: ScoreMode = "clamp"): number {
  const raw = mode === "rescale" ? (cosine + 1) / 2 : cosine;
  return Math.min(1, Math.max(0, raw));
}

/** Collapse whitespace runs and trim, so layout differences do not affect scoring. */
export function normalizeText(text: string): string {
  return text.replace(/\s+/g, " ").trim();
}
