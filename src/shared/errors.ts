// ============================================================================
// ERRORS — failure taxonomy shared by every component
// ============================================================================

/** Base class so callers can catch everything this package raises in one place. */
export class StreamTestError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** The locator resolved to nothing, at arm time or while a wait was in progress. */
export class ElementNotFoundError extends StreamTestError {
  readonly locator: string;

  constructor(locator: string, detail?: string) {
    super(`Element not found: ${locator}${detail ? ` (${detail})` : ""}`);
    this.locator = locator;
  }
}

/** The observation handle was never armed on this channel, or has been disposed. */
export class InvalidHandleError extends StreamTestError {}

/** Monitor metrics were read before the scope closed, or the closing snapshot failed. */
export class MetricsNotReadyError extends StreamTestError {}

/** A second observation was requested for an element that already has a live one. */
export class ObservationConflictError extends StreamTestError {
  readonly locator: string;

  constructor(locator: string, message: string) {
    super(message);
    this.locator = locator;
  }
}

/** Silence was never reached within the overall budget. */
export class StreamTimeoutError extends StreamTestError {
  readonly locator: string;
  readonly timeoutMs: number;
  readonly elapsedMs: number;
  readonly lastText: string;

  constructor(details: { locator: string; timeoutMs: number; elapsedMs: number; lastText: string }) {
    super(
      `Stream at ${details.locator} did not go quiet within ${details.timeoutMs}ms ` +
      `(last text: "${details.lastText.slice(0, 80)}")`
    );
    this.locator = details.locator;
    this.timeoutMs = details.timeoutMs;
    this.elapsedMs = details.elapsedMs;
    this.lastText = details.lastText;
  }
}

/** The actual text is not close enough in meaning to the expected text. */
export class SimilarityAssertionError extends StreamTestError {
  readonly score: number;
  readonly minScore: number;
  readonly actual: string;
  readonly expected: string;

  constructor(details: { score: number; minScore: number; actual: string; expected: string }) {
    super(
      `Semantic similarity ${details.score.toFixed(4)} is below the minimum ${details.minScore.toFixed(4)}\n` +
      `  actual:   "${details.actual.slice(0, 200)}"\n` +
      `  expected: "${details.expected.slice(0, 200)}"`
    );
    this.score = details.score;
    this.minScore = details.minScore;
    this.actual = details.actual;
    this.expected = details.expected;
  }
}

/** The rendered document answered with something the channel does not understand. */
export class ContextResponseError extends StreamTestError {}

/** The embedding oracle failed or returned unusable vectors. */
export class EmbeddingError extends StreamTestError {}

/** Render an unknown thrown value as a message. */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
