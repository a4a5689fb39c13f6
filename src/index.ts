/**
 * chat-stream-assert - assertions for streamed chat responses
 *
 * - **stream-wait**: wait until a token-by-token response has stopped changing
 * - **latency**: time-to-first-token and total streaming time around an action
 * - **semantic**: soft assertions on meaning via embedding similarity
 * - **observation**: the in-document mutation channel the latency monitor reads
 */

// Re-export shared
export {
  StreamTestError,
  ElementNotFoundError,
  InvalidHandleError,
  MetricsNotReadyError,
  ObservationConflictError,
  StreamTimeoutError,
  SimilarityAssertionError,
  ContextResponseError,
  EmbeddingError,
  consoleLogger,
  silentLogger,
  systemClock,
} from "./shared";
export type { Logger, Clock } from "./shared";

// Re-export browser
export { By, describeLocator, toPlaywrightSelector, PlaywrightDocument } from "./browser";
export type {
  ElementLocator,
  LocatorStrategy,
  RenderedDocument,
  ElementReader,
  ScriptExecutor,
  PlaywrightElement,
} from "./browser";

// Re-export observation
export { MutationChannel, DEFAULT_BOUNDARY_TIMEOUT_MS } from "./observation";
export type {
  ObservationChannel,
  ObservationHandle,
  MutationSnapshot,
  MutationChannelConfig,
  ProbeState,
} from "./observation";

// Re-export stream-wait
export {
  StreamWaiter,
  waitForStreamEnd,
  DEFAULT_SILENCE_TIMEOUT_MS,
  DEFAULT_STREAM_TIMEOUT_MS,
} from "./stream-wait";
export type { StreamWaitOptions, StreamWaiterConfig, StreamEnd } from "./stream-wait";

// Re-export latency
export { LatencyMonitor, computeLatencyMetrics, describeLatency } from "./latency";
export type { LatencyMetrics, LatencyMonitorConfig, DocumentLatencyMonitorConfig } from "./latency";

// Re-export semantic
export {
  SemanticAssert,
  OpenAIEmbeddingProvider,
  cosineSimilarity,
  resolveEmbeddingConfig,
  DEFAULT_MIN_SCORE,
} from "./semantic";
export type {
  EmbeddingProvider,
  EmbeddingsClient,
  ScoreMode,
  SemanticAssertConfig,
  SimilarityResult,
} from "./semantic";
