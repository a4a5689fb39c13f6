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
  errorMessage,
} from "./errors";

export type { Logger } from "./logger";
export { consoleLogger, silentLogger } from "./logger";

export type { Clock } from "./timing";
export { delay, systemClock, withTimeout } from "./timing";
