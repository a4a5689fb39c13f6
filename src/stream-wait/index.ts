export type { StreamWaitOptions, StreamWaiterConfig, StreamEnd } from "./types";
export {
  DEFAULT_SILENCE_TIMEOUT_MS,
  DEFAULT_STREAM_TIMEOUT_MS,
  MIN_POLL_INTERVAL_MS,
  MAX_POLL_INTERVAL_MS,
  derivePollInterval,
  parseWaitOptions,
} from "./types";

export { StreamWaiter, waitForStreamEnd } from "./stream-waiter";
