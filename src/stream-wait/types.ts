// ============================================================================
// STREAM WAIT TYPES — options, defaults and results for quiescence waits
// ============================================================================

import { z } from "zod";
import type { Clock, Logger } from "../shared";

/** Quiet period after which a stream is considered finished (ms). */
export const DEFAULT_SILENCE_TIMEOUT_MS = 1_000;

/** Overall budget for a single wait (ms). */
export const DEFAULT_STREAM_TIMEOUT_MS = 30_000;

/** Bounds for the derived polling interval (ms). */
export const MIN_POLL_INTERVAL_MS = 10;
export const MAX_POLL_INTERVAL_MS = 100;

export const streamWaitOptionsSchema = z.object({
  silenceTimeoutMs: z.number().positive().finite().optional(),
  timeoutMs: z.number().positive().finite().optional(),
  pollIntervalMs: z.number().positive().finite().optional(),
});

/** Per-call overrides; anything omitted falls back to the waiter's defaults. */
export type StreamWaitOptions = z.infer<typeof streamWaitOptionsSchema>;

/** Validate wait options. Throws RangeError naming every offending field. */
export function parseWaitOptions(options: StreamWaitOptions): StreamWaitOptions {
  const result = streamWaitOptionsSchema.safeParse(options);
  if (!result.success) {
    const problems = result.error.issues.map(i => `${i.path.join(".")} ${i.message}`);
    throw new RangeError(`Invalid stream wait options: ${problems.join("; ")}`);
  }
  return result.data;
}

export interface StreamWaiterConfig extends StreamWaitOptions {
  /** Controlling-process clock (default: systemClock) */
  clock?: Clock;
  logger?: Logger;
}

/** What a completed wait observed. */
export interface StreamEnd<TElement> {
  element: TElement;
  /** Text at the moment silence was confirmed. */
  text: string;
  /** Controlling-clock time from the start of the wait until silence was confirmed. */
  elapsedMs: number;
  /** Number of polls that saw the text differ from the previous poll. */
  changeCount: number;
}

/**
 * Polling interval derived from the silence window: a tenth of it, kept within
 * [MIN_POLL_INTERVAL_MS, MAX_POLL_INTERVAL_MS].
 */
export function derivePollInterval(silenceTimeoutMs: number): number {
  return Math.min(MAX_POLL_INTERVAL_MS, Math.max(MIN_POLL_INTERVAL_MS, silenceTimeoutMs / 10));
}
