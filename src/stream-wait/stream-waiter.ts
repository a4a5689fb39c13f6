// ============================================================================
// STREAM WAITER — quiescence-based detection of a finished streamed response
// ============================================================================

import type { ElementLocator, ElementReader } from "../browser";
import { describeLocator, parseLocator } from "../browser";
import type { Clock, Logger } from "../shared";
import {
  ElementNotFoundError,
  ObservationConflictError,
  StreamTimeoutError,
  consoleLogger,
  systemClock,
} from "../shared";

import type { StreamEnd, StreamWaitOptions, StreamWaiterConfig } from "./types";
import {
  DEFAULT_SILENCE_TIMEOUT_MS,
  DEFAULT_STREAM_TIMEOUT_MS,
  derivePollInterval,
  parseWaitOptions,
} from "./types";

/**
 * Locators with a wait in flight, shared by every waiter in the process. Keyed by
 * `describeLocator`, so two different locators for the same element are not
 * recognised as a conflict.
 */
const activeWaits = new Set<string>();

interface ResolvedWait {
  silenceTimeoutMs: number;
  timeoutMs: number;
  pollIntervalMs: number;
}

/**
 * Waits until an element's text has stopped changing for a continuous silence
 * window.
 *
 * A streamed response has no end marker visible from outside, so silence is the
 * proxy. A generation that pauses for longer than the window is reported as
 * finished; pick the window with the slowest expected pause in mind.
 *
 * Per tick:
 * 1. Read the text (a vanished element fails with ElementNotFoundError)
 * 2. A change resets the silence clock, and that tick cannot end the wait
 * 3. Otherwise, silence >= window ends the wait
 * 4. Elapsed >= overall timeout fails with StreamTimeoutError
 */
export class StreamWaiter {
  private readonly defaults: StreamWaitOptions;
  private readonly clock: Clock;
  private readonly logger: Logger;

  constructor(config: StreamWaiterConfig = {}) {
    const { clock, logger, ...defaults } = config;
    this.defaults = parseWaitOptions(defaults);
    this.clock = clock ?? systemClock;
    this.logger = logger ?? consoleLogger;
  }

  /** Wait for the stream to end and return the element. */
  async waitForStreamEnd<TElement>(
    document: ElementReader<TElement>,
    locator: ElementLocator,
    options?: StreamWaitOptions
  ): Promise<TElement> {
    const result = await this.waitForStreamText(document, locator, options);
    return result.element;
  }

  /** Wait for the stream to end and return everything the wait observed. */
  async waitForStreamText<TElement>(
    document: ElementReader<TElement>,
    locator: ElementLocator,
    options?: StreamWaitOptions
  ): Promise<StreamEnd<TElement>> {
    const target = parseLocator(locator);
    const settings = this.resolve(options);
    const key = describeLocator(target);

    // Registered before the first await, so a concurrent call always sees it.
    if (activeWaits.has(key)) {
      throw new ObservationConflictError(key, `A stream wait on ${key} is already in progress`);
    }
    activeWaits.add(key);

    try {
      return await this.poll(document, target, settings);
    } finally {
      activeWaits.delete(key);
    }
  }

  private resolve(options?: StreamWaitOptions): ResolvedWait {
    const overrides = parseWaitOptions(options ?? {});
    const silenceTimeoutMs = overrides.silenceTimeoutMs ?? this.defaults.silenceTimeoutMs ?? DEFAULT_SILENCE_TIMEOUT_MS;
    return {
      silenceTimeoutMs,
      timeoutMs: overrides.timeoutMs ?? this.defaults.timeoutMs ?? DEFAULT_STREAM_TIMEOUT_MS,
      pollIntervalMs: overrides.pollIntervalMs ?? this.defaults.pollIntervalMs ?? derivePollInterval(silenceTimeoutMs),
    };
  }

  private async poll<TElement>(
    document: ElementReader<TElement>,
    locator: ElementLocator,
    { silenceTimeoutMs, timeoutMs, pollIntervalMs }: ResolvedWait
  ): Promise<StreamEnd<TElement>> {
    const key = describeLocator(locator);
    const waitStart = this.clock.now();

    const element = await document.resolve(locator);
    if (element === null) {
      throw new ElementNotFoundError(key);
    }

    let lastSeen = await this.read(document, element, key);
    let lastChangeAt = this.clock.now();
    let changeCount = 0;

    for (;;) {
      const before = this.clock.now();
      const untilSilence = silenceTimeoutMs - (before - lastChangeAt);
      const untilTimeout = timeoutMs - (before - waitStart);
      await this.clock.sleep(Math.max(0, Math.min(pollIntervalMs, untilSilence, untilTimeout)));

      const text = await this.read(document, element, key);
      const now = this.clock.now();

      if (text !== lastSeen) {
        lastSeen = text;
        lastChangeAt = now;
        changeCount++;
      } else if (now - lastChangeAt >= silenceTimeoutMs) {
        const elapsedMs = now - waitStart;
        this.logger.log(
          `[StreamWaiter] Stream ended at ${key} after ${elapsedMs.toFixed(0)}ms ` +
          `(${changeCount} changes, ${lastSeen.length} chars)`
        );
        return { element, text: lastSeen, elapsedMs, changeCount };
      }

      if (now - waitStart >= timeoutMs) {
        this.logger.warn(`[StreamWaiter] No ${silenceTimeoutMs}ms silence at ${key} within ${timeoutMs}ms`);
        throw new StreamTimeoutError({ locator: key, timeoutMs, elapsedMs: now - waitStart, lastText: lastSeen });
      }
    }
  }

  private async read<TElement>(document: ElementReader<TElement>, element: TElement, key: string): Promise<string> {
    const text = await document.readText(element);
    if (text === null) {
      throw new ElementNotFoundError(key, "removed from the document while waiting");
    }
    return text;
  }
}

/** One-off wait with default settings. */
export function waitForStreamEnd<TElement>(
  document: ElementReader<TElement>,
  locator: ElementLocator,
  options?: StreamWaiterConfig
): Promise<TElement> {
  const { clock, logger, ...waitOptions } = options ?? {};
  return new StreamWaiter({ clock, logger }).waitForStreamEnd(document, locator, waitOptions);
}
