// ============================================================================
// LATENCY MONITOR — scoped observation around a triggering action
// ============================================================================

import type { ElementLocator, ScriptExecutor } from "../browser";
import { describeLocator } from "../browser";
import type { ObservationChannel, ObservationHandle } from "../observation";
import { MutationChannel } from "../observation";
import type { Logger } from "../shared";
import {
  InvalidHandleError,
  MetricsNotReadyError,
  consoleLogger,
  errorMessage,
} from "../shared";

import { computeLatencyMetrics, describeLatency } from "./metrics";
import type {
  DocumentLatencyMonitorConfig,
  LatencyMetrics,
  LatencyMonitorConfig,
  MonitorPhase,
} from "./types";

/**
 * Measures time-to-first-token and total streaming time for one action.
 *
 * Lifecycle: `idle -> open -> closed`, once. Opening arms the channel; closing
 * takes the final snapshot, freezes the metrics and disarms, on every exit path.
 * Cleanup failures are logged and never replace an error from the action.
 *
 * ```ts
 * const monitor = LatencyMonitor.forDocument(document, By.id("response"));
 * await monitor.measure(async () => {
 *   await sendButton.click();
 *   await waiter.waitForStreamEnd(document, By.id("response"));
 * });
 * monitor.metrics.ttftMs;
 * ```
 */
export class LatencyMonitor {
  private readonly channel: ObservationChannel;
  private readonly locator: ElementLocator;
  private readonly logger: Logger;
  private phase: MonitorPhase = "idle";
  private handle: ObservationHandle | null = null;
  private result: LatencyMetrics | null = null;
  private closeFailure: unknown = null;

  constructor(channel: ObservationChannel, locator: ElementLocator, config: LatencyMonitorConfig = {}) {
    this.channel = channel;
    this.locator = locator;
    this.logger = config.logger ?? consoleLogger;
  }

  /** Monitor backed by a fresh MutationChannel on `document`. */
  static forDocument(
    document: ScriptExecutor,
    locator: ElementLocator,
    config: DocumentLatencyMonitorConfig = {}
  ): LatencyMonitor {
    const channel = new MutationChannel(document, { logger: config.logger, ...config.channel });
    return new LatencyMonitor(channel, locator, { logger: config.logger });
  }

  get state(): MonitorPhase {
    return this.phase;
  }

  /** Metrics of the closed scope. Throws MetricsNotReadyError while idle or open. */
  get metrics(): LatencyMetrics {
    if (this.result) return this.result;
    if (this.phase !== "closed") {
      throw new MetricsNotReadyError(`Latency metrics are only available after the monitor is closed (currently ${this.phase})`);
    }
    throw new MetricsNotReadyError(
      `Latency metrics unavailable: the closing snapshot failed (${errorMessage(this.closeFailure)})`,
      { cause: this.closeFailure }
    );
  }

  /**
   * Open the scope, run `action`, close the scope. Resolves with the action's
   * value; an action error propagates unchanged after cleanup.
   */
  async measure<T>(action: () => Promise<T>): Promise<T> {
    await this.start();
    try {
      return await action();
    } finally {
      await this.stop();
    }
  }

  /** Arm the channel. An arm failure propagates and leaves the monitor idle. */
  async start(): Promise<void> {
    if (this.phase !== "idle") {
      throw new InvalidHandleError(`LatencyMonitor on ${describeLocator(this.locator)} was already ${this.phase}; create a new monitor`);
    }
    this.handle = await this.channel.arm(this.locator);
    this.phase = "open";
  }

  /** Take the final snapshot and disarm. Never throws once the scope is open. */
  async stop(): Promise<void> {
    if (this.phase === "idle" || !this.handle) {
      throw new InvalidHandleError(`LatencyMonitor on ${describeLocator(this.locator)} was never started`);
    }
    if (this.phase === "closed") return;

    const handle = this.handle;
    this.phase = "closed";

    try {
      this.result = computeLatencyMetrics(await this.channel.retrieve(handle));
      this.logger.log(`[LatencyMonitor] ${describeLocator(this.locator)}: ${describeLatency(this.result)}`);
    } catch (error) {
      this.closeFailure = error;
      this.logger.warn(`[LatencyMonitor] Could not read final snapshot for ${handle.id}: ${errorMessage(error)}`);
    }

    try {
      await this.channel.disarm(handle);
    } catch (error) {
      this.logger.warn(`[LatencyMonitor] Could not disarm ${handle.id}: ${errorMessage(error)}`);
    }
  }
}
