// ============================================================================
// LATENCY TYPES — derived metrics and monitor configuration
// ============================================================================

import type { Logger } from "../shared";
import type { MutationChannelConfig } from "../observation";

/**
 * Read-only view over a closing snapshot. Times are milliseconds on the
 * document clock, measured from the moment the probe was armed.
 */
export interface LatencyMetrics {
  /** Time to first token: first mutation minus arm time; null without mutations. */
  readonly ttftMs: number | null;
  /** Last mutation minus arm time; null without mutations. */
  readonly totalMs: number | null;
  /** Number of content mutations observed. */
  readonly tokenCount: number;
}

export type MonitorPhase = "idle" | "open" | "closed";

export interface LatencyMonitorConfig {
  logger?: Logger;
}

export interface DocumentLatencyMonitorConfig extends LatencyMonitorConfig {
  channel?: MutationChannelConfig;
}
