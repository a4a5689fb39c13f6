// ============================================================================
// LATENCY METRICS — derivation and formatting
// ============================================================================

import type { MutationSnapshot } from "../observation";
import type { LatencyMetrics } from "./types";

export function computeLatencyMetrics(snapshot: MutationSnapshot): LatencyMetrics {
  const { startTime, firstMutationTime, lastMutationTime, mutationCount } = snapshot;
  return Object.freeze({
    ttftMs: firstMutationTime === null ? null : firstMutationTime - startTime,
    totalMs: lastMutationTime === null ? null : lastMutationTime - startTime,
    tokenCount: mutationCount,
  });
}

function formatMs(value: number | null): string {
  return value === null ? "N/A" : `${value.toFixed(1)}ms`;
}

/** e.g. `TTFT 50.0ms, total 500.0ms, 15 mutations` */
export function describeLatency(metrics: LatencyMetrics): string {
  const mutations = metrics.tokenCount === 1 ? "1 mutation" : `${metrics.tokenCount} mutations`;
  return `TTFT ${formatMs(metrics.ttftMs)}, total ${formatMs(metrics.totalMs)}, ${mutations}`;
}
