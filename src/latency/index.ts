export type {
  LatencyMetrics,
  LatencyMonitorConfig,
  DocumentLatencyMonitorConfig,
  MonitorPhase,
} from "./types";

export { computeLatencyMetrics, describeLatency } from "./metrics";
export { LatencyMonitor } from "./latency-monitor";
