export type EventName = string;

export interface EventReading {
  value: number;
  unit: string;
}

/** `null` marks an event perf reported as unsupported, uncounted or unparsable. */
export type EventMap = Map<EventName, EventReading | null>;

export type MetricKey =
  | "instructions"
  | "cycles"
  | "ipc"
  | "cpi"
  | "branchMissRate"
  | "cacheMissRate"
  | "l1dMpki"
  | "l1iMpki"
  | "llcMpki"
  | "dtlbMpki"
  | "itlbMpki";

export type DerivedMetrics = Record<MetricKey, number | null>;

export interface Metric {
  key: MetricKey;
  name: string;
  /** Value as rendered in the table, already scaled and suffixed. */
  value: string;
  description: string;
  raw: number | null;
}

export interface HeuristicThresholds {
  ipcBelow: number;
  branchMissRateAbove: number;
  l1dMpkiAbove: number;
  llcMpkiAbove: number;
}

export interface WorkloadParams {
  workload?: string;
  ops: number;
  trade: number;
}

export interface ReportInput {
  title: string;
  systemInfo: string;
  benchOutput: string;
  workloadLines: string[];
  metrics: Metric[];
  conclusions: string[];
}

export interface MetricsSnapshot {
  schemaVersion: string;
  title: string;
  generatedAt: string;
  reportSha256: string;
  events: Record<EventName, EventReading | null>;
  metrics: Array<Pick<Metric, "key" | "name" | "value" | "raw">>;
  conclusions: string[];
  thresholds: HeuristicThresholds;
}
