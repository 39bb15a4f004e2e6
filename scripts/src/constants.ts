import type { HeuristicThresholds } from "lib/report/types.js";

export const THRESHOLDS_SCHEMA_PATH = "lib/thresholds.schema.json";
export const SNAPSHOT_SCHEMA_PATH = "lib/perf_metrics.schema.json";
export const SNAPSHOT_SCHEMA_VERSION = "1.0.0";

export const DEFAULT_REPORT_TITLE = "OrderBook Performance Case Study";

export const REPORT_ENV_VARIABLES = {
	thresholdsPath: "PERF_REPORT_THRESHOLDS",
	title: "PERF_REPORT_TITLE"
} as const;

export const UNAVAILABLE_SENTINELS = ["<not supported>", "<not counted>"] as const;

export const PERF_EVENTS = {
	cycles: "cycles",
	instructions: "instructions",
	branches: "branches",
	branchMisses: "branch-misses",
	cacheReferences: "cache-references",
	cacheMisses: "cache-misses",
	l1dMisses: "L1-dcache-load-misses",
	l1iMisses: "L1-icache-load-misses",
	llcMisses: "LLC-load-misses",
	dtlbMisses: "dTLB-load-misses",
	itlbMisses: "iTLB-load-misses"
} as const;

// Rule-of-thumb cut-offs carried over unchanged from earlier case studies.
export const DEFAULT_THRESHOLDS: HeuristicThresholds = {
	ipcBelow: 1.0,
	branchMissRateAbove: 0.03,
	l1dMpkiAbove: 5.0,
	llcMpkiAbove: 1.0
};

export const DEFAULT_WORKLOAD = {
	warmupOrders: 20000,
	maxActiveOrders: 50000,
	priceLevels: 2000
} as const;

export const CONCLUSION_MESSAGES = {
	lowIpc: "IPC is low; execution is likely limited by branches, caches or data dependencies.",
	branchMisses: "Branch misprediction rate is high; control flow may be one of the main bottlenecks.",
	l1dMpki: "L1D MPKI is high; data locality may be insufficient.",
	llcMpki: "LLC MPKI is high; there may be a lot of cross-tier memory traffic.",
	fallback: "No obvious anomaly in the counters; confirm hotspots with a flame graph or sampling profile."
} as const;
