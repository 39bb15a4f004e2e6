import type { DerivedMetrics, EventMap, Metric, MetricKey } from "lib/report/types.js";

import { PERF_EVENTS } from "../constants.js";
import { formatValue } from "./format.js";
import { getValue } from "./parser.js";

export function ratio(numerator: number | null, denominator: number | null): number | null {
  if (numerator === null || denominator === null || denominator === 0) {
    return null;
  }
  return numerator / denominator;
}

export function mpki(misses: number | null, instructions: number | null): number | null {
  if (misses === null || instructions === null || instructions === 0) {
    return null;
  }
  return (1000 * misses) / instructions;
}

export function computeMetrics(events: EventMap): DerivedMetrics {
  const instructions = getValue(events, PERF_EVENTS.instructions);
  const cycles = getValue(events, PERF_EVENTS.cycles);

  return {
    instructions,
    cycles,
    ipc: ratio(instructions, cycles),
    cpi: ratio(cycles, instructions),
    branchMissRate: ratio(getValue(events, PERF_EVENTS.branchMisses), getValue(events, PERF_EVENTS.branches)),
    cacheMissRate: ratio(getValue(events, PERF_EVENTS.cacheMisses), getValue(events, PERF_EVENTS.cacheReferences)),
    l1dMpki: mpki(getValue(events, PERF_EVENTS.l1dMisses), instructions),
    l1iMpki: mpki(getValue(events, PERF_EVENTS.l1iMisses), instructions),
    llcMpki: mpki(getValue(events, PERF_EVENTS.llcMisses), instructions),
    dtlbMpki: mpki(getValue(events, PERF_EVENTS.dtlbMisses), instructions),
    itlbMpki: mpki(getValue(events, PERF_EVENTS.itlbMisses), instructions)
  };
}

interface MetricDefinition {
  key: MetricKey;
  name: string;
  description: string;
  percent?: boolean;
}

const METRIC_TABLE: MetricDefinition[] = [
  { key: "instructions", name: "Instructions", description: "retired instructions" },
  { key: "cycles", name: "Cycles", description: "CPU cycles" },
  { key: "ipc", name: "IPC", description: "instructions per cycle" },
  { key: "cpi", name: "CPI", description: "cycles per instruction" },
  { key: "branchMissRate", name: "Branch miss rate", description: "branch-misses / branches", percent: true },
  { key: "cacheMissRate", name: "Cache miss rate", description: "cache-misses / cache-references", percent: true },
  { key: "l1dMpki", name: "L1D MPKI", description: "L1-dcache-load-misses per 1K instr" },
  { key: "l1iMpki", name: "L1I MPKI", description: "L1-icache-load-misses per 1K instr" },
  { key: "llcMpki", name: "LLC MPKI", description: "LLC-load-misses per 1K instr" },
  { key: "dtlbMpki", name: "dTLB MPKI", description: "dTLB-load-misses per 1K instr" },
  { key: "itlbMpki", name: "iTLB MPKI", description: "iTLB-load-misses per 1K instr" }
];

/** Table rows in report order; percentages are scaled ×100 and suffixed with `%`. */
export function buildMetricRows(derived: DerivedMetrics): Metric[] {
  return METRIC_TABLE.map(({ key, name, description, percent }) => {
    const raw = derived[key];
    const value = percent
      ? formatValue(raw === null ? null : raw * 100, { unit: "%" })
      : formatValue(raw);
    return { key, name, value, description, raw };
  });
}

/** Core events whose absence leaves most of the table at N/A. */
export function findMissingCoreEvents(events: EventMap): string[] {
  return [PERF_EVENTS.instructions, PERF_EVENTS.cycles].filter((name) => getValue(events, name) === null);
}
