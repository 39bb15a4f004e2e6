import type { EventMap, EventReading, HeuristicThresholds, Metric, MetricsSnapshot } from "lib/report/types.js";

import { SNAPSHOT_SCHEMA_VERSION } from "../constants.js";
import { validateSnapshot } from "../contracts/validators.js";
import { writeTextFile } from "../utils/fs.js";
import { computeSha256, stringifyDeterministic } from "./deterministic.js";

export interface SnapshotInput {
  title: string;
  markdown: string;
  events: EventMap;
  metrics: Metric[];
  conclusions: string[];
  thresholds: HeuristicThresholds;
  generatedAt?: Date;
}

export function buildSnapshot(input: SnapshotInput): MetricsSnapshot {
  return {
    schemaVersion: SNAPSHOT_SCHEMA_VERSION,
    title: input.title,
    generatedAt: (input.generatedAt ?? new Date()).toISOString(),
    reportSha256: computeSha256(input.markdown),
    events: Object.fromEntries(
      [...input.events].map(([name, reading]): [string, EventReading | null] => [name, finiteReading(reading)])
    ),
    metrics: input.metrics.map(({ key, name, value, raw }) => ({ key, name, value, raw })),
    conclusions: [...input.conclusions],
    thresholds: { ...input.thresholds }
  };
}

// Counters that overflow to Infinity are unavailable, as in the table.
function finiteReading(reading: EventReading | null): EventReading | null {
  return reading !== null && Number.isFinite(reading.value) ? { ...reading } : null;
}

/** Serializes and schema-checks a snapshot; throws listing the ajv errors. */
export async function serializeSnapshot(snapshot: MetricsSnapshot): Promise<string> {
  const serialized = stringifyDeterministic(snapshot);
  const { errors } = await validateSnapshot(JSON.parse(serialized));
  if (errors.length > 0) {
    throw new Error(`Metrics snapshot failed validation: ${errors.join("; ")}`);
  }
  return serialized;
}

export async function writeSnapshot(path: string, serialized: string): Promise<void> {
  await writeTextFile(path, serialized);
}
