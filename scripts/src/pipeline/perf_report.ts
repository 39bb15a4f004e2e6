import { parseArgs } from "node:util";

import type { HeuristicThresholds, Metric } from "lib/report/types.js";

import { resolveReportRuntimeConfig, type ReportRuntimeConfig } from "../config/env.js";
import { loadThresholds } from "../config/thresholds.js";
import { buildMetricRows, computeMetrics, findMissingCoreEvents } from "../perf/calculator.js";
import { deriveConclusions } from "../perf/heuristics.js";
import { parsePerfCsv } from "../perf/parser.js";
import { renderReport, writeReport } from "../report/render.js";
import { buildSnapshot, serializeSnapshot, writeSnapshot } from "../report/snapshot.js";
import { resolveWorkloadLines } from "../report/workload.js";
import { readRequiredTextFile } from "../utils/fs.js";
import { logger } from "../utils/logger.js";

export interface ReportOptions {
  perfPath: string;
  systemPath: string;
  benchPath: string;
  ops: number;
  trade: number;
  workload?: string;
  outPath: string;
  title?: string;
  thresholdsPath?: string;
  jsonPath?: string;
}

export type CliCommand = { kind: "help" } | { kind: "run"; options: ReportOptions };

export const USAGE =
  `Usage: generate_report --perf <csv> --system <txt> --bench <txt> --ops <n> --trade <pct> --out <md> [options]\n\n` +
  `  --perf        perf stat -x, output (CSV)\n` +
  `  --system      system description text\n` +
  `  --bench       benchmark console output\n` +
  `  --ops         operations per iteration (integer)\n` +
  `  --trade       trade percentage (integer)\n` +
  `  --workload    workload description, one item per line\n` +
  `  --out         markdown report path (overwritten)\n` +
  `  --title       report heading\n` +
  `  --thresholds  YAML file overriding heuristic thresholds\n` +
  `  --json        also write a JSON metrics snapshot\n`;

export function parseCliArgs(argv: string[]): CliCommand {
  const { values } = parseArgs({
    args: argv,
    strict: true,
    allowPositionals: false,
    options: {
      perf: { type: "string" },
      system: { type: "string" },
      bench: { type: "string" },
      ops: { type: "string" },
      trade: { type: "string" },
      workload: { type: "string" },
      out: { type: "string" },
      title: { type: "string" },
      thresholds: { type: "string" },
      json: { type: "string" },
      help: { type: "boolean", short: "h" }
    }
  });

  if (values.help) {
    return { kind: "help" };
  }

  return {
    kind: "run",
    options: {
      perfPath: requireArg("perf", values.perf),
      systemPath: requireArg("system", values.system),
      benchPath: requireArg("bench", values.bench),
      ops: parseInteger("ops", requireArg("ops", values.ops)),
      trade: parseInteger("trade", requireArg("trade", values.trade)),
      workload: values.workload,
      outPath: requireArg("out", values.out),
      title: values.title,
      thresholdsPath: values.thresholds,
      jsonPath: values.json
    }
  };
}

function requireArg(name: string, value: string | undefined): string {
  if (value === undefined || value === "") {
    throw new Error(`Missing required argument --${name}`);
  }
  return value;
}

function parseInteger(name: string, raw: string): number {
  const value = Number.parseInt(raw, 10);
  if (!/^[+-]?\d+$/.test(raw.trim()) || !Number.isSafeInteger(value)) {
    throw new Error(`Argument --${name} must be an integer, got "${raw}"`);
  }
  return value;
}

export interface ReportResult {
  markdown: string;
  metrics: Metric[];
  conclusions: string[];
  thresholds: HeuristicThresholds;
}

export async function generatePerfReport(
  options: ReportOptions,
  runtime: ReportRuntimeConfig = resolveReportRuntimeConfig()
): Promise<ReportResult> {
  const perfCsv = await readRequiredTextFile(options.perfPath, "Perf counter file");
  const events = parsePerfCsv(perfCsv);
  logger.debug("Parsed perf counters", { path: options.perfPath, events: events.size });

  const missing = findMissingCoreEvents(events);
  if (missing.length > 0) {
    logger.warn("Core counters unavailable; derived metrics will read N/A", { missing });
  }

  const thresholds = await loadThresholds(options.thresholdsPath ?? runtime.thresholdsPath);
  const derived = computeMetrics(events);
  const metrics = buildMetricRows(derived);
  const conclusions = deriveConclusions(derived, thresholds);

  const systemInfo = await readRequiredTextFile(options.systemPath, "System info file");
  const benchOutput = await readRequiredTextFile(options.benchPath, "Benchmark output file");

  const title = options.title ?? runtime.title;
  const markdown = renderReport({
    title,
    systemInfo,
    benchOutput,
    workloadLines: resolveWorkloadLines({ workload: options.workload, ops: options.ops, trade: options.trade }),
    metrics,
    conclusions
  });

  // Nothing is written until every output has been produced and validated.
  const snapshot = options.jsonPath
    ? await serializeSnapshot(buildSnapshot({ title, markdown, events, metrics, conclusions, thresholds }))
    : null;

  await writeReport(options.outPath, markdown);
  logger.info("Report written", { path: options.outPath, conclusions: conclusions.length });

  if (options.jsonPath && snapshot !== null) {
    await writeSnapshot(options.jsonPath, snapshot);
    logger.info("Metrics snapshot written", { path: options.jsonPath });
  }

  return { markdown, metrics, conclusions, thresholds };
}
