#!/usr/bin/env node
/**
 * generate_report.ts — CLI that turns a `perf stat -x,` capture plus the
 * matching system and benchmark text into a markdown case-study report.
 *
 * Usage:
 *   npx tsx scripts/src/generate_report.ts \
 *     --perf perf-orderbook/perf-stat.csv \
 *     --system perf-orderbook/system.txt \
 *     --bench perf-orderbook/bench_output.txt \
 *     --ops 50000 --trade 10 \
 *     --out perf-orderbook/orderbook_case_study.md
 */

import { generatePerfReport, parseCliArgs, USAGE } from "./pipeline/perf_report.js";
import { logger } from "./utils/logger.js";

async function main(): Promise<void> {
  const command = parseCliArgs(process.argv.slice(2));
  if (command.kind === "help") {
    console.log(USAGE);
    return;
  }
  await generatePerfReport(command.options);
}

void main().catch((error: unknown) => {
  logger.error("Failed to generate report", { error: error instanceof Error ? error.message : String(error) });
  if (error instanceof Error && error.stack) {
    console.error(error.stack);
  }
  process.exitCode = 1;
});
