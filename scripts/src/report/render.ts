import type { Metric, ReportInput } from "lib/report/types.js";

import { writeTextFile } from "../utils/fs.js";

// ── Markdown assembly ───────────────────────────────────────────────

export function renderReport(input: ReportInput): string {
  const lines: string[] = [];
  const w = (...s: string[]) => lines.push(...s);

  w(`# ${input.title}`);
  w(``);

  w(`## Test Environment`);
  w(``);
  w("```", input.systemInfo.trim(), "```");
  w(``);

  w(`## Workload`);
  w(``);
  w(...bullets(input.workloadLines));
  w(``);

  w(`## Benchmark Output`);
  w(``);
  w("```", input.benchOutput.trim(), "```");
  w(``);

  w(`## Metrics`);
  w(``);
  w(`| Metric | Value | Description |`);
  w(`|---|---:|---|`);
  w(...input.metrics.map(metricRow));
  w(``);

  w(`## Conclusions (Draft)`);
  w(``);
  w(...bullets(input.conclusions));

  return `${lines.join("\n")}\n`;
}

function bullets(items: string[]): string[] {
  return items.map((item) => `- ${item}`);
}

function metricRow(metric: Metric): string {
  return `| ${metric.name} | ${metric.value} | ${metric.description} |`;
}

// ── Output ──────────────────────────────────────────────────────────

/** Overwrites `outPath`, creating parent directories as needed. */
export async function writeReport(outPath: string, markdown: string): Promise<void> {
  await writeTextFile(outPath, markdown);
}
