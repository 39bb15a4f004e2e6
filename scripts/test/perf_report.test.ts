import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { mkdtemp, readFile, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import fsExtra from "fs-extra";

import { CONCLUSION_MESSAGES, DEFAULT_THRESHOLDS } from "../src/constants.js";
import { generatePerfReport, parseCliArgs, type ReportOptions } from "../src/pipeline/perf_report.js";
import { computeSha256 } from "../src/report/deterministic.js";

const REQUIRED = [
  "--perf", "perf.csv",
  "--system", "system.txt",
  "--bench", "bench.txt",
  "--ops", "50000",
  "--trade", "10",
  "--out", "report.md"
];

describe("parseCliArgs", () => {
  it("parses the required arguments", () => {
    expect(parseCliArgs(REQUIRED)).toEqual({
      kind: "run",
      options: {
        perfPath: "perf.csv",
        systemPath: "system.txt",
        benchPath: "bench.txt",
        ops: 50000,
        trade: 10,
        workload: undefined,
        outPath: "report.md",
        title: undefined,
        thresholdsPath: undefined,
        jsonPath: undefined
      }
    });
  });

  it("passes optional arguments through", () => {
    const command = parseCliArgs([...REQUIRED, "--workload", "line one\nline two", "--json", "m.json", "--title", "T"]);
    expect(command.kind).toBe("run");
    if (command.kind === "run") {
      expect(command.options.workload).toBe("line one\nline two");
      expect(command.options.jsonPath).toBe("m.json");
      expect(command.options.title).toBe("T");
    }
  });

  it("rejects a missing required argument", () => {
    expect(() => parseCliArgs(REQUIRED.slice(0, -2))).toThrow("Missing required argument --out");
  });

  it("rejects a non-integer count", () => {
    const args = [...REQUIRED];
    args[args.indexOf("--ops") + 1] = "5e4";
    expect(() => parseCliArgs(args)).toThrow('Argument --ops must be an integer, got "5e4"');
  });

  it("rejects counts beyond the safe integer range", () => {
    const args = [...REQUIRED];
    args[args.indexOf("--trade") + 1] = "9007199254740993";
    expect(() => parseCliArgs(args)).toThrow('Argument --trade must be an integer, got "9007199254740993"');
  });

  it("rejects unknown flags", () => {
    expect(() => parseCliArgs([...REQUIRED, "--verbose"])).toThrow();
  });

  it("recognises --help", () => {
    expect(parseCliArgs(["--help"])).toEqual({ kind: "help" });
  });
});

describe("generatePerfReport", () => {
  let dir: string;
  let options: ReportOptions;
  const runtime = { title: "Test Report", thresholdsPath: null };

  beforeEach(async () => {
    vi.spyOn(console, "log").mockImplementation(() => undefined);
    vi.spyOn(console, "warn").mockImplementation(() => undefined);
    dir = await mkdtemp(join(tmpdir(), "perf-report-"));
    await writeFile(
      join(dir, "perf.csv"),
      [
        "# started on Mon Oct 19 10:00:00 2026",
        "",
        "1000000,,instructions,500000,100.00,,",
        "2000000,,cycles,500000,100.00,,",
        "<not supported>,,LLC-load-misses,0,100.00,,"
      ].join("\n")
    );
    await writeFile(join(dir, "system.txt"), "host: test-box\n");
    await writeFile(join(dir, "bench.txt"), "BM_OrderBookWorkload 1234 ns\n");
    options = {
      perfPath: join(dir, "perf.csv"),
      systemPath: join(dir, "system.txt"),
      benchPath: join(dir, "bench.txt"),
      ops: 50000,
      trade: 10,
      outPath: join(dir, "out", "report.md")
    };
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await fsExtra.remove(dir);
  });

  it("writes the markdown report", async () => {
    const result = await generatePerfReport(options, runtime);
    const written = await readFile(options.outPath, "utf8");

    expect(written).toBe(result.markdown);
    expect(written.startsWith("# Test Report\n")).toBe(true);
    expect(written).toContain("| IPC | 0.500 | instructions per cycle |\n");
    expect(written).toContain("| CPI | 2.000 | cycles per instruction |\n");
    expect(written).toContain("| LLC MPKI | N/A | LLC-load-misses per 1K instr |\n");
    expect(result.conclusions).toEqual([CONCLUSION_MESSAGES.lowIpc]);
  });

  it("renders the default workload from ops and trade", async () => {
    const { markdown } = await generatePerfReport(options, runtime);
    const section = markdown.slice(
      markdown.indexOf("## Workload\n\n") + "## Workload\n\n".length,
      markdown.indexOf("\n\n## Benchmark Output")
    );

    expect(section).toBe(
      [
        "- add/delete split evenly, trade share 10%",
        "- Operations per iteration: 50000",
        "- Warm-up orders: 20000, max active orders: 50000, price levels: 2000"
      ].join("\n")
    );
  });

  it("overwrites an existing report", async () => {
    await fsExtra.outputFile(options.outPath, "stale");
    await generatePerfReport({ ...options, title: "Fresh" }, runtime);
    expect((await readFile(options.outPath, "utf8")).startsWith("# Fresh\n")).toBe(true);
  });

  it("writes a validated metrics snapshot", async () => {
    const jsonPath = join(dir, "out", "metrics.json");
    const { markdown } = await generatePerfReport({ ...options, jsonPath }, runtime);
    const snapshot = JSON.parse(await readFile(jsonPath, "utf8"));

    expect(snapshot.schemaVersion).toBe("1.0.0");
    expect(snapshot.title).toBe("Test Report");
    expect(snapshot.reportSha256).toBe(computeSha256(markdown));
    expect(snapshot.events).toEqual({
      cycles: { unit: "", value: 2000000 },
      instructions: { unit: "", value: 1000000 },
      "LLC-load-misses": null
    });
    expect(snapshot.metrics[2]).toEqual({ key: "ipc", name: "IPC", raw: 0.5, value: "0.500" });
    expect(snapshot.conclusions).toEqual([CONCLUSION_MESSAGES.lowIpc]);
    expect(snapshot.thresholds).toEqual(DEFAULT_THRESHOLDS);
  });

  it("records overflowing counters as unavailable in the snapshot", async () => {
    await writeFile(join(dir, "perf.csv"), "1000000,,instructions\n1e400,,cycles\n");
    const jsonPath = join(dir, "out", "metrics.json");

    const { markdown } = await generatePerfReport({ ...options, jsonPath }, runtime);
    const snapshot = JSON.parse(await readFile(jsonPath, "utf8"));

    expect(snapshot.events).toEqual({ cycles: null, instructions: { unit: "", value: 1000000 } });
    expect(markdown).toContain("| Cycles | N/A | CPU cycles |\n");
    expect(markdown).toContain("| CPI | N/A | cycles per instruction |\n");
    expect(await readFile(options.outPath, "utf8")).toBe(markdown);
  });

  it("applies a thresholds override file", async () => {
    const thresholdsPath = join(dir, "thresholds.yaml");
    await writeFile(thresholdsPath, "ipcBelow: 0.25\n");

    const { conclusions } = await generatePerfReport({ ...options, thresholdsPath }, runtime);
    expect(conclusions).toEqual([CONCLUSION_MESSAGES.fallback]);
  });

  it("fails without writing when a required file is missing", async () => {
    const systemPath = join(dir, "missing.txt");
    await expect(generatePerfReport({ ...options, systemPath }, runtime)).rejects.toThrow(
      `System info file missing at ${systemPath}`
    );
    expect(await fsExtra.pathExists(options.outPath)).toBe(false);
  });
});
