import { existsSync, readdirSync, readFileSync } from "node:fs";
import { join } from "node:path";
import { run, type Operation } from "effection";
import { afterEach, beforeEach, describe, expect, it } from "vitest";

import { NoResultsFoundError, UnsupportedFormatError } from "./errors.ts";
import type { FormatAdapter } from "./formats/mod.ts";
import { buildReport, generateReport, type GenerateReportOptions } from "./report.ts";
import { scanResults } from "./scanner.ts";
import {
  SAMPLE_DATE,
  makeTempDir,
  sampleScan,
  stubRenderer,
  writeResultFile,
} from "./testing.ts";

describe("buildReport", () => {
  it("creates one section per benchmark", () => {
    const document = buildReport(sampleScan(), stubRenderer, {
      title: "Bench",
      generatedAt: SAMPLE_DATE,
    });

    expect(document.sections.map((s) => [s.label, s.chart.fileName])).toEqual([
      ["test_boot", "test_boot.png"],
      ["test_load [1000]", "test_load_1000.png"],
    ]);
    expect(document.meta.versions).toEqual(["5.2.4", "6.0.4"]);
    expect(document.meta.warnings).toHaveLength(1);
  });
});

describe("generateReport", () => {
  let tmp: ReturnType<typeof makeTempDir>;
  let resultsDir: string;
  let outputDir: string;

  beforeEach(() => {
    tmp = makeTempDir();
    resultsDir = join(tmp.path, ".benchmarks", "test-platform");
    outputDir = join(tmp.path, "out");
    writeResultFile(resultsDir, "0001_5.2.4.json", [
      { name: "test_load", param: "1000", mean: 1.0 },
      { name: "test_boot", mean: 2.0 },
    ]);
    writeResultFile(resultsDir, "0002_6.0.4.json", [
      { name: "test_load", param: "1000", mean: 0.5 },
    ]);
  });

  afterEach(() => {
    tmp.remove();
  });

  function options(overrides: Partial<GenerateReportOptions> = {}): GenerateReportOptions {
    return {
      format: "markdown",
      outputDir,
      renderer: stubRenderer,
      scan: () => scanResults(resultsDir),
      title: "Bench",
      generatedAt: SAMPLE_DATE,
      ...overrides,
    };
  }

  it("writes the report, the comparison table and the charts", async () => {
    const outcome = await run(() => generateReport(options()));

    expect(outcome.reportPath).toBe(join(outputDir, "benchmark_charts.md"));
    expect(outcome.comparisonPath).toBe(join(outputDir, "performance_comparison.md"));
    expect(readdirSync(join(outputDir, "charts")).sort()).toEqual([
      "test_boot.png",
      "test_load_1000.png",
    ]);

    const report = readFileSync(outcome.reportPath, "utf-8");
    expect(report.match(/\]\(charts\//g)).toHaveLength(2);

    const table = readFileSync(outcome.comparisonPath, "utf-8");
    expect(table).toContain("| test_load [1000] | 6.0.4 | 0.500000 | 0.500000 (6.0.4) | 1.000000 (5.2.4) | -50.0% |");
    expect(table).toContain("| test_boot | 5.2.4 | 2.000000 | 2.000000 (5.2.4) | 2.000000 (5.2.4) | n/a |");
  });

  it("uses the adapter's extension", async () => {
    const outcome = await run(() => generateReport(options({ format: "html" })));
    expect(outcome.reportPath).toBe(join(outputDir, "benchmark_charts.html"));
    expect(existsSync(outcome.reportPath)).toBe(true);
  });

  it("rejects an unknown format before writing anything", async () => {
    await expect(run(() => generateReport(options({ format: "docx" })))).rejects.toThrow(
      'Unsupported report format "docx"',
    );
    expect(existsSync(outputDir)).toBe(false);
  });

  it("fails with UnsupportedFormatError when the backend is missing", async () => {
    let rendered = false;
    const unavailable: FormatAdapter = {
      id: "pdf",
      extension: "pdf",
      *detect(): Operation<boolean> {
        return false;
      },
      *render(): Operation<Uint8Array> {
        rendered = true;
        return new Uint8Array();
      },
    };

    const error = await run(() => generateReport(options({ format: "pdf", adapters: { pdf: unavailable } }))).then(
      () => undefined,
      (e: unknown) => e,
    );

    expect(error).toBeInstanceOf(UnsupportedFormatError);
    if (error instanceof UnsupportedFormatError) {
      expect(error.format).toBe("pdf");
    }
    expect(rendered).toBe(false);
    expect(existsSync(join(outputDir, "benchmark_charts.pdf"))).toBe(false);
    expect(existsSync(outputDir)).toBe(false);
  });

  it("propagates NoResultsFoundError", async () => {
    await expect(
      run(() => generateReport(options({ scan: () => scanResults(join(tmp.path, "empty")) }))),
    ).rejects.toBeInstanceOf(NoResultsFoundError);
    expect(existsSync(outputDir)).toBe(false);
  });
});
