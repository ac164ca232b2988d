/**
 * report command implementation.
 *
 * Scans recorded result files and writes the comparison report, the
 * timing table and one chart per benchmark.
 *
 * @module
 */

import { join } from "node:path";
import type { Operation } from "effection";
import { Option } from "commander";
import { z } from "zod";
import { createChartRenderer } from "../lib/chart.ts";
import { CONFIG_FILE, VERSION_ENV, defaultPlatformId, loadConfig } from "../lib/config.ts";
import { generateReport, type ReportOutcome } from "../lib/report.ts";
import { toError, wrapResult } from "../lib/result.ts";
import { RESULTS_DIR, scanFile, scanResults, type ScanResult } from "../lib/scanner.ts";
import { ChartStyleSchema, type BenchmarkConfig, type ChartStyle } from "../lib/schema.ts";
import { createCommand, parseOptions } from "./options.ts";

const ReportOptionsSchema = z.object({
  output: z.string().min(1).optional(),
  results: z.string().min(1).optional(),
  file: z.string().min(1).optional(),
  version: z.string().min(1).optional(),
  platform: z.string().min(1).optional(),
  format: z.string().min(1).optional(),
  chartStyle: ChartStyleSchema.optional(),
  title: z.string().min(1).optional(),
  config: z.string().min(1).default(CONFIG_FILE),
});

function reportOptions() {
  return createCommand("report")
    .option("-o, --output <dir>", "Output directory")
    .option("--results <dir>", "Results directory to scan")
    .option("--file <path>", "Report on a single result file")
    .addOption(new Option("--version <label>", "Version label for --file").env(VERSION_ENV))
    .option("--platform <id>", "Platform folder under .benchmarks")
    .option("-f, --format <format>", "Report format: pdf, html, markdown")
    .option("--chart-style <style>", "Chart style: bar, line")
    .option("--title <title>", "Report title")
    .option("-c, --config <path>", "Config file");
}

/**
 * Everything the report step needs, after flags and config are merged.
 */
export interface ReportSettings {
  outputDir: string;
  platformId: string;
  format: string;
  chartStyle: ChartStyle;
  title: string;
  scan: () => ScanResult;
}

/**
 * Default results directory for an output directory and platform.
 */
export function resultsDirFor(outputDir: string, platformId: string): string {
  return join(outputDir, RESULTS_DIR, platformId);
}

/**
 * Resolve report settings: flags first, then the config file, then defaults.
 */
export function resolveReportSettings(
  flags: Partial<Omit<ReportSettings, "scan">> & { results?: string; file?: string; version?: string },
  config: BenchmarkConfig,
): ReportSettings {
  const outputDir = flags.outputDir ?? config.output ?? ".";
  const platformId = flags.platformId ?? config.platformId ?? defaultPlatformId();
  const resultsDir = flags.results ?? resultsDirFor(outputDir, platformId);
  const { file, version } = flags;

  return {
    outputDir,
    platformId,
    format: flags.format ?? config.format ?? "pdf",
    chartStyle: flags.chartStyle ?? config.chartStyle ?? "bar",
    title: flags.title ?? "Benchmark comparison",
    scan: file ? () => scanFile(file, version) : () => scanResults(resultsDir),
  };
}

/**
 * The report step shared by `report` and `run`.
 */
export function generateFromSettings(settings: ReportSettings): Operation<ReportOutcome> {
  return generateReport({
    format: settings.format,
    outputDir: settings.outputDir,
    renderer: createChartRenderer({ style: settings.chartStyle }),
    scan: settings.scan,
    title: settings.title,
    generatedAt: new Date(),
    platformId: settings.platformId,
  });
}

/**
 * Print what a report contains and where it was written.
 */
export function printReportSummary(outcome: ReportOutcome): void {
  const { meta, sections } = outcome.document;

  console.log(
    `\nScanned ${meta.files.length} file(s): ${sections.length} benchmark(s) across ${meta.versions.length} version(s)`,
  );
  for (const file of meta.files) {
    console.log(`  ✓ ${file.fileName} (${file.version}, ${file.recordCount} benchmark(s))`);
  }
  for (const warning of meta.warnings) {
    console.error(`  ✗ ${warning.fileName}: ${warning.message}`);
  }
  if (sections.length === 0) {
    console.error("  No valid benchmark entries in the scanned files; the report is empty");
  }

  console.log(`\nWrote: ${outcome.reportPath}`);
  console.log(`Wrote: ${outcome.comparisonPath}`);
  console.log(`Wrote: ${outcome.chartPaths.length} chart(s)`);
}

/**
 * Generate a report from recorded results.
 */
export function* reportCommand(args: string[]): Operation<number> {
  const parseResult = parseOptions(reportOptions(), ReportOptionsSchema, args);

  if (!parseResult.ok) {
    console.error("Error parsing arguments:");
    console.error(parseResult.summary);
    return 1;
  }

  const flags = parseResult.config;

  let config: BenchmarkConfig;
  try {
    config = loadConfig(flags.config);
  } catch (e) {
    console.error(toError(e).message);
    return 1;
  }

  const settings = resolveReportSettings(
    {
      outputDir: flags.output,
      platformId: flags.platform,
      format: flags.format,
      chartStyle: flags.chartStyle,
      title: flags.title,
      results: flags.results,
      file: flags.file,
      version: flags.version,
    },
    config,
  );

  console.log(`\nGenerating ${settings.format} report in ${settings.outputDir}`);

  const result = yield* wrapResult("report", generateFromSettings(settings));
  if (!result.ok) {
    console.error(`\n${result.error.message}`);
    return 1;
  }

  printReportSummary(result.value);
  return 0;
}
