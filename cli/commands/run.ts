/**
 * run command implementation.
 *
 * Checks out each requested version of the target application in turn,
 * runs the benchmark harness against it, records the result file and
 * finally generates the report over everything recorded so far.
 *
 * @module
 */

import type { Operation } from "effection";
import { z } from "zod";
import { WorkingCopy } from "../lib/checkout.ts";
import { CONFIG_FILE, loadConfig } from "../lib/config.ts";
import { resolveAdapter } from "../lib/formats/mod.ts";
import { createCommandHarness } from "../lib/harness.ts";
import { runVersions, type RunOutcome } from "../lib/orchestrator.ts";
import type { ReportOutcome } from "../lib/report.ts";
import { toError, wrapResult } from "../lib/result.ts";
import { ChartStyleSchema, type BenchmarkConfig } from "../lib/schema.ts";
import { createGitVersionControl } from "../lib/vcs.ts";
import { collect, createCommand, parseOptions } from "./options.ts";
import {
  generateFromSettings,
  printReportSummary,
  resolveReportSettings,
  resultsDirFor,
} from "./report.ts";

const RunOptionsSchema = z.object({
  version: z.array(z.string().min(1)).default([]),
  workingCopy: z.string().min(1).optional(),
  harness: z.string().min(1).optional(),
  refTemplate: z.string().includes("{version}").optional(),
  output: z.string().min(1).optional(),
  platform: z.string().min(1).optional(),
  format: z.string().min(1).optional(),
  chartStyle: ChartStyleSchema.optional(),
  title: z.string().min(1).optional(),
  config: z.string().min(1).default(CONFIG_FILE),
});

function runOptions() {
  return createCommand("run")
    .option("-v, --version <label>", "Version to benchmark (repeatable)", collect)
    .option("-w, --working-copy <dir>", "Git working copy of the target application")
    .option("--harness <command>", "Harness command template")
    .option("--ref-template <template>", "Git ref for a version, e.g. v{version}")
    .option("-o, --output <dir>", "Output directory")
    .option("--platform <id>", "Platform folder under .benchmarks")
    .option("-f, --format <format>", "Report format: pdf, html, markdown")
    .option("--chart-style <style>", "Chart style: bar, line")
    .option("--title <title>", "Report title")
    .option("-c, --config <path>", "Config file");
}

/**
 * Print per-version outcomes.
 */
function printRunSummary(outcome: RunOutcome<ReportOutcome>): void {
  console.log("\nVersions:");
  for (const v of outcome.versions) {
    if (v.ok) {
      console.log(`  ✓ ${v.version}: ${v.recorded.fileName} (${v.recorded.benchmarkCount} benchmark(s))`);
    } else {
      console.error(`  ✗ ${v.version}: ${v.stage} failed: ${v.error.message}`);
    }
  }
}

/**
 * Run benchmarks for a list of versions, then generate the report.
 */
export function* runCommand(args: string[]): Operation<number> {
  const parseResult = parseOptions(runOptions(), RunOptionsSchema, args);

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

  const versions = flags.version.length > 0 ? flags.version : config.versions;
  const workingCopy = flags.workingCopy ?? config.workingCopy;
  const harnessCommand = flags.harness ?? config.harness?.command;

  const missing = [
    versions.length === 0 ? "--version" : undefined,
    workingCopy === undefined ? "--working-copy" : undefined,
    harnessCommand === undefined ? "--harness" : undefined,
  ].filter((m) => m !== undefined);

  if (workingCopy === undefined || harnessCommand === undefined || missing.length > 0) {
    console.error(`Missing required option(s): ${missing.join(", ")}`);
    console.error(`Set them on the command line or in ${flags.config}`);
    return 1;
  }

  const settings = resolveReportSettings(
    {
      outputDir: flags.output,
      platformId: flags.platform,
      format: flags.format,
      chartStyle: flags.chartStyle,
      title: flags.title,
    },
    config,
  );

  // An unusable format is reported before any version is checked out.
  const adapter = yield* wrapResult(settings.format, resolveAdapter(settings.format));
  if (!adapter.ok) {
    console.error(adapter.error.message);
    return 1;
  }

  const resultsDir = resultsDirFor(settings.outputDir, settings.platformId);

  console.log(`\nBenchmarking ${versions.length} version(s): ${versions.join(", ")}`);
  console.log(`Working copy: ${workingCopy}`);
  console.log(`Harness: ${harnessCommand}`);
  console.log(`Results: ${resultsDir}`);

  const outcome = yield* runVersions({
    versions,
    workingCopy: new WorkingCopy(workingCopy),
    resultsDir,
    vcs: createGitVersionControl({ refTemplate: flags.refTemplate ?? config.refTemplate }),
    harness: createCommandHarness(harnessCommand),
    report: () => generateFromSettings(settings),
  });

  printRunSummary(outcome);

  const failed = outcome.versions.filter((v) => !v.ok).length;

  if (outcome.status === "ALL_FAILED" || !outcome.report) {
    console.error(`\nAll ${failed} version(s) failed; no report generated`);
    return 1;
  }

  if (!outcome.report.ok) {
    console.error(`\nReport failed: ${outcome.report.error.message}`);
    return 1;
  }

  printReportSummary(outcome.report.value);
  console.log(
    `\nCompleted: ${outcome.versions.length - failed} version(s) recorded, ${failed} version(s) failed`,
  );

  if (outcome.restoreError) {
    console.error(`Working copy was left on the last checked-out version`);
  }

  return 0;
}
