/**
 * status command implementation.
 *
 * Shows the result files collected under each platform folder.
 *
 * @module
 */

import { join } from "node:path";
import type { Operation } from "effection";
import { z } from "zod";
import { CONFIG_FILE, loadConfig } from "../lib/config.ts";
import { toError, tryResult } from "../lib/result.ts";
import { RESULTS_DIR, listPlatformDirs, scanResults, type ScanResult } from "../lib/scanner.ts";
import { aggregateSeries, allVersions } from "../lib/series.ts";
import { createCommand, parseOptions } from "./options.ts";

const StatusOptionsSchema = z.object({
  output: z.string().min(1).optional(),
  platform: z.string().min(1).optional(),
  config: z.string().min(1).default(CONFIG_FILE),
});

function statusOptions() {
  return createCommand("status")
    .option("-o, --output <dir>", "Output directory")
    .option("--platform <id>", "Only show this platform folder")
    .option("-c, --config <path>", "Config file");
}

/**
 * Per-version file and benchmark counts for one platform folder.
 */
export interface PlatformStatus {
  platformId: string;
  files: number;
  benchmarks: number;
  rows: { version: string; files: number; records: number }[];
  warnings: string[];
}

/**
 * Summarize one scanned platform folder.
 */
export function describePlatform(platformId: string, scan: ScanResult): PlatformStatus {
  const rows = allVersions(scan.records).map((version) => ({
    version,
    files: scan.files.filter((f) => f.version === version).length,
    records: scan.records.filter((r) => r.version === version).length,
  }));

  return {
    platformId,
    files: scan.files.length,
    benchmarks: aggregateSeries(scan.records).length,
    rows,
    warnings: scan.warnings.map((w) => `${w.fileName}: ${w.message}`),
  };
}

function printPlatform(status: PlatformStatus): void {
  console.log(`\n${status.platformId}`);
  console.log(`  Files: ${status.files}, benchmarks: ${status.benchmarks}\n`);
  console.log(`  ${"Version".padEnd(20)} ${"Files".padEnd(6)} Records`);
  console.log(`  ${"-".repeat(20)} ${"-".repeat(6)} ${"-".repeat(7)}`);
  for (const row of status.rows) {
    console.log(`  ${row.version.padEnd(20)} ${String(row.files).padEnd(6)} ${row.records}`);
  }
  if (status.warnings.length > 0) {
    console.log("\n  Skipped:");
    for (const w of status.warnings) {
      console.log(`    - ${w}`);
    }
  }
}

/**
 * Show collected benchmark data.
 */
export function* statusCommand(args: string[]): Operation<number> {
  const parseResult = parseOptions(statusOptions(), StatusOptionsSchema, args);

  if (!parseResult.ok) {
    console.error("Error parsing arguments:");
    console.error(parseResult.summary);
    return 1;
  }

  const flags = parseResult.config;

  let outputDir: string;
  try {
    outputDir = flags.output ?? loadConfig(flags.config).output ?? ".";
  } catch (e) {
    console.error(toError(e).message);
    return 1;
  }

  const platforms = listPlatformDirs(outputDir).filter(
    (p) => flags.platform === undefined || p === flags.platform,
  );

  if (platforms.length === 0) {
    console.log(`No benchmark data found in ${join(outputDir, RESULTS_DIR)}`);
    return 0;
  }

  console.log("\nBenchmark Data Status");

  for (const platformId of platforms) {
    const dir = join(outputDir, RESULTS_DIR, platformId);
    const scan = tryResult(platformId, () => scanResults(dir));
    if (scan.ok) {
      printPlatform(describePlatform(platformId, scan.value));
    } else {
      console.log(`\n${platformId}`);
      console.log(`  ${scan.error.message}`);
    }
  }

  return 0;
}
