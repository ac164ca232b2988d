/**
 * Fixtures shared by the test suites.
 *
 * @module
 */

import { mkdirSync, mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import type { ChartRenderer } from "./chart.ts";
import { createResultRecord } from "./record.ts";
import { buildReport, type ReportDocument } from "./report.ts";
import type { ScanResult } from "./scanner.ts";

/**
 * A 1x1 PNG.
 */
export const PNG_1PX = Uint8Array.from(
  Buffer.from(
    "iVBORw0KGgoAAAANSUhEUgAAAAEAAAABCAYAAAAfFcSJAAAADUlEQVR42mNkYPhfDwAChwGA60e6kgAAAABJRU5ErkJggg==",
    "base64",
  ),
);

export interface EntryFixture {
  name: string;
  param?: string;
  mean: number;
  stddev?: number;
  rounds?: number;
}

/**
 * Serialize a result file with the given entries.
 */
export function resultFileJson(entries: EntryFixture[], extra: Record<string, unknown> = {}): string {
  return JSON.stringify({
    machine_info: { node: "bench-host", system: "Linux", release: "6.1.0", machine: "x86_64" },
    datetime: "2026-01-01T00:00:00",
    ...extra,
    benchmarks: entries.map((e) => ({
      name: e.name,
      ...(e.param === undefined ? {} : { param: e.param }),
      stats: {
        mean: e.mean,
        min: e.mean * 0.5,
        max: e.mean * 2,
        stddev: e.stddev ?? 0,
        rounds: e.rounds ?? 5,
      },
    })),
  });
}

/**
 * Write a result file into a directory, creating it if needed.
 */
export function writeResultFile(dir: string, fileName: string, entries: EntryFixture[]): string {
  mkdirSync(dir, { recursive: true });
  const path = join(dir, fileName);
  writeFileSync(path, resultFileJson(entries));
  return path;
}

/**
 * A fresh temporary directory and a function that removes it.
 */
export function makeTempDir(): { path: string; remove: () => void } {
  const path = mkdtempSync(join(tmpdir(), "version-bench-test-"));
  return { path, remove: () => rmSync(path, { recursive: true, force: true }) };
}

/**
 * Renderer that skips Plot and returns a fixed 1x1 PNG.
 */
export const stubRenderer: ChartRenderer = {
  render(series, slug) {
    return { identity: series.identity, slug, fileName: `${slug}.png`, png: PNG_1PX };
  },
};

/**
 * Two benchmarks over two versions:
 *
 *   test_boot         5.2.4 → 2.0s   6.0.4 → 2.5s
 *   test_load [1000]  5.2.4 → 1.0s   6.0.4 → 0.5s
 */
export function sampleScan(): ScanResult {
  const rows = [
    { name: "test_load", param: "1000", version: "5.2.4", mean: 1.0, sequence: 1 },
    { name: "test_boot", param: undefined, version: "5.2.4", mean: 2.0, sequence: 1 },
    { name: "test_load", param: "1000", version: "6.0.4", mean: 0.5, sequence: 2 },
    { name: "test_boot", param: undefined, version: "6.0.4", mean: 2.5, sequence: 2 },
  ];

  return {
    location: "/results",
    records: rows.map(({ name, param, version, mean, sequence }) =>
      createResultRecord({
        identity: { name, param },
        version,
        mean,
        min: mean,
        max: mean,
        stddev: 0,
        rounds: 3,
        sequence,
      }),
    ),
    files: [
      { path: "/results/0001_5.2.4.json", fileName: "0001_5.2.4.json", version: "5.2.4", sequence: 1, recordCount: 2 },
      { path: "/results/0002_6.0.4.json", fileName: "0002_6.0.4.json", version: "6.0.4", sequence: 2, recordCount: 2 },
    ],
    warnings: [{ kind: "file", fileName: "0003_7.0.json", message: "invalid JSON" }],
    machineInfo: { node: "bench-host", system: "Linux", release: "6.1.0", machine: "x86_64" },
  };
}

export const SAMPLE_DATE = new Date(Date.UTC(2026, 0, 2, 3, 4, 5));

/**
 * The sample scan as a report document, with stub charts.
 */
export function sampleDocument(): ReportDocument {
  return buildReport(sampleScan(), stubRenderer, {
    title: "Bench",
    generatedAt: SAMPLE_DATE,
    platformId: "Linux-x64-node20",
  });
}
