/**
 * Report assembly.
 *
 * Turns a scan into a format-independent report document (summary plus
 * one section per series with its chart), then hands it to a format
 * adapter. Nothing is written until the chosen format has rendered the
 * whole document.
 *
 * @module
 */

import { mkdirSync, writeFileSync } from "node:fs";
import { join } from "node:path";
import type { Operation } from "effection";
import { writeCharts, type ChartArtifact, type ChartRenderer } from "./chart.ts";
import { renderComparisonTable } from "./formats/markdown.ts";
import { resolveAdapter, type FormatAdapter } from "./formats/mod.ts";
import { identityKey, identityLabel } from "./record.ts";
import type { ScanResult, ScannedFile, ScanWarning } from "./scanner.ts";
import type { MachineInfo } from "./schema.ts";
import { aggregateSeries, allVersions, summarizeSeries, type SummarizedSeries } from "./series.ts";
import { assignSlugs } from "./slug.ts";

/**
 * Base name of the report document, without extension.
 */
export const REPORT_BASENAME = "benchmark_charts";

/**
 * Markdown timing table written next to every report.
 */
export const COMPARISON_FILENAME = "performance_comparison.md";

/**
 * Run-level information shown in the summary section.
 */
export interface ReportMetadata {
  title: string;
  generatedAt: Date;
  platformId?: string;
  files: readonly ScannedFile[];
  warnings: readonly ScanWarning[];
  machineInfo?: MachineInfo;
  /** Distinct version labels, in version order */
  versions: readonly string[];
}

export interface ReportSection {
  /** Identity as displayed, e.g. "test_load [1000]" */
  label: string;
  series: SummarizedSeries;
  chart: ChartArtifact;
}

export interface ReportDocument {
  meta: ReportMetadata;
  sections: readonly ReportSection[];
}

export interface BuildReportOptions {
  title: string;
  generatedAt: Date;
  platformId?: string;
}

/**
 * Aggregate a scan and render one chart per series.
 */
export function buildReport(
  scan: ScanResult,
  renderer: ChartRenderer,
  options: BuildReportOptions,
): ReportDocument {
  const series = summarizeSeries(aggregateSeries(scan.records));
  const slugs = assignSlugs(series.map((s) => s.identity));

  const sections = series.map((s) => {
    const slug = slugs.get(identityKey(s.identity));
    if (slug === undefined) {
      throw new Error(`Internal error: no slug for ${identityLabel(s.identity)}`);
    }
    return { label: identityLabel(s.identity), series: s, chart: renderer.render(s, slug) };
  });

  return {
    meta: {
      title: options.title,
      generatedAt: options.generatedAt,
      platformId: options.platformId,
      files: scan.files,
      warnings: scan.warnings,
      machineInfo: scan.machineInfo,
      versions: allVersions(scan.records),
    },
    sections,
  };
}

export interface GenerateReportOptions extends BuildReportOptions {
  format: string;
  outputDir: string;
  renderer: ChartRenderer;
  /** Produces the scan; called after the format has been resolved */
  scan: () => ScanResult;
  /** Adapter lookup override, used by tests */
  adapters?: Partial<Record<string, FormatAdapter>>;
}

export interface ReportOutcome {
  document: ReportDocument;
  reportPath: string;
  comparisonPath: string;
  chartPaths: string[];
}

/**
 * Resolve the format, scan, build and render the report, then write it.
 *
 * @throws UnsupportedFormatError before anything is scanned or written
 * @throws NoResultsFoundError from the scan
 */
export function* generateReport(options: GenerateReportOptions): Operation<ReportOutcome> {
  const adapter = yield* resolveAdapter(options.format, options.adapters);

  const scan = options.scan();
  const document = buildReport(scan, options.renderer, options);
  const bytes = yield* adapter.render(document);
  const table = renderComparisonTable(document);

  mkdirSync(options.outputDir, { recursive: true });
  const chartPaths = writeCharts(
    document.sections.map((s) => s.chart),
    options.outputDir,
  );
  const reportPath = join(options.outputDir, `${REPORT_BASENAME}.${adapter.extension}`);
  writeFileSync(reportPath, bytes);
  const comparisonPath = join(options.outputDir, COMPARISON_FILENAME);
  writeFileSync(comparisonPath, table);

  return { document, reportPath, comparisonPath, chartPaths };
}
