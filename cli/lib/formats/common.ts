/**
 * Text helpers shared by the report formats.
 *
 * @module
 */

import type { ReportDocument, ReportSection } from "../report.ts";
import type { MachineInfo } from "../schema.ts";
import { formatChange, formatSeconds } from "../stats.ts";

/**
 * Format a timestamp as "YYYY-MM-DD HH:MM:SS UTC".
 */
export function formatTimestamp(date: Date): string {
  return `${date.toISOString().replace("T", " ").slice(0, 19)} UTC`;
}

/**
 * Short host description from the harness's machine info.
 */
export function describeMachine(info: MachineInfo | undefined): string | undefined {
  if (!info) return undefined;
  const parts = [
    info.node,
    [info.system, info.release].filter(Boolean).join(" "),
    info.machine,
    info.cpu?.brand_raw,
  ].filter((part): part is string => typeof part === "string" && part !== "");
  return parts.length > 0 ? parts.join(" · ") : undefined;
}

/**
 * Label/value pairs of the summary section, in display order.
 */
export function summaryFacts(document: ReportDocument): [string, string][] {
  const { meta, sections } = document;
  const facts: [string, string][] = [["Generated", formatTimestamp(meta.generatedAt)]];
  if (meta.platformId) facts.push(["Platform", meta.platformId]);
  const machine = describeMachine(meta.machineInfo);
  if (machine) facts.push(["Machine", machine]);
  facts.push(
    ["Number of benchmark runs", String(meta.versions.length)],
    ["Total benchmark files", String(meta.files.length)],
    ["Benchmarks", String(sections.length)],
  );
  return facts;
}

export const OVERVIEW_HEADERS = ["Benchmark", "Versions", "Best mean (s)", "Worst mean (s)", "Change"];

/**
 * One overview row per section.
 */
export function overviewRow(section: ReportSection): string[] {
  const { summary, points } = section.series;
  return [
    section.label,
    String(points.length),
    `${formatSeconds(summary.bestMean)} (${summary.bestVersion})`,
    `${formatSeconds(summary.worstMean)} (${summary.worstVersion})`,
    formatChange(summary.relativeChange),
  ];
}

export const DETAIL_HEADERS = ["Version", "Mean (s)", "Min (s)", "Max (s)", "StdDev (s)", "Rounds"];

/**
 * Per-version rows of a section's data table.
 */
export function detailRows(section: ReportSection): string[][] {
  return section.series.points.map(({ version, record }) => [
    version,
    formatSeconds(record.mean),
    formatSeconds(record.min),
    formatSeconds(record.max),
    formatSeconds(record.stddev),
    String(record.rounds),
  ]);
}

/**
 * Lines describing the scanned files, e.g. "0001_5.2.4.json (5.2.4, 3 benchmarks)".
 */
export function fileLines(document: ReportDocument): string[] {
  return document.meta.files.map(
    (f) => `${f.fileName} (${f.version}, ${f.recordCount} benchmark${f.recordCount === 1 ? "" : "s"})`,
  );
}

/**
 * Lines describing skipped files and entries.
 */
export function warningLines(document: ReportDocument): string[] {
  return document.meta.warnings.map((w) =>
    w.kind === "file" ? `${w.fileName}: skipped (${w.message})` : `${w.fileName}: ${w.message}`,
  );
}

const HTML_ESCAPES: Record<string, string> = {
  "&": "&amp;",
  "<": "&lt;",
  ">": "&gt;",
  '"': "&quot;",
  "'": "&#39;",
};

export function escapeHtml(text: string): string {
  return text.replace(/[&<>"']/g, (c) => HTML_ESCAPES[c] ?? c);
}

/**
 * Escape a value for a Markdown table cell.
 */
export function escapeMarkdownCell(text: string): string {
  return text.replace(/\\/g, "\\\\").replace(/\|/g, "\\|").replace(/\r?\n/g, " ");
}
