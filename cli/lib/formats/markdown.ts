/**
 * Markdown report format.
 *
 * Charts are linked as `charts/<slug>.png`, relative to the report file.
 *
 * @module
 */

import type { Operation } from "effection";
import { CHARTS_DIR } from "../chart.ts";
import type { ReportDocument } from "../report.ts";
import { formatSeconds } from "../stats.ts";
import {
  DETAIL_HEADERS,
  OVERVIEW_HEADERS,
  detailRows,
  escapeMarkdownCell,
  fileLines,
  overviewRow,
  summaryFacts,
  warningLines,
} from "./common.ts";
import type { FormatAdapter } from "./mod.ts";

/**
 * Render a Markdown table.
 */
export function markdownTable(headers: readonly string[], rows: readonly string[][]): string {
  const line = (cells: readonly string[]) => `| ${cells.map(escapeMarkdownCell).join(" | ")} |`;
  return [line(headers), `|${headers.map(() => "---").join("|")}|`, ...rows.map(line)].join("\n");
}

function escapeAlt(text: string): string {
  return text.replace(/[[\]\\]/g, (c) => `\\${c}`);
}

/**
 * Render the full report as Markdown.
 */
export function renderMarkdownReport(document: ReportDocument): string {
  const { meta, sections } = document;
  const out: string[] = [`# ${meta.title}`, "", "## Summary", ""];

  for (const [label, value] of summaryFacts(document)) {
    out.push(`- **${label}:** ${value}`);
  }

  out.push("", "### Benchmark files", "");
  for (const line of fileLines(document)) {
    out.push(`- ${line}`);
  }

  const warnings = warningLines(document);
  if (warnings.length > 0) {
    out.push("", "### Skipped", "");
    for (const line of warnings) {
      out.push(`- ${line}`);
    }
  }

  if (sections.length > 0) {
    out.push("", "### Overview", "", markdownTable(OVERVIEW_HEADERS, sections.map(overviewRow)));
  }

  for (const section of sections) {
    out.push(
      "",
      `## Benchmark: ${section.label}`,
      "",
      `![${escapeAlt(section.label)}](${CHARTS_DIR}/${section.chart.fileName})`,
      "",
      markdownTable(DETAIL_HEADERS, detailRows(section)),
    );
  }

  out.push("");
  return out.join("\n");
}

/**
 * Render the timing table: one row per benchmark, slowest latest mean first.
 */
export function renderComparisonTable(document: ReportDocument): string {
  const rows = [...document.sections]
    .sort((a, b) => b.series.summary.lastMean - a.series.summary.lastMean)
    .map((section) => {
      const { summary, points } = section.series;
      const latest = points[points.length - 1];
      return [
        section.label,
        latest.version,
        formatSeconds(summary.lastMean),
        ...overviewRow(section).slice(2),
      ];
    });

  return [
    `# ${document.meta.title}`,
    "",
    markdownTable(
      ["Benchmark", "Latest version", "Latest mean (s)", ...OVERVIEW_HEADERS.slice(2)],
      rows,
    ),
    "",
  ].join("\n");
}

/**
 * Markdown adapter. Needs no backend.
 */
export const markdownAdapter: FormatAdapter = {
  id: "markdown",
  extension: "md",

  *detect(): Operation<boolean> {
    return true;
  },

  *render(document: ReportDocument): Operation<Uint8Array> {
    return new TextEncoder().encode(renderMarkdownReport(document));
  },
};
