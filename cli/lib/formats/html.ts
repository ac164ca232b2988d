/**
 * Interactive HTML report format.
 *
 * Charts are embedded as base64 data URIs so the page is a single
 * shareable file. A filter box narrows the benchmark sections by name.
 *
 * @module
 */

import type { Operation } from "effection";
import type { ReportDocument, ReportSection } from "../report.ts";
import {
  DETAIL_HEADERS,
  OVERVIEW_HEADERS,
  detailRows,
  escapeHtml,
  fileLines,
  formatTimestamp,
  overviewRow,
  summaryFacts,
  warningLines,
} from "./common.ts";
import type { FormatAdapter } from "./mod.ts";

const STYLE = `
  body { font-family: "Segoe UI", Tahoma, Geneva, Verdana, sans-serif; margin: 0; padding: 20px; background: #f5f5f5; }
  .container { max-width: 1200px; margin: 0 auto; background: white; padding: 30px; border-radius: 10px; box-shadow: 0 2px 10px rgba(0,0,0,0.1); }
  h1 { color: #2c3e50; text-align: center; border-bottom: 3px solid #3498db; padding-bottom: 10px; }
  .summary, .file-list { background: #ecf0f1; padding: 20px; border-radius: 5px; margin-bottom: 30px; }
  .file-list ul { list-style: none; padding-left: 0; }
  .file-list li { padding: 4px 0; border-bottom: 1px solid #dee2e6; }
  .warning { color: #b03a2e; }
  .chart-section h2 { color: #2c3e50; border-left: 4px solid #3498db; padding-left: 15px; }
  .chart-container { text-align: center; margin: 20px 0; }
  .chart-container img { max-width: 100%; height: auto; border: 1px solid #ddd; border-radius: 5px; }
  table { width: 100%; border-collapse: collapse; margin-top: 20px; }
  th, td { border: 1px solid #ddd; padding: 8px 12px; text-align: left; }
  th { background: #3498db; color: white; }
  tr:nth-child(even) { background: #f2f2f2; }
  #filter { width: 100%; padding: 8px; font-size: 1rem; margin-bottom: 20px; box-sizing: border-box; }
  .footer { text-align: center; margin-top: 40px; padding-top: 20px; border-top: 1px solid #ddd; color: #7f8c8d; }
`;

const SCRIPT = `
  const filter = document.getElementById("filter");
  filter.addEventListener("input", () => {
    const needle = filter.value.trim().toLowerCase();
    for (const el of document.querySelectorAll("[data-benchmark]")) {
      el.hidden = needle !== "" && !el.dataset.benchmark.toLowerCase().includes(needle);
    }
  });
`;

function htmlTable(headers: readonly string[], rows: readonly string[][], rowAttrs?: readonly string[]): string {
  const head = headers.map((h) => `<th>${escapeHtml(h)}</th>`).join("");
  const body = rows
    .map((row, i) => {
      const attrs = rowAttrs ? ` ${rowAttrs[i]}` : "";
      return `<tr${attrs}>${row.map((cell) => `<td>${escapeHtml(cell)}</td>`).join("")}</tr>`;
    })
    .join("\n");
  return `<table class="data-table">\n<thead><tr>${head}</tr></thead>\n<tbody>\n${body}\n</tbody>\n</table>`;
}

function dataAttr(section: ReportSection): string {
  return `data-benchmark="${escapeHtml(section.label)}"`;
}

function renderSection(section: ReportSection): string {
  const src = `data:image/png;base64,${Buffer.from(section.chart.png).toString("base64")}`;
  return `
<section class="chart-section" id="${escapeHtml(section.chart.slug)}" ${dataAttr(section)}>
<h2>Benchmark: ${escapeHtml(section.label)}</h2>
<div class="chart-container"><img src="${src}" alt="Chart for ${escapeHtml(section.label)}"></div>
${htmlTable(DETAIL_HEADERS, detailRows(section))}
</section>`;
}

/**
 * Render the full report as a standalone HTML page.
 */
export function renderHtmlReport(document: ReportDocument): string {
  const { meta, sections } = document;
  const facts = summaryFacts(document)
    .map(([label, value]) => `<p><strong>${escapeHtml(label)}:</strong> ${escapeHtml(value)}</p>`)
    .join("\n");
  const files = fileLines(document)
    .map((line) => `<li>${escapeHtml(line)}</li>`)
    .join("\n");
  const warnings = warningLines(document)
    .map((line) => `<li class="warning">${escapeHtml(line)}</li>`)
    .join("\n");

  const overview =
    sections.length > 0
      ? `<h2>Overview</h2>\n${htmlTable(OVERVIEW_HEADERS, sections.map(overviewRow), sections.map(dataAttr))}`
      : "";

  return `<!DOCTYPE html>
<html lang="en">
<head>
<meta charset="UTF-8">
<meta name="viewport" content="width=device-width, initial-scale=1.0">
<title>${escapeHtml(meta.title)}</title>
<style>${STYLE}</style>
</head>
<body>
<div class="container">
<h1>${escapeHtml(meta.title)}</h1>
<div class="summary">
<h2>Summary</h2>
${facts}
${overview}
</div>
<div class="file-list">
<h3>Benchmark Files</h3>
<ul>
${files}
${warnings}
</ul>
</div>
<input id="filter" type="search" placeholder="Filter benchmarks by name">
${sections.map(renderSection).join("\n")}
<div class="footer"><p>Generated on ${escapeHtml(formatTimestamp(meta.generatedAt))}</p></div>
</div>
<script>${SCRIPT}</script>
</body>
</html>
`;
}

/**
 * HTML adapter. Needs no backend.
 */
export const htmlAdapter: FormatAdapter = {
  id: "html",
  extension: "html",

  *detect(): Operation<boolean> {
    return true;
  },

  *render(document: ReportDocument): Operation<Uint8Array> {
    return new TextEncoder().encode(renderHtmlReport(document));
  },
};
