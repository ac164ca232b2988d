/**
 * Print-oriented PDF report format, rendered with pdfkit.
 *
 * pdfkit is loaded lazily so that a missing or broken install turns into
 * an unsupported format instead of a crash at startup.
 *
 * @module
 */

import { call, type Operation } from "effection";
import type { ReportDocument, ReportSection } from "../report.ts";
import {
  DETAIL_HEADERS,
  OVERVIEW_HEADERS,
  detailRows,
  fileLines,
  overviewRow,
  summaryFacts,
  warningLines,
} from "./common.ts";
import type { FormatAdapter } from "./mod.ts";

type PdfKit = { default: typeof import("pdfkit") };

export interface PdfOptions {
  /** Deflate content streams (default: true) */
  compress?: boolean;
}

const PAGE_MARGIN = 50;
const CONTENT_WIDTH = 595.28 - 2 * PAGE_MARGIN;

function* loadPdfKit(): Operation<PdfKit | undefined> {
  try {
    return yield* call(() => import("pdfkit"));
  } catch (error) {
    console.error(`  pdfkit could not be loaded: ${error instanceof Error ? error.message : String(error)}`);
    return undefined;
  }
}

function fixedWidthRows(headers: readonly string[], rows: readonly string[][]): string[] {
  const widths = headers.map((h, i) => Math.max(h.length, ...rows.map((r) => r[i].length)));
  const line = (cells: readonly string[]) => cells.map((c, i) => c.padEnd(widths[i])).join("  ");
  return [line(headers), widths.map((w) => "-".repeat(w)).join("  "), ...rows.map(line)];
}

/**
 * Fixed-width overview table, one row per benchmark.
 */
export function overviewLines(sections: readonly ReportSection[]): string[] {
  return fixedWidthRows(OVERVIEW_HEADERS, sections.map(overviewRow));
}

function writeDocument(doc: PDFKit.PDFDocument, document: ReportDocument): void {
  const { meta, sections } = document;

  doc.font("Helvetica-Bold").fontSize(20).text(meta.title, { align: "center" });
  doc.moveDown();

  doc.font("Helvetica").fontSize(12);
  for (const [label, value] of summaryFacts(document)) {
    doc.text(`${label}: ${value}`);
  }

  doc.moveDown().font("Helvetica-Bold").text("Benchmark files");
  doc.font("Courier").fontSize(9);
  for (const line of fileLines(document)) {
    doc.text(`• ${line}`);
  }

  const warnings = warningLines(document);
  if (warnings.length > 0) {
    doc.moveDown().font("Helvetica-Bold").fontSize(12).text("Skipped");
    doc.font("Courier").fontSize(9);
    for (const line of warnings) {
      doc.text(`• ${line}`);
    }
  }

  if (sections.length > 0) {
    doc.moveDown().font("Helvetica-Bold").fontSize(12).text("Overview");
    doc.font("Courier").fontSize(8);
    for (const line of overviewLines(sections)) {
      doc.text(line);
    }
  }

  for (const section of sections) {
    writeSection(doc, section);
  }
}

function writeSection(doc: PDFKit.PDFDocument, section: ReportSection): void {
  doc.addPage();
  doc.font("Helvetica-Bold").fontSize(14).text(`Benchmark: ${section.label}`);
  doc.moveDown(0.5);
  doc.image(Buffer.from(section.chart.png), { fit: [CONTENT_WIDTH, 300], align: "center" });
  doc.moveDown();
  doc.font("Courier").fontSize(9);
  for (const line of fixedWidthRows(DETAIL_HEADERS, detailRows(section))) {
    doc.text(line);
  }
}

/**
 * Create a PDF adapter.
 */
export function createPdfAdapter(options: PdfOptions = {}): FormatAdapter {
  return {
    id: "pdf",
    extension: "pdf",

    *detect(): Operation<boolean> {
      const pdfkit = yield* loadPdfKit();
      return pdfkit !== undefined;
    },

    *render(document: ReportDocument): Operation<Uint8Array> {
      const { default: PDFDocument } = yield* call(() => import("pdfkit"));

      const doc = new PDFDocument({
        size: "A4",
        margin: PAGE_MARGIN,
        compress: options.compress ?? true,
        info: { Title: document.meta.title, CreationDate: document.meta.generatedAt },
      });

      const chunks: Buffer[] = [];
      const finished = new Promise<void>((resolve, reject) => {
        doc.on("data", (chunk: Buffer) => chunks.push(chunk));
        doc.on("end", () => resolve());
        doc.on("error", reject);
      });

      writeDocument(doc, document);
      doc.end();
      yield* call(() => finished);

      return Buffer.concat(chunks);
    },
  };
}

/**
 * Default PDF adapter.
 */
export const pdfAdapter: FormatAdapter = createPdfAdapter();
