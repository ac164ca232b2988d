/**
 * Report format adapter interface and registry.
 *
 * Each adapter checks whether its rendering backend is available and
 * renders a complete report document into bytes.
 *
 * @module
 */

import type { Operation } from "effection";
import { UnsupportedFormatError } from "../errors.ts";
import type { ReportDocument } from "../report.ts";
import { FormatIdSchema, type FormatId } from "../schema.ts";
import { htmlAdapter } from "./html.ts";
import { markdownAdapter } from "./markdown.ts";
import { pdfAdapter } from "./pdf.ts";

/**
 * Report format adapter interface.
 * Each format (pdf, html, markdown) implements this interface.
 */
export interface FormatAdapter {
  /** Format identifier */
  id: FormatId;

  /** File extension of the rendered document, without the dot */
  extension: string;

  /**
   * Check if the rendering backend can be loaded.
   * @returns true if `render` can be called
   */
  detect(): Operation<boolean>;

  /**
   * Render the whole document. Must not write to disk.
   */
  render(document: ReportDocument): Operation<Uint8Array>;
}

/**
 * Get the adapter for a specific format.
 * Uses exhaustive switch for type safety.
 */
export function getAdapter(id: FormatId): FormatAdapter {
  switch (id) {
    case "pdf":
      return pdfAdapter;
    case "html":
      return htmlAdapter;
    case "markdown":
      return markdownAdapter;
    default: {
      const exhaustive: never = id;
      throw new UnsupportedFormatError(String(exhaustive));
    }
  }
}

/**
 * Look up a format by name and make sure its backend is available.
 *
 * @param format - Requested format name
 * @param overrides - Adapters that replace the built-in ones
 * @throws UnsupportedFormatError naming the requested format
 */
export function* resolveAdapter(
  format: string,
  overrides: Partial<Record<string, FormatAdapter>> = {},
): Operation<FormatAdapter> {
  const parsed = FormatIdSchema.safeParse(format);
  if (!parsed.success) {
    throw new UnsupportedFormatError(format, `expected one of ${FormatIdSchema.options.join(", ")}`);
  }

  const adapter = overrides[parsed.data] ?? getAdapter(parsed.data);
  const available = yield* adapter.detect();
  if (!available) {
    throw new UnsupportedFormatError(format, "rendering backend is not available");
  }
  return adapter;
}
