/**
 * Chart rendering.
 *
 * Draws one comparison series with Observable Plot against a jsdom
 * document, then rasterises the SVG to PNG with resvg. Versions sit on a
 * fixed band (or point) scale in version order; the mean is plotted with
 * ±stddev error bars and min/max markers.
 *
 * @module
 */

import { mkdirSync, writeFileSync } from "node:fs";
import { join } from "node:path";
import * as Plot from "@observablehq/plot";
import { Resvg } from "@resvg/resvg-js";
import { JSDOM } from "jsdom";
import { EmptySeriesError } from "./errors.ts";
import { identityLabel, type BenchmarkIdentity } from "./record.ts";
import type { ChartStyle } from "./schema.ts";
import type { ComparisonSeries } from "./series.ts";
import { pickUnit } from "./stats.ts";

const XMLNS = "http://www.w3.org/2000/xmlns/";
const SVG_NS = "http://www.w3.org/2000/svg";
const XLINK_NS = "http://www.w3.org/1999/xlink";

/**
 * Directory (relative to the report) holding chart images.
 */
export const CHARTS_DIR = "charts";

export interface ChartOptions {
  style: ChartStyle;
  /** Plot width in CSS pixels (default: 800) */
  width?: number;
  /** Plot height in CSS pixels (default: 450) */
  height?: number;
  /** Draw min/max markers (default: true) */
  showRange?: boolean;
}

/**
 * A rendered chart, addressable by its slug.
 */
export interface ChartArtifact {
  identity: BenchmarkIdentity;
  slug: string;
  /** `<slug>.png` */
  fileName: string;
  png: Uint8Array;
}

/**
 * Turns a series into a chart artifact.
 */
export interface ChartRenderer {
  render(series: ComparisonSeries, slug: string): ChartArtifact;
}

interface ChartDatum {
  version: string;
  mean: number;
  low: number;
  high: number;
  min: number;
  max: number;
}

/**
 * Render a series as a standalone SVG document.
 *
 * @throws EmptySeriesError if the series has no points
 */
export function renderChartSvg(series: ComparisonSeries, options: ChartOptions): string {
  const title = identityLabel(series.identity);
  if (series.points.length === 0) {
    throw new EmptySeriesError(title);
  }

  const top = Math.max(...series.points.map(({ record: r }) => Math.max(r.max, r.mean + r.stddev)));
  const unit = pickUnit(top);

  const data: ChartDatum[] = series.points.map(({ version, record: r }) => ({
    version,
    mean: r.mean * unit.scale,
    low: Math.max(0, r.mean - r.stddev) * unit.scale,
    high: (r.mean + r.stddev) * unit.scale,
    min: r.min * unit.scale,
    max: r.max * unit.scale,
  }));
  const versions = data.map((d) => d.version);

  const marks: Plot.Markish[] =
    options.style === "bar"
      ? [
          Plot.barY(data, { x: "version", y: "mean", fill: "version", fillOpacity: 0.8 }),
          Plot.ruleY([0]),
        ]
      : [
          Plot.line(data, { x: "version", y: "mean", stroke: "#4e79a7", strokeWidth: 2 }),
          Plot.dot(data, { x: "version", y: "mean", fill: "#4e79a7", r: 4 }),
        ];

  marks.push(Plot.ruleX(data, { x: "version", y1: "low", y2: "high", stroke: "black", strokeWidth: 1.5 }));

  if (options.showRange ?? true) {
    marks.push(
      Plot.dot(data, { x: "version", y: "min", symbol: "triangle", r: 3, fill: "#888" }),
      Plot.dot(data, { x: "version", y: "max", symbol: "triangle", r: 3, fill: "#888", rotate: 180 }),
    );
  }

  marks.push(
    Plot.text([title], {
      text: (d: string) => d,
      frameAnchor: "top",
      dy: -28,
      fontSize: 14,
      fontWeight: "bold",
    }),
  );

  const { document } = new JSDOM("").window;
  const plot = Plot.plot({
    document,
    width: options.width ?? 800,
    height: options.height ?? 450,
    marginTop: 48,
    marginBottom: versions.length > 6 ? 80 : 48,
    style: { background: "white" },
    x: {
      domain: versions,
      type: options.style === "bar" ? "band" : "point",
      label: "Version",
      padding: options.style === "bar" ? 0.2 : 0.5,
      tickRotate: versions.length > 6 ? -30 : 0,
    },
    y: { label: `Mean time (${unit.label})`, grid: true, zero: true },
    color: { domain: versions, scheme: "tableau10" },
    marks,
  });

  plot.setAttributeNS(XMLNS, "xmlns", SVG_NS);
  plot.setAttributeNS(XMLNS, "xmlns:xlink", XLINK_NS);
  return plot.outerHTML;
}

/**
 * Rasterise an SVG document to PNG.
 */
export function svgToPng(svg: string, width: number): Uint8Array {
  const resvg = new Resvg(svg, {
    background: "white",
    fitTo: { mode: "width", value: width },
    font: { loadSystemFonts: true, defaultFontFamily: "sans-serif" },
  });
  return resvg.render().asPng();
}

/**
 * Default renderer: Plot → SVG → PNG at twice the plot width.
 */
export function createChartRenderer(options: ChartOptions): ChartRenderer {
  return {
    render(series, slug) {
      const svg = renderChartSvg(series, options);
      return {
        identity: series.identity,
        slug,
        fileName: `${slug}.png`,
        png: svgToPng(svg, (options.width ?? 800) * 2),
      };
    },
  };
}

/**
 * Write chart images to `<dir>/charts/`.
 *
 * @returns the written paths
 */
export function writeCharts(artifacts: readonly ChartArtifact[], dir: string): string[] {
  const chartsDir = join(dir, CHARTS_DIR);
  mkdirSync(chartsDir, { recursive: true });
  return artifacts.map((artifact) => {
    const path = join(chartsDir, artifact.fileName);
    writeFileSync(path, artifact.png);
    return path;
  });
}
