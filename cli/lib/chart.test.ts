import { existsSync, readFileSync } from "node:fs";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";

import { createChartRenderer, renderChartSvg, writeCharts } from "./chart.ts";
import { EmptySeriesError } from "./errors.ts";
import { createResultRecord } from "./record.ts";
import { aggregateSeries, type ComparisonSeries } from "./series.ts";
import { makeTempDir, PNG_1PX } from "./testing.ts";

const identity = { name: "test_load", param: "1000" };

function series(): ComparisonSeries {
  return aggregateSeries(
    [
      ["5.2.4", 0.012],
      ["6.0.4", 0.006],
      ["current", 0.005],
    ].map(([version, mean], i) =>
      createResultRecord({
        identity,
        version: String(version),
        mean: Number(mean),
        min: Number(mean) * 0.9,
        max: Number(mean) * 1.2,
        stddev: Number(mean) * 0.1,
        rounds: 5,
        sequence: i + 1,
      }),
    ),
  )[0];
}

describe("renderChartSvg", () => {
  it("draws a standalone SVG document", () => {
    const svg = renderChartSvg(series(), { style: "bar" });

    expect(svg.startsWith("<svg")).toBe(true);
    expect(svg).toContain('xmlns="http://www.w3.org/2000/svg"');
    expect(svg).toContain("test_load [1000]");
    expect(svg).toContain("Mean time (ms)");
  });

  it("places versions in series order", () => {
    const svg = renderChartSvg(series(), { style: "line" });
    const positions = ["5.2.4", "6.0.4", "current"].map((v) => svg.indexOf(`>${v}<`));

    expect(positions.every((p) => p >= 0)).toBe(true);
    expect([...positions].sort((a, b) => a - b)).toEqual(positions);
  });

  it("throws EmptySeriesError for a series without points", () => {
    expect(() => renderChartSvg({ identity, points: [] }, { style: "bar" })).toThrow(
      EmptySeriesError,
    );
  });
});

describe("createChartRenderer", () => {
  it("produces a PNG named after the slug", () => {
    const chart = createChartRenderer({ style: "bar", width: 400, height: 240 }).render(
      series(),
      "test_load_1000",
    );

    expect(chart.fileName).toBe("test_load_1000.png");
    expect(chart.identity).toEqual(identity);
    expect(Array.from(chart.png.subarray(0, 4))).toEqual([137, 80, 78, 71]);
  });
});

describe("writeCharts", () => {
  let tmp: ReturnType<typeof makeTempDir>;

  beforeEach(() => {
    tmp = makeTempDir();
  });

  afterEach(() => {
    tmp.remove();
  });

  it("writes each chart under charts/", () => {
    const paths = writeCharts(
      [{ identity, slug: "a", fileName: "a.png", png: PNG_1PX }],
      tmp.path,
    );

    expect(paths).toEqual([join(tmp.path, "charts", "a.png")]);
    expect(existsSync(paths[0])).toBe(true);
    expect(readFileSync(paths[0]).equals(Buffer.from(PNG_1PX))).toBe(true);
  });
});
