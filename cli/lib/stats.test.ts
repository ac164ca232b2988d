import { describe, expect, it } from "vitest";

import { createResultRecord } from "./record.ts";
import { calculateSummary, formatChange, formatSeconds, pickUnit } from "./stats.ts";

function at(version: string, mean: number) {
  return createResultRecord({
    identity: { name: "test_load" },
    version,
    mean,
    min: mean,
    max: mean,
    stddev: 0,
    rounds: 1,
    sequence: 1,
  });
}

describe("calculateSummary", () => {
  it("reports -50% when the mean halves", () => {
    const summary = calculateSummary([at("5.2.4", 1), at("6.0.4", 0.5)]);
    expect(summary.relativeChange).toBe(-0.5);
    expect(formatChange(summary.relativeChange)).toBe("-50.0%");
  });

  it("has no relative change for a single point", () => {
    const summary = calculateSummary([at("5.2.4", 1)]);
    expect(summary.relativeChange).toBeUndefined();
    expect(summary.bestVersion).toBe("5.2.4");
    expect(summary.worstVersion).toBe("5.2.4");
  });

  it("has no relative change when the first mean is zero", () => {
    expect(calculateSummary([at("1.0", 0), at("2.0", 1)]).relativeChange).toBeUndefined();
  });

  it("throws on an empty series", () => {
    expect(() => calculateSummary([])).toThrow("Cannot calculate summary from empty series");
  });
});

describe("formatting", () => {
  it("formats signed percentages", () => {
    expect(formatChange(0.125)).toBe("+12.5%");
    expect(formatChange(0)).toBe("0.0%");
    expect(formatChange(undefined)).toBe("n/a");
  });

  it("formats seconds with six decimals", () => {
    expect(formatSeconds(0.5)).toBe("0.500000");
    expect(formatSeconds(0.0000123)).toBe("0.000012");
  });

  it("picks a readable unit", () => {
    expect(pickUnit(2)).toEqual({ label: "s", scale: 1 });
    expect(pickUnit(0.02)).toEqual({ label: "ms", scale: 1e3 });
    expect(pickUnit(0.00002)).toEqual({ label: "µs", scale: 1e6 });
  });
});
