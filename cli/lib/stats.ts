/**
 * Summary statistics for comparison series.
 * Pure functions with no Effection dependencies.
 *
 * @module
 */

import type { ResultRecord } from "./record.ts";

/**
 * Derived numbers shown in the report's summary table.
 * All time values are in seconds.
 */
export interface SeriesSummary {
  /** Lowest mean across versions */
  bestMean: number;
  bestVersion: string;
  /** Highest mean across versions */
  worstMean: number;
  worstVersion: string;
  firstMean: number;
  lastMean: number;
  /**
   * (last - first) / first, e.g. -0.5 for a run that got twice as fast.
   * Undefined for single-point series and when the first mean is 0.
   */
  relativeChange: number | undefined;
}

/**
 * Calculate summary statistics for records already in version order.
 *
 * @throws Error if records is empty
 */
export function calculateSummary(records: readonly ResultRecord[]): SeriesSummary {
  if (records.length === 0) {
    throw new Error("Cannot calculate summary from empty series");
  }

  let best = records[0];
  let worst = records[0];
  for (const record of records) {
    if (record.mean < best.mean) best = record;
    if (record.mean > worst.mean) worst = record;
  }

  const first = records[0];
  const last = records[records.length - 1];

  return {
    bestMean: best.mean,
    bestVersion: best.version,
    worstMean: worst.mean,
    worstVersion: worst.version,
    firstMean: first.mean,
    lastMean: last.mean,
    relativeChange: relativeChange(first.mean, last.mean, records.length),
  };
}

function relativeChange(first: number, last: number, count: number): number | undefined {
  if (count < 2 || first === 0) return undefined;
  return (last - first) / first;
}

/**
 * Format a relative change as a signed percentage ("-50.0%", "+12.5%").
 */
export function formatChange(change: number | undefined): string {
  if (change === undefined) return "n/a";
  const percent = change * 100;
  const sign = percent > 0 ? "+" : "";
  return `${sign}${percent.toFixed(1)}%`;
}

/**
 * Format a time in seconds with six decimals.
 */
export function formatSeconds(value: number): string {
  return value.toFixed(6);
}

/**
 * Display unit for a set of times in seconds.
 */
export interface TimeUnit {
  label: "s" | "ms" | "µs";
  /** Multiplier from seconds to this unit */
  scale: number;
}

/**
 * Pick the unit that keeps the largest value readable.
 */
export function pickUnit(maxSeconds: number): TimeUnit {
  if (maxSeconds >= 1) return { label: "s", scale: 1 };
  if (maxSeconds >= 1e-3) return { label: "ms", scale: 1e3 };
  return { label: "µs", scale: 1e6 };
}
