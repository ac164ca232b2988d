/**
 * Series aggregation.
 *
 * Groups result records by benchmark identity, keeps the most recent
 * record per version (highest sequence wins) and orders the remaining
 * points with the version-ordering policy.
 *
 * Series are immutable; to update one, scan again and rebuild.
 *
 * @module
 */

import {
  identityKey,
  type BenchmarkIdentity,
  type ResultRecord,
} from "./record.ts";
import { calculateSummary, type SeriesSummary } from "./stats.ts";
import { orderVersions } from "./version-order.ts";

export interface SeriesPoint {
  readonly version: string;
  readonly record: ResultRecord;
}

/**
 * Ordered per-version measurements of one benchmark.
 */
export interface ComparisonSeries {
  readonly identity: BenchmarkIdentity;
  readonly points: readonly SeriesPoint[];
}

/**
 * A series together with its derived summary statistics.
 */
export interface SummarizedSeries extends ComparisonSeries {
  readonly summary: SeriesSummary;
}

interface Group {
  identity: BenchmarkIdentity;
  latest: Map<string, ResultRecord>;
  firstSeen: Map<string, number>;
}

function compareIdentities(a: BenchmarkIdentity, b: BenchmarkIdentity): number {
  if (a.name !== b.name) return a.name < b.name ? -1 : 1;
  if (a.param === b.param) return 0;
  if (a.param === undefined) return -1;
  if (b.param === undefined) return 1;
  return a.param < b.param ? -1 : 1;
}

/**
 * Build one series per distinct identity, sorted by name and parameter.
 * Input order does not matter.
 */
export function aggregateSeries(records: readonly ResultRecord[]): ComparisonSeries[] {
  const groups = new Map<string, Group>();

  for (const record of records) {
    const key = identityKey(record.identity);
    let group = groups.get(key);
    if (!group) {
      group = { identity: record.identity, latest: new Map(), firstSeen: new Map() };
      groups.set(key, group);
    }

    // Last write wins per version.
    const current = group.latest.get(record.version);
    if (!current || record.sequence > current.sequence) {
      group.latest.set(record.version, record);
    }

    const seen = group.firstSeen.get(record.version);
    if (seen === undefined || record.sequence < seen) {
      group.firstSeen.set(record.version, record.sequence);
    }
  }

  return Array.from(groups.values())
    .sort((a, b) => compareIdentities(a.identity, b.identity))
    .map((group) => {
      const order = orderVersions(
        Array.from(group.firstSeen, ([label, firstSeen]) => ({ label, firstSeen })),
      );
      const points = order.map((version) => {
        const record = group.latest.get(version);
        if (!record) {
          throw new Error(`Internal error: no record for version ${version}`);
        }
        return Object.freeze({ version, record });
      });
      return Object.freeze({
        identity: group.identity,
        points: Object.freeze(points),
      });
    });
}

/**
 * Attach summary statistics to every series.
 */
export function summarizeSeries(series: readonly ComparisonSeries[]): SummarizedSeries[] {
  return series.map((s) =>
    Object.freeze({ ...s, summary: calculateSummary(s.points.map((p) => p.record)) }),
  );
}

/**
 * Distinct version labels across all series, in version order.
 */
export function allVersions(records: readonly ResultRecord[]): string[] {
  const firstSeen = new Map<string, number>();
  for (const record of records) {
    const seen = firstSeen.get(record.version);
    if (seen === undefined || record.sequence < seen) {
      firstSeen.set(record.version, record.sequence);
    }
  }
  return orderVersions(Array.from(firstSeen, ([label, seen]) => ({ label, firstSeen: seen })));
}
