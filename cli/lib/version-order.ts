/**
 * Version-ordering policy for comparison series.
 *
 * Labels are free text. Dotted numeric versions (optionally prefixed with
 * `v` and optionally carrying a pre-release suffix) are ordered
 * numerically, with a pre-release sorting before its release:
 *
 *   5.1.6 < 5.2.4 < 6.0.4-alpha1 < 6.0.4-b1 < 6.0.4-rc.2 < 6.0.4 < 6.1.0
 *
 * Anything else ("current", "main", "HEAD~3") sorts after every parseable
 * version, in the order it was first encountered.
 *
 * @module
 */

/**
 * Sortable form of a parsed version label.
 */
export interface VersionKey {
  /** Numeric release components, e.g. [6, 0, 4] */
  core: number[];
  /** Pre-release rank: alpha 100, beta 200, other 250, rc 300, release 999 */
  rank: number;
  /** Trailing number of the pre-release tag, 0 if none */
  preNumber: number;
}

const RELEASE_RANK = 999;

function prereleaseRank(tag: string): number {
  if (/^(alpha|a)(\d|\.|-|$)/.test(tag)) return 100;
  if (/^(beta|b)(\d|\.|-|$)/.test(tag)) return 200;
  if (/^(rc|c)(\d|\.|-|$)/.test(tag)) return 300;
  return 250;
}

/**
 * Parse a version label, or return undefined if it is not a dotted
 * numeric version.
 */
export function parseVersion(label: string): VersionKey | undefined {
  const match = label
    .trim()
    .match(/^[vV]?(\d+(?:\.\d+)*)(?:-([0-9A-Za-z.-]+)|([A-Za-z][0-9A-Za-z.-]*))?$/);
  if (!match) return undefined;

  const core = match[1].split(".").map((part) => parseInt(part, 10));
  const tag = (match[2] ?? match[3])?.toLowerCase();
  if (tag === undefined) {
    return { core, rank: RELEASE_RANK, preNumber: 0 };
  }

  const trailing = tag.match(/(\d+)$/);
  return {
    core,
    rank: prereleaseRank(tag),
    preNumber: trailing ? parseInt(trailing[1], 10) : 0,
  };
}

/**
 * Compare two parsed versions. Missing trailing components count as 0,
 * so "5.2" and "5.2.0" compare equal.
 */
export function compareVersionKeys(a: VersionKey, b: VersionKey): number {
  for (let i = 0; i < Math.max(a.core.length, b.core.length); i++) {
    const diff = (a.core[i] ?? 0) - (b.core[i] ?? 0);
    if (diff !== 0) return diff;
  }
  if (a.rank !== b.rank) return a.rank - b.rank;
  return a.preNumber - b.preNumber;
}

/**
 * A version label together with the position it was first seen at.
 */
export interface SeenVersion {
  label: string;
  firstSeen: number;
}

/**
 * Order version labels: parseable versions ascending, then the rest in
 * first-encountered order. Equal versions keep first-encountered order.
 */
export function orderVersions(versions: readonly SeenVersion[]): string[] {
  const parsed = versions.map((v) => ({ ...v, key: parseVersion(v.label) }));

  return parsed
    .sort((a, b) => {
      if (a.key && b.key) {
        return compareVersionKeys(a.key, b.key) || a.firstSeen - b.firstSeen;
      }
      if (a.key) return -1;
      if (b.key) return 1;
      return a.firstSeen - b.firstSeen;
    })
    .map((v) => v.label);
}

/**
 * Comparator over bare labels, for lists without discovery order.
 * Unparseable labels keep their relative input order (Array#sort is stable).
 */
export function compareVersionLabels(a: string, b: string): number {
  const ka = parseVersion(a);
  const kb = parseVersion(b);
  if (ka && kb) return compareVersionKeys(ka, kb);
  if (ka) return -1;
  if (kb) return 1;
  return 0;
}
