/**
 * Filesystem-safe names for chart artifacts.
 *
 * @module
 */

import { identityKey, type BenchmarkIdentity } from "./record.ts";

const MAX_SLUG_LENGTH = 120;

/**
 * Slug for one identity. Brackets, slashes, spaces and every other
 * character outside [A-Za-z0-9._-] become underscores.
 *
 * slugify({ name: "test_load", param: "1000/people" }) === "test_load_1000_people"
 */
export function slugify(identity: BenchmarkIdentity): string {
  const raw = identity.param === undefined
    ? identity.name
    : `${identity.name}_${identity.param}`;

  const slug = raw
    .replace(/[^A-Za-z0-9._-]+/g, "_")
    .replace(/^[_.-]+|[_.-]+$/g, "")
    .slice(0, MAX_SLUG_LENGTH);

  return slug === "" ? "benchmark" : slug;
}

/**
 * Assign a unique slug to every identity, keyed by `identityKey`.
 * Collisions (compared case-insensitively) get a numeric suffix.
 */
export function assignSlugs(identities: readonly BenchmarkIdentity[]): Map<string, string> {
  const slugs = new Map<string, string>();
  const taken = new Set<string>();

  for (const identity of identities) {
    const base = slugify(identity);
    let slug = base;
    for (let n = 2; taken.has(slug.toLowerCase()); n++) {
      slug = `${base}-${n}`;
    }
    taken.add(slug.toLowerCase());
    slugs.set(identityKey(identity), slug);
  }

  return slugs;
}
