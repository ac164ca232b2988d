/**
 * Result record model.
 *
 * A record is one benchmark's timing statistics from one result file,
 * tagged with the version label and discovery sequence of that file.
 *
 * @module
 */

import { MalformedResultError } from "./errors.ts";

/**
 * What was measured, independent of version.
 */
export interface BenchmarkIdentity {
  readonly name: string;
  readonly param?: string;
}

/**
 * One measured run of one benchmark.
 * All time values are in seconds.
 */
export interface ResultRecord {
  readonly identity: BenchmarkIdentity;
  readonly version: string;
  readonly mean: number;
  readonly min: number;
  readonly max: number;
  readonly stddev: number;
  readonly rounds: number;
  readonly sequence: number;
}

/**
 * Loosely typed input, as it comes from a decoder.
 */
export interface ResultRecordInput {
  identity: BenchmarkIdentity;
  version: string;
  mean?: number;
  min?: number;
  max?: number;
  stddev?: number;
  rounds?: number;
  sequence: number;
}

const TIMING_FIELDS = ["mean", "min", "max", "stddev"] as const;

function requireTiming(
  input: ResultRecordInput,
  field: (typeof TIMING_FIELDS)[number],
): number {
  const value = input[field];
  if (value === undefined) {
    throw new MalformedResultError(`${identityLabel(input.identity)}: missing ${field}`);
  }
  if (!Number.isFinite(value) || value < 0) {
    throw new MalformedResultError(
      `${identityLabel(input.identity)}: ${field} must be a finite non-negative number, got ${value}`,
    );
  }
  return value;
}

/**
 * Build a validated, frozen record.
 *
 * @throws MalformedResultError if a timing field is missing, negative or
 *   non-finite, or if rounds is not an integer >= 1
 */
export function createResultRecord(input: ResultRecordInput): ResultRecord {
  const [mean, min, max, stddev] = TIMING_FIELDS.map((field) =>
    requireTiming(input, field),
  );

  const { rounds } = input;
  if (rounds === undefined || !Number.isInteger(rounds) || rounds < 1) {
    throw new MalformedResultError(
      `${identityLabel(input.identity)}: rounds must be an integer >= 1, got ${rounds}`,
    );
  }

  const identity: BenchmarkIdentity =
    input.identity.param === undefined
      ? { name: input.identity.name }
      : { name: input.identity.name, param: input.identity.param };

  return Object.freeze({
    identity: Object.freeze(identity),
    version: input.version,
    mean,
    min,
    max,
    stddev,
    rounds,
    sequence: input.sequence,
  });
}

/**
 * Stable map key for an identity.
 */
export function identityKey(identity: BenchmarkIdentity): string {
  return identity.param === undefined
    ? identity.name
    : `${identity.name}\u0000${identity.param}`;
}

/**
 * Human readable identity: the base name with the parameter signature as
 * a bracketed suffix.
 */
export function identityLabel(identity: BenchmarkIdentity): string {
  return identity.param === undefined
    ? identity.name
    : `${identity.name} [${identity.param}]`;
}

export function sameIdentity(a: BenchmarkIdentity, b: BenchmarkIdentity): boolean {
  return a.name === b.name && a.param === b.param;
}

/**
 * Split a test name like `test_load[10000-people]` into its base name and
 * parameter signature. An explicit `param` wins over the bracketed suffix.
 */
export function parseIdentity(name: string, param?: string | null): BenchmarkIdentity {
  const match = name.match(/^(.+?)\[(.*)\]$/);
  const baseName = match ? match[1] : name;
  const suffix = match ? match[2] : undefined;
  const signature = param ?? suffix;
  return signature === undefined || signature === ""
    ? { name: baseName }
    : { name: baseName, param: signature };
}
