/**
 * Error taxonomy for the comparison pipeline.
 *
 * Per-record, per-file and per-version errors are collected and reported;
 * the structural ones (`NoResultsFoundError`, `UnsupportedFormatError`,
 * `EmptySeriesError`) abort the current report pass.
 *
 * @module
 */

/**
 * One benchmark entry (or the value built from it) is not a valid record.
 */
export class MalformedResultError extends Error {
  override name = "MalformedResultError";

  constructor(
    message: string,
    readonly source?: string,
  ) {
    super(source ? `${source}: ${message}` : message);
  }
}

/**
 * No result file in the scanned set could be decoded.
 */
export class NoResultsFoundError extends Error {
  override name = "NoResultsFoundError";

  constructor(
    readonly location: string,
    readonly skipped: readonly string[] = [],
  ) {
    const detail = skipped.length > 0 ? ` (${skipped.length} file(s) skipped)` : "";
    super(`No benchmark results found in ${location}${detail}`);
  }
}

/**
 * A chart was requested for a series without points.
 * Reaching this means the aggregator produced an invalid series.
 */
export class EmptySeriesError extends Error {
  override name = "EmptySeriesError";

  constructor(readonly identity: string) {
    super(`Cannot render chart for ${identity}: series has no points`);
  }
}

/**
 * The requested report format is unknown or its backend cannot be loaded.
 */
export class UnsupportedFormatError extends Error {
  override name = "UnsupportedFormatError";

  constructor(
    readonly format: string,
    reason?: string,
  ) {
    super(`Unsupported report format "${format}"${reason ? `: ${reason}` : ""}`);
  }
}

export class VersionCheckoutFailedError extends Error {
  override name = "VersionCheckoutFailedError";

  constructor(
    readonly version: string,
    cause: Error,
  ) {
    super(`Checkout of ${version} failed: ${cause.message}`, { cause });
  }
}

export class HarnessRunFailedError extends Error {
  override name = "HarnessRunFailedError";

  constructor(
    readonly version: string,
    message: string,
    cause?: Error,
  ) {
    super(`Benchmark run for ${version} failed: ${message}`, { cause });
  }
}
