/**
 * Multi-version run orchestration.
 *
 * For each requested version, strictly in order:
 *
 *   CHECKOUT → RUN → RECORD
 *
 * A failure at any stage is recorded for that version and the next version
 * starts. After the last version the report is generated once over the
 * whole results directory. The run ends COMPLETE if at least one version
 * was recorded, ALL_FAILED otherwise.
 *
 * @module
 */

import { copyFileSync, existsSync, mkdirSync, readFileSync } from "node:fs";
import { basename, join } from "node:path";
import { call, type Operation } from "effection";
import { useCheckout, type WorkingCopy } from "./checkout.ts";
import { HarnessRunFailedError } from "./errors.ts";
import type { BenchmarkHarness } from "./harness.ts";
import { failures, successes, toError, wrapResult, type Result } from "./result.ts";
import { decodeResultFile, formatResultFilename, nextSequence } from "./scanner.ts";
import { useTempDir } from "./temp-dir.ts";
import type { VersionControl } from "./vcs.ts";

export type VersionStage = "CHECKOUT" | "RUN" | "RECORD";

export type RunStatus = "COMPLETE" | "ALL_FAILED";

/**
 * A result file recorded for one version.
 */
export interface RecordedRun {
  version: string;
  sequence: number;
  fileName: string;
  path: string;
  benchmarkCount: number;
}

export type VersionOutcome =
  | { version: string; ok: true; recorded: RecordedRun }
  | { version: string; ok: false; stage: VersionStage; error: Error };

export interface RunOptions<R> {
  /** Version labels, in the order they are run */
  versions: readonly string[];
  workingCopy: WorkingCopy;
  /** `<output>/.benchmarks/<platform-id>` */
  resultsDir: string;
  vcs: VersionControl;
  harness: BenchmarkHarness;
  /** The report step, run once if any version was recorded */
  report: () => Operation<R>;
}

export interface RunOutcome<R> {
  status: RunStatus;
  versions: VersionOutcome[];
  /** Absent when every version failed */
  report?: Result<R>;
  /** Set if the working copy could not be returned to its original ref */
  restoreError?: Error;
}

/**
 * Copy the harness output into the results directory under the next
 * sequence number.
 *
 * @throws HarnessRunFailedError if there is no valid result file
 */
export function recordResult(outputFile: string, version: string, resultsDir: string): RecordedRun {
  if (!existsSync(outputFile)) {
    throw new HarnessRunFailedError(version, "harness did not produce a result file");
  }

  mkdirSync(resultsDir, { recursive: true });
  const sequence = nextSequence(resultsDir);
  const fileName = formatResultFilename(sequence, version);

  let benchmarkCount: number;
  try {
    const decoded = decodeResultFile(readFileSync(outputFile, "utf-8"), basename(outputFile), version, sequence);
    benchmarkCount = decoded.records.length;
  } catch (e) {
    const err = toError(e);
    throw new HarnessRunFailedError(version, `invalid result file: ${err.message}`, err);
  }

  const path = join(resultsDir, fileName);
  copyFileSync(outputFile, path);
  return { version, sequence, fileName, path, benchmarkCount };
}

class StageError extends Error {
  constructor(
    readonly stage: VersionStage,
    readonly error: Error,
  ) {
    super(error.message);
  }
}

/**
 * CHECKOUT → RUN → RECORD for one version.
 * The checkout lease and temp dir live in their own scope and are
 * released before this returns.
 */
function processVersion<R>(version: string, opts: RunOptions<R>): Operation<RecordedRun> {
  return call(function* () {
    let stage: VersionStage = "CHECKOUT";
    try {
      console.log(`  checkout ${version}`);
      const checkout = yield* useCheckout(opts.vcs, opts.workingCopy, version);

      stage = "RUN";
      const dir = yield* useTempDir();
      const outputFile = join(dir, "result.json");
      yield* opts.harness.run({ version, workingCopy: checkout.path, outputFile });

      stage = "RECORD";
      const recorded = recordResult(outputFile, version, opts.resultsDir);
      console.log(`  Wrote: ${recorded.path} (${recorded.benchmarkCount} benchmark(s))`);
      return recorded;
    } catch (e) {
      throw new StageError(stage, toError(e));
    }
  });
}

/**
 * Run every requested version, then the report.
 */
export function* runVersions<R>(opts: RunOptions<R>): Operation<RunOutcome<R>> {
  const path = opts.workingCopy.path;
  const original = yield* wrapResult(path, opts.vcs.currentRef(path));
  if (!original.ok) {
    console.error(`  Could not determine current ref of ${path}: ${original.error.message}`);
  }

  const results: Result<RecordedRun>[] = [];
  let restoreError: Error | undefined;

  try {
    for (let i = 0; i < opts.versions.length; i++) {
      const version = opts.versions[i];
      console.log(`\n[${i + 1}/${opts.versions.length}] ${version}`);
      const result = yield* wrapResult(version, processVersion(version, opts));
      if (!result.ok) {
        console.error(`  ${version}: ${result.error.message}`);
      }
      results.push(result);
    }
  } finally {
    if (original.ok) {
      const restored = yield* wrapResult(original.value, opts.vcs.restore(path, original.value));
      if (!restored.ok) {
        restoreError = restored.error;
        console.error(`  Could not restore ${path} to ${original.value}: ${restored.error.message}`);
      }
    }
  }

  const versions: VersionOutcome[] = results.map((result, i): VersionOutcome => {
    const version = opts.versions[i];
    if (result.ok) return { version, ok: true, recorded: result.value };
    const { error } = result;
    return error instanceof StageError
      ? { version, ok: false, stage: error.stage, error: error.error }
      : { version, ok: false, stage: "CHECKOUT", error };
  });

  if (successes(results).length === 0) {
    console.error(`\nAll ${failures(results).length} version(s) failed; skipping report`);
    return { status: "ALL_FAILED", versions, restoreError };
  }

  console.log("\nGenerating report...");
  const report = yield* wrapResult("report", opts.report());
  return { status: "COMPLETE", versions, report, restoreError };
}
