import { readdirSync, writeFileSync } from "node:fs";
import { join } from "node:path";
import { run, type Operation } from "effection";
import { afterEach, beforeEach, describe, expect, it } from "vitest";

import { WorkingCopy } from "./checkout.ts";
import { HarnessRunFailedError, VersionCheckoutFailedError } from "./errors.ts";
import type { BenchmarkHarness, HarnessRunOpts } from "./harness.ts";
import { recordResult, runVersions, type RunOptions } from "./orchestrator.ts";
import { scanResults } from "./scanner.ts";
import { aggregateSeries } from "./series.ts";
import { makeTempDir, resultFileJson } from "./testing.ts";
import type { VersionControl } from "./vcs.ts";

interface FakeVcs extends VersionControl {
  log: string[];
}

function fakeVcs(failing: string[] = []): FakeVcs {
  const log: string[] = [];
  return {
    log,
    *currentRef(): Operation<string> {
      return "main";
    },
    *checkout(_workingCopy: string, version: string): Operation<void> {
      log.push(`checkout ${version}`);
      if (failing.includes(version)) {
        throw new Error(`pathspec '${version}' did not match`);
      }
    },
    *restore(_workingCopy: string, ref: string): Operation<void> {
      log.push(`restore ${ref}`);
    },
  };
}

interface FakeHarness extends BenchmarkHarness {
  runs: { version: string; holder: string | undefined }[];
}

/**
 * Writes a result file whose mean is looked up per version.
 */
function fakeHarness(
  workingCopy: WorkingCopy,
  means: Record<string, number>,
  failing: string[] = [],
): FakeHarness {
  const runs: FakeHarness["runs"] = [];
  return {
    runs,
    *run(opts: HarnessRunOpts): Operation<void> {
      runs.push({ version: opts.version, holder: workingCopy.holder });
      if (failing.includes(opts.version)) {
        throw new HarnessRunFailedError(opts.version, "exit code 2");
      }
      const mean = means[opts.version] ?? 1;
      writeFileSync(opts.outputFile, resultFileJson([{ name: "test_load", param: "1000", mean }]));
    },
  };
}

describe("runVersions", () => {
  let tmp: ReturnType<typeof makeTempDir>;
  let resultsDir: string;

  beforeEach(() => {
    tmp = makeTempDir();
    resultsDir = join(tmp.path, ".benchmarks", "test-platform");
  });

  afterEach(() => {
    tmp.remove();
  });

  function setup(opts: { failCheckout?: string[]; failRun?: string[] } = {}) {
    const workingCopy = new WorkingCopy(join(tmp.path, "app"));
    const vcs = fakeVcs(opts.failCheckout);
    const harness = fakeHarness(workingCopy, { "5.2.4": 1.0, "6.0.4": 0.5 }, opts.failRun);
    let reports = 0;
    const options: RunOptions<number> = {
      versions: ["5.2.4", "6.0.4"],
      workingCopy,
      resultsDir,
      vcs,
      harness,
      *report(): Operation<number> {
        reports++;
        return scanResults(resultsDir).files.length;
      },
    };
    return { workingCopy, vcs, harness, options, reports: () => reports };
  }

  it("records every version and reports once", async () => {
    const { vcs, options, reports } = setup();

    const outcome = await run(() => runVersions(options));

    expect(outcome.status).toBe("COMPLETE");
    expect(outcome.versions.map((v) => v.ok)).toEqual([true, true]);
    expect(outcome.report).toEqual({ ok: true, value: 2 });
    expect(reports()).toBe(1);
    expect(readdirSync(resultsDir).sort()).toEqual(["0001_5.2.4.json", "0002_6.0.4.json"]);
    expect(vcs.log).toEqual(["checkout 5.2.4", "checkout 6.0.4", "restore main"]);
  });

  it("holds the working copy during a run and releases it after", async () => {
    const { workingCopy, harness, options } = setup();

    await run(() => runVersions(options));

    expect(harness.runs).toEqual([
      { version: "5.2.4", holder: "5.2.4" },
      { version: "6.0.4", holder: "6.0.4" },
    ]);
    expect(workingCopy.holder).toBeUndefined();
  });

  it("continues after a failed checkout", async () => {
    const { harness, options, reports } = setup({ failCheckout: ["5.2.4"] });

    const outcome = await run(() => runVersions(options));

    expect(outcome.status).toBe("COMPLETE");
    const [first, second] = outcome.versions;
    expect(first.ok).toBe(false);
    if (!first.ok) {
      expect(first.stage).toBe("CHECKOUT");
      expect(first.error).toBeInstanceOf(VersionCheckoutFailedError);
    }
    expect(second.ok).toBe(true);
    expect(harness.runs.map((r) => r.version)).toEqual(["6.0.4"]);
    expect(reports()).toBe(1);
    expect(readdirSync(resultsDir)).toEqual(["0001_6.0.4.json"]);
  });

  it("attributes a harness failure to the RUN stage", async () => {
    const { options } = setup({ failRun: ["6.0.4"] });

    const outcome = await run(() => runVersions(options));

    const failed = outcome.versions[1];
    expect(failed.ok).toBe(false);
    if (!failed.ok) {
      expect(failed.stage).toBe("RUN");
      expect(failed.error.message).toBe("Benchmark run for 6.0.4 failed: exit code 2");
    }
  });

  it("skips the report when every version fails", async () => {
    const { workingCopy, vcs, options, reports } = setup({ failCheckout: ["5.2.4", "6.0.4"] });

    const outcome = await run(() => runVersions(options));

    expect(outcome.status).toBe("ALL_FAILED");
    expect(outcome.report).toBeUndefined();
    expect(reports()).toBe(0);
    expect(vcs.log[vcs.log.length - 1]).toBe("restore main");
    expect(workingCopy.holder).toBeUndefined();
  });

  it("numbers results after those already recorded", async () => {
    const { options } = setup();

    await run(() => runVersions(options));
    await run(() => runVersions({ ...options, versions: ["6.0.4"] }));

    expect(readdirSync(resultsDir).sort()).toEqual([
      "0001_5.2.4.json",
      "0002_6.0.4.json",
      "0003_6.0.4.json",
    ]);
  });

  it("keeps labels that differ only in filename-unsafe characters apart", async () => {
    const workingCopy = new WorkingCopy(join(tmp.path, "app"));
    const harness = fakeHarness(workingCopy, { "release/6.0": 1.0, "release-6.0": 2.0 });

    const outcome = await run(() =>
      runVersions({
        versions: ["release/6.0", "release-6.0"],
        workingCopy,
        resultsDir,
        vcs: fakeVcs(),
        harness,
        *report() {
          const [series] = aggregateSeries(scanResults(resultsDir).records);
          return series.points.map((p) => [p.version, p.record.mean]);
        },
      }),
    );

    expect(readdirSync(resultsDir).sort()).toEqual([
      "0001_release%2F6.0.json",
      "0002_release-6.0.json",
    ]);
    expect(outcome.report).toEqual({
      ok: true,
      value: [
        ["release/6.0", 1.0],
        ["release-6.0", 2.0],
      ],
    });
  });

  it("returns a report failure without failing the run", async () => {
    const { options } = setup();

    const outcome = await run(() =>
      runVersions({
        ...options,
        *report(): Operation<number> {
          throw new Error("renderer crashed");
        },
      }),
    );

    expect(outcome.status).toBe("COMPLETE");
    expect(outcome.report?.ok).toBe(false);
  });
});

describe("recordResult", () => {
  let tmp: ReturnType<typeof makeTempDir>;

  beforeEach(() => {
    tmp = makeTempDir();
  });

  afterEach(() => {
    tmp.remove();
  });

  it("fails when the harness wrote nothing", () => {
    expect(() => recordResult(join(tmp.path, "missing.json"), "5.2.4", tmp.path)).toThrow(
      "Benchmark run for 5.2.4 failed: harness did not produce a result file",
    );
  });

  it("fails on an unreadable result file", () => {
    const output = join(tmp.path, "result.json");
    writeFileSync(output, "not json");
    expect(() => recordResult(output, "5.2.4", join(tmp.path, "results"))).toThrow(
      HarnessRunFailedError,
    );
  });

  it("copies the file under the next sequence number", () => {
    const output = join(tmp.path, "result.json");
    writeFileSync(output, resultFileJson([{ name: "a", mean: 1 }, { name: "b", mean: 2 }]));

    const recorded = recordResult(output, "feature/x", join(tmp.path, "results"));

    expect(recorded).toEqual({
      version: "feature/x",
      sequence: 1,
      fileName: "0001_feature%2Fx.json",
      path: join(tmp.path, "results", "0001_feature%2Fx.json"),
      benchmarkCount: 2,
    });
  });
});
