/**
 * Benchmark harness invocation.
 *
 * The harness is an external command run inside the checked-out working
 * copy. It is told where to write its JSON result file through the
 * `{output}` placeholder of the command template; `{version}` expands to
 * the version label being measured.
 *
 * @module
 */

import { exec } from "@effectionx/process";
import type { Operation } from "effection";
import { HarnessRunFailedError } from "./errors.ts";
import { wrapResult } from "./result.ts";

/**
 * Options for a single harness run.
 */
export interface HarnessRunOpts {
  /** Version label being measured */
  version: string;
  /** Checked-out working copy, used as the harness's cwd */
  workingCopy: string;
  /** Where the harness must write its result file */
  outputFile: string;
}

/**
 * Runs the benchmarks for one checked-out version.
 */
export interface BenchmarkHarness {
  /**
   * Run the harness to completion.
   * @throws HarnessRunFailedError if the harness fails
   */
  run(opts: HarnessRunOpts): Operation<void>;
}

/**
 * Expand `{output}` and `{version}` in a command template.
 */
export function expandTemplate(
  template: string,
  values: { output: string; version: string },
): string {
  return template.replace(/\{(output|version)\}/g, (_, key: "output" | "version") => values[key]);
}

/**
 * Last lines of a process's stderr, for error messages.
 */
function tail(text: string, lines = 10): string {
  return text.trim().split("\n").slice(-lines).join("\n");
}

/**
 * Harness that runs a shell-style command template.
 */
export function createCommandHarness(template: string): BenchmarkHarness {
  return {
    *run(opts: HarnessRunOpts): Operation<void> {
      const command = expandTemplate(template, {
        output: opts.outputFile,
        version: opts.version,
      });
      console.log(`  $ ${command}`);

      const result = yield* wrapResult(command, exec(command, { cwd: opts.workingCopy }).join());
      if (!result.ok) {
        throw new HarnessRunFailedError(opts.version, result.error.message, result.error);
      }

      const { code, stderr } = result.value;
      if (code !== 0) {
        throw new HarnessRunFailedError(
          opts.version,
          `exit code ${code}${stderr ? `\n${tail(stderr)}` : ""}`,
        );
      }
    },
  };
}
