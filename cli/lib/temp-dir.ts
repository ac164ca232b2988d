/**
 * Temporary directory resource.
 *
 * The harness writes its result file here; the orchestrator then records
 * it into the results directory under its final name.
 *
 * @module
 */

import { mkdtempSync, rmSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { resource, type Operation } from "effection";

/**
 * Create a temporary directory as a resource.
 * The directory is removed when the enclosing scope exits.
 *
 * @param prefix - Prefix for the temp directory name
 * @returns The path to the created temp directory
 */
export function useTempDir(prefix = "version-bench-"): Operation<string> {
  return resource(function* (provide) {
    const dir = mkdtempSync(join(tmpdir(), prefix));
    try {
      yield* provide(dir);
    } finally {
      rmSync(dir, { recursive: true, force: true });
    }
  });
}
