/**
 * benchmark.config.json loading and defaults.
 *
 * @module
 */

import { existsSync, readFileSync } from "node:fs";
import { arch, type } from "node:os";
import { ZodError } from "zod";
import { validateBenchmarkConfig, type BenchmarkConfig } from "./schema.ts";

export const CONFIG_FILE = "benchmark.config.json";

/**
 * Environment variable that overrides the version label in single-file mode.
 */
export const VERSION_ENV = "BENCH_VERSION";

/**
 * Load the config file.
 * A missing file yields defaults; an unreadable or invalid one is an error.
 */
export function loadConfig(path = CONFIG_FILE): BenchmarkConfig {
  if (!existsSync(path)) {
    return validateBenchmarkConfig({});
  }

  let data: unknown;
  try {
    data = JSON.parse(readFileSync(path, "utf-8"));
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new Error(`Failed to read ${path}: ${reason}`);
  }

  try {
    return validateBenchmarkConfig(data);
  } catch (error) {
    if (error instanceof ZodError) {
      const issues = error.issues.map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`);
      throw new Error(`Invalid ${path}:\n  ${issues.join("\n  ")}`);
    }
    throw error;
  }
}

/**
 * Default platform folder name, e.g. "Linux-x64-node20".
 */
export function defaultPlatformId(): string {
  const major = process.versions.node.split(".")[0];
  return `${type()}-${arch()}-node${major}`;
}
