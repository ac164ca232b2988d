/**
 * Zod schemas for benchmark result files and the benchmark config.
 * This is the single source of truth for the data format read from disk.
 *
 * Result files follow the pytest-benchmark JSON layout: a top-level
 * `benchmarks` array whose entries carry a `name`, an optional `param`
 * and a `stats` block. Timing values are in seconds.
 *
 * @module
 */

import { z } from "zod";

/**
 * Report formats the generator knows about.
 */
export const FORMATS = ["pdf", "html", "markdown"] as const;

/**
 * Report format schema.
 */
export const FormatIdSchema = z.enum(FORMATS);

/**
 * Report format type.
 */
export type FormatId = z.infer<typeof FormatIdSchema>;

/**
 * Chart styles: grouped bars or a line over versions.
 */
export const CHART_STYLES = ["bar", "line"] as const;

export const ChartStyleSchema = z.enum(CHART_STYLES);

export type ChartStyle = z.infer<typeof ChartStyleSchema>;

/**
 * A non-negative, finite timing value in seconds.
 */
const SecondsSchema = z.number().finite().nonnegative();

/**
 * Statistics block of one benchmark entry.
 * Extra fields written by the harness (median, iqr, ops, ...) are ignored.
 */
export const EntryStatsSchema = z.object({
  mean: SecondsSchema,
  min: SecondsSchema,
  max: SecondsSchema,
  stddev: SecondsSchema,
  rounds: z.number().int().min(1),
});

export type EntryStats = z.infer<typeof EntryStatsSchema>;

/**
 * A single benchmark entry.
 */
export const ResultEntrySchema = z.object({
  name: z.string().min(1),
  param: z.string().nullish(),
  stats: EntryStatsSchema,
});

export type ResultEntry = z.infer<typeof ResultEntrySchema>;

/**
 * Host information recorded by the harness. Only a few fields are shown.
 */
export const MachineInfoSchema = z
  .object({
    node: z.string().optional(),
    system: z.string().optional(),
    release: z.string().optional(),
    machine: z.string().optional(),
    cpu: z.object({ brand_raw: z.string().optional() }).passthrough().optional(),
  })
  .passthrough();

export type MachineInfo = z.infer<typeof MachineInfoSchema>;

/**
 * Outer shape of a result file.
 *
 * Entries are left as `unknown` here so that one malformed entry does not
 * reject the whole file; each entry is validated with `ResultEntrySchema`.
 */
export const ResultFileSchema = z.object({
  machine_info: MachineInfoSchema.optional(),
  benchmarks: z.array(z.unknown()),
});

export type ResultFile = z.infer<typeof ResultFileSchema>;

/**
 * Configuration file schema (benchmark.config.json).
 */
export const BenchmarkConfigSchema = z.object({
  versions: z.array(z.string().min(1)).default([]),
  workingCopy: z.string().min(1).optional(),
  refTemplate: z.string().includes("{version}").optional(),
  output: z.string().min(1).optional(),
  platformId: z.string().min(1).optional(),
  format: FormatIdSchema.optional(),
  chartStyle: ChartStyleSchema.optional(),
  harness: z
    .object({
      command: z.string().min(1),
    })
    .optional(),
});

export type BenchmarkConfig = z.infer<typeof BenchmarkConfigSchema>;

/**
 * Safe validation of a decoded result file.
 */
export function safeParseResultFile(
  data: unknown,
): z.SafeParseReturnType<unknown, ResultFile> {
  return ResultFileSchema.safeParse(data);
}

/**
 * Validate benchmark config file.
 * Throws ZodError if validation fails.
 */
export function validateBenchmarkConfig(data: unknown): BenchmarkConfig {
  return BenchmarkConfigSchema.parse(data);
}
