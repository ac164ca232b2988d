/**
 * Result store scanner.
 *
 * Reads a results directory laid out as
 * `.benchmarks/<platform-id>/NNNN_<version>.json` and decodes every file
 * into result records. A file that cannot be decoded is skipped with a
 * warning; scanning continues with the remaining files.
 *
 * The directory is the only persistent state: every scan re-derives all
 * records from disk.
 *
 * @module
 */

import { existsSync, readdirSync, readFileSync, statSync } from "node:fs";
import { basename, join } from "node:path";
import type { ZodError } from "zod";
import { MalformedResultError, NoResultsFoundError } from "./errors.ts";
import {
  createResultRecord,
  parseIdentity,
  type ResultRecord,
} from "./record.ts";
import { isErr, isOk, tryResult } from "./result.ts";
import {
  ResultEntrySchema,
  safeParseResultFile,
  type MachineInfo,
} from "./schema.ts";

/**
 * Name of the directory holding per-platform result folders.
 */
export const RESULTS_DIR = ".benchmarks";

/**
 * Sequence number and version label encoded in a result filename.
 */
export interface ResultFileName {
  sequence: number;
  label: string;
}

/**
 * A result file that was decoded.
 */
export interface ScannedFile {
  path: string;
  fileName: string;
  version: string;
  sequence: number;
  recordCount: number;
}

/**
 * Something that was left out of the scan.
 * `file` warnings mean the whole file was skipped, `record` warnings a
 * single benchmark entry.
 */
export interface ScanWarning {
  kind: "file" | "record";
  fileName: string;
  message: string;
}

export interface ScanResult {
  /** Directory or file that was scanned */
  location: string;
  records: ResultRecord[];
  files: ScannedFile[];
  warnings: ScanWarning[];
  /** Host information from the first decoded file that has any */
  machineInfo?: MachineInfo;
}

/**
 * Percent-encode a version label for use in a filename. The encoding is
 * reversible, so `release/6.0` and `release-6.0` stay distinct.
 */
export function encodeLabel(label: string): string {
  return encodeURIComponent(label).replace(
    /[!'()*]/g,
    (c) => `%${c.charCodeAt(0).toString(16).toUpperCase()}`,
  );
}

/**
 * Inverse of `encodeLabel`. A hand-named file whose label is not valid
 * percent-encoding keeps its label as written.
 */
export function decodeLabel(encoded: string): string {
  try {
    return decodeURIComponent(encoded);
  } catch (e) {
    if (e instanceof URIError) return encoded;
    throw e;
  }
}

/**
 * Parse `NNNN_<label>.json` into its parts.
 * Repeated `.json` extensions are tolerated.
 */
export function parseResultFilename(fileName: string): ResultFileName | undefined {
  let base = fileName;
  if (!base.endsWith(".json")) return undefined;
  while (base.endsWith(".json")) {
    base = base.slice(0, -".json".length);
  }

  const match = base.match(/^(\d+)_(.+)$/);
  if (!match) return undefined;

  return { sequence: parseInt(match[1], 10), label: decodeLabel(match[2]) };
}

/**
 * Format a result filename for a sequence number and version label.
 */
export function formatResultFilename(sequence: number, label: string): string {
  return `${String(sequence).padStart(4, "0")}_${encodeLabel(label)}.json`;
}

function formatIssues(error: ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message))
    .join("; ");
}

function entryName(entry: unknown): string | undefined {
  if (typeof entry === "object" && entry !== null && "name" in entry) {
    return typeof entry.name === "string" ? entry.name : undefined;
  }
  return undefined;
}

/**
 * Records and entry-level warnings decoded from one file.
 */
export interface DecodedFile {
  records: ResultRecord[];
  warnings: ScanWarning[];
  machineInfo?: MachineInfo;
}

/**
 * Decode the contents of one result file.
 *
 * @throws MalformedResultError if the document is not a result file at all
 */
export function decodeResultFile(
  text: string,
  fileName: string,
  version: string,
  sequence: number,
): DecodedFile {
  let data: unknown;
  try {
    data = JSON.parse(text);
  } catch (e) {
    const reason = e instanceof Error ? e.message : String(e);
    throw new MalformedResultError(`invalid JSON (${reason})`, fileName);
  }

  const parsed = safeParseResultFile(data);
  if (!parsed.success) {
    throw new MalformedResultError(formatIssues(parsed.error), fileName);
  }

  const records: ResultRecord[] = [];
  const warnings: ScanWarning[] = [];

  parsed.data.benchmarks.forEach((entry, index) => {
    const context = entryName(entry) ?? `benchmarks[${index}]`;
    const result = tryResult(context, () => {
      const valid = ResultEntrySchema.safeParse(entry);
      if (!valid.success) {
        throw new MalformedResultError(formatIssues(valid.error), context);
      }
      const { name, param, stats } = valid.data;
      return createResultRecord({
        identity: parseIdentity(name, param),
        version,
        ...stats,
        sequence,
      });
    });

    if (isOk(result)) {
      records.push(result.value);
    } else {
      warnings.push({ kind: "record", fileName, message: result.error.message });
    }
  });

  return { records, warnings, machineInfo: parsed.data.machine_info };
}

/**
 * List result files in a directory in sequence order.
 * JSON files that do not follow the naming convention are returned as
 * warnings.
 */
export function listResultFiles(dir: string): {
  files: { fileName: string; parsed: ResultFileName }[];
  ignored: ScanWarning[];
} {
  const names = readdirSync(dir, { withFileTypes: true })
    .filter((entry) => entry.isFile() && entry.name.endsWith(".json"))
    .map((entry) => entry.name);

  const files: { fileName: string; parsed: ResultFileName }[] = [];
  const ignored: ScanWarning[] = [];

  for (const fileName of names) {
    const parsed = parseResultFilename(fileName);
    if (parsed) {
      files.push({ fileName, parsed });
    } else {
      ignored.push({
        kind: "file",
        fileName,
        message: "filename does not match NNNN_<version>.json",
      });
    }
  }

  files.sort(
    (a, b) =>
      a.parsed.sequence - b.parsed.sequence ||
      (a.fileName < b.fileName ? -1 : a.fileName > b.fileName ? 1 : 0),
  );
  ignored.sort((a, b) => (a.fileName < b.fileName ? -1 : 1));

  return { files, ignored };
}

interface PendingFile {
  path: string;
  fileName: string;
  version: string;
  sequence: number;
}

function scanPending(location: string, pending: PendingFile[], initial: ScanWarning[]): ScanResult {
  const records: ResultRecord[] = [];
  const files: ScannedFile[] = [];
  const warnings: ScanWarning[] = [...initial];
  let machineInfo: MachineInfo | undefined;

  for (const file of pending) {
    const result = tryResult(file.fileName, () =>
      decodeResultFile(readFileSync(file.path, "utf-8"), file.fileName, file.version, file.sequence),
    );

    if (isErr(result)) {
      warnings.push({ kind: "file", fileName: file.fileName, message: result.error.message });
      continue;
    }

    const decoded = result.value;
    records.push(...decoded.records);
    warnings.push(...decoded.warnings);
    machineInfo ??= decoded.machineInfo;
    files.push({ ...file, recordCount: decoded.records.length });
  }

  if (files.length === 0) {
    throw new NoResultsFoundError(
      location,
      warnings.filter((w) => w.kind === "file").map((w) => w.fileName),
    );
  }

  return { location, records, files, warnings, machineInfo };
}

/**
 * Scan a results directory.
 *
 * Every record from one file shares that file's version label and
 * sequence. Sequence is the file's 1-based position in sequence order.
 *
 * @throws NoResultsFoundError if the directory is missing or no file in it
 *   can be decoded
 */
export function scanResults(dir: string): ScanResult {
  if (!existsSync(dir) || !statSync(dir).isDirectory()) {
    throw new NoResultsFoundError(dir);
  }

  const { files, ignored } = listResultFiles(dir);
  const pending = files.map(({ fileName, parsed }, index) => ({
    path: join(dir, fileName),
    fileName,
    version: parsed.label,
    sequence: index + 1,
  }));

  return scanPending(dir, pending, ignored);
}

/**
 * Scan a single result file.
 *
 * The version label is, in order: the explicit override, the label from
 * the filename convention, the file's base name.
 *
 * @throws NoResultsFoundError if the file is missing or cannot be decoded
 */
export function scanFile(path: string, versionOverride?: string): ScanResult {
  const fileName = basename(path);
  if (!existsSync(path)) {
    throw new NoResultsFoundError(path);
  }

  const fromName = parseResultFilename(fileName);
  const version =
    versionOverride ?? fromName?.label ?? fileName.replace(/(\.json)+$/, "");

  return scanPending(path, [{ path, fileName, version, sequence: 1 }], []);
}

/**
 * Platform folders under `<output>/.benchmarks`, sorted by name.
 */
export function listPlatformDirs(outputDir: string): string[] {
  const root = join(outputDir, RESULTS_DIR);
  if (!existsSync(root)) return [];
  return readdirSync(root, { withFileTypes: true })
    .filter((entry) => entry.isDirectory())
    .map((entry) => entry.name)
    .sort();
}

/**
 * Next free sequence number in a results directory.
 */
export function nextSequence(dir: string): number {
  if (!existsSync(dir)) return 1;
  const { files } = listResultFiles(dir);
  return files.reduce((max, f) => Math.max(max, f.parsed.sequence), 0) + 1;
}
