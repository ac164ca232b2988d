/**
 * Outcome values for steps that fail one at a time.
 *
 * A corrupt result file is skipped while the rest of the directory is
 * scanned, and a version whose checkout or harness run fails is recorded
 * while the next version runs. Both collect a `Result` per item and split
 * the list afterwards.
 *
 * @module
 */

import type { Operation } from "effection";

/**
 * Outcome of one item. `context` names the item that failed: a result
 * filename, a benchmark entry or a version label.
 */
export type Result<T> =
  | { ok: true; value: T }
  | { ok: false; error: Error; context: string };

/**
 * Normalize a thrown value. Harness and git failures surface as `Error`,
 * anything else is wrapped.
 */
export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

/**
 * Run an operation and capture its failure, so that one version's checkout
 * or harness run cannot end the whole run.
 *
 * @param context - version label or step name reported with the error
 */
export function* wrapResult<T>(
  context: string,
  op: Operation<T>,
): Operation<Result<T>> {
  try {
    const value = yield* op;
    return { ok: true, value };
  } catch (error: unknown) {
    return { ok: false, error: toError(error), context };
  }
}

/**
 * `wrapResult` for synchronous steps such as decoding one result file.
 */
export function tryResult<T>(context: string, fn: () => T): Result<T> {
  try {
    return { ok: true, value: fn() };
  } catch (error: unknown) {
    return { ok: false, error: toError(error), context };
  }
}

export function isOk<T>(result: Result<T>): result is { ok: true; value: T } {
  return result.ok;
}

export function isErr<T>(
  result: Result<T>,
): result is { ok: false; error: Error; context: string } {
  return !result.ok;
}

/**
 * Values of the recorded items, in order.
 */
export function successes<T>(results: Result<T>[]): T[] {
  return results.filter(isOk).map((r) => r.value);
}

/**
 * Errors of the failed items with the item each belongs to.
 */
export function failures<T>(
  results: Result<T>[],
): { error: Error; context: string }[] {
  return results.filter(isErr).map((r) => ({
    error: r.error,
    context: r.context,
  }));
}
