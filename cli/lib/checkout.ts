/**
 * Exclusive checkout lease on the target application's working copy.
 *
 * Version control mutates the working copy in place, so at most one
 * version may hold it at a time. The lease is a resource: it is released
 * when the enclosing scope exits, whether the version succeeded or not.
 *
 * @module
 */

import { resource, type Operation } from "effection";
import { VersionCheckoutFailedError } from "./errors.ts";
import { toError } from "./result.ts";
import type { VersionControl } from "./vcs.ts";

/**
 * The shared working copy and who currently holds it.
 */
export class WorkingCopy {
  #holder: string | undefined;

  constructor(readonly path: string) {}

  /** Version label of the current lease holder */
  get holder(): string | undefined {
    return this.#holder;
  }

  acquire(version: string): void {
    if (this.#holder !== undefined) {
      throw new Error(`Working copy ${this.path} is already checked out for ${this.#holder}`);
    }
    this.#holder = version;
  }

  release(version: string): void {
    if (this.#holder === version) {
      this.#holder = undefined;
    }
  }
}

/**
 * Acquire the working copy for a version and check that version out.
 *
 * @throws VersionCheckoutFailedError if the lease is taken or the checkout fails
 */
export function useCheckout(
  vcs: VersionControl,
  workingCopy: WorkingCopy,
  version: string,
): Operation<WorkingCopy> {
  return resource(function* (provide) {
    try {
      workingCopy.acquire(version);
    } catch (e) {
      throw new VersionCheckoutFailedError(version, toError(e));
    }

    try {
      try {
        yield* vcs.checkout(workingCopy.path, version);
      } catch (e) {
        throw new VersionCheckoutFailedError(version, toError(e));
      }
      yield* provide(workingCopy);
    } finally {
      workingCopy.release(version);
    }
  });
}
