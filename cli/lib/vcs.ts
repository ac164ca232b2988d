/**
 * Version control collaborator.
 *
 * Moves a working copy of the target application to a given ref. Only git
 * is supported.
 *
 * @module
 */

import { exec } from "@effectionx/process";
import type { Operation } from "effection";

export interface VersionControl {
  /**
   * Ref the working copy is on: a branch name, or a commit id when detached.
   */
  currentRef(workingCopy: string): Operation<string>;

  /**
   * Check out the ref for a version label.
   * @throws Error if the checkout fails
   */
  checkout(workingCopy: string, version: string): Operation<void>;

  /**
   * Check out a ref verbatim, without applying the ref template.
   */
  restore(workingCopy: string, ref: string): Operation<void>;
}

export interface GitOptions {
  /** Maps a version label to a ref, e.g. "v{version}" (default: "{version}") */
  refTemplate?: string;
}

function* gitCheckout(workingCopy: string, ref: string): Operation<void> {
  const { code, stderr } = yield* exec(`git checkout --quiet ${ref}`, { cwd: workingCopy }).join();
  if (code !== 0) {
    throw new Error(stderr.trim() || `git checkout ${ref} exited with code ${code}`);
  }
}

/**
 * Git-backed version control.
 */
export function createGitVersionControl(options: GitOptions = {}): VersionControl {
  const refTemplate = options.refTemplate ?? "{version}";

  return {
    *currentRef(workingCopy: string): Operation<string> {
      const branch = yield* exec("git rev-parse --abbrev-ref HEAD", { cwd: workingCopy }).expect();
      const name = branch.stdout.trim();
      if (name !== "HEAD") return name;

      const commit = yield* exec("git rev-parse HEAD", { cwd: workingCopy }).expect();
      return commit.stdout.trim();
    },

    *checkout(workingCopy: string, version: string): Operation<void> {
      yield* gitCheckout(workingCopy, refTemplate.replaceAll("{version}", version));
    },

    *restore(workingCopy: string, ref: string): Operation<void> {
      yield* gitCheckout(workingCopy, ref);
    },
  };
}
