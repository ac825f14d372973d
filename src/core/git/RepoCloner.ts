/**
 * Repository Cloner.
 *
 * Clones source repositories into the source root, once. A destination
 * that already exists is treated as an earlier clone and left untouched,
 * so re-running a manifest does not re-fetch (or clobber local edits to)
 * sources that are already there.
 *
 * ## Usage
 *
 * ```typescript
 * const cloner = new RepoCloner();
 * const outcome = await cloner.ensureCloned({
 *   url: "https://github.com/conformal/spectrwm.git",
 *   dir: "/src/spectrwm",
 * });
 * // outcome.status === "cloned" | "skipped"
 * ```
 *
 * @module
 */

import * as fs from "node:fs/promises";
import * as path from "node:path";
import { simpleGit, GitError } from "simple-git";
import { ProvisionError } from "../errors/errors.js";
import { ErrorCode } from "../errors/ErrorCode.js";

// =============================================================================
// Types
// =============================================================================

/**
 * A repository to clone, with an absolute destination.
 */
export interface CloneRequest {
  readonly url: string;
  readonly dir: string;

  /** Branch or tag to check out */
  readonly ref?: string;

  /** Shallow clone depth; full history when omitted */
  readonly depth?: number;
}

export interface CloneOutcome {
  readonly url: string;
  readonly dir: string;
  readonly status: "cloned" | "skipped";
}

/**
 * The git operation the cloner needs. Tests substitute a fake.
 */
export interface GitClient {
  clone(url: string, dir: string, options: readonly string[]): Promise<void>;
}

// =============================================================================
// simple-git Client
// =============================================================================

export class SimpleGitClient implements GitClient {
  async clone(url: string, dir: string, options: readonly string[]): Promise<void> {
    await simpleGit().clone(url, dir, [...options]);
  }
}

// =============================================================================
// RepoCloner
// =============================================================================

/**
 * Clones repositories that are not present yet.
 *
 * ## Error Handling
 *
 * Clone failures are wrapped in ProvisionError (GIT_CLONE_FAILED, failure
 * kind "network"). A partially written destination is removed so the next
 * run retries instead of skipping it.
 */
export class RepoCloner {
  constructor(private readonly git: GitClient = new SimpleGitClient()) {}

  /**
   * Whether the destination already exists (as anything).
   */
  static async isPresent(dir: string): Promise<boolean> {
    const stat = await fs.lstat(dir).catch(() => null);
    return stat !== null;
  }

  /**
   * git clone arguments for a request.
   */
  static cloneOptions(request: CloneRequest): string[] {
    const options: string[] = [];
    if (request.depth !== undefined) {
      options.push("--depth", String(request.depth));
    }
    if (request.ref) {
      options.push("--branch", request.ref);
    }
    return options;
  }

  async ensureCloned(request: CloneRequest): Promise<CloneOutcome> {
    if (await RepoCloner.isPresent(request.dir)) {
      return { url: request.url, dir: request.dir, status: "skipped" };
    }

    await fs.mkdir(path.dirname(request.dir), { recursive: true });

    try {
      await this.git.clone(request.url, request.dir, RepoCloner.cloneOptions(request));
    } catch (error) {
      await fs.rm(request.dir, { recursive: true, force: true });
      throw this.wrapCloneError(request, error);
    }

    return { url: request.url, dir: request.dir, status: "cloned" };
  }

  private wrapCloneError(request: CloneRequest, error: unknown): ProvisionError {
    const cause = error instanceof Error ? error : new Error(String(error));
    const reason = error instanceof GitError ? error.message.trim() : cause.message;

    return new ProvisionError(
      `Failed to clone ${request.url}`,
      ErrorCode.GIT_CLONE_FAILED,
      { url: request.url, dir: request.dir, ref: request.ref, reason },
      `Could not clone repository from ${request.url}. ` +
        `Check network connectivity and that the repository URL is correct. ` +
        `Error: ${reason}`,
      cause,
    );
  }
}
