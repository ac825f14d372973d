/**
 * Creates the symlinks of a deployment.
 *
 * @module
 */

import * as fs from "node:fs/promises";
import * as path from "node:path";
import { ProvisionError } from "../errors/errors.js";
import { ErrorCode } from "../errors/ErrorCode.js";
import type { DotfileEntry } from "./TargetMapper.js";
import { classifyPath } from "./TargetSnapshot.js";

export interface LinkOutcome {
  readonly entry: DotfileEntry;
  /** "unchanged" when the target already linked to the deployed entry */
  readonly status: "linked" | "unchanged";
}

/**
 * The link text for an entry: relative to the link's own directory, so a
 * moved home keeps working.
 */
export function linkTextFor(entry: DotfileEntry): string {
  return path.relative(path.dirname(entry.targetPath), entry.deployedPath);
}

/**
 * Links every entry's target to its deployed copy.
 *
 * Targets are expected to be clear. A symlink that already resolves to the
 * deployed entry is left alone; anything else found at a target means the
 * filesystem changed after planning.
 *
 * @throws ProvisionError DEPLOY_LINK_CONFLICT when a target is occupied
 * @throws ProvisionError DEPLOY_LINK_FAILED when a link cannot be created
 */
export async function linkEntries(entries: readonly DotfileEntry[]): Promise<LinkOutcome[]> {
  const outcomes: LinkOutcome[] = [];

  for (const entry of entries) {
    const current = await classifyPath(entry.targetPath);

    if (current !== "absent") {
      if (current === "symlink" && (await pointsAt(entry.targetPath, entry.deployedPath))) {
        outcomes.push({ entry, status: "unchanged" });
        continue;
      }
      throw new ProvisionError(
        `Target ${entry.targetPath} is occupied`,
        ErrorCode.DEPLOY_LINK_CONFLICT,
        { entry: entry.relativePath, target: entry.targetPath, found: current },
        "Something recreated the target after it was cleared. Re-run to clear it again.",
      );
    }

    try {
      await fs.mkdir(path.dirname(entry.targetPath), { recursive: true });
      await fs.symlink(linkTextFor(entry), entry.targetPath);
    } catch (error) {
      const cause = error instanceof Error ? error : new Error(String(error));
      throw new ProvisionError(
        `Failed to link ${entry.targetPath}`,
        ErrorCode.DEPLOY_LINK_FAILED,
        { entry: entry.relativePath, target: entry.targetPath, reason: cause.message },
        undefined,
        cause,
      );
    }
    outcomes.push({ entry, status: "linked" });
  }

  return outcomes;
}

async function pointsAt(linkPath: string, expected: string): Promise<boolean> {
  const text = await fs.readlink(linkPath);
  return path.resolve(path.dirname(linkPath), text) === path.resolve(expected);
}
