/**
 * Uniform precondition check applied before every step.
 *
 * @module
 */

import * as fs from "node:fs/promises";
import type { Requirement } from "./ProvisionStep.js";

/**
 * A requirement that is not met, and why.
 */
export interface UnmetRequirement {
  readonly requirement: Requirement;
  readonly reason: "missing" | "wrong-type";
}

/**
 * Returns the first unmet requirement, or null when all are met.
 *
 * Symlinks are followed: a link to a directory satisfies a directory
 * requirement, a broken link satisfies nothing.
 */
export async function findUnmetRequirement(
  requirements: readonly Requirement[],
): Promise<UnmetRequirement | null> {
  for (const requirement of requirements) {
    const stat = await fs.stat(requirement.path).catch(() => null);
    if (!stat) {
      return { requirement, reason: "missing" };
    }

    const matches = requirement.type === "directory" ? stat.isDirectory() : stat.isFile();
    if (!matches) {
      return { requirement, reason: "wrong-type" };
    }
  }
  return null;
}

export function describeUnmet(unmet: UnmetRequirement): string {
  const { path, type } = unmet.requirement;
  if (unmet.reason === "wrong-type") {
    return `${path} is not a ${type}`;
  }
  return `${type === "directory" ? "Directory" : "File"} not found: ${path}`;
}
