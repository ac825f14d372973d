/**
 * Read-only view of what currently sits at each deployment target.
 *
 * @module
 */

import * as fs from "node:fs/promises";

/**
 * What a target path currently is. Sockets, fifos and devices count as
 * files; a broken link is still a symlink.
 */
export type TargetKind = "file" | "directory" | "symlink" | "absent";

export type TargetSnapshot = ReadonlyMap<string, TargetKind>;

/**
 * Classifies a path without following a final symlink.
 */
export async function classifyPath(targetPath: string): Promise<TargetKind> {
  try {
    const stat = await fs.lstat(targetPath);
    if (stat.isSymbolicLink()) return "symlink";
    if (stat.isDirectory()) return "directory";
    return "file";
  } catch (error) {
    if (isMissingPathError(error)) {
      return "absent";
    }
    throw error;
  }
}

/**
 * Classifies every path, in order.
 */
export async function snapshotTargets(paths: readonly string[]): Promise<TargetSnapshot> {
  const snapshot = new Map<string, TargetKind>();
  for (const targetPath of paths) {
    snapshot.set(targetPath, await classifyPath(targetPath));
  }
  return snapshot;
}

function isMissingPathError(error: unknown): boolean {
  if (!(error instanceof Error) || !("code" in error)) return false;
  // ENOTDIR: a parent component is a file, so nothing can exist below it
  return error.code === "ENOENT" || error.code === "ENOTDIR";
}
