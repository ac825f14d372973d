/**
 * Removal planning for conflict-safe deployment.
 *
 * The plan is a pure function of a filesystem snapshot and the entry set:
 * it can be printed (dry run), confirmed, and only then applied.
 *
 * @module
 */

import type { DotfileEntry } from "./TargetMapper.js";
import type { TargetKind, TargetSnapshot } from "./TargetSnapshot.js";

// =============================================================================
// Types
// =============================================================================

export interface PlannedRemoval {
  readonly entry: DotfileEntry;
  readonly path: string;
  readonly kind: Exclude<TargetKind, "absent">;
}

export interface RemovalPlan {
  /** Targets that exist and will be removed, in entry order */
  readonly removals: readonly PlannedRemoval[];

  /** Entries whose target is already free */
  readonly clear: readonly DotfileEntry[];
}

// =============================================================================
// Planning
// =============================================================================

/**
 * Splits entries into targets to remove and targets already clear.
 *
 * Files, directories and symlinks (valid or broken) are all removed. A
 * target missing from the snapshot counts as absent.
 */
export function planRemovals(snapshot: TargetSnapshot, entries: readonly DotfileEntry[]): RemovalPlan {
  const removals: PlannedRemoval[] = [];
  const clear: DotfileEntry[] = [];

  for (const entry of entries) {
    const kind = snapshot.get(entry.targetPath) ?? "absent";
    if (kind === "absent") {
      clear.push(entry);
    } else {
      removals.push({ entry, path: entry.targetPath, kind });
    }
  }

  return { removals, clear };
}

/**
 * One line per planned removal, e.g. `~/.bashrc (file)`.
 */
export function describeRemovals(plan: RemovalPlan, homeDir?: string): string[] {
  return plan.removals.map((removal) => {
    const shown =
      homeDir && removal.path.startsWith(homeDir + "/") ? `~${removal.path.slice(homeDir.length)}` : removal.path;
    return `${shown} (${removal.kind})`;
  });
}
