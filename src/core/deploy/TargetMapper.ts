/**
 * Maps the entries of a dotfiles tree to the paths they are deployed at.
 *
 * ## Mapping rules
 *
 * Given a source tree `S`, home `H` and config root `C`:
 *
 * - a top-level entry `S/bashrc` maps to `H/.bashrc`
 * - a top-level dot entry `S/.xinitrc` keeps its name: `H/.xinitrc`
 * - a child of the `.config` subtree, `S/.config/nvim`, maps to `C/nvim`
 *   (the leading dot is already implied by the subtree, no renaming)
 * - version-control and stow bookkeeping (`.git`, `.gitignore`,
 *   `.stow-local-ignore`, ...) is never deployed
 * - an entry that does not resolve (a dangling link) is skipped
 *
 * Two entries mapping to the same target (`bashrc` next to `.bashrc`) are
 * rejected, as is an entry whose target would swallow the config root, the
 * deploy directory or the source tree (say a top-level `config` entry,
 * which maps to `H/.config`).
 *
 * @module
 */

import * as fs from "node:fs/promises";
import * as path from "node:path";
import { ProvisionError } from "../errors/errors.js";
import { ErrorCode } from "../errors/ErrorCode.js";
import { listVisibleEntries } from "../utils/visibleEntries.js";

// =============================================================================
// Types
// =============================================================================

export type EntryScope = "home" | "config";

/**
 * One deployable entry of the dotfiles tree.
 */
export interface DotfileEntry {
  /** Entry name as it appears in the source tree */
  readonly name: string;

  readonly scope: EntryScope;

  /** Path relative to the tree root (`bashrc`, `.config/nvim`) */
  readonly relativePath: string;

  /** Absolute path in the source tree */
  readonly sourcePath: string;

  /** Absolute path in the deployed copy; the link points here */
  readonly deployedPath: string;

  /** Absolute path the entry is linked at */
  readonly targetPath: string;
}

/**
 * Where a dotfiles tree comes from and goes to.
 */
export interface DeployLayout {
  readonly sourceDir: string;
  readonly deployDir: string;
  readonly homeDir: string;
  readonly configDir: string;

  /** Entry names never deployed */
  readonly ignore?: readonly string[];
}

export const CONFIG_SUBTREE = ".config";

/** Dot entries stow leaves alone by default */
export const BOOKKEEPING_ENTRIES: readonly string[] = [
  ".git",
  ".gitignore",
  ".gitmodules",
  ".hg",
  ".svn",
  ".cvsignore",
  ".stow-local-ignore",
];

// =============================================================================
// Mapping
// =============================================================================

/**
 * Lists the deployable entries of a tree, home entries first, each group
 * sorted by name.
 *
 * @throws ProvisionError DEPLOY_INVALID_ENTRY for an entry that maps onto a protected path
 */
export async function mapDotfileEntries(layout: DeployLayout): Promise<DotfileEntry[]> {
  const ignored = new Set([...BOOKKEEPING_ENTRIES, ...(layout.ignore ?? [])]);
  const entries: DotfileEntry[] = [];

  for (const name of await listVisibleEntries(layout.sourceDir, { dot: true })) {
    if (name === CONFIG_SUBTREE || ignored.has(name)) continue;
    const sourcePath = path.join(layout.sourceDir, name);
    if (!(await resolves(sourcePath))) continue;
    entries.push({
      name,
      scope: "home",
      relativePath: name,
      sourcePath,
      deployedPath: path.join(layout.deployDir, name),
      targetPath: path.join(layout.homeDir, name.startsWith(".") ? name : `.${name}`),
    });
  }

  const configSource = path.join(layout.sourceDir, CONFIG_SUBTREE);
  if (await isDirectory(configSource)) {
    for (const name of await listVisibleEntries(configSource)) {
      if (ignored.has(name) || ignored.has(`${CONFIG_SUBTREE}/${name}`)) continue;
      const sourcePath = path.join(configSource, name);
      if (!(await resolves(sourcePath))) continue;
      entries.push({
        name,
        scope: "config",
        relativePath: `${CONFIG_SUBTREE}/${name}`,
        sourcePath,
        deployedPath: path.join(layout.deployDir, CONFIG_SUBTREE, name),
        targetPath: path.join(layout.configDir, name),
      });
    }
  }

  assertDistinctTargets(entries);
  for (const entry of entries) {
    assertNotProtected(entry, layout);
  }

  return entries;
}

/**
 * True when `ancestor` is `candidate` or one of its parent directories.
 */
export function containsPath(ancestor: string, candidate: string): boolean {
  const relative = path.relative(ancestor, candidate);
  return relative === "" || (!relative.startsWith("..") && !path.isAbsolute(relative));
}

// =============================================================================
// Internal Helpers
// =============================================================================

async function isDirectory(p: string): Promise<boolean> {
  const stat = await fs.stat(p).catch(() => null);
  return stat?.isDirectory() ?? false;
}

/** False for a link whose target is gone */
async function resolves(p: string): Promise<boolean> {
  return (await fs.stat(p).catch(() => null)) !== null;
}

function assertDistinctTargets(entries: readonly DotfileEntry[]): void {
  const claimed = new Map<string, DotfileEntry>();
  for (const entry of entries) {
    const first = claimed.get(entry.targetPath);
    if (first) {
      throw new ProvisionError(
        `Dotfiles entries "${first.relativePath}" and "${entry.relativePath}" both map to ${entry.targetPath}`,
        ErrorCode.DEPLOY_INVALID_ENTRY,
        { entries: [first.relativePath, entry.relativePath], target: entry.targetPath },
        `Remove one of them or add it to the step's ignore list.`,
      );
    }
    claimed.set(entry.targetPath, entry);
  }
}

function assertNotProtected(entry: DotfileEntry, layout: DeployLayout): void {
  const protectedPaths = [
    { label: "config directory", path: layout.configDir },
    { label: "deploy directory", path: layout.deployDir },
    { label: "dotfiles source", path: layout.sourceDir },
  ];

  for (const guarded of protectedPaths) {
    if (containsPath(entry.targetPath, guarded.path)) {
      throw new ProvisionError(
        `Dotfiles entry "${entry.relativePath}" would replace the ${guarded.label}`,
        ErrorCode.DEPLOY_INVALID_ENTRY,
        { entry: entry.relativePath, target: entry.targetPath, protectedPath: guarded.path },
        `Rename the entry or add "${entry.relativePath}" to the step's ignore list.`,
      );
    }
  }
}
