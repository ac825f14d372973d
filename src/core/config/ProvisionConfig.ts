/**
 * Run configuration for rigforge.
 *
 * Everything a provisioning run needs to know about *where* it operates is
 * resolved here, once, at start-up:
 *
 * - `sourceRoot`: the directory manifest-relative paths resolve against
 *   (cloned sources, dotfiles tree, fonts, local package files). Defaults to
 *   the directory holding the manifest.
 * - `homeDir`: the home directory dotfiles and assets are deployed into.
 * - `configDir`: the XDG config directory `.config` entries are linked into.
 *   `XDG_CONFIG_HOME` only applies to the invoking user's own home; with
 *   `--home` it is `<home>/.config` unless `--config-dir` says otherwise.
 *
 * The result is frozen and passed down explicitly; no step reads `HOME` or
 * the working directory on its own.
 *
 * ## Why env-paths?
 *
 * The per-user fallback manifest lives in the platform's config directory
 * (`~/.config/rigforge` on Linux, honouring `XDG_CONFIG_HOME`). env-paths
 * owns that convention so this module does not have to.
 *
 * @module
 */

import * as path from "node:path";
import envPaths from "env-paths";
import { ProvisionError } from "../errors/errors.js";
import { ErrorCode } from "../errors/ErrorCode.js";

// =============================================================================
// Types
// =============================================================================

export interface ProvisionConfig {
  /** Absolute directory manifest-relative paths resolve against */
  readonly sourceRoot: string;

  /** Absolute home directory targets are deployed into */
  readonly homeDir: string;

  /** Absolute XDG config directory */
  readonly configDir: string;

  /**
   * Command prefixed to privileged commands (e.g. "sudo").
   * `null` runs them directly, as when rigforge itself runs as root.
   */
  readonly privilegeCommand: string | null;

  /** Compute and print the plan without changing anything */
  readonly dryRun: boolean;

  /** Skip the confirmation gate before removing conflicting targets */
  readonly assumeYes: boolean;
}

/**
 * Inputs for {@link resolveProvisionConfig}.
 */
export interface ResolveConfigOptions {
  /** Environment to read HOME / XDG_CONFIG_HOME / RIGFORGE_SUDO from */
  readonly env: NodeJS.ProcessEnv;

  /** Directory of the loaded manifest (default source root) */
  readonly manifestDir: string;

  /** Working directory for resolving relative CLI paths */
  readonly cwd: string;

  /** Effective user id; 0 disables the privilege prefix */
  readonly uid?: number;

  readonly sourceRoot?: string;
  readonly homeDir?: string;
  readonly configDir?: string;

  /** Privilege command override; empty string disables it */
  readonly sudo?: string;

  readonly dryRun?: boolean;
  readonly assumeYes?: boolean;
}

// =============================================================================
// Constants
// =============================================================================

export const MANIFEST_FILENAME = "rigforge.yaml";

const DEFAULT_PRIVILEGE_COMMAND = "sudo";

// =============================================================================
// Resolution
// =============================================================================

/**
 * Resolves and freezes the run configuration.
 *
 * @throws ProvisionError CONFIG_HOME_MISSING when no home directory is known
 */
export function resolveProvisionConfig(options: ResolveConfigOptions): ProvisionConfig {
  const { env, cwd } = options;

  const home = options.homeDir ?? env.HOME;
  if (!home || home.trim() === "") {
    throw new ProvisionError(
      "Cannot determine the home directory",
      ErrorCode.CONFIG_HOME_MISSING,
      undefined,
      "Set the HOME environment variable or pass --home <dir>.",
    );
  }
  const homeDir = path.resolve(cwd, home);

  const configDir = resolveConfigDir(options, homeDir);

  const sourceRoot = path.resolve(cwd, options.sourceRoot ?? options.manifestDir);

  return Object.freeze({
    sourceRoot,
    homeDir,
    configDir,
    privilegeCommand: resolvePrivilegeCommand(options.sudo ?? env.RIGFORGE_SUDO, options.uid),
    dryRun: options.dryRun ?? false,
    assumeYes: options.assumeYes ?? false,
  });
}

function resolveConfigDir(options: ResolveConfigOptions, homeDir: string): string {
  if (options.configDir) {
    return path.resolve(options.cwd, options.configDir);
  }
  const xdgConfig = options.env.XDG_CONFIG_HOME;
  if (options.homeDir === undefined && xdgConfig && path.isAbsolute(xdgConfig)) {
    return path.normalize(xdgConfig);
  }
  return path.join(homeDir, ".config");
}

/**
 * Picks the privilege prefix.
 *
 * An explicit override wins (empty disables). Otherwise root needs no prefix
 * and everyone else gets `sudo`.
 */
export function resolvePrivilegeCommand(override: string | undefined, uid: number | undefined): string | null {
  if (override !== undefined) {
    const trimmed = override.trim();
    return trimmed === "" ? null : trimmed;
  }
  if (uid === 0) {
    return null;
  }
  return DEFAULT_PRIVILEGE_COMMAND;
}

/**
 * Candidate manifest locations, most specific first.
 *
 * 1. An explicit path (`--manifest` or `RIGFORGE_MANIFEST`)
 * 2. `rigforge.yaml` in the working directory
 * 3. `rigforge.yaml` in the per-user config directory
 */
export function manifestSearchPaths(options: {
  readonly explicit?: string;
  readonly cwd: string;
  readonly env: NodeJS.ProcessEnv;
}): string[] {
  if (options.explicit) {
    return [path.resolve(options.cwd, options.explicit)];
  }
  const fromEnv = options.env.RIGFORGE_MANIFEST;
  if (fromEnv) {
    return [path.resolve(options.cwd, fromEnv)];
  }
  return [path.join(options.cwd, MANIFEST_FILENAME), path.join(userConfigDir(), MANIFEST_FILENAME)];
}

/**
 * rigforge's own per-user config directory.
 */
export function userConfigDir(): string {
  return envPaths("rigforge", { suffix: "" }).config;
}
