/**
 * Handler for the `rigforge doctor` CLI command.
 *
 * Checks that the machine can run a manifest:
 * - Node.js version
 * - git and make on PATH
 * - HOME
 * - the manifest loads and validates
 * - the manifest's package manager and the privilege command are on PATH
 *
 * Every check runs even when an earlier one fails; the report lists them all.
 *
 * @module
 */

import * as path from "node:path";
import { execa } from "execa";
import {
  manifestSearchPaths,
  resolvePrivilegeCommand,
  resolveProvisionConfig,
} from "../../core/config/ProvisionConfig.js";
import { ProvisionError } from "../../core/errors/errors.js";
import { ErrorCode } from "../../core/errors/ErrorCode.js";
import { shellQuote } from "../../core/exec/CommandExecutor.js";
import { ManifestLoader, type ProvisionManifest } from "../../core/manifest/ManifestLoader.js";

// =============================================================================
// Constants
// =============================================================================

export const MIN_NODE_VERSION = 20;

const REQUIRED_TOOLS = ["git", "make"] as const;

// =============================================================================
// Types
// =============================================================================

export type DoctorStatus = "OK" | "WARN" | "ERROR";

export interface DoctorCheckResult {
  readonly name: string;
  readonly status: DoctorStatus;
  readonly details?: string;
  /** Actionable fix suggestion (for WARN/ERROR) */
  readonly fix?: string;
}

export interface DoctorResult {
  readonly checks: DoctorCheckResult[];
  /** True if any check has ERROR status */
  readonly hasErrors: boolean;
}

export interface DoctorInput {
  readonly manifest?: string;
  readonly sudo?: string;
}

/**
 * Dependencies for the doctor handler, injected for tests.
 */
export interface DoctorDependencies {
  readonly env: NodeJS.ProcessEnv;
  readonly cwd: string;
  readonly uid?: number;
  readonly getNodeVersion: () => string;
  /** Absolute path of an executable on PATH, or null */
  readonly findExecutable: (name: string) => Promise<string | null>;
  readonly loader?: ManifestLoader;
}

// =============================================================================
// Check Implementations
// =============================================================================

function checkNodeVersion(getVersion: () => string): DoctorCheckResult {
  const version = getVersion();
  const majorVersion = parseInt(version.split(".")[0] ?? "", 10);

  if (Number.isNaN(majorVersion)) {
    return {
      name: "Node.js",
      status: "ERROR",
      details: `Unable to parse version "${version}"`,
      fix: "Ensure Node.js is properly installed.",
    };
  }

  if (majorVersion >= MIN_NODE_VERSION) {
    return { name: "Node.js", status: "OK", details: `v${version}` };
  }

  return {
    name: "Node.js",
    status: "ERROR",
    details: `v${version} (requires >= ${MIN_NODE_VERSION})`,
    fix: `Upgrade Node.js to >= ${MIN_NODE_VERSION}.`,
  };
}

async function checkExecutable(
  label: string,
  name: string,
  findExecutable: (name: string) => Promise<string | null>,
  fix: string,
): Promise<DoctorCheckResult> {
  const found = await findExecutable(name);
  if (found) {
    return { name: label, status: "OK", details: found };
  }
  return { name: label, status: "ERROR", details: `${name} not found on PATH`, fix };
}

function checkHome(env: NodeJS.ProcessEnv): DoctorCheckResult {
  const home = env.HOME;
  if (home && home.trim() !== "") {
    return { name: "HOME", status: "OK", details: home };
  }
  return {
    name: "HOME",
    status: "ERROR",
    details: "not set",
    fix: "Set the HOME environment variable or pass --home <dir> to run.",
  };
}

async function checkManifest(
  input: DoctorInput,
  deps: DoctorDependencies,
): Promise<{ check: DoctorCheckResult; manifest: ProvisionManifest | null }> {
  const loader = deps.loader ?? new ManifestLoader();

  try {
    const manifestPath = await loader.find(
      manifestSearchPaths({ explicit: input.manifest, cwd: deps.cwd, env: deps.env }),
    );
    const config = resolveProvisionConfig({
      env: deps.env,
      cwd: deps.cwd,
      uid: deps.uid,
      manifestDir: path.dirname(manifestPath),
    });
    const manifest = await loader.load(manifestPath, {
      home: config.homeDir,
      configDir: config.configDir,
      sourceRoot: config.sourceRoot,
    });

    const count = manifest.steps.length;
    return {
      check: {
        name: "Manifest",
        status: "OK",
        details: `${manifestPath} (${count} step${count === 1 ? "" : "s"})`,
      },
      manifest,
    };
  } catch (error) {
    if (error instanceof ProvisionError && error.code === ErrorCode.MANIFEST_NOT_FOUND) {
      return {
        check: {
          name: "Manifest",
          status: "WARN",
          details: "not found",
          fix: error.hint,
        },
        manifest: null,
      };
    }

    const message = error instanceof Error ? error.message : String(error);
    const hint = error instanceof ProvisionError ? error.hint : undefined;
    return {
      check: { name: "Manifest", status: "ERROR", details: message, fix: hint },
      manifest: null,
    };
  }
}

/**
 * Package managers named by the manifest, first word of each install command.
 */
export function packageManagerBinaries(manifest: ProvisionManifest): string[] {
  const installs = [
    manifest.packageManager?.install,
    ...manifest.steps.map((step) => (step.kind === "packages" ? step.manager?.install : undefined)),
  ];

  const binaries = new Set<string>();
  for (const install of installs) {
    const binary = install?.trim().split(/\s+/)[0];
    if (binary) binaries.add(binary);
  }
  return [...binaries];
}

// =============================================================================
// Handler Implementation
// =============================================================================

export async function handleDoctor(input: DoctorInput, deps: DoctorDependencies): Promise<DoctorResult> {
  const checks: DoctorCheckResult[] = [];

  checks.push(checkNodeVersion(deps.getNodeVersion));

  for (const tool of REQUIRED_TOOLS) {
    checks.push(
      await checkExecutable(tool, tool, deps.findExecutable, `Install ${tool} with your package manager.`),
    );
  }

  checks.push(checkHome(deps.env));

  const { check: manifestCheck, manifest } = await checkManifest(input, deps);
  checks.push(manifestCheck);

  if (manifest) {
    for (const binary of packageManagerBinaries(manifest)) {
      checks.push(
        await checkExecutable(
          "Package manager",
          binary,
          deps.findExecutable,
          `Install ${binary} or change packageManager.install in the manifest.`,
        ),
      );
    }
  }

  const privilegeCommand = resolvePrivilegeCommand(input.sudo ?? deps.env.RIGFORGE_SUDO, deps.uid);
  if (privilegeCommand) {
    const binary = privilegeCommand.split(/\s+/)[0] ?? privilegeCommand;
    checks.push(
      await checkExecutable(
        "Privilege command",
        binary,
        deps.findExecutable,
        `Install ${binary}, run as root, or pick another with --sudo <cmd>.`,
      ),
    );
  } else {
    checks.push({ name: "Privilege command", status: "OK", details: "none (privileged commands run directly)" });
  }

  return {
    checks,
    hasErrors: checks.some((check) => check.status === "ERROR"),
  };
}

/**
 * Dependencies backed by the real system.
 */
export function createDefaultDoctorDependencies(): DoctorDependencies {
  return {
    env: process.env,
    cwd: process.cwd(),
    uid: process.getuid?.(),
    getNodeVersion: () => process.versions.node,
    findExecutable: async (name) => {
      const result = await execa("sh", ["-c", `command -v ${shellQuote(name)}`], { reject: false });
      const found = typeof result.stdout === "string" ? result.stdout.trim() : "";
      return result.exitCode === 0 && found !== "" ? found : null;
    },
  };
}

// =============================================================================
// Output Formatting
// =============================================================================

export function formatDoctorReport(result: DoctorResult): string[] {
  const lines: string[] = [];

  lines.push("rigforge doctor");
  lines.push("---------------");

  for (const check of result.checks) {
    const statusTag = `[${check.status}]`.padEnd(7);
    lines.push(`${statusTag} ${check.name}: ${check.details ?? ""}`);

    if (check.fix && (check.status === "WARN" || check.status === "ERROR")) {
      for (const [i, fixLine] of check.fix.split("\n").entries()) {
        lines.push(`${" ".repeat(8)}${i === 0 ? "Fix: " : "     "}${fixLine}`);
      }
    }
  }

  return lines;
}
