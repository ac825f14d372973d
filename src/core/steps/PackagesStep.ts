/**
 * Installs OS packages through the manifest's package manager.
 *
 * When the manager declares a `query` command, each package is checked
 * first (`rpm -q <name>`) and installed ones are dropped; if nothing is
 * left the step is skipped. Names containing a slash are local package
 * files or URLs and always go to the install command.
 *
 * @module
 */

import { ErrorCode } from "../errors/ErrorCode.js";
import { shellQuote, type CommandRequest } from "../exec/CommandExecutor.js";
import type { PackageManager } from "../manifest/ManifestSchema.js";
import type {
  PlannedAction,
  ProvisionStep,
  Requirement,
  StepContext,
  StepResult,
} from "../pipeline/ProvisionStep.js";
import { plannedRun, runOrThrow } from "./runCommand.js";
import type { StepOptions } from "./StepOptions.js";

export interface PackagesStepOptions extends StepOptions {
  readonly packages: readonly string[];
  readonly manager: PackageManager;
}

export class PackagesStep implements ProvisionStep {
  readonly kind = "packages";
  readonly name: string;
  readonly description: string;
  readonly requires: readonly Requirement[];
  readonly optional: boolean;

  private readonly packages: readonly string[];
  private readonly manager: PackageManager;

  constructor(options: PackagesStepOptions) {
    this.name = options.name;
    this.description = options.description;
    this.requires = options.requires;
    this.optional = options.optional;
    this.packages = options.packages;
    this.manager = options.manager;
  }

  /**
   * Packages the guard may query. Local files and URLs are never queried.
   */
  static isQueryable(pkg: string): boolean {
    return !pkg.includes("/");
  }

  async execute(ctx: StepContext): Promise<StepResult> {
    const missing = await this.findMissing(ctx);

    if (missing.length === 0) {
      ctx.log.info("All packages already installed, skipping");
      return {
        status: "skipped",
        actions: [{ type: "skip", description: `already installed: ${this.packages.join(", ")}` }],
      };
    }

    const request = this.installRequest(missing);
    await runOrThrow(ctx, request, {
      code: ErrorCode.PACKAGE_INSTALL_FAILED,
      message: `Failed to install packages: ${missing.join(", ")}`,
    });

    return { status: "succeeded", actions: [{ type: "install", description: missing.join(" ") }] };
  }

  /**
   * The query is read-only, so the preview runs it too.
   */
  async preview(ctx: StepContext): Promise<readonly PlannedAction[]> {
    const missing = await this.findMissing(ctx);
    const actions: PlannedAction[] = [];

    const installed = this.packages.filter((p) => !missing.includes(p));
    if (installed.length > 0) {
      actions.push({ type: "skip", description: `already installed: ${installed.join(", ")}` });
    }
    if (missing.length > 0) {
      actions.push(plannedRun(ctx, this.installRequest(missing)));
    }
    return actions;
  }

  private installRequest(packages: readonly string[]): CommandRequest {
    return {
      command: `${this.manager.install} ${packages.map(shellQuote).join(" ")}`,
      privileged: this.manager.privileged,
    };
  }

  private async findMissing(ctx: StepContext): Promise<string[]> {
    const query = this.manager.query;
    if (!query) {
      return [...this.packages];
    }

    const missing: string[] = [];
    for (const pkg of this.packages) {
      if (!PackagesStep.isQueryable(pkg)) {
        missing.push(pkg);
        continue;
      }
      const queried = await ctx.executor.run({ command: `${query} ${shellQuote(pkg)}`, quiet: true });
      if (queried.success) {
        ctx.log.verbose(`${pkg} is already installed`);
      } else {
        missing.push(pkg);
      }
    }
    return missing;
  }
}
