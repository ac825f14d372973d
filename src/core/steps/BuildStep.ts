/**
 * Compiles and installs a source tree by running its commands in order.
 *
 * @module
 */

import { ErrorCode } from "../errors/ErrorCode.js";
import type { ShellCommand } from "../manifest/ManifestSchema.js";
import type {
  PlannedAction,
  ProvisionStep,
  Requirement,
  StepContext,
  StepResult,
} from "../pipeline/ProvisionStep.js";
import { plannedRun, runOrThrow, toRequest } from "./runCommand.js";
import type { StepOptions } from "./StepOptions.js";

export interface BuildStepOptions extends StepOptions {
  /** Absolute build directory; also required to exist */
  readonly dir: string;
  readonly commands: readonly ShellCommand[];
}

export class BuildStep implements ProvisionStep {
  readonly kind = "build";
  readonly name: string;
  readonly description: string;
  readonly requires: readonly Requirement[];
  readonly optional: boolean;

  private readonly dir: string;
  private readonly commands: readonly ShellCommand[];

  constructor(options: BuildStepOptions) {
    this.name = options.name;
    this.description = options.description;
    this.requires = [{ path: options.dir, type: "directory" }, ...options.requires];
    this.optional = options.optional;
    this.dir = options.dir;
    this.commands = options.commands;
  }

  async execute(ctx: StepContext): Promise<StepResult> {
    const actions: PlannedAction[] = [];
    for (const command of this.commands) {
      const request = toRequest(command, this.dir);
      await runOrThrow(ctx, request, {
        code: ErrorCode.BUILD_FAILED,
        message: `Build command failed in ${this.dir}: ${command.run}`,
      });
      actions.push(plannedRun(ctx, request));
    }
    return { status: "succeeded", actions };
  }

  async preview(ctx: StepContext): Promise<readonly PlannedAction[]> {
    return this.commands.map((command) => plannedRun(ctx, toRequest(command, this.dir)));
  }
}
