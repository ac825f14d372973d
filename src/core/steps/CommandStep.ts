/**
 * Runs one free-form shell command.
 *
 * @module
 */

import { ErrorCode, type FailureKind } from "../errors/ErrorCode.js";
import type { CommandRequest } from "../exec/CommandExecutor.js";
import type {
  PlannedAction,
  ProvisionStep,
  Requirement,
  StepContext,
  StepResult,
} from "../pipeline/ProvisionStep.js";
import { plannedRun, runOrThrow } from "./runCommand.js";
import type { StepOptions } from "./StepOptions.js";

export interface CommandStepOptions extends StepOptions {
  readonly run: string;
  readonly privileged: boolean;
  /** Absolute working directory; also required to exist */
  readonly cwd?: string;
  /** Kind reported when the command fails */
  readonly failureKind: FailureKind;
}

export class CommandStep implements ProvisionStep {
  readonly kind = "command";
  readonly name: string;
  readonly description: string;
  readonly requires: readonly Requirement[];
  readonly optional: boolean;

  private readonly request: CommandRequest;
  private readonly failureKind: FailureKind;

  constructor(options: CommandStepOptions) {
    this.name = options.name;
    this.description = options.description;
    this.requires = options.cwd
      ? [{ path: options.cwd, type: "directory" }, ...options.requires]
      : options.requires;
    this.optional = options.optional;
    this.request = { command: options.run, privileged: options.privileged, cwd: options.cwd };
    this.failureKind = options.failureKind;
  }

  async execute(ctx: StepContext): Promise<StepResult> {
    await runOrThrow(ctx, this.request, {
      code: ErrorCode.COMMAND_FAILED,
      message: `Command failed: ${this.request.command}`,
      kind: this.failureKind,
    });
    return { status: "succeeded", actions: [plannedRun(ctx, this.request)] };
  }

  async preview(ctx: StepContext): Promise<readonly PlannedAction[]> {
    return [plannedRun(ctx, this.request)];
  }
}
