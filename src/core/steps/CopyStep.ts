/**
 * Copies the visible top-level entries of a directory into another one,
 * then runs optional follow-up commands (`fc-cache -fv` after fonts).
 *
 * @module
 */

import * as fs from "node:fs/promises";
import * as path from "node:path";
import { ProvisionError } from "../errors/errors.js";
import { ErrorCode } from "../errors/ErrorCode.js";
import type { ShellCommand } from "../manifest/ManifestSchema.js";
import type {
  PlannedAction,
  ProvisionStep,
  Requirement,
  StepContext,
  StepResult,
} from "../pipeline/ProvisionStep.js";
import { listVisibleEntries } from "../utils/visibleEntries.js";
import { plannedRun, runOrThrow, toRequest } from "./runCommand.js";
import type { StepOptions } from "./StepOptions.js";

export interface CopyStepOptions extends StepOptions {
  readonly from: string;
  readonly to: string;
  readonly after: readonly ShellCommand[];
}

export class CopyStep implements ProvisionStep {
  readonly kind = "copy";
  readonly name: string;
  readonly description: string;
  readonly requires: readonly Requirement[];
  readonly optional: boolean;

  private readonly from: string;
  private readonly to: string;
  private readonly after: readonly ShellCommand[];

  constructor(options: CopyStepOptions) {
    this.name = options.name;
    this.description = options.description;
    this.requires = [{ path: options.from, type: "directory" }, ...options.requires];
    this.optional = options.optional;
    this.from = options.from;
    this.to = options.to;
    this.after = options.after;
  }

  async execute(ctx: StepContext): Promise<StepResult> {
    const names = await listVisibleEntries(this.from);
    const actions: PlannedAction[] = [];

    if (names.length === 0) {
      ctx.log.warn(`${this.from} is empty, nothing to copy`);
    }

    try {
      await fs.mkdir(this.to, { recursive: true });
      for (const name of names) {
        await fs.cp(path.join(this.from, name), path.join(this.to, name), {
          recursive: true,
          force: true,
          verbatimSymlinks: true,
        });
        actions.push({ type: "copy", description: `${path.join(this.from, name)} -> ${path.join(this.to, name)}` });
      }
    } catch (error) {
      const cause = error instanceof Error ? error : new Error(String(error));
      throw new ProvisionError(
        `Failed to copy ${this.from} to ${this.to}`,
        ErrorCode.COPY_FAILED,
        { from: this.from, to: this.to, reason: cause.message },
        undefined,
        cause,
      );
    }
    ctx.log.info(`Copied ${names.length} entries into ${this.to}`);

    for (const command of this.after) {
      const request = toRequest(command);
      await runOrThrow(ctx, request, {
        code: ErrorCode.COPY_FAILED,
        message: `Post-copy command failed: ${command.run}`,
      });
      actions.push(plannedRun(ctx, request));
    }

    return { status: "succeeded", actions };
  }

  async preview(ctx: StepContext): Promise<readonly PlannedAction[]> {
    const names = await listVisibleEntries(this.from);
    return [
      ...names.map(
        (name): PlannedAction => ({
          type: "copy",
          description: `${path.join(this.from, name)} -> ${path.join(this.to, name)}`,
        }),
      ),
      ...this.after.map((command) => plannedRun(ctx, toRequest(command))),
    ];
  }
}
