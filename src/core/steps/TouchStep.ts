/**
 * Creates an empty file (and its parents) unless it already exists.
 *
 * @module
 */

import * as fs from "node:fs/promises";
import * as path from "node:path";
import { ProvisionError } from "../errors/errors.js";
import { ErrorCode } from "../errors/ErrorCode.js";
import type {
  PlannedAction,
  ProvisionStep,
  Requirement,
  StepContext,
  StepResult,
} from "../pipeline/ProvisionStep.js";
import type { StepOptions } from "./StepOptions.js";

export interface TouchStepOptions extends StepOptions {
  readonly path: string;
}

export class TouchStep implements ProvisionStep {
  readonly kind = "touch";
  readonly name: string;
  readonly description: string;
  readonly requires: readonly Requirement[];
  readonly optional: boolean;

  private readonly filePath: string;

  constructor(options: TouchStepOptions) {
    this.name = options.name;
    this.description = options.description;
    this.requires = options.requires;
    this.optional = options.optional;
    this.filePath = options.path;
  }

  async execute(ctx: StepContext): Promise<StepResult> {
    if (await this.exists()) {
      ctx.log.verbose(`${this.filePath} already exists`);
      return { status: "skipped", actions: [{ type: "skip", description: `${this.filePath} already exists` }] };
    }

    try {
      await fs.mkdir(path.dirname(this.filePath), { recursive: true });
      // "a" creates the file without truncating one that appeared meanwhile
      const handle = await fs.open(this.filePath, "a");
      await handle.close();
    } catch (error) {
      const cause = error instanceof Error ? error : new Error(String(error));
      throw new ProvisionError(
        `Failed to create ${this.filePath}`,
        ErrorCode.COPY_FAILED,
        { path: this.filePath, reason: cause.message },
        undefined,
        cause,
      );
    }

    ctx.log.info(`Created ${this.filePath}`);
    return { status: "succeeded", actions: [{ type: "create", description: this.filePath }] };
  }

  async preview(_ctx: StepContext): Promise<readonly PlannedAction[]> {
    if (await this.exists()) {
      return [{ type: "skip", description: `${this.filePath} already exists` }];
    }
    return [{ type: "create", description: this.filePath }];
  }

  private async exists(): Promise<boolean> {
    const stat = await fs.lstat(this.filePath).catch(() => null);
    return stat !== null;
  }
}
