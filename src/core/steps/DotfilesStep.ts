/**
 * Deploys a dotfiles tree with the conflict-safe deployer.
 *
 * @module
 */

import { ConflictSafeDeployer, type DeploymentPlan } from "../deploy/ConflictSafeDeployer.js";
import { linkTextFor } from "../deploy/DotfileLinker.js";
import type { DeployLayout } from "../deploy/TargetMapper.js";
import type {
  PlannedAction,
  ProvisionStep,
  Requirement,
  StepContext,
  StepResult,
} from "../pipeline/ProvisionStep.js";
import type { StepOptions } from "./StepOptions.js";

export interface DotfilesStepOptions extends StepOptions {
  readonly source: string;
  readonly deployDir: string;
  readonly ignore: readonly string[];
}

export class DotfilesStep implements ProvisionStep {
  readonly kind = "dotfiles";
  readonly name: string;
  readonly description: string;
  readonly requires: readonly Requirement[];
  readonly optional: boolean;

  private readonly source: string;
  private readonly deployDir: string;
  private readonly ignore: readonly string[];

  constructor(options: DotfilesStepOptions) {
    this.name = options.name;
    this.description = options.description;
    this.requires = [{ path: options.source, type: "directory" }, ...options.requires];
    this.optional = options.optional;
    this.source = options.source;
    this.deployDir = options.deployDir;
    this.ignore = options.ignore;
  }

  async execute(ctx: StepContext): Promise<StepResult> {
    const deployer = new ConflictSafeDeployer(ctx.events);
    const plan = await deployer.plan(this.layout(ctx));

    for (const removal of plan.removal.removals) {
      ctx.log.verbose(`Removing existing ${removal.kind} ${removal.path}`);
    }

    const report = await deployer.apply(plan, {
      assumeYes: ctx.config.assumeYes,
      confirm: ctx.confirmRemoval,
    });

    if (report.copiedTo) {
      ctx.log.info(`Copied ${this.source} to ${report.copiedTo}`);
    }
    ctx.log.info(
      `Linked ${report.linked} entries (${report.removed} replaced, ${report.unchanged} already in place)`,
    );

    return { status: "succeeded", actions: describePlan(plan) };
  }

  async preview(ctx: StepContext): Promise<readonly PlannedAction[]> {
    const deployer = new ConflictSafeDeployer(ctx.events);
    return describePlan(await deployer.plan(this.layout(ctx)));
  }

  private layout(ctx: StepContext): DeployLayout {
    return {
      sourceDir: this.source,
      deployDir: this.deployDir,
      homeDir: ctx.config.homeDir,
      configDir: ctx.config.configDir,
      ignore: this.ignore,
    };
  }
}

/**
 * Plan actions in the order they are applied: removals, copy, links.
 */
export function describePlan(plan: DeploymentPlan): PlannedAction[] {
  const actions: PlannedAction[] = plan.removal.removals.map((removal): PlannedAction => ({
    type: "remove",
    description: `${removal.path} (${removal.kind})`,
  }));

  if (plan.copyNeeded) {
    actions.push({ type: "copy", description: `${plan.layout.sourceDir} -> ${plan.layout.deployDir}` });
  }

  for (const entry of plan.entries) {
    actions.push({ type: "link", description: `${entry.targetPath} -> ${linkTextFor(entry)}` });
  }
  return actions;
}
