/**
 * Clones source repositories, skipping any already present.
 *
 * @module
 */

import { RepoCloner, type CloneRequest } from "../git/RepoCloner.js";
import type {
  PlannedAction,
  ProvisionStep,
  Requirement,
  StepContext,
  StepResult,
} from "../pipeline/ProvisionStep.js";
import type { StepOptions } from "./StepOptions.js";

export interface CloneStepOptions extends StepOptions {
  /** Repositories with absolute destinations, cloned in order */
  readonly repos: readonly CloneRequest[];
  readonly cloner: RepoCloner;
}

export function skipCloneMessage(dir: string): string {
  return `${dir} already exists, skipping clone`;
}

export class CloneStep implements ProvisionStep {
  readonly kind = "clone";
  readonly name: string;
  readonly description: string;
  readonly requires: readonly Requirement[];
  readonly optional: boolean;

  private readonly repos: readonly CloneRequest[];
  private readonly cloner: RepoCloner;

  constructor(options: CloneStepOptions) {
    this.name = options.name;
    this.description = options.description;
    this.requires = options.requires;
    this.optional = options.optional;
    this.repos = options.repos;
    this.cloner = options.cloner;
  }

  async execute(ctx: StepContext): Promise<StepResult> {
    const actions: PlannedAction[] = [];

    for (const repo of this.repos) {
      const outcome = await this.cloner.ensureCloned(repo);
      if (outcome.status === "skipped") {
        ctx.log.info(skipCloneMessage(repo.dir));
        actions.push({ type: "skip", description: skipCloneMessage(repo.dir) });
      } else {
        ctx.log.info(`Cloned ${repo.url} into ${repo.dir}`);
        ctx.events.info("Repository cloned", { url: repo.url, dir: repo.dir, ref: repo.ref });
        actions.push({ type: "clone", description: `${repo.url} -> ${repo.dir}` });
      }
    }

    const allSkipped = actions.every((a) => a.type === "skip");
    return { status: allSkipped ? "skipped" : "succeeded", actions };
  }

  async preview(_ctx: StepContext): Promise<readonly PlannedAction[]> {
    const actions: PlannedAction[] = [];
    for (const repo of this.repos) {
      if (await RepoCloner.isPresent(repo.dir)) {
        actions.push({ type: "skip", description: skipCloneMessage(repo.dir) });
      } else {
        const options = RepoCloner.cloneOptions(repo);
        const flags = options.length > 0 ? `${options.join(" ")} ` : "";
        actions.push({ type: "clone", description: `git clone ${flags}${repo.url} ${repo.dir}` });
      }
    }
    return actions;
  }
}
