/**
 * Builds the step list of a run from a loaded manifest.
 *
 * Every relative path in a step spec is resolved against the source root
 * here, so steps only ever see absolute paths.
 *
 * @module
 */

import * as path from "node:path";
import type { ProvisionConfig } from "../config/ProvisionConfig.js";
import { RepoCloner } from "../git/RepoCloner.js";
import type { ProvisionManifest } from "../manifest/ManifestLoader.js";
import type { ResolvedStepSpec, StepKind } from "../manifest/ManifestSchema.js";
import { BuildStep } from "../steps/BuildStep.js";
import { CloneStep } from "../steps/CloneStep.js";
import { CommandStep } from "../steps/CommandStep.js";
import { CopyStep } from "../steps/CopyStep.js";
import { DotfilesStep } from "../steps/DotfilesStep.js";
import { PackagesStep } from "../steps/PackagesStep.js";
import type { StepOptions } from "../steps/StepOptions.js";
import { TouchStep } from "../steps/TouchStep.js";
import type { ProvisionStep, Requirement } from "./ProvisionStep.js";

export interface BuildPipelineOptions {
  /** Only keep steps of these kinds */
  readonly kinds?: readonly StepKind[];
  readonly cloner?: RepoCloner;
}

export const DEFAULT_DEPLOY_DIRNAME = "dotfiles";

export class PipelineBuilder {
  private readonly cloner: RepoCloner;

  constructor(
    private readonly config: ProvisionConfig,
    options: Pick<BuildPipelineOptions, "cloner"> = {},
  ) {
    this.cloner = options.cloner ?? new RepoCloner();
  }

  build(manifest: ProvisionManifest, options: Pick<BuildPipelineOptions, "kinds"> = {}): ProvisionStep[] {
    const kinds = options.kinds;
    return manifest.steps
      .filter((spec) => !kinds || kinds.includes(spec.kind))
      .map((spec) => this.buildStep(spec));
  }

  /**
   * Resolves a manifest path against the source root.
   */
  resolvePath(p: string): string {
    return path.resolve(this.config.sourceRoot, p);
  }

  private buildStep(spec: ResolvedStepSpec): ProvisionStep {
    const base: StepOptions = {
      name: spec.name,
      description: spec.description ?? defaultDescription(spec),
      requires: spec.requires.map((req): Requirement => ({ path: this.resolvePath(req.path), type: req.type })),
      optional: spec.optional,
    };

    switch (spec.kind) {
      case "packages":
        return new PackagesStep({
          ...base,
          packages: spec.packages.map((p) => (p.includes("/") && !isUrl(p) ? this.resolvePath(p) : p)),
          manager: spec.manager,
        });
      case "clone":
        return new CloneStep({
          ...base,
          repos: spec.repos.map((repo) => ({ ...repo, dir: this.resolvePath(repo.dir) })),
          cloner: this.cloner,
        });
      case "build":
        return new BuildStep({ ...base, dir: this.resolvePath(spec.dir), commands: spec.commands });
      case "copy":
        return new CopyStep({
          ...base,
          from: this.resolvePath(spec.from),
          to: this.resolvePath(spec.to),
          after: spec.after,
        });
      case "touch":
        return new TouchStep({ ...base, path: this.resolvePath(spec.path) });
      case "command":
        return new CommandStep({
          ...base,
          run: spec.run,
          privileged: spec.privileged,
          cwd: spec.cwd ? this.resolvePath(spec.cwd) : undefined,
          failureKind: spec.failureKind,
        });
      case "dotfiles":
        return new DotfilesStep({
          ...base,
          source: this.resolvePath(spec.source),
          deployDir: spec.deployDir
            ? this.resolvePath(spec.deployDir)
            : path.join(this.config.homeDir, DEFAULT_DEPLOY_DIRNAME),
          ignore: spec.ignore,
        });
    }
  }
}

function isUrl(value: string): boolean {
  return /^[a-z][a-z0-9+.-]*:\/\//i.test(value);
}

function defaultDescription(spec: ResolvedStepSpec): string {
  switch (spec.kind) {
    case "packages":
      return `Install ${spec.packages.length} package${spec.packages.length === 1 ? "" : "s"}`;
    case "clone":
      return `Clone ${spec.repos.map((r) => path.basename(r.dir)).join(", ")}`;
    case "build":
      return `Build in ${spec.dir}`;
    case "copy":
      return `Copy ${spec.from} to ${spec.to}`;
    case "touch":
      return `Create ${spec.path}`;
    case "command":
      return spec.run;
    case "dotfiles":
      return `Deploy dotfiles from ${spec.source}`;
  }
}
