/**
 * Handler for `rigforge run`, `rigforge plan` and `rigforge deploy`.
 *
 * ## Flow
 *
 * 1. Locate the manifest and resolve the run configuration
 * 2. Load, render and validate the manifest
 * 3. Build the step list (all steps, or only dotfiles for `deploy`)
 * 4. Run it, fail-fast, or preview it for a dry run
 *
 * The handler returns the report even when a step failed; call
 * {@link assertRunSucceeded} to turn a failed report into an error.
 *
 * @module
 */

import * as path from "node:path";
import {
  manifestSearchPaths,
  resolveProvisionConfig,
  type ProvisionConfig,
} from "../../core/config/ProvisionConfig.js";
import { ProvisionError, StepFailedError } from "../../core/errors/errors.js";
import { ErrorCode } from "../../core/errors/ErrorCode.js";
import type { CommandExecutor } from "../../core/exec/CommandExecutor.js";
import type { RepoCloner } from "../../core/git/RepoCloner.js";
import type { ContextualLogger } from "../../core/logging/ContextualLogger.js";
import { Phase } from "../../core/logging/Phase.js";
import { StepTimer } from "../../core/logging/StepTimer.js";
import { ManifestLoader, type ProvisionManifest } from "../../core/manifest/ManifestLoader.js";
import type { StepKind } from "../../core/manifest/ManifestSchema.js";
import { PipelineBuilder } from "../../core/pipeline/PipelineBuilder.js";
import type { RemovalConfirmer, StepLogger } from "../../core/pipeline/ProvisionStep.js";
import { StepRunner, type RunReport } from "../../core/pipeline/StepRunner.js";

// =============================================================================
// Types
// =============================================================================

export interface RunInput {
  readonly manifest?: string;
  readonly sourceRoot?: string;
  readonly home?: string;
  readonly configDir?: string;
  readonly sudo?: string;
  readonly dryRun: boolean;
  readonly yes: boolean;
  /** Restrict the run to these step kinds */
  readonly kinds?: readonly StepKind[];
}

export interface RunDependencies {
  readonly env: NodeJS.ProcessEnv;
  readonly cwd: string;
  readonly uid?: number;

  /** Human-facing step output */
  readonly log: StepLogger;
  readonly logger: ContextualLogger;

  readonly createExecutor: (config: ProvisionConfig) => CommandExecutor;
  readonly createConfirmer: (config: ProvisionConfig) => RemovalConfirmer;
  readonly onStepStart?: (name: string, description: string, index: number, total: number) => void;

  readonly cloner?: RepoCloner;
  readonly loader?: ManifestLoader;
}

export interface RunResult {
  readonly manifest: ProvisionManifest;
  readonly config: ProvisionConfig;
  readonly report: RunReport;
}

// =============================================================================
// Handler
// =============================================================================

/**
 * @throws ProvisionError for manifest and configuration problems
 */
export async function handleRun(input: RunInput, deps: RunDependencies): Promise<RunResult> {
  const timer = new StepTimer(deps.logger);
  const loader = deps.loader ?? new ManifestLoader();

  const { manifestPath, config } = await timer.run(Phase.CONFIG_RESOLVE, async () => {
    const candidates = manifestSearchPaths({ explicit: input.manifest, cwd: deps.cwd, env: deps.env });
    const found = await loader.find(candidates);
    const resolved = resolveProvisionConfig({
      env: deps.env,
      cwd: deps.cwd,
      uid: deps.uid,
      manifestDir: path.dirname(found),
      sourceRoot: input.sourceRoot,
      homeDir: input.home,
      configDir: input.configDir,
      sudo: input.sudo,
      dryRun: input.dryRun,
      assumeYes: input.yes,
    });
    return { manifestPath: found, config: resolved };
  });
  deps.log.debug(`Manifest ${manifestPath}`);
  deps.log.debug(`Source root ${config.sourceRoot}, home ${config.homeDir}, config ${config.configDir}`);

  const manifest = await timer.run(Phase.MANIFEST_LOAD, () =>
    loader.load(manifestPath, {
      home: config.homeDir,
      configDir: config.configDir,
      sourceRoot: config.sourceRoot,
    }),
  );

  const steps = await timer.run(Phase.PIPELINE_BUILD, async () => {
    const builder = new PipelineBuilder(config, { cloner: deps.cloner });
    return builder.build(manifest, { kinds: input.kinds });
  });

  if (steps.length === 0 && input.kinds) {
    throw new ProvisionError(
      `Manifest has no ${input.kinds.join("/")} steps`,
      ErrorCode.MANIFEST_INVALID,
      { manifestPath, kinds: [...input.kinds] },
      `Add a step of kind ${input.kinds.map((k) => `"${k}"`).join(" or ")} to ${manifestPath}.`,
    );
  }

  const runner = new StepRunner({
    config,
    executor: deps.createExecutor(config),
    log: deps.log,
    logger: deps.logger,
    confirmRemoval: deps.createConfirmer(config),
    onStepStart: (step, index, total) => deps.onStepStart?.(step.name, step.description, index, total),
  });

  const report = await runner.run(steps);
  deps.logger.withContext({ phase: Phase.DONE }).info("Run report", {
    success: report.success,
    dryRun: report.dryRun,
    failedStep: report.failure?.step,
  });

  return { manifest, config, report };
}

/**
 * @throws StepFailedError for the step a failed report stopped on
 */
export function assertRunSucceeded(report: RunReport): void {
  if (report.success) return;

  const failed = report.outcomes.find((o) => o.status === "failed");
  if (failed?.error) {
    throw new StepFailedError(failed.name, failed.error);
  }
  throw new ProvisionError("Run failed", ErrorCode.INTERNAL_ERROR, { failure: report.failure });
}
