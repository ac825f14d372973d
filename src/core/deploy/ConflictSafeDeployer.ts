/**
 * Conflict-safe dotfiles deployment.
 *
 * A deployment runs in four phases, each logged under its own phase:
 *
 * 1. **plan**: map the source tree to targets, snapshot what is there now,
 *    decide what must be removed. Nothing is touched.
 * 2. **remove**: after confirmation, remove every existing target (file,
 *    directory or symlink, broken or not).
 * 3. **copy**: copy the source tree to the deploy directory.
 * 4. **link**: symlink every target to its deployed entry.
 *
 * Dry runs stop after the plan.
 *
 * @module
 */

import * as fs from "node:fs/promises";
import * as path from "node:path";
import { ProvisionError } from "../errors/errors.js";
import { ErrorCode } from "../errors/ErrorCode.js";
import type { ContextualLogger } from "../logging/ContextualLogger.js";
import { Phase } from "../logging/Phase.js";
import { linkEntries, type LinkOutcome } from "./DotfileLinker.js";
import { planRemovals, type RemovalPlan } from "./RemovalPlanner.js";
import { mapDotfileEntries, type DeployLayout, type DotfileEntry } from "./TargetMapper.js";
import { snapshotTargets } from "./TargetSnapshot.js";

// =============================================================================
// Types
// =============================================================================

export interface DeploymentPlan {
  readonly layout: DeployLayout;
  readonly entries: readonly DotfileEntry[];
  readonly removal: RemovalPlan;

  /** False when the tree is deployed in place */
  readonly copyNeeded: boolean;
}

export interface ApplyOptions {
  /** Skip the confirmation gate */
  readonly assumeYes: boolean;

  /** Asked once before anything is removed; only when removals exist */
  readonly confirm: (plan: RemovalPlan) => Promise<boolean>;
}

export interface DeploymentReport {
  readonly removed: number;
  readonly linked: number;
  readonly unchanged: number;
  readonly copiedTo: string | null;
  readonly links: readonly LinkOutcome[];
}

// =============================================================================
// ConflictSafeDeployer Class
// =============================================================================

/**
 * Plans and applies dotfiles deployments.
 *
 * @example
 * ```typescript
 * const deployer = new ConflictSafeDeployer(logger);
 * const plan = await deployer.plan({ sourceDir, deployDir, homeDir, configDir });
 * await deployer.apply(plan, { assumeYes: false, confirm: askUser });
 * ```
 */
export class ConflictSafeDeployer {
  constructor(private readonly logger: ContextualLogger) {}

  async plan(layout: DeployLayout): Promise<DeploymentPlan> {
    const log = this.logger.withContext({ phase: Phase.DEPLOY_PLAN });

    const entries = await mapDotfileEntries(layout);
    const snapshot = await snapshotTargets(entries.map((e) => e.targetPath));
    const removal = planRemovals(snapshot, entries);

    log.info("Deployment planned", {
      entries: entries.length,
      removals: removal.removals.length,
      sourceDir: layout.sourceDir,
      deployDir: layout.deployDir,
    });

    return {
      layout,
      entries,
      removal,
      copyNeeded: path.resolve(layout.sourceDir) !== path.resolve(layout.deployDir),
    };
  }

  /**
   * Applies a plan.
   *
   * @throws ProvisionError DEPLOY_CANCELLED when the removal is declined
   * @throws ProvisionError DEPLOY_REMOVE_FAILED, COPY_FAILED, DEPLOY_LINK_* on filesystem failures
   */
  async apply(plan: DeploymentPlan, options: ApplyOptions): Promise<DeploymentReport> {
    const { removals } = plan.removal;

    if (removals.length > 0 && !options.assumeYes) {
      const approved = await options.confirm(plan.removal);
      if (!approved) {
        throw new ProvisionError(
          "Deployment cancelled: conflicting targets were not removed",
          ErrorCode.DEPLOY_CANCELLED,
          { targets: removals.map((r) => r.path) },
          "Re-run and confirm, or pass --yes to remove conflicting targets without asking.",
        );
      }
    }

    await this.removeTargets(plan.removal);
    const copiedTo = await this.copyTree(plan);

    const linkLog = this.logger.withContext({ phase: Phase.DEPLOY_LINK });
    await fs.mkdir(plan.layout.configDir, { recursive: true });
    const links = await linkEntries(plan.entries);
    const linked = links.filter((l) => l.status === "linked").length;
    linkLog.info("Entries linked", { linked, unchanged: links.length - linked });

    return {
      removed: removals.length,
      linked,
      unchanged: links.length - linked,
      copiedTo,
      links,
    };
  }

  private async removeTargets(plan: RemovalPlan): Promise<void> {
    const log = this.logger.withContext({ phase: Phase.DEPLOY_REMOVE });

    for (const removal of plan.removals) {
      try {
        await fs.rm(removal.path, { recursive: true, force: true });
      } catch (error) {
        const cause = error instanceof Error ? error : new Error(String(error));
        throw new ProvisionError(
          `Failed to remove ${removal.path}`,
          ErrorCode.DEPLOY_REMOVE_FAILED,
          { target: removal.path, kind: removal.kind, reason: cause.message },
          "Check the permissions of the target and its parent directory.",
          cause,
        );
      }
      log.debug("Target removed", { target: removal.path, kind: removal.kind });
    }
  }

  private async copyTree(plan: DeploymentPlan): Promise<string | null> {
    const { sourceDir, deployDir } = plan.layout;
    if (!plan.copyNeeded) {
      return null;
    }

    const log = this.logger.withContext({ phase: Phase.DEPLOY_COPY });
    try {
      await fs.mkdir(path.dirname(deployDir), { recursive: true });
      await fs.cp(sourceDir, deployDir, { recursive: true, force: true, verbatimSymlinks: true });
    } catch (error) {
      const cause = error instanceof Error ? error : new Error(String(error));
      throw new ProvisionError(
        `Failed to copy ${sourceDir} to ${deployDir}`,
        ErrorCode.COPY_FAILED,
        { from: sourceDir, to: deployDir, reason: cause.message },
        undefined,
        cause,
      );
    }
    log.info("Dotfiles copied", { from: sourceDir, to: deployDir });
    return deployDir;
  }
}
