/**
 * Contracts shared by every provisioning step.
 *
 * A step is built once from its manifest spec (with every path already
 * resolved to an absolute one), run at most once, and then discarded.
 *
 * @module
 */

import type { ProvisionConfig } from "../config/ProvisionConfig.js";
import type { CommandExecutor } from "../exec/CommandExecutor.js";
import type { StepKind } from "../manifest/ManifestSchema.js";
import type { RemovalPlan } from "../deploy/RemovalPlanner.js";
import type { ContextualLogger } from "../logging/ContextualLogger.js";

// =============================================================================
// Types
// =============================================================================

/**
 * A path that must exist before a step may run.
 */
export interface Requirement {
  readonly path: string;
  readonly type: "directory" | "file";
}

/**
 * Human-facing messages from a running step.
 */
export interface StepLogger {
  info(message: string): void;
  warn(message: string): void;
  verbose(message: string): void;
  debug(message: string): void;
}

/**
 * Asked before conflicting targets are removed. Resolves true to proceed.
 */
export type RemovalConfirmer = (plan: RemovalPlan) => Promise<boolean>;

/**
 * Everything a step may use while running.
 */
export interface StepContext {
  readonly config: ProvisionConfig;
  readonly executor: CommandExecutor;
  readonly log: StepLogger;
  /** Structured events for the log file, bound to this step */
  readonly events: ContextualLogger;
  readonly confirmRemoval: RemovalConfirmer;
}

/**
 * One thing a step would do (dry run) or did.
 */
export interface PlannedAction {
  readonly type:
    | "run"
    | "install"
    | "clone"
    | "skip"
    | "copy"
    | "create"
    | "remove"
    | "link"
    /** A needed path that is not there yet (dry run only) */
    | "require";
  readonly description: string;
}

export interface StepResult {
  /** "skipped" when every action was already satisfied */
  readonly status: "succeeded" | "skipped";
  readonly actions: readonly PlannedAction[];
}

export interface ProvisionStep {
  readonly name: string;
  readonly kind: StepKind;

  /** One-line description for plans and progress output */
  readonly description: string;

  /** Paths checked by the runner before execute() or preview() */
  readonly requires: readonly Requirement[];

  /** Skip, rather than fail, when a requirement is missing */
  readonly optional: boolean;

  /**
   * Performs the step.
   *
   * @throws ProvisionError describing the failure; the runner stops on it
   */
  execute(ctx: StepContext): Promise<StepResult>;

  /**
   * Describes what execute() would do, without side effects.
   */
  preview(ctx: StepContext): Promise<readonly PlannedAction[]>;
}
