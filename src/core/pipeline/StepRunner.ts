/**
 * Step Runner - executes a provisioning pipeline, fail-fast.
 *
 * ## Execution Rules
 *
 * - Steps run strictly in order, one at a time.
 * - Before each step, its `requires` paths are checked. A missing path
 *   fails the step (SOURCE_MISSING), or skips it with a warning when the
 *   step is optional.
 * - The first failure stops the run: the failed step is recorded with its
 *   error code and failure kind, every later step is marked `not-run`, and
 *   the report is returned. Nothing is retried and nothing is rolled back.
 * - In dry-run mode each step is previewed instead of executed. A missing
 *   path is listed in the step's plan rather than failing or skipping it,
 *   since an earlier step may create it.
 *
 * The runner never throws for a step failure; it is reported in the
 * {@link RunReport}. Callers decide how to surface it.
 *
 * @module
 */

import { ProvisionError, toProvisionError } from "../errors/errors.js";
import { ErrorCode, type FailureKind } from "../errors/ErrorCode.js";
import type { ProvisionConfig } from "../config/ProvisionConfig.js";
import type { CommandExecutor } from "../exec/CommandExecutor.js";
import type { ContextualLogger } from "../logging/ContextualLogger.js";
import { Phase } from "../logging/Phase.js";
import { StepTimer } from "../logging/StepTimer.js";
import type { StepKind } from "../manifest/ManifestSchema.js";
import { describeUnmet, findUnmetRequirement } from "./Preconditions.js";
import type {
  PlannedAction,
  ProvisionStep,
  RemovalConfirmer,
  StepContext,
  StepLogger,
} from "./ProvisionStep.js";

// =============================================================================
// Types
// =============================================================================

export type StepStatus = "succeeded" | "skipped" | "failed" | "not-run" | "planned";

export interface StepOutcome {
  readonly name: string;
  readonly kind: StepKind;
  readonly description: string;
  readonly status: StepStatus;
  readonly durationMs: number;
  readonly actions: readonly PlannedAction[];
  /** Messages the step logged while running */
  readonly messages: readonly string[];
  readonly error?: ProvisionError;
}

export interface RunFailure {
  readonly step: string;
  readonly kind: FailureKind;
  readonly code: ErrorCode;
  readonly message: string;
  readonly details?: Record<string, unknown>;
}

export interface RunReport {
  readonly success: boolean;
  readonly dryRun: boolean;
  readonly outcomes: readonly StepOutcome[];
  readonly failure?: RunFailure;
}

export interface StepRunnerOptions {
  readonly config: ProvisionConfig;
  readonly executor: CommandExecutor;
  /** Human-facing output */
  readonly log: StepLogger;
  /** Structured events */
  readonly logger: ContextualLogger;
  readonly confirmRemoval: RemovalConfirmer;
  /** Called before each step starts (progress display) */
  readonly onStepStart?: (step: ProvisionStep, index: number, total: number) => void;
  /** Clock override for tests */
  readonly clock?: () => number;
}

// =============================================================================
// StepRunner Class
// =============================================================================

export class StepRunner {
  private readonly options: StepRunnerOptions;
  private readonly timer: StepTimer;
  private readonly logger: ContextualLogger;

  constructor(options: StepRunnerOptions) {
    this.options = options;
    this.logger = options.logger.withContext({ phase: Phase.PIPELINE_RUN });
    this.timer = new StepTimer(this.logger, options.clock);
  }

  async run(steps: readonly ProvisionStep[]): Promise<RunReport> {
    const { dryRun } = this.options.config;
    const outcomes: StepOutcome[] = [];

    for (const [index, step] of steps.entries()) {
      this.options.onStepStart?.(step, index, steps.length);

      const outcome = await this.runStep(step, dryRun);
      outcomes.push(outcome);

      if (outcome.status === "failed" && outcome.error) {
        const error = outcome.error;
        for (const rest of steps.slice(index + 1)) {
          outcomes.push(notRun(rest));
        }
        this.logger.error("Run stopped", { step: step.name, error });

        return {
          success: false,
          dryRun,
          outcomes,
          failure: {
            step: step.name,
            kind: error.kind,
            code: error.code,
            message: error.message,
            details: error.details,
          },
        };
      }
    }

    this.logger.info("Run finished", { steps: steps.length, dryRun });
    return { success: true, dryRun, outcomes };
  }

  private async runStep(step: ProvisionStep, dryRun: boolean): Promise<StepOutcome> {
    const messages: string[] = [];
    const ctx = this.createContext(step, messages);

    this.timer.start(step.name, { kind: step.kind, dryRun });

    try {
      const pending: PlannedAction[] = [];
      const unmet = await findUnmetRequirement(step.requires);
      if (unmet) {
        const reason = describeUnmet(unmet);
        if (dryRun) {
          // An earlier step (a clone, usually) may still create it
          const outlook = step.optional ? "skipped if still missing" : "must exist when the step runs";
          ctx.log.warn(`${step.name}: ${reason} (${outlook})`);
          pending.push({ type: "require", description: step.optional ? `${reason} (${outlook})` : reason });
        } else if (step.optional) {
          ctx.log.warn(`Skipping ${step.name}: ${reason}`);
          const durationMs = this.timer.end(step.name, { status: "skipped" });
          return outcome(step, "skipped", durationMs, [{ type: "skip", description: reason }], messages);
        } else {
          throw new ProvisionError(
            reason,
            ErrorCode.SOURCE_MISSING,
            { path: unmet.requirement.path, expected: unmet.requirement.type, reason: unmet.reason },
            `Step "${step.name}" needs ${unmet.requirement.path}. Create it, clone it in an earlier step, or mark the step optional.`,
          );
        }
      }

      if (dryRun) {
        const actions = [...pending, ...(await step.preview(ctx))];
        const durationMs = this.timer.end(step.name, { status: "planned" });
        return outcome(step, "planned", durationMs, actions, messages);
      }

      const result = await step.execute(ctx);
      const durationMs = this.timer.end(step.name, { status: result.status });
      return outcome(step, result.status, durationMs, result.actions, messages);
    } catch (thrown) {
      const error = toProvisionError(thrown);
      const durationMs = this.timer.endWithError(step.name, error);
      return { ...outcome(step, "failed", durationMs, [], messages), error };
    }
  }

  private createContext(step: ProvisionStep, messages: string[]): StepContext {
    const sink = this.options.log;
    const log: StepLogger = {
      info: (message) => {
        messages.push(message);
        sink.info(message);
      },
      warn: (message) => {
        messages.push(message);
        sink.warn(message);
      },
      verbose: (message) => sink.verbose(message),
      debug: (message) => sink.debug(message),
    };

    return {
      config: this.options.config,
      executor: this.options.executor,
      log,
      events: this.logger.withContext({ step: step.name }),
      confirmRemoval: this.options.confirmRemoval,
    };
  }
}

// =============================================================================
// Helpers
// =============================================================================

function outcome(
  step: ProvisionStep,
  status: StepStatus,
  durationMs: number,
  actions: readonly PlannedAction[],
  messages: readonly string[],
): StepOutcome {
  return { name: step.name, kind: step.kind, description: step.description, status, durationMs, actions, messages };
}

function notRun(step: ProvisionStep): StepOutcome {
  return outcome(step, "not-run", 0, [], []);
}
