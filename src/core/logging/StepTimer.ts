/**
 * Step Timer for pipeline instrumentation.
 *
 * Tracks start/end times of run phases and provisioning steps and emits
 * `step.start` / `step.end` structured log events with durations.
 *
 * @module
 */

import type { ContextualLogger } from "./ContextualLogger.js";

// =============================================================================
// Types
// =============================================================================

interface RunningTiming {
  readonly startTime: number;
}

// =============================================================================
// StepTimer Class
// =============================================================================

/**
 * Timer for phases and steps.
 *
 * Labels are either a {@link Phase} or a manifest step name.
 *
 * @example
 * ```typescript
 * const timer = new StepTimer(logger);
 *
 * const manifest = await timer.run(Phase.MANIFEST_LOAD, () => loader.load(file));
 * ```
 */
export class StepTimer {
  private readonly logger: ContextualLogger;
  private readonly clock: () => number;
  private readonly running = new Map<string, RunningTiming>();

  constructor(logger: ContextualLogger, clock: () => number = Date.now) {
    this.logger = logger;
    this.clock = clock;
  }

  start(label: string, context?: Record<string, unknown>): void {
    this.running.set(label, { startTime: this.clock() });
    this.logger.withContext({ step: label }).info("Step started", { event: "step.start", ...context });
  }

  /**
   * Ends a timing and returns its duration; 0 when the label never started.
   */
  end(label: string, context?: Record<string, unknown>): number {
    const durationMs = this.finish(label);
    if (durationMs === undefined) return 0;

    this.logger
      .withContext({ step: label })
      .info("Step completed", { event: "step.end", durationMs, ...context });
    return durationMs;
  }

  endWithError(label: string, error: Error, context?: Record<string, unknown>): number {
    const durationMs = this.finish(label);
    if (durationMs === undefined) return 0;

    this.logger.withContext({ step: label }).error("Step failed", {
      event: "step.end",
      durationMs,
      error,
      ...context,
    });
    return durationMs;
  }

  /**
   * Runs a function between start() and end()/endWithError().
   */
  async run<T>(label: string, fn: () => Promise<T>, context?: Record<string, unknown>): Promise<T> {
    this.start(label, context);
    try {
      const result = await fn();
      this.end(label);
      return result;
    } catch (error) {
      this.endWithError(label, error instanceof Error ? error : new Error(String(error)));
      throw error;
    }
  }

  private finish(label: string): number | undefined {
    const timing = this.running.get(label);
    if (!timing) return undefined;

    this.running.delete(label);
    return this.clock() - timing.startTime;
  }
}
