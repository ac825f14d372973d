/**
 * Execution context for structured logging.
 *
 * One context is created per rigforge invocation. Its correlation ID is
 * bound into every structured log entry, so a single run can be picked
 * out of a log file that several runs have appended to.
 *
 * @module
 */

import { randomUUID } from "node:crypto";
import type { Phase } from "./Phase.js";
import type { LogContext } from "./ContextualLogger.js";

// =============================================================================
// Types
// =============================================================================

export interface ExecutionContext {
  /** Unique identifier for this run */
  readonly correlationId: string;

  /** Current run phase, when known */
  readonly phase?: Phase;

  /** Extra fields bound into every entry (command name, manifest path, ...) */
  readonly metadata: Readonly<Record<string, unknown>>;
}

export interface CreateExecutionContextOptions {
  /** Custom correlation ID (default: random UUID) */
  correlationId?: string;

  phase?: Phase;

  metadata?: Record<string, unknown>;
}

// =============================================================================
// Factory Functions
// =============================================================================

/**
 * Creates the context for a new run.
 *
 * @example
 * ```typescript
 * const ctx = createExecutionContext({ metadata: { command: "run" } });
 * const logger = createLogger({ sink }).withContext(toLogContext(ctx));
 * ```
 */
export function createExecutionContext(
  options: CreateExecutionContextOptions = {},
): ExecutionContext {
  return {
    correlationId: options.correlationId ?? randomUUID(),
    phase: options.phase,
    metadata: { ...options.metadata },
  };
}

/**
 * Flattens a context into the fields a logger binds.
 */
export function toLogContext(ctx: ExecutionContext): LogContext {
  return {
    ...ctx.metadata,
    correlationId: ctx.correlationId,
    phase: ctx.phase,
  };
}
