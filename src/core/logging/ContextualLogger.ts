/**
 * Contextual Logger with structured output.
 *
 * Provides structured logging with:
 * - Automatic context enrichment (correlationId, phase, step, timestamp)
 * - Child loggers via withContext()
 * - Level filtering
 * - ProvisionError enrichment (code, failure kind)
 *
 * Entries go to a pluggable sink. The CLI writes them as JSON lines to the
 * file named by `--log-file` and discards them otherwise; human-facing
 * output is CliUx's job.
 *
 * @module
 */

import * as fs from "node:fs";
import * as path from "node:path";
import { ProvisionError } from "../errors/errors.js";
import type { Phase } from "./Phase.js";

// =============================================================================
// Types
// =============================================================================

export type LogLevel = "debug" | "info" | "warn" | "error";

/**
 * A structured log entry.
 */
export interface LogEntry {
  /** ISO timestamp */
  ts: string;

  level: LogLevel;

  msg: string;

  /** Correlation ID of the run */
  correlationId?: string;

  /** Current run phase */
  phase?: string;

  /** Name of the provisioning step being run */
  step?: string;

  /** Error code (if logging an error) */
  errorCode?: string;

  /** Failure kind (if logging a ProvisionError) */
  failureKind?: string;

  /** Error message (if logging an error) */
  errorMessage?: string;

  /** Stack trace (debug mode only) */
  stack?: string;

  /** Error cause message (debug mode only) */
  cause?: string;

  [key: string]: unknown;
}

export interface LogSink {
  write(entry: LogEntry): void;
}

/**
 * Context that can be bound to a logger.
 */
export interface LogContext {
  correlationId?: string;
  phase?: Phase;
  step?: string;
  [key: string]: unknown;
}

export interface CreateLoggerOptions {
  /** Output sink (default: discard) */
  sink?: LogSink;

  /** Minimum log level (default: "info") */
  minLevel?: LogLevel;

  /** Include debug details (stack, cause) */
  debug?: boolean;

  context?: LogContext;
}

// =============================================================================
// Log Level Utilities
// =============================================================================

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

function shouldLog(level: LogLevel, minLevel: LogLevel): boolean {
  return LEVEL_ORDER[level] >= LEVEL_ORDER[minLevel];
}

// =============================================================================
// Sinks
// =============================================================================

/**
 * Sink that drops every entry.
 */
export class NullSink implements LogSink {
  write(_entry: LogEntry): void {}
}

/**
 * Appends entries to a file as JSON lines.
 *
 * Writes are synchronous so that the last entries before a fail-fast exit
 * are on disk.
 */
export class JsonLinesFileSink implements LogSink {
  constructor(private readonly filePath: string) {
    fs.mkdirSync(path.dirname(filePath), { recursive: true });
  }

  write(entry: LogEntry): void {
    fs.appendFileSync(this.filePath, JSON.stringify(entry) + "\n", "utf-8");
  }
}

// =============================================================================
// ContextualLogger Class
// =============================================================================

/**
 * Logger with bound context and structured output.
 *
 * @example
 * ```typescript
 * const logger = createLogger({ sink: new JsonLinesFileSink("/tmp/run.log") });
 * const stepLogger = logger.withContext({ phase: Phase.PIPELINE_RUN, step: "clone-repos" });
 * stepLogger.info("Clone skipped", { dir: "/src/spectrwm" });
 * ```
 */
export class ContextualLogger {
  private readonly sink: LogSink;
  private readonly minLevel: LogLevel;
  private readonly debugMode: boolean;
  private readonly context: LogContext;

  constructor(options: CreateLoggerOptions = {}) {
    this.sink = options.sink ?? new NullSink();
    this.minLevel = options.minLevel ?? "info";
    this.debugMode = options.debug ?? false;
    this.context = options.context ?? {};
  }

  /**
   * Creates a child logger with additional context.
   */
  withContext(ctx: LogContext): ContextualLogger {
    return new ContextualLogger({
      sink: this.sink,
      minLevel: this.minLevel,
      debug: this.debugMode,
      context: { ...this.context, ...ctx },
    });
  }

  debug(msg: string, ctx?: Record<string, unknown>): void {
    this.log("debug", msg, ctx);
  }

  info(msg: string, ctx?: Record<string, unknown>): void {
    this.log("info", msg, ctx);
  }

  warn(msg: string, ctx?: Record<string, unknown>): void {
    this.log("warn", msg, ctx);
  }

  error(msg: string, ctx?: Record<string, unknown>): void {
    this.log("error", msg, ctx);
  }

  private log(level: LogLevel, msg: string, ctx?: Record<string, unknown>): void {
    if (!shouldLog(level, this.minLevel)) {
      return;
    }

    const entry: LogEntry = {
      ts: new Date().toISOString(),
      level,
      msg,
    };

    for (const [key, value] of Object.entries(this.context)) {
      if (value !== undefined) {
        entry[key] = value;
      }
    }

    if (ctx) {
      for (const [key, value] of Object.entries(ctx)) {
        if (key === "error" && value instanceof Error) {
          this.enrichWithError(entry, value);
        } else if (value !== undefined) {
          entry[key] = value;
        }
      }
    }

    this.sink.write(entry);
  }

  private enrichWithError(entry: LogEntry, error: Error): void {
    entry.errorMessage = error.message;

    if (error instanceof ProvisionError) {
      entry.errorCode = error.code;
      entry.failureKind = error.kind;

      if (this.debugMode && error.cause) {
        entry.cause = error.cause.message;
      }
    }

    if (this.debugMode && error.stack) {
      entry.stack = error.stack;
    }
  }
}

// =============================================================================
// Factory Function
// =============================================================================

export function createLogger(options: CreateLoggerOptions = {}): ContextualLogger {
  return new ContextualLogger(options);
}
