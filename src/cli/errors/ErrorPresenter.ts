/**
 * Error presentation for CLI output.
 *
 * Formats ProvisionError and unknown errors for the terminal. Stack traces
 * and cause chains are shown only with `--debug`.
 *
 * ```
 * Error [BUILD_FAILED]: Step "spectrwm" failed: Build command failed in /src/spectrwm/linux: make
 *
 * Step: spectrwm
 * Kind: build
 * Command: make
 * Exit Code: 2
 * Cwd: /src/spectrwm/linux
 * Stderr: make: *** No targets specified and no makefile found.  Stop.
 *
 * Hint:
 *   "make" exited with code 2 after 31ms.
 * ```
 *
 * @module
 */

import { ProvisionError, toProvisionError } from "../../core/errors/errors.js";
import { getExitCode } from "../../core/errors/ErrorCode.js";

// =============================================================================
// Types
// =============================================================================

export interface FormatErrorOptions {
  /** Include stack traces and cause chain (default: false) */
  debug?: boolean;
}

export interface ErrorPresenterOptions {
  /** Output function (default: console.error) */
  output?: (line: string) => void;
  debug?: boolean;
}

// =============================================================================
// ErrorPresenter Class
// =============================================================================

/**
 * Presents errors to CLI users and picks the process exit code.
 */
export class ErrorPresenter {
  private readonly output: (line: string) => void;
  private readonly debug: boolean;

  constructor(options: ErrorPresenterOptions = {}) {
    this.output = options.output ?? console.error;
    this.debug = options.debug ?? false;
  }

  /**
   * Prints the error and returns the exit code it maps to.
   */
  present(error: unknown): number {
    const formatted = formatError(error, { debug: this.debug });
    for (const line of formatted.split("\n")) {
      this.output(line);
    }
    return exitCodeFor(error);
  }
}

// =============================================================================
// Format Functions
// =============================================================================

export function exitCodeFor(error: unknown): number {
  return error instanceof ProvisionError ? getExitCode(error.code) : 1;
}

/**
 * Formats an error for CLI output.
 *
 * Unknown errors are reported as INTERNAL_ERROR.
 */
export function formatError(error: unknown, options: FormatErrorOptions = {}): string {
  const { debug = false } = options;
  const provisionError = toProvisionError(error);

  const lines: string[] = [];

  lines.push(`Error [${provisionError.code}]: ${provisionError.message}`);
  lines.push("");

  if (provisionError.details && Object.keys(provisionError.details).length > 0) {
    const detailLines = formatDetails(provisionError.details);
    if (detailLines.length > 0) {
      lines.push(...detailLines);
      lines.push("");
    }
  }

  if (provisionError.hint) {
    lines.push("Hint:");
    for (const hintLine of provisionError.hint.split("\n")) {
      lines.push(`  ${hintLine}`);
    }
    lines.push("");
  }

  if (debug) {
    if (provisionError.stack) {
      lines.push("Stack trace:");
      lines.push(...provisionError.stack.split("\n").slice(1));
      lines.push("");
    }

    const cause = innermostCause(provisionError);
    if (cause) {
      lines.push("Caused by:");
      lines.push(`  ${cause.message}`);
      if (cause.stack) {
        lines.push(...cause.stack.split("\n").slice(1));
      }
      lines.push("");
    }
  }

  return lines.join("\n").trimEnd();
}

/**
 * The deepest cause that is not itself a ProvisionError wrapper.
 */
function innermostCause(error: ProvisionError): Error | undefined {
  let cause = error.cause;
  while (cause instanceof ProvisionError && cause.cause) {
    cause = cause.cause;
  }
  return cause instanceof ProvisionError ? undefined : cause;
}

function formatDetails(details: Record<string, unknown>): string[] {
  const lines: string[] = [];

  for (const [key, value] of Object.entries(details)) {
    if (value === undefined) continue;

    if (Array.isArray(value)) {
      if (value.length > 0) {
        lines.push(`${formatKey(key)}:`);
        for (const item of value) {
          lines.push(`  - ${String(item)}`);
        }
      }
    } else if (typeof value === "string" && value.includes("\n")) {
      lines.push(`${formatKey(key)}:`);
      for (const line of value.split("\n")) {
        lines.push(`  ${line}`);
      }
    } else if (typeof value === "object" && value !== null) {
      lines.push(`${formatKey(key)}: ${JSON.stringify(value)}`);
    } else {
      lines.push(`${formatKey(key)}: ${String(value)}`);
    }
  }

  return lines;
}

/**
 * camelCase to Title Case.
 */
function formatKey(key: string): string {
  return key
    .replace(/([A-Z])/g, " $1")
    .replace(/^./, (str) => str.toUpperCase())
    .trim();
}
