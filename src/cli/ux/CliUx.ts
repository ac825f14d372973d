/**
 * Human-facing terminal output for rigforge.
 *
 * Levels (silent, info, verbose, debug) come from the global flags. Colors
 * are used only on a TTY. Errors always print, even when silent.
 *
 * Step progress, step messages and the output of the commands steps run
 * all go through here; the structured log file is ContextualLogger's.
 *
 * @module
 */

import pc from "picocolors";
import type { OutputLogger } from "../../core/exec/CommandExecutor.js";

// =============================================================================
// Types
// =============================================================================

export type LogLevel = "silent" | "info" | "verbose" | "debug";

export interface CliUxOptions {
  readonly level: LogLevel;

  /** Default: whether stdout is a TTY */
  readonly colors?: boolean;

  /** Writer overrides, for tests */
  readonly stdout?: (msg: string) => void;
  readonly stderr?: (msg: string) => void;
}

export interface ErrorDetails {
  readonly code?: string;
  readonly hint?: string;
}

type Stream = "stdout" | "stderr";
type Style = (text: string) => string;

// =============================================================================
// Constants
// =============================================================================

const LEVEL_ORDER: Record<LogLevel, number> = {
  silent: 0,
  info: 1,
  verbose: 2,
  debug: 3,
};

const MARKS = {
  success: "✓",
  error: "✗",
  warning: "⚠",
  info: "→",
  output: "│",
} as const;

const plain: Style = (text) => text;

// =============================================================================
// CliUx Class
// =============================================================================

/**
 * Terminal output helper.
 *
 * Structurally a `StepLogger`, so the step runner can log through it as is.
 *
 * @example
 * ```typescript
 * const ux = createCliUx({ level: "info" });
 *
 * ux.step(1, 3, "base-packages: Install 12 packages");
 * ux.info("All packages already installed, skipping");
 * ux.success("fedora-spectrwm provisioned");
 * ```
 */
export class CliUx {
  private readonly level: LogLevel;
  private readonly writers: Record<Stream, (msg: string) => void>;
  private readonly style: Record<"green" | "red" | "yellow" | "cyan" | "dim", Style>;

  constructor(options: CliUxOptions) {
    this.level = options.level;
    this.writers = {
      stdout: options.stdout ?? ((msg) => process.stdout.write(msg)),
      stderr: options.stderr ?? ((msg) => process.stderr.write(msg)),
    };

    const colors = options.colors ?? process.stdout.isTTY ?? false;
    this.style = colors
      ? { green: pc.green, red: pc.red, yellow: pc.yellow, cyan: pc.cyan, dim: pc.dim }
      : { green: plain, red: plain, yellow: plain, cyan: plain, dim: plain };
  }

  // ===========================================================================
  // Step output
  // ===========================================================================

  /** `[2/17] sources: Clone bin, spectrwm` */
  step(current: number, total: number, description: string): void {
    this.emit("info", "stdout", `${this.style.dim(`[${current}/${total}]`)} ${description}`);
  }

  info(message: string): void {
    this.emit("info", "stdout", `${this.style.cyan(MARKS.info)} ${message}`);
  }

  warn(message: string): void {
    this.emit("info", "stderr", `${this.style.yellow(MARKS.warning)} ${message}`);
  }

  verbose(message: string): void {
    this.emit("verbose", "stdout", `  ${this.style.dim(message)}`);
  }

  debug(message: string): void {
    this.emit("debug", "stdout", `  ${this.style.dim(`[debug] ${message}`)}`);
  }

  /**
   * Sink for the output of commands run by steps, shown from verbose up.
   */
  commandOutput(): OutputLogger {
    const bar = this.style.dim(MARKS.output);
    return {
      stdout: (line) => this.emit("verbose", "stdout", `    ${bar} ${line}`),
      stderr: (line) => this.emit("verbose", "stderr", `    ${bar} ${line}`),
    };
  }

  // ===========================================================================
  // Results
  // ===========================================================================

  success(message: string, details?: Readonly<Record<string, unknown>>): void {
    this.emit("info", "stdout", `${this.style.green(MARKS.success)} ${message}`);
    for (const [key, value] of Object.entries(details ?? {})) {
      this.emit("info", "stdout", `  ${this.style.dim(`${key}:`)} ${String(value)}`);
    }
  }

  /**
   * Always printed, whatever the level.
   */
  error(message: string, details: ErrorDetails = {}): void {
    const code = details.code ? `${this.style.red(details.code)}: ` : "";
    this.writers.stderr(`${this.style.red(MARKS.error)} ${code}${message}\n`);
    if (details.hint) {
      this.writers.stderr(`  ${this.style.dim("Hint:")} ${details.hint}\n`);
    }
  }

  /** A line as is, e.g. from a report printer */
  print(line: string): void {
    this.emit("info", "stdout", line);
  }

  listItem(text: string): void {
    this.emit("info", "stdout", `  • ${text}`);
  }

  newline(): void {
    this.emit("info", "stdout", "");
  }

  private emit(minLevel: Exclude<LogLevel, "silent">, stream: Stream, line: string): void {
    if (LEVEL_ORDER[minLevel] > LEVEL_ORDER[this.level]) return;
    this.writers[stream](`${line}\n`);
  }
}

// =============================================================================
// Factory
// =============================================================================

export function createCliUx(options: CliUxOptions): CliUx {
  return new CliUx(options);
}

let defaultInstance: CliUx | null = null;

/**
 * The process-wide instance, configured by the CLI's preAction hook.
 */
export function getCliUx(): CliUx {
  defaultInstance ??= createCliUx({ level: "info" });
  return defaultInstance;
}

export function setDefaultCliUx(ux: CliUx): void {
  defaultInstance = ux;
}

// =============================================================================
// Log Level Parsing
// =============================================================================

export interface LogLevelFlags {
  readonly verbose: boolean;
  readonly debug: boolean;
  readonly silent: boolean;
}

/**
 * --debug beats --silent, which beats --verbose.
 */
export function parseLogLevel(flags: LogLevelFlags): LogLevel {
  if (flags.debug) return "debug";
  if (flags.silent) return "silent";
  if (flags.verbose) return "verbose";
  return "info";
}
