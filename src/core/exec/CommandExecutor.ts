/**
 * Command Executor - runs the shell commands provisioning steps are made of.
 *
 * Package installs, builds, post-copy hooks and free-form commands all go
 * through a {@link CommandExecutor}. The execa-backed implementation:
 *
 * - runs unprivileged commands through the shell (pipes, `$(...)` work)
 * - runs privileged commands as `<privilegeCommand> sh -c '<command>'`
 * - streams stdout/stderr line by line to the step's output logger
 * - never throws on a non-zero exit; callers decide what a failure means
 * - has no timeout: a hung command blocks the run until it is interrupted
 *
 * Tests substitute a fake behind the same interface.
 *
 * @module
 */

import { execa, type Options as ExecaOptions } from "execa";

// =============================================================================
// Types
// =============================================================================

/**
 * Receives command output as it is produced.
 */
export interface OutputLogger {
  stdout(line: string): void;
  stderr(line: string): void;
}

/**
 * A single command invocation.
 */
export interface CommandRequest {
  /** Shell command string */
  readonly command: string;

  /** Run through the privilege command (sudo) */
  readonly privileged?: boolean;

  /** Working directory (default: the process's) */
  readonly cwd?: string;

  /** Extra environment variables merged over process.env */
  readonly env?: Record<string, string>;

  /** Suppress output streaming (for checks such as package queries) */
  readonly quiet?: boolean;
}

/**
 * Outcome of a command invocation.
 */
export interface CommandResult {
  /** The command as it was actually executed (with privilege prefix) */
  readonly command: string;

  readonly success: boolean;

  /** Exit code (0 for success; 1 when the process could not start) */
  readonly exitCode: number;

  readonly durationMs: number;

  /** Tail of stderr, or the spawn error message, when the command failed */
  readonly error?: string;
}

export interface CommandExecutor {
  run(request: CommandRequest): Promise<CommandResult>;
}

// =============================================================================
// Helpers
// =============================================================================

/**
 * Quotes a string for POSIX `sh`.
 */
export function shellQuote(value: string): string {
  return `'${value.replace(/'/g, `'\\''`)}'`;
}

/**
 * Renders the command line that will actually run.
 */
export function describeCommand(request: CommandRequest, privilegeCommand: string | null): string {
  if (request.privileged && privilegeCommand) {
    return `${privilegeCommand} sh -c ${shellQuote(request.command)}`;
  }
  return request.command;
}

/**
 * Formats duration in human-readable format ("1.23s" or "456ms").
 */
export function formatDuration(ms: number): string {
  if (ms >= 1000) {
    return `${(ms / 1000).toFixed(2)}s`;
  }
  return `${ms}ms`;
}

const STDERR_TAIL_LINES = 20;

function lastLines(text: string, count: number): string {
  return text.split("\n").filter((l) => l.trim()).slice(-count).join("\n");
}

/**
 * An execa transform that hands each complete, non-blank line to `emit`
 * and passes it on unchanged, so the result is still buffered.
 */
function forwardLines(emit: (line: string) => void) {
  return function* (line: unknown) {
    if (typeof line === "string" && line.trim()) {
      emit(line);
    }
    yield line;
  };
}

// =============================================================================
// ExecaCommandExecutor
// =============================================================================

/**
 * Executes commands with execa.
 *
 * @example
 * ```typescript
 * const executor = new ExecaCommandExecutor({ privilegeCommand: "sudo", output });
 * const result = await executor.run({ command: "make install", cwd: srcDir, privileged: true });
 * ```
 */
export class ExecaCommandExecutor implements CommandExecutor {
  private readonly privilegeCommand: string | null;
  private readonly output?: OutputLogger;

  constructor(options: { privilegeCommand: string | null; output?: OutputLogger }) {
    this.privilegeCommand = options.privilegeCommand;
    this.output = options.output;
  }

  async run(request: CommandRequest): Promise<CommandResult> {
    const startTime = Date.now();
    const command = describeCommand(request, this.privilegeCommand);

    const output = request.quiet ? undefined : this.output;
    const execaOptions: ExecaOptions = {
      cwd: request.cwd,
      env: request.env ? { ...process.env, ...request.env } : process.env,
      stdin: "inherit",
      stdout: output ? forwardLines(output.stdout) : "pipe",
      stderr: output ? forwardLines(output.stderr) : "pipe",
      // Don't throw on non-zero exit - we handle it manually
      reject: false,
    };

    try {
      const subprocess =
        request.privileged && this.privilegeCommand
          ? execa(this.privilegeCommand, ["sh", "-c", request.command], execaOptions)
          : execa(request.command, { ...execaOptions, shell: true });

      const result = await subprocess;
      const durationMs = Date.now() - startTime;
      const exitCode = result.exitCode ?? (result.failed ? 1 : 0);

      let stderr = "";
      if (typeof result.stderr === "string") {
        stderr = result.stderr;
      } else if (Array.isArray(result.stderr)) {
        stderr = result.stderr.join("\n");
      }

      return {
        command,
        success: exitCode === 0 && !result.failed,
        exitCode,
        durationMs,
        error: result.failed ? lastLines(stderr, STDERR_TAIL_LINES) || result.message : undefined,
      };
    } catch (error) {
      return {
        command,
        success: false,
        exitCode: 1,
        durationMs: Date.now() - startTime,
        error: error instanceof Error ? error.message : String(error),
      };
    }
  }
}
