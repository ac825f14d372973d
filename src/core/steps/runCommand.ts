/**
 * Command helpers shared by the steps that shell out.
 *
 * @module
 */

import { ProvisionError } from "../errors/errors.js";
import type { ErrorCode, FailureKind } from "../errors/ErrorCode.js";
import { describeCommand, formatDuration, type CommandRequest, type CommandResult } from "../exec/CommandExecutor.js";
import type { ShellCommand } from "../manifest/ManifestSchema.js";
import type { PlannedAction, StepContext } from "../pipeline/ProvisionStep.js";

/**
 * How a failed command is reported.
 */
export interface CommandFailure {
  readonly code: ErrorCode;
  readonly message: string;
  /** Overrides the kind implied by the code */
  readonly kind?: FailureKind;
  readonly hint?: string;
}

/**
 * Runs a command and throws when it exits non-zero.
 */
export async function runOrThrow(
  ctx: StepContext,
  request: CommandRequest,
  failure: CommandFailure,
): Promise<CommandResult> {
  ctx.log.verbose(`$ ${describeCommand(request, ctx.config.privilegeCommand)}`);
  ctx.log.debug(`cwd=${request.cwd ?? "(inherited)"} privileged=${request.privileged ?? false}`);
  ctx.events.debug("Command started", { command: request.command, cwd: request.cwd, privileged: request.privileged });

  const result = await ctx.executor.run(request);

  ctx.events.info("Command finished", {
    command: result.command,
    exitCode: result.exitCode,
    durationMs: result.durationMs,
  });

  if (!result.success) {
    throw new ProvisionError(
      failure.message,
      failure.code,
      { command: result.command, exitCode: result.exitCode, cwd: request.cwd, stderr: result.error },
      failure.hint ?? `"${result.command}" exited with code ${result.exitCode} after ${formatDuration(result.durationMs)}.`,
      undefined,
      true,
      failure.kind,
    );
  }
  return result;
}

/**
 * Preview entry for a command, shown as it would be executed.
 */
export function plannedRun(ctx: StepContext, request: CommandRequest): PlannedAction {
  const where = request.cwd ? ` (in ${request.cwd})` : "";
  return { type: "run", description: `${describeCommand(request, ctx.config.privilegeCommand)}${where}` };
}

export function toRequest(command: ShellCommand, cwd?: string): CommandRequest {
  return { command: command.run, privileged: command.privileged, cwd };
}
