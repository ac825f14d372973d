/**
 * Per-invocation CLI state: global flags, terminal output and the
 * structured logger.
 *
 * @module
 */

import * as path from "node:path";
import { z } from "zod";
import {
  createLogger,
  JsonLinesFileSink,
  NullSink,
  type ContextualLogger,
} from "../core/logging/ContextualLogger.js";
import { createExecutionContext, toLogContext, type ExecutionContext } from "../core/logging/ExecutionContext.js";
import { Phase } from "../core/logging/Phase.js";
import { getCliUx, type CliUx } from "./ux/CliUx.js";

/**
 * Flags accepted before any subcommand.
 */
export const GlobalOptionsSchema = z.object({
  verbose: z.boolean().default(false),
  debug: z.boolean().default(false),
  silent: z.boolean().default(false),
  logFile: z.string().optional(),
});

export type GlobalOptions = z.infer<typeof GlobalOptionsSchema>;

export interface CliRuntime {
  readonly globals: GlobalOptions;
  readonly ux: CliUx;
  readonly logger: ContextualLogger;
  readonly context: ExecutionContext;
}

/**
 * Builds the runtime for one command invocation.
 *
 * Structured entries go to `--log-file` as JSON lines, or nowhere.
 */
export function createRuntime(rawGlobals: unknown, command: string, cwd: string = process.cwd()): CliRuntime {
  const globals = GlobalOptionsSchema.parse(rawGlobals);
  const context = createExecutionContext({ phase: Phase.CLI_INIT, metadata: { command } });

  const sink = globals.logFile ? new JsonLinesFileSink(path.resolve(cwd, globals.logFile)) : new NullSink();
  const logger = createLogger({
    sink,
    minLevel: globals.debug ? "debug" : "info",
    debug: globals.debug,
  }).withContext(toLogContext(context));

  logger.info("Command started", { args: process.argv.slice(2) });

  return { globals, ux: getCliUx(), logger, context };
}
