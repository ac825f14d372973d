/**
 * In-process stand-ins shared by the tests.
 */

import * as fs from "node:fs/promises";
import * as os from "node:os";
import * as path from "node:path";
import type { ProvisionConfig } from "../../src/core/config/ProvisionConfig.js";
import type { CommandExecutor, CommandRequest, CommandResult } from "../../src/core/exec/CommandExecutor.js";
import { describeCommand } from "../../src/core/exec/CommandExecutor.js";
import type { GitClient } from "../../src/core/git/RepoCloner.js";
import { createLogger, type LogEntry, type LogSink } from "../../src/core/logging/ContextualLogger.js";
import type { RemovalConfirmer, StepContext, StepLogger } from "../../src/core/pipeline/ProvisionStep.js";

// =============================================================================
// Temp directories
// =============================================================================

export async function createTestDir(prefix = "rigforge-test-"): Promise<string> {
  return await fs.realpath(await fs.mkdtemp(path.join(os.tmpdir(), prefix)));
}

export async function cleanupTestDir(dir: string): Promise<void> {
  await fs.rm(dir, { recursive: true, force: true });
}

export async function writeFiles(root: string, files: Record<string, string>): Promise<void> {
  for (const [relative, content] of Object.entries(files)) {
    const full = path.join(root, relative);
    await fs.mkdir(path.dirname(full), { recursive: true });
    await fs.writeFile(full, content, "utf-8");
  }
}

// =============================================================================
// Logging
// =============================================================================

export class MemorySink implements LogSink {
  readonly entries: LogEntry[] = [];

  write(entry: LogEntry): void {
    this.entries.push(entry);
  }

  messages(): string[] {
    return this.entries.map((e) => e.msg);
  }
}

export class RecordingStepLogger implements StepLogger {
  readonly infos: string[] = [];
  readonly warnings: string[] = [];
  readonly verboses: string[] = [];
  readonly debugs: string[] = [];

  info(message: string): void {
    this.infos.push(message);
  }

  warn(message: string): void {
    this.warnings.push(message);
  }

  verbose(message: string): void {
    this.verboses.push(message);
  }

  debug(message: string): void {
    this.debugs.push(message);
  }
}

// =============================================================================
// Commands
// =============================================================================

export type Responder = (request: CommandRequest) => { exitCode: number; error?: string };

/**
 * Records every request; exit codes come from the responder (default 0).
 */
export class FakeExecutor implements CommandExecutor {
  readonly requests: CommandRequest[] = [];

  constructor(
    private readonly responder: Responder = () => ({ exitCode: 0 }),
    private readonly privilegeCommand: string | null = "sudo",
  ) {}

  async run(request: CommandRequest): Promise<CommandResult> {
    this.requests.push(request);
    const { exitCode, error } = this.responder(request);
    return {
      command: describeCommand(request, this.privilegeCommand),
      success: exitCode === 0,
      exitCode,
      durationMs: 5,
      error: exitCode === 0 ? undefined : error ?? "failed",
    };
  }

  commands(): string[] {
    return this.requests.map((r) => r.command);
  }
}

// =============================================================================
// Git
// =============================================================================

/**
 * Clones by creating the destination with a marker file, or fails for
 * URLs listed in `failing`.
 */
export class FakeGitClient implements GitClient {
  readonly clones: Array<{ url: string; dir: string; options: readonly string[] }> = [];

  constructor(private readonly failing: readonly string[] = []) {}

  async clone(url: string, dir: string, options: readonly string[]): Promise<void> {
    this.clones.push({ url, dir, options });
    await fs.mkdir(dir, { recursive: true });
    if (this.failing.includes(url)) {
      throw new Error(`fatal: repository '${url}' not found`);
    }
    await fs.writeFile(path.join(dir, "README"), url, "utf-8");
  }
}

// =============================================================================
// Config and step context
// =============================================================================

export function makeConfig(root: string, overrides: Partial<ProvisionConfig> = {}): ProvisionConfig {
  return {
    sourceRoot: path.join(root, "src"),
    homeDir: path.join(root, "home"),
    configDir: path.join(root, "home", ".config"),
    privilegeCommand: "sudo",
    dryRun: false,
    assumeYes: true,
    ...overrides,
  };
}

export interface TestContext extends StepContext {
  readonly log: RecordingStepLogger;
  readonly sink: MemorySink;
}

export function makeContext(
  config: ProvisionConfig,
  options: { executor?: CommandExecutor; confirm?: RemovalConfirmer } = {},
): TestContext {
  const sink = new MemorySink();
  return {
    config,
    executor: options.executor ?? new FakeExecutor(),
    log: new RecordingStepLogger(),
    events: createLogger({ sink, minLevel: "debug" }),
    confirmRemoval: options.confirm ?? (async () => true),
    sink,
  };
}
