import { describe, it, expect, beforeEach, afterEach } from "vitest";
import * as fs from "node:fs/promises";
import * as path from "node:path";
import { StepRunner } from "../../src/core/pipeline/StepRunner.js";
import { ProvisionError } from "../../src/core/errors/errors.js";
import { ErrorCode } from "../../src/core/errors/ErrorCode.js";
import { createLogger } from "../../src/core/logging/ContextualLogger.js";
import type { StepKind } from "../../src/core/manifest/ManifestSchema.js";
import type {
  PlannedAction,
  ProvisionStep,
  Requirement,
  StepContext,
  StepResult,
} from "../../src/core/pipeline/ProvisionStep.js";
import type { ProvisionConfig } from "../../src/core/config/ProvisionConfig.js";
import {
  FakeExecutor,
  MemorySink,
  RecordingStepLogger,
  cleanupTestDir,
  createTestDir,
  makeConfig,
} from "../helpers/fakes.js";

// =============================================================================
// Test Helpers
// =============================================================================

interface ScriptedStepOptions {
  kind?: StepKind;
  requires?: Requirement[];
  optional?: boolean;
  fail?: Error;
  status?: StepResult["status"];
  say?: string;
  debug?: string;
}

class ScriptedStep implements ProvisionStep {
  readonly kind: StepKind;
  readonly description: string;
  readonly requires: readonly Requirement[];
  readonly optional: boolean;
  executed = 0;
  previewed = 0;

  constructor(
    readonly name: string,
    private readonly options: ScriptedStepOptions = {},
  ) {
    this.kind = options.kind ?? "command";
    this.description = `${name} description`;
    this.requires = options.requires ?? [];
    this.optional = options.optional ?? false;
  }

  async execute(ctx: StepContext): Promise<StepResult> {
    this.executed++;
    if (this.options.say) {
      ctx.log.info(this.options.say);
      ctx.log.verbose(`verbose from ${this.name}`);
    }
    if (this.options.debug) {
      ctx.log.debug(this.options.debug);
    }
    if (this.options.fail) {
      throw this.options.fail;
    }
    return { status: this.options.status ?? "succeeded", actions: [{ type: "run", description: this.name }] };
  }

  async preview(_ctx: StepContext): Promise<readonly PlannedAction[]> {
    this.previewed++;
    return [{ type: "run", description: `would run ${this.name}` }];
  }
}

function tickingClock(step = 10): () => number {
  let now = 0;
  return () => {
    now += step;
    return now;
  };
}

function createRunner(config: ProvisionConfig, onStepStart?: (name: string, i: number, n: number) => void) {
  const log = new RecordingStepLogger();
  const sink = new MemorySink();
  const runner = new StepRunner({
    config,
    executor: new FakeExecutor(),
    log,
    logger: createLogger({ sink, minLevel: "debug" }),
    confirmRemoval: async () => true,
    onStepStart: (step, index, total) => onStepStart?.(step.name, index, total),
    clock: tickingClock(),
  });
  return { runner, log, sink };
}

// =============================================================================
// Tests
// =============================================================================

describe("StepRunner", () => {
  let testDir: string;
  let config: ProvisionConfig;

  beforeEach(async () => {
    testDir = await createTestDir("rigforge-runner-");
    config = makeConfig(testDir);
  });

  afterEach(async () => {
    await cleanupTestDir(testDir);
  });

  it("runs every step in order and reports success", async () => {
    const started: string[] = [];
    const { runner } = createRunner(config, (name, i, n) => started.push(`${i + 1}/${n} ${name}`));
    const steps = [new ScriptedStep("dnf5"), new ScriptedStep("packages", { kind: "packages", status: "skipped" })];

    const report = await runner.run(steps);

    expect(started).toEqual(["1/2 dnf5", "2/2 packages"]);
    expect(report.success).toBe(true);
    expect(report.dryRun).toBe(false);
    expect(report.failure).toBeUndefined();
    expect(report.outcomes.map((o) => [o.name, o.status, o.durationMs])).toEqual([
      ["dnf5", "succeeded", 10],
      ["packages", "skipped", 10],
    ]);
  });

  it("stops at the first failure and marks the rest not-run", async () => {
    const { runner, sink } = createRunner(config);
    const failing = new ProvisionError("Build command failed in /src/spectrwm: make", ErrorCode.BUILD_FAILED, {
      exitCode: 2,
    });
    const last = new ScriptedStep("dotfiles", { kind: "dotfiles" });
    const steps = [new ScriptedStep("sources"), new ScriptedStep("spectrwm", { kind: "build", fail: failing }), last];

    const report = await runner.run(steps);

    expect(report.success).toBe(false);
    expect(report.outcomes.map((o) => o.status)).toEqual(["succeeded", "failed", "not-run"]);
    expect(report.outcomes[1]?.error).toBe(failing);
    expect(report.failure).toEqual({
      step: "spectrwm",
      kind: "build",
      code: "BUILD_FAILED",
      message: "Build command failed in /src/spectrwm: make",
      details: { exitCode: 2 },
    });
    expect(last.executed).toBe(0);
    expect(sink.entries.find((e) => e.msg === "Run stopped")).toMatchObject({
      phase: "pipeline.run",
      step: "spectrwm",
      errorCode: "BUILD_FAILED",
    });
  });

  it("fails a step whose required directory is missing", async () => {
    const { runner } = createRunner(config);
    const missing = path.join(testDir, "src", "spectrwm");
    const build = new ScriptedStep("spectrwm", { requires: [{ path: missing, type: "directory" }] });

    const report = await runner.run([build]);

    expect(build.executed).toBe(0);
    expect(report.failure).toMatchObject({
      step: "spectrwm",
      kind: "missing-directory",
      code: "SOURCE_MISSING",
      message: `Directory not found: ${missing}`,
      details: { path: missing, expected: "directory", reason: "missing" },
    });
  });

  it("skips an optional step with a warning", async () => {
    const { runner, log } = createRunner(config);
    const missing = path.join(testDir, "src", "fonts");
    const fonts = new ScriptedStep("fonts", { optional: true, requires: [{ path: missing, type: "directory" }] });

    const report = await runner.run([fonts, new ScriptedStep("bin")]);

    expect(report.success).toBe(true);
    expect(report.outcomes[0]).toMatchObject({
      status: "skipped",
      actions: [{ type: "skip", description: `Directory not found: ${missing}` }],
      messages: [`Skipping fonts: Directory not found: ${missing}`],
    });
    expect(log.warnings).toEqual([`Skipping fonts: Directory not found: ${missing}`]);
    expect(report.outcomes[1]?.status).toBe("succeeded");
  });

  it("reports a file where a directory is required", async () => {
    const { runner } = createRunner(config);
    const file = path.join(testDir, "dzen2");
    await fs.writeFile(file, "", "utf-8");

    const report = await runner.run([new ScriptedStep("dzen2", { requires: [{ path: file, type: "directory" }] })]);

    expect(report.failure?.message).toBe(`${file} is not a directory`);
  });

  it("previews instead of executing in a dry run", async () => {
    const { runner } = createRunner({ ...config, dryRun: true });
    const step = new ScriptedStep("starship");

    const report = await runner.run([step]);

    expect(step.executed).toBe(0);
    expect(step.previewed).toBe(1);
    expect(report.dryRun).toBe(true);
    expect(report.outcomes[0]).toMatchObject({
      status: "planned",
      actions: [{ type: "run", description: "would run starship" }],
    });
  });

  it("plans a step whose directory an earlier step would create", async () => {
    const { runner, log } = createRunner({ ...config, dryRun: true });
    const missing = path.join(testDir, "src", "spectrwm");
    const build = new ScriptedStep("spectrwm", { requires: [{ path: missing, type: "directory" }] });

    const report = await runner.run([build]);

    expect(report.success).toBe(true);
    expect(report.outcomes[0]).toMatchObject({
      status: "planned",
      actions: [
        { type: "require", description: `Directory not found: ${missing}` },
        { type: "run", description: "would run spectrwm" },
      ],
    });
    expect(log.warnings).toEqual([`spectrwm: Directory not found: ${missing} (must exist when the step runs)`]);
  });

  it("plans an optional step whose directory is missing instead of skipping it", async () => {
    const { runner, log } = createRunner({ ...config, dryRun: true });
    const missing = path.join(testDir, "src", "wallpaper");
    const wallpapers = new ScriptedStep("wallpapers", {
      optional: true,
      requires: [{ path: missing, type: "directory" }],
    });

    const report = await runner.run([wallpapers]);

    expect(wallpapers.previewed).toBe(1);
    expect(report.outcomes[0]).toMatchObject({
      status: "planned",
      actions: [
        { type: "require", description: `Directory not found: ${missing} (skipped if still missing)` },
        { type: "run", description: "would run wallpapers" },
      ],
    });
    expect(log.warnings).toEqual([`wallpapers: Directory not found: ${missing} (skipped if still missing)`]);
  });

  it("wraps unexpected errors as internal failures", async () => {
    const { runner } = createRunner(config);

    const report = await runner.run([new ScriptedStep("odd", { fail: new TypeError("undefined is not a function") })]);

    expect(report.failure).toMatchObject({
      kind: "internal",
      code: "INTERNAL_ERROR",
      message: "undefined is not a function",
    });
  });

  it("records info and warning messages per step, not verbose output", async () => {
    const { runner, log } = createRunner(config);

    const report = await runner.run([new ScriptedStep("sources", { say: "Cloned bin" })]);

    expect(report.outcomes[0]?.messages).toEqual(["Cloned bin"]);
    expect(log.infos).toEqual(["Cloned bin"]);
    expect(log.verboses).toEqual(["verbose from sources"]);
  });

  it("passes debug output through without recording it", async () => {
    const { runner, log } = createRunner(config);
    const report = await runner.run([new ScriptedStep("sources", { debug: "cwd=/src privileged=false" })]);

    expect(log.debugs).toEqual(["cwd=/src privileged=false"]);
    expect(report.outcomes[0]?.messages).toEqual([]);
  });
});
