/**
 * `run`, `plan` and `deploy`: the commands that execute a manifest.
 *
 * @module
 */

import { Command } from "commander";
import { z } from "zod";
import { ExecaCommandExecutor } from "../../core/exec/CommandExecutor.js";
import type { StepKind } from "../../core/manifest/ManifestSchema.js";
import { assertRunSucceeded, handleRun, type RunDependencies } from "../handlers/runHandler.js";
import { RunReportPrinter } from "../printers/RunReportPrinter.js";
import { createRemovalConfirmer } from "../prompts/RemovalPrompt.js";
import { createRuntime, type CliRuntime } from "../runtime.js";

const RunOptionsSchema = z.object({
  manifest: z.string().optional(),
  sourceRoot: z.string().optional(),
  home: z.string().optional(),
  configDir: z.string().optional(),
  sudo: z.string().optional(),
  dryRun: z.boolean().default(false),
  yes: z.boolean().default(false),
});

type RunOptions = z.infer<typeof RunOptionsSchema>;

interface RunVariant {
  readonly name: string;
  readonly description: string;
  /** Always preview, never execute */
  readonly planOnly: boolean;
  readonly kinds?: readonly StepKind[];
}

const VARIANTS: Record<"run" | "plan" | "deploy", RunVariant> = {
  run: { name: "run", description: "Provision this machine from the manifest", planOnly: false },
  plan: { name: "plan", description: "Print what run would do, without changing anything", planOnly: true },
  deploy: {
    name: "deploy",
    description: "Only deploy the dotfiles steps of the manifest",
    planOnly: false,
    kinds: ["dotfiles"],
  },
};

export function buildRunCommand(): Command {
  return buildVariant(VARIANTS.run);
}

export function buildPlanCommand(): Command {
  return buildVariant(VARIANTS.plan);
}

export function buildDeployCommand(): Command {
  return buildVariant(VARIANTS.deploy);
}

function buildVariant(variant: RunVariant): Command {
  const command = new Command(variant.name)
    .description(variant.description)
    .option("-m, --manifest <file>", "Manifest file (default: ./rigforge.yaml, then the user config dir)")
    .option("--source-root <dir>", "Directory relative manifest paths resolve against (default: the manifest's)")
    .option("--home <dir>", "Home directory to deploy into (default: $HOME)")
    .option("--config-dir <dir>", "Config directory .config entries go into (default: $XDG_CONFIG_HOME, or <home>/.config)")
    .option("--sudo <cmd>", 'Privilege command for privileged steps ("" runs them directly)');

  if (!variant.planOnly) {
    command
      .option("-n, --dry-run", "Print the plan instead of running it", false)
      .option("-y, --yes", "Remove conflicting dotfiles targets without asking", false);
  }

  return command.action(async (rawOptions: unknown, self: Command) => {
    const options = RunOptionsSchema.parse(rawOptions);
    const runtime = createRuntime(self.optsWithGlobals(), variant.name);
    await executeVariant(variant, options, runtime);
  });
}

async function executeVariant(variant: RunVariant, options: RunOptions, runtime: CliRuntime): Promise<void> {
  const { ux } = runtime;
  const dryRun = variant.planOnly || options.dryRun;

  const { report, manifest } = await handleRun(
    {
      manifest: options.manifest,
      sourceRoot: options.sourceRoot,
      home: options.home,
      configDir: options.configDir,
      sudo: options.sudo,
      dryRun,
      yes: options.yes,
      kinds: variant.kinds,
    },
    createRunDependencies(runtime),
  );

  ux.newline();
  new RunReportPrinter({ output: (line) => ux.print(line) }).print(report, {
    manifestPath: manifest.manifestPath,
  });

  assertRunSucceeded(report);

  if (!dryRun) {
    ux.success(`${manifest.name} provisioned`);
  }
}

function createRunDependencies(runtime: CliRuntime): RunDependencies {
  const { ux } = runtime;
  return {
    env: process.env,
    cwd: process.cwd(),
    uid: process.getuid?.(),
    log: ux,
    logger: runtime.logger,
    createExecutor: (config) =>
      new ExecaCommandExecutor({ privilegeCommand: config.privilegeCommand, output: ux.commandOutput() }),
    createConfirmer: (config) =>
      createRemovalConfirmer({
        ux,
        interactive: Boolean(process.stdin.isTTY && process.stdout.isTTY),
        homeDir: config.homeDir,
      }),
    onStepStart: (name, description, index, total) => ux.step(index + 1, total, `${name}: ${description}`),
  };
}
