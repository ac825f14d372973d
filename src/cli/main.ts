#!/usr/bin/env node
import { Command } from "commander";
import { buildDoctorCommand } from "./commands/doctor.js";
import { buildDeployCommand, buildPlanCommand, buildRunCommand } from "./commands/run.js";
import { ErrorPresenter } from "./errors/ErrorPresenter.js";
import { GlobalOptionsSchema } from "./runtime.js";
import { createCliUx, parseLogLevel, setDefaultCliUx } from "./ux/CliUx.js";
import { CLI_VERSION } from "./version.js";

async function main(): Promise<void> {
  const program = new Command()
    .name("rigforge")
    .description("Provision a Linux desktop from a declarative manifest")
    .version(CLI_VERSION)
    .option("--verbose", "Show command output and additional details", false)
    .option("--debug", "Show all output including debug traces", false)
    .option("--silent", "Suppress all output except errors", false)
    .option("--log-file <path>", "Append structured JSON log entries to this file");

  // Set up CliUx before any command runs
  program.hook("preAction", (thisCommand) => {
    const globals = GlobalOptionsSchema.parse(thisCommand.opts());
    setDefaultCliUx(createCliUx({ level: parseLogLevel(globals) }));
  });

  program.addCommand(buildRunCommand());
  program.addCommand(buildPlanCommand());
  program.addCommand(buildDeployCommand());
  program.addCommand(buildDoctorCommand());

  try {
    await program.parseAsync(process.argv);
  } catch (err) {
    const { debug } = GlobalOptionsSchema.parse(program.opts());
    const presenter = new ErrorPresenter({ debug, output: (line) => process.stderr.write(line + "\n") });
    process.exitCode = presenter.present(err);
  }
}

void main();
