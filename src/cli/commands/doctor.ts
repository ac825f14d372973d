/**
 * `doctor`: environment diagnostics.
 *
 * @module
 */

import { Command } from "commander";
import { z } from "zod";
import { createDefaultDoctorDependencies, formatDoctorReport, handleDoctor } from "../handlers/doctorHandler.js";
import { createRuntime } from "../runtime.js";

const DoctorOptionsSchema = z.object({
  manifest: z.string().optional(),
  sudo: z.string().optional(),
});

export function buildDoctorCommand(): Command {
  return new Command("doctor")
    .description("Check that this machine can run a manifest")
    .option("-m, --manifest <file>", "Manifest file to validate")
    .option("--sudo <cmd>", "Privilege command to check for")
    .action(async (rawOptions: unknown, self: Command) => {
      const options = DoctorOptionsSchema.parse(rawOptions);
      const runtime = createRuntime(self.optsWithGlobals(), "doctor");

      const result = await handleDoctor(options, createDefaultDoctorDependencies());
      runtime.logger.info("Doctor finished", {
        hasErrors: result.hasErrors,
        failed: result.checks.filter((c) => c.status === "ERROR").map((c) => c.name),
      });

      // The report is the command's output, so it prints even with --silent
      for (const line of formatDoctorReport(result)) {
        process.stdout.write(line + "\n");
      }

      if (result.hasErrors) {
        process.exitCode = 1;
      }
    });
}
