import { describe, it, expect } from "vitest";
import { RunReportPrinter, summarize } from "../../src/cli/printers/RunReportPrinter.js";
import type { RunReport, StepOutcome, StepStatus } from "../../src/core/pipeline/StepRunner.js";
import type { PlannedAction } from "../../src/core/pipeline/ProvisionStep.js";
import { ProvisionError } from "../../src/core/errors/errors.js";
import { ErrorCode } from "../../src/core/errors/ErrorCode.js";

function stepOutcome(
  name: string,
  status: StepStatus,
  actions: PlannedAction[] = [],
  error?: ProvisionError,
): StepOutcome {
  return {
    name,
    kind: "command",
    description: `${name} description`,
    status,
    durationMs: 5,
    actions,
    messages: [],
    error,
  };
}

describe("summarize", () => {
  it("counts statuses in a fixed order", () => {
    expect(
      summarize([
        stepOutcome("a", "not-run"),
        stepOutcome("b", "skipped"),
        stepOutcome("c", "succeeded"),
        stepOutcome("d", "succeeded"),
        stepOutcome("e", "failed"),
      ]),
    ).toBe("2 succeeded, 1 skipped, 1 failed, 1 not run");
  });

  it("handles an empty run", () => {
    expect(summarize([])).toBe("no steps");
  });
});

describe("RunReportPrinter", () => {
  it("prints the full plan for a dry run", () => {
    const report: RunReport = {
      success: true,
      dryRun: true,
      outcomes: [
        stepOutcome("base", "planned", [
          { type: "skip", description: "already installed: git" },
          { type: "run", description: "sudo sh -c 'dnf5 install -y stow'" },
        ]),
        stepOutcome("fonts", "skipped", [{ type: "skip", description: "Directory not found: /src/fonts" }]),
        stepOutcome("dotfiles", "planned", [
          { type: "remove", description: "/home/ana/.bashrc (file)" },
          { type: "link", description: "/home/ana/.bashrc -> dotfiles/bashrc" },
        ]),
      ],
    };

    const lines: string[] = [];
    new RunReportPrinter({ output: (line) => lines.push(line) }).print(report, {
      manifestPath: "/work/rigforge.yaml",
    });

    expect(lines).toEqual([
      "Dry-run plan (nothing changed)",
      "Manifest: /work/rigforge.yaml",
      "",
      "[1/3] base: base description",
      "  = already installed: git",
      "  $ sudo sh -c 'dnf5 install -y stow'",
      "",
      "[2/3] fonts: fonts description [skipped]",
      "  = Directory not found: /src/fonts",
      "",
      "[3/3] dotfiles: dotfiles description",
      "  - /home/ana/.bashrc (file)",
      "  ~ /home/ana/.bashrc -> dotfiles/bashrc",
      "",
      "Summary: 2 planned, 1 skipped",
      "Hint: Rerun without --dry-run to apply.",
    ]);
  });

  it("prints only the summary and failed step for a real run", () => {
    const error = new ProvisionError("Failed to clone https://example.test/x.git", ErrorCode.GIT_CLONE_FAILED);
    const report: RunReport = {
      success: false,
      dryRun: false,
      outcomes: [stepOutcome("base", "succeeded"), stepOutcome("sources", "failed", [], error)],
      failure: {
        step: "sources",
        kind: "network",
        code: "GIT_CLONE_FAILED",
        message: error.message,
      },
    };

    const lines = new RunReportPrinter().format(report, { manifestPath: "/work/rigforge.yaml" });

    expect(lines).toEqual(["Summary: 1 succeeded, 1 failed", "Failed step: sources (network)"]);
  });
});
