/**
 * Run Report Printer.
 *
 * Formats a {@link RunReport}: the full step-by-step plan for a dry run,
 * a one-line summary otherwise.
 *
 * ## Dry-run Format
 *
 * ```
 * Dry-run plan (nothing changed)
 * Manifest: /work/rigforge.yaml
 *
 * [1/2] base-packages: Install 2 packages
 *   = already installed: git
 *   $ sudo sh -c 'dnf5 install -y '\''make'\'''
 *
 * [2/2] dotfiles: Deploy dotfiles from /work/dotfiles
 *   - /home/ana/.bashrc (file)
 *   ~ /home/ana/.bashrc -> dotfiles/bashrc
 *
 * Summary: 2 planned
 * Hint: Rerun without --dry-run to apply.
 * ```
 *
 * @module
 */

import type { PlannedAction } from "../../core/pipeline/ProvisionStep.js";
import type { RunReport, StepOutcome, StepStatus } from "../../core/pipeline/StepRunner.js";

// =============================================================================
// Types
// =============================================================================

export interface RunReportPrinterOptions {
  /** Custom output function (default: console.log) */
  readonly output?: (line: string) => void;
}

export interface RunReportMeta {
  readonly manifestPath: string;
}

// =============================================================================
// Symbols
// =============================================================================

const SYMBOLS: Record<PlannedAction["type"], string> = {
  run: "$",
  install: "+",
  clone: "+",
  copy: "+",
  create: "+",
  remove: "-",
  link: "~",
  skip: "=",
  require: "?",
};

const SUMMARY_ORDER: ReadonlyArray<{ status: StepStatus; label: string }> = [
  { status: "succeeded", label: "succeeded" },
  { status: "planned", label: "planned" },
  { status: "skipped", label: "skipped" },
  { status: "failed", label: "failed" },
  { status: "not-run", label: "not run" },
];

// =============================================================================
// RunReportPrinter Class
// =============================================================================

export class RunReportPrinter {
  private readonly output: (line: string) => void;

  constructor(options: RunReportPrinterOptions = {}) {
    this.output = options.output ?? console.log.bind(console);
  }

  print(report: RunReport, meta: RunReportMeta): void {
    for (const line of this.format(report, meta)) {
      this.output(line);
    }
  }

  format(report: RunReport, meta: RunReportMeta): string[] {
    const lines: string[] = [];

    if (report.dryRun) {
      lines.push("Dry-run plan (nothing changed)");
      lines.push(`Manifest: ${meta.manifestPath}`);
      lines.push("");

      report.outcomes.forEach((outcome, index) => {
        lines.push(...formatStep(outcome, index, report.outcomes.length));
        lines.push("");
      });
    }

    lines.push(`Summary: ${summarize(report.outcomes)}`);

    if (report.failure) {
      lines.push(`Failed step: ${report.failure.step} (${report.failure.kind})`);
    } else if (report.dryRun) {
      lines.push("Hint: Rerun without --dry-run to apply.");
    }

    return lines;
  }
}

// =============================================================================
// Helpers
// =============================================================================

function formatStep(outcome: StepOutcome, index: number, total: number): string[] {
  const status = outcome.status === "planned" ? "" : ` [${outcome.status}]`;
  const lines = [`[${index + 1}/${total}] ${outcome.name}: ${outcome.description}${status}`];

  for (const action of outcome.actions) {
    lines.push(`  ${SYMBOLS[action.type]} ${action.description}`);
  }
  if (outcome.error) {
    lines.push(`  ! ${outcome.error.message}`);
  }
  return lines;
}

/**
 * "3 succeeded, 1 skipped"; "no steps" for an empty run.
 */
export function summarize(outcomes: readonly StepOutcome[]): string {
  const parts = SUMMARY_ORDER.map(({ status, label }) => {
    const count = outcomes.filter((o) => o.status === status).length;
    return count > 0 ? `${count} ${label}` : null;
  }).filter((part): part is string => part !== null);

  return parts.length > 0 ? parts.join(", ") : "no steps";
}
