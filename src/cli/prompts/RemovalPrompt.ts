/**
 * Confirmation gate before conflicting dotfiles targets are removed.
 *
 * Lists what would be removed, then asks once with @clack/prompts.
 * Without a terminal to ask on, the answer is no: removal then needs
 * `--yes`.
 *
 * @module
 */

import * as clack from "@clack/prompts";
import type { RemovalPlan } from "../../core/deploy/RemovalPlanner.js";
import { describeRemovals } from "../../core/deploy/RemovalPlanner.js";
import type { RemovalConfirmer } from "../../core/pipeline/ProvisionStep.js";
import type { CliUx } from "../ux/CliUx.js";

export interface RemovalPromptOptions {
  readonly ux: CliUx;

  /** Whether stdin and stdout are a terminal */
  readonly interactive: boolean;

  /** Shortens paths under this directory to `~/...` */
  readonly homeDir?: string;

  /**
   * Prompt override for tests. Resolves to the answer, or a symbol when
   * the prompt was cancelled.
   */
  readonly ask?: (message: string) => Promise<boolean | symbol>;
}

export function createRemovalConfirmer(options: RemovalPromptOptions): RemovalConfirmer {
  const ask = options.ask ?? ((message: string) => clack.confirm({ message, initialValue: false }));

  return async (plan: RemovalPlan): Promise<boolean> => {
    const { ux } = options;
    const lines = describeRemovals(plan, options.homeDir);

    ux.warn(`${lines.length} existing target${lines.length === 1 ? "" : "s"} will be removed:`);
    for (const line of lines) {
      ux.listItem(line);
    }

    if (!options.interactive) {
      ux.warn("Not running in a terminal; pass --yes to remove them.");
      return false;
    }

    const answer = await ask("Remove these and continue?");
    if (clack.isCancel(answer)) {
      return false;
    }
    return answer === true;
  };
}
