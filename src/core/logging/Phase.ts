/**
 * Run phase identifiers for structured logging.
 *
 * Phases are the fixed stages of a rigforge run. Individual provisioning
 * steps are named by the manifest and logged under `pipeline.run`.
 *
 * @module
 */

/**
 * All run phase names.
 *
 * Phases follow a dotted naming convention: `<domain>.<action>`
 */
export const Phase = {
  /** CLI initialization */
  CLI_INIT: "cli.init",

  /** Resolving the run configuration */
  CONFIG_RESOLVE: "config.resolve",

  /** Loading, validating and rendering the manifest */
  MANIFEST_LOAD: "manifest.load",

  /** Turning manifest steps into runnable steps */
  PIPELINE_BUILD: "pipeline.build",

  /** Running the steps */
  PIPELINE_RUN: "pipeline.run",

  /** Computing the removal plan for dotfiles targets */
  DEPLOY_PLAN: "deploy.plan",

  /** Removing conflicting targets */
  DEPLOY_REMOVE: "deploy.remove",

  /** Copying the dotfiles tree into its deploy directory */
  DEPLOY_COPY: "deploy.copy",

  /** Linking deployed entries into place */
  DEPLOY_LINK: "deploy.link",

  /** Run complete */
  DONE: "done",
} as const;

export type Phase = (typeof Phase)[keyof typeof Phase];
