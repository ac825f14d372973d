/**
 * Zod schemas for the provisioning manifest (`rigforge.yaml`).
 *
 * A manifest names the machine setup and lists its steps in the order they
 * must run:
 *
 * ```yaml
 * name: fedora-spectrwm
 * packageManager:
 *   install: dnf5 install -y
 *   query: rpm -q
 * steps:
 *   - kind: packages
 *     name: base-packages
 *     packages: [git, make, stow]
 *   - kind: clone
 *     name: sources
 *     repos:
 *       - url: https://github.com/conformal/spectrwm.git
 *         dir: spectrwm
 *   - kind: build
 *     name: spectrwm
 *     dir: spectrwm/linux
 *     commands:
 *       - make
 *       - run: make install
 *         privileged: true
 *   - kind: dotfiles
 *     name: dotfiles
 *     source: dotfiles
 * ```
 *
 * Every string is a Handlebars template (`{{home}}`, `{{configDir}}`,
 * `{{sourceRoot}}` and the manifest's own `variables`). A literal `{{`,
 * such as a `docker ps --format '{{.Names}}'` argument, is written `\{{`;
 * inside a double-quoted YAML string that is `\\{{`.
 *
 * @module
 */

import { z } from "zod";

// =============================================================================
// Shared Field Schemas
// =============================================================================

/**
 * Non-empty string schema (trims and validates non-empty).
 */
const nonEmptyString = (fieldName: string) =>
  z
    .string()
    .transform((s) => s.trim())
    .refine((s) => s.length > 0, { message: `${fieldName} cannot be empty` });

/**
 * A shell command: either a bare string or `{ run, privileged }`.
 */
const CommandSchema = z
  .union([
    nonEmptyString("Command"),
    z.object({
      run: nonEmptyString("Command run"),
      privileged: z.boolean().default(false),
    }),
  ])
  .transform((cmd) => (typeof cmd === "string" ? { run: cmd, privileged: false } : cmd));

/**
 * How packages are installed and, optionally, queried.
 *
 * `query` is run once per package before installing; exit code 0 means the
 * package is already present and is dropped from the install.
 */
export const PackageManagerSchema = z.object({
  install: nonEmptyString("packageManager.install"),
  query: nonEmptyString("packageManager.query").optional(),
  privileged: z.boolean().default(true),
});

/**
 * Failure kinds a command step may declare.
 */
const CommandFailureKindSchema = z.enum(["command", "network", "package", "build", "deploy"]);

/**
 * A path a step needs: a bare string means a directory.
 */
const RequirementSchema = z
  .union([
    nonEmptyString("Required path"),
    z.object({
      path: nonEmptyString("Required path"),
      type: z.enum(["directory", "file"]).default("directory"),
    }),
  ])
  .transform((req) => (typeof req === "string" ? { path: req, type: "directory" as const } : req));

/**
 * Fields shared by every step.
 */
const StepBaseSchema = z.object({
  /** Unique step name, used in logs, reports and errors */
  name: nonEmptyString("Step name"),

  description: z.string().optional(),

  /**
   * Extra paths (relative to the source root) that must exist before the
   * step runs. Each kind adds its own implicit requirements on top.
   */
  requires: z.array(RequirementSchema).default([]),

  /** Skip the step with a warning, instead of failing, when a required path is missing */
  optional: z.boolean().default(false),
});

// =============================================================================
// Step Schemas
// =============================================================================

const PackagesStepSchema = StepBaseSchema.extend({
  kind: z.literal("packages"),
  packages: z.array(nonEmptyString("Package name")).min(1, "At least one package is required"),
  /** Overrides the manifest-level package manager for this step */
  manager: PackageManagerSchema.optional(),
});

const RepoSchema = z.object({
  url: nonEmptyString("Repository url"),
  dir: nonEmptyString("Repository dir"),
  /** Branch or tag to clone */
  ref: nonEmptyString("Repository ref").optional(),
  depth: z.number().int().positive().optional(),
});

const CloneStepSchema = StepBaseSchema.extend({
  kind: z.literal("clone"),
  repos: z.array(RepoSchema).min(1, "At least one repository is required"),
});

const BuildStepSchema = StepBaseSchema.extend({
  kind: z.literal("build"),
  dir: nonEmptyString("Build dir"),
  commands: z.array(CommandSchema).min(1, "At least one build command is required"),
});

const CopyStepSchema = StepBaseSchema.extend({
  kind: z.literal("copy"),
  from: nonEmptyString("Copy from"),
  to: nonEmptyString("Copy to"),
  /** Commands run after the copy, e.g. `fc-cache -fv` */
  after: z.array(CommandSchema).default([]),
});

const TouchStepSchema = StepBaseSchema.extend({
  kind: z.literal("touch"),
  path: nonEmptyString("Touch path"),
});

const CommandStepSchema = StepBaseSchema.extend({
  kind: z.literal("command"),
  run: nonEmptyString("Command run"),
  privileged: z.boolean().default(false),
  cwd: nonEmptyString("Command cwd").optional(),
  failureKind: CommandFailureKindSchema.default("command"),
});

const DotfilesStepSchema = StepBaseSchema.extend({
  kind: z.literal("dotfiles"),
  source: nonEmptyString("Dotfiles source"),
  /** Where the tree is copied before linking (default: `<home>/dotfiles`) */
  deployDir: nonEmptyString("Dotfiles deployDir").optional(),
  /** Entry names never deployed */
  ignore: z.array(nonEmptyString("Ignored entry")).default([]),
});

export const StepSchema = z.discriminatedUnion("kind", [
  PackagesStepSchema,
  CloneStepSchema,
  BuildStepSchema,
  CopyStepSchema,
  TouchStepSchema,
  CommandStepSchema,
  DotfilesStepSchema,
]);

/**
 * User-defined template variables.
 */
export const VariablesSchema = z.record(z.string()).default({});

/**
 * Schema for the full manifest file.
 */
export const ManifestSchema = z
  .object({
    name: nonEmptyString("Manifest name"),
    description: z.string().optional(),
    variables: VariablesSchema,
    packageManager: PackageManagerSchema.optional(),
    steps: z.array(StepSchema).min(1, "At least one step is required"),
  })
  .superRefine((data, ctx) => {
    const seen = new Set<string>();
    data.steps.forEach((step, index) => {
      if (seen.has(step.name)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `Duplicate step name "${step.name}"`,
          path: ["steps", index, "name"],
        });
      }
      seen.add(step.name);
    });
  })
  .transform((data, ctx) => ({
    ...data,
    // Each packages step carries its effective manager from here on
    steps: data.steps.map((step, index) => {
      if (step.kind !== "packages") return step;
      const manager = step.manager ?? data.packageManager;
      if (!manager) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: "packages steps need a manager here or a top-level packageManager",
          path: ["steps", index, "manager"],
        });
        return z.NEVER;
      }
      return { ...step, manager };
    }),
  }));

// =============================================================================
// Types (derived from Zod schemas)
// =============================================================================

export type ShellCommand = z.infer<typeof CommandSchema>;
export type PackageManager = z.infer<typeof PackageManagerSchema>;
export type RepoSpec = z.infer<typeof RepoSchema>;
export type RequirementSpec = z.infer<typeof RequirementSchema>;

export type PackagesStepSpec = z.infer<typeof PackagesStepSchema>;
export type CloneStepSpec = z.infer<typeof CloneStepSchema>;
export type BuildStepSpec = z.infer<typeof BuildStepSchema>;
export type CopyStepSpec = z.infer<typeof CopyStepSchema>;
export type TouchStepSpec = z.infer<typeof TouchStepSchema>;
export type CommandStepSpec = z.infer<typeof CommandStepSchema>;
export type DotfilesStepSpec = z.infer<typeof DotfilesStepSchema>;

/** Union of all step specs, discriminated on `kind` */
export type StepSpec = z.infer<typeof StepSchema>;

export type StepKind = StepSpec["kind"];

export type ManifestData = z.infer<typeof ManifestSchema>;

/** A step as validated, with its effective package manager filled in */
export type ResolvedStepSpec = ManifestData["steps"][number];
