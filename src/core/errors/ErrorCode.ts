/**
 * Standardized error codes for rigforge.
 *
 * Error codes are stable public API contracts. They should be:
 * - SCREAMING_SNAKE_CASE
 * - Grouped by domain
 * - Mapped to exactly one exit code and one failure kind
 *
 * @module
 */

// =============================================================================
// Error Code Enum
// =============================================================================

/**
 * All official rigforge error codes.
 *
 * Codes are grouped by domain:
 * - MANIFEST_* : Manifest lookup, parsing, validation and rendering
 * - CONFIG_* : Run configuration
 * - PACKAGE_* : Package manager invocations
 * - GIT_* : Repository clones
 * - BUILD_* : Compile and install commands
 * - COMMAND_* : Free-form shell commands
 * - SOURCE_* : Step preconditions
 * - COPY_* / DEPLOY_* : Asset copies and dotfiles deployment
 * - INTERNAL_* : Internal errors
 */
export const ErrorCode = {
  // Manifest errors (20-29)
  MANIFEST_NOT_FOUND: "MANIFEST_NOT_FOUND",
  MANIFEST_READ_FAILED: "MANIFEST_READ_FAILED",
  MANIFEST_PARSE_FAILED: "MANIFEST_PARSE_FAILED",
  MANIFEST_INVALID: "MANIFEST_INVALID",
  MANIFEST_TEMPLATE_FAILED: "MANIFEST_TEMPLATE_FAILED",

  // Configuration errors (20-29, same category)
  CONFIG_HOME_MISSING: "CONFIG_HOME_MISSING",

  // Package errors (30-39)
  PACKAGE_INSTALL_FAILED: "PACKAGE_INSTALL_FAILED",

  // Git errors (40-49)
  GIT_CLONE_FAILED: "GIT_CLONE_FAILED",

  // Build and command errors (50-59)
  BUILD_FAILED: "BUILD_FAILED",
  COMMAND_FAILED: "COMMAND_FAILED",

  // Precondition errors (60-69)
  SOURCE_MISSING: "SOURCE_MISSING",

  // Copy and deployment errors (70-79)
  COPY_FAILED: "COPY_FAILED",
  DEPLOY_REMOVE_FAILED: "DEPLOY_REMOVE_FAILED",
  DEPLOY_LINK_FAILED: "DEPLOY_LINK_FAILED",
  DEPLOY_LINK_CONFLICT: "DEPLOY_LINK_CONFLICT",
  DEPLOY_INVALID_ENTRY: "DEPLOY_INVALID_ENTRY",
  DEPLOY_CANCELLED: "DEPLOY_CANCELLED",

  // Internal errors (1)
  INTERNAL_ERROR: "INTERNAL_ERROR",
} as const;

export type ErrorCode = (typeof ErrorCode)[keyof typeof ErrorCode];

// =============================================================================
// Failure Kinds
// =============================================================================

/**
 * What a failed step was doing when it failed.
 *
 * Every kind aborts the run the same way; the kind only changes how the
 * failure is reported and which exit code the process ends with.
 */
export type FailureKind =
  | "package"
  | "network"
  | "build"
  | "missing-directory"
  | "deploy"
  | "command"
  | "internal";

/**
 * Gets the failure kind implied by an error code.
 */
export function getFailureKind(code: ErrorCode): FailureKind {
  if (code.startsWith("PACKAGE_")) return "package";
  if (code.startsWith("GIT_")) return "network";
  if (code.startsWith("BUILD_")) return "build";
  if (code.startsWith("COMMAND_")) return "command";
  if (code.startsWith("SOURCE_")) return "missing-directory";
  if (code.startsWith("COPY_") || code.startsWith("DEPLOY_")) return "deploy";
  return "internal";
}

// =============================================================================
// Exit Codes
// =============================================================================

/**
 * Exit code ranges by category:
 * - 1: Internal/generic error
 * - 20-29: Manifest/configuration errors
 * - 30-39: Package errors
 * - 40-49: Git errors
 * - 50-59: Build/command errors
 * - 60-69: Precondition errors
 * - 70-79: Copy/deployment errors
 */
const EXIT_CODE_MAP: Record<ErrorCode, number> = {
  [ErrorCode.MANIFEST_NOT_FOUND]: 20,
  [ErrorCode.MANIFEST_READ_FAILED]: 21,
  [ErrorCode.MANIFEST_PARSE_FAILED]: 22,
  [ErrorCode.MANIFEST_INVALID]: 23,
  [ErrorCode.MANIFEST_TEMPLATE_FAILED]: 24,
  [ErrorCode.CONFIG_HOME_MISSING]: 25,

  [ErrorCode.PACKAGE_INSTALL_FAILED]: 30,

  [ErrorCode.GIT_CLONE_FAILED]: 40,

  [ErrorCode.BUILD_FAILED]: 50,
  [ErrorCode.COMMAND_FAILED]: 51,

  [ErrorCode.SOURCE_MISSING]: 60,

  [ErrorCode.COPY_FAILED]: 70,
  [ErrorCode.DEPLOY_REMOVE_FAILED]: 71,
  [ErrorCode.DEPLOY_LINK_FAILED]: 72,
  [ErrorCode.DEPLOY_LINK_CONFLICT]: 73,
  [ErrorCode.DEPLOY_INVALID_ENTRY]: 74,
  [ErrorCode.DEPLOY_CANCELLED]: 75,

  [ErrorCode.INTERNAL_ERROR]: 1,
};

/**
 * Gets the exit code for an error code.
 */
export function getExitCode(code: ErrorCode): number {
  return EXIT_CODE_MAP[code] ?? 1;
}
