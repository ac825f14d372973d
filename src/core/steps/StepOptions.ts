import type { Requirement } from "../pipeline/ProvisionStep.js";

/**
 * Fields every step is constructed with, paths already absolute.
 */
export interface StepOptions {
  readonly name: string;
  readonly description: string;
  /** Manifest-declared requirements; each step adds its implicit ones */
  readonly requires: readonly Requirement[];
  readonly optional: boolean;
}
