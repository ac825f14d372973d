/**
 * Template rendering for manifest values.
 *
 * Uses Handlebars in strict mode: referencing a variable that does not
 * exist is an error, not an empty string. Output is never HTML-escaped,
 * since values end up in paths and shell commands. `\{{` renders a literal
 * `{{`.
 *
 * @module
 */

import Handlebars from "handlebars";
import { ProvisionError } from "../errors/errors.js";
import { ErrorCode } from "../errors/ErrorCode.js";

export type TemplateVariables = Record<string, string>;

/**
 * Renders one string value.
 *
 * @param at - Field path of the value, for error messages
 * @throws ProvisionError MANIFEST_TEMPLATE_FAILED on unknown variables or bad syntax
 */
export function renderString(
  template: string,
  variables: TemplateVariables,
  at: readonly string[],
  manifestPath: string,
): string {
  if (!template.includes("{{")) {
    return template;
  }

  try {
    const compiled = Handlebars.compile(template, { strict: true, noEscape: true });
    return compiled(variables);
  } catch (error) {
    const cause = error instanceof Error ? error : new Error(String(error));
    const field = at.length > 0 ? at.join(".") : "(root)";
    throw new ProvisionError(
      `Cannot render manifest value at ${field}`,
      ErrorCode.MANIFEST_TEMPLATE_FAILED,
      { manifestPath, field, template, reason: cause.message },
      `Available variables: ${Object.keys(variables).sort().join(", ")}. ` +
        `Declare custom ones under "variables:".`,
      cause,
    );
  }
}

/**
 * Renders every string inside a parsed YAML value, keeping its shape.
 */
export function renderTemplates(
  value: unknown,
  variables: TemplateVariables,
  at: readonly string[],
  manifestPath: string,
): unknown {
  if (typeof value === "string") {
    return renderString(value, variables, at, manifestPath);
  }
  if (Array.isArray(value)) {
    return value.map((item, index) => renderTemplates(item, variables, [...at, String(index)], manifestPath));
  }
  if (typeof value === "object" && value !== null) {
    return Object.fromEntries(
      Object.entries(value).map(([key, item]) => [key, renderTemplates(item, variables, [...at, key], manifestPath)]),
    );
  }
  return value;
}
