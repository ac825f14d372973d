/**
 * Manifest Loader for rigforge.
 *
 * Loads, renders and validates provisioning manifests from disk.
 *
 * ## Manifest Resolution
 *
 * The CLI hands the loader an ordered list of candidate paths (see
 * `manifestSearchPaths`); the first one that exists is used. If none
 * exists, an actionable error lists every location that was tried.
 *
 * ## Rendering
 *
 * Every string value may reference template variables:
 *
 * - `{{home}}`: the home directory
 * - `{{configDir}}`: the XDG config directory
 * - `{{sourceRoot}}`: the directory relative paths resolve against
 * - anything declared under `variables:` (which may itself use the above)
 *
 * Rendering happens before schema validation, so zod sees final values.
 *
 * @module
 */

import * as fs from "node:fs/promises";
import * as path from "node:path";
import { parse as parseYaml, YAMLParseError } from "yaml";
import { ProvisionError } from "../errors/errors.js";
import { ErrorCode } from "../errors/ErrorCode.js";
import { ManifestSchema, VariablesSchema, type ManifestData } from "./ManifestSchema.js";
import { renderString, renderTemplates, type TemplateVariables } from "./ManifestRenderer.js";

// =============================================================================
// Types
// =============================================================================

/**
 * Full manifest with loader metadata.
 */
export interface ProvisionManifest extends ManifestData {
  /** Absolute path to the manifest file that was loaded */
  readonly manifestPath: string;
}

/**
 * Built-in variables available to every manifest.
 */
export interface BaseVariables {
  readonly home: string;
  readonly configDir: string;
  readonly sourceRoot: string;
}

// =============================================================================
// ManifestLoader Class
// =============================================================================

/**
 * Loads and validates provisioning manifests.
 *
 * @example
 * ```typescript
 * const loader = new ManifestLoader();
 * const manifestPath = await loader.find(["/work/rigforge.yaml"]);
 * const manifest = await loader.load(manifestPath, {
 *   home: "/home/ana",
 *   configDir: "/home/ana/.config",
 *   sourceRoot: "/work",
 * });
 * ```
 */
export class ManifestLoader {
  /**
   * Returns the first candidate that exists.
   *
   * @throws ProvisionError MANIFEST_NOT_FOUND if none exists
   */
  async find(candidates: readonly string[]): Promise<string> {
    for (const candidate of candidates) {
      try {
        const stat = await fs.stat(candidate);
        if (stat.isFile()) {
          return candidate;
        }
      } catch {
        continue;
      }
    }

    throw new ProvisionError(
      "Provisioning manifest not found",
      ErrorCode.MANIFEST_NOT_FOUND,
      { searched: [...candidates] },
      `No manifest found. Looked in:\n${candidates.map((c) => `  - ${c}`).join("\n")}\n` +
        `Create rigforge.yaml there or pass --manifest <file>.`,
    );
  }

  /**
   * Loads a manifest file.
   *
   * @throws ProvisionError if the file cannot be read, parsed, rendered or validated
   */
  async load(manifestPath: string, base: BaseVariables): Promise<ProvisionManifest> {
    const content = await this.readManifestFile(manifestPath);
    const parsed = this.parseYaml(content, manifestPath);
    const rendered = this.render(parsed, base, manifestPath);
    const validated = this.validateSchema(rendered, manifestPath);

    return {
      ...validated,
      manifestPath,
    };
  }

  private async readManifestFile(manifestPath: string): Promise<string> {
    try {
      return await fs.readFile(manifestPath, "utf-8");
    } catch (error) {
      const cause = error instanceof Error ? error : new Error(String(error));
      throw new ProvisionError(
        "Failed to read manifest file",
        ErrorCode.MANIFEST_READ_FAILED,
        { manifestPath, reason: cause.message },
        `Could not read ${manifestPath}. ${cause.message}`,
        cause,
      );
    }
  }

  private parseYaml(content: string, manifestPath: string): unknown {
    try {
      return parseYaml(content);
    } catch (error) {
      const cause = error instanceof Error ? error : new Error(String(error));

      let details: Record<string, unknown> = { manifestPath };
      if (error instanceof YAMLParseError) {
        details = {
          ...details,
          line: error.linePos?.[0]?.line,
          column: error.linePos?.[0]?.col,
        };
      }

      throw new ProvisionError(
        "Invalid YAML syntax in manifest",
        ErrorCode.MANIFEST_PARSE_FAILED,
        details,
        `Failed to parse ${path.basename(manifestPath)}: ${cause.message}`,
        cause,
      );
    }
  }

  /**
   * Renders template variables through every string in the document.
   *
   * User variables are rendered first against the built-ins, then the rest
   * of the document against both.
   */
  private render(parsed: unknown, base: BaseVariables, manifestPath: string): unknown {
    if (typeof parsed !== "object" || parsed === null || Array.isArray(parsed)) {
      return parsed;
    }

    const doc: Record<string, unknown> = Object.fromEntries(Object.entries(parsed));
    const { variables: rawVariables, ...rest } = doc;
    const baseVars: TemplateVariables = { ...base };

    const declared = VariablesSchema.safeParse(rawVariables);
    if (!declared.success) {
      // Let schema validation report the bad shape with its path
      return parsed;
    }

    const variables: Record<string, string> = {};
    for (const [name, template] of Object.entries(declared.data)) {
      variables[name] = renderString(template, baseVars, ["variables", name], manifestPath);
    }
    const allVars: TemplateVariables = { ...variables, ...baseVars };

    return {
      ...doc,
      ...Object.fromEntries(
        Object.entries(rest).map(([key, value]) => [key, renderTemplates(value, allVars, [key], manifestPath)]),
      ),
      variables,
    };
  }

  private validateSchema(rendered: unknown, manifestPath: string): ManifestData {
    const result = ManifestSchema.safeParse(rendered);

    if (!result.success) {
      const issues = result.error.issues.map((issue) => {
        const fieldPath = issue.path.length > 0 ? issue.path.join(".") : "(root)";
        return `${fieldPath}: ${issue.message}`;
      });

      throw new ProvisionError(
        "Invalid manifest",
        ErrorCode.MANIFEST_INVALID,
        { manifestPath, issues },
        `The manifest at ${manifestPath} has validation errors: ${issues.join("; ")}`,
      );
    }

    return result.data;
  }
}
