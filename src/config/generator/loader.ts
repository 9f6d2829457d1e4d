/**
 * Generator configuration loading.
 *
 * Configuration comes from an object (tests, library callers) or a JSON file
 * (`generate --config`). Either way it is parsed by GeneratorConfigSchema,
 * completed with defaults and deep-frozen. Nothing is generated from a
 * configuration that failed validation.
 */

import { readFileSync } from "node:fs";
import type { ZodIssue } from "zod";
import { GeneratorConfigSchema, type GeneratorConfig } from "./schema.js";

export interface ConfigValidationIssue {
  /** Path to the invalid field; empty for the whole document */
  path: (string | number)[];
  message: string;
  /** Zod issue code, or "file" when the file could not be read or parsed */
  code: string;
}

export class GeneratorConfigError extends Error {
  public readonly issues: ConfigValidationIssue[];

  constructor(message: string, issues: ConfigValidationIssue[]) {
    super(message);
    this.name = "GeneratorConfigError";
    this.issues = issues;
  }

  format(): string {
    const lines = ["Generator configuration validation failed:"];
    for (const issue of this.issues) {
      const path = issue.path.length > 0 ? issue.path.join(".") : "(root)";
      lines.push(`  - ${path}: ${issue.message}`);
    }
    return lines.join("\n");
  }
}

function toIssues(zodIssues: ReadonlyArray<ZodIssue>): ConfigValidationIssue[] {
  return zodIssues.map(({ path, message, code }) => ({ path: [...path], message, code }));
}

function freezeConfig(config: GeneratorConfig): Readonly<GeneratorConfig> {
  Object.freeze(config.enumeration);
  Object.freeze(config.export);
  return Object.freeze(config);
}

/**
 * Validate a configuration object, filling omitted fields with defaults.
 *
 * @throws GeneratorConfigError listing every issue
 */
export function loadGeneratorConfig(input: unknown): Readonly<GeneratorConfig> {
  const result = GeneratorConfigSchema.safeParse(input);

  if (!result.success) {
    const issues = toIssues(result.error.issues);
    throw new GeneratorConfigError(
      `Invalid generator configuration: ${issues.length} validation error(s)`,
      issues
    );
  }

  return freezeConfig(result.data);
}

/**
 * Read a JSON configuration file and load it.
 *
 * @throws GeneratorConfigError if the file is unreadable, not JSON or invalid
 */
export function loadGeneratorConfigFile(path: string): Readonly<GeneratorConfig> {
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(path, "utf-8"));
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new GeneratorConfigError(`Cannot load generator configuration from ${path}`, [
      { path: [], message, code: "file" },
    ]);
  }
  return loadGeneratorConfig(raw);
}

/**
 * Check a configuration without throwing.
 */
export function validateGeneratorConfig(input: unknown): {
  success: boolean;
  config?: GeneratorConfig;
  errors?: ConfigValidationIssue[];
} {
  const result = GeneratorConfigSchema.safeParse(input);

  return result.success
    ? { success: true, config: result.data }
    : { success: false, errors: toIssues(result.error.issues) };
}
