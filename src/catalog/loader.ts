/**
 * Component catalog loader and validator.
 *
 * Responsible for:
 * - Loading the catalog from JSON (bundled file or any path)
 * - Validating the component schema
 * - Rejecting configuration errors before any enumeration starts
 * - Reporting composition lint findings as warnings
 * - Freezing the loaded components
 *
 * ═══════════════════════════════════════════════════════════════════════════
 * ERRORS VS WARNINGS
 * ═══════════════════════════════════════════════════════════════════════════
 *
 * ERRORS (fatal, block loading):
 *   - Schema failures (missing fields, unknown category, stage outside 0–3,
 *     integer-like or "__proto__" parameter names)
 *   - Empty parameter range lists
 *   - Non-finite numeric parameter values
 *   - Repeated values within one parameter range
 *   - Repeated stages within validStages
 *   - Duplicate component names
 *
 * WARNINGS (reported, never block):
 *   - Prerequisites or incompatibilities naming unknown components
 *   - Asymmetric incompatibilities, unplaceable prerequisites
 *
 * See validators.ts for the warning rules.
 */

import { readFileSync } from "node:fs";
import { fileURLToPath } from "node:url";
import { CatalogFileSchema, type Component } from "./schema.js";
import { lintCatalog, type CatalogLintIssue } from "./validators.js";
import { deepFreeze } from "../utils/freeze.js";

/**
 * Validation error for catalog loading.
 */
export class CatalogValidationError extends Error {
  public readonly issues: CatalogIssue[];

  constructor(message: string, issues: CatalogIssue[]) {
    super(message);
    this.name = "CatalogValidationError";
    this.issues = issues;
  }

  /**
   * Format errors for display.
   */
  format(): string {
    const lines = ["Catalog validation failed:"];
    for (const issue of this.issues) {
      const location = issue.componentName ? `[${issue.componentName}]` : "[catalog]";
      lines.push(`  - ${location} ${issue.field}: ${issue.message}`);
    }
    return lines.join("\n");
  }
}

/**
 * Individual catalog issue.
 */
export interface CatalogIssue {
  /** Component name if the issue belongs to one */
  componentName?: string;
  /** Field that has the issue */
  field: string;
  /** Human-readable error message */
  message: string;
  /** Error type for programmatic handling */
  type: "schema" | "duplicate" | "consistency" | "reference";
  /** Errors block loading; warnings are informational */
  severity: "error" | "warning";
}

export interface LoadCatalogOptions {
  /**
   * Run composition lint and report its findings as warnings.
   * Default: true
   */
  lint?: boolean;
}

/**
 * Result of catalog validation.
 */
export interface CatalogLoadResult {
  success: boolean;
  catalogVersion?: string;
  components?: ReadonlyArray<Readonly<Component>>;
  errors?: CatalogIssue[];
  warnings?: CatalogIssue[];
  stats?: {
    total: number;
    schemaErrors: number;
    consistencyErrors: number;
    duplicateNames: number;
    lintWarnings: number;
  };
}

/**
 * A validated, frozen catalog.
 */
export interface LoadedCatalog {
  catalogVersion: string;
  components: ReadonlyArray<Readonly<Component>>;
  warnings: CatalogIssue[];
}

/** Version assigned to component arrays loaded without a catalog envelope */
export const UNVERSIONED_CATALOG = "0.0.0";

/** The catalog shipped with this package */
export const DEFAULT_CATALOG_PATH = fileURLToPath(
  new URL("../../catalog/components.json", import.meta.url)
);

// ============================================================
// Helpers
// ============================================================

/**
 * Best-effort component name from raw input, for error locations.
 */
function rawComponentName(input: unknown, index: number): string | undefined {
  if (typeof input !== "object" || input === null) {
    return undefined;
  }
  const components: unknown = Reflect.get(input, "components");
  if (!Array.isArray(components)) {
    return undefined;
  }
  const raw: unknown = components[index];
  if (typeof raw === "object" && raw !== null) {
    const name: unknown = Reflect.get(raw, "name");
    if (typeof name === "string" && name.length > 0) {
      return name;
    }
  }
  return `components[${index}]`;
}

/**
 * Check the parts of a component the schema cannot express.
 */
function checkComponentConsistency(component: Component): CatalogIssue[] {
  const issues: CatalogIssue[] = [];

  for (const [parameter, values] of Object.entries(component.parameterRanges)) {
    if (values.length === 0) {
      issues.push({
        componentName: component.name,
        field: `parameterRanges.${parameter}`,
        message: "Parameter range must list at least one value",
        type: "consistency",
        severity: "error",
      });
      continue;
    }

    const nonFinite = values.filter((v) => typeof v === "number" && !Number.isFinite(v));
    if (nonFinite.length > 0) {
      issues.push({
        componentName: component.name,
        field: `parameterRanges.${parameter}`,
        message: `Parameter range contains non-finite numbers (${nonFinite.join(", ")}); write unbounded values as strings such as "inf"`,
        type: "consistency",
        severity: "error",
      });
    }

    if (new Set(values).size !== values.length) {
      issues.push({
        componentName: component.name,
        field: `parameterRanges.${parameter}`,
        message: "Parameter range contains repeated values",
        type: "consistency",
        severity: "error",
      });
    }
  }

  if (new Set(component.validStages).size !== component.validStages.length) {
    issues.push({
      componentName: component.name,
      field: "validStages",
      message: `validStages contains repeated stages (${component.validStages.join(", ")})`,
      type: "consistency",
      severity: "error",
    });
  }

  return issues;
}

/**
 * Check for duplicate component names.
 */
function findDuplicateNames(components: Component[]): CatalogIssue[] {
  const seen = new Map<string, number>();
  const issues: CatalogIssue[] = [];

  components.forEach((component, i) => {
    const firstIndex = seen.get(component.name);
    if (firstIndex !== undefined) {
      issues.push({
        componentName: component.name,
        field: "name",
        message: `Duplicate component name "${component.name}" (first seen at index ${firstIndex}, duplicate at index ${i})`,
        type: "duplicate",
        severity: "error",
      });
    } else {
      seen.set(component.name, i);
    }
  });

  return issues;
}

function convertLintIssue(issue: CatalogLintIssue): CatalogIssue {
  return {
    componentName: issue.componentName,
    field: issue.field,
    message: `${issue.message} [${issue.rule}]`,
    type: "reference",
    severity: "warning",
  };
}

// ============================================================
// Loading
// ============================================================

/**
 * Load and validate a catalog from a raw input object.
 *
 * @param input - Raw catalog data ({ catalogVersion, components })
 * @returns Frozen components in declaration order, or validation errors
 *
 * @example
 *   const result = loadCatalog(JSON.parse(readFileSync(path, "utf-8")));
 *   if (!result.success) {
 *     console.error(formatCatalogReport(result));
 *   }
 */
export function loadCatalog(input: unknown, options: LoadCatalogOptions = {}): CatalogLoadResult {
  const { lint = true } = options;

  const parsed = CatalogFileSchema.safeParse(input);
  if (!parsed.success) {
    const errors: CatalogIssue[] = parsed.error.issues.map((issue) => {
      const [head, index, ...rest] = issue.path;
      if (head === "components" && typeof index === "number") {
        return {
          componentName: rawComponentName(input, index),
          field: rest.join(".") || "(component)",
          message: issue.message,
          type: "schema" as const,
          severity: "error" as const,
        };
      }
      return {
        field: issue.path.join(".") || "(root)",
        message: issue.message,
        type: "schema" as const,
        severity: "error" as const,
      };
    });
    return {
      success: false,
      errors,
      stats: {
        total: 0,
        schemaErrors: errors.length,
        consistencyErrors: 0,
        duplicateNames: 0,
        lintWarnings: 0,
      },
    };
  }

  const { catalogVersion, components } = parsed.data;

  const consistencyIssues = components.flatMap(checkComponentConsistency);
  const duplicateIssues = findDuplicateNames(components);
  const errors = [...consistencyIssues, ...duplicateIssues];

  const warnings = lint ? lintCatalog(components).issues.map(convertLintIssue) : [];

  const stats = {
    total: components.length,
    schemaErrors: 0,
    consistencyErrors: consistencyIssues.length,
    duplicateNames: duplicateIssues.length,
    lintWarnings: warnings.length,
  };

  if (errors.length > 0) {
    return {
      success: false,
      catalogVersion,
      errors,
      warnings: warnings.length > 0 ? warnings : undefined,
      stats,
    };
  }

  return {
    success: true,
    catalogVersion,
    components: deepFreeze(components),
    warnings: warnings.length > 0 ? warnings : undefined,
    stats,
  };
}

/**
 * Load a bare component array (no catalog envelope).
 */
export function loadComponentArray(
  components: unknown[],
  options: LoadCatalogOptions = {}
): CatalogLoadResult {
  return loadCatalog({ catalogVersion: UNVERSIONED_CATALOG, components }, options);
}

/**
 * Load and validate a catalog, throwing on error.
 *
 * @throws CatalogValidationError if validation fails
 */
export function loadCatalogOrThrow(
  input: unknown,
  options: LoadCatalogOptions = {}
): LoadedCatalog {
  const result = loadCatalog(input, options);

  if (!result.success || !result.components || !result.catalogVersion) {
    const errors = result.errors ?? [];
    throw new CatalogValidationError(
      `Catalog validation failed: ${errors.length} error(s)`,
      errors
    );
  }

  return {
    catalogVersion: result.catalogVersion,
    components: result.components,
    warnings: result.warnings ?? [],
  };
}

/**
 * Read a catalog JSON file and load it.
 *
 * @throws CatalogValidationError if the file cannot be read, parsed or validated
 */
export function loadCatalogFile(path: string, options: LoadCatalogOptions = {}): LoadedCatalog {
  return loadCatalogOrThrow(readJsonFile(path), options);
}

/**
 * Load the catalog shipped in catalog/components.json.
 */
export function loadDefaultCatalog(options: LoadCatalogOptions = {}): LoadedCatalog {
  return loadCatalogFile(DEFAULT_CATALOG_PATH, options);
}

function readJsonFile(path: string): unknown {
  let text: string;
  try {
    text = readFileSync(path, "utf-8");
  } catch (err) {
    throw new CatalogValidationError(`Cannot read catalog file: ${path}`, [
      {
        field: "(file)",
        message: err instanceof Error ? err.message : String(err),
        type: "schema",
        severity: "error",
      },
    ]);
  }

  try {
    return JSON.parse(text);
  } catch (err) {
    throw new CatalogValidationError(`Catalog file is not valid JSON: ${path}`, [
      {
        field: "(file)",
        message: err instanceof Error ? err.message : String(err),
        type: "schema",
        severity: "error",
      },
    ]);
  }
}

/**
 * Format a detailed validation report.
 */
export function formatCatalogReport(result: CatalogLoadResult): string {
  const lines: string[] = [];

  lines.push("═══════════════════════════════════════════════════════════════");
  lines.push(" Catalog Validation Report");
  lines.push("═══════════════════════════════════════════════════════════════");

  if (result.catalogVersion) {
    lines.push("");
    lines.push(`Catalog Version:    ${result.catalogVersion}`);
  }

  if (result.stats) {
    lines.push("");
    lines.push(`Total Components:   ${result.stats.total}`);
    lines.push(`Schema Errors:      ${result.stats.schemaErrors}`);
    lines.push(`Consistency Errors: ${result.stats.consistencyErrors}`);
    lines.push(`Duplicate Names:    ${result.stats.duplicateNames}`);
    lines.push(`Lint Warnings:      ${result.stats.lintWarnings}`);
  }

  if (result.errors && result.errors.length > 0) {
    lines.push("");
    lines.push("───────────────────────────────────────────────────────────────");
    lines.push(" ERRORS (block loading)");
    lines.push("───────────────────────────────────────────────────────────────");

    for (const error of result.errors) {
      lines.push("");
      lines.push(`[${error.componentName ?? "catalog"}] ${error.type.toUpperCase()}`);
      lines.push(`  Field: ${error.field}`);
      lines.push(`  Message: ${error.message}`);
    }
  }

  if (result.warnings && result.warnings.length > 0) {
    lines.push("");
    lines.push("───────────────────────────────────────────────────────────────");
    lines.push(" WARNINGS (review recommended)");
    lines.push("───────────────────────────────────────────────────────────────");

    for (const warning of result.warnings) {
      lines.push("");
      lines.push(`[${warning.componentName ?? "catalog"}] ${warning.type.toUpperCase()}`);
      lines.push(`  Field: ${warning.field}`);
      lines.push(`  Message: ${warning.message}`);
    }
  }

  lines.push("");
  lines.push("═══════════════════════════════════════════════════════════════");
  lines.push(result.success ? " ✓ Validation PASSED" : " ✗ Validation FAILED");
  lines.push("═══════════════════════════════════════════════════════════════");

  return lines.join("\n");
}
