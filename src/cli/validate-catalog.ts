#!/usr/bin/env node
/**
 * CLI command to validate the component catalog and classic bindings.
 *
 * Validates:
 * - Catalog schema, parameter ranges and name uniqueness
 * - Composition lint (dangling or unplaceable constraints)
 * - Classic algorithm bindings (schema + name resolution)
 * - Stage grammar (every start stage can reach entropy coding)
 *
 * Usage:
 *   npx tsx src/cli/validate-catalog.ts [options]
 *   npm run validate-catalog
 *
 * Options:
 *   --catalog <path>    Path to component catalog JSON (default: bundled catalog)
 *   --classics <path>   Path to classic bindings JSON (default: bundled bindings)
 *   --verbose           Show detailed output
 *   --json              Output entire report as JSON (for CI parsing)
 *   -h, --help          Show help
 *
 * Exit codes:
 *   0 - All validations passed (warnings allowed)
 *   1 - One or more validations failed
 */

import { resolve } from "node:path";
import { parseArgs } from "node:util";
import { pathToFileURL } from "node:url";
import { realpathSync } from "node:fs";

import {
  CatalogValidationError,
  ComponentRegistry,
  DEFAULT_CATALOG_PATH,
  STAGE_LABELS,
  formatLintIssue,
  lintCatalog,
  loadCatalogFile,
  type LoadedCatalog,
} from "../catalog/index.js";
import {
  ClassicBindingError,
  DEFAULT_CLASSICS_PATH,
  loadClassicBindingsFile,
  resolveClassicBinding,
  type ClassicBinding,
} from "../classics/index.js";
import {
  DEFAULT_TRANSITIONS,
  START_STAGES,
  canReach,
  formatGrammar,
  type TransitionGrammar,
} from "../grammar/index.js";

// ============================================================
// Types
// ============================================================

export interface StepResult {
  success: boolean;
  component: string;
  message: string;
  details?: string[];
  /** Non-blocking findings */
  warnings?: string[];
}

export interface ValidationReport {
  timestamp: string;
  catalogVersion?: string;
  steps: StepResult[];
  summary: {
    stepsPassed: number;
    stepsFailed: number;
    stepsTotal: number;
    components?: number;
    variations?: number;
    lintWarnings?: number;
    unusableComponents?: number;
    unresolvedClassicNames?: number;
  };
}

export interface ValidateCatalogOptions {
  catalogPath: string;
  classicsPath: string;
  grammar?: TransitionGrammar;
}

// ============================================================
// Validation Steps
// ============================================================

export function runCatalogStep(catalogPath: string): {
  step: StepResult;
  catalog?: LoadedCatalog;
} {
  try {
    const catalog = loadCatalogFile(catalogPath, { lint: false });
    const stats = ComponentRegistry.create(catalog.components).getStats();
    return {
      catalog,
      step: {
        success: true,
        component: "Catalog",
        message: `${stats.totalComponents} components, ${stats.totalVariations} variations (version ${catalog.catalogVersion})`,
        details: Object.entries(stats.byCategory)
          .filter(([, count]) => count > 0)
          .map(([category, count]) => `${category}: ${count}`),
      },
    };
  } catch (err) {
    if (err instanceof CatalogValidationError) {
      return {
        step: {
          success: false,
          component: "Catalog",
          message: err.message,
          details: err.issues.map(
            (issue) => `[${issue.componentName ?? "catalog"}] ${issue.field}: ${issue.message}`
          ),
        },
      };
    }
    throw err;
  }
}

export function runLintStep(
  catalog: LoadedCatalog,
  grammar: TransitionGrammar = DEFAULT_TRANSITIONS
): { step: StepResult; warningCount: number; unusable: string[] } {
  const result = lintCatalog(catalog.components, grammar);

  const details =
    result.unusableComponents.length > 0
      ? [`Never placeable: ${result.unusableComponents.join(", ")}`]
      : undefined;

  return {
    warningCount: result.warningCount,
    unusable: result.unusableComponents,
    step: {
      success: true,
      component: "Composition Lint",
      message:
        result.warningCount === 0
          ? "No constraint problems"
          : `${result.warningCount} warning(s)`,
      details,
      warnings: result.issues.map(formatLintIssue),
    },
  };
}

export function runClassicsStep(
  classicsPath: string,
  catalog: LoadedCatalog | undefined
): { step: StepResult; unresolvedNames: number } {
  let bindings: ReadonlyArray<ClassicBinding>;
  try {
    bindings = loadClassicBindingsFile(classicsPath);
  } catch (err) {
    if (err instanceof ClassicBindingError) {
      return {
        unresolvedNames: 0,
        step: {
          success: false,
          component: "Classic Bindings",
          message: err.message,
          details: err.issues.map(
            (issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`
          ),
        },
      };
    }
    throw err;
  }

  if (!catalog) {
    return {
      unresolvedNames: 0,
      step: {
        success: true,
        component: "Classic Bindings",
        message: `${bindings.length} binding(s) loaded; names not checked (catalog invalid)`,
      },
    };
  }

  const registry = ComponentRegistry.create(catalog.components);
  const warnings: string[] = [];
  let unresolvedNames = 0;
  let usable = 0;

  for (const binding of bindings) {
    const resolved = resolveClassicBinding(registry, binding);
    unresolvedNames += resolved.missingNames.length;
    for (const name of resolved.missingNames) {
      warnings.push(`${binding.algorithmName}: "${name}" is not in the catalog`);
    }
    if (resolved.components.length > 0) {
      usable++;
    } else {
      warnings.push(`${binding.algorithmName}: no component resolves; binding is skipped`);
    }
  }

  return {
    unresolvedNames,
    step: {
      success: true,
      component: "Classic Bindings",
      message: `${usable}/${bindings.length} binding(s) usable, ${unresolvedNames} unresolved name(s)`,
      warnings,
    },
  };
}

export function runGrammarStep(grammar: TransitionGrammar = DEFAULT_TRANSITIONS): StepResult {
  const stranded = START_STAGES.filter((stage) => !canReach(stage, 3, grammar));

  if (stranded.length > 0) {
    return {
      success: false,
      component: "Stage Grammar",
      message: "Some start stages cannot reach entropy coding",
      details: stranded.map((stage) => `${stage} (${STAGE_LABELS[stage]})`),
    };
  }

  return {
    success: true,
    component: "Stage Grammar",
    message: `${START_STAGES.length} start stages, all reach entropy coding`,
    details: formatGrammar(grammar).split("\n"),
  };
}

/**
 * Run every step and assemble the report.
 */
export function validateCatalog(
  options: ValidateCatalogOptions,
  now: Date = new Date()
): ValidationReport {
  const grammar = options.grammar ?? DEFAULT_TRANSITIONS;
  const steps: StepResult[] = [];

  const { step: catalogStep, catalog } = runCatalogStep(options.catalogPath);
  steps.push(catalogStep);

  let lintWarnings: number | undefined;
  let unusableComponents: number | undefined;
  if (catalog) {
    const lint = runLintStep(catalog, grammar);
    steps.push(lint.step);
    lintWarnings = lint.warningCount;
    unusableComponents = lint.unusable.length;
  }

  const classics = runClassicsStep(options.classicsPath, catalog);
  steps.push(classics.step);

  steps.push(runGrammarStep(grammar));

  const stats = catalog ? ComponentRegistry.create(catalog.components).getStats() : undefined;
  const stepsPassed = steps.filter((s) => s.success).length;

  return {
    timestamp: now.toISOString(),
    catalogVersion: catalog?.catalogVersion,
    steps,
    summary: {
      stepsPassed,
      stepsFailed: steps.length - stepsPassed,
      stepsTotal: steps.length,
      components: stats?.totalComponents,
      variations: stats?.totalVariations,
      lintWarnings,
      unusableComponents,
      unresolvedClassicNames: catalog ? classics.unresolvedNames : undefined,
    },
  };
}

// ============================================================
// CLI Parsing
// ============================================================

function parseCliArgs() {
  const { values } = parseArgs({
    options: {
      catalog: { type: "string", default: DEFAULT_CATALOG_PATH },
      classics: { type: "string", default: DEFAULT_CLASSICS_PATH },
      verbose: { type: "boolean", default: false },
      json: { type: "boolean", default: false },
      help: { type: "boolean", short: "h", default: false },
    },
  });

  if (values.help) {
    console.log(`
Usage: validate-catalog [options]

Options:
  --catalog <path>    Path to component catalog JSON (default: bundled catalog)
  --classics <path>   Path to classic bindings JSON (default: bundled bindings)
  --verbose           Show detailed output
  --json              Output entire report as JSON (for CI parsing)
  -h, --help          Show this help message
`);
    process.exit(0);
  }

  return values;
}

// ============================================================
// Output Formatting
// ============================================================

const COLORS = {
  reset: "\x1b[0m",
  bold: "\x1b[1m",
  dim: "\x1b[2m",
  green: "\x1b[32m",
  red: "\x1b[31m",
  yellow: "\x1b[33m",
};

const useColors = process.stdout.isTTY && !process.env.NO_COLOR;

function c(color: keyof typeof COLORS, text: string): string {
  return useColors ? `${COLORS[color]}${text}${COLORS.reset}` : text;
}

function printHeader(): void {
  console.log("");
  console.log(c("bold", "═".repeat(60)));
  console.log(c("bold", " Component Catalog Validation"));
  console.log(c("bold", "═".repeat(60)));
  console.log("");
}

function printStep(step: StepResult, verbose: boolean): void {
  const icon = step.success ? c("green", "✓") : c("red", "✗");
  console.log(`${icon} ${c("bold", step.component)}: ${step.message}`);

  if (!step.success) {
    step.details?.forEach((d) => console.log(`    ${c("red", "•")} ${d}`));
  } else if (verbose) {
    step.details?.forEach((d) => console.log(`  ${c("dim", "•")} ${d}`));
  }

  for (const warning of step.warnings ?? []) {
    const [first = "", ...rest] = warning.split("\n");
    console.log(`  ${c("yellow", "!")} ${first}`);
    if (verbose) {
      rest.forEach((line) => console.log(`    ${c("dim", line.trim())}`));
    }
  }
  console.log("");
}

function printFooter(passed: number, failed: number): void {
  console.log("─".repeat(60));
  if (failed === 0) {
    console.log(c("green", `✓ All validations passed (${passed}/${passed})`));
  } else {
    console.log(c("red", `✗ Validation failed: ${failed} step(s)`));
  }
  console.log("─".repeat(60));
  console.log("");
}

// ============================================================
// Main
// ============================================================

async function main(): Promise<void> {
  const args = parseCliArgs();

  const report = validateCatalog({
    catalogPath: resolve(args.catalog ?? DEFAULT_CATALOG_PATH),
    classicsPath: resolve(args.classics ?? DEFAULT_CLASSICS_PATH),
  });
  const verbose = args.verbose ?? false;

  if (args.json) {
    console.log(JSON.stringify(report, null, 2));
  } else {
    printHeader();
    report.steps.forEach((step) => printStep(step, verbose));
    printFooter(report.summary.stepsPassed, report.summary.stepsFailed);
  }

  process.exit(report.summary.stepsFailed > 0 ? 1 : 0);
}

// Only run when executed directly (not imported by tests); argv[1] may be an npm bin symlink
const isDirectExecution =
  process.argv[1] !== undefined &&
  import.meta.url === pathToFileURL(realpathSync(process.argv[1])).href;

if (isDirectExecution) {
  main().catch((err: unknown) => {
    const message = err instanceof Error ? err.message : String(err);
    console.error(c("red", `Error: ${message}`));
    process.exit(1);
  });
}
