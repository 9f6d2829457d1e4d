#!/usr/bin/env node
/**
 * CLI command to generate the compression catalog CSV files.
 *
 * Writes into the output directory:
 *   compression_components.csv   one row per component variation
 *   classic_algorithms.csv       well-known compressors as component chains
 *   pipeline_combinations.csv    every valid pipeline up to --max-depth
 *   generation_summary.csv       counts and timestamp
 *   manifest-<runId>.json        configuration, catalog stats, row counts
 *
 * Usage:
 *   npx tsx src/cli/generate.ts [options]
 *   npm run generate -- --max-depth 3 --stats
 *
 * Options:
 *   -o, --output <dir>    Output directory (default: $OUTPUT_DIR or "output")
 *   --catalog <path>      Component catalog JSON (default: bundled catalog)
 *   --classics <path>     Classic bindings JSON (default: bundled bindings)
 *   --config <path>       Generator configuration JSON; flags below override it
 *   --min-depth <n>       Shortest pipeline emitted (default: 2)
 *   --max-depth <n>       Longest pipeline explored (default: 4)
 *   --any-ending          Do not require pipelines to end in an entropy coder
 *   --no-pipelines        Skip pipeline_combinations.csv
 *   --no-variations       One component row per component, not per variation
 *   --no-classics         Skip classic_algorithms.csv
 *   --stats               Print catalog and generation statistics
 *   --json                Print the result as JSON (for scripting)
 *   -h, --help            Show help
 *
 * Exit codes:
 *   0 - Files written
 *   1 - Invalid configuration, catalog or bindings
 */

import { join, resolve } from "node:path";
import { parseArgs } from "node:util";
import { pathToFileURL } from "node:url";
import { realpathSync } from "node:fs";

import { loadAppConfig } from "../config/index.js";
import {
  loadGeneratorConfig,
  loadGeneratorConfigFile,
  DEFAULT_GENERATOR_CONFIG,
  GeneratorConfigError,
  type GeneratorConfig,
} from "../config/generator/index.js";
import {
  CatalogValidationError,
  ComponentRegistry,
  DEFAULT_CATALOG_PATH,
  loadCatalogFile,
  type RegistryStats,
} from "../catalog/index.js";
import {
  ClassicBindingError,
  DEFAULT_CLASSICS_PATH,
  loadClassicBindingsFile,
} from "../classics/index.js";
import { exportCatalog, type ExportResult } from "../export/index.js";
import { createManifest, saveManifest } from "../manifest/index.js";
import { createLogger, getRunId, initRunId, type Logger } from "../logging/index.js";

// ============================================================
// Types
// ============================================================

/**
 * Flags that shape the generator configuration. Depths arrive as strings
 * from the command line and are validated by the config schema; a flag that
 * is absent or false leaves the base configuration's value in place.
 */
export interface GenerateFlags {
  minDepth?: string;
  maxDepth?: string;
  anyEnding?: boolean;
  noPipelines?: boolean;
  noVariations?: boolean;
  noClassics?: boolean;
}

export interface RunGenerationOptions {
  outputDir: string;
  catalogPath: string;
  classicsPath: string;
  generatorConfig: Readonly<GeneratorConfig>;
  logger: Logger;
  /** Default: current run ID, initialized if missing */
  runId?: string;
  /** Default: true */
  captureGit?: boolean;
  now?: Date;
  context?: Record<string, unknown>;
}

export interface GenerationOutcome {
  runId: string;
  catalogVersion: string;
  manifestPath: string;
  export: ExportResult;
  registryStats: RegistryStats;
  lintWarnings: number;
}

// ============================================================
// Configuration
// ============================================================

function parseDepth(value: string | undefined, fallback: number): number {
  return value === undefined ? fallback : Number(value);
}

/**
 * Apply CLI flags on top of a base configuration and validate the result.
 *
 * @throws GeneratorConfigError for non-integer or inconsistent depths
 */
export function buildGeneratorConfig(
  flags: GenerateFlags,
  base: GeneratorConfig = DEFAULT_GENERATOR_CONFIG
): Readonly<GeneratorConfig> {
  const { enumeration, export: output } = base;
  return loadGeneratorConfig({
    enumeration: {
      minDepth: parseDepth(flags.minDepth, enumeration.minDepth),
      maxDepth: parseDepth(flags.maxDepth, enumeration.maxDepth),
      requireTerminalCategory: flags.anyEnding ? false : enumeration.requireTerminalCategory,
    },
    export: {
      includeVariations: flags.noVariations ? false : output.includeVariations,
      includePipelines: flags.noPipelines ? false : output.includePipelines,
      includeClassics: flags.noClassics ? false : output.includeClassics,
    },
  });
}

// ============================================================
// Generation
// ============================================================

/**
 * Load inputs, write every CSV file and the manifest.
 *
 * @throws CatalogValidationError, ClassicBindingError or ManifestError
 */
export async function runGeneration(options: RunGenerationOptions): Promise<GenerationOutcome> {
  const { logger, generatorConfig, outputDir } = options;
  const runId = options.runId ?? getRunId() ?? initRunId();
  const startedAt = options.now ?? new Date();

  const catalog = loadCatalogFile(options.catalogPath);
  logger.info("Catalog loaded", {
    path: options.catalogPath,
    version: catalog.catalogVersion,
    components: catalog.components.length,
  });
  for (const warning of catalog.warnings) {
    logger.warn(`${warning.componentName ?? "catalog"}: ${warning.message}`);
  }

  const registry = ComponentRegistry.create(catalog.components);
  const bindings = loadClassicBindingsFile(options.classicsPath);
  logger.info("Classic bindings loaded", { bindings: bindings.length });

  logger.info("Writing CSV files", {
    outputDir,
    minDepth: generatorConfig.enumeration.minDepth,
    maxDepth: generatorConfig.enumeration.maxDepth,
  });
  const result = await exportCatalog(registry, bindings, generatorConfig, outputDir, {
    now: startedAt,
    onFile: (file) => logger.info(`Wrote ${file.kind}`, { path: file.path, rows: file.rows }),
  });

  const registryStats = registry.getStats();
  const manifest = createManifest({
    runId,
    catalogVersion: catalog.catalogVersion,
    generatorConfig,
    registryStats,
    lintWarnings: catalog.warnings.length,
    outputs: result.files,
    startedAt,
    captureGit: options.captureGit,
    context: options.context,
  });
  const manifestPath = saveManifest(manifest, outputDir);
  logger.info("Manifest saved", { path: manifestPath });

  return {
    runId,
    catalogVersion: catalog.catalogVersion,
    manifestPath,
    export: result,
    registryStats,
    lintWarnings: catalog.warnings.length,
  };
}

// ============================================================
// CLI Parsing
// ============================================================

function parseCliArgs() {
  const { values } = parseArgs({
    options: {
      output: { type: "string", short: "o" },
      catalog: { type: "string", default: DEFAULT_CATALOG_PATH },
      classics: { type: "string", default: DEFAULT_CLASSICS_PATH },
      config: { type: "string" },
      "min-depth": { type: "string" },
      "max-depth": { type: "string" },
      "any-ending": { type: "boolean", default: false },
      "no-pipelines": { type: "boolean", default: false },
      "no-variations": { type: "boolean", default: false },
      "no-classics": { type: "boolean", default: false },
      stats: { type: "boolean", default: false },
      json: { type: "boolean", default: false },
      help: { type: "boolean", short: "h", default: false },
    },
  });

  if (values.help) {
    console.log(`
Usage: generate [options]

Options:
  -o, --output <dir>    Output directory (default: $OUTPUT_DIR or "output")
  --catalog <path>      Component catalog JSON (default: bundled catalog)
  --classics <path>     Classic bindings JSON (default: bundled bindings)
  --config <path>       Generator configuration JSON; flags below override it
  --min-depth <n>       Shortest pipeline emitted (default: 2)
  --max-depth <n>       Longest pipeline explored (default: 4)
  --any-ending          Do not require pipelines to end in an entropy coder
  --no-pipelines        Skip pipeline_combinations.csv
  --no-variations       One component row per component, not per variation
  --no-classics         Skip classic_algorithms.csv
  --stats               Print catalog and generation statistics
  --json                Print the result as JSON (for scripting)
  -h, --help            Show this help message
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
  cyan: "\x1b[36m",
};

const useColors = process.stdout.isTTY && !process.env.NO_COLOR;

function c(color: keyof typeof COLORS, text: string): string {
  return useColors ? `${COLORS[color]}${text}${COLORS.reset}` : text;
}

function printOutcome(outcome: GenerationOutcome, showStats: boolean): void {
  console.log("");
  console.log(c("bold", "═".repeat(60)));
  console.log(c("bold", ` Generation complete (run ${outcome.runId})`));
  console.log(c("bold", "═".repeat(60)));
  console.log("");
  console.log(c("bold", "Generated files:"));
  for (const file of outcome.export.files) {
    console.log(`  ${c("green", "✓")} ${file.kind}: ${file.path} ${c("dim", `(${file.rows} rows)`)}`);
  }
  console.log(`  ${c("green", "✓")} manifest: ${outcome.manifestPath}`);

  if (showStats) {
    const stats = outcome.registryStats;
    console.log("");
    console.log(c("bold", "Statistics:"));
    console.log(`  catalog version: ${outcome.catalogVersion}`);
    console.log(`  unique components: ${stats.totalComponents}`);
    console.log(`  component variations: ${outcome.export.counts.variations}`);
    console.log(`  classic algorithms: ${outcome.export.counts.classics}`);
    console.log(`  pipelines: ${outcome.export.counts.pipelines}`);
    console.log(`  lint warnings: ${outcome.lintWarnings}`);
    console.log("  by category:");
    for (const [category, count] of Object.entries(stats.byCategory)) {
      console.log(`    ${category}: ${count}`);
    }
    console.log("  by stage:");
    for (const [stage, count] of Object.entries(stats.byStage)) {
      console.log(`    ${stage}: ${count}`);
    }
  }
  console.log("");
}

/**
 * Error text for the console; validation errors list every issue.
 */
export function describeError(err: unknown): string {
  if (
    err instanceof CatalogValidationError ||
    err instanceof GeneratorConfigError ||
    err instanceof ClassicBindingError
  ) {
    return err.format();
  }
  return err instanceof Error ? err.message : String(err);
}

// ============================================================
// Main
// ============================================================

async function main(): Promise<void> {
  const args = parseCliArgs();
  const appConfig = loadAppConfig();
  const runId = initRunId();

  const outputDir = resolve(args.output ?? appConfig.outputDir);
  const logger = createLogger({
    level: appConfig.logLevel,
    logDir: join(outputDir, "logs"),
    console: !args.json,
    file: appConfig.logToFile,
  });

  const flags: GenerateFlags = {
    minDepth: args["min-depth"],
    maxDepth: args["max-depth"],
    anyEnding: args["any-ending"],
    noPipelines: args["no-pipelines"],
    noVariations: args["no-variations"],
    noClassics: args["no-classics"],
  };
  const base = args.config ? loadGeneratorConfigFile(resolve(args.config)) : undefined;
  const generatorConfig = buildGeneratorConfig(flags, base);

  logger.info("Starting generation", { app: appConfig.appName, env: appConfig.env });

  const outcome = await runGeneration({
    outputDir,
    catalogPath: resolve(args.catalog ?? DEFAULT_CATALOG_PATH),
    classicsPath: resolve(args.classics ?? DEFAULT_CLASSICS_PATH),
    generatorConfig,
    logger,
    runId,
    context: args.config ? { flags, configFile: resolve(args.config) } : { flags },
  });

  if (args.json) {
    console.log(
      JSON.stringify(
        {
          runId: outcome.runId,
          catalogVersion: outcome.catalogVersion,
          manifestPath: outcome.manifestPath,
          files: outcome.export.files,
          counts: outcome.export.counts,
          stats: args.stats ? outcome.registryStats : undefined,
        },
        null,
        2
      )
    );
  } else {
    printOutcome(outcome, args.stats ?? false);
  }
}

// Only run when executed directly (not imported by tests); argv[1] may be an npm bin symlink
const isDirectExecution =
  process.argv[1] !== undefined &&
  import.meta.url === pathToFileURL(realpathSync(process.argv[1])).href;

if (isDirectExecution) {
  main().catch((err: unknown) => {
    console.error(c("red", `Error: ${describeError(err)}`));
    process.exit(1);
  });
}
