/**
 * Generation manifest factory.
 */

import type { GeneratorConfig } from "../config/generator/schema.js";
import type { RegistryStats } from "../catalog/registry.js";
import {
  type CatalogStats,
  type GenerationManifest,
  type OutputFile,
  GenerationManifestSchema,
  MANIFEST_VERSION,
} from "./schema.js";
import { createRunMetadata } from "./metadata.js";
import { deepFreeze } from "../utils/freeze.js";

export class ManifestError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ManifestError";
  }
}

/**
 * Flatten registry statistics into their JSON form.
 */
export function toCatalogStats(stats: RegistryStats, lintWarnings: number): CatalogStats {
  return {
    totalComponents: stats.totalComponents,
    totalVariations: stats.totalVariations,
    parametricComponents: stats.parametricComponents,
    constrainedComponents: stats.constrainedComponents,
    lintWarnings,
    byCategory: { ...stats.byCategory },
    byStage: Object.fromEntries(Object.entries(stats.byStage)),
  };
}

export interface CreateManifestOptions {
  runId: string;
  catalogVersion: string;
  generatorConfig: GeneratorConfig;
  registryStats: RegistryStats;
  lintWarnings?: number;
  outputs: ReadonlyArray<OutputFile>;

  /** Optional: override start timestamp */
  startedAt?: Date;

  /** Optional: disable git state capture */
  captureGit?: boolean;

  /** Optional: disable hostname capture */
  captureHostname?: boolean;

  context?: Record<string, unknown>;
}

/**
 * Create a generation manifest.
 *
 * The returned manifest is deeply frozen.
 *
 * @throws ManifestError if the assembled manifest fails schema validation
 */
export function createManifest(options: CreateManifestOptions): Readonly<GenerationManifest> {
  const manifest: GenerationManifest = {
    manifestVersion: MANIFEST_VERSION,
    runMetadata: createRunMetadata({
      runId: options.runId,
      startedAt: options.startedAt,
      captureGit: options.captureGit,
      captureHostname: options.captureHostname,
      context: options.context,
    }),
    catalogVersion: options.catalogVersion,
    generatorConfig: options.generatorConfig,
    catalogStats: toCatalogStats(options.registryStats, options.lintWarnings ?? 0),
    outputs: options.outputs.map((output) => ({ ...output })),
  };

  const result = GenerationManifestSchema.safeParse(manifest);
  if (!result.success) {
    const errors = result.error.issues
      .map((i) => `${i.path.join(".")}: ${i.message}`)
      .join("; ");
    throw new ManifestError(`Invalid manifest: ${errors}`);
  }

  return deepFreeze(result.data);
}
