/**
 * Generation manifest schema definitions.
 *
 * A manifest is written beside the CSV files of every generation run and
 * records what produced them:
 *
 * 1. WHEN: Run metadata (run ID, timestamp, host)
 * 2. WHERE: Git state of the working copy, when available
 * 3. WHAT: Catalog version and statistics
 * 4. HOW: The generator configuration in effect
 * 5. OUTPUT: Every file written, with its row count
 *
 * Manifests are frozen once created. The manifestVersion field lets loaders
 * reject files written by an incompatible release.
 */

import { z } from "zod";
import { GeneratorConfigSchema } from "../config/generator/schema.js";

/**
 * Git repository state at time of run.
 */
export const GitStateSchema = z
  .object({
    /** Current commit SHA (full 40 chars) */
    commitSha: z.string().regex(/^[a-f0-9]{40}$/),

    /** Short commit SHA (7 chars) */
    commitShort: z.string().regex(/^[a-f0-9]{7}$/),

    branch: z.string(),

    /** Whether working directory has uncommitted changes */
    isDirty: z.boolean(),

    /** Commit timestamp (ISO 8601) */
    commitDate: z.string().datetime({ offset: true }),
  })
  .strict();

export type GitState = z.infer<typeof GitStateSchema>;

export const RunMetadataSchema = z
  .object({
    /** Unique run identifier (from logging/run-id) */
    runId: z.string().min(1),

    /** Run start timestamp (ISO 8601, UTC) */
    startedAt: z.string().datetime(),

    hostname: z.string().optional(),

    git: GitStateSchema.optional(),

    /** Free-form context, e.g. the CLI flags used */
    context: z.record(z.string(), z.unknown()).optional(),
  })
  .strict();

export type RunMetadata = z.infer<typeof RunMetadataSchema>;

const Count = z.number().int().min(0);

export const CatalogStatsSchema = z
  .object({
    totalComponents: Count,
    totalVariations: Count,
    parametricComponents: Count,
    constrainedComponents: Count,
    lintWarnings: Count,
    /** Category → component count, in canonical category order */
    byCategory: z.record(z.string(), Count),
    /** Stage → component count */
    byStage: z.record(z.string(), Count),
  })
  .strict();

export type CatalogStats = z.infer<typeof CatalogStatsSchema>;

export const OutputFileSchema = z
  .object({
    kind: z.enum(["components", "classics", "pipelines", "summary"]),
    /** Path as written, relative to the working directory of the run */
    path: z.string().min(1),
    /** Data rows, header excluded */
    rows: Count,
  })
  .strict();

export type OutputFile = z.infer<typeof OutputFileSchema>;

export const GenerationManifestSchema = z
  .object({
    manifestVersion: z.string().regex(/^\d+\.\d+\.\d+$/),
    runMetadata: RunMetadataSchema,
    catalogVersion: z.string().regex(/^\d+\.\d+\.\d+$/),
    generatorConfig: GeneratorConfigSchema,
    catalogStats: CatalogStatsSchema,
    outputs: z.array(OutputFileSchema),
  })
  .strict();

export type GenerationManifest = z.infer<typeof GenerationManifestSchema>;

/**
 * Current manifest schema version.
 * Increment the major version when making breaking changes to the schema.
 */
export const MANIFEST_VERSION = "1.0.0";
