/**
 * Generation manifest module.
 *
 * Usage:
 *   import { createManifest, saveManifest } from "./manifest/index.js";
 *
 *   const manifest = createManifest({
 *     runId: getRunId() ?? initRunId(),
 *     catalogVersion,
 *     generatorConfig,
 *     registryStats: registry.getStats(),
 *     outputs: result.files,
 *   });
 *   saveManifest(manifest, outputDir);
 */

export {
  GitStateSchema,
  RunMetadataSchema,
  CatalogStatsSchema,
  OutputFileSchema,
  GenerationManifestSchema,
  MANIFEST_VERSION,
  type GitState,
  type RunMetadata,
  type CatalogStats,
  type OutputFile,
  type GenerationManifest,
} from "./schema.js";

export { captureGitState, createRunMetadata, type RunMetadataOptions } from "./metadata.js";

export {
  createManifest,
  toCatalogStats,
  ManifestError,
  type CreateManifestOptions,
} from "./factory.js";

export {
  serializeManifest,
  deserializeManifest,
  isVersionCompatible,
  getManifestFilename,
  saveManifest,
  loadManifest,
  summarizeManifest,
} from "./serialization.js";
