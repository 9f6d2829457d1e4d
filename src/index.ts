/**
 * Compression grammar: a catalog of compression components, their
 * parametric variations and every valid multi-stage pipeline they compose.
 *
 *   import {
 *     loadDefaultCatalog,
 *     ComponentRegistry,
 *     enumeratePipelines,
 *     summarizePipeline,
 *   } from "compression-grammar";
 *
 *   const registry = ComponentRegistry.create(loadDefaultCatalog().components);
 *   for (const pipeline of enumeratePipelines(registry, { maxDepth: 3 })) {
 *     console.log(summarizePipeline(pipeline).name);
 *   }
 */

export * from "./catalog/index.js";
export * from "./variations/index.js";
export * from "./grammar/index.js";
export * from "./classics/index.js";
export * from "./export/index.js";
export * from "./manifest/index.js";
export {
  loadGeneratorConfig,
  loadGeneratorConfigFile,
  validateGeneratorConfig,
  GeneratorConfigError,
  GeneratorConfigSchema,
  DEFAULT_GENERATOR_CONFIG,
  type GeneratorConfig,
  type GeneratorConfigInput,
} from "./config/generator/index.js";
