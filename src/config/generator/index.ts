/**
 * Generator configuration module.
 *
 * Usage:
 *   import { loadGeneratorConfig } from "./config/generator/index.js";
 *
 *   const config = loadGeneratorConfig({ enumeration: { maxDepth: 5 } });
 */

export type {
  GeneratorConfig,
  GeneratorConfigInput,
  EnumerationConfig,
  ExportConfig,
} from "./schema.js";

export {
  GeneratorConfigSchema,
  EnumerationConfigSchema,
  ExportConfigSchema,
} from "./schema.js";

export {
  loadGeneratorConfig,
  loadGeneratorConfigFile,
  validateGeneratorConfig,
  GeneratorConfigError,
  type ConfigValidationIssue,
} from "./loader.js";

export { DEFAULT_GENERATOR_CONFIG } from "./defaults.js";
