/**
 * Component catalog module.
 *
 * Provides schema-validated component loading, composition lint and
 * deterministic indexing for pipeline enumeration.
 *
 * ═══════════════════════════════════════════════════════════════════════════
 * ARCHITECTURE OVERVIEW
 * ═══════════════════════════════════════════════════════════════════════════
 *
 * 1. LOADING: Catalogs are loaded from JSON with loadCatalog() (structured
 *    result) or loadCatalogOrThrow() / loadCatalogFile(). Loading rejects
 *    schema failures, empty or repeated range values and duplicate names.
 *
 * 2. LINT: lintCatalog() reports constraints that can never be met or that
 *    name unknown components. Findings are warnings and never block loading.
 *
 * 3. REGISTRY: ComponentRegistry.create() orders components canonically,
 *    builds name, category and stage indexes and freezes everything.
 *
 * ═══════════════════════════════════════════════════════════════════════════
 * EXAMPLE USAGE
 * ═══════════════════════════════════════════════════════════════════════════
 *
 *   import { loadDefaultCatalog, ComponentRegistry } from "./catalog/index.js";
 *
 *   const { components } = loadDefaultCatalog();
 *   const registry = ComponentRegistry.create(components);
 *
 *   for (const coder of registry.getByCategory("entropy_coder")) {
 *     console.log(coder.name, coder.timeCost);
 *   }
 */

// Enumerations
export {
  ComponentCategory,
  PipelineStage,
  CATEGORY_ORDER,
  TERMINAL_CATEGORY,
  PIPELINE_STAGES,
  STAGE_LABELS,
  categoryRank,
} from "./enums.js";

// Schema and types
export {
  ParameterValue,
  ParameterRangesSchema,
  ComponentSchema,
  CatalogFileSchema,
  type ParameterRanges,
  type Component,
  type ComponentInput,
  type CatalogFile,
} from "./schema.js";

// Loader and validation
export {
  loadCatalog,
  loadComponentArray,
  loadCatalogOrThrow,
  loadCatalogFile,
  loadDefaultCatalog,
  formatCatalogReport,
  CatalogValidationError,
  DEFAULT_CATALOG_PATH,
  UNVERSIONED_CATALOG,
  type CatalogIssue,
  type CatalogLoadResult,
  type LoadCatalogOptions,
  type LoadedCatalog,
} from "./loader.js";

// Composition lint
export {
  lintCatalog,
  formatLintIssue,
  type LintRule,
  type CatalogLintIssue,
  type CatalogLintResult,
} from "./validators.js";

// Registry and indexing
export {
  ComponentRegistry,
  type ComponentFilter,
  type RegistryStats,
  type StageIndex,
} from "./registry.js";
