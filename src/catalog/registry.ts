/**
 * Component registry with deterministic indexing.
 *
 * ═══════════════════════════════════════════════════════════════════════════
 * DETERMINISTIC INDEXING FOR PIPELINE ENUMERATION
 * ═══════════════════════════════════════════════════════════════════════════
 *
 * The ComponentRegistry is the single owner of every component during a run.
 * Pipelines and variations hold references into it; nothing is copied.
 *
 * 1. CANONICAL ORDER: Components are ordered by category (canonical category
 *    order from enums.ts), then by declaration order within the category.
 *    Every index preserves this order, and the stage index in particular
 *    fixes the order in which pipelines are emitted.
 *
 * 2. INDEXES:
 *    - By name (direct lookup; used to resolve prerequisites and classics)
 *    - By category
 *    - By stage (a component valid in several stages appears in each)
 *
 * 3. IMMUTABILITY: The registry and everything it indexes are frozen,
 *    including the arrays and ranges of components passed in unfrozen.
 *    Independent enumerations may share one registry without coordination.
 */

import type { Component } from "./schema.js";
import { countVariations } from "../variations/expander.js";
import { deepFreeze } from "../utils/freeze.js";
import {
  CATEGORY_ORDER,
  PIPELINE_STAGES,
  categoryRank,
  type ComponentCategory,
  type PipelineStage,
} from "./enums.js";

/**
 * Component filter options. All criteria are AND-combined.
 */
export interface ComponentFilter {
  category?: ComponentCategory;
  /** Valid in this stage */
  stage?: PipelineStage;
  lossless?: boolean;
  /** Declares at least one parameter range */
  hasParameters?: boolean;
  /** Name contains this text (case-insensitive) */
  nameContains?: string;
}

export interface RegistryStats {
  totalComponents: number;
  byCategory: Record<ComponentCategory, number>;
  byStage: Record<PipelineStage, number>;
  /** Sum over components of the size of their parameter product */
  totalVariations: number;
  parametricComponents: number;
  constrainedComponents: number;
}

/**
 * Anything the enumerator can pull stage-ordered candidates from.
 */
export interface StageIndex {
  getByStage(stage: PipelineStage): ReadonlyArray<Readonly<Component>>;
}

/**
 * Immutable component registry with deterministic indexes.
 *
 * @example
 *   const { components } = loadDefaultCatalog();
 *   const registry = ComponentRegistry.create(components);
 *
 *   const coders = registry.getByCategory("entropy_coder");
 *   const modelers = registry.getByStage(2);
 *   const bwt = registry.getByName("Burrows-Wheeler Transform");
 */
export class ComponentRegistry implements StageIndex {
  private readonly _components: ReadonlyArray<Readonly<Component>>;

  private readonly _byName: ReadonlyMap<string, Readonly<Component>>;

  private readonly _byCategory: ReadonlyMap<ComponentCategory, ReadonlyArray<Readonly<Component>>>;

  private readonly _byStage: ReadonlyMap<PipelineStage, ReadonlyArray<Readonly<Component>>>;

  private constructor(components: ReadonlyArray<Readonly<Component>>) {
    // Stable sort keeps declaration order within a category
    const ordered = components
      .map((component, index) => ({ component, index }))
      .sort((a, b) => {
        const byCategory = categoryRank(a.component.category) - categoryRank(b.component.category);
        return byCategory !== 0 ? byCategory : a.index - b.index;
      })
      .map(({ component }) => deepFreeze(component));

    this._components = Object.freeze(ordered);
    this._byName = this.buildNameIndex(this._components);
    this._byCategory = this.buildCategoryIndex(this._components);
    this._byStage = this.buildStageIndex(this._components);
  }

  /**
   * Create a registry from validated components (see loader.ts).
   *
   * When names repeat, the first component in canonical order wins the
   * name index; the loader rejects such catalogs, so this only matters for
   * hand-built component lists.
   */
  static create(components: ReadonlyArray<Readonly<Component>>): ComponentRegistry {
    return new ComponentRegistry(components);
  }

  // ============================================================
  // Index Builders (private)
  // ============================================================

  private buildNameIndex(
    components: ReadonlyArray<Readonly<Component>>
  ): ReadonlyMap<string, Readonly<Component>> {
    const index = new Map<string, Readonly<Component>>();
    for (const component of components) {
      if (!index.has(component.name)) {
        index.set(component.name, component);
      }
    }
    return index;
  }

  private buildCategoryIndex(
    components: ReadonlyArray<Readonly<Component>>
  ): ReadonlyMap<ComponentCategory, ReadonlyArray<Readonly<Component>>> {
    const index = new Map<ComponentCategory, Readonly<Component>[]>();

    for (const component of components) {
      const bucket = index.get(component.category);
      if (bucket) {
        bucket.push(component);
      } else {
        index.set(component.category, [component]);
      }
    }

    const frozenIndex = new Map<ComponentCategory, ReadonlyArray<Readonly<Component>>>();
    for (const [key, value] of index) {
      frozenIndex.set(key, Object.freeze(value));
    }
    return frozenIndex;
  }

  private buildStageIndex(
    components: ReadonlyArray<Readonly<Component>>
  ): ReadonlyMap<PipelineStage, ReadonlyArray<Readonly<Component>>> {
    const index = new Map<PipelineStage, Readonly<Component>[]>();

    for (const component of components) {
      for (const stage of new Set(component.validStages)) {
        const bucket = index.get(stage);
        if (bucket) {
          bucket.push(component);
        } else {
          index.set(stage, [component]);
        }
      }
    }

    const frozenIndex = new Map<PipelineStage, ReadonlyArray<Readonly<Component>>>();
    for (const [key, value] of index) {
      frozenIndex.set(key, Object.freeze(value));
    }
    return frozenIndex;
  }

  // ============================================================
  // Public Accessors
  // ============================================================

  /**
   * All components in canonical order.
   */
  get components(): ReadonlyArray<Readonly<Component>> {
    return this._components;
  }

  get size(): number {
    return this._components.length;
  }

  getByName(name: string): Readonly<Component> | undefined {
    return this._byName.get(name);
  }

  has(name: string): boolean {
    return this._byName.has(name);
  }

  getByCategory(category: ComponentCategory): ReadonlyArray<Readonly<Component>> {
    return this._byCategory.get(category) ?? [];
  }

  /**
   * Components valid in a stage, in canonical order.
   */
  getByStage(stage: PipelineStage): ReadonlyArray<Readonly<Component>> {
    return this._byStage.get(stage) ?? [];
  }

  /**
   * Categories that have components, in canonical order.
   */
  getCategories(): ReadonlyArray<ComponentCategory> {
    return Object.freeze(CATEGORY_ORDER.filter((category) => this._byCategory.has(category)));
  }

  /**
   * Stages that have components, ascending.
   */
  getStages(): ReadonlyArray<PipelineStage> {
    return Object.freeze(PIPELINE_STAGES.filter((stage) => this._byStage.has(stage)));
  }

  /**
   * Filter components by multiple criteria, in canonical order.
   *
   * @example
   *   // Parametric lossless components usable as transforms
   *   registry.filter({ stage: 1, lossless: true, hasParameters: true });
   */
  filter(filter: ComponentFilter): ReadonlyArray<Readonly<Component>> {
    let results = [...this._components];

    if (filter.category !== undefined) {
      results = results.filter((c) => c.category === filter.category);
    }

    const stage = filter.stage;
    if (stage !== undefined) {
      results = results.filter((c) => c.validStages.includes(stage));
    }

    if (filter.lossless !== undefined) {
      results = results.filter((c) => c.lossless === filter.lossless);
    }

    if (filter.hasParameters !== undefined) {
      results = results.filter(
        (c) => (Object.keys(c.parameterRanges).length > 0) === filter.hasParameters
      );
    }

    if (filter.nameContains !== undefined) {
      const search = filter.nameContains.toLowerCase();
      results = results.filter((c) => c.name.toLowerCase().includes(search));
    }

    return Object.freeze(results);
  }

  getStats(): RegistryStats {
    const byCategory: Record<ComponentCategory, number> = {
      entropy_measure: 0,
      transform: 0,
      predictor: 0,
      dictionary: 0,
      entropy_coder: 0,
      run_length: 0,
      context_model: 0,
      filter: 0,
      integer_coder: 0,
    };
    const byStage: Record<PipelineStage, number> = { 0: 0, 1: 0, 2: 0, 3: 0 };

    let totalVariations = 0;
    let parametricComponents = 0;
    let constrainedComponents = 0;

    for (const component of this._components) {
      byCategory[component.category]++;

      totalVariations += countVariations(component);
      if (Object.keys(component.parameterRanges).length > 0) {
        parametricComponents++;
      }
      if (component.prerequisites.length > 0 || component.incompatibleWith.length > 0) {
        constrainedComponents++;
      }
    }

    for (const stage of PIPELINE_STAGES) {
      byStage[stage] = this.getByStage(stage).length;
    }

    return {
      totalComponents: this._components.length,
      byCategory,
      byStage,
      totalVariations,
      parametricComponents,
      constrainedComponents,
    };
  }
}
