/**
 * CSV row builders.
 *
 * Each builder turns core values into flat rows keyed by column name. List
 * and record fields are JSON-encoded so a row survives a round trip through
 * any CSV reader. Builders are lazy and never touch the filesystem.
 */

import type { Component } from "../catalog/schema.js";
import { CATEGORY_ORDER } from "../catalog/enums.js";
import { expandVariations } from "../variations/expander.js";
import type { Pipeline } from "../grammar/enumerator.js";
import { summarizePipeline } from "../grammar/summary.js";
import { summarizeClassic, type ResolvedClassic } from "../classics/resolver.js";

export type CsvValue = string | number | boolean;

export type CsvRow<C extends string> = Record<C, CsvValue>;

export const COMPONENT_COLUMNS = [
  "category",
  "name",
  "formula_latex",
  "formula_ascii",
  "description",
  "parameters",
  "parameter_values",
  "complexity_time",
  "complexity_space",
  "pipeline_stages",
  "is_lossless",
  "prerequisites",
] as const;

export const PIPELINE_COLUMNS = [
  "pipeline_id",
  "pipeline_name",
  "pipeline_components",
  "pipeline_formula",
  "total_time_complexity",
  "total_space_complexity",
  "num_stages",
  "all_lossless",
] as const;

export const CLASSIC_COLUMNS = [
  "algorithm_name",
  "pipeline_components",
  "pipeline_formula",
  "combined_description",
  "total_time_complexity",
  "total_space_complexity",
  "num_stages",
] as const;

export const SUMMARY_COLUMNS = ["metric", "value", "description"] as const;

export type ComponentRow = CsvRow<(typeof COMPONENT_COLUMNS)[number]>;
export type PipelineRow = CsvRow<(typeof PIPELINE_COLUMNS)[number]>;
export type ClassicRow = CsvRow<(typeof CLASSIC_COLUMNS)[number]>;
export type SummaryRow = CsvRow<(typeof SUMMARY_COLUMNS)[number]>;

export interface ComponentRowOptions {
  /**
   * One row per parameter variation. When false, one row per component with
   * the full ranges in parameter_values.
   * Default: true
   */
  includeVariations?: boolean;
}

function componentRow(
  component: Readonly<Component>,
  parameterValues: Readonly<Record<string, unknown>>
): ComponentRow {
  return {
    category: component.category,
    name: component.name,
    formula_latex: component.formulaLatex,
    formula_ascii: component.formulaAscii,
    description: component.description,
    parameters: JSON.stringify(component.parameters),
    parameter_values: JSON.stringify(parameterValues),
    complexity_time: component.timeCost,
    complexity_space: component.spaceCost,
    pipeline_stages: JSON.stringify(component.validStages),
    is_lossless: component.lossless,
    prerequisites: JSON.stringify(component.prerequisites),
  };
}

export function* componentRows(
  components: Iterable<Readonly<Component>>,
  options: ComponentRowOptions = {}
): Generator<ComponentRow> {
  const { includeVariations = true } = options;

  for (const component of components) {
    if (!includeVariations) {
      yield componentRow(component, component.parameterRanges);
      continue;
    }
    for (const variation of expandVariations(component)) {
      yield componentRow(component, variation.params);
    }
  }
}

/**
 * Pipeline rows, numbered from 1 in enumeration order.
 */
export function* pipelineRows(pipelines: Iterable<Pipeline>): Generator<PipelineRow> {
  let id = 0;
  for (const pipeline of pipelines) {
    id++;
    const summary = summarizePipeline(pipeline, id);
    yield {
      pipeline_id: id,
      pipeline_name: summary.name,
      pipeline_components: JSON.stringify(summary.componentNames),
      pipeline_formula: summary.formula,
      total_time_complexity: summary.totalTimeCost,
      total_space_complexity: summary.totalSpaceCost,
      num_stages: summary.numStages,
      all_lossless: summary.allLossless,
    };
  }
}

/**
 * Classic algorithm rows. pipeline_components lists the names as bound,
 * including any the catalog did not resolve.
 */
export function* classicRows(resolved: Iterable<ResolvedClassic>): Generator<ClassicRow> {
  for (const classic of resolved) {
    const summary = summarizeClassic(classic);
    yield {
      algorithm_name: summary.algorithmName,
      pipeline_components: JSON.stringify(summary.requestedNames),
      pipeline_formula: summary.formula,
      combined_description: summary.combinedDescription,
      total_time_complexity: summary.totalTimeCost,
      total_space_complexity: summary.totalSpaceCost,
      num_stages: summary.numStages,
    };
  }
}

export interface GenerationCounts {
  components: number;
  variations: number;
  classics: number;
  pipelines: number;
  maxDepth: number;
  generatedAt: Date;
}

export function summaryRows(counts: GenerationCounts): SummaryRow[] {
  return [
    {
      metric: "total_components",
      value: String(counts.components),
      description: "Number of unique compression components",
    },
    {
      metric: "total_component_variations",
      value: String(counts.variations),
      description: "Components × parameter variations",
    },
    {
      metric: "classic_algorithms",
      value: String(counts.classics),
      description: "Well-known algorithm pipelines",
    },
    {
      metric: "generated_pipelines",
      value: String(counts.pipelines),
      description: `Valid pipeline combinations (depth ≤ ${counts.maxDepth})`,
    },
    {
      metric: "generation_timestamp",
      value: counts.generatedAt.toISOString(),
      description: "UTC timestamp of generation",
    },
    {
      metric: "categories",
      value: CATEGORY_ORDER.join(", "),
      description: "Component categories in taxonomy",
    },
  ];
}
