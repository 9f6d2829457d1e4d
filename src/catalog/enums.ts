/**
 * Domain enumerations for the component catalog.
 *
 * Both enumerations are closed. The category order below is the canonical
 * catalog order: registries, reports and exports list categories in exactly
 * this sequence.
 */

import { z } from "zod";

/**
 * Functional category of a compression component.
 *
 * Categories are a grouping tag for reporting. They do not drive the stage
 * grammar, with one exception: ENTROPY_CODER is the terminal category used to
 * decide whether a pipeline counts as complete.
 */
export const ComponentCategory = z.enum([
  "entropy_measure", // Information-theoretic foundations
  "transform", // Reversible data transformations
  "predictor", // Statistical modeling / prediction
  "dictionary", // LZ family
  "entropy_coder", // Final bit-level encoding
  "run_length", // Run-length encoding variants
  "context_model", // Context mixing and modeling
  "filter", // Pre-processing filters
  "integer_coder", // Integer / universal codes
]);
export type ComponentCategory = z.infer<typeof ComponentCategory>;

/**
 * Categories in canonical order.
 */
export const CATEGORY_ORDER: ReadonlyArray<ComponentCategory> = ComponentCategory.options;

/**
 * Category a pipeline must end in when terminal completion is required.
 */
export const TERMINAL_CATEGORY: ComponentCategory = "entropy_coder";

/**
 * Abstract pipeline position.
 *
 *   0 → pre-filter
 *   1 → transform
 *   2 → modeling
 *   3 → entropy coding
 */
export const PipelineStage = z.union([
  z.literal(0),
  z.literal(1),
  z.literal(2),
  z.literal(3),
]);
export type PipelineStage = z.infer<typeof PipelineStage>;

export const PIPELINE_STAGES: ReadonlyArray<PipelineStage> = [0, 1, 2, 3];

export const STAGE_LABELS: Readonly<Record<PipelineStage, string>> = {
  0: "pre-filter",
  1: "transform",
  2: "modeling",
  3: "entropy-coding",
};

/**
 * Position of a category in canonical order.
 */
export function categoryRank(category: ComponentCategory): number {
  return CATEGORY_ORDER.indexOf(category);
}
