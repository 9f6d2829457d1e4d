/**
 * Flat, serializable view of a pipeline.
 */

import type { PipelineStage } from "../catalog/enums.js";
import { combineComplexity } from "./complexity.js";
import type { Pipeline } from "./enumerator.js";

/** Separator between pipeline elements in names and formulas */
export const PIPELINE_SEPARATOR = " → ";

export interface PipelineSummary {
  /** 1-based position in the enumeration, when known */
  id?: number;
  /** Component names joined with " → " */
  name: string;
  componentNames: string[];
  stages: PipelineStage[];
  /** ASCII formulas joined with " → " */
  formula: string;
  timeCosts: string[];
  spaceCosts: string[];
  totalTimeCost: string;
  totalSpaceCost: string;
  numStages: number;
  allLossless: boolean;
}

export function summarizePipeline(pipeline: Pipeline, id?: number): PipelineSummary {
  const componentNames = pipeline.map((entry) => entry.component.name);
  const timeCosts = pipeline.map((entry) => entry.component.timeCost);
  const spaceCosts = pipeline.map((entry) => entry.component.spaceCost);

  const summary: PipelineSummary = {
    name: componentNames.join(PIPELINE_SEPARATOR),
    componentNames,
    stages: pipeline.map((entry) => entry.stage),
    formula: pipeline.map((entry) => entry.component.formulaAscii).join(PIPELINE_SEPARATOR),
    timeCosts,
    spaceCosts,
    totalTimeCost: combineComplexity(timeCosts),
    totalSpaceCost: combineComplexity(spaceCosts),
    numStages: pipeline.length,
    allLossless: pipeline.every((entry) => entry.component.lossless),
  };

  if (id !== undefined) {
    summary.id = id;
  }
  return summary;
}
