/**
 * Stage grammar, pipeline enumeration and pipeline summaries.
 */

export {
  DEFAULT_TRANSITIONS,
  START_STAGES,
  TransitionGrammarSchema,
  GrammarError,
  successors,
  validateGrammar,
  canReach,
  formatGrammar,
  type TransitionGrammar,
} from "./transitions.js";

export {
  DEFAULT_MIN_DEPTH,
  DEFAULT_MAX_DEPTH,
  EnumerationOptionsSchema,
  EnumerationOptionsError,
  resolveEnumerationOptions,
  enumeratePipelines,
  countPipelines,
  pipelineNames,
  type EnumerationOptions,
  type EnumerationSettings,
  type Pipeline,
  type PipelineEntry,
} from "./enumerator.js";

export {
  COMPLEXITY_RANKING,
  DEFAULT_COMPLEXITY,
  complexityRank,
  combineComplexity,
} from "./complexity.js";

export { PIPELINE_SEPARATOR, summarizePipeline, type PipelineSummary } from "./summary.js";
