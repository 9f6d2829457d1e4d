/**
 * Stage-transition grammar.
 *
 * The grammar states which stage may follow which:
 *
 *   0 (pre-filter)     → 1, 2, 3
 *   1 (transform)      → 2, 3
 *   2 (modeling)       → 2, 3
 *   3 (entropy-coding) → (terminal)
 *
 * Modeling may repeat; a transform may never directly follow another
 * transform. Grammars are typed as a Record over every stage, so a table
 * missing a stage does not compile.
 */

import { z } from "zod";
import { PipelineStage, PIPELINE_STAGES } from "../catalog/enums.js";

export type TransitionGrammar = Readonly<Record<PipelineStage, ReadonlyArray<PipelineStage>>>;

export const DEFAULT_TRANSITIONS: TransitionGrammar = Object.freeze({
  0: Object.freeze([1, 2, 3] as const),
  1: Object.freeze([2, 3] as const),
  2: Object.freeze([2, 3] as const),
  3: Object.freeze([] as const),
});

/**
 * Stages a pipeline may start from. Entropy coding is never a start stage.
 */
export const START_STAGES: ReadonlyArray<PipelineStage> = Object.freeze([0, 1, 2] as const);

/**
 * Stages allowed directly after `stage`.
 */
export function successors(
  stage: PipelineStage,
  grammar: TransitionGrammar = DEFAULT_TRANSITIONS
): ReadonlyArray<PipelineStage> {
  return grammar[stage];
}

// ============================================================
// Custom grammars
// ============================================================

const SuccessorList = z
  .array(PipelineStage)
  .refine((stages) => new Set(stages).size === stages.length, "Successor stages must be unique");

export const TransitionGrammarSchema = z
  .object({
    0: SuccessorList,
    1: SuccessorList,
    2: SuccessorList,
    3: SuccessorList,
  })
  .strict();

export class GrammarError extends Error {
  public readonly issues: string[];

  constructor(message: string, issues: string[]) {
    super(message);
    this.name = "GrammarError";
    this.issues = issues;
  }
}

/**
 * Validate a grammar table supplied from outside (JSON, tests, callers).
 *
 * Keys may be numeric or numeric strings, as JSON object keys always are.
 *
 * @throws GrammarError if a stage is missing or a successor is not a stage
 */
export function validateGrammar(input: unknown): TransitionGrammar {
  const result = TransitionGrammarSchema.safeParse(input);
  if (!result.success) {
    const issues = result.error.issues.map(
      (issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`
    );
    throw new GrammarError(`Invalid transition grammar: ${issues.length} issue(s)`, issues);
  }

  const grammar = result.data;
  return Object.freeze({
    0: Object.freeze([...grammar[0]]),
    1: Object.freeze([...grammar[1]]),
    2: Object.freeze([...grammar[2]]),
    3: Object.freeze([...grammar[3]]),
  });
}

/**
 * Whether `to` can be reached from `from` in one or more transitions.
 */
export function canReach(
  from: PipelineStage,
  to: PipelineStage,
  grammar: TransitionGrammar = DEFAULT_TRANSITIONS
): boolean {
  const visited = new Set<PipelineStage>();
  const queue: PipelineStage[] = [...grammar[from]];

  while (queue.length > 0) {
    const stage = queue.shift();
    if (stage === undefined || visited.has(stage)) {
      continue;
    }
    if (stage === to) {
      return true;
    }
    visited.add(stage);
    queue.push(...grammar[stage]);
  }

  return false;
}

/**
 * Render a grammar as "0 → 1, 2, 3" lines, one per stage.
 */
export function formatGrammar(grammar: TransitionGrammar = DEFAULT_TRANSITIONS): string {
  return PIPELINE_STAGES.map((stage) => {
    const next = grammar[stage];
    return `${stage} → ${next.length > 0 ? next.join(", ") : "(terminal)"}`;
  }).join("\n");
}
