/**
 * Pipeline enumerator.
 *
 * ═══════════════════════════════════════════════════════════════════════════
 * BOUNDED DEPTH-FIRST SEARCH OVER THE STAGE GRAMMAR
 * ═══════════════════════════════════════════════════════════════════════════
 *
 * A pipeline is an ordered list of components, each tagged with the stage it
 * was inserted under. The search extends a partial pipeline one component at
 * a time:
 *
 *   search(partial, stage):
 *     1. length ≥ minDepth → emit a frozen copy, if the last component is an
 *        entropy coder or terminal completion is not required. Emission does
 *        not end the branch; longer pipelines share the prefix.
 *     2. length ≥ maxDepth → return.
 *     3. for each next stage allowed by the grammar, for each component of
 *        that stage in catalog order:
 *          - skip if a prerequisite is not already in the pipeline
 *          - skip if an incompatible component is already in the pipeline
 *          - push, recurse, pop
 *
 * The search starts from every component of stages 0, 1 and 2, in that
 * order. Output order depends only on catalog order, the options and the
 * grammar, so two runs over the same inputs emit identical sequences.
 *
 * Constraints are checked once, when a component is inserted, against the
 * pipeline built so far. A name that is not in the catalog is never an
 * error: as a prerequisite it can never be met, as an incompatibility it can
 * never collide.
 *
 * Enumeration is lazy. The consumer drives it by pulling from the generator
 * and stops it by no longer pulling.
 */

import { z } from "zod";
import type { Component } from "../catalog/schema.js";
import type { StageIndex } from "../catalog/registry.js";
import { PipelineStage, TERMINAL_CATEGORY } from "../catalog/enums.js";
import {
  DEFAULT_TRANSITIONS,
  START_STAGES,
  successors,
  type TransitionGrammar,
} from "./transitions.js";

/** Upper bound used when no maxDepth is given */
export const DEFAULT_MAX_DEPTH = 6;

export const DEFAULT_MIN_DEPTH = 2;

export interface PipelineEntry {
  readonly component: Readonly<Component>;
  /** Stage this component was inserted under */
  readonly stage: PipelineStage;
}

export type Pipeline = ReadonlyArray<PipelineEntry>;

export const EnumerationOptionsSchema = z
  .object({
    minDepth: z.number().int().min(1).default(DEFAULT_MIN_DEPTH),
    maxDepth: z.number().int().min(1).default(DEFAULT_MAX_DEPTH),
    /** Accept only pipelines whose last component is an entropy coder */
    requireTerminalCategory: z.boolean().default(true),
    startStages: z.array(PipelineStage).default([...START_STAGES]),
  })
  .strict()
  .refine((options) => options.minDepth <= options.maxDepth, {
    message: "minDepth must be <= maxDepth",
    path: ["minDepth"],
  });

export type EnumerationSettings = z.infer<typeof EnumerationOptionsSchema>;

export interface EnumerationOptions extends Partial<EnumerationSettings> {
  /** Stage table to search over (validated separately, see validateGrammar) */
  grammar?: TransitionGrammar;
}

export class EnumerationOptionsError extends Error {
  public readonly issues: string[];

  constructor(message: string, issues: string[]) {
    super(message);
    this.name = "EnumerationOptionsError";
    this.issues = issues;
  }
}

/**
 * Validate enumeration options and apply defaults.
 *
 * @throws EnumerationOptionsError on non-integer depths, minDepth > maxDepth
 *         or unknown start stages
 */
export function resolveEnumerationOptions(
  options: EnumerationOptions = {}
): EnumerationSettings & { grammar: TransitionGrammar } {
  const { grammar = DEFAULT_TRANSITIONS, ...settings } = options;

  const result = EnumerationOptionsSchema.safeParse(settings);
  if (!result.success) {
    const issues = result.error.issues.map(
      (issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`
    );
    throw new EnumerationOptionsError(
      `Invalid enumeration options: ${issues.join("; ")}`,
      issues
    );
  }

  return { ...result.data, grammar };
}

/**
 * Enumerate every valid pipeline.
 *
 * @param source - Stage index to draw candidates from (usually a ComponentRegistry)
 * @param options - Depth bounds, terminal requirement, grammar
 * @returns Lazy sequence of frozen pipelines
 * @throws EnumerationOptionsError when called with invalid options
 *
 * @example
 *   const registry = ComponentRegistry.create(loadDefaultCatalog().components);
 *   for (const pipeline of enumeratePipelines(registry, { maxDepth: 3 })) {
 *     console.log(pipeline.map((entry) => entry.component.name).join(" → "));
 *   }
 */
export function enumeratePipelines(
  source: StageIndex,
  options: EnumerationOptions = {}
): Generator<Pipeline> {
  // Resolved here so invalid options throw at the call, not on first pull
  return generate(source, resolveEnumerationOptions(options));
}

function* generate(
  source: StageIndex,
  settings: EnumerationSettings & { grammar: TransitionGrammar }
): Generator<Pipeline> {
  const { minDepth, maxDepth, requireTerminalCategory, startStages, grammar } = settings;

  const partial: PipelineEntry[] = [];
  // Multiset of names in `partial`; components may repeat under stage 2 → 2
  const nameCounts = new Map<string, number>();

  function push(entry: PipelineEntry): void {
    partial.push(entry);
    nameCounts.set(entry.component.name, (nameCounts.get(entry.component.name) ?? 0) + 1);
  }

  function pop(): void {
    const entry = partial.pop();
    if (entry === undefined) {
      return;
    }
    const remaining = (nameCounts.get(entry.component.name) ?? 0) - 1;
    if (remaining > 0) {
      nameCounts.set(entry.component.name, remaining);
    } else {
      nameCounts.delete(entry.component.name);
    }
  }

  function admits(candidate: Readonly<Component>): boolean {
    for (const prerequisite of candidate.prerequisites) {
      if (!nameCounts.has(prerequisite)) {
        return false;
      }
    }
    for (const incompatible of candidate.incompatibleWith) {
      if (nameCounts.has(incompatible)) {
        return false;
      }
    }
    return true;
  }

  function* search(currentStage: PipelineStage): Generator<Pipeline> {
    if (partial.length >= minDepth) {
      const last = partial[partial.length - 1];
      if (!requireTerminalCategory || last?.component.category === TERMINAL_CATEGORY) {
        yield Object.freeze([...partial]);
      }
    }

    if (partial.length >= maxDepth) {
      return;
    }

    for (const nextStage of successors(currentStage, grammar)) {
      for (const candidate of source.getByStage(nextStage)) {
        if (!admits(candidate)) {
          continue;
        }
        push(Object.freeze({ component: candidate, stage: nextStage }));
        yield* search(nextStage);
        pop();
      }
    }
  }

  for (const startStage of startStages) {
    for (const component of source.getByStage(startStage)) {
      // A starting component has an empty prefix: any prerequisite rejects it
      if (!admits(component)) {
        continue;
      }
      push(Object.freeze({ component, stage: startStage }));
      yield* search(startStage);
      pop();
    }
  }
}

/**
 * Count pipelines without retaining them.
 */
export function countPipelines(source: StageIndex, options: EnumerationOptions = {}): number {
  let count = 0;
  for (const _pipeline of enumeratePipelines(source, options)) {
    count++;
  }
  return count;
}

/**
 * Component names of a pipeline, in order.
 */
export function pipelineNames(pipeline: Pipeline): string[] {
  return pipeline.map((entry) => entry.component.name);
}
