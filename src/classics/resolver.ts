/**
 * Classic binding loader and resolver.
 */

import { readFileSync } from "node:fs";
import { fileURLToPath } from "node:url";
import type { ZodIssue } from "zod";
import type { Component } from "../catalog/schema.js";
import { combineComplexity } from "../grammar/complexity.js";
import { PIPELINE_SEPARATOR } from "../grammar/summary.js";
import { ClassicBindingFileSchema, type ClassicBinding } from "./schema.js";

/** The bindings shipped with this package */
export const DEFAULT_CLASSICS_PATH = fileURLToPath(
  new URL("../../catalog/classic-algorithms.json", import.meta.url)
);

/**
 * Raised for a malformed bindings file. Unknown component names are not
 * errors and never raise this.
 */
export class ClassicBindingError extends Error {
  public readonly issues: ZodIssue[];

  constructor(message: string, issues: ZodIssue[] = []) {
    super(message);
    this.name = "ClassicBindingError";
    this.issues = issues;
  }

  format(): string {
    const lines = [this.message];
    for (const issue of this.issues) {
      lines.push(`  - ${issue.path.join(".") || "(root)"}: ${issue.message}`);
    }
    return lines.join("\n");
  }
}

/**
 * Anything classic names can be resolved against (usually a ComponentRegistry).
 */
export interface NameIndex {
  getByName(name: string): Readonly<Component> | undefined;
}

export interface ResolvedClassic {
  algorithmName: string;
  /** Names as listed in the binding, resolved or not */
  requestedNames: ReadonlyArray<string>;
  /** Resolved components, in binding order */
  components: ReadonlyArray<Readonly<Component>>;
  /** Names the index did not know */
  missingNames: ReadonlyArray<string>;
}

export interface ClassicSummary {
  algorithmName: string;
  requestedNames: string[];
  componentNames: string[];
  formula: string;
  combinedDescription: string;
  totalTimeCost: string;
  totalSpaceCost: string;
  numStages: number;
}

/**
 * Validate a raw bindings object.
 *
 * @throws ClassicBindingError if the object does not match the schema
 */
export function loadClassicBindings(input: unknown): ReadonlyArray<ClassicBinding> {
  const result = ClassicBindingFileSchema.safeParse(input);
  if (!result.success) {
    throw new ClassicBindingError(
      `Classic bindings validation failed: ${result.error.issues.length} error(s)`,
      result.error.issues
    );
  }
  return Object.freeze(result.data.bindings.map((binding) => Object.freeze(binding)));
}

/**
 * Read and validate a bindings JSON file.
 *
 * @throws ClassicBindingError if the file cannot be read, parsed or validated
 */
export function loadClassicBindingsFile(path: string): ReadonlyArray<ClassicBinding> {
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(path, "utf-8"));
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new ClassicBindingError(`Cannot load classic bindings from ${path}: ${reason}`);
  }
  return loadClassicBindings(raw);
}

export function loadDefaultClassicBindings(): ReadonlyArray<ClassicBinding> {
  return loadClassicBindingsFile(DEFAULT_CLASSICS_PATH);
}

/**
 * Resolve one binding. Unknown names are recorded in missingNames.
 */
export function resolveClassicBinding(index: NameIndex, binding: ClassicBinding): ResolvedClassic {
  const components: Readonly<Component>[] = [];
  const missingNames: string[] = [];

  for (const name of binding.componentNames) {
    const component = index.getByName(name);
    if (component) {
      components.push(component);
    } else {
      missingNames.push(name);
    }
  }

  return Object.freeze({
    algorithmName: binding.algorithmName,
    requestedNames: Object.freeze([...binding.componentNames]),
    components: Object.freeze(components),
    missingNames: Object.freeze(missingNames),
  });
}

/**
 * Resolve every binding, dropping those with no resolvable component.
 */
export function resolveClassicBindings(
  index: NameIndex,
  bindings: ReadonlyArray<ClassicBinding>
): ResolvedClassic[] {
  return bindings
    .map((binding) => resolveClassicBinding(index, binding))
    .filter((resolved) => resolved.components.length > 0);
}

export function summarizeClassic(resolved: ResolvedClassic): ClassicSummary {
  const { components } = resolved;
  return {
    algorithmName: resolved.algorithmName,
    requestedNames: [...resolved.requestedNames],
    componentNames: components.map((c) => c.name),
    formula: components.map((c) => c.formulaAscii).join(PIPELINE_SEPARATOR),
    combinedDescription: components.map((c) => c.description).join("; "),
    totalTimeCost: combineComplexity(components.map((c) => c.timeCost)),
    totalSpaceCost: combineComplexity(components.map((c) => c.spaceCost)),
    numStages: components.length,
  };
}
