/**
 * Parametric variation expander.
 *
 * A variation is one concrete parameter assignment for a component, drawn
 * from the Cartesian product of its declared parameter ranges:
 *
 *   { window_size: [4096, 8192], lookahead_size: [16, 32] }
 *     → { window_size: 4096, lookahead_size: 16 }
 *     → { window_size: 4096, lookahead_size: 32 }
 *     → { window_size: 8192, lookahead_size: 16 }
 *     → { window_size: 8192, lookahead_size: 32 }
 *
 * The last-declared parameter varies fastest. A component without ranges has
 * exactly one variation with an empty assignment.
 *
 * Expansion is lazy and restartable: every call returns a fresh generator and
 * no state is shared between calls.
 */

import type { Component, ParameterValue } from "../catalog/schema.js";

export interface Variation {
  /** The catalog-owned component (shared, never copied) */
  readonly component: Readonly<Component>;
  /** Parameter name → value, in declaration order */
  readonly params: Readonly<Record<string, ParameterValue>>;
}

/**
 * Raised when a component reaches the expander with a range that cannot be
 * expanded. The catalog loader rejects such components earlier; this covers
 * hand-built components.
 */
export class VariationError extends Error {
  public readonly componentName: string;
  public readonly parameter: string;

  constructor(componentName: string, parameter: string, message: string) {
    super(`${componentName}.${parameter}: ${message}`);
    this.name = "VariationError";
    this.componentName = componentName;
    this.parameter = parameter;
  }
}

type Range = readonly [name: string, values: ReadonlyArray<ParameterValue>];

function* product(
  ranges: ReadonlyArray<Range>,
  depth: number,
  prefix: Array<[string, ParameterValue]>
): Generator<Array<[string, ParameterValue]>> {
  const current = ranges[depth];
  if (current === undefined) {
    yield [...prefix];
    return;
  }

  const [name, values] = current;
  for (const value of values) {
    prefix.push([name, value]);
    yield* product(ranges, depth + 1, prefix);
    prefix.pop();
  }
}

/**
 * Expand one component into all of its variations.
 *
 * @throws VariationError if a parameter declares an empty range
 *
 * @example
 *   for (const { params } of expandVariations(lz77)) {
 *     console.log(params.window_size, params.lookahead_size);
 *   }
 */
export function* expandVariations(component: Readonly<Component>): Generator<Variation> {
  const ranges: Range[] = Object.entries(component.parameterRanges);

  for (const [name, values] of ranges) {
    if (values.length === 0) {
      throw new VariationError(component.name, name, "parameter range is empty");
    }
  }

  if (ranges.length === 0) {
    yield Object.freeze({ component, params: Object.freeze({}) });
    return;
  }

  for (const assignment of product(ranges, 0, [])) {
    yield Object.freeze({
      component,
      params: Object.freeze(Object.fromEntries(assignment)),
    });
  }
}

/**
 * Number of variations a component expands to, without expanding it.
 */
export function countVariations(component: Readonly<Component>): number {
  return Object.values(component.parameterRanges).reduce(
    (total, values) => total * values.length,
    1
  );
}

/**
 * Expand every component of a sequence, in order.
 */
export function* expandCatalog(
  components: Iterable<Readonly<Component>>
): Generator<Variation> {
  for (const component of components) {
    yield* expandVariations(component);
  }
}
