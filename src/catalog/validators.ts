/**
 * Catalog lint rules.
 *
 * ═══════════════════════════════════════════════════════════════════════════
 * COMPOSITION CONSTRAINT CHECKS
 * ═══════════════════════════════════════════════════════════════════════════
 *
 * Prerequisites and incompatibilities are resolved by name during pipeline
 * enumeration, and an unresolvable name is never an error there: a missing
 * prerequisite simply can never be satisfied and a missing incompatibility
 * can never collide. These rules surface such cases up front.
 *
 * Every finding is a WARNING. Lint never blocks catalog loading and the
 * enumerator never consults it.
 *
 * USAGE:
 *   const result = lintCatalog(components);
 *   for (const issue of result.issues) {
 *     console.log(formatLintIssue(issue));
 *   }
 */

import type { Component } from "./schema.js";
import { canReach, DEFAULT_TRANSITIONS, type TransitionGrammar } from "../grammar/transitions.js";

export type LintRule =
  | "DANGLING_PREREQUISITE"
  | "DANGLING_INCOMPATIBILITY"
  | "SELF_REFERENCE"
  | "ASYMMETRIC_INCOMPATIBILITY"
  | "UNPLACEABLE_PREREQUISITE";

export interface CatalogLintIssue {
  rule: LintRule;

  /** Component that declares the constraint */
  componentName: string;

  /** Field holding the offending reference */
  field: "prerequisites" | "incompatibleWith";

  /** The referenced name */
  reference: string;

  message: string;

  suggestion: string;
}

export interface CatalogLintResult {
  issues: CatalogLintIssue[];
  warningCount: number;
  /** Components that can never appear in a pipeline */
  unusableComponents: string[];
}

// ═══════════════════════════════════════════════════════════════════════════
// RULES
// ═══════════════════════════════════════════════════════════════════════════

function checkDanglingReferences(
  component: Component,
  names: ReadonlySet<string>
): CatalogLintIssue[] {
  const issues: CatalogLintIssue[] = [];

  for (const prerequisite of component.prerequisites) {
    if (!names.has(prerequisite)) {
      issues.push({
        rule: "DANGLING_PREREQUISITE",
        componentName: component.name,
        field: "prerequisites",
        reference: prerequisite,
        message: `Prerequisite "${prerequisite}" is not in the catalog`,
        suggestion: `Add "${prerequisite}" to the catalog or remove it; "${component.name}" can never appear in a pipeline until then`,
      });
    }
  }

  for (const incompatible of component.incompatibleWith) {
    if (!names.has(incompatible)) {
      issues.push({
        rule: "DANGLING_INCOMPATIBILITY",
        componentName: component.name,
        field: "incompatibleWith",
        reference: incompatible,
        message: `Incompatible component "${incompatible}" is not in the catalog`,
        suggestion: `Remove "${incompatible}" or fix its spelling`,
      });
    }
  }

  return issues;
}

function checkSelfReference(component: Component): CatalogLintIssue[] {
  const issues: CatalogLintIssue[] = [];

  if (component.prerequisites.includes(component.name)) {
    issues.push({
      rule: "SELF_REFERENCE",
      componentName: component.name,
      field: "prerequisites",
      reference: component.name,
      message: "Component lists itself as a prerequisite",
      suggestion: "Remove the self-reference; it can only be satisfied by a repeated component",
    });
  }

  if (component.incompatibleWith.includes(component.name)) {
    issues.push({
      rule: "SELF_REFERENCE",
      componentName: component.name,
      field: "incompatibleWith",
      reference: component.name,
      message: "Component lists itself as incompatible",
      suggestion: "Remove the self-reference; it only prevents the component from repeating",
    });
  }

  return issues;
}

/**
 * Incompatibility is checked when the declaring component is inserted. If B
 * comes first and only A declares the conflict, the pair is still rejected;
 * if A comes first, B is accepted. The declaration should be mirrored.
 */
function checkAsymmetricIncompatibility(
  component: Component,
  byName: ReadonlyMap<string, Component>
): CatalogLintIssue[] {
  const issues: CatalogLintIssue[] = [];

  for (const incompatible of component.incompatibleWith) {
    const other = byName.get(incompatible);
    if (other && other.name !== component.name && !other.incompatibleWith.includes(component.name)) {
      issues.push({
        rule: "ASYMMETRIC_INCOMPATIBILITY",
        componentName: component.name,
        field: "incompatibleWith",
        reference: incompatible,
        message: `"${component.name}" is incompatible with "${incompatible}" but not the other way round`,
        suggestion: `Add "${component.name}" to incompatibleWith of "${incompatible}"`,
      });
    }
  }

  return issues;
}

function checkPlaceablePrerequisites(
  component: Component,
  byName: ReadonlyMap<string, Component>,
  grammar: TransitionGrammar
): CatalogLintIssue[] {
  const issues: CatalogLintIssue[] = [];

  for (const prerequisite of component.prerequisites) {
    const other = byName.get(prerequisite);
    if (!other || other.name === component.name) {
      continue;
    }

    const placeable = other.validStages.some((from) =>
      component.validStages.some((to) => canReach(from, to, grammar))
    );

    if (!placeable) {
      issues.push({
        rule: "UNPLACEABLE_PREREQUISITE",
        componentName: component.name,
        field: "prerequisites",
        reference: prerequisite,
        message: `No stage of "${prerequisite}" (${other.validStages.join(", ")}) can precede a stage of "${component.name}" (${component.validStages.join(", ")})`,
        suggestion: "Widen validStages of either component or drop the prerequisite",
      });
    }
  }

  return issues;
}

// ═══════════════════════════════════════════════════════════════════════════
// ENTRY POINTS
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Run all lint rules over a component list.
 *
 * @param components - Components in catalog order
 * @param grammar - Grammar used for the placement check
 */
export function lintCatalog(
  components: ReadonlyArray<Component>,
  grammar: TransitionGrammar = DEFAULT_TRANSITIONS
): CatalogLintResult {
  const byName = new Map<string, Component>();
  for (const component of components) {
    if (!byName.has(component.name)) {
      byName.set(component.name, component);
    }
  }
  const names: ReadonlySet<string> = new Set(byName.keys());

  const issues: CatalogLintIssue[] = [];
  for (const component of components) {
    issues.push(
      ...checkDanglingReferences(component, names),
      ...checkSelfReference(component),
      ...checkAsymmetricIncompatibility(component, byName),
      ...checkPlaceablePrerequisites(component, byName, grammar)
    );
  }

  const unusable = new Set<string>();
  for (const issue of issues) {
    if (
      issue.field === "prerequisites" &&
      (issue.rule === "DANGLING_PREREQUISITE" || issue.rule === "UNPLACEABLE_PREREQUISITE")
    ) {
      unusable.add(issue.componentName);
    }
  }

  return {
    issues,
    warningCount: issues.length,
    unusableComponents: [...unusable],
  };
}

/**
 * @example Output:
 *   WARNING [DANGLING_PREREQUISITE]: Prerequisite "Foo" is not in the catalog
 *     COMPONENT: Bar (prerequisites)
 *     SUGGESTION: Add "Foo" to the catalog or remove it; ...
 */
export function formatLintIssue(issue: CatalogLintIssue): string {
  return [
    `WARNING [${issue.rule}]: ${issue.message}`,
    `  COMPONENT: ${issue.componentName} (${issue.field})`,
    `  SUGGESTION: ${issue.suggestion}`,
  ].join("\n");
}
