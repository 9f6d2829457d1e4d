/**
 * Tests for the pipeline enumerator.
 *
 * Run: node --import tsx src/grammar/enumerator.test.ts
 *
 * Tests cover:
 *   1. Small hand-built catalogs with exact expected output
 *   2. Prerequisites and incompatibilities
 *   3. Depth bounds and the terminal-category requirement
 *   4. Option validation
 *   5. Structural properties over the bundled catalog
 */

import { strict as assert } from "node:assert";

import { ComponentSchema, type ComponentInput } from "../catalog/schema.js";
import { ComponentRegistry } from "../catalog/registry.js";
import { loadDefaultCatalog } from "../catalog/loader.js";
import { TERMINAL_CATEGORY } from "../catalog/enums.js";
import {
  enumeratePipelines,
  countPipelines,
  pipelineNames,
  EnumerationOptionsError,
  type EnumerationOptions,
  type Pipeline,
} from "./enumerator.js";
import { DEFAULT_TRANSITIONS, START_STAGES, validateGrammar } from "./transitions.js";

// ═══════════════════════════════════════════════════════════════════════════
// TEST HELPERS
// ═══════════════════════════════════════════════════════════════════════════

let passed = 0;
let failed = 0;

function test(name: string, fn: () => void): void {
  try {
    fn();
    passed++;
    console.log(`  ✓ ${name}`);
  } catch (err) {
    failed++;
    console.error(`  ✗ ${name}`);
    console.error(`    ${err instanceof Error ? err.message : String(err)}`);
  }
}

function section(title: string): void {
  console.log(`\n── ${title} ──`);
}

function makeRegistry(inputs: ComponentInput[]): ComponentRegistry {
  return ComponentRegistry.create(inputs.map((input) => ComponentSchema.parse(input)));
}

function names(registry: ComponentRegistry, options: EnumerationOptions = {}): string[] {
  return [...enumeratePipelines(registry, options)].map((p) => pipelineNames(p).join(","));
}

// ═══════════════════════════════════════════════════════════════════════════
// FIXTURES
// ═══════════════════════════════════════════════════════════════════════════

/** Filter → Transform → Entropy coder, over a narrowed grammar */
const FTE = makeRegistry([
  { category: "filter", name: "F", validStages: [0] },
  { category: "transform", name: "T", validStages: [1] },
  { category: "entropy_coder", name: "E", validStages: [3] },
]);

const FTE_GRAMMAR = validateGrammar({ 0: [1, 3], 1: [3], 2: [], 3: [] });

/** B refuses to follow A; C accepts anything */
const INCOMPATIBLE = makeRegistry([
  { category: "transform", name: "A", validStages: [1] },
  { category: "entropy_coder", name: "B", validStages: [3], incompatibleWith: ["A"] },
  { category: "entropy_coder", name: "C", validStages: [3] },
]);

/** A and B share stage 2; only B declares the conflict */
const SAME_STAGE = makeRegistry([
  { category: "context_model", name: "A", validStages: [2] },
  { category: "context_model", name: "B", validStages: [2], incompatibleWith: ["A"] },
  { category: "entropy_coder", name: "E", validStages: [3] },
]);

/** MTF needs BWT earlier in the pipeline and may repeat under modeling */
const PREREQ = makeRegistry([
  { category: "transform", name: "BWT", validStages: [1] },
  { category: "transform", name: "MTF", validStages: [1, 2], prerequisites: ["BWT"] },
  { category: "entropy_coder", name: "Huff", validStages: [3] },
]);

// ═══════════════════════════════════════════════════════════════════════════
// EXACT OUTPUT
// ═══════════════════════════════════════════════════════════════════════════

section("Exact Output: Narrowed Grammar");

test("filter/transform/coder catalog yields three pipelines", () => {
  const result = names(FTE, { grammar: FTE_GRAMMAR });
  assert.deepEqual(new Set(result), new Set(["F,E", "F,T,E", "T,E"]));
  assert.equal(result.length, 3);
});

test("pipelines are emitted depth-first in grammar and catalog order", () => {
  assert.deepEqual(names(FTE, { grammar: FTE_GRAMMAR }), ["F,T,E", "F,E", "T,E"]);
});

test("each entry records the stage it was inserted under", () => {
  const [first] = [...enumeratePipelines(FTE, { grammar: FTE_GRAMMAR })];
  assert.ok(first);
  assert.deepEqual(
    first.map((entry) => entry.stage),
    [0, 1, 3]
  );
});

test("default grammar adds nothing for this catalog", () => {
  // 0 → 1, 2, 3 and 1 → 2, 3; stage 2 is empty here
  assert.deepEqual(names(FTE), ["F,T,E", "F,E", "T,E"]);
});

// ═══════════════════════════════════════════════════════════════════════════
// CONSTRAINTS
// ═══════════════════════════════════════════════════════════════════════════

section("Constraints: Incompatibility");

test("incompatible component is never inserted after its conflict", () => {
  assert.deepEqual(names(INCOMPATIBLE), ["A,C"]);
});

test("when A can only come first, no pipeline contains both A and B", () => {
  for (const pipeline of enumeratePipelines(INCOMPATIBLE, { requireTerminalCategory: false })) {
    const set = new Set(pipelineNames(pipeline));
    assert.ok(!(set.has("A") && set.has("B")), pipelineNames(pipeline).join(","));
  }
});

test("declaring component is never inserted after its conflict", () => {
  for (const pipeline of enumeratePipelines(SAME_STAGE, { maxDepth: 3 })) {
    const order = pipelineNames(pipeline);
    const a = order.indexOf("A");
    assert.ok(a === -1 || !order.slice(a + 1).includes("B"), order.join(","));
  }
});

test("conflict is checked against the prefix only, so B may precede A", () => {
  assert.deepEqual(names(SAME_STAGE, { maxDepth: 3 }), [
    "A,A,E",
    "A,E",
    "B,A,E",
    "B,B,E",
    "B,E",
  ]);
});

section("Constraints: Prerequisites");

test("prerequisite must appear earlier; repeats allowed under stage 2", () => {
  assert.deepEqual(names(PREREQ, { maxDepth: 4 }), [
    "BWT,MTF,MTF,Huff",
    "BWT,MTF,Huff",
    "BWT,Huff",
  ]);
});

test("component with a prerequisite never starts a pipeline", () => {
  for (const pipeline of enumeratePipelines(PREREQ, { maxDepth: 4 })) {
    assert.notEqual(pipeline[0]?.component.name, "MTF");
  }
});

test("unknown prerequisite makes a component unusable, not an error", () => {
  const registry = makeRegistry([
    { category: "transform", name: "X", validStages: [1], prerequisites: ["Nowhere"] },
    { category: "entropy_coder", name: "E", validStages: [3] },
  ]);
  assert.deepEqual(names(registry), []);
});

test("unknown incompatibility never blocks anything", () => {
  const registry = makeRegistry([
    { category: "transform", name: "X", validStages: [1], incompatibleWith: ["Nowhere"] },
    { category: "entropy_coder", name: "E", validStages: [3] },
  ]);
  assert.deepEqual(names(registry), ["X,E"]);
});

// ═══════════════════════════════════════════════════════════════════════════
// DEPTH AND TERMINATION
// ═══════════════════════════════════════════════════════════════════════════

section("Depth Bounds");

test("maxDepth cuts longer pipelines", () => {
  assert.deepEqual(names(PREREQ, { maxDepth: 3 }), ["BWT,MTF,Huff", "BWT,Huff"]);
});

test("minDepth drops shorter pipelines", () => {
  assert.deepEqual(names(PREREQ, { minDepth: 3, maxDepth: 4 }), [
    "BWT,MTF,MTF,Huff",
    "BWT,MTF,Huff",
  ]);
});

test("minDepth equal to maxDepth emits a single length", () => {
  assert.deepEqual(names(PREREQ, { minDepth: 2, maxDepth: 2 }), ["BWT,Huff"]);
});

section("Terminal Category");

test("without the terminal requirement, prefixes are emitted too", () => {
  assert.deepEqual(names(PREREQ, { maxDepth: 3, requireTerminalCategory: false }), [
    "BWT,MTF",
    "BWT,MTF,MTF",
    "BWT,MTF,Huff",
    "BWT,Huff",
  ]);
});

test("countPipelines matches the number of emitted pipelines", () => {
  assert.equal(countPipelines(PREREQ, { maxDepth: 4 }), 3);
  assert.equal(countPipelines(PREREQ, { maxDepth: 3, requireTerminalCategory: false }), 4);
});

test("empty registry yields nothing", () => {
  assert.equal(countPipelines(makeRegistry([])), 0);
});

// ═══════════════════════════════════════════════════════════════════════════
// OPTIONS
// ═══════════════════════════════════════════════════════════════════════════

section("Option Validation");

test("minDepth above maxDepth throws at the call", () => {
  assert.throws(() => enumeratePipelines(PREREQ, { minDepth: 5, maxDepth: 2 }), EnumerationOptionsError);
});

test("non-integer depth throws", () => {
  assert.throws(() => enumeratePipelines(PREREQ, { maxDepth: 2.5 }), EnumerationOptionsError);
});

test("zero minDepth throws with the field in the issue", () => {
  try {
    enumeratePipelines(PREREQ, { minDepth: 0 });
    assert.fail("expected EnumerationOptionsError");
  } catch (err) {
    assert.ok(err instanceof EnumerationOptionsError);
    assert.equal(err.issues.length, 1);
    assert.ok(err.issues[0]?.startsWith("minDepth: "));
  }
});

test("custom start stages restrict the first element", () => {
  assert.deepEqual(names(FTE, { grammar: FTE_GRAMMAR, startStages: [1] }), ["T,E"]);
});

// ═══════════════════════════════════════════════════════════════════════════
// BUNDLED CATALOG PROPERTIES
// ═══════════════════════════════════════════════════════════════════════════

section("Bundled Catalog: maxDepth 3");

const bundled = ComponentRegistry.create(loadDefaultCatalog().components);
const bundledPipelines: Pipeline[] = [...enumeratePipelines(bundled, { maxDepth: 3 })];

test("enumeration produces pipelines", () => {
  assert.ok(bundledPipelines.length > 0);
});

test("every pipeline respects depth bounds and ends in an entropy coder", () => {
  for (const pipeline of bundledPipelines) {
    assert.ok(pipeline.length >= 2 && pipeline.length <= 3);
    assert.equal(pipeline[pipeline.length - 1]?.component.category, TERMINAL_CATEGORY);
  }
});

test("every pipeline follows the grammar from a start stage", () => {
  for (const pipeline of bundledPipelines) {
    const [first] = pipeline;
    assert.ok(first && START_STAGES.includes(first.stage));
    pipeline.forEach((entry, i) => {
      assert.ok(entry.component.validStages.includes(entry.stage));
      const previous = pipeline[i - 1];
      if (previous) {
        assert.ok(DEFAULT_TRANSITIONS[previous.stage].includes(entry.stage));
      }
    });
  }
});

test("prerequisites always precede their dependents", () => {
  for (const pipeline of bundledPipelines) {
    pipeline.forEach((entry, i) => {
      const before = new Set(pipeline.slice(0, i).map((e) => e.component.name));
      for (const prerequisite of entry.component.prerequisites) {
        assert.ok(before.has(prerequisite), `${entry.component.name} before ${prerequisite}`);
      }
    });
  }
});

test("Move-to-Front never starts a pipeline", () => {
  for (const pipeline of bundledPipelines) {
    assert.notEqual(pipeline[0]?.component.name, "Move-to-Front Transform");
  }
});

test("enumeration is deterministic", () => {
  const again = [...enumeratePipelines(bundled, { maxDepth: 3 })];
  assert.deepEqual(
    again.map((p) => pipelineNames(p).join(" → ")),
    bundledPipelines.map((p) => pipelineNames(p).join(" → "))
  );
});

test("emitted pipelines are frozen", () => {
  const [first] = bundledPipelines;
  assert.ok(first && Object.isFrozen(first));
});

test("consumer can stop early", () => {
  const generator = enumeratePipelines(bundled);
  const first = generator.next();
  assert.equal(first.done, false);
  generator.return(undefined);
  assert.equal(generator.next().done, true);
});

// ═══════════════════════════════════════════════════════════════════════════
// RESULTS
// ═══════════════════════════════════════════════════════════════════════════

console.log(`\n${passed} passed, ${failed} failed`);

if (failed > 0) {
  process.exit(1);
}
