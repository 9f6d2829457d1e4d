/**
 * Tests for the component registry.
 *
 * Run: node --import tsx src/catalog/registry.test.ts
 *
 * Tests cover:
 *   1. Canonical ordering by category, then declaration
 *   2. Name, category and stage indexes
 *   3. Multi-criteria filtering
 *   4. Statistics
 */

import { strict as assert } from "node:assert";

import { ComponentSchema, type ComponentInput } from "./schema.js";
import { ComponentRegistry } from "./registry.js";
import { loadDefaultCatalog } from "./loader.js";

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

function names(list: ReadonlyArray<{ name: string }>): string[] {
  return list.map((c) => c.name);
}

// ═══════════════════════════════════════════════════════════════════════════
// FIXTURES
// ═══════════════════════════════════════════════════════════════════════════

// Declared out of canonical order on purpose
const INPUTS: ComponentInput[] = [
  { category: "entropy_coder", name: "Huffman", validStages: [3] },
  { category: "transform", name: "BWT", validStages: [1] },
  {
    category: "transform",
    name: "MTF",
    validStages: [1, 2],
    parameterRanges: { alphabet_size: [256, 65536] },
    prerequisites: ["BWT"],
  },
  {
    category: "dictionary",
    name: "LZ77",
    validStages: [1],
    parameterRanges: { window_size: [4096, 32768], lookahead_size: [16, 64, 258] },
  },
  { category: "entropy_measure", name: "Shannon Entropy", validStages: [0] },
  { category: "predictor", name: "Quantizer", validStages: [2], lossless: false },
];

const registry = ComponentRegistry.create(INPUTS.map((input) => ComponentSchema.parse(input)));

// ═══════════════════════════════════════════════════════════════════════════
// ORDERING
// ═══════════════════════════════════════════════════════════════════════════

section("Canonical Order");

test("components are ordered by category, then declaration", () => {
  assert.deepEqual(names(registry.components), [
    "Shannon Entropy",
    "BWT",
    "MTF",
    "Quantizer",
    "LZ77",
    "Huffman",
  ]);
});

test("size counts every component", () => {
  assert.equal(registry.size, 6);
});

test("categories are listed in canonical order, empty ones omitted", () => {
  assert.deepEqual(registry.getCategories(), [
    "entropy_measure",
    "transform",
    "predictor",
    "dictionary",
    "entropy_coder",
  ]);
});

test("stages with components are listed ascending", () => {
  assert.deepEqual(registry.getStages(), [0, 1, 2, 3]);
});

test("registry and its lists are frozen", () => {
  assert.ok(Object.isFrozen(registry.components));
  assert.ok(Object.isFrozen(registry.getByStage(1)));
  assert.ok(registry.components.every((c) => Object.isFrozen(c)));
});

test("hand-built components are frozen all the way down", () => {
  const mtf = registry.getByName("MTF");
  assert.ok(mtf);
  assert.throws(() => Reflect.apply(Array.prototype.push, mtf.prerequisites, ["Nowhere"]), TypeError);
  assert.deepEqual(mtf.prerequisites, ["BWT"]);
  assert.ok(Object.isFrozen(mtf.validStages));
  assert.ok(Object.isFrozen(mtf.incompatibleWith));
  assert.ok(Object.isFrozen(mtf.parameterRanges.alphabet_size));
  assert.equal(Reflect.set(mtf.parameterRanges, "extra", [1]), false);
});

// ═══════════════════════════════════════════════════════════════════════════
// INDEXES
// ═══════════════════════════════════════════════════════════════════════════

section("Indexes");

test("lookup by name", () => {
  assert.equal(registry.getByName("LZ77")?.category, "dictionary");
  assert.equal(registry.getByName("Deflate"), undefined);
  assert.equal(registry.has("MTF"), true);
  assert.equal(registry.has("mtf"), false);
});

test("lookup by category", () => {
  assert.deepEqual(names(registry.getByCategory("transform")), ["BWT", "MTF"]);
  assert.deepEqual(registry.getByCategory("filter"), []);
});

test("a component valid in several stages appears in each", () => {
  assert.deepEqual(names(registry.getByStage(1)), ["BWT", "MTF", "LZ77"]);
  assert.deepEqual(names(registry.getByStage(2)), ["MTF", "Quantizer"]);
  assert.deepEqual(names(registry.getByStage(3)), ["Huffman"]);
});

test("stage lookups return shared instances", () => {
  assert.equal(registry.getByStage(1)[1], registry.getByName("MTF"));
  assert.equal(registry.getByStage(2)[0], registry.getByName("MTF"));
});

test("duplicate names resolve to the first in canonical order", () => {
  const dup = ComponentRegistry.create(
    [
      { category: "entropy_coder", name: "Same", validStages: [3] },
      { category: "transform", name: "Same", validStages: [1] },
    ].map((input) => ComponentSchema.parse(input))
  );
  assert.equal(dup.getByName("Same")?.category, "transform");
  assert.equal(dup.size, 2);
});

// ═══════════════════════════════════════════════════════════════════════════
// FILTERING
// ═══════════════════════════════════════════════════════════════════════════

section("Filtering");

test("stage and parameter filters combine", () => {
  assert.deepEqual(names(registry.filter({ stage: 1, hasParameters: true })), ["MTF", "LZ77"]);
});

test("components without parameters", () => {
  assert.deepEqual(names(registry.filter({ hasParameters: false, stage: 1 })), ["BWT"]);
});

test("lossless filter", () => {
  assert.deepEqual(names(registry.filter({ lossless: false })), ["Quantizer"]);
});

test("name search is case-insensitive", () => {
  assert.deepEqual(names(registry.filter({ nameContains: "lz" })), ["LZ77"]);
  assert.deepEqual(names(registry.filter({ nameContains: "ENTROPY" })), ["Shannon Entropy"]);
});

test("category filter", () => {
  assert.deepEqual(names(registry.filter({ category: "entropy_coder" })), ["Huffman"]);
});

test("empty filter returns everything", () => {
  assert.equal(registry.filter({}).length, 6);
});

// ═══════════════════════════════════════════════════════════════════════════
// STATISTICS
// ═══════════════════════════════════════════════════════════════════════════

section("Statistics");

test("counts per category and stage", () => {
  const stats = registry.getStats();
  assert.equal(stats.totalComponents, 6);
  assert.equal(stats.byCategory.transform, 2);
  assert.equal(stats.byCategory.filter, 0);
  assert.deepEqual(stats.byStage, { 0: 1, 1: 3, 2: 2, 3: 1 });
});

test("variation total is the sum of parameter products", () => {
  // 1 + 1 + 2 + 1 + (2 × 3) + 1
  assert.equal(registry.getStats().totalVariations, 12);
});

test("parametric and constrained counts", () => {
  const stats = registry.getStats();
  assert.equal(stats.parametricComponents, 2);
  assert.equal(stats.constrainedComponents, 1);
});

section("Bundled Catalog");

test("bundled catalog indexes every component", () => {
  const bundled = ComponentRegistry.create(loadDefaultCatalog().components);
  const stats = bundled.getStats();
  assert.equal(stats.totalComponents, 53);
  assert.equal(
    Object.values(stats.byCategory).reduce((sum, n) => sum + n, 0),
    53
  );
  assert.deepEqual(stats.byStage, { 0: 10, 1: 15, 2: 22, 3: 19 });
});

// ═══════════════════════════════════════════════════════════════════════════
// RESULTS
// ═══════════════════════════════════════════════════════════════════════════

console.log(`\n${passed} passed, ${failed} failed`);

if (failed > 0) {
  process.exit(1);
}
