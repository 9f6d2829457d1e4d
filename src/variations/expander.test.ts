/**
 * Tests for parametric variation expansion.
 *
 * Run: node --import tsx src/variations/expander.test.ts
 */

import { strict as assert } from "node:assert";

import { ComponentSchema } from "../catalog/schema.js";
import { loadDefaultCatalog } from "../catalog/loader.js";
import { expandVariations, expandCatalog, countVariations, VariationError } from "./expander.js";

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

// ═══════════════════════════════════════════════════════════════════════════
// FIXTURES
// ═══════════════════════════════════════════════════════════════════════════

const lz77 = ComponentSchema.parse({
  category: "dictionary",
  name: "LZ77",
  parameterRanges: { window_size: [4096, 8192], lookahead_size: [16, 32] },
  validStages: [1],
});

const huffman = ComponentSchema.parse({
  category: "entropy_coder",
  name: "Huffman",
  validStages: [3],
});

const rice = ComponentSchema.parse({
  category: "integer_coder",
  name: "Rice",
  parameterRanges: { k: [0, 1, 2, "adaptive"] },
  validStages: [3],
});

// ═══════════════════════════════════════════════════════════════════════════
// EXPANSION
// ═══════════════════════════════════════════════════════════════════════════

section("expandVariations");

test("cartesian product with the last parameter varying fastest", () => {
  const params = [...expandVariations(lz77)].map((v) => v.params);
  assert.deepEqual(params, [
    { window_size: 4096, lookahead_size: 16 },
    { window_size: 4096, lookahead_size: 32 },
    { window_size: 8192, lookahead_size: 16 },
    { window_size: 8192, lookahead_size: 32 },
  ]);
});

test("parameter keys keep declaration order", () => {
  const [first] = [...expandVariations(lz77)];
  assert.deepEqual(Object.keys(first?.params ?? {}), ["window_size", "lookahead_size"]);
});

test("component without ranges has one empty variation", () => {
  const variations = [...expandVariations(huffman)];
  assert.equal(variations.length, 1);
  assert.deepEqual(variations[0]?.params, {});
});

test("mixed value types are kept as declared", () => {
  assert.deepEqual(
    [...expandVariations(rice)].map((v) => v.params.k),
    [0, 1, 2, "adaptive"]
  );
});

test("variations share the catalog component", () => {
  for (const variation of expandVariations(lz77)) {
    assert.equal(variation.component, lz77);
  }
});

test("variations and their params are frozen", () => {
  const [first] = [...expandVariations(lz77)];
  assert.ok(first && Object.isFrozen(first) && Object.isFrozen(first.params));
});

test("expansion is restartable", () => {
  const a = [...expandVariations(lz77)].map((v) => JSON.stringify(v.params));
  const b = [...expandVariations(lz77)].map((v) => JSON.stringify(v.params));
  assert.deepEqual(a, b);
});

test("empty range throws VariationError on first pull", () => {
  const broken = { ...huffman, parameterRanges: { table_bits: [] } };
  const generator = expandVariations(broken);
  assert.throws(
    () => generator.next(),
    (err: unknown) =>
      err instanceof VariationError &&
      err.message === "Huffman.table_bits: parameter range is empty" &&
      err.componentName === "Huffman" &&
      err.parameter === "table_bits"
  );
});

// ═══════════════════════════════════════════════════════════════════════════
// COUNTING AND CATALOG EXPANSION
// ═══════════════════════════════════════════════════════════════════════════

section("countVariations / expandCatalog");

test("count is the product of range sizes", () => {
  assert.equal(countVariations(lz77), 4);
  assert.equal(countVariations(huffman), 1);
  assert.equal(countVariations(rice), 4);
});

test("count matches expansion", () => {
  for (const component of [lz77, huffman, rice]) {
    assert.equal([...expandVariations(component)].length, countVariations(component));
  }
});

test("catalog expansion keeps component order", () => {
  const order = [...expandCatalog([huffman, lz77])].map((v) => v.component.name);
  assert.deepEqual(order, ["Huffman", "LZ77", "LZ77", "LZ77", "LZ77"]);
});

test("bundled catalog expands to 279 variations", () => {
  const { components } = loadDefaultCatalog();
  let total = 0;
  for (const _variation of expandCatalog(components)) {
    total++;
  }
  assert.equal(total, 279);
  assert.equal(
    components.reduce((sum, c) => sum + countVariations(c), 0),
    279
  );
});

test("bundled catalog configurations are distinct per component", () => {
  const { components } = loadDefaultCatalog();
  for (const component of components) {
    const seen = new Set<string>();
    for (const variation of expandVariations(component)) {
      seen.add(JSON.stringify(variation.params));
    }
    assert.equal(seen.size, countVariations(component), component.name);
  }
});

// ═══════════════════════════════════════════════════════════════════════════
// RESULTS
// ═══════════════════════════════════════════════════════════════════════════

console.log(`\n${passed} passed, ${failed} failed`);

if (failed > 0) {
  process.exit(1);
}
