/**
 * Tests for classic algorithm bindings.
 *
 * Run: node --import tsx src/classics/resolver.test.ts
 *
 * Tests cover:
 *   1. Binding file validation
 *   2. Name resolution with unknown names skipped
 *   3. Summaries (formula, description, combined costs)
 *   4. The bundled bindings against the bundled catalog
 */

import { strict as assert } from "node:assert";
import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { join } from "node:path";
import { tmpdir } from "node:os";

import { ComponentSchema, type ComponentInput } from "../catalog/schema.js";
import { ComponentRegistry } from "../catalog/registry.js";
import { loadDefaultCatalog } from "../catalog/loader.js";
import {
  ClassicBindingError,
  loadClassicBindings,
  loadClassicBindingsFile,
  loadDefaultClassicBindings,
  resolveClassicBinding,
  resolveClassicBindings,
  summarizeClassic,
} from "./resolver.js";
import type { ClassicBinding } from "./schema.js";

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

const INPUTS: ComponentInput[] = [
  {
    category: "dictionary",
    name: "LZ77",
    formulaAscii: "(distance, length, next)",
    description: "Back-references into a window",
    timeCost: "O(n * window)",
    spaceCost: "O(window)",
    validStages: [1],
  },
  {
    category: "entropy_coder",
    name: "Huffman",
    formulaAscii: "len = ceil(-log2 p)",
    description: "Prefix-free code",
    timeCost: "O(n log n)",
    spaceCost: "O(1)",
    validStages: [3],
  },
];

const registry = ComponentRegistry.create(INPUTS.map((input) => ComponentSchema.parse(input)));

const [deflate, partial, ghost] = loadClassicBindings({
  bindings: [
    { algorithmName: "DEFLATE", componentNames: ["LZ77", "Huffman"] },
    { algorithmName: "Half Known", componentNames: ["Unknown Stage", "Huffman"] },
    { algorithmName: "Ghost", componentNames: ["Nothing", "Nowhere"] },
  ],
});

// ═══════════════════════════════════════════════════════════════════════════
// VALIDATION
// ═══════════════════════════════════════════════════════════════════════════

section("Binding Validation");

test("valid bindings load in order and frozen", () => {
  assert.equal(deflate?.algorithmName, "DEFLATE");
  assert.equal(ghost?.algorithmName, "Ghost");
  assert.ok(deflate && Object.isFrozen(deflate));
});

test("algorithm names are trimmed", () => {
  const [binding] = loadClassicBindings({
    bindings: [{ algorithmName: "  LZ4 ", componentNames: ["LZ4"] }],
  });
  assert.equal(binding?.algorithmName, "LZ4");
});

test("component names are trimmed", () => {
  const [binding] = loadClassicBindings({
    bindings: [{ algorithmName: "DEFLATE", componentNames: [" LZ77", "Huffman  "] }],
  });
  assert.deepEqual(binding?.componentNames, ["LZ77", "Huffman"]);
});

test("empty component list is rejected", () => {
  assert.throws(
    () => loadClassicBindings({ bindings: [{ algorithmName: "Empty", componentNames: [] }] }),
    (err: unknown) =>
      err instanceof ClassicBindingError &&
      err.message === "Classic bindings validation failed: 1 error(s)" &&
      err.issues[0]?.message === "A binding must list at least one component"
  );
});

test("repeated algorithm names are rejected", () => {
  assert.throws(
    () =>
      loadClassicBindings({
        bindings: [
          { algorithmName: "LZ4", componentNames: ["A"] },
          { algorithmName: "LZ4", componentNames: ["B"] },
        ],
      }),
    (err: unknown) =>
      err instanceof ClassicBindingError &&
      err.format() ===
        "Classic bindings validation failed: 1 error(s)\n  - bindings: algorithmName values must be unique"
  );
});

test("unknown fields are rejected", () => {
  assert.throws(
    () => loadClassicBindings({ bindings: [], version: 2 }),
    ClassicBindingError
  );
});

const workDir = mkdtempSync(join(tmpdir(), "classics-"));

test("unreadable file becomes ClassicBindingError", () => {
  const path = join(workDir, "missing.json");
  assert.throws(
    () => loadClassicBindingsFile(path),
    (err: unknown) =>
      err instanceof ClassicBindingError &&
      err.message.startsWith(`Cannot load classic bindings from ${path}: `) &&
      err.issues.length === 0
  );
});

test("malformed JSON becomes ClassicBindingError", () => {
  const path = join(workDir, "broken.json");
  writeFileSync(path, "[");
  assert.throws(() => loadClassicBindingsFile(path), ClassicBindingError);
});

test("file with valid bindings loads", () => {
  const path = join(workDir, "ok.json");
  writeFileSync(path, JSON.stringify({ bindings: [{ algorithmName: "X", componentNames: ["Y"] }] }));
  assert.equal(loadClassicBindingsFile(path).length, 1);
});

rmSync(workDir, { recursive: true, force: true });

// ═══════════════════════════════════════════════════════════════════════════
// RESOLUTION
// ═══════════════════════════════════════════════════════════════════════════

section("Resolution");

test("fully known binding resolves every name", () => {
  assert.ok(deflate);
  const resolved = resolveClassicBinding(registry, deflate);
  assert.deepEqual(
    resolved.components.map((c) => c.name),
    ["LZ77", "Huffman"]
  );
  assert.deepEqual(resolved.missingNames, []);
});

test("unknown names are skipped and recorded", () => {
  assert.ok(partial);
  const resolved = resolveClassicBinding(registry, partial);
  assert.deepEqual(
    resolved.components.map((c) => c.name),
    ["Huffman"]
  );
  assert.deepEqual(resolved.missingNames, ["Unknown Stage"]);
  assert.deepEqual(resolved.requestedNames, ["Unknown Stage", "Huffman"]);
});

test("resolved components are the registry's own instances", () => {
  assert.ok(deflate);
  const resolved = resolveClassicBinding(registry, deflate);
  assert.equal(resolved.components[0], registry.getByName("LZ77"));
});

test("bindings with nothing resolvable are dropped", () => {
  const bindings = [deflate, partial, ghost].filter((b): b is ClassicBinding => b !== undefined);
  const resolved = resolveClassicBindings(registry, bindings);
  assert.deepEqual(
    resolved.map((r) => r.algorithmName),
    ["DEFLATE", "Half Known"]
  );
});

// ═══════════════════════════════════════════════════════════════════════════
// SUMMARIES
// ═══════════════════════════════════════════════════════════════════════════

section("Summaries");

test("summary joins formulas and descriptions", () => {
  assert.ok(deflate);
  const summary = summarizeClassic(resolveClassicBinding(registry, deflate));
  assert.equal(summary.algorithmName, "DEFLATE");
  assert.equal(summary.formula, "(distance, length, next) → len = ceil(-log2 p)");
  assert.equal(summary.combinedDescription, "Back-references into a window; Prefix-free code");
  assert.equal(summary.numStages, 2);
});

test("summary costs take the dominant label", () => {
  assert.ok(deflate);
  const summary = summarizeClassic(resolveClassicBinding(registry, deflate));
  assert.equal(summary.totalTimeCost, "O(n * window)");
  // "O(window)" holds no known pattern, so the ranked "O(1)" wins
  assert.equal(summary.totalSpaceCost, "O(1)");
});

test("summary counts only resolved components", () => {
  assert.ok(partial);
  const summary = summarizeClassic(resolveClassicBinding(registry, partial));
  assert.equal(summary.numStages, 1);
  assert.deepEqual(summary.componentNames, ["Huffman"]);
  assert.deepEqual(summary.requestedNames, ["Unknown Stage", "Huffman"]);
});

// ═══════════════════════════════════════════════════════════════════════════
// BUNDLED DATA
// ═══════════════════════════════════════════════════════════════════════════

section("Bundled Bindings");

test("every bundled binding resolves completely", () => {
  const bundled = ComponentRegistry.create(loadDefaultCatalog().components);
  const bindings = loadDefaultClassicBindings();
  assert.equal(bindings.length, 10);
  for (const binding of bindings) {
    const resolved = resolveClassicBinding(bundled, binding);
    assert.deepEqual(resolved.missingNames, [], binding.algorithmName);
  }
});

test("bzip2 chains four components", () => {
  const bundled = ComponentRegistry.create(loadDefaultCatalog().components);
  const bzip2 = loadDefaultClassicBindings().find((b) => b.algorithmName === "bzip2");
  assert.ok(bzip2);
  const summary = summarizeClassic(resolveClassicBinding(bundled, bzip2));
  assert.equal(summary.numStages, 4);
  assert.equal(summary.componentNames[0], "Burrows-Wheeler Transform");
  assert.equal(summary.totalTimeCost, "O(n log n)");
});

// ═══════════════════════════════════════════════════════════════════════════
// RESULTS
// ═══════════════════════════════════════════════════════════════════════════

console.log(`\n${passed} passed, ${failed} failed`);

if (failed > 0) {
  process.exit(1);
}
