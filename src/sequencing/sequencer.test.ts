/**
 * Level-Aware Sequencer tests.
 *
 * Run: node --import tsx src/sequencing/sequencer.test.ts
 */

import { strict as assert } from "node:assert";

import { sequence, promoteTiers, topologicalOrder, type SequenceNode } from "./index.js";
import { DependencyGraph } from "../graph/index.js";
import type { EducationalTier, PipelineWarning } from "../types/index.js";

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

function node(id: string, tier: EducationalTier, difficulty = 4): SequenceNode {
  return { id, tier, difficulty };
}

function graphOf(...edges: [string, string][]): DependencyGraph {
  const graph = new DependencyGraph();
  for (const [from, to] of edges) {
    graph.addEdge({ from, to, strength: 1, provenance: "explicit" });
  }
  return graph;
}

// ═══════════════════════════════════════════════════════════════════════════
// ORDERING
// ═══════════════════════════════════════════════════════════════════════════

section("Ordering");

test("Kinematics, Dynamics, Energy follow their prerequisites", () => {
  const graph = graphOf(["kinematics", "dynamics"], ["dynamics", "energy"]);
  const result = sequence(graph, [
    node("energy", "ug_intro"),
    node("dynamics", "hs_advanced"),
    node("kinematics", "hs_advanced"),
  ]);
  assert.deepEqual(result.order, ["kinematics", "dynamics", "energy"]);
  assert.deepEqual(result.promotions, []);
});

test("earlier tiers come first regardless of input order", () => {
  const result = sequence(new DependencyGraph(), [node("a", "ug_intro"), node("b", "hs_foundational")]);
  assert.deepEqual(result.order, ["b", "a"]);
});

test("ties within a tier keep input order", () => {
  const result = sequence(new DependencyGraph(), [node("x", "ug_intro"), node("y", "ug_intro"), node("z", "ug_intro")]);
  assert.deepEqual(result.order, ["x", "y", "z"]);
});

test("topological order prefers the earliest ready node", () => {
  const graph = graphOf(["c", "a"]);
  assert.deepEqual(topologicalOrder(graph, ["a", "b", "c"]), ["b", "c", "a"]);
  assert.equal(topologicalOrder(graphOf(["a", "b"], ["b", "a"]), ["a", "b"]), undefined);
});

// ═══════════════════════════════════════════════════════════════════════════
// TIER PROMOTION
// ═══════════════════════════════════════════════════════════════════════════

section("Tier promotion");

test("dependents of a later-tier prerequisite are promoted transitively", () => {
  const graph = graphOf(["p", "q"], ["q", "r"]);
  const nodes = [node("q", "hs_advanced"), node("r", "hs_advanced"), node("s", "hs_advanced"), node("p", "ug_advanced")];
  const tiers = promoteTiers(graph, nodes);
  assert.equal(tiers.get("q"), "ug_advanced");
  assert.equal(tiers.get("r"), "ug_advanced");
  assert.equal(tiers.get("s"), "hs_advanced");

  const warnings: PipelineWarning[] = [];
  const result = sequence(graph, nodes, { onWarning: (w) => warnings.push(w) });
  assert.deepEqual(result.order, ["s", "p", "q", "r"]);
  assert.deepEqual(result.promotions, [
    { id: "q", from: "hs_advanced", to: "ug_advanced" },
    { id: "r", from: "hs_advanced", to: "ug_advanced" },
  ]);
  assert.deepEqual(
    warnings.map((w) => w.kind),
    ["tier_promotion", "tier_promotion"]
  );
});

test("every edge runs forward in the sequence and tiers never fall", () => {
  const graph = graphOf(["a", "b"], ["c", "b"], ["b", "d"], ["e", "a"]);
  const nodes = [
    node("a", "hs_foundational"),
    node("b", "hs_advanced"),
    node("c", "ug_intro"),
    node("d", "hs_foundational"),
    node("e", "grad_intro"),
  ];
  const result = sequence(graph, nodes);
  const index = new Map(result.order.map((id, i) => [id, i]));
  assert.equal(result.order.length, nodes.length);
  for (const edge of graph.edges()) {
    assert.ok((index.get(edge.from) ?? -1) < (index.get(edge.to) ?? -1), `${edge.from} before ${edge.to}`);
  }
  assert.deepEqual(result.order, ["c", "e", "a", "b", "d"]);
  assert.ok(["a", "b", "d"].every((id) => result.effectiveTiers.get(id) === "grad_intro"));
});

// ═══════════════════════════════════════════════════════════════════════════
// FALLBACK
// ═══════════════════════════════════════════════════════════════════════════

section("Fallback");

test("a cyclic bucket falls back to ascending difficulty", () => {
  const graph = graphOf(["a", "b"], ["b", "a"]);
  const warnings: PipelineWarning[] = [];
  const result = sequence(
    graph,
    [node("a", "hs_advanced", 5), node("b", "hs_advanced", 3), node("c", "hs_advanced", 4), node("z", "ug_intro", 1)],
    { onWarning: (w) => warnings.push(w) }
  );
  assert.deepEqual(result.order, ["b", "c", "a", "z"]);
  assert.deepEqual(result.fallbackTiers, ["hs_advanced"]);
  assert.equal(warnings[0]?.kind, "sequencing_fallback");
  assert.equal(warnings[0]?.message, "Cycle among hs_advanced nodes; ordered 3 node(s) by difficulty");
});

console.log(`\n═══════════════════════════════════════════════`);
console.log(`  Results: ${passed} passed, ${failed} failed`);
console.log(`═══════════════════════════════════════════════\n`);

if (failed > 0) {
  process.exit(1);
}
