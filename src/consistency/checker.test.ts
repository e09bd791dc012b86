/**
 * Consistency Checker tests.
 *
 * Run: node --import tsx src/consistency/checker.test.ts
 */

import { strict as assert } from "node:assert";

import { check, keywordLevel, assessOrdering } from "./index.js";
import { loadBuiltinProfile } from "../config/discipline/index.js";
import type { EducationalTier, SubtopicRecord, VariantKind } from "../types/index.js";

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

const physics = loadBuiltinProfile("physics");

function item(
  id: string,
  title: string,
  sequenceIndex: number,
  prerequisites: string[] = [],
  overrides: { tier?: EducationalTier; clusterId?: string; variantKind?: VariantKind } = {}
): SubtopicRecord {
  return {
    id,
    clusterId: overrides.clusterId ?? `cluster_${id}`,
    title,
    educationalTier: overrides.tier ?? "hs_advanced",
    cognitiveLevel: "understand",
    prerequisites,
    sequenceIndex,
    discipline: "Physics",
    conceptTitle: title,
    variantKind: overrides.variantKind ?? "foundational",
    hierarchyLevel: 2,
    learningObjectives: [],
    questionTypes: ["conceptual"],
  };
}

// ═══════════════════════════════════════════════════════════════════════════
// KEYWORD LEVELS
// ═══════════════════════════════════════════════════════════════════════════

section("Keyword levels");

test("the highest mapped keyword wins", () => {
  assert.equal(keywordLevel("Linear Algebra and Calculus", physics.complexityLevels), 4);
  assert.equal(keywordLevel("Algebra Drills", physics.complexityLevels), 2);
  assert.equal(keywordLevel("Optics", physics.complexityLevels), undefined);
});

// ═══════════════════════════════════════════════════════════════════════════
// PREREQUISITES
// ═══════════════════════════════════════════════════════════════════════════

section("Prerequisites");

test("a well-ordered sequence has no findings", () => {
  assert.deepEqual(check([item("s1", "Vectors", 1), item("s2", "Forces", 2, ["s1"])], physics), []);
});

test("a prerequisite after its dependent is an error", () => {
  const issues = check([item("s1", "Lenses", 1, ["s2"]), item("s2", "Mirrors", 2)], physics);
  assert.deepEqual(issues, [
    {
      kind: "prerequisite_order",
      severity: "error",
      discipline: "Physics",
      subtopicIds: ["s1", "s2"],
      description: '"Lenses" (#1) comes before its prerequisite "Mirrors" (#2)',
    },
  ]);
});

test("an unknown prerequisite id is an error", () => {
  const issues = check([item("s1", "Lenses", 1, ["ghost"])], physics);
  assert.equal(issues.length, 1);
  assert.equal(issues[0]?.kind, "unresolved_prerequisite");
  assert.deepEqual(issues[0]?.subtopicIds, ["s1", "ghost"]);
});

test("the checker never mutates or throws on a frozen sequence", () => {
  const sequence = Object.freeze([Object.freeze(item("s1", "Lenses", 1, ["s1"]))]);
  const issues = check(sequence, physics);
  assert.equal(issues[0]?.kind, "prerequisite_order");
  assert.equal(sequence[0]?.sequenceIndex, 1);
});

// ═══════════════════════════════════════════════════════════════════════════
// COMPLEXITY AND ERA
// ═══════════════════════════════════════════════════════════════════════════

section("Complexity and era");

test("a more complex prerequisite is a complexity inversion", () => {
  const issues = check([item("s1", "Calculus Review", 1), item("s2", "Algebra Drills", 2, ["s1"])], physics);
  assert.deepEqual(
    issues.map((i) => [i.kind, i.severity, i.description]),
    [
      [
        "complexity_inversion",
        "warning",
        'Prerequisite "Calculus Review" (complexity 4) is more complex than "Algebra Drills" (complexity 2)',
      ],
    ]
  );
});

test("complexity is compared only where both titles declare it", () => {
  assert.deepEqual(check([item("s1", "Calculus Review", 1), item("s2", "Projectile Drills", 2, ["s1"])], physics), []);
});

test("a later-era prerequisite is an era inversion", () => {
  const issues = check([item("s1", "Quantum Tunneling", 1), item("s2", "Classical Orbits", 2, ["s1"])], physics);
  assert.equal(issues.length, 1);
  assert.equal(issues[0]?.kind, "era_inversion");
  assert.deepEqual(issues[0]?.subtopicIds, ["s2", "s1"]);
});

// ═══════════════════════════════════════════════════════════════════════════
// TIERS AND LINKS
// ═══════════════════════════════════════════════════════════════════════════

section("Tiers and links");

test("a tier drop of more than one step is a regression", () => {
  const issues = check(
    [
      item("s1", "Lenses", 1, [], { tier: "ug_advanced" }),
      item("s2", "Mirrors", 2, [], { tier: "hs_advanced" }),
      item("s3", "Prisms", 3, [], { tier: "ug_intro" }),
      item("s4", "Fibres", 4, [], { tier: "hs_advanced" }),
    ],
    physics
  );
  assert.deepEqual(
    issues.map((i) => [i.kind, i.subtopicIds]),
    [["tier_regression", ["s2", "s1"]]]
  );
  assert.equal(issues[0]?.description, "Tier drops 2 steps from ug_advanced to hs_advanced at #2");
});

test("positional checks follow sequenceIndex, not array order", () => {
  const sequence = [
    item("s1", "Lenses", 1, [], { tier: "ug_advanced" }),
    item("s2", "Mirrors", 2, [], { tier: "hs_advanced" }),
    item("s3", "Prisms", 3, [], { tier: "ug_intro" }),
  ];
  const reversed = [...sequence].reverse();
  assert.deepEqual(
    check(reversed, physics).map((i) => [i.kind, i.subtopicIds]),
    [["tier_regression", ["s2", "s1"]]]
  );
  assert.deepEqual(assessOrdering(reversed, []), assessOrdering(sequence, []));

  const calculus = item("s1", "Vector Calculus", 1, [], { clusterId: "A" });
  const unlinked = item("s2", "Fundamental Principles of Electromagnetism", 2, [], { clusterId: "B" });
  assert.deepEqual(
    check([unlinked, calculus], physics).map((i) => [i.kind, i.subtopicIds]),
    [["missing_prerequisite_link", ["s2", "s1"]]]
  );
});

test("a pattern match without a listed prerequisite is informational", () => {
  const calculus = item("s1", "Vector Calculus", 1, [], { clusterId: "A" });
  const unlinked = item("s2", "Fundamental Principles of Electromagnetism", 2, [], { clusterId: "B" });
  assert.deepEqual(check([calculus, unlinked], physics), [
    {
      kind: "missing_prerequisite_link",
      severity: "info",
      discipline: "Physics",
      subtopicIds: ["s2", "s1"],
      description:
        '"Fundamental Principles of Electromagnetism" matches "electromagnetism" but does not list "Vector Calculus" as a prerequisite',
    },
  ]);

  const linked = { ...unlinked, prerequisites: ["s1"] };
  assert.deepEqual(check([calculus, linked], physics), []);
});

// ═══════════════════════════════════════════════════════════════════════════
// QUALITY
// ═══════════════════════════════════════════════════════════════════════════

section("Quality");

test("a clean sequence scores 1", () => {
  const sequence = [item("s1", "Vectors", 1), item("s2", "Forces", 2, ["s1"])];
  assert.deepEqual(assessOrdering(sequence, check(sequence, physics)), {
    score: 1,
    prerequisiteSatisfaction: 1,
    difficultyProgression: 1,
    errors: 0,
  });
});

test("errors and unsatisfied links lower the score", () => {
  const sequence = [item("s1", "Lenses", 1, ["s2"]), item("s2", "Mirrors", 2)];
  const quality = assessOrdering(sequence, check(sequence, physics));
  assert.equal(quality.errors, 1);
  assert.equal(quality.prerequisiteSatisfaction, 0);
  assert.equal(quality.score, 0.704);
});

console.log(`\n═══════════════════════════════════════════════`);
console.log(`  Results: ${passed} passed, ${failed} failed`);
console.log(`═══════════════════════════════════════════════\n`);

if (failed > 0) {
  process.exit(1);
}
