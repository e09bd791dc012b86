/**
 * Curriculum assembler tests.
 *
 * Run: node --import tsx src/pipeline/assembler.test.ts
 */

import { strict as assert } from "node:assert";

import { CurriculumAssembler, assembleCurriculum, type CurriculumAssembly } from "./index.js";
import { DEFAULT_PROFILE, loadBuiltinProfile, loadDisciplineProfile, tierRank } from "../config/discipline/index.js";
import type { EducationalTier, TopicRecord } from "../types/index.js";

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

function record(title: string, hierarchyLevel: number, tier: EducationalTier, sourceId = "openstax-physics"): TopicRecord {
  return { title, hierarchyLevel, sourceId, sourceEducationalTier: tier, language: "en" };
}

const physics = loadBuiltinProfile("physics");

const physicsRecords: TopicRecord[] = [
  record("Newton's First Law", 2, "hs_advanced"),
  record("Newtons First Law", 2, "hs_advanced", "lecture-notes"),
  record("Velocity and Acceleration", 2, "hs_foundational"),
  record("Vector Calculus", 1, "ug_intro"),
  record("Kinetic Energy", 3, "hs_advanced"),
  record("Quantum Tunneling", 4, "ug_advanced"),
  record("Classical Mechanics Review", 3, "ug_intro"),
  record("Simple Harmonic Motion", 3, "hs_advanced"),
];

function assertOrderingGuarantees(result: CurriculumAssembly): void {
  const position = new Map(result.subtopics.map((s) => [s.id, s.sequenceIndex]));
  result.subtopics.forEach((s, i) => {
    assert.equal(s.sequenceIndex, i + 1);
    for (const p of s.prerequisites) {
      const index = position.get(p);
      assert.ok(index !== undefined && index < s.sequenceIndex, `${p} should precede ${s.id}`);
    }
    const previous = result.subtopics[i - 1];
    if (previous !== undefined) {
      assert.ok(tierRank(previous.educationalTier) <= tierRank(s.educationalTier), `tier drops at ${s.id}`);
    }
  });
  assert.equal(result.clusterGraph.hasCycle(), false);
  assert.equal(result.subtopicGraph.hasCycle(), false);
}

// ═══════════════════════════════════════════════════════════════════════════
// FULL RUN
// ═══════════════════════════════════════════════════════════════════════════

section("Full run");

const physicsRun = new CurriculumAssembler({ profile: physics, target: 40 }).assemble(physicsRecords);

test("produces exactly the target number of subtopics", () => {
  assert.equal(physicsRun.subtopics.length, 40);
  assert.equal(physicsRun.stats.subtopics, 40);
  assert.equal(new Set(physicsRun.subtopics.map((s) => s.id)).size, 40);
});

test("every ordering guarantee holds", () => {
  assertOrderingGuarantees(physicsRun);
});

test("no error-severity findings", () => {
  assert.equal(physicsRun.stats.issues.error, 0);
  assert.deepEqual(
    physicsRun.issues.filter((i) => i.severity === "error"),
    []
  );
});

test("duplicate titles collapse into one concept", () => {
  const newton = physicsRun.conceptGroups.filter((g) => g.canonical.title.startsWith("Newton"));
  assert.equal(newton.length, 1);
  assert.equal(newton[0]?.canonical.title, "Newton's First Law");
  assert.equal(newton[0]?.members.length, 2);
  assert.equal(physicsRun.stats.conceptGroups, 7);
});

test("subtopics carry the discipline and their cluster", () => {
  const clusterIds = new Set(physicsRun.clusters.map((c) => c.id));
  for (const s of physicsRun.subtopics) {
    assert.equal(s.discipline, "Physics");
    assert.ok(clusterIds.has(s.clusterId));
    assert.match(s.id, /^physics_\d{4}$/);
  }
});

test("quality is a score between 0 and 1", () => {
  const { score } = physicsRun.stats.quality;
  assert.ok(score >= 0 && score <= 1);
});

// ═══════════════════════════════════════════════════════════════════════════
// CYCLES
// ═══════════════════════════════════════════════════════════════════════════

section("Cycles");

test("mutually declared prerequisites are resolved", () => {
  const profile = loadDisciplineProfile({
    ...DEFAULT_PROFILE,
    contentAreas: [
      { name: "Alpha", keywords: ["alpha"] },
      { name: "Beta", keywords: ["beta"] },
    ],
    explicitPrerequisites: { Alpha: ["Beta"], Beta: ["Alpha"] },
  });
  const result = assembleCurriculum(
    [record("Alpha Particles", 1, "hs_foundational"), record("Beta Decay", 1, "hs_foundational")],
    { profile, target: 6 }
  );

  assert.equal(result.stats.removedEdges, 1);
  assert.equal(result.stats.clusterEdges, 1);
  assert.ok(result.warnings.some((w) => w.kind === "cycle_edge_removed"));
  assert.equal(result.subtopics.length, 6);
  assertOrderingGuarantees(result);
});

// ═══════════════════════════════════════════════════════════════════════════
// INPUT AND TARGETS
// ═══════════════════════════════════════════════════════════════════════════

section("Input and targets");

test("skipped records become warnings", () => {
  const result = new CurriculumAssembler({ profile: physics, target: 5 }).assembleCollection({
    records: [record("Kinetic Energy", 2, "hs_advanced"), record("   ", 2, "hs_advanced")],
  });
  assert.deepEqual(result.stats.records, { total: 2, accepted: 1, skipped: 1 });
  assert.equal(result.warnings[0]?.kind, "record_skipped");
  assert.equal(result.warnings[0]?.message, "Skipped record 1: Title is empty or whitespace");
  assert.equal(result.subtopics.length, 5);
});

test("the target defaults to the profile's", () => {
  assert.equal(new CurriculumAssembler({ profile: physics }).target, physics.targetSubtopics);
});

test("a zero target yields an empty sequence", () => {
  const result = assembleCurriculum(physicsRecords, { profile: physics, target: 0 });
  assert.deepEqual(result.subtopics, []);
  assert.deepEqual(result.issues, []);
});

test("no records yields an empty sequence", () => {
  const result = assembleCurriculum([], { profile: physics, target: 10 });
  assert.deepEqual(result.subtopics, []);
  assert.equal(result.stats.clusters, 0);
});

test("a negative target is rejected", () => {
  assert.throws(() => new CurriculumAssembler({ profile: physics, target: -1 }), RangeError);
});

console.log(`\n═══════════════════════════════════════════════`);
console.log(`  Results: ${passed} passed, ${failed} failed`);
console.log(`═══════════════════════════════════════════════\n`);

if (failed > 0) {
  process.exit(1);
}
