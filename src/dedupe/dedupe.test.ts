/**
 * Concept Deduplicator tests.
 *
 * Run: node --import tsx src/dedupe/dedupe.test.ts
 *
 * Tests cover:
 *   1. Title normalization
 *   2. Similarity scoring
 *   3. Grouping and the cannot-link guard
 *   4. Canonical election and supplementary notes
 */

import { strict as assert } from "node:assert";

import {
  dedupe,
  scoreCanonical,
  normalizeTitle,
  stripNumbering,
  characterRatio,
  wordOverlap,
  similarityScore,
} from "./index.js";
import { loadBuiltinProfile, loadDisciplineProfile, DEFAULT_PROFILE } from "../config/discipline/index.js";
import type { EducationalTier, PipelineWarning, TopicRecord } from "../types/index.js";

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

const physics = loadBuiltinProfile("physics");
const generic = loadDisciplineProfile(DEFAULT_PROFILE);

function record(
  title: string,
  sourceId = "state-standards",
  tier: EducationalTier = "hs_foundational",
  hierarchyLevel = 2
): TopicRecord {
  return { title, hierarchyLevel, sourceId, sourceEducationalTier: tier, language: "en" };
}

// ═══════════════════════════════════════════════════════════════════════════
// NORMALIZATION
// ═══════════════════════════════════════════════════════════════════════════

section("Normalization");

test("leading chapter markers and numbering are stripped", () => {
  assert.deepEqual(stripNumbering("Chapter 3: Forces"), { text: "Forces", stripped: true });
  assert.deepEqual(stripNumbering("2.1 Vectors"), { text: "Vectors", stripped: true });
  assert.deepEqual(stripNumbering("Section 4.2 Work"), { text: "Work", stripped: true });
});

test("words that merely start like markers are kept", () => {
  assert.deepEqual(stripNumbering("Unit Circle"), { text: "Unit Circle", stripped: false });
});

test("boilerplate prefixes are removed after numbering", () => {
  const n = normalizeTitle("1. Introduction to Thermodynamics", physics.boilerplatePrefixes);
  assert.equal(n.text, "thermodynamics");
  assert.deepEqual([...n.words], ["thermodynamics"]);
  assert.equal(n.hadNumbering, true);
});

test("content words drop apostrophes and stop words", () => {
  const n = normalizeTitle("Newton's Laws of Motion", physics.boilerplatePrefixes);
  assert.equal(n.text, "newton's laws of motion");
  assert.deepEqual([...n.words], ["newtons", "laws", "motion"]);
});

test("a title made only of boilerplate falls back to itself", () => {
  const n = normalizeTitle("Introduction to", physics.boilerplatePrefixes);
  assert.equal(n.text, "introduction to");
});

// ═══════════════════════════════════════════════════════════════════════════
// SIMILARITY
// ═══════════════════════════════════════════════════════════════════════════

section("Similarity");

test("character ratio counts matching blocks", () => {
  assert.equal(characterRatio("abcd", "bcde"), 0.75);
  assert.equal(characterRatio("abc", "xyz"), 0);
  assert.equal(characterRatio("", ""), 1);
});

test("word overlap divides by the smaller set", () => {
  assert.equal(wordOverlap(new Set(["a", "b"]), new Set(["a", "b", "c"])), 1);
  assert.equal(wordOverlap(new Set(["a", "b"]), new Set(["a", "c"])), 0.5);
  assert.equal(wordOverlap(new Set(), new Set(["a"])), 0);
});

test("apostrophe variants score above the merge threshold", () => {
  const a = normalizeTitle("Newton's First Law", physics.boilerplatePrefixes);
  const b = normalizeTitle("Newtons First Law", physics.boilerplatePrefixes);
  // chars: 34 / 35, words: 1
  assert.equal(similarityScore(a, b), (34 / 35 + 1) / 2);
});

// ═══════════════════════════════════════════════════════════════════════════
// GROUPING
// ═══════════════════════════════════════════════════════════════════════════

section("Grouping");

test("Newton's First Law variants collapse to the apostrophized title", () => {
  const groups = dedupe(
    [
      record("Newtons First Law", "state-standards-b", "hs_foundational"),
      record("Newton's First Law", "state-standards-a", "hs_advanced"),
    ],
    physics
  );
  assert.equal(groups.length, 1);
  assert.equal(groups[0]?.canonical.title, "Newton's First Law");
  assert.equal(groups[0]?.canonicalScore, 3);
  assert.deepEqual(groups[0]?.supplementaryNotes, [
    "Newtons First Law (source state-standards-b, hs_foundational)",
  ]);
  assert.equal(groups[0]?.educationalTier, "hs_foundational");
});

test("unrelated titles stay apart and keep first-seen order", () => {
  const groups = dedupe(
    [record("Kinematics"), record("Thermodynamics"), record("Introduction to Kinematics")],
    physics
  );
  assert.deepEqual(
    groups.map((g) => g.members.map((m) => m.title)),
    [["Kinematics", "Introduction to Kinematics"], ["Thermodynamics"]]
  );
});

test("the cannot-link guard outranks a pair above the merge threshold", () => {
  const warnings: PipelineWarning[] = [];
  const groups = dedupe([record("Mass"), record("Mass Unit"), record("Unit")], generic, {
    onWarning: (w) => warnings.push(w),
  });
  assert.deepEqual(
    groups.map((g) => g.members.map((m) => m.title)),
    [["Mass", "Mass Unit"], ["Unit"]]
  );
  assert.equal(warnings.length, 1);
  assert.equal(warnings[0]?.kind, "merge_refused");
  assert.equal(
    warnings[0]?.message,
    'Refused to merge "Mass Unit" with "Unit": "Mass" and "Unit" are dissimilar'
  );
});

test("empty titles are skipped with a warning", () => {
  const warnings: PipelineWarning[] = [];
  const groups = dedupe([record("  "), record("Optics")], physics, {
    onWarning: (w) => warnings.push(w),
  });
  assert.equal(groups.length, 1);
  assert.equal(warnings[0]?.kind, "record_skipped");
  assert.equal(warnings[0]?.stage, "dedupe");
});

test("no records give no groups", () => {
  assert.deepEqual(dedupe([], physics), []);
});

// ═══════════════════════════════════════════════════════════════════════════
// CANONICAL RUBRIC
// ═══════════════════════════════════════════════════════════════════════════

section("Canonical rubric");

test("rubric adds numbering and authoritative sources", () => {
  const s = scoreCanonical(record("2.1 Vectors", "mit-university-notes"), physics);
  assert.deepEqual(s, {
    total: 2.5,
    standardTerm: false,
    conciseTitle: true,
    hierarchyMetadata: true,
    authoritativeSource: true,
  });
});

test("rubric ties go to the first-seen member", () => {
  const intro = record("Introduction to Thermodynamics", "state-standards");
  const bare = record("Thermodynamics", "openstax-physics");

  const forward = dedupe([intro, bare], physics);
  assert.equal(forward.length, 1);
  assert.equal(forward[0]?.canonical.title, "Introduction to Thermodynamics");

  const reversed = dedupe([bare, intro], physics);
  assert.equal(reversed[0]?.canonical.title, "Thermodynamics");
  assert.deepEqual(reversed[0]?.supplementaryNotes, [
    "Introduction to Thermodynamics (source state-standards, hs_foundational)",
  ]);
});

console.log(`\n═══════════════════════════════════════════════`);
console.log(`  Results: ${passed} passed, ${failed} failed`);
console.log(`═══════════════════════════════════════════════\n`);

if (failed > 0) {
  process.exit(1);
}
