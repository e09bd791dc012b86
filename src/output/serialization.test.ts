/**
 * Curriculum document tests.
 *
 * Run: node --import tsx src/output/serialization.test.ts
 */

import { strict as assert } from "node:assert";
import { mkdtempSync, rmSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";

import {
  CurriculumDocumentError,
  createCurriculumDocument,
  createRunMetadata,
  deserializeCurriculum,
  getCurriculumFilename,
  isVersionCompatible,
  loadCurriculum,
  saveCurriculum,
  serializeCurriculum,
  summarizeCurriculum,
} from "./index.js";
import { assembleCurriculum } from "../pipeline/index.js";
import { loadBuiltinProfile } from "../config/discipline/index.js";

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

const RUN_ID = "20260102-abcdef";

const runMetadata = createRunMetadata({
  runId: RUN_ID,
  startedAt: new Date("2026-01-02T03:04:05.000Z"),
  captureGit: false,
  captureHostname: false,
});

const assembly = assembleCurriculum(
  [
    { title: "Kinetic Energy", hierarchyLevel: 2, sourceId: "openstax-physics", sourceEducationalTier: "hs_advanced", language: "en" },
    { title: "Velocity and Acceleration", hierarchyLevel: 2, sourceId: "openstax-physics", sourceEducationalTier: "hs_foundational", language: "en" },
  ],
  { profile: loadBuiltinProfile("physics"), target: 5 }
);

const doc = createCurriculumDocument(assembly, runMetadata);

// ═══════════════════════════════════════════════════════════════════════════
// RUN METADATA
// ═══════════════════════════════════════════════════════════════════════════

section("Run metadata");

test("captures only what was asked for", () => {
  assert.deepEqual(runMetadata, { runId: RUN_ID, startedAt: "2026-01-02T03:04:05.000Z" });
});

test("keeps initiator and non-empty context", () => {
  const metadata = createRunMetadata({
    runId: RUN_ID,
    startedAt: new Date("2026-01-02T03:04:05.000Z"),
    captureGit: false,
    captureHostname: false,
    initiatedBy: "tester",
    context: { input: "records.json" },
  });
  assert.equal(metadata.initiatedBy, "tester");
  assert.deepEqual(metadata.context, { input: "records.json" });
});

// ═══════════════════════════════════════════════════════════════════════════
// DOCUMENT
// ═══════════════════════════════════════════════════════════════════════════

section("Document");

test("carries the discipline and the whole sequence", () => {
  assert.deepEqual(doc.discipline, { name: "Physics", slug: "physics" });
  assert.equal(doc.target, 5);
  assert.equal(doc.subtopics.length, 5);
  assert.equal(doc.stats.warnings, assembly.warnings.length);
});

test("cluster subtopic counts add up to the sequence", () => {
  const total = doc.clusters.reduce((sum, c) => sum + c.subtopicCount, 0);
  assert.equal(total, 5);
});

test("subtopics carry learning objectives and question types", () => {
  doc.subtopics.forEach((s, i) => {
    assert.equal(s.learningObjectives.length, 3);
    assert.deepEqual(s.learningObjectives, assembly.subtopics[i]?.learningObjectives);
    assert.deepEqual(s.questionTypes, assembly.subtopics[i]?.questionTypes);
  });
});

test("survives a serialize/deserialize round trip", () => {
  assert.deepEqual(deserializeCurriculum(serializeCurriculum(doc)), doc);
});

test("deserialized documents are frozen", () => {
  const loaded = deserializeCurriculum(serializeCurriculum(doc, false));
  assert.ok(Object.isFrozen(loaded));
  assert.ok(Object.isFrozen(loaded.subtopics[0]));
});

// ═══════════════════════════════════════════════════════════════════════════
// VALIDATION
// ═══════════════════════════════════════════════════════════════════════════

section("Validation");

test("rejects malformed JSON", () => {
  assert.throws(
    () => deserializeCurriculum("{not json"),
    (err: unknown) => err instanceof CurriculumDocumentError && err.message.startsWith("Failed to parse curriculum JSON")
  );
});

test("rejects a different major version", () => {
  assert.equal(isVersionCompatible("1.4.0"), true);
  assert.equal(isVersionCompatible("2.0.0"), false);
  const json = serializeCurriculum({ ...doc, documentVersion: "2.0.0" });
  assert.throws(
    () => deserializeCurriculum(json),
    (err: unknown) => err instanceof CurriculumDocumentError && err.message.startsWith("Incompatible curriculum document version: 2.0.0")
  );
});

test("rejects subtopics out of sequence order", () => {
  const json = serializeCurriculum({ ...doc, subtopics: [...doc.subtopics].reverse() });
  try {
    deserializeCurriculum(json);
    assert.fail("expected a CurriculumDocumentError");
  } catch (err) {
    assert.ok(err instanceof CurriculumDocumentError);
    assert.deepEqual(err.issues[0]?.path, ["subtopics"]);
  }
});

test("rejects a subtopic without a question type", () => {
  const [first, ...rest] = doc.subtopics;
  assert.ok(first !== undefined);
  const json = serializeCurriculum({ ...doc, subtopics: [{ ...first, questionTypes: [] }, ...rest] });
  try {
    deserializeCurriculum(json);
    assert.fail("expected a CurriculumDocumentError");
  } catch (err) {
    assert.ok(err instanceof CurriculumDocumentError);
    assert.ok(err.issues.some((i) => i.path.join(".") === "subtopics.0.questionTypes"));
  }
});

test("rejects unknown fields", () => {
  const json = serializeCurriculum(doc).replace('"documentVersion"', '"extra": true, "documentVersion"');
  assert.throws(() => deserializeCurriculum(json), CurriculumDocumentError);
});

// ═══════════════════════════════════════════════════════════════════════════
// FILES
// ═══════════════════════════════════════════════════════════════════════════

section("Files");

test("standard filename names the discipline and run", () => {
  assert.equal(getCurriculumFilename(RUN_ID, "physics"), "curriculum-physics-20260102-abcdef.json");
});

test("saves and loads through the filesystem", () => {
  const dir = mkdtempSync(join(tmpdir(), "curriculum-"));
  try {
    const path = saveCurriculum(doc, join(dir, "out"));
    assert.equal(path, join(dir, "out", "curriculum-physics-20260102-abcdef.json"));
    assert.deepEqual(loadCurriculum(path), doc);
  } finally {
    rmSync(dir, { recursive: true, force: true });
  }
});

test("a missing file is a document error", () => {
  assert.throws(() => loadCurriculum(join(tmpdir(), "no-such-curriculum.json")), CurriculumDocumentError);
});

test("summary reports the sequence size", () => {
  const lines = summarizeCurriculum(doc, { includeSubtopics: true }).split("\n");
  assert.equal(lines[0], "=== Curriculum: Physics ===");
  assert.ok(lines.includes("Subtopics: 5 of 5"));
  assert.ok(lines.includes("Records: 2 accepted, 0 skipped"));
  assert.equal(lines.filter((l) => /^ {2}\d+\. /.test(l)).length, 5);
});

console.log(`\n═══════════════════════════════════════════════`);
console.log(`  Results: ${passed} passed, ${failed} failed`);
console.log(`═══════════════════════════════════════════════\n`);

if (failed > 0) {
  process.exit(1);
}
