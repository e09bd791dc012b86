/**
 * Curriculum document serialization.
 *
 * A run is written out as a versioned JSON document carrying the final
 * sequence together with the metadata it was produced under.
 *
 * FILE NAMING CONVENTION:
 * Documents are saved as: curriculum-{slug}-{runId}.json
 */

import { writeFileSync, readFileSync, mkdirSync, existsSync } from "node:fs";
import { join } from "node:path";
import { deepFreeze, formatZodIssues, type ProfileValidationIssue } from "../config/discipline/loader.js";
import type { CurriculumAssembly } from "../pipeline/index.js";
import {
  type CurriculumDocument,
  type RunMetadata,
  CurriculumDocumentSchema,
  CURRICULUM_DOCUMENT_VERSION,
} from "./schema.js";

export class CurriculumDocumentError extends Error {
  public readonly issues: ProfileValidationIssue[];

  constructor(message: string, issues: ProfileValidationIssue[] = []) {
    super(message);
    this.name = "CurriculumDocumentError";
    this.issues = issues;
  }

  format(): string {
    const lines = [this.message];
    for (const issue of this.issues) {
      const path = issue.path.length > 0 ? issue.path.join(".") : "(root)";
      lines.push(`  - ${path}: ${issue.message}`);
    }
    return lines.join("\n");
  }
}

/**
 * Build the document for a finished assembly.
 */
export function createCurriculumDocument(
  assembly: CurriculumAssembly,
  runMetadata: RunMetadata
): CurriculumDocument {
  const counts = new Map<string, number>();
  for (const s of assembly.subtopics) {
    counts.set(s.clusterId, (counts.get(s.clusterId) ?? 0) + 1);
  }

  return {
    documentVersion: CURRICULUM_DOCUMENT_VERSION,
    discipline: { name: assembly.discipline, slug: assembly.slug },
    runMetadata,
    target: assembly.target,
    subtopics: assembly.subtopics.map((s) => ({
      ...s,
      prerequisites: [...s.prerequisites],
      learningObjectives: [...s.learningObjectives],
      questionTypes: [...s.questionTypes],
    })),
    clusters: assembly.clusters.map((c) => ({
      ...c,
      memberConcepts: [...c.memberConcepts],
      conceptNotes: c.conceptNotes.map((notes) => [...notes]),
      prerequisiteClusterIds: [...c.prerequisiteClusterIds],
      subtopicCount: counts.get(c.id) ?? 0,
    })),
    issues: assembly.issues.map((i) => ({ ...i, subtopicIds: [...i.subtopicIds] })),
    stats: {
      ...assembly.stats,
      records: { ...assembly.stats.records },
      issues: { ...assembly.stats.issues },
      quality: { ...assembly.stats.quality },
      warnings: assembly.warnings.length,
    },
  };
}

export function serializeCurriculum(doc: CurriculumDocument, pretty = true): string {
  return JSON.stringify(doc, null, pretty ? 2 : undefined);
}

/**
 * Parse, validate and freeze a curriculum document.
 *
 * @throws CurriculumDocumentError on bad JSON, schema failure or a
 *   different major version
 */
export function deserializeCurriculum(json: string): Readonly<CurriculumDocument> {
  let parsed: unknown;
  try {
    parsed = JSON.parse(json);
  } catch (err) {
    throw new CurriculumDocumentError(
      `Failed to parse curriculum JSON: ${err instanceof Error ? err.message : String(err)}`
    );
  }

  const result = CurriculumDocumentSchema.safeParse(parsed);
  if (!result.success) {
    throw new CurriculumDocumentError("Invalid curriculum document", formatZodIssues(result.error.issues));
  }

  const doc = result.data;
  if (!isVersionCompatible(doc.documentVersion)) {
    throw new CurriculumDocumentError(
      `Incompatible curriculum document version: ${doc.documentVersion} ` +
        `(current: ${CURRICULUM_DOCUMENT_VERSION}). Migration may be required.`
    );
  }

  return deepFreeze(doc);
}

/**
 * Only an exact major version match is accepted.
 */
export function isVersionCompatible(version: string): boolean {
  const [major] = version.split(".").map(Number);
  const [currentMajor] = CURRICULUM_DOCUMENT_VERSION.split(".").map(Number);
  return major === currentMajor;
}

export function getCurriculumFilename(runId: string, slug: string): string {
  return `curriculum-${slug}-${runId}.json`;
}

/**
 * @returns Full path to the saved file
 */
export function saveCurriculum(doc: CurriculumDocument, directory: string, filename?: string): string {
  const name = filename ?? getCurriculumFilename(doc.runMetadata.runId, doc.discipline.slug);
  const filePath = join(directory, name);

  if (!existsSync(directory)) {
    mkdirSync(directory, { recursive: true });
  }

  writeFileSync(filePath, serializeCurriculum(doc), "utf-8");
  return filePath;
}

export function loadCurriculum(filePath: string): Readonly<CurriculumDocument> {
  let json: string;
  try {
    json = readFileSync(filePath, "utf-8");
  } catch (err) {
    throw new CurriculumDocumentError(
      `Failed to read curriculum file: ${err instanceof Error ? err.message : String(err)}`
    );
  }
  return deserializeCurriculum(json);
}

export interface SummaryOptions {
  /** List every subtopic (default: false) */
  includeSubtopics?: boolean;
}

/**
 * Human-readable summary for logs and the console.
 */
export function summarizeCurriculum(doc: CurriculumDocument, options: SummaryOptions = {}): string {
  const { stats } = doc;
  const lines: string[] = [
    `=== Curriculum: ${doc.discipline.name} ===`,
    `Version: ${doc.documentVersion}`,
    `Run ID: ${doc.runMetadata.runId}`,
    `Started: ${doc.runMetadata.startedAt}`,
  ];

  if (doc.runMetadata.git) {
    lines.push(`Commit: ${doc.runMetadata.git.commitShort} (${doc.runMetadata.git.branch})`);
  }

  lines.push("");
  lines.push("--- Statistics ---");
  lines.push(`Records: ${stats.records.accepted} accepted, ${stats.records.skipped} skipped`);
  lines.push(`Concepts: ${stats.conceptGroups}`);
  lines.push(`Clusters: ${stats.clusters} (${stats.clusterEdges} edges, ${stats.removedEdges} removed)`);
  lines.push(`Subtopics: ${stats.subtopics} of ${doc.target}`);
  lines.push(`Issues: ${stats.issues.error} error, ${stats.issues.warning} warning, ${stats.issues.info} info`);
  lines.push(`Quality: ${stats.quality.score}`);

  if (options.includeSubtopics) {
    lines.push("");
    lines.push("--- Subtopics ---");
    for (const s of doc.subtopics) {
      lines.push(`  ${s.sequenceIndex}. ${s.title} [${s.educationalTier}, ${s.cognitiveLevel}]`);
    }
  }

  return lines.join("\n");
}
