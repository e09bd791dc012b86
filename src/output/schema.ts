/**
 * Curriculum document schema.
 *
 * The serialized form of one assembly run. Consumers read `subtopics` in
 * array order, which always matches `sequenceIndex`.
 *
 * VERSIONING: bump the major version when a field changes meaning or is
 * removed; loaders reject a different major.
 */

import { z } from "zod";
import { CognitiveLevel, EducationalTier, QuestionType } from "../config/discipline/enums.js";
import { ISSUE_KINDS, ISSUE_SEVERITIES, VARIANT_KINDS } from "../types/index.js";

export const CURRICULUM_DOCUMENT_VERSION = "1.1.0";

export const GitStateSchema = z
  .object({
    commitSha: z.string().regex(/^[a-f0-9]{40}$/),
    commitShort: z.string().regex(/^[a-f0-9]{7}$/),
    branch: z.string(),
    isDirty: z.boolean(),
    commitDate: z.string().datetime({ offset: true }),
  })
  .strict();

export type GitState = z.infer<typeof GitStateSchema>;

export const RunMetadataSchema = z
  .object({
    /** From logging/run-id */
    runId: z.string().min(1),
    startedAt: z.string().datetime(),
    hostname: z.string().optional(),
    initiatedBy: z.string().optional(),
    git: GitStateSchema.optional(),
    context: z.record(z.string(), z.unknown()).optional(),
  })
  .strict();

export type RunMetadata = z.infer<typeof RunMetadataSchema>;

export const SubtopicSchema = z
  .object({
    id: z.string().min(1),
    clusterId: z.string().min(1),
    title: z.string().min(1),
    educationalTier: EducationalTier,
    cognitiveLevel: CognitiveLevel,
    prerequisites: z.array(z.string().min(1)),
    sequenceIndex: z.number().int().positive(),
    discipline: z.string().min(1),
    conceptTitle: z.string(),
    variantKind: z.enum(VARIANT_KINDS),
    hierarchyLevel: z.number().int().min(1),
    learningObjectives: z.array(z.string().min(1)),
    questionTypes: z.array(QuestionType).min(1),
  })
  .strict();

export const ClusterSummarySchema = z
  .object({
    id: z.string().min(1),
    label: z.string().min(1),
    hierarchyLevel: z.number().int().min(1),
    memberConcepts: z.array(z.string()),
    conceptNotes: z.array(z.array(z.string())),
    expansionPotential: z.number().min(0),
    educationalTier: EducationalTier,
    difficulty: z.number().min(1).max(10),
    prerequisiteClusterIds: z.array(z.string()),
    /** Items allocated to the cluster, back-fill included */
    subtopicCount: z.number().int().min(0),
  })
  .strict();

export const ConsistencyIssueSchema = z
  .object({
    kind: z.enum(ISSUE_KINDS),
    severity: z.enum(ISSUE_SEVERITIES),
    discipline: z.string(),
    subtopicIds: z.array(z.string()),
    description: z.string(),
  })
  .strict();

const Count = z.number().int().min(0);
const Ratio = z.number().min(0).max(1);

export const CurriculumStatsSchema = z
  .object({
    records: z.object({ total: Count, accepted: Count, skipped: Count }).strict(),
    conceptGroups: Count,
    clusters: Count,
    clusterEdges: Count,
    removedEdges: Count,
    forcedRemovals: Count,
    promotions: Count,
    subtopics: Count,
    subtopicEdges: Count,
    trimmed: Count,
    backfilled: Count,
    warnings: Count,
    issues: z.object({ error: Count, warning: Count, info: Count }).strict(),
    quality: z
      .object({
        score: Ratio,
        prerequisiteSatisfaction: Ratio,
        difficultyProgression: Ratio,
        errors: Count,
      })
      .strict(),
  })
  .strict();

export const CurriculumDocumentSchema = z
  .object({
    documentVersion: z.string().regex(/^\d+\.\d+\.\d+$/),
    discipline: z.object({ name: z.string().min(1), slug: z.string().min(1) }).strict(),
    runMetadata: RunMetadataSchema,
    target: Count,
    subtopics: z.array(SubtopicSchema),
    clusters: z.array(ClusterSummarySchema),
    issues: z.array(ConsistencyIssueSchema),
    stats: CurriculumStatsSchema,
  })
  .strict()
  .refine((doc) => doc.subtopics.every((s, i) => s.sequenceIndex === i + 1), {
    message: "subtopics must be listed in sequenceIndex order starting at 1",
    path: ["subtopics"],
  });

export type CurriculumDocument = z.infer<typeof CurriculumDocumentSchema>;
export type CurriculumStats = z.infer<typeof CurriculumStatsSchema>;
