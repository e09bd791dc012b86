/**
 * Discipline profile schema definition.
 *
 * A profile carries every heuristic table one discipline's pipeline run
 * reads: boilerplate prefixes and terminology for deduplication, content
 * areas for clustering, prerequisite patterns for the dependency graph,
 * suffix templates for expansion, and the complexity and era maps used by
 * the consistency checker.
 *
 * A profile is validated once, frozen, and injected into the pipeline at
 * construction. Changing any table means a new run.
 */

import { z } from "zod";
import { QuestionType } from "./enums.js";
import { DEFAULT_LEARNING_OBJECTIVE_TEMPLATES, DEFAULT_QUESTION_TYPE_RULES } from "./defaults.js";

const keywordList = z.array(z.string().min(1).transform((s) => s.toLowerCase()));

/** Templates must name the topic they expand. */
const topicTemplate = z
  .string()
  .min(1)
  .refine((t) => t.includes("{topic}"), { message: 'Template must contain "{topic}"' });

export const ContentAreaSchema = z
  .object({
    /** Cluster label given to matching concepts */
    name: z.string().min(1).describe("Cluster label for concepts in this area"),

    /** Lower-case substrings; a concept matches if its title contains any */
    keywords: keywordList.min(1).describe("Keywords that place a concept in this area"),
  })
  .strict();

export type ContentArea = z.infer<typeof ContentAreaSchema>;

export const QuestionTypeRuleSchema = z
  .object({
    type: QuestionType,
    /** Lower-case substrings; an item qualifies if its title contains any */
    keywords: keywordList.min(1),
  })
  .strict();

export type QuestionTypeRule = z.infer<typeof QuestionTypeRuleSchema>;

export const DisciplineProfileSchema = z
  .object({
    /** Display name, e.g. "Physics" */
    discipline: z.string().min(1).describe("Discipline display name"),

    /** Identifier prefix for cluster and subtopic ids */
    slug: z
      .string()
      .regex(/^[a-z][a-z0-9_]*$/)
      .describe("Lower-case identifier used in generated ids"),

    /** Leading phrases stripped before title comparison ("introduction to") */
    boilerplatePrefixes: keywordList
      .default([])
      .describe("Title prefixes removed before similarity scoring"),

    /** Discipline-standard terms; a title containing one scores +2 as canonical */
    standardTerms: keywordList
      .default([])
      .describe("Allow-list of discipline-standard terminology"),

    /** Substrings of source ids that mark an authoritative source */
    authoritativeSources: keywordList
      .default([])
      .describe("Source id indicators of recognized authoritative sources"),

    /** Ordered content areas; the first matching area wins */
    contentAreas: z
      .array(ContentAreaSchema)
      .default([])
      .describe("Content-area keyword map used to name clusters"),

    /** Label for concepts no content area matches */
    generalClusterLabel: z
      .string()
      .min(1)
      .optional()
      .describe('Fallback cluster label; defaults to "General <discipline>"'),

    /** Topical density factor applied to expansion potential */
    disciplineFactor: z
      .number()
      .min(0.5)
      .max(2)
      .default(1)
      .describe("Per-discipline expansion factor, nominally 1.0-1.3"),

    /** Cluster label -> labels that must precede it */
    explicitPrerequisites: z
      .record(z.array(z.string().min(1)))
      .default({})
      .describe("Declared cluster prerequisites by label"),

    /** Dependent keyword -> required prerequisite keywords */
    prerequisitePatterns: z
      .record(keywordList)
      .default({})
      .describe("Keyword prerequisite table"),

    /** Extra keyword ladders, each ordered from basic to advanced */
    progressionLadders: z
      .array(keywordList.min(2))
      .default([])
      .describe("Discipline progression ladders merged after the generic ladder"),

    /** Ordered variant templates; the first produces the foundational item */
    expansionSuffixes: z
      .array(topicTemplate)
      .min(1)
      .describe("Ordered expansion templates containing {topic}"),

    /** Templates for back-fill items drawn from under-represented clusters */
    specializedSuffixes: z
      .array(topicTemplate)
      .min(1)
      .describe("Back-fill templates containing {topic}"),

    /** Question types by title keyword, in output order */
    questionTypeRules: z
      .array(QuestionTypeRuleSchema)
      .default(DEFAULT_QUESTION_TYPE_RULES)
      .describe("Keyword table assigning question types to generated items"),

    /** Question type for items no rule matches */
    fallbackQuestionType: QuestionType.default("conceptual"),

    /** Objective templates; {topic} and {discipline} are filled lower-cased */
    learningObjectiveTemplates: z
      .array(topicTemplate)
      .default(DEFAULT_LEARNING_OBJECTIVE_TEMPLATES)
      .describe("Learning objective templates containing {topic}"),

    /** Keyword -> numeric complexity tier */
    complexityLevels: z
      .record(z.number().int().min(1))
      .default({})
      .describe("Complexity map, e.g. algebra < calculus < differential equations"),

    /** Keyword -> historical era */
    eraLevels: z
      .record(z.number().int().min(1))
      .default({})
      .describe("Historical era map, e.g. classical < quantum"),

    /** Target subtopic count for a run */
    targetSubtopics: z
      .number()
      .int()
      .min(1)
      .default(1000)
      .describe("Number of subtopics the final sequence must contain"),
  })
  .strict();

export type DisciplineProfile = z.infer<typeof DisciplineProfileSchema>;

/** Input shape accepted by the loader, before defaults are applied. */
export type DisciplineProfileInput = z.input<typeof DisciplineProfileSchema>;

/**
 * The label for concepts that match no content area.
 */
export function generalClusterLabel(profile: DisciplineProfile): string {
  return profile.generalClusterLabel ?? `General ${profile.discipline}`;
}
