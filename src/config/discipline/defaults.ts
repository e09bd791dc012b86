/**
 * Built-in defaults shared by every discipline profile.
 */

import type { QuestionType } from "./enums.js";
import type { DisciplineProfileInput } from "./schema.js";

/**
 * Generic progression ladders, each ordered from the earlier concept to the
 * later one. Applied to every discipline before the profile's own ladders.
 */
export const GENERIC_PROGRESSION_LADDERS: readonly (readonly string[])[] = [
  ["arithmetic", "algebra"],
  ["algebra", "calculus"],
  ["geometry", "trigonometry"],
  ["basic", "advanced"],
  ["introduction", "intermediate", "advanced"],
];

/** Stop words ignored by word-overlap scoring. */
export const STOP_WORDS: ReadonlySet<string> = new Set([
  "a",
  "an",
  "and",
  "at",
  "by",
  "for",
  "in",
  "of",
  "on",
  "or",
  "the",
  "to",
  "with",
]);

/**
 * Minimal profile for a discipline without a dedicated JSON profile.
 * Everything concept-specific falls into the general cluster.
 */
/**
 * Question types by title keyword, checked in order. A title may match
 * several; one matching none gets the profile's fallback type.
 */
export const DEFAULT_QUESTION_TYPE_RULES: { type: QuestionType; keywords: string[] }[] = [
  { type: "computational", keywords: ["calculation", "mathematical", "equation", "formula"] },
  { type: "conceptual", keywords: ["principle", "theory", "concept", "understanding"] },
  { type: "experimental", keywords: ["experimental", "laboratory", "measurement", "observation"] },
  { type: "graphical", keywords: ["graph", "chart", "diagram", "visualization"] },
];

/** `{topic}` is the lower-cased item title, `{discipline}` the lower-cased discipline. */
export const DEFAULT_LEARNING_OBJECTIVE_TEMPLATES: string[] = [
  "Understand the fundamental concepts of {topic}",
  "Apply knowledge of {topic} to solve problems",
  "Analyze the implications of {topic} in {discipline}",
];

export const DEFAULT_PROFILE: DisciplineProfileInput = {
  discipline: "General Studies",
  slug: "general",
  boilerplatePrefixes: ["introduction to", "principles of", "fundamentals of"],
  expansionSuffixes: [
    "Fundamental Principles of {topic}",
    "Theory of {topic}",
    "Applications of {topic}",
    "Problem-Solving Strategies for {topic}",
    "Advanced Concepts in {topic}",
  ],
  specializedSuffixes: [
    "Research Methods in {topic}",
    "Advanced Applications in {topic}",
    "Interdisciplinary Connections in {topic}",
  ],
};
