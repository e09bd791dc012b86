/**
 * Domain enumerations shared by the profile schema, the input boundary and
 * every pipeline stage.
 *
 * The order of each enum is significant: tiers and cognitive levels are
 * compared by position.
 */

import { z } from "zod";

/**
 * Educational tiers, most introductory first.
 *
 *   hs_foundational  High school, foundational
 *   hs_advanced      High school, advanced (AP/IB)
 *   ug_intro         Undergraduate, introductory
 *   ug_advanced      Undergraduate, advanced
 *   grad_intro       Graduate, introductory
 *   grad_advanced    Graduate, advanced
 */
export const EducationalTier = z.enum([
  "hs_foundational",
  "hs_advanced",
  "ug_intro",
  "ug_advanced",
  "grad_intro",
  "grad_advanced",
]);
export type EducationalTier = z.infer<typeof EducationalTier>;

export const TIER_ORDER: readonly EducationalTier[] = EducationalTier.options;

/**
 * Zero-based position of a tier in TIER_ORDER.
 */
export function tierRank(tier: EducationalTier): number {
  return TIER_ORDER.indexOf(tier);
}

export function compareTiers(a: EducationalTier, b: EducationalTier): number {
  return tierRank(a) - tierRank(b);
}

export function laterTier(a: EducationalTier, b: EducationalTier): EducationalTier {
  return compareTiers(a, b) >= 0 ? a : b;
}

export function earlierTier(a: EducationalTier, b: EducationalTier): EducationalTier {
  return compareTiers(a, b) <= 0 ? a : b;
}

/**
 * Cognitive levels (revised Bloom taxonomy), lowest first.
 */
export const CognitiveLevel = z.enum([
  "remember",
  "understand",
  "apply",
  "analyze",
  "evaluate",
  "create",
]);
export type CognitiveLevel = z.infer<typeof CognitiveLevel>;

/**
 * Kinds of assessment question a subtopic lends itself to.
 */
export const QuestionType = z.enum(["conceptual", "computational", "experimental", "graphical"]);
export type QuestionType = z.infer<typeof QuestionType>;

/**
 * Where a dependency edge came from. Precedence when two sources relate
 * the same pair: explicit > pattern-derived > level-derived.
 */
export const EdgeProvenance = z.enum(["explicit", "pattern-derived", "level-derived"]);
export type EdgeProvenance = z.infer<typeof EdgeProvenance>;

export const PROVENANCE_PRECEDENCE: Readonly<Record<EdgeProvenance, number>> = {
  explicit: 3,
  "pattern-derived": 2,
  "level-derived": 1,
};
