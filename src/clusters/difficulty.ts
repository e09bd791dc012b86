/**
 * Difficulty scores (1-10) for concepts and clusters.
 */

import type { EducationalTier } from "../config/discipline/enums.js";

export const MIN_DIFFICULTY = 1;
export const MAX_DIFFICULTY = 10;

const TIER_BASE: Readonly<Record<EducationalTier, number>> = {
  hs_foundational: 2,
  hs_advanced: 4,
  ug_intro: 5,
  ug_advanced: 7,
  grad_intro: 8,
  grad_advanced: 9,
};

const ADJUSTMENTS: readonly { keywords: readonly string[]; delta: number }[] = [
  { keywords: ["advanced", "quantum", "relativistic", "tensor"], delta: 1.5 },
  { keywords: ["basic", "intro", "fundamental"], delta: -1 },
  { keywords: ["application", "lab", "experimental"], delta: 0.5 },
];

/**
 * Difficulty of a concept: its tier's base score adjusted by title keywords.
 * Each adjustment applies at most once.
 */
export function difficultyScore(title: string, tier: EducationalTier): number {
  const lowered = title.toLowerCase();
  let score = TIER_BASE[tier];
  for (const { keywords, delta } of ADJUSTMENTS) {
    if (keywords.some((k) => lowered.includes(k))) {
      score += delta;
    }
  }
  return Math.min(MAX_DIFFICULTY, Math.max(MIN_DIFFICULTY, score));
}

/**
 * Mean of the given scores, rounded to one decimal. Empty input scores the
 * minimum.
 */
export function averageDifficulty(scores: readonly number[]): number {
  if (scores.length === 0) {
    return MIN_DIFFICULTY;
  }
  const mean = scores.reduce((sum, s) => sum + s, 0) / scores.length;
  return Math.round(mean * 10) / 10;
}
