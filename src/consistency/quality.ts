/**
 * Ordering quality score (0-1) for a checked sequence.
 *
 *   base       = 1 - 0.1 per error-severity issue
 *   blended    = 0.7 × base + 0.3 × prerequisite satisfaction ratio
 *   quality    = 0.8 × blended + 0.2 × difficulty progression ratio
 *
 * The difficulty progression ratio is the share of consecutive pairs, by
 * sequenceIndex, whose difficulty does not fall by more than
 * DIFFICULTY_TOLERANCE.
 */

import type { ConsistencyIssue, SubtopicRecord } from "../types/index.js";
import { difficultyScore } from "../clusters/difficulty.js";

export const DIFFICULTY_TOLERANCE = 1.5;

export interface OrderingQuality {
  readonly score: number;
  readonly prerequisiteSatisfaction: number;
  readonly difficultyProgression: number;
  readonly errors: number;
}

function round3(value: number): number {
  return Math.round(value * 1000) / 1000;
}

export function assessOrdering(
  sequence: readonly SubtopicRecord[],
  issues: readonly ConsistencyIssue[]
): OrderingQuality {
  const position = new Map(sequence.map((s) => [s.id, s.sequenceIndex]));

  let links = 0;
  let satisfied = 0;
  for (const subtopic of sequence) {
    for (const p of subtopic.prerequisites) {
      links++;
      const index = position.get(p);
      if (index !== undefined && index < subtopic.sequenceIndex) satisfied++;
    }
  }
  const prerequisiteSatisfaction = links === 0 ? 1 : satisfied / links;

  let pairs = 0;
  let progressing = 0;
  let previous: number | undefined;
  for (const subtopic of [...sequence].sort((a, b) => a.sequenceIndex - b.sequenceIndex)) {
    const difficulty = difficultyScore(subtopic.title, subtopic.educationalTier);
    if (previous !== undefined) {
      pairs++;
      if (difficulty >= previous - DIFFICULTY_TOLERANCE) progressing++;
    }
    previous = difficulty;
  }
  const difficultyProgression = pairs === 0 ? 1 : progressing / pairs;

  const errors = issues.filter((i) => i.severity === "error").length;
  const base = Math.max(0, 1 - 0.1 * errors);
  const blended = 0.7 * base + 0.3 * prerequisiteSatisfaction;
  const score = Math.min(1, Math.max(0, 0.8 * blended + 0.2 * difficultyProgression));

  return {
    score: round3(score),
    prerequisiteSatisfaction: round3(prerequisiteSatisfaction),
    difficultyProgression: round3(difficultyProgression),
    errors,
  };
}
