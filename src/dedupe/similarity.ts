/**
 * Title similarity scoring.
 *
 * score = (characterRatio + wordOverlap) / 2
 *
 * characterRatio is the Ratcliff/Obershelp ratio 2M / (|a| + |b|), where M
 * counts characters in the recursively found longest common blocks.
 * wordOverlap is |A ∩ B| / min(|A|, |B|) over content words. When either
 * title has no content words the character ratio is the whole score.
 */

import type { NormalizedTitle } from "./normalize.js";

/** Pairs at or above this score share a concept group. */
export const MERGE_THRESHOLD = 0.8;

/** Pairs below this score never share a concept group. */
export const CANNOT_LINK_THRESHOLD = 0.3;

interface Match {
  a: number;
  b: number;
  size: number;
}

/**
 * Longest common substring of a[alo, ahi) and b[blo, bhi).
 * Ties go to the earliest start in `a`, then in `b`.
 */
function longestMatch(a: string, b: string, alo: number, ahi: number, blo: number, bhi: number): Match {
  let best: Match = { a: alo, b: blo, size: 0 };
  let prev = new Array<number>(bhi - blo + 1).fill(0);

  for (let i = alo; i < ahi; i++) {
    const row = new Array<number>(bhi - blo + 1).fill(0);
    for (let j = blo; j < bhi; j++) {
      if (a[i] === b[j]) {
        const length = (prev[j - blo] ?? 0) + 1;
        row[j - blo + 1] = length;
        if (length > best.size) {
          best = { a: i - length + 1, b: j - length + 1, size: length };
        }
      }
    }
    prev = row;
  }

  return best;
}

function matchingCharacters(a: string, b: string): number {
  let total = 0;
  const queue: [number, number, number, number][] = [[0, a.length, 0, b.length]];

  while (queue.length > 0) {
    const range = queue.pop();
    if (range === undefined) break;
    const [alo, ahi, blo, bhi] = range;
    const match = longestMatch(a, b, alo, ahi, blo, bhi);
    if (match.size === 0) continue;

    total += match.size;
    if (alo < match.a && blo < match.b) {
      queue.push([alo, match.a, blo, match.b]);
    }
    if (match.a + match.size < ahi && match.b + match.size < bhi) {
      queue.push([match.a + match.size, ahi, match.b + match.size, bhi]);
    }
  }

  return total;
}

export function characterRatio(a: string, b: string): number {
  const length = a.length + b.length;
  if (length === 0) {
    return 1;
  }
  return (2 * matchingCharacters(a, b)) / length;
}

export function wordOverlap(a: ReadonlySet<string>, b: ReadonlySet<string>): number {
  const smaller = a.size <= b.size ? a : b;
  const larger = smaller === a ? b : a;
  if (smaller.size === 0) {
    return 0;
  }
  let shared = 0;
  for (const word of smaller) {
    if (larger.has(word)) shared++;
  }
  return shared / smaller.size;
}

export function similarityScore(a: NormalizedTitle, b: NormalizedTitle): number {
  const chars = characterRatio(a.text, b.text);
  if (a.words.size === 0 || b.words.size === 0) {
    return chars;
  }
  return (chars + wordOverlap(a.words, b.words)) / 2;
}

/**
 * Cheap test for whether a pair can reach the merge threshold, so the
 * character ratio is only computed for plausible pairs.
 */
export function mayReachThreshold(a: NormalizedTitle, b: NormalizedTitle, threshold: number): boolean {
  const lengths = a.text.length + b.text.length;
  const charBound = lengths === 0 ? 1 : (2 * Math.min(a.text.length, b.text.length)) / lengths;

  if (a.words.size === 0 || b.words.size === 0) {
    return charBound >= threshold;
  }
  return (charBound + wordOverlap(a.words, b.words)) / 2 >= threshold;
}
