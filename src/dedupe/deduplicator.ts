/**
 * Concept Deduplicator.
 *
 * Groups raw topic records that denote the same concept and elects one
 * canonical representative per group.
 *
 * ═══════════════════════════════════════════════════════════════════════════
 * GROUPING
 * ═══════════════════════════════════════════════════════════════════════════
 *
 * Every pair scoring at or above MERGE_THRESHOLD is linked, strongest pair
 * first, with union-find. A link that would put two records scoring below
 * CANNOT_LINK_THRESHOLD into one group is refused and reported. Groups come
 * out in order of their first member's input position.
 *
 * ═══════════════════════════════════════════════════════════════════════════
 * CANONICAL RUBRIC
 * ═══════════════════════════════════════════════════════════════════════════
 *
 *   +2    title uses a discipline-standard term
 *   +1    title has 2 to 6 words
 *   +0.5  title carries explicit hierarchy numbering ("2.1", "Chapter 3")
 *   +1    record comes from an authoritative source
 *
 * Ties go to the member seen first.
 */

import type { DisciplineProfile } from "../config/discipline/schema.js";
import { earlierTier } from "../config/discipline/enums.js";
import type { TopicRecord } from "../records/schema.js";
import type { ConceptGroup, StageOptions } from "../types/index.js";
import { createSilentLogger } from "../logging/index.js";
import { normalizeTitle, type NormalizedTitle } from "./normalize.js";
import {
  similarityScore,
  mayReachThreshold,
  MERGE_THRESHOLD,
  CANNOT_LINK_THRESHOLD,
} from "./similarity.js";

export type DedupeOptions = StageOptions;

export interface CanonicalScore {
  readonly total: number;
  readonly standardTerm: boolean;
  readonly conciseTitle: boolean;
  readonly hierarchyMetadata: boolean;
  readonly authoritativeSource: boolean;
}

/**
 * Score a record against the canonical rubric.
 */
export function scoreCanonical(
  record: TopicRecord,
  profile: DisciplineProfile,
  normalized: NormalizedTitle = normalizeTitle(record.title, profile.boilerplatePrefixes)
): CanonicalScore {
  const lowered = record.title.toLowerCase().replace(/’/g, "'");
  const wordCount = record.title.trim().split(/\s+/).length;
  const source = record.sourceId.toLowerCase();

  const standardTerm = profile.standardTerms.some((term) => lowered.includes(term));
  const conciseTitle = wordCount >= 2 && wordCount <= 6;
  const hierarchyMetadata = normalized.hadNumbering;
  const authoritativeSource = profile.authoritativeSources.some((s) => source.includes(s));

  return {
    total:
      (standardTerm ? 2 : 0) +
      (conciseTitle ? 1 : 0) +
      (hierarchyMetadata ? 0.5 : 0) +
      (authoritativeSource ? 1 : 0),
    standardTerm,
    conciseTitle,
    hierarchyMetadata,
    authoritativeSource,
  };
}

export function supplementaryNote(record: TopicRecord): string {
  return `${record.title} (source ${record.sourceId}, ${record.sourceEducationalTier})`;
}

/**
 * Union-find over record positions, tracking each root's members.
 */
class RecordGroups {
  private readonly parent: number[];
  private readonly members = new Map<number, number[]>();

  constructor(size: number) {
    this.parent = Array.from({ length: size }, (_, i) => i);
    for (let i = 0; i < size; i++) {
      this.members.set(i, [i]);
    }
  }

  find(i: number): number {
    let root = i;
    while (this.parent[root] !== root) {
      root = this.parent[root] ?? root;
    }
    let node = i;
    while (node !== root) {
      const next = this.parent[node] ?? root;
      this.parent[node] = root;
      node = next;
    }
    return root;
  }

  membersOf(root: number): readonly number[] {
    return this.members.get(root) ?? [];
  }

  union(a: number, b: number): void {
    const [keep, drop] = a < b ? [a, b] : [b, a];
    this.parent[drop] = keep;
    this.members.set(keep, [...this.membersOf(keep), ...this.membersOf(drop)].sort((x, y) => x - y));
    this.members.delete(drop);
  }

  roots(): number[] {
    return [...this.members.keys()].sort((x, y) => x - y);
  }
}

/**
 * Group equivalent records and elect canonical representatives.
 */
export function dedupe(
  records: readonly TopicRecord[],
  profile: DisciplineProfile,
  options: DedupeOptions = {}
): ConceptGroup[] {
  const logger = options.logger ?? createSilentLogger();

  const kept: TopicRecord[] = [];
  records.forEach((record, index) => {
    if (record.title.trim() === "") {
      logger.warn("Skipping record with empty title", { index, sourceId: record.sourceId });
      options.onWarning?.({
        stage: "dedupe",
        kind: "record_skipped",
        message: `Record ${index} from ${record.sourceId} has an empty title`,
        details: { index, sourceId: record.sourceId },
      });
      return;
    }
    kept.push(record);
  });

  const normalized = kept.map((r) => normalizeTitle(r.title, profile.boilerplatePrefixes));

  const scores = new Map<string, number>();
  const score = (i: number, j: number): number => {
    const key = i < j ? `${i}:${j}` : `${j}:${i}`;
    let value = scores.get(key);
    if (value === undefined) {
      const a = normalized[i];
      const b = normalized[j];
      value = a !== undefined && b !== undefined ? similarityScore(a, b) : 0;
      scores.set(key, value);
    }
    return value;
  };

  const candidates: { i: number; j: number; score: number }[] = [];
  for (let i = 0; i < normalized.length; i++) {
    const a = normalized[i];
    if (a === undefined) continue;
    for (let j = i + 1; j < normalized.length; j++) {
      const b = normalized[j];
      if (b === undefined || !mayReachThreshold(a, b, MERGE_THRESHOLD)) continue;
      const s = score(i, j);
      if (s >= MERGE_THRESHOLD) {
        candidates.push({ i, j, score: s });
      }
    }
  }
  candidates.sort((x, y) => y.score - x.score || x.i - y.i || x.j - y.j);

  const groups = new RecordGroups(kept.length);
  for (const { i, j, score: pairScore } of candidates) {
    const rootA = groups.find(i);
    const rootB = groups.find(j);
    if (rootA === rootB) continue;

    const conflict = findConflict(groups.membersOf(rootA), groups.membersOf(rootB), score);
    if (conflict !== undefined) {
      const [x, y] = conflict;
      const message = `Refused to merge "${kept[i]?.title}" with "${kept[j]?.title}": "${kept[x]?.title}" and "${kept[y]?.title}" are dissimilar`;
      logger.warn(message, { score: pairScore });
      options.onWarning?.({
        stage: "dedupe",
        kind: "merge_refused",
        message,
        details: { score: pairScore, conflictScore: score(x, y) },
      });
      continue;
    }

    groups.union(rootA, rootB);
  }

  const result: ConceptGroup[] = groups.roots().flatMap((root) => {
    const members = groups.membersOf(root).flatMap((index) => {
      const record = kept[index];
      return record !== undefined ? [{ record, index }] : [];
    });
    const first = members[0];
    if (first === undefined) return [];

    let canonical = first.record;
    let canonicalScore = -1;
    for (const { record, index } of members) {
      const { total } = scoreCanonical(record, profile, normalized[index]);
      if (total > canonicalScore) {
        canonicalScore = total;
        canonical = record;
      }
    }

    const records = members.map((m) => m.record);
    return [
      {
        canonical,
        members: records,
        canonicalScore,
        supplementaryNotes: records.filter((r) => r !== canonical).map(supplementaryNote),
        educationalTier: records.reduce(
          (tier, r) => earlierTier(tier, r.sourceEducationalTier),
          canonical.sourceEducationalTier
        ),
      },
    ];
  });

  logger.info("Deduplicated topic records", {
    records: kept.length,
    groups: result.length,
    merged: kept.length - result.length,
  });

  return result;
}

function findConflict(
  left: readonly number[],
  right: readonly number[],
  score: (i: number, j: number) => number
): [number, number] | undefined {
  for (const x of left) {
    for (const y of right) {
      if (score(x, y) < CANNOT_LINK_THRESHOLD) {
        return [x, y];
      }
    }
  }
  return undefined;
}
