/**
 * Consistency Checker.
 *
 * Re-scans a finished sequence and reports violations as structured
 * findings. Read-only: the sequence is never modified and nothing is
 * thrown.
 *
 *   unresolved_prerequisite    error    prerequisite id not in the sequence
 *   prerequisite_order         error    prerequisite at or after its dependent
 *   complexity_inversion       warning  prerequisite more complex than dependent
 *   era_inversion              warning  prerequisite from a later era
 *   tier_regression            warning  tier drops more than one step
 *   missing_prerequisite_link  info     pattern suggests an unlisted prerequisite
 *
 * Complexity and era compare only where both titles name a mapped keyword;
 * a title naming several takes the highest.
 */

import type { DisciplineProfile } from "../config/discipline/schema.js";
import { tierRank } from "../config/discipline/enums.js";
import type { ConsistencyIssue, SubtopicRecord, StageOptions } from "../types/index.js";
import { createSilentLogger } from "../logging/index.js";

export type CheckOptions = StageOptions;

/**
 * Highest level among the keywords a title contains, or undefined.
 */
export function keywordLevel(title: string, levels: Readonly<Record<string, number>>): number | undefined {
  const lowered = title.toLowerCase();
  let level: number | undefined;
  for (const [keyword, value] of Object.entries(levels)) {
    if (lowered.includes(keyword.toLowerCase()) && (level === undefined || value > level)) {
      level = value;
    }
  }
  return level;
}

/**
 * Check a sequence against a discipline profile.
 */
export function check(
  sequence: readonly SubtopicRecord[],
  profile: DisciplineProfile,
  options: CheckOptions = {}
): ConsistencyIssue[] {
  const logger = options.logger ?? createSilentLogger();
  const discipline = profile.discipline;
  const issues: ConsistencyIssue[] = [];
  const byId = new Map(sequence.map((s) => [s.id, s]));

  for (const subtopic of sequence) {
    for (const prerequisiteId of subtopic.prerequisites) {
      const prerequisite = byId.get(prerequisiteId);
      if (prerequisite === undefined) {
        issues.push({
          kind: "unresolved_prerequisite",
          severity: "error",
          discipline,
          subtopicIds: [subtopic.id, prerequisiteId],
          description: `"${subtopic.title}" lists prerequisite ${prerequisiteId}, which is not in the sequence`,
        });
        continue;
      }

      if (prerequisite.sequenceIndex >= subtopic.sequenceIndex) {
        issues.push({
          kind: "prerequisite_order",
          severity: "error",
          discipline,
          subtopicIds: [subtopic.id, prerequisite.id],
          description: `"${subtopic.title}" (#${subtopic.sequenceIndex}) comes before its prerequisite "${prerequisite.title}" (#${prerequisite.sequenceIndex})`,
        });
      }

      const dependentComplexity = keywordLevel(subtopic.title, profile.complexityLevels);
      const prerequisiteComplexity = keywordLevel(prerequisite.title, profile.complexityLevels);
      if (
        dependentComplexity !== undefined &&
        prerequisiteComplexity !== undefined &&
        prerequisiteComplexity > dependentComplexity
      ) {
        issues.push({
          kind: "complexity_inversion",
          severity: "warning",
          discipline,
          subtopicIds: [subtopic.id, prerequisite.id],
          description: `Prerequisite "${prerequisite.title}" (complexity ${prerequisiteComplexity}) is more complex than "${subtopic.title}" (complexity ${dependentComplexity})`,
        });
      }

      const dependentEra = keywordLevel(subtopic.title, profile.eraLevels);
      const prerequisiteEra = keywordLevel(prerequisite.title, profile.eraLevels);
      if (dependentEra !== undefined && prerequisiteEra !== undefined && prerequisiteEra > dependentEra) {
        issues.push({
          kind: "era_inversion",
          severity: "warning",
          discipline,
          subtopicIds: [subtopic.id, prerequisite.id],
          description: `Prerequisite "${prerequisite.title}" (era ${prerequisiteEra}) is from a later era than "${subtopic.title}" (era ${dependentEra})`,
        });
      }
    }
  }

  // Position checks read the sequence by sequenceIndex, whatever the array order
  const ordered = [...sequence].sort((a, b) => a.sequenceIndex - b.sequenceIndex);

  for (let i = 1; i < ordered.length; i++) {
    const previous = ordered[i - 1];
    const current = ordered[i];
    if (previous === undefined || current === undefined) continue;
    const drop = tierRank(previous.educationalTier) - tierRank(current.educationalTier);
    if (drop > 1) {
      issues.push({
        kind: "tier_regression",
        severity: "warning",
        discipline,
        subtopicIds: [current.id, previous.id],
        description: `Tier drops ${drop} steps from ${previous.educationalTier} to ${current.educationalTier} at #${current.sequenceIndex}`,
      });
    }
  }

  issues.push(...missingLinks(ordered, profile));

  const counts = { error: 0, warning: 0, info: 0 };
  for (const issue of issues) counts[issue.severity]++;
  if (counts.error > 0 || counts.warning > 0) {
    logger.warn("Consistency check found violations", { ...counts });
  } else {
    logger.info("Consistency check passed", { ...counts });
  }

  return issues;
}

/**
 * Foundational items whose title matches a dependent keyword of the
 * pattern table while an earlier item matches one of its prerequisite
 * keywords but is not among the item's transitive prerequisites.
 */
function missingLinks(sequence: readonly SubtopicRecord[], profile: DisciplineProfile): ConsistencyIssue[] {
  const byId = new Map(sequence.map((s) => [s.id, s]));
  const ancestors = new Map<string, ReadonlySet<string>>();

  const ancestorsOf = (id: string): ReadonlySet<string> => {
    const cached = ancestors.get(id);
    if (cached !== undefined) return cached;
    // Guard against cycles in malformed input
    ancestors.set(id, new Set());
    const result = new Set<string>();
    for (const p of byId.get(id)?.prerequisites ?? []) {
      result.add(p);
      for (const a of ancestorsOf(p)) result.add(a);
    }
    ancestors.set(id, result);
    return result;
  };

  const patterns = Object.entries(profile.prerequisitePatterns).map(
    ([dependent, prerequisites]) => [dependent.toLowerCase(), prerequisites] as const
  );
  const issues: ConsistencyIssue[] = [];
  const lowered = sequence.map((s) => s.title.toLowerCase());

  sequence.forEach((subtopic, i) => {
    if (subtopic.variantKind !== "foundational") return;
    const title = lowered[i] ?? "";

    for (const [dependentKeyword, prerequisiteKeywords] of patterns) {
      if (!title.includes(dependentKeyword)) continue;

      const known = ancestorsOf(subtopic.id);
      for (let j = 0; j < i; j++) {
        const earlier = sequence[j];
        const earlierTitle = lowered[j] ?? "";
        if (earlier === undefined || earlier.clusterId === subtopic.clusterId) continue;
        if (!prerequisiteKeywords.some((k) => earlierTitle.includes(k))) continue;
        if (known.has(earlier.id)) break;

        issues.push({
          kind: "missing_prerequisite_link",
          severity: "info",
          discipline: profile.discipline,
          subtopicIds: [subtopic.id, earlier.id],
          description: `"${subtopic.title}" matches "${dependentKeyword}" but does not list "${earlier.title}" as a prerequisite`,
        });
        return;
      }
    }
  });

  return issues;
}
