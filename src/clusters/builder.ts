/**
 * Cluster Builder.
 *
 * Partitions concept groups by hierarchy level (capped at 6), then by
 * content area. The first content area whose keyword appears in the
 * canonical title wins; unmatched concepts join the discipline's general
 * cluster.
 *
 * Clusters come out ordered by level, then by content-area order in the
 * profile, with the general cluster last in its level. Prerequisites are
 * left empty for the graph stage to fill.
 */

import type { DisciplineProfile } from "../config/discipline/schema.js";
import { generalClusterLabel } from "../config/discipline/schema.js";
import { earlierTier, type EducationalTier } from "../config/discipline/enums.js";
import type { Cluster, ConceptGroup, StageOptions } from "../types/index.js";
import { createSilentLogger } from "../logging/index.js";
import { difficultyScore, averageDifficulty } from "./difficulty.js";

export const MAX_HIERARCHY_LEVEL = 6;

/** Expansion multipliers by hierarchy level; mid levels expand most. */
export const LEVEL_MULTIPLIERS: Readonly<Record<number, number>> = {
  1: 2,
  2: 8,
  3: 12,
  4: 15,
  5: 8,
  6: 3,
};

export type ClusterBuildOptions = StageOptions;

export function clampHierarchyLevel(level: number): number {
  return Math.min(MAX_HIERARCHY_LEVEL, Math.max(1, Math.trunc(level)));
}

/**
 * Content-area label for a concept title.
 */
export function assignContentArea(title: string, profile: DisciplineProfile): string {
  const lowered = title.toLowerCase().replace(/’/g, "'");
  const area = profile.contentAreas.find((a) => a.keywords.some((k) => lowered.includes(k)));
  return area?.name ?? generalClusterLabel(profile);
}

export function expansionPotential(
  memberCount: number,
  hierarchyLevel: number,
  disciplineFactor: number
): number {
  return memberCount * (LEVEL_MULTIPLIERS[clampHierarchyLevel(hierarchyLevel)] ?? 1) * disciplineFactor;
}

interface Bucket {
  label: string;
  level: number;
  groups: ConceptGroup[];
}

/**
 * Partition concept groups into clusters.
 */
export function buildClusters(
  groups: readonly ConceptGroup[],
  profile: DisciplineProfile,
  options: ClusterBuildOptions = {}
): Cluster[] {
  const logger = options.logger ?? createSilentLogger();
  const general = generalClusterLabel(profile);
  const labelRank = new Map<string, number>();
  profile.contentAreas.forEach((area, i) => {
    if (!labelRank.has(area.name)) labelRank.set(area.name, i);
  });

  const buckets = new Map<string, Bucket>();
  for (const group of groups) {
    const level = clampHierarchyLevel(group.canonical.hierarchyLevel);
    const label = assignContentArea(group.canonical.title, profile);
    const key = `${level}\u0000${label}`;
    const bucket = buckets.get(key) ?? { label, level, groups: [] };
    bucket.groups.push(group);
    buckets.set(key, bucket);
  }

  const rank = (label: string): number =>
    label === general ? Number.MAX_SAFE_INTEGER : (labelRank.get(label) ?? Number.MAX_SAFE_INTEGER - 1);

  const ordered = [...buckets.values()].sort(
    (a, b) => a.level - b.level || rank(a.label) - rank(b.label) || a.label.localeCompare(b.label)
  );

  const counters = new Map<number, number>();
  const clusters = ordered.map((bucket): Cluster => {
    const n = (counters.get(bucket.level) ?? 0) + 1;
    counters.set(bucket.level, n);

    const first = bucket.groups[0];
    const tier: EducationalTier = bucket.groups.reduce<EducationalTier>(
      (t, g) => earlierTier(t, g.educationalTier),
      first?.educationalTier ?? "grad_advanced"
    );

    return {
      id: `${profile.slug}_L${bucket.level}_${String(n).padStart(3, "0")}`,
      label: bucket.label,
      hierarchyLevel: bucket.level,
      memberConcepts: bucket.groups.map((g) => g.canonical.title),
      conceptNotes: bucket.groups.map((g) => g.supplementaryNotes),
      expansionPotential: expansionPotential(bucket.groups.length, bucket.level, profile.disciplineFactor),
      educationalTier: tier,
      difficulty: averageDifficulty(
        bucket.groups.map((g) => difficultyScore(g.canonical.title, g.educationalTier))
      ),
      prerequisiteClusterIds: [],
    };
  });

  logger.info("Built clusters", { groups: groups.length, clusters: clusters.length });
  for (const cluster of clusters) {
    logger.debug("Cluster", {
      id: cluster.id,
      label: cluster.label,
      members: cluster.memberConcepts.length,
      potential: cluster.expansionPotential,
      tier: cluster.educationalTier,
    });
  }

  return clusters;
}
