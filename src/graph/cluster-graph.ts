/**
 * Dependency Graph Builder for clusters.
 *
 * Edge sources, in precedence order:
 *
 *   explicit         profile.explicitPrerequisites, by cluster label   1.0
 *   pattern-derived  profile.prerequisitePatterns on member titles     0.8
 *   pattern-derived  progression ladders on member titles              0.6
 *
 * Hierarchy level alone never adds an edge; level order is the
 * sequencer's concern.
 */

import type { DisciplineProfile } from "../config/discipline/schema.js";
import { GENERIC_PROGRESSION_LADDERS } from "../config/discipline/defaults.js";
import type { Cluster, StageOptions } from "../types/index.js";
import { createSilentLogger } from "../logging/index.js";
import { DependencyGraph } from "./dependency-graph.js";

export const EXPLICIT_STRENGTH = 1.0;
export const PATTERN_STRENGTH = 0.8;
export const LADDER_STRENGTH = 0.6;

export type ClusterGraphOptions = StageOptions;

function titlesOf(cluster: Cluster): string[] {
  return cluster.memberConcepts.map((t) => t.toLowerCase().replace(/’/g, "'"));
}

function matchesAny(titles: readonly string[], keywords: readonly string[]): boolean {
  return titles.some((title) => keywords.some((k) => title.includes(k)));
}

/**
 * Every ladder that applies to a profile: the generic ladders, then the
 * profile's own.
 */
export function progressionLadders(profile: DisciplineProfile): readonly (readonly string[])[] {
  return [...GENERIC_PROGRESSION_LADDERS, ...profile.progressionLadders];
}

/**
 * Derive prerequisite edges between clusters.
 */
export function buildClusterGraph(
  clusters: readonly Cluster[],
  profile: DisciplineProfile,
  options: ClusterGraphOptions = {}
): DependencyGraph {
  const logger = options.logger ?? createSilentLogger();
  const graph = new DependencyGraph(clusters.map((c) => c.id));
  const titles = new Map(clusters.map((c) => [c.id, titlesOf(c)]));
  const counts = { explicit: 0, pattern: 0, ladder: 0 };

  // Explicit
  for (const dependent of clusters) {
    const labels = profile.explicitPrerequisites[dependent.label] ?? [];
    for (const prerequisite of clusters) {
      if (!labels.includes(prerequisite.label)) continue;
      const result = graph.addEdge({
        from: prerequisite.id,
        to: dependent.id,
        strength: EXPLICIT_STRENGTH,
        provenance: "explicit",
      });
      if (result === "added" || result === "replaced") counts.explicit++;
    }
  }

  // Keyword patterns
  for (const [dependentKeyword, prerequisiteKeywords] of Object.entries(profile.prerequisitePatterns)) {
    const keyword = dependentKeyword.toLowerCase();
    const dependents = clusters.filter((c) => matchesAny(titles.get(c.id) ?? [], [keyword]));
    if (dependents.length === 0) continue;
    const prerequisites = clusters.filter((c) => matchesAny(titles.get(c.id) ?? [], prerequisiteKeywords));

    for (const dependent of dependents) {
      for (const prerequisite of prerequisites) {
        const result = graph.addEdge({
          from: prerequisite.id,
          to: dependent.id,
          strength: PATTERN_STRENGTH,
          provenance: "pattern-derived",
        });
        if (result === "added") counts.pattern++;
      }
    }
  }

  // Progression ladders
  for (const ladder of progressionLadders(profile)) {
    const steps = ladder.map((step) => clusters.filter((c) => matchesAny(titles.get(c.id) ?? [], [step])));
    for (let lower = 0; lower < steps.length; lower++) {
      for (let higher = lower + 1; higher < steps.length; higher++) {
        for (const prerequisite of steps[lower] ?? []) {
          for (const dependent of steps[higher] ?? []) {
            const result = graph.addEdge({
              from: prerequisite.id,
              to: dependent.id,
              strength: LADDER_STRENGTH,
              provenance: "pattern-derived",
            });
            if (result === "added") counts.ladder++;
          }
        }
      }
    }
  }

  logger.info("Built cluster dependency graph", {
    clusters: clusters.length,
    edges: graph.edgeCount,
    ...counts,
  });

  return graph;
}

/**
 * Copy each cluster with its prerequisites taken from the graph, in edge
 * insertion order.
 */
export function attachPrerequisites(clusters: readonly Cluster[], graph: DependencyGraph): Cluster[] {
  const prerequisites = new Map<string, string[]>();
  for (const edge of graph.edges()) {
    const list = prerequisites.get(edge.to) ?? [];
    list.push(edge.from);
    prerequisites.set(edge.to, list);
  }
  return clusters.map((c) => ({ ...c, prerequisiteClusterIds: prerequisites.get(c.id) ?? [] }));
}
