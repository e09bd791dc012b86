/**
 * Subtopic-level prerequisites, using the cluster graph as a skeleton.
 *
 *   - Every foundational item depends on the anchor (first foundational
 *     item) of each prerequisite cluster that produced items.
 *   - Every later item of a concept depends on that concept's first item.
 *   - Back-fill items depend on their cluster's anchor.
 *
 * Edge count stays linear in the number of items: at most one edge per
 * item, plus one per foundational item and prerequisite cluster.
 */

import type { Cluster, SubtopicRecord, VariantKind, StageOptions } from "../types/index.js";
import { createSilentLogger } from "../logging/index.js";
import { DependencyGraph } from "./dependency-graph.js";

/**
 * What the linker needs to know about an item, in final sequence order.
 */
export interface SubtopicNode {
  readonly id: string;
  readonly clusterId: string;
  /** Position of the expanded concept in its cluster; -1 for back-fill */
  readonly conceptIndex: number;
  readonly variantKind: VariantKind;
}

/**
 * Prerequisite ids per item id.
 */
export function deriveSubtopicPrerequisites(
  nodes: readonly SubtopicNode[],
  clusters: readonly Cluster[]
): Map<string, string[]> {
  const anchors = new Map<string, string>();
  const conceptHeads = new Map<string, string>();
  for (const node of nodes) {
    if (node.variantKind === "foundational" && !anchors.has(node.clusterId)) {
      anchors.set(node.clusterId, node.id);
    }
    const conceptKey = `${node.clusterId}\u0000${node.conceptIndex}`;
    if (node.conceptIndex >= 0 && !conceptHeads.has(conceptKey)) {
      conceptHeads.set(conceptKey, node.id);
    }
  }

  const clusterPrerequisites = new Map(clusters.map((c) => [c.id, c.prerequisiteClusterIds]));
  const result = new Map<string, string[]>();

  for (const node of nodes) {
    const prerequisites: string[] = [];
    const anchor = anchors.get(node.clusterId);

    if (node.variantKind === "foundational") {
      for (const clusterId of clusterPrerequisites.get(node.clusterId) ?? []) {
        const upstream = anchors.get(clusterId);
        if (upstream !== undefined && !prerequisites.includes(upstream)) {
          prerequisites.push(upstream);
        }
      }
    } else if (node.variantKind === "specialized") {
      if (anchor !== undefined) prerequisites.push(anchor);
    } else {
      const head = conceptHeads.get(`${node.clusterId}\u0000${node.conceptIndex}`);
      if (head !== undefined && head !== node.id) prerequisites.push(head);
    }

    result.set(node.id, prerequisites);
  }

  return result;
}

/**
 * Graph over subtopic ids from their prerequisite lists. Cross-cluster
 * edges carry the strength and provenance of the cluster edge they
 * inherit; within-cluster edges are explicit.
 */
export function buildSubtopicGraph(
  subtopics: readonly SubtopicRecord[],
  clusterGraph?: DependencyGraph,
  options: StageOptions = {}
): DependencyGraph {
  const logger = options.logger ?? createSilentLogger();
  const graph = new DependencyGraph(subtopics.map((s) => s.id));
  const clusterOf = new Map(subtopics.map((s) => [s.id, s.clusterId]));

  for (const subtopic of subtopics) {
    for (const prerequisite of subtopic.prerequisites) {
      const fromCluster = clusterOf.get(prerequisite);
      const skeleton =
        fromCluster !== undefined && fromCluster !== subtopic.clusterId
          ? clusterGraph?.getEdge(fromCluster, subtopic.clusterId)
          : undefined;

      graph.addEdge({
        from: prerequisite,
        to: subtopic.id,
        strength: skeleton?.strength ?? 1,
        provenance: skeleton?.provenance ?? "explicit",
      });
    }
  }

  logger.debug("Built subtopic dependency graph", {
    subtopics: subtopics.length,
    edges: graph.edgeCount,
  });

  return graph;
}
