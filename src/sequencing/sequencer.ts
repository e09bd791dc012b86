/**
 * Level-Aware Sequencer.
 *
 * Linearizes an acyclic graph so that every prerequisite precedes its
 * dependents and tiers never decrease along the sequence.
 *
 * 1. Tier promotion: a node whose prerequisite sits in a later tier is
 *    moved up to that tier, transitively. Afterwards every edge runs from
 *    an earlier-or-equal tier to a later-or-equal one.
 * 2. Nodes are bucketed by effective tier in tier order.
 * 3. Each bucket is ordered by Kahn's algorithm on its induced subgraph,
 *    ties broken by input order. A bucket whose subgraph still has a cycle
 *    falls back to ascending difficulty.
 */

import {
  TIER_ORDER,
  laterTier,
  type EducationalTier,
} from "../config/discipline/enums.js";
import type { StageOptions } from "../types/index.js";
import { createSilentLogger } from "../logging/index.js";
import type { DependencyGraph } from "../graph/dependency-graph.js";

export interface SequenceNode {
  readonly id: string;
  readonly tier: EducationalTier;
  /** Declared difficulty, used only by the fallback ordering */
  readonly difficulty: number;
}

export interface SequenceResult {
  /** Node ids, a permutation of the input */
  readonly order: readonly string[];
  /** Tier each node was sequenced under */
  readonly effectiveTiers: ReadonlyMap<string, EducationalTier>;
  /** Nodes moved to a later tier */
  readonly promotions: readonly { id: string; from: EducationalTier; to: EducationalTier }[];
  /** Tiers whose bucket fell back to difficulty order */
  readonly fallbackTiers: readonly EducationalTier[];
}

export type SequenceOptions = StageOptions;

/**
 * Raise each node to the latest tier among its prerequisites, until stable.
 * Terminates on cyclic graphs too, since tiers only ever increase.
 */
export function promoteTiers(
  graph: DependencyGraph,
  nodes: readonly SequenceNode[]
): Map<string, EducationalTier> {
  const tiers = new Map(nodes.map((n) => [n.id, n.tier]));
  const edges = graph.edges().filter((e) => tiers.has(e.from) && tiers.has(e.to));

  let changed = true;
  while (changed) {
    changed = false;
    for (const edge of edges) {
      const from = tiers.get(edge.from);
      const to = tiers.get(edge.to);
      if (from === undefined || to === undefined) continue;
      const promoted = laterTier(from, to);
      if (promoted !== to) {
        tiers.set(edge.to, promoted);
        changed = true;
      }
    }
  }

  return tiers;
}

/**
 * Kahn's algorithm over the graph induced on `ids`, always emitting the
 * ready node that comes first in `ids`. Returns undefined on a cycle.
 */
export function topologicalOrder(graph: DependencyGraph, ids: readonly string[]): string[] | undefined {
  const position = new Map(ids.map((id, i) => [id, i]));
  const indegree = new Map<string, number>(ids.map((id) => [id, 0]));
  for (const id of ids) {
    for (const next of graph.successors(id)) {
      const degree = indegree.get(next);
      if (degree !== undefined) indegree.set(next, degree + 1);
    }
  }

  const ready = ids.filter((id) => indegree.get(id) === 0);
  const order: string[] = [];

  while (ready.length > 0) {
    let best = 0;
    for (let i = 1; i < ready.length; i++) {
      const candidate = ready[i];
      const current = ready[best];
      if (
        candidate !== undefined &&
        current !== undefined &&
        (position.get(candidate) ?? 0) < (position.get(current) ?? 0)
      ) {
        best = i;
      }
    }
    const [id] = ready.splice(best, 1);
    if (id === undefined) break;
    order.push(id);

    for (const next of graph.successors(id)) {
      const degree = indegree.get(next);
      if (degree === undefined) continue;
      indegree.set(next, degree - 1);
      if (degree - 1 === 0) ready.push(next);
    }
  }

  return order.length === ids.length ? order : undefined;
}

/**
 * Order nodes by tier, then by prerequisites within each tier.
 */
export function sequence(
  graph: DependencyGraph,
  nodes: readonly SequenceNode[],
  options: SequenceOptions = {}
): SequenceResult {
  const logger = options.logger ?? createSilentLogger();
  const effectiveTiers = promoteTiers(graph, nodes);

  const promotions: { id: string; from: EducationalTier; to: EducationalTier }[] = [];
  for (const node of nodes) {
    const tier = effectiveTiers.get(node.id) ?? node.tier;
    if (tier !== node.tier) {
      promotions.push({ id: node.id, from: node.tier, to: tier });
      logger.info("Promoted node to a later tier", { id: node.id, from: node.tier, to: tier });
      options.onWarning?.({
        stage: "sequencer",
        kind: "tier_promotion",
        message: `Promoted ${node.id} from ${node.tier} to ${tier} to follow its prerequisites`,
        details: { id: node.id, from: node.tier, to: tier },
      });
    }
  }

  const order: string[] = [];
  const fallbackTiers: EducationalTier[] = [];

  for (const tier of TIER_ORDER) {
    const bucket = nodes.filter((n) => (effectiveTiers.get(n.id) ?? n.tier) === tier);
    if (bucket.length === 0) continue;

    const ids = bucket.map((n) => n.id);
    const sub = graph.induce(ids);
    const sorted = topologicalOrder(sub, ids);
    if (sorted !== undefined) {
      order.push(...sorted);
      continue;
    }

    const byDifficulty = bucket
      .map((node, i) => ({ node, i }))
      .sort((a, b) => a.node.difficulty - b.node.difficulty || a.i - b.i)
      .map(({ node }) => node.id);
    order.push(...byDifficulty);
    fallbackTiers.push(tier);

    const message = `Cycle among ${tier} nodes; ordered ${bucket.length} node(s) by difficulty`;
    logger.warn(message, { tier });
    options.onWarning?.({
      stage: "sequencer",
      kind: "sequencing_fallback",
      message,
      details: { tier, nodes: byDifficulty },
    });
  }

  logger.debug("Sequenced nodes", {
    nodes: order.length,
    promotions: promotions.length,
    fallbacks: fallbackTiers.length,
  });

  return { order, effectiveTiers, promotions, fallbackTiers };
}
