/**
 * Cycle Resolver.
 *
 * Repeatedly finds cycles and removes the weakest edge of each, the most
 * recently inserted edge losing a strength tie. After `maxIterations`
 * rounds (default: node count x 3) every edge still on a cycle is removed
 * outright and the event is reported as a warning.
 *
 * The input graph is left untouched; an acyclic input yields an identical
 * copy.
 */

import type { DependencyEdge, StageOptions } from "../types/index.js";
import { createSilentLogger } from "../logging/index.js";
import type { DependencyGraph } from "./dependency-graph.js";

export interface ResolveOptions extends StageOptions {
  /** Rounds of weakest-edge removal before forced removal */
  maxIterations?: number;
}

export interface CycleResolution {
  readonly graph: DependencyGraph;
  /** Weakest edges removed, in removal order */
  readonly removedEdges: readonly DependencyEdge[];
  /** Edges removed after the iteration cap */
  readonly forcedEdges: readonly DependencyEdge[];
  readonly iterations: number;
}

/**
 * The edge a cycle gives up: lowest strength, latest insertion on ties.
 */
export function weakestEdge(edges: readonly DependencyEdge[]): DependencyEdge | undefined {
  let weakest: DependencyEdge | undefined;
  for (const edge of edges) {
    if (
      weakest === undefined ||
      edge.strength < weakest.strength ||
      (edge.strength === weakest.strength && edge.order > weakest.order)
    ) {
      weakest = edge;
    }
  }
  return weakest;
}

/**
 * Break every cycle, reporting what was removed.
 */
export function resolveCyclesWithReport(
  input: DependencyGraph,
  options: ResolveOptions = {}
): CycleResolution {
  const logger = options.logger ?? createSilentLogger();
  const graph = input.clone();
  const maxIterations = options.maxIterations ?? graph.nodes.length * 3;
  const removedEdges: DependencyEdge[] = [];
  const forcedEdges: DependencyEdge[] = [];

  let iterations = 0;
  let cycles = graph.findCycles();
  while (cycles.length > 0 && iterations < maxIterations) {
    iterations++;
    for (const cycle of cycles) {
      const edges = graph.cycleEdges(cycle);
      // An earlier removal this round may already have broken the cycle
      if (edges.length !== cycle.length) continue;

      const weakest = weakestEdge(edges);
      if (weakest === undefined) continue;
      graph.removeEdge(weakest.from, weakest.to);
      removedEdges.push(weakest);
      logger.debug("Removed cycle edge", {
        from: weakest.from,
        to: weakest.to,
        strength: weakest.strength,
        provenance: weakest.provenance,
      });
      options.onWarning?.({
        stage: "resolver",
        kind: "cycle_edge_removed",
        message: `Removed ${weakest.provenance} edge ${weakest.from} -> ${weakest.to} to break a cycle`,
        details: { from: weakest.from, to: weakest.to, strength: weakest.strength },
      });
    }
    cycles = graph.findCycles();
  }

  while (cycles.length > 0) {
    for (const cycle of cycles) {
      for (const edge of graph.cycleEdges(cycle)) {
        graph.removeEdge(edge.from, edge.to);
        forcedEdges.push(edge);
      }
    }
    cycles = graph.findCycles();
  }

  if (forcedEdges.length > 0) {
    const message = `Iteration cap of ${maxIterations} reached; forcibly removed ${forcedEdges.length} cyclic edge(s)`;
    logger.warn(message, { edges: forcedEdges.map((e) => `${e.from}->${e.to}`) });
    options.onWarning?.({
      stage: "resolver",
      kind: "forced_edge_removal",
      message,
      details: { edges: forcedEdges.map((e) => `${e.from}->${e.to}`) },
    });
  }

  if (removedEdges.length > 0 || forcedEdges.length > 0) {
    logger.info("Resolved dependency cycles", {
      removed: removedEdges.length,
      forced: forcedEdges.length,
      iterations,
    });
  }

  return { graph, removedEdges, forcedEdges, iterations };
}

/**
 * An acyclic copy of the graph.
 */
export function resolveCycles(graph: DependencyGraph, options: ResolveOptions = {}): DependencyGraph {
  return resolveCyclesWithReport(graph, options).graph;
}
