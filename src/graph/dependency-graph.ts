/**
 * Directed prerequisite graph.
 *
 * Nodes are cluster ids or subtopic ids. An edge `from -> to` means `from`
 * must precede `to`. Self-loops are never stored. When two sources relate
 * the same ordered pair, the edge of higher provenance precedence is kept;
 * an equal or lower one never replaces it.
 *
 * Iteration order is deterministic: nodes in insertion order, edges in
 * insertion order.
 */

import { PROVENANCE_PRECEDENCE } from "../config/discipline/enums.js";
import type { AddEdgeResult, DependencyEdge, EdgeInput } from "../types/index.js";

function edgeKey(from: string, to: string): string {
  return `${from}\u0000${to}`;
}

export class DependencyGraph {
  private readonly nodeIds: string[] = [];
  private readonly nodeIndex = new Map<string, number>();
  private readonly edgeMap = new Map<string, DependencyEdge>();
  private readonly outgoing = new Map<string, Set<string>>();
  private readonly incoming = new Map<string, Set<string>>();
  private sequence = 0;

  constructor(nodes: Iterable<string> = []) {
    for (const node of nodes) {
      this.addNode(node);
    }
  }

  addNode(id: string): void {
    if (this.nodeIndex.has(id)) return;
    this.nodeIndex.set(id, this.nodeIds.length);
    this.nodeIds.push(id);
    this.outgoing.set(id, new Set());
    this.incoming.set(id, new Set());
  }

  hasNode(id: string): boolean {
    return this.nodeIndex.has(id);
  }

  get nodes(): readonly string[] {
    return this.nodeIds;
  }

  get edgeCount(): number {
    return this.edgeMap.size;
  }

  /**
   * Insert an edge, adding unknown endpoints as nodes.
   */
  addEdge(input: EdgeInput): AddEdgeResult {
    if (input.from === input.to) {
      return "self-loop";
    }
    if (!(input.strength > 0 && input.strength <= 1)) {
      throw new RangeError(`Edge strength must be in (0, 1], got ${input.strength}`);
    }

    this.addNode(input.from);
    this.addNode(input.to);

    const key = edgeKey(input.from, input.to);
    const existing = this.edgeMap.get(key);
    if (
      existing !== undefined &&
      PROVENANCE_PRECEDENCE[input.provenance] <= PROVENANCE_PRECEDENCE[existing.provenance]
    ) {
      return "kept-existing";
    }

    this.edgeMap.set(key, { ...input, order: this.sequence++ });
    this.outgoing.get(input.from)?.add(input.to);
    this.incoming.get(input.to)?.add(input.from);
    return existing === undefined ? "added" : "replaced";
  }

  /** Re-insert an edge with its original insertion order. */
  private restoreEdge(edge: DependencyEdge): void {
    this.addNode(edge.from);
    this.addNode(edge.to);
    this.edgeMap.set(edgeKey(edge.from, edge.to), edge);
    this.outgoing.get(edge.from)?.add(edge.to);
    this.incoming.get(edge.to)?.add(edge.from);
    this.sequence = Math.max(this.sequence, edge.order + 1);
  }

  removeEdge(from: string, to: string): boolean {
    const removed = this.edgeMap.delete(edgeKey(from, to));
    if (removed) {
      this.outgoing.get(from)?.delete(to);
      this.incoming.get(to)?.delete(from);
    }
    return removed;
  }

  getEdge(from: string, to: string): DependencyEdge | undefined {
    return this.edgeMap.get(edgeKey(from, to));
  }

  hasEdge(from: string, to: string): boolean {
    return this.edgeMap.has(edgeKey(from, to));
  }

  /** Edges in insertion order. */
  edges(): DependencyEdge[] {
    return [...this.edgeMap.values()].sort((a, b) => a.order - b.order);
  }

  successors(id: string): string[] {
    return [...(this.outgoing.get(id) ?? [])];
  }

  predecessors(id: string): string[] {
    return [...(this.incoming.get(id) ?? [])];
  }

  /**
   * One cycle per DFS back edge, each as the node path `[a, b, ..., z]`
   * closed by the edge `z -> a`. Empty when the graph is acyclic.
   */
  findCycles(): string[][] {
    const WHITE = 0;
    const GRAY = 1;
    const BLACK = 2;
    const color = new Map<string, number>();
    const cycles: string[][] = [];

    for (const start of this.nodeIds) {
      if ((color.get(start) ?? WHITE) !== WHITE) continue;

      const path: string[] = [start];
      const iterators: Iterator<string>[] = [this.successors(start)[Symbol.iterator]()];
      color.set(start, GRAY);

      while (path.length > 0) {
        const iterator = iterators[iterators.length - 1];
        const node = path[path.length - 1];
        if (iterator === undefined || node === undefined) break;

        const step = iterator.next();
        if (step.done === true) {
          color.set(node, BLACK);
          path.pop();
          iterators.pop();
          continue;
        }

        const next = step.value;
        const state = color.get(next) ?? WHITE;
        if (state === WHITE) {
          color.set(next, GRAY);
          path.push(next);
          iterators.push(this.successors(next)[Symbol.iterator]());
        } else if (state === GRAY) {
          cycles.push(path.slice(path.indexOf(next)));
        }
      }
    }

    return cycles;
  }

  hasCycle(): boolean {
    return this.findCycles().length > 0;
  }

  /**
   * Edges along a cycle returned by findCycles().
   */
  cycleEdges(cycle: readonly string[]): DependencyEdge[] {
    const edges: DependencyEdge[] = [];
    cycle.forEach((from, i) => {
      const to = cycle[(i + 1) % cycle.length];
      const edge = to !== undefined ? this.getEdge(from, to) : undefined;
      if (edge !== undefined) edges.push(edge);
    });
    return edges;
  }

  /**
   * Subgraph on the given nodes, keeping only edges between them.
   */
  induce(nodeIds: Iterable<string>): DependencyGraph {
    const keep = new Set(nodeIds);
    const sub = new DependencyGraph(this.nodeIds.filter((id) => keep.has(id)));
    for (const edge of this.edges()) {
      if (keep.has(edge.from) && keep.has(edge.to)) {
        sub.restoreEdge(edge);
      }
    }
    return sub;
  }

  clone(): DependencyGraph {
    return this.induce(this.nodeIds);
  }

  /** Edge set as sorted `from->to` strings, for comparison. */
  edgeSignature(): string[] {
    return this.edges()
      .map((e) => `${e.from}->${e.to}`)
      .sort();
  }
}
