/**
 * Dependency graph edge types.
 */

import type { EdgeProvenance } from "../config/discipline/enums.js";

/**
 * A prerequisite relation: `from` must precede `to`.
 */
export interface DependencyEdge {
  /** Prerequisite node id */
  readonly from: string;
  /** Dependent node id */
  readonly to: string;
  /** (0, 1] */
  readonly strength: number;
  readonly provenance: EdgeProvenance;
  /** Insertion sequence number; later edges have larger values */
  readonly order: number;
}

export interface EdgeInput {
  readonly from: string;
  readonly to: string;
  readonly strength: number;
  readonly provenance: EdgeProvenance;
}

/** Outcome of an attempted edge insertion. */
export type AddEdgeResult = "added" | "replaced" | "kept-existing" | "self-loop";
