/**
 * Dependency graphs and cycle resolution.
 */

export { DependencyGraph } from "./dependency-graph.js";
export {
  buildClusterGraph,
  attachPrerequisites,
  progressionLadders,
  EXPLICIT_STRENGTH,
  PATTERN_STRENGTH,
  LADDER_STRENGTH,
  type ClusterGraphOptions,
} from "./cluster-graph.js";
export {
  resolveCycles,
  resolveCyclesWithReport,
  weakestEdge,
  type ResolveOptions,
  type CycleResolution,
} from "./resolver.js";
export { deriveSubtopicPrerequisites, buildSubtopicGraph, type SubtopicNode } from "./subtopic-graph.js";
