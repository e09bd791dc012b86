/**
 * Cluster Builder.
 */

export {
  buildClusters,
  assignContentArea,
  expansionPotential,
  clampHierarchyLevel,
  LEVEL_MULTIPLIERS,
  MAX_HIERARCHY_LEVEL,
  type ClusterBuildOptions,
} from "./builder.js";
export { difficultyScore, averageDifficulty, MIN_DIFFICULTY, MAX_DIFFICULTY } from "./difficulty.js";
