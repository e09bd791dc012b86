/**
 * Concept Deduplicator.
 */

export { dedupe, scoreCanonical, supplementaryNote, type CanonicalScore, type DedupeOptions } from "./deduplicator.js";
export {
  normalizeTitle,
  stripNumbering,
  stripBoilerplate,
  contentWords,
  type NormalizedTitle,
} from "./normalize.js";
export {
  similarityScore,
  characterRatio,
  wordOverlap,
  mayReachThreshold,
  MERGE_THRESHOLD,
  CANNOT_LINK_THRESHOLD,
} from "./similarity.js";
