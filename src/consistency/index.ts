/**
 * Consistency Checker.
 */

export { check, keywordLevel, type CheckOptions } from "./checker.js";
export { assessOrdering, DIFFICULTY_TOLERANCE, type OrderingQuality } from "./quality.js";
