/**
 * Shared type foundations for the curriculum assembler.
 */

export type { TopicRecord } from "../records/schema.js";
export type { EducationalTier, CognitiveLevel, EdgeProvenance, QuestionType } from "../config/discipline/enums.js";
export * from "./curriculum.js";
export * from "./graph.js";
export * from "./findings.js";
export * from "./stage.js";
