/**
 * Curriculum data model: concept groups, clusters and generated subtopics.
 */

import type { CognitiveLevel, EducationalTier, QuestionType } from "../config/discipline/enums.js";
import type { TopicRecord } from "../records/schema.js";

/**
 * Records judged to denote the same concept.
 */
export interface ConceptGroup {
  /** Elected representative */
  readonly canonical: TopicRecord;
  /** Every member in input order, canonical included */
  readonly members: readonly TopicRecord[];
  /** Rubric score of the canonical member */
  readonly canonicalScore: number;
  /** One note per non-canonical member: "<title> (source <id>, <tier>)" */
  readonly supplementaryNotes: readonly string[];
  /** Most introductory tier among the members */
  readonly educationalTier: EducationalTier;
}

/**
 * A named, level-scoped grouping of concepts.
 */
export interface Cluster {
  /** `<slug>_L<level>_<NNN>` */
  readonly id: string;
  readonly label: string;
  /** 1..6 */
  readonly hierarchyLevel: number;
  /** Canonical concept titles, in first-seen order */
  readonly memberConcepts: readonly string[];
  /** Supplementary notes, parallel to memberConcepts */
  readonly conceptNotes: readonly (readonly string[])[];
  readonly expansionPotential: number;
  readonly educationalTier: EducationalTier;
  /** 1..10 */
  readonly difficulty: number;
  /** Filled from the resolved cluster graph */
  readonly prerequisiteClusterIds: readonly string[];
}

export const VARIANT_KINDS = ["foundational", "variant", "generic", "specialized"] as const;

/**
 * How a subtopic was generated.
 *
 *   foundational  first expansion template of a concept
 *   variant       a later expansion template
 *   generic       numbered "Advanced Topic N" once templates run out
 *   specialized   back-fill item from an under-represented cluster
 */
export type VariantKind = (typeof VARIANT_KINDS)[number];

/**
 * A fine-grained curriculum item. The unit of the final sequence.
 */
export interface SubtopicRecord {
  /** `<slug>_<NNNN>`, unique within the discipline */
  readonly id: string;
  readonly clusterId: string;
  readonly title: string;
  readonly educationalTier: EducationalTier;
  readonly cognitiveLevel: CognitiveLevel;
  /** Ids of subtopics that must precede this one */
  readonly prerequisites: readonly string[];
  /** Final position; the only ordering authority downstream */
  readonly sequenceIndex: number;
  readonly discipline: string;
  /** Concept this item expands */
  readonly conceptTitle: string;
  readonly variantKind: VariantKind;
  readonly hierarchyLevel: number;
  readonly learningObjectives: readonly string[];
  /** At least one; in the profile's rule order */
  readonly questionTypes: readonly QuestionType[];
}
