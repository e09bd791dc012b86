/**
 * Quota Expander.
 *
 * Turns sequenced clusters into exactly `target` subtopics:
 *
 * 1. Allocate quotas across clusters (see quotas.ts).
 * 2. Within a cluster, split the quota across concepts and expand each
 *    concept through the profile's expansion templates. The first template
 *    gives the foundational item; once templates run out, items are
 *    numbered "<topic> - Advanced Topic N".
 * 3. Back-fill any shortfall with specialized items, one at a time, into
 *    the least-populated cluster (sequence order breaks ties). Back-fill
 *    items join the end of their cluster's block.
 * 4. Link prerequisites, attach learning objectives and question types,
 *    and assign sequenceIndex in block order.
 *
 * This is the only place sequenceIndex is written.
 */

import type { DisciplineProfile } from "../config/discipline/schema.js";
import type { CognitiveLevel } from "../config/discipline/enums.js";
import type { Cluster, SubtopicRecord, VariantKind, StageOptions } from "../types/index.js";
import { createSilentLogger } from "../logging/index.js";
import { deriveSubtopicPrerequisites } from "../graph/subtopic-graph.js";
import { allocateQuotas, distributeQuota } from "./quotas.js";
import { learningObjectivesFor, questionTypesFor } from "./enrichment.js";

/** Cognitive progression for generated items, lowest first. */
export const COGNITIVE_PROGRESSION: readonly CognitiveLevel[] = [
  "understand",
  "apply",
  "analyze",
  "evaluate",
  "create",
];

export type ExpandOptions = StageOptions;

export interface ExpansionResult {
  /** Final sequence, sequenceIndex 1..n */
  readonly subtopics: readonly SubtopicRecord[];
  /** Quota per cluster id, before back-fill */
  readonly quotas: ReadonlyMap<string, number>;
  readonly backfilled: number;
  readonly trimmed: number;
}

interface Draft {
  id: string;
  clusterId: string;
  title: string;
  conceptTitle: string;
  conceptIndex: number;
  variantKind: VariantKind;
  cognitiveLevel: CognitiveLevel;
}

export function fillTemplate(template: string, topic: string): string {
  return template.split("{topic}").join(topic);
}

/**
 * Cognitive level for a generated item: the progression entry at
 * min(level - 1, 4), one step higher on odd variants, two for back-fill.
 */
export function cognitiveLevelFor(hierarchyLevel: number, variantIndex: number, specialized = false): CognitiveLevel {
  const last = COGNITIVE_PROGRESSION.length - 1;
  const base = Math.min(Math.max(hierarchyLevel - 1, 0), last);
  const step = specialized ? 2 : variantIndex % 2;
  return COGNITIVE_PROGRESSION[Math.min(base + step, last)] ?? "create";
}

/**
 * Expansion of one concept into `count` items.
 */
export function conceptVariants(
  concept: string,
  count: number,
  templates: readonly string[]
): { title: string; variantKind: VariantKind }[] {
  return Array.from({ length: count }, (_, v) => {
    const template = templates[v];
    if (template !== undefined) {
      return { title: fillTemplate(template, concept), variantKind: v === 0 ? "foundational" : "variant" };
    }
    return { title: `${concept} - Advanced Topic ${v - templates.length + 1}`, variantKind: "generic" };
  });
}

/**
 * Title of the n-th back-fill item of a cluster: concepts cycle fastest,
 * then templates; later rounds are numbered.
 */
export function specializedTitle(cluster: Cluster, n: number, templates: readonly string[]): string {
  const concepts = cluster.memberConcepts;
  const concept = concepts[n % concepts.length] ?? cluster.label;
  const slot = Math.floor(n / concepts.length);
  const template = templates[slot % templates.length] ?? "{topic}";
  const round = Math.floor(slot / templates.length);
  const title = fillTemplate(template, concept);
  return round === 0 ? title : `${title} (${round + 1})`;
}

/**
 * Expand clusters, already in sequence order, to exactly `target` items.
 */
export function expandClusters(
  orderedClusters: readonly Cluster[],
  target: number,
  profile: DisciplineProfile,
  options: ExpandOptions = {}
): ExpansionResult {
  const logger = options.logger ?? createSilentLogger();
  const allocation = allocateQuotas(
    orderedClusters.map((c) => ({
      expansionPotential: c.expansionPotential,
      memberCount: c.memberConcepts.length,
    })),
    target
  );

  let counter = 0;
  const nextId = (): string => `${profile.slug}_${String(++counter).padStart(4, "0")}`;

  const blocks: Draft[][] = orderedClusters.map((cluster, i) => {
    const quota = allocation.quotas[i] ?? 0;
    const perConcept = distributeQuota(quota, cluster.memberConcepts.length);
    const block: Draft[] = [];

    cluster.memberConcepts.forEach((concept, conceptIndex) => {
      const variants = conceptVariants(concept, perConcept[conceptIndex] ?? 0, profile.expansionSuffixes);
      variants.forEach(({ title, variantKind }, v) => {
        block.push({
          id: nextId(),
          clusterId: cluster.id,
          title,
          conceptTitle: concept,
          conceptIndex,
          variantKind,
          cognitiveLevel: cognitiveLevelFor(cluster.hierarchyLevel, v),
        });
      });
    });

    logger.debug("Expanded cluster", { clusterId: cluster.id, quota, concepts: cluster.memberConcepts.length });
    return block;
  });

  const backfillCounts = orderedClusters.map(() => 0);
  let backfilled = 0;
  for (let n = 0; n < allocation.shortfall; n++) {
    let pick = -1;
    orderedClusters.forEach((cluster, i) => {
      if (cluster.memberConcepts.length === 0) return;
      const size = blocks[i]?.length ?? 0;
      if (pick < 0 || size < (blocks[pick]?.length ?? 0)) pick = i;
    });
    const cluster = orderedClusters[pick];
    const block = blocks[pick];
    if (cluster === undefined || block === undefined) break;

    const k = backfillCounts[pick] ?? 0;
    backfillCounts[pick] = k + 1;
    block.push({
      id: nextId(),
      clusterId: cluster.id,
      title: specializedTitle(cluster, k, profile.specializedSuffixes),
      conceptTitle: cluster.memberConcepts[k % cluster.memberConcepts.length] ?? cluster.label,
      conceptIndex: -1,
      variantKind: "specialized",
      cognitiveLevel: cognitiveLevelFor(cluster.hierarchyLevel, 0, true),
    });
    backfilled++;
  }

  if (allocation.trimmed > 0 || backfilled > 0) {
    const message = `Adjusted rounded quotas to the target of ${target}: trimmed ${allocation.trimmed}, back-filled ${backfilled}`;
    logger.info(message);
    options.onWarning?.({
      stage: "expansion",
      kind: "quota_adjusted",
      message,
      details: { trimmed: allocation.trimmed, backfilled },
    });
  }

  const drafts = blocks.flat();
  const prerequisites = deriveSubtopicPrerequisites(drafts, orderedClusters);
  const clustersById = new Map(orderedClusters.map((c) => [c.id, c]));

  const subtopics = drafts.flatMap((draft, i): SubtopicRecord[] => {
    const cluster = clustersById.get(draft.clusterId);
    if (cluster === undefined) return [];
    return [
      {
        id: draft.id,
        clusterId: draft.clusterId,
        title: draft.title,
        educationalTier: cluster.educationalTier,
        cognitiveLevel: draft.cognitiveLevel,
        prerequisites: prerequisites.get(draft.id) ?? [],
        sequenceIndex: i + 1,
        discipline: profile.discipline,
        conceptTitle: draft.conceptTitle,
        variantKind: draft.variantKind,
        hierarchyLevel: cluster.hierarchyLevel,
        learningObjectives: learningObjectivesFor(draft.title, profile),
        questionTypes: questionTypesFor(draft.title, profile),
      },
    ];
  });

  if (subtopics.length !== target) {
    logger.warn("Generated subtopic count differs from the target", {
      target,
      generated: subtopics.length,
    });
  }

  logger.info("Expanded clusters into subtopics", {
    clusters: orderedClusters.length,
    subtopics: subtopics.length,
    target,
  });

  return {
    subtopics,
    quotas: new Map(orderedClusters.map((c, i) => [c.id, allocation.quotas[i] ?? 0])),
    backfilled,
    trimmed: allocation.trimmed,
  };
}

/**
 * The expanded sequence alone.
 */
export function expand(
  orderedClusters: readonly Cluster[],
  target: number,
  profile: DisciplineProfile,
  options: ExpandOptions = {}
): SubtopicRecord[] {
  return [...expandClusters(orderedClusters, target, profile, options).subtopics];
}
