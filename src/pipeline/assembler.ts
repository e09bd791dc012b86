/**
 * Curriculum assembler.
 *
 * Wires the stages into one run over a discipline's topic records:
 *
 *   records → dedupe → clusters → cluster graph → cycle resolution
 *           → tier-aware sequencing → quota expansion → subtopic graph
 *           → consistency check
 *
 * Once records are accepted nothing here throws. Recovered defects are
 * collected as warnings and violations as issues on the result.
 */

import type { DisciplineProfile } from "../config/discipline/schema.js";
import type {
  Cluster,
  ConceptGroup,
  ConsistencyIssue,
  IssueSeverity,
  PipelineStage,
  PipelineWarning,
  StageOptions,
  SubtopicRecord,
  TopicRecord,
} from "../types/index.js";
import { type Logger, createSilentLogger } from "../logging/index.js";
import { type SkippedRecord, type TopicRecordLoadResult, loadTopicRecords } from "../records/index.js";
import { dedupe } from "../dedupe/index.js";
import { buildClusters } from "../clusters/index.js";
import {
  type DependencyGraph,
  attachPrerequisites,
  buildClusterGraph,
  buildSubtopicGraph,
  resolveCyclesWithReport,
} from "../graph/index.js";
import { sequence } from "../sequencing/index.js";
import { expandClusters } from "../expansion/index.js";
import { type OrderingQuality, assessOrdering, check } from "../consistency/index.js";

export interface AssemblerOptions {
  profile: DisciplineProfile;
  /** Defaults to the profile's targetSubtopics */
  target?: number;
  logger?: Logger;
  /** Cycle resolution cap; three rounds per cluster when omitted */
  maxResolverIterations?: number;
}

export interface AssemblyStats {
  readonly records: { readonly total: number; readonly accepted: number; readonly skipped: number };
  readonly conceptGroups: number;
  readonly clusters: number;
  readonly clusterEdges: number;
  readonly removedEdges: number;
  readonly forcedRemovals: number;
  readonly promotions: number;
  readonly subtopics: number;
  readonly subtopicEdges: number;
  readonly trimmed: number;
  readonly backfilled: number;
  readonly issues: Readonly<Record<IssueSeverity, number>>;
  readonly quality: OrderingQuality;
}

export interface CurriculumAssembly {
  readonly discipline: string;
  readonly slug: string;
  readonly target: number;
  /** Final sequence; sequenceIndex is the ordering authority */
  readonly subtopics: readonly SubtopicRecord[];
  /** Clusters in sequence order, with effective tiers */
  readonly clusters: readonly Cluster[];
  readonly conceptGroups: readonly ConceptGroup[];
  /** Acyclic cluster graph after resolution */
  readonly clusterGraph: DependencyGraph;
  readonly subtopicGraph: DependencyGraph;
  readonly issues: readonly ConsistencyIssue[];
  readonly warnings: readonly PipelineWarning[];
  readonly stats: AssemblyStats;
}

export class CurriculumAssembler {
  readonly profile: DisciplineProfile;
  readonly target: number;
  private readonly logger: Logger;
  private readonly maxResolverIterations: number | undefined;

  constructor(options: AssemblerOptions) {
    const target = options.target ?? options.profile.targetSubtopics;
    if (!Number.isInteger(target) || target < 0) {
      throw new RangeError(`Target subtopic count must be a non-negative integer, got ${target}`);
    }
    this.profile = options.profile;
    this.target = target;
    this.logger = (options.logger ?? createSilentLogger()).child(options.profile.slug);
    this.maxResolverIterations = options.maxResolverIterations;
  }

  /**
   * Validate a raw record collection, then assemble the accepted records.
   * Skipped records are reported as warnings.
   */
  assembleCollection(input: unknown): CurriculumAssembly {
    return this.assembleLoaded(loadTopicRecords(input, { logger: this.logger.child("records") }));
  }

  /**
   * Assemble the output of the record loader.
   */
  assembleLoaded(loaded: TopicRecordLoadResult): CurriculumAssembly {
    return this.run(loaded.records, loaded.skipped);
  }

  /**
   * Assemble already-validated records.
   */
  assemble(records: readonly TopicRecord[]): CurriculumAssembly {
    return this.run(records, []);
  }

  private run(records: readonly TopicRecord[], skipped: readonly SkippedRecord[]): CurriculumAssembly {
    const { profile, target } = this;
    const warnings: PipelineWarning[] = [];
    const stage = (name: PipelineStage): StageOptions => ({
      logger: this.logger.child(name),
      onWarning: (warning) => {
        warnings.push(warning);
      },
    });

    for (const record of skipped) {
      warnings.push({
        stage: "records",
        kind: "record_skipped",
        message: `Skipped record ${record.index}: ${record.message}`,
        details: { index: record.index, reason: record.reason },
      });
    }

    this.logger.info("Assembling curriculum", { records: records.length, target });

    const conceptGroups = dedupe(records, profile, stage("dedupe"));
    const clusters = buildClusters(conceptGroups, profile, stage("clusters"));
    const rawGraph = buildClusterGraph(clusters, profile, stage("graph"));
    const resolution = resolveCyclesWithReport(rawGraph, {
      ...stage("resolver"),
      maxIterations: this.maxResolverIterations,
    });
    const clusterGraph = resolution.graph;
    const linked = attachPrerequisites(clusters, clusterGraph);

    const sequenced = sequence(
      clusterGraph,
      linked.map((c) => ({ id: c.id, tier: c.educationalTier, difficulty: c.difficulty })),
      stage("sequencer")
    );
    const byId = new Map(linked.map((c) => [c.id, c]));
    const ordered = sequenced.order.flatMap((id): Cluster[] => {
      const cluster = byId.get(id);
      if (cluster === undefined) return [];
      return [{ ...cluster, educationalTier: sequenced.effectiveTiers.get(id) ?? cluster.educationalTier }];
    });

    const expansion = expandClusters(ordered, target, profile, stage("expansion"));
    const subtopicGraph = buildSubtopicGraph(expansion.subtopics, clusterGraph, stage("graph"));
    const issues = check(expansion.subtopics, profile, stage("consistency"));
    const quality = assessOrdering(expansion.subtopics, issues);

    const severities: Record<IssueSeverity, number> = { error: 0, warning: 0, info: 0 };
    for (const issue of issues) severities[issue.severity]++;

    const stats: AssemblyStats = {
      records: { total: records.length + skipped.length, accepted: records.length, skipped: skipped.length },
      conceptGroups: conceptGroups.length,
      clusters: ordered.length,
      clusterEdges: clusterGraph.edgeCount,
      removedEdges: resolution.removedEdges.length,
      forcedRemovals: resolution.forcedEdges.length,
      promotions: sequenced.promotions.length,
      subtopics: expansion.subtopics.length,
      subtopicEdges: subtopicGraph.edgeCount,
      trimmed: expansion.trimmed,
      backfilled: expansion.backfilled,
      issues: severities,
      quality,
    };

    this.logger.info("Assembled curriculum", {
      subtopics: stats.subtopics,
      clusters: stats.clusters,
      warnings: warnings.length,
      errors: severities.error,
      quality: quality.score,
    });

    return {
      discipline: profile.discipline,
      slug: profile.slug,
      target,
      subtopics: expansion.subtopics,
      clusters: ordered,
      conceptGroups,
      clusterGraph,
      subtopicGraph,
      issues,
      warnings,
      stats,
    };
  }
}

/**
 * One-shot assembly with a fresh assembler.
 */
export function assembleCurriculum(
  records: readonly TopicRecord[],
  options: AssemblerOptions
): CurriculumAssembly {
  return new CurriculumAssembler(options).assemble(records);
}
