/**
 * Non-fatal findings reported by the pipeline.
 */

export const ISSUE_KINDS = [
  "prerequisite_order",
  "unresolved_prerequisite",
  "complexity_inversion",
  "era_inversion",
  "tier_regression",
  "missing_prerequisite_link",
] as const;

export type IssueKind = (typeof ISSUE_KINDS)[number];

export const ISSUE_SEVERITIES = ["error", "warning", "info"] as const;

export type IssueSeverity = (typeof ISSUE_SEVERITIES)[number];

/**
 * A consistency finding on the final sequence.
 */
export interface ConsistencyIssue {
  readonly kind: IssueKind;
  readonly severity: IssueSeverity;
  readonly discipline: string;
  /** Offending subtopic ids; the dependent first where there is one */
  readonly subtopicIds: readonly string[];
  readonly description: string;
}

export const PIPELINE_STAGES = [
  "records",
  "dedupe",
  "clusters",
  "graph",
  "resolver",
  "sequencer",
  "expansion",
  "consistency",
] as const;

export type PipelineStage = (typeof PIPELINE_STAGES)[number];

export const WARNING_KINDS = [
  "record_skipped",
  "merge_refused",
  "cycle_edge_removed",
  "forced_edge_removal",
  "sequencing_fallback",
  "tier_promotion",
  "quota_adjusted",
] as const;

export type WarningKind = (typeof WARNING_KINDS)[number];

/**
 * A recovered defect. The run continued with a deterministic fallback.
 */
export interface PipelineWarning {
  readonly stage: PipelineStage;
  readonly kind: WarningKind;
  readonly message: string;
  readonly details?: Readonly<Record<string, unknown>>;
}
