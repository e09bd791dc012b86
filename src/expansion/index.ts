/**
 * Quota Expander.
 */

export {
  expand,
  expandClusters,
  conceptVariants,
  specializedTitle,
  cognitiveLevelFor,
  fillTemplate,
  COGNITIVE_PROGRESSION,
  type ExpandOptions,
  type ExpansionResult,
} from "./expander.js";
export { questionTypesFor, learningObjectivesFor } from "./enrichment.js";
export { allocateQuotas, distributeQuota, type QuotaInput, type QuotaAllocation } from "./quotas.js";
