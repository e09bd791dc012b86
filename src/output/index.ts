/**
 * Curriculum document exports.
 */

export {
  CurriculumDocumentSchema,
  CurriculumStatsSchema,
  SubtopicSchema,
  ClusterSummarySchema,
  ConsistencyIssueSchema,
  RunMetadataSchema,
  GitStateSchema,
  CURRICULUM_DOCUMENT_VERSION,
  type CurriculumDocument,
  type CurriculumStats,
  type RunMetadata,
  type GitState,
} from "./schema.js";

export { captureGitState, createRunMetadata, type RunMetadataOptions } from "./metadata.js";

export {
  CurriculumDocumentError,
  createCurriculumDocument,
  serializeCurriculum,
  deserializeCurriculum,
  isVersionCompatible,
  getCurriculumFilename,
  saveCurriculum,
  loadCurriculum,
  summarizeCurriculum,
  type SummaryOptions,
} from "./serialization.js";
