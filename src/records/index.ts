/**
 * Input boundary: raw topic records from the extraction collaborator.
 */

export {
  TopicRecordSchema,
  TopicRecordCollectionSchema,
  type TopicRecord,
  type TopicRecordCollection,
} from "./schema.js";

export {
  loadTopicRecords,
  loadTopicRecordsFromFile,
  RecordCollectionError,
  type CollectionIssue,
  type SkipReason,
  type SkippedRecord,
  type LoadRecordsOptions,
  type TopicRecordLoadResult,
} from "./loader.js";
