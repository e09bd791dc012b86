/**
 * Topic record loader.
 *
 * Responsible for:
 * - Validating the collection envelope (fatal if it is not a collection)
 * - Validating each record independently
 * - Skipping defective records with a logged, structured reason
 *
 * A defective record never fails the run. Only an input that is not a
 * record collection at all raises RecordCollectionError.
 */

import { readFileSync, existsSync } from "node:fs";
import { TopicRecordSchema, TopicRecordCollectionSchema, type TopicRecord } from "./schema.js";
import { deepFreeze } from "../config/discipline/loader.js";
import { createSilentLogger, type Logger } from "../logging/index.js";

/**
 * The input is not a record collection.
 */
export class RecordCollectionError extends Error {
  public readonly issues: CollectionIssue[];

  constructor(message: string, issues: CollectionIssue[] = []) {
    super(message);
    this.name = "RecordCollectionError";
    this.issues = issues;
  }

  format(): string {
    const lines = [this.message];
    for (const issue of this.issues) {
      lines.push(`  - ${issue.field}: ${issue.message}`);
    }
    return lines.join("\n");
  }
}

export interface CollectionIssue {
  field: string;
  message: string;
}

export type SkipReason = "empty_title" | "invalid_record";

/**
 * A record that was dropped before grouping.
 */
export interface SkippedRecord {
  /** Position in the input collection */
  readonly index: number;
  readonly reason: SkipReason;
  readonly message: string;
}

export interface LoadRecordsOptions {
  logger?: Logger;
}

export interface TopicRecordLoadResult {
  /** Valid records in input order, frozen */
  readonly records: readonly TopicRecord[];
  readonly skipped: readonly SkippedRecord[];
  /** Discipline named by the collection envelope, if any */
  readonly discipline?: string;
  readonly stats: {
    readonly total: number;
    readonly accepted: number;
    readonly skipped: number;
  };
}

function describeIssues(issues: { path: (string | number)[]; message: string }[]): string {
  return issues
    .map((issue) => `${issue.path.length > 0 ? issue.path.join(".") : "(record)"}: ${issue.message}`)
    .join("; ");
}

/**
 * Validate a raw record collection.
 *
 * @param input - `{ discipline?, records: [...] }` or a bare array of records
 * @throws RecordCollectionError if the input is not a collection
 */
export function loadTopicRecords(
  input: unknown,
  options: LoadRecordsOptions = {}
): TopicRecordLoadResult {
  const logger = options.logger ?? createSilentLogger();

  const envelope = TopicRecordCollectionSchema.safeParse(input);
  if (!envelope.success) {
    throw new RecordCollectionError(
      "Input is not a topic record collection",
      envelope.error.issues.map((issue) => ({
        field: issue.path.join(".") || "(root)",
        message: issue.message,
      }))
    );
  }

  const collection = envelope.data;
  const rawRecords = Array.isArray(collection) ? collection : collection.records;
  const discipline = Array.isArray(collection) ? undefined : collection.discipline;

  const records: TopicRecord[] = [];
  const skipped: SkippedRecord[] = [];

  rawRecords.forEach((raw, index) => {
    const parsed = TopicRecordSchema.safeParse(raw);
    if (!parsed.success) {
      const message = describeIssues(parsed.error.issues);
      skipped.push({ index, reason: "invalid_record", message });
      logger.warn("Skipping invalid topic record", { index, message });
      return;
    }

    if (parsed.data.title.trim() === "") {
      const message = "Title is empty or whitespace";
      skipped.push({ index, reason: "empty_title", message });
      logger.warn("Skipping topic record with empty title", { index });
      return;
    }

    records.push(deepFreeze(parsed.data));
  });

  logger.info("Loaded topic records", {
    total: rawRecords.length,
    accepted: records.length,
    skipped: skipped.length,
  });

  return {
    records,
    skipped,
    ...(discipline !== undefined ? { discipline } : {}),
    stats: {
      total: rawRecords.length,
      accepted: records.length,
      skipped: skipped.length,
    },
  };
}

/**
 * Read a JSON record collection from disk and validate it.
 *
 * @throws RecordCollectionError if the file is missing, not JSON, or not a collection
 */
export function loadTopicRecordsFromFile(
  path: string,
  options: LoadRecordsOptions = {}
): TopicRecordLoadResult {
  if (!existsSync(path)) {
    throw new RecordCollectionError(`Record file not found: ${path}`);
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(readFileSync(path, "utf-8"));
  } catch (err) {
    throw new RecordCollectionError(
      `Failed to parse record JSON at ${path}: ${err instanceof Error ? err.message : String(err)}`
    );
  }

  return loadTopicRecords(parsed, options);
}
