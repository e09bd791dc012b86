/**
 * Topic record schema.
 *
 * A TopicRecord is one raw heading harvested from a source document by the
 * extraction collaborator. Records are accepted as-is apart from validation;
 * the pipeline never mutates them.
 */

import { z } from "zod";
import { EducationalTier } from "../config/discipline/enums.js";

export const TopicRecordSchema = z
  .object({
    /** Heading text as it appears in the source */
    title: z.string().describe("Raw heading text"),

    /** 1 = broadest heading level */
    hierarchyLevel: z.number().int().min(1).describe("Heading depth, 1 = broadest"),

    /** Opaque source or book identifier */
    sourceId: z.string().min(1).describe("Source document identifier"),

    /** Educational tier of the source document */
    sourceEducationalTier: EducationalTier.describe("Tier of the source document"),

    /** ISO language code */
    language: z.string().min(1).default("en").describe("Language of the heading"),
  })
  .strict();

export type TopicRecord = z.infer<typeof TopicRecordSchema>;

/**
 * Collection envelope. Records are validated one by one by the loader, so
 * the envelope only requires an array.
 */
export const TopicRecordCollectionSchema = z.union([
  z
    .object({
      discipline: z.string().min(1).optional(),
      records: z.array(z.unknown()),
    })
    .strict(),
  z.array(z.unknown()),
]);

export type TopicRecordCollection = z.infer<typeof TopicRecordCollectionSchema>;
