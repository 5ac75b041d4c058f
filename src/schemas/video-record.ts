/**
 * Video Record Schema
 *
 * One row of the output table: provider metadata, derived engagement
 * metrics, extracted text, analysis fields and the virality score.
 *
 * @module schemas/video-record
 */

import { z } from 'zod';

/**
 * Column order of the output table.
 */
export const VIDEO_RECORD_COLUMNS = [
  'videoId',
  'title',
  'description',
  'channel',
  'publishedAt',
  'durationSec',
  'views',
  'likes',
  'comments',
  'elapsedDays',
  'viewsPerDay',
  'likeRatio',
  'extractedText',
  'topic',
  'hooks',
  'viralityScore',
] as const;

export type VideoRecordColumn = (typeof VIDEO_RECORD_COLUMNS)[number];

const count = z.coerce.number().int().nonnegative();

/**
 * Schema for a finished record.
 *
 * Numbers are coerced so rows read back from CSV validate as-is.
 */
export const VideoRecordSchema = z.object({
  videoId: z.string().min(1),
  title: z.string(),
  description: z.string(),
  channel: z.string(),
  /** ISO8601 instant with zone */
  publishedAt: z.string(),
  durationSec: count,
  views: count,
  likes: count,
  comments: count,
  /** Whole days since publish, at least 1 */
  elapsedDays: z.coerce.number().int().min(1),
  viewsPerDay: z.coerce.number().nonnegative(),
  /** likes / (likes + ε); in [0, 1) */
  likeRatio: z.coerce.number().min(0).lt(1),
  extractedText: z.string(),
  topic: z.string(),
  hooks: z.string(),
  viralityScore: z.coerce.number(),
});

export type VideoRecord = z.infer<typeof VideoRecordSchema>;

/**
 * Fields filled in after the popularity filter.
 */
export type EnrichmentFields = Pick<VideoRecord, 'extractedText' | 'topic' | 'hooks' | 'viralityScore'>;

/**
 * Record as produced by the detail enricher, before enrichment.
 */
export type DetailRecord = Omit<VideoRecord, keyof EnrichmentFields>;

/**
 * Validate a record, throwing a ZodError on bad data.
 */
export function parseVideoRecord(data: unknown): VideoRecord {
  return VideoRecordSchema.parse(data);
}
