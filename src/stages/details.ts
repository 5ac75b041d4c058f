/**
 * Detail Enrichment Stage
 *
 * Looks up metadata and statistics for candidate IDs in batches of 50 and
 * derives the engagement fields every later stage relies on.
 *
 * @module stages/details
 */

import {
  MAX_PAGE_SIZE,
  isRetryableError,
  type VideoDetails,
  type YouTubeApi,
} from '../workers/youtube/client.js';
import { elapsedDays, normalizePublishedAt, parseDuration } from '../workers/youtube/time.js';
import { YOUTUBE_API_RETRY, withRetry, type RetryConfig } from '../workers/retry.js';
import type { DetailRecord } from '../schemas/video-record.js';

/** Keeps the ratio defined at zero likes and strictly below 1 */
export const LIKE_RATIO_EPSILON = 1e-6;

export interface DetailFetchOptions {
  retry?: RetryConfig;
  timeoutMs?: number;
}

/** Just below 1 */
const MAX_LIKE_RATIO = 1 - Number.EPSILON;

/**
 * likes / (likes + ε), capped below 1.
 *
 * The metric only tells "has likes" apart from "has none"; it is kept
 * for compatibility with existing tables. Past about 8.6 billion likes
 * ε vanishes in floating point, hence the cap.
 */
export function likeRatio(likes: number): number {
  return Math.min(likes / (likes + LIKE_RATIO_EPSILON), MAX_LIKE_RATIO);
}

/**
 * Split an array into chunks of at most `size` items.
 */
export function chunk<T>(items: readonly T[], size: number): T[][] {
  const chunks: T[][] = [];
  for (let i = 0; i < items.length; i += size) {
    chunks.push(items.slice(i, i + size));
  }
  return chunks;
}

/**
 * Map provider details to a record with empty enrichment fields.
 */
export function toDetailRecord(details: VideoDetails, now: Date): DetailRecord {
  const publishedAt = normalizePublishedAt(details.publishedAt);
  const elapsed = elapsedDays(publishedAt, now);

  return {
    videoId: details.videoId,
    title: details.title,
    description: details.description,
    channel: details.channelTitle,
    publishedAt,
    durationSec: parseDuration(details.duration),
    views: details.viewCount,
    likes: details.likeCount,
    comments: details.commentCount,
    elapsedDays: elapsed,
    viewsPerDay: details.viewCount / elapsed,
    likeRatio: likeRatio(details.likeCount),
  };
}

/**
 * Fetch details for `ids`, one `videos.list` call per batch of 50.
 *
 * Output follows provider order within each batch and batch order
 * overall; IDs the provider does not return are dropped.
 */
export async function fetchDetails(
  client: YouTubeApi,
  ids: readonly string[],
  now: Date = new Date(),
  options: DetailFetchOptions = {}
): Promise<DetailRecord[]> {
  const retry = options.retry ?? YOUTUBE_API_RETRY;
  const records: DetailRecord[] = [];

  for (const batch of chunk(ids, MAX_PAGE_SIZE)) {
    const details = await withRetry(
      () => client.getVideoDetails(batch, options.timeoutMs),
      isRetryableError,
      retry
    );
    for (const item of details) {
      records.push(toDetailRecord(item, now));
    }
  }

  return records;
}
