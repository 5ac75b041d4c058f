/**
 * Candidate Fetch Stage
 *
 * Pages through short-video search results ordered by view count until
 * enough IDs are collected or the provider stops returning pages.
 *
 * @module stages/candidates
 */

import { MAX_PAGE_SIZE, isRetryableError, type YouTubeApi } from '../workers/youtube/client.js';
import { publishedAfterBound } from '../workers/youtube/time.js';
import { YOUTUBE_API_RETRY, withRetry, type RetryConfig } from '../workers/retry.js';
import type { Logger } from '../pipeline/types.js';

// ============================================================================
// Types
// ============================================================================

export interface CandidateFetchOptions {
  /** Clock for the publish-date bound */
  now?: Date;
  retry?: RetryConfig;
  /** Per-request timeout in milliseconds */
  timeoutMs?: number;
  logger?: Logger;
}

// ============================================================================
// Stage
// ============================================================================

/**
 * Collect up to `maxItems` distinct video IDs for `query` published in
 * the last `daysBack` days.
 *
 * Stops on a missing or repeated page token, an empty page, or after
 * `ceil(maxItems / 50) + 1` pages.
 *
 * @throws RangeError for a non-positive `maxItems` or negative `daysBack`
 * @throws YouTubeApiError once retries are exhausted
 */
export async function fetchCandidates(
  client: YouTubeApi,
  query: string,
  daysBack: number,
  maxItems: number,
  options: CandidateFetchOptions = {}
): Promise<string[]> {
  if (!Number.isInteger(maxItems) || maxItems <= 0) {
    throw new RangeError(`maxItems must be a positive integer, got ${maxItems}`);
  }
  if (!Number.isFinite(daysBack) || daysBack < 0) {
    throw new RangeError(`daysBack must be zero or more, got ${daysBack}`);
  }

  const publishedAfter = publishedAfterBound(daysBack, options.now);
  const retry = options.retry ?? YOUTUBE_API_RETRY;
  const maxPages = Math.ceil(maxItems / MAX_PAGE_SIZE) + 1;

  const ids: string[] = [];
  const seenIds = new Set<string>();
  const seenTokens = new Set<string>();
  let pageToken: string | undefined;

  for (let page = 0; page < maxPages && ids.length < maxItems; page++) {
    const token = pageToken;
    const result = await withRetry(
      () =>
        client.searchPage(query, {
          maxResults: Math.min(MAX_PAGE_SIZE, maxItems - ids.length),
          order: 'viewCount',
          videoDuration: 'short',
          publishedAfter,
          pageToken: token,
          timeoutMs: options.timeoutMs,
        }),
      isRetryableError,
      retry
    );

    if (result.videoIds.length === 0) {
      break;
    }

    for (const id of result.videoIds) {
      if (!seenIds.has(id)) {
        seenIds.add(id);
        ids.push(id);
      }
    }

    const next = result.nextPageToken;
    if (!next) {
      break;
    }
    if (seenTokens.has(next)) {
      options.logger?.warn(`Search returned a repeated page token; stopping after ${page + 1} pages`);
      break;
    }
    seenTokens.add(next);
    pageToken = next;
  }

  options.logger?.debug(`Collected ${Math.min(ids.length, maxItems)} candidate IDs for "${query}"`);
  return ids.slice(0, maxItems);
}
