/**
 * Corpus Lookup
 *
 * Search and fetch over a finished table, for downstream research tools.
 *
 * @module lookup/corpus
 */

import type { VideoRecord } from '../schemas/video-record.js';
import { buildVideoUrl } from '../workers/youtube/frames.js';
import { fileExists } from '../storage/atomic.js';
import { readTable, writeTable } from '../export/table.js';
import { SAMPLE_RECORDS } from './sample.js';

// ============================================================================
// Types
// ============================================================================

/** Search results are capped at this many rows */
export const SEARCH_LIMIT = 20;

/** Summary length for search hits */
export const SUMMARY_WIDTH = 140;

export interface SearchHit {
  id: string;
  title: string;
  /** Description, whitespace-collapsed and shortened */
  text: string;
  url: string;
}

export interface VideoMetadata {
  publishedAt: string;
  channel: string;
  views: number;
  likes: number;
  comments: number;
  durationSec: number;
  elapsedDays: number;
  viewsPerDay: number;
  likeRatio: number;
  viralityScore: number;
  topic: string;
  hooks: string;
}

export interface VideoDocument {
  id: string;
  title: string;
  /** Description, then the extracted text under a "Captions:" heading */
  text: string;
  url: string;
  metadata: VideoMetadata;
}

export class NotFoundError extends Error {
  constructor(public readonly id: string) {
    super('Video not found');
    this.name = 'NotFoundError';
  }
}

// ============================================================================
// Text
// ============================================================================

/**
 * Collapse whitespace and, when longer than `width`, drop trailing words
 * until the text plus `placeholder` fits.
 *
 * @example
 * shortenText('hello world '.repeat(20), 40) // 'hello world hello world hello [...]'
 */
export function shortenText(text: string, width: number = SUMMARY_WIDTH, placeholder: string = ' [...]'): string {
  const words = text.split(/\s+/).filter((word) => word.length > 0);
  const collapsed = words.join(' ');
  if (collapsed.length <= width) {
    return collapsed;
  }

  let kept = '';
  for (const word of words) {
    const next = kept ? `${kept} ${word}` : word;
    if (next.length + placeholder.length > width) {
      break;
    }
    kept = next;
  }
  return kept ? kept + placeholder : placeholder.trimStart();
}

// ============================================================================
// Index
// ============================================================================

/**
 * In-memory lookup over a table's records.
 *
 * @example
 * ```typescript
 * const { records } = await loadCorpus(config.dataPath);
 * const index = new CorpusIndex(records);
 * index.search('recipe');   // up to 20 hits
 * index.fetch('abc123');    // full document or NotFoundError
 * ```
 */
export class CorpusIndex {
  private readonly byId: Map<string, VideoRecord>;

  constructor(private readonly records: readonly VideoRecord[]) {
    this.byId = new Map();
    for (const record of records) {
      if (!this.byId.has(record.videoId)) {
        this.byId.set(record.videoId, record);
      }
    }
  }

  get size(): number {
    return this.records.length;
  }

  /**
   * Rows whose title or description contains `query`, ignoring case.
   * An empty query matches every row.
   */
  search(query: string, limit: number = SEARCH_LIMIT): SearchHit[] {
    const needle = query.toLowerCase();
    const hits: SearchHit[] = [];

    for (const record of this.records) {
      if (hits.length >= limit) {
        break;
      }
      if (record.title.toLowerCase().includes(needle) || record.description.toLowerCase().includes(needle)) {
        hits.push({
          id: record.videoId,
          title: record.title,
          text: shortenText(record.description),
          url: buildVideoUrl(record.videoId),
        });
      }
    }

    return hits;
  }

  /**
   * The first row with `id`.
   *
   * @throws NotFoundError
   */
  fetch(id: string): VideoDocument {
    const record = this.byId.get(id);
    if (!record) {
      throw new NotFoundError(id);
    }

    return {
      id,
      title: record.title,
      text: `${record.description}\n\nCaptions:\n${record.extractedText}`,
      url: buildVideoUrl(id),
      metadata: {
        publishedAt: record.publishedAt,
        channel: record.channel,
        views: record.views,
        likes: record.likes,
        comments: record.comments,
        durationSec: record.durationSec,
        elapsedDays: record.elapsedDays,
        viewsPerDay: record.viewsPerDay,
        likeRatio: record.likeRatio,
        viralityScore: record.viralityScore,
        topic: record.topic,
        hooks: record.hooks,
      },
    };
  }
}

// ============================================================================
// Loading
// ============================================================================

/**
 * Read a table for lookup (`.json` columnar, anything else CSV).
 *
 * When the file does not exist, a three-row placeholder corpus is written
 * there and returned, so a fresh server has something to answer with.
 */
export async function loadCorpus(filePath: string): Promise<{ records: VideoRecord[]; created: boolean }> {
  if (await fileExists(filePath)) {
    return { records: await readTable(filePath), created: false };
  }
  await writeTable(filePath, SAMPLE_RECORDS);
  return { records: [...SAMPLE_RECORDS], created: true };
}
