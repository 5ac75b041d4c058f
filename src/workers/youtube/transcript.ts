/**
 * YouTube Transcript Fetching
 *
 * Fetches human-authored captions using the youtube-transcript npm package,
 * trying a prioritized list of languages, and combines the caption
 * segments into newline-separated text.
 *
 * @module workers/youtube/transcript
 */

import { YoutubeTranscript } from 'youtube-transcript';
import { decodeHtmlEntities, stripTags } from '../../utils/html.js';
import { withTimeout } from '../retry.js';

// ============================================================================
// Types
// ============================================================================

/**
 * A single transcript segment
 */
export interface TranscriptSegment {
  /** Text content of the segment */
  text: string;
  /** Start time in seconds */
  offset: number;
  /** Duration in seconds */
  duration: number;
}

/**
 * Raw segment shape returned by youtube-transcript (times in ms)
 */
export interface RawTranscriptSegment {
  text: string;
  offset: number;
  duration: number;
  lang?: string;
}

/**
 * Fetches raw caption segments for one video and language.
 */
export type SegmentFetcher = (videoId: string, lang: string) => Promise<RawTranscriptSegment[]>;

/**
 * Transcript lookup options
 */
export interface TranscriptOptions {
  /** Languages tried in order (default: en, en-US, en-GB) */
  languages?: readonly string[];
  /** Timeout per language attempt in milliseconds (default: 10000) */
  timeoutMs?: number;
  /** Segment source (defaults to youtube-transcript) */
  fetchSegments?: SegmentFetcher;
}

/**
 * Full transcript with metadata
 */
export interface TranscriptResult {
  videoId: string;
  /** Language that produced the transcript */
  language: string;
  /** Combined transcript text, one segment per line */
  text: string;
  segments: TranscriptSegment[];
}

/**
 * Error thrown when transcript fetching fails
 */
export class TranscriptError extends Error {
  constructor(
    message: string,
    public readonly videoId: string,
    public readonly isTranscriptUnavailable: boolean = false
  ) {
    super(message);
    this.name = 'TranscriptError';
  }
}

// ============================================================================
// Constants
// ============================================================================

/** Caption languages in priority order */
export const DEFAULT_TRANSCRIPT_LANGUAGES = ['en', 'en-US', 'en-GB'] as const;

const DEFAULT_TIMEOUT_MS = 10000;

const defaultFetcher: SegmentFetcher = (videoId, lang) =>
  YoutubeTranscript.fetchTranscript(videoId, { lang });

// ============================================================================
// Main Functions
// ============================================================================

/**
 * Fetch the transcript text for a YouTube video.
 *
 * @returns Newline-joined transcript, or null if no listed language has one
 * @throws TranscriptError on network failures and timeouts
 *
 * @example
 * ```typescript
 * const transcript = await fetchTranscript('dQw4w9WgXcQ');
 * if (transcript) {
 *   console.log(transcript.split('\n').length, 'caption lines');
 * }
 * ```
 */
export async function fetchTranscript(
  videoId: string,
  options: TranscriptOptions = {}
): Promise<string | null> {
  try {
    const result = await fetchTranscriptWithDetails(videoId, options);
    return result.text || null;
  } catch (error) {
    if (error instanceof TranscriptError && error.isTranscriptUnavailable) {
      return null;
    }
    throw error;
  }
}

/**
 * Fetch transcript with timing information.
 *
 * Languages are tried in order; an "unavailable" answer moves on to the
 * next language, any other failure stops the lookup.
 *
 * @throws TranscriptError if no language has captions or a fetch fails
 */
export async function fetchTranscriptWithDetails(
  videoId: string,
  options: TranscriptOptions = {}
): Promise<TranscriptResult> {
  const languages = options.languages ?? DEFAULT_TRANSCRIPT_LANGUAGES;
  const timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
  const fetchSegments = options.fetchSegments ?? defaultFetcher;

  for (const language of languages) {
    let rawSegments: RawTranscriptSegment[];
    try {
      rawSegments = await withTimeout(
        fetchSegments(videoId, language),
        timeoutMs,
        () => new TranscriptError(`Transcript fetch timed out after ${timeoutMs}ms`, videoId)
      );
    } catch (error) {
      if (error instanceof TranscriptError) {
        throw error;
      }
      if (isTranscriptUnavailableError(error)) {
        continue;
      }
      throw new TranscriptError(
        error instanceof Error ? error.message : String(error),
        videoId,
        false
      );
    }

    const segments: TranscriptSegment[] = rawSegments.map((seg) => ({
      text: seg.text,
      offset: seg.offset / 1000,
      duration: seg.duration / 1000,
    }));
    const text = combineSegments(segments);

    if (text) {
      return { videoId, language, text, segments };
    }
  }

  throw new TranscriptError(`Transcript not available for video ${videoId}`, videoId, true);
}

/**
 * Combine transcript segments into text, one non-empty segment per line.
 */
export function combineSegments(segments: TranscriptSegment[]): string {
  return segments
    .map((segment) => cleanTranscriptText(segment.text))
    .filter((text) => text.length > 0)
    .join('\n');
}

/**
 * Clean transcript text by removing HTML entities and normalizing.
 *
 * Caption text arrives escaped twice (`&amp;#39;`), so entities are
 * decoded twice.
 */
export function cleanTranscriptText(text: string): string {
  return stripTags(decodeHtmlEntities(decodeHtmlEntities(text)))
    .replace(/\s+/g, ' ')
    .trim();
}

// ============================================================================
// Helper Functions
// ============================================================================

/**
 * Check if an error indicates transcript is unavailable.
 *
 * Common reasons:
 * - Video has no captions
 * - Captions are disabled by creator
 * - Requested language is not offered
 * - Video is private or deleted
 */
export function isTranscriptUnavailableError(error: unknown): boolean {
  if (error instanceof Error) {
    const message = error.message.toLowerCase();
    return (
      message.includes('transcript is disabled') ||
      message.includes('no transcript') ||
      message.includes('transcripts are disabled') ||
      message.includes('could not retrieve') ||
      message.includes('video unavailable') ||
      message.includes('is no longer available') ||
      message.includes('private video') ||
      message.includes('not available') ||
      message.includes('disabled for this video') ||
      message.includes('no transcripts are available in')
    );
  }
  return false;
}

/**
 * Check if an error is a TranscriptError
 */
export function isTranscriptError(error: unknown): error is TranscriptError {
  return error instanceof TranscriptError;
}
