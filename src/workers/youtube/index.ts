/**
 * YouTube Access
 *
 * - client.ts: YouTube Data API v3 client (search, details, caption tracks)
 * - transcript.ts: human-authored captions via youtube-transcript
 * - frames.ts: clip download and frame sampling via yt-dlp and ffmpeg
 * - time.ts: duration and publish-time helpers
 *
 * @module workers/youtube
 */

export {
  YouTubeClient,
  YouTubeApiError,
  MAX_PAGE_SIZE,
  isRetryableError,
  type YouTubeApi,
  type YouTubeClientOptions,
  type VideoDetails,
  type SearchOptions,
  type SearchPage,
  type CaptionTrack,
  type CaptionFormat,
} from './client.js';

export {
  fetchTranscript,
  fetchTranscriptWithDetails,
  combineSegments,
  cleanTranscriptText,
  isTranscriptUnavailableError,
  TranscriptError,
  isTranscriptError,
  DEFAULT_TRANSCRIPT_LANGUAGES,
  type TranscriptSegment,
  type TranscriptResult,
  type TranscriptOptions,
  type SegmentFetcher,
} from './transcript.js';

export {
  sampleFrames,
  withDownloadedClip,
  framePositions,
  buildVideoUrl,
  FRAME_SAMPLES,
  type FrameSamplerOptions,
  type ClipHandle,
} from './frames.js';

export { parseDuration, elapsedDays, publishedAfterBound, normalizePublishedAt, MS_PER_DAY } from './time.js';
