/**
 * Text Extraction Chain
 *
 * Produces a textual representation of a video by trying strategies in
 * priority order: the public transcript, the Data API caption track, and
 * finally sampled frames described by a vision model. The first strategy
 * returning non-blank text wins; failures never escape the chain.
 *
 * @module stages/extract
 */

import type { Logger } from '../pipeline/types.js';
import type { DetailRecord } from '../schemas/video-record.js';
import type { YouTubeApi } from '../workers/youtube/client.js';
import { fetchTranscript, type TranscriptOptions } from '../workers/youtube/transcript.js';
import {
  FRAME_SAMPLES,
  buildVideoUrl,
  sampleFrames,
  type FrameSamplerOptions,
} from '../workers/youtube/frames.js';
import type { TextModel } from '../analysis/client.js';
import { describeFrames } from '../analysis/vision.js';

// ============================================================================
// Types
// ============================================================================

export type StrategyName = 'transcript' | 'captionTrack' | 'frames';

/** Which strategy produced the text; `none` when all of them failed */
export type ExtractionSource = StrategyName | 'none';

/** Every source, in chain order */
export const EXTRACTION_SOURCES: readonly ExtractionSource[] = ['transcript', 'captionTrack', 'frames', 'none'];

/**
 * One way of turning a video into text.
 *
 * `run` returns null (or blank text) for "no result" and may throw; the
 * chain treats both the same.
 */
export interface ExtractionStrategy {
  name: StrategyName;
  run(record: Pick<DetailRecord, 'videoId'>, logger: Logger): Promise<string | null>;
}

export interface ExtractionOutcome {
  text: string;
  source: ExtractionSource;
}

/**
 * Collaborators and limits for the built-in strategies.
 */
export interface DefaultStrategyOptions {
  youtube: YouTubeApi;
  /** Frame sampling is skipped when no vision model is given */
  visionModel?: TextModel;
  transcript?: TranscriptOptions;
  /** Caption list/download timeout in milliseconds (default: 10000) */
  captionTimeoutMs?: number;
  frames?: FrameSamplerOptions & { count?: number };
}

const DEFAULT_CAPTION_TIMEOUT_MS = 10000;

// ============================================================================
// Chain Runner
// ============================================================================

/**
 * Run `strategies` in order and return the first non-blank text.
 *
 * Never throws: strategy errors are logged and the next strategy runs.
 */
export async function extractText(
  record: Pick<DetailRecord, 'videoId'>,
  strategies: readonly ExtractionStrategy[],
  logger: Logger
): Promise<ExtractionOutcome> {
  for (const strategy of strategies) {
    try {
      const text = await strategy.run(record, logger);
      if (text && text.trim()) {
        return { text, source: strategy.name };
      }
      logger.debug(`[${record.videoId}] ${strategy.name}: no text`);
    } catch (error) {
      logger.debug(
        `[${record.videoId}] ${strategy.name} failed: ${error instanceof Error ? error.message : String(error)}`
      );
    }
  }

  logger.warn(`[${record.videoId}] No text could be extracted`);
  return { text: '', source: 'none' };
}

// ============================================================================
// Built-in Strategies
// ============================================================================

/**
 * Public transcript in the first available English variant.
 */
export function transcriptStrategy(options: TranscriptOptions = {}): ExtractionStrategy {
  return {
    name: 'transcript',
    run: (record) => fetchTranscript(record.videoId, options),
  };
}

/**
 * First caption track listed by the Data API, downloaded as SRT.
 *
 * Most keys may not download tracks of videos they do not own, so this
 * usually fails with 403 and the chain moves on.
 */
export function captionTrackStrategy(
  youtube: YouTubeApi,
  timeoutMs: number = DEFAULT_CAPTION_TIMEOUT_MS
): ExtractionStrategy {
  return {
    name: 'captionTrack',
    run: async (record) => {
      const tracks = await youtube.listCaptionTracks(record.videoId, timeoutMs);
      const first = tracks[0];
      if (!first) {
        return null;
      }
      return youtube.downloadCaptionTrack(first.id, 'srt', timeoutMs);
    },
  };
}

/**
 * Sampled frames, each described by the vision model.
 */
export function frameStrategy(
  visionModel: TextModel,
  options: FrameSamplerOptions & { count?: number } = {}
): ExtractionStrategy {
  const count = options.count ?? FRAME_SAMPLES;

  return {
    name: 'frames',
    run: async (record, logger) => {
      const frames = await sampleFrames(buildVideoUrl(record.videoId), count, options);
      if (frames.length === 0) {
        return null;
      }
      return describeFrames(frames, visionModel, logger);
    },
  };
}

/**
 * Transcript → caption track → frames (when a vision model is given).
 */
export function createDefaultStrategies(options: DefaultStrategyOptions): ExtractionStrategy[] {
  const strategies: ExtractionStrategy[] = [
    transcriptStrategy(options.transcript),
    captionTrackStrategy(options.youtube, options.captionTimeoutMs),
  ];
  if (options.visionModel && (options.frames?.count ?? FRAME_SAMPLES) > 0) {
    strategies.push(frameStrategy(options.visionModel, options.frames));
  }
  return strategies;
}
