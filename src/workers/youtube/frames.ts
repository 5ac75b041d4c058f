/**
 * Video Frame Sampling
 *
 * Downloads a progressive MP4 of a video with yt-dlp into a private temp
 * directory and rasterizes frames at chosen timeline positions with ffmpeg.
 * The directory is removed on every exit path.
 *
 * @module workers/youtube/frames
 */

import { mkdtemp, readdir, rm } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { runChecked, runCommand, type CommandRunner } from '../exec.js';

// ============================================================================
// Types
// ============================================================================

/**
 * Executables and limits used for sampling.
 */
export interface FrameSamplerOptions {
  runner?: CommandRunner;
  /** Parent directory for the temp dir (default: os.tmpdir()) */
  tempRoot?: string;
  ytDlpPath?: string;
  ffprobePath?: string;
  ffmpegPath?: string;
  /** Download timeout in milliseconds (default: 120000) */
  downloadTimeoutMs?: number;
  /** ffprobe/ffmpeg timeout in milliseconds (default: 30000) */
  decodeTimeoutMs?: number;
}

/**
 * A downloaded clip, valid only inside `withDownloadedClip`.
 */
export interface ClipHandle {
  /** Path of the downloaded file */
  filePath: string;
  /** Clip length in seconds */
  durationSec: number;
  /** Rasterize the frame at `seconds` as PNG bytes */
  frameAt(seconds: number): Promise<Buffer>;
}

// ============================================================================
// Constants
// ============================================================================

/** Frames sampled per video */
export const FRAME_SAMPLES = 3;

const DEFAULTS = {
  ytDlpPath: 'yt-dlp',
  ffprobePath: 'ffprobe',
  ffmpegPath: 'ffmpeg',
  downloadTimeoutMs: 120000,
  decodeTimeoutMs: 30000,
} as const;

/** Single-file MP4 with both audio and video */
const PROGRESSIVE_MP4 = 'best[ext=mp4][vcodec!=none][acodec!=none]/best[ext=mp4]';

// ============================================================================
// Positions
// ============================================================================

/**
 * Evenly spaced sample positions that skip the first and last frame.
 *
 * @example
 * framePositions(40, 3) // [10, 20, 30]
 */
export function framePositions(durationSec: number, count: number = FRAME_SAMPLES): number[] {
  if (!(durationSec > 0) || count < 1) {
    return [];
  }
  return Array.from({ length: count }, (_, i) => (durationSec * (i + 1)) / (count + 1));
}

// ============================================================================
// Scoped Clip Resource
// ============================================================================

/**
 * Download `videoUrl`, hand the clip to `use`, then delete it.
 *
 * @throws CommandError if download or probing fails; the temp dir is gone either way
 */
export async function withDownloadedClip<T>(
  videoUrl: string,
  use: (clip: ClipHandle) => Promise<T>,
  options: FrameSamplerOptions = {}
): Promise<T> {
  const runner = options.runner ?? runCommand;
  const settings = {
    ytDlpPath: options.ytDlpPath ?? DEFAULTS.ytDlpPath,
    ffprobePath: options.ffprobePath ?? DEFAULTS.ffprobePath,
    ffmpegPath: options.ffmpegPath ?? DEFAULTS.ffmpegPath,
    downloadTimeoutMs: options.downloadTimeoutMs ?? DEFAULTS.downloadTimeoutMs,
    decodeTimeoutMs: options.decodeTimeoutMs ?? DEFAULTS.decodeTimeoutMs,
  };

  const workingDir = await mkdtemp(path.join(options.tempRoot ?? os.tmpdir(), 'trendwatch-clip-'));
  try {
    await runChecked(
      runner,
      [
        settings.ytDlpPath,
        '--no-playlist',
        '--no-warnings',
        '--quiet',
        '-f',
        PROGRESSIVE_MP4,
        '-o',
        path.join(workingDir, 'clip.%(ext)s'),
        videoUrl,
      ],
      { timeoutMs: settings.downloadTimeoutMs }
    );

    const filePath = await findClip(workingDir);
    const durationSec = await probeDuration(runner, settings.ffprobePath, filePath, settings.decodeTimeoutMs);

    const clip: ClipHandle = {
      filePath,
      durationSec,
      frameAt: async (seconds) => {
        const result = await runChecked(
          runner,
          [
            settings.ffmpegPath,
            '-v',
            'error',
            '-ss',
            seconds.toFixed(3),
            '-i',
            filePath,
            '-frames:v',
            '1',
            '-f',
            'image2pipe',
            '-vcodec',
            'png',
            '-',
          ],
          { timeoutMs: settings.decodeTimeoutMs }
        );
        if (result.stdout.length === 0) {
          throw new Error(`No frame decoded at ${seconds.toFixed(3)}s`);
        }
        return result.stdout;
      },
    };

    return await use(clip);
  } finally {
    await rm(workingDir, { recursive: true, force: true });
  }
}

/**
 * Sample `count` PNG frames from a video.
 *
 * @throws on any download or decode failure
 */
export async function sampleFrames(
  videoUrl: string,
  count: number = FRAME_SAMPLES,
  options: FrameSamplerOptions = {}
): Promise<Buffer[]> {
  return withDownloadedClip(
    videoUrl,
    async (clip) => {
      const frames: Buffer[] = [];
      for (const position of framePositions(clip.durationSec, count)) {
        frames.push(await clip.frameAt(position));
      }
      return frames;
    },
    options
  );
}

/**
 * Canonical watch URL for a video ID.
 */
export function buildVideoUrl(videoId: string): string {
  return `https://www.youtube.com/watch?v=${videoId}`;
}

// ============================================================================
// Helpers
// ============================================================================

async function findClip(workingDir: string): Promise<string> {
  const entries = await readdir(workingDir);
  const clip = entries.find((entry) => entry.startsWith('clip.') && !entry.endsWith('.part'));
  if (!clip) {
    throw new Error('yt-dlp produced no progressive MP4 stream');
  }
  return path.join(workingDir, clip);
}

async function probeDuration(
  runner: CommandRunner,
  ffprobePath: string,
  filePath: string,
  timeoutMs: number
): Promise<number> {
  const result = await runChecked(
    runner,
    [
      ffprobePath,
      '-v',
      'error',
      '-show_entries',
      'format=duration',
      '-of',
      'default=noprint_wrappers=1:nokey=1',
      filePath,
    ],
    { timeoutMs }
  );

  const duration = parseFloat(result.stdout.toString('utf-8').trim());
  if (!Number.isFinite(duration) || duration <= 0) {
    throw new Error(`Could not read clip duration for ${path.basename(filePath)}`);
  }
  return duration;
}
