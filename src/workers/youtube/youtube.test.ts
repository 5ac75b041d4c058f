/**
 * YouTube Access Tests
 *
 * The API client runs against a scripted fetch, transcripts against a
 * scripted segment fetcher and frame sampling against a scripted command
 * runner. Nothing here reaches the network or spawns a process.
 */

import { describe, it, expect, beforeEach, afterEach } from '@jest/globals';
import * as fs from 'node:fs/promises';
import * as os from 'node:os';
import * as path from 'node:path';
import {
  YouTubeClient,
  YouTubeApiError,
  isRetryableError,
} from './client.js';
import { parseDuration, elapsedDays, publishedAfterBound, normalizePublishedAt } from './time.js';
import {
  fetchTranscript,
  fetchTranscriptWithDetails,
  cleanTranscriptText,
  combineSegments,
  isTranscriptUnavailableError,
  TranscriptError,
  type SegmentFetcher,
} from './transcript.js';
import { framePositions, sampleFrames, withDownloadedClip, buildVideoUrl } from './frames.js';
import { CommandError, runChecked, type CommandResult, type CommandRunner } from '../exec.js';

// ============================================================================
// Time Helpers
// ============================================================================

describe('time helpers', () => {
  describe('parseDuration', () => {
    it('parses hours, minutes and seconds', () => {
      expect(parseDuration('PT1M5S')).toBe(65);
      expect(parseDuration('PT1H30M')).toBe(5400);
      expect(parseDuration('PT45S')).toBe(45);
      expect(parseDuration('PT2H0M1S')).toBe(7201);
    });

    it('yields 0 for missing or unsupported values', () => {
      expect(parseDuration('')).toBe(0);
      expect(parseDuration(undefined)).toBe(0);
      expect(parseDuration(null)).toBe(0);
      expect(parseDuration('P1D')).toBe(0);
      expect(parseDuration('PT')).toBe(0);
    });
  });

  describe('elapsedDays', () => {
    const now = new Date('2026-01-11T06:00:00Z');

    it('counts whole days', () => {
      expect(elapsedDays('2026-01-01T12:00:00Z', now)).toBe(9);
    });

    it('is at least 1', () => {
      expect(elapsedDays('2026-01-11T05:00:00Z', now)).toBe(1);
      expect(elapsedDays('2026-02-01T00:00:00Z', now)).toBe(1);
      expect(elapsedDays('not a date', now)).toBe(1);
    });
  });

  it('computes the search window bound', () => {
    expect(publishedAfterBound(10, new Date('2026-01-11T00:00:00Z'))).toBe('2026-01-01T00:00:00.000Z');
    expect(publishedAfterBound(0, new Date('2026-01-11T00:00:00Z'))).toBe('2026-01-11T00:00:00.000Z');
  });

  describe('normalizePublishedAt', () => {
    it('keeps zoned instants in UTC', () => {
      expect(normalizePublishedAt('2026-01-01T12:00:00Z')).toBe('2026-01-01T12:00:00.000Z');
      expect(normalizePublishedAt('2026-01-01T12:00:00+02:00')).toBe('2026-01-01T10:00:00.000Z');
    });

    it('reads zoneless timestamps as UTC', () => {
      expect(normalizePublishedAt('2026-01-01T12:00:00')).toBe('2026-01-01T12:00:00.000Z');
    });

    it('passes through unparseable values', () => {
      expect(normalizePublishedAt('yesterday')).toBe('yesterday');
    });
  });
});

// ============================================================================
// API Client
// ============================================================================

interface ScriptedReply {
  status?: number;
  body: unknown;
}

function createFetch(replies: ScriptedReply[]): { fetchImpl: typeof fetch; urls: URL[] } {
  const urls: URL[] = [];
  const fetchImpl: typeof fetch = async (input) => {
    urls.push(new URL(typeof input === 'string' ? input : input instanceof URL ? input.href : input.url));
    const reply = replies.shift();
    if (!reply) {
      throw new Error('unexpected request');
    }
    const body = typeof reply.body === 'string' ? reply.body : JSON.stringify(reply.body);
    return new Response(body, { status: reply.status ?? 200 });
  };
  return { fetchImpl, urls };
}

describe('YouTubeClient', () => {
  it('requires an API key', () => {
    expect(() => new YouTubeClient('')).toThrow('YouTubeClient requires an API key');
  });

  describe('searchPage', () => {
    it('sends the search parameters and reads IDs and the next token', async () => {
      const { fetchImpl, urls } = createFetch([
        {
          body: {
            nextPageToken: 'NEXT',
            items: [{ id: { videoId: 'a1' } }, { id: { kind: 'youtube#channel' } }, { id: { videoId: 'b2' } }],
          },
        },
      ]);
      const client = new YouTubeClient('test-secret', { fetchImpl, baseUrl: 'https://api.test/v3' });

      const page = await client.searchPage('cats', {
        maxResults: 25,
        publishedAfter: '2026-01-01T00:00:00.000Z',
        pageToken: 'PREV',
      });

      expect(page).toEqual({ videoIds: ['a1', 'b2'], nextPageToken: 'NEXT' });
      const url = urls[0];
      expect(url?.pathname).toBe('/v3/search');
      expect(Object.fromEntries(url?.searchParams ?? [])).toEqual({
        part: 'id',
        q: 'cats',
        type: 'video',
        maxResults: '25',
        order: 'viewCount',
        videoDuration: 'short',
        publishedAfter: '2026-01-01T00:00:00.000Z',
        pageToken: 'PREV',
        key: 'test-secret',
      });
    });

    it('clamps the page size and drops an empty token', async () => {
      const { fetchImpl, urls } = createFetch([{ body: { nextPageToken: '', items: [] } }]);
      const client = new YouTubeClient('test-secret', { fetchImpl });

      expect(await client.searchPage('x', { maxResults: 500 })).toEqual({ videoIds: [], nextPageToken: undefined });
      expect(urls[0]?.searchParams.get('maxResults')).toBe('50');
    });
  });

  describe('getVideoDetails', () => {
    it('parses snippet, statistics and duration', async () => {
      const { fetchImpl, urls } = createFetch([
        {
          body: {
            items: [
              {
                id: 'a1',
                snippet: {
                  publishedAt: '2026-01-01T00:00:00Z',
                  title: 'Title',
                  description: 'Desc',
                  channelTitle: 'Chan',
                },
                contentDetails: { duration: 'PT30S' },
                statistics: { viewCount: '1200', likeCount: '45', commentCount: 'n/a' },
              },
              { id: 'b2' },
            ],
          },
        },
      ]);
      const client = new YouTubeClient('test-secret', { fetchImpl });

      expect(await client.getVideoDetails(['a1', 'b2'])).toEqual([
        {
          videoId: 'a1',
          title: 'Title',
          description: 'Desc',
          channelTitle: 'Chan',
          publishedAt: '2026-01-01T00:00:00Z',
          duration: 'PT30S',
          viewCount: 1200,
          likeCount: 45,
          commentCount: 0,
        },
        {
          videoId: 'b2',
          title: '',
          description: '',
          channelTitle: '',
          publishedAt: '',
          duration: '',
          viewCount: 0,
          likeCount: 0,
          commentCount: 0,
        },
      ]);
      expect(urls[0]?.searchParams.get('id')).toBe('a1,b2');
      expect(urls[0]?.searchParams.get('part')).toBe('snippet,statistics,contentDetails');
    });

    it('makes no request for an empty list', async () => {
      const { fetchImpl, urls } = createFetch([]);
      const client = new YouTubeClient('test-secret', { fetchImpl });

      expect(await client.getVideoDetails([])).toEqual([]);
      expect(urls).toHaveLength(0);
    });

    it('rejects more than 50 IDs', async () => {
      const client = new YouTubeClient('test-secret', { fetchImpl: createFetch([]).fetchImpl });
      const ids = Array.from({ length: 51 }, (_, i) => `id${i}`);

      await expect(client.getVideoDetails(ids)).rejects.toThrow(RangeError);
    });
  });

  describe('caption tracks', () => {
    it('lists tracks and downloads one as SRT', async () => {
      const { fetchImpl, urls } = createFetch([
        { body: { items: [{ id: 'track-1', snippet: { language: 'en', trackKind: 'asr' } }, { id: 'track-2' }] } },
        { body: '1\n00:00:00,000 --> 00:00:01,000\nhello\n' },
      ]);
      const client = new YouTubeClient('test-secret', { fetchImpl });

      expect(await client.listCaptionTracks('a1')).toEqual([
        { id: 'track-1', language: 'en', trackKind: 'asr' },
        { id: 'track-2', language: '', trackKind: 'standard' },
      ]);
      expect(await client.downloadCaptionTrack('track-1')).toBe('1\n00:00:00,000 --> 00:00:01,000\nhello\n');
      expect(urls[1]?.pathname).toBe('/youtube/v3/captions/track-1');
      expect(urls[1]?.searchParams.get('tfmt')).toBe('srt');
    });
  });

  describe('errors', () => {
    async function failWith(status: number, body: unknown): Promise<YouTubeApiError> {
      const client = new YouTubeClient('test-secret', { fetchImpl: createFetch([{ status, body }]).fetchImpl });
      try {
        await client.searchPage('x');
      } catch (error) {
        if (error instanceof YouTubeApiError) {
          return error;
        }
        throw error;
      }
      throw new Error('expected a YouTubeApiError');
    }

    it('marks quota exhaustion as permanent', async () => {
      const error = await failWith(403, {
        error: { message: 'The request cannot be completed.', errors: [{ reason: 'quotaExceeded' }] },
      });

      expect(error.message).toBe('YouTube API quota exceeded: The request cannot be completed.');
      expect(error.isQuotaExceeded).toBe(true);
      expect(error.isRetryable).toBe(false);
      expect(isRetryableError(error)).toBe(false);
    });

    it('marks 429 and 5xx as retryable', async () => {
      const limited = await failWith(429, { error: { message: 'slow down' } });
      expect(limited.message).toBe('Rate limit exceeded: slow down');
      expect(limited.isRetryable).toBe(true);

      const server = await failWith(503, 'upstream unavailable');
      expect(server.message).toBe('Server error (503): upstream unavailable');
      expect(server.statusCode).toBe(503);
      expect(isRetryableError(server)).toBe(true);
    });

    it('reports auth and other client errors as permanent', async () => {
      expect((await failWith(401, {})).message).toBe('Authentication failed: Invalid API key');

      const forbidden = await failWith(403, { error: { message: 'Captions are private' } });
      expect(forbidden.message).toBe('Access forbidden: Captions are private');
      expect(forbidden.isRetryable).toBe(false);

      expect((await failWith(400, 'bad')).message).toBe('API error (400): bad');
    });

    it('turns an aborted request into a retryable timeout', async () => {
      const fetchImpl: typeof fetch = (_input, init) =>
        new Promise((_resolve, reject) => {
          init?.signal?.addEventListener('abort', () => {
            const error = new Error('The operation was aborted');
            error.name = 'AbortError';
            reject(error);
          });
        });
      const client = new YouTubeClient('test-secret', { fetchImpl, timeoutMs: 10 });

      await expect(client.searchPage('x')).rejects.toEqual(
        new YouTubeApiError('Request timed out after 10ms', 408, true, false)
      );
    });

    it('classifies plain network errors by message', () => {
      expect(isRetryableError(new Error('fetch failed'))).toBe(true);
      expect(isRetryableError(new Error('socket hang up ECONNRESET'))).toBe(true);
      expect(isRetryableError(new Error('invalid argument'))).toBe(false);
      expect(isRetryableError('string')).toBe(false);
    });
  });
});

// ============================================================================
// Transcripts
// ============================================================================

function scriptedSegments(byLanguage: Record<string, string[] | Error>): { fetcher: SegmentFetcher; asked: string[] } {
  const asked: string[] = [];
  const fetcher: SegmentFetcher = async (_videoId, lang) => {
    asked.push(lang);
    const entry = byLanguage[lang];
    if (entry === undefined) {
      throw new Error(`No transcripts are available in ${lang} this video`);
    }
    if (entry instanceof Error) {
      throw entry;
    }
    return entry.map((text, i) => ({ text, offset: i * 1500, duration: 1500 }));
  };
  return { fetcher, asked };
}

describe('transcripts', () => {
  it('tries languages in order and joins segments by line', async () => {
    const { fetcher, asked } = scriptedSegments({ 'en-US': ['first line', '  ', 'second &amp;#39;line&amp;#39;'] });

    const result = await fetchTranscriptWithDetails('vid', { fetchSegments: fetcher });

    expect(asked).toEqual(['en', 'en-US']);
    expect(result.language).toBe('en-US');
    expect(result.text).toBe("first line\nsecond 'line'");
    expect(result.segments[1]).toEqual({ text: '  ', offset: 1.5, duration: 1.5 });
  });

  it('moves past a language whose captions are blank', async () => {
    const { fetcher } = scriptedSegments({ en: ['', ' '], 'en-GB': ['hello'] });
    expect(await fetchTranscript('vid', { fetchSegments: fetcher })).toBe('hello');
  });

  it('returns null when no language has captions', async () => {
    const { fetcher, asked } = scriptedSegments({});

    expect(await fetchTranscript('vid', { fetchSegments: fetcher })).toBeNull();
    expect(asked).toEqual(['en', 'en-US', 'en-GB']);
  });

  it('stops on other failures', async () => {
    const { fetcher, asked } = scriptedSegments({ en: new Error('socket closed') });

    await expect(fetchTranscript('vid', { fetchSegments: fetcher })).rejects.toEqual(
      new TranscriptError('socket closed', 'vid', false)
    );
    expect(asked).toEqual(['en']);
  });

  it('times out a stalled lookup', async () => {
    const stalled: SegmentFetcher = () => new Promise(() => undefined);

    await expect(fetchTranscript('vid', { fetchSegments: stalled, timeoutMs: 10 })).rejects.toThrow(
      'Transcript fetch timed out after 10ms'
    );
  });

  it('cleans caption markup', () => {
    expect(cleanTranscriptText('<i>Tom &amp;amp; Jerry</i>\n  again')).toBe('Tom & Jerry again');
    expect(combineSegments([])).toBe('');
    expect(isTranscriptUnavailableError(new Error('Transcript is disabled on this video'))).toBe(true);
    expect(isTranscriptUnavailableError(new Error('timeout'))).toBe(false);
  });
});

// ============================================================================
// Frame Sampling
// ============================================================================

interface RunnerScript {
  download?: 'ok' | 'fail' | 'no-file';
  duration?: string;
  failFrames?: boolean;
}

function createRunner(script: RunnerScript = {}): { runner: CommandRunner; calls: string[][] } {
  const calls: string[][] = [];
  const ok = (stdout: string | Buffer): CommandResult => ({
    code: 0,
    stdout: typeof stdout === 'string' ? Buffer.from(stdout) : stdout,
    stderr: '',
  });

  const runner: CommandRunner = async (args) => {
    calls.push(args);
    const [command] = args;
    if (command === 'yt-dlp') {
      if (script.download === 'fail') {
        return { code: 1, stdout: Buffer.alloc(0), stderr: 'ERROR: Video unavailable\n' };
      }
      if (script.download !== 'no-file') {
        const template = args[args.indexOf('-o') + 1] ?? '';
        await fs.writeFile(template.replace('%(ext)s', 'mp4'), 'clip');
      }
      return ok('');
    }
    if (command === 'ffprobe') {
      return ok(script.duration ?? '12.000000\n');
    }
    if (command === 'ffmpeg') {
      if (script.failFrames) {
        return { code: 1, stdout: Buffer.alloc(0), stderr: 'decode error' };
      }
      return ok(`png@${args[args.indexOf('-ss') + 1] ?? ''}`);
    }
    throw new Error(`unexpected command ${command ?? ''}`);
  };
  return { runner, calls };
}

describe('frame sampling', () => {
  let tempRoot: string;

  beforeEach(async () => {
    tempRoot = await fs.mkdtemp(path.join(os.tmpdir(), 'frames-test-'));
  });

  afterEach(async () => {
    await fs.rm(tempRoot, { recursive: true, force: true });
  });

  it('spaces positions evenly inside the clip', () => {
    expect(framePositions(40, 3)).toEqual([10, 20, 30]);
    expect(framePositions(0, 3)).toEqual([]);
    expect(framePositions(10, 0)).toEqual([]);
  });

  it('samples frames and removes the working directory', async () => {
    const { runner, calls } = createRunner();

    const frames = await sampleFrames(buildVideoUrl('abc'), 3, { runner, tempRoot });

    expect(frames.map((frame) => frame.toString())).toEqual(['png@3.000', 'png@6.000', 'png@9.000']);
    expect(calls.map((args) => args[0])).toEqual(['yt-dlp', 'ffprobe', 'ffmpeg', 'ffmpeg', 'ffmpeg']);
    expect(calls[0]?.at(-1)).toBe('https://www.youtube.com/watch?v=abc');
    expect(await fs.readdir(tempRoot)).toEqual([]);
  });

  it('removes the working directory when the download fails', async () => {
    const { runner } = createRunner({ download: 'fail' });

    await expect(sampleFrames('https://example.test/v', 3, { runner, tempRoot })).rejects.toBeInstanceOf(CommandError);
    expect(await fs.readdir(tempRoot)).toEqual([]);
  });

  it('fails when no clip was written', async () => {
    const { runner } = createRunner({ download: 'no-file' });

    await expect(sampleFrames('https://example.test/v', 3, { runner, tempRoot })).rejects.toThrow(
      'yt-dlp produced no progressive MP4 stream'
    );
    expect(await fs.readdir(tempRoot)).toEqual([]);
  });

  it('fails on an unreadable duration', async () => {
    const { runner } = createRunner({ duration: 'N/A\n' });

    await expect(sampleFrames('https://example.test/v', 3, { runner, tempRoot })).rejects.toThrow(
      'Could not read clip duration for clip.mp4'
    );
  });

  it('removes the working directory when the consumer throws', async () => {
    const { runner } = createRunner({ failFrames: true });

    await expect(
      withDownloadedClip('https://example.test/v', (clip) => clip.frameAt(1), { runner, tempRoot })
    ).rejects.toThrow('ffmpeg exited with code 1: decode error');
    expect(await fs.readdir(tempRoot)).toEqual([]);
  });

  it('runChecked reports exit code and stderr', async () => {
    const runner: CommandRunner = async () => ({ code: 3, stdout: Buffer.alloc(0), stderr: '  broken pipe \n' });

    await expect(runChecked(runner, ['tool', '--flag'])).rejects.toEqual(
      new CommandError('tool exited with code 3: broken pipe', 'tool', 3, '  broken pipe \n')
    );
  });
});
