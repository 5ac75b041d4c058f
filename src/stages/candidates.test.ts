/**
 * Tests for the candidate fetch stage
 */

import { describe, it, expect } from '@jest/globals';
import { fetchCandidates } from './candidates.js';
import { YouTubeApiError, type SearchOptions, type SearchPage, type YouTubeApi } from '../workers/youtube/client.js';
import { IMMEDIATE_RETRY } from '../workers/retry.js';

// ============================================================================
// Fake Client
// ============================================================================

interface SearchCall {
  query: string;
  options: SearchOptions;
}

function createSearchClient(respond: (callIndex: number, options: SearchOptions) => SearchPage): {
  client: YouTubeApi;
  calls: SearchCall[];
} {
  const calls: SearchCall[] = [];
  const client: YouTubeApi = {
    searchPage: async (query, options = {}) => {
      calls.push({ query, options });
      return respond(calls.length - 1, options);
    },
    getVideoDetails: async () => {
      throw new Error('not used');
    },
    listCaptionTracks: async () => {
      throw new Error('not used');
    },
    downloadCaptionTrack: async () => {
      throw new Error('not used');
    },
  };
  return { client, calls };
}

const NOW = new Date('2026-01-11T00:00:00Z');

// ============================================================================
// fetchCandidates
// ============================================================================

describe('fetchCandidates', () => {
  it('sends short, view-ordered searches bounded by publish date', async () => {
    const { client, calls } = createSearchClient(() => ({ videoIds: ['a'] }));

    await fetchCandidates(client, 'YouTube Shorts', 10, 5, { now: NOW, retry: IMMEDIATE_RETRY });

    expect(calls).toHaveLength(1);
    expect(calls[0]?.query).toBe('YouTube Shorts');
    expect(calls[0]?.options).toMatchObject({
      maxResults: 5,
      order: 'viewCount',
      videoDuration: 'short',
      publishedAfter: '2026-01-01T00:00:00.000Z',
    });
    expect(calls[0]?.options.pageToken).toBeUndefined();
  });

  it('follows page tokens, requests only the remainder and truncates', async () => {
    const pages: SearchPage[] = [
      { videoIds: ['a', 'b'], nextPageToken: 't1' },
      { videoIds: ['b', 'c', 'd'], nextPageToken: 't2' },
    ];
    const { client, calls } = createSearchClient((i) => pages[i] ?? { videoIds: [] });

    const ids = await fetchCandidates(client, 'q', 10, 3, { now: NOW, retry: IMMEDIATE_RETRY });

    expect(ids).toEqual(['a', 'b', 'c']);
    expect(calls).toHaveLength(2);
    expect(calls[1]?.options.maxResults).toBe(1);
    expect(calls[1]?.options.pageToken).toBe('t1');
  });

  it('stops when a page token repeats', async () => {
    const { client, calls } = createSearchClient((i) => ({
      videoIds: [`v${i}`],
      nextPageToken: 'same',
    }));

    const ids = await fetchCandidates(client, 'q', 10, 200, { now: NOW, retry: IMMEDIATE_RETRY });

    expect(ids).toEqual(['v0', 'v1']);
    expect(calls).toHaveLength(2);
  });

  it('stops on an empty page even when a token is present', async () => {
    const { client, calls } = createSearchClient(() => ({ videoIds: [], nextPageToken: 'more' }));

    const ids = await fetchCandidates(client, 'q', 10, 50, { now: NOW, retry: IMMEDIATE_RETRY });

    expect(ids).toEqual([]);
    expect(calls).toHaveLength(1);
  });

  it('requests at most ceil(max / 50) + 1 pages', async () => {
    const { client, calls } = createSearchClient((i) => ({
      videoIds: [`v${i}`],
      nextPageToken: `t${i}`,
    }));

    const ids = await fetchCandidates(client, 'q', 10, 60, { now: NOW, retry: IMMEDIATE_RETRY });

    expect(calls).toHaveLength(3);
    expect(ids).toEqual(['v0', 'v1', 'v2']);
  });

  it('never returns more than maxItems', async () => {
    const { client } = createSearchClient((i) => ({
      videoIds: Array.from({ length: 50 }, (_, j) => `p${i}-${j}`),
      nextPageToken: `t${i}`,
    }));

    const ids = await fetchCandidates(client, 'q', 10, 75, { now: NOW, retry: IMMEDIATE_RETRY });

    expect(ids).toHaveLength(75);
    expect(new Set(ids).size).toBe(75);
  });

  it('retries transient failures', async () => {
    let attempts = 0;
    const { client } = createSearchClient(() => {
      attempts++;
      if (attempts === 1) {
        throw new YouTubeApiError('backend error', 503, true);
      }
      return { videoIds: ['x'] };
    });

    const ids = await fetchCandidates(client, 'q', 10, 1, { now: NOW, retry: IMMEDIATE_RETRY });

    expect(ids).toEqual(['x']);
    expect(attempts).toBe(2);
  });

  it('propagates permanent failures', async () => {
    const { client } = createSearchClient(() => {
      throw new YouTubeApiError('bad request', 400, false);
    });

    await expect(fetchCandidates(client, 'q', 10, 1, { now: NOW, retry: IMMEDIATE_RETRY })).rejects.toThrow(
      'bad request'
    );
  });

  it('rejects invalid bounds', async () => {
    const { client, calls } = createSearchClient(() => ({ videoIds: ['a'] }));

    await expect(fetchCandidates(client, 'q', 10, 0)).rejects.toThrow(RangeError);
    await expect(fetchCandidates(client, 'q', 10, 2.5)).rejects.toThrow(RangeError);
    await expect(fetchCandidates(client, 'q', -1, 5)).rejects.toThrow(RangeError);
    expect(calls).toHaveLength(0);
  });
});
