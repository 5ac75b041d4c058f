/**
 * YouTube Data API Client
 *
 * Low-level client for the YouTube Data API v3.
 * Handles paginated search, batched video details, caption tracks,
 * and error classification (quota exhaustion is never retried).
 *
 * @module workers/youtube/client
 */

// ============================================================================
// Types
// ============================================================================

/**
 * Options for one page of video search
 */
export interface SearchOptions {
  /** Maximum results to return (1-50, default 50) */
  maxResults?: number;
  /** Result ordering (default: viewCount) */
  order?: 'relevance' | 'date' | 'viewCount';
  /** Filter by video duration; 'short' is under four minutes */
  videoDuration?: 'short' | 'medium' | 'long' | 'any';
  /** Only videos published after this date (RFC 3339) */
  publishedAfter?: string;
  /** Continuation token from a previous page */
  pageToken?: string;
  /** Request timeout in milliseconds (default: 10000) */
  timeoutMs?: number;
}

/**
 * One page of search results
 */
export interface SearchPage {
  /** Video IDs in provider order */
  videoIds: string[];
  /** Token for the next page, absent on the last page */
  nextPageToken?: string;
}

/**
 * Detailed video information from videos.list endpoint
 */
export interface VideoDetails {
  videoId: string;
  title: string;
  description: string;
  channelTitle: string;
  /** When the video was published (RFC 3339) */
  publishedAt: string;
  /** Video duration in ISO8601 format (e.g., "PT45S"); empty when absent */
  duration: string;
  viewCount: number;
  likeCount: number;
  commentCount: number;
}

/**
 * Caption track listed by captions.list
 */
export interface CaptionTrack {
  id: string;
  language: string;
  /** 'standard', 'asr' (auto-generated) or 'forced' */
  trackKind: string;
}

/**
 * Subtitle formats accepted by captions.download
 */
export type CaptionFormat = 'srt' | 'sbv' | 'scc' | 'ttml' | 'vtt';

/**
 * Calls the pipeline makes against the video provider.
 *
 * YouTubeClient implements it; tests substitute in-memory fakes.
 */
export interface YouTubeApi {
  searchPage(query: string, options?: SearchOptions): Promise<SearchPage>;
  getVideoDetails(videoIds: string[], timeoutMs?: number): Promise<VideoDetails[]>;
  listCaptionTracks(videoId: string, timeoutMs?: number): Promise<CaptionTrack[]>;
  downloadCaptionTrack(trackId: string, format?: CaptionFormat, timeoutMs?: number): Promise<string>;
}

/**
 * YouTube API error with additional context
 */
export class YouTubeApiError extends Error {
  constructor(
    message: string,
    public readonly statusCode: number,
    public readonly isRetryable: boolean,
    public readonly isQuotaExceeded: boolean = false
  ) {
    super(message);
    this.name = 'YouTubeApiError';
  }
}

/**
 * Client construction options
 */
export interface YouTubeClientOptions {
  /** Override the API base URL */
  baseUrl?: string;
  /** Fetch implementation (defaults to global fetch) */
  fetchImpl?: typeof fetch;
  /** Default request timeout in milliseconds */
  timeoutMs?: number;
}

// ============================================================================
// API Response Types (Internal)
// ============================================================================

interface YouTubeSearchResponse {
  nextPageToken?: string;
  items?: Array<{
    id?: {
      kind?: string;
      videoId?: string;
    };
  }>;
}

interface YouTubeVideosResponse {
  items?: Array<{
    id: string;
    snippet?: {
      publishedAt?: string;
      title?: string;
      description?: string;
      channelTitle?: string;
    };
    contentDetails?: {
      duration?: string;
    };
    statistics?: {
      viewCount?: string;
      likeCount?: string;
      commentCount?: string;
    };
  }>;
}

interface YouTubeCaptionsResponse {
  items?: Array<{
    id: string;
    snippet?: {
      language?: string;
      trackKind?: string;
    };
  }>;
}

// ============================================================================
// Constants
// ============================================================================

/** Largest page / batch the API accepts */
export const MAX_PAGE_SIZE = 50;

/** Default configuration */
const DEFAULTS = {
  maxResults: MAX_PAGE_SIZE,
  order: 'viewCount' as const,
  videoDuration: 'short' as const,
  timeoutMs: 10000,
} as const;

// ============================================================================
// Client Implementation
// ============================================================================

/**
 * YouTubeClient provides access to the YouTube Data API v3.
 *
 * @example
 * ```typescript
 * const client = new YouTubeClient(requireApiKey(config, 'youtube'));
 *
 * const page = await client.searchPage('YouTube Shorts', { videoDuration: 'short' });
 * const details = await client.getVideoDetails(page.videoIds);
 * ```
 */
export class YouTubeClient implements YouTubeApi {
  private readonly baseUrl: string;
  private readonly fetchImpl: typeof fetch;
  private readonly timeoutMs: number;

  /**
   * @param apiKey - YouTube Data API key
   * @throws Error if the key is empty
   */
  constructor(
    private readonly apiKey: string,
    options: YouTubeClientOptions = {}
  ) {
    if (!apiKey) {
      throw new Error('YouTubeClient requires an API key');
    }
    this.baseUrl = options.baseUrl ?? 'https://www.googleapis.com/youtube/v3';
    this.fetchImpl = options.fetchImpl ?? fetch;
    this.timeoutMs = options.timeoutMs ?? DEFAULTS.timeoutMs;
  }

  /**
   * Fetch one page of video search results.
   *
   * Costs 100 quota units per call.
   *
   * @throws YouTubeApiError on API errors
   */
  async searchPage(query: string, options: SearchOptions = {}): Promise<SearchPage> {
    const maxResults = Math.max(1, Math.min(options.maxResults ?? DEFAULTS.maxResults, MAX_PAGE_SIZE));

    const params = new URLSearchParams({
      part: 'id',
      q: query,
      type: 'video',
      maxResults: String(maxResults),
      order: options.order ?? DEFAULTS.order,
      videoDuration: options.videoDuration ?? DEFAULTS.videoDuration,
    });

    if (options.publishedAfter) {
      params.set('publishedAfter', options.publishedAfter);
    }
    if (options.pageToken) {
      params.set('pageToken', options.pageToken);
    }

    const data = await this.getJson<YouTubeSearchResponse>('search', params, options.timeoutMs);

    return parseSearchResponse(data);
  }

  /**
   * Get detailed information for up to 50 videos.
   *
   * Costs 1 quota unit per call (regardless of video count).
   *
   * @throws YouTubeApiError on API errors
   * @throws RangeError when more than 50 IDs are passed
   */
  async getVideoDetails(videoIds: string[], timeoutMs?: number): Promise<VideoDetails[]> {
    if (videoIds.length === 0) {
      return [];
    }
    if (videoIds.length > MAX_PAGE_SIZE) {
      throw new RangeError(`videos.list accepts at most ${MAX_PAGE_SIZE} IDs, got ${videoIds.length}`);
    }

    const params = new URLSearchParams({
      part: 'snippet,statistics,contentDetails',
      id: videoIds.join(','),
    });

    const data = await this.getJson<YouTubeVideosResponse>('videos', params, timeoutMs);

    return parseVideosResponse(data);
  }

  /**
   * List caption tracks for a video.
   */
  async listCaptionTracks(videoId: string, timeoutMs?: number): Promise<CaptionTrack[]> {
    const params = new URLSearchParams({ part: 'snippet', videoId });
    const data = await this.getJson<YouTubeCaptionsResponse>('captions', params, timeoutMs);

    return (data.items ?? []).map((item) => ({
      id: item.id,
      language: item.snippet?.language ?? '',
      trackKind: item.snippet?.trackKind ?? 'standard',
    }));
  }

  /**
   * Download a caption track body in a subtitle format.
   *
   * The API only serves tracks the key's project may access; others
   * fail with 403 and surface as YouTubeApiError.
   */
  async downloadCaptionTrack(
    trackId: string,
    format: CaptionFormat = 'srt',
    timeoutMs?: number
  ): Promise<string> {
    const params = new URLSearchParams({ tfmt: format });
    const response = await this.request(`captions/${encodeURIComponent(trackId)}`, params, timeoutMs);

    return response.text();
  }

  private async getJson<T>(
    endpoint: string,
    params: URLSearchParams,
    timeoutMs?: number
  ): Promise<T> {
    const response = await this.request(endpoint, params, timeoutMs);
    return (await response.json()) as T;
  }

  private async request(
    endpoint: string,
    params: URLSearchParams,
    timeoutMs: number = this.timeoutMs
  ): Promise<Response> {
    params.set('key', this.apiKey);
    const response = await this.fetchWithTimeout(
      `${this.baseUrl}/${endpoint}?${params.toString()}`,
      { method: 'GET' },
      timeoutMs
    );

    if (!response.ok) {
      await handleError(response);
    }
    return response;
  }

  /**
   * Execute fetch with timeout using AbortController.
   */
  private async fetchWithTimeout(
    url: string,
    options: RequestInit,
    timeoutMs: number
  ): Promise<Response> {
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), timeoutMs);

    try {
      return await this.fetchImpl(url, { ...options, signal: controller.signal });
    } catch (error) {
      if (error instanceof Error && error.name === 'AbortError') {
        throw new YouTubeApiError(`Request timed out after ${timeoutMs}ms`, 408, true, false);
      }
      throw error;
    } finally {
      clearTimeout(timeoutId);
    }
  }
}

// ============================================================================
// Response Handling
// ============================================================================

/**
 * Handle API error responses.
 *
 * Detects quota exceeded (403) errors and marks them appropriately.
 */
async function handleError(response: Response): Promise<never> {
  const text = await response.text().catch(() => 'Unknown error');

  let errorMessage = text;
  let isQuotaExceeded = false;

  // Parse error message from response if JSON
  try {
    const parsed = JSON.parse(text) as {
      error?: {
        message?: string;
        errors?: Array<{ reason?: string }>;
      };
    };
    if (parsed.error?.message) {
      errorMessage = parsed.error.message;
    }
    const reasons = parsed.error?.errors?.map((e) => e.reason) ?? [];
    isQuotaExceeded = reasons.some(
      (r) => r === 'quotaExceeded' || r === 'dailyLimitExceeded' || r === 'rateLimitExceeded'
    );
  } catch {
    // Not JSON: report the raw body
    errorMessage = text;
  }

  if (response.status === 403) {
    const lowerMessage = errorMessage.toLowerCase();
    if (
      lowerMessage.includes('quota') ||
      lowerMessage.includes('limit exceeded') ||
      lowerMessage.includes('daily limit')
    ) {
      isQuotaExceeded = true;
    }
  }

  // Only transient errors are retryable, never quota
  const isRetryable = !isQuotaExceeded && (response.status === 429 || response.status >= 500);

  let message: string;
  if (isQuotaExceeded) {
    message = `YouTube API quota exceeded: ${errorMessage}`;
  } else if (response.status === 429) {
    message = `Rate limit exceeded: ${errorMessage}`;
  } else if (response.status >= 500) {
    message = `Server error (${response.status}): ${errorMessage}`;
  } else if (response.status === 401) {
    message = 'Authentication failed: Invalid API key';
  } else if (response.status === 403) {
    message = `Access forbidden: ${errorMessage}`;
  } else {
    message = `API error (${response.status}): ${errorMessage}`;
  }

  throw new YouTubeApiError(message, response.status, isRetryable, isQuotaExceeded);
}

function parseSearchResponse(data: YouTubeSearchResponse): SearchPage {
  const videoIds: string[] = [];
  for (const item of data.items ?? []) {
    const videoId = item.id?.videoId;
    if (videoId) {
      videoIds.push(videoId);
    }
  }
  return {
    videoIds,
    nextPageToken: data.nextPageToken || undefined,
  };
}

function parseVideosResponse(data: YouTubeVideosResponse): VideoDetails[] {
  return (data.items ?? []).map((item) => ({
    videoId: item.id,
    title: item.snippet?.title ?? '',
    description: item.snippet?.description ?? '',
    channelTitle: item.snippet?.channelTitle ?? '',
    publishedAt: item.snippet?.publishedAt ?? '',
    duration: item.contentDetails?.duration ?? '',
    viewCount: parseCount(item.statistics?.viewCount),
    likeCount: parseCount(item.statistics?.likeCount),
    commentCount: parseCount(item.statistics?.commentCount),
  }));
}

function parseCount(value: string | undefined): number {
  const parsed = parseInt(value ?? '0', 10);
  return Number.isFinite(parsed) && parsed > 0 ? parsed : 0;
}

// ============================================================================
// Helper Functions
// ============================================================================

/**
 * Check if an error is retryable
 */
export function isRetryableError(error: unknown): boolean {
  if (error instanceof YouTubeApiError) {
    return error.isRetryable;
  }
  if (error instanceof Error) {
    const message = error.message.toLowerCase();
    return (
      message.includes('timeout') ||
      message.includes('network') ||
      message.includes('econnreset') ||
      message.includes('fetch failed') ||
      message.includes('503') ||
      message.includes('500') ||
      message.includes('502') ||
      message.includes('504')
    );
  }
  return false;
}
