/**
 * Language and Vision Model Clients
 *
 * One `TextModel` interface over OpenAI chat completions and Google
 * Generative AI. Requests carry a prompt and optionally one image;
 * responses are the model's free-form text.
 *
 * @module analysis/client
 */

import OpenAI from 'openai';
import {
  GoogleGenerativeAI,
  GoogleGenerativeAIFetchError,
  GoogleGenerativeAIResponseError,
  type GenerateContentRequest,
  type Part,
} from '@google/generative-ai';
import { requireApiKey, providerKeyName, type AppConfig } from '../config/index.js';
import type { ModelConfig, TaskType } from '../config/models.js';
import { MODEL_RETRY, withRetry, withTimeout, type RetryConfig } from '../workers/retry.js';

// ============================================================================
// Types
// ============================================================================

/**
 * Image attached to a model request.
 */
export interface ModelImage {
  data: Buffer;
  mimeType: 'image/png' | 'image/jpeg';
}

/**
 * A single-turn request to a model.
 */
export interface ModelRequest {
  prompt: string;
  image?: ModelImage;
}

/**
 * Anything that turns a prompt into text.
 *
 * The analyzer and the frame describer depend only on this, so tests
 * pass scripted fakes. An answer with no text (empty, truncated or
 * blocked by the provider) comes back as the empty string.
 */
export interface TextModel {
  readonly modelId: string;
  complete(request: ModelRequest): Promise<string>;
}

/**
 * Options shared by the concrete clients.
 */
export interface ModelClientOptions {
  /** Request timeout in milliseconds (default: 60000) */
  timeoutMs?: number;
  /** Retry policy for transient failures */
  retry?: RetryConfig;
}

export type ChatContentPart = { type: 'text'; text: string } | { type: 'image_url'; image_url: { url: string } };

export interface ChatRequest {
  model: string;
  messages: Array<{ role: 'user'; content: string | ChatContentPart[] }>;
  temperature?: number;
}

/**
 * The slice of the OpenAI SDK the chat client calls.
 */
export interface ChatCompletionsApi {
  chat: {
    completions: {
      create(
        body: ChatRequest,
        options?: { signal?: AbortSignal }
      ): Promise<{ choices: Array<{ message: { content: string | null } }> }>;
    };
  };
}

/**
 * The slice of the Google Generative AI SDK the Gemini client calls.
 */
export interface GenerativeApi {
  getGenerativeModel(params: { model: string }): {
    generateContent(request: GenerateContentRequest): Promise<{ response: { text(): string } }>;
  };
}

/**
 * Model API error with additional context.
 */
export class ModelApiError extends Error {
  constructor(
    message: string,
    public readonly statusCode: number,
    public readonly isRetryable: boolean
  ) {
    super(message);
    this.name = 'ModelApiError';
  }
}

// ============================================================================
// Constants
// ============================================================================

const DEFAULT_TIMEOUT_MS = 60000;

/** HTTP statuses worth retrying */
const RETRYABLE_STATUSES = new Set([408, 429, 500, 502, 503, 504]);

// ============================================================================
// OpenAI
// ============================================================================

/**
 * OpenAI chat completions client.
 *
 * @example
 * ```typescript
 * const model = new OpenAIChatModel(apiKey, config.models.analysis);
 * const text = await model.complete({ prompt: 'Summarize: ...' });
 * ```
 */
export class OpenAIChatModel implements TextModel {
  readonly modelId: string;
  private readonly client: ChatCompletionsApi;
  private readonly timeoutMs: number;
  private readonly retry: RetryConfig;

  constructor(
    apiKey: string,
    private readonly model: ModelConfig,
    options: ModelClientOptions & { client?: ChatCompletionsApi } = {}
  ) {
    this.modelId = model.modelId;
    this.client = options.client ?? new OpenAI({ apiKey, maxRetries: 0 });
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.retry = options.retry ?? MODEL_RETRY;
  }

  async complete(request: ModelRequest): Promise<string> {
    return withRetry(() => this.completeOnce(request), isRetryableModelError, this.retry);
  }

  private async completeOnce(request: ModelRequest): Promise<string> {
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), this.timeoutMs);

    const content: string | ChatContentPart[] = request.image
      ? [
          { type: 'image_url', image_url: { url: toDataUrl(request.image) } },
          { type: 'text', text: request.prompt },
        ]
      : request.prompt;

    try {
      const response = await this.client.chat.completions.create(
        {
          model: this.model.modelId,
          messages: [{ role: 'user', content }],
          ...(this.model.temperature !== undefined && { temperature: this.model.temperature }),
        },
        { signal: controller.signal }
      );

      return (response.choices[0]?.message.content ?? '').trim();
    } catch (error) {
      if (error instanceof OpenAI.APIUserAbortError || (error instanceof Error && error.name === 'AbortError')) {
        throw new ModelApiError(`Request timed out after ${this.timeoutMs}ms`, 408, true);
      }
      if (error instanceof OpenAI.APIError) {
        const status = error.status ?? 500;
        throw new ModelApiError(error.message, status, RETRYABLE_STATUSES.has(status));
      }
      throw new ModelApiError(error instanceof Error ? error.message : 'Unknown error', 500, true);
    } finally {
      clearTimeout(timeoutId);
    }
  }
}

// ============================================================================
// Google Generative AI
// ============================================================================

/**
 * Google Generative AI client.
 *
 * The SDK takes no AbortSignal, so timeouts use Promise.race.
 */
export class GoogleGenerativeModel implements TextModel {
  readonly modelId: string;
  private readonly genAI: GenerativeApi;
  private readonly timeoutMs: number;
  private readonly retry: RetryConfig;

  constructor(
    apiKey: string,
    private readonly model: ModelConfig,
    options: ModelClientOptions & { client?: GenerativeApi } = {}
  ) {
    this.modelId = model.modelId;
    this.genAI = options.client ?? new GoogleGenerativeAI(apiKey);
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.retry = options.retry ?? MODEL_RETRY;
  }

  async complete(request: ModelRequest): Promise<string> {
    const generative = this.genAI.getGenerativeModel({ model: this.model.modelId });

    const parts: Part[] = request.image
      ? [
          { inlineData: { mimeType: request.image.mimeType, data: request.image.data.toString('base64') } },
          { text: request.prompt },
        ]
      : [{ text: request.prompt }];

    const completeOnce = async (): Promise<string> => {
      let response: { text(): string };
      try {
        ({ response } = await generative.generateContent({
          contents: [{ role: 'user', parts }],
          ...(this.model.temperature !== undefined && {
            generationConfig: { temperature: this.model.temperature },
          }),
        }));
      } catch (error) {
        if (error instanceof GoogleGenerativeAIFetchError) {
          const status = error.status ?? 500;
          throw new ModelApiError(error.message, status, RETRYABLE_STATUSES.has(status));
        }
        throw error;
      }

      try {
        return response.text().trim();
      } catch (error) {
        // Blocked candidate (safety, recitation): an answer without text
        if (error instanceof GoogleGenerativeAIResponseError) {
          return '';
        }
        throw error;
      }
    };

    return withRetry(
      () =>
        withTimeout(
          completeOnce(),
          this.timeoutMs,
          () => new ModelApiError(`Request timed out after ${this.timeoutMs}ms`, 408, true)
        ),
      isRetryableModelError,
      this.retry
    );
  }
}

// ============================================================================
// Factory
// ============================================================================

/**
 * Build the model client configured for a task.
 *
 * @throws MissingCredentialsError when the provider's key is absent
 */
export function createTextModel(
  config: AppConfig,
  task: TaskType,
  options: ModelClientOptions = {}
): TextModel {
  const model = config.models[task];
  const apiKey = requireApiKey(config, providerKeyName(model.provider));

  return model.provider === 'google'
    ? new GoogleGenerativeModel(apiKey, model, options)
    : new OpenAIChatModel(apiKey, model, options);
}

// ============================================================================
// Helper Functions
// ============================================================================

/**
 * Encode an image as a data URL.
 */
export function toDataUrl(image: ModelImage): string {
  return `data:${image.mimeType};base64,${image.data.toString('base64')}`;
}

/**
 * Check if an error is transient and worth retrying.
 */
export function isRetryableModelError(error: unknown): boolean {
  if (error instanceof ModelApiError) {
    return error.isRetryable;
  }

  if (error instanceof Error) {
    const message = error.message.toLowerCase();
    return (
      message.includes('rate limit') ||
      message.includes('429') ||
      message.includes('timeout') ||
      message.includes('timed out') ||
      message.includes('network') ||
      message.includes('econnreset') ||
      message.includes('503') ||
      message.includes('500') ||
      message.includes('502') ||
      message.includes('504')
    );
  }

  return false;
}
