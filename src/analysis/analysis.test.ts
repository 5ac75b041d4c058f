/**
 * Analysis Tests
 *
 * Prompt construction, the tolerant topic/hooks parser, the analyzer and
 * frame description against scripted models, and client helpers.
 */

import { describe, it, expect } from '@jest/globals';
import OpenAI from 'openai';
import {
  GoogleGenerativeAIFetchError,
  GoogleGenerativeAIResponseError,
  type GenerateContentRequest,
} from '@google/generative-ai';
import { analyzeText } from './analyzer.js';
import { parseAnalysisResponse, extractTag, splitHooks } from './parser.js';
import { buildAnalysisPrompt, FRAME_EXTRACTION_PROMPT } from './prompts.js';
import { describeFrames } from './vision.js';
import {
  createTextModel,
  GoogleGenerativeModel,
  isRetryableModelError,
  ModelApiError,
  OpenAIChatModel,
  toDataUrl,
  type ChatCompletionsApi,
  type GenerativeApi,
  type ModelRequest,
  type TextModel,
} from './client.js';
import { loadConfig, MissingCredentialsError } from '../config/index.js';
import { IMMEDIATE_RETRY } from '../workers/retry.js';

// ============================================================================
// Helpers
// ============================================================================

function recordingModel(answer: (request: ModelRequest) => string): TextModel & { requests: ModelRequest[] } {
  const requests: ModelRequest[] = [];
  return {
    modelId: 'test-model',
    requests,
    complete: async (request) => {
      requests.push(request);
      return answer(request);
    },
  };
}

// ============================================================================
// Prompts
// ============================================================================

describe('buildAnalysisPrompt', () => {
  it('appends the text after the instruction', () => {
    expect(buildAnalysisPrompt('some captions')).toBe(
      'Read the captions & description below. Return two XML tags only:\n' +
        '<topic> – main subject in ≤5 words\n' +
        "<hooks> – concise list of virality hooks (≤40 chars each, ';'-separated)\n\n" +
        'TEXT:\nsome captions'
    );
  });

  it('still builds a prompt for empty text', () => {
    expect(buildAnalysisPrompt('').endsWith('TEXT:\n')).toBe(true);
  });
});

// ============================================================================
// Parser
// ============================================================================

describe('parseAnalysisResponse', () => {
  it('reads both tags', () => {
    expect(parseAnalysisResponse('<topic> Street food </topic>\n<hooks>fast cuts; price reveal</hooks>')).toEqual({
      topic: 'Street food',
      hooks: 'fast cuts; price reveal',
    });
  });

  it('tolerates a missing hooks tag', () => {
    expect(parseAnalysisResponse('<topic>cooking</topic>')).toEqual({ topic: 'cooking', hooks: '' });
  });

  it('tolerates a malformed topic tag', () => {
    expect(parseAnalysisResponse('<topic>cooking\n<hooks>a; b</hooks>')).toEqual({ topic: '', hooks: 'a; b' });
  });

  it('matches spans across newlines and takes the first occurrence', () => {
    expect(parseAnalysisResponse('<hooks>\nfirst;\nsecond\n</hooks><hooks>later</hooks>').hooks).toBe('first;\nsecond');
  });

  it('decodes entities inside spans', () => {
    expect(parseAnalysisResponse('<topic>Mac &amp; cheese</topic><hooks>&quot;wait&quot;; 1&#x2F;2 price</hooks>')).toEqual({
      topic: 'Mac & cheese',
      hooks: '"wait"; 1/2 price',
    });
  });

  it('returns empty fields for empty input', () => {
    expect(parseAnalysisResponse('')).toEqual({ topic: '', hooks: '' });
    expect(parseAnalysisResponse(null)).toEqual({ topic: '', hooks: '' });
  });
});

describe('extractTag', () => {
  it('matches tag names case-insensitively', () => {
    expect(extractTag('<TOPIC>Cooking</TOPIC>', 'topic')).toBe('Cooking');
  });
});

describe('splitHooks', () => {
  it('drops blank phrases', () => {
    expect(splitHooks(' a ; ;b;')).toEqual(['a', 'b']);
  });
});

// ============================================================================
// Analyzer
// ============================================================================

describe('analyzeText', () => {
  it('sends the prompt and parses the answer', async () => {
    const model = recordingModel(() => '<topic>pets</topic><hooks>cute reveal</hooks>');

    const result = await analyzeText('a dog on a skateboard', model);

    expect(result).toEqual({ topic: 'pets', hooks: 'cute reveal' });
    expect(model.requests).toEqual([{ prompt: buildAnalysisPrompt('a dog on a skateboard') }]);
  });

  it('propagates model failures', async () => {
    const model: TextModel = {
      modelId: 'broken',
      complete: () => Promise.reject(new ModelApiError('quota', 429, true)),
    };

    await expect(analyzeText('text', model)).rejects.toThrow('quota');
  });
});

// ============================================================================
// Vision
// ============================================================================

describe('describeFrames', () => {
  it('sends each frame as a PNG and joins the answers', async () => {
    const model = recordingModel((request) => `  text of ${request.image?.data.toString()}  `);

    const text = await describeFrames([Buffer.from('f1'), Buffer.from('f2')], model);

    expect(text).toBe('text of f1\ntext of f2');
    expect(model.requests.map((r) => r.prompt)).toEqual([FRAME_EXTRACTION_PROMPT, FRAME_EXTRACTION_PROMPT]);
    expect(model.requests[0]?.image?.mimeType).toBe('image/png');
  });

  it('returns empty text when every call fails', async () => {
    const model: TextModel = {
      modelId: 'broken',
      complete: () => Promise.reject(new Error('down')),
    };

    expect(await describeFrames([Buffer.from('f1')], model)).toBe('');
  });
});

// ============================================================================
// Client helpers
// ============================================================================

describe('toDataUrl', () => {
  it('encodes bytes as base64', () => {
    expect(toDataUrl({ data: Buffer.from('png'), mimeType: 'image/png' })).toBe('data:image/png;base64,cG5n');
  });
});

describe('isRetryableModelError', () => {
  it('honours the flag on ModelApiError', () => {
    expect(isRetryableModelError(new ModelApiError('slow down', 429, true))).toBe(true);
    expect(isRetryableModelError(new ModelApiError('bad request', 400, false))).toBe(false);
  });

  it('recognises transient messages on plain errors', () => {
    expect(isRetryableModelError(new Error('socket ECONNRESET'))).toBe(true);
    expect(isRetryableModelError(new Error('invalid prompt'))).toBe(false);
    expect(isRetryableModelError('timeout')).toBe(false);
  });
});

// ============================================================================
// OpenAI client
// ============================================================================

type ChatCreate = ChatCompletionsApi['chat']['completions']['create'];
type ChatBody = Parameters<ChatCreate>[0];

function scriptedChat(reply: (body: ChatBody, signal?: AbortSignal) => Promise<string | null>): {
  client: ChatCompletionsApi;
  bodies: ChatBody[];
} {
  const bodies: ChatBody[] = [];
  const create: ChatCreate = async (body, options) => {
    bodies.push(body);
    const content = await reply(body, options?.signal);
    return { choices: [{ message: { content } }] };
  };
  return { client: { chat: { completions: { create } } }, bodies };
}

describe('OpenAIChatModel', () => {
  const reasoning = { modelId: 'o4-mini', provider: 'openai' } as const;

  it('sends the prompt as user text and trims the answer', async () => {
    const { client, bodies } = scriptedChat(async () => '  <topic>pets</topic>\n');
    const model = new OpenAIChatModel('test-secret', { modelId: 'gpt-4o', provider: 'openai', temperature: 0.2 }, { client });

    expect(await model.complete({ prompt: 'hello' })).toBe('<topic>pets</topic>');
    expect(bodies).toEqual([{ model: 'gpt-4o', messages: [{ role: 'user', content: 'hello' }], temperature: 0.2 }]);
  });

  it('puts the image before the prompt and omits temperature for reasoning models', async () => {
    const { client, bodies } = scriptedChat(async () => 'a sign reading OPEN');
    const model = new OpenAIChatModel('test-secret', { modelId: 'o3', provider: 'openai' }, { client });

    await model.complete({ prompt: 'describe', image: { data: Buffer.from('png'), mimeType: 'image/png' } });

    expect(bodies[0]?.messages[0]?.content).toEqual([
      { type: 'image_url', image_url: { url: 'data:image/png;base64,cG5n' } },
      { type: 'text', text: 'describe' },
    ]);
    expect(bodies[0] && 'temperature' in bodies[0]).toBe(false);
  });

  it('returns an empty answer as empty text without retrying', async () => {
    for (const content of ['', null]) {
      const { client, bodies } = scriptedChat(async () => content);
      const model = new OpenAIChatModel('test-secret', reasoning, { client, retry: IMMEDIATE_RETRY });

      expect(await model.complete({ prompt: 'x' })).toBe('');
      expect(bodies).toHaveLength(1);
    }
  });

  it('lets the analyzer degrade an empty answer to empty fields', async () => {
    const { client } = scriptedChat(async () => '');
    const model = new OpenAIChatModel('test-secret', reasoning, { client, retry: IMMEDIATE_RETRY });

    await expect(analyzeText('some caption', model)).resolves.toEqual({ topic: '', hooks: '' });
  });

  it('turns an aborted request into a retryable timeout', async () => {
    const { client, bodies } = scriptedChat(
      (_body, signal) =>
        new Promise((_resolve, reject) => {
          signal?.addEventListener('abort', () => reject(new OpenAI.APIUserAbortError()));
        })
    );
    const model = new OpenAIChatModel('test-secret', reasoning, { client, timeoutMs: 10, retry: IMMEDIATE_RETRY });

    await expect(model.complete({ prompt: 'x' })).rejects.toMatchObject({
      name: 'ModelApiError',
      message: 'Request timed out after 10ms',
      statusCode: 408,
      isRetryable: true,
    });
    expect(bodies).toHaveLength(3);
  });

  it('retries transient API statuses and stops on permanent ones', async () => {
    const limited = scriptedChat(async () => {
      throw new OpenAI.APIError(429, undefined, 'Rate limited', undefined);
    });
    await expect(
      new OpenAIChatModel('test-secret', reasoning, { client: limited.client, retry: IMMEDIATE_RETRY }).complete({ prompt: 'x' })
    ).rejects.toMatchObject({ statusCode: 429, isRetryable: true });
    expect(limited.bodies).toHaveLength(3);

    const rejected = scriptedChat(async () => {
      throw new OpenAI.APIError(400, undefined, 'Unsupported parameter', undefined);
    });
    await expect(
      new OpenAIChatModel('test-secret', reasoning, { client: rejected.client, retry: IMMEDIATE_RETRY }).complete({ prompt: 'x' })
    ).rejects.toMatchObject({ statusCode: 400, isRetryable: false });
    expect(rejected.bodies).toHaveLength(1);
  });
});

// ============================================================================
// Google client
// ============================================================================

function scriptedGemini(text: () => string, fail?: () => Error): {
  client: GenerativeApi;
  models: string[];
  requests: GenerateContentRequest[];
} {
  const models: string[] = [];
  const requests: GenerateContentRequest[] = [];
  const client: GenerativeApi = {
    getGenerativeModel: ({ model }) => {
      models.push(model);
      return {
        generateContent: async (request) => {
          requests.push(request);
          if (fail) {
            throw fail();
          }
          return { response: { text } };
        },
      };
    },
  };
  return { client, models, requests };
}

describe('GoogleGenerativeModel', () => {
  const gemini = { modelId: 'gemini-2.0-flash', provider: 'google', temperature: 0.2 } as const;

  it('sends inline image data and the prompt', async () => {
    const { client, models, requests } = scriptedGemini(() => ' a kitchen \n');
    const model = new GoogleGenerativeModel('test-secret', gemini, { client });

    const text = await model.complete({ prompt: 'describe', image: { data: Buffer.from('png'), mimeType: 'image/png' } });

    expect(text).toBe('a kitchen');
    expect(models).toEqual(['gemini-2.0-flash']);
    expect(requests).toEqual([
      {
        contents: [{ role: 'user', parts: [{ inlineData: { mimeType: 'image/png', data: 'cG5n' } }, { text: 'describe' }] }],
        generationConfig: { temperature: 0.2 },
      },
    ]);
  });

  it('treats a blocked answer as empty text', async () => {
    const { client, requests } = scriptedGemini(() => {
      throw new GoogleGenerativeAIResponseError('Candidate was blocked due to SAFETY');
    });
    const model = new GoogleGenerativeModel('test-secret', gemini, { client, retry: IMMEDIATE_RETRY });

    await expect(analyzeText('some caption', model)).resolves.toEqual({ topic: '', hooks: '' });
    expect(requests).toHaveLength(1);
  });

  it('maps fetch errors to their status', async () => {
    const unavailable = scriptedGemini(
      () => '',
      () => new GoogleGenerativeAIFetchError('Service Unavailable', 503)
    );
    await expect(
      new GoogleGenerativeModel('test-secret', gemini, { client: unavailable.client, retry: IMMEDIATE_RETRY }).complete({
        prompt: 'x',
      })
    ).rejects.toMatchObject({ statusCode: 503, isRetryable: true });
    expect(unavailable.requests).toHaveLength(3);

    const denied = scriptedGemini(
      () => '',
      () => new GoogleGenerativeAIFetchError('API key not valid', 400)
    );
    await expect(
      new GoogleGenerativeModel('test-secret', gemini, { client: denied.client, retry: IMMEDIATE_RETRY }).complete({
        prompt: 'x',
      })
    ).rejects.toMatchObject({ statusCode: 400, isRetryable: false });
    expect(denied.requests).toHaveLength(1);
  });
});

describe('createTextModel', () => {
  it('builds an OpenAI client for o-series models', () => {
    const config = loadConfig({ OPENAI_API_KEY: 'test-secret' });
    const model = createTextModel(config, 'analysis');

    expect(model).toBeInstanceOf(OpenAIChatModel);
    expect(model.modelId).toBe('o4-mini');
  });

  it('builds a Google client for gemini models', () => {
    const config = loadConfig({ GOOGLE_AI_API_KEY: 'test-secret', VISION_MODEL: 'gemini-2.0-flash' });
    const model = createTextModel(config, 'vision');

    expect(model).toBeInstanceOf(GoogleGenerativeModel);
    expect(model.modelId).toBe('gemini-2.0-flash');
  });

  it('requires the provider key', () => {
    const config = loadConfig({});
    expect(() => createTextModel(config, 'vision')).toThrow(MissingCredentialsError);
  });
});
