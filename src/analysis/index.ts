/**
 * Text analysis: model clients, prompts, the tolerant response parser,
 * and frame description.
 *
 * @module analysis
 */

export {
  OpenAIChatModel,
  GoogleGenerativeModel,
  ModelApiError,
  createTextModel,
  isRetryableModelError,
  toDataUrl,
  type TextModel,
  type ModelRequest,
  type ModelImage,
  type ModelClientOptions,
  type ChatCompletionsApi,
  type GenerativeApi,
} from './client.js';

export {
  ANALYSIS_INSTRUCTION,
  FRAME_EXTRACTION_PROMPT,
  buildAnalysisPrompt,
} from './prompts.js';

export {
  parseAnalysisResponse,
  extractTag,
  splitHooks,
  EMPTY_ANALYSIS,
  type AnalysisResult,
} from './parser.js';

export { analyzeText } from './analyzer.js';
export { describeFrames } from './vision.js';
