/**
 * Text Analyzer
 *
 * Sends a video's extracted text to the language model and parses the
 * topic and hooks out of its answer.
 *
 * @module analysis/analyzer
 */

import type { TextModel } from './client.js';
import { buildAnalysisPrompt } from './prompts.js';
import { parseAnalysisResponse, type AnalysisResult } from './parser.js';

/**
 * Analyze extracted text into a topic and virality hooks.
 *
 * Malformed answers degrade to empty fields; model call failures that
 * survive the client's retries propagate.
 */
export async function analyzeText(text: string, model: TextModel): Promise<AnalysisResult> {
  const raw = await model.complete({ prompt: buildAnalysisPrompt(text) });
  return parseAnalysisResponse(raw);
}
