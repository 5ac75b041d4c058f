/**
 * Analysis Prompt Templates
 *
 * Prompts for the text analyzer and the per-frame vision extraction.
 *
 * @module analysis/prompts
 */

/**
 * Instruction asking for the two tagged fields.
 */
export const ANALYSIS_INSTRUCTION =
  'Read the captions & description below. Return two XML tags only:\n' +
  '<topic> – main subject in ≤5 words\n' +
  "<hooks> – concise list of virality hooks (≤40 chars each, ';'-separated)";

/**
 * Vision prompt sent with each sampled frame.
 */
export const FRAME_EXTRACTION_PROMPT =
  'Extract all visible text and a short scene description (≤40 words).';

/**
 * Build the analyzer prompt for one video's extracted text.
 *
 * Empty text still produces a prompt; the model then answers from nothing
 * and the parser tolerates whatever comes back.
 */
export function buildAnalysisPrompt(text: string): string {
  return `${ANALYSIS_INSTRUCTION}\n\nTEXT:\n${text}`;
}
