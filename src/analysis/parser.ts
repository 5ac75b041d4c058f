/**
 * Analysis Response Parser
 *
 * Pulls the `<topic>` and `<hooks>` spans out of a loosely structured
 * model answer. A missing or unterminated tag yields an empty field.
 *
 * @module analysis/parser
 */

import { decodeHtmlEntities } from '../utils/html.js';

/**
 * Topic and hooks for one video.
 */
export interface AnalysisResult {
  /** Main subject in a few words */
  topic: string;
  /** Semicolon-separated virality hooks */
  hooks: string;
}

export const EMPTY_ANALYSIS: Readonly<AnalysisResult> = Object.freeze({ topic: '', hooks: '' });

/**
 * Extract the first `<tag>…</tag>` span, trimmed and entity-decoded.
 *
 * Tag names match case-insensitively and the body may span lines.
 */
export function extractTag(raw: string, tag: string): string {
  const pattern = new RegExp(`<${tag}>([\\s\\S]*?)</${tag}>`, 'i');
  const match = pattern.exec(raw);
  if (!match) {
    return '';
  }
  return decodeHtmlEntities((match[1] ?? '').trim());
}

/**
 * Parse a model answer into an AnalysisResult.
 *
 * @example
 * parseAnalysisResponse('<topic>cooking</topic>') // { topic: 'cooking', hooks: '' }
 */
export function parseAnalysisResponse(raw: string | null | undefined): AnalysisResult {
  if (!raw) {
    return { ...EMPTY_ANALYSIS };
  }
  return {
    topic: extractTag(raw, 'topic'),
    hooks: extractTag(raw, 'hooks'),
  };
}

/**
 * Split a hooks string into its trimmed, non-empty phrases.
 */
export function splitHooks(hooks: string): string[] {
  return hooks
    .split(';')
    .map((hook) => hook.trim())
    .filter((hook) => hook.length > 0);
}
