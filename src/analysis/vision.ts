/**
 * Frame Description
 *
 * Runs the vision model over sampled frames to recover on-screen text
 * and a short scene description per frame.
 *
 * @module analysis/vision
 */

import type { Logger } from '../pipeline/types.js';
import type { TextModel } from './client.js';
import { FRAME_EXTRACTION_PROMPT } from './prompts.js';

/**
 * Describe each PNG frame and join the answers with newlines.
 *
 * A frame whose call fails is skipped; when every frame fails the
 * result is the empty string.
 */
export async function describeFrames(
  frames: Buffer[],
  model: TextModel,
  logger?: Logger
): Promise<string> {
  const texts: string[] = [];

  for (const [index, frame] of frames.entries()) {
    try {
      const text = await model.complete({
        prompt: FRAME_EXTRACTION_PROMPT,
        image: { data: frame, mimeType: 'image/png' },
      });
      if (text.trim()) {
        texts.push(text.trim());
      }
    } catch (error) {
      logger?.debug(
        `Vision call failed for frame ${index + 1}/${frames.length}: ${
          error instanceof Error ? error.message : String(error)
        }`
      );
    }
  }

  return texts.join('\n');
}
