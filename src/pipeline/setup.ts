/**
 * Pipeline Setup
 *
 * Builds a PipelineContext from configuration: the YouTube client, the
 * analysis model and the extraction chain.
 *
 * @module pipeline/setup
 */

import { assertCredentials, requireApiKey, type AppConfig } from '../config/index.js';
import { YouTubeClient } from '../workers/youtube/client.js';
import { createTextModel } from '../analysis/client.js';
import { createDefaultStrategies } from '../stages/extract.js';
import { FRAME_SAMPLES } from '../workers/youtube/frames.js';
import type { Logger, PipelineContext } from './types.js';

export interface ContextOptions {
  logger?: Logger;
  /** Frames sampled when nothing else yields text; 0 disables frame sampling */
  frames?: number;
}

/**
 * Create the live collaborators for a run.
 *
 * @throws MissingCredentialsError naming every missing key, before any client is built
 */
export function createPipelineContext(config: AppConfig, options: ContextOptions = {}): PipelineContext {
  assertCredentials(config);

  const frames = options.frames ?? FRAME_SAMPLES;
  const youtube = new YouTubeClient(requireApiKey(config, 'youtube'));
  const visionModel = frames > 0 ? createTextModel(config, 'vision') : undefined;

  return {
    youtube,
    textModel: createTextModel(config, 'analysis'),
    strategies: createDefaultStrategies({ youtube, visionModel, frames: { count: frames } }),
    logger: options.logger,
  };
}
