/**
 * Pipeline Stages Exports
 *
 * Candidate fetch, detail enrichment, popularity filter and the text
 * extraction chain, in execution order.
 *
 * @module stages
 */

export { fetchCandidates, type CandidateFetchOptions } from './candidates.js';

export {
  fetchDetails,
  toDetailRecord,
  likeRatio,
  chunk,
  LIKE_RATIO_EPSILON,
  type DetailFetchOptions,
} from './details.js';

export {
  filterPopular,
  filterPopularWithStats,
  MIN_VIEWS,
  LIKE_RATIO_THRESHOLD,
  DEFAULT_THRESHOLDS,
  type FilterThresholds,
  type FilterReason,
  type FilterStats,
} from './filter.js';

export {
  extractText,
  transcriptStrategy,
  captionTrackStrategy,
  frameStrategy,
  createDefaultStrategies,
  EXTRACTION_SOURCES,
  type ExtractionStrategy,
  type ExtractionOutcome,
  type ExtractionSource,
  type StrategyName,
  type DefaultStrategyOptions,
} from './extract.js';
