/**
 * Lookup Module
 *
 * @module lookup
 */

export {
  CorpusIndex,
  NotFoundError,
  loadCorpus,
  shortenText,
  SEARCH_LIMIT,
  SUMMARY_WIDTH,
  type SearchHit,
  type VideoDocument,
  type VideoMetadata,
} from './corpus.js';

export { ApiError, requireBearer, createErrorHandler, notFoundHandler, formatZodError } from './middleware.js';

export { createApp, startServer, type LookupServerOptions } from './server.js';

export { SAMPLE_RECORDS } from './sample.js';
