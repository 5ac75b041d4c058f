/**
 * Schemas
 *
 * @module schemas
 */

export {
  VIDEO_RECORD_COLUMNS,
  VideoRecordSchema,
  parseVideoRecord,
  type VideoRecord,
  type VideoRecordColumn,
  type DetailRecord,
  type EnrichmentFields,
} from './video-record.js';
