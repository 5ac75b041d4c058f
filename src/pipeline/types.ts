/**
 * Pipeline Type Definitions
 *
 * Context, options, observer and result types for the
 * search → details → filter → enrich → write pipeline.
 *
 * @module pipeline/types
 */

import type { VideoRecord } from '../schemas/video-record.js';
import type { YouTubeApi } from '../workers/youtube/client.js';
import type { TextModel } from '../analysis/client.js';
import type { ExtractionStrategy, ExtractionSource } from '../stages/extract.js';
import type { FilterThresholds } from '../stages/filter.js';

// ============================================================================
// Logger Interface
// ============================================================================

/**
 * Minimal logger interface for pipeline stages.
 * Allows stages to log at various levels without depending on a specific logger.
 */
export interface Logger {
  /** Log debug-level message (typically hidden) */
  debug(message: string, ...args: unknown[]): void;

  /** Log informational message */
  info(message: string, ...args: unknown[]): void;

  /** Log warning message */
  warn(message: string, ...args: unknown[]): void;

  /** Log error message */
  error(message: string, ...args: unknown[]): void;
}

/**
 * Logger that discards everything.
 */
export const silentLogger: Logger = {
  debug: () => undefined,
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
};

// ============================================================================
// Stages
// ============================================================================

/**
 * Pipeline stages in execution order.
 */
export const PIPELINE_STAGES = ['search', 'details', 'filter', 'enrich', 'write'] as const;

export type PipelineStage = (typeof PIPELINE_STAGES)[number];

/**
 * Human-readable labels for each stage.
 */
export const STAGE_LABELS: Record<PipelineStage, string> = {
  search: 'Searching shorts',
  details: 'Fetching details',
  filter: 'Filtering by virality thresholds',
  enrich: 'Analyzing and scoring',
  write: 'Writing table',
};

// ============================================================================
// Progress Observer
// ============================================================================

/**
 * Receives progress notifications. All callbacks are optional and any
 * exception they throw is logged and ignored.
 */
export interface ProgressObserver {
  onStageStart?(stage: PipelineStage, detail?: string): void;
  onStageComplete?(stage: PipelineStage, detail?: string): void;
  /** Called once per enriched record; `done` counts completions so far */
  onRecordComplete?(done: number, total: number, record: VideoRecord, source: ExtractionSource): void;
}

// ============================================================================
// Context and Options
// ============================================================================

/**
 * Collaborators the pipeline runs against. Built once by the entry point.
 */
export interface PipelineContext {
  youtube: YouTubeApi;
  /** Model for topic/hook analysis */
  textModel: TextModel;
  /** Extraction strategies in priority order */
  strategies: ExtractionStrategy[];
  logger?: Logger;
  observer?: ProgressObserver;
  /** Clock, for reproducible elapsed-day computation */
  now?: () => Date;
}

/**
 * Where to write the finished table.
 */
export interface OutputOptions {
  /** Delimited text table path */
  csvPath: string;
  /** Optional columnar JSON table path */
  columnarPath?: string;
}

/**
 * Options for one pipeline run.
 */
export interface PipelineOptions {
  /** Search query (default: "YouTube Shorts") */
  query?: string;
  /** Published within the last N days (default: 10) */
  daysBack?: number;
  /** Candidates fetched before filtering (default: 50) */
  maxResults?: number;
  /** Popularity thresholds (default: 100000 views, 0.9 like ratio) */
  thresholds?: Partial<FilterThresholds>;
  /** Records enriched at once (default: 1) */
  concurrency?: number;
  /** Stops scheduling new enrichments when aborted */
  signal?: AbortSignal;
  /** Output files; omitted means no table is written */
  output?: OutputOptions;
}

/**
 * Counts for each stage of a run.
 */
export interface PipelineStats {
  candidates: number;
  detailed: number;
  retained: number;
  /** Records per winning extraction source */
  sources: Record<ExtractionSource, number>;
  durationMs: number;
}

/**
 * Outcome of a completed run.
 */
export interface PipelineResult {
  /** Finished records in filter order */
  records: VideoRecord[];
  stats: PipelineStats;
  /** Files written, if any */
  written: string[];
}

/**
 * Raised when the run is aborted; no table has been written.
 */
export class PipelineCancelledError extends Error {
  constructor(
    public readonly completed: number,
    public readonly total: number
  ) {
    super(`Pipeline cancelled after ${completed} of ${total} records`);
    this.name = 'PipelineCancelledError';
  }
}
