/**
 * Pipeline Module
 *
 * @module pipeline
 */

export {
  runPipeline,
  enrichRecord,
  DEFAULT_QUERY,
  DEFAULT_DAYS_BACK,
  DEFAULT_MAX_RESULTS,
  DEFAULT_CONCURRENCY,
} from './orchestrator.js';

export {
  PIPELINE_STAGES,
  STAGE_LABELS,
  PipelineCancelledError,
  silentLogger,
  type Logger,
  type PipelineStage,
  type ProgressObserver,
  type PipelineContext,
  type OutputOptions,
  type PipelineOptions,
  type PipelineStats,
  type PipelineResult,
} from './types.js';
