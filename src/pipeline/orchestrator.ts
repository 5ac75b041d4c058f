/**
 * Pipeline Orchestrator
 *
 * Runs one trend-watch pass end to end:
 *
 * 1. search   - candidate IDs for the query
 * 2. details  - metadata and engagement metrics
 * 3. filter   - popularity thresholds
 * 4. enrich   - extraction chain, analysis and score, per record
 * 5. write    - the table, once, atomically
 *
 * Enrichment runs under a ConcurrencyLimiter and stores results by index,
 * so table order always matches filter order. Records are frozen once
 * finished.
 *
 * @module pipeline/orchestrator
 */

import { fetchCandidates } from '../stages/candidates.js';
import { fetchDetails } from '../stages/details.js';
import { filterPopularWithStats } from '../stages/filter.js';
import { extractText, type ExtractionSource } from '../stages/extract.js';
import { analyzeText } from '../analysis/analyzer.js';
import { viralityScore } from '../ranking/virality.js';
import { writeColumnarTable, writeCsvTable } from '../export/table.js';
import { ConcurrencyLimiter } from '../workers/concurrency.js';
import type { DetailRecord, VideoRecord } from '../schemas/video-record.js';
import {
  PipelineCancelledError,
  silentLogger,
  type Logger,
  type PipelineContext,
  type PipelineOptions,
  type PipelineResult,
  type PipelineStage,
  type ProgressObserver,
} from './types.js';

// ============================================================================
// Defaults
// ============================================================================

export const DEFAULT_QUERY = 'YouTube Shorts';
export const DEFAULT_DAYS_BACK = 10;
export const DEFAULT_MAX_RESULTS = 50;
export const DEFAULT_CONCURRENCY = 1;

// ============================================================================
// Observer Guard
// ============================================================================

/**
 * Wrap an observer so its exceptions are logged instead of propagating.
 */
function guardObserver(observer: ProgressObserver | undefined, logger: Logger): Required<ProgressObserver> {
  const call = (name: string, fn: () => void): void => {
    try {
      fn();
    } catch (error) {
      logger.warn(`Progress observer ${name} failed: ${error instanceof Error ? error.message : String(error)}`);
    }
  };

  return {
    onStageStart: (stage, detail) => call('onStageStart', () => observer?.onStageStart?.(stage, detail)),
    onStageComplete: (stage, detail) => call('onStageComplete', () => observer?.onStageComplete?.(stage, detail)),
    onRecordComplete: (done, total, record, source) =>
      call('onRecordComplete', () => observer?.onRecordComplete?.(done, total, record, source)),
  };
}

// ============================================================================
// Per-record Enrichment
// ============================================================================

/**
 * Extract text, analyze it and score the record.
 *
 * Extraction never throws; analysis failures propagate.
 */
export async function enrichRecord(
  record: DetailRecord,
  context: Pick<PipelineContext, 'strategies' | 'textModel'>,
  logger: Logger
): Promise<{ record: VideoRecord; source: ExtractionSource }> {
  const { text, source } = await extractText(record, context.strategies, logger);
  const analysis = await analyzeText(text, context.textModel);

  const finished: VideoRecord = Object.freeze({
    ...record,
    extractedText: text,
    topic: analysis.topic,
    hooks: analysis.hooks,
    viralityScore: viralityScore(record),
  });

  return { record: finished, source };
}

// ============================================================================
// Orchestrator
// ============================================================================

/**
 * Run the pipeline.
 *
 * @throws RangeError for invalid bounds
 * @throws PipelineCancelledError when `options.signal` aborts; nothing is written
 * @throws YouTubeApiError or ModelApiError when a required call fails after retries
 */
export async function runPipeline(context: PipelineContext, options: PipelineOptions = {}): Promise<PipelineResult> {
  const logger = context.logger ?? silentLogger;
  const observer = guardObserver(context.observer, logger);
  const now = context.now?.() ?? new Date();
  const startedAt = Date.now();

  const query = options.query ?? DEFAULT_QUERY;
  const daysBack = options.daysBack ?? DEFAULT_DAYS_BACK;
  const maxResults = options.maxResults ?? DEFAULT_MAX_RESULTS;
  const concurrency = options.concurrency ?? DEFAULT_CONCURRENCY;
  const isAborted = (): boolean => options.signal?.aborted === true;

  const limiter = new ConcurrencyLimiter(concurrency);

  const stage = async <T>(
    name: PipelineStage,
    detail: string,
    run: () => Promise<T>,
    summary: (result: T) => string
  ): Promise<T> => {
    observer.onStageStart(name, detail);
    const result = await run();
    const text = summary(result);
    logger.debug(`${name}: ${text}`);
    observer.onStageComplete(name, text);
    return result;
  };

  if (isAborted()) {
    throw new PipelineCancelledError(0, 0);
  }

  // 1. Search
  const ids = await stage(
    'search',
    `"${query}", last ${daysBack} days, up to ${maxResults}`,
    () => fetchCandidates(context.youtube, query, daysBack, maxResults, { now, logger }),
    (result) => `${result.length} candidates`
  );

  // 2. Details
  const detailed = await stage(
    'details',
    `${ids.length} videos`,
    () => fetchDetails(context.youtube, ids, now),
    (result) => `${result.length} records`
  );

  // 3. Filter
  const filtered = await stage(
    'filter',
    `${detailed.length} records`,
    async () => filterPopularWithStats(detailed, options.thresholds),
    ({ stats }) =>
      `${stats.retained} retained (${stats.dropped.lowViews} low views, ${stats.dropped.lowLikeRatio} low like ratio)`
  );
  const retained = filtered.records;

  // 4. Enrich
  const total = retained.length;
  const results: Array<VideoRecord | undefined> = new Array<VideoRecord | undefined>(total);
  const sources: Record<ExtractionSource, number> = { transcript: 0, captionTrack: 0, frames: 0, none: 0 };
  const progress: { done: number; failed: boolean; error?: unknown } = { done: 0, failed: false };

  await stage(
    'enrich',
    `${total} records, ${concurrency} at a time`,
    () =>
      Promise.all(
        retained.map((record, index) =>
          limiter.run(async () => {
            if (progress.failed || isAborted()) {
              return;
            }
            try {
              const enriched = await enrichRecord(record, context, logger);
              results[index] = enriched.record;
              sources[enriched.source]++;
              progress.done++;
              observer.onRecordComplete(progress.done, total, enriched.record, enriched.source);
            } catch (error) {
              // First failure wins; records still queued are skipped
              if (!progress.failed) {
                progress.failed = true;
                progress.error = error;
              }
            }
          })
        )
      ),
    () => `${progress.done} of ${total} records`
  );

  if (progress.failed) {
    throw progress.error;
  }
  if (isAborted()) {
    throw new PipelineCancelledError(progress.done, total);
  }

  const records = results.filter((record): record is VideoRecord => record !== undefined);

  // 5. Write
  const written: string[] = [];
  const output = options.output;
  if (output) {
    await stage(
      'write',
      output.csvPath,
      async () => {
        await writeCsvTable(output.csvPath, records);
        written.push(output.csvPath);
        if (output.columnarPath) {
          await writeColumnarTable(output.columnarPath, records);
          written.push(output.columnarPath);
        }
      },
      () => `${records.length} rows to ${written.join(', ')}`
    );
  }

  return {
    records,
    stats: {
      candidates: ids.length,
      detailed: detailed.length,
      retained: total,
      sources,
      durationMs: Date.now() - startedAt,
    },
    written,
  };
}
