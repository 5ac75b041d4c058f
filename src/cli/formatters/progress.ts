/**
 * Progress Formatters
 *
 * Terminal progress for a pipeline run: an ora spinner per stage, driven
 * by the pipeline's ProgressObserver callbacks.
 *
 * @module cli/formatters/progress
 */

import ora, { type Ora } from 'ora';
import chalk from 'chalk';
import { STAGE_LABELS, type PipelineStage, type ProgressObserver } from '../../pipeline/types.js';
import type { ExtractionSource } from '../../stages/extract.js';
import type { VideoRecord } from '../../schemas/video-record.js';

// ============================================================================
// Types
// ============================================================================

/**
 * Progress spinner options.
 */
export interface SpinnerOptions {
  /** Spinner color */
  color?: 'cyan' | 'green' | 'yellow' | 'red' | 'blue' | 'magenta' | 'white';
  /** Render at all; defaults to whether stdout is a TTY */
  enabled?: boolean;
}

// ============================================================================
// Spinner Class
// ============================================================================

/**
 * Progress spinner wrapper with consistent styling.
 *
 * @example
 * ```typescript
 * const spinner = new ProgressSpinner('Loading corpus...');
 * spinner.start();
 *
 * try {
 *   await loadCorpus(path);
 *   spinner.succeed('Corpus loaded');
 * } catch (err) {
 *   spinner.fail('Failed to load corpus');
 * }
 * ```
 */
export class ProgressSpinner {
  private spinner: Ora;
  private startTime: number = 0;

  constructor(text: string, options: SpinnerOptions = {}) {
    this.spinner = ora({
      text,
      color: options.color ?? 'cyan',
      isEnabled: options.enabled ?? process.stdout.isTTY === true,
      stream: process.stdout,
    });
  }

  start(text?: string): this {
    this.startTime = Date.now();
    if (text) {
      this.spinner.text = text;
    }
    this.spinner.start();
    return this;
  }

  update(text: string): this {
    this.spinner.text = text;
    return this;
  }

  /**
   * Stop with a success mark and the elapsed time.
   */
  succeed(text?: string): this {
    const duration = Date.now() - this.startTime;
    const durationStr = duration > 0 ? chalk.dim(` (${formatDuration(duration)})`) : '';
    this.spinner.succeed((text ?? this.spinner.text) + durationStr);
    return this;
  }

  fail(text?: string): this {
    this.spinner.fail(text);
    return this;
  }

  stop(): this {
    this.spinner.stop();
    return this;
  }

  isSpinning(): boolean {
    return this.spinner.isSpinning;
  }
}

// ============================================================================
// Pipeline Observer
// ============================================================================

/**
 * ProgressObserver that shows one spinner line per stage.
 *
 * While enriching, the line counts finished records and the source each
 * one's text came from.
 *
 * @example
 * ```typescript
 * const progress = new SpinnerProgress();
 * try {
 *   await runPipeline({ ...context, observer: progress }, options);
 * } catch (err) {
 *   progress.fail();
 *   throw err;
 * }
 * ```
 */
export class SpinnerProgress implements ProgressObserver {
  private readonly spinner: ProgressSpinner;
  private current: PipelineStage | undefined;

  constructor(options: SpinnerOptions = {}) {
    this.spinner = new ProgressSpinner('', options);
  }

  onStageStart(stage: PipelineStage, detail?: string): void {
    this.current = stage;
    this.spinner.start(stageLine(stage, detail));
  }

  onStageComplete(stage: PipelineStage, detail?: string): void {
    this.current = undefined;
    this.spinner.succeed(stageLine(stage, detail));
  }

  onRecordComplete(done: number, total: number, record: VideoRecord, source: ExtractionSource): void {
    this.spinner.update(`${STAGE_LABELS.enrich} ${done}/${total} ${chalk.dim(`${record.videoId} (${source})`)}`);
  }

  /**
   * Mark the running stage as failed, if any.
   */
  fail(message?: string): void {
    if (this.current) {
      this.spinner.fail(stageLine(this.current, message ?? 'failed'));
      this.current = undefined;
    }
  }
}

function stageLine(stage: PipelineStage, detail?: string): string {
  return detail ? `${STAGE_LABELS[stage]}: ${detail}` : STAGE_LABELS[stage];
}

// ============================================================================
// Utility Functions
// ============================================================================

/**
 * Format a duration in milliseconds to human-readable string.
 *
 * @example
 * formatDuration(950)    // '950ms'
 * formatDuration(95000)  // '1m 35s'
 */
export function formatDuration(ms: number): string {
  if (ms < 1000) {
    return `${ms}ms`;
  }

  const seconds = ms / 1000;
  if (seconds < 60) {
    return `${seconds.toFixed(1)}s`;
  }

  const minutes = Math.floor(seconds / 60);
  const remainingSeconds = Math.round(seconds % 60);
  return `${minutes}m ${remainingSeconds}s`;
}
