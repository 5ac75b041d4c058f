/**
 * Run Command
 *
 * One trend-watch pass: search, enrich, rank and write the table, with an
 * optional lookup server over the results afterwards.
 *
 * Ctrl-C stops scheduling new records; in-flight ones finish, nothing is
 * written and the process exits with 130. A second Ctrl-C exits at once.
 *
 * @module cli/commands/run
 */

import type { Command } from 'commander';
import { createBaseCommand, EXIT_CODES, type BaseCommand } from '../base-command.js';
import { UsageError, parseIntegerOption } from '../options.js';
import { SpinnerProgress } from '../formatters/progress.js';
import { formatRunSummary } from '../formatters/run-summary.js';
import { serveRecords } from './serve.js';
import { ConfigError, MissingCredentialsError, loadConfig, type AppConfig } from '../../config/index.js';
import { createPipelineContext } from '../../pipeline/setup.js';
import {
  runPipeline,
  DEFAULT_CONCURRENCY,
  DEFAULT_DAYS_BACK,
  DEFAULT_MAX_RESULTS,
  DEFAULT_QUERY,
} from '../../pipeline/orchestrator.js';
import { PipelineCancelledError, type PipelineContext, type PipelineOptions } from '../../pipeline/types.js';
import { FRAME_SAMPLES } from '../../workers/youtube/frames.js';

// ============================================================================
// Options
// ============================================================================

export const DEFAULT_OUTPUT = 'trendwatch_results.csv';

/**
 * Raw option values as commander hands them over.
 */
export interface RunCommandOptions {
  query: string;
  days: string;
  max: string;
  out: string;
  columnar?: string;
  concurrency: string;
  frames: string;
  serve?: boolean;
}

export interface RunSettings {
  pipeline: PipelineOptions;
  frames: number;
  serve: boolean;
}

/**
 * Validate raw options into pipeline settings.
 *
 * @throws UsageError for any invalid number
 */
export function resolveRunSettings(options: RunCommandOptions): RunSettings {
  return {
    pipeline: {
      query: options.query,
      daysBack: parseIntegerOption('days', options.days, 0),
      maxResults: parseIntegerOption('max', options.max, 1),
      concurrency: parseIntegerOption('concurrency', options.concurrency, 1),
      output: { csvPath: options.out, columnarPath: options.columnar },
    },
    frames: parseIntegerOption('frames', options.frames, 0),
    serve: options.serve === true,
  };
}

// ============================================================================
// Handler
// ============================================================================

function exitForError(base: BaseCommand, error: unknown): never {
  if (error instanceof UsageError) {
    base.error(error.message, EXIT_CODES.USAGE_ERROR);
  }
  if (error instanceof PipelineCancelledError) {
    base.error(error.message, EXIT_CODES.CANCELLED);
  }
  if (error instanceof MissingCredentialsError || error instanceof ConfigError) {
    base.error(error.message, EXIT_CODES.ERROR);
  }
  base.error(error instanceof Error ? error.message : String(error), error);
}

interface PreparedRun {
  settings: RunSettings;
  config: AppConfig;
  context: PipelineContext;
}

/**
 * Validate options, load config and build collaborators, or exit.
 */
function prepareRun(base: BaseCommand, options: RunCommandOptions): PreparedRun {
  try {
    const settings = resolveRunSettings(options);
    const config = loadConfig();
    const context = createPipelineContext(config, { logger: base.toLogger(), frames: settings.frames });
    return { settings, config, context };
  } catch (error) {
    exitForError(base, error);
  }
}

async function runHandler(options: RunCommandOptions, cmd: Command): Promise<void> {
  const base = createBaseCommand(cmd);
  const { settings, config, context } = prepareRun(base, options);

  const controller = new AbortController();
  const onSigint = (): void => {
    if (controller.signal.aborted) {
      base.exitWith(EXIT_CODES.CANCELLED);
    }
    base.warn('Cancelling: waiting for records in progress to finish (Ctrl-C again to quit now)');
    controller.abort();
  };
  process.on('SIGINT', onSigint);

  const progress = new SpinnerProgress({ enabled: !base.isQuiet() && process.stdout.isTTY === true });

  try {
    const result = await runPipeline(
      { ...context, observer: progress },
      { ...settings.pipeline, signal: controller.signal }
    );

    base.blank();
    base.info(formatRunSummary(result));

    if (settings.serve) {
      base.blank();
      await serveRecords(base, result.records, config.server.port, config.server.apiToken);
    }
  } catch (error) {
    progress.fail(error instanceof Error ? error.message : undefined);
    exitForError(base, error);
  } finally {
    process.removeListener('SIGINT', onSigint);
  }
}

export function registerRunCommand(program: Command): void {
  program
    .command('run')
    .description('Find trending shorts, extract and analyze their text, and write a ranked table')
    .option('--query <q>', 'Search query', DEFAULT_QUERY)
    .option('--days <n>', 'Look back this many days', String(DEFAULT_DAYS_BACK))
    .option('--max <n>', 'Maximum candidates to consider', String(DEFAULT_MAX_RESULTS))
    .option('-o, --out <path>', 'CSV output path', DEFAULT_OUTPUT)
    .option('--columnar <path>', 'Also write a columnar JSON table')
    .option('--concurrency <n>', 'Records enriched at a time', String(DEFAULT_CONCURRENCY))
    .option('--frames <n>', 'Frames sampled when no captions exist (0 disables)', String(FRAME_SAMPLES))
    .option('--serve', 'Start the lookup server over the results when done')
    .action(runHandler);
}
