/**
 * CLI Formatters
 *
 * @module cli/formatters
 */

export { ProgressSpinner, SpinnerProgress, formatDuration, type SpinnerOptions } from './progress.js';

export { formatRunSummary, SUMMARY_TOP_N } from './run-summary.js';
