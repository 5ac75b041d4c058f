/**
 * Run Summary Formatters
 *
 * Terminal summary printed after a pipeline run: counts, extraction
 * sources, files written and the top records by virality score.
 *
 * @module cli/formatters/run-summary
 */

import chalk from 'chalk';
import type { PipelineResult } from '../../pipeline/types.js';
import { rankRecords } from '../../ranking/virality.js';
import { buildVideoUrl } from '../../workers/youtube/frames.js';
import { EXTRACTION_SOURCES } from '../../stages/extract.js';
import { formatDuration } from './progress.js';

/** Records listed in the summary */
export const SUMMARY_TOP_N = 5;

/**
 * Format a complete run summary.
 *
 * @example
 * ```
 * === Run Complete ===
 * Duration: 1m 12s
 *
 * Results:
 *   Candidates:  50
 *   Detailed:    50
 *   Retained:    18
 *   Text from:   transcript 12, captionTrack 2, frames 3, none 1
 *
 * Top by virality:
 *   1. 22,750  Video title  https://www.youtube.com/watch?v=...
 *
 * Written:
 *   trendwatch_results.csv
 * ```
 */
export function formatRunSummary(result: PipelineResult, topN: number = SUMMARY_TOP_N): string {
  const lines: string[] = [];
  const { stats } = result;

  lines.push(chalk.bold('=== Run Complete ==='));
  lines.push(`Duration: ${formatDuration(stats.durationMs)}`);
  lines.push('');

  lines.push('Results:');
  lines.push(`  Candidates:  ${stats.candidates}`);
  lines.push(`  Detailed:    ${stats.detailed}`);
  lines.push(`  Retained:    ${stats.retained}`);
  const sources = EXTRACTION_SOURCES.map((source) => `${source} ${stats.sources[source]}`).join(', ');
  lines.push(`  Text from:   ${sources}`);

  const top = rankRecords(result.records).slice(0, topN);
  if (top.length > 0) {
    lines.push('');
    lines.push('Top by virality:');
    top.forEach((record, i) => {
      const score = Math.round(record.viralityScore).toLocaleString('en-US');
      lines.push(`  ${i + 1}. ${chalk.cyan(score)}  ${record.title}  ${chalk.dim(buildVideoUrl(record.videoId))}`);
    });
  } else {
    lines.push('');
    lines.push(chalk.yellow('No records passed the filter.'));
  }

  if (result.written.length > 0) {
    lines.push('');
    lines.push('Written:');
    for (const file of result.written) {
      lines.push(`  ${file}`);
    }
  }

  return lines.join('\n');
}
