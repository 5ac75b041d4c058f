/**
 * Virality Scoring
 *
 * A single unbounded score mixing reach, approval and velocity. Not
 * normalized; only meaningful for ordering records of the same run.
 *
 * @module ranking/virality
 */

import type { VideoRecord } from '../schemas/video-record.js';

// ============================================================================
// Constants
// ============================================================================

/**
 * Weights applied to each signal.
 *
 * score = views / 1000 + likes + viewsPerDay × 0.1
 */
export const VIRALITY_WEIGHTS = {
  viewsDivisor: 1000,
  likes: 1,
  viewsPerDay: 0.1,
} as const;

// ============================================================================
// Types
// ============================================================================

export type ScoreInput = Pick<VideoRecord, 'views' | 'likes' | 'viewsPerDay'>;

// ============================================================================
// Scoring
// ============================================================================

/**
 * Compute the virality score for one record.
 *
 * Non-decreasing in each of views, likes and viewsPerDay.
 *
 * @example
 * viralityScore({ views: 200_000, likes: 15_000, viewsPerDay: 20_000 }) // 17200
 */
export function viralityScore(input: ScoreInput): number {
  return (
    input.views / VIRALITY_WEIGHTS.viewsDivisor +
    input.likes * VIRALITY_WEIGHTS.likes +
    input.viewsPerDay * VIRALITY_WEIGHTS.viewsPerDay
  );
}

/**
 * Return a copy sorted by score, highest first. Ties keep input order.
 */
export function rankRecords<T extends Pick<VideoRecord, 'viralityScore'>>(records: readonly T[]): T[] {
  return [...records].sort((a, b) => b.viralityScore - a.viralityScore);
}
