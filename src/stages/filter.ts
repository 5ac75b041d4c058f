/**
 * Popularity Filter Stage
 *
 * @module stages/filter
 */

import type { DetailRecord } from '../schemas/video-record.js';

/** Minimum lifetime views */
export const MIN_VIEWS = 100_000;

/** Minimum like ratio */
export const LIKE_RATIO_THRESHOLD = 0.9;

export interface FilterThresholds {
  minViews: number;
  minLikeRatio: number;
}

export const DEFAULT_THRESHOLDS: Readonly<FilterThresholds> = Object.freeze({
  minViews: MIN_VIEWS,
  minLikeRatio: LIKE_RATIO_THRESHOLD,
});

/**
 * Why a record was dropped. A record failing both checks counts as
 * `lowViews`.
 */
export type FilterReason = 'lowViews' | 'lowLikeRatio';

export interface FilterStats {
  input: number;
  retained: number;
  dropped: Record<FilterReason, number>;
}

function resolveThresholds(thresholds: Partial<FilterThresholds> = {}): FilterThresholds {
  return {
    minViews: thresholds.minViews ?? DEFAULT_THRESHOLDS.minViews,
    minLikeRatio: thresholds.minLikeRatio ?? DEFAULT_THRESHOLDS.minLikeRatio,
  };
}

function rejectionReason(
  record: Pick<DetailRecord, 'views' | 'likeRatio'>,
  thresholds: FilterThresholds
): FilterReason | null {
  if (record.views < thresholds.minViews) {
    return 'lowViews';
  }
  if (record.likeRatio < thresholds.minLikeRatio) {
    return 'lowLikeRatio';
  }
  return null;
}

/**
 * Keep records with `views ≥ minViews` and `likeRatio ≥ minLikeRatio`,
 * in input order.
 */
export function filterPopular<T extends Pick<DetailRecord, 'views' | 'likeRatio'>>(
  records: readonly T[],
  thresholds?: Partial<FilterThresholds>
): T[] {
  return filterPopularWithStats(records, thresholds).records;
}

/**
 * Same as {@link filterPopular}, plus counts of dropped records by reason.
 */
export function filterPopularWithStats<T extends Pick<DetailRecord, 'views' | 'likeRatio'>>(
  records: readonly T[],
  thresholds?: Partial<FilterThresholds>
): { records: T[]; stats: FilterStats } {
  const resolved = resolveThresholds(thresholds);
  const kept: T[] = [];
  const dropped: Record<FilterReason, number> = { lowViews: 0, lowLikeRatio: 0 };

  for (const record of records) {
    const reason = rejectionReason(record, resolved);
    if (reason) {
      dropped[reason]++;
    } else {
      kept.push(record);
    }
  }

  return {
    records: kept,
    stats: { input: records.length, retained: kept.length, dropped },
  };
}
