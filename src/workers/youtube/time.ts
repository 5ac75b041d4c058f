/**
 * Duration and publish-time helpers for YouTube metadata.
 *
 * @module workers/youtube/time
 */

/** Milliseconds in one day */
export const MS_PER_DAY = 24 * 60 * 60 * 1000;

const DURATION_PATTERN = /^PT(?:(\d+)H)?(?:(\d+)M)?(?:(\d+)S)?/;

/**
 * Parse ISO8601 duration to seconds.
 *
 * Absent components count as zero; anything that does not start with
 * `PT` yields 0.
 *
 * @example
 * parseDuration('PT15M33S') // 933
 * parseDuration('PT1H30M') // 5400
 */
export function parseDuration(duration: string | undefined | null): number {
  if (!duration) {
    return 0;
  }

  const match = DURATION_PATTERN.exec(duration);
  if (!match) {
    return 0;
  }

  const hours = parseInt(match[1] ?? '0', 10);
  const minutes = parseInt(match[2] ?? '0', 10);
  const seconds = parseInt(match[3] ?? '0', 10);

  return hours * 3600 + minutes * 60 + seconds;
}

/**
 * Whole days elapsed since publication, never less than 1.
 *
 * An unparseable timestamp counts as published today.
 */
export function elapsedDays(publishedAt: string, now: Date = new Date()): number {
  const published = Date.parse(publishedAt);
  if (Number.isNaN(published)) {
    return 1;
  }
  const days = Math.floor((now.getTime() - published) / MS_PER_DAY);
  return Math.max(1, days);
}

/**
 * Lower publish bound for a search window, as an RFC 3339 UTC timestamp.
 *
 * @example
 * publishedAfterBound(10, new Date('2026-01-11T00:00:00Z')) // '2026-01-01T00:00:00.000Z'
 */
export function publishedAfterBound(daysBack: number, now: Date = new Date()): string {
  return new Date(now.getTime() - daysBack * MS_PER_DAY).toISOString();
}

/**
 * Normalize a provider timestamp into an ISO string with an explicit zone.
 *
 * YouTube returns `2026-01-01T12:00:00Z`; strings without a zone are
 * interpreted as UTC.
 */
export function normalizePublishedAt(publishedAt: string): string {
  const hasZone = /(Z|[+-]\d{2}:?\d{2})$/i.test(publishedAt);
  const parsed = Date.parse(hasZone ? publishedAt : `${publishedAt}Z`);
  if (Number.isNaN(parsed)) {
    return publishedAt;
  }
  return new Date(parsed).toISOString();
}
