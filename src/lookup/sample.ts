/**
 * Placeholder corpus written when the lookup server starts without a table.
 *
 * @module lookup/sample
 */

import type { VideoRecord } from '../schemas/video-record.js';
import { likeRatio } from '../stages/details.js';
import { viralityScore } from '../ranking/virality.js';

type SampleFields = Omit<VideoRecord, 'viewsPerDay' | 'likeRatio' | 'viralityScore'>;

function sample(fields: SampleFields): VideoRecord {
  const viewsPerDay = fields.views / fields.elapsedDays;
  return Object.freeze({
    ...fields,
    viewsPerDay,
    likeRatio: likeRatio(fields.likes),
    viralityScore: viralityScore({ views: fields.views, likes: fields.likes, viewsPerDay }),
  });
}

export const SAMPLE_RECORDS: readonly VideoRecord[] = Object.freeze([
  sample({
    videoId: 'sample00001',
    title: 'Sample short: one-pan pasta in a minute',
    description: 'Placeholder row. Run the pipeline to replace this corpus with real results.',
    channel: 'Sample Channel',
    publishedAt: '2026-01-01T00:00:00.000Z',
    durationSec: 58,
    views: 120_000,
    likes: 11_000,
    comments: 300,
    elapsedDays: 10,
    extractedText: 'boil water, add pasta, stir in sauce',
    topic: 'cooking',
    hooks: 'one pan; under a minute',
  }),
  sample({
    videoId: 'sample00002',
    title: 'Sample short: desk stretch routine',
    description: 'Placeholder row. Three stretches you can do without leaving your chair.',
    channel: 'Sample Channel',
    publishedAt: '2026-01-02T00:00:00.000Z',
    durationSec: 42,
    views: 200_000,
    likes: 15_000,
    comments: 450,
    elapsedDays: 8,
    extractedText: 'roll your shoulders, reach up, twist slowly',
    topic: 'fitness',
    hooks: 'no equipment; at your desk',
  }),
  sample({
    videoId: 'sample00003',
    title: 'Sample short: paper plane that flies far',
    description: 'Placeholder row. A folding trick for longer glides.',
    channel: 'Sample Channel',
    publishedAt: '2026-01-03T00:00:00.000Z',
    durationSec: 35,
    views: 150_000,
    likes: 9_000,
    comments: 120,
    elapsedDays: 6,
    extractedText: 'fold in half, crease the wings, tilt the nose',
    topic: 'crafts',
    hooks: 'longer glides; one sheet of paper',
  }),
]);
