/**
 * Ranking Module Exports
 *
 * @module ranking
 */

export { VIRALITY_WEIGHTS, viralityScore, rankRecords, type ScoreInput } from './virality.js';
