/**
 * Leaderboard scoring and ranking.
 */

import type { RankedEntry, ScoreInputs } from './types.js';
import type { UserId } from '../../users/index.js';

export const COINS_PER_POINT = 10;
export const POINTS_PER_PASSED_QUIZ = 10;

/**
 * score = floor(coins / 10) + quizzesPassed × 10 + scenarioScore
 */
export const computeScore = (inputs: ScoreInputs): number =>
  Math.floor(inputs.coins / COINS_PER_POINT) +
  inputs.quizzesPassed * POINTS_PER_PASSED_QUIZ +
  inputs.scenarioScore;

/**
 * Assigns ranks 1..N by descending score. Entries must be in insertion order;
 * ties keep that order.
 */
export const rankEntries = (
  entries: readonly { userId: UserId; score: number }[]
): RankedEntry[] =>
  entries
    .map((entry, position) => ({ entry, position }))
    .sort((a, b) => b.entry.score - a.entry.score || a.position - b.position)
    .map(({ entry }, index) => ({ userId: entry.userId, score: entry.score, rank: index + 1 }));

export const computePercentile = (rank: number, total: number): number =>
  total > 0 ? ((total - rank + 1) / total) * 100 : 0;
