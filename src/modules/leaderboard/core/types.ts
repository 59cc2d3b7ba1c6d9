/**
 * Leaderboard Module - Core Types
 */

import type { UserId } from '../../users/index.js';

// ─────────────────────────────────────────────────────────────────────────────
// Periods
// ─────────────────────────────────────────────────────────────────────────────

export const LEADERBOARD_PERIODS = ['all_time', 'weekly', 'monthly'] as const;

/**
 * Scoring window. Every period uses the same formula; the weekly scores are
 * reset by a scheduled job.
 */
export type LeaderboardPeriod = (typeof LEADERBOARD_PERIODS)[number];

export const isLeaderboardPeriod = (value: string): value is LeaderboardPeriod =>
  LEADERBOARD_PERIODS.some((period) => period === value);

export const DEFAULT_LEADERBOARD_LIMIT = 10;
export const MAX_LEADERBOARD_LIMIT = 100;

// ─────────────────────────────────────────────────────────────────────────────
// Entries
// ─────────────────────────────────────────────────────────────────────────────

export interface ScoreInputs {
  coins: number;
  quizzesPassed: number;
  scenarioScore: number;
}

/**
 * Stored standing of one user in one period.
 */
export interface LeaderboardEntry {
  userId: UserId;
  period: LeaderboardPeriod;
  score: number;
  /** Null until the first recompute after insertion */
  rank: number | null;
}

export interface RankedEntry {
  userId: UserId;
  score: number;
  rank: number;
}

export interface LeaderboardRow extends RankedEntry {
  displayName: string;
}

export interface RequesterStanding {
  rank: number;
  score: number;
  /** (total - rank + 1) / total × 100 */
  percentile: number;
}

export interface LeaderboardStandings {
  period: LeaderboardPeriod;
  entries: LeaderboardRow[];
  totalPlayers: number;
  /** Present when the requesting user has an entry, even outside the top slice */
  requester: RequesterStanding | null;
}
