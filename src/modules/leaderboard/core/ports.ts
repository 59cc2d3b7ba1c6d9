/**
 * Leaderboard Module - Ports
 */

import type { DatabaseError } from './errors.js';
import type { LeaderboardEntry, LeaderboardPeriod } from './types.js';
import type { KeyedMutex } from '../../../common/utils/keyed-mutex.js';
import type { UserId } from '../../users/index.js';
import type { Result } from 'neverthrow';

export interface LeaderboardRepository {
  /** Inserts or overwrites the score of (userId, period). Rank is left for recompute. */
  upsertScore(
    userId: UserId,
    period: LeaderboardPeriod,
    score: number
  ): Promise<Result<void, DatabaseError>>;

  /**
   * Rewrites every rank of the period from one consistent read:
   * descending score, ties by insertion order.
   */
  recomputeRanks(period: LeaderboardPeriod): Promise<Result<void, DatabaseError>>;

  /** Entries of a period in insertion order */
  listEntries(period: LeaderboardPeriod): Promise<Result<LeaderboardEntry[], DatabaseError>>;

  /** Sets every score of the period to zero */
  resetScores(period: LeaderboardPeriod): Promise<Result<void, DatabaseError>>;
}

/**
 * Serializes writes per period across live updates and scheduled jobs.
 */
export type PeriodLock = KeyedMutex<LeaderboardPeriod>;
