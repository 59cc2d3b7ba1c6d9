/**
 * Leaderboard Repository - Kysely Implementation
 *
 * Rank recompute is a single UPDATE over a window function, so every rank of a
 * period is derived from one snapshot of its scores.
 */

import { sql } from 'kysely';
import { ok, err, type Result } from 'neverthrow';

import { createDatabaseError, type DatabaseError } from '../../core/errors.js';
import { isLeaderboardPeriod, type LeaderboardEntry, type LeaderboardPeriod } from '../../core/types.js';

import type { LeaderboardRepository } from '../../core/ports.js';
import type { GameDbClient } from '../../../../infra/database/client.js';
import type { UserId } from '../../../users/index.js';
import type { Logger } from 'pino';

export interface LeaderboardRepoOptions {
  db: GameDbClient;
  logger: Logger;
}

class KyselyLeaderboardRepo implements LeaderboardRepository {
  private readonly db: GameDbClient;
  private readonly log: Logger;

  constructor(options: LeaderboardRepoOptions) {
    this.db = options.db;
    this.log = options.logger.child({ module: 'leaderboard-repo' });
  }

  async upsertScore(
    userId: UserId,
    period: LeaderboardPeriod,
    score: number
  ): Promise<Result<void, DatabaseError>> {
    try {
      await this.db
        .insertInto('leaderboard_entries')
        .values({ user_id: userId, period, score })
        .onConflict((oc) =>
          oc.columns(['user_id', 'period']).doUpdateSet({ score, updated_at: new Date() })
        )
        .execute();
      return ok(undefined);
    } catch (error) {
      this.log.error({ err: error, userId, period }, 'Failed to upsert leaderboard score');
      return err(createDatabaseError('Failed to upsert leaderboard score', error));
    }
  }

  async recomputeRanks(period: LeaderboardPeriod): Promise<Result<void, DatabaseError>> {
    try {
      await sql`
        UPDATE leaderboard_entries AS le
        SET rank = ranked.position
        FROM (
          SELECT id, ROW_NUMBER() OVER (ORDER BY score DESC, id ASC) AS position
          FROM leaderboard_entries
          WHERE period = ${period}
        ) AS ranked
        WHERE le.id = ranked.id
      `.execute(this.db);
      return ok(undefined);
    } catch (error) {
      this.log.error({ err: error, period }, 'Failed to recompute leaderboard ranks');
      return err(createDatabaseError('Failed to recompute leaderboard ranks', error));
    }
  }

  async listEntries(period: LeaderboardPeriod): Promise<Result<LeaderboardEntry[], DatabaseError>> {
    try {
      const rows = await this.db
        .selectFrom('leaderboard_entries')
        .select(['user_id', 'period', 'score', 'rank'])
        .where('period', '=', period)
        .orderBy('id', 'asc')
        .execute();

      const entries: LeaderboardEntry[] = [];
      for (const row of rows) {
        if (!isLeaderboardPeriod(row.period)) {
          continue;
        }
        entries.push({
          userId: Number(row.user_id),
          period: row.period,
          score: row.score,
          rank: row.rank,
        });
      }
      return ok(entries);
    } catch (error) {
      this.log.error({ err: error, period }, 'Failed to list leaderboard entries');
      return err(createDatabaseError('Failed to list leaderboard entries', error));
    }
  }

  async resetScores(period: LeaderboardPeriod): Promise<Result<void, DatabaseError>> {
    try {
      const result = await this.db
        .updateTable('leaderboard_entries')
        .set({ score: 0, updated_at: new Date() })
        .where('period', '=', period)
        .executeTakeFirst();
      this.log.info({ period, rows: Number(result.numUpdatedRows) }, 'Leaderboard scores reset');
      return ok(undefined);
    } catch (error) {
      this.log.error({ err: error, period }, 'Failed to reset leaderboard scores');
      return err(createDatabaseError('Failed to reset leaderboard scores', error));
    }
  }
}

export const makeLeaderboardRepo = (options: LeaderboardRepoOptions): LeaderboardRepository => {
  return new KyselyLeaderboardRepo(options);
};
