/**
 * Analytics Repository - Kysely Implementation
 */

import { ok, err, type Result } from 'neverthrow';

import { createDatabaseError, type DatabaseError } from '../../core/errors.js';

import type { AnalyticsRepository, TimeWindow } from '../../core/ports.js';
import type { AnalyticsEventType, DailyMetrics, UserEvent } from '../../core/types.js';
import type { GameDbClient } from '../../../../infra/database/client.js';
import type { Logger } from 'pino';

export interface AnalyticsRepoOptions {
  db: GameDbClient;
  logger: Logger;
}

class KyselyAnalyticsRepo implements AnalyticsRepository {
  private readonly db: GameDbClient;
  private readonly log: Logger;

  constructor(options: AnalyticsRepoOptions) {
    this.db = options.db;
    this.log = options.logger.child({ module: 'analytics-repo' });
  }

  async recordEvent(event: UserEvent): Promise<Result<void, DatabaseError>> {
    try {
      await this.db
        .insertInto('user_events')
        .values({
          user_id: event.userId,
          event_type: event.type,
          event_data: JSON.stringify(event.data),
        })
        .execute();
      return ok(undefined);
    } catch (error) {
      this.log.error({ err: error, userId: event.userId, eventType: event.type }, 'Failed to record event');
      return err(createDatabaseError('Failed to record event', error));
    }
  }

  async findDaily(date: string): Promise<Result<DailyMetrics | null, DatabaseError>> {
    try {
      const row = await this.db
        .selectFrom('analytics_daily')
        .select(['daily_active_users', 'new_users', 'quiz_completions', 'scenario_completions'])
        .where('date', '=', date)
        .executeTakeFirst();

      if (row === undefined) {
        return ok(null);
      }

      return ok({
        date,
        dailyActiveUsers: row.daily_active_users,
        newUsers: row.new_users,
        quizCompletions: row.quiz_completions,
        scenarioCompletions: row.scenario_completions,
      });
    } catch (error) {
      this.log.error({ err: error, date }, 'Failed to load daily metrics');
      return err(createDatabaseError('Failed to load daily metrics', error));
    }
  }

  async saveDaily(metrics: DailyMetrics): Promise<Result<boolean, DatabaseError>> {
    try {
      const row = await this.db
        .insertInto('analytics_daily')
        .values({
          date: metrics.date,
          daily_active_users: metrics.dailyActiveUsers,
          new_users: metrics.newUsers,
          quiz_completions: metrics.quizCompletions,
          scenario_completions: metrics.scenarioCompletions,
        })
        .onConflict((oc) => oc.column('date').doNothing())
        .returning('date')
        .executeTakeFirst();
      return ok(row !== undefined);
    } catch (error) {
      this.log.error({ err: error, date: metrics.date }, 'Failed to save daily metrics');
      return err(createDatabaseError('Failed to save daily metrics', error));
    }
  }

  async countActiveUsers(window: TimeWindow): Promise<Result<number, DatabaseError>> {
    try {
      const row = await this.db
        .selectFrom('user_events')
        .select((eb) => eb.fn.count<string>('user_id').distinct().as('count'))
        .where('created_at', '>=', window.from)
        .where('created_at', '<', window.to)
        .executeTakeFirstOrThrow();
      return ok(Number(row.count));
    } catch (error) {
      this.log.error({ err: error }, 'Failed to count active users');
      return err(createDatabaseError('Failed to count active users', error));
    }
  }

  async countNewUsers(window: TimeWindow): Promise<Result<number, DatabaseError>> {
    try {
      const row = await this.db
        .selectFrom('users')
        .select((eb) => eb.fn.countAll<string>().as('count'))
        .where('created_at', '>=', window.from)
        .where('created_at', '<', window.to)
        .executeTakeFirstOrThrow();
      return ok(Number(row.count));
    } catch (error) {
      this.log.error({ err: error }, 'Failed to count new users');
      return err(createDatabaseError('Failed to count new users', error));
    }
  }

  async countEvents(
    type: AnalyticsEventType,
    window: TimeWindow
  ): Promise<Result<number, DatabaseError>> {
    try {
      const row = await this.db
        .selectFrom('user_events')
        .select((eb) => eb.fn.countAll<string>().as('count'))
        .where('event_type', '=', type)
        .where('created_at', '>=', window.from)
        .where('created_at', '<', window.to)
        .executeTakeFirstOrThrow();
      return ok(Number(row.count));
    } catch (error) {
      this.log.error({ err: error, eventType: type }, 'Failed to count events');
      return err(createDatabaseError('Failed to count events', error));
    }
  }
}

export const makeAnalyticsRepo = (options: AnalyticsRepoOptions): AnalyticsRepository => {
  return new KyselyAnalyticsRepo(options);
};
