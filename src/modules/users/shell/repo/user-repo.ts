/**
 * User Repository - Kysely Implementation
 *
 * Progress changes are single UPDATE statements so concurrent grants to the
 * same user (a referral bonus while the referrer plays) never lose a write.
 */

import { sql, type Selectable } from 'kysely';
import { ok, err, type Result } from 'neverthrow';

import { createDatabaseError, type DatabaseError } from '../../core/errors.js';

import type { UserRepository } from '../../core/ports.js';
import type {
  EnsureUserResult,
  ProgressDelta,
  UserId,
  UserIdentity,
  UserProfile,
} from '../../core/types.js';
import type { GameDbClient, Users } from '../../../../infra/database/client.js';
import type { Logger } from 'pino';

// ─────────────────────────────────────────────────────────────────────────────
// Types
// ─────────────────────────────────────────────────────────────────────────────

export interface UserRepoOptions {
  db: GameDbClient;
  logger: Logger;
}

type UserRow = Selectable<Users>;

// ─────────────────────────────────────────────────────────────────────────────
// Implementation
// ─────────────────────────────────────────────────────────────────────────────

class KyselyUserRepo implements UserRepository {
  private readonly db: GameDbClient;
  private readonly log: Logger;

  constructor(options: UserRepoOptions) {
    this.db = options.db;
    this.log = options.logger.child({ module: 'user-repo' });
  }

  async findById(id: UserId): Promise<Result<UserProfile | null, DatabaseError>> {
    try {
      const row = await this.db
        .selectFrom('users')
        .selectAll()
        .where('id', '=', String(id))
        .executeTakeFirst();

      return ok(row !== undefined ? this.mapRow(row) : null);
    } catch (error) {
      this.log.error({ err: error, userId: id }, 'Failed to find user');
      return err(createDatabaseError('Failed to find user', error));
    }
  }

  async ensureUser(
    id: UserId,
    identity?: UserIdentity
  ): Promise<Result<EnsureUserResult, DatabaseError>> {
    try {
      const inserted = await this.db
        .insertInto('users')
        .values({
          id,
          username: identity?.username ?? null,
          first_name: identity?.firstName ?? null,
          last_name: identity?.lastName ?? null,
        })
        .onConflict((oc) => oc.column('id').doNothing())
        .returningAll()
        .executeTakeFirst();

      if (inserted !== undefined) {
        return ok({ user: this.mapRow(inserted), created: true });
      }

      const existing =
        identity !== undefined
          ? await this.db
              .updateTable('users')
              .set({
                username: identity.username,
                first_name: identity.firstName,
                last_name: identity.lastName,
              })
              .where('id', '=', String(id))
              .returningAll()
              .executeTakeFirstOrThrow()
          : await this.db
              .selectFrom('users')
              .selectAll()
              .where('id', '=', String(id))
              .executeTakeFirstOrThrow();

      return ok({ user: this.mapRow(existing), created: false });
    } catch (error) {
      this.log.error({ err: error, userId: id }, 'Failed to ensure user');
      return err(createDatabaseError('Failed to ensure user', error));
    }
  }

  async applyDelta(
    id: UserId,
    delta: ProgressDelta
  ): Promise<Result<UserProfile | null, DatabaseError>> {
    const coins = delta.coins ?? 0;

    try {
      const row = await this.db
        .updateTable('users')
        .set({
          coins: sql<number>`coins + ${coins}`,
          quizzes_passed: sql<number>`quizzes_passed + ${delta.quizzesPassed ?? 0}`,
          scenario_score: sql<number>`scenario_score + ${delta.scenarioScore ?? 0}`,
          max_unlocked_level:
            delta.unlockLevel !== undefined
              ? sql<number>`GREATEST(max_unlocked_level, ${delta.unlockLevel})`
              : sql<number>`max_unlocked_level`,
          scenario_badges:
            delta.badge !== undefined
              ? sql<string[]>`ARRAY(SELECT DISTINCT b FROM unnest(array_append(scenario_badges, ${delta.badge}::text)) AS b ORDER BY b)`
              : sql<string[]>`scenario_badges`,
          updated_at: new Date(),
        })
        .where('id', '=', String(id))
        .where(sql<boolean>`coins + ${coins} >= 0`)
        .returningAll()
        .executeTakeFirst();

      return ok(row !== undefined ? this.mapRow(row) : null);
    } catch (error) {
      this.log.error({ err: error, userId: id, delta }, 'Failed to apply progress delta');
      return err(createDatabaseError('Failed to apply progress delta', error));
    }
  }

  async setSubscribed(id: UserId, subscribed: boolean): Promise<Result<void, DatabaseError>> {
    try {
      await this.db
        .updateTable('users')
        .set({ subscribed, updated_at: new Date() })
        .where('id', '=', String(id))
        .execute();
      return ok(undefined);
    } catch (error) {
      this.log.error({ err: error, userId: id }, 'Failed to update subscription');
      return err(createDatabaseError('Failed to update subscription', error));
    }
  }

  async listIds(): Promise<Result<UserId[], DatabaseError>> {
    try {
      const rows = await this.db
        .selectFrom('users')
        .select('id')
        .orderBy('created_at', 'asc')
        .orderBy('id', 'asc')
        .execute();
      return ok(rows.map((row) => Number(row.id)));
    } catch (error) {
      this.log.error({ err: error }, 'Failed to list users');
      return err(createDatabaseError('Failed to list users', error));
    }
  }

  async listSubscribers(): Promise<Result<UserProfile[], DatabaseError>> {
    try {
      const rows = await this.db
        .selectFrom('users')
        .selectAll()
        .where('subscribed', '=', true)
        .orderBy('id', 'asc')
        .execute();
      return ok(rows.map((row) => this.mapRow(row)));
    } catch (error) {
      this.log.error({ err: error }, 'Failed to list subscribers');
      return err(createDatabaseError('Failed to list subscribers', error));
    }
  }

  async findMany(ids: readonly UserId[]): Promise<Result<UserProfile[], DatabaseError>> {
    if (ids.length === 0) {
      return ok([]);
    }

    try {
      const rows = await this.db
        .selectFrom('users')
        .selectAll()
        .where(
          'id',
          'in',
          ids.map((id) => String(id))
        )
        .execute();
      return ok(rows.map((row) => this.mapRow(row)));
    } catch (error) {
      this.log.error({ err: error, count: ids.length }, 'Failed to load users');
      return err(createDatabaseError('Failed to load users', error));
    }
  }

  // ─────────────────────────────────────────────────────────────────────────────
  // Private Helpers
  // ─────────────────────────────────────────────────────────────────────────────

  private mapRow(row: UserRow): UserProfile {
    return {
      id: Number(row.id),
      username: row.username,
      firstName: row.first_name,
      lastName: row.last_name,
      coins: row.coins,
      quizzesPassed: row.quizzes_passed,
      maxUnlockedLevel: row.max_unlocked_level,
      scenarioScore: row.scenario_score,
      scenarioBadges: row.scenario_badges,
      subscribed: row.subscribed,
      createdAt: row.created_at,
    };
  }
}

// ─────────────────────────────────────────────────────────────────────────────
// Factory Function
// ─────────────────────────────────────────────────────────────────────────────

export const makeUserRepo = (options: UserRepoOptions): UserRepository => {
  return new KyselyUserRepo(options);
};
