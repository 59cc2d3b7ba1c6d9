/**
 * Referral Repository - Kysely Implementation
 */

import { ok, err, type Result } from 'neverthrow';

import {
  createCodeCollisionError,
  createDatabaseError,
  type CodeCollisionError,
  type DatabaseError,
} from '../../core/errors.js';

import type { ReferralRepository } from '../../core/ports.js';
import type { NewReferral, ReferralRecord, ReferralStatus } from '../../core/types.js';
import type { GameDbClient, Referrals } from '../../../../infra/database/client.js';
import type { UserId } from '../../../users/index.js';
import type { Selectable } from 'kysely';
import type { Logger } from 'pino';

export interface ReferralRepoOptions {
  db: GameDbClient;
  logger: Logger;
}

const UNIQUE_VIOLATION = '23505';

const isUniqueViolation = (error: unknown): boolean =>
  error instanceof Error && 'code' in error && error.code === UNIQUE_VIOLATION;

const toStatus = (value: string): ReferralStatus => (value === 'completed' ? 'completed' : 'pending');

class KyselyReferralRepo implements ReferralRepository {
  private readonly db: GameDbClient;
  private readonly log: Logger;

  constructor(options: ReferralRepoOptions) {
    this.db = options.db;
    this.log = options.logger.child({ module: 'referral-repo' });
  }

  async findByCode(code: string): Promise<Result<ReferralRecord | null, DatabaseError>> {
    try {
      const row = await this.db
        .selectFrom('referrals')
        .selectAll()
        .where('code', '=', code)
        .executeTakeFirst();
      return ok(row !== undefined ? this.mapRow(row) : null);
    } catch (error) {
      this.log.error({ err: error, code }, 'Failed to find referral');
      return err(createDatabaseError('Failed to find referral', error));
    }
  }

  async findPendingByReferrer(
    referrerId: UserId
  ): Promise<Result<ReferralRecord | null, DatabaseError>> {
    try {
      const row = await this.db
        .selectFrom('referrals')
        .selectAll()
        .where('referrer_id', '=', String(referrerId))
        .where('status', '=', 'pending')
        .orderBy('created_at', 'desc')
        .limit(1)
        .executeTakeFirst();
      return ok(row !== undefined ? this.mapRow(row) : null);
    } catch (error) {
      this.log.error({ err: error, referrerId }, 'Failed to find pending referral');
      return err(createDatabaseError('Failed to find pending referral', error));
    }
  }

  async create(
    referral: NewReferral
  ): Promise<Result<ReferralRecord, DatabaseError | CodeCollisionError>> {
    try {
      const row = await this.db
        .insertInto('referrals')
        .values({ code: referral.code, referrer_id: referral.referrerId, status: 'pending' })
        .returningAll()
        .executeTakeFirstOrThrow();
      return ok(this.mapRow(row));
    } catch (error) {
      if (isUniqueViolation(error)) {
        this.log.warn({ code: referral.code }, 'Referral code collision');
        return err(createCodeCollisionError(referral.code));
      }
      this.log.error({ err: error, referrerId: referral.referrerId }, 'Failed to create referral');
      return err(createDatabaseError('Failed to create referral', error));
    }
  }

  async markCompleted(
    code: string,
    referredId: UserId,
    completedAt: Date
  ): Promise<Result<ReferralRecord | null, DatabaseError>> {
    try {
      const row = await this.db
        .updateTable('referrals')
        .set({ referred_id: referredId, status: 'completed', completed_at: completedAt })
        .where('code', '=', code)
        .where('status', '=', 'pending')
        .returningAll()
        .executeTakeFirst();
      return ok(row !== undefined ? this.mapRow(row) : null);
    } catch (error) {
      this.log.error({ err: error, code, referredId }, 'Failed to complete referral');
      return err(createDatabaseError('Failed to complete referral', error));
    }
  }

  async countByReferrer(referrerId: UserId): Promise<Result<number, DatabaseError>> {
    return this.count(referrerId, null);
  }

  async countCompletedByReferrer(referrerId: UserId): Promise<Result<number, DatabaseError>> {
    return this.count(referrerId, 'completed');
  }

  private async count(
    referrerId: UserId,
    status: ReferralStatus | null
  ): Promise<Result<number, DatabaseError>> {
    try {
      let query = this.db
        .selectFrom('referrals')
        .select((eb) => eb.fn.countAll<string>().as('count'))
        .where('referrer_id', '=', String(referrerId));
      if (status !== null) {
        query = query.where('status', '=', status);
      }
      const row = await query.executeTakeFirstOrThrow();
      return ok(Number(row.count));
    } catch (error) {
      this.log.error({ err: error, referrerId, status }, 'Failed to count referrals');
      return err(createDatabaseError('Failed to count referrals', error));
    }
  }

  private mapRow(row: Selectable<Referrals>): ReferralRecord {
    return {
      code: row.code,
      referrerId: Number(row.referrer_id),
      referredId: row.referred_id !== null ? Number(row.referred_id) : null,
      status: toStatus(row.status),
      createdAt: row.created_at,
      completedAt: row.completed_at,
    };
  }
}

export const makeReferralRepo = (options: ReferralRepoOptions): ReferralRepository => {
  return new KyselyReferralRepo(options);
};
