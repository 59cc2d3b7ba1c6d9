/**
 * Referral Module - Ports
 */

import type { CodeCollisionError, DatabaseError } from './errors.js';
import type { NewReferral, ReferralRecord } from './types.js';
import type { UserId } from '../../users/index.js';
import type { Result } from 'neverthrow';

/**
 * Hashing port for code generation.
 */
export interface Hasher {
  sha256(data: string): string;
}

/**
 * Source of high-resolution timestamps, as a decimal string.
 */
export type TimestampSource = () => string;

export interface ReferralRepository {
  findByCode(code: string): Promise<Result<ReferralRecord | null, DatabaseError>>;

  /** Most recent pending code of a referrer */
  findPendingByReferrer(referrerId: UserId): Promise<Result<ReferralRecord | null, DatabaseError>>;

  /** Inserts a pending record; fails with CodeCollisionError if the code exists */
  create(
    referral: NewReferral
  ): Promise<Result<ReferralRecord, DatabaseError | CodeCollisionError>>;

  /**
   * Flips a pending record to completed. Returns null when the record is no
   * longer pending.
   */
  markCompleted(
    code: string,
    referredId: UserId,
    completedAt: Date
  ): Promise<Result<ReferralRecord | null, DatabaseError>>;

  countByReferrer(referrerId: UserId): Promise<Result<number, DatabaseError>>;

  countCompletedByReferrer(referrerId: UserId): Promise<Result<number, DatabaseError>>;
}
