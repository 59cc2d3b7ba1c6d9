/**
 * Users Module - Ports
 */

import type { DatabaseError } from './errors.js';
import type { EnsureUserResult, ProgressDelta, UserId, UserIdentity, UserProfile } from './types.js';
import type { Result } from 'neverthrow';

export interface UserRepository {
  findById(id: UserId): Promise<Result<UserProfile | null, DatabaseError>>;

  /**
   * Creates the user with default progress if absent. A non-null identity
   * refreshes the stored display fields.
   */
  ensureUser(id: UserId, identity?: UserIdentity): Promise<Result<EnsureUserResult, DatabaseError>>;

  /**
   * Applies the delta atomically. Returns null when the user does not exist or the
   * coin change would make the balance negative.
   */
  applyDelta(id: UserId, delta: ProgressDelta): Promise<Result<UserProfile | null, DatabaseError>>;

  setSubscribed(id: UserId, subscribed: boolean): Promise<Result<void, DatabaseError>>;

  /** All user ids in creation order */
  listIds(): Promise<Result<UserId[], DatabaseError>>;

  /** Users who opted in to scheduled tips, by id */
  listSubscribers(): Promise<Result<UserProfile[], DatabaseError>>;

  /** Profiles for the given ids; unknown ids are skipped */
  findMany(ids: readonly UserId[]): Promise<Result<UserProfile[], DatabaseError>>;
}
