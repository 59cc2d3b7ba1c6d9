/**
 * Users Module - Public API
 */

export type {
  UserId,
  UserIdentity,
  UserProfile,
  EnsureUserResult,
  ProgressDelta,
} from './core/types.js';
export { EMPTY_IDENTITY } from './core/types.js';

export { getDisplayName } from './core/profile.js';

export type { DatabaseError } from './core/errors.js';
export { createDatabaseError } from './core/errors.js';

export type { UserRepository } from './core/ports.js';

export { makeUserRepo, type UserRepoOptions } from './shell/repo/user-repo.js';
