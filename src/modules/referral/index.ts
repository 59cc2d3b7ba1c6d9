/**
 * Referral Module - Public API
 */

export type {
  ReferralStatus,
  ReferralRecord,
  NewReferral,
  ReferralOutcome,
  ReferralStats,
} from './core/types.js';
export {
  REFERRAL_CODE_LENGTH,
  REFERRAL_CODE_PATTERN,
  SIGNUP_BONUS,
  MILESTONE_BONUS,
  MILESTONE_EVERY,
} from './core/types.js';

export type {
  ReferralError,
  InvalidReferralCodeError,
  ReferralAlreadyUsedError,
  CodeCollisionError,
  BonusFailedError,
} from './core/errors.js';

export type { Hasher, TimestampSource, ReferralRepository } from './core/ports.js';

export { generateReferralCode, normalizeReferralCode } from './core/code.js';

export {
  getOrCreateCode,
  type GetOrCreateCodeDeps,
  type GetOrCreateCodeInput,
} from './core/usecases/get-or-create-code.js';
export {
  processReferral,
  isMilestone,
  type ProcessReferralDeps,
  type ProcessReferralInput,
} from './core/usecases/process-referral.js';
export { getReferralStats, referralsUntilBonus } from './core/usecases/get-referral-stats.js';

export { cryptoHasher, hrtimeTimestamp } from './shell/crypto/hasher.js';
export { makeReferralRepo, type ReferralRepoOptions } from './shell/repo/referral-repo.js';
