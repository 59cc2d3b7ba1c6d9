/**
 * Referral code generation.
 */

import { REFERRAL_CODE_LENGTH } from './types.js';

import type { Hasher } from './ports.js';
import type { UserId } from '../../users/index.js';

/**
 * First 8 hex characters of sha256("<userId>_<timestamp>"), upper-cased.
 */
export const generateReferralCode = (hasher: Hasher, userId: UserId, timestamp: string): string =>
  hasher
    .sha256(`${String(userId)}_${timestamp}`)
    .slice(0, REFERRAL_CODE_LENGTH)
    .toUpperCase();

export const normalizeReferralCode = (code: string): string => code.trim().toUpperCase();
