/**
 * Referral Module - Core Types
 */

import type { UserId } from '../../users/index.js';

export const REFERRAL_CODE_LENGTH = 8;
export const SIGNUP_BONUS = 20;
export const MILESTONE_BONUS = 50;
/** The referrer earns the milestone bonus at every multiple of this many completions */
export const MILESTONE_EVERY = 3;
export const MAX_CODE_ATTEMPTS = 3;

export const REFERRAL_CODE_PATTERN = /^[0-9A-F]{8}$/;

export type ReferralStatus = 'pending' | 'completed';

export interface ReferralRecord {
  code: string;
  referrerId: UserId;
  referredId: UserId | null;
  status: ReferralStatus;
  createdAt: Date;
  completedAt: Date | null;
}

export interface NewReferral {
  code: string;
  referrerId: UserId;
}

export interface ReferralOutcome {
  referrerId: UserId;
  signupBonus: number;
  /** Completed referrals of the referrer, counted after this completion */
  completedReferrals: number;
  milestoneBonus: number;
}

export interface ReferralStats {
  code: string;
  totalReferrals: number;
  completedReferrals: number;
  /** Completions left until the next milestone bonus */
  referralsUntilBonus: number;
}
