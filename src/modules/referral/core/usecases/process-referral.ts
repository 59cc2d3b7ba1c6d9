/**
 * Process Referral Use Case
 *
 * Redeems a code for a newly signed-up user. The referrer's milestone is decided
 * from the completed count re-read after this completion, not from a counter.
 */

import { ok, err, type Result } from 'neverthrow';

import { adjustCoins, type LedgerDeps } from '../../../rewards/index.js';
import { normalizeReferralCode } from '../code.js';
import {
  createBonusFailedError,
  createInvalidReferralCodeError,
  createReferralAlreadyUsedError,
  type ReferralError,
} from '../errors.js';
import {
  MILESTONE_BONUS,
  MILESTONE_EVERY,
  SIGNUP_BONUS,
  type ReferralOutcome,
} from '../types.js';

import type { ReferralRepository } from '../ports.js';
import type { UserId } from '../../../users/index.js';

export interface ProcessReferralDeps {
  referralRepo: ReferralRepository;
  ledger: LedgerDeps;
  clock?: () => Date;
}

export interface ProcessReferralInput {
  code: string;
  newUserId: UserId;
}

export const isMilestone = (completedReferrals: number): boolean =>
  completedReferrals > 0 && completedReferrals % MILESTONE_EVERY === 0;

export async function processReferral(
  deps: ProcessReferralDeps,
  input: ProcessReferralInput
): Promise<Result<ReferralOutcome, ReferralError>> {
  const { referralRepo, ledger, clock = () => new Date() } = deps;
  const code = normalizeReferralCode(input.code);

  const found = await referralRepo.findByCode(code);
  if (found.isErr()) {
    return err(found.error);
  }
  const record = found.value;
  if (record === null) {
    return err(createInvalidReferralCodeError(code, 'not found'));
  }
  if (record.referrerId === input.newUserId) {
    return err(createInvalidReferralCodeError(code, 'self referral'));
  }
  if (record.status !== 'pending') {
    return err(createReferralAlreadyUsedError(code));
  }

  const completed = await referralRepo.markCompleted(code, input.newUserId, clock());
  if (completed.isErr()) {
    return err(completed.error);
  }
  if (completed.value === null) {
    return err(createReferralAlreadyUsedError(code));
  }

  const counted = await referralRepo.countCompletedByReferrer(record.referrerId);
  if (counted.isErr()) {
    return err(counted.error);
  }
  const completedReferrals = counted.value;

  // The code is consumed at this point, so the milestone is settled before the signup credit
  let milestoneBonus = 0;
  if (isMilestone(completedReferrals)) {
    const bonus = await adjustCoins(ledger, { userId: record.referrerId, delta: MILESTONE_BONUS });
    if (bonus.isErr()) {
      return err(createBonusFailedError(record.referrerId, bonus.error));
    }
    milestoneBonus = MILESTONE_BONUS;
  }

  const signup = await adjustCoins(ledger, { userId: input.newUserId, delta: SIGNUP_BONUS });
  if (signup.isErr()) {
    ledger.logger.error(
      { err: signup.error, code, newUserId: input.newUserId, milestoneBonus },
      'Referral signup bonus failed'
    );
    return err(createBonusFailedError(input.newUserId, signup.error));
  }

  ledger.logger.info(
    { code, referrerId: record.referrerId, newUserId: input.newUserId, completedReferrals, milestoneBonus },
    'Referral completed'
  );

  return ok({
    referrerId: record.referrerId,
    signupBonus: SIGNUP_BONUS,
    completedReferrals,
    milestoneBonus,
  });
}
