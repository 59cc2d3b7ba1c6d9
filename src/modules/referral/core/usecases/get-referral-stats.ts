/**
 * Get Referral Stats Use Case
 */

import { ok, err, type Result } from 'neverthrow';

import { getOrCreateCode, type GetOrCreateCodeDeps } from './get-or-create-code.js';
import { MILESTONE_EVERY, type ReferralStats } from '../types.js';

import type { ReferralError } from '../errors.js';
import type { UserId } from '../../../users/index.js';

export const referralsUntilBonus = (completedReferrals: number): number =>
  MILESTONE_EVERY - (completedReferrals % MILESTONE_EVERY);

export async function getReferralStats(
  deps: GetOrCreateCodeDeps,
  input: { userId: UserId }
): Promise<Result<ReferralStats, ReferralError>> {
  const { referralRepo } = deps;

  const record = await getOrCreateCode(deps, input);
  if (record.isErr()) {
    return err(record.error);
  }

  const total = await referralRepo.countByReferrer(input.userId);
  if (total.isErr()) {
    return err(total.error);
  }

  const completed = await referralRepo.countCompletedByReferrer(input.userId);
  if (completed.isErr()) {
    return err(completed.error);
  }

  return ok({
    code: record.value.code,
    totalReferrals: total.value,
    completedReferrals: completed.value,
    referralsUntilBonus: referralsUntilBonus(completed.value),
  });
}
