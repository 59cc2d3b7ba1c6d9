/**
 * Get Or Create Code Use Case
 *
 * Returns the referrer's pending code, minting a new one when none is pending.
 * Each code is single-use, so a referrer whose last code was redeemed receives a
 * fresh one.
 */

import { ok, err, type Result } from 'neverthrow';

import { generateReferralCode } from '../code.js';
import { createCodeCollisionError, type ReferralError } from '../errors.js';
import { MAX_CODE_ATTEMPTS, type ReferralRecord } from '../types.js';

import type { Hasher, ReferralRepository, TimestampSource } from '../ports.js';
import type { UserId } from '../../../users/index.js';

export interface GetOrCreateCodeDeps {
  referralRepo: ReferralRepository;
  hasher: Hasher;
  now: TimestampSource;
}

export interface GetOrCreateCodeInput {
  userId: UserId;
}

export async function getOrCreateCode(
  deps: GetOrCreateCodeDeps,
  input: GetOrCreateCodeInput
): Promise<Result<ReferralRecord, ReferralError>> {
  const { referralRepo, hasher, now } = deps;

  const existing = await referralRepo.findPendingByReferrer(input.userId);
  if (existing.isErr()) {
    return err(existing.error);
  }
  if (existing.value !== null) {
    return ok(existing.value);
  }

  let lastCode = '';
  for (let attempt = 0; attempt < MAX_CODE_ATTEMPTS; attempt++) {
    lastCode = generateReferralCode(hasher, input.userId, now());
    const created = await referralRepo.create({ code: lastCode, referrerId: input.userId });

    if (created.isOk()) {
      return ok(created.value);
    }
    if (created.error.type !== 'CodeCollisionError') {
      return err(created.error);
    }
  }

  return err(createCodeCollisionError(lastCode));
}
