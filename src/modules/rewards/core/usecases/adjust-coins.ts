/**
 * Adjust Coins Use Case
 *
 * Credits or spends coins without touching the scenario score. Used for referral
 * bonuses and shop purchases.
 */

import { ok, err, type Result } from 'neverthrow';

import { refreshStandings, type LedgerDeps } from './refresh-standings.js';
import {
  createInsufficientCoinsError,
  createUserNotFoundError,
  type RewardError,
} from '../errors.js';

import type { CoinAdjustment } from '../types.js';
import type { UserId } from '../../../users/index.js';

export interface AdjustCoinsInput {
  userId: UserId;
  delta: number;
}

export async function adjustCoins(
  deps: LedgerDeps,
  input: AdjustCoinsInput
): Promise<Result<CoinAdjustment, RewardError>> {
  const { userRepo } = deps;
  const { userId, delta } = input;

  const ensured = await userRepo.ensureUser(userId);
  if (ensured.isErr()) {
    return err(ensured.error);
  }

  const applied = await userRepo.applyDelta(userId, { coins: delta });
  if (applied.isErr()) {
    return err(applied.error);
  }
  if (applied.value === null) {
    return err(
      delta < 0
        ? createInsufficientCoinsError(-delta, ensured.value.user.coins)
        : createUserNotFoundError(userId)
    );
  }

  await refreshStandings(deps, userId);

  return ok({ delta, balance: applied.value.coins });
}
