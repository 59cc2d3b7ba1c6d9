/**
 * Grant Reward Use Case
 *
 * Single entry point for scenario rewards. Each call is applied exactly once;
 * callers must not call twice for one event.
 */

import { ok, err, type Result } from 'neverthrow';

import { refreshStandings, type LedgerDeps } from './refresh-standings.js';
import { createUserNotFoundError, type RewardError } from '../errors.js';

import type { RewardGrant } from '../types.js';
import type { ProgressDelta, UserId } from '../../../users/index.js';

export interface GrantRewardInput {
  userId: UserId;
  coinDelta: number;
  badgeId?: string;
}

export async function grantReward(
  deps: LedgerDeps,
  input: GrantRewardInput
): Promise<Result<RewardGrant, RewardError>> {
  const { userRepo, logger } = deps;
  const { userId, coinDelta, badgeId } = input;

  const ensured = await userRepo.ensureUser(userId);
  if (ensured.isErr()) {
    return err(ensured.error);
  }
  const before = ensured.value.user;

  const coinsGranted = coinDelta > 0 ? coinDelta : 0;
  const badgeGranted =
    badgeId !== undefined && !before.scenarioBadges.includes(badgeId) ? badgeId : null;

  const delta: ProgressDelta = {
    ...(coinsGranted > 0 && { coins: coinsGranted, scenarioScore: coinsGranted }),
    ...(badgeId !== undefined && { badge: badgeId }),
  };

  const applied = await userRepo.applyDelta(userId, delta);
  if (applied.isErr()) {
    return err(applied.error);
  }
  const after = applied.value;
  if (after === null) {
    return err(createUserNotFoundError(userId));
  }

  logger.info({ userId, coinsGranted, badgeGranted }, 'Reward granted');

  await refreshStandings(deps, userId);

  return ok({
    coinsGranted,
    badgeGranted,
    newScore: after.scenarioScore,
    allBadges: after.scenarioBadges,
  });
}
