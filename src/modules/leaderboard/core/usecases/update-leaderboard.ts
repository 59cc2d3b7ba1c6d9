/**
 * Update Leaderboard Use Case
 *
 * Recomputes a user's derived score, writes it into every period and re-ranks
 * each period under its lock.
 */

import { ok, err, type Result } from 'neverthrow';

import { createUserNotFoundError, type LeaderboardError } from '../errors.js';
import { computeScore } from '../scoring.js';
import { LEADERBOARD_PERIODS } from '../types.js';

import type { LeaderboardRepository, PeriodLock } from '../ports.js';
import type { UserId, UserRepository } from '../../../users/index.js';

export interface UpdateLeaderboardDeps {
  userRepo: UserRepository;
  leaderboardRepo: LeaderboardRepository;
  periodLock: PeriodLock;
}

export interface UpdateLeaderboardInput {
  userId: UserId;
}

export interface UpdateLeaderboardOutput {
  score: number;
}

export async function updateLeaderboard(
  deps: UpdateLeaderboardDeps,
  input: UpdateLeaderboardInput
): Promise<Result<UpdateLeaderboardOutput, LeaderboardError>> {
  const { userRepo, leaderboardRepo, periodLock } = deps;

  const userResult = await userRepo.findById(input.userId);
  if (userResult.isErr()) {
    return err(userResult.error);
  }
  if (userResult.value === null) {
    return err(createUserNotFoundError(input.userId));
  }

  const score = computeScore(userResult.value);

  for (const period of LEADERBOARD_PERIODS) {
    const written = await periodLock.runExclusive(period, async () => {
      const upserted = await leaderboardRepo.upsertScore(input.userId, period, score);
      if (upserted.isErr()) {
        return upserted;
      }
      return leaderboardRepo.recomputeRanks(period);
    });

    if (written.isErr()) {
      return err(written.error);
    }
  }

  return ok({ score });
}
