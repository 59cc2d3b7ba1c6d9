/**
 * Reset Weekly Leaderboard Use Case
 *
 * Zeroes the weekly scores and re-ranks the period while holding the weekly lock,
 * so no live update interleaves with the reset.
 */

import { ok, err, type Result } from 'neverthrow';

import type { LeaderboardError } from '../errors.js';
import type { LeaderboardRepository, PeriodLock } from '../ports.js';

export interface ResetWeeklyLeaderboardDeps {
  leaderboardRepo: LeaderboardRepository;
  periodLock: PeriodLock;
}

export async function resetWeeklyLeaderboard(
  deps: ResetWeeklyLeaderboardDeps
): Promise<Result<void, LeaderboardError>> {
  const { leaderboardRepo, periodLock } = deps;

  const result = await periodLock.runExclusive('weekly', async () => {
    const reset = await leaderboardRepo.resetScores('weekly');
    if (reset.isErr()) {
      return reset;
    }
    return leaderboardRepo.recomputeRanks('weekly');
  });

  if (result.isErr()) {
    return err(result.error);
  }
  return ok(undefined);
}
