/**
 * Rebuild Leaderboard Use Case
 *
 * Writes standings for every known user. Used when a board is viewed before
 * anyone has been ranked.
 */

import { ok, err, type Result } from 'neverthrow';

import { updateLeaderboard, type UpdateLeaderboardDeps } from './update-leaderboard.js';

import type { LeaderboardError } from '../errors.js';

export interface RebuildLeaderboardOutput {
  usersRanked: number;
}

export async function rebuildLeaderboard(
  deps: UpdateLeaderboardDeps
): Promise<Result<RebuildLeaderboardOutput, LeaderboardError>> {
  const idsResult = await deps.userRepo.listIds();
  if (idsResult.isErr()) {
    return err(idsResult.error);
  }

  for (const userId of idsResult.value) {
    const updated = await updateLeaderboard(deps, { userId });
    if (updated.isErr()) {
      return err(updated.error);
    }
  }

  return ok({ usersRanked: idsResult.value.length });
}
