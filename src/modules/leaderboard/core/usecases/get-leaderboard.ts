/**
 * Get Leaderboard Use Case
 *
 * Returns the top entries of a period with display names, plus the requester's
 * standing wherever they rank.
 */

import { ok, err, type Result } from 'neverthrow';

import { getDisplayName, type UserId, type UserRepository } from '../../../users/index.js';
import { createInvalidLeaderboardQueryError, type LeaderboardError } from '../errors.js';
import { computePercentile, rankEntries } from '../scoring.js';
import {
  MAX_LEADERBOARD_LIMIT,
  type LeaderboardPeriod,
  type LeaderboardStandings,
  type RequesterStanding,
} from '../types.js';

import type { LeaderboardRepository } from '../ports.js';

export interface GetLeaderboardDeps {
  leaderboardRepo: LeaderboardRepository;
  userRepo: UserRepository;
}

export interface GetLeaderboardInput {
  period: LeaderboardPeriod;
  limit: number;
  requestingUserId?: UserId;
}

export async function getLeaderboard(
  deps: GetLeaderboardDeps,
  input: GetLeaderboardInput
): Promise<Result<LeaderboardStandings, LeaderboardError>> {
  const { leaderboardRepo, userRepo } = deps;
  const { period, limit, requestingUserId } = input;

  if (!Number.isInteger(limit) || limit < 1 || limit > MAX_LEADERBOARD_LIMIT) {
    return err(
      createInvalidLeaderboardQueryError(
        `limit must be an integer between 1 and ${String(MAX_LEADERBOARD_LIMIT)}`
      )
    );
  }

  const entriesResult = await leaderboardRepo.listEntries(period);
  if (entriesResult.isErr()) {
    return err(entriesResult.error);
  }

  const ranked = rankEntries(entriesResult.value);
  const top = ranked.slice(0, limit);

  const usersResult = await userRepo.findMany(top.map((entry) => entry.userId));
  if (usersResult.isErr()) {
    return err(usersResult.error);
  }
  const usersById = new Map(usersResult.value.map((user) => [user.id, user]));

  let requester: RequesterStanding | null = null;
  if (requestingUserId !== undefined) {
    const own = ranked.find((entry) => entry.userId === requestingUserId);
    if (own !== undefined) {
      requester = {
        rank: own.rank,
        score: own.score,
        percentile: computePercentile(own.rank, ranked.length),
      };
    }
  }

  return ok({
    period,
    entries: top.map((entry) => {
      const user = usersById.get(entry.userId);
      return {
        ...entry,
        displayName:
          user !== undefined ? getDisplayName(user) : `User ${String(entry.userId)}`,
      };
    }),
    totalPlayers: ranked.length,
    requester,
  });
}
