/**
 * Re-ranks a user after a committed ledger change. A failure is logged and does
 * not fail the ledger operation.
 */

import { updateLeaderboard, type UpdateLeaderboardDeps } from '../../../leaderboard/index.js';

import type { UserId } from '../../../users/index.js';
import type { Logger } from 'pino';

export interface LedgerDeps extends UpdateLeaderboardDeps {
  logger: Logger;
}

export async function refreshStandings(deps: LedgerDeps, userId: UserId): Promise<void> {
  const result = await updateLeaderboard(deps, { userId });
  if (result.isErr()) {
    deps.logger.warn(
      { userId, error: result.error.type, message: result.error.message },
      'Leaderboard update failed after ledger change'
    );
  }
}
