/**
 * Leaderboard Module - Public API
 */

// ─────────────────────────────────────────────────────────────────────────────
// Core Types
// ─────────────────────────────────────────────────────────────────────────────

export type {
  LeaderboardPeriod,
  ScoreInputs,
  LeaderboardEntry,
  RankedEntry,
  LeaderboardRow,
  RequesterStanding,
  LeaderboardStandings,
} from './core/types.js';
export {
  LEADERBOARD_PERIODS,
  DEFAULT_LEADERBOARD_LIMIT,
  MAX_LEADERBOARD_LIMIT,
  isLeaderboardPeriod,
} from './core/types.js';

export { computeScore, rankEntries, computePercentile } from './core/scoring.js';

// ─────────────────────────────────────────────────────────────────────────────
// Errors & Ports
// ─────────────────────────────────────────────────────────────────────────────

export type { LeaderboardError } from './core/errors.js';
export { getHttpStatusForError as getLeaderboardHttpStatus } from './core/errors.js';

export type { LeaderboardRepository, PeriodLock } from './core/ports.js';

// ─────────────────────────────────────────────────────────────────────────────
// Use Cases
// ─────────────────────────────────────────────────────────────────────────────

export {
  updateLeaderboard,
  type UpdateLeaderboardDeps,
  type UpdateLeaderboardInput,
  type UpdateLeaderboardOutput,
} from './core/usecases/update-leaderboard.js';
export {
  getLeaderboard,
  type GetLeaderboardDeps,
  type GetLeaderboardInput,
} from './core/usecases/get-leaderboard.js';
export {
  resetWeeklyLeaderboard,
  type ResetWeeklyLeaderboardDeps,
} from './core/usecases/reset-weekly-leaderboard.js';
export {
  rebuildLeaderboard,
  type RebuildLeaderboardOutput,
} from './core/usecases/rebuild-leaderboard.js';

// ─────────────────────────────────────────────────────────────────────────────
// Shell
// ─────────────────────────────────────────────────────────────────────────────

export { makeLeaderboardRepo, type LeaderboardRepoOptions } from './shell/repo/leaderboard-repo.js';
export { makeLeaderboardRoutes, type MakeLeaderboardRoutesDeps } from './shell/rest/routes.js';
