/**
 * Scheduler Module - Domain Errors
 */

import type { AnalyticsError } from '../../analytics/index.js';
import type { LeaderboardError } from '../../leaderboard/index.js';
import type { DatabaseError } from '../../users/index.js';

export interface UnknownJobError {
  readonly type: 'UnknownJobError';
  readonly message: string;
  readonly jobName: string;
}

export type SchedulerError = UnknownJobError | LeaderboardError | AnalyticsError | DatabaseError;

export const createUnknownJobError = (jobName: string): UnknownJobError => ({
  type: 'UnknownJobError',
  message: `Unknown scheduled job "${jobName}"`,
  jobName,
});
