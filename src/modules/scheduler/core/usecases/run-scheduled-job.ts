/**
 * Run Scheduled Job Use Case
 *
 * Dispatches a fired job to its use case. The weekly reset takes the same
 * period lock as live leaderboard updates.
 */

import { ok, err, type Result } from 'neverthrow';

import { aggregateDailyMetrics, type AnalyticsRepository } from '../../../analytics/index.js';
import {
  resetWeeklyLeaderboard,
  type LeaderboardRepository,
  type PeriodLock,
} from '../../../leaderboard/index.js';
import { createUnknownJobError, type SchedulerError } from '../errors.js';
import { isScheduledJobName, type JobRunSummary } from '../types.js';
import { sendSubscriberTips, type SendSubscriberTipsDeps } from './send-subscriber-tips.js';

import type { Logger } from 'pino';

export interface RunScheduledJobDeps extends SendSubscriberTipsDeps {
  leaderboardRepo: LeaderboardRepository;
  analyticsRepo: AnalyticsRepository;
  periodLock: PeriodLock;
  logger: Logger;
}

export interface RunScheduledJobInput {
  name: string;
  now: Date;
}

export async function runScheduledJob(
  deps: RunScheduledJobDeps,
  input: RunScheduledJobInput
): Promise<Result<JobRunSummary, SchedulerError>> {
  const { name } = input;
  if (!isScheduledJobName(name)) {
    return err(createUnknownJobError(name));
  }

  switch (name) {
    case 'weekly_leaderboard_reset': {
      const result = await resetWeeklyLeaderboard(deps);
      if (result.isErr()) return err(result.error);
      deps.logger.info('Weekly leaderboard reset');
      return ok({ job: name });
    }
    case 'daily_metrics_aggregation': {
      const result = await aggregateDailyMetrics(deps, { now: input.now });
      if (result.isErr()) return err(result.error);
      const summary = result.value;
      const date = summary.status === 'created' ? summary.metrics.date : summary.date;
      deps.logger.info({ date, status: summary.status }, 'Daily metrics aggregation finished');
      return ok({ job: name, status: summary.status, date });
    }
    case 'subscriber_tips': {
      const result = await sendSubscriberTips(deps, { now: input.now });
      if (result.isErr()) return err(result.error);
      deps.logger.info(result.value, 'Subscriber tips sent');
      return ok({ job: name, ...result.value });
    }
    default: {
      const unhandled: never = name;
      return err(createUnknownJobError(String(unhandled)));
    }
  }
}
