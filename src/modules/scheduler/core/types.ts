/**
 * Scheduler Module - Core Types
 */

/** Cron patterns, evaluated in UTC */
export const SCHEDULED_JOBS = {
  weekly_leaderboard_reset: '0 0 * * 1',
  daily_metrics_aggregation: '0 0 * * *',
  subscriber_tips: '0 10 * * *',
} as const;

export type ScheduledJobName = keyof typeof SCHEDULED_JOBS;

export const SCHEDULED_JOB_NAMES = Object.keys(SCHEDULED_JOBS).filter(isScheduledJobName);

export function isScheduledJobName(value: string): value is ScheduledJobName {
  return Object.hasOwn(SCHEDULED_JOBS, value);
}

export interface ScheduledJobPayload {
  name: ScheduledJobName;
}

export type JobRunSummary =
  | { job: 'weekly_leaderboard_reset' }
  | { job: 'daily_metrics_aggregation'; status: 'created' | 'skipped'; date: string }
  | { job: 'subscriber_tips'; sent: number; failed: number };
