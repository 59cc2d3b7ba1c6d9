/**
 * Aggregate Daily Metrics Use Case
 *
 * Summarizes the 24 hours before `now` into one row keyed by the UTC day the
 * window starts on. Runs once per day; a day that already has a row is skipped.
 */

import { ok, err, type Result } from 'neverthrow';

import { AGGREGATION_WINDOW_MS, type DailyMetrics } from '../types.js';

import type { AnalyticsError } from '../errors.js';
import type { AnalyticsRepository, TimeWindow } from '../ports.js';

export interface AggregateDailyMetricsDeps {
  analyticsRepo: AnalyticsRepository;
}

export interface AggregateDailyMetricsInput {
  now: Date;
}

export type AggregateDailyMetricsOutput =
  | { status: 'created'; metrics: DailyMetrics }
  | { status: 'skipped'; date: string };

export const toUtcDate = (date: Date): string => date.toISOString().slice(0, 10);

export async function aggregateDailyMetrics(
  deps: AggregateDailyMetricsDeps,
  input: AggregateDailyMetricsInput
): Promise<Result<AggregateDailyMetricsOutput, AnalyticsError>> {
  const { analyticsRepo } = deps;
  const window: TimeWindow = {
    from: new Date(input.now.getTime() - AGGREGATION_WINDOW_MS),
    to: input.now,
  };
  const date = toUtcDate(window.from);

  const existing = await analyticsRepo.findDaily(date);
  if (existing.isErr()) {
    return err(existing.error);
  }
  if (existing.value !== null) {
    return ok({ status: 'skipped', date });
  }

  const [active, created, quizzes, scenarios] = await Promise.all([
    analyticsRepo.countActiveUsers(window),
    analyticsRepo.countNewUsers(window),
    analyticsRepo.countEvents('quiz_complete', window),
    analyticsRepo.countEvents('scenario_complete', window),
  ]);

  if (active.isErr()) return err(active.error);
  if (created.isErr()) return err(created.error);
  if (quizzes.isErr()) return err(quizzes.error);
  if (scenarios.isErr()) return err(scenarios.error);

  const metrics: DailyMetrics = {
    date,
    dailyActiveUsers: active.value,
    newUsers: created.value,
    quizCompletions: quizzes.value,
    scenarioCompletions: scenarios.value,
  };

  const saved = await analyticsRepo.saveDaily(metrics);
  if (saved.isErr()) {
    return err(saved.error);
  }
  if (!saved.value) {
    return ok({ status: 'skipped', date });
  }

  return ok({ status: 'created', metrics });
}
