/**
 * Analytics Module - Public API
 */

export type { AnalyticsEventType, EventData, UserEvent, DailyMetrics } from './core/types.js';
export { ANALYTICS_EVENT_TYPES, AGGREGATION_WINDOW_MS } from './core/types.js';

export type { AnalyticsError, DatabaseError } from './core/errors.js';
export type { AnalyticsRepository, TimeWindow } from './core/ports.js';

export { trackEvent, type TrackEventDeps } from './core/usecases/track-event.js';
export {
  aggregateDailyMetrics,
  toUtcDate,
  type AggregateDailyMetricsDeps,
  type AggregateDailyMetricsInput,
  type AggregateDailyMetricsOutput,
} from './core/usecases/aggregate-daily-metrics.js';

export { makeAnalyticsRepo, type AnalyticsRepoOptions } from './shell/repo/analytics-repo.js';
