/**
 * Analytics Module - Ports
 */

import type { DatabaseError } from './errors.js';
import type { AnalyticsEventType, DailyMetrics, UserEvent } from './types.js';
import type { Result } from 'neverthrow';

/**
 * Half-open time range [from, to).
 */
export interface TimeWindow {
  from: Date;
  to: Date;
}

export interface AnalyticsRepository {
  recordEvent(event: UserEvent): Promise<Result<void, DatabaseError>>;

  findDaily(date: string): Promise<Result<DailyMetrics | null, DatabaseError>>;

  /** Inserts the row unless the date already exists. Returns false if it did. */
  saveDaily(metrics: DailyMetrics): Promise<Result<boolean, DatabaseError>>;

  countActiveUsers(window: TimeWindow): Promise<Result<number, DatabaseError>>;

  countNewUsers(window: TimeWindow): Promise<Result<number, DatabaseError>>;

  countEvents(type: AnalyticsEventType, window: TimeWindow): Promise<Result<number, DatabaseError>>;
}
