/**
 * Analytics Module - Core Types
 */

import type { UserId } from '../../users/index.js';

export const ANALYTICS_EVENT_TYPES = [
  'user_signup',
  'user_return',
  'quiz_level_start',
  'quiz_complete',
  'scenario_start',
  'scenario_complete',
  'referral_signup',
  'report_submitted',
  'education_complete',
] as const;

export type AnalyticsEventType = (typeof ANALYTICS_EVENT_TYPES)[number];

export type EventData = Record<string, string | number | boolean | null>;

export interface UserEvent {
  userId: UserId;
  type: AnalyticsEventType;
  data: EventData;
}

export interface DailyMetrics {
  /** UTC day the window starts on, YYYY-MM-DD */
  date: string;
  dailyActiveUsers: number;
  newUsers: number;
  quizCompletions: number;
  scenarioCompletions: number;
}

export const AGGREGATION_WINDOW_MS = 24 * 60 * 60 * 1000;
