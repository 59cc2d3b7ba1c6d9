import type { ColumnType, Generated, JSONColumnType } from 'kysely';

// Helper for timestamps which can be strings or Dates depending on driver config
export type Timestamp = ColumnType<Date, Date | string, Date | string>;

// Players
export interface Users {
  id: ColumnType<string, number | string, never>; // BIGINT -> string
  username: string | null;
  first_name: string | null;
  last_name: string | null;
  subscribed: Generated<boolean>;
  coins: Generated<number>;
  quizzes_passed: Generated<number>;
  max_unlocked_level: Generated<number>;
  scenario_score: Generated<number>;
  scenario_badges: Generated<string[]>;
  created_at: Generated<Timestamp>;
  updated_at: Generated<Timestamp>;
}

// One row per (user, period); id keeps insertion order for rank tie breaks
export interface LeaderboardEntries {
  id: Generated<string>; // BIGSERIAL -> string
  user_id: ColumnType<string, number | string, never>;
  period: string;
  score: Generated<number>;
  rank: number | null;
  updated_at: Generated<Timestamp>;
}

export interface Referrals {
  code: string;
  referrer_id: ColumnType<string, number | string, never>;
  referred_id: ColumnType<string | null, number | string | null, number | string | null>;
  status: string;
  created_at: Generated<Timestamp>;
  completed_at: Timestamp | null;
}

export interface UserEvents {
  id: Generated<string>; // BIGSERIAL -> string
  user_id: ColumnType<string, number | string, never>;
  event_type: string;
  event_data: JSONColumnType<Record<string, unknown>>;
  created_at: Generated<Timestamp>;
}

export interface AnalyticsDaily {
  date: ColumnType<Date, string, string>; // DATE
  daily_active_users: number;
  new_users: number;
  quiz_completions: number;
  scenario_completions: number;
  created_at: Generated<Timestamp>;
}

// User-submitted scam reports; status moves from new to reviewed outside the bot
export interface ScamReports {
  id: Generated<string>; // BIGSERIAL -> string
  user_id: ColumnType<string, number | string, never>;
  description: string;
  link: string | null;
  contact: string | null;
  status: Generated<string>;
  created_at: Generated<Timestamp>;
}

export interface GameDatabase {
  users: Users;
  leaderboard_entries: LeaderboardEntries;
  referrals: Referrals;
  user_events: UserEvents;
  analytics_daily: AnalyticsDaily;
  scam_reports: ScamReports;
}
