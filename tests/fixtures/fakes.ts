/**
 * Test fakes
 *
 * In-memory implementations of the repository and gateway ports. Each fake
 * exposes its backing state for assertions and can be told to fail.
 */

import { ok, err, type Result } from 'neverthrow';
import pinoLogger from 'pino';

import { createDatabaseError as createAnalyticsDbError } from '@/modules/analytics/core/errors.js';
import { createDatabaseError as createLeaderboardDbError } from '@/modules/leaderboard/core/errors.js';
import { rankEntries } from '@/modules/leaderboard/index.js';
import {
  createCodeCollisionError,
  createDatabaseError as createReferralDbError,
  type CodeCollisionError,
} from '@/modules/referral/core/errors.js';
import { createDatabaseError as createReportDbError } from '@/modules/reports/index.js';
import {
  createDatabaseError,
  type DatabaseError,
  type ProgressDelta,
  type UserId,
  type UserProfile,
  type UserRepository,
} from '@/modules/users/index.js';

import { makeNewUser } from './builders.js';

import type { AnalyticsRepository, DailyMetrics, UserEvent } from '@/modules/analytics/index.js';
import type {
  DeliveryTarget,
  GatewayError,
  MessagingGateway,
  ViewModel,
} from '@/modules/conversation/index.js';
import type {
  LeaderboardEntry,
  LeaderboardPeriod,
  LeaderboardRepository,
} from '@/modules/leaderboard/index.js';
import type { Hasher, ReferralRecord, ReferralRepository } from '@/modules/referral/index.js';
import type { ReportRepository, ScamReport } from '@/modules/reports/index.js';
import type { Logger } from 'pino';

export const testLogger: Logger = pinoLogger({ level: 'silent' });

// ─────────────────────────────────────────────────────────────────────────────
// Users
// ─────────────────────────────────────────────────────────────────────────────

/**
 * In-memory counterpart of the repository's UPDATE: null when coins would go negative.
 */
const applyProgressDelta = (user: UserProfile, delta: ProgressDelta): UserProfile | null => {
  const coins = user.coins + (delta.coins ?? 0);
  if (coins < 0) {
    return null;
  }

  return {
    ...user,
    coins,
    quizzesPassed: user.quizzesPassed + (delta.quizzesPassed ?? 0),
    scenarioScore: user.scenarioScore + (delta.scenarioScore ?? 0),
    maxUnlockedLevel: Math.max(user.maxUnlockedLevel, delta.unlockLevel ?? user.maxUnlockedLevel),
    scenarioBadges:
      delta.badge !== undefined
        ? [...new Set([...user.scenarioBadges, delta.badge])].sort()
        : user.scenarioBadges,
  };
};

export interface FakeUserRepo extends UserRepository {
  readonly users: Map<UserId, UserProfile>;
  /** Methods that return a DatabaseError until removed */
  readonly failing: Set<keyof UserRepository>;
}

export const makeFakeUserRepo = (seed: readonly UserProfile[] = []): FakeUserRepo => {
  const users = new Map<UserId, UserProfile>(seed.map((user) => [user.id, user]));
  const failing = new Set<keyof UserRepository>();

  const fail = (method: keyof UserRepository): DatabaseError | null =>
    failing.has(method) ? createDatabaseError(`${method} failed`) : null;

  return {
    users,
    failing,

    async findById(id) {
      const failure = fail('findById');
      if (failure !== null) return err(failure);
      return ok(users.get(id) ?? null);
    },

    async ensureUser(id, identity) {
      const failure = fail('ensureUser');
      if (failure !== null) return err(failure);

      const existing = users.get(id);
      if (existing === undefined) {
        const created = makeNewUser(id, identity, new Date());
        users.set(id, created);
        return ok({ user: created, created: true });
      }
      const refreshed = identity !== undefined ? { ...existing, ...identity } : existing;
      users.set(id, refreshed);
      return ok({ user: refreshed, created: false });
    },

    async applyDelta(id, delta) {
      const failure = fail('applyDelta');
      if (failure !== null) return err(failure);

      const user = users.get(id);
      if (user === undefined) return ok(null);
      const updated = applyProgressDelta(user, delta);
      if (updated !== null) users.set(id, updated);
      return ok(updated);
    },

    async setSubscribed(id, subscribed) {
      const failure = fail('setSubscribed');
      if (failure !== null) return err(failure);

      const user = users.get(id);
      if (user !== undefined) users.set(id, { ...user, subscribed });
      return ok(undefined);
    },

    async listIds() {
      const failure = fail('listIds');
      if (failure !== null) return err(failure);
      return ok([...users.keys()]);
    },

    async listSubscribers() {
      const failure = fail('listSubscribers');
      if (failure !== null) return err(failure);
      return ok([...users.values()].filter((user) => user.subscribed).sort((a, b) => a.id - b.id));
    },

    async findMany(ids) {
      const failure = fail('findMany');
      if (failure !== null) return err(failure);
      return ok(
        ids.flatMap((id) => {
          const user = users.get(id);
          return user !== undefined ? [user] : [];
        })
      );
    },
  };
};

// ─────────────────────────────────────────────────────────────────────────────
// Leaderboard
// ─────────────────────────────────────────────────────────────────────────────

export interface FakeLeaderboardRepo extends LeaderboardRepository {
  /** Entries per period, in insertion order */
  readonly periods: Map<LeaderboardPeriod, LeaderboardEntry[]>;
  readonly failing: Set<keyof LeaderboardRepository>;
}

export const makeFakeLeaderboardRepo = (): FakeLeaderboardRepo => {
  const periods = new Map<LeaderboardPeriod, LeaderboardEntry[]>();
  const failing = new Set<keyof LeaderboardRepository>();

  const entriesOf = (period: LeaderboardPeriod): LeaderboardEntry[] => {
    const existing = periods.get(period);
    if (existing !== undefined) return existing;
    const created: LeaderboardEntry[] = [];
    periods.set(period, created);
    return created;
  };

  const fail = (method: keyof LeaderboardRepository) =>
    failing.has(method) ? createLeaderboardDbError(`${method} failed`) : null;

  return {
    periods,
    failing,

    async upsertScore(userId, period, score) {
      const failure = fail('upsertScore');
      if (failure !== null) return err(failure);

      const entries = entriesOf(period);
      const index = entries.findIndex((entry) => entry.userId === userId);
      if (index === -1) {
        entries.push({ userId, period, score, rank: null });
      } else {
        const current = entries[index];
        if (current !== undefined) entries[index] = { ...current, score };
      }
      return ok(undefined);
    },

    async recomputeRanks(period) {
      const failure = fail('recomputeRanks');
      if (failure !== null) return err(failure);

      const entries = entriesOf(period);
      const ranks = new Map(rankEntries(entries).map((ranked) => [ranked.userId, ranked.rank]));
      periods.set(
        period,
        entries.map((entry) => ({ ...entry, rank: ranks.get(entry.userId) ?? null }))
      );
      return ok(undefined);
    },

    async listEntries(period) {
      const failure = fail('listEntries');
      if (failure !== null) return err(failure);
      return ok(entriesOf(period).map((entry) => ({ ...entry })));
    },

    async resetScores(period) {
      const failure = fail('resetScores');
      if (failure !== null) return err(failure);
      periods.set(
        period,
        entriesOf(period).map((entry) => ({ ...entry, score: 0 }))
      );
      return ok(undefined);
    },
  };
};

// ─────────────────────────────────────────────────────────────────────────────
// Referrals
// ─────────────────────────────────────────────────────────────────────────────

export interface FakeReferralRepo extends ReferralRepository {
  /** Records by code, in creation order */
  readonly records: Map<string, ReferralRecord>;
}

export const makeFakeReferralRepo = (
  seed: readonly ReferralRecord[] = [],
  clock: () => Date = () => new Date('2024-01-01T00:00:00.000Z')
): FakeReferralRepo => {
  const records = new Map<string, ReferralRecord>(seed.map((record) => [record.code, record]));

  const byReferrer = (referrerId: UserId): ReferralRecord[] =>
    [...records.values()].filter((record) => record.referrerId === referrerId);

  return {
    records,

    async findByCode(code) {
      return ok(records.get(code) ?? null);
    },

    async findPendingByReferrer(referrerId) {
      const pending = byReferrer(referrerId).filter((record) => record.status === 'pending');
      return ok(pending[pending.length - 1] ?? null);
    },

    async create(referral): Promise<Result<ReferralRecord, DatabaseError | CodeCollisionError>> {
      if (records.has(referral.code)) {
        return err(createCodeCollisionError(referral.code));
      }
      const record: ReferralRecord = {
        ...referral,
        referredId: null,
        status: 'pending',
        createdAt: clock(),
        completedAt: null,
      };
      records.set(record.code, record);
      return ok(record);
    },

    async markCompleted(code, referredId, completedAt) {
      const record = records.get(code);
      if (record?.status !== 'pending') {
        return ok(null);
      }
      const completed: ReferralRecord = { ...record, referredId, status: 'completed', completedAt };
      records.set(code, completed);
      return ok(completed);
    },

    async countByReferrer(referrerId) {
      return ok(byReferrer(referrerId).length);
    },

    async countCompletedByReferrer(referrerId) {
      return ok(byReferrer(referrerId).filter((record) => record.status === 'completed').length);
    },
  };
};

/**
 * Referral repo whose every call fails.
 */
export const makeFailingReferralRepo = (): ReferralRepository => {
  const failure = () => err(createReferralDbError('referral store unavailable'));
  return {
    findByCode: async () => failure(),
    findPendingByReferrer: async () => failure(),
    create: async () => failure(),
    markCompleted: async () => failure(),
    countByReferrer: async () => failure(),
    countCompletedByReferrer: async () => failure(),
  };
};

/**
 * Deterministic hasher: the input, hex-encoded and padded.
 */
export const testHasher: Hasher = {
  sha256(data: string): string {
    return Buffer.from(data).toString('hex').padEnd(64, '0');
  },
};

// ─────────────────────────────────────────────────────────────────────────────
// Analytics
// ─────────────────────────────────────────────────────────────────────────────

export interface RecordedEvent extends UserEvent {
  createdAt: Date;
}

export interface FakeAnalyticsRepo extends AnalyticsRepository {
  readonly events: RecordedEvent[];
  readonly daily: Map<string, DailyMetrics>;
  failRecording: boolean;
}

/**
 * New users are counted from `user_signup` events.
 */
export const makeFakeAnalyticsRepo = (
  clock: () => Date = () => new Date()
): FakeAnalyticsRepo => {
  const events: RecordedEvent[] = [];
  const daily = new Map<string, DailyMetrics>();

  const inWindow = (event: RecordedEvent, window: { from: Date; to: Date }): boolean =>
    event.createdAt >= window.from && event.createdAt < window.to;

  const repo: FakeAnalyticsRepo = {
    events,
    daily,
    failRecording: false,

    async recordEvent(event) {
      if (repo.failRecording) {
        return err(createAnalyticsDbError('recordEvent failed'));
      }
      events.push({ ...event, createdAt: clock() });
      return ok(undefined);
    },

    async findDaily(date) {
      return ok(daily.get(date) ?? null);
    },

    async saveDaily(metrics) {
      if (daily.has(metrics.date)) return ok(false);
      daily.set(metrics.date, metrics);
      return ok(true);
    },

    async countActiveUsers(window) {
      return ok(new Set(events.filter((e) => inWindow(e, window)).map((e) => e.userId)).size);
    },

    async countNewUsers(window) {
      return ok(events.filter((e) => e.type === 'user_signup' && inWindow(e, window)).length);
    },

    async countEvents(type, window) {
      return ok(events.filter((e) => e.type === type && inWindow(e, window)).length);
    },
  };

  return repo;
};

// ─────────────────────────────────────────────────────────────────────────────
// Scam reports
// ─────────────────────────────────────────────────────────────────────────────

export interface FakeReportRepo extends ReportRepository {
  readonly reports: ScamReport[];
  failing: boolean;
}

export const makeFakeReportRepo = (
  clock: () => Date = () => new Date('2024-01-01T00:00:00.000Z')
): FakeReportRepo => {
  const repo: FakeReportRepo = {
    reports: [],
    failing: false,

    async create(report) {
      if (repo.failing) return err(createReportDbError('create failed'));
      const saved: ScamReport = {
        ...report,
        id: repo.reports.length + 1,
        status: 'new',
        createdAt: clock(),
      };
      repo.reports.push(saved);
      return ok(saved);
    },
  };
  return repo;
};

// ─────────────────────────────────────────────────────────────────────────────
// Messaging gateway
// ─────────────────────────────────────────────────────────────────────────────

export type GatewayCall =
  | { method: 'sendView'; target: DeliveryTarget; view: ViewModel }
  | { method: 'editCurrentView'; target: DeliveryTarget; view: ViewModel }
  | { method: 'answerButton'; target: DeliveryTarget; notice: string | undefined };

export interface FakeGateway extends MessagingGateway {
  readonly calls: GatewayCall[];
  failEdits: boolean;
  failSends: boolean;
  /** Chats whose sends are refused */
  readonly refusedChats: Set<number>;
  /** Text of the last view sent or edited */
  lastText(): string | undefined;
}

export const makeFakeGateway = (): FakeGateway => {
  const calls: GatewayCall[] = [];
  const refused = (message: string): GatewayError => ({
    type: 'GatewayError',
    message,
    retryable: false,
    statusCode: 400,
  });

  const gateway: FakeGateway = {
    calls,
    failEdits: false,
    failSends: false,
    refusedChats: new Set<number>(),

    async sendView(target, view) {
      calls.push({ method: 'sendView', target, view });
      return gateway.failSends || gateway.refusedChats.has(target.chatId)
        ? err(refused('send refused'))
        : ok(undefined);
    },

    async editCurrentView(target, view) {
      calls.push({ method: 'editCurrentView', target, view });
      return gateway.failEdits ? err(refused('edit refused')) : ok(undefined);
    },

    async answerButton(target, notice) {
      calls.push({ method: 'answerButton', target, notice });
      return ok(undefined);
    },

    lastText() {
      for (let index = calls.length - 1; index >= 0; index--) {
        const call = calls[index];
        if (call !== undefined && call.method !== 'answerButton') {
          return call.view.text;
        }
      }
      return undefined;
    },
  };

  return gateway;
};
