import { describe, expect, it } from 'vitest';

import { createKeyedMutex } from '@/common/utils/keyed-mutex.js';
import {
  adjustCoins,
  grantReward,
  recordQuizCompletion,
  type LedgerDeps,
} from '@/modules/rewards/index.js';

import { makeTestUser } from '../../fixtures/builders.js';
import { makeFakeLeaderboardRepo, makeFakeUserRepo, testLogger } from '../../fixtures/fakes.js';

import type { LeaderboardPeriod } from '@/modules/leaderboard/index.js';
import type { UserProfile } from '@/modules/users/index.js';

const setup = (users: UserProfile[] = []) => {
  const userRepo = makeFakeUserRepo(users);
  const leaderboardRepo = makeFakeLeaderboardRepo();
  const deps: LedgerDeps = {
    userRepo,
    leaderboardRepo,
    periodLock: createKeyedMutex<LeaderboardPeriod>(),
    logger: testLogger,
  };
  return { deps, userRepo, leaderboardRepo };
};

describe('grantReward', () => {
  it('credits coins, score and badge and refreshes the standings', async () => {
    const { deps, userRepo, leaderboardRepo } = setup();

    const result = await grantReward(deps, { userId: 5, coinDelta: 30, badgeId: 'phishing_hero' });

    expect(result._unsafeUnwrap()).toEqual({
      coinsGranted: 30,
      badgeGranted: 'phishing_hero',
      newScore: 30,
      allBadges: ['phishing_hero'],
    });
    expect(userRepo.users.get(5)?.coins).toBe(30);
    expect(leaderboardRepo.periods.get('all_time')).toEqual([
      { userId: 5, period: 'all_time', score: 33, rank: 1 },
    ]);
  });

  it('does not report a badge the user already holds', async () => {
    const { deps } = setup([makeTestUser({ id: 5, scenarioBadges: ['phishing_hero'], scenarioScore: 30 })]);

    const result = await grantReward(deps, { userId: 5, coinDelta: 30, badgeId: 'phishing_hero' });

    expect(result._unsafeUnwrap()).toMatchObject({ badgeGranted: null, newScore: 60 });
  });

  it('grants no coins for a non-positive delta', async () => {
    const { deps, userRepo } = setup([makeTestUser({ id: 5, coins: 40 })]);

    const result = await grantReward(deps, { userId: 5, coinDelta: -10 });

    expect(result._unsafeUnwrap().coinsGranted).toBe(0);
    expect(userRepo.users.get(5)?.coins).toBe(40);
  });

  it('succeeds when the leaderboard refresh fails', async () => {
    const { deps, userRepo, leaderboardRepo } = setup();
    leaderboardRepo.failing.add('upsertScore');

    const result = await grantReward(deps, { userId: 5, coinDelta: 30 });

    expect(result.isOk()).toBe(true);
    expect(userRepo.users.get(5)?.scenarioScore).toBe(30);
  });

  it('fails when the user store fails', async () => {
    const { deps, userRepo } = setup();
    userRepo.failing.add('applyDelta');

    const result = await grantReward(deps, { userId: 5, coinDelta: 30 });

    expect(result._unsafeUnwrapErr().type).toBe('DatabaseError');
  });
});

describe('recordQuizCompletion', () => {
  const input = { userId: 8, level: 1, totalQuestions: 5, passThreshold: 3, maxLevel: 3 };

  it('pays the perfect-score reward and unlocks the next level', async () => {
    const { deps, userRepo } = setup();

    const result = await recordQuizCompletion(deps, { ...input, correctCount: 5 });

    expect(result._unsafeUnwrap().completion).toMatchObject({ reward: 15, unlockedLevel: 2 });
    expect(userRepo.users.get(8)).toMatchObject({ coins: 15, quizzesPassed: 1, maxUnlockedLevel: 2 });
  });

  it('counts a pass at the threshold without unlocking', async () => {
    const { deps, userRepo } = setup();

    await recordQuizCompletion(deps, { ...input, correctCount: 3 });

    expect(userRepo.users.get(8)).toMatchObject({ coins: 10, quizzesPassed: 1, maxUnlockedLevel: 1 });
  });

  it('pays the base reward for a failed attempt', async () => {
    const { deps, userRepo } = setup();

    await recordQuizCompletion(deps, { ...input, correctCount: 2 });

    expect(userRepo.users.get(8)).toMatchObject({ coins: 10, quizzesPassed: 0 });
  });
});

describe('adjustCoins', () => {
  it('credits and reports the new balance', async () => {
    const { deps } = setup([makeTestUser({ id: 3, coins: 5 })]);

    const result = await adjustCoins(deps, { userId: 3, delta: 20 });

    expect(result._unsafeUnwrap()).toEqual({ delta: 20, balance: 25 });
  });

  it('refuses a spend larger than the balance', async () => {
    const { deps, userRepo } = setup([makeTestUser({ id: 3, coins: 10 })]);

    const result = await adjustCoins(deps, { userId: 3, delta: -20 });

    expect(result._unsafeUnwrapErr()).toMatchObject({
      type: 'InsufficientCoinsError',
      required: 20,
      balance: 10,
    });
    expect(userRepo.users.get(3)?.coins).toBe(10);
  });
});
