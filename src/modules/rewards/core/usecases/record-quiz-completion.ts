/**
 * Record Quiz Completion Use Case
 *
 * Applies the reward, pass count and unlock of a finished attempt in one update.
 */

import { ok, err, type Result } from 'neverthrow';

import { refreshStandings, type LedgerDeps } from './refresh-standings.js';
import { evaluateCompletion } from '../../../quiz/index.js';
import { createUserNotFoundError, type RewardError } from '../errors.js';

import type { QuizCompletionRecord } from '../types.js';
import type { ProgressDelta, UserId } from '../../../users/index.js';

export interface RecordQuizCompletionInput {
  userId: UserId;
  level: number;
  correctCount: number;
  totalQuestions: number;
  passThreshold: number;
  maxLevel: number;
}

export async function recordQuizCompletion(
  deps: LedgerDeps,
  input: RecordQuizCompletionInput
): Promise<Result<QuizCompletionRecord, RewardError>> {
  const { userRepo, logger } = deps;

  const ensured = await userRepo.ensureUser(input.userId);
  if (ensured.isErr()) {
    return err(ensured.error);
  }

  const completion = evaluateCompletion({
    level: input.level,
    correctCount: input.correctCount,
    totalQuestions: input.totalQuestions,
    passThreshold: input.passThreshold,
    maxLevel: input.maxLevel,
    currentMaxUnlockedLevel: ensured.value.user.maxUnlockedLevel,
  });

  const delta: ProgressDelta = {
    coins: completion.reward,
    ...(completion.passed && { quizzesPassed: 1 }),
    ...(completion.unlockedLevel !== null && { unlockLevel: completion.unlockedLevel }),
  };

  const applied = await userRepo.applyDelta(input.userId, delta);
  if (applied.isErr()) {
    return err(applied.error);
  }
  if (applied.value === null) {
    return err(createUserNotFoundError(input.userId));
  }

  logger.info(
    {
      userId: input.userId,
      level: completion.level,
      correct: completion.correctCount,
      total: completion.totalQuestions,
      passed: completion.passed,
      unlockedLevel: completion.unlockedLevel,
    },
    'Quiz completion recorded'
  );

  await refreshStandings(deps, input.userId);

  return ok({ completion, user: applied.value });
}
