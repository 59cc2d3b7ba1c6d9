/**
 * Quiz State Machine
 *
 * LevelSelect → InProgress(level, questionIndex) → Completed
 */

import { ok, err, type Result } from 'neverthrow';

import {
  createInvalidAnswerError,
  createQuestionOutOfRangeError,
  type QuizError,
} from './errors.js';
import {
  BASE_QUIZ_REWARD,
  PERFECT_SCORE_BONUS,
  type AnswerOutcome,
  type CompletionInput,
  type LevelSelection,
  type QuizCompletion,
  type QuizSession,
  type SelectLevelInput,
} from './types.js';

import type { QuizQuestion } from '../../content/index.js';

/**
 * Starts an attempt at a level, or explains why it cannot start.
 */
export const selectLevel = (input: SelectLevelInput): LevelSelection => {
  const { level, maxUnlockedLevel, availableLevels, questions } = input;

  if (!availableLevels.includes(level)) {
    return { kind: 'unavailable', level };
  }
  if (level > maxUnlockedLevel) {
    return { kind: 'locked', level, maxUnlockedLevel };
  }

  const first = questions[0];
  if (first === undefined) {
    return { kind: 'no_questions', level };
  }

  return {
    kind: 'started',
    session: { level, questionIndex: 0, correctCount: 0 },
    question: first,
    totalQuestions: questions.length,
  };
};

/**
 * Question the session currently points at.
 */
export const currentQuestion = (
  session: QuizSession,
  questions: readonly QuizQuestion[]
): QuizQuestion | null => questions[session.questionIndex] ?? null;

/**
 * Scores one answer and advances. An out-of-range option leaves the session as it was.
 */
export const submitAnswer = (
  session: QuizSession,
  questions: readonly QuizQuestion[],
  optionIndex: number
): Result<AnswerOutcome, QuizError> => {
  const question = currentQuestion(session, questions);
  if (question === null) {
    return err(createQuestionOutOfRangeError(session.questionIndex));
  }
  if (!Number.isInteger(optionIndex) || optionIndex < 0 || optionIndex >= question.options.length) {
    return err(createInvalidAnswerError(optionIndex, question.options.length));
  }

  const wasCorrect = optionIndex === question.correctOptionIndex;
  const correctCount = session.correctCount + (wasCorrect ? 1 : 0);
  const questionIndex = session.questionIndex + 1;

  const next = questions[questionIndex];
  if (next === undefined) {
    return ok({
      kind: 'completed',
      wasCorrect,
      level: session.level,
      correctCount,
      totalQuestions: questions.length,
    });
  }

  return ok({
    kind: 'next',
    wasCorrect,
    session: { level: session.level, questionIndex, correctCount },
    question: next,
    totalQuestions: questions.length,
  });
};

/**
 * Pass, reward and unlock rules for a finished attempt.
 */
export const evaluateCompletion = (input: CompletionInput): QuizCompletion => {
  const { level, correctCount, totalQuestions, passThreshold, maxLevel, currentMaxUnlockedLevel } =
    input;

  const perfect = totalQuestions > 0 && correctCount === totalQuestions;
  const passed = correctCount >= passThreshold;
  const reward = BASE_QUIZ_REWARD + (perfect ? PERFECT_SCORE_BONUS : 0);

  const candidate = level + 1;
  const unlockedLevel =
    perfect && level < maxLevel && candidate > currentMaxUnlockedLevel ? candidate : null;

  return { level, correctCount, totalQuestions, passed, perfect, reward, unlockedLevel };
};
