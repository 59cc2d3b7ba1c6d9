/**
 * Quiz actions: level selection and answers.
 */

import { ok, err } from 'neverthrow';

import { toStoreError, track, turn, type TurnContext, type TurnResult } from './context.js';
import { createInvalidSelectionError } from '../errors.js';
import { answerFeedback, renderQuizQuestion, renderQuizResult } from '../views.js';
import { pushFrame, replaceTop } from '../../../navigation/index.js';
import { currentQuestion, selectLevel, submitAnswer } from '../../../quiz/index.js';
import { recordQuizCompletion } from '../../../rewards/index.js';

export async function handleQuizLevel(ctx: TurnContext, level: number): Promise<TurnResult> {
  const { content } = ctx.deps;
  const { session, user } = ctx;

  const selection = selectLevel({
    level,
    maxUnlockedLevel: user.maxUnlockedLevel,
    availableLevels: content.listLevels(),
    questions: content.getQuestions(session.language, level),
  });

  switch (selection.kind) {
    case 'unavailable':
      return ok(turn(session, null, `Level ${String(level)} is not available.`));
    case 'locked':
      return ok(
        turn(
          session,
          null,
          `Level ${String(level)} is locked. Score perfectly on level ${String(level - 1)} to unlock it.`
        )
      );
    case 'no_questions':
      return ok(turn(session, null, `There are no questions for level ${String(level)} yet.`));
    case 'started': {
      await track(ctx, 'quiz_level_start', { level });
      return ok(
        turn(
          {
            ...session,
            quiz: selection.session,
            nav: pushFrame(session.nav, 'quiz_question'),
          },
          renderQuizQuestion(selection.session, selection.question, selection.totalQuestions)
        )
      );
    }
    default: {
      const unhandled: never = selection;
      return ok(turn(session, null, String(unhandled)));
    }
  }
}

export async function handleQuizAnswer(
  ctx: TurnContext,
  questionIndex: number,
  optionIndex: number,
  rawInput: string
): Promise<TurnResult> {
  const { content, ledger, settings } = ctx.deps;
  const { session, user } = ctx;

  const quiz = session.quiz;
  if (quiz === null) {
    return err(createInvalidSelectionError(rawInput, 'no quiz in progress'));
  }
  if (quiz.questionIndex !== questionIndex) {
    return err(createInvalidSelectionError(rawInput, 'question already answered'));
  }

  const questions = content.getQuestions(session.language, quiz.level);
  const answered = currentQuestion(quiz, questions);
  const outcome = submitAnswer(quiz, questions, optionIndex);
  if (outcome.isErr() || answered === null) {
    return err(
      createInvalidSelectionError(rawInput, outcome.isErr() ? outcome.error.message : 'no question')
    );
  }

  const step = outcome.value;
  const feedback = answerFeedback(answered, step.wasCorrect);

  if (step.kind === 'next') {
    return ok(
      turn(
        { ...session, quiz: step.session },
        renderQuizQuestion(step.session, step.question, step.totalQuestions, feedback)
      )
    );
  }

  const recorded = await recordQuizCompletion(ledger, {
    userId: user.id,
    level: step.level,
    correctCount: step.correctCount,
    totalQuestions: step.totalQuestions,
    passThreshold: settings.quizPassThreshold,
    maxLevel: content.maxLevel(),
  });
  if (recorded.isErr()) {
    return err(toStoreError(recorded.error));
  }

  const { completion, user: updated } = recorded.value;
  await track(ctx, 'quiz_complete', {
    level: completion.level,
    correct: completion.correctCount,
    total: completion.totalQuestions,
    passed: completion.passed,
  });

  return ok(
    turn(
      { ...session, quiz: null, nav: replaceTop(session.nav, 'quiz_levels') },
      renderQuizResult(completion, updated.coins, settings.quizPassThreshold, feedback)
    )
  );
}
