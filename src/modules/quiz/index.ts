/**
 * Quiz Module - Public API
 */

export type {
  QuizSession,
  SelectLevelInput,
  LevelSelection,
  AnswerOutcome,
  CompletionInput,
  QuizCompletion,
} from './core/types.js';
export { BASE_QUIZ_REWARD, PERFECT_SCORE_BONUS } from './core/types.js';

export type { QuizError, InvalidAnswerError, QuestionOutOfRangeError } from './core/errors.js';

export { selectLevel, currentQuestion, submitAnswer, evaluateCompletion } from './core/machine.js';
