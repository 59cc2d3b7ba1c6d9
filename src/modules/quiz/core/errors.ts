/**
 * Quiz Module - Domain Errors
 */

/**
 * The chosen option does not exist for the current question.
 */
export interface InvalidAnswerError {
  readonly type: 'InvalidAnswerError';
  readonly message: string;
  readonly optionIndex: number;
  readonly optionCount: number;
}

/**
 * The session points past the question list, e.g. content changed mid-attempt.
 */
export interface QuestionOutOfRangeError {
  readonly type: 'QuestionOutOfRangeError';
  readonly message: string;
  readonly questionIndex: number;
}

export type QuizError = InvalidAnswerError | QuestionOutOfRangeError;

export const createInvalidAnswerError = (
  optionIndex: number,
  optionCount: number
): InvalidAnswerError => ({
  type: 'InvalidAnswerError',
  message: `Option ${String(optionIndex)} is not one of ${String(optionCount)} options`,
  optionIndex,
  optionCount,
});

export const createQuestionOutOfRangeError = (questionIndex: number): QuestionOutOfRangeError => ({
  type: 'QuestionOutOfRangeError',
  message: `Question ${String(questionIndex)} does not exist`,
  questionIndex,
});
