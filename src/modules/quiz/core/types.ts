/**
 * Quiz Module - Core Types
 *
 * A quiz attempt is a value: handlers receive the current session and get back
 * the next state or an outcome to render.
 */

import type { QuizQuestion } from '../../content/index.js';

export const BASE_QUIZ_REWARD = 10;
export const PERFECT_SCORE_BONUS = 5;

/**
 * In-progress attempt. Lives in the user's session only.
 */
export interface QuizSession {
  readonly level: number;
  readonly questionIndex: number;
  readonly correctCount: number;
}

// ─────────────────────────────────────────────────────────────────────────────
// Level selection
// ─────────────────────────────────────────────────────────────────────────────

export interface SelectLevelInput {
  level: number;
  maxUnlockedLevel: number;
  availableLevels: readonly number[];
  questions: readonly QuizQuestion[];
}

export type LevelSelection =
  | { kind: 'started'; session: QuizSession; question: QuizQuestion; totalQuestions: number }
  | { kind: 'locked'; level: number; maxUnlockedLevel: number }
  | { kind: 'unavailable'; level: number }
  | { kind: 'no_questions'; level: number };

// ─────────────────────────────────────────────────────────────────────────────
// Answering
// ─────────────────────────────────────────────────────────────────────────────

export type AnswerOutcome =
  | {
      kind: 'next';
      wasCorrect: boolean;
      session: QuizSession;
      question: QuizQuestion;
      totalQuestions: number;
    }
  | {
      kind: 'completed';
      wasCorrect: boolean;
      level: number;
      correctCount: number;
      totalQuestions: number;
    };

// ─────────────────────────────────────────────────────────────────────────────
// Completion
// ─────────────────────────────────────────────────────────────────────────────

export interface CompletionInput {
  level: number;
  correctCount: number;
  totalQuestions: number;
  passThreshold: number;
  /** Highest level in the catalog */
  maxLevel: number;
  currentMaxUnlockedLevel: number;
}

export interface QuizCompletion {
  level: number;
  correctCount: number;
  totalQuestions: number;
  passed: boolean;
  perfect: boolean;
  reward: number;
  /** Level unlocked by this attempt, null when nothing new was unlocked */
  unlockedLevel: number | null;
}
