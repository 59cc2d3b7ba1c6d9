/**
 * Session Module - Core Types
 *
 * Per-user ephemeral state. Never persisted; a missing session is rebuilt
 * from defaults on the next event.
 */

import { createNavStack, type NavStack } from '../../navigation/index.js';

import type { Language } from '../../content/index.js';
import type { QuizSession } from '../../quiz/index.js';
import type { ReportDraft } from '../../reports/index.js';
import type { ScenarioState } from '../../scenario/index.js';
import type { UserId } from '../../users/index.js';

export interface UserSession {
  userId: UserId;
  language: Language;
  nav: NavStack;
  quiz: QuizSession | null;
  scenario: ScenarioState | null;
  /** Scam report being typed in; while set, plain text answers its prompts */
  report: ReportDraft | null;
  /** Index of the lesson on screen */
  lesson: number | null;
}

export const createSession = (userId: UserId, language: Language): UserSession => ({
  userId,
  language,
  nav: createNavStack(),
  quiz: null,
  scenario: null,
  report: null,
  lesson: null,
});
