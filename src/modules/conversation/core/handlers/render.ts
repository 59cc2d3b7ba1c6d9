/**
 * Renders whatever view sits on top of the session's navigation stack.
 */

import { ok, err, type Result } from 'neverthrow';

import { toStoreError, type TurnContext } from './context.js';
import {
  renderBalance,
  renderEducation,
  renderHelp,
  renderLanguage,
  renderLeaderboard,
  renderLesson,
  renderMainMenu,
  renderQuizLevels,
  renderQuizQuestion,
  renderReferral,
  renderReportPrompt,
  renderScenarioMenu,
  renderScenarioNode,
  renderShop,
  renderTips,
} from '../views.js';
import {
  DEFAULT_LEADERBOARD_LIMIT,
  getLeaderboard,
  rebuildLeaderboard,
  type LeaderboardPeriod,
  type LeaderboardStandings,
} from '../../../leaderboard/index.js';
import {
  peekFrame,
  popFrame,
  pushFrame,
  replaceTop,
  type ViewId,
} from '../../../navigation/index.js';
import { currentQuestion } from '../../../quiz/index.js';
import { MILESTONE_BONUS, SIGNUP_BONUS, getReferralStats } from '../../../referral/index.js';
import { HINT_PRICE } from '../../../rewards/index.js';
import { resumeScenario } from '../../../scenario/index.js';

import type { ConversationError } from '../errors.js';
import type { ViewModel } from '../types.js';
import type { UserSession } from '../../../session/index.js';

export interface RenderedView {
  session: UserSession;
  view: ViewModel;
}

export interface RenderOptions {
  period?: LeaderboardPeriod;
}

type RenderResult = Result<RenderedView, ConversationError>;

const rendered = (session: UserSession, view: ViewModel): RenderResult => ok({ session, view });

/**
 * Loads standings, ranking every known user first when the board is still empty.
 */
export async function loadStandings(
  ctx: TurnContext,
  period: LeaderboardPeriod
): Promise<Result<LeaderboardStandings, ConversationError>> {
  const { ledger } = ctx.deps;
  const input = { period, limit: DEFAULT_LEADERBOARD_LIMIT, requestingUserId: ctx.user.id };

  const first = await getLeaderboard(ledger, input);
  if (first.isErr()) return err(toStoreError(first.error));
  if (first.value.totalPlayers > 0) return ok(first.value);

  const rebuilt = await rebuildLeaderboard(ledger);
  if (rebuilt.isErr()) return err(toStoreError(rebuilt.error));
  if (rebuilt.value.usersRanked === 0) return ok(first.value);

  const second = await getLeaderboard(ledger, input);
  if (second.isErr()) return err(toStoreError(second.error));
  return ok(second.value);
}

export async function renderCurrent(
  ctx: TurnContext,
  session: UserSession,
  options: RenderOptions = {}
): Promise<RenderResult> {
  const { content, settings } = ctx.deps;
  const { user } = ctx;
  const view = peekFrame(session.nav).view;

  switch (view) {
    case 'main_menu':
      return rendered(session, renderMainMenu());

    case 'tips':
      return rendered(session, renderTips(content.getTips(session.language)));

    case 'quiz_levels':
      return rendered(session, renderQuizLevels(content.listLevels(), user.maxUnlockedLevel));

    case 'quiz_question': {
      const quiz = session.quiz;
      const questions = quiz !== null ? content.getQuestions(session.language, quiz.level) : [];
      const question = quiz !== null ? currentQuestion(quiz, questions) : null;
      if (quiz === null || question === null) {
        return renderCurrent(ctx, {
          ...session,
          quiz: null,
          nav: replaceTop(session.nav, 'quiz_levels'),
        });
      }
      return rendered(session, renderQuizQuestion(quiz, question, questions.length));
    }

    case 'scenario_menu':
      return rendered(session, renderScenarioMenu(content.listScenarios(session.language)));

    case 'scenario_play': {
      const state = session.scenario;
      const scenario =
        state !== null ? content.getScenario(session.language, state.scenarioId) : null;
      const step = state !== null && scenario !== null ? resumeScenario(scenario, state) : null;
      if (scenario === null || step === null || step.kind !== 'node') {
        return renderCurrent(ctx, {
          ...session,
          scenario: null,
          nav: replaceTop(session.nav, 'scenario_menu'),
        });
      }
      return rendered(session, renderScenarioNode(scenario, step.nodeId, step.node));
    }

    case 'balance':
      return rendered(session, renderBalance(user));

    case 'shop':
      return rendered(session, renderShop(user.coins, HINT_PRICE));

    case 'leaderboard': {
      const standings = await loadStandings(ctx, options.period ?? 'all_time');
      if (standings.isErr()) return err(standings.error);
      return rendered(session, renderLeaderboard(standings.value));
    }

    case 'referral': {
      const stats = await getReferralStats(ctx.deps.referrals, { userId: user.id });
      if (stats.isErr()) return err(toStoreError(stats.error));
      return rendered(
        session,
        renderReferral(stats.value, settings.botUsername, SIGNUP_BONUS, MILESTONE_BONUS)
      );
    }

    case 'language':
      return rendered(session, renderLanguage(session.language));

    case 'help':
      return rendered(session, renderHelp());

    case 'education':
      return rendered(session, renderEducation(content.listLessons(session.language)));

    case 'lesson': {
      const lessons = content.listLessons(session.language);
      const index = session.lesson;
      const lesson = index !== null ? lessons[index] : undefined;
      if (index === null || lesson === undefined) {
        return renderCurrent(ctx, {
          ...session,
          lesson: null,
          nav: replaceTop(session.nav, 'education'),
        });
      }
      return rendered(session, renderLesson(lesson, index, lessons.length));
    }

    case 'report': {
      const draft = session.report;
      if (draft === null) {
        return renderCurrent(ctx, { ...session, nav: popFrame(session.nav).stack });
      }
      return rendered(session, renderReportPrompt(draft.stage));
    }

    default: {
      const unhandled: never = view;
      return rendered(session, renderHelp(`Unknown view ${String(unhandled)}`));
    }
  }
}

/**
 * Pushes `view` and renders it.
 */
export const openView = (
  ctx: TurnContext,
  session: UserSession,
  view: ViewId,
  options: RenderOptions = {}
): Promise<RenderResult> =>
  renderCurrent(ctx, { ...session, nav: pushFrame(session.nav, view) }, options);
