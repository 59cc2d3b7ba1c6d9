/**
 * Open, back, home and language actions.
 */

import { ok, err } from 'neverthrow';

import { turn, type TurnContext, type TurnResult } from './context.js';
import { openView, renderCurrent } from './render.js';
import { renderMainMenu } from '../views.js';
import { popFrame, resetStack } from '../../../navigation/index.js';

import type { OpenableView } from '../actions.js';
import type { Language } from '../../../content/index.js';
import type { LeaderboardPeriod } from '../../../leaderboard/index.js';
import type { UserSession } from '../../../session/index.js';

export async function handleOpen(ctx: TurnContext, view: OpenableView): Promise<TurnResult> {
  const result = await openView(ctx, ctx.session, view);
  if (result.isErr()) return err(result.error);
  return ok(turn(result.value.session, result.value.view));
}

/**
 * Pops one frame and renders the new top. Leaving a quiz question, a scenario
 * node or a report prompt abandons it. Back from the root re-renders the main menu.
 */
export async function handleBack(ctx: TurnContext): Promise<TurnResult> {
  const { stack, popped } = popFrame(ctx.session.nav);

  const session: UserSession = {
    ...ctx.session,
    nav: stack,
    ...(popped?.view === 'quiz_question' && { quiz: null }),
    ...(popped?.view === 'scenario_play' && { scenario: null }),
    ...(popped?.view === 'report' && { report: null }),
    ...(popped?.view === 'lesson' && { lesson: null }),
  };

  const result = await renderCurrent(ctx, session);
  if (result.isErr()) return err(result.error);
  return ok(turn(result.value.session, result.value.view));
}

export function handleHome(ctx: TurnContext, greeting?: string): TurnResult {
  const session: UserSession = {
    ...ctx.session,
    nav: resetStack(),
    quiz: null,
    scenario: null,
    report: null,
    lesson: null,
  };
  return ok(turn(session, renderMainMenu(greeting)));
}

export async function handleLeaderboardPeriod(
  ctx: TurnContext,
  period: LeaderboardPeriod
): Promise<TurnResult> {
  const result = await openView(ctx, ctx.session, 'leaderboard', { period });
  if (result.isErr()) return err(result.error);
  return ok(turn(result.value.session, result.value.view));
}

export async function handleSetLanguage(
  ctx: TurnContext,
  language: Language
): Promise<TurnResult> {
  const result = await openView(ctx, { ...ctx.session, language }, 'language');
  if (result.isErr()) return err(result.error);
  return ok(turn(result.value.session, result.value.view, 'Language updated'));
}
