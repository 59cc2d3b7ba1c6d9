/**
 * Scenario actions: starting a walk and picking options.
 */

import { ok, err } from 'neverthrow';

import { toStoreError, track, turn, type TurnContext, type TurnResult } from './context.js';
import { createInvalidSelectionError } from '../errors.js';
import { renderScenarioConclusion, renderScenarioNode } from '../views.js';
import { pushFrame, replaceTop } from '../../../navigation/index.js';
import { grantReward, type RewardGrant } from '../../../rewards/index.js';
import {
  chooseOption,
  startScenario,
  type ScenarioConclusion,
} from '../../../scenario/index.js';

import type { UserSession } from '../../../session/index.js';

/**
 * Pays out a successful walk and renders the conclusion. The scenario state is
 * dropped and the navigation top becomes the scenario menu.
 */
async function concludeScenario(
  ctx: TurnContext,
  session: UserSession,
  conclusion: ScenarioConclusion,
  feedback?: string
): Promise<TurnResult> {
  let grant: RewardGrant | null = null;

  if (conclusion.outcome === 'success' && conclusion.reward > 0) {
    const granted = await grantReward(ctx.deps.ledger, {
      userId: ctx.user.id,
      coinDelta: conclusion.reward,
      ...(conclusion.badge !== null && { badgeId: conclusion.badge }),
    });
    if (granted.isErr()) {
      return err(toStoreError(granted.error));
    }
    grant = granted.value;
  }

  await track(ctx, 'scenario_complete', {
    scenarioId: conclusion.scenarioId,
    outcome: conclusion.outcome,
    choices: conclusion.history.length,
  });

  return ok(
    turn(
      { ...session, scenario: null, nav: replaceTop(session.nav, 'scenario_menu') },
      renderScenarioConclusion(conclusion, grant, feedback)
    )
  );
}

export async function handleScenarioStart(
  ctx: TurnContext,
  scenarioId: string
): Promise<TurnResult> {
  const { session } = ctx;
  const scenario = ctx.deps.content.getScenario(session.language, scenarioId);
  if (scenario === null) {
    return ok(turn(session, null, 'This scenario is no longer available.'));
  }

  await track(ctx, 'scenario_start', { scenarioId });

  const opened: UserSession = { ...session, nav: pushFrame(session.nav, 'scenario_play') };
  const step = startScenario(scenario);
  if (step.kind === 'concluded') {
    return concludeScenario(ctx, opened, step.conclusion);
  }

  return ok(
    turn({ ...opened, scenario: step.state }, renderScenarioNode(scenario, step.nodeId, step.node))
  );
}

export async function handleScenarioPick(
  ctx: TurnContext,
  nodeId: string,
  optionIndex: number,
  rawInput: string
): Promise<TurnResult> {
  const { session } = ctx;
  const state = session.scenario;
  if (state === null) {
    return err(createInvalidSelectionError(rawInput, 'no scenario in progress'));
  }

  const scenario = ctx.deps.content.getScenario(session.language, state.scenarioId);
  if (scenario === null) {
    return ok(
      turn(
        { ...session, scenario: null, nav: replaceTop(session.nav, 'scenario_menu') },
        null,
        'This scenario is no longer available.'
      )
    );
  }

  const chosen = chooseOption(scenario, state, nodeId, optionIndex);
  if (chosen.isErr()) {
    return err(createInvalidSelectionError(rawInput, chosen.error.message));
  }

  const { choice, step } = chosen.value;
  if (step.kind === 'concluded') {
    // A synthetic ending already shows the option feedback as its text
    const echo = step.conclusion.synthetic ? undefined : choice.feedback;
    return concludeScenario(ctx, session, step.conclusion, echo);
  }

  return ok(
    turn(
      { ...session, scenario: step.state },
      renderScenarioNode(scenario, step.nodeId, step.node, choice.feedback)
    )
  );
}
