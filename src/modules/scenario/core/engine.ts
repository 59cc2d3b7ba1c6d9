/**
 * Scenario Dialogue Engine
 *
 * NodeActive(nodeId) → NodeActive(next) → Terminal
 *
 * A `next` that is null or names no node ends the walk with a synthetic `fail`
 * whose text is the chosen option's feedback.
 */

import { ok, err, type Result } from 'neverthrow';

import {
  createInvalidChoiceError,
  createScenarioMismatchError,
  type ScenarioError,
} from './errors.js';

import type { ChoiceResult, ScenarioChoice, ScenarioConclusion, ScenarioState, ScenarioStep } from './types.js';
import type { Scenario, ScenarioNode, ScenarioOutcome } from '../../content/index.js';

const getNode = (scenario: Scenario, nodeId: string): ScenarioNode | undefined =>
  Object.hasOwn(scenario.nodes, nodeId) ? scenario.nodes[nodeId] : undefined;

const conclude = (
  scenario: Scenario,
  outcome: ScenarioOutcome,
  text: string,
  history: readonly ScenarioChoice[],
  synthetic: boolean
): ScenarioConclusion => {
  const success = outcome === 'success';
  return {
    scenarioId: scenario.id,
    outcome,
    text,
    reward: success ? scenario.reward : 0,
    badge: success ? scenario.badge : null,
    history,
    synthetic,
  };
};

/**
 * Resolves a node id into the next step of the walk.
 */
const enterNode = (
  scenario: Scenario,
  nodeId: string | null,
  history: readonly ScenarioChoice[],
  fallbackText: string
): ScenarioStep => {
  const node = nodeId !== null ? getNode(scenario, nodeId) : undefined;

  if (nodeId === null || node === undefined) {
    return {
      kind: 'concluded',
      conclusion: conclude(scenario, 'fail', fallbackText, history, true),
    };
  }

  if (node.kind === 'terminal') {
    return {
      kind: 'concluded',
      conclusion: conclude(scenario, node.outcome, node.text, history, false),
    };
  }

  return {
    kind: 'node',
    nodeId,
    node,
    state: { scenarioId: scenario.id, currentNodeId: nodeId, history },
  };
};

/**
 * Enters the declared start node.
 */
export const startScenario = (scenario: Scenario): ScenarioStep =>
  enterNode(scenario, scenario.start, [], scenario.intro);

/**
 * Re-renders the active node of a walk, e.g. after "back".
 */
export const resumeScenario = (scenario: Scenario, state: ScenarioState): ScenarioStep =>
  enterNode(scenario, state.currentNodeId, state.history, scenario.intro);

/**
 * Applies option `optionIndex` of node `nodeId`. The node must be the active one.
 */
export const chooseOption = (
  scenario: Scenario,
  state: ScenarioState,
  nodeId: string,
  optionIndex: number
): Result<ChoiceResult, ScenarioError> => {
  if (state.scenarioId !== scenario.id) {
    return err(createScenarioMismatchError(scenario.id, state.scenarioId));
  }
  if (nodeId !== state.currentNodeId) {
    return err(createInvalidChoiceError(nodeId, optionIndex, 'node is not active'));
  }

  const node = getNode(scenario, nodeId);
  if (node === undefined || node.kind !== 'decision') {
    return err(createInvalidChoiceError(nodeId, optionIndex, 'node has no options'));
  }

  const choice = node.options[optionIndex];
  if (choice === undefined) {
    return err(createInvalidChoiceError(nodeId, optionIndex, 'option unavailable'));
  }

  const history: ScenarioChoice[] = [
    ...state.history,
    { nodeId, chosenOptionLabel: choice.label, impact: choice.impact },
  ];

  return ok({ choice, step: enterNode(scenario, choice.next, history, choice.feedback) });
};
