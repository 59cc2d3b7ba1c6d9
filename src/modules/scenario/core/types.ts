/**
 * Scenario Module - Core Types
 */

import type {
  DecisionNode,
  Impact,
  ScenarioOption,
  ScenarioOutcome,
} from '../../content/index.js';

export interface ScenarioChoice {
  readonly nodeId: string;
  readonly chosenOptionLabel: string;
  readonly impact: Impact;
}

/**
 * Active walk through one scenario graph. Lives in the user's session only.
 */
export interface ScenarioState {
  readonly scenarioId: string;
  readonly currentNodeId: string;
  readonly history: readonly ScenarioChoice[];
}

export interface ScenarioConclusion {
  scenarioId: string;
  outcome: ScenarioOutcome;
  text: string;
  /** Coins granted for this walk; non-zero only on success */
  reward: number;
  /** Badge granted for this walk; only on success */
  badge: string | null;
  history: readonly ScenarioChoice[];
  /** True when the walk ended on a missing node instead of a terminal node */
  synthetic: boolean;
}

/**
 * Result of entering or advancing a scenario.
 */
export type ScenarioStep =
  | { kind: 'node'; state: ScenarioState; nodeId: string; node: DecisionNode }
  | { kind: 'concluded'; conclusion: ScenarioConclusion };

export interface ChoiceResult {
  /** The option the user picked, for echoing its feedback */
  choice: ScenarioOption;
  step: ScenarioStep;
}
