/**
 * Scenario Module - Public API
 */

export type {
  ScenarioChoice,
  ScenarioState,
  ScenarioConclusion,
  ScenarioStep,
  ChoiceResult,
} from './core/types.js';

export type { ScenarioError, InvalidChoiceError, ScenarioMismatchError } from './core/errors.js';

export { startScenario, resumeScenario, chooseOption } from './core/engine.js';
