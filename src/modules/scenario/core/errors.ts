/**
 * Scenario Module - Domain Errors
 */

/**
 * A button from an earlier node was pressed, or the option index is out of range.
 */
export interface InvalidChoiceError {
  readonly type: 'InvalidChoiceError';
  readonly message: string;
  readonly nodeId: string;
  readonly optionIndex: number;
}

export interface ScenarioMismatchError {
  readonly type: 'ScenarioMismatchError';
  readonly message: string;
  readonly expected: string;
  readonly actual: string;
}

export type ScenarioError = InvalidChoiceError | ScenarioMismatchError;

export const createInvalidChoiceError = (
  nodeId: string,
  optionIndex: number,
  reason: string
): InvalidChoiceError => ({
  type: 'InvalidChoiceError',
  message: `Invalid choice ${String(optionIndex)} at node '${nodeId}': ${reason}`,
  nodeId,
  optionIndex,
});

export const createScenarioMismatchError = (
  expected: string,
  actual: string
): ScenarioMismatchError => ({
  type: 'ScenarioMismatchError',
  message: `Scenario state belongs to '${actual}', not '${expected}'`,
  expected,
  actual,
});
