import type { RunState, StepName, ToolExecution } from './states';
import { isResolved } from './data-flow';

export interface RoutingPolicy {
  /** Tool whose results are cross-checked by the validator */
  validationTool: string;
}

export const DEFAULT_VALIDATION_TOOL = 'calculate_hypothetical_pnl';

export const DEFAULT_ROUTING_POLICY: RoutingPolicy = { validationTool: DEFAULT_VALIDATION_TOOL };

/** A successful execution of the validation tool that carries a result */
export function isValidationEligible(execution: ToolExecution, validationTool: string): boolean {
  return execution.toolName === validationTool && execution.error === undefined && typeof execution.result === 'string';
}

/** True when every subtask is completed or failed (vacuously true with no subtasks) */
export function allSubtasksResolved(state: Readonly<RunState>): boolean {
  return state.subtasks.every(isResolved);
}

/**
 * Pick the next step from the current run state. Rules are evaluated in a
 * fixed order and the first match wins; the iteration ceiling dominates.
 */
export function nextStep(state: Readonly<RunState>, policy: RoutingPolicy = DEFAULT_ROUTING_POLICY): StepName {
  if (state.iterationCount >= state.maxIterations) {
    return 'synthesize';
  }

  if (state.errorRecoveryFlag && state.retryCount < state.maxRetries) {
    return 'recover';
  }

  if (state.replanFlag) {
    return 'decompose';
  }

  const allResolved = allSubtasksResolved(state);
  if (allResolved) {
    return state.needsValidation ? 'validate' : 'synthesize';
  }

  // Validate the first batch of calculations before moving on; gated on an
  // empty validation list so it happens at most once mid-run.
  if (state.needsValidation && state.validations.length === 0 && state.toolLog.some((e) => isValidationEligible(e, policy.validationTool))) {
    return 'validate';
  }

  if (state.currentTask !== null || state.subtasks.some((st) => st.status === 'pending')) {
    return 'execute';
  }

  return 'synthesize';
}
