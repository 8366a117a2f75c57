import { nextStep, isValidationEligible, allSubtasksResolved, DEFAULT_VALIDATION_TOOL } from '../../../src/orchestrator/router';
import { createSubtask, createToolExecution } from '../../../src/orchestrator/data-flow';
import type { Subtask } from '../../../src/orchestrator/states';
import { createState, FIXED_NOW } from '../../helpers/fakes';

function subtask(id: string, status: Subtask['status']): Subtask {
  return { ...createSubtask(id, `do ${id}`, ['get_account_pnl']), status };
}

const calcExecution = createToolExecution({ toolName: DEFAULT_VALIDATION_TOOL, arguments: { hierarchy: 'FHC' }, subtaskId: 'task_1', timestamp: FIXED_NOW, result: '1250.00' });

describe('nextStep', () => {
  it('synthesizes once the iteration ceiling is reached, whatever else is pending', () => {
    const state = createState({
      iterationCount: 15,
      maxIterations: 15,
      errorRecoveryFlag: true,
      replanFlag: true,
      subtasks: [subtask('task_1', 'pending')],
    });
    expect(nextStep(state)).toBe('synthesize');
  });

  it('recovers while the error flag is set and retries remain', () => {
    const state = createState({ errorRecoveryFlag: true, retryCount: 2, maxRetries: 3, subtasks: [subtask('task_1', 'failed')] });
    expect(nextStep(state)).toBe('recover');
  });

  it('skips recovery once retries are exhausted', () => {
    const state = createState({ errorRecoveryFlag: true, retryCount: 3, maxRetries: 3, subtasks: [subtask('task_1', 'failed'), subtask('task_2', 'pending')], currentTask: 'task_2' });
    expect(nextStep(state)).toBe('execute');
  });

  it('decomposes again when a replan is requested', () => {
    const state = createState({ replanFlag: true, subtasks: [subtask('task_1', 'failed')] });
    expect(nextStep(state)).toBe('decompose');
  });

  it('validates when everything is resolved and validation is needed', () => {
    const state = createState({ needsValidation: true, subtasks: [subtask('task_1', 'completed')], toolLog: [calcExecution] });
    expect(nextStep(state)).toBe('validate');
  });

  it('synthesizes when everything is resolved and no validation is needed', () => {
    const state = createState({ subtasks: [subtask('task_1', 'completed'), subtask('task_2', 'failed')] });
    expect(nextStep(state)).toBe('synthesize');
  });

  it('synthesizes immediately with no subtasks at all', () => {
    expect(nextStep(createState())).toBe('synthesize');
  });

  it('validates mid-run only for the first batch of calculations', () => {
    const base = createState({
      needsValidation: true,
      subtasks: [subtask('task_1', 'completed'), subtask('task_2', 'pending')],
      currentTask: 'task_2',
      toolLog: [calcExecution],
    });
    expect(nextStep(base)).toBe('validate');

    const alreadyValidated = { ...base, validations: [{ isValid: true, confidence: 0.95, issues: [], crossCheck: {}, toolLogIndex: 0 }] };
    expect(nextStep(alreadyValidated)).toBe('execute');
  });

  it('executes while a subtask is pending', () => {
    const state = createState({ subtasks: [subtask('task_1', 'completed'), subtask('task_2', 'pending')], currentTask: null });
    expect(nextStep(state)).toBe('execute');
  });

  it('honours a custom validation tool', () => {
    const state = createState({
      needsValidation: true,
      subtasks: [subtask('task_1', 'completed'), subtask('task_2', 'pending')],
      toolLog: [createToolExecution({ toolName: 'price_bond', arguments: {}, subtaskId: 'task_1', timestamp: FIXED_NOW, result: '99.5' })],
    });
    expect(nextStep(state)).toBe('execute');
    expect(nextStep(state, { validationTool: 'price_bond' })).toBe('validate');
  });
});

describe('isValidationEligible', () => {
  it('accepts only successful executions of the validation tool', () => {
    expect(isValidationEligible(calcExecution, DEFAULT_VALIDATION_TOOL)).toBe(true);
    expect(isValidationEligible(calcExecution, 'other_tool')).toBe(false);

    const failed = createToolExecution({ toolName: DEFAULT_VALIDATION_TOOL, arguments: {}, subtaskId: 'task_1', timestamp: FIXED_NOW, error: 'boom' });
    expect(isValidationEligible(failed, DEFAULT_VALIDATION_TOOL)).toBe(false);
  });
});

describe('allSubtasksResolved', () => {
  it('is vacuously true without subtasks', () => {
    expect(allSubtasksResolved(createState())).toBe(true);
  });

  it('is false while anything is in progress', () => {
    expect(allSubtasksResolved(createState({ subtasks: [subtask('task_1', 'completed'), subtask('task_2', 'in_progress')] }))).toBe(false);
  });
});
