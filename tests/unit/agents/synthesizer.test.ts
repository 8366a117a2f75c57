import { Synthesizer } from '../../../src/agents/synthesizer';
import { createProgressRecord, createSubtask, createToolExecution } from '../../../src/orchestrator/data-flow';
import type { RunState, Subtask } from '../../../src/orchestrator/states';
import { FIXED_NOW, ScriptedOracle, createState, createTestContext } from '../../helpers/fakes';

describe('Synthesizer', () => {
  const done: Subtask = { ...createSubtask('task_1', 'Fetch P&L', ['get_account_pnl']), status: 'completed', result: 'P&L: 1250.00', attemptCount: 1 };
  const failed: Subtask = { ...createSubtask('task_2', 'Compute hypothetical P&L', ['calculate_hypothetical_pnl']), status: 'failed', error: 'timeout', attemptCount: 1 };

  const finished = (overrides: Partial<RunState> = {}): RunState =>
    createState({
      subtasks: [done],
      resultsBySubtask: { task_1: 'P&L: 1250.00' },
      toolLog: [createToolExecution({ toolName: 'get_account_pnl', arguments: { account_number: '1001' }, subtaskId: 'task_1', timestamp: FIXED_NOW, result: 'P&L: 1250.00' })],
      iterationCount: 2,
      ...overrides,
    });

  it('returns the trimmed oracle answer and stops the run', async () => {
    const oracle = new ScriptedOracle({ answer: ['  Account 1001 has a P&L of 1250.00.\n'] });

    const update = await new Synthesizer(createTestContext({ oracle })).synthesize(finished());

    expect(update.finalAnswer).toBe('Account 1001 has a P&L of 1250.00.');
    expect(update.outcome).toBe('completed');
    expect(update.continueFlag).toBe(false);
    expect(update.iterationCount).toBe(3);
    expect(update.progressLog).toEqual([
      {
        kind: 'summary',
        step: 'synthesize',
        content: 'Synthesized final answer from all subtask results',
        timestamp: FIXED_NOW,
        metadata: { subtasksCompleted: 1, toolsUsed: ['get_account_pnl'], totalToolCalls: 1, outcome: 'completed', fallback: false },
      },
    ]);
  });

  it('gives the oracle the completed results and tool calls', async () => {
    const oracle = new ScriptedOracle({ answer: ['ok'] });

    await new Synthesizer(createTestContext({ oracle })).synthesize(finished());

    const [call] = oracle.callsOf('answer');
    expect(call?.context).toBe(
      [
        '### REQUEST\nWhat is the P&L of account 1001?',
        '### COMPLETED SUBTASKS\ntask_1: Fetch P&L\nResult: P&L: 1250.00',
        '### TOOL CALLS\n- get_account_pnl({"account_number":"1001"}): P&L: 1250.00',
      ].join('\n\n'),
    );
    expect(call?.instruction).toContain('All subtasks completed.');
  });

  it('summarizes the results itself when the oracle answers with nothing', async () => {
    const ctx = createTestContext({ oracle: new ScriptedOracle({ answer: ['   '] }) });

    const update = await new Synthesizer(ctx).synthesize(finished({ subtasks: [done, failed] }));

    expect(update.outcome).toBe('partial');
    expect(update.finalAnswer).toBe(
      [
        'Results for: What is the P&L of account 1001?',
        '- Fetch P&L: P&L: 1250.00',
        '',
        'Some subtasks did not complete. Say which parts of the request could not be answered.',
      ].join('\n'),
    );
    expect(update.progressLog?.[0]?.metadata.fallback).toBe(true);
    expect(ctx.logger.warn).toHaveBeenCalledWith('Composing fallback answer', { reason: 'Oracle returned an empty answer' });
  });

  it('summarizes the results itself when the oracle call fails', async () => {
    const ctx = createTestContext({ oracle: new ScriptedOracle({ answer: [new Error('service unavailable')] }) });

    const update = await new Synthesizer(ctx).synthesize(createState({ subtasks: [failed], iterationCount: 5 }));

    expect(update.finalAnswer).toBe(
      ['Results for: What is the P&L of account 1001?', 'No subtask produced a result.', '', 'Some subtasks did not complete. Say which parts of the request could not be answered.'].join('\n'),
    );
    expect(ctx.logger.warn).toHaveBeenCalledWith('Composing fallback answer', { reason: 'service unavailable' });
  });

  describe('classifyOutcome', () => {
    it('is completed when every subtask completed', () => {
      expect(Synthesizer.classifyOutcome(finished())).toBe('completed');
    });

    it('is partial when a subtask did not complete', () => {
      expect(Synthesizer.classifyOutcome(finished({ subtasks: [done, failed] }))).toBe('partial');
    });

    it('is truncated at the iteration ceiling with work outstanding', () => {
      expect(Synthesizer.classifyOutcome(finished({ subtasks: [done, failed], iterationCount: 15, maxIterations: 15 }))).toBe('truncated');
      expect(Synthesizer.classifyOutcome(finished({ needsValidation: true, iterationCount: 15, maxIterations: 15 }))).toBe('truncated');
    });

    it('is not truncated at the ceiling when nothing was outstanding', () => {
      expect(Synthesizer.classifyOutcome(finished({ iterationCount: 15, maxIterations: 15 }))).toBe('completed');
    });

    it('is retries_exhausted after giving up', () => {
      const giveUp = createProgressRecord('recovery', 'recover', 'Max retries exceeded. Proceeding with partial results.', FIXED_NOW, { strategy: 'give_up', tier: 3 });
      expect(Synthesizer.classifyOutcome(finished({ subtasks: [done, failed], progressLog: [giveUp] }))).toBe('retries_exhausted');
    });

    it('is retries_exhausted when an error is left with no retries', () => {
      expect(Synthesizer.classifyOutcome(finished({ subtasks: [done, failed], errorRecoveryFlag: true, retryCount: 3, maxRetries: 3 }))).toBe('retries_exhausted');
    });

    it('is retries_exhausted when a failed subtask outlived the budget after later work cleared the flag', () => {
      const error = { subtaskId: failed.id, toolName: 'get_account_pnl', message: 'service down', timestamp: FIXED_NOW };
      expect(Synthesizer.classifyOutcome(finished({ subtasks: [failed, done], errorLog: [error], retryCount: 3, maxRetries: 3 }))).toBe('retries_exhausted');
    });

    it('stays partial when a replan superseded the failed subtask', () => {
      const error = { subtaskId: failed.id, toolName: 'get_account_pnl', message: 'service down', timestamp: FIXED_NOW };
      const replan = createProgressRecord('recovery', 'recover', 'Replanning request with a different approach', FIXED_NOW, { strategy: 'replan', tier: 2 });
      expect(Synthesizer.classifyOutcome(finished({ subtasks: [failed, done], errorLog: [error], progressLog: [replan], retryCount: 3, maxRetries: 3 }))).toBe('partial');
    });
  });
});
