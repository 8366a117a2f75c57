import chalk from 'chalk';
import { formatProgressEvent, formatRunResult, formatSubtask, formatToolDescriptor } from '../../../src/cli/formatters';
import type { RunResult } from '../../../src/orchestrator/data-flow';
import { createSubtask } from '../../../src/orchestrator/data-flow';
import { createState } from '../../helpers/fakes';

describe('CLI formatters', () => {
  const originalLevel = chalk.level;

  beforeAll(() => {
    chalk.level = 0;
  });

  afterAll(() => {
    chalk.level = originalLevel;
  });

  it('marks subtasks by status', () => {
    expect(formatSubtask({ id: 'task_1', description: 'Fetch P&L', status: 'completed' })).toBe('    ✓ task_1 Fetch P&L');
    expect(formatSubtask({ id: 'task_2', description: 'Compute', status: 'failed' })).toBe('    ✗ task_2 Compute');
  });

  describe('formatProgressEvent', () => {
    it('renders reasoning content', () => {
      expect(formatProgressEvent({ event_type: 'reasoning', data: { content: 'Decomposed request into 1 subtask(s): Fetch' } })).toBe('  Decomposed request into 1 subtask(s): Fetch');
    });

    it('renders tool results and failures', () => {
      expect(formatProgressEvent({ event_type: 'tool_execution', data: { tool_name: 'get_account_pnl', result: '1250.00' } })).toBe('  get_account_pnl returned 7 chars');
      expect(formatProgressEvent({ event_type: 'tool_execution', data: { tool_name: 'get_account_pnl', error: 'timeout' } })).toBe('  get_account_pnl failed: timeout');
    });

    it('renders one line per subtask and skips malformed entries', () => {
      const event = {
        event_type: 'subtask_update' as const,
        data: { subtasks: [{ id: 'task_1', description: 'Fetch', status: 'in_progress' }, 'junk', { id: 'x', status: 'unknown' }] },
      };
      expect(formatProgressEvent(event)).toBe('    … task_1 Fetch');
    });

    it('has no console form for the final answer and done events', () => {
      expect(formatProgressEvent({ event_type: 'final_answer', data: { answer: 'x' } })).toBeNull();
      expect(formatProgressEvent({ event_type: 'done', data: {} })).toBeNull();
    });
  });

  describe('formatRunResult', () => {
    const base: RunResult = {
      status: 'completed',
      runKey: 'run-1',
      finalAnswer: 'P&L is 1250.00',
      outcome: 'completed',
      state: createState({ subtasks: [{ ...createSubtask('task_1', 'Fetch', []), status: 'completed' }], iterationCount: 3 }),
      steps: ['decompose', 'execute', 'synthesize'],
      durationMs: 1234,
    };

    it('prints the answer and the run summary', () => {
      expect(formatRunResult(base).split('\n')).toEqual([
        '',
        'Answer',
        'P&L is 1250.00',
        '',
        'Run completed.',
        '  Run key:    run-1',
        '  Subtasks:   1/1 completed',
        '  Tool calls: 0',
        '  Iterations: 3/15',
        '  Duration:   1.2s',
      ]);
    });

    it('names a non-completed outcome and the error details when verbose', () => {
      const failed: RunResult = { ...base, status: 'failed', finalAnswer: null, outcome: null, error: { code: 'SYNTHESIS_FAILED', message: 'no answer', details: 'stack' } };

      const lines = formatRunResult(failed, { verbose: true }).split('\n');

      expect(lines[1]).toBe('Run failed.');
      expect(lines.slice(-2)).toEqual(['  Error: [SYNTHESIS_FAILED] no answer', '  Details: stack']);
      expect(formatRunResult({ ...base, outcome: 'partial' }).split('\n')).toContain('Run finished with outcome: partial');
    });
  });

  it('lists tool parameters under the tool name', () => {
    expect(formatToolDescriptor({ name: 'get_account_pnl', description: 'Current P&L', parameters: { account_number: 'string' } })).toBe('  get_account_pnl\n    Current P&L\n      account_number: string');
  });
});
