/* eslint-disable @typescript-eslint/require-await */
import { RunEngine, ConsoleRunLogger } from '../../../src/orchestrator/workflow';
import { AgentCoordinator } from '../../../src/orchestrator/agent-coordinator';
import type { RunStore } from '../../../src/orchestrator/state-store';
import type { ProgressEvent } from '../../../src/orchestrator/events';
import { createSubtask, updateSubtask } from '../../../src/orchestrator/data-flow';
import type { PersistedRun } from '../../../src/orchestrator/states';
import { createSilentLogger, createState, FakeToolService, ScriptedOracle } from '../../helpers/fakes';

// ── Helpers ─────────────────────────────────────────────────────────────

class MemoryStore implements RunStore {
  readonly saves: PersistedRun[] = [];
  constructor(private runs = new Map<string, PersistedRun>()) {}

  async save(run: PersistedRun): Promise<void> {
    this.saves.push(run);
    this.runs.set(run.runKey, run);
  }
  async load(runKey: string): Promise<PersistedRun | null> {
    return this.runs.get(runKey) ?? null;
  }
  async exists(runKey: string): Promise<boolean> {
    return this.runs.has(runKey);
  }
  async list(): Promise<PersistedRun[]> {
    return [...this.runs.values()];
  }
}

/** Decompose into one subtask, execute it, then synthesize */
function createHappyCoordinator(): AgentCoordinator {
  const coordinator = new AgentCoordinator();
  coordinator.registerHandler('decompose', async (s) => ({
    subtasks: [createSubtask('task_1', 'Fetch P&L', ['get_account_pnl'])],
    currentTask: 'task_1',
    iterationCount: s.iterationCount + 1,
  }));
  coordinator.registerHandler('execute', async (s) => {
    const started = updateSubtask(s.subtasks, 'task_1', { status: 'in_progress' });
    return {
      subtasks: updateSubtask(started, 'task_1', { status: 'completed', result: '42' }),
      currentTask: null,
      completedIds: ['task_1'],
      resultsBySubtask: { task_1: '42' },
      iterationCount: s.iterationCount + 1,
    };
  });
  coordinator.registerHandler('synthesize', async (s) => ({
    finalAnswer: 'P&L is 42',
    outcome: 'completed',
    continueFlag: false,
    iterationCount: s.iterationCount + 1,
  }));
  return coordinator;
}

function collect(engine: RunEngine): ProgressEvent[] {
  const events: ProgressEvent[] = [];
  engine.events.onProgress((e) => events.push(e));
  return events;
}

const INPUT = { request: 'What is the P&L of account 1001?', availableTools: ['get_account_pnl'] };

// ═══════════════════════════════════════════════════════════════════════
// AgentCoordinator
// ═══════════════════════════════════════════════════════════════════════

describe('AgentCoordinator', () => {
  it('should register and execute a handler', async () => {
    const coordinator = new AgentCoordinator();
    const handler = jest.fn().mockResolvedValue({ iterationCount: 1 });
    coordinator.registerHandler('recover', handler);

    const state = createState();
    await expect(coordinator.execute('recover', state)).resolves.toEqual({ iterationCount: 1 });
    expect(handler).toHaveBeenCalledWith(state);
    expect(coordinator.hasHandler('recover')).toBe(true);
    expect(coordinator.getRegisteredSteps()).toEqual(['recover']);
  });

  it('should throw for an unregistered step', async () => {
    await expect(new AgentCoordinator().execute('validate', createState())).rejects.toThrow('No handler registered for step: validate');
  });
});

// ═══════════════════════════════════════════════════════════════════════
// RunEngine
// ═══════════════════════════════════════════════════════════════════════

describe('RunEngine', () => {
  it('starts with decomposition and stops after synthesis', async () => {
    const store = new MemoryStore();
    const engine = new RunEngine({ coordinator: createHappyCoordinator(), runKey: 'run-1', store, logger: createSilentLogger() });
    const events = collect(engine);

    const result = await engine.run(INPUT);

    expect(result.status).toBe('completed');
    expect(result.steps).toEqual(['decompose', 'execute', 'synthesize']);
    expect(result.finalAnswer).toBe('P&L is 42');
    expect(result.outcome).toBe('completed');
    expect(result.state.iterationCount).toBe(3);
    expect(events.filter((e) => e.event_type === 'done')).toHaveLength(1);
    expect(events[events.length - 1]?.event_type).toBe('done');
    expect(events.map((e) => e.event_type)).toEqual(['subtask_update', 'subtask_update', 'final_answer', 'done']);
  });

  it('checkpoints the initial state, every merge and the final status', async () => {
    const store = new MemoryStore();
    const engine = new RunEngine({ coordinator: createHappyCoordinator(), runKey: 'run-1', store, logger: createSilentLogger() });

    await engine.run(INPUT);

    expect(store.saves.map((s) => [s.status, s.lastStep])).toEqual([
      ['running', null],
      ['running', 'decompose'],
      ['running', 'execute'],
      ['completed', 'synthesize'],
    ]);
    expect(store.saves[3]?.state.finalAnswer).toBe('P&L is 42');
  });

  it('applies engine budgets unless the input overrides them', async () => {
    const engine = new RunEngine({ coordinator: createHappyCoordinator(), store: null, logger: createSilentLogger(), maxIterations: 7, maxRetries: 1 });
    const result = await engine.run(INPUT);
    expect(result.state.maxIterations).toBe(7);
    expect(result.state.maxRetries).toBe(1);

    const overridden = await engine.run({ ...INPUT, maxIterations: 9 });
    expect(overridden.state.maxIterations).toBe(9);
  });

  it('forces synthesis when a handler throws', async () => {
    const coordinator = createHappyCoordinator();
    coordinator.registerHandler('execute', async () => {
      throw new Error('handler exploded');
    });
    const engine = new RunEngine({ coordinator, store: null, logger: createSilentLogger() });
    const events = collect(engine);

    const result = await engine.run(INPUT);

    expect(result.status).toBe('completed');
    expect(result.steps).toEqual(['decompose', 'execute', 'synthesize']);
    expect(events.find((e) => e.event_type === 'error')?.data).toEqual({ message: 'handler exploded', step: 'execute' });
  });

  it('fails the run when synthesis throws, still emitting done once', async () => {
    const coordinator = createHappyCoordinator();
    coordinator.registerHandler('synthesize', async () => {
      throw new Error('no answer');
    });
    const store = new MemoryStore();
    const engine = new RunEngine({ coordinator, runKey: 'run-2', store, logger: createSilentLogger() });
    const events = collect(engine);

    const result = await engine.run(INPUT);

    expect(result.status).toBe('failed');
    expect(result.error).toMatchObject({ code: 'SYNTHESIS_FAILED', message: 'no answer' });
    expect(result.finalAnswer).toBeNull();
    expect(events.filter((e) => e.event_type === 'done')).toHaveLength(1);
    expect(store.saves[store.saves.length - 1]?.status).toBe('failed');
  });

  it('counts an iteration for a handler that forgot to', async () => {
    const coordinator = new AgentCoordinator();
    coordinator.registerHandler('decompose', async () => ({}));
    coordinator.registerHandler('synthesize', async () => ({ finalAnswer: 'nothing to do' }));
    const engine = new RunEngine({ coordinator, store: null, logger: createSilentLogger() });

    const result = await engine.run(INPUT);

    expect(result.steps).toEqual(['decompose', 'synthesize']);
    expect(result.state.iterationCount).toBe(2);
  });

  it('reports a failed checkpoint write without stopping', async () => {
    const store = new MemoryStore();
    jest.spyOn(store, 'save').mockRejectedValue(new Error('disk full'));
    const engine = new RunEngine({ coordinator: createHappyCoordinator(), store, logger: createSilentLogger() });
    const events = collect(engine);

    const result = await engine.run(INPUT);

    expect(result.status).toBe('completed');
    expect(events.filter((e) => e.event_type === 'error').map((e) => e.data.message)).toContain('Checkpoint write failed: disk full');
  });

  it('closes collaborators at teardown only when asked to', async () => {
    const oracle = new ScriptedOracle();
    const tools = new FakeToolService();

    await new RunEngine({ coordinator: createHappyCoordinator(), store: null, logger: createSilentLogger(), oracle, tools }).run(INPUT);
    expect(oracle.close).not.toHaveBeenCalled();

    await new RunEngine({ coordinator: createHappyCoordinator(), store: null, logger: createSilentLogger(), oracle, tools, closeOnFinish: true }).run(INPUT);
    expect(oracle.close).toHaveBeenCalledTimes(1);
    expect(tools.close).toHaveBeenCalledTimes(1);
  });

  describe('resume', () => {
    it('continues from the step after the last checkpoint', async () => {
      const state = createState({
        subtasks: [{ ...createSubtask('task_1', 'Fetch P&L', ['get_account_pnl']), status: 'completed', result: '42' }],
        resultsBySubtask: { task_1: '42' },
        iterationCount: 2,
      });
      const store = new MemoryStore(new Map<string, PersistedRun>([['run-3', { runKey: 'run-3', status: 'running', lastStep: 'execute', updatedAt: '2026-01-01T00:00:00.000Z', state }]]));
      const engine = new RunEngine({ coordinator: createHappyCoordinator(), runKey: 'run-3', store, logger: createSilentLogger() });

      const result = await engine.resume();

      expect(result.steps).toEqual(['synthesize']);
      expect(result.finalAnswer).toBe('P&L is 42');
      expect(result.state.iterationCount).toBe(3);
    });

    it('returns a finished run as stored', async () => {
      const state = createState({ finalAnswer: 'done before', outcome: 'completed' });
      const store = new MemoryStore(new Map<string, PersistedRun>([['run-4', { runKey: 'run-4', status: 'completed', lastStep: 'synthesize', updatedAt: '2026-01-01T00:00:00.000Z', state }]]));
      const coordinator = createHappyCoordinator();
      const execute = jest.spyOn(coordinator, 'execute');

      const result = await new RunEngine({ coordinator, runKey: 'run-4', store, logger: createSilentLogger() }).resume();

      expect(result.status).toBe('completed');
      expect(result.finalAnswer).toBe('done before');
      expect(result.steps).toEqual([]);
      expect(execute).not.toHaveBeenCalled();
    });

    it('rejects when there is no checkpoint', async () => {
      const engine = new RunEngine({ coordinator: createHappyCoordinator(), runKey: 'missing', store: new MemoryStore(), logger: createSilentLogger() });
      await expect(engine.resume()).rejects.toThrow('No checkpoint found for run missing');
    });
  });
});

describe('ConsoleRunLogger', () => {
  it('prefixes the run key and appends data as JSON', () => {
    const logger = new ConsoleRunLogger('abcdef1234567890');
    expect(logger.format('INFO', 'Starting run', { tools: 3 })).toBe('[stepwise:abcdef12] INFO  Starting run {"tools":3}');
    expect(new ConsoleRunLogger().format('WARN', 'no key')).toBe('[stepwise] WARN  no key');
  });
});
