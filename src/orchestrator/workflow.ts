import crypto from 'crypto';
import type { ReasoningOracle } from '../oracle/types';
import type { ToolService } from '../tools/types';
import { AgentCoordinator } from './agent-coordinator';
import { CheckpointStore, RunStore } from './state-store';
import { RunEvents, doneEvent, errorEvent, toWireEvents } from './events';
import { DEFAULT_ROUTING_POLICY, RoutingPolicy, nextStep } from './router';
import type { RunState, RunStatus, StepName } from './states';
import { type RunInput, type RunResult, DEFAULT_MAX_ITERATIONS, DEFAULT_MAX_RETRIES, createInitialState, mergeUpdate } from './data-flow';

// ── Logger ──────────────────────────────────────────────────────────────

/** Logger interface for run observability */
export interface RunLogger {
  info(message: string, data?: Record<string, unknown>): void;
  warn(message: string, data?: Record<string, unknown>): void;
  error(message: string, data?: Record<string, unknown>): void;
  debug(message: string, data?: Record<string, unknown>): void;
}

/** Default console-based logger with run-key prefix */
export class ConsoleRunLogger implements RunLogger {
  private prefix: string;

  constructor(runKey?: string) {
    this.prefix = runKey ? `[stepwise:${runKey.slice(0, 8)}]` : '[stepwise]';
  }

  info(message: string, data?: Record<string, unknown>): void {
    console.log(this.format('INFO', message, data));
  }

  warn(message: string, data?: Record<string, unknown>): void {
    console.warn(this.format('WARN', message, data));
  }

  error(message: string, data?: Record<string, unknown>): void {
    console.error(this.format('ERROR', message, data));
  }

  debug(message: string, data?: Record<string, unknown>): void {
    console.debug(this.format('DEBUG', message, data));
  }

  format(level: string, message: string, data?: Record<string, unknown>): string {
    const base = `${this.prefix} ${level.padEnd(5)} ${message}`;
    return data ? `${base} ${JSON.stringify(data)}` : base;
  }
}

// ── Options ─────────────────────────────────────────────────────────────

export const DEFAULT_STATE_DIR = '.stepwise';

/** Configuration for creating a RunEngine */
export interface RunEngineOptions {
  /** Coordinator with a handler registered for every step */
  coordinator: AgentCoordinator;
  /** Resumability key (auto-generated if omitted) */
  runKey?: string;
  /** Checkpoint store; `null` disables checkpointing */
  store?: RunStore | null;
  /** Directory for the default CheckpointStore */
  stateDir?: string;
  logger?: RunLogger;
  events?: RunEvents;
  maxIterations?: number;
  maxRetries?: number;
  policy?: RoutingPolicy;
  /** Collaborators closed at teardown when `closeOnFinish` is set */
  oracle?: ReasoningOracle;
  tools?: ToolService;
  closeOnFinish?: boolean;
}

// ── Engine ──────────────────────────────────────────────────────────────

/**
 * RunEngine drives one run: execute the routed step, merge its update,
 * publish events, checkpoint, and route again until the Synthesizer has
 * produced the final answer.
 *
 * `run()` never throws. A handler that throws is reported as an `error`
 * event and the engine jumps straight to synthesis; if synthesis itself
 * throws the run ends with status `failed`.
 */
export class RunEngine {
  readonly events: RunEvents;
  private coordinator: AgentCoordinator;
  private store: RunStore | null;
  private logger: RunLogger;
  private policy: RoutingPolicy;
  private runKey: string;
  private maxIterations: number;
  private maxRetries: number;
  private state: RunState;
  private startTime = 0;

  constructor(private options: RunEngineOptions) {
    this.runKey = options.runKey ?? crypto.randomUUID();
    this.coordinator = options.coordinator;
    this.store = options.store === undefined ? new CheckpointStore(options.stateDir ?? DEFAULT_STATE_DIR) : options.store;
    this.logger = options.logger ?? new ConsoleRunLogger(this.runKey);
    this.events = options.events ?? new RunEvents();
    this.policy = options.policy ?? DEFAULT_ROUTING_POLICY;
    this.maxIterations = options.maxIterations ?? DEFAULT_MAX_ITERATIONS;
    this.maxRetries = options.maxRetries ?? DEFAULT_MAX_RETRIES;
    this.state = createInitialState({ request: '', availableTools: [] });
  }

  // ── Public API ──────────────────────────────────────────────────────

  /** Start a new run. Always begins with decomposition. */
  async run(input: RunInput): Promise<RunResult> {
    this.startTime = Date.now();
    const state = createInitialState({
      ...input,
      maxIterations: input.maxIterations ?? this.maxIterations,
      maxRetries: input.maxRetries ?? this.maxRetries,
    });

    this.logger.info('Starting run', { runKey: this.runKey, tools: state.availableTools.length, maxIterations: state.maxIterations, maxRetries: state.maxRetries });
    return this.execute(state, null);
  }

  /**
   * Continue a checkpointed run under the same key. A run that already
   * finished is returned as stored without executing anything.
   * @throws Error if checkpointing is disabled or no checkpoint exists.
   */
  async resume(): Promise<RunResult> {
    this.startTime = Date.now();
    if (!this.store) {
      throw new Error('Cannot resume without a checkpoint store');
    }

    const persisted = await this.store.load(this.runKey);
    if (!persisted) {
      throw new Error(`No checkpoint found for run ${this.runKey}`);
    }

    if (persisted.status !== 'running') {
      this.logger.info('Run already finished', { runKey: this.runKey, status: persisted.status });
      this.state = persisted.state;
      return this.buildResult(persisted.status, [], persisted.error);
    }

    this.logger.info('Resuming run', { runKey: this.runKey, lastStep: persisted.lastStep, iteration: persisted.state.iterationCount });
    return this.execute(persisted.state, persisted.lastStep);
  }

  getRunKey(): string {
    return this.runKey;
  }

  getState(): Readonly<RunState> {
    return this.state;
  }

  // ── Execution Loop ──────────────────────────────────────────────────

  private async execute(initial: RunState, lastStep: StepName | null): Promise<RunResult> {
    this.state = initial;
    const steps: StepName[] = [];
    let failure: RunResult['error'];

    if (lastStep === null) {
      await this.checkpoint('running', null);
    }

    let step: StepName = lastStep === null ? 'decompose' : nextStep(this.state, this.policy);

    for (;;) {
      steps.push(step);
      this.events.emitStep({ runKey: this.runKey, step, iteration: this.state.iterationCount, timestamp: new Date().toISOString() });
      this.logger.debug(`Executing: ${step}`, { iteration: this.state.iterationCount });

      const stepStart = Date.now();
      const before = this.state.iterationCount;

      try {
        const update = await this.coordinator.execute(step, this.state);
        this.state = mergeUpdate(this.state, update);

        // Every step consumes an iteration so the ceiling always terminates the loop
        if (this.state.iterationCount <= before) {
          this.state = { ...this.state, iterationCount: before + 1 };
        }

        for (const event of toWireEvents(step, update, this.state)) {
          this.events.emitProgress(event);
        }
        this.logger.debug(`Completed: ${step} (${Date.now() - stepStart}ms)`);
      } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        this.logger.error(`Failed: ${step} (${Date.now() - stepStart}ms)`, { error: message });
        this.events.emitProgress(errorEvent(message, step, this.state));

        if (step === 'synthesize') {
          failure = { code: 'SYNTHESIS_FAILED', message, details: error instanceof Error ? error.stack : undefined };
          break;
        }
        step = 'synthesize';
        continue;
      }

      if (step === 'synthesize') break;

      await this.checkpoint('running', step);
      step = nextStep(this.state, this.policy);
    }

    const status: RunStatus = failure ? 'failed' : 'completed';
    await this.checkpoint(status, steps[steps.length - 1] ?? lastStep, failure);

    const result = this.buildResult(status, steps, failure);
    this.events.emitProgress(doneEvent(result));
    await this.teardown();
    return result;
  }

  // ── Persistence ─────────────────────────────────────────────────────

  private async checkpoint(status: RunStatus, lastStep: StepName | null, error?: RunResult['error']): Promise<void> {
    if (!this.store) return;
    try {
      await this.store.save({
        runKey: this.runKey,
        status,
        lastStep,
        updatedAt: new Date().toISOString(),
        state: this.state,
        ...(error ? { error } : {}),
      });
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      this.logger.error('Checkpoint write failed', { error: message });
      this.events.emitProgress(errorEvent(`Checkpoint write failed: ${message}`, lastStep, this.state));
    }
  }

  // ── Teardown ────────────────────────────────────────────────────────

  private async teardown(): Promise<void> {
    if (!this.options.closeOnFinish) return;

    const closers: Array<[string, (() => Promise<void>) | undefined]> = [
      ['oracle', this.options.oracle?.close?.bind(this.options.oracle)],
      ['tools', this.options.tools?.close?.bind(this.options.tools)],
    ];

    for (const [name, close] of closers) {
      if (!close) continue;
      try {
        await close();
      } catch (err) {
        this.logger.warn(`Failed to close ${name}`, { error: err instanceof Error ? err.message : String(err) });
      }
    }
  }

  // ── Helpers ─────────────────────────────────────────────────────────

  private buildResult(status: RunStatus, steps: StepName[], error?: RunResult['error']): RunResult {
    const result: RunResult = {
      status,
      runKey: this.runKey,
      finalAnswer: this.state.finalAnswer,
      outcome: this.state.outcome,
      state: this.state,
      steps,
      durationMs: Date.now() - this.startTime,
      ...(error ? { error } : {}),
    };

    this.logger.info('Run result', { status: result.status, outcome: result.outcome, steps: steps.length, durationMs: result.durationMs });
    return result;
  }
}
