import type { RunState, RunUpdate, StepName } from './states';

/**
 * A handler function executed when the engine routes to a step.
 * Receives the current (read-only) run state and returns a partial
 * update that the engine merges before routing again.
 */
export type StepHandler = (state: Readonly<RunState>) => Promise<RunUpdate>;

/**
 * AgentCoordinator maps each step to the handler that performs it.
 *
 * Handlers are registered externally (real components in production,
 * scripted fakes in tests) so the coordinator has no hard dependency on
 * any particular implementation.
 */
export class AgentCoordinator {
  private handlers = new Map<StepName, StepHandler>();

  /** Register a handler for a step, replacing any earlier one */
  registerHandler(step: StepName, handler: StepHandler): void {
    this.handlers.set(step, handler);
  }

  hasHandler(step: StepName): boolean {
    return this.handlers.has(step);
  }

  /**
   * Execute the handler registered for the given step.
   * @throws Error if no handler is registered for the step.
   */
  async execute(step: StepName, state: Readonly<RunState>): Promise<RunUpdate> {
    const handler = this.handlers.get(step);
    if (!handler) {
      throw new Error(`No handler registered for step: ${step}`);
    }
    return handler(state);
  }

  getRegisteredSteps(): StepName[] {
    return [...this.handlers.keys()];
  }
}
