import type { ErrorRecord, RunState, RunUpdate, Subtask } from './states';
import { createProgressRecord, updateSubtask } from './data-flow';

/** Recovery tactics, in the order the tiers apply them */
export type RecoveryTactic = 'retry' | 'alternative_tool' | 'skip_alternative' | 'replan' | 'give_up';

/** Decision for a single recovery invocation */
export interface RecoveryDecision {
  tactic: RecoveryTactic;
  tier: number;
  nextRetryCount: number;
}

/**
 * RecoveryStrategist repositions run state after a failed subtask.
 *
 * Tiers are keyed on `retryCount` and visited strictly in order:
 *  - 0: retry the identical subtask
 *  - 1: retry so the executor can pick another candidate tool
 *       (skipped straight to 3 when the subtask has only one candidate)
 *  - 2: force a fresh decomposition
 *  - 3+: give up and continue with partial results
 *
 * The strategist never calls the oracle or the tool service.
 */
export class RecoveryStrategist {
  constructor(private now: () => string = () => new Date().toISOString()) {}

  /** Pure tier selection */
  static decide(retryCount: number, failed: Subtask | undefined): RecoveryDecision {
    if (retryCount <= 0) {
      return { tactic: 'retry', tier: 0, nextRetryCount: 1 };
    }
    if (retryCount === 1) {
      const hasAlternative = (failed?.candidateTools.length ?? 0) > 1;
      return hasAlternative ? { tactic: 'alternative_tool', tier: 1, nextRetryCount: 2 } : { tactic: 'skip_alternative', tier: 1, nextRetryCount: 3 };
    }
    if (retryCount === 2) {
      return { tactic: 'replan', tier: 2, nextRetryCount: 3 };
    }
    return { tactic: 'give_up', tier: 3, nextRetryCount: retryCount };
  }

  recover(state: Readonly<RunState>): RunUpdate {
    const iterationCount = state.iterationCount + 1;
    const latest: ErrorRecord | undefined = state.errorLog[state.errorLog.length - 1];

    if (!latest) {
      return { errorRecoveryFlag: false, iterationCount };
    }

    const failed = state.subtasks.find((st) => st.id === latest.subtaskId);
    const decision = RecoveryStrategist.decide(state.retryCount, failed);
    const timestamp = this.now();

    const errorNote = createProgressRecord('recovery', 'recover', `Encountered error: ${latest.message}. Attempting recovery (retry ${state.retryCount}/${state.maxRetries})`, timestamp, {
      subtaskId: latest.subtaskId,
      tool: latest.toolName,
      error: latest.message,
    });

    const base: RunUpdate = { retryCount: decision.nextRetryCount, iterationCount, continueFlag: true };

    switch (decision.tactic) {
      case 'retry':
      case 'alternative_tool': {
        const content = decision.tactic === 'retry' ? `Retrying subtask ${latest.subtaskId} unchanged` : `Retrying subtask ${latest.subtaskId} with an alternative tool`;
        const note = createProgressRecord('recovery', 'recover', content, timestamp, { strategy: decision.tactic, tier: decision.tier, subtaskId: latest.subtaskId });
        return {
          ...base,
          ...this.requeue(state, failed),
          errorRecoveryFlag: false,
          progressLog: [errorNote, note],
        };
      }
      case 'skip_alternative': {
        const note = createProgressRecord('recovery', 'recover', `No alternative tool for subtask ${latest.subtaskId}; skipping to next strategy`, timestamp, { strategy: decision.tactic, tier: decision.tier, subtaskId: latest.subtaskId });
        return { ...base, progressLog: [errorNote, note] };
      }
      case 'replan': {
        const note = createProgressRecord('recovery', 'recover', 'Replanning request with a different approach', timestamp, { strategy: decision.tactic, tier: decision.tier });
        return { ...base, replanFlag: true, errorRecoveryFlag: false, progressLog: [errorNote, note] };
      }
      case 'give_up': {
        const note = createProgressRecord('recovery', 'recover', 'Max retries exceeded. Proceeding with partial results.', timestamp, { strategy: decision.tactic, tier: decision.tier, retryCount: state.retryCount });
        return { ...base, errorRecoveryFlag: false, progressLog: [errorNote, note] };
      }
    }
  }

  /** Put a failed subtask back in front of the executor */
  private requeue(state: Readonly<RunState>, failed: Subtask | undefined): RunUpdate {
    if (!failed) return {};
    if (failed.status !== 'failed') {
      return { currentTask: failed.id };
    }
    return { currentTask: failed.id, subtasks: updateSubtask(state.subtasks, failed.id, { status: 'in_progress' }) };
  }
}
