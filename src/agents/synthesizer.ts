import type { RunOutcome, RunState, RunUpdate } from '../orchestrator/states';
import { createProgressRecord } from '../orchestrator/data-flow';
import { buildSynthesisPrompt, describeOutcome } from './prompts/synthesis';
import { ContextBuilder } from './context-builder';
import type { RunContext } from './types';

/**
 * Synthesizer composes the final answer. It is the only step that sets
 * `finalAnswer`, and it always produces one: when the oracle fails or
 * answers with nothing, a plain summary of the gathered results is used.
 */
export class Synthesizer {
  constructor(private ctx: RunContext) {}

  async synthesize(state: Readonly<RunState>): Promise<RunUpdate> {
    const outcome = Synthesizer.classifyOutcome(state);
    const completedSubtasks = ContextBuilder.formatCompleted(state.subtasks, state.resultsBySubtask);

    const prompt = buildSynthesisPrompt({
      request: state.originalRequest,
      completedSubtasks,
      toolCalls: ContextBuilder.formatToolLog(state.toolLog, this.ctx.resultPreviewChars),
      validations: ContextBuilder.formatValidations(state.validations),
      outcome,
    });

    let answer = '';
    let fallbackReason: string | null = null;
    try {
      answer = (await this.ctx.oracle.decide(prompt.instruction, prompt.context)).trim();
      if (!answer) fallbackReason = 'Oracle returned an empty answer';
    } catch (err) {
      fallbackReason = err instanceof Error ? err.message : String(err);
    }

    if (fallbackReason !== null) {
      this.ctx.logger.warn('Composing fallback answer', { reason: fallbackReason });
      answer = Synthesizer.fallbackAnswer(state, outcome);
    }

    const record = createProgressRecord('summary', 'synthesize', 'Synthesized final answer from all subtask results', this.ctx.now(), {
      subtasksCompleted: state.subtasks.filter((st) => st.status === 'completed').length,
      toolsUsed: [...new Set(state.toolLog.map((e) => e.toolName))],
      totalToolCalls: state.toolLog.length,
      outcome,
      fallback: fallbackReason !== null,
    });

    this.ctx.logger.info('Final answer ready', { outcome, chars: answer.length });

    return {
      finalAnswer: answer,
      outcome,
      continueFlag: false,
      progressLog: [record],
      iterationCount: state.iterationCount + 1,
    };
  }

  /**
   * How the run ended. Hitting the iteration ceiling only counts as
   * truncation when work was still outstanding.
   */
  static classifyOutcome(state: Readonly<RunState>): RunOutcome {
    const unfinished = state.subtasks.some((st) => st.status !== 'completed');
    const outstanding = unfinished || state.errorRecoveryFlag || state.replanFlag || state.needsValidation;

    if (state.iterationCount >= state.maxIterations && outstanding) {
      return 'truncated';
    }

    const tactics = state.progressLog.filter((p) => p.kind === 'recovery').map((p) => p.metadata.strategy);
    const budgetSpent = state.retryCount >= state.maxRetries;
    // A subtask left failed once the budget ran out, unless a replan superseded it
    const failedIds = new Set(state.subtasks.filter((st) => st.status === 'failed').map((st) => st.id));
    const abandoned = budgetSpent && !tactics.includes('replan') && state.errorLog.some((e) => failedIds.has(e.subtaskId));
    if (tactics.includes('give_up') || abandoned || (state.errorRecoveryFlag && budgetSpent)) {
      return 'retries_exhausted';
    }

    return unfinished ? 'partial' : 'completed';
  }

  static fallbackAnswer(state: Readonly<RunState>, outcome: RunOutcome): string {
    const lines = state.subtasks.filter((st) => st.status === 'completed').map((st) => `- ${st.description}: ${state.resultsBySubtask[st.id] ?? st.result ?? ''}`);

    return [`Results for: ${state.originalRequest}`, ...(lines.length ? lines : ['No subtask produced a result.']), '', describeOutcome(outcome)].join('\n');
  }
}
