import { z } from 'zod';
import type { ProgressRecord, RunState, RunUpdate, Subtask, ToolExecution } from '../orchestrator/states';
import { createErrorRecord, createProgressRecord, createToolExecution, firstPending, updateSubtask } from '../orchestrator/data-flow';
import { parseOracleJson, OracleParse } from '../oracle/parse';
import { getToolSelectionPrompt } from './prompts/tool-selection';
import { ContextBuilder } from './context-builder';
import type { RunContext } from './types';

const ToolSelectionSchema = z.object({
  tool: z.string().trim().min(1),
  arguments: z.record(z.unknown()).default({}),
});

export type ToolSelection = z.infer<typeof ToolSelectionSchema>;

/** Tool name recorded when no tool could be chosen */
export const UNKNOWN_TOOL = 'unknown';

/**
 * StepExecutor advances exactly one subtask per invocation: the oracle picks
 * a tool and arguments, the tool service runs it, and the outcome lands in
 * the subtask, the tool log and (on failure) the error log.
 */
export class StepExecutor {
  constructor(private ctx: RunContext) {}

  async execute(state: Readonly<RunState>): Promise<RunUpdate> {
    const iterationCount = state.iterationCount + 1;
    const subtask = StepExecutor.resolveSubtask(state);

    if (!subtask) {
      this.ctx.logger.debug('No executable subtask left');
      return { continueFlag: false, currentTask: null, iterationCount };
    }

    const subtasks = updateSubtask(state.subtasks, subtask.id, { status: 'in_progress', attemptCount: subtask.attemptCount + 1 });
    const failedTools = [...new Set(state.errorLog.filter((e) => e.subtaskId === subtask.id && e.toolName !== UNKNOWN_TOOL).map((e) => e.toolName))];

    const prompt = getToolSelectionPrompt({
      request: state.originalRequest,
      subtaskId: subtask.id,
      subtaskDescription: subtask.description,
      toolCatalog: ContextBuilder.formatCatalog(this.ctx.catalog, subtask.candidateTools.length ? subtask.candidateTools : state.availableTools),
      previousResults: ContextBuilder.formatResults(state.resultsBySubtask),
      failedTools,
    });

    let selection: OracleParse<ToolSelection>;
    try {
      const response = await this.ctx.oracle.decide(prompt.instruction, prompt.context);
      selection = parseOracleJson(response, 'object', ToolSelectionSchema);
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      selection = { kind: 'malformed', raw: '', reason: `Oracle call failed: ${message}` };
    }

    if (selection.kind === 'empty') {
      return this.fail(subtasks, subtask, UNKNOWN_TOOL, 'Failed to parse tool selection: empty oracle response', iterationCount);
    }
    if (selection.kind === 'malformed') {
      return this.fail(subtasks, subtask, UNKNOWN_TOOL, `Failed to parse tool selection: ${selection.reason}`, iterationCount);
    }

    const { tool, arguments: args } = selection.value;
    if (state.availableTools.length > 0 && !state.availableTools.includes(tool)) {
      return this.fail(subtasks, subtask, tool, `Tool ${tool} is not available`, iterationCount);
    }

    const timestamp = this.ctx.now();
    const callRecord = createProgressRecord('tool_call', 'execute', `Calling ${tool} with args: ${JSON.stringify(args)}`, timestamp, { subtaskId: subtask.id, tool, args });
    this.ctx.logger.info(`Invoking ${tool}`, { subtaskId: subtask.id, attempt: subtask.attemptCount + 1 });

    try {
      const result = await this.ctx.tools.invoke(tool, args);
      const execution = createToolExecution({ toolName: tool, arguments: args, subtaskId: subtask.id, timestamp: this.ctx.now(), result });
      const completed = updateSubtask(subtasks, subtask.id, { status: 'completed', result, error: undefined });

      return {
        subtasks: completed,
        currentTask: firstPending(completed)?.id ?? null,
        toolLog: [execution],
        completedIds: [subtask.id],
        resultsBySubtask: { ...state.resultsBySubtask, [subtask.id]: result },
        progressLog: [callRecord],
        errorRecoveryFlag: false,
        iterationCount,
      };
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      const execution = createToolExecution({ toolName: tool, arguments: args, subtaskId: subtask.id, timestamp: this.ctx.now(), error: message });
      return this.fail(subtasks, subtask, tool, message, iterationCount, execution, callRecord);
    }
  }

  /**
   * The subtask to work on: `currentTask` while it is still open, otherwise
   * the first in-progress subtask, otherwise the first pending one.
   */
  static resolveSubtask(state: Readonly<RunState>): Subtask | undefined {
    const current = state.currentTask !== null ? state.subtasks.find((st) => st.id === state.currentTask) : undefined;
    if (current && (current.status === 'pending' || current.status === 'in_progress')) {
      return current;
    }
    return state.subtasks.find((st) => st.status === 'in_progress') ?? firstPending(state.subtasks);
  }

  private fail(
    subtasks: Subtask[],
    subtask: Subtask,
    toolName: string,
    message: string,
    iterationCount: number,
    execution?: ToolExecution,
    callRecord?: ProgressRecord,
  ): RunUpdate {
    const timestamp = this.ctx.now();
    const failed = updateSubtask(subtasks, subtask.id, { status: 'failed', error: message });
    const failureRecord = createProgressRecord('tool_call', 'execute', `Subtask ${subtask.id} failed: ${message}`, timestamp, { subtaskId: subtask.id, tool: toolName, error: message });

    this.ctx.logger.warn(`Subtask ${subtask.id} failed`, { tool: toolName, error: message });

    return {
      subtasks: failed,
      currentTask: firstPending(failed)?.id ?? null,
      errorLog: [createErrorRecord(subtask.id, toolName, message, timestamp)],
      progressLog: callRecord ? [callRecord, failureRecord] : [failureRecord],
      ...(execution ? { toolLog: [execution] } : {}),
      errorRecoveryFlag: true,
      iterationCount,
    };
  }
}
