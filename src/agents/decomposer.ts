import { z } from 'zod';
import type { RunState, RunUpdate, Subtask } from '../orchestrator/states';
import { FALLBACK_SUBTASK_ID, createProgressRecord, createSubtask } from '../orchestrator/data-flow';
import { parseOracleJson, OracleParse } from '../oracle/parse';
import { buildDecompositionPrompt } from './prompts/decomposition';
import { ContextBuilder } from './context-builder';
import type { RunContext } from './types';

const PlannedSubtaskSchema = z.object({
  id: z.string().trim().min(1),
  description: z.string().trim().min(1),
  tools: z.array(z.string()).default([]),
});

const PlanSchema = z.array(PlannedSubtaskSchema).min(1);

export type PlannedSubtask = z.infer<typeof PlannedSubtaskSchema>;

/**
 * Decomposer turns the request into ordered subtasks. On a replan the new
 * subtasks are appended after the existing ones; ids that would collide get
 * an `_r<n>` suffix.
 */
export class Decomposer {
  constructor(private ctx: RunContext) {}

  async plan(state: Readonly<RunState>): Promise<RunUpdate> {
    const replanning = state.replanFlag;
    const prompt = buildDecompositionPrompt({
      request: state.originalRequest,
      toolCatalog: ContextBuilder.formatCatalog(this.ctx.catalog, state.availableTools),
      ...(replanning
        ? {
            existingSubtasks: state.subtasks.map((st) => `- ${st.id} [${st.status}]: ${st.description}`).join('\n'),
            failures: ContextBuilder.formatFailures(state.errorLog) || 'Earlier attempts did not succeed.',
          }
        : {}),
    });

    let parsed: OracleParse<PlannedSubtask[]>;
    try {
      const response = await this.ctx.oracle.decide(prompt.instruction, prompt.context);
      parsed = parseOracleJson(response, 'array', PlanSchema);
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      this.ctx.logger.warn('Decomposition oracle call failed; using fallback plan', { error: message });
      parsed = { kind: 'malformed', raw: '', reason: `Oracle call failed: ${message}` };
    }

    const taken = new Set(replanning ? state.subtasks.map((st) => st.id) : []);
    let planned: Subtask[];
    let fallbackReason: string | null = null;

    if (parsed.kind === 'parsed') {
      planned = parsed.value.map((item) => createSubtask(uniqueId(item.id, taken), item.description, dedupe(item.tools)));
    } else {
      fallbackReason = parsed.kind === 'empty' ? 'Oracle returned no plan' : parsed.reason;
      this.ctx.logger.warn('Falling back to a single subtask', { reason: fallbackReason });
      planned = [createSubtask(uniqueId(FALLBACK_SUBTASK_ID, taken), `Address request: ${state.originalRequest}`, state.availableTools)];
    }

    const subtasks = replanning ? [...state.subtasks, ...planned] : planned;
    const needsValidation = subtasks.some((st) => st.candidateTools.includes(this.ctx.validation.tool));

    const record = createProgressRecord('planning', 'decompose', `Decomposed request into ${planned.length} subtask(s): ${planned.map((st) => st.description).join(', ')}`, this.ctx.now(), {
      subtaskCount: planned.length,
      subtasks: planned.map((st) => ({ id: st.id, description: st.description, tools: st.candidateTools })),
      replan: replanning,
      fallback: fallbackReason !== null,
      ...(fallbackReason !== null ? { reason: fallbackReason } : {}),
    });

    this.ctx.logger.info(replanning ? 'Replanned request' : 'Decomposed request', { subtasks: planned.length, fallback: fallbackReason !== null });

    return {
      subtasks,
      currentTask: planned[0]?.id ?? null,
      needsValidation,
      replanFlag: false,
      progressLog: [record],
      iterationCount: state.iterationCount + 1,
    };
  }
}

/** Reserve `id` in `taken`, suffixing `_r1`, `_r2`, ... when it is already used */
export function uniqueId(id: string, taken: Set<string>): string {
  let candidate = id;
  for (let n = 1; taken.has(candidate); n++) {
    candidate = `${id}_r${n}`;
  }
  taken.add(candidate);
  return candidate;
}

function dedupe(values: string[]): string[] {
  return [...new Set(values.map((v) => v.trim()).filter((v) => v.length > 0))];
}
