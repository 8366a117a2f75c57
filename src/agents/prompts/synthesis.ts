import type { RunOutcome } from '../../orchestrator/states';
import type { OraclePrompt } from './decomposition';

const OUTCOME_NOTES: Record<RunOutcome, string> = {
  completed: 'All subtasks completed.',
  partial: 'Some subtasks did not complete. Say which parts of the request could not be answered.',
  retries_exhausted: 'Recovery attempts were exhausted. Present the partial results and say what is missing.',
  truncated: 'The run hit its iteration limit before finishing. Present what was gathered and say the answer is incomplete.',
};

export interface SynthesisPromptInput {
  request: string;
  completedSubtasks: string;
  toolCalls: string;
  validations: string;
  outcome: RunOutcome;
}

export function buildSynthesisPrompt(input: SynthesisPromptInput): OraclePrompt {
  const instruction = `You are writing the final answer for a user's request.

Use ONLY the subtask results and tool calls provided. Do not invent figures.

### GUIDELINES
- Answer the request directly, then give the supporting numbers.
- Mention validation confidence when cross-checks were run.
- Keep the answer concise and readable.

### RUN STATUS
${OUTCOME_NOTES[input.outcome]}
`;

  const sections = [`### REQUEST\n${input.request}`, `### COMPLETED SUBTASKS\n${input.completedSubtasks || '(none)'}`, `### TOOL CALLS\n${input.toolCalls || '(none)'}`];
  if (input.validations) sections.push(`### VALIDATION\n${input.validations}`);

  return { instruction, context: sections.join('\n\n') };
}

export function describeOutcome(outcome: RunOutcome): string {
  return OUTCOME_NOTES[outcome];
}
