/**
 * Prompt for the request decomposer.
 *
 * The oracle splits a user request into ordered subtasks and nominates the
 * tools that could serve each one. On a replan it also sees which subtasks
 * already exist and what went wrong, so it can take a different route.
 */

export interface OraclePrompt {
  instruction: string;
  context: string;
}

export interface DecompositionPromptInput {
  request: string;
  toolCatalog: string;
  existingSubtasks?: string;
  failures?: string;
}

export function buildDecompositionPrompt(input: DecompositionPromptInput): OraclePrompt {
  const replanning = Boolean(input.failures);

  const instruction = `You are a planning assistant for a tool-using agent.

Your task: break the user's request into a short, ordered list of subtasks.
Each subtask must be small enough to be answered by a single tool call.

### AVAILABLE TOOLS
${input.toolCatalog}

### INSTRUCTIONS
- Use only the tools listed above.
- Order subtasks so that later ones can use the results of earlier ones.
- Give every subtask a unique id such as "task_1", "task_2".
- Keep descriptions short and concrete.${
    replanning
      ? `
- A previous plan partly failed. Propose NEW subtasks that reach the goal another way.
- Do not repeat subtasks that already completed.`
      : ''
  }

### OUTPUT FORMAT

Return ONLY a JSON array. No markdown. No explanation.

[
  { "id": "task_1", "description": "Fetch the formula for account 1001", "tools": ["get_hpl_formula"] }
]
`;

  const sections = [`### REQUEST\n${input.request}`];
  if (input.existingSubtasks) sections.push(`### EXISTING SUBTASKS\n${input.existingSubtasks}`);
  if (input.failures) sections.push(`### FAILURES SO FAR\n${input.failures}`);

  return { instruction, context: sections.join('\n\n') };
}
