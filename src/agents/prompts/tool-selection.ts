import type { OraclePrompt } from './decomposition';

export interface ToolSelectionPromptInput {
  request: string;
  subtaskId: string;
  subtaskDescription: string;
  toolCatalog: string;
  previousResults: string;
  failedTools: string[];
}

export const getToolSelectionPrompt = (input: ToolSelectionPromptInput): OraclePrompt => {
  const avoid = input.failedTools.length
    ? `\n- These tools already failed for this subtask; prefer a different tool or different arguments: ${input.failedTools.join(', ')}`
    : '';

  const instruction = `
ACT AS: Tool operator
TASK: Choose exactly one tool call that completes the current subtask.

### CANDIDATE TOOLS
${input.toolCatalog}

### RULES
- Pick one tool from the candidates above.
- Fill in every argument the tool needs, using values from the request or previous results.${avoid}

### OUTPUT REQUIREMENTS
Return a single JSON object. Do NOT wrap it in markdown code blocks.
{
  "tool": "tool_name",
  "arguments": { "param": "value" }
}
`;

  const context = `### REQUEST
${input.request}

### CURRENT SUBTASK
${input.subtaskId}: ${input.subtaskDescription}

### PREVIOUS RESULTS
${input.previousResults || '(none yet)'}
`;

  return { instruction, context };
};
