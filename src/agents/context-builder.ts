import type { ErrorRecord, Subtask, ToolExecution, ValidationResult } from '../orchestrator/states';
import type { ToolDescriptor } from '../tools/types';

/**
 * ContextBuilder renders run state into the plain-text sections that the
 * oracle prompts embed.
 */
export class ContextBuilder {
  static truncate(text: string, maxChars: number): string {
    return text.length > maxChars ? `${text.slice(0, maxChars)}...` : text;
  }

  /** `- name(param: desc, ...) - description` per tool; restricted to `names` when given */
  static formatCatalog(catalog: ToolDescriptor[], names?: string[]): string {
    const selected = names ? catalog.filter((t) => names.includes(t.name)) : catalog;
    if (!selected.length) {
      return names?.length ? names.map((n) => `- ${n}`).join('\n') : '(no tool documentation available)';
    }
    return selected
      .map((t) => {
        const params = Object.entries(t.parameters)
          .map(([name, desc]) => `${name}: ${desc}`)
          .join(', ');
        return `- ${t.name}(${params})${t.description ? ` - ${t.description}` : ''}`;
      })
      .join('\n');
  }

  static formatResults(resultsBySubtask: Record<string, string>): string {
    const entries = Object.entries(resultsBySubtask);
    if (!entries.length) return '';
    return entries.map(([id, result]) => `- ${id}: ${result}`).join('\n');
  }

  static formatCompleted(subtasks: Subtask[], resultsBySubtask: Record<string, string>): string {
    return subtasks
      .filter((st) => st.status === 'completed')
      .map((st) => `${st.id}: ${st.description}\nResult: ${resultsBySubtask[st.id] ?? st.result ?? ''}`)
      .join('\n\n');
  }

  static formatToolLog(toolLog: ToolExecution[], maxChars: number): string {
    return toolLog
      .map((e) => {
        const outcome = e.error !== undefined ? `ERROR ${ContextBuilder.truncate(e.error, maxChars)}` : ContextBuilder.truncate(e.result ?? '', maxChars);
        return `- ${e.toolName}(${JSON.stringify(e.arguments)}): ${outcome}`;
      })
      .join('\n');
  }

  static formatValidations(validations: ValidationResult[]): string {
    return validations
      .map((v) => {
        const issues = v.issues.length ? `, Issues: ${v.issues.join(', ')}` : '';
        return `- Confidence: ${v.confidence.toFixed(2)}, Valid: ${v.isValid}${issues}`;
      })
      .join('\n');
  }

  static formatFailures(errors: ErrorRecord[]): string {
    return errors.map((e) => `- ${e.subtaskId} (${e.toolName}): ${e.message}`).join('\n');
  }
}
