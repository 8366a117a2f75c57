import chalk from 'chalk';
import type { RunResult } from '../orchestrator/data-flow';
import type { ProgressEvent } from '../orchestrator/events';
import type { StepName, Subtask, SubtaskStatus } from '../orchestrator/states';
import type { ToolDescriptor } from '../tools/types';

// ── Primitives ──────────────────────────────────────────────────────────

export function formatStep(message: string): string {
  return chalk.cyan(`> ${message}`);
}

export function formatInfo(message: string): string {
  return chalk.gray(`  ${message}`);
}

export function formatSuccess(message: string): string {
  return chalk.green(`  ${message}`);
}

export function formatError(message: string): string {
  return chalk.red(`  ${message}`);
}

export function formatWarning(message: string): string {
  return chalk.yellow(`  ${message}`);
}

// ── Step progress ───────────────────────────────────────────────────────

const STEP_LABELS: Record<StepName, string> = {
  decompose: 'Planning subtasks...',
  execute: 'Running tool...',
  validate: 'Cross-checking results...',
  recover: 'Recovering from error...',
  synthesize: 'Composing answer...',
};

export function formatStepStart(step: StepName, iteration: number): string {
  return chalk.cyan(`  [${iteration}] ${STEP_LABELS[step]}`);
}

const STATUS_MARKERS: Record<SubtaskStatus, [marker: string, paint: (text: string) => string]> = {
  pending: ['·', chalk.gray],
  in_progress: ['…', chalk.cyan],
  completed: ['✓', chalk.green],
  failed: ['✗', chalk.red],
};

export function formatSubtask(subtask: Pick<Subtask, 'id' | 'description' | 'status'>): string {
  const [marker, paint] = STATUS_MARKERS[subtask.status];
  return `    ${paint(marker)} ${subtask.id} ${subtask.description}`;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function stringField(data: Record<string, unknown>, key: string): string {
  const value = data[key];
  return typeof value === 'string' ? value : '';
}

/**
 * Human-readable rendering of a wire event; `null` for events that have
 * no console form (the final answer is printed with the result).
 */
export function formatProgressEvent(event: ProgressEvent): string | null {
  const data = event.data;
  switch (event.event_type) {
    case 'reasoning':
      return formatInfo(stringField(data, 'content'));
    case 'tool_execution': {
      const tool = stringField(data, 'tool_name');
      const error = stringField(data, 'error');
      return error ? formatWarning(`${tool} failed: ${error}`) : formatSuccess(`${tool} returned ${stringField(data, 'result').length} chars`);
    }
    case 'subtask_update': {
      const subtasks = Array.isArray(data.subtasks) ? data.subtasks : [];
      const lines = subtasks.flatMap((raw: unknown) => {
        if (!isRecord(raw)) return [];
        const status = stringField(raw, 'status');
        if (status !== 'pending' && status !== 'in_progress' && status !== 'completed' && status !== 'failed') return [];
        return [formatSubtask({ id: stringField(raw, 'id'), description: stringField(raw, 'description'), status })];
      });
      return lines.length ? lines.join('\n') : null;
    }
    case 'error':
      return formatError(`Engine error: ${stringField(data, 'message')}`);
    case 'final_answer':
    case 'done':
      return null;
  }
}

// ── Final result ────────────────────────────────────────────────────────

export function formatRunResult(result: RunResult, opts?: { verbose?: boolean }): string {
  const lines: string[] = [''];

  if (result.finalAnswer) {
    lines.push(chalk.bold('Answer'));
    lines.push(result.finalAnswer);
    lines.push('');
  }

  if (result.status === 'completed' && result.outcome === 'completed') {
    lines.push(chalk.green.bold('Run completed.'));
  } else if (result.status === 'completed') {
    lines.push(chalk.yellow.bold(`Run finished with outcome: ${result.outcome ?? 'unknown'}`));
  } else {
    lines.push(chalk.red.bold(`Run ${result.status}.`));
  }

  const completed = result.state.subtasks.filter((st) => st.status === 'completed').length;
  lines.push(formatInfo(`Run key:    ${result.runKey}`));
  lines.push(formatInfo(`Subtasks:   ${completed}/${result.state.subtasks.length} completed`));
  lines.push(formatInfo(`Tool calls: ${result.state.toolLog.length}`));
  lines.push(formatInfo(`Iterations: ${result.state.iterationCount}/${result.state.maxIterations}`));
  lines.push(formatInfo(`Duration:   ${(result.durationMs / 1000).toFixed(1)}s`));

  if (result.state.validations.length) {
    const mean = result.state.validations.reduce((sum, v) => sum + v.confidence, 0) / result.state.validations.length;
    lines.push(formatInfo(`Confidence: ${mean.toFixed(2)} over ${result.state.validations.length} check(s)`));
  }

  if (result.error) {
    lines.push(formatError(`Error: [${result.error.code}] ${result.error.message}`));
    if (result.error.details && opts?.verbose) {
      lines.push(formatInfo(`Details: ${result.error.details}`));
    }
  }

  return lines.join('\n');
}

export function formatToolDescriptor(tool: ToolDescriptor): string {
  const params = Object.entries(tool.parameters).map(([name, desc]) => formatInfo(`    ${name}: ${desc}`));
  return [chalk.bold(`  ${tool.name}`), ...(tool.description ? [formatInfo(`  ${tool.description}`)] : []), ...params].join('\n');
}
