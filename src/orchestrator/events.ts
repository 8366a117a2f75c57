import { EventEmitter } from 'events';
import type { ProgressRecord, RunState, RunUpdate, StepName, Subtask, ToolExecution } from './states';
import type { RunResult } from './data-flow';
import { countCompleted } from './data-flow';

// ── Wire shape ──────────────────────────────────────────────────────────

export type ProgressEventType = 'reasoning' | 'subtask_update' | 'tool_execution' | 'final_answer' | 'done' | 'error';

export interface StateSnapshot {
  iteration_count: number;
  completed_count: number;
  total_subtasks: number;
}

/** Event as exposed to front ends; field names are part of the wire format */
export interface ProgressEvent {
  event_type: ProgressEventType;
  data: Record<string, unknown>;
  state_snapshot?: StateSnapshot;
}

/** Emitted on every step boundary, before the handler runs */
export interface StepEvent {
  runKey: string;
  step: StepName;
  iteration: number;
  timestamp: string;
}

export class RunEvents extends EventEmitter {
  emitProgress(event: ProgressEvent): void {
    this.emit('progress', event);
  }

  emitStep(event: StepEvent): void {
    this.emit('step', event);
  }

  onProgress(listener: (event: ProgressEvent) => void): this {
    return this.on('progress', listener);
  }

  onStep(listener: (event: StepEvent) => void): this {
    return this.on('step', listener);
  }
}

// ── Translation ─────────────────────────────────────────────────────────

export function snapshot(state: Readonly<RunState>): StateSnapshot {
  return {
    iteration_count: state.iterationCount,
    completed_count: countCompleted(state),
    total_subtasks: state.subtasks.length,
  };
}

function reasoningData(record: ProgressRecord): Record<string, unknown> {
  return { kind: record.kind, step: record.step, content: record.content, timestamp: record.timestamp, metadata: record.metadata };
}

function subtaskData(subtask: Subtask): Record<string, unknown> {
  return {
    id: subtask.id,
    description: subtask.description,
    status: subtask.status,
    candidate_tools: subtask.candidateTools,
    attempt_count: subtask.attemptCount,
    ...(subtask.result !== undefined ? { result: subtask.result } : {}),
    ...(subtask.error !== undefined ? { error: subtask.error } : {}),
  };
}

function executionData(execution: ToolExecution): Record<string, unknown> {
  return {
    tool_name: execution.toolName,
    arguments: execution.arguments,
    subtask_id: execution.subtaskId,
    timestamp: execution.timestamp,
    ...(execution.result !== undefined ? { result: execution.result } : {}),
    ...(execution.error !== undefined ? { error: execution.error } : {}),
  };
}

/**
 * Translate one merged step update into wire events. `state` must be the
 * state after the merge so every snapshot reflects committed values.
 */
export function toWireEvents(step: StepName, update: RunUpdate, state: Readonly<RunState>): ProgressEvent[] {
  const state_snapshot = snapshot(state);
  const events: ProgressEvent[] = [];

  for (const record of update.progressLog ?? []) {
    events.push({ event_type: 'reasoning', data: reasoningData(record), state_snapshot });
  }

  if (update.subtasks !== undefined) {
    events.push({ event_type: 'subtask_update', data: { subtasks: state.subtasks.map(subtaskData) }, state_snapshot });
  }

  for (const execution of update.toolLog ?? []) {
    events.push({ event_type: 'tool_execution', data: executionData(execution), state_snapshot });
  }

  if (step === 'synthesize' && update.finalAnswer !== undefined) {
    events.push({ event_type: 'final_answer', data: { answer: update.finalAnswer, outcome: state.outcome }, state_snapshot });
  }

  return events;
}

export function doneEvent(result: RunResult): ProgressEvent {
  return {
    event_type: 'done',
    data: {
      run_key: result.runKey,
      status: result.status,
      outcome: result.outcome,
      steps: result.steps.length,
      duration_ms: result.durationMs,
      ...(result.error ? { error: result.error.message } : {}),
    },
    state_snapshot: snapshot(result.state),
  };
}

export function errorEvent(message: string, step: StepName | null, state: Readonly<RunState>): ProgressEvent {
  return { event_type: 'error', data: { message, step }, state_snapshot: snapshot(state) };
}
