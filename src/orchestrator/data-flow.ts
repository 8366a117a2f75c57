import type { ErrorRecord, ProgressKind, ProgressRecord, RunOutcome, RunState, RunStatus, RunUpdate, StepName, Subtask, SubtaskStatus, ToolExecution } from './states';

// ── Input / Output Interfaces ───────────────────────────────────────────

/** Input parameters to start a run */
export interface RunInput {
  request: string;
  availableTools: string[];
  maxIterations?: number;
  maxRetries?: number;
}

/** Complete result returned when a run finishes */
export interface RunResult {
  status: RunStatus;
  runKey: string;
  finalAnswer: string | null;
  outcome: RunOutcome | null;
  state: RunState;
  steps: StepName[];
  error?: {
    code: string;
    message: string;
    details?: string;
  };
  durationMs: number;
}

// ── Constants ───────────────────────────────────────────────────────────

export const DEFAULT_MAX_ITERATIONS = 15;
export const DEFAULT_MAX_RETRIES = 3;

/** Id given to the single subtask created when decomposition yields nothing usable */
export const FALLBACK_SUBTASK_ID = 'task_1';

// ── Merge Policy ────────────────────────────────────────────────────────

type Reducer<T> = (current: T, incoming: T) => T;

const append = <T>(current: readonly T[], incoming: readonly T[]): T[] => [...current, ...incoming];

const overwrite = <T>(_current: T, incoming: T): T => incoming;

/**
 * Field-level merge policy for partial updates. Sequences marked `append`
 * are concatenated (never deduplicated); everything else is replaced.
 */
export const MERGE_POLICY: { [K in keyof RunState]: Reducer<RunState[K]> } = {
  originalRequest: overwrite,
  currentTask: overwrite,
  subtasks: overwrite,
  completedIds: append,
  toolLog: append,
  progressLog: append,
  availableTools: overwrite,
  iterationCount: overwrite,
  maxIterations: overwrite,
  validations: append,
  needsValidation: overwrite,
  errorLog: append,
  retryCount: overwrite,
  maxRetries: overwrite,
  resultsBySubtask: overwrite,
  finalAnswer: overwrite,
  continueFlag: overwrite,
  replanFlag: overwrite,
  errorRecoveryFlag: overwrite,
  outcome: overwrite,
};

function isRunStateField(key: string): key is keyof RunState {
  return Object.prototype.hasOwnProperty.call(MERGE_POLICY, key);
}

function mergeField<K extends keyof RunState>(target: RunState, key: K, incoming: RunState[K]): void {
  target[key] = MERGE_POLICY[key](target[key], incoming);
}

/** Merge a handler's partial update into the run state, returning a new state */
export function mergeUpdate(state: Readonly<RunState>, update: RunUpdate): RunState {
  const next: RunState = { ...state };
  for (const key of Object.keys(update)) {
    if (!isRunStateField(key)) continue;
    const incoming = update[key];
    if (incoming !== undefined) {
      mergeField(next, key, incoming);
    }
  }
  return next;
}

// ── Factories ───────────────────────────────────────────────────────────

export function createInitialState(input: RunInput): RunState {
  return {
    originalRequest: input.request,
    currentTask: null,
    subtasks: [],
    completedIds: [],
    toolLog: [],
    progressLog: [],
    availableTools: [...input.availableTools],
    iterationCount: 0,
    maxIterations: input.maxIterations ?? DEFAULT_MAX_ITERATIONS,
    validations: [],
    needsValidation: false,
    errorLog: [],
    retryCount: 0,
    maxRetries: input.maxRetries ?? DEFAULT_MAX_RETRIES,
    resultsBySubtask: {},
    finalAnswer: null,
    continueFlag: true,
    replanFlag: false,
    errorRecoveryFlag: false,
    outcome: null,
  };
}

export function createSubtask(id: string, description: string, candidateTools: string[]): Subtask {
  return { id, description, status: 'pending', candidateTools: [...candidateTools], attemptCount: 0 };
}

export function createProgressRecord(kind: ProgressKind, step: StepName, content: string, timestamp: string, metadata: Record<string, unknown> = {}): ProgressRecord {
  return { kind, step, content, timestamp, metadata };
}

export function createToolExecution(params: { toolName: string; arguments: Record<string, unknown>; subtaskId: string; timestamp: string; result?: string; error?: string }): ToolExecution {
  const execution: ToolExecution = {
    toolName: params.toolName,
    arguments: { ...params.arguments },
    subtaskId: params.subtaskId,
    timestamp: params.timestamp,
    ...(params.result !== undefined ? { result: params.result } : {}),
    ...(params.error !== undefined ? { error: params.error } : {}),
  };
  return Object.freeze(execution);
}

export function createErrorRecord(subtaskId: string, toolName: string, message: string, timestamp: string): ErrorRecord {
  return Object.freeze({ subtaskId, toolName, message, timestamp });
}

// ── Subtask helpers ─────────────────────────────────────────────────────

const ALLOWED_TRANSITIONS: Record<SubtaskStatus, SubtaskStatus[]> = {
  pending: ['in_progress'],
  in_progress: ['completed', 'failed'],
  completed: [],
  // Re-queued by the recovery strategist for a retry tactic
  failed: ['in_progress'],
};

export function canTransition(from: SubtaskStatus, to: SubtaskStatus): boolean {
  return ALLOWED_TRANSITIONS[from].includes(to);
}

/**
 * Return a copy of `subtasks` with the subtask `id` patched.
 * @throws Error if the status change is not an allowed transition.
 */
export function updateSubtask(subtasks: readonly Subtask[], id: string, patch: Partial<Omit<Subtask, 'id'>>): Subtask[] {
  return subtasks.map((st) => {
    if (st.id !== id) return st;
    if (patch.status && patch.status !== st.status && !canTransition(st.status, patch.status)) {
      throw new Error(`Invalid subtask transition for ${id}: ${st.status} -> ${patch.status}`);
    }
    return { ...st, ...patch };
  });
}

export function isResolved(subtask: Subtask): boolean {
  return subtask.status === 'completed' || subtask.status === 'failed';
}

export function firstPending(subtasks: readonly Subtask[]): Subtask | undefined {
  return subtasks.find((st) => st.status === 'pending');
}

export function countCompleted(state: Readonly<RunState>): number {
  return state.subtasks.filter((st) => st.status === 'completed').length;
}
