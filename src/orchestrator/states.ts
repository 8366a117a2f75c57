export type StepName = 'decompose' | 'execute' | 'validate' | 'recover' | 'synthesize';

export type SubtaskStatus = 'pending' | 'in_progress' | 'completed' | 'failed';

export interface Subtask {
  id: string;
  description: string;
  status: SubtaskStatus;
  candidateTools: string[];
  result?: string;
  error?: string;
  attemptCount: number;
}

/** One invocation of the tool service. Never edited after it is appended. */
export interface ToolExecution {
  readonly toolName: string;
  readonly arguments: Readonly<Record<string, unknown>>;
  readonly result?: string;
  readonly error?: string;
  readonly timestamp: string;
  readonly subtaskId: string;
}

export interface ValidationResult {
  isValid: boolean;
  confidence: number;
  issues: string[];
  crossCheck: Record<string, unknown>;
  /** Index into `toolLog` of the execution this result covers */
  toolLogIndex: number;
}

export interface ErrorRecord {
  readonly subtaskId: string;
  readonly toolName: string;
  readonly message: string;
  readonly timestamp: string;
}

export type ProgressKind = 'planning' | 'tool_call' | 'validation' | 'recovery' | 'summary';

export interface ProgressRecord {
  kind: ProgressKind;
  step: StepName;
  content: string;
  timestamp: string;
  metadata: Record<string, unknown>;
}

export type RunOutcome = 'completed' | 'partial' | 'retries_exhausted' | 'truncated';

export interface RunState {
  originalRequest: string;
  currentTask: string | null;
  subtasks: Subtask[];
  completedIds: string[];
  toolLog: ToolExecution[];
  progressLog: ProgressRecord[];
  availableTools: string[];
  iterationCount: number;
  maxIterations: number;
  validations: ValidationResult[];
  needsValidation: boolean;
  errorLog: ErrorRecord[];
  retryCount: number;
  maxRetries: number;
  resultsBySubtask: Record<string, string>;
  finalAnswer: string | null;
  continueFlag: boolean;
  replanFlag: boolean;
  errorRecoveryFlag: boolean;
  outcome: RunOutcome | null;
}

/** Sparse update returned by a step handler */
export type RunUpdate = Partial<RunState>;

export type RunStatus = 'running' | 'completed' | 'failed';

export interface PersistedRun {
  runKey: string;
  status: RunStatus;
  lastStep: StepName | null;
  updatedAt: string;
  state: RunState;
  error?: {
    code: string;
    message: string;
    details?: string;
  };
}
