import fs from 'fs/promises';
import path from 'path';
import { z } from 'zod';
import type { PersistedRun } from './states';

export const CHECKPOINT_FILE = 'state.json';

const StepNameSchema = z.enum(['decompose', 'execute', 'validate', 'recover', 'synthesize']);

const SubtaskSchema = z.object({
  id: z.string(),
  description: z.string(),
  status: z.enum(['pending', 'in_progress', 'completed', 'failed']),
  candidateTools: z.array(z.string()),
  result: z.string().optional(),
  error: z.string().optional(),
  attemptCount: z.number().int().nonnegative(),
});

const ToolExecutionSchema = z.object({
  toolName: z.string(),
  arguments: z.record(z.unknown()),
  result: z.string().optional(),
  error: z.string().optional(),
  timestamp: z.string(),
  subtaskId: z.string(),
});

const RunStateSchema = z.object({
  originalRequest: z.string(),
  currentTask: z.string().nullable(),
  subtasks: z.array(SubtaskSchema),
  completedIds: z.array(z.string()),
  toolLog: z.array(ToolExecutionSchema),
  progressLog: z.array(
    z.object({
      kind: z.enum(['planning', 'tool_call', 'validation', 'recovery', 'summary']),
      step: StepNameSchema,
      content: z.string(),
      timestamp: z.string(),
      metadata: z.record(z.unknown()),
    }),
  ),
  availableTools: z.array(z.string()),
  iterationCount: z.number().int().nonnegative(),
  maxIterations: z.number().int().positive(),
  validations: z.array(
    z.object({
      isValid: z.boolean(),
      confidence: z.number(),
      issues: z.array(z.string()),
      crossCheck: z.record(z.unknown()),
      toolLogIndex: z.number().int().nonnegative(),
    }),
  ),
  needsValidation: z.boolean(),
  errorLog: z.array(z.object({ subtaskId: z.string(), toolName: z.string(), message: z.string(), timestamp: z.string() })),
  retryCount: z.number().int().nonnegative(),
  maxRetries: z.number().int().nonnegative(),
  resultsBySubtask: z.record(z.string()),
  finalAnswer: z.string().nullable(),
  continueFlag: z.boolean(),
  replanFlag: z.boolean(),
  errorRecoveryFlag: z.boolean(),
  outcome: z.enum(['completed', 'partial', 'retries_exhausted', 'truncated']).nullable(),
});

/** Shape a checkpoint file must have to be resumed or listed */
export const PersistedRunSchema: z.ZodType<PersistedRun> = z.object({
  runKey: z.string().min(1),
  status: z.enum(['running', 'completed', 'failed']),
  lastStep: StepNameSchema.nullable(),
  updatedAt: z.string(),
  state: RunStateSchema,
  error: z.object({ code: z.string(), message: z.string(), details: z.string().optional() }).optional(),
});

/** Persistence for run checkpoints, keyed by run key. `load` yields null for a missing or malformed checkpoint */
export interface RunStore {
  save(run: PersistedRun): Promise<void>;
  load(runKey: string): Promise<PersistedRun | null>;
  exists(runKey: string): Promise<boolean>;
  list(): Promise<PersistedRun[]>;
}

/** Stores each run at `<stateDir>/<runKey>/state.json` */
export class CheckpointStore implements RunStore {
  constructor(private stateDir: string) {}

  pathFor(runKey: string): string {
    return path.join(this.stateDir, runKey, CHECKPOINT_FILE);
  }

  async save(run: PersistedRun): Promise<void> {
    const file = this.pathFor(run.runKey);
    await fs.mkdir(path.dirname(file), { recursive: true });
    await fs.writeFile(file, JSON.stringify(run, null, 2), 'utf-8');
  }

  async load(runKey: string): Promise<PersistedRun | null> {
    try {
      const data = await fs.readFile(this.pathFor(runKey), 'utf-8');
      const parsed = PersistedRunSchema.safeParse(JSON.parse(data));
      return parsed.success ? parsed.data : null;
    } catch {
      return null;
    }
  }

  async exists(runKey: string): Promise<boolean> {
    try {
      await fs.access(this.pathFor(runKey));
      return true;
    } catch {
      return false;
    }
  }

  /** All readable checkpoints, most recently updated first */
  async list(): Promise<PersistedRun[]> {
    let entries: string[];
    try {
      entries = await fs.readdir(this.stateDir);
    } catch {
      return [];
    }

    const runs = await Promise.all(entries.map((key) => this.load(key)));
    return runs.filter((run): run is PersistedRun => run !== null).sort((a, b) => b.updatedAt.localeCompare(a.updatedAt));
  }
}
