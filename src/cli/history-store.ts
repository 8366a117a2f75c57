import fs from 'node:fs/promises';
import path from 'node:path';
import type { PersistedRun, RunOutcome, RunStatus } from '../orchestrator/states';
import { CheckpointStore } from '../orchestrator/state-store';
import { DEFAULT_STATE_DIR } from '../orchestrator/workflow';

export type HistoryStoreOptions = {
  rootDir?: string;
};

export type HistoryFilter = {
  status?: RunStatus;
  outcome?: RunOutcome;
  from?: Date;
  to?: Date;
  limit?: number;
};

export type HistoryEntrySummary = {
  runKey: string;
  status: RunStatus;
  outcome: RunOutcome | null;
  request: string;
  updatedAt: string;
  iterations: number;
  completedSubtasks: number;
  totalSubtasks: number;
  toolCalls: number;
  error?: PersistedRun['error'];
};

/** Read-side view over the checkpoints written by the engine */
export class HistoryStore {
  private checkpoints: CheckpointStore;

  constructor(opts?: HistoryStoreOptions) {
    this.checkpoints = new CheckpointStore(opts?.rootDir ?? DEFAULT_STATE_DIR);
  }

  async load(runKey: string): Promise<PersistedRun | null> {
    return this.checkpoints.load(runKey);
  }

  static toSummary(run: PersistedRun): HistoryEntrySummary {
    const { state } = run;
    return {
      runKey: run.runKey,
      status: run.status,
      outcome: state.outcome,
      request: state.originalRequest,
      updatedAt: run.updatedAt,
      iterations: state.iterationCount,
      completedSubtasks: state.subtasks.filter((st) => st.status === 'completed').length,
      totalSubtasks: state.subtasks.length,
      toolCalls: state.toolLog.length,
      ...(run.error ? { error: run.error } : {}),
    };
  }

  private matchesFilter(summary: HistoryEntrySummary, filter: HistoryFilter): boolean {
    if (filter.status && summary.status !== filter.status) return false;
    if (filter.outcome && summary.outcome !== filter.outcome) return false;

    const updatedAtMs = Date.parse(summary.updatedAt);
    if (Number.isFinite(updatedAtMs)) {
      if (filter.from && updatedAtMs < filter.from.getTime()) return false;
      if (filter.to && updatedAtMs > filter.to.getTime()) return false;
    }

    return true;
  }

  /** Summaries matching `filter`, newest first */
  async list(filter: HistoryFilter = {}): Promise<HistoryEntrySummary[]> {
    const runs = await this.checkpoints.list();
    const summaries = runs.map((r) => HistoryStore.toSummary(r)).filter((s) => this.matchesFilter(s, filter));

    if (filter.limit && filter.limit > 0) {
      return summaries.slice(0, filter.limit);
    }
    return summaries;
  }

  async latest(): Promise<HistoryEntrySummary | null> {
    const list = await this.list({ limit: 1 });
    return list[0] ?? null;
  }

  async exportToFile(entries: HistoryEntrySummary[], filePath: string): Promise<void> {
    await fs.mkdir(path.dirname(filePath), { recursive: true });
    await fs.writeFile(filePath, JSON.stringify(entries, null, 2), 'utf8');
  }
}
