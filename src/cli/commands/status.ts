import { Command } from 'commander';
import { HistoryStore } from '../history-store';
import { formatError, formatInfo, formatSubtask, formatSuccess } from '../formatters';
import { validateRunKey } from '../validators';
import { loadConfig } from '../../config/loader';
import type { PersistedRun } from '../../orchestrator/states';

type StatusCommandOptions = {
  runKey?: string;
  json?: boolean;
};

async function resolveRun(store: HistoryStore, runKey?: string): Promise<PersistedRun | null> {
  if (runKey) {
    return store.load(validateRunKey(runKey));
  }

  const latest = await store.latest();
  if (!latest) return null;
  return store.load(latest.runKey);
}

function renderText(run: PersistedRun): void {
  const { state } = run;

  console.log(formatSuccess('Run status'));
  console.log(formatInfo(`runKey: ${run.runKey}`));
  console.log(formatInfo(`request: ${state.originalRequest}`));
  console.log(formatInfo(`status: ${run.status}${state.outcome ? ` (${state.outcome})` : ''}`));
  console.log(formatInfo(`lastStep: ${run.lastStep ?? '-'}`));
  console.log(formatInfo(`iterations: ${state.iterationCount}/${state.maxIterations}`));
  console.log(formatInfo(`retries: ${state.retryCount}/${state.maxRetries}`));
  console.log(formatInfo(`updatedAt: ${run.updatedAt}`));

  if (state.subtasks.length) {
    console.log(formatInfo('subtasks:'));
    for (const st of state.subtasks) console.log(formatSubtask(st));
  }

  if (run.error) {
    console.log(formatError(`error: ${run.error.code} - ${run.error.message}`));
  }

  if (state.finalAnswer) {
    console.log('');
    console.log(state.finalAnswer);
  }
}

export function registerStatusCommand(program: Command): void {
  program
    .command('status')
    .description('Show the state of the latest (or a given) run')
    .option('--run-key <key>', 'Show status for a specific run key')
    .option('--json', 'Output status as JSON', false)
    .action(async (options: StatusCommandOptions) => {
      try {
        const config = loadConfig();
        const store = new HistoryStore({ rootDir: config.run.state_dir });

        const run = await resolveRun(store, options.runKey);

        if (!run) {
          const msg = options.runKey ? `No checkpoint found for run key: ${options.runKey}` : 'No runs found.';
          console.log(formatInfo(msg));
          return;
        }

        if (options.json) {
          console.log(JSON.stringify(run, null, 2));
          return;
        }

        renderText(run);
      } catch (err) {
        const msg = err instanceof Error ? err.message : String(err);
        console.error(formatError(msg));
        process.exitCode = 1;
      }
    });
}
