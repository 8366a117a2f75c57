import { Command } from 'commander';
import path from 'node:path';
import { HistoryStore } from '../history-store';
import { formatError, formatInfo, formatSuccess } from '../formatters';
import { parseDate, parseIntOption, parseOutcome, parseStatus } from '../validators';
import { loadConfig } from '../../config/loader';

type HistoryCommandOptions = {
  status?: string;
  outcome?: string;
  from?: string;
  to?: string;
  limit?: string;
  export?: string;
  json?: boolean;
};

async function showList(store: HistoryStore, options: HistoryCommandOptions): Promise<void> {
  const entries = await store.list({
    status: parseStatus(options.status),
    outcome: parseOutcome(options.outcome),
    from: parseDate('from', options.from),
    to: parseDate('to', options.to),
    limit: parseIntOption('limit', options.limit),
  });

  if (options.export) {
    const exportPath = path.resolve(process.cwd(), options.export);
    await store.exportToFile(entries, exportPath);
  }

  if (options.json) {
    console.log(JSON.stringify(entries, null, 2));
    return;
  }

  if (!entries.length) {
    console.log(formatInfo('No history entries found.'));
    return;
  }

  console.log(formatSuccess('Run history'));
  for (const e of entries) {
    const outcome = e.outcome ? `/${e.outcome}` : '';
    console.log(formatInfo(`${e.updatedAt} ${e.runKey} ${e.status}${outcome} ${e.completedSubtasks}/${e.totalSubtasks} ${JSON.stringify(e.request)}`));
  }

  if (options.export) {
    console.log(formatInfo(`exported: ${options.export}`));
  }
}

export function registerHistoryCommand(program: Command): void {
  program
    .command('history')
    .description('List past runs')
    .option('--status <status>', 'Filter by run status (running, completed, failed)')
    .option('--outcome <outcome>', 'Filter by outcome (completed, partial, retries_exhausted, truncated)')
    .option('--from <date>', 'Filter by updatedAt >= date (ISO string)')
    .option('--to <date>', 'Filter by updatedAt <= date (ISO string)')
    .option('--limit <n>', 'Limit number of results')
    .option('--export <file>', 'Export results to JSON file')
    .option('--json', 'Output as JSON', false)
    .action(async (options: HistoryCommandOptions) => {
      try {
        const config = loadConfig();
        await showList(new HistoryStore({ rootDir: config.run.state_dir }), options);
      } catch (err) {
        const msg = err instanceof Error ? err.message : String(err);
        console.error(formatError(msg));
        process.exitCode = 1;
      }
    });
}
