import { Command } from 'commander';
import { loadConfig } from '../../config/loader';
import { formatError, formatStep } from '../formatters';
import { validateRunKey } from '../validators';
import { openSession, reportResult } from './run';

type ResumeCommandOptions = {
  runKey: string;
  json?: boolean;
  verbose?: boolean;
};

export function registerResumeCommand(program: Command): void {
  program
    .command('resume')
    .description('Continue a checkpointed run')
    .requiredOption('--run-key <key>', 'Key of the run to resume')
    .option('--json', 'Print raw progress events as JSON lines', false)
    .option('--verbose', 'Show detailed output')
    .action(async (options: ResumeCommandOptions) => {
      try {
        const runKey = validateRunKey(options.runKey);
        const verbose = program.opts().verbose === true || Boolean(options.verbose);
        const json = Boolean(options.json);

        const config = loadConfig();
        if (!json) console.log(formatStep(`Resuming ${runKey}`));

        const { engine } = await openSession(config, runKey, { verbose, json });
        const result = await engine.resume();

        reportResult(result, { verbose, json });
      } catch (err) {
        const msg = err instanceof Error ? err.message : String(err);
        console.error(formatError(msg));
        process.exitCode = 1;
      }
    });
}
