#!/usr/bin/env node
import { Command } from 'commander';
import { registerCommands } from './commands';

export function createProgram(): Command {
  const program = new Command();

  program.name('stepwise').description('Answer requests by planning, running and cross-checking tool calls').version('0.1.0').option('--verbose', 'Show detailed output', false);

  registerCommands(program);
  return program;
}

if (require.main === module) {
  createProgram()
    .parseAsync(process.argv)
    .catch((err: unknown) => {
      console.error(err instanceof Error ? err.message : String(err));
      process.exitCode = 1;
    });
}
