import { Command } from 'commander';
import { registerRunCommand } from './run';
import { registerResumeCommand } from './resume';
import { registerStatusCommand } from './status';
import { registerHistoryCommand } from './history';
import { registerToolsCommand } from './tools';

/**
 * Register all subcommands here
 */
export function registerCommands(program: Command): void {
  registerRunCommand(program);
  registerResumeCommand(program);
  registerStatusCommand(program);
  registerHistoryCommand(program);
  registerToolsCommand(program);
}
