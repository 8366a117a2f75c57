import { Command } from 'commander';
import { loadConfig } from '../../config/loader';
import { HttpToolService } from '../../tools/client';
import { formatError, formatInfo, formatSuccess, formatToolDescriptor } from '../formatters';

type ToolsCommandOptions = {
  json?: boolean;
};

export function registerToolsCommand(program: Command): void {
  program
    .command('tools')
    .description('List the tools offered by the configured tool service')
    .option('--json', 'Output as JSON', false)
    .action(async (options: ToolsCommandOptions) => {
      try {
        const config = loadConfig();
        const service = new HttpToolService({ baseUrl: config.tools.url, token: config.tools.token, timeout: config.tools.timeout_ms });
        const tools = await service.listTools();

        if (options.json) {
          console.log(JSON.stringify(tools, null, 2));
          return;
        }

        if (!tools.length) {
          console.log(formatInfo(`No tools offered by ${config.tools.url}`));
          return;
        }

        console.log(formatSuccess(`${tools.length} tool(s) at ${config.tools.url}`));
        for (const tool of tools) console.log(formatToolDescriptor(tool));
      } catch (err) {
        const msg = err instanceof Error ? err.message : String(err);
        console.error(formatError(msg));
        process.exitCode = 1;
      }
    });
}
