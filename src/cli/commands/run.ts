import { Command } from 'commander';
import crypto from 'node:crypto';
import { loadConfig } from '../../config/loader';
import type { Config } from '../../config/validator';
import { formatError, formatInfo, formatProgressEvent, formatRunResult, formatStep, formatStepStart } from '../formatters';
import { ValidationError, parseIntOption, validateRunKey } from '../validators';
import { createRunContext, createRunCoordinator } from '../../orchestrator/register-handlers';
import { RunEngine } from '../../orchestrator/workflow';
import type { RunLogger } from '../../orchestrator/workflow';
import { CheckpointStore } from '../../orchestrator/state-store';
import type { RunResult } from '../../orchestrator/data-flow';
import type { RunContext } from '../../agents/types';

// ── Types ───────────────────────────────────────────────────────────────

export type RunCommandOptions = {
  runKey?: string;
  maxIterations?: string;
  maxRetries?: string;
  json?: boolean;
  verbose?: boolean;
};

// ── Verbose-aware logger ────────────────────────────────────────────────

/** Logger that writes to the console; info and debug only when verbose */
export class CliRunLogger implements RunLogger {
  constructor(
    private runKey: string,
    private verbose: boolean,
  ) {}

  info(message: string, data?: Record<string, unknown>): void {
    if (this.verbose) {
      console.log(formatInfo(`[${this.runKey.slice(0, 8)}] ${message}${suffix(data)}`));
    }
  }

  warn(message: string, data?: Record<string, unknown>): void {
    console.warn(formatInfo(`WARN: ${message}${suffix(data)}`));
  }

  error(message: string, data?: Record<string, unknown>): void {
    console.error(formatError(`${message}${suffix(data)}`));
  }

  debug(message: string, data?: Record<string, unknown>): void {
    if (this.verbose) {
      console.log(formatInfo(`DEBUG: ${message}${suffix(data)}`));
    }
  }
}

function suffix(data?: Record<string, unknown>): string {
  return data ? ` ${JSON.stringify(data)}` : '';
}

// ── Session wiring ──────────────────────────────────────────────────────

export interface RunSession {
  engine: RunEngine;
  ctx: RunContext;
}

/**
 * Build an engine for `runKey` from configuration and attach console
 * output. With `json` set, stdout carries only wire events (one per line).
 */
export async function openSession(config: Config, runKey: string, opts: { verbose: boolean; json: boolean }): Promise<RunSession> {
  const logger = new CliRunLogger(runKey, opts.verbose && !opts.json);
  const ctx = await createRunContext({ config, logger });

  const engine = new RunEngine({
    coordinator: createRunCoordinator(ctx),
    runKey,
    store: new CheckpointStore(config.run.state_dir),
    logger,
    maxIterations: config.run.max_iterations,
    maxRetries: config.run.max_retries,
    policy: { validationTool: config.validation.tool },
    oracle: ctx.oracle,
    tools: ctx.tools,
    closeOnFinish: true,
  });

  engine.events.onProgress((event) => {
    if (opts.json) {
      console.log(JSON.stringify(event));
      return;
    }
    const line = formatProgressEvent(event);
    if (line !== null) console.log(line);
  });

  if (opts.verbose && !opts.json) {
    engine.events.onStep((event) => console.log(formatStepStart(event.step, event.iteration)));
  }

  return { engine, ctx };
}

export function reportResult(result: RunResult, opts: { verbose: boolean; json: boolean }): void {
  if (!opts.json) {
    console.log(formatRunResult(result, { verbose: opts.verbose }));
  }
  if (result.status === 'failed') {
    process.exitCode = 1;
  }
}

// ── Command registration ────────────────────────────────────────────────

export function registerRunCommand(program: Command): void {
  program
    .command('run')
    .description('Answer a request by planning and running tool calls')
    .argument('<request...>', 'The request, in plain language')
    .option('--run-key <key>', 'Resumability key (random if omitted)')
    .option('--max-iterations <n>', 'Iteration ceiling for the run')
    .option('--max-retries <n>', 'Recovery attempts before giving up')
    .option('--json', 'Print raw progress events as JSON lines', false)
    .option('--verbose', 'Show detailed output')
    .action(async (request: string[], options: RunCommandOptions) => {
      await executeRunCommand(request, options, program.opts().verbose === true);
    });
}

// ── Main execution ──────────────────────────────────────────────────────

export async function executeRunCommand(requestWords: string[], options: RunCommandOptions, globalVerbose = false): Promise<void> {
  try {
    const request = requestWords.join(' ').trim();
    if (!request) {
      throw new ValidationError('Request must not be empty');
    }

    const runKey = options.runKey ? validateRunKey(options.runKey) : crypto.randomUUID();
    const maxIterations = parseIntOption('max-iterations', options.maxIterations);
    const maxRetries = parseIntOption('max-retries', options.maxRetries, 0);
    const verbose = globalVerbose || Boolean(options.verbose);
    const json = Boolean(options.json);

    const config = loadConfig({ overrides: { run: { max_iterations: maxIterations, max_retries: maxRetries } } });

    if (!json) {
      console.log('');
      console.log(formatStep(request));
      console.log(formatInfo(`run key: ${runKey}`));
      console.log('');
    }

    const { engine, ctx } = await openSession(config, runKey, { verbose, json });
    const result = await engine.run({ request, availableTools: ctx.catalog.map((t) => t.name) });

    reportResult(result, { verbose, json });
  } catch (err) {
    const msg = err instanceof Error ? err.message : String(err);
    console.error(formatError(msg));
    process.exitCode = 1;
  }
}
