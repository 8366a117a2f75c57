import type { Config } from '../config/validator';
import { AgentCoordinator } from './agent-coordinator';
import { RecoveryStrategist } from './recovery';
import type { RunLogger } from './workflow';
import { GeminiOracle } from '../oracle/gemini-oracle';
import type { ReasoningOracle } from '../oracle/types';
import { HttpToolService } from '../tools/client';
import type { ToolDescriptor, ToolService } from '../tools/types';
import { Decomposer } from '../agents/decomposer';
import { StepExecutor } from '../agents/step-executor';
import { ResultValidator } from '../agents/result-validator';
import { Synthesizer } from '../agents/synthesizer';
import type { RunContext } from '../agents/types';

/**
 * Build the shared context from configuration. The oracle and tool service
 * are created from config unless supplied; the tool catalog is fetched once
 * and an unreachable catalog yields an empty one.
 */
export async function createRunContext(params: { config: Config; logger: RunLogger; oracle?: ReasoningOracle; tools?: ToolService; now?: () => string }): Promise<RunContext> {
  const { config, logger } = params;

  const oracle =
    params.oracle ??
    new GeminiOracle({
      apiKey: config.oracle.api_key ?? '',
      model: config.oracle.model,
      temperature: config.oracle.temperature,
      baseUrl: config.oracle.base_url,
    });

  const tools =
    params.tools ??
    new HttpToolService({
      baseUrl: config.tools.url,
      token: config.tools.token,
      timeout: config.tools.timeout_ms,
    });

  let catalog: ToolDescriptor[] = [];
  try {
    catalog = await tools.listTools();
  } catch (err) {
    logger.warn('Could not fetch tool catalog', { error: err instanceof Error ? err.message : String(err) });
  }

  return {
    oracle,
    tools,
    catalog,
    validation: {
      tool: config.validation.tool,
      parameter: config.validation.parameter,
      alternates: config.validation.alternates,
      defaultAlternate: config.validation.default_alternate,
    },
    resultPreviewChars: config.synthesis.result_preview_chars,
    logger,
    now: params.now ?? (() => new Date().toISOString()),
  };
}

/** Wire the five step components to a coordinator over a shared context */
export function createRunCoordinator(ctx: RunContext): AgentCoordinator {
  const coordinator = new AgentCoordinator();

  const decomposer = new Decomposer(ctx);
  const executor = new StepExecutor(ctx);
  const validator = new ResultValidator(ctx);
  const strategist = new RecoveryStrategist(ctx.now);
  const synthesizer = new Synthesizer(ctx);

  coordinator.registerHandler('decompose', (state) => decomposer.plan(state));
  coordinator.registerHandler('execute', (state) => executor.execute(state));
  coordinator.registerHandler('validate', (state) => validator.validate(state));
  coordinator.registerHandler('recover', async (state) => {
    const update = strategist.recover(state);
    ctx.logger.info('Recovery step', { retryCount: update.retryCount ?? state.retryCount, replan: update.replanFlag === true });
    return update;
  });
  coordinator.registerHandler('synthesize', (state) => synthesizer.synthesize(state));

  return coordinator;
}
