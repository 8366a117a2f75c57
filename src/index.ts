export * from './orchestrator/states';
export * from './orchestrator/data-flow';
export * from './orchestrator/router';
export * from './orchestrator/recovery';
export * from './orchestrator/events';
export * from './orchestrator/agent-coordinator';
export * from './orchestrator/state-store';
export * from './orchestrator/workflow';
export * from './orchestrator/register-handlers';

export * from './agents/types';
export { Decomposer } from './agents/decomposer';
export { StepExecutor } from './agents/step-executor';
export { ResultValidator } from './agents/result-validator';
export { Synthesizer } from './agents/synthesizer';

export * from './oracle/types';
export * from './oracle/parse';
export { GeminiOracle } from './oracle/gemini-oracle';
export type { GeminiOracleOptions } from './oracle/gemini-oracle';

export * from './tools/types';
export * from './tools/errors';
export { HttpToolService } from './tools/client';

export { loadConfig } from './config/loader';
export type { LoadConfigOptions, DeepPartial } from './config/loader';
export { ConfigSchema, ConfigValidationError } from './config/validator';
export type { Config } from './config/validator';
