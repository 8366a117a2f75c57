import type { ReasoningOracle } from '../oracle/types';
import type { ToolDescriptor, ToolService } from '../tools/types';
import type { RunLogger } from '../orchestrator/workflow';

/** How the validator derives an independent cross-check call */
export interface ValidationSettings {
  /** Result-sensitive calculation tool */
  tool: string;
  /** Argument that is swapped for the cross-check */
  parameter: string;
  /** Original value → complementary value */
  alternates: Record<string, string>;
  /** Used when the original value has no entry in `alternates` */
  defaultAlternate: string;
}

/**
 * Collaborators and settings shared read-only by every step handler.
 * Handlers may invoke the oracle and tool service but never reconfigure
 * or close them.
 */
export interface RunContext {
  oracle: ReasoningOracle;
  tools: ToolService;
  catalog: ToolDescriptor[];
  validation: ValidationSettings;
  resultPreviewChars: number;
  logger: RunLogger;
  now: () => string;
}
