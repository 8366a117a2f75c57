import type { Config } from './validator';

export const defaults: Config = {
  oracle: {
    model: 'gemini-2.0-flash',
    temperature: 0.2,
  },
  tools: {
    url: 'http://localhost:8000',
    timeout_ms: 30000,
  },
  run: {
    max_iterations: 15,
    max_retries: 3,
    state_dir: '.stepwise',
  },
  validation: {
    tool: 'calculate_hypothetical_pnl',
    parameter: 'hierarchy',
    alternates: { FHC: 'PRA', PRA: 'FHC' },
    default_alternate: 'FHC',
  },
  synthesis: {
    result_preview_chars: 200,
  },
};
