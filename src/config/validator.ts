import { z } from 'zod';

const positiveInt = z.coerce.number().int().positive();

export const ConfigSchema = z.object({
  oracle: z.object({
    api_key: z.string().min(1).optional(),
    model: z.string().min(1),
    temperature: z.coerce.number().min(0).max(2),
    base_url: z.string().url().optional(),
  }),
  tools: z.object({
    url: z.string().url(),
    token: z.string().min(1).optional(),
    timeout_ms: positiveInt,
  }),
  run: z.object({
    max_iterations: positiveInt,
    max_retries: z.coerce.number().int().min(0),
    state_dir: z.string().min(1),
  }),
  validation: z.object({
    tool: z.string().min(1),
    parameter: z.string().min(1),
    alternates: z.record(z.string()),
    default_alternate: z.string().min(1),
  }),
  synthesis: z.object({
    result_preview_chars: positiveInt,
  }),
});

export type Config = z.infer<typeof ConfigSchema>;

export class ConfigValidationError extends Error {
  constructor(public issues: string[]) {
    super(`Configuration validation failed:\n${issues.map((i) => `  - ${i}`).join('\n')}`);
    this.name = 'ConfigValidationError';
  }
}
