import fs from 'fs';
import path from 'path';
import dotenv from 'dotenv';
import YAML from 'yaml';
import { ConfigSchema, Config, ConfigValidationError } from './validator';
import { defaults } from './defaults';

export const CONFIG_FILE = 'stepwise.yaml';

/**
 * Recursive partial of Config, used for YAML and CLI overrides.
 */
export type DeepPartial<T> = {
  [P in keyof T]?: T[P] extends (infer U)[] ? DeepPartial<U>[] : T[P] extends object ? DeepPartial<T[P]> : T[P];
};

export interface LoadConfigOptions {
  /** Directory holding `.env` and `stepwise.yaml` (defaults to process.cwd()) */
  cwd?: string;
  overrides?: DeepPartial<Config>;
}

/**
 * Layer defaults, `stepwise.yaml`, environment variables and CLI overrides,
 * then validate.
 * @throws ConfigValidationError when the merged result is invalid.
 */
export function loadConfig(options: LoadConfigOptions = {}): Config {
  const cwd = options.cwd ?? process.cwd();

  // Load .env into process.env
  dotenv.config({ path: path.join(cwd, '.env') });

  // 1. Start with defaults
  const config: Record<string, unknown> = structuredClone(defaults);

  // 2. Override with stepwise.yaml (if exists)
  const yamlPath = path.join(cwd, CONFIG_FILE);
  if (fs.existsSync(yamlPath)) {
    const parsedYaml: unknown = YAML.parse(fs.readFileSync(yamlPath, 'utf8'));
    if (isRecord(parsedYaml)) {
      deepMerge(config, parsedYaml);
    }
  }

  // 3. Override with environment variables
  deepMerge(config, {
    oracle: {
      api_key: process.env.GEMINI_API_KEY,
      model: process.env.GEMINI_MODEL,
    },
    tools: {
      url: process.env.TOOL_SERVICE_URL,
      token: process.env.TOOL_SERVICE_TOKEN,
    },
    run: {
      max_iterations: process.env.STEPWISE_MAX_ITERATIONS,
      max_retries: process.env.STEPWISE_MAX_RETRIES,
    },
  });

  // 4. Override with CLI arguments
  deepMerge(config, options.overrides ?? {});

  // 5. Validate with Zod
  const result = ConfigSchema.safeParse(config);
  if (!result.success) {
    throw new ConfigValidationError(result.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`));
  }

  return result.data;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Simple deep merge for config objects. Undefined and empty-string values
 * in `source` leave the target untouched.
 */
function deepMerge(target: Record<string, unknown>, source: object): void {
  for (const [key, sourceValue] of Object.entries(source)) {
    if (isRecord(sourceValue)) {
      const existing = target[key];
      const nested: Record<string, unknown> = isRecord(existing) ? existing : {};
      target[key] = nested;
      deepMerge(nested, sourceValue);
    } else if (sourceValue !== undefined && sourceValue !== '') {
      target[key] = sourceValue;
    }
  }
}
