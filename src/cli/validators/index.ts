import type { RunOutcome, RunStatus } from '../../orchestrator/states';

export class ValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ValidationError';
  }
}

const OUTCOMES: readonly RunOutcome[] = ['completed', 'partial', 'retries_exhausted', 'truncated'];
const STATUSES: readonly RunStatus[] = ['running', 'completed', 'failed'];

/**
 * Parse a CLI integer option.
 * @throws {ValidationError} when the value is not an integer >= min
 */
export function parseIntOption(name: string, input: string | undefined, min = 1): number | undefined {
  if (input === undefined) return undefined;
  const trimmed = input.trim();
  if (!/^-?\d+$/.test(trimmed)) {
    throw new ValidationError(`--${name} must be an integer, got "${input}"`);
  }
  const n = Number.parseInt(trimmed, 10);
  if (n < min) {
    throw new ValidationError(`--${name} must be >= ${min}`);
  }
  return n;
}

/** Run keys become directory names, so only a safe character set is accepted */
export function validateRunKey(input: string): string {
  const key = input.trim();
  if (!/^[A-Za-z0-9][A-Za-z0-9._-]{0,127}$/.test(key)) {
    throw new ValidationError(`Invalid run key: "${input}". Use letters, digits, ".", "_" or "-"`);
  }
  return key;
}

export function parseOutcome(input: string | undefined): RunOutcome | undefined {
  if (input === undefined) return undefined;
  const match = OUTCOMES.find((o) => o === input);
  if (!match) {
    throw new ValidationError(`Invalid outcome: "${input}". Expected one of: ${OUTCOMES.join(', ')}`);
  }
  return match;
}

export function parseStatus(input: string | undefined): RunStatus | undefined {
  if (input === undefined) return undefined;
  const match = STATUSES.find((s) => s === input);
  if (!match) {
    throw new ValidationError(`Invalid status: "${input}". Expected one of: ${STATUSES.join(', ')}`);
  }
  return match;
}

export function parseDate(name: string, input: string | undefined): Date | undefined {
  if (!input) return undefined;
  const d = new Date(input);
  if (!Number.isFinite(d.getTime())) {
    throw new ValidationError(`--${name} must be a date, got "${input}"`);
  }
  return d;
}
