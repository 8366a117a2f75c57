import type { ZodType, ZodTypeDef } from 'zod';

/** Tagged outcome of reading structured data out of free oracle text */
export type OracleParse<T> = { kind: 'parsed'; value: T } | { kind: 'malformed'; raw: string; reason: string } | { kind: 'empty' };

export type JsonShape = 'object' | 'array';

const OPENERS: Record<JsonShape, string> = { object: '{', array: '[' };
const CLOSERS: Record<JsonShape, string> = { object: '}', array: ']' };

/**
 * Find the first balanced `{...}` or `[...]` span that parses as JSON.
 * Brackets inside string literals are ignored.
 */
export function extractFirstJson(text: string, shape: JsonShape): unknown {
  const open = OPENERS[shape];
  let start = text.indexOf(open);

  while (start !== -1) {
    const end = findClosing(text, start, shape);
    if (end !== -1) {
      try {
        return JSON.parse(text.slice(start, end + 1)) as unknown;
      } catch {
        // not well-formed; keep scanning from the next opener
      }
    }
    start = text.indexOf(open, start + 1);
  }

  return undefined;
}

function findClosing(text: string, start: number, shape: JsonShape): number {
  const open = OPENERS[shape];
  const close = CLOSERS[shape];
  let depth = 0;
  let inString = false;
  let escaped = false;

  for (let i = start; i < text.length; i++) {
    const ch = text[i];
    if (inString) {
      if (escaped) escaped = false;
      else if (ch === '\\') escaped = true;
      else if (ch === '"') inString = false;
      continue;
    }
    if (ch === '"') inString = true;
    else if (ch === open) depth++;
    else if (ch === close) {
      depth--;
      if (depth === 0) return i;
    }
  }
  return -1;
}

function stripFences(text: string): string {
  const fenceMatch = text.match(/```(?:json)?\s*([\s\S]*?)\s*```/i);
  return fenceMatch?.[1] ? fenceMatch[1].trim() : text;
}

/**
 * Parse an oracle response into a validated value. Never throws: every
 * failure mode is reported through the tagged result.
 */
export function parseOracleJson<T>(text: string | null | undefined, shape: JsonShape, schema: ZodType<T, ZodTypeDef, unknown>): OracleParse<T> {
  const raw = (text ?? '').trim();
  if (!raw) {
    return { kind: 'empty' };
  }

  const candidate = extractFirstJson(stripFences(raw), shape) ?? extractFirstJson(raw, shape);
  if (candidate === undefined) {
    return { kind: 'malformed', raw, reason: `No well-formed JSON ${shape} found in oracle response` };
  }

  const validated = schema.safeParse(candidate);
  if (!validated.success) {
    const reason = validated.error.issues.map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`).join('; ');
    return { kind: 'malformed', raw, reason: `Oracle response failed validation: ${reason}` };
  }

  return { kind: 'parsed', value: validated.data };
}
