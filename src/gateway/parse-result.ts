import type { z } from 'zod';
import { ParseError } from '../core/errors.js';

function tryParse(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}

function direct(raw: string): unknown {
  const trimmed = raw.trim();
  if ((trimmed.startsWith('{') && trimmed.endsWith('}')) ||
      (trimmed.startsWith('[') && trimmed.endsWith(']'))) {
    return tryParse(trimmed);
  }
  return undefined;
}

function fenced(raw: string): unknown {
  const match = raw.match(/```(?:json)?\s*\n?([\s\S]*?)```/);
  return match ? tryParse(match[1].trim()) : undefined;
}

/**
 * First balanced `{...}` or `[...]` in the text, skipping brackets inside
 * string literals
 */
function firstBalanced(raw: string): unknown {
  const objectAt = raw.indexOf('{');
  const arrayAt = raw.indexOf('[');
  const begin = objectAt === -1 ? arrayAt : arrayAt === -1 ? objectAt : Math.min(objectAt, arrayAt);
  if (begin === -1) return undefined;

  const open = raw[begin];
  const close = open === '{' ? '}' : ']';
  let depth = 0;
  let inString = false;
  let escaped = false;

  for (let i = begin; i < raw.length; i++) {
    const ch = raw[i];
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
      if (depth === 0) return tryParse(raw.slice(begin, i + 1));
    }
  }
  return undefined;
}

/**
 * Pull a JSON value out of model output: the whole text, then a fenced
 * block, then the first balanced object or array. Undefined when none parse.
 */
export function extractJson(raw: string): unknown {
  for (const strategy of [direct, fenced, firstBalanced]) {
    const value = strategy(raw);
    if (value !== undefined) return value;
  }
  return undefined;
}

export function parseJsonPayload<T>(raw: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>): T {
  const value = extractJson(raw);
  if (value === undefined) {
    throw new ParseError('Response contained no JSON', raw);
  }

  const result = schema.safeParse(value);
  if (!result.success) {
    const issues = result.error.issues
      .map(issue => `${issue.path.join('.') || '$'}: ${issue.message}`)
      .join('; ');
    throw new ParseError(`Response did not match schema: ${issues}`, raw);
  }
  return result.data;
}

/**
 * Trimmed free text, cut at the last word boundary when over `maxLength`
 */
export function parseTextPayload(raw: string, maxLength: number): string {
  const text = raw.trim().replace(/^"(.*)"$/s, '$1').trim();
  if (!text) {
    throw new ParseError('Response was empty', raw);
  }
  if (text.length <= maxLength) return text;

  const cut = text.slice(0, maxLength - 1);
  const boundary = cut.lastIndexOf(' ');
  return `${(boundary > 0 ? cut.slice(0, boundary) : cut).trimEnd()}…`;
}
