import type { z } from 'zod';
import { UpstreamError } from '../utils/errors';
import type { LLMClient, LLMCompletionOptions } from './llmClient';

export type LLMJsonResult<T> =
  | { ok: true; data: T }
  | { ok: false; error: string; raw: string };

export function stripCodeFences(raw: string): string {
  const fenced = raw.match(/```(?:json|JSON)?\s*([\s\S]*?)```/);
  return (fenced ? fenced[1] : raw).trim();
}

/**
 * Returns the first JSON object or array in the text, scanning brackets outside string literals.
 * An unterminated block is returned up to the end of the text so it can still be repaired.
 */
export function extractJsonBlock(text: string): string | null {
  const start = text.search(/[{[]/);
  if (start === -1) return null;

  const stack: string[] = [];
  let inString = false;
  let escaped = false;

  for (let i = start; i < text.length; i += 1) {
    const ch = text[i];
    if (inString) {
      if (escaped) escaped = false;
      else if (ch === '\\') escaped = true;
      else if (ch === '"') inString = false;
      continue;
    }
    if (ch === '"') inString = true;
    else if (ch === '{' || ch === '[') stack.push(ch === '{' ? '}' : ']');
    else if (ch === '}' || ch === ']') {
      stack.pop();
      if (stack.length === 0) return text.slice(start, i + 1);
    }
  }
  return text.slice(start);
}

// Appends whatever quotes and brackets are still open at the end of the text
function closeOpenBrackets(text: string): string {
  const stack: string[] = [];
  let inString = false;
  let escaped = false;
  for (const ch of text) {
    if (inString) {
      if (escaped) escaped = false;
      else if (ch === '\\') escaped = true;
      else if (ch === '"') inString = false;
      continue;
    }
    if (ch === '"') inString = true;
    else if (ch === '{') stack.push('}');
    else if (ch === '[') stack.push(']');
    else if (ch === '}' || ch === ']') stack.pop();
  }
  let closed = text.replace(/,\s*$/, '');
  if (inString) closed += '"';
  return closed.replace(/,\s*$/, '') + stack.reverse().join('');
}

export function repairJson(text: string): string {
  let repaired = text
    .replace(/[“”]/g, '"')
    .replace(/[‘’]/g, "'")
    .replace(/\/\*[\s\S]*?\*\//g, '')
    .replace(/^\s*\/\/.*$/gm, '')
    .replace(/([{,]\s*)([A-Za-z_][\w-]*)(\s*):/g, '$1"$2"$3:')
    .replace(/(?<=[:[,]\s*)True\b/g, 'true')
    .replace(/(?<=[:[,]\s*)False\b/g, 'false')
    .replace(/(?<=[:[,]\s*)None\b/g, 'null');

  repaired = closeOpenBrackets(repaired);
  return repaired.replace(/,(\s*[}\]])/g, '$1');
}

// Single-quoted keys and values, tried only after everything else failed
function convertSingleQuotes(text: string): string {
  return text.replace(/'((?:[^'\\\n]|\\.)*)'(?=\s*[:,}\]])/g, (_match, inner: string) => JSON.stringify(inner.replace(/\\'/g, "'")));
}

function tryParse(text: string): { ok: true; value: unknown } | { ok: false } {
  try {
    return { ok: true, value: JSON.parse(text) };
  } catch {
    return { ok: false };
  }
}

function formatIssues(error: z.ZodError): string {
  return error.issues
    .slice(0, 5)
    .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
    .join('; ');
}

/**
 * Parses model output into a validated value. Candidates are tried in order:
 * the text without code fences, the first JSON block in it, then repaired forms of that block.
 * Never throws.
 */
export function parseLLMJson<T>(raw: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>): LLMJsonResult<T> {
  if (!raw || !raw.trim()) {
    return { ok: false, error: 'Empty model response', raw };
  }

  const stripped = stripCodeFences(raw);
  const block = extractJsonBlock(stripped);
  const candidates: string[] = [stripped];
  if (block) {
    const repaired = repairJson(block);
    candidates.push(block, repaired, convertSingleQuotes(repaired));
  }

  let schemaError: string | null = null;
  const tried = new Set<string>();
  for (const candidate of candidates) {
    if (tried.has(candidate)) continue;
    tried.add(candidate);

    const parsed = tryParse(candidate);
    if (!parsed.ok) continue;

    const validated = schema.safeParse(parsed.value);
    if (validated.success) {
      return { ok: true, data: validated.data };
    }
    schemaError = formatIssues(validated.error);
  }

  return {
    ok: false,
    error: schemaError ? `Response did not match the expected shape: ${schemaError}` : 'Response is not valid JSON',
    raw,
  };
}

/**
 * Sends the prompt and parses the answer; an unusable answer is an UpstreamError
 */
export async function requestLLMJson<T>(
  client: LLMClient,
  prompt: string,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  options?: LLMCompletionOptions
): Promise<T> {
  const raw = await client.complete(prompt, options);
  const result = parseLLMJson(raw, schema);
  if (!result.ok) {
    throw new UpstreamError(result.error, { sample: result.raw.slice(0, 200) });
  }
  return result.data;
}
