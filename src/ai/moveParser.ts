import { z } from 'zod';
import type { Logger } from '../logger';
import { silentLogger } from '../logger';
import { fail, ok, type Result } from '../core/types';
import { movePayloadSchema, type MovePayload } from './moveSchema';
import { callWithTimeout } from './providerCall';
import { reconstructionPrompt } from './prompt';
import type { ModelProvider } from './types';

export type ParseMethod = 'direct' | 'markdown_extraction' | 'inline_json' | 'model_reconstruction';

export interface ParsedMove {
  move: MovePayload;
  method: ParseMethod;
  /** Parsers tried, in order, ending with the one that succeeded. */
  attempts: ParseMethod[];
}

export interface ParseError {
  kind: 'parse_error';
  message: string;
  attempts: ParseMethod[];
}

/** Last-resort extraction by a secondary model; returns JSON text or null. */
export type MoveReconstructor = (raw: string) => Promise<string | null>;

function parseError(message: string, attempts: ParseMethod[]): ParseError {
  return { kind: 'parse_error', message, attempts };
}

const THINK_BLOCK = /<think>[\s\S]*?<\/think>/g;

const FENCE_PATTERNS = [/```json\s*\n([\s\S]*?)\n```/, /```\s*\n([\s\S]*?)\n```/, /```json\s*([\s\S]*?)```/, /```([\s\S]*?)```/];

export function stripReasoning(text: string): string {
  return text.replace(THINK_BLOCK, '').trim();
}

/** Whole reply as JSON, tolerating a fence wrapped around all of it. */
function directCandidate(text: string): string {
  let cleaned = stripReasoning(text);
  if (cleaned.startsWith('```json')) cleaned = cleaned.slice(7);
  else if (cleaned.startsWith('```')) cleaned = cleaned.slice(3);
  if (cleaned.endsWith('```')) cleaned = cleaned.slice(0, -3);
  return cleaned.trim();
}

export function extractFencedJson(text: string): string | null {
  for (const pattern of FENCE_PATTERNS) {
    const match = pattern.exec(text);
    if (match?.[1] !== undefined) return match[1].trim();
  }
  return null;
}

/**
 * First balanced `{...}` in free text that mentions `placements`. Braces
 * inside string literals are ignored.
 */
export function extractInlineJson(text: string): string | null {
  let from = 0;
  while (from < text.length) {
    const open = text.indexOf('{', from);
    if (open === -1) return null;

    let depth = 0;
    let inString = false;
    let escaped = false;
    let close = -1;
    for (let i = open; i < text.length; i++) {
      const ch = text[i];
      if (inString) {
        if (escaped) escaped = false;
        else if (ch === '\\') escaped = true;
        else if (ch === '"') inString = false;
        continue;
      }
      if (ch === '"') inString = true;
      else if (ch === '{') depth += 1;
      else if (ch === '}') {
        depth -= 1;
        if (depth === 0) {
          close = i;
          break;
        }
      }
    }

    if (close === -1) return null;
    const candidate = text.slice(open, close + 1);
    if (candidate.includes('placements')) return candidate;
    from = open + 1;
  }
  return null;
}

function validate(json: string): Result<MovePayload, string> {
  let data: unknown;
  try {
    data = JSON.parse(json);
  } catch (error) {
    return fail(error instanceof Error ? error.message : 'invalid JSON');
  }
  const parsed = movePayloadSchema.safeParse(data);
  if (parsed.success) return ok(parsed.data);
  return fail(parsed.error.issues.map((issue) => issue.message).join('; '));
}

/** The three local parsers, in order. */
export function parseMoveText(text: string): Result<ParsedMove, ParseError> {
  const attempts: ParseMethod[] = [];
  let lastError = 'Empty response';

  if (!text.trim()) return fail(parseError(lastError, attempts));

  const stages: Array<[ParseMethod, () => string | null]> = [
    ['direct', () => directCandidate(text)],
    ['markdown_extraction', () => extractFencedJson(text)],
    ['inline_json', () => extractInlineJson(text)]
  ];

  for (const [method, extract] of stages) {
    attempts.push(method);
    const candidate = extract();
    if (candidate === null) continue;
    const validated = validate(candidate);
    if (validated.ok) return ok({ move: validated.value, method, attempts });
    lastError = validated.error;
  }

  return fail(parseError(lastError, attempts));
}

/** Local parsers first, then the reconstructor if one is given. */
export async function parseMove(
  text: string,
  reconstruct?: MoveReconstructor,
  logger: Logger = silentLogger
): Promise<Result<ParsedMove, ParseError>> {
  const local = parseMoveText(text);
  if (local.ok || !reconstruct) return local;

  const attempts: ParseMethod[] = [...local.error.attempts, 'model_reconstruction'];
  logger.debug(`Local parsers failed (${local.error.message}); asking for a reconstruction`);
  const rebuilt = await reconstruct(text);
  if (rebuilt === null) return fail(parseError(local.error.message, attempts));

  const validated = validate(rebuilt);
  if (!validated.ok) return fail(parseError(validated.error, attempts));
  return ok({ move: validated.value, method: 'model_reconstruction', attempts });
}

const reconstructionSchema = z.object({
  has_move: z.boolean(),
  extracted_move: z.union([z.record(z.unknown()), z.string()]).nullish(),
  analysis: z.string().nullish()
});

const MIN_RECONSTRUCTION_LENGTH = 32;

/** Asks `provider` to pull a move out of free text. */
export function providerReconstructor(
  provider: ModelProvider,
  timeoutMs: number,
  logger: Logger = silentLogger
): MoveReconstructor {
  return async (raw) => {
    const snippet = raw.trim();
    if (snippet.length < MIN_RECONSTRUCTION_LENGTH) return null;

    const result = await callWithTimeout(
      provider,
      {
        modelId: provider.modelId,
        messages: [{ role: 'user', content: reconstructionPrompt(snippet.slice(0, 2000)) }],
        maxTokens: 1200
      },
      timeoutMs
    );
    if (result.status !== 'ok') {
      logger.warn(`Reconstruction by ${provider.id} failed: ${result.error ?? result.status}`);
      return null;
    }

    const answer = validateReconstruction(result.content);
    if (!answer.ok) {
      logger.warn(`Reconstruction by ${provider.id} unusable: ${answer.error}`);
      return null;
    }
    return answer.value;
  };
}

function validateReconstruction(content: string): Result<string, string> {
  let data: unknown;
  try {
    data = JSON.parse(stripReasoning(content));
  } catch (error) {
    return fail(error instanceof Error ? error.message : 'invalid JSON');
  }
  const parsed = reconstructionSchema.safeParse(data);
  if (!parsed.success) return fail('unexpected shape');
  const { has_move: hasMove, extracted_move: extracted, analysis } = parsed.data;
  if (!hasMove || !extracted) return fail(analysis || 'no move found');
  return ok(typeof extracted === 'string' ? extracted : JSON.stringify(extracted));
}
