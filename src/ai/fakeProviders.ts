import type { ModelProvider, ProviderCallResult, ProviderRequest, ToolCall } from './types';

/** In-process provider stand-ins for tests and offline runs. */
export type ScriptStep =
  | { kind: 'reply'; result: ProviderCallResult; delayMs?: number }
  | { kind: 'hang' }
  | { kind: 'throw'; message: string };

export function reply(content: string, delayMs?: number): ScriptStep {
  return { kind: 'reply', result: { status: 'ok', content }, delayMs };
}

export function replyJson(move: unknown, delayMs?: number): ScriptStep {
  return reply(JSON.stringify(move), delayMs);
}

export function providerError(error: string): ScriptStep {
  return { kind: 'reply', result: { status: 'error', content: '', error } };
}

export function callTools(...calls: Array<{ name: string; args?: unknown }>): ScriptStep {
  const toolCalls: ToolCall[] = calls.map((call, index) => ({
    id: `call_${index}`,
    name: call.name,
    arguments: JSON.stringify(call.args ?? {})
  }));
  return { kind: 'reply', result: { status: 'ok', content: '', toolCalls } };
}

export const hang: ScriptStep = { kind: 'hang' };

export function raise(message: string): ScriptStep {
  return { kind: 'throw', message };
}

function aborted(): ProviderCallResult {
  return { status: 'timeout', content: '', error: 'aborted' };
}

function wait(ms: number, signal: AbortSignal): Promise<boolean> {
  return new Promise((resolve) => {
    const timer = setTimeout(() => resolve(true), ms);
    signal.addEventListener(
      'abort',
      () => {
        clearTimeout(timer);
        resolve(false);
      },
      { once: true }
    );
  });
}

/** Plays back a fixed script; the last step repeats once it runs out. */
export class ScriptedProvider implements ModelProvider {
  readonly requests: ProviderRequest[] = [];

  constructor(
    readonly id: string,
    private readonly script: readonly ScriptStep[],
    readonly modelId: string = `${id}-model`
  ) {}

  get calls(): number {
    return this.requests.length;
  }

  async call(request: ProviderRequest, signal: AbortSignal): Promise<ProviderCallResult> {
    this.requests.push({ ...request, messages: [...request.messages] });
    const step = this.script[Math.min(this.requests.length, this.script.length) - 1];
    if (!step) return { status: 'error', content: '', error: 'empty script' };

    switch (step.kind) {
      case 'hang':
        return await new Promise<ProviderCallResult>((resolve) => {
          signal.addEventListener('abort', () => resolve(aborted()), { once: true });
        });
      case 'throw':
        throw new Error(step.message);
      case 'reply':
        if (step.delayMs && !(await wait(step.delayMs, signal))) return aborted();
        return step.result;
    }
  }
}
