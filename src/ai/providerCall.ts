import type { Logger } from '../logger';
import { silentLogger } from '../logger';
import type { AttemptBudget, Deadline, RetryPolicy } from './retryPolicy';
import type { FallbackChain, ModelProvider, ProviderCallResult, ProviderRequest } from './types';

export function errorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}

function timeoutResult(timeoutMs: number): ProviderCallResult {
  return { status: 'timeout', content: '', error: `Timed out after ${Math.round(timeoutMs)} ms` };
}

/**
 * Calls a provider under a hard timeout. The provider's signal aborts when
 * the timer fires, and a late answer is dropped. Thrown errors come back as
 * `error` results.
 */
export async function callWithTimeout(
  provider: ModelProvider,
  request: ProviderRequest,
  timeoutMs: number
): Promise<ProviderCallResult> {
  const controller = new AbortController();
  let timer: ReturnType<typeof setTimeout> | undefined;

  const expiry = new Promise<ProviderCallResult>((resolve) => {
    timer = setTimeout(() => {
      controller.abort();
      resolve(timeoutResult(timeoutMs));
    }, Math.max(0, timeoutMs));
  });

  const attempt = (async (): Promise<ProviderCallResult> => {
    try {
      const result = await provider.call(request, controller.signal);
      return controller.signal.aborted ? timeoutResult(timeoutMs) : result;
    } catch (error) {
      if (controller.signal.aborted) return timeoutResult(timeoutMs);
      return { status: 'error', content: '', error: errorMessage(error) };
    }
  })();

  try {
    return await Promise.race([attempt, expiry]);
  } finally {
    clearTimeout(timer);
  }
}

/** One provider invocation; a plain call by default, or a whole tool loop. */
export type ProviderInvoker = (
  provider: ModelProvider,
  request: ProviderRequest,
  deadline: Deadline
) => Promise<ProviderCallResult>;

export function timedInvoker(policy: RetryPolicy): ProviderInvoker {
  return (provider, request, deadline) => callWithTimeout(provider, request, deadline.roundTimeoutMs(policy));
}

export interface FallbackCallOptions {
  policy: RetryPolicy;
  deadline: Deadline;
  budget: AttemptBudget;
  fallbackChain?: FallbackChain;
  invoke?: ProviderInvoker;
  onFallback?: (from: ModelProvider, to: ModelProvider, result: ProviderCallResult) => Promise<void>;
  onRetry?: (provider: ModelProvider, result: ProviderCallResult) => Promise<void>;
  logger?: Logger;
}

export interface FallbackCallResult {
  result: ProviderCallResult;
  servedBy: ModelProvider;
}

/**
 * Calls `provider` until it answers. A timeout moves to the provider's
 * substitute in the chain (one step per timeout) and an error retries the
 * same provider. Every call spends one attempt from the shared budget.
 */
export async function callWithFallback(
  provider: ModelProvider,
  buildRequest: (provider: ModelProvider) => ProviderRequest,
  options: FallbackCallOptions
): Promise<FallbackCallResult> {
  const { policy, deadline, budget } = options;
  const invoke = options.invoke ?? timedInvoker(policy);
  const logger = options.logger ?? silentLogger;

  let current = provider;
  let last: ProviderCallResult = {
    status: 'timeout',
    content: '',
    error: budget.exhausted ? 'No attempts left' : 'Session deadline reached before the call'
  };

  while (!deadline.expired && budget.take()) {
    const result = await invoke(current, buildRequest(current), deadline);
    if (result.status === 'ok') return { result, servedBy: current };

    last = result;
    logger.warn(`${current.id} returned ${result.status}: ${result.error ?? 'no details'}`);
    if (budget.exhausted || !deadline.canRetry(policy)) break;

    if (result.status === 'timeout') {
      const substitute = options.fallbackChain?.get(current.id);
      if (!substitute) break;
      logger.info(`Falling back from ${current.id} to ${substitute.id}`);
      await options.onFallback?.(current, substitute, result);
      current = substitute;
    } else {
      await options.onRetry?.(current, result);
    }
  }

  return { result: last, servedBy: current };
}
