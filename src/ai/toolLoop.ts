import type { Logger } from '../logger';
import { silentLogger } from '../logger';
import { callWithTimeout } from './providerCall';
import { explorationFeedback, keepSearchingFeedback } from './prompt';
import { AttemptBudget, Deadline, monotonicClock, type Clock, type RetryPolicy } from './retryPolicy';
import { parseToolArguments, type ToolContext, type ToolRegistry, type ToolResult } from './tools';
import type { ChatMessage, ModelProvider, ProgressEvent, ProviderCallResult, ProviderRequest } from './types';

export const DEFAULT_MAX_ROUNDS = 24;
export const MAX_CONSECUTIVE_ROUND_TIMEOUTS = 3;
/** Slack on top of one round before the loop asks for more exploration. */
const EXPLORATION_SLACK_MS = 5_000;

export interface ExplorationPolicy {
  minWordValidations: number;
  minScoredCandidates: number;
}

export const NO_EXPLORATION: ExplorationPolicy = { minWordValidations: 0, minScoredCandidates: 0 };

export interface ToolLoopOptions {
  policy: RetryPolicy;
  /** Overall budget; defaults to the policy's session timeout. */
  timeoutMs?: number;
  /**
   * Attempts shared with the caller. The first round runs on an attempt the
   * caller already claimed; each retry of a timed out round claims another.
   */
  budget?: AttemptBudget;
  maxRounds?: number;
  exploration?: ExplorationPolicy;
  onEvent?: (event: ProgressEvent) => Promise<void>;
  logger?: Logger;
  clock?: Clock;
}

export interface ToolLoopResult extends ProviderCallResult {
  toolCallsExecuted: string[];
  rounds: number;
}

/** Tracks how much checking the model has done before answering. */
class ExplorationTracker {
  private validations = 0;
  private readonly scored = new Set<string>();

  record(name: string, args: unknown, result: ToolResult): void {
    if (name === 'validate_word' && !('error' in result)) {
      this.validations += 1;
    } else if (name === 'calculate_move_score') {
      const total = result.total_score;
      const words = result.words;
      if (typeof total !== 'number' || total < 0 || !Array.isArray(words) || words.length === 0) return;
      this.scored.add(`${[...new Set(words.map(String))].sort().join('|')}#${placementSignature(args)}`);
    }
  }

  pending(policy: ExplorationPolicy): { words?: number; candidates?: number } | null {
    const words = this.validations < policy.minWordValidations ? policy.minWordValidations : undefined;
    const candidates =
      policy.minScoredCandidates > 0 && this.scored.size < policy.minScoredCandidates
        ? policy.minScoredCandidates
        : undefined;
    return words || candidates ? { words, candidates } : null;
  }
}

function placementSignature(args: unknown): string {
  if (typeof args !== 'object' || args === null || !('placements' in args) || !Array.isArray(args.placements)) {
    return '';
  }
  const bits: string[] = [];
  for (const item of args.placements) {
    if (typeof item !== 'object' || item === null) continue;
    const { row, col, letter } = item;
    if (typeof row === 'number' && typeof col === 'number' && typeof letter === 'string') {
      bits.push(`${row}:${col}:${letter.toUpperCase()}`);
    }
  }
  return bits.sort().join(';');
}

/** Standalone budget with the first round's attempt already claimed. */
function claimedBudget(policy: RetryPolicy): AttemptBudget {
  const budget = new AttemptBudget(policy.maxAttempts);
  budget.take();
  return budget;
}

/**
 * Runs provider rounds until a final answer: tool calls are executed
 * locally and fed back, up to `maxRounds` and the deadline. A round that
 * times out is retried while the attempt budget lasts, at most a few times in
 * a row.
 */
export async function runToolLoop(
  provider: ModelProvider,
  request: ProviderRequest,
  registry: ToolRegistry,
  context: ToolContext,
  options: ToolLoopOptions
): Promise<ToolLoopResult> {
  const { policy } = options;
  const logger = options.logger ?? silentLogger;
  const maxRounds = options.maxRounds ?? DEFAULT_MAX_ROUNDS;
  const exploration = options.exploration ?? NO_EXPLORATION;
  const exploring = exploration.minWordValidations > 0 || exploration.minScoredCandidates > 0;
  const deadline = new Deadline(options.timeoutMs ?? policy.sessionTimeoutMs, options.clock ?? monotonicClock);
  const emit = options.onEvent ?? (async () => {});
  const budget = options.budget ?? claimedBudget(policy);

  const conversation: ChatMessage[] = [...request.messages];
  const executed: string[] = [];
  const tracker = new ExplorationTracker();
  let rounds = 0;
  let consecutiveTimeouts = 0;
  let best: string | null = null;

  const finish = (result: ProviderCallResult): ToolLoopResult => ({ ...result, toolCallsExecuted: executed, rounds });
  const fallbackToBest = (status: 'timeout' | 'error', error: string): ToolLoopResult =>
    best !== null ? finish({ status: 'ok', content: best }) : finish({ status, content: '', error });

  while (rounds < maxRounds && !deadline.expired) {
    rounds += 1;
    const response = await callWithTimeout(
      provider,
      { ...request, messages: [...conversation], tools: registry.definitions() },
      deadline.roundTimeoutMs(policy)
    );

    if (response.status === 'timeout') {
      consecutiveTimeouts += 1;
      if (
        consecutiveTimeouts <= MAX_CONSECUTIVE_ROUND_TIMEOUTS &&
        deadline.canRetry(policy) &&
        budget.take()
      ) {
        logger.info(`${provider.id} round ${rounds} timed out; continuing`);
        await emit({
          type: 'retry',
          providerId: provider.id,
          attempt: rounds,
          reason: 'round timeout',
          remainingMs: deadline.remainingMs()
        });
        conversation.push({ role: 'user', content: keepSearchingFeedback() });
        continue;
      }
      return fallbackToBest('timeout', response.error ?? 'Timeout during tool workflow');
    }
    consecutiveTimeouts = 0;

    if (response.status === 'error') return finish(response);

    const toolCalls = response.toolCalls ?? [];
    if (toolCalls.length > 0) {
      conversation.push({ role: 'assistant', content: response.content, toolCalls });
      for (const call of toolCalls) {
        const args = parseToolArguments(call.arguments);
        const result = args.ok ? await registry.execute(call.name, args.value, context) : { error: args.error };
        executed.push(call.name);
        tracker.record(call.name, args.ok ? args.value : {}, result);
        await emit({ type: 'tool', providerId: provider.id, tool: call.name, result });
        conversation.push({ role: 'tool', toolCallId: call.id, name: call.name, content: JSON.stringify(result) });
      }
      continue;
    }

    const content = response.content.trim();
    if (!content) return finish({ status: 'error', content: '', error: 'Model returned empty response' });

    if (exploring) {
      best = content;
      const pending = tracker.pending(exploration);
      if (pending && deadline.remainingMs() > policy.perRoundTimeoutMs + EXPLORATION_SLACK_MS) {
        await emit({
          type: 'retry',
          providerId: provider.id,
          attempt: rounds,
          reason: 'exploration minimum not met',
          remainingMs: deadline.remainingMs()
        });
        conversation.push({ role: 'assistant', content });
        conversation.push({ role: 'user', content: explorationFeedback(pending) });
        continue;
      }
    }

    return finish({ ...response, content });
  }

  if (deadline.expired) return fallbackToBest('timeout', 'Session deadline reached during tool workflow');
  return fallbackToBest('error', `Tool loop exceeded ${maxRounds} rounds`);
}
