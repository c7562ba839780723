import type { Board } from '../core/board';
import type { Variant } from '../core/types';
import type { DictionaryJudge } from '../dictionary/judge';
import { judgeMove, validateExchange, validateMoveRules } from '../dictionary/moveValidator';
import type { Logger } from '../logger';
import { silentLogger } from '../logger';
import {
  failedCandidate,
  forcedMove,
  makeCandidate,
  selectWinner,
  winningMove,
  type ArbitratedMove,
  type Candidate,
  type CandidateStatus
} from './candidate';
import { parseMove, type MoveReconstructor } from './moveParser';
import { moveKind } from './moveSchema';
import {
  buildCompactState,
  buildMovePrompt,
  buildSystemPrompt,
  declineFeedback,
  parseFeedback,
  violationFeedback
} from './prompt';
import { callWithFallback, errorMessage, type ProviderInvoker } from './providerCall';
import { AttemptBudget, Deadline, monotonicClock, resolveRetryPolicy, type Clock, type RetryPolicy } from './retryPolicy';
import { ConversationSession } from './session';
import { runToolLoop, type ExplorationPolicy } from './toolLoop';
import type { ToolContext, ToolRegistry } from './tools';
import type { ChatMessage, FallbackChain, ModelProvider, ProgressEvent, ProgressSink } from './types';

export interface ToolSetup {
  registry: ToolRegistry;
  exploration?: ExplorationPolicy;
  maxRounds?: number;
}

export interface ArbitrationRequest {
  board: Board;
  rack: readonly string[];
  variant: Variant;
  /** Tiles left in the bag; decides between a forced exchange and a pass. */
  bagRemaining: number;
  providers: readonly ModelProvider[];
  judge: DictionaryJudge;
  session?: ConversationSession;
  policy?: Partial<RetryPolicy>;
  fallbackChain?: FallbackChain;
  /** Re-prompt once when a provider passes or exchanges. */
  requireScoringAttempt?: boolean;
  implicitBlanks?: boolean;
  /** Run each provider call as a tool loop. */
  tools?: ToolSetup;
  reconstructor?: MoveReconstructor;
  onProgress?: ProgressSink;
  logger?: Logger;
  clock?: Clock;
  maxTokens?: number;
}

export interface ArbitrationOutcome {
  move: ArbitratedMove;
  winner: Candidate | null;
  /** Every provider's outcome, in provider order. */
  candidates: Candidate[];
  reason?: string;
}

type Notify = (event: ProgressEvent) => Promise<void>;

/** Sink failures are logged and never reach the arbitration. */
function progressNotifier(sink: ProgressSink | undefined, logger: Logger): Notify {
  return async (event) => {
    if (!sink) return;
    try {
      await sink(event);
    } catch (error) {
      logger.error(`Progress sink failed on '${event.type}' event`, error);
    }
  };
}

interface TaskDeps {
  policy: RetryPolicy;
  session: ConversationSession;
  notify: Notify;
  logger: Logger;
}

/** Result of judging one answer: final, or a failure worth a re-prompt. */
type Evaluation = { final: true; candidate: Candidate } | { final: false; candidate: Candidate; feedback: string };

function toolInvoker(
  setup: ToolSetup,
  context: ToolContext,
  budget: AttemptBudget,
  request: ArbitrationRequest,
  deps: TaskDeps
): ProviderInvoker {
  return (provider, providerRequest, deadline) =>
    runToolLoop(provider, providerRequest, setup.registry, context, {
      policy: deps.policy,
      timeoutMs: deadline.remainingMs(),
      budget,
      maxRounds: setup.maxRounds,
      exploration: setup.exploration,
      onEvent: deps.notify,
      logger: deps.logger,
      clock: request.clock
    });
}

async function runProviderTask(provider: ModelProvider, request: ArbitrationRequest, deps: TaskDeps): Promise<Candidate> {
  const { policy, session, notify, logger } = deps;
  const board = request.board.clone();
  const rack = [...request.rack];
  const deadline = new Deadline(policy.sessionTimeoutMs, request.clock ?? monotonicClock);
  const budget = new AttemptBudget(policy.maxAttempts);
  const system = buildSystemPrompt(board, request.variant, { tools: Boolean(request.tools) });
  const history = session.history(provider.id);
  const state = buildCompactState(board, rack, request.variant, request.bagRemaining);
  const turn: ChatMessage[] = [{ role: 'user', content: buildMovePrompt(state) }];
  const invoke = request.tools
    ? toolInvoker(request.tools, { board, rack, variant: request.variant, judge: request.judge }, budget, request, deps)
    : undefined;
  let declinesLeft = request.requireScoringAttempt ? 1 : 0;

  const finish = (candidate: Candidate, answer?: string): Candidate => {
    if (answer !== undefined) turn.push({ role: 'assistant', content: answer });
    session.append(provider.id, ...turn);
    return candidate;
  };

  const evaluate = async (raw: string, servedBy: string): Promise<Evaluation> => {
    const base = { servedBy, attempts: budget.used, rawContent: raw };
    const failure = (status: Exclude<CandidateStatus, 'ok'>, error: string, fields: Partial<Candidate> = {}) =>
      failedCandidate(provider.id, status, error, { ...base, ...fields });

    const parsed = await parseMove(raw, request.reconstructor, logger);
    if (!parsed.ok) {
      return {
        final: false,
        candidate: failure('parse_error', parsed.error.message),
        feedback: parseFeedback(parsed.error.message)
      };
    }

    const { move, method } = parsed.value;
    const kind = moveKind(move);
    const described = { move, kind, parseMethod: method };

    if (kind !== 'play') {
      if (declinesLeft > 0) {
        declinesLeft -= 1;
        return {
          final: false,
          candidate: failure('invalid', `declined to play (${kind}) before trying a scoring move`, described),
          feedback: declineFeedback()
        };
      }
      if (kind === 'exchange') {
        const exchange = validateExchange(rack, move.exchange ?? []);
        if (!exchange.ok) {
          return {
            final: false,
            candidate: failure('invalid', exchange.error, described),
            feedback: violationFeedback(exchange.error)
          };
        }
      }
      return { final: true, candidate: makeCandidate(provider.id, 'ok', { ...base, ...described, score: 0 }) };
    }

    const checked = validateMoveRules(board, rack, move, { variant: request.variant, implicitBlanks: request.implicitBlanks });
    if (!checked.ok) {
      return {
        final: false,
        candidate: failure('invalid', checked.error, described),
        feedback: violationFeedback(checked.error, move.word)
      };
    }

    const words = checked.value.words.map((found) => found.word);
    const scored = {
      ...described,
      placements: checked.value.placements,
      direction: checked.value.direction,
      words,
      score: checked.value.score
    };

    let judged: Awaited<ReturnType<typeof judgeMove>>;
    try {
      judged = await judgeMove(checked.value, request.judge, request.variant);
    } catch (error) {
      return { final: true, candidate: failure('error', `Judge error: ${errorMessage(error)}`, scored) };
    }
    if (!judged.ok) {
      return {
        final: false,
        candidate: failure('invalid', judged.error, scored),
        feedback: violationFeedback(judged.error, words[0])
      };
    }

    return { final: true, candidate: makeCandidate(provider.id, 'ok', { ...base, ...scored, judgeValid: true }) };
  };

  await notify({ type: 'start', providerId: provider.id, modelId: provider.modelId });

  for (;;) {
    const call = await callWithFallback(
      provider,
      (current) => ({
        modelId: current.modelId,
        messages: [{ role: 'system', content: system }, ...history, ...turn],
        maxTokens: request.maxTokens
      }),
      {
        policy,
        deadline,
        budget,
        fallbackChain: request.fallbackChain,
        invoke,
        logger,
        onFallback: (from, to) => notify({ type: 'fallback', providerId: provider.id, from: from.id, to: to.id }),
        onRetry: (_current, result) =>
          notify({
            type: 'retry',
            providerId: provider.id,
            attempt: budget.used,
            reason: result.error ?? result.status,
            remainingMs: deadline.remainingMs()
          })
      }
    );

    const { result, servedBy } = call;
    if (result.status !== 'ok') {
      return finish(
        failedCandidate(provider.id, result.status, result.error ?? result.status, {
          servedBy: servedBy.id,
          attempts: budget.used
        })
      );
    }

    const evaluation = await evaluate(result.content, servedBy.id);
    if (evaluation.final) return finish(evaluation.candidate, result.content);

    logger.info(`${servedBy.id} answer rejected: ${evaluation.candidate.error ?? 'unknown'}`);
    if (budget.exhausted || !deadline.canRetry(policy)) return finish(evaluation.candidate, result.content);

    turn.push({ role: 'assistant', content: result.content }, { role: 'user', content: evaluation.feedback });
    await notify({
      type: 'retry',
      providerId: provider.id,
      attempt: budget.used,
      reason: evaluation.feedback,
      remainingMs: deadline.remainingMs()
    });
  }
}

/**
 * Asks every provider for a move in parallel and picks the best
 * judge-approved play once all of them have finished. With no such play the
 * outcome is a forced exchange of the whole rack, or a pass when the bag is
 * too small to exchange.
 */
export async function arbitrate(request: ArbitrationRequest): Promise<ArbitrationOutcome> {
  const policy = resolveRetryPolicy(request.policy);
  const logger = request.logger ?? silentLogger;
  const session = request.session ?? new ConversationSession();
  const notify = progressNotifier(request.onProgress, logger);

  let completed = 0;
  const tasks = request.providers.map(async (provider) => {
    const candidate = await runProviderTask(provider, request, {
      policy,
      session,
      notify,
      logger: logger.child(provider.id)
    });
    completed += 1;
    const done = { ...candidate, sequence: completed };
    await notify({ type: 'result', candidate: done });
    return done;
  });

  const settled = await Promise.allSettled(tasks);
  const candidates = settled.map((outcome, index): Candidate => {
    if (outcome.status === 'fulfilled') return outcome.value;
    completed += 1;
    const providerId = request.providers[index].id;
    logger.error(`Provider task ${providerId} crashed`, outcome.reason);
    return failedCandidate(providerId, 'error', errorMessage(outcome.reason), { sequence: completed });
  });

  const winner = selectWinner(candidates);
  if (winner) {
    logger.info(`Winner ${winner.providerId} with ${winner.words.join(', ')} for ${winner.score}`);
    return { move: winningMove(winner), winner, candidates };
  }

  const forced = forcedMove(request.rack, request.bagRemaining, candidates);
  logger.warn(forced.reason);
  return { move: forced.move, winner: null, candidates, reason: forced.reason };
}
