import { RACK_SIZE } from '../core/tiles';
import type { Direction, Placement } from '../core/types';
import type { ParseMethod } from './moveParser';
import type { MoveKind, MovePayload } from './moveSchema';

export type CandidateStatus = 'ok' | 'invalid' | 'parse_error' | 'timeout' | 'error';

/** What one provider task produced, win or lose. */
export interface Candidate {
  providerId: string;
  /** Provider that gave the final answer; differs after a fallback. */
  servedBy: string;
  status: CandidateStatus;
  kind: MoveKind | null;
  move: MovePayload | null;
  /** Rack-resolved placements of a validated play. */
  placements: Placement[];
  direction: Direction | null;
  words: string[];
  score: number;
  judgeValid: boolean;
  parseMethod?: ParseMethod;
  error?: string;
  attempts: number;
  /** Completion order across the arbitration, from 1. */
  sequence: number;
  rawContent?: string;
}

export type ArbitratedMove =
  | {
      kind: 'play';
      pass: false;
      placements: Placement[];
      direction: Direction;
      word: string;
      words: string[];
      score: number;
    }
  | { kind: 'exchange'; pass: false; exchange: string[] }
  | { kind: 'pass'; pass: true };

export function makeCandidate(providerId: string, status: CandidateStatus, fields: Partial<Candidate> = {}): Candidate {
  return {
    providerId,
    servedBy: providerId,
    kind: null,
    move: null,
    placements: [],
    direction: null,
    words: [],
    score: -1,
    judgeValid: false,
    attempts: 0,
    sequence: 0,
    ...fields,
    status
  };
}

export function failedCandidate(
  providerId: string,
  status: Exclude<CandidateStatus, 'ok'>,
  error: string,
  fields: Partial<Candidate> = {}
): Candidate {
  return makeCandidate(providerId, status, { ...fields, error });
}

export function isEligible(candidate: Candidate): boolean {
  return candidate.status === 'ok' && candidate.kind === 'play' && candidate.judgeValid;
}

/** Highest score among judge-approved plays; earliest completion wins ties. */
export function selectWinner(candidates: readonly Candidate[]): Candidate | null {
  let best: Candidate | null = null;
  for (const candidate of candidates) {
    if (!isEligible(candidate)) continue;
    if (
      !best ||
      candidate.score > best.score ||
      (candidate.score === best.score && candidate.sequence < best.sequence)
    ) {
      best = candidate;
    }
  }
  return best;
}

export function describeFailure(candidate: Candidate): string {
  if (candidate.status === 'ok') return `${candidate.providerId}: declined to play (${candidate.kind ?? 'unknown'})`;
  return `${candidate.providerId}: ${candidate.status}${candidate.error ? ` (${candidate.error})` : ''}`;
}

export const FAILURES_IN_REASON = 3;

/**
 * Move used when no provider produced an eligible play: exchange the whole
 * rack, or pass when the bag cannot cover an exchange.
 */
export function forcedMove(
  rack: readonly string[],
  bagRemaining: number,
  candidates: readonly Candidate[]
): { move: ArbitratedMove; reason: string } {
  const failures = candidates.slice(0, FAILURES_IN_REASON).map(describeFailure);
  const reason = `No provider produced a valid move${failures.length > 0 ? `: ${failures.join('; ')}` : ''}`;
  if (bagRemaining < RACK_SIZE || rack.length === 0) {
    return { move: { kind: 'pass', pass: true }, reason };
  }
  return { move: { kind: 'exchange', pass: false, exchange: [...rack] }, reason };
}

export function winningMove(candidate: Candidate): ArbitratedMove {
  const direction = candidate.direction ?? 'ACROSS';
  return {
    kind: 'play',
    pass: false,
    placements: candidate.placements,
    direction,
    word: candidate.words[0] ?? '',
    words: candidate.words,
    score: candidate.score
  };
}
