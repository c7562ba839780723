import type { Board } from '../core/board';
import { coordKey } from '../core/boardLayout';
import { removeFromRack, resolveRackUsage } from '../core/rack';
import { checkPlacementRules } from '../core/rules';
import { scoreMove } from '../core/scoring';
import { BLANK, fail, ok } from '../core/types';
import type {
  Direction,
  Placement,
  Result,
  RuleViolation,
  ScoreBreakdown,
  Variant,
  WordFound
} from '../core/types';
import { canonicalStart, type BlanksEncoding, type MovePayload } from '../ai/moveSchema';
import type { DictionaryJudge } from './judge';

export interface ValidateOptions {
  variant: Variant;
  /** Let letters missing from the rack spend a blank without a mapping. */
  implicitBlanks?: boolean;
}

export interface ValidatedMove {
  /** Rack-resolved placements ready to commit. */
  placements: Placement[];
  direction: Direction;
  words: WordFound[];
  breakdowns: ScoreBreakdown[];
  score: number;
  bingo: boolean;
}

export interface NormalizedMove {
  placements: Placement[];
  direction: Direction;
  blankAllowed: (placement: Placement) => boolean;
}

function clean(letter: string | null | undefined): string {
  return (letter ?? '').trim();
}

function isLowercaseLetter(letter: string): boolean {
  return letter !== letter.toUpperCase() && letter === letter.toLowerCase();
}

/** Letter a `?` at this position stands for, if the payload says. */
export function resolveBlankLetter(
  row: number,
  col: number,
  blanks: BlanksEncoding | null | undefined,
  ordinal: number
): string | null {
  if (!blanks) return null;
  if (Array.isArray(blanks)) {
    return clean(blanks[ordinal]).toUpperCase() || null;
  }
  const mapped = blanks[coordKey(row, col)] ?? blanks[BLANK] ?? blanks[`?${ordinal + 1}`];
  return clean(mapped).toUpperCase() || null;
}

function mappingAllowsBlank(blanks: BlanksEncoding | null | undefined, placement: Placement): boolean {
  if (!blanks || Array.isArray(blanks)) return false;
  const byCoord = blanks[coordKey(placement.row, placement.col)];
  const anyBlank = blanks[BLANK];
  return clean(byCoord).toUpperCase() === placement.letter || clean(anyBlank).toUpperCase() === placement.letter;
}

/**
 * Turns a tolerant payload into canonical placements. Tiles without
 * coordinates are laid from the start square along the direction, skipping
 * occupied cells.
 */
export function normalizeMovePayload(board: Board, move: MovePayload): Result<NormalizedMove, RuleViolation> {
  const direction = move.direction;
  if (direction !== 'ACROSS' && direction !== 'DOWN') return fail('direction_invalid');

  const start = canonicalStart(move);
  const cursor = start ? { ...start } : null;
  const advance = () => {
    if (!cursor) return;
    if (direction === 'ACROSS') cursor.col += 1;
    else cursor.row += 1;
  };

  const placements: Placement[] = [];
  let blankOrdinal = 0;
  for (const raw of move.placements) {
    let row: number;
    let col: number;
    if (raw.row !== undefined && raw.col !== undefined) {
      row = raw.row;
      col = raw.col;
    } else if (cursor) {
      while (board.isOccupied(cursor.row, cursor.col)) advance();
      row = cursor.row;
      col = cursor.col;
      advance();
    } else {
      return fail('invalid_placements_format');
    }

    const letter = clean(raw.letter);
    if (Array.from(letter).length !== 1) return fail('letter_len_must_be_1');
    const explicit = clean(raw.blank_as ?? raw.blankAs).toUpperCase();

    if (letter === BLANK) {
      const mapped = explicit || resolveBlankLetter(row, col, move.blanks, blankOrdinal);
      blankOrdinal += 1;
      placements.push(mapped ? { row, col, letter: BLANK, blankAs: mapped } : { row, col, letter: BLANK });
    } else if (explicit) {
      placements.push({ row, col, letter: BLANK, blankAs: explicit });
    } else if (isLowercaseLetter(letter)) {
      placements.push({ row, col, letter: BLANK, blankAs: letter.toUpperCase() });
    } else {
      placements.push({ row, col, letter });
    }
  }

  return ok({ placements, direction, blankAllowed: (p) => mappingAllowsBlank(move.blanks, p) });
}

/**
 * Geometry, rack and scoring without the dictionary. The board is never
 * modified.
 */
export function validateMoveRules(
  board: Board,
  rack: readonly string[],
  move: MovePayload,
  options: ValidateOptions
): Result<ValidatedMove, RuleViolation> {
  const normalized = normalizeMovePayload(board, move);
  if (!normalized.ok) return normalized;

  const geometry = checkPlacementRules(board, normalized.value.placements, normalized.value.direction);
  if (!geometry.ok) return geometry;

  const usage = resolveRackUsage(rack, normalized.value.placements, options.variant, {
    implicitBlanks: options.implicitBlanks,
    blankAllowed: normalized.value.blankAllowed
  });
  if (!usage.ok) return usage;

  const scored = scoreMove(board, usage.value, options.variant);
  if (scored.words.length === 0) return fail('no_words_formed');

  return ok({
    placements: usage.value,
    direction: geometry.value,
    words: scored.words,
    breakdowns: scored.breakdowns,
    score: scored.total,
    bingo: scored.bingo
  });
}

/**
 * Runs every formed word past the judge. Words along the move direction
 * fail as `word_not_in_dict`, the others as `cross_word_not_in_dict`.
 */
export async function judgeMove(
  move: ValidatedMove,
  judge: DictionaryJudge,
  variant: Variant
): Promise<Result<ValidatedMove, RuleViolation>> {
  const verdict = await judge.judge(
    move.words.map((w) => w.word),
    variant
  );
  for (const [i, found] of move.words.entries()) {
    if (verdict.results[i]?.valid) continue;
    return fail<RuleViolation>(
      found.direction === move.direction ? `word_not_in_dict:${found.word}` : `cross_word_not_in_dict:${found.word}`
    );
  }
  return ok(move);
}

export async function validateMove(
  board: Board,
  rack: readonly string[],
  move: MovePayload,
  judge: DictionaryJudge,
  options: ValidateOptions
): Promise<Result<ValidatedMove, RuleViolation>> {
  const checked = validateMoveRules(board, rack, move, options);
  if (!checked.ok) return checked;
  return await judgeMove(checked.value, judge, options.variant);
}

/** Exchange letters must all come from the rack; lowercase is accepted. */
export function validateExchange(rack: readonly string[], letters: readonly string[]): Result<string[], RuleViolation> {
  const normalized = letters.map((letter) => clean(letter).toUpperCase());
  if (normalized.length === 0) return fail('no_placements');
  const remaining = removeFromRack(rack, normalized);
  if (!remaining.ok) return remaining;
  return ok(normalized);
}
