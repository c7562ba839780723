import type { Board } from './board';
import { coordKey } from './boardLayout';
import { RACK_SIZE, tileValue } from './tiles';
import type { Placement, ScoreBreakdown, Variant, WordFound } from './types';

export const BINGO_BONUS = 50;

export interface WordsScore {
  total: number;
  breakdowns: ScoreBreakdown[];
}

export interface MoveScore extends WordsScore {
  words: WordFound[];
  bingo: boolean;
}

/**
 * Scores words on a board that already holds the placements. Letter and word
 * premiums count only under new tiles whose premium is still unused; blanks
 * are worth 0.
 */
export function scoreWords(
  board: Board,
  placements: readonly Placement[],
  words: readonly WordFound[],
  variant: Variant
): WordsScore {
  const placedKeys = new Set(placements.map((p) => coordKey(p.row, p.col)));

  const breakdowns = words.map((found): ScoreBreakdown => {
    let basePoints = 0;
    let letterBonusPoints = 0;
    let wordMultiplier = 1;

    found.cells.forEach(({ row, col }) => {
      const cell = board.cell(row, col);
      const value = cell.isBlank || cell.letter === null ? 0 : tileValue(cell.letter, variant);
      basePoints += value;

      if (!placedKeys.has(coordKey(row, col)) || !cell.premium || cell.premiumUsed) return;
      if (cell.premium === 'DL') letterBonusPoints += value;
      else if (cell.premium === 'TL') letterBonusPoints += value * 2;
      else if (cell.premium === 'DW') wordMultiplier *= 2;
      else if (cell.premium === 'TW') wordMultiplier *= 3;
    });

    return {
      word: found.word,
      basePoints,
      letterBonusPoints,
      wordMultiplier,
      total: (basePoints + letterBonusPoints) * wordMultiplier
    };
  });

  return { total: breakdowns.reduce((sum, b) => sum + b.total, 0), breakdowns };
}

/** Marks premiums under the placements as used. Safe to call twice. */
export function consumePremiums(board: Board, placements: readonly Placement[]): void {
  placements.forEach((p) => board.markPremiumUsed(p.row, p.col));
}

/**
 * Scores a move without touching `board`: words are built on a copy and
 * premiums stay unconsumed. Adds the bingo bonus for a full rack.
 */
export function scoreMove(board: Board, placements: readonly Placement[], variant: Variant): MoveScore {
  const scratch = board.clone();
  scratch.placeLetters(placements);
  const words = scratch.buildWordsForMove(placements);
  const scored = scoreWords(scratch, placements, words, variant);
  const bingo = placements.length === RACK_SIZE;
  return {
    words,
    breakdowns: scored.breakdowns,
    bingo,
    total: scored.total + (bingo ? BINGO_BONUS : 0)
  };
}
