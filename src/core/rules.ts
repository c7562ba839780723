import type { Board } from './board';
import { CENTER, coordKey } from './boardLayout';
import { fail, ok } from './types';
import type { Direction, Placement, Result, RuleViolation } from './types';

const NEIGHBOURS = [
  [1, 0],
  [-1, 0],
  [0, 1],
  [0, -1]
] as const;

export function placementsInLine(board: Board, placements: readonly Placement[]): Direction | null {
  return board.lineDirection(placements);
}

/** Only binding while the board is empty. */
export function firstMoveMustCoverCenter(board: Board, placements: readonly Placement[]): boolean {
  if (board.hasAnyLetters()) return true;
  return placements.some((p) => p.row === CENTER.row && p.col === CENTER.col);
}

/** Vacuously true on an empty board. */
export function connectedToExisting(board: Board, placements: readonly Placement[]): boolean {
  if (!board.hasAnyLetters()) return true;
  return placements.some(({ row, col }) =>
    NEIGHBOURS.some(([dr, dc]) => board.isOccupied(row + dr, col + dc))
  );
}

/** Every cell in the placement span is either new or already occupied. */
export function noGapsInLine(board: Board, placements: readonly Placement[], direction: Direction): boolean {
  if (placements.length === 0) return true;
  const claimed = new Set(placements.map((p) => coordKey(p.row, p.col)));
  const along = placements.map((p) => (direction === 'ACROSS' ? p.col : p.row));
  const fixed = direction === 'ACROSS' ? placements[0].row : placements[0].col;
  const min = Math.min(...along);
  const max = Math.max(...along);
  for (let i = min; i <= max; i += 1) {
    const row = direction === 'ACROSS' ? fixed : i;
    const col = direction === 'ACROSS' ? i : fixed;
    if (!claimed.has(coordKey(row, col)) && !board.isOccupied(row, col)) return false;
  }
  return true;
}

/**
 * Geometry checks in a fixed order (bounds, occupancy, line, gaps, then
 * center or connectivity); the first failure is reported. When
 * `expectedDirection` is given, a multi-tile move must run that way.
 */
export function checkPlacementRules(
  board: Board,
  placements: readonly Placement[],
  expectedDirection?: Direction
): Result<Direction, RuleViolation> {
  if (placements.length === 0) return fail('no_placements');
  if (!placements.every((p) => board.inside(p.row, p.col))) return fail('out_of_bounds');

  const seen = new Set<string>();
  for (const p of placements) {
    if (board.isOccupied(p.row, p.col)) return fail('cell_occupied');
    const key = coordKey(p.row, p.col);
    if (seen.has(key)) return fail('duplicate_cell');
    seen.add(key);
  }

  const direction = placementsInLine(board, placements);
  if (!direction) return fail('not_in_one_line');
  if (expectedDirection && placements.length > 1 && expectedDirection !== direction) {
    return fail('direction_mismatch');
  }
  if (!noGapsInLine(board, placements, direction)) return fail('gaps_in_line');

  if (!firstMoveMustCoverCenter(board, placements)) return fail('first_move_must_cover_center');
  if (!connectedToExisting(board, placements)) return fail('not_connected');

  return ok(placements.length === 1 && expectedDirection ? expectedDirection : direction);
}
