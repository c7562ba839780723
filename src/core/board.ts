import { BOARD_SIZE, buildPremiumMap, coordKey } from './boardLayout';
import { BLANK } from './types';
import type { Cell, Coord, Direction, Placement, Premium, WordFound } from './types';

const premiumMap = buildPremiumMap();

export interface PremiumSquare extends Coord {
  premium: Premium;
}

function perpendicular(direction: Direction): Direction {
  return direction === 'ACROSS' ? 'DOWN' : 'ACROSS';
}

/**
 * 15x15 grid. Premiums are fixed at construction; only `premiumUsed` ever
 * changes on a premium cell, and only from false to true.
 */
export class Board {
  private readonly cells: Cell[][];

  constructor() {
    this.cells = Array.from({ length: BOARD_SIZE }, (_, row) =>
      Array.from({ length: BOARD_SIZE }, (_, col) => ({
        letter: null,
        isBlank: false,
        premium: premiumMap.get(coordKey(row, col)) ?? null,
        premiumUsed: false
      }))
    );
  }

  inside(row: number, col: number): boolean {
    return (
      Number.isInteger(row) &&
      Number.isInteger(col) &&
      row >= 0 &&
      row < BOARD_SIZE &&
      col >= 0 &&
      col < BOARD_SIZE
    );
  }

  cell(row: number, col: number): Readonly<Cell> {
    return this.cells[row][col];
  }

  getLetter(row: number, col: number): string | null {
    if (!this.inside(row, col)) return null;
    return this.cells[row][col].letter;
  }

  isOccupied(row: number, col: number): boolean {
    return this.getLetter(row, col) !== null;
  }

  hasAnyLetters(): boolean {
    return this.cells.some((row) => row.some((cell) => cell.letter !== null));
  }

  /** Unconditional write; callers validate first. */
  placeLetters(placements: readonly Placement[]): void {
    placements.forEach((p) => {
      const cell = this.cells[p.row][p.col];
      cell.letter = p.blankAs ?? p.letter;
      cell.isBlank = p.letter === BLANK;
    });
  }

  clearLetters(placements: readonly Placement[]): void {
    placements.forEach((p) => {
      const cell = this.cells[p.row][p.col];
      cell.letter = null;
      cell.isBlank = false;
    });
  }

  markPremiumUsed(row: number, col: number): void {
    const cell = this.cells[row][col];
    if (cell.premium) cell.premiumUsed = true;
  }

  /** Writes a cell from persisted data. */
  restoreCell(row: number, col: number, letter: string | null, isBlank: boolean, premiumUsed: boolean): void {
    const cell = this.cells[row][col];
    cell.letter = letter;
    cell.isBlank = letter !== null && isBlank;
    cell.premiumUsed = cell.premium !== null && premiumUsed;
  }

  /** Single row => ACROSS (a lone tile included), single column => DOWN. */
  lineDirection(placements: readonly Placement[]): Direction | null {
    if (placements.length === 0) return null;
    const [first] = placements;
    if (placements.every((p) => p.row === first.row)) return 'ACROSS';
    if (placements.every((p) => p.col === first.col)) return 'DOWN';
    return null;
  }

  /** Contiguous occupied run through (row, col); empty when the cell itself is empty. */
  extendWord(row: number, col: number, direction: Direction): Coord[] {
    if (!this.isOccupied(row, col)) return [];
    const dr = direction === 'DOWN' ? 1 : 0;
    const dc = direction === 'ACROSS' ? 1 : 0;

    let r = row;
    let c = col;
    while (this.isOccupied(r - dr, c - dc)) {
      r -= dr;
      c -= dc;
    }

    const cells: Coord[] = [];
    while (this.isOccupied(r, c)) {
      cells.push({ row: r, col: c });
      r += dr;
      c += dc;
    }
    return cells;
  }

  wordFrom(cells: readonly Coord[]): string {
    return cells.map(({ row, col }) => this.cells[row][col].letter ?? '').join('');
  }

  /**
   * Words formed by placements already written to the board: the main word
   * along the placement line, then each perpendicular word through a new
   * tile. Only runs of two or more letters count.
   */
  buildWordsForMove(placements: readonly Placement[]): WordFound[] {
    if (placements.length === 0) return [];
    const mainDirection = this.lineDirection(placements) ?? 'ACROSS';
    const crossDirection = perpendicular(mainDirection);
    const wordsByKey = new Map<string, WordFound>();

    const addWord = (cells: Coord[], direction: Direction) => {
      if (cells.length < 2) return;
      const key = `${direction}:${cells[0].row},${cells[0].col}`;
      if (wordsByKey.has(key)) return;
      wordsByKey.set(key, { word: this.wordFrom(cells), cells, direction });
    };

    const [first] = placements;
    addWord(this.extendWord(first.row, first.col, mainDirection), mainDirection);
    placements.forEach((p) => {
      addWord(this.extendWord(p.row, p.col, crossDirection), crossDirection);
    });
    return [...wordsByKey.values()];
  }

  premiumSquares(includeUsed = false): PremiumSquare[] {
    const squares: PremiumSquare[] = [];
    this.cells.forEach((cells, row) => {
      cells.forEach((cell, col) => {
        if (!cell.premium) return;
        if (cell.premiumUsed && !includeUsed) return;
        squares.push({ row, col, premium: cell.premium });
      });
    });
    return squares;
  }

  /** One string per row, `.` for an empty cell. */
  toRows(): string[] {
    return this.cells.map((row) => row.map((cell) => cell.letter ?? '.').join(''));
  }

  /** Coordinates matching a cell predicate, in row-major order. */
  coordsWhere(predicate: (cell: Readonly<Cell>) => boolean): Coord[] {
    const coords: Coord[] = [];
    this.cells.forEach((cells, row) => {
      cells.forEach((cell, col) => {
        if (predicate(cell)) coords.push({ row, col });
      });
    });
    return coords;
  }

  clone(): Board {
    const copy = new Board();
    this.cells.forEach((cells, row) => {
      cells.forEach((cell, col) => {
        copy.restoreCell(row, col, cell.letter, cell.isBlank, cell.premiumUsed);
      });
    });
    return copy;
  }
}
