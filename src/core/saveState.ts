import { readFile, writeFile } from 'node:fs/promises';
import { z } from 'zod';
import { Board } from './board';
import { BOARD_SIZE, coordKey } from './boardLayout';
import type { GameSnapshot } from './game';
import { BLANK } from './types';
import type { Placement } from './types';

export const SAVE_VERSION = '1';

export class SaveStateError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'SaveStateError';
  }
}

const coordSchema = z.tuple([z.number().int().min(0).max(14), z.number().int().min(0).max(14)]);

const gridRowSchema = z
  .string()
  .refine((row) => Array.from(row).length === BOARD_SIZE, { message: `row must have ${BOARD_SIZE} cells` });

export const boardEncodingSchema = z.object({
  grid: z.array(gridRowSchema).length(BOARD_SIZE),
  blanks: z.array(coordSchema),
  premiumsUsed: z.array(coordSchema)
});
export type BoardEncoding = z.infer<typeof boardEncodingSchema>;

const historyEntrySchema = z.discriminatedUnion('type', [
  z.object({
    type: z.literal('MOVE'),
    moveNumber: z.number().int(),
    playerId: z.string(),
    scoreDelta: z.number(),
    words: z.array(z.string()),
    placedTiles: z.number().int()
  }),
  z.object({ type: z.literal('PASS'), moveNumber: z.number().int(), playerId: z.string() }),
  z.object({
    type: z.literal('EXCHANGE'),
    moveNumber: z.number().int(),
    playerId: z.string(),
    exchangedTiles: z.number().int()
  })
]);

export const saveFileSchema = boardEncodingSchema.extend({
  version: z.literal(SAVE_VERSION),
  variant: z.enum(['en', 'ru']),
  players: z
    .array(
      z.object({
        id: z.string().min(1),
        rack: z.string(),
        score: z.number(),
        passStreak: z.number().int().min(0)
      })
    )
    .min(1),
  bag: z.string(),
  seed: z.number().int(),
  currentPlayerIndex: z.number().int().min(0),
  moveNumber: z.number().int().min(0),
  history: z.array(historyEntrySchema),
  ended: z
    .object({
      reason: z.enum(['bag_empty_and_player_out', 'no_moves_available', 'all_players_passed_twice']),
      finalScores: z.record(z.number()),
      leftoverPoints: z.record(z.number())
    })
    .nullable()
});
export type SaveFile = z.infer<typeof saveFileSchema>;

const cellLetterSchema = z.string().refine((letter) => Array.from(letter).length === 1, {
  message: 'must be a single letter'
});

export const encodedMoveSchema = z.object({
  placements: z.array(
    z.object({
      row: z.number().int().min(0).max(BOARD_SIZE - 1),
      col: z.number().int().min(0).max(BOARD_SIZE - 1),
      letter: cellLetterSchema
    })
  ),
  blanks: z.record(cellLetterSchema).optional()
});
export type EncodedMove = z.infer<typeof encodedMoveSchema>;

export function encodeBoard(board: Board): BoardEncoding {
  const toPair = ({ row, col }: { row: number; col: number }): [number, number] => [row, col];
  return {
    grid: board.toRows(),
    blanks: board.coordsWhere((cell) => cell.isBlank).map(toPair),
    premiumsUsed: board.coordsWhere((cell) => cell.premiumUsed).map(toPair)
  };
}

export function decodeBoard(encoding: BoardEncoding): Board {
  const board = new Board();
  const blanks = new Set(encoding.blanks.map(([row, col]) => coordKey(row, col)));
  const used = new Set(encoding.premiumsUsed.map(([row, col]) => coordKey(row, col)));
  encoding.grid.forEach((line, row) => {
    Array.from(line).forEach((char, col) => {
      const key = coordKey(row, col);
      board.restoreCell(row, col, char === '.' ? null : char, blanks.has(key), used.has(key));
    });
  });
  return board;
}

export function serializeGame(snapshot: GameSnapshot): SaveFile {
  return {
    version: SAVE_VERSION,
    variant: snapshot.variant,
    ...encodeBoard(snapshot.board),
    players: snapshot.players.map((p) => ({
      id: p.id,
      rack: p.rack.join(''),
      score: p.score,
      passStreak: p.passStreak
    })),
    bag: snapshot.bag.tiles.join(''),
    seed: snapshot.bag.seed,
    currentPlayerIndex: snapshot.currentPlayerIndex,
    moveNumber: snapshot.moveNumber,
    history: snapshot.history,
    ended: snapshot.ended
  };
}

/** Validates untrusted save data and rebuilds a snapshot; throws SaveStateError. */
export function restoreGame(data: unknown): GameSnapshot {
  const parsed = saveFileSchema.safeParse(data);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new SaveStateError(`Invalid save file at ${issue.path.join('.') || '<root>'}: ${issue.message}`);
  }
  const save = parsed.data;
  if (save.currentPlayerIndex >= save.players.length) {
    throw new SaveStateError('Invalid save file at currentPlayerIndex: no such player');
  }
  return {
    variant: save.variant,
    board: decodeBoard(save),
    bag: { tiles: Array.from(save.bag), seed: save.seed },
    players: save.players.map((p) => ({
      id: p.id,
      rack: Array.from(p.rack),
      score: p.score,
      passStreak: p.passStreak
    })),
    currentPlayerIndex: save.currentPlayerIndex,
    moveNumber: save.moveNumber,
    history: save.history,
    ended: save.ended
  };
}

export async function saveSnapshot(path: string, snapshot: GameSnapshot): Promise<void> {
  await writeFile(path, `${JSON.stringify(serializeGame(snapshot), null, 2)}\n`, 'utf8');
}

export async function loadSnapshot(path: string): Promise<GameSnapshot> {
  const raw = await readFile(path, 'utf8');
  let data: unknown;
  try {
    data = JSON.parse(raw);
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new SaveStateError(`Save file ${path} is not JSON: ${reason}`);
  }
  return restoreGame(data);
}

/** `{row, col, letter}` triples; blanks are listed under `blanks` keyed `row,col`. */
export function encodeMove(placements: readonly Placement[]): EncodedMove {
  const blanks: Record<string, string> = {};
  const encoded = placements.map((p) => {
    if (p.letter === BLANK && p.blankAs) blanks[coordKey(p.row, p.col)] = p.blankAs;
    return { row: p.row, col: p.col, letter: p.letter };
  });
  return Object.keys(blanks).length > 0 ? { placements: encoded, blanks } : { placements: encoded };
}

/** Validates an encoded move; throws SaveStateError. */
export function decodeMove(data: unknown): Placement[] {
  const parsed = encodedMoveSchema.safeParse(data);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new SaveStateError(`Invalid move at ${issue.path.join('.') || '<root>'}: ${issue.message}`);
  }
  const move = parsed.data;
  return move.placements.map((p) => {
    const blankAs = move.blanks?.[coordKey(p.row, p.col)];
    return blankAs ? { row: p.row, col: p.col, letter: BLANK, blankAs } : { row: p.row, col: p.col, letter: p.letter };
  });
}
