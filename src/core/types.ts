export type Variant = 'en' | 'ru';

export type Premium = 'TW' | 'DW' | 'TL' | 'DL';

export type Direction = 'ACROSS' | 'DOWN';

/** Rack symbol for a blank tile. */
export const BLANK = '?';

export interface Coord {
  row: number;
  col: number;
}

export interface Cell {
  letter: string | null;
  isBlank: boolean;
  premium: Premium | null;
  /** Premiums apply only on the turn a tile first covers them. */
  premiumUsed: boolean;
}

export interface Placement {
  readonly row: number;
  readonly col: number;
  /** Variant letter, or BLANK for a blank tile. */
  readonly letter: string;
  /** Letter a blank stands for. */
  readonly blankAs?: string;
}

export interface WordFound {
  word: string;
  cells: Coord[];
  direction: Direction;
}

export interface ScoreBreakdown {
  word: string;
  basePoints: number;
  letterBonusPoints: number;
  wordMultiplier: number;
  total: number;
}

export type Result<T, E> = { ok: true; value: T } | { ok: false; error: E };

export function ok<T>(value: T): { ok: true; value: T } {
  return { ok: true, value };
}

export function fail<E>(error: E): { ok: false; error: E } {
  return { ok: false, error };
}

export type RuleViolationCode =
  | 'no_placements'
  | 'invalid_placements_format'
  | 'direction_invalid'
  | 'out_of_bounds'
  | 'cell_occupied'
  | 'duplicate_cell'
  | 'not_in_one_line'
  | 'direction_mismatch'
  | 'gaps_in_line'
  | 'first_move_must_cover_center'
  | 'not_connected'
  | 'letter_len_must_be_1'
  | 'blank_has_no_mapping'
  | 'rack_missing_blank_for_mapping'
  | 'no_words_formed';

/**
 * Reason strings are either a bare code or `code:detail`
 * (e.g. `rack_missing_tile:Q`, `cross_word_not_in_dict:EN`).
 */
export type RuleViolation =
  | RuleViolationCode
  | `rack_missing_tile:${string}`
  | `word_not_in_dict:${string}`
  | `cross_word_not_in_dict:${string}`;

export type GameEndReason = 'bag_empty_and_player_out' | 'no_moves_available' | 'all_players_passed_twice';

export interface GameEndedInfo {
  reason: GameEndReason;
  finalScores: Record<string, number>;
  leftoverPoints: Record<string, number>;
}

export interface PlayerState {
  id: string;
  rack: string[];
  score: number;
  passStreak: number;
}

export type GameHistoryEntry =
  | {
    type: 'MOVE';
    moveNumber: number;
    playerId: string;
    scoreDelta: number;
    words: string[];
    placedTiles: number;
  }
  | {
    type: 'PASS';
    moveNumber: number;
    playerId: string;
  }
  | {
    type: 'EXCHANGE';
    moveNumber: number;
    playerId: string;
    exchangedTiles: number;
  };

export interface MoveResult {
  success: boolean;
  message?: string;
  violation?: RuleViolation;
  scoreDelta?: number;
  words?: string[];
  breakdowns?: ScoreBreakdown[];
  gameEnded?: GameEndedInfo;
}
