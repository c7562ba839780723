import { Board } from './board';
import { consumeRack, removeFromRack, resolveRackUsage } from './rack';
import { checkPlacementRules } from './rules';
import { BINGO_BONUS, consumePremiums, scoreWords } from './scoring';
import { RACK_SIZE, TileBag, rackPoints, type BagSnapshot } from './tiles';
import type {
  GameEndReason,
  GameEndedInfo,
  GameHistoryEntry,
  MoveResult,
  Placement,
  PlayerState,
  Variant
} from './types';

export type GameStatus = 'in_progress' | 'ended';

export interface GameState {
  variant: Variant;
  board: Board;
  bag: TileBag;
  players: PlayerState[];
  currentPlayerIndex: number;
  moveNumber: number;
  history: GameHistoryEntry[];
  ended: GameEndedInfo | null;
}

/** Plain copy of a game, detached from the live instance. */
export interface GameSnapshot {
  variant: Variant;
  board: Board;
  bag: BagSnapshot;
  players: PlayerState[];
  currentPlayerIndex: number;
  moveNumber: number;
  history: GameHistoryEntry[];
  ended: GameEndedInfo | null;
}

const MAX_HISTORY = 250;

function copyPlayers(players: readonly PlayerState[]): PlayerState[] {
  return players.map((p) => ({ ...p, rack: [...p.rack] }));
}

export class ScrabbleGame {
  private state: GameState | null = null;

  start(variant: Variant, playerIds: string[], seed: number = Date.now()): GameState {
    if (playerIds.length === 0) {
      throw new Error('At least one player is required');
    }
    const bag = TileBag.create(variant, seed);
    const players = playerIds.map((id) => ({ id, rack: bag.draw(RACK_SIZE), score: 0, passStreak: 0 }));
    this.state = {
      variant,
      board: new Board(),
      bag,
      players,
      currentPlayerIndex: 0,
      moveNumber: 0,
      history: [],
      ended: null
    };
    return this.state;
  }

  resume(snapshot: GameSnapshot): void {
    this.state = {
      variant: snapshot.variant,
      board: snapshot.board.clone(),
      bag: TileBag.restore(snapshot.bag),
      players: copyPlayers(snapshot.players),
      currentPlayerIndex: snapshot.currentPlayerIndex,
      moveNumber: snapshot.moveNumber,
      history: snapshot.history.map((entry) => ({ ...entry })),
      ended: snapshot.ended
    };
  }

  snapshot(): GameSnapshot {
    const state = this.getState();
    return {
      variant: state.variant,
      board: state.board.clone(),
      bag: state.bag.snapshot(),
      players: copyPlayers(state.players),
      currentPlayerIndex: state.currentPlayerIndex,
      moveNumber: state.moveNumber,
      history: state.history.map((entry) => ({ ...entry })),
      ended: state.ended
    };
  }

  getState(): GameState {
    if (!this.state) {
      throw new Error('Game not started');
    }
    return this.state;
  }

  get status(): GameStatus {
    return this.getState().ended ? 'ended' : 'in_progress';
  }

  currentPlayer(): PlayerState {
    const state = this.getState();
    return state.players[state.currentPlayerIndex];
  }

  /**
   * Validates geometry and rack usage, commits the tiles, scores them and
   * refills the rack. Dictionary checks are the judge's concern.
   */
  playMove(playerId: string, placements: readonly Placement[]): MoveResult {
    const state = this.getState();
    const refusal = this.refuse(playerId);
    if (refusal) return refusal;
    const player = this.currentPlayer();

    const geometry = checkPlacementRules(state.board, placements);
    if (!geometry.ok) return { success: false, message: 'Illegal placement', violation: geometry.error };

    const usage = resolveRackUsage(player.rack, placements, state.variant);
    if (!usage.ok) return { success: false, message: 'Tile not in rack', violation: usage.error };
    const resolved = usage.value;

    const remaining = consumeRack(player.rack, resolved);
    if (!remaining.ok) return { success: false, message: 'Tile not in rack', violation: remaining.error };

    state.board.placeLetters(resolved);
    const words = state.board.buildWordsForMove(resolved);
    if (words.length === 0) {
      state.board.clearLetters(resolved);
      return { success: false, message: 'No word formed', violation: 'no_words_formed' };
    }

    const scored = scoreWords(state.board, resolved, words, state.variant);
    const scoreDelta = scored.total + (resolved.length === RACK_SIZE ? BINGO_BONUS : 0);
    consumePremiums(state.board, resolved);

    player.rack = [...remaining.value, ...state.bag.draw(RACK_SIZE - remaining.value.length)];
    player.score += scoreDelta;
    player.passStreak = 0;
    state.moveNumber += 1;
    recordHistory(state, {
      type: 'MOVE',
      moveNumber: state.moveNumber,
      playerId,
      scoreDelta,
      words: words.map((w) => w.word),
      placedTiles: resolved.length
    });
    this.advanceTurn();

    const result: MoveResult = {
      success: true,
      scoreDelta,
      words: words.map((w) => w.word),
      breakdowns: scored.breakdowns
    };
    const finisher = state.bag.isEmpty() ? state.players.find((p) => p.rack.length === 0) : undefined;
    if (finisher) {
      result.gameEnded = this.settle('bag_empty_and_player_out', finisher.id);
    }
    return result;
  }

  passTurn(playerId: string): MoveResult {
    const state = this.getState();
    const refusal = this.refuse(playerId);
    if (refusal) return refusal;

    this.currentPlayer().passStreak += 1;
    state.moveNumber += 1;
    recordHistory(state, { type: 'PASS', moveNumber: state.moveNumber, playerId });
    this.advanceTurn();
    return this.afterPass();
  }

  /** Needs a full rack's worth of tiles in the bag; counts as a pass. */
  exchangeTiles(playerId: string, letters: readonly string[]): MoveResult {
    const state = this.getState();
    const refusal = this.refuse(playerId);
    if (refusal) return refusal;
    const player = this.currentPlayer();

    if (letters.length === 0) {
      return { success: false, message: 'Choose tiles to exchange' };
    }
    if (state.bag.remaining() < RACK_SIZE) {
      return { success: false, message: 'Not enough tiles in bag' };
    }
    const remaining = removeFromRack(player.rack, letters);
    if (!remaining.ok) return { success: false, message: 'Tile not in rack', violation: remaining.error };

    player.rack = [...remaining.value, ...state.bag.exchange(letters)];
    player.passStreak += 1;
    state.moveNumber += 1;
    recordHistory(state, {
      type: 'EXCHANGE',
      moveNumber: state.moveNumber,
      playerId,
      exchangedTiles: letters.length
    });
    this.advanceTurn();
    return this.afterPass();
  }

  /** Ends the game when the caller has established that nobody can move. */
  declareNoMovesAvailable(): MoveResult {
    if (this.getState().ended) return { success: false, message: 'Game has ended' };
    return { success: true, gameEnded: this.settle('no_moves_available', null) };
  }

  private refuse(playerId: string): MoveResult | null {
    const state = this.getState();
    if (state.ended) return { success: false, message: 'Game has ended' };
    if (this.currentPlayer().id !== playerId) return { success: false, message: 'Not your turn' };
    return null;
  }

  private afterPass(): MoveResult {
    const state = this.getState();
    if (state.players.every((p) => p.passStreak >= 2)) {
      return { success: true, gameEnded: this.settle('all_players_passed_twice', null) };
    }
    return { success: true };
  }

  private advanceTurn(): void {
    const state = this.getState();
    state.currentPlayerIndex = (state.currentPlayerIndex + 1) % state.players.length;
  }

  /**
   * Everyone loses the value of their own rack; a finisher with an empty rack
   * collects what the others lost. Runs once per game.
   */
  private settle(reason: GameEndReason, finisherId: string | null): GameEndedInfo {
    const state = this.getState();
    if (state.ended) return state.ended;

    const leftoverPoints: Record<string, number> = {};
    state.players.forEach((p) => {
      leftoverPoints[p.id] = rackPoints(p.rack, state.variant);
      p.score -= leftoverPoints[p.id];
    });

    const finisher = state.players.find((p) => p.id === finisherId);
    if (finisher) {
      finisher.score += state.players
        .filter((p) => p.id !== finisher.id)
        .reduce((sum, p) => sum + leftoverPoints[p.id], 0);
    }

    const finalScores: Record<string, number> = {};
    state.players.forEach((p) => {
      finalScores[p.id] = p.score;
    });
    state.ended = { reason, finalScores, leftoverPoints };
    return state.ended;
  }
}

function recordHistory(state: GameState, entry: GameHistoryEntry) {
  state.history.push(entry);
  if (state.history.length > MAX_HISTORY) {
    state.history.splice(0, state.history.length - MAX_HISTORY);
  }
}
