import { describe, it, expect } from 'vitest';
import { Board } from './board';
import { ScrabbleGame } from './game';
import type { Placement } from './types';

function setup(racks: Record<string, string[]>, bagTiles: string[] = [], board = new Board()): ScrabbleGame {
    const game = new ScrabbleGame();
    game.resume({
        variant: 'en',
        board,
        bag: { tiles: bagTiles, seed: 1 },
        players: Object.entries(racks).map(([id, rack]) => ({ id, rack, score: 0, passStreak: 0 })),
        currentPlayerIndex: 0,
        moveNumber: 0,
        history: [],
        ended: null
    });
    return game;
}

const CAT: Placement[] = [
    { row: 7, col: 7, letter: 'C' },
    { row: 7, col: 8, letter: 'A' },
    { row: 7, col: 9, letter: 'T' }
];

const FULL_BAG = 'EEEEEEEEEEIIIIIIIIII'.split('');

describe('ScrabbleGame', () => {
    it('starts a game correctly', () => {
        const game = new ScrabbleGame();
        const state = game.start('en', ['p1', 'p2'], 123);

        expect(state.variant).toBe('en');
        expect(state.players.map((p) => p.id)).toEqual(['p1', 'p2']);
        expect(state.players.map((p) => p.rack.length)).toEqual([7, 7]);
        expect(state.players.map((p) => p.score)).toEqual([0, 0]);
        expect(state.bag.remaining()).toBe(86);
        expect(state.moveNumber).toBe(0);
        expect(game.currentPlayer().id).toBe('p1');
        expect(game.status).toBe('in_progress');
    });

    it('deals the same racks for the same seed', () => {
        const a = new ScrabbleGame().start('en', ['p1', 'p2'], 99);
        const b = new ScrabbleGame().start('en', ['p1', 'p2'], 99);
        expect(a.players).toEqual(b.players);
    });

    it('throws before start', () => {
        expect(() => new ScrabbleGame().getState()).toThrow('Game not started');
    });

    it('plays, scores, refills and passes the turn', () => {
        const game = setup({ p1: ['C', 'A', 'T', 'E', 'E', 'R', 'S'], p2: ['X'] }, ['B', 'D', 'F', 'G', 'H']);
        const result = game.playMove('p1', CAT);

        expect(result.success).toBe(true);
        expect(result.scoreDelta).toBe(10);
        expect(result.words).toEqual(['CAT']);

        const state = game.getState();
        expect(state.players[0].rack).toEqual(['E', 'E', 'R', 'S', 'H', 'G', 'F']);
        expect(state.players[0].score).toBe(10);
        expect(state.bag.remaining()).toBe(2);
        expect(state.board.cell(7, 7).premiumUsed).toBe(true);
        expect(game.currentPlayer().id).toBe('p2');
        expect(state.history).toEqual([
            { type: 'MOVE', moveNumber: 1, playerId: 'p1', scoreDelta: 10, words: ['CAT'], placedTiles: 3 }
        ]);
    });

    it('validates first move must cover center', () => {
        const game = setup({ p1: ['C', 'A', 'T'] });
        const result = game.playMove('p1', [
            { row: 0, col: 0, letter: 'C' },
            { row: 0, col: 1, letter: 'A' }
        ]);
        expect(result.success).toBe(false);
        expect(result.violation).toBe('first_move_must_cover_center');
        expect(game.getState().board.hasAnyLetters()).toBe(false);
        expect(game.getState().players[0].rack).toEqual(['C', 'A', 'T']);
    });

    it('rejects a move out of turn', () => {
        const game = setup({ p1: ['C', 'A', 'T'], p2: ['C', 'A', 'T'] });
        expect(game.playMove('p2', CAT)).toEqual({ success: false, message: 'Not your turn' });
    });

    it('rejects tiles that are not in the rack', () => {
        const game = setup({ p1: ['C', 'A'] });
        const result = game.playMove('p1', CAT);
        expect(result.violation).toBe('rack_missing_tile:T');
        expect(game.getState().board.hasAnyLetters()).toBe(false);
    });

    it('rejects a lone opening tile that forms no word', () => {
        const game = setup({ p1: ['C'] });
        const result = game.playMove('p1', [{ row: 7, col: 7, letter: 'C' }]);
        expect(result.violation).toBe('no_words_formed');
        expect(game.getState().board.hasAnyLetters()).toBe(false);
        expect(game.currentPlayer().id).toBe('p1');
    });

    it('plays a blank for zero points', () => {
        const game = setup({ p1: ['?', 'A', 'T'] }, FULL_BAG);
        const result = game.playMove('p1', [
            { row: 7, col: 7, letter: '?', blankAs: 'C' },
            { row: 7, col: 8, letter: 'A' },
            { row: 7, col: 9, letter: 'T' }
        ]);
        expect(result.scoreDelta).toBe(4);
        const state = game.getState();
        expect(state.board.getLetter(7, 7)).toBe('C');
        expect(state.board.cell(7, 7).isBlank).toBe(true);
        expect(state.players[0].rack).not.toContain('?');
    });

    it('refuses a blank that stands for more than one letter', () => {
        const game = setup({ p1: ['?', 'T'] }, FULL_BAG);
        const result = game.playMove('p1', [
            { row: 7, col: 7, letter: '?', blankAs: 'CA' },
            { row: 7, col: 8, letter: 'T' }
        ]);
        expect(result).toMatchObject({ success: false, violation: 'blank_has_no_mapping' });
        expect(game.getState().board.hasAnyLetters()).toBe(false);
        expect(game.getState().players[0].rack).toEqual(['?', 'T']);
    });

    it('adds the bingo bonus for seven tiles', () => {
        const game = setup({ p1: 'ABCDEFG'.split('') }, FULL_BAG);
        const placements = 'ABCDEFG'.split('').map((letter, i) => ({ row: 7, col: 7 + i, letter }));
        const result = game.playMove('p1', placements);
        expect(result.scoreDelta).toBe(84);
        expect(game.getState().players[0].rack).toHaveLength(7);
    });

    it('ends after every player passes twice, deducting leftovers', () => {
        const game = setup({ p1: ['A'], p2: ['Q'] });
        expect(game.passTurn('p1')).toEqual({ success: true });
        expect(game.passTurn('p2')).toEqual({ success: true });
        expect(game.passTurn('p1')).toEqual({ success: true });

        const result = game.passTurn('p2');
        expect(result.gameEnded).toEqual({
            reason: 'all_players_passed_twice',
            finalScores: { p1: -1, p2: -10 },
            leftoverPoints: { p1: 1, p2: 10 }
        });
        expect(game.status).toBe('ended');
        expect(game.passTurn('p1')).toEqual({ success: false, message: 'Game has ended' });
    });

    it('resets the pass streak on a play', () => {
        const game = setup({ p1: ['C', 'A', 'T', 'S'], p2: ['Q'] }, FULL_BAG);
        game.passTurn('p1');
        game.passTurn('p2');
        expect(game.playMove('p1', CAT).success).toBe(true);
        expect(game.passTurn('p2').gameEnded).toBeUndefined();
        expect(game.getState().players.map((p) => p.passStreak)).toEqual([0, 2]);
    });

    it('exchanges tiles and counts it as a pass', () => {
        const game = setup({ p1: ['Q', 'Q', 'A'], p2: ['B'] }, FULL_BAG);
        const result = game.exchangeTiles('p1', ['Q', 'Q']);
        expect(result).toEqual({ success: true });

        const state = game.getState();
        expect(state.players[0].rack).toHaveLength(3);
        expect(state.players[0].rack[0]).toBe('A');
        expect(state.players[0].passStreak).toBe(1);
        expect(state.bag.remaining()).toBe(FULL_BAG.length);
        expect(state.bag.countOf('Q')).toBe(2);
        expect(state.history[0]).toEqual({ type: 'EXCHANGE', moveNumber: 1, playerId: 'p1', exchangedTiles: 2 });
    });

    it('refuses exchanges the rules do not allow', () => {
        expect(setup({ p1: ['A'] }, ['E', 'E']).exchangeTiles('p1', ['A'])).toEqual({
            success: false,
            message: 'Not enough tiles in bag'
        });
        expect(setup({ p1: ['A'] }, FULL_BAG).exchangeTiles('p1', [])).toEqual({
            success: false,
            message: 'Choose tiles to exchange'
        });
        expect(setup({ p1: ['A'] }, FULL_BAG).exchangeTiles('p1', ['Z']).violation).toBe('rack_missing_tile:Z');
    });

    it('ends when the bag is empty and a player goes out', () => {
        const game = setup({ p1: ['A', 'T'], p2: ['Q', 'I'] });
        const result = game.playMove('p1', [
            { row: 7, col: 7, letter: 'A' },
            { row: 7, col: 8, letter: 'T' }
        ]);
        expect(result.success).toBe(true);
        expect(result.scoreDelta).toBe(4);
        expect(result.gameEnded).toEqual({
            reason: 'bag_empty_and_player_out',
            finalScores: { p1: 15, p2: -11 },
            leftoverPoints: { p1: 0, p2: 11 }
        });
    });

    it('ends when no moves are available and settles once', () => {
        const game = setup({ p1: ['A'], p2: ['B'] });
        const result = game.declareNoMovesAvailable();
        expect(result.gameEnded).toEqual({
            reason: 'no_moves_available',
            finalScores: { p1: -1, p2: -3 },
            leftoverPoints: { p1: 1, p2: 3 }
        });
        expect(game.declareNoMovesAvailable()).toEqual({ success: false, message: 'Game has ended' });
        expect(game.getState().players.map((p) => p.score)).toEqual([-1, -3]);
    });

    it('snapshots without sharing state', () => {
        const game = setup({ p1: ['C', 'A', 'T'], p2: ['B'] }, FULL_BAG);
        const before = game.snapshot();
        game.playMove('p1', CAT);

        expect(before.board.hasAnyLetters()).toBe(false);
        expect(before.players[0].rack).toEqual(['C', 'A', 'T']);
        expect(before.bag.tiles).toHaveLength(FULL_BAG.length);
    });
});
