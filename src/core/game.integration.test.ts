import { describe, it, expect } from 'vitest';
import { ScrabbleGame } from './game';
import { variantSupply } from './tiles';
import type { Placement } from './types';

function symbolCounts(game: ScrabbleGame): Record<string, number> {
    const state = game.getState();
    const counts: Record<string, number> = {};
    const add = (symbol: string) => {
        counts[symbol] = (counts[symbol] ?? 0) + 1;
    };
    state.players.forEach((p) => p.rack.forEach(add));
    state.bag.snapshot().tiles.forEach(add);
    for (let row = 0; row < 15; row += 1) {
        for (let col = 0; col < 15; col += 1) {
            const cell = state.board.cell(row, col);
            if (cell.letter === null) continue;
            add(cell.isBlank ? '?' : cell.letter);
        }
    }
    return counts;
}

/** Places a rack tile, giving blanks a letter. */
function tile(row: number, col: number, letter: string): Placement {
    return letter === '?' ? { row, col, letter, blankAs: 'E' } : { row, col, letter };
}

describe('ScrabbleGame Integration', () => {
    it('keeps every tile accounted for across plays and exchanges', () => {
        const game = new ScrabbleGame();
        game.start('en', ['p1', 'p2'], 2024);
        const supply = variantSupply('en');
        expect(symbolCounts(game)).toEqual(supply);

        // p1 opens with two tiles through the center
        const rack1 = game.currentPlayer().rack;
        let result = game.playMove('p1', [tile(7, 7, rack1[0]), tile(7, 8, rack1[1])]);
        expect(result.success).toBe(true);
        expect(symbolCounts(game)).toEqual(supply);

        // p2 hangs one tile under the first letter
        const rack2 = game.currentPlayer().rack;
        result = game.playMove('p2', [tile(8, 7, rack2[0])]);
        expect(result.success).toBe(true);
        expect(result.words).toHaveLength(1);
        expect(symbolCounts(game)).toEqual(supply);

        // p1 swaps three tiles
        result = game.exchangeTiles('p1', game.currentPlayer().rack.slice(0, 3));
        expect(result.success).toBe(true);
        expect(symbolCounts(game)).toEqual(supply);

        expect(game.getState().history.map((h) => h.type)).toEqual(['MOVE', 'MOVE', 'EXCHANGE']);
        expect(game.getState().players.map((p) => p.rack.length)).toEqual([7, 7]);
    });

    it('replays identically from the same seed', () => {
        const play = () => {
            const game = new ScrabbleGame();
            game.start('ru', ['a', 'b'], 77);
            const rack = game.currentPlayer().rack;
            game.playMove('a', [tile(7, 7, rack[0]), tile(7, 8, rack[1])]);
            game.exchangeTiles('b', game.currentPlayer().rack.slice(0, 2));
            return game.snapshot();
        };
        const first = play();
        const second = play();
        expect(second.players).toEqual(first.players);
        expect(second.bag).toEqual(first.bag);
        expect(second.board.toRows()).toEqual(first.board.toRows());
    });
});
