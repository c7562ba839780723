import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { Board } from './board';
import { ScrabbleGame } from './game';
import {
    SaveStateError,
    decodeBoard,
    decodeMove,
    encodeBoard,
    encodeMove,
    loadSnapshot,
    restoreGame,
    saveSnapshot,
    serializeGame
} from './saveState';
import type { Placement } from './types';

function playedGame(): ScrabbleGame {
    const game = new ScrabbleGame();
    game.resume({
        variant: 'en',
        board: new Board(),
        bag: { tiles: 'EEEEIIIIAAAA'.split(''), seed: 31 },
        players: [
            { id: 'p1', rack: ['C', '?', 'T', 'S'], score: 0, passStreak: 0 },
            { id: 'p2', rack: ['Q'], score: 0, passStreak: 1 }
        ],
        currentPlayerIndex: 0,
        moveNumber: 0,
        history: [],
        ended: null
    });
    game.playMove('p1', [
        { row: 7, col: 7, letter: 'C' },
        { row: 7, col: 8, letter: '?', blankAs: 'A' },
        { row: 7, col: 9, letter: 'T' }
    ]);
    return game;
}

describe('board encoding', () => {
    it('round-trips letters, blanks and used premiums', () => {
        const board = playedGame().getState().board;
        const encoded = encodeBoard(board);

        expect(encoded.grid[7]).toBe('.......CAT.....');
        expect(encoded.blanks).toEqual([[7, 8]]);
        expect(encoded.premiumsUsed).toEqual([[7, 7]]);

        const restored = decodeBoard(encoded);
        expect(restored.toRows()).toEqual(board.toRows());
        expect(restored.cell(7, 8).isBlank).toBe(true);
        expect(restored.cell(7, 7).premiumUsed).toBe(true);
        expect(restored.cell(7, 9).isBlank).toBe(false);
    });
});

describe('game save files', () => {
    it('round-trips a game snapshot', () => {
        const game = playedGame();
        const snapshot = game.snapshot();
        const save = serializeGame(snapshot);

        expect(save.version).toBe('1');
        expect(save.players[0].rack).toBe('SAAA');
        expect(save.bag).toBe('EEEEIIII');

        const restored = restoreGame(JSON.parse(JSON.stringify(save)));
        expect(restored.players).toEqual(snapshot.players);
        expect(restored.bag).toEqual(snapshot.bag);
        expect(restored.history).toEqual(snapshot.history);
        expect(restored.board.toRows()).toEqual(snapshot.board.toRows());

        const resumed = new ScrabbleGame();
        resumed.resume(restored);
        expect(resumed.currentPlayer().id).toBe('p2');
        expect(resumed.getState().bag.draw(3)).toEqual(game.getState().bag.draw(3));
    });

    it('rejects malformed saves', () => {
        const save = serializeGame(playedGame().snapshot());
        expect(() => restoreGame({ ...save, grid: save.grid.slice(1) })).toThrow(SaveStateError);
        expect(() => restoreGame({ ...save, version: '2' })).toThrow(/version/);
        expect(() => restoreGame({ ...save, currentPlayerIndex: 5 })).toThrow('no such player');
        expect(() => restoreGame(null)).toThrow(SaveStateError);
    });

    describe('on disk', () => {
        let dir = '';

        beforeEach(async () => {
            dir = await mkdtemp(join(tmpdir(), 'scrabble-save-'));
        });

        afterEach(async () => {
            await rm(dir, { recursive: true, force: true });
        });

        it('writes and reads a snapshot file', async () => {
            const file = join(dir, 'game.json');
            const snapshot = playedGame().snapshot();
            await saveSnapshot(file, snapshot);
            const loaded = await loadSnapshot(file);
            expect(loaded.players).toEqual(snapshot.players);
            expect(loaded.board.toRows()).toEqual(snapshot.board.toRows());
        });

        it('reports a file that is not JSON', async () => {
            const file = join(dir, 'broken.json');
            await writeFile(file, '{ nope', 'utf8');
            await expect(loadSnapshot(file)).rejects.toThrow(SaveStateError);
        });
    });
});

describe('move encoding', () => {
    it('lists blanks by coordinate', () => {
        const placements: Placement[] = [
            { row: 7, col: 7, letter: 'C' },
            { row: 7, col: 8, letter: '?', blankAs: 'A' }
        ];
        const encoded = encodeMove(placements);
        expect(encoded).toEqual({
            placements: [
                { row: 7, col: 7, letter: 'C' },
                { row: 7, col: 8, letter: '?' }
            ],
            blanks: { '7,8': 'A' }
        });
        expect(decodeMove(encoded)).toEqual(placements);
        expect(encodeMove([{ row: 1, col: 1, letter: 'A' }])).toEqual({
            placements: [{ row: 1, col: 1, letter: 'A' }]
        });
    });

    it('rejects malformed moves', () => {
        expect(() => decodeMove({ placements: [{ row: 7, col: 7, letter: '?' }], blanks: { '7,7': 'CA' } })).toThrow(
            'Invalid move at blanks.7,7: must be a single letter'
        );
        expect(() => decodeMove({ placements: [{ row: 15, col: 0, letter: 'A' }] })).toThrow(SaveStateError);
        expect(() => decodeMove('CAT')).toThrow(SaveStateError);
    });
});
