import { describe, it, expect } from 'vitest';
import { TileBag, buildTiles, getInitialBagSize, rackPoints, tileValue, variantSupply } from './tiles';

describe('buildTiles', () => {
    it('builds the English set with correct counts', () => {
        const tiles = buildTiles('en');
        expect(tiles).toHaveLength(100);

        const count = (char: string) => tiles.filter((t) => t === char).length;
        expect(count('A')).toBe(9);
        expect(count('E')).toBe(12);
        expect(count('Z')).toBe(1);
        expect(count('?')).toBe(2);
    });

    it('builds the Russian set with correct counts', () => {
        const tiles = buildTiles('ru');
        expect(tiles).toHaveLength(104);
        expect(getInitialBagSize('ru')).toBe(104);

        const count = (char: string) => tiles.filter((t) => t === char).length;
        expect(count('О')).toBe(10);
        expect(count('Ф')).toBe(1);
        expect(count('?')).toBe(2);
    });

    it('exposes the supply per symbol', () => {
        const supply = variantSupply('en');
        expect(supply.A).toBe(9);
        expect(supply['?']).toBe(2);
    });
});

describe('tileValue', () => {
    it('returns letter values and zero for blanks', () => {
        expect(tileValue('A', 'en')).toBe(1);
        expect(tileValue('z', 'en')).toBe(10);
        expect(tileValue('?', 'en')).toBe(0);
        expect(tileValue('Ф', 'ru')).toBe(10);
    });

    it('sums rack points', () => {
        expect(rackPoints(['Q', 'A', '?'], 'en')).toBe(11);
        expect(rackPoints([], 'en')).toBe(0);
    });
});

describe('TileBag', () => {
    it('draws the same sequence for the same seed', () => {
        const a = TileBag.create('en', 42);
        const b = TileBag.create('en', 42);
        expect(a.draw(7)).toEqual(b.draw(7));
        expect(a.draw(7)).toEqual(b.draw(7));
    });

    it('shuffles differently for different seeds', () => {
        const a = TileBag.create('en', 1).snapshot().tiles;
        const b = TileBag.create('en', 2).snapshot().tiles;
        expect(a).not.toEqual(b);
    });

    it('draws no more than what remains', () => {
        const bag = TileBag.create('en', 7);
        const drawn = bag.draw(120);
        expect(drawn).toHaveLength(100);
        expect(bag.remaining()).toBe(0);
        expect(bag.isEmpty()).toBe(true);
    });

    it('keeps the tile count constant across exchanges', () => {
        const bag = TileBag.create('en', 9);
        const rack = bag.draw(7);
        const drawn = bag.exchange(rack.slice(0, 3));
        expect(drawn).toHaveLength(3);
        expect(bag.remaining()).toBe(93);

        const all = [...bag.snapshot().tiles, ...rack.slice(3), ...drawn].sort();
        expect(all).toEqual(buildTiles('en').sort());
    });

    it('resumes identically from a snapshot', () => {
        const bag = TileBag.create('ru', 5);
        bag.draw(14);
        const copy = TileBag.restore(bag.snapshot());

        bag.putBack(['А', 'Б']);
        copy.putBack(['А', 'Б']);
        expect(copy.snapshot()).toEqual(bag.snapshot());
        expect(copy.draw(5)).toEqual(bag.draw(5));
    });
});
