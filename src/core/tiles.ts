import tileSets from './tileSets.json';
import { createSeededRandom, shuffleInPlace, type SeededRandom } from './random';
import { BLANK, type Variant } from './types';

export interface TileSpec {
  letter: string;
  count: number;
  value: number;
}

export const RACK_SIZE = 7;

const VALUE_MAPS: Record<Variant, Map<string, number>> = {
  en: new Map(tileSets.en.map((spec) => [spec.letter, spec.value])),
  ru: new Map(tileSets.ru.map((spec) => [spec.letter, spec.value]))
};

export function specsFor(variant: Variant): TileSpec[] {
  return tileSets[variant];
}

export function getInitialBagSize(variant: Variant): number {
  return specsFor(variant).reduce((sum, spec) => sum + spec.count, 0);
}

/** Letter -> total count in the variant, blanks under BLANK. */
export function variantSupply(variant: Variant): Record<string, number> {
  const supply: Record<string, number> = {};
  specsFor(variant).forEach((spec) => {
    supply[spec.letter] = spec.count;
  });
  return supply;
}

export function isVariantLetter(letter: string, variant: Variant): boolean {
  return letter !== BLANK && VALUE_MAPS[variant].has(letter);
}

export function tileValue(letter: string, variant: Variant): number {
  if (letter === BLANK) return 0;
  return VALUE_MAPS[variant].get(letter.toUpperCase()) ?? 0;
}

/** Face value of a rack; blanks count 0. */
export function rackPoints(rack: readonly string[], variant: Variant): number {
  return rack.reduce((sum, letter) => sum + tileValue(letter, variant), 0);
}

export function buildTiles(variant: Variant): string[] {
  const tiles: string[] = [];
  specsFor(variant).forEach((spec) => {
    for (let i = 0; i < spec.count; i += 1) {
      tiles.push(spec.letter);
    }
  });
  return tiles;
}

export interface BagSnapshot {
  tiles: string[];
  seed: number;
}

/**
 * Shuffled tile bag driven by a seeded generator: the same seed and the same
 * sequence of calls yield the same draws.
 */
export class TileBag {
  private tiles: string[];
  private readonly rng: SeededRandom;

  private constructor(tiles: string[], rng: SeededRandom) {
    this.tiles = tiles;
    this.rng = rng;
  }

  static create(variant: Variant, seed: number): TileBag {
    const rng = createSeededRandom(seed);
    const tiles = shuffleInPlace(buildTiles(variant), () => rng.next());
    return new TileBag(tiles, rng);
  }

  /** Rebuilds a bag in the exact order captured by `snapshot()`. */
  static restore(snapshot: BagSnapshot): TileBag {
    return new TileBag([...snapshot.tiles], createSeededRandom(snapshot.seed));
  }

  remaining(): number {
    return this.tiles.length;
  }

  isEmpty(): boolean {
    return this.tiles.length === 0;
  }

  draw(count: number): string[] {
    const drawn: string[] = [];
    for (let i = 0; i < count; i += 1) {
      const tile = this.tiles.pop();
      if (tile === undefined) break;
      drawn.push(tile);
    }
    return drawn;
  }

  putBack(letters: readonly string[]): void {
    this.tiles.push(...letters);
    this.shuffle();
  }

  /**
   * Draws replacements before returning the given tiles, so a player cannot
   * draw back what they just exchanged.
   */
  exchange(letters: readonly string[]): string[] {
    this.shuffle();
    const drawn = this.draw(letters.length);
    this.putBack(letters);
    return drawn;
  }

  countOf(letter: string): number {
    return this.tiles.filter((tile) => tile === letter).length;
  }

  snapshot(): BagSnapshot {
    return { tiles: [...this.tiles], seed: this.rng.state };
  }

  private shuffle(): void {
    shuffleInPlace(this.tiles, () => this.rng.next());
  }
}
