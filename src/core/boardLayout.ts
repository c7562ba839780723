import layout from './premiums.json';
import type { Premium } from './types';

export const BOARD_SIZE = 15;
export const CENTER = { row: 7, col: 7 } as const;

const PREMIUM_ORDER: Premium[] = ['TW', 'DW', 'TL', 'DL'];

export function coordKey(row: number, col: number): string {
  return `${row},${col}`;
}

/**
 * Standard 15x15 premium layout keyed by `row,col`. The center star is a DW.
 */
export function buildPremiumMap(): Map<string, Premium> {
  const map = new Map<string, Premium>();
  for (const premium of PREMIUM_ORDER) {
    for (const [row, col] of layout[premium]) {
      map.set(coordKey(row, col), premium);
    }
  }
  return map;
}
