import { isVariantLetter } from './tiles';
import { BLANK, fail, ok } from './types';
import type { Placement, Result, RuleViolation, Variant } from './types';

export interface RackUsageOptions {
  /** Spend a blank for any letter the rack lacks. */
  implicitBlanks?: boolean;
  /** Spend a blank for this letter placement when the rack lacks it. */
  blankAllowed?: (placement: Placement) => boolean;
}

function takeFrom(pool: string[], symbol: string): boolean {
  const idx = pool.indexOf(symbol);
  if (idx < 0) return false;
  pool.splice(idx, 1);
  return true;
}

/**
 * Decides which rack tile each placement spends, in placement order. A `?`
 * placement always spends a blank; a letter spends the literal tile when the
 * rack has one and falls back to a blank only when allowed. A blank must
 * stand for exactly one letter of the variant.
 */
export function resolveRackUsage(
  rack: readonly string[],
  placements: readonly Placement[],
  variant: Variant,
  options: RackUsageOptions = {}
): Result<Placement[], RuleViolation> {
  const pool = [...rack];
  const resolved: Placement[] = [];

  for (const p of placements) {
    if (p.letter === BLANK) {
      if (!p.blankAs || !isVariantLetter(p.blankAs, variant)) return fail('blank_has_no_mapping');
      if (!takeFrom(pool, BLANK)) return fail('rack_missing_blank_for_mapping');
      resolved.push({ row: p.row, col: p.col, letter: BLANK, blankAs: p.blankAs });
    } else if (takeFrom(pool, p.letter)) {
      resolved.push({ row: p.row, col: p.col, letter: p.letter });
    } else if (
      isVariantLetter(p.letter, variant) &&
      (options.implicitBlanks || options.blankAllowed?.(p)) &&
      takeFrom(pool, BLANK)
    ) {
      resolved.push({ row: p.row, col: p.col, letter: BLANK, blankAs: p.letter });
    } else {
      return fail<RuleViolation>(`rack_missing_tile:${p.letter}`);
    }
  }

  return ok(resolved);
}

/** Removes exchanged tiles; fails when the rack does not hold them all. */
export function removeFromRack(
  rack: readonly string[],
  letters: readonly string[]
): Result<string[], RuleViolation> {
  const remaining = [...rack];
  for (const letter of letters) {
    if (!takeFrom(remaining, letter)) return fail<RuleViolation>(`rack_missing_tile:${letter}`);
  }
  return ok(remaining);
}

/**
 * Removes one rack symbol per placement (`?` for a blank, never the letter it
 * stands for). Survivors keep their order.
 */
export function consumeRack(
  rack: readonly string[],
  placements: readonly Placement[]
): Result<string[], RuleViolation> {
  return removeFromRack(rack, placements.map((p) => p.letter));
}
