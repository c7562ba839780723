import { z } from 'zod';

const coordinate = z.coerce.number().int();

export const payloadPlacementSchema = z.object({
  row: coordinate.optional(),
  col: coordinate.optional(),
  letter: z.string(),
  blank_as: z.string().nullish(),
  blankAs: z.string().nullish()
});
export type PayloadPlacement = z.infer<typeof payloadPlacementSchema>;

/**
 * Blank mappings come keyed by `row,col`, by `?`, by `?1`, `?2`... in order of
 * appearance, or as a plain ordered list.
 */
export const blanksSchema = z.union([z.record(z.string()), z.array(z.string())]);
export type BlanksEncoding = z.infer<typeof blanksSchema>;

export type MoveSchemaIssue = 'pass_move_must_not_have_placements' | 'placements_required_for_play';

/**
 * Tolerant move payload as models write it. Coordinates may be per tile or
 * given once as `start` (or top-level `row`/`col`).
 */
export const movePayloadSchema = z
  .object({
    row: coordinate.nullish(),
    col: coordinate.nullish(),
    start: z.object({ row: coordinate, col: coordinate }).nullish(),
    direction: z
      .string()
      .nullish()
      .transform((value) => (value ?? 'ACROSS').trim().toUpperCase() || 'ACROSS'),
    placements: z.array(payloadPlacementSchema).nullish().transform((value) => value ?? []),
    blanks: blanksSchema.nullish(),
    word: z.string().nullish(),
    exchange: z.array(z.string()).nullish(),
    pass: z.boolean().nullish()
  })
  .superRefine((move, ctx) => {
    if (move.pass) {
      if (move.placements.length > 0) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'pass_move_must_not_have_placements' });
      }
    } else if (move.placements.length === 0 && !(move.exchange && move.exchange.length > 0)) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'placements_required_for_play' });
    }
  });
export type MovePayload = z.output<typeof movePayloadSchema>;

export type MoveKind = 'play' | 'exchange' | 'pass';

export function moveKind(move: MovePayload): MoveKind {
  if (move.pass) return 'pass';
  if (move.placements.length === 0 && move.exchange && move.exchange.length > 0) return 'exchange';
  return 'play';
}

/** Start coordinate, preferring `start` over top-level `row`/`col`. */
export function canonicalStart(move: MovePayload): { row: number; col: number } | null {
  if (move.start) return move.start;
  if (move.row === null || move.row === undefined || move.col === null || move.col === undefined) return null;
  return { row: move.row, col: move.col };
}
