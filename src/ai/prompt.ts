import type { Board } from '../core/board';
import { specsFor } from '../core/tiles';
import type { Premium, RuleViolation, Variant } from '../core/types';

const LANGUAGE: Record<Variant, string> = {
  en: 'English',
  ru: 'Russian'
};

export function languageName(variant: Variant): string {
  return LANGUAGE[variant];
}

export interface CompactState {
  variant: Variant;
  grid: string[];
  blanks: Array<{ row: number; col: number }>;
  rack: string;
  bag: number;
}

/** Board and rack as models see them; `.` marks an empty cell. */
export function buildCompactState(board: Board, rack: readonly string[], variant: Variant, bagRemaining: number): CompactState {
  return {
    variant,
    grid: board.toRows(),
    blanks: board.coordsWhere((cell) => cell.isBlank),
    rack: rack.join(''),
    bag: bagRemaining
  };
}

function premiumSummary(board: Board): string {
  const groups: Record<Premium, string[]> = { TW: [], DW: [], TL: [], DL: [] };
  for (const square of board.premiumSquares()) {
    groups[square.premium].push(`(${square.row},${square.col})`);
  }
  return (['TW', 'DW', 'TL', 'DL'] as const).map((premium) => `${premium}:[${groups[premium].join(',')}]`).join('; ');
}

function tileSummary(variant: Variant): string {
  return specsFor(variant)
    .map((spec) => `${spec.letter}=${spec.value}`)
    .join(' ');
}

export function buildSystemPrompt(board: Board, variant: Variant, options: { tools?: boolean } = {}): string {
  const language = languageName(variant);
  const lines = [
    `You are an expert Scrabble player for the ${language} variant. Play to win under the official rules.`,
    'Reply with JSON only. Place tiles only on empty cells, in one line (ACROSS or DOWN) with no gaps.',
    'After the first move your tiles must touch existing letters; the first move must cover the center (row=7,col=7).',
    "Use only letters from the rack. For a '?' tile give the letter it stands for in 'blanks', keyed 'row,col'.",
    `Every word you form, cross-words included, must be a valid ${language} word.`,
    'Coordinates are 0-based. Answer with {"start":{"row":int,"col":int},"direction":"ACROSS"|"DOWN",' +
      '"placements":[{"row":int,"col":int,"letter":str}],"blanks":{},"word":str}, or {"pass":true}, ' +
      'or {"exchange":[letters]}.',
    `Tile values: ${tileSummary(variant)}.`,
    `Unused premiums: ${premiumSummary(board)}.`
  ];
  if (options.tools) {
    lines.push('You may call the provided tools to inspect the board, check words and score candidates before answering.');
  }
  return lines.join('\n');
}

export function buildMovePrompt(state: CompactState): string {
  return `Propose exactly one move for this state.\nState:\n${JSON.stringify(state)}`;
}

export function parseFeedback(message: string): string {
  return `Your reply was not a valid move JSON: ${message}. Reply again with the JSON move only.`;
}

export function violationFeedback(violation: RuleViolation, word?: string | null): string {
  const subject = word ? `Your move '${word}'` : 'Your move';
  return `${subject} was rejected: ${violation}. Try a different legal move.`;
}

export function declineFeedback(): string {
  return 'Do not pass or exchange yet. Look again for any legal scoring move and reply with it as JSON.';
}

export function keepSearchingFeedback(): string {
  return 'Continue searching for better scoring legal moves. Use tools again and avoid repeating invalid ideas.';
}

export function explorationFeedback(pending: { words?: number; candidates?: number }): string {
  const parts = ['Do not finalize yet. Evaluate more candidate words with tools.'];
  if (pending.words) parts.push(`Validate at least ${pending.words} words.`);
  if (pending.candidates) parts.push(`Score at least ${pending.candidates} distinct candidates.`);
  parts.push('When time is short, return only the best move as JSON.');
  return parts.join(' ');
}

export function reconstructionPrompt(snippet: string): string {
  return [
    'A Scrabble player replied with this text instead of a clean JSON move:',
    '',
    snippet,
    '',
    'Reply strictly with JSON of the form {"has_move": boolean, "extracted_move": object | null, "analysis": string}.',
    'If the text contains a move, give it as extracted_move with placements, start, direction, blanks and word.'
  ].join('\n');
}
