import { z } from 'zod';
import type { Board } from '../core/board';
import {
  checkPlacementRules,
  connectedToExisting,
  firstMoveMustCoverCenter,
  noGapsInLine,
  placementsInLine
} from '../core/rules';
import { scoreMove } from '../core/scoring';
import { isVariantLetter, specsFor } from '../core/tiles';
import { BLANK, fail, ok, type Placement, type Result, type Variant } from '../core/types';
import type { DictionaryJudge } from '../dictionary/judge';
import type { Logger } from '../logger';
import { silentLogger } from '../logger';
import { errorMessage } from './providerCall';
import type { ToolDefinition } from './types';

/** Read-only view handed to every tool; tools never write to `board`. */
export interface ToolContext {
  readonly board: Board;
  readonly rack: readonly string[];
  readonly variant: Variant;
  readonly judge: DictionaryJudge;
}

export type ToolResult = Record<string, unknown>;

export class ToolRegistryError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ToolRegistryError';
  }
}

export interface ToolSpec<S extends z.ZodTypeAny> {
  name: string;
  description: string;
  parameters: Record<string, unknown>;
  args: S;
  run(args: z.output<S>, context: ToolContext): ToolResult | Promise<ToolResult>;
}

export interface RegisteredTool {
  readonly name: string;
  readonly definition: ToolDefinition;
  invoke(args: unknown, context: ToolContext): Promise<ToolResult>;
}

function describeIssues(error: z.ZodError): string {
  return error.issues.map((issue) => `${issue.path.join('.') || 'args'}: ${issue.message}`).join('; ');
}

/** Binds a handler to its argument schema; bad arguments come back as `{ error }`. */
export function defineTool<S extends z.ZodTypeAny>(spec: ToolSpec<S>): RegisteredTool {
  return {
    name: spec.name,
    definition: { name: spec.name, description: spec.description, parameters: spec.parameters },
    async invoke(raw, context) {
      const parsed = spec.args.safeParse(raw ?? {});
      if (!parsed.success) return { error: `Invalid arguments for ${spec.name}: ${describeIssues(parsed.error)}` };
      return await spec.run(parsed.data, context);
    }
  };
}

export class ToolRegistry {
  private readonly tools = new Map<string, RegisteredTool>();

  constructor(
    tools: readonly RegisteredTool[],
    private readonly logger: Logger = silentLogger
  ) {
    for (const tool of tools) {
      const name = tool.name.trim();
      if (!name) throw new ToolRegistryError('Tool without a name');
      if (this.tools.has(name)) throw new ToolRegistryError(`Duplicate tool name: ${name}`);
      this.tools.set(name, tool);
    }
  }

  get names(): string[] {
    return [...this.tools.keys()];
  }

  has(name: string): boolean {
    return this.tools.has(name);
  }

  definitions(): ToolDefinition[] {
    return [...this.tools.values()].map((tool) => tool.definition);
  }

  async execute(name: string, args: unknown, context: ToolContext): Promise<ToolResult> {
    const tool = this.tools.get(name);
    if (!tool) return { error: `Unknown tool: ${name}` };
    try {
      return await tool.invoke(args, context);
    } catch (error) {
      this.logger.error(`Tool ${name} failed`, error);
      return { error: `Tool ${name} failed: ${errorMessage(error)}` };
    }
  }
}

/** Tool arguments arrive as JSON text; empty text means no arguments. */
export function parseToolArguments(text: string): Result<unknown, string> {
  if (!text.trim()) return ok({});
  try {
    return ok(JSON.parse(text));
  } catch (error) {
    return fail(`Arguments are not valid JSON: ${errorMessage(error)}`);
  }
}

const placementArg = z.object({
  row: z.number().int(),
  col: z.number().int(),
  letter: z.string().trim().length(1),
  blank_as: z.string().trim().nullish()
});

const placementsArgs = z.object({ placements: z.array(placementArg).min(1) });
const lineArgs = placementsArgs.extend({ direction: z.enum(['ACROSS', 'DOWN']).optional() });
const noArgs = z.object({}).passthrough();

const PLACEMENTS_PARAMETER = {
  type: 'array',
  items: {
    type: 'object',
    properties: {
      row: { type: 'integer', minimum: 0, maximum: 14 },
      col: { type: 'integer', minimum: 0, maximum: 14 },
      letter: { type: 'string', description: "Tile letter, or '?' for a blank" },
      blank_as: { type: 'string', description: 'Letter a blank stands for' }
    },
    required: ['row', 'col', 'letter']
  }
};

const NO_PARAMETERS = { type: 'object', properties: {} };

const PLACEMENTS_PARAMETERS = {
  type: 'object',
  properties: { placements: PLACEMENTS_PARAMETER },
  required: ['placements']
};

const LINE_PARAMETERS = {
  type: 'object',
  properties: { placements: PLACEMENTS_PARAMETER, direction: { type: 'string', enum: ['ACROSS', 'DOWN'] } },
  required: ['placements']
};

function toPlacements(args: z.output<typeof placementsArgs>): Placement[] {
  return args.placements.map(({ row, col, letter, blank_as: blankAs }) => {
    const mapped = blankAs?.toUpperCase();
    if (mapped) return { row, col, letter: BLANK, blankAs: mapped };
    return { row, col, letter: letter.toUpperCase() };
  });
}

/** Cells the placements would write to must exist and be free; blanks need one variant letter. */
function unplaceable(board: Board, placements: readonly Placement[], variant: Variant): string | null {
  for (const { row, col, letter, blankAs } of placements) {
    if (!board.inside(row, col)) return `out_of_bounds at (${row},${col})`;
    if (board.isOccupied(row, col)) return `cell_occupied at (${row},${col})`;
    if (letter === BLANK && (!blankAs || !isVariantLetter(blankAs, variant))) {
      return `blank_has_no_mapping at (${row},${col})`;
    }
  }
  return null;
}

export function createDefaultTools(): RegisteredTool[] {
  return [
    defineTool({
      name: 'get_board_state',
      description: "Current board as 15 rows of 15 characters ('.' is empty) plus blank tile positions.",
      parameters: NO_PARAMETERS,
      args: noArgs,
      run: (_args, { board }) => ({
        grid: board.toRows(),
        blanks: board.coordsWhere((cell) => cell.isBlank),
        is_empty: !board.hasAnyLetters()
      })
    }),
    defineTool({
      name: 'get_rack_letters',
      description: "Letters on the rack; '?' is a blank.",
      parameters: NO_PARAMETERS,
      args: noArgs,
      run: (_args, { rack }) => ({ rack: rack.join(''), letters: [...rack], count: rack.length })
    }),
    defineTool({
      name: 'get_premium_squares',
      description: 'Premium squares that are still unused.',
      parameters: NO_PARAMETERS,
      args: noArgs,
      run: (_args, { board }) => ({ squares: board.premiumSquares() })
    }),
    defineTool({
      name: 'get_tile_values',
      description: 'Point value of every tile in this variant.',
      parameters: NO_PARAMETERS,
      args: noArgs,
      run: (_args, { variant }) => ({
        variant,
        values: Object.fromEntries(specsFor(variant).map((spec) => [spec.letter, spec.value]))
      })
    }),
    defineTool({
      name: 'rules_placements_in_line',
      description: 'Whether the placements share one row or one column.',
      parameters: PLACEMENTS_PARAMETERS,
      args: placementsArgs,
      run: (args, { board }) => {
        const direction = placementsInLine(board, toPlacements(args));
        return { valid: direction !== null, direction };
      }
    }),
    defineTool({
      name: 'rules_first_move_must_cover_center',
      description: 'Whether the placements cover the center square when the board is empty.',
      parameters: PLACEMENTS_PARAMETERS,
      args: placementsArgs,
      run: (args, { board }) => ({ valid: firstMoveMustCoverCenter(board, toPlacements(args)) })
    }),
    defineTool({
      name: 'rules_connected_to_existing',
      description: 'Whether the placements touch a letter already on the board.',
      parameters: PLACEMENTS_PARAMETERS,
      args: placementsArgs,
      run: (args, { board }) => ({ valid: connectedToExisting(board, toPlacements(args)) })
    }),
    defineTool({
      name: 'rules_no_gaps_in_line',
      description: 'Whether the placements and existing letters form one unbroken run.',
      parameters: LINE_PARAMETERS,
      args: lineArgs,
      run: (args, { board }) => {
        const placements = toPlacements(args);
        const direction = args.direction ?? placementsInLine(board, placements);
        if (!direction) return { valid: false, reason: 'not_in_one_line' };
        return { valid: noGapsInLine(board, placements, direction), direction };
      }
    }),
    defineTool({
      name: 'rules_extract_all_words',
      description: 'Main word and cross-words the placements would form.',
      parameters: PLACEMENTS_PARAMETERS,
      args: placementsArgs,
      run: (args, { board, variant }) => {
        const placements = toPlacements(args);
        const problem = unplaceable(board, placements, variant);
        if (problem) return { error: problem };
        const preview = board.clone();
        preview.placeLetters(placements);
        return { words: preview.buildWordsForMove(placements) };
      }
    }),
    defineTool({
      name: 'validate_word',
      description: 'Checks one word against the dictionary of this variant.',
      parameters: {
        type: 'object',
        properties: { word: { type: 'string' } },
        required: ['word']
      },
      args: z.object({ word: z.string().trim().min(1) }),
      run: async ({ word }, { judge, variant }) => {
        const verdict = await judge.judge([word], variant);
        const [result] = verdict.results;
        return result ? { ...result } : { word, valid: false, reason: 'not_in_dictionary' };
      }
    }),
    defineTool({
      name: 'validate_move_legality',
      description: 'Runs every placement rule in order and reports the first violation.',
      parameters: LINE_PARAMETERS,
      args: lineArgs,
      run: (args, { board }) => {
        const checked = checkPlacementRules(board, toPlacements(args), args.direction);
        return checked.ok ? { valid: true, direction: checked.value } : { valid: false, reason: checked.error };
      }
    }),
    defineTool({
      name: 'calculate_move_score',
      description: 'Score of the placements with premiums and the bingo bonus, word by word.',
      parameters: PLACEMENTS_PARAMETERS,
      args: placementsArgs,
      run: (args, { board, variant }) => {
        const placements = toPlacements(args);
        const problem = unplaceable(board, placements, variant);
        if (problem) return { error: problem };
        const scored = scoreMove(board, placements, variant);
        return {
          total_score: scored.total,
          words: scored.words.map((found) => found.word),
          breakdowns: scored.breakdowns,
          bingo: scored.bingo
        };
      }
    })
  ];
}

export function createToolRegistry(logger?: Logger): ToolRegistry {
  return new ToolRegistry(createDefaultTools(), logger);
}
