import { describe, expect, it } from 'vitest';
import { ScriptedProvider, replyJson } from './fakeProviders';
import { extractInlineJson, parseMove, parseMoveText, providerReconstructor } from './moveParser';

const at = {
    word: 'AT',
    direction: 'ACROSS',
    placements: [
        { row: 7, col: 7, letter: 'A' },
        { row: 7, col: 8, letter: 'T' }
    ]
};
const atJson = JSON.stringify(at);

describe('parseMoveText', () => {
    it('parses a clean reply directly', () => {
        const result = parseMoveText(atJson);
        expect(result.ok && result.value.method).toBe('direct');
        expect(result.ok && result.value.attempts).toEqual(['direct']);
        expect(result.ok && result.value.move.placements).toHaveLength(2);
    });

    it('drops reasoning blocks and a fence around the whole reply', () => {
        const result = parseMoveText(`<think>maybe {"x": 1}</think>\n\`\`\`json\n${atJson}\n\`\`\``);
        expect(result.ok && result.value.method).toBe('direct');
    });

    it('falls back to a fenced block inside prose', () => {
        const result = parseMoveText(`Here is my move:\n\`\`\`json\n${atJson}\n\`\`\`\nGood luck!`);
        expect(result.ok && result.value.attempts).toEqual(['direct', 'markdown_extraction']);
        expect(result.ok && result.value.move.word).toBe('AT');
    });

    it('finds an inline object that mentions placements', () => {
        const result = parseMoveText(`Scores {"AT": 4} so I play ${atJson} now.`);
        expect(result.ok && result.value.method).toBe('inline_json');
        expect(result.ok && result.value.attempts).toEqual(['direct', 'markdown_extraction', 'inline_json']);
    });

    it('reports the schema problem when JSON is not a move', () => {
        const result = parseMoveText('{"placements": []}');
        expect(result).toEqual({
            ok: false,
            error: {
                kind: 'parse_error',
                message: 'placements_required_for_play',
                attempts: ['direct', 'markdown_extraction', 'inline_json']
            }
        });
    });

    it('rejects an empty reply without trying parsers', () => {
        expect(parseMoveText('  ')).toEqual({
            ok: false,
            error: { kind: 'parse_error', message: 'Empty response', attempts: [] }
        });
    });
});

describe('extractInlineJson', () => {
    it('ignores braces inside strings', () => {
        expect(extractInlineJson('x {"note":"a } here","placements":[]} y')).toBe('{"note":"a } here","placements":[]}');
    });

    it('gives up on an unbalanced object', () => {
        expect(extractInlineJson('{"placements": [')).toBeNull();
    });
});

describe('parseMove', () => {
    it('uses the reconstructor only after local parsers fail', async () => {
        const result = await parseMove('I think passing is best here.', async () => '{"pass": true}');
        expect(result.ok && result.value.method).toBe('model_reconstruction');
        expect(result.ok && result.value.move.pass).toBe(true);
        expect(result.ok && result.value.attempts).toHaveLength(4);
    });

    it('fails when the reconstructor finds nothing', async () => {
        const result = await parseMove('nothing useful', async () => null);
        expect(result.ok).toBe(false);
        expect(!result.ok && result.error.attempts).toEqual([
            'direct',
            'markdown_extraction',
            'inline_json',
            'model_reconstruction'
        ]);
    });
});

describe('providerReconstructor', () => {
    const rambling = 'I would put A on the center and T right after it for four points.';

    it('returns the extracted move as JSON text', async () => {
        const helper = new ScriptedProvider('helper', [replyJson({ has_move: true, extracted_move: at, analysis: 'found' })]);
        const reconstruct = providerReconstructor(helper, 500);

        expect(await reconstruct(rambling)).toBe(atJson);
        expect(helper.requests[0].maxTokens).toBe(1200);
    });

    it('skips short replies and answers without a move', async () => {
        const helper = new ScriptedProvider('helper', [replyJson({ has_move: false, extracted_move: null, analysis: 'none' })]);
        const reconstruct = providerReconstructor(helper, 500);

        expect(await reconstruct('too short')).toBeNull();
        expect(helper.calls).toBe(0);
        expect(await reconstruct(rambling)).toBeNull();
        expect(helper.calls).toBe(1);
    });
});
