import { describe, expect, it, vi } from 'vitest';
import { callWithFallback, callWithTimeout } from './providerCall';
import { ScriptedProvider, hang, providerError, raise, reply } from './fakeProviders';
import { AttemptBudget, Deadline, resolveRetryPolicy } from './retryPolicy';
import type { ModelProvider, ProviderRequest } from './types';

const request = (provider: ModelProvider): ProviderRequest => ({
    modelId: provider.modelId,
    messages: [{ role: 'user', content: 'move please' }]
});

const policy = resolveRetryPolicy({
    maxAttempts: 3,
    perRoundTimeoutMs: 20,
    sessionTimeoutMs: 2_000,
    minRetryWindowMs: 0
});

function setup(maxAttempts = policy.maxAttempts) {
    return { policy, deadline: new Deadline(policy.sessionTimeoutMs), budget: new AttemptBudget(maxAttempts) };
}

describe('callWithTimeout', () => {
    it('returns the answer when the provider is quick', async () => {
        const provider = new ScriptedProvider('quick', [reply('{"pass": true}')]);
        const result = await callWithTimeout(provider, request(provider), 500);
        expect(result).toEqual({ status: 'ok', content: '{"pass": true}' });
    });

    it('reports a timeout and aborts the call', async () => {
        const provider = new ScriptedProvider('slow', [hang]);
        const result = await callWithTimeout(provider, request(provider), 10);
        expect(result).toEqual({ status: 'timeout', content: '', error: 'Timed out after 10 ms' });
    });

    it('turns a thrown error into an error result', async () => {
        const provider = new ScriptedProvider('broken', [raise('socket closed')]);
        expect(await callWithTimeout(provider, request(provider), 500)).toEqual({
            status: 'error',
            content: '',
            error: 'socket closed'
        });
    });
});

describe('callWithFallback', () => {
    it('substitutes once per timeout', async () => {
        const primary = new ScriptedProvider('primary', [hang]);
        const cheaper = new ScriptedProvider('cheaper', [reply('done')]);
        const onFallback = vi.fn(async () => {});

        const outcome = await callWithFallback(primary, request, {
            ...setup(),
            fallbackChain: new Map([['primary', cheaper]]),
            onFallback
        });

        expect(outcome.result.status).toBe('ok');
        expect(outcome.servedBy.id).toBe('cheaper');
        expect(primary.calls).toBe(1);
        expect(cheaper.requests[0].modelId).toBe('cheaper-model');
        expect(onFallback).toHaveBeenCalledTimes(1);
    });

    it('never makes more calls than the attempt budget allows', async () => {
        const a = new ScriptedProvider('a', [hang]);
        const b = new ScriptedProvider('b', [hang]);
        const options = { ...setup(), fallbackChain: new Map([['a', b], ['b', a]]) };

        const outcome = await callWithFallback(a, request, options);

        expect(outcome.result.status).toBe('timeout');
        expect(a.calls + b.calls).toBe(3);
        expect(options.budget.used).toBe(3);
    });

    it('gives up on a timeout with no substitute', async () => {
        const lonely = new ScriptedProvider('lonely', [hang]);
        const outcome = await callWithFallback(lonely, request, setup());
        expect(outcome.result.status).toBe('timeout');
        expect(lonely.calls).toBe(1);
    });

    it('retries provider errors on the same provider', async () => {
        const flaky = new ScriptedProvider('flaky', [providerError('rate limited'), reply('ok now')]);
        const onRetry = vi.fn(async () => {});
        const outcome = await callWithFallback(flaky, request, { ...setup(), onRetry });

        expect(outcome.result).toEqual({ status: 'ok', content: 'ok now' });
        expect(flaky.calls).toBe(2);
        expect(onRetry).toHaveBeenCalledTimes(1);
    });

    it('stops when too little time is left for a retry', async () => {
        const flaky = new ScriptedProvider('flaky', [providerError('boom'), reply('late')]);
        const strict = resolveRetryPolicy({ ...policy, minRetryWindowMs: 5_000 });
        const outcome = await callWithFallback(flaky, request, {
            policy: strict,
            deadline: new Deadline(strict.sessionTimeoutMs),
            budget: new AttemptBudget(3)
        });

        expect(outcome.result).toEqual({ status: 'error', content: '', error: 'boom' });
        expect(flaky.calls).toBe(1);
    });
});
