/**
 * Provider registry, invoker and error classification tests
 */

import { describe, it, expect, beforeEach, vi } from 'vitest';
import { ApiError } from '@google/genai';
import { CircuitBreakerRegistry } from '../ai/circuit-breaker.js';
import { GeminiTransport, ProviderInvoker, ProviderRegistry, errorFromStatus, parseRetryAfterMs, parseRetryDelayMs } from '../ai/providers/index.js';
import { ProviderError } from '../ai/types.js';
import { engineRequestSchema } from '../../shared/schema.js';
import { loadConfig } from '../config.js';
import { createDefaultRegistry } from '../ai/providers/index.js';
import { getGemini, getOpenAI, getPerplexity, resetClients } from '../ai/clients.js';
import { getMetrics, resetMetrics } from '../metrics.js';
import { ScriptedTransport, reply } from './fakes.js';

function request(model: string, withSchema = false) {
  return engineRequestSchema.parse({
    model,
    messages: [
      { role: 'system', content: 'You are terse.' },
      { role: 'user', content: 'Name a colour.' },
    ],
    params: { temperature: 0.5, maxTokens: 64 },
    ...(withSchema ? { schema: { name: 'colour', fields: [{ name: 'name', type: { kind: 'string' } }] } } : {}),
  });
}

beforeEach(() => {
  resetMetrics();
});

describe('ProviderRegistry', () => {
  it('strips a string prefix from the model name', () => {
    const transport = new ScriptedTransport([reply('ok')]);
    const registry = new ProviderRegistry().register('fake/', transport);

    const resolved = registry.resolve('fake/small-1');
    expect(resolved.transport).toBe(transport);
    expect(resolved.model).toBe('small-1');
  });

  it('passes identifiers matched by a regular expression through unchanged', () => {
    const transport = new ScriptedTransport([reply('ok')], 'local');
    const registry = new ProviderRegistry().register(/^local-.+/, transport);
    expect(registry.resolve('local-llama').model).toBe('local-llama');
  });

  it('prefers later registrations', () => {
    const first = new ScriptedTransport([reply('one')], 'first');
    const second = new ScriptedTransport([reply('two')], 'second');
    const registry = new ProviderRegistry().register('fake/', first).register('fake/', second);
    expect(registry.resolve('fake/x').transport).toBe(second);
    expect(registry.families().sort()).toEqual(['first', 'second']);
  });

  it('rejects unknown identifiers as permanent', () => {
    const registry = new ProviderRegistry();
    expect(() => registry.resolve('nope/model')).toThrow(new ProviderError('Unknown model identifier: nope/model', 'permanent', 'registry'));
    try {
      registry.resolve('nope/model');
    } catch (error) {
      expect(error).toBeInstanceOf(ProviderError);
      if (error instanceof ProviderError) expect(error.kind).toBe('permanent');
    }
  });

  it('is read-only once sealed', () => {
    const registry = new ProviderRegistry().seal();
    expect(registry.isSealed()).toBe(true);
    expect(() => registry.register('fake/', new ScriptedTransport([reply('ok')]))).toThrow(/sealed/);
  });

  it('registers every built-in family by default', () => {
    const registry = createDefaultRegistry(loadConfig({}));
    expect(registry.families().sort()).toEqual(['anthropic', 'gemini', 'ollama', 'openai', 'perplexity']);
    expect(registry.resolve('gemini/gemini-2.5-flash').model).toBe('gemini-2.5-flash');
    expect(registry.resolve('ollama/llama3').transport.family).toBe('ollama');
  });
});

describe('ProviderInvoker', () => {
  it('sends composed messages and returns a RawResponse', async () => {
    const transport = new ScriptedTransport([reply('{"name": "teal"}')]);
    const invoker = new ProviderInvoker(new ProviderRegistry().register('fake/', transport), { breakers: false });

    const response = await invoker.invoke(request('fake/small', true), []);

    expect(response.text).toBe('{"name": "teal"}');
    expect(response.provider).toBe('fake');
    expect(response.model).toBe('fake/small');
    expect(response.finishReason).toBe('stop');

    const call = transport.calls[0];
    expect(call.model).toBe('small');
    expect(call.json).toBe(true);
    expect(call.params).toEqual({ temperature: 0.5, maxTokens: 64 });
    expect(call.messages).toHaveLength(2);
    expect(call.messages[0].role).toBe('system');
    expect(call.messages[0].content.startsWith('You are terse.\n\nRespond with a single JSON object describing colour.')).toBe(true);
    expect(call.messages[1]).toEqual({ role: 'user', content: 'Name a colour.' });
    expect(getMetrics().providers.byFamily).toEqual({ fake: 1 });
  });

  it('does not ask for JSON without a schema', async () => {
    const transport = new ScriptedTransport([reply('teal')]);
    const invoker = new ProviderInvoker(new ProviderRegistry().register('fake/', transport), { breakers: false });

    await invoker.invoke(request('fake/small'), []);
    expect(transport.calls[0].json).toBe(false);
    expect(transport.calls[0].messages[0]).toEqual({ role: 'system', content: 'You are terse.' });
  });

  it('does not call the backend when the signal is already aborted', async () => {
    const transport = new ScriptedTransport([reply('teal')]);
    const invoker = new ProviderInvoker(new ProviderRegistry().register('fake/', transport), { breakers: false });
    const abort = new AbortController();
    abort.abort();

    await expect(invoker.invoke(request('fake/small'), [], abort.signal)).rejects.toThrow();
    expect(transport.calls).toHaveLength(0);
  });

  it('fails fast with a transient error once the circuit opens', async () => {
    const transport = new ScriptedTransport([new ProviderError('502 Bad Gateway', 'transient', 'fake', 502)]);
    const breakers = new CircuitBreakerRegistry({ fake: { openAfterFailures: 2, closeAfterSuccesses: 1, cooldownMs: 1000 } }, () => 0);
    const invoker = new ProviderInvoker(new ProviderRegistry().register('fake/', transport), { breakers, now: () => 0 });

    await expect(invoker.invoke(request('fake/small'), [])).rejects.toThrow('502 Bad Gateway');
    await expect(invoker.invoke(request('fake/small'), [])).rejects.toThrow('502 Bad Gateway');

    const error = await invoker.invoke(request('fake/small'), []).catch((e: unknown) => e);
    expect(error).toBeInstanceOf(ProviderError);
    if (error instanceof ProviderError) {
      expect(error.kind).toBe('transient');
      expect(error.retryAfterMs).toBe(1000);
      expect(error.message).toMatch(/^Circuit breaker open for fake/);
    }
    expect(transport.calls).toHaveLength(2);
    expect(invoker.circuitStats().fake.state).toBe('OPEN');
  });

  it('does not let permanent errors open the circuit', async () => {
    const transport = new ScriptedTransport([new ProviderError('401 Unauthorized', 'permanent', 'fake', 401)]);
    const breakers = new CircuitBreakerRegistry({ fake: { openAfterFailures: 1, closeAfterSuccesses: 1, cooldownMs: 1000 } }, () => 0);
    const invoker = new ProviderInvoker(new ProviderRegistry().register('fake/', transport), { breakers });

    await expect(invoker.invoke(request('fake/small'), [])).rejects.toThrow('401 Unauthorized');
    await expect(invoker.invoke(request('fake/small'), [])).rejects.toThrow('401 Unauthorized');
    expect(transport.calls).toHaveLength(2);
  });

  it('fails permanently when a backend credential is missing', async () => {
    const invoker = new ProviderInvoker(createDefaultRegistry(loadConfig({})), { breakers: false });
    const error = await invoker.invoke(request('anthropic/claude-sonnet'), []).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ProviderError);
    if (error instanceof ProviderError) {
      expect(error.kind).toBe('permanent');
      expect(error.message).toBe('Missing ANTHROPIC_API_KEY');
    }
  });
});

describe('error classification', () => {
  it('treats rate limits and server errors as transient', () => {
    const limited = errorFromStatus('openai', 429, 'Too many requests', { 'retry-after': '2' });
    expect(limited.kind).toBe('transient');
    expect(limited.retryAfterMs).toBe(2000);
    expect(limited.status).toBe(429);

    expect(errorFromStatus('gemini', 503, 'Unavailable').kind).toBe('transient');
    expect(errorFromStatus('gemini', 408, 'Timeout').kind).toBe('transient');
  });

  it('treats auth and request errors as permanent', () => {
    expect(errorFromStatus('openai', 401, 'Bad key').kind).toBe('permanent');
    expect(errorFromStatus('openai', 404, 'No such model').message).toBe('No such model');

    const odd = errorFromStatus('openai', 418, 'teapot');
    expect(odd.kind).toBe('permanent');
    expect(odd.message).toBe('Unexpected status 418: teapot');
  });

  it('prefers a retry-after header over a body hint', () => {
    expect(errorFromStatus('gemini', 429, 'Quota', undefined, 12000).retryAfterMs).toBe(12000);
    expect(errorFromStatus('openai', 429, 'Quota', { 'retry-after': '2' }, 12000).retryAfterMs).toBe(2000);
  });

  it('reads the retry delay from an error body', () => {
    const body = '{"error":{"code":429,"details":[{"@type":"type.googleapis.com/google.rpc.RetryInfo","retryDelay": "12.5s"}]}}';
    expect(parseRetryDelayMs(body)).toBe(12500);
    expect(parseRetryDelayMs('Resource exhausted')).toBeUndefined();
  });

  it('parses retry-after as seconds or an HTTP date', () => {
    const now = Date.UTC(2025, 0, 1, 0, 0, 0);
    expect(parseRetryAfterMs({ 'retry-after': '1.5' }, now)).toBe(1500);
    expect(parseRetryAfterMs({ 'retry-after': new Date(now + 5000).toUTCString() }, now)).toBe(5000);
    expect(parseRetryAfterMs(new Headers({ 'Retry-After': '3' }), now)).toBe(3000);
    expect(parseRetryAfterMs({ 'retry-after': 'soon' }, now)).toBeUndefined();
    expect(parseRetryAfterMs(undefined, now)).toBeUndefined();
  });
});

describe('SDK clients', () => {
  it('reuses one client per credential', () => {
    resetClients();
    const first = getOpenAI('test-secret');
    expect(getOpenAI('test-secret')).toBe(first);
    expect(getOpenAI('other-test-secret')).not.toBe(first);
  });

  it('points Perplexity at its OpenAI-compatible endpoint', () => {
    expect(getPerplexity('test-secret').baseURL).toBe('https://api.perplexity.ai');
    expect(() => getPerplexity(undefined)).toThrow(new ProviderError('Missing PERPLEXITY_API_KEY', 'permanent', 'perplexity'));
  });
});

describe('GeminiTransport', () => {
  it('carries the rate-limit retry delay into the provider error', async () => {
    resetClients();
    const ai = getGemini('test-secret');
    const body = '{"error":{"code":429,"status":"RESOURCE_EXHAUSTED","details":[{"@type":"type.googleapis.com/google.rpc.RetryInfo","retryDelay":"7s"}]}}';
    vi.spyOn(ai.models, 'generateContent').mockRejectedValue(new ApiError({ message: body, status: 429 }));

    const transport = new GeminiTransport(() => ai);
    const error = await transport
      .generate({ model: 'gemini-2.5-flash', messages: [{ role: 'user', content: 'Hi' }], params: { temperature: 0 }, media: [], json: false })
      .catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ProviderError);
    if (error instanceof ProviderError) {
      expect(error.kind).toBe('transient');
      expect(error.status).toBe(429);
      expect(error.retryAfterMs).toBe(7000);
    }
  });
});
