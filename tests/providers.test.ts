import { AxiosError, AxiosHeaders } from 'axios';
import { describe, expect, it } from 'vitest';
import { LiveApiError } from '@/services/errors';
import { parseModelJson } from '@/services/providers/generative/model-json';
import { parseIsoDuration } from '@/services/providers/live/amadeus-flight-client';
import { createLiveApiClient, toLiveApiError } from '@/services/providers/live/live-api-client';
import { GenerativeTier } from '@/services/providers/tiers/generative-tier';
import { FakeBackend, generatedHotels } from './helpers';

function axiosFailure(status?: number, code?: string): AxiosError {
  const config = { headers: new AxiosHeaders() };
  const response =
    status === undefined ? undefined : { data: {}, status, statusText: '', headers: {}, config };
  return new AxiosError('request failed', code, config, undefined, response);
}

describe('toLiveApiError', () => {
  it.each([
    [401, 'auth'],
    [403, 'auth'],
    [404, 'not-found'],
    [429, 'rate-limit'],
    [503, 'upstream'],
    [400, 'bad-request'],
  ] as const)('maps HTTP %i to %s', (status, kind) => {
    const mapped = toLiveApiError(axiosFailure(status), 'places');
    expect(mapped.kind).toBe(kind);
    expect(mapped.status).toBe(status);
  });

  it('treats aborted and timed-out requests as timeouts', () => {
    expect(toLiveApiError(axiosFailure(undefined, 'ECONNABORTED'), 'places').kind).toBe('timeout');
    expect(toLiveApiError(axiosFailure(undefined, 'ERR_CANCELED'), 'places').kind).toBe('timeout');
  });

  it('treats a missing response as a network fault', () => {
    const mapped = toLiveApiError(axiosFailure(), 'places');
    expect(mapped.kind).toBe('network');
    expect(mapped.message).toBe('places: request failed');
    expect(mapped.transient).toBe(true);
  });

  it('passes LiveApiErrors through and wraps anything else as upstream', () => {
    const original = new LiveApiError('auth', 'nope');
    expect(toLiveApiError(original, 'places')).toBe(original);
    expect(toLiveApiError(new Error('boom'), 'places').message).toBe('places: boom');
  });
});

describe('createLiveApiClient', () => {
  const client = createLiveApiClient('hotels-only', {
    lodging: async ({ city }) => [
      {
        name: `${city} Inn`,
        city,
        tier: 'budget',
        pricePerNight: 50,
        rating: 3.5,
        roomCapacity: 2,
        amenities: [],
        description: '',
      },
    ],
  });

  it('supports only the categories it has handlers for', () => {
    expect(client.supports('lodging')).toBe(true);
    expect(client.supports('dining')).toBe(false);
  });

  it('rejects a category it does not serve', async () => {
    await expect(
      client.fetch({ category: 'dining', params: { city: 'Lisbon', count: 3 } }, new AbortController().signal),
    ).rejects.toMatchObject({ kind: 'bad-request', transient: false });
  });

  it('dispatches to the handler', async () => {
    const hotels = await client.fetch(
      { category: 'lodging', params: { city: 'Porto', count: 3 } },
      new AbortController().signal,
    );
    expect(hotels.map((h) => h.name)).toEqual(['Porto Inn']);
  });
});

describe('parseIsoDuration', () => {
  it('converts hour and minute durations to hours', () => {
    expect(parseIsoDuration('PT7H')).toBe(7);
    expect(parseIsoDuration('PT8H24M')).toBe(8.4);
    expect(parseIsoDuration('PT45M')).toBe(0.75);
    expect(parseIsoDuration('P1D')).toBe(0);
  });
});

describe('parseModelJson', () => {
  it('reads the object inside a markdown fence', () => {
    expect(parseModelJson('```json\n{"a":1}\n```')).toEqual({ ok: true, value: { a: 1 } });
  });

  it('tolerates prose around the object and keeps apostrophes', () => {
    expect(parseModelJson('Sure! {"name":"Lisbon\'s Best"} Enjoy.')).toEqual({
      ok: true,
      value: { name: "Lisbon's Best" },
    });
  });

  it('says why a reply was rejected', () => {
    expect(parseModelJson('   ')).toEqual({ ok: false, reason: 'empty output' });
    expect(parseModelJson('Here are some hotels!')).toEqual({ ok: false, reason: 'no JSON object found' });
    expect(parseModelJson('42')).toEqual({ ok: false, reason: 'no JSON object found' });
    const broken = parseModelJson("{'a': 1}");
    expect(broken.ok).toBe(false);
    expect(!broken.ok && broken.reason).toMatch(/^invalid JSON: /);
  });
});

describe('GenerativeTier', () => {
  const lodging = { category: 'lodging' as const, params: { city: 'Atlantis', count: 3 } };

  it('misses without a backend', async () => {
    const tier = new GenerativeTier(null, { timeoutMs: 100 });
    expect(tier.supports()).toBe(false);
    expect(await tier.attempt(lodging)).toEqual({ status: 'miss', reason: 'no generative backend configured' });
  });

  it('accepts fenced output that matches the schema', async () => {
    const backend = new FakeBackend({ hotels: () => '```json\n' + generatedHotels('Atlantis', 2) + '\n```' });
    const attempt = await new GenerativeTier(backend, { timeoutMs: 100 }).attempt(lodging);

    expect(attempt.status).toBe('hit');
    expect(attempt.status === 'hit' && attempt.payload.map((h) => h.pricePerNight)).toEqual([100, 110]);
    expect(backend.calls[0]?.schemaName).toBe('hotels');
  });

  it('reports prose as unparsable', async () => {
    const backend = new FakeBackend({ hotels: () => 'I could not find any hotels.' });
    expect(await new GenerativeTier(backend, { timeoutMs: 100 }).attempt(lodging)).toEqual({
      status: 'error',
      reason: 'unparsable output: no JSON object found',
    });
  });

  it('reports schema-invalid output', async () => {
    const backend = new FakeBackend({ hotels: () => JSON.stringify({ hotels: [{ name: 'No price' }] }) });
    const attempt = await new GenerativeTier(backend, { timeoutMs: 100 }).attempt(lodging);
    expect(attempt.status).toBe('error');
    expect(attempt.status === 'error' && attempt.reason.startsWith('schema-invalid output: ')).toBe(true);
  });

  it('gives up on a backend that does not answer in time', async () => {
    const backend = new FakeBackend({ hotels: () => new Promise<string>(() => undefined) });
    const attempt = await new GenerativeTier(backend, { timeoutMs: 20 }).attempt(lodging);
    expect(attempt).toEqual({ status: 'error', reason: 'backend: generative:lodging timed out after 20ms' });
  });
});
