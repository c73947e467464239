import { describe, expect, it, vi } from 'vitest';
import { LiveApiError } from '@/services/errors';
import { createLiveApiClient } from '@/services/providers/live/live-api-client';
import { GENERATED_CAVEAT, type RetrievalQuery } from '@/services/providers/retrieval-types';
import type { DestinationData } from '@/services/providers/schemas';
import { queryCacheKey } from '@/services/providers/tiered-retriever';
import { FakeBackend, buildRetriever, generatedDestination, generatedHotels, loadCatalog } from './helpers';

const liveLisbon: DestinationData = {
  destination: { name: 'Lisbon', country: 'PT', description: '', currency: 'EUR' },
  attractions: [{ name: 'Live Sight', type: 'landmark', description: '', entranceFee: 0, estimatedDurationHours: 1 }],
};

describe('TieredRetriever', () => {
  it('stops at a sufficient live result without touching catalog or generation', async () => {
    const catalog = loadCatalog();
    const lookup = vi.spyOn(catalog, 'lookup');
    const backend = new FakeBackend({ destination: () => generatedDestination('Lisbon', 3) });
    const live = createLiveApiClient('fake-live', { destination: async () => liveLisbon });
    const retriever = buildRetriever({ live: [live], catalog, backend });

    const outcome = await retriever.retrieve({ category: 'destination', params: { city: 'Lisbon' } });

    expect(outcome.success).toBe(true);
    if (!outcome.success) return;
    expect(outcome.result.provenance).toBe('live-api');
    expect(outcome.result.payload.attractions[0]?.name).toBe('Live Sight');
    expect(outcome.result.caveats).toEqual([]);
    expect(lookup).not.toHaveBeenCalled();
    expect(backend.calls).toHaveLength(0);
  });

  it('falls through to the catalog when the live source has nothing for the category', async () => {
    const live = createLiveApiClient('flights-only', { transport: async () => [] });
    const retriever = buildRetriever({ live: [live] });

    const outcome = await retriever.retrieve({ category: 'lodging', params: { city: 'Lisbon', count: 5 } });

    expect(outcome.success).toBe(true);
    if (!outcome.success) return;
    expect(outcome.result.provenance).toBe('catalog');
    expect(outcome.result.payload).toHaveLength(6);
    expect(outcome.trace.map((t) => [t.tier, t.status])).toEqual([
      ['live-api', 'skipped'],
      ['catalog', 'hit'],
    ]);
  });

  it('discards an insufficient live result instead of merging it', async () => {
    const live = createLiveApiClient('empty', {
      destination: async () => ({ ...liveLisbon, attractions: [] }),
    });
    const retriever = buildRetriever({ live: [live] });

    const outcome = await retriever.retrieve({ category: 'destination', params: { city: 'Lisbon' } });

    expect(outcome.success).toBe(true);
    if (!outcome.success) return;
    expect(outcome.result.provenance).toBe('catalog');
    expect(outcome.result.payload.attractions).toHaveLength(16);
    expect(outcome.trace[0]).toEqual({ tier: 'live-api', status: 'insufficient', reason: 'below completeness threshold' });
  });

  it('marks generated data with provenance and the unverified caveat', async () => {
    const backend = new FakeBackend({ hotels: () => generatedHotels('Atlantis Bay', 3) });
    const retriever = buildRetriever({ backend });

    const outcome = await retriever.retrieve({ category: 'lodging', params: { city: 'Atlantis Bay', count: 5 } });

    expect(outcome.success).toBe(true);
    if (!outcome.success) return;
    expect(outcome.result.provenance).toBe('generated');
    expect(outcome.result.caveats).toEqual([GENERATED_CAVEAT]);
    expect(outcome.result.payload.map((h) => h.name)).toEqual([
      'Atlantis Bay Hotel 1',
      'Atlantis Bay Hotel 2',
      'Atlantis Bay Hotel 3',
    ]);
    expect(Object.isFrozen(outcome.result)).toBe(true);
  });

  it('keeps provenance and caveat on a cached generated result', async () => {
    const backend = new FakeBackend({ hotels: () => generatedHotels('Atlantis Bay', 2) });
    const retriever = buildRetriever({ backend, cacheTtlSeconds: 60 });
    const query: RetrievalQuery<'lodging'> = { category: 'lodging', params: { city: 'Atlantis Bay', count: 5 } };

    await retriever.retrieve(query);
    const second = await retriever.retrieve({ category: 'lodging', params: { city: '  ATLANTIS bay ', count: 5 } });

    expect(backend.calls).toHaveLength(1);
    expect(second.success).toBe(true);
    if (!second.success) return;
    expect(second.result.provenance).toBe('generated');
    expect(second.result.caveats).toEqual([GENERATED_CAVEAT]);
    expect(second.trace).toEqual([{ tier: 'generated', status: 'hit', reason: 'cached' }]);
  });

  it('keeps cities written in non-Latin scripts apart in the cache', async () => {
    const names: Record<string, string> = { 東京: 'Tokyo', 大阪: 'Osaka' };
    const backend = new FakeBackend({
      destination: (request) => {
        const city = Object.keys(names).find((c) => request.prompt.includes(`"${c}"`)) ?? '';
        return generatedDestination(names[city] ?? 'Unknown', 3);
      },
    });
    const retriever = buildRetriever({ backend, cacheTtlSeconds: 60 });

    const tokyo = await retriever.retrieve({ category: 'destination', params: { city: '東京' } });
    const osaka = await retriever.retrieve({ category: 'destination', params: { city: '大阪' } });

    expect(backend.calls).toHaveLength(2);
    expect(tokyo.success && tokyo.result.payload.destination.name).toBe('Tokyo');
    expect(osaka.success && osaka.result.payload.destination.name).toBe('Osaka');
  });

  it('does not cache a query whose city normalises to nothing', async () => {
    const backend = new FakeBackend({ destination: () => generatedDestination('Nameless', 3) });
    const retriever = buildRetriever({ backend, cacheTtlSeconds: 60 });

    await retriever.retrieve({ category: 'destination', params: { city: '???' } });
    const second = await retriever.retrieve({ category: 'destination', params: { city: '!!!' } });

    expect(backend.calls).toHaveLength(2);
    expect(second.success && second.trace.map((t) => t.status)).toEqual(['skipped', 'miss', 'hit']);
  });

  it('fails as exhausted when generation returns output that breaks the schema', async () => {
    const backend = new FakeBackend({ hotels: () => JSON.stringify({ hotels: [{ name: 'No price' }] }) });
    const retriever = buildRetriever({ backend });

    const outcome = await retriever.retrieve({ category: 'lodging', params: { city: 'Atlantis Bay', count: 5 } });

    expect(outcome.success).toBe(false);
    if (outcome.success) return;
    expect(outcome.failure.reason).toBe('exhausted');
    expect(outcome.failure.trace.map((t) => t.status)).toEqual(['skipped', 'miss', 'error']);
    expect(outcome.failure.trace[2]?.reason).toMatch(/^schema-invalid output/);
  });

  it('retries transient live failures, then falls back', async () => {
    const fetch = vi.fn(async (): Promise<DestinationData> => {
      throw new LiveApiError('rate-limit', 'slow down', 429);
    });
    const live = createLiveApiClient('flaky', { destination: fetch });
    const retriever = buildRetriever({ live: [live], maxRetries: 2 });

    const outcome = await retriever.retrieve({ category: 'destination', params: { city: 'Lisbon' } });

    expect(fetch).toHaveBeenCalledTimes(3);
    expect(outcome.success && outcome.result.provenance).toBe('catalog');
  });

  it('does not retry non-transient live failures', async () => {
    const fetch = vi.fn(async (): Promise<DestinationData> => {
      throw new LiveApiError('auth', 'bad key', 401);
    });
    const live = createLiveApiClient('unauthorized', { destination: fetch });
    const retriever = buildRetriever({ live: [live], maxRetries: 2 });

    const outcome = await retriever.retrieve({ category: 'destination', params: { city: 'Lisbon' } });

    expect(fetch).toHaveBeenCalledTimes(1);
    expect(outcome.success).toBe(true);
    if (!outcome.success) return;
    expect(outcome.result.provenance).toBe('catalog');
    expect(outcome.trace[0]).toEqual({ tier: 'live-api', status: 'error', reason: 'auth: bad key' });
  });

  it('reports cancelled when the caller has already aborted', async () => {
    const controller = new AbortController();
    controller.abort();
    const retriever = buildRetriever({});

    const outcome = await retriever.retrieve({ category: 'destination', params: { city: 'Lisbon' } }, controller.signal);

    expect(outcome.success).toBe(false);
    if (outcome.success) return;
    expect(outcome.failure.reason).toBe('cancelled');
    expect(outcome.failure.trace).toEqual([]);
  });

  it('lists the tiers that can serve a category', () => {
    const live = createLiveApiClient('dest', { destination: async () => liveLisbon });
    const retriever = buildRetriever({ live: [live] });

    expect(retriever.chainFor('destination')).toEqual(['live-api', 'catalog']);
    expect(retriever.chainFor('dining')).toEqual(['catalog']);
  });
});

describe('queryCacheKey', () => {
  it('ignores case, accents, spacing and key order', () => {
    expect(queryCacheKey({ category: 'destination', params: { city: 'Reykjavík ' } })).toBe(
      queryCacheKey({ category: 'destination', params: { city: 'REYKJAVIK' } }),
    );
    expect(queryCacheKey({ category: 'dining', params: { city: 'Lisbon', count: 8 } })).toBe('dining?city=lisbon&count=8');
  });

  it('keeps letters of every script and gives up on empty text', () => {
    expect(queryCacheKey({ category: 'destination', params: { city: '東京' } })).toBe('destination?city=東京');
    expect(queryCacheKey({ category: 'destination', params: { city: 'Москва' } })).toBe('destination?city=москва');
    expect(queryCacheKey({ category: 'destination', params: { city: ' ?! ' } })).toBeNull();
  });
});
