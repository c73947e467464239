import { fileURLToPath } from 'node:url';
import { loadAppConfig, type AppConfig } from '@/config/app.config';
import { JsonCatalogStore } from '@/services/providers/catalog/json-catalog';
import type { GenerateRequest, GenerativeBackend } from '@/services/providers/generative/generative-backend';
import type { LiveApiClient } from '@/services/providers/live/live-api-client';
import { TieredRetriever } from '@/services/providers/tiered-retriever';
import { CatalogTier } from '@/services/providers/tiers/catalog-tier';
import { GenerativeTier } from '@/services/providers/tiers/generative-tier';
import { LiveApiTier } from '@/services/providers/tiers/live-api-tier';
import type { CatalogStore } from '@/services/providers/catalog/catalog-store';
import type { TripRequest } from '@/types/trip';

export const CATALOG_DIR = fileURLToPath(new URL('../data/catalog', import.meta.url));

/** Fixed "today" for validation; trips below are in the future relative to it. */
export const NOW = new Date('2031-01-01T00:00:00Z');

export function makeRequest(overrides: Partial<TripRequest> = {}): TripRequest {
  return {
    destination: 'Lisbon',
    origin: 'New York',
    startDate: '2031-06-01',
    endDate: '2031-06-05',
    budget: 6000,
    travelers: 2,
    preferences: [],
    dietaryRestrictions: [],
    ...overrides,
  };
}

export function loadCatalog(): JsonCatalogStore {
  return JsonCatalogStore.fromDirectory(CATALOG_DIR);
}

export function testConfig(env: Record<string, string> = {}): AppConfig {
  return loadAppConfig({
    NODE_ENV: 'test',
    CATALOG_DIR,
    LIVE_API_TIMEOUT_MS: '200',
    GENERATIVE_TIMEOUT_MS: '200',
    INDEPENDENT_DEADLINE_MS: '2000',
    RUN_DEADLINE_MS: '4000',
    RETRIEVAL_CACHE_TTL_SECONDS: '60',
    ...env,
  });
}

type Responder = (request: GenerateRequest) => string | Promise<string>;

/** In-process generative backend; responses keyed by schema name. */
export class FakeBackend implements GenerativeBackend {
  readonly name = 'fake';
  readonly calls: GenerateRequest[] = [];

  constructor(private readonly responders: Partial<Record<string, Responder>> = {}) {}

  async generate(request: GenerateRequest): Promise<string> {
    this.calls.push(request);
    const responder = this.responders[request.schemaName];
    if (!responder) throw new Error(`no fake response for ${request.schemaName}`);
    return responder(request);
  }
}

export function buildRetriever(options: {
  live?: LiveApiClient[];
  catalog?: CatalogStore;
  backend?: GenerativeBackend | null;
  cacheTtlSeconds?: number;
  maxRetries?: number;
}): TieredRetriever {
  return new TieredRetriever(
    [
      new LiveApiTier(options.live ?? [], { timeoutMs: 200, maxRetries: options.maxRetries ?? 2, initialDelayMs: 1 }),
      new CatalogTier(options.catalog ?? loadCatalog()),
      new GenerativeTier(options.backend ?? null, { timeoutMs: 200 }),
    ],
    { cacheTtlSeconds: options.cacheTtlSeconds ?? 0 },
  );
}

// ── Generated fixtures (made-up places) ──────────────────────

export function generatedDestination(city: string, attractions: number): string {
  return JSON.stringify({
    destination: { name: city, country: 'Nowhere', description: 'A made-up place.', currency: 'USD' },
    attractions: Array.from({ length: attractions }, (_, i) => ({
      name: `${city} Sight ${i + 1}`,
      type: 'landmark',
      description: 'Something to see.',
      entranceFee: 0,
      estimatedDurationHours: 2,
    })),
  });
}

export function generatedHotels(city: string, count: number): string {
  return JSON.stringify({
    hotels: Array.from({ length: count }, (_, i) => ({
      name: `${city} Hotel ${i + 1}`,
      city,
      tier: 'mid-range',
      pricePerNight: 100 + i * 10,
      rating: 4,
      roomCapacity: 2,
      amenities: ['wifi'],
      description: 'A made-up hotel.',
    })),
  });
}

export function generatedRestaurants(city: string, count: number): string {
  return JSON.stringify({
    restaurants: Array.from({ length: count }, (_, i) => ({
      name: `${city} Kitchen ${i + 1}`,
      city,
      cuisine: `Cuisine ${i + 1}`,
      description: 'A made-up restaurant.',
      priceRange: '$$',
      averageCostPerPerson: 20,
      rating: 4,
      dietaryOptions: [],
      specialties: [],
    })),
  });
}

export function generatedFlights(from: string, to: string, perDirection: number): string {
  const leg = (direction: 'outbound' | 'return', i: number) => ({
    airline: 'Test Air',
    flightNumber: `TA${direction === 'outbound' ? 100 + i : 200 + i}`,
    from: direction === 'outbound' ? from : to,
    to: direction === 'outbound' ? to : from,
    departTime: direction === 'outbound' ? '2031-06-01T09:00:00' : '2031-06-05T09:00:00',
    arriveTime: direction === 'outbound' ? '2031-06-01T15:00:00' : '2031-06-05T15:00:00',
    durationHours: 6,
    price: 300 + i * 50,
    stops: 0,
    cabin: 'economy',
    direction,
  });
  return JSON.stringify({
    flights: [
      ...Array.from({ length: perDirection }, (_, i) => leg('outbound', i)),
      ...Array.from({ length: perDirection }, (_, i) => leg('return', i)),
    ],
  });
}

/** Backend that can answer every category for `city`. */
export function fullGenerativeBackend(city: string, origin = 'NYC'): FakeBackend {
  return new FakeBackend({
    destination: () => generatedDestination(city, 12),
    hotels: () => generatedHotels(city, 5),
    restaurants: () => generatedRestaurants(city, 6),
    flights: () => generatedFlights(origin, 'ATL', 3),
  });
}
