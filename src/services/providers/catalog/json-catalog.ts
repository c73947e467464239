// JSON-file catalog. Files are validated once at load and indexed by normalised key.
import fs from 'fs';
import path from 'path';
import { z } from 'zod';
import { logger } from '@/services/logger';
import { normalizeKey, placeKeyCandidates, routeKey } from '@/utils/normalize-key';
import type { RetrievalCategory } from '../retrieval-types';
import {
  catalogDataSchema,
  type CatalogData,
  type CatalogRecords,
  type CatalogStore,
} from './catalog-store';

type CatalogIndex = { [K in RetrievalCategory]: Map<string, CatalogRecords[K][]> };

const CATALOG_FILES = {
  destinations: 'destinations.json',
  hotels: 'hotels.json',
  restaurants: 'restaurants.json',
  routes: 'flights.json',
} as const;

function push<T>(map: Map<string, T[]>, key: string, record: T): void {
  const list = map.get(key);
  if (list) list.push(record);
  else map.set(key, [record]);
}

export class JsonCatalogStore implements CatalogStore {
  private readonly index: CatalogIndex = {
    destination: new Map(),
    lodging: new Map(),
    dining: new Map(),
    transport: new Map(),
  };

  constructor(data: CatalogData) {
    for (const d of data.destinations) push(this.index.destination, normalizeKey(d.destination.name), d);
    for (const h of data.hotels) push(this.index.lodging, normalizeKey(h.city), h);
    for (const r of data.restaurants) push(this.index.dining, normalizeKey(r.city), r);
    for (const f of data.routes) push(this.index.transport, routeKey(f.origin, f.destination), f);
  }

  static fromDirectory(dir: string): JsonCatalogStore {
    const read = (file: string, key: string): unknown => {
      const filePath = path.join(dir, file);
      if (!fs.existsSync(filePath)) {
        logger.warn('catalog:file_missing', { filePath });
        return [];
      }
      const parsed: unknown = JSON.parse(fs.readFileSync(filePath, 'utf-8'));
      const wrapper = z.record(z.unknown()).safeParse(parsed);
      return wrapper.success ? wrapper.data[key] ?? [] : parsed;
    };

    const data = catalogDataSchema.parse({
      destinations: read(CATALOG_FILES.destinations, 'destinations'),
      hotels: read(CATALOG_FILES.hotels, 'hotels'),
      restaurants: read(CATALOG_FILES.restaurants, 'restaurants'),
      routes: read(CATALOG_FILES.routes, 'routes'),
    });
    logger.info('catalog:loaded', {
      dir,
      destinations: data.destinations.length,
      hotels: data.hotels.length,
      restaurants: data.restaurants.length,
      routes: data.routes.length,
    });
    return new JsonCatalogStore(data);
  }

  lookup<C extends RetrievalCategory>(category: C, key: string): readonly CatalogRecords[C][] {
    const index: Map<string, CatalogRecords[C][]> = this.index[category];

    if (category === 'transport') {
      return index.get(normalizeKey(key)) ?? [];
    }

    const candidates = placeKeyCandidates(key);
    for (const candidate of candidates) {
      const hit = index.get(candidate);
      if (hit) return hit;
    }

    // Fuzzy: whole-word prefix either way ("bali indonesia" ~ "bali").
    const shortest = candidates[candidates.length - 1] ?? '';
    if (!shortest) return [];
    for (const [indexed, records] of index) {
      if (indexed.startsWith(`${shortest} `) || shortest.startsWith(`${indexed} `)) {
        return records;
      }
    }
    return [];
  }

  cities(): string[] {
    return [...this.index.destination.values()].flat().map((d) => d.destination.name);
  }
}
