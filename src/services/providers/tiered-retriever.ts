// src/services/providers/tiered-retriever.ts
// Walks live API → catalog → generative for one category and returns the first
// sufficient result. Results are memoised per normalised query.
import { LRUCache } from 'lru-cache';
import { logger } from '@/services/logger';
import { deepFreeze } from '@/utils/freeze';
import { normalizeKey } from '@/utils/normalize-key';
import {
  GENERATED_CAVEAT,
  TIER_ORDER,
  type Provenance,
  type RetrievalCategory,
  type RetrievalFailure,
  type RetrievalOutcome,
  type RetrievalPayloads,
  type RetrievalQuery,
  type RetrievalResult,
  type TierStrategy,
  type TierTrace,
} from './retrieval-types';
import { isSufficient } from './sufficiency';

const CACHE_MAX_PER_CATEGORY = 200;

type RetrievalCaches = {
  [K in RetrievalCategory]: LRUCache<string, RetrievalResult<RetrievalPayloads[K]>>;
};

export interface TieredRetrieverOptions {
  /** 0 disables memoisation. */
  cacheTtlSeconds: number;
}

/**
 * Stable key over the query: string params are normalised, keys sorted.
 * Null when a text param normalises to nothing; such queries are never cached.
 */
export function queryCacheKey(query: RetrievalQuery): string | null {
  const parts: string[] = [];
  const entries = Object.entries(query.params)
    .filter(([, v]) => v !== undefined)
    .sort(([a], [b]) => a.localeCompare(b));
  for (const [k, v] of entries) {
    const value = typeof v === 'string' ? normalizeKey(v) : String(v);
    if (!value) return null;
    parts.push(`${k}=${value}`);
  }
  return `${query.category}?${parts.join('&')}`;
}

function caveatsFor(provenance: Provenance): string[] {
  return provenance === 'generated' ? [GENERATED_CAVEAT] : [];
}

/** What agents depend on; TieredRetriever is the production implementation. */
export interface DataRetriever {
  retrieve<C extends RetrievalCategory>(
    query: RetrievalQuery<C>,
    signal?: AbortSignal,
  ): Promise<RetrievalOutcome<RetrievalPayloads[C]>>;
}

export class TieredRetriever implements DataRetriever {
  private readonly tiers: readonly TierStrategy[];
  private readonly caches: RetrievalCaches | null;

  constructor(tiers: readonly TierStrategy[], options: TieredRetrieverOptions) {
    // Order is fixed regardless of how the tiers were passed in.
    this.tiers = [...tiers].sort(
      (a, b) => TIER_ORDER.indexOf(a.provenance) - TIER_ORDER.indexOf(b.provenance),
    );
    const cacheOptions = { max: CACHE_MAX_PER_CATEGORY, ttl: options.cacheTtlSeconds * 1000 };
    this.caches =
      options.cacheTtlSeconds > 0
        ? {
            destination: new LRUCache(cacheOptions),
            lodging: new LRUCache(cacheOptions),
            dining: new LRUCache(cacheOptions),
            transport: new LRUCache(cacheOptions),
          }
        : null;
  }

  /** Provenances of the tiers that can serve `category`, in chain order. */
  chainFor(category: RetrievalCategory): Provenance[] {
    return this.tiers.filter((t) => t.supports(category)).map((t) => t.provenance);
  }

  async retrieve<C extends RetrievalCategory>(
    query: RetrievalQuery<C>,
    signal?: AbortSignal,
  ): Promise<RetrievalOutcome<RetrievalPayloads[C]>> {
    const { category } = query;
    const key = queryCacheKey(query);
    const cache: LRUCache<string, RetrievalResult<RetrievalPayloads[C]>> | undefined =
      key === null ? undefined : this.caches?.[category];

    const cached = key === null ? undefined : cache?.get(key);
    if (cached) {
      logger.debug('retriever:cache_hit', { category, provenance: cached.provenance });
      return { success: true, result: cached, trace: [{ tier: cached.provenance, status: 'hit', reason: 'cached' }] };
    }

    const trace: TierTrace[] = [];
    const cancelled = (): RetrievalOutcome<RetrievalPayloads[C]> => {
      logger.info('retriever:cancelled', { category, trace });
      return { success: false, failure: this.failure(category, 'cancelled', 'Retrieval cancelled by caller', trace) };
    };

    for (const tier of this.tiers) {
      if (signal?.aborted) return cancelled();
      if (!tier.supports(category)) {
        trace.push({ tier: tier.provenance, status: 'skipped', reason: 'unsupported' });
        continue;
      }

      const attempt = await tier.attempt(query, signal);
      if (signal?.aborted) return cancelled();

      if (attempt.status !== 'hit') {
        trace.push({ tier: tier.provenance, status: attempt.status, reason: attempt.reason });
        logger.info('retriever:tier_miss', { category, tier: tier.provenance, status: attempt.status, reason: attempt.reason });
        continue;
      }
      if (!isSufficient(category, attempt.payload)) {
        trace.push({ tier: tier.provenance, status: 'insufficient', reason: 'below completeness threshold' });
        logger.info('retriever:tier_insufficient', { category, tier: tier.provenance });
        continue;
      }

      trace.push({ tier: tier.provenance, status: 'hit' });
      const result: RetrievalResult<RetrievalPayloads[C]> = deepFreeze({
        payload: attempt.payload,
        provenance: tier.provenance,
        caveats: caveatsFor(tier.provenance),
      });
      if (key !== null) cache?.set(key, result);
      logger.info('retriever:hit', { category, tier: tier.provenance, attempts: trace.length });
      return { success: true, result, trace };
    }

    logger.warn('retriever:exhausted', { category, trace });
    return {
      success: false,
      failure: this.failure(category, 'exhausted', `No tier produced sufficient ${category} data`, trace),
    };
  }

  private failure(
    category: RetrievalCategory,
    reason: RetrievalFailure['reason'],
    message: string,
    trace: TierTrace[],
  ): RetrievalFailure {
    return { category, reason, message, trace: [...trace] };
  }
}
