// Tier 1: live third-party APIs. Bounded per call, retried only on transient faults.
import { LiveApiError, TimeoutError, errorMessage } from '@/services/errors';
import { logger } from '@/services/logger';
import { withTimeout } from '@/utils/abort';
import { retryWithBackoff } from '@/utils/retryWithBackoff';
import type { LiveApiClient } from '../live/live-api-client';
import type {
  RetrievalCategory,
  RetrievalPayloads,
  RetrievalQuery,
  TierAttempt,
  TierStrategy,
} from '../retrieval-types';

export interface LiveApiTierOptions {
  timeoutMs: number;
  maxRetries: number;
  /** First backoff delay; doubles per retry. */
  initialDelayMs?: number;
}

function isTransient(err: unknown): boolean {
  if (err instanceof LiveApiError) return err.transient;
  return err instanceof TimeoutError;
}

export class LiveApiTier implements TierStrategy {
  readonly provenance = 'live-api' as const;

  constructor(
    private readonly clients: readonly LiveApiClient[],
    private readonly options: LiveApiTierOptions,
  ) {}

  supports(category: RetrievalCategory): boolean {
    return this.clients.some((c) => c.supports(category));
  }

  async attempt<C extends RetrievalCategory>(
    query: RetrievalQuery<C>,
    signal?: AbortSignal,
  ): Promise<TierAttempt<RetrievalPayloads[C]>> {
    const client = this.clients.find((c) => c.supports(query.category));
    if (!client) return { status: 'miss', reason: 'no live source for category' };

    const label = `${client.name}:${query.category}`;
    try {
      const payload = await retryWithBackoff(
        () => withTimeout((s) => client.fetch(query, s), this.options.timeoutMs, label, signal),
        {
          maxRetries: this.options.maxRetries,
          initialDelay: this.options.initialDelayMs ?? 200,
          shouldRetry: isTransient,
          signal,
          label,
        },
      );
      return { status: 'hit', payload };
    } catch (err) {
      const kind = err instanceof LiveApiError ? err.kind : err instanceof TimeoutError ? 'timeout' : 'unknown';
      logger.warn('live-api:failed', { source: client.name, category: query.category, kind, error: errorMessage(err) });
      return { status: 'error', reason: `${kind}: ${errorMessage(err)}` };
    }
  }
}
