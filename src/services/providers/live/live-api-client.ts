// src/services/providers/live/live-api-client.ts
// Tier-1 source: a client serves some categories through per-category handlers.
import axios from 'axios';
import { LiveApiError, errorMessage } from '@/services/errors';
import type {
  RetrievalCategory,
  RetrievalParams,
  RetrievalPayloads,
  RetrievalQuery,
} from '../retrieval-types';

export type LiveApiHandlers = {
  [K in RetrievalCategory]?: (params: RetrievalParams[K], signal: AbortSignal) => Promise<RetrievalPayloads[K]>;
};

export interface LiveApiClient {
  readonly name: string;
  supports(category: RetrievalCategory): boolean;
  fetch<C extends RetrievalCategory>(query: RetrievalQuery<C>, signal: AbortSignal): Promise<RetrievalPayloads[C]>;
}

export function createLiveApiClient(name: string, handlers: LiveApiHandlers): LiveApiClient {
  return {
    name,
    supports: (category) => handlers[category] !== undefined,
    async fetch<C extends RetrievalCategory>(query: RetrievalQuery<C>, signal: AbortSignal) {
      const handler: LiveApiHandlers[C] = handlers[query.category];
      if (!handler) {
        throw new LiveApiError('bad-request', `${name} does not serve ${query.category}`);
      }
      return handler(query.params, signal);
    },
  };
}

/** Maps any transport-level failure into a LiveApiError kind. */
export function toLiveApiError(err: unknown, source: string): LiveApiError {
  if (err instanceof LiveApiError) return err;
  if (!axios.isAxiosError(err)) {
    return new LiveApiError('upstream', `${source}: ${errorMessage(err)}`);
  }

  if (err.code === 'ECONNABORTED' || err.code === 'ETIMEDOUT' || err.code === 'ERR_CANCELED') {
    return new LiveApiError('timeout', `${source}: request timed out`);
  }
  const status = err.response?.status;
  if (status === undefined) {
    return new LiveApiError('network', `${source}: ${err.message}`);
  }
  if (status === 401 || status === 403) return new LiveApiError('auth', `${source}: unauthorized (${status})`, status);
  if (status === 404) return new LiveApiError('not-found', `${source}: not found`, status);
  if (status === 429) return new LiveApiError('rate-limit', `${source}: rate limited`, status);
  if (status >= 500) return new LiveApiError('upstream', `${source}: upstream error (${status})`, status);
  return new LiveApiError('bad-request', `${source}: request rejected (${status})`, status);
}
