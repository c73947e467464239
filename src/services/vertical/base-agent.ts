// Shared execute() wrapper: timing, fault conversion and freezing for every trip agent.
import { RetrievalFailedError, UnsatisfiableRequestError, errorMessage } from '@/services/errors';
import { logger } from '@/services/logger';
import type { DataRetriever } from '@/services/providers/tiered-retriever';
import type {
  Provenance,
  RetrievalCategory,
  RetrievalPayloads,
  RetrievalQuery,
  RetrievalResult,
} from '@/services/providers/retrieval-types';
import type { TripContextReader } from '@/services/trip-context';
import type {
  AgentCategory,
  AgentPayloads,
  AgentResult,
  AgentWarning,
  TripRequest,
} from '@/types/trip';
import { deepFreeze } from '@/utils/freeze';
import { computeConfidence } from './confidence';

export interface TripAgent<C extends AgentCategory = AgentCategory> {
  readonly category: C;
  execute(request: TripRequest, context: TripContextReader, signal?: AbortSignal): Promise<AgentResult<C>>;
}

/** What a concrete agent hands back before confidence and timing are attached. */
export interface AgentOutput<C extends AgentCategory> {
  payload: AgentPayloads[C];
  provenance: Provenance;
  /** 0..1, how much of the expected payload was found. */
  completeness: number;
  caveats?: readonly string[];
  warnings?: AgentWarning[];
}

/** Zero-confidence failure marker carrying the cause as a warning. */
export function failedAgentResult<C extends AgentCategory>(
  category: C,
  error: string,
  durationMs: number,
): AgentResult<C> {
  return {
    category,
    status: 'failed',
    payload: null,
    provenance: null,
    confidence: 0,
    caveats: [],
    warnings: [{ severity: 'warning', message: `${category} agent failed: ${error}` }],
    durationMs,
    error,
  };
}

export interface AgentDeps {
  retriever: DataRetriever;
}

export abstract class BaseTripAgent<C extends AgentCategory> implements TripAgent<C> {
  abstract readonly category: C;

  constructor(protected readonly deps: AgentDeps) {}

  protected abstract run(
    request: TripRequest,
    context: TripContextReader,
    signal?: AbortSignal,
  ): Promise<AgentOutput<C>>;

  async execute(request: TripRequest, context: TripContextReader, signal?: AbortSignal): Promise<AgentResult<C>> {
    const start = Date.now();
    let result: AgentResult<C>;
    try {
      const output = await this.run(request, context, signal);
      result = {
        category: this.category,
        status: 'ok',
        payload: output.payload,
        provenance: output.provenance,
        confidence: computeConfidence(output.provenance, output.completeness),
        caveats: output.caveats ?? [],
        warnings: output.warnings ?? [],
        durationMs: Date.now() - start,
      };
    } catch (err) {
      const message = errorMessage(err);
      if (err instanceof UnsatisfiableRequestError) {
        logger.warn('agent:unsatisfiable', { category: this.category, error: message });
      } else if (!(err instanceof RetrievalFailedError)) {
        logger.error('agent:fault', { category: this.category, error: message });
      }
      result = failedAgentResult(this.category, message, Date.now() - start);
    }
    logger.debug('agent:executed', {
      category: this.category,
      status: result.status,
      confidence: result.confidence,
      durationMs: result.durationMs,
    });
    return deepFreeze(result);
  }

  /** Retrieves or throws RetrievalFailedError, which execute() records as a failure. */
  protected async retrieve<Q extends RetrievalCategory>(
    query: RetrievalQuery<Q>,
    signal?: AbortSignal,
  ): Promise<RetrievalResult<RetrievalPayloads[Q]>> {
    const outcome = await this.deps.retriever.retrieve(query, signal);
    if (!outcome.success) {
      throw new RetrievalFailedError(outcome.failure.reason, outcome.failure.message);
    }
    return outcome.result;
  }
}
