// src/services/orchestrator.ts: two-level run: independent agents, then dependents, then verification
import { errorMessage } from '@/services/errors';
import { logger } from '@/services/logger';
import { TripContext } from '@/services/trip-context';
import type { AgentRegistry } from '@/services/vertical/agent-registry';
import { failedAgentResult } from '@/services/vertical/base-agent';
import type { VerifierAgent } from '@/services/verifier-agent';
import {
  DEPENDENT_CATEGORIES,
  INDEPENDENT_CATEGORIES,
  type AgentCategory,
  type AgentResult,
  type IndependentCategory,
  type TripRequest,
  type TripResults,
  type TripState,
  type VerificationResult,
} from '@/types/trip';
import { linkedController } from '@/utils/abort';

export interface OrchestratorListener {
  onStateChange?(state: TripState): void;
  /** `results` is the context snapshot right after `result` was recorded. */
  onAgentResult?<C extends AgentCategory>(result: AgentResult<C>, results: TripResults): void;
}

export interface OrchestratorOptions {
  /** Independent agents still pending after this are recorded as failed. */
  independentDeadlineMs: number;
  /** Whole-run budget; dependents do not start once it has elapsed. */
  runDeadlineMs: number;
}

export interface OrchestratorDeps {
  agents: AgentRegistry;
  verifier: VerifierAgent;
  options: OrchestratorOptions;
}

export type OrchestrationOutcome =
  | { state: 'verified'; results: TripResults; verification: VerificationResult }
  | { state: 'failed'; results: TripResults; error: string };

/** Results of an earlier pass over the same trip, and the independent agents whose inputs changed since. */
export interface PreviousPass {
  results: TripResults;
  rerun: readonly IndependentCategory[];
}

export interface RunOptions {
  signal?: AbortSignal;
  listener?: OrchestratorListener;
  /** Seeds the run; unaffected ok results are kept and their agents skipped. */
  previous?: PreviousPass;
}

/** Independent categories a new pass takes over unchanged: ok before and untouched by the change. */
export function reusableCategories(previous: PreviousPass): IndependentCategory[] {
  return INDEPENDENT_CATEGORIES.filter(
    (category) => !previous.rerun.includes(category) && previous.results[category]?.status === 'ok',
  );
}

/** The part of `previous.results` a new pass starts from. */
export function reusedResults(previous: PreviousPass): TripResults {
  return TripContext.seeded(previous.results, reusableCategories(previous)).snapshot();
}

function startTimer(ms: number): { expired: Promise<'deadline'>; clear(): void } {
  let timer: NodeJS.Timeout | undefined;
  const expired = new Promise<'deadline'>((resolve) => {
    timer = setTimeout(() => resolve('deadline'), Math.max(0, ms));
  });
  return { expired, clear: () => clearTimeout(timer) };
}

export class Orchestrator {
  constructor(private readonly deps: OrchestratorDeps) {}

  async run(request: TripRequest, options: RunOptions = {}): Promise<OrchestrationOutcome> {
    const { signal, listener, previous } = options;
    const { independentDeadlineMs, runDeadlineMs } = this.deps.options;
    const startedAt = Date.now();
    const reused = previous ? reusableCategories(previous) : [];
    const context = previous ? TripContext.seeded(previous.results, reused) : new TripContext();
    const fail = (error: string): OrchestrationOutcome => {
      logger.warn('orchestrator:run_failed', { destination: request.destination, error });
      listener?.onStateChange?.('failed');
      return { state: 'failed', results: context.snapshot(), error };
    };

    listener?.onStateChange?.('running');
    logger.info('orchestrator:start', { destination: request.destination, startDate: request.startDate, reused });

    const independent = await this.runStage(
      INDEPENDENT_CATEGORIES.filter((category) => !context.has(category)),
      request,
      context,
      independentDeadlineMs,
      signal,
      listener,
    );
    if (signal?.aborted) return fail('Trip planning was cancelled');

    const results = context.snapshot();
    if (INDEPENDENT_CATEGORIES.every((c) => results[c]?.status !== 'ok')) {
      return fail('All independent agents failed');
    }

    const remaining = runDeadlineMs - (Date.now() - startedAt);
    if (remaining <= 0) {
      return fail('Run deadline elapsed before dependent agents could start');
    }
    logger.info('orchestrator:independents_done', { timedOut: independent.timedOut, remainingMs: remaining });

    await this.runStage(DEPENDENT_CATEGORIES, request, context, remaining, signal, listener);
    if (signal?.aborted) return fail('Trip planning was cancelled');

    const snapshot = context.snapshot();
    const verification = this.deps.verifier.verify(request, snapshot);
    listener?.onStateChange?.('verified');
    logger.info('orchestrator:verified', {
      destination: request.destination,
      score: verification.score,
      passed: verification.passed,
      durationMs: Date.now() - startedAt,
    });
    return { state: 'verified', results: snapshot, verification };
  }

  /**
   * Runs `categories` concurrently, recording each result as it settles.
   * At the deadline, in-flight work is aborted and pending categories are recorded as failed.
   */
  private async runStage(
    categories: readonly AgentCategory[],
    request: TripRequest,
    context: TripContext,
    deadlineMs: number,
    signal: AbortSignal | undefined,
    listener: OrchestratorListener | undefined,
  ): Promise<{ timedOut: boolean }> {
    const controller = linkedController(signal);
    const startedAt = Date.now();

    const record = <C extends AgentCategory>(result: AgentResult<C>): void => {
      if (context.has(result.category)) {
        logger.debug('orchestrator:late_result_dropped', { category: result.category });
        return;
      }
      context.record(result);
      logger.info('orchestrator:agent_done', {
        category: result.category,
        status: result.status,
        provenance: result.provenance,
        confidence: result.confidence,
        durationMs: result.durationMs,
      });
      try {
        listener?.onAgentResult?.(result, context.snapshot());
      } catch (err) {
        logger.error('orchestrator:listener_error', { category: result.category, error: errorMessage(err) });
      }
    };

    const launch = <C extends AgentCategory>(category: C): Promise<void> => {
      logger.debug('orchestrator:agent_start', { category });
      const agent = this.deps.agents[category];
      return agent.execute(request, context, controller.signal).then(record);
    };

    const timer = startTimer(deadlineMs);
    const settled = await Promise.race([
      Promise.all(categories.map((c) => launch(c))).then(() => 'settled' as const),
      timer.expired,
    ]);
    timer.clear();

    if (settled === 'settled') return { timedOut: false };

    controller.abort();
    const elapsed = Date.now() - startedAt;
    for (const category of categories) {
      if (!context.has(category)) {
        record(failedAgentResult(category, `deadline exceeded after ${deadlineMs}ms`, elapsed));
      }
    }
    logger.warn('orchestrator:deadline', { categories, deadlineMs });
    return { timedOut: true };
  }
}
