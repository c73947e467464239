// src/services/trip-service.ts: external entry points: plan in the background, poll, modify, run one agent
import { v4 as uuidv4 } from 'uuid';
import type { TripStore } from '@/memory/TripStore';
import { errorMessage } from '@/services/errors';
import { logger } from '@/services/logger';
import {
  reusedResults,
  type Orchestrator,
  type OrchestratorListener,
  type PreviousPass,
} from '@/services/orchestrator';
import { emptyContext } from '@/services/trip-context';
import {
  planModification,
  type ModifiableField,
  type TripModification,
} from '@/services/trip-modification';
import type { AgentRegistry } from '@/services/vertical/agent-registry';
import type {
  AgentCategory,
  AgentResult,
  IndependentCategory,
  TripRecord,
  TripRequest,
  TripRevision,
  TripState,
  TripStatus,
} from '@/types/trip';
import type { FieldError } from '@/types/trip-request';

/** Oldest versions beyond this are dropped from a trip's undo history. */
export const MAX_REVISIONS = 20;

export interface TripServiceDeps {
  orchestrator: Orchestrator;
  agents: AgentRegistry;
  store: TripStore;
}

interface ActiveRun {
  controller: AbortController;
  done: Promise<void>;
}

type NotFound = { status: 'not-found' };
/** The trip is running, or another change to it is being applied. */
type Busy = { status: 'busy'; state: TripState };

export type ModifyOutcome =
  | { status: 'started'; changed: ModifiableField[]; rerun: IndependentCategory[]; revision: number }
  | { status: 'conflict'; conflicts: FieldError[] }
  | NotFound
  | Busy;

export type RevisionOutcome = { status: 'restored'; state: TripState; revision: number } | { status: 'empty' } | NotFound | Busy;

function revisionOf(record: TripRecord): TripRevision {
  return {
    request: record.request,
    state: record.state,
    results: record.results,
    verification: record.verification,
    error: record.error,
  };
}

export class TripService {
  private readonly active = new Map<string, ActiveRun>();
  /** Trips with a modify, undo or redo between its read and its write. */
  private readonly reserved = new Set<string>();

  constructor(private readonly deps: TripServiceDeps) {}

  /** Stores the trip as `created` and starts planning without waiting for it. */
  async planTrip(request: TripRequest): Promise<string> {
    const tripId = uuidv4();
    const now = Date.now();
    await this.deps.store.set({
      tripId,
      request,
      state: 'created',
      results: {},
      history: [],
      undone: [],
      createdAt: now,
      updatedAt: now,
    });
    logger.info('trip:created', { tripId, destination: request.destination });
    this.start(tripId, request);
    return tripId;
  }

  /** Whatever is known now, including partial results while the run is in progress. */
  async getTripStatus(tripId: string): Promise<TripStatus | null> {
    const record = await this.deps.store.get(tripId);
    if (!record) return null;
    return {
      tripId: record.tripId,
      state: record.state,
      request: record.request,
      results: record.results,
      ...(record.verification && { verification: record.verification }),
      ...(record.error && { error: record.error }),
      revision: record.history.length,
      canUndo: record.history.length > 0,
      canRedo: record.undone.length > 0,
    };
  }

  /**
   * Applies `change` to a settled trip and re-plans it in the background.
   * Only the independent agents that read a changed field run again; budget,
   * itinerary and verification always do. The replaced version can be undone.
   */
  async modifyTrip(tripId: string, change: TripModification, now: Date = new Date()): Promise<ModifyOutcome> {
    return this.exclusive<ModifyOutcome>(tripId, async (record) => {
      const plan = planModification(record.request, change, now);
      if (!plan.ok) return { status: 'conflict', conflicts: plan.conflicts };

      const previous: PreviousPass = { results: record.results, rerun: plan.rerun };
      const history = [...record.history, revisionOf(record)].slice(-MAX_REVISIONS);
      await this.patch(tripId, {
        request: plan.request,
        state: 'created',
        results: reusedResults(previous),
        verification: undefined,
        error: undefined,
        history,
        undone: [],
      });
      logger.info('trip:modified', { tripId, changed: plan.changed, rerun: plan.rerun });
      this.start(tripId, plan.request, previous);
      return { status: 'started', changed: plan.changed, rerun: plan.rerun, revision: history.length };
    });
  }

  /** Restores the version the last modification replaced. */
  async undoModification(tripId: string): Promise<RevisionOutcome> {
    return this.exclusive<RevisionOutcome>(tripId, async (record) => {
      const target = record.history[record.history.length - 1];
      if (!target) return { status: 'empty' };
      const history = record.history.slice(0, -1);
      await this.patch(tripId, { ...this.restore(target), history, undone: [...record.undone, revisionOf(record)] });
      logger.info('trip:undo', { tripId, revision: history.length });
      return { status: 'restored', state: target.state, revision: history.length };
    });
  }

  /** Re-applies the version the last undo took back. */
  async redoModification(tripId: string): Promise<RevisionOutcome> {
    return this.exclusive<RevisionOutcome>(tripId, async (record) => {
      const target = record.undone[record.undone.length - 1];
      if (!target) return { status: 'empty' };
      const history = [...record.history, revisionOf(record)];
      await this.patch(tripId, { ...this.restore(target), history, undone: record.undone.slice(0, -1) });
      logger.info('trip:redo', { tripId, revision: history.length });
      return { status: 'restored', state: target.state, revision: history.length };
    });
  }

  /** One agent in isolation against an empty context. */
  async runSingleAgent<C extends AgentCategory>(
    category: C,
    request: TripRequest,
    signal?: AbortSignal,
  ): Promise<AgentResult<C>> {
    const agent = this.deps.agents[category];
    logger.info('trip:single_agent', { category, destination: request.destination });
    return agent.execute(request, emptyContext(), signal);
  }

  /** Aborts a running trip. Returns false when the trip is not running. */
  cancelTrip(tripId: string): boolean {
    const run = this.active.get(tripId);
    if (!run) return false;
    run.controller.abort();
    logger.info('trip:cancel_requested', { tripId });
    return true;
  }

  /** Resolves once the trip has left the running state. */
  async waitForTrip(tripId: string): Promise<TripStatus | null> {
    await this.active.get(tripId)?.done;
    return this.getTripStatus(tripId);
  }

  /** Aborts every running trip and waits for them to settle. */
  async close(): Promise<void> {
    const runs = [...this.active.values()];
    for (const run of runs) run.controller.abort();
    await Promise.all(runs.map((r) => r.done));
  }

  /** Runs `fn` on the current record while no run or other change touches the trip. */
  private async exclusive<T>(tripId: string, fn: (record: TripRecord) => Promise<T>): Promise<T | NotFound | Busy> {
    if (this.active.has(tripId) || this.reserved.has(tripId)) {
      const record = await this.deps.store.get(tripId);
      return record ? { status: 'busy', state: record.state } : { status: 'not-found' };
    }
    this.reserved.add(tripId);
    try {
      const record = await this.deps.store.get(tripId);
      if (!record) return { status: 'not-found' };
      return await fn(record);
    } finally {
      this.reserved.delete(tripId);
    }
  }

  private restore(revision: TripRevision): Partial<TripRecord> {
    return {
      request: revision.request,
      state: revision.state,
      results: revision.results,
      verification: revision.verification,
      error: revision.error,
    };
  }

  private start(tripId: string, request: TripRequest, previous?: PreviousPass): void {
    const controller = new AbortController();
    const done = this.execute(tripId, request, controller.signal, previous)
      .catch((err) => {
        logger.error('trip:unrecorded_failure', { tripId, error: errorMessage(err) });
      })
      .finally(() => this.active.delete(tripId));
    this.active.set(tripId, { controller, done });
  }

  private async execute(
    tripId: string,
    request: TripRequest,
    signal: AbortSignal,
    previous: PreviousPass | undefined,
  ): Promise<void> {
    // Listener callbacks are synchronous; writes are chained so they land in order.
    let writes: Promise<unknown> = Promise.resolve();
    const enqueue = (patch: Partial<TripRecord>) => {
      writes = writes
        .then(() => this.patch(tripId, patch))
        .catch((err) => logger.error('trip:store_write_failed', { tripId, error: errorMessage(err) }));
    };

    const listener: OrchestratorListener = {
      onStateChange: (state) => {
        if (state === 'running') enqueue({ state });
      },
      onAgentResult: (_result, results) => enqueue({ results }),
    };

    try {
      const outcome = await this.deps.orchestrator.run(request, { signal, listener, previous });
      await writes;
      if (outcome.state === 'failed') {
        await this.patch(tripId, { state: 'failed', results: outcome.results, error: outcome.error });
        return;
      }
      await this.patch(tripId, {
        state: 'verified',
        results: outcome.results,
        verification: outcome.verification,
      });
      await this.patch(tripId, { state: 'done' });
      logger.info('trip:done', { tripId, score: outcome.verification.score });
    } catch (err) {
      await writes;
      logger.error('trip:run_error', { tripId, error: errorMessage(err) });
      await this.patch(tripId, { state: 'failed', error: errorMessage(err) });
    }
  }

  private async patch(tripId: string, patch: Partial<TripRecord>): Promise<void> {
    await this.deps.store.update(tripId, (record) => ({ ...record, ...patch, updatedAt: Date.now() }));
  }
}
