// src/services/trip-context.ts: per-run arena of agent results, one slot per category
import { ContextWriteError } from '@/services/errors';
import type { AgentCategory, AgentResult, TripResults } from '@/types/trip';

/** Read side handed to agents. Absent keys mean the upstream agent has not run or did not record. */
export interface TripContextReader {
  get<C extends AgentCategory>(category: C): AgentResult<C> | undefined;
  snapshot(): TripResults;
}

function isResultFor<C extends AgentCategory>(result: AgentResult, category: C): result is AgentResult<C> {
  return result.category === category;
}

export class TripContext implements TripContextReader {
  private readonly slots: Partial<Record<AgentCategory, AgentResult>> = {};

  /** A context holding `keep` from an earlier run's results; the other slots stay open. */
  static seeded(results: TripResults, keep: readonly AgentCategory[]): TripContext {
    const context = new TripContext();
    for (const category of keep) {
      const result = results[category];
      if (result) context.record(result);
    }
    return context;
  }

  /** Write-once per category; a second write throws ContextWriteError. */
  record(result: AgentResult): void {
    if (this.slots[result.category] !== undefined) throw new ContextWriteError(result.category);
    this.slots[result.category] = result;
  }

  has(category: AgentCategory): boolean {
    return this.slots[category] !== undefined;
  }

  get<C extends AgentCategory>(category: C): AgentResult<C> | undefined {
    const result = this.slots[category];
    return result && isResultFor(result, category) ? result : undefined;
  }

  snapshot(): TripResults {
    return Object.freeze({
      destination: this.get('destination'),
      lodging: this.get('lodging'),
      dining: this.get('dining'),
      transport: this.get('transport'),
      budget: this.get('budget'),
      itinerary: this.get('itinerary'),
    });
  }
}

/** A context that never holds anything, for running one agent in isolation. */
export function emptyContext(): TripContextReader {
  return new TripContext();
}
