import type { TripRecord } from '@/types/trip';

/** Persistence for trip records, keyed by trip id. */
export interface TripStore {
  get(tripId: string): Promise<TripRecord | null>;
  set(record: TripRecord): Promise<void>;
  /** Applies `patch` to an existing record; returns the updated record or null when absent. */
  update(tripId: string, patch: (record: TripRecord) => TripRecord): Promise<TripRecord | null>;
  delete(tripId: string): Promise<void>;
}
