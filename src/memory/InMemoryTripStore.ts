import { logger } from '@/services/logger';
import type { TripRecord } from '@/types/trip';
import type { TripStore } from './TripStore';

interface TripEntry {
  record: TripRecord;
  timestamp: number;
}

const CLEANUP_INTERVAL_MS = 5 * 60 * 1000;

export class InMemoryTripStore implements TripStore {
  private memory = new Map<string, TripEntry>();
  private readonly ttl: number;
  private readonly maxTrips: number;
  private cleanupInterval: NodeJS.Timeout | null = null;

  constructor(ttlMinutes: number = 120, maxTrips: number = 1000) {
    this.ttl = ttlMinutes * 60 * 1000;
    this.maxTrips = maxTrips;
    this.startCleanupInterval();
  }

  private startCleanupInterval(): void {
    this.cleanupInterval = setInterval(() => this.cleanupExpiredTrips(), CLEANUP_INTERVAL_MS);
    // Never keeps the process alive on its own.
    this.cleanupInterval.unref();
  }

  private cleanupExpiredTrips(): void {
    const now = Date.now();
    let cleaned = 0;

    for (const [tripId, entry] of this.memory) {
      if (now - entry.timestamp > this.ttl) {
        this.memory.delete(tripId);
        cleaned++;
      }
    }

    // Over capacity: drop the oldest fifth.
    if (this.memory.size >= this.maxTrips) {
      const oldest = [...this.memory]
        .sort(([, a], [, b]) => a.timestamp - b.timestamp)
        .slice(0, Math.max(1, Math.floor(this.memory.size * 0.2)));
      for (const [tripId] of oldest) {
        this.memory.delete(tripId);
        cleaned++;
      }
    }

    if (cleaned > 0) {
      logger.debug('trip-store:cleanup', { cleaned, remaining: this.memory.size });
    }
  }

  async get(tripId: string): Promise<TripRecord | null> {
    const entry = this.memory.get(tripId);
    if (!entry) return null;
    if (Date.now() - entry.timestamp > this.ttl) {
      this.memory.delete(tripId);
      return null;
    }
    return entry.record;
  }

  async set(record: TripRecord): Promise<void> {
    if (!this.memory.has(record.tripId)) this.cleanupExpiredTrips();
    this.memory.set(record.tripId, { record, timestamp: Date.now() });
  }

  async update(tripId: string, patch: (record: TripRecord) => TripRecord): Promise<TripRecord | null> {
    const current = await this.get(tripId);
    if (!current) return null;
    const next = patch(current);
    this.memory.set(tripId, { record: next, timestamp: Date.now() });
    return next;
  }

  async delete(tripId: string): Promise<void> {
    this.memory.delete(tripId);
  }

  close(): void {
    if (this.cleanupInterval) {
      clearInterval(this.cleanupInterval);
      this.cleanupInterval = null;
    }
  }
}
