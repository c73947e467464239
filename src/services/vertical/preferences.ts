// Free-form preference tags → the knobs the agents read.
import { LODGING_TIERS, type LodgingTier } from '@/services/providers/schemas';
import type { Pace } from '@/types/trip';

export interface TripPreferences {
  pace: Pace;
  lodgingTier: LodgingTier;
  /** True when a lodging tier tag was given rather than defaulted. */
  lodgingTierRequested: boolean;
  noDowngrades: boolean;
  interests: string[];
}

const PACES: readonly Pace[] = ['relaxed', 'moderate', 'packed'];

export const ATTRACTIONS_PER_DAY: Record<Pace, number> = {
  relaxed: 1,
  moderate: 2,
  packed: 3,
};

function isPace(tag: string): tag is Pace {
  return PACES.some((p) => p === tag);
}

function isLodgingTier(tag: string): tag is LodgingTier {
  return LODGING_TIERS.some((t) => t === tag);
}

export function parsePreferences(tags: readonly string[]): TripPreferences {
  const prefs: TripPreferences = {
    pace: 'moderate',
    lodgingTier: 'mid-range',
    lodgingTierRequested: false,
    noDowngrades: false,
    interests: [],
  };
  for (const raw of tags) {
    const tag = raw.trim().toLowerCase();
    if (!tag) continue;
    if (isPace(tag)) prefs.pace = tag;
    else if (isLodgingTier(tag)) {
      prefs.lodgingTier = tag;
      prefs.lodgingTierRequested = true;
    } else if (tag === 'no-downgrades') prefs.noDowngrades = true;
    else prefs.interests.push(tag);
  }
  return prefs;
}

/** Case-insensitive: does any interest occur in any of `fields`? */
export function matchesInterest(interests: readonly string[], ...fields: string[]): boolean {
  if (interests.length === 0) return false;
  const text = fields.join(' ').toLowerCase();
  return interests.some((i) => text.includes(i));
}
