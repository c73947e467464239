import type { HotelOption } from '@/services/providers/schemas';
import type { TripContextReader } from '@/services/trip-context';
import type { AgentWarning, TripRequest } from '@/types/trip';
import { nights as countNights } from '@/utils/dates';
import { BaseTripAgent, type AgentOutput } from './base-agent';
import { LODGING_BUDGET_SHARE } from './budget-rules';
import { parsePreferences } from './preferences';

export const MAX_LODGING_OPTIONS = 5;

export function roomsFor(travelers: number): number {
  return Math.ceil(travelers / 2);
}

/** Rating descending, cheaper first on ties. */
function byRatingThenPrice(a: HotelOption, b: HotelOption): number {
  return b.rating - a.rating || a.pricePerNight - b.pricePerNight;
}

export class LodgingAgent extends BaseTripAgent<'lodging'> {
  readonly category = 'lodging' as const;

  protected async run(
    request: TripRequest,
    _context: TripContextReader,
    signal?: AbortSignal,
  ): Promise<AgentOutput<'lodging'>> {
    const { payload: hotels, provenance, caveats } = await this.retrieve(
      { category: 'lodging', params: { city: request.destination, count: MAX_LODGING_OPTIONS } },
      signal,
    );
    const prefs = parsePreferences(request.preferences);
    const rooms = roomsFor(request.travelers);
    const nights = countNights(request.startDate, request.endDate);
    const subBudget = Math.round(request.budget * LODGING_BUDGET_SHARE * 100) / 100;
    const cost = (h: HotelOption) => rooms * nights * h.pricePerNight;
    const warnings: AgentWarning[] = [];

    const inTier = hotels.filter((h) => h.tier === prefs.lodgingTier);
    if (prefs.lodgingTierRequested && inTier.length === 0) {
      warnings.push({ severity: 'info', message: `No ${prefs.lodgingTier} hotels found; considered all tiers` });
    }
    const pool = inTier.length > 0 ? inTier : [...hotels];

    const affordable = pool.filter((h) => cost(h) <= subBudget).sort(byRatingThenPrice);
    let selected = affordable[0];
    if (!selected) {
      selected = [...pool].sort((a, b) => a.pricePerNight - b.pricePerNight || b.rating - a.rating)[0];
      if (selected) {
        warnings.push({
          severity: 'warning',
          message: `No hotel fits the lodging budget of ${subBudget}; selected the cheapest option (${selected.name}, ${cost(selected)})`,
        });
      }
    }
    if (!selected) throw new Error('no hotels returned');

    const chosen = selected;
    // Requested tier first, then the rest, each by rating.
    const sameTier = pool.filter((h) => h !== chosen).sort(byRatingThenPrice);
    const otherTiers = hotels.filter((h) => !pool.includes(h)).sort(byRatingThenPrice);
    const options = [chosen, ...sameTier, ...otherTiers].slice(0, MAX_LODGING_OPTIONS);
    const totalCost = cost(chosen);

    return {
      payload: {
        selected: chosen,
        options,
        tier: prefs.lodgingTier,
        rooms,
        nights,
        totalCost,
        subBudget,
        withinSubBudget: totalCost <= subBudget,
      },
      provenance,
      completeness: options.length / MAX_LODGING_OPTIONS,
      caveats,
      warnings,
    };
  }
}
