import type { Attraction } from '@/services/providers/schemas';
import type { TripContextReader } from '@/services/trip-context';
import type { AgentWarning, TripRequest } from '@/types/trip';
import { tripDays } from '@/utils/dates';
import { BaseTripAgent, type AgentOutput } from './base-agent';
import { matchesInterest, parsePreferences } from './preferences';

/** How many attractions to propose for a trip of `days` days. */
export function recommendedAttractionCount(days: number): number {
  if (days <= 2) return 5;
  if (days <= 4) return 8;
  if (days <= 7) return 12;
  return 15;
}

/** Interest matches first; original order kept within each group. */
export function rankAttractions(attractions: readonly Attraction[], interests: readonly string[]): Attraction[] {
  const matched: Attraction[] = [];
  const rest: Attraction[] = [];
  for (const a of attractions) {
    (matchesInterest(interests, a.name, a.type, a.description) ? matched : rest).push(a);
  }
  return [...matched, ...rest];
}

export class DestinationAgent extends BaseTripAgent<'destination'> {
  readonly category = 'destination' as const;

  protected async run(
    request: TripRequest,
    _context: TripContextReader,
    signal?: AbortSignal,
  ): Promise<AgentOutput<'destination'>> {
    const { payload, provenance, caveats } = await this.retrieve(
      { category: 'destination', params: { city: request.destination } },
      signal,
    );
    const { interests } = parsePreferences(request.preferences);
    const recommendedCount = recommendedAttractionCount(tripDays(request.startDate, request.endDate));
    const attractions = rankAttractions(payload.attractions, interests).slice(0, recommendedCount);

    const warnings: AgentWarning[] = [];
    if (attractions.length < recommendedCount) {
      warnings.push({
        severity: 'info',
        message: `Found ${attractions.length} of ${recommendedCount} recommended attractions for ${payload.destination.name}`,
      });
    }

    return {
      payload: { destination: payload.destination, attractions, recommendedCount },
      provenance,
      completeness: attractions.length / recommendedCount,
      caveats,
      warnings,
    };
  }
}
