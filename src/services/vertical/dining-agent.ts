import { UnsatisfiableRequestError } from '@/services/errors';
import type { Restaurant } from '@/services/providers/schemas';
import type { TripContextReader } from '@/services/trip-context';
import type { AgentWarning, TripRequest } from '@/types/trip';
import { tripDays } from '@/utils/dates';
import { BaseTripAgent, type AgentOutput } from './base-agent';
import { roundMoney } from './budget-rules';
import { matchesInterest, parsePreferences } from './preferences';

export const MAX_RESTAURANTS = 6;
export const MEALS_PER_DAY = 3;

const MEAT = ['steakhouse', 'steak', 'bbq', 'barbecue', 'meat', 'chicken', 'pork', 'lamb', 'seafood', 'fish', 'sushi'];

/** Keywords that rule a restaurant out for a hard restriction. */
export const DIETARY_CONFLICTS: Record<string, readonly string[]> = {
  vegetarian: MEAT,
  vegan: [...MEAT, 'dairy', 'cheese', 'cream', 'bakery'],
  halal: ['pork', 'bacon', 'alcohol', 'wine bar', 'beer hall', 'suckling pig'],
  kosher: ['pork', 'bacon', 'shellfish', 'prawn', 'shrimp', 'crab', 'lobster'],
  'gluten-free': ['pasta', 'pizza', 'bakery', 'ramen'],
};

/** The restriction it conflicts with, or null. Listing the restriction as an option overrides keywords. */
export function dietaryConflict(restaurant: Restaurant, restrictions: readonly string[]): string | null {
  const offered = restaurant.dietaryOptions.map((o) => o.toLowerCase());
  const text = [restaurant.name, restaurant.cuisine, restaurant.description, ...restaurant.specialties]
    .join(' ')
    .toLowerCase();
  for (const restriction of restrictions) {
    const r = restriction.toLowerCase();
    if (offered.includes(r)) continue;
    const keywords = DIETARY_CONFLICTS[r] ?? [];
    if (keywords.some((k) => text.includes(k))) return r;
  }
  return null;
}

/**
 * Best-rated restaurant of each cuisine first (interest cuisines ahead),
 * then the remaining ones by rating, up to `max`.
 */
export function diversifyByCuisine(
  restaurants: readonly Restaurant[],
  interests: readonly string[],
  max = MAX_RESTAURANTS,
): Restaurant[] {
  const byRating = [...restaurants].sort((a, b) => b.rating - a.rating);
  const seen = new Set<string>();
  const leaders: Restaurant[] = [];
  const rest: Restaurant[] = [];
  for (const r of byRating) {
    const cuisine = r.cuisine.toLowerCase();
    if (seen.has(cuisine)) {
      rest.push(r);
    } else {
      seen.add(cuisine);
      leaders.push(r);
    }
  }
  const interesting = (r: Restaurant) => matchesInterest(interests, r.cuisine, ...r.specialties);
  const orderedLeaders = [...leaders.filter(interesting), ...leaders.filter((r) => !interesting(r))];
  return [...orderedLeaders, ...rest].slice(0, max);
}

export class DiningAgent extends BaseTripAgent<'dining'> {
  readonly category = 'dining' as const;

  protected async run(
    request: TripRequest,
    _context: TripContextReader,
    signal?: AbortSignal,
  ): Promise<AgentOutput<'dining'>> {
    const { payload, provenance, caveats } = await this.retrieve(
      { category: 'dining', params: { city: request.destination, count: MAX_RESTAURANTS + 2 } },
      signal,
    );
    const { interests } = parsePreferences(request.preferences);
    const warnings: AgentWarning[] = [];

    const excluded: string[] = [];
    const compatible = payload.filter((r) => {
      if (dietaryConflict(r, request.dietaryRestrictions) === null) return true;
      excluded.push(r.name);
      return false;
    });
    if (excluded.length > 0) {
      warnings.push({
        severity: 'info',
        message: `Excluded ${excluded.length} restaurant(s) for dietary restrictions: ${excluded.join(', ')}`,
      });
    }
    if (compatible.length === 0) {
      throw new UnsatisfiableRequestError(
        `No restaurants in ${request.destination} match the dietary restrictions: ` +
          `${request.dietaryRestrictions.join(', ')} (excluded ${excluded.join(', ')})`,
      );
    }

    const restaurants = diversifyByCuisine(compatible, interests);
    const averageMealCost =
      restaurants.length > 0
        ? roundMoney(restaurants.reduce((sum, r) => sum + r.averageCostPerPerson, 0) / restaurants.length)
        : 0;
    const days = tripDays(request.startDate, request.endDate);

    return {
      payload: {
        restaurants,
        excluded,
        averageMealCost,
        mealsPerDay: MEALS_PER_DAY,
        estimatedCost: roundMoney(averageMealCost * MEALS_PER_DAY * days * request.travelers),
      },
      provenance,
      completeness: restaurants.length / MAX_RESTAURANTS,
      caveats,
      warnings,
    };
  }
}
