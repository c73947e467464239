// Tier 2: curated seed catalog. Synchronous lookups; an empty lookup is a miss.
import { placeKeyCandidates, routeKey } from '@/utils/normalize-key';
import type { CatalogStore, FlightRoute } from '../catalog/catalog-store';
import type {
  RetrievalCategory,
  RetrievalParams,
  RetrievalPayloads,
  RetrievalQuery,
  TierAttempt,
  TierStrategy,
} from '../retrieval-types';
import type { FlightOption } from '../schemas';

type CatalogHandlers = {
  [K in RetrievalCategory]: (params: RetrievalParams[K]) => RetrievalPayloads[K] | null;
};

function nonEmpty<T>(items: T[]): T[] | null {
  return items.length > 0 ? items : null;
}

/** Places a timetable route on a calendar date. Times are local, without offset. */
export function materializeRoute(
  route: FlightRoute,
  date: string,
  direction: FlightOption['direction'],
): FlightOption {
  const depart = new Date(`${date}T${route.departureTime}:00Z`);
  const arrive = new Date(depart.getTime() + route.durationHours * 3_600_000);
  return {
    airline: route.airline,
    flightNumber: route.flightNumber,
    from: route.fromAirport,
    to: route.toAirport,
    departTime: depart.toISOString().slice(0, 19),
    arriveTime: arrive.toISOString().slice(0, 19),
    durationHours: route.durationHours,
    price: route.price,
    stops: route.stops,
    cabin: route.cabin,
    direction,
  };
}

export class CatalogTier implements TierStrategy {
  readonly provenance = 'catalog' as const;
  private readonly handlers: CatalogHandlers;

  constructor(private readonly store: CatalogStore) {
    this.handlers = {
      destination: ({ city }) => this.store.lookup('destination', city)[0] ?? null,
      lodging: ({ city }) => nonEmpty([...this.store.lookup('lodging', city)]),
      dining: ({ city, cuisine }) => {
        const restaurants = [...this.store.lookup('dining', city)];
        if (restaurants.length === 0) return null;
        if (!cuisine) return restaurants;
        const wanted = cuisine.toLowerCase();
        const matches = (c: string) => c.toLowerCase().includes(wanted);
        return [
          ...restaurants.filter((r) => matches(r.cuisine)),
          ...restaurants.filter((r) => !matches(r.cuisine)),
        ];
      },
      transport: (p) => {
        const outbound = this.routes(p.origin, p.destination);
        const inbound = this.routes(p.destination, p.origin);
        const sameCabin = (routes: readonly FlightRoute[]) => {
          const matching = routes.filter((r) => r.cabin === p.cabin);
          return matching.length > 0 ? matching : routes;
        };
        return nonEmpty([
          ...sameCabin(outbound).map((r) => materializeRoute(r, p.departDate, 'outbound')),
          ...sameCabin(inbound).map((r) => materializeRoute(r, p.returnDate, 'return')),
        ]);
      },
    };
  }

  supports(): boolean {
    return true;
  }

  private routes(from: string, to: string): readonly FlightRoute[] {
    for (const origin of placeKeyCandidates(from)) {
      for (const destination of placeKeyCandidates(to)) {
        const found = this.store.lookup('transport', routeKey(origin, destination));
        if (found.length > 0) return found;
      }
    }
    return [];
  }

  async attempt<C extends RetrievalCategory>(query: RetrievalQuery<C>): Promise<TierAttempt<RetrievalPayloads[C]>> {
    const handler: CatalogHandlers[C] = this.handlers[query.category];
    const payload = handler(query.params);
    if (payload === null) return { status: 'miss', reason: 'not in catalog' };
    return { status: 'hit', payload };
  }
}
