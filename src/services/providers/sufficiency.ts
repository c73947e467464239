// Completeness predicates: a tier's output is only accepted when it passes these.
import type { RetrievalCategory, RetrievalPayloads } from './retrieval-types';

type SufficiencyTable = { [K in RetrievalCategory]: (payload: RetrievalPayloads[K]) => boolean };

const SUFFICIENCY: SufficiencyTable = {
  destination: (d) => d.attractions.length >= 1,
  lodging: (hotels) => hotels.length >= 1,
  dining: (restaurants) => restaurants.length >= 1,
  transport: (flights) => flights.length >= 1,
};

export function isSufficient<C extends RetrievalCategory>(
  category: C,
  payload: RetrievalPayloads[C],
): boolean {
  const check: (payload: RetrievalPayloads[C]) => boolean = SUFFICIENCY[category];
  return check(payload);
}
