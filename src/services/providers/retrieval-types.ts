// Shared retrieval types for the tiered data layer
import type {
  CabinClass,
  DestinationData,
  FlightOption,
  HotelOption,
  Restaurant,
} from './schemas';

/** Which tier produced a result. Ordered from most to least trusted. */
export type Provenance = 'live-api' | 'catalog' | 'generated';

export const TIER_ORDER: readonly Provenance[] = ['live-api', 'catalog', 'generated'];

export const GENERATED_CAVEAT = 'Unverified, AI-generated data: please confirm before booking.';

export interface RetrievalParams {
  destination: { city: string };
  lodging: { city: string; count: number };
  dining: { city: string; count: number; cuisine?: string };
  transport: {
    origin: string;
    destination: string;
    departDate: string; // YYYY-MM-DD
    returnDate: string; // YYYY-MM-DD
    travelers: number;
    cabin: CabinClass;
  };
}

export interface RetrievalPayloads {
  destination: DestinationData;
  lodging: HotelOption[];
  dining: Restaurant[];
  transport: FlightOption[];
}

export type RetrievalCategory = keyof RetrievalPayloads;

export const RETRIEVAL_CATEGORIES: readonly RetrievalCategory[] = [
  'destination',
  'lodging',
  'dining',
  'transport',
];

export interface RetrievalQuery<C extends RetrievalCategory = RetrievalCategory> {
  category: C;
  params: RetrievalParams[C];
}

export interface RetrievalResult<T> {
  readonly payload: T;
  readonly provenance: Provenance;
  readonly caveats: readonly string[];
}

/** What one tier reports back to the chain walker. */
export type TierAttempt<T> =
  | { status: 'hit'; payload: T }
  | { status: 'miss'; reason: string }
  | { status: 'error'; reason: string };

export interface TierTrace {
  tier: Provenance;
  status: 'hit' | 'insufficient' | 'miss' | 'error' | 'skipped';
  reason?: string;
}

export interface RetrievalFailure {
  category: RetrievalCategory;
  reason: 'exhausted' | 'cancelled';
  message: string;
  trace: TierTrace[];
}

export type RetrievalOutcome<T> =
  | { success: true; result: RetrievalResult<T>; trace: TierTrace[] }
  | { success: false; failure: RetrievalFailure };

export interface TierStrategy {
  readonly provenance: Provenance;
  supports(category: RetrievalCategory): boolean;
  attempt<C extends RetrievalCategory>(
    query: RetrievalQuery<C>,
    signal?: AbortSignal,
  ): Promise<TierAttempt<RetrievalPayloads[C]>>;
}
