// Domain types shared by the agents, the orchestrator, the verifier and the trip service.
import type { Provenance } from '@/services/providers/retrieval-types';
import type {
  Attraction,
  CabinClass,
  DestinationInfo,
  FlightOption,
  HotelOption,
  LodgingTier,
  Restaurant,
} from '@/services/providers/schemas';

export interface TripRequest {
  readonly destination: string;
  readonly origin?: string;
  /** YYYY-MM-DD, inclusive. */
  readonly startDate: string;
  /** YYYY-MM-DD, inclusive. */
  readonly endDate: string;
  readonly budget: number;
  readonly travelers: number;
  readonly preferences: readonly string[];
  readonly dietaryRestrictions: readonly string[];
}

export const INDEPENDENT_CATEGORIES = ['destination', 'lodging', 'dining', 'transport'] as const;
export const DEPENDENT_CATEGORIES = ['budget', 'itinerary'] as const;

export type IndependentCategory = (typeof INDEPENDENT_CATEGORIES)[number];
export type DependentCategory = (typeof DEPENDENT_CATEGORIES)[number];
export type AgentCategory = IndependentCategory | DependentCategory;

export const AGENT_CATEGORIES: readonly AgentCategory[] = [...INDEPENDENT_CATEGORIES, ...DEPENDENT_CATEGORIES];

export function isAgentCategory(value: string): value is AgentCategory {
  return AGENT_CATEGORIES.some((c) => c === value);
}

export type Severity = 'info' | 'warning' | 'error';

export interface AgentWarning {
  severity: Severity;
  message: string;
}

export type Pace = 'relaxed' | 'moderate' | 'packed';

// ── Payloads ─────────────────────────────────────────────────

export interface DestinationPayload {
  destination: DestinationInfo;
  /** Interest matches first, capped at the recommended count. */
  attractions: readonly Attraction[];
  recommendedCount: number;
}

export interface LodgingPayload {
  selected: HotelOption;
  options: readonly HotelOption[];
  tier: LodgingTier;
  rooms: number;
  nights: number;
  /** rooms × nights × pricePerNight of the selected hotel. */
  totalCost: number;
  subBudget: number;
  withinSubBudget: boolean;
}

export interface DiningPayload {
  restaurants: readonly Restaurant[];
  /** Restaurants dropped for a dietary conflict. */
  excluded: readonly string[];
  averageMealCost: number;
  mealsPerDay: number;
  estimatedCost: number;
}

export interface TransportPayload {
  /** False when there was no origin to fly from; nothing was retrieved. */
  planned: boolean;
  /** Cabin the trip's tier asks for. */
  requestedCabin: CabinClass;
  /** Cabin of the selected outbound flight; the requested one when nothing was selected. */
  cabin: CabinClass;
  outbound: readonly FlightOption[];
  inbound: readonly FlightOption[];
  selectedOutbound: FlightOption | null;
  selectedInbound: FlightOption | null;
  /** True when return legs were derived from the outbound ones. */
  mirroredReturn: boolean;
  totalCost: number;
  subBudget: number;
}

export type BudgetLine = 'lodging' | 'dining' | 'transport' | 'activities';

export interface BudgetLineItem {
  line: BudgetLine;
  amount: number;
  source: 'agent' | 'default';
}

export interface BudgetPayload {
  budget: number;
  lineItems: readonly BudgetLineItem[];
  total: number;
  withinBudget: boolean;
  remaining: number;
  utilizationPercent: number;
  suggestions: readonly string[];
}

export interface ScheduledAttraction {
  name: string;
  type: string;
  durationHours: number;
  entranceFee: number;
}

export interface ItineraryDay {
  day: number;
  date: string;
  attractions: readonly ScheduledAttraction[];
  lunch: string | null;
  dinner: string | null;
  notes: readonly string[];
  isRestDay: boolean;
}

export interface ItineraryPayload {
  pace: Pace;
  days: readonly ItineraryDay[];
}

export interface AgentPayloads {
  destination: DestinationPayload;
  lodging: LodgingPayload;
  dining: DiningPayload;
  transport: TransportPayload;
  budget: BudgetPayload;
  itinerary: ItineraryPayload;
}

// ── Results ──────────────────────────────────────────────────

export interface AgentSuccess<C extends AgentCategory> {
  readonly category: C;
  readonly status: 'ok';
  readonly payload: AgentPayloads[C];
  readonly provenance: Provenance;
  /** 0–100. */
  readonly confidence: number;
  readonly caveats: readonly string[];
  readonly warnings: readonly AgentWarning[];
  readonly durationMs: number;
}

export interface AgentFailure<C extends AgentCategory> {
  readonly category: C;
  readonly status: 'failed';
  readonly payload: null;
  readonly provenance: null;
  readonly confidence: 0;
  readonly caveats: readonly string[];
  readonly warnings: readonly AgentWarning[];
  readonly durationMs: number;
  readonly error: string;
}

export type AgentResult<C extends AgentCategory = AgentCategory> = {
  [K in C]: AgentSuccess<K> | AgentFailure<K>;
}[C];

export type TripResults = { readonly [K in AgentCategory]?: AgentResult<K> };

// ── Verification ─────────────────────────────────────────────

export type VerificationCheck = 'budget' | 'itinerary' | 'provenance' | 'consistency' | 'data-quality';

export interface VerificationIssue {
  severity: Severity;
  check: VerificationCheck;
  category?: AgentCategory;
  message: string;
}

export interface BudgetCheck {
  budget: number;
  recomputedTotal: number;
  reportedTotal: number | null;
  tolerance: number;
}

export interface VerificationResult {
  /** 0–100. */
  score: number;
  passed: boolean;
  issues: readonly VerificationIssue[];
  budgetCheck: BudgetCheck;
  summary: string;
}

// ── Trip records ─────────────────────────────────────────────

export type TripState = 'created' | 'running' | 'verified' | 'done' | 'failed';

/** A settled version of a trip, kept so a modification can be undone. */
export interface TripRevision {
  request: TripRequest;
  state: TripState;
  results: TripResults;
  verification?: VerificationResult;
  error?: string;
}

export interface TripRecord extends TripRevision {
  tripId: string;
  /** Versions replaced by modifications, oldest first. */
  history: readonly TripRevision[];
  /** Versions taken back by undo since the last modification, most recently undone last. */
  undone: readonly TripRevision[];
  createdAt: number;
  updatedAt: number;
}

export interface TripStatus {
  tripId: string;
  state: TripState;
  request: TripRequest;
  results: TripResults;
  verification?: VerificationResult;
  error?: string;
  /** Number of modifications behind the current version. */
  revision: number;
  canUndo: boolean;
  canRedo: boolean;
}
