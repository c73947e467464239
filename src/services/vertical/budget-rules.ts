// Budget arithmetic shared by the budget agent and the verifier's independent recompute.
import type { Provenance } from '@/services/providers/retrieval-types';
import type { Attraction } from '@/services/providers/schemas';
import type {
  AgentWarning,
  BudgetLine,
  BudgetLineItem,
  Pace,
  TripRequest,
  TripResults,
} from '@/types/trip';
import { tripDays } from '@/utils/dates';
import { ATTRACTIONS_PER_DAY, parsePreferences } from './preferences';

export const LODGING_BUDGET_SHARE = 0.3;
export const DINING_BUDGET_SHARE = 0.2;
export const TRANSPORT_BUDGET_SHARE = 0.35;
export const ACTIVITIES_BUDGET_SHARE = 0.1;

/** Share of the total budget assumed for a line whose agent produced nothing. */
export const DEFAULT_BUDGET_SHARES: Record<BudgetLine, number> = {
  lodging: LODGING_BUDGET_SHARE,
  dining: DINING_BUDGET_SHARE,
  transport: TRANSPORT_BUDGET_SHARE,
  activities: ACTIVITIES_BUDGET_SHARE,
};

export const BUDGET_LINES: readonly BudgetLine[] = ['lodging', 'dining', 'transport', 'activities'];

export function roundMoney(value: number): number {
  return Math.round(value * 100) / 100;
}

/** Attractions the itinerary can fit: one slot per day per pace step. */
export function scheduledAttractionLimit(days: number, pace: Pace): number {
  return Math.max(0, days) * ATTRACTIONS_PER_DAY[pace];
}

/** Entrance fees of the attractions that will be scheduled, for every traveler. */
export function activitiesCost(attractions: readonly Attraction[], request: TripRequest): number {
  const { pace } = parsePreferences(request.preferences);
  const limit = scheduledAttractionLimit(tripDays(request.startDate, request.endDate), pace);
  const fees = attractions.slice(0, limit).reduce((sum, a) => sum + a.entranceFee, 0);
  return roundMoney(fees * request.travelers);
}

export interface BudgetLines {
  items: BudgetLineItem[];
  total: number;
  warnings: AgentWarning[];
  /** Provenance of every upstream result that contributed an amount. */
  provenances: Provenance[];
}

export function computeBudgetLines(request: TripRequest, results: TripResults): BudgetLines {
  const amounts: Partial<Record<BudgetLine, number>> = {};
  const provenances: Provenance[] = [];

  const { lodging, dining, transport, destination } = results;
  if (lodging?.status === 'ok') {
    amounts.lodging = lodging.payload.totalCost;
    provenances.push(lodging.provenance);
  }
  if (dining?.status === 'ok') {
    amounts.dining = dining.payload.estimatedCost;
    provenances.push(dining.provenance);
  }
  if (transport?.status === 'ok') {
    amounts.transport = transport.payload.totalCost;
    if (transport.payload.planned) provenances.push(transport.provenance);
  }
  if (destination?.status === 'ok') {
    amounts.activities = activitiesCost(destination.payload.attractions, request);
    provenances.push(destination.provenance);
  }

  const warnings: AgentWarning[] = [];
  const items = BUDGET_LINES.map((line): BudgetLineItem => {
    const amount = amounts[line];
    if (amount !== undefined) return { line, amount: roundMoney(amount), source: 'agent' };
    const share = DEFAULT_BUDGET_SHARES[line];
    warnings.push({
      severity: 'warning',
      message: `No ${line} estimate available; assuming ${Math.round(share * 100)}% of the budget`,
    });
    return { line, amount: roundMoney(request.budget * share), source: 'default' };
  });

  const total = roundMoney(items.reduce((sum, i) => sum + i.amount, 0));
  return { items, total, warnings, provenances };
}
