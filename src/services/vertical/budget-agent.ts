import type { TripContextReader } from '@/services/trip-context';
import type { BudgetLineItem, TripRequest, TripResults } from '@/types/trip';
import { nights as countNights, tripDays } from '@/utils/dates';
import { BaseTripAgent, type AgentOutput } from './base-agent';
import { BUDGET_LINES, computeBudgetLines, roundMoney } from './budget-rules';
import { weakestProvenance } from './confidence';
import { parsePreferences } from './preferences';

function amountOf(items: readonly BudgetLineItem[], line: BudgetLineItem['line']): number {
  return items.find((i) => i.line === line)?.amount ?? 0;
}

/** Concrete ways to cut cost, most specific first. Always includes a shorter stay. */
export function downgradeSuggestions(
  request: TripRequest,
  results: TripResults,
  items: readonly BudgetLineItem[],
): string[] {
  const suggestions: string[] = [];
  const { lodging, transport, dining } = results;

  if (lodging?.status === 'ok') {
    const { selected, options, rooms, nights } = lodging.payload;
    const cheaper = options
      .filter((o) => o.pricePerNight < selected.pricePerNight)
      .sort((a, b) => a.pricePerNight - b.pricePerNight)[0];
    if (cheaper) {
      const saving = roundMoney((selected.pricePerNight - cheaper.pricePerNight) * rooms * nights);
      suggestions.push(`Stay at ${cheaper.name} instead of ${selected.name} to save about ${saving}`);
    }
  }

  // The cabin actually selected, which can differ from the requested one.
  const cabin = transport?.status === 'ok' ? transport.payload.selectedOutbound?.cabin : undefined;
  if (cabin !== undefined && cabin !== 'economy') {
    suggestions.push(`Fly economy instead of ${cabin} class`);
  }

  if (dining?.status === 'ok' && dining.payload.averageMealCost > 0) {
    const cheapest = [...dining.payload.restaurants].sort((a, b) => a.averageCostPerPerson - b.averageCostPerPerson)[0];
    if (cheapest && cheapest.averageCostPerPerson < dining.payload.averageMealCost) {
      suggestions.push(
        `Eat more meals at lower-cost places such as ${cheapest.name} (about ${cheapest.averageCostPerPerson} per person)`,
      );
    }
  }

  const activities = amountOf(items, 'activities');
  if (activities > 0) {
    suggestions.push(`Skip some paid attractions; entrance fees currently total ${activities}`);
  }

  const days = tripDays(request.startDate, request.endDate);
  const nights = Math.max(1, countNights(request.startDate, request.endDate));
  const nightly =
    lodging?.status === 'ok'
      ? lodging.payload.selected.pricePerNight * lodging.payload.rooms
      : amountOf(items, 'lodging') / nights;
  const dailyDining = amountOf(items, 'dining') / Math.max(1, days);
  suggestions.push(`Shorten the stay by one night to save about ${roundMoney(nightly + dailyDining)}`);

  return suggestions;
}

export class BudgetAgent extends BaseTripAgent<'budget'> {
  readonly category = 'budget' as const;

  protected async run(request: TripRequest, context: TripContextReader): Promise<AgentOutput<'budget'>> {
    const results = context.snapshot();
    const { items, total, warnings, provenances } = computeBudgetLines(request, results);
    const withinBudget = total <= request.budget;
    const { noDowngrades } = parsePreferences(request.preferences);

    let suggestions: string[] = [];
    if (!withinBudget) {
      warnings.push({
        severity: 'warning',
        message: `Estimated total ${total} exceeds the budget of ${request.budget} by ${roundMoney(total - request.budget)}`,
      });
      if (!noDowngrades) suggestions = downgradeSuggestions(request, results, items);
    }

    const fromAgents = items.filter((i) => i.source === 'agent').length;
    return {
      payload: {
        budget: request.budget,
        lineItems: items,
        total,
        withinBudget,
        remaining: roundMoney(request.budget - total),
        utilizationPercent: Math.round((total / request.budget) * 1000) / 10,
        suggestions,
      },
      provenance: weakestProvenance(provenances),
      completeness: fromAgents / BUDGET_LINES.length,
      warnings,
    };
  }
}
