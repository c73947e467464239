import type { CabinClass, FlightOption, LodgingTier } from '@/services/providers/schemas';
import type { TripContextReader } from '@/services/trip-context';
import type { AgentWarning, TripRequest } from '@/types/trip';
import { BaseTripAgent, type AgentOutput } from './base-agent';
import { TRANSPORT_BUDGET_SHARE, roundMoney } from './budget-rules';
import { parsePreferences } from './preferences';

export const MAX_FLIGHTS_PER_DIRECTION = 3;

export function cabinForTier(tier: LodgingTier): CabinClass {
  return tier === 'luxury' ? 'business' : 'economy';
}

/** Price ascending, shorter first on ties. */
export function rankFlights(flights: readonly FlightOption[]): FlightOption[] {
  return [...flights].sort((a, b) => a.price - b.price || a.durationHours - b.durationHours);
}

function onDate(isoDateTime: string, date: string): string {
  return `${date}${isoDateTime.slice(10)}`;
}

/** Return legs derived from an outbound one: reversed airports, same clock time on the return date. */
export function mirrorFlight(flight: FlightOption, returnDate: string): FlightOption {
  const depart = onDate(flight.departTime, returnDate);
  const departMs = Date.parse(`${depart.slice(0, 19)}Z`);
  const arrive = Number.isNaN(departMs)
    ? depart
    : new Date(departMs + flight.durationHours * 3_600_000).toISOString().slice(0, 19);
  return {
    ...flight,
    from: flight.to,
    to: flight.from,
    departTime: depart,
    arriveTime: arrive,
    direction: 'return',
  };
}

export class TransportAgent extends BaseTripAgent<'transport'> {
  readonly category = 'transport' as const;

  protected async run(
    request: TripRequest,
    _context: TripContextReader,
    signal?: AbortSignal,
  ): Promise<AgentOutput<'transport'>> {
    const prefs = parsePreferences(request.preferences);
    const requestedCabin = cabinForTier(prefs.lodgingTier);
    const subBudget = roundMoney(request.budget * TRANSPORT_BUDGET_SHARE);

    if (!request.origin) {
      return {
        payload: {
          planned: false,
          requestedCabin,
          cabin: requestedCabin,
          outbound: [],
          inbound: [],
          selectedOutbound: null,
          selectedInbound: null,
          mirroredReturn: false,
          totalCost: 0,
          subBudget,
        },
        provenance: 'catalog',
        completeness: 0,
        warnings: [{ severity: 'info', message: 'No origin given; transport to the destination is not planned' }],
      };
    }

    const { payload, provenance, caveats } = await this.retrieve(
      {
        category: 'transport',
        params: {
          origin: request.origin,
          destination: request.destination,
          departDate: request.startDate,
          returnDate: request.endDate,
          travelers: request.travelers,
          cabin: requestedCabin,
        },
      },
      signal,
    );
    const warnings: AgentWarning[] = [];

    const outbound = rankFlights(payload.filter((f) => f.direction === 'outbound')).slice(0, MAX_FLIGHTS_PER_DIRECTION);
    let inbound = rankFlights(payload.filter((f) => f.direction === 'return')).slice(0, MAX_FLIGHTS_PER_DIRECTION);
    let mirroredReturn = false;
    if (inbound.length === 0 && outbound.length > 0) {
      inbound = outbound.map((f) => mirrorFlight(f, request.endDate));
      mirroredReturn = true;
      warnings.push({
        severity: 'info',
        message: 'No return flights found; return options mirror the outbound flights',
      });
    }
    if (outbound.length === 0) {
      warnings.push({ severity: 'warning', message: `No outbound flights found from ${request.origin}` });
    }

    const selectedOutbound = outbound[0] ?? null;
    const selectedInbound = inbound[0] ?? null;
    const cabin = selectedOutbound?.cabin ?? requestedCabin;
    if (cabin !== requestedCabin) {
      warnings.push({
        severity: 'info',
        message: `No ${requestedCabin} fares found; selected ${cabin} class instead`,
      });
    }
    const perTraveler = (selectedOutbound?.price ?? 0) + (selectedInbound?.price ?? 0);
    const totalCost = roundMoney(perTraveler * request.travelers);
    if (totalCost > subBudget) {
      warnings.push({
        severity: 'warning',
        message: `Flights cost ${totalCost}, above the transport budget of ${subBudget}`,
      });
    }

    return {
      payload: {
        planned: true,
        requestedCabin,
        cabin,
        outbound,
        inbound,
        selectedOutbound,
        selectedInbound,
        mirroredReturn,
        totalCost,
        subBudget,
      },
      provenance,
      completeness: outbound.length / MAX_FLIGHTS_PER_DIRECTION,
      caveats,
      warnings,
    };
  }
}
