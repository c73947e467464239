import type { Provenance } from '@/services/providers/retrieval-types';
import type { Attraction } from '@/services/providers/schemas';
import type { TripContextReader } from '@/services/trip-context';
import type { AgentWarning, ItineraryDay, TripRequest } from '@/types/trip';
import { datesInRange } from '@/utils/dates';
import { BaseTripAgent, type AgentOutput } from './base-agent';
import { weakestProvenance } from './confidence';
import { ATTRACTIONS_PER_DAY, parsePreferences } from './preferences';

function clockTime(isoDateTime: string): string {
  return isoDateTime.slice(11, 16);
}

export class ItineraryAgent extends BaseTripAgent<'itinerary'> {
  readonly category = 'itinerary' as const;

  protected async run(request: TripRequest, context: TripContextReader): Promise<AgentOutput<'itinerary'>> {
    const { pace } = parsePreferences(request.preferences);
    const perDay = ATTRACTIONS_PER_DAY[pace];
    const warnings: AgentWarning[] = [];
    const provenances: Provenance[] = [];

    const destination = context.get('destination');
    const dining = context.get('dining');
    const lodging = context.get('lodging');
    const transport = context.get('transport');

    let attractions: readonly Attraction[] = [];
    if (destination?.status === 'ok') {
      attractions = destination.payload.attractions;
      provenances.push(destination.provenance);
    } else {
      warnings.push({ severity: 'warning', message: 'No destination data; days are left unscheduled' });
    }

    let restaurants: readonly string[] = [];
    if (dining?.status === 'ok') {
      restaurants = dining.payload.restaurants.map((r) => r.name);
      provenances.push(dining.provenance);
    } else {
      warnings.push({ severity: 'warning', message: 'No dining data; meals are not planned' });
    }

    let hotel: string | null = null;
    if (lodging?.status === 'ok') {
      hotel = lodging.payload.selected.name;
      provenances.push(lodging.provenance);
    }
    const arrival = transport?.status === 'ok' ? transport.payload.selectedOutbound : null;
    const departure = transport?.status === 'ok' ? transport.payload.selectedInbound : null;

    const dates = datesInRange(request.startDate, request.endDate);
    const last = dates.length - 1;
    const meal = (slot: number) => (restaurants.length > 0 ? restaurants[slot % restaurants.length] ?? null : null);

    const days = dates.map((date, i): ItineraryDay => {
      const scheduled = attractions.slice(i * perDay, (i + 1) * perDay).map((a) => ({
        name: a.name,
        type: a.type,
        durationHours: a.estimatedDurationHours,
        entranceFee: a.entranceFee,
      }));
      const notes: string[] = [];
      if (i === 0) {
        if (arrival) notes.push(`Arrive on ${arrival.flightNumber} at ${clockTime(arrival.arriveTime)}`);
        notes.push(hotel ? `Check in at ${hotel}` : 'Check in at your accommodation');
      }
      if (scheduled.length === 0) notes.push('Free day: no attractions scheduled');
      if (i === last) {
        notes.push(hotel ? `Check out of ${hotel}` : 'Check out');
        if (departure) notes.push(`Depart on ${departure.flightNumber} at ${clockTime(departure.departTime)}`);
      }
      return {
        day: i + 1,
        date,
        attractions: scheduled,
        lunch: meal(i * 2),
        dinner: meal(i * 2 + 1),
        notes,
        isRestDay: scheduled.length === 0,
      };
    });

    const activeDays = days.filter((d) => !d.isRestDay).length;
    return {
      payload: { pace, days },
      provenance: weakestProvenance(provenances),
      completeness: days.length > 0 ? activeDays / days.length : 0,
      warnings,
    };
  }
}
