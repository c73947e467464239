// Amadeus Self-Service: OAuth client-credentials, IATA resolution and round-trip flight offers.
import axios from 'axios';
import { z } from 'zod';
import { LiveApiError } from '@/services/errors';
import { logger } from '@/services/logger';
import type { RetrievalParams } from '../retrieval-types';
import type { CabinClass, FlightOption } from '../schemas';
import { createLiveApiClient, toLiveApiError, type LiveApiClient } from './live-api-client';

const TOKEN_REFRESH_MARGIN_S = 60;
const MAX_OFFERS = 10;

const TRAVEL_CLASS: Record<CabinClass, string> = {
  economy: 'ECONOMY',
  premium: 'PREMIUM_ECONOMY',
  business: 'BUSINESS',
  first: 'FIRST',
};

const tokenSchema = z.object({
  access_token: z.string(),
  expires_in: z.number(),
});

const locationsSchema = z.object({
  data: z.array(z.object({ iataCode: z.string().optional() })).default([]),
});

const segmentSchema = z.object({
  carrierCode: z.string(),
  number: z.string(),
  departure: z.object({ iataCode: z.string(), at: z.string() }),
  arrival: z.object({ iataCode: z.string(), at: z.string() }),
});

const offersSchema = z.object({
  data: z
    .array(
      z.object({
        itineraries: z.array(
          z.object({
            duration: z.string().default('PT0M'),
            segments: z.array(segmentSchema).min(1),
          }),
        ),
        price: z.object({ total: z.coerce.number() }),
      }),
    )
    .default([]),
});

type Itinerary = z.infer<typeof offersSchema>['data'][number]['itineraries'][number];

/** "PT2H35M" -> 2.58 */
export function parseIsoDuration(value: string): number {
  const match = /^PT(?:(\d+)H)?(?:(\d+)M)?$/.exec(value);
  if (!match) return 0;
  const hours = Number(match[1] ?? 0);
  const minutes = Number(match[2] ?? 0);
  return Math.round((hours + minutes / 60) * 100) / 100;
}

function toFlightOption(
  itinerary: Itinerary,
  direction: FlightOption['direction'],
  price: number,
  cabin: CabinClass,
): FlightOption | null {
  const first = itinerary.segments[0];
  const last = itinerary.segments[itinerary.segments.length - 1];
  if (!first || !last) return null;
  const durationHours = parseIsoDuration(itinerary.duration);
  return {
    airline: first.carrierCode,
    flightNumber: `${first.carrierCode}${first.number}`,
    from: first.departure.iataCode,
    to: last.arrival.iataCode,
    departTime: first.departure.at,
    arriveTime: last.arrival.at,
    durationHours: durationHours > 0 ? durationHours : 1,
    price,
    stops: itinerary.segments.length - 1,
    cabin,
    direction,
  };
}

export interface AmadeusOptions {
  clientId: string;
  clientSecret: string;
  baseUrl: string;
}

export function createAmadeusFlightClient(options: AmadeusOptions): LiveApiClient {
  const http = axios.create({ baseURL: options.baseUrl });
  let token: { value: string; expiresAt: number } | null = null;

  async function accessToken(signal: AbortSignal): Promise<string> {
    if (token && token.expiresAt > Date.now()) return token.value;
    const body = new URLSearchParams({
      grant_type: 'client_credentials',
      client_id: options.clientId,
      client_secret: options.clientSecret,
    });
    const res = tokenSchema.parse(
      (
        await http.post('/v1/security/oauth2/token', body.toString(), {
          headers: { 'Content-Type': 'application/x-www-form-urlencoded' },
          signal,
        })
      ).data,
    );
    token = {
      value: res.access_token,
      expiresAt: Date.now() + Math.max(0, res.expires_in - TOKEN_REFRESH_MARGIN_S) * 1000,
    };
    return token.value;
  }

  async function resolveIata(place: string, bearer: string, signal: AbortSignal): Promise<string> {
    const trimmed = place.trim();
    if (/^[A-Z]{3}$/.test(trimmed)) return trimmed;
    const keyword = trimmed.split(',')[0]?.trim() ?? trimmed;
    const res = locationsSchema.parse(
      (
        await http.get('/v1/reference-data/locations', {
          params: { subType: 'CITY,AIRPORT', keyword, 'page[limit]': 5 },
          headers: { Authorization: `Bearer ${bearer}` },
          signal,
        })
      ).data,
    );
    const code = res.data.find((l) => l.iataCode)?.iataCode;
    if (!code) throw new LiveApiError('not-found', `Amadeus: no IATA code for "${place}"`);
    return code;
  }

  async function fetchFlights(
    params: RetrievalParams['transport'],
    signal: AbortSignal,
  ): Promise<FlightOption[]> {
    try {
      const bearer = await accessToken(signal);
      const [originCode, destinationCode] = await Promise.all([
        resolveIata(params.origin, bearer, signal),
        resolveIata(params.destination, bearer, signal),
      ]);
      const res = offersSchema.parse(
        (
          await http.get('/v2/shopping/flight-offers', {
            params: {
              originLocationCode: originCode,
              destinationLocationCode: destinationCode,
              departureDate: params.departDate,
              returnDate: params.returnDate,
              adults: params.travelers,
              travelClass: TRAVEL_CLASS[params.cabin],
              currencyCode: 'USD',
              max: MAX_OFFERS,
            },
            headers: { Authorization: `Bearer ${bearer}` },
            signal,
          })
        ).data,
      );

      const flights: FlightOption[] = [];
      for (const offer of res.data) {
        const legs = offer.itineraries.length || 1;
        // Offer total covers every traveler and every leg.
        const perLeg = Math.round((offer.price.total / params.travelers / legs) * 100) / 100;
        const [outbound, inbound] = offer.itineraries;
        const out = outbound ? toFlightOption(outbound, 'outbound', perLeg, params.cabin) : null;
        const back = inbound ? toFlightOption(inbound, 'return', perLeg, params.cabin) : null;
        if (out) flights.push(out);
        if (back) flights.push(back);
      }
      logger.debug('amadeus:fetched', { originCode, destinationCode, offers: res.data.length });
      return flights;
    } catch (err) {
      if (err instanceof z.ZodError) {
        throw new LiveApiError('upstream', `Amadeus: unexpected response shape (${err.errors[0]?.message ?? 'invalid'})`);
      }
      throw toLiveApiError(err, 'Amadeus');
    }
  }

  return createLiveApiClient('amadeus', { transport: fetchFlights });
}
