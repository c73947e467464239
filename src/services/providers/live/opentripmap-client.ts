// OpenTripMap: city centre by geoname, then attractions within a radius of it.
import axios from 'axios';
import { z } from 'zod';
import { LiveApiError } from '@/services/errors';
import { logger } from '@/services/logger';
import { destinationDataSchema, type DestinationData } from '../schemas';
import { createLiveApiClient, toLiveApiError, type LiveApiClient } from './live-api-client';

const BASE_URL = 'https://api.opentripmap.com/0.1/en/places';
const SEARCH_RADIUS_M = 10_000;
const MAX_PLACES = 30;

const geonameSchema = z.object({
  status: z.string().optional(),
  name: z.string().optional(),
  country: z.string().optional(),
  lat: z.number().optional(),
  lon: z.number().optional(),
});

const placeSchema = z.object({
  xid: z.string().optional(),
  name: z.string().default(''),
  kinds: z.string().default(''),
  rate: z.number().default(0),
  dist: z.number().optional(),
});

const radiusSchema = z.array(placeSchema);

export interface OpenTripMapOptions {
  apiKey: string;
  baseUrl?: string;
}

function kindLabel(kinds: string): string {
  const first = kinds.split(',')[0]?.trim();
  return first ? first.replace(/_/g, ' ') : 'general';
}

export function createOpenTripMapClient(options: OpenTripMapOptions): LiveApiClient {
  const http = axios.create({ baseURL: options.baseUrl ?? BASE_URL });

  async function fetchDestination(city: string, signal: AbortSignal): Promise<DestinationData> {
    try {
      const geo = geonameSchema.parse(
        (await http.get('/geoname', { params: { name: city, apikey: options.apiKey }, signal })).data,
      );
      if (geo.status !== 'OK' || geo.lat === undefined || geo.lon === undefined) {
        throw new LiveApiError('not-found', `OpenTripMap: no geoname for "${city}"`);
      }

      const places = radiusSchema.parse(
        (
          await http.get('/radius', {
            params: {
              radius: SEARCH_RADIUS_M,
              lon: geo.lon,
              lat: geo.lat,
              kinds: 'interesting_places',
              rate: 2,
              format: 'json',
              limit: MAX_PLACES,
              apikey: options.apiKey,
            },
            signal,
          })
        ).data,
      );

      const seen = new Set<string>();
      const attractions = places
        .filter((p) => p.name.trim() && !seen.has(p.name) && seen.add(p.name))
        .sort((a, b) => b.rate - a.rate)
        .map((p) => ({
          name: p.name.trim(),
          type: kindLabel(p.kinds),
          description: '',
        }));

      logger.debug('opentripmap:fetched', { city, places: places.length, attractions: attractions.length });
      return destinationDataSchema.parse({
        destination: { name: geo.name ?? city, country: geo.country ?? 'Unknown' },
        attractions,
      });
    } catch (err) {
      if (err instanceof z.ZodError) {
        throw new LiveApiError('upstream', `OpenTripMap: unexpected response shape (${err.errors[0]?.message ?? 'invalid'})`);
      }
      throw toLiveApiError(err, 'OpenTripMap');
    }
  }

  return createLiveApiClient('opentripmap', {
    destination: (params, signal) => fetchDestination(params.city, signal),
  });
}
