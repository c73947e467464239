// src/services/providers/catalog/catalog-store.ts
// Read-only lookup over the static seed catalog, by (category, key).
import { z } from 'zod';
import type { RetrievalCategory } from '../retrieval-types';
import {
  CABIN_CLASSES,
  destinationDataSchema,
  hotelOptionSchema,
  restaurantSchema,
  type DestinationData,
  type HotelOption,
  type Restaurant,
} from '../schemas';

export const flightRouteSchema = z.object({
  origin: z.string().min(1),
  destination: z.string().min(1),
  airline: z.string().min(1),
  flightNumber: z.string().min(1),
  fromAirport: z.string().min(1),
  toAirport: z.string().min(1),
  /** Local departure time, HH:MM. */
  departureTime: z.string().regex(/^\d{2}:\d{2}$/),
  durationHours: z.number().positive(),
  price: z.number().nonnegative(),
  stops: z.number().int().min(0).default(0),
  cabin: z.enum(CABIN_CLASSES).default('economy'),
});

export type FlightRoute = z.infer<typeof flightRouteSchema>;

/** Record shape stored per category. */
export interface CatalogRecords {
  destination: DestinationData;
  lodging: HotelOption;
  dining: Restaurant;
  transport: FlightRoute;
}

export interface CatalogStore {
  lookup<C extends RetrievalCategory>(category: C, key: string): readonly CatalogRecords[C][];
  cities(): string[];
}

export const catalogDataSchema = z.object({
  destinations: z.array(destinationDataSchema),
  hotels: z.array(hotelOptionSchema),
  restaurants: z.array(restaurantSchema),
  routes: z.array(flightRouteSchema),
});

export type CatalogData = z.infer<typeof catalogDataSchema>;
