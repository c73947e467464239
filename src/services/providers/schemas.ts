// src/services/providers/schemas.ts
// Canonical shapes for every retrieval category. The catalog loader, the live
// API mappers and the generative tier all produce exactly these.
import { z } from 'zod';

export const CABIN_CLASSES = ['economy', 'premium', 'business', 'first'] as const;
export const LODGING_TIERS = ['budget', 'mid-range', 'luxury'] as const;

export const attractionSchema = z.object({
  name: z.string().min(1),
  /** Free-form kind, e.g. "museum", "temple", "viewpoint". */
  type: z.string().default('general'),
  description: z.string().default(''),
  /** Per person; 0 when free. */
  entranceFee: z.number().min(0).default(0),
  estimatedDurationHours: z.number().positive().default(2),
  openingHours: z.string().optional(),
});

export const destinationInfoSchema = z.object({
  name: z.string().min(1),
  country: z.string().default('Unknown'),
  description: z.string().default(''),
  currency: z.string().default('USD'),
  timezone: z.string().optional(),
  language: z.string().optional(),
  bestTimeToVisit: z.string().optional(),
});

export const destinationDataSchema = z.object({
  destination: destinationInfoSchema,
  attractions: z.array(attractionSchema),
});

export const hotelOptionSchema = z.object({
  name: z.string().min(1),
  city: z.string().min(1),
  tier: z.enum(LODGING_TIERS).default('mid-range'),
  pricePerNight: z.number().nonnegative(),
  /** Guest rating 0–5. */
  rating: z.number().min(0).max(5).default(0),
  roomCapacity: z.number().int().positive().default(2),
  amenities: z.array(z.string()).default([]),
  address: z.string().optional(),
  description: z.string().default(''),
});

export const restaurantSchema = z.object({
  name: z.string().min(1),
  city: z.string().min(1),
  cuisine: z.string().default('International'),
  description: z.string().default(''),
  priceRange: z.enum(['$', '$$', '$$$', '$$$$']).default('$$'),
  averageCostPerPerson: z.number().nonnegative(),
  rating: z.number().min(0).max(5).default(0),
  /** Restrictions the kitchen explicitly caters for, e.g. "vegetarian", "halal". */
  dietaryOptions: z.array(z.string()).default([]),
  specialties: z.array(z.string()).default([]),
});

export const flightOptionSchema = z.object({
  airline: z.string().min(1),
  flightNumber: z.string().min(1),
  from: z.string().min(1),
  to: z.string().min(1),
  departTime: z.string(), // ISO datetime
  arriveTime: z.string(), // ISO datetime
  durationHours: z.number().positive(),
  /** One way, per traveler. */
  price: z.number().nonnegative(),
  stops: z.number().int().min(0).default(0),
  cabin: z.enum(CABIN_CLASSES).default('economy'),
  direction: z.enum(['outbound', 'return']),
});

export type Attraction = z.infer<typeof attractionSchema>;
export type DestinationInfo = z.infer<typeof destinationInfoSchema>;
export type DestinationData = z.infer<typeof destinationDataSchema>;
export type HotelOption = z.infer<typeof hotelOptionSchema>;
export type Restaurant = z.infer<typeof restaurantSchema>;
export type FlightOption = z.infer<typeof flightOptionSchema>;
export type CabinClass = (typeof CABIN_CLASSES)[number];
export type LodgingTier = (typeof LODGING_TIERS)[number];
