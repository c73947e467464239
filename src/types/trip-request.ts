import { z } from 'zod';
import { deepFreeze } from '@/utils/freeze';
import { isIsoDate, toIsoDate } from '@/utils/dates';
import type { TripRequest } from './trip';

const isoDate = z
  .string()
  .regex(/^\d{4}-\d{2}-\d{2}$/, 'Expected a date in YYYY-MM-DD format')
  .refine(isIsoDate, 'Not a valid calendar date');

const tag = z.string().trim().toLowerCase().min(1);

export const tripRequestSchema = z
  .object({
    destination: z.string().trim().min(1, 'Destination is required'),
    origin: z
      .string()
      .trim()
      .optional()
      .transform((v) => (v ? v : undefined)),
    startDate: isoDate,
    endDate: isoDate,
    budget: z.number().positive('Budget must be greater than 0'),
    travelers: z.number().int().min(1, 'At least one traveler').max(20, 'At most 20 travelers'),
    preferences: z.array(tag).optional().default([]),
    dietaryRestrictions: z.array(tag).optional().default([]),
  })
  .refine((r) => r.startDate < r.endDate, {
    message: 'endDate must be after startDate',
    path: ['endDate'],
  });

export type TripRequestBody = z.input<typeof tripRequestSchema>;

export interface FieldError {
  path: string;
  message: string;
}

/**
 * Validates a trip request body.
 * `now` decides what counts as a past start date.
 */
export function validateTripRequest(
  data: unknown,
  now: Date = new Date(),
):
  | { success: true; data: TripRequest }
  | { success: false; error: FieldError[] } {
  const result = tripRequestSchema.safeParse(data);

  if (!result.success) {
    return {
      success: false,
      error: result.error.errors.map((e) => ({
        path: e.path.join('.') || 'root',
        message: e.message,
      })),
    };
  }

  if (result.data.startDate < toIsoDate(now)) {
    return {
      success: false,
      error: [{ path: 'startDate', message: 'startDate must not be in the past' }],
    };
  }

  const { origin, ...rest } = result.data;
  const request: TripRequest = origin ? { ...rest, origin } : rest;
  return { success: true, data: deepFreeze(request) };
}
