// src/services/trip-modification.ts: turns a change to a planned trip into a new request and the agents to re-run
import { z } from 'zod';
import { INDEPENDENT_CATEGORIES, type IndependentCategory, type TripRequest } from '@/types/trip';
import { validateTripRequest, type FieldError } from '@/types/trip-request';

export const MODIFIABLE_FIELDS = [
  'destination',
  'origin',
  'startDate',
  'endDate',
  'budget',
  'travelers',
  'preferences',
  'dietaryRestrictions',
] as const;

export type ModifiableField = (typeof MODIFIABLE_FIELDS)[number];

/**
 * Independent agents that read each request field.
 * Budget and itinerary read everything upstream and always re-run.
 */
export const AFFECTED_AGENTS: Record<ModifiableField, readonly IndependentCategory[]> = {
  destination: ['destination', 'lodging', 'dining', 'transport'],
  origin: ['transport'],
  startDate: ['destination', 'lodging', 'dining', 'transport'],
  endDate: ['destination', 'lodging', 'dining', 'transport'],
  budget: ['lodging', 'transport'],
  travelers: ['lodging', 'dining', 'transport'],
  preferences: ['destination', 'lodging', 'dining', 'transport'],
  dietaryRestrictions: ['dining'],
};

// Field shapes only; the merged request goes through the full trip request validation.
export const tripModificationSchema = z
  .object({
    destination: z.string(),
    /** null or an empty string removes the origin. */
    origin: z.string().nullable(),
    startDate: z.string(),
    endDate: z.string(),
    budget: z.number(),
    travelers: z.number(),
    preferences: z.array(z.string()),
    dietaryRestrictions: z.array(z.string()),
  })
  .partial()
  .strict()
  .refine((change) => MODIFIABLE_FIELDS.some((field) => change[field] !== undefined), {
    message: 'A modification must name at least one field',
  });

export type TripModification = z.infer<typeof tripModificationSchema>;

export function validateTripModification(
  data: unknown,
): { success: true; data: TripModification } | { success: false; error: FieldError[] } {
  const result = tripModificationSchema.safeParse(data);
  if (result.success) return { success: true, data: result.data };
  return {
    success: false,
    error: result.error.errors.map((e) => ({ path: e.path.join('.') || 'root', message: e.message })),
  };
}

export type ModificationPlan =
  | { ok: true; request: TripRequest; changed: ModifiableField[]; rerun: IndependentCategory[] }
  | { ok: false; conflicts: FieldError[] };

function sameValue(a: unknown, b: unknown): boolean {
  return JSON.stringify(a) === JSON.stringify(b);
}

/**
 * Applies `change` to `current`. The result must still be a valid trip request
 * and must differ from the current one; otherwise the conflicts say why.
 */
export function planModification(
  current: TripRequest,
  change: TripModification,
  now: Date = new Date(),
): ModificationPlan {
  const body: Record<string, unknown> = { ...current };
  for (const field of MODIFIABLE_FIELDS) {
    const value = change[field];
    if (value !== undefined) body[field] = value;
  }
  if (change.origin === null) delete body.origin;

  const validation = validateTripRequest(body, now);
  if (!validation.success) return { ok: false, conflicts: validation.error };

  const request = validation.data;
  const changed = MODIFIABLE_FIELDS.filter((field) => !sameValue(request[field], current[field]));
  if (changed.length === 0) {
    return { ok: false, conflicts: [{ path: 'root', message: 'The modification does not change the trip' }] };
  }

  const rerun = INDEPENDENT_CATEGORIES.filter((category) =>
    changed.some((field) => AFFECTED_AGENTS[field].includes(category)),
  );
  return { ok: true, request, changed, rerun };
}
