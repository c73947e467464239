// Prompt templates and output contracts for generated data, one per retrieval category.
// Arrays are wrapped in an object because JSON mode only returns objects.
import { z } from 'zod';
import { zodToJsonSchema } from 'zod-to-json-schema';
import type { RetrievalCategory, RetrievalParams, RetrievalPayloads } from '../retrieval-types';
import {
  destinationDataSchema,
  flightOptionSchema,
  hotelOptionSchema,
  restaurantSchema,
} from '../schemas';

export const GENERATION_SYSTEM = `You are a travel data assistant. You produce realistic, conservative travel facts as JSON.
Rules:
- Respond with JSON only, no prose and no markdown.
- Use real, well-known places where you know them; never invent precise addresses you are unsure of.
- Prices are numbers in USD without currency symbols.
- If you are unsure of a value, use a typical value for the city rather than leaving it out.`;

export type ParsedGeneration<T> = { ok: true; data: T } | { ok: false; error: string };

export interface GenerationTemplate<P, T> {
  schemaName: string;
  jsonSchema: object;
  prompt(params: P): string;
  parse(raw: unknown): ParsedGeneration<T>;
}

type GenerationTemplates = {
  [K in RetrievalCategory]: GenerationTemplate<RetrievalParams[K], RetrievalPayloads[K]>;
};

function issues(error: z.ZodError): string {
  return error.errors
    .slice(0, 5)
    .map((e) => `${e.path.join('.') || 'root'}: ${e.message}`)
    .join('; ');
}

const hotelsWrapper = z.object({ hotels: z.array(hotelOptionSchema) });
const restaurantsWrapper = z.object({ restaurants: z.array(restaurantSchema) });
const flightsWrapper = z.object({ flights: z.array(flightOptionSchema) });

export const GENERATION_TEMPLATES: GenerationTemplates = {
  destination: {
    schemaName: 'destination',
    jsonSchema: zodToJsonSchema(destinationDataSchema, 'destination'),
    prompt: ({ city }) =>
      `Describe the travel destination "${city}". Include its country, local currency code, main language, ` +
      `time zone and best time to visit, plus 15 notable attractions with type, one-sentence description, ` +
      `entrance fee per person (0 if free) and typical visit duration in hours.`,
    parse: (raw) => {
      const r = destinationDataSchema.safeParse(raw);
      return r.success ? { ok: true, data: r.data } : { ok: false, error: issues(r.error) };
    },
  },
  lodging: {
    schemaName: 'hotels',
    jsonSchema: zodToJsonSchema(hotelsWrapper, 'hotels'),
    prompt: ({ city, count }) =>
      `List ${count} hotels in ${city} across budget, mid-range and luxury tiers. ` +
      `For each give name, city "${city}", tier, typical price per night for a double room, ` +
      `guest rating out of 5, room capacity, main amenities and a short description.`,
    parse: (raw) => {
      const r = hotelsWrapper.safeParse(raw);
      return r.success ? { ok: true, data: r.data.hotels } : { ok: false, error: issues(r.error) };
    },
  },
  dining: {
    schemaName: 'restaurants',
    jsonSchema: zodToJsonSchema(restaurantsWrapper, 'restaurants'),
    prompt: ({ city, count, cuisine }) =>
      `List ${count} restaurants in ${city}${cuisine ? ` with an emphasis on ${cuisine} cuisine` : ''}, ` +
      `covering several different cuisines. For each give name, city "${city}", cuisine, short description, ` +
      `price range ($ to $$$$), average cost per person per meal, rating out of 5, ` +
      `dietary options catered for (e.g. vegetarian, vegan, halal, kosher, gluten-free) and signature dishes.`,
    parse: (raw) => {
      const r = restaurantsWrapper.safeParse(raw);
      return r.success ? { ok: true, data: r.data.restaurants } : { ok: false, error: issues(r.error) };
    },
  },
  transport: {
    schemaName: 'flights',
    jsonSchema: zodToJsonSchema(flightsWrapper, 'flights'),
    prompt: (p) =>
      `List up to 3 plausible ${p.cabin} flights from ${p.origin} to ${p.destination} on ${p.departDate} ` +
      `(direction "outbound") and up to 3 from ${p.destination} to ${p.origin} on ${p.returnDate} ` +
      `(direction "return"). Use ISO 8601 datetimes, airport codes for from/to, duration in hours, ` +
      `number of stops and a typical one-way price per traveler.`,
    parse: (raw) => {
      const r = flightsWrapper.safeParse(raw);
      return r.success ? { ok: true, data: r.data.flights } : { ok: false, error: issues(r.error) };
    },
  },
};
