/**
 * Transit API response normalization
 *
 * Flattens data.stops[].stoptimesWithoutPatterns[] into Departure records.
 * The whole payload is validated up front: one malformed stoptime fails the
 * request instead of being skipped.
 */

import { z } from 'zod';
import { NormalizationError } from '../errors.js';
import type { Departure } from '../types/departures.js';
import type {
  TransitGraphQLError,
  TransitStoptime,
  TransitStopsResponse,
} from '../types/transit-api.js';

const stoptimeSchema: z.ZodType<TransitStoptime> = z.object({
  stop: z.object({
    name: z.string(),
    code: z.string(),
  }),
  serviceDay: z.number().int(),
  scheduledDeparture: z.number().int(),
  realtimeDeparture: z.number().int().nullish(),
  trip: z.object({
    route: z.object({
      shortName: z.string(),
    }),
  }),
  headsign: z.string().nullish(),
});

const stopsResponseSchema: z.ZodType<TransitStopsResponse> = z.object({
  data: z.object({
    stops: z.array(
      z.object({
        stoptimesWithoutPatterns: z.array(stoptimeSchema).nullish(),
      })
    ),
  }),
});

const graphQLErrorsSchema: z.ZodType<{ errors: TransitGraphQLError[] }> = z.object({
  errors: z.array(z.object({ message: z.string() })).min(1),
});

/**
 * Convert a service day plus an offset (both in seconds) to a UTC Date
 *
 * @throws NormalizationError if the sum falls outside the Date range
 */
export function toUtcDate(serviceDay: number, offsetSeconds: number): Date {
  const date = new Date((serviceDay + offsetSeconds) * 1000);
  if (Number.isNaN(date.getTime())) {
    throw new NormalizationError(`departure time out of range: ${serviceDay} + ${offsetSeconds}`);
  }
  return date;
}

function describeFailure(raw: unknown, error: z.ZodError): string {
  const graphQLErrors = graphQLErrorsSchema.safeParse(raw);
  if (graphQLErrors.success) {
    return `GraphQL errors: ${graphQLErrors.data.errors.map((e) => e.message).join('; ')}`;
  }

  const [issue] = error.issues;
  if (!issue) {
    return error.message;
  }
  return issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message;
}

export function normalizeStoptime(stoptime: TransitStoptime): Departure {
  const realtime = stoptime.realtimeDeparture;

  return {
    stop: `${stoptime.stop.code} ${stoptime.stop.name}`,
    line: stoptime.trip.route.shortName,
    destination: stoptime.headsign ?? null,
    scheduled: toUtcDate(stoptime.serviceDay, stoptime.scheduledDeparture),
    estimated: realtime === null || realtime === undefined
      ? null
      : toUtcDate(stoptime.serviceDay, realtime),
  };
}

export interface NormalizedStops {
  matchedStops: number;
  departures: Departure[];
}

/**
 * Normalize a raw transit API response, keeping the number of matched stops
 *
 * @throws NormalizationError if the payload does not have the expected shape
 */
export function normalizeStopsResponse(raw: unknown): NormalizedStops {
  const parsed = stopsResponseSchema.safeParse(raw);
  if (!parsed.success) {
    throw new NormalizationError(describeFailure(raw, parsed.error));
  }

  const { stops } = parsed.data.data;
  return {
    matchedStops: stops.length,
    departures: stops.flatMap((stop) =>
      (stop.stoptimesWithoutPatterns ?? []).map(normalizeStoptime)
    ),
  };
}

/**
 * Normalize a raw transit API response into departures
 *
 * Departures keep upstream order (stop by stop). An empty stop list yields
 * an empty array; deciding what that means is up to the caller.
 */
export function normalizeDepartures(raw: unknown): Departure[] {
  return normalizeStopsResponse(raw).departures;
}
