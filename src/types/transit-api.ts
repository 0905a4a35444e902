/**
 * HSL (Digitransit) routing API GraphQL types
 * Covers only the fields requested by the stop departures query
 */

export interface TransitStoptime {
  stop: {
    name: string;
    code: string;
  };
  serviceDay: number; // Unix seconds at the start of the service day
  scheduledDeparture: number; // Seconds since serviceDay
  realtimeDeparture?: number | null; // Seconds since serviceDay
  trip: {
    route: {
      shortName: string;
    };
  };
  headsign?: string | null;
}

export interface TransitStop {
  stoptimesWithoutPatterns?: TransitStoptime[] | null;
}

export interface TransitStopsResponse {
  data: {
    stops: TransitStop[];
  };
}

export interface TransitGraphQLError {
  message: string;
}
