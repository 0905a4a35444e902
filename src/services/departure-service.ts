/**
 * Departure lookup pipeline
 *
 * build query -> fetch from transit API -> normalize -> rank
 *
 * Every failure leaves this service as a DepartureLookupError.
 */

import { inspect } from 'util';
import { DepartureLookupError, NormalizationError, UpstreamError } from '../errors.js';
import type { DepartureList } from '../types/departures.js';
import type { Logger } from '../utils/logger.js';
import { rankDepartures } from '../utils/departure-ranking.js';
import { buildStopDeparturesQuery } from './query-builder.js';
import { type NormalizedStops, normalizeStopsResponse } from './departure-normalizer.js';
import type { FetchOptions } from './transit-api-client.js';

export const DEFAULT_DEPARTURE_COUNT = 5;

/**
 * The part of TransitApiClient the service depends on
 */
export interface DepartureSource {
  fetchDepartures(query: string, options?: FetchOptions): Promise<unknown>;
}

interface ServiceDependencies {
  client: DepartureSource;
  logger: Logger;
  now?: () => Date;
}

export interface LookupContext {
  correlationId?: string;
  signal?: AbortSignal;
}

// Raw payloads can be large; keep debug lines bounded
function formatPayload(payload: unknown): string {
  return inspect(payload, { depth: 8, breakLength: 120, maxStringLength: 2000 });
}

export class DepartureService {
  private client: DepartureSource;
  private logger: Logger;
  private now: () => Date;

  constructor(deps: ServiceDependencies) {
    this.client = deps.client;
    this.logger = deps.logger;
    this.now = deps.now ?? (() => new Date());
  }

  /**
   * Next departures from the stops matching a name or stop code
   *
   * @param stopName - Stop code (e.g. "H3030") or part of a stop name (e.g. "malm")
   * @param n - Total number of departures to return across all matched stops
   * @throws DepartureLookupError
   */
  async getDepartures(
    stopName: string,
    n: number = DEFAULT_DEPARTURE_COUNT,
    context: LookupContext = {}
  ): Promise<DepartureList> {
    const { correlationId } = context;

    this.logger.debug('Departure lookup requested', { correlationId, stopName, n });

    if (n <= 0) {
      return { departures: [], generated_at: this.now() };
    }

    const query = buildStopDeparturesQuery(stopName, n);
    const raw = await this.fetchRaw(query, context);

    this.logger.debug('Transit API returned payload', {
      correlationId,
      payload: formatPayload(raw),
    });

    let normalized: NormalizedStops;
    try {
      normalized = normalizeStopsResponse(raw);
    } catch (error) {
      this.logger.error('Parsing transit API response failed', {
        correlationId,
        error: error instanceof NormalizationError ? error.detail : String(error),
        payload: formatPayload(raw),
      });
      throw DepartureLookupError.parseFailure(error);
    }

    if (normalized.matchedStops === 0) {
      this.logger.info('No stops matched the query', { correlationId, stopName });
      throw DepartureLookupError.notFound();
    }

    const departures = rankDepartures(normalized.departures, n);

    this.logger.debug('Departures ranked', {
      correlationId,
      matchedStops: normalized.matchedStops,
      departureCount: departures.length,
    });

    return { departures, generated_at: this.now() };
  }

  private async fetchRaw(query: string, context: LookupContext): Promise<unknown> {
    try {
      return await this.client.fetchDepartures(query, {
        correlationId: context.correlationId,
        signal: context.signal,
      });
    } catch (error) {
      if (error instanceof UpstreamError && error.kind === 'BadStatus') {
        this.logger.error('Transit API returned non-200 status', {
          correlationId: context.correlationId,
          status: error.status,
        });
        throw DepartureLookupError.badUpstreamStatus(error.status, error);
      }

      this.logger.error('Error while retrieving data from transit API', {
        correlationId: context.correlationId,
        error: error instanceof Error ? error.message : String(error),
      });
      throw DepartureLookupError.upstreamUnreachable(error);
    }
  }
}

export type DepartureLookup = Pick<DepartureService, 'getDepartures'>;
