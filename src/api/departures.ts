/**
 * Departures API route
 * Implements GET /departures?stops=<string>&n=<integer>
 */

import { Router, Request, Response, NextFunction } from 'express';
import { z } from 'zod';
import { DepartureLookupError } from '../errors.js';
import { DEFAULT_DEPARTURE_COUNT, type DepartureLookup } from '../services/departure-service.js';

// Zod schema for query validation
const departuresQuerySchema = z.object({
  stops: z
    .string({ required_error: 'stops is required', invalid_type_error: 'stops must be a single string' })
    .min(1, 'stops is required'),
  n: z
    .string({ invalid_type_error: 'n must be an integer' })
    .regex(/^-?\d+$/, 'n must be an integer')
    .optional()
    .transform((value) => (value === undefined ? DEFAULT_DEPARTURE_COUNT : Number(value))),
});

export function createDeparturesRouter(service: DepartureLookup): Router {
  const router = Router();

  /**
   * GET /departures
   * Next departures for the stops that match `stops`, sorted by real-time estimate
   *
   * Query Parameters:
   * - stops: Stop code (e.g. "H3030") or part of a stop name (e.g. "malm") (required)
   * - n: Total number of departures to return (default 5)
   *
   * Response (200 OK):
   * {
   *   "departures": [
   *     {
   *       "stop": "H3030 Malmin asema",
   *       "line": "I",
   *       "destination": "Lentoasema",
   *       "scheduled": "2024-05-02T07:01:00.000Z",
   *       "estimated": "2024-05-02T07:02:00.000Z"
   *     }
   *   ],
   *   "generated_at": "2024-05-02T06:58:12.345Z"
   * }
   *
   * Errors:
   * - 400: Invalid query parameters
   * - 404: No stops matched
   * - 502: Transit API returned a non-200 status
   * - 500: Transit API unreachable, or its response could not be parsed
   */
  router.get('/', async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    const parsed = departuresQuerySchema.safeParse(req.query);

    if (!parsed.success) {
      res.status(400).json({
        error: 'Validation error',
        details: parsed.error.errors.map(err => ({
          field: err.path.join('.'),
          message: err.message,
        })),
      });
      return;
    }

    // Cancel the upstream call if the client goes away first
    const abortController = new AbortController();
    res.on('close', () => {
      if (!res.writableFinished) {
        abortController.abort();
      }
    });

    try {
      const departureList = await service.getDepartures(parsed.data.stops, parsed.data.n, {
        correlationId: req.correlationId,
        signal: abortController.signal,
      });

      res.status(200).json(departureList);
    } catch (error) {
      if (error instanceof DepartureLookupError) {
        res.status(error.status).json({
          error: error.kind,
          detail: error.detail,
        });
        return;
      }

      next(error);
    }
  });

  return router;
}
