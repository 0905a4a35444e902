/**
 * Liveness endpoint
 */

import { Router, Request, Response } from 'express';

export function createPingRouter(now: () => Date = () => new Date()): Router {
  const router = Router();

  /**
   * GET /
   * Returns the current UTC timestamp
   */
  router.get('/', (req: Request, res: Response): void => {
    res.status(200).json({ pong: now().toISOString() });
  });

  return router;
}
