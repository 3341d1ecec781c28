/**
 * Health Check Routes
 *
 * Liveness probe for load balancers. Registered ahead of authentication
 * and never proxied.
 */

import { Router, type Request, type Response } from 'express';

const router = Router();

/**
 * GET /health
 *
 * Returns 200 with a plain-text body while the process is serving.
 * Does NOT check upstream services.
 */
router.get('/health', (_req: Request, res: Response) => {
  res.status(200).type('text/plain').send('OK');
});

export default router;
