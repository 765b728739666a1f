// =============================================================================
// GET /api/health — liveness plus dedup window sizes
// =============================================================================

import { Router } from 'express';
import { SyncSession } from '../services/syncSession';

export function createHealthRouter(session: SyncSession): Router {
  const router = Router();

  router.get('/', (_req, res) => {
    res.json({
      status: 'ok',
      uptime: process.uptime(),
      timestamp: new Date().toISOString(),
      ...session.stats(),
    });
  });

  return router;
}
