// =============================================================================
// Express application — routes and middleware, no listening socket
// =============================================================================
import express from 'express';

import logger from './utils/logger';
import { errorMessage } from './utils/sanitizeError';
import { SyncSession } from './services/syncSession';

// Routes
import { createZoomWebhookRouter } from './routes/zoom-webhooks';
import { createRecordingRouter, RecordingSource } from './routes/recordings';
import { createHealthRouter } from './routes/health';

export interface AppDependencies {
  session: SyncSession;
  recordings: RecordingSource;
  skipWebhookSignature?: boolean;
}

export function createApp(deps: AppDependencies): express.Express {
  const app = express();

  // Request logging (non-PII)
  app.use((req, _res, next) => {
    logger.debug(`${req.method} ${req.path}`, {
      ip: req.ip,
      userAgent: req.get('user-agent')?.substring(0, 60),
    });
    next();
  });

  /* ── Routes ── */
  app.use('/api/webhooks/zoom', createZoomWebhookRouter(deps.session, { skipSignature: deps.skipWebhookSignature }));
  app.use('/api/health', createHealthRouter(deps.session));
  app.use('/download', createRecordingRouter(deps.recordings));

  app.use((_req, res) => {
    res.status(404).json({ error: 'Not found' });
  });

  /* ── Global error handler ── */
  app.use(
    (
      err: Error,
      _req: express.Request,
      res: express.Response,
      _next: express.NextFunction,
    ) => {
      logger.error('Unhandled server error', { error: errorMessage(err) });
      res.status(500).json({ error: 'Internal server error' });
    },
  );

  return app;
}
