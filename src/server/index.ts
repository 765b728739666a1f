// =============================================================================
// Server Entry — bootstrap
// =============================================================================
import config from './config';
import logger from './utils/logger';
import { errorMessage } from './utils/sanitizeError';
import { createApp } from './app';
import { createSyncSession } from './services/syncSession';

/* ── Start ── */
function start(): void {
  try {
    const { session, zoom } = createSyncSession(config);
    const app = createApp({
      session,
      recordings: zoom,
      skipWebhookSignature: config.skipWebhookSignature,
    });

    if (config.skipWebhookSignature) {
      logger.warn('Webhook signature verification is DISABLED (SKIP_WEBHOOK_SIGNATURE=true)');
    }

    const server = app.listen(config.port, () => {
      logger.info(`Server running on port ${config.port} [${config.nodeEnv}]`);
    });

    // Graceful shutdown: forget dedup state, stop accepting requests
    const shutdown = (signal: string): void => {
      logger.info(`${signal} received, shutting down`);
      session.close();
      server.close();
    };
    process.on('SIGTERM', () => shutdown('SIGTERM'));
    process.on('SIGINT', () => shutdown('SIGINT'));
  } catch (err) {
    logger.error('Failed to start server', { error: errorMessage(err) });
    process.exit(1);
  }
}

start();
