// =============================================================================
// Inbound Zoom Webhook Handler
// =============================================================================
// POST /api/webhooks/zoom
//
// Receives meeting, recording, SMS and Zoom Phone events, answers Zoom's
// endpoint validation challenge, checks the HMAC-SHA256 signature, validates
// the envelope with Zod and hands the event to the sync session.
//
//   • The body is read raw (express.raw) so the signature is computed over
//     the exact bytes Zoom signed. The signature value is NEVER logged.
//   • `endpoint.url_validation` is answered before the signature check.
//   • The response is sent AFTER processing: 200 on success (duplicates
//     included), 500 when the handler failed so Zoom redelivers.
// =============================================================================

import express, { Router, Request, Response } from 'express';
import { z } from 'zod';
import { SyncSession } from '../services/syncSession';
import { URL_VALIDATION_EVENT, ZOOM_SIGNATURE_HEADER } from '../services/webhookAuthenticator';
import { errorMessage } from '../utils/sanitizeError';
import logger from '../utils/logger';

// ─────────────────────────────────────────────────────────────────────────────
// Zod schemas
// ─────────────────────────────────────────────────────────────────────────────

const ZoomWebhookSchema = z.object({
  event: z.string().min(1),
  event_ts: z.union([z.number(), z.string()]).optional(),
  payload: z
    .object({
      account_id: z.string().optional(),
      object: z.record(z.unknown()).optional(),
      plainToken: z.string().optional(),
    })
    .passthrough(),
});

const UrlValidationSchema = z.object({
  event: z.literal(URL_VALIDATION_EVENT),
  payload: z.object({ plainToken: z.string().min(1) }),
});

export interface ZoomWebhookRouterOptions {
  /** Accept unsigned / badly signed requests (local testing only) */
  skipSignature?: boolean;
}

// ─────────────────────────────────────────────────────────────────────────────
// Router factory
// ─────────────────────────────────────────────────────────────────────────────

export function createZoomWebhookRouter(
  session: SyncSession,
  options: ZoomWebhookRouterOptions = {},
): Router {
  const router = Router();

  router.post(
    '/',
    express.raw({ type: '*/*', limit: '5mb' }),
    async (req: Request, res: Response): Promise<void> => {
      // ── Step 1: Parse the raw body ──────────────────────────────────
      const rawBody: unknown = req.body;
      if (!Buffer.isBuffer(rawBody) || rawBody.length === 0) {
        res.status(400).json({ error: 'Empty request body' });
        return;
      }

      let body: unknown;
      try {
        body = JSON.parse(rawBody.toString('utf8'));
      } catch {
        logger.warn('Zoom webhook body is not valid JSON');
        res.status(400).json({ error: 'Invalid JSON' });
        return;
      }

      // ── Step 2: Endpoint validation challenge ─────────────────────────
      const challenge = UrlValidationSchema.safeParse(body);
      if (challenge.success) {
        logger.info('Answering Zoom endpoint URL validation');
        res.status(200).json(session.urlValidation(challenge.data.payload.plainToken));
        return;
      }

      // ── Step 3: Verify HMAC-SHA256 signature ──────────────────────────
      if (options.skipSignature) {
        logger.debug('Zoom webhook signature verification skipped');
      } else {
        try {
          session.assertAuthentic(rawBody, req.get(ZOOM_SIGNATURE_HEADER));
        } catch (err) {
          logger.warn('Invalid Zoom webhook signature, request rejected', { ip: req.ip });
          res.status(401).json({ error: errorMessage(err) });
          return;
        }
      }

      // ── Step 4: Validate the envelope ─────────────────────────────────
      const parsed = ZoomWebhookSchema.safeParse(body);
      if (!parsed.success) {
        logger.warn('Malformed Zoom webhook dropped', {
          errors: parsed.error.issues.map((iss) => ({
            path: iss.path.join('.'),
            message: iss.message,
          })),
        });
        res.status(400).json({ error: 'Malformed webhook payload' });
        return;
      }

      // ── Step 5: Process ───────────────────────────────────────────────
      try {
        const ok = await session.processWebhook(parsed.data);
        if (ok) {
          res.status(200).json({ status: 'success' });
        } else {
          res.status(500).json({ status: 'error', error: 'Event processing failed' });
        }
      } catch (err) {
        logger.error('Zoom webhook top-level error', { eventType: parsed.data.event, error: errorMessage(err) });
        res.status(500).json({ status: 'error', error: 'Internal server error' });
      }
    },
  );

  return router;
}
