// =============================================================================
// Phone Recording Download Proxy
// =============================================================================
// GET /download/:token
//
// Links in CRM notes point here. The token decodes to
// `<accountId>|<fileId>`; the file is streamed from Zoom with the service's
// own OAuth token so note readers never need Zoom credentials.
// =============================================================================

import { Router, Request, Response } from 'express';
import { decodeDownloadToken } from '../services/zoomRecordings';
import { RecordingStream } from '../services/zoomClient';
import { errorMessage } from '../utils/sanitizeError';
import logger from '../utils/logger';

/** The part of the Zoom client the proxy needs */
export interface RecordingSource {
  readonly accountId: string;
  openPhoneRecordingStream(fileId: string): Promise<RecordingStream>;
}

export function createRecordingRouter(source: RecordingSource): Router {
  const router = Router();

  router.get('/:token', async (req: Request, res: Response): Promise<void> => {
    const target = decodeDownloadToken(req.params.token);
    if (!target) {
      res.status(400).json({ error: 'Invalid download token' });
      return;
    }
    if (target.accountId !== source.accountId) {
      logger.warn('Download token for a different Zoom account rejected');
      res.status(400).json({ error: 'Invalid download token' });
      return;
    }

    let download: RecordingStream;
    try {
      download = await source.openPhoneRecordingStream(target.fileId);
    } catch (err) {
      logger.error('Recording download failed', { error: errorMessage(err) });
      res.status(502).json({ error: 'Recording unavailable' });
      return;
    }

    res.status(200);
    res.setHeader('Content-Type', download.contentType);
    const filename = `zoom_recording_${target.fileId.replace(/[^A-Za-z0-9._-]/g, '_')}.mp3`;
    res.setHeader('Content-Disposition', `attachment; filename="${filename}"`);
    if (download.contentLength) res.setHeader('Content-Length', download.contentLength);

    download.stream.on('error', (err: Error) => {
      logger.error('Recording stream interrupted', { error: errorMessage(err) });
      res.destroy(err);
    });
    download.stream.pipe(res);
  });

  return router;
}
