// =============================================================================
// Phone recording download links
// =============================================================================
// Notes carry a link to our own `/download/:token` proxy rather than to Zoom,
// because Zoom's download URLs need a bearer token. The token is
// base64url("<accountId>|<fileId>") so it survives as a single path segment.
// =============================================================================

/** Minimum length of a usable Zoom download file id */
const MIN_FILE_ID_LENGTH = 6;

export interface DownloadTarget {
  accountId: string;
  fileId: string;
}

export function encodeDownloadToken(accountId: string, fileId: string): string {
  return Buffer.from(`${accountId}|${fileId}`, 'utf8').toString('base64url');
}

/**
 * Decodes a proxy token. Returns `null` for anything that is not
 * `<accountId>|<fileId>` with both parts present.
 */
export function decodeDownloadToken(token: string): DownloadTarget | null {
  if (!/^[A-Za-z0-9+/=_-]+$/.test(token)) return null;
  const decoded = Buffer.from(token, 'base64url').toString('utf8');
  const parts = decoded.split('|');
  if (parts.length !== 2) return null;
  const [accountId, fileId] = parts;
  if (!accountId || !fileId) return null;
  return { accountId, fileId };
}

/**
 * The id Zoom expects on the download endpoint: the path segment after
 * `download/` in the webhook's `download_url`, else the recording id.
 */
export function extractDownloadFileId(downloadUrl: string | undefined, recordingId: string | undefined): string {
  if (downloadUrl && downloadUrl.includes('download/')) {
    const tail = downloadUrl.split('download/').pop() ?? '';
    return tail.split(/[?#]/)[0];
  }
  return recordingId ?? '';
}

/**
 * Builds the proxy link for a recording, or `null` when the file id is too
 * short to be a real Zoom id.
 */
export function buildDownloadLink(publicBaseUrl: string, accountId: string, fileId: string): string | null {
  if (fileId.length < MIN_FILE_ID_LENGTH) return null;
  return `${publicBaseUrl}/download/${encodeDownloadToken(accountId, fileId)}`;
}
