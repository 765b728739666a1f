// =============================================================================
// HTTP Retry Helper — shared by the Zoom and GoHighLevel clients
// =============================================================================
// withRetry(label, getClient, fn)
//   → Wraps any API call with automatic retry for:
//       • HTTP 429 (rate limit)  — waits the duration the API specifies
//       • HTTP 5xx (server err)  — exponential back-off: 1 s → 2 s → 4 s
//       • Network / timeout      — same back-off as 5xx
//       • HTTP 401               — rebuilds the client with a forced token
//                                  refresh and retries once
//     Other client errors (4xx) are never retried.
// =============================================================================
import { AxiosError, AxiosInstance, AxiosResponse } from 'axios';
import logger from '../utils/logger';

/** Builds an authorised client; `forceRefresh` bypasses any token cache */
export type ClientFactory = (forceRefresh: boolean) => Promise<AxiosInstance>;

export interface RetryOptions {
  /** Maximum number of retry attempts (applies to 429, 5xx and network) */
  maxRetries?: number;
  /** Base delay for exponential back-off (ms) */
  backoffBaseMs?: number;
}

const DEFAULT_MAX_RETRIES = 3;
const DEFAULT_BACKOFF_BASE_MS = 1_000;

/**
 * Executes `fn` against a fresh client and retries transient failures.
 *
 * @param label     — Provider name used in log lines ("zoom", "crm")
 * @param getClient — Factory returning an authorised Axios instance
 * @param fn        — The API call to execute
 */
export async function withRetry<T>(
  label: string,
  getClient: ClientFactory,
  fn: (client: AxiosInstance) => Promise<AxiosResponse<T>>,
  options: RetryOptions = {},
): Promise<AxiosResponse<T>> {
  const maxRetries = options.maxRetries ?? DEFAULT_MAX_RETRIES;
  const backoffBaseMs = options.backoffBaseMs ?? DEFAULT_BACKOFF_BASE_MS;

  let lastError: unknown;
  let tokenRefreshed = false;

  for (let attempt = 0; attempt <= maxRetries; attempt++) {
    try {
      const client = await getClient(tokenRefreshed);
      return await fn(client);
    } catch (err) {
      lastError = err;
      if (!(err instanceof AxiosError)) throw err;

      const status = err.response?.status;

      // ── Token expired / invalid → force-refresh and retry once ────────
      if (status === 401 && !tokenRefreshed) {
        logger.warn(`${label} 401, forcing token refresh and retrying`, { attempt });
        tokenRefreshed = true;
        continue;
      }

      // ── Rate limited (429) ────────────────────────────────────────────
      if (status === 429) {
        if (attempt >= maxRetries) break;
        const waitMs = parseRetryAfter(err, backoffBaseMs * Math.pow(2, attempt));
        logger.warn(`${label} rate limit hit (429), backing off`, { attempt, waitMs });
        await sleep(waitMs);
        continue;
      }

      // ── Server error (5xx) ────────────────────────────────────────────
      if (status !== undefined && status >= 500) {
        if (attempt >= maxRetries) break;
        const delay = backoffBaseMs * Math.pow(2, attempt);
        logger.warn(`${label} server error (${status}), retrying in ${delay}ms`, {
          attempt,
          status,
        });
        await sleep(delay);
        continue;
      }

      // ── Network / timeout error (no HTTP status) ─────────────────────
      if (status === undefined) {
        if (attempt >= maxRetries) break;
        const delay = backoffBaseMs * Math.pow(2, attempt);
        logger.warn(`${label} network/timeout error, retrying`, { attempt, code: err.code });
        await sleep(delay);
        continue;
      }

      // ── Client error (4xx except 401/429): do NOT retry ─────────────
      throw err;
    }
  }

  logger.error(`${label} API call failed after all retry attempts`, { maxRetries });
  throw lastError;
}

/**
 * Parse the `Retry-After` header (seconds). Falls back to `fallbackMs`.
 */
function parseRetryAfter(err: AxiosError, fallbackMs: number): number {
  const header: unknown = err.response?.headers?.['retry-after'];
  if (header !== undefined && header !== null) {
    const seconds = parseInt(String(header), 10);
    if (!isNaN(seconds) && seconds > 0) {
      return seconds * 1000;
    }
  }
  return fallbackMs;
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
