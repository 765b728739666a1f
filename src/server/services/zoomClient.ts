// =============================================================================
// Zoom API Client — server-to-server OAuth + meeting / recording helpers
// =============================================================================
// getAccessToken()            — account_credentials grant, cached until it is
//                               within 5 minutes of expiry
// getMeetingParticipants(id)  — past-meeting participants; any failure → []
// openPhoneRecordingStream()  — authorised streaming download of a phone
//                               recording file
//
// Every request goes through `withRetry` so 429 / 5xx / 401 are handled the
// same way as on the CRM side.
// =============================================================================
import axios, { AxiosAdapter, AxiosInstance } from 'axios';
import { Readable } from 'stream';
import { withRetry, RetryOptions } from './httpClient';
import { ProviderError } from '../utils/ProviderError';
import { errorMessage } from '../utils/sanitizeError';
import logger from '../utils/logger';
import { EventSourceGateway, MeetingParticipant } from '../types';

/* ── Constants ── */
const ZOOM_API_BASE = 'https://api.zoom.us/v2';
const ZOOM_DOWNLOAD_BASE = 'https://zoom.us/v2';
const ZOOM_OAUTH_URL = 'https://zoom.us/oauth/token';
const DEFAULT_TIMEOUT_MS = 15_000;

/** Refresh the cached token once it is this close to expiry */
const REFRESH_THRESHOLD_MS = 5 * 60 * 1000;

export interface ZoomClientOptions {
  accountId: string;
  clientId: string;
  clientSecret: string;
  apiBase?: string;
  downloadBase?: string;
  oauthUrl?: string;
  retry?: RetryOptions;
  /** Custom Axios adapter (tests route requests in-process) */
  adapter?: AxiosAdapter;
}

interface TokenResponse {
  access_token: string;
  expires_in?: number;
}

interface ParticipantsResponse {
  participants?: MeetingParticipant[];
}

export interface RecordingStream {
  stream: Readable;
  contentType: string;
  contentLength: string | undefined;
}

export class ZoomClient implements EventSourceGateway {
  private readonly options: ZoomClientOptions;
  private readonly http: AxiosInstance;
  private cachedToken: { value: string; expiresAt: number } | null = null;

  constructor(options: ZoomClientOptions) {
    this.options = options;
    this.http = axios.create({ timeout: DEFAULT_TIMEOUT_MS, adapter: options.adapter });
  }

  get accountId(): string {
    return this.options.accountId;
  }

  /**
   * Returns a bearer token for the Zoom REST API.
   *
   * @throws ProviderError when the OAuth endpoint rejects the credentials
   */
  async getAccessToken(forceRefresh = false): Promise<string> {
    const now = Date.now();
    if (!forceRefresh && this.cachedToken && this.cachedToken.expiresAt - now > REFRESH_THRESHOLD_MS) {
      return this.cachedToken.value;
    }

    try {
      const res = await this.http.post<TokenResponse>(
        this.options.oauthUrl ?? ZOOM_OAUTH_URL,
        new URLSearchParams({
          grant_type: 'account_credentials',
          account_id: this.options.accountId,
        }).toString(),
        {
          auth: { username: this.options.clientId, password: this.options.clientSecret },
          headers: { 'Content-Type': 'application/x-www-form-urlencoded' },
        },
      );
      const expiresInSec = res.data.expires_in ?? 3600;
      this.cachedToken = { value: res.data.access_token, expiresAt: now + expiresInSec * 1000 };
      logger.debug('Zoom access token refreshed', { expiresInSec });
      return res.data.access_token;
    } catch (err) {
      throw new ProviderError('zoom', 'token', err);
    }
  }

  /**
   * Lists the participants of a past meeting.
   *
   * Meeting UUIDs may contain `/` and `=`, so Zoom requires them to be
   * URL-encoded twice. Failures are logged and yield an empty list.
   */
  async getMeetingParticipants(meetingUuid: string): Promise<MeetingParticipant[]> {
    if (!meetingUuid) return [];
    const encoded = encodeURIComponent(encodeURIComponent(meetingUuid));

    try {
      const res = await withRetry<ParticipantsResponse>(
        'zoom',
        (force) => this.createClient(this.options.apiBase ?? ZOOM_API_BASE, force),
        (client) => client.get(`/past_meetings/${encoded}/participants`),
        this.options.retry,
      );
      const participants = res.data.participants ?? [];
      logger.debug('Fetched meeting participants', { count: participants.length });
      return participants;
    } catch (err) {
      logger.warn('Failed to fetch meeting participants', {
        error: new ProviderError('zoom', 'listParticipants', err).message,
      });
      return [];
    }
  }

  /**
   * Opens an authorised download stream for a phone recording file.
   *
   * @throws ProviderError on any upstream failure
   */
  async openPhoneRecordingStream(fileId: string): Promise<RecordingStream> {
    try {
      const res = await withRetry<Readable>(
        'zoom',
        (force) => this.createClient(this.options.downloadBase ?? ZOOM_DOWNLOAD_BASE, force),
        (client) =>
          client.get(`/phone/recording/download/${encodeURIComponent(fileId)}`, {
            responseType: 'stream',
            headers: { Accept: 'application/octet-stream' },
          }),
        this.options.retry,
      );
      const contentType = res.headers['content-type'];
      const contentLength = res.headers['content-length'];
      return {
        stream: res.data,
        contentType: typeof contentType === 'string' ? contentType : 'audio/mpeg',
        contentLength: contentLength === undefined || contentLength === null ? undefined : String(contentLength),
      };
    } catch (err) {
      logger.warn('Phone recording download failed', { error: errorMessage(err) });
      throw err instanceof ProviderError ? err : new ProviderError('zoom', 'downloadRecording', err);
    }
  }

  private async createClient(baseURL: string, forceRefresh: boolean): Promise<AxiosInstance> {
    const token = await this.getAccessToken(forceRefresh);
    return axios.create({
      baseURL,
      timeout: DEFAULT_TIMEOUT_MS,
      adapter: this.options.adapter,
      headers: {
        Authorization: `Bearer ${token}`,
        'Content-Type': 'application/json',
      },
    });
  }
}
