// =============================================================================
// Sync Session — the context every webhook is processed in
// =============================================================================
// Owns the processed-event set, the written-note set and the collaborators
// (event source, CRM, resolver, activity logger, router). Nothing lives in
// module-level state, so a test can build as many isolated sessions as it
// needs.
//
// Webhooks run one at a time (p-limit, concurrency 1): the seen → process →
// mark sequence of one event never interleaves with another's.
// =============================================================================
import pLimit from 'p-limit';
import { ContactResolver } from './contactResolver';
import { ActivityLogger } from './activityLogger';
import { EventRouter } from './eventRouter';
import { computeEventKey, DEFAULT_DEDUPE_CAPACITY, EventDeduplicator } from './eventDeduplicator';
import { NoteDeduplicator } from './noteDeduplicator';
import { buildUrlValidationResponse, verifySignature } from './webhookAuthenticator';
import { ZoomClient } from './zoomClient';
import { CrmContactsClient } from './crmContacts';
import { AuthenticationError } from '../utils/ProviderError';
import logger from '../utils/logger';
import { AppConfig } from '../config';
import { CrmGateway, EventSourceGateway, UrlValidationResponse, ZoomWebhookEvent } from '../types';

export interface SyncSessionOptions {
  eventSource: EventSourceGateway;
  crm: CrmGateway;
  /** Zoom webhook secret token (signatures and URL validation) */
  webhookSecret: string;
  publicBaseUrl: string;
  accountId: string;
  eventCapacity?: number;
  noteCapacity?: number;
  /** Clock in epoch milliseconds */
  now?: () => number;
}

export interface SessionStats {
  processedEvents: number;
  writtenNotes: number;
}

export class SyncSession {
  private readonly events: EventDeduplicator;
  private readonly notes: NoteDeduplicator;
  private readonly router: EventRouter;
  private readonly webhookSecret: string;
  private readonly queue = pLimit(1);

  constructor(options: SyncSessionOptions) {
    this.webhookSecret = options.webhookSecret;
    this.events = new EventDeduplicator(options.eventCapacity ?? DEFAULT_DEDUPE_CAPACITY);
    this.notes = new NoteDeduplicator(options.noteCapacity ?? DEFAULT_DEDUPE_CAPACITY);

    const resolver = new ContactResolver(options.crm, { now: options.now });
    this.router = new EventRouter({
      resolver,
      activity: new ActivityLogger(options.crm, this.notes),
      eventSource: options.eventSource,
      publicBaseUrl: options.publicBaseUrl,
      accountId: options.accountId,
    });
  }

  /** Checks an `x-zm-signature` header against the raw body */
  verify(rawBody: Buffer | string, signature: string | undefined): boolean {
    return verifySignature(rawBody, signature, this.webhookSecret);
  }

  /**
   * @throws AuthenticationError when the signature does not match
   */
  assertAuthentic(rawBody: Buffer | string, signature: string | undefined): void {
    if (!this.verify(rawBody, signature)) throw new AuthenticationError();
  }

  urlValidation(plainToken: string): UrlValidationResponse {
    return buildUrlValidationResponse(plainToken, this.webhookSecret);
  }

  /**
   * Processes one webhook after every earlier one has finished.
   *
   * Only a fully written event is marked; one where some CRM write failed
   * still returns `true` but stays unmarked, so a redelivery retries the
   * missing writes and the note set skips the ones already made.
   *
   * @returns `false` only when the handler failed outright
   */
  processWebhook(event: ZoomWebhookEvent): Promise<boolean> {
    return this.queue(() => this.process(event));
  }

  stats(): SessionStats {
    return { processedEvents: this.events.size, writtenNotes: this.notes.size };
  }

  /** Drops queued webhooks and forgets every processed key */
  close(): void {
    this.queue.clearQueue();
    this.events.clear();
    this.notes.clear();
  }

  private async process(event: ZoomWebhookEvent): Promise<boolean> {
    const key = computeEventKey(event);

    if (this.events.seen(key)) {
      logger.info('Duplicate Zoom event skipped', { eventType: event.event, eventKey: key });
      return true;
    }

    const outcome = await this.router.route(event);
    if (outcome === 'done') {
      this.events.mark(key);
      logger.info('Zoom event processed', { eventType: event.event, eventKey: key });
      return true;
    }

    logger.warn(
      outcome === 'partial'
        ? 'Zoom event partly processed, left unmarked for redelivery'
        : 'Zoom event processing failed, left unmarked for redelivery',
      { eventType: event.event, eventKey: key },
    );
    return outcome === 'partial';
  }
}

// ─────────────────────────────────────────────────────────────────────────────
// Factory — production wiring from config
// ─────────────────────────────────────────────────────────────────────────────

export interface SessionBundle {
  session: SyncSession;
  zoom: ZoomClient;
}

export function createSyncSession(config: AppConfig): SessionBundle {
  const zoom = new ZoomClient({
    accountId: config.zoomAccountId,
    clientId: config.zoomClientId,
    clientSecret: config.zoomClientSecret,
  });
  const crm = new CrmContactsClient({
    apiKey: config.ghlApiKey,
    locationId: config.ghlLocationId || undefined,
  });

  const session = new SyncSession({
    eventSource: zoom,
    crm,
    webhookSecret: config.zoomWebhookSecretToken,
    publicBaseUrl: config.publicBaseUrl,
    accountId: config.zoomAccountId,
    eventCapacity: config.dedupeCapacity,
    noteCapacity: config.dedupeCapacity,
  });

  return { session, zoom };
}
