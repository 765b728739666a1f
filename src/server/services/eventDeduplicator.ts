// =============================================================================
// Event Deduplicator — first layer of duplicate prevention
// =============================================================================
// Zoom delivers webhooks at least once. Every event gets a key built from
// the fields that identify it; a key is marked only after the event was
// processed successfully, so a failed event is retried on redelivery.
//
// Key layout by category (case-insensitive substring on the event type):
//
//   phone.call       type_caller_callee_callId_ts
//   phone.recording  type_caller_callee_fileId_ts
//   sms              type_senderPhone_messageId_ts
//   meeting          type_meetingUuid_hostId_ts
//   anything else    type_ts_<12 hex of sha256(payload.object)>
// =============================================================================
import crypto from 'crypto';
import { BoundedSet } from '../utils/boundedSet';
import logger from '../utils/logger';
import { ZoomWebhookEvent } from '../types';
import { childRecord, partyNumber, readString } from './identityNormalizer';

export const DEFAULT_DEDUPE_CAPACITY = 1000;

/**
 * Builds the dedup key for a webhook. Identical payloads always produce
 * identical keys.
 */
export function computeEventKey(event: ZoomWebhookEvent): string {
  const type = event.event;
  const lower = type.toLowerCase();
  const object = event.payload.object ?? {};
  const ts = event.event_ts === undefined ? '' : String(event.event_ts);

  let parts: string[];
  if (lower.includes('phone.call')) {
    parts = [type, partyNumber(object, 'caller'), partyNumber(object, 'callee'), readString(object, 'call_id'), ts];
  } else if (lower.includes('phone.recording')) {
    parts = [type, partyNumber(object, 'caller'), partyNumber(object, 'callee'), readString(object, 'id'), ts];
  } else if (lower.includes('sms')) {
    const sender = childRecord(object, 'sender');
    parts = [type, readString(sender, 'phone_number'), readString(object, 'message_id'), ts];
  } else if (lower.includes('meeting')) {
    parts = [type, readString(object, 'uuid'), readString(object, 'host_id'), ts];
  } else {
    const digest = crypto.createHash('sha256').update(JSON.stringify(object)).digest('hex').slice(0, 12);
    parts = [type, ts, digest];
  }

  return parts.join('_');
}

export class EventDeduplicator {
  private readonly processed: BoundedSet<string>;

  constructor(capacity = DEFAULT_DEDUPE_CAPACITY) {
    this.processed = new BoundedSet<string>(capacity);
  }

  seen(key: string): boolean {
    return this.processed.has(key);
  }

  /** Record a successfully processed event */
  mark(key: string): void {
    if (this.processed.add(key)) {
      logger.info('Processed-event set reached capacity, cleared');
    }
  }

  get size(): number {
    return this.processed.size;
  }

  clear(): void {
    this.processed.clear();
  }
}
