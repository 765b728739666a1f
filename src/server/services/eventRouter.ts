// =============================================================================
// Event Router — webhook → participants → contacts → notes
// =============================================================================
// classifyEvent() picks a handler from the event type (case-insensitive
// substring, first match wins):
//
//   1. sms | message                               → SMS
//   2. phone.call.caller | phone.call.callee |
//      phone.caller | phone.callee                 → phone call
//   3. phone.recording | call.recording            → phone recording
//   4. recording                                   → meeting recording
//   5. anything else                               → meeting
//
// Each handler extracts the people involved, resolves each to a contact and
// writes the rendered note. A person whose CRM write failed is skipped
// without failing the event, but the outcome is `partial` so the session
// leaves the event unmarked and a redelivery retries it; a contact reached
// twice in one event gets one note.
// =============================================================================
import { ContactResolver, isResolvable } from './contactResolver';
import { ActivityLogger } from './activityLogger';
import {
  childRecord,
  normalizeParticipant,
  partyNumber,
  readString,
  recordList,
  summarizeDescriptor,
} from './identityNormalizer';
import {
  CallRole,
  SmsRole,
  renderMeetingNote,
  renderMeetingRecordingNote,
  renderPhoneCallNote,
  renderPhoneRecordingNote,
  renderSmsNote,
} from './noteFormatter';
import { buildDownloadLink, extractDownloadFileId } from './zoomRecordings';
import { errorMessage } from '../utils/sanitizeError';
import logger from '../utils/logger';
import {
  EventKind,
  EventSourceGateway,
  JsonRecord,
  ParticipantContext,
  PersonDescriptor,
  ResolutionPolicy,
  ZoomWebhookEvent,
} from '../types';

const CLASSIFICATION: ReadonlyArray<[EventKind, readonly string[]]> = [
  ['sms', ['sms', 'message']],
  ['phone_call', ['phone.call.caller', 'phone.call.callee', 'phone.caller', 'phone.callee']],
  ['phone_recording', ['phone.recording', 'call.recording']],
  ['meeting_recording', ['recording']],
];

/**
 * done     every contact written
 * partial  handled, but at least one CRM write failed
 * failed   nothing to process, or the handler threw
 */
export type RouteOutcome = 'done' | 'partial' | 'failed';

export function classifyEvent(eventType: string): EventKind {
  const lower = eventType.toLowerCase();
  for (const [kind, needles] of CLASSIFICATION) {
    if (needles.some((needle) => lower.includes(needle))) return kind;
  }
  return 'meeting';
}

export interface EventRouterOptions {
  resolver: ContactResolver;
  activity: ActivityLogger;
  eventSource: EventSourceGateway;
  /** Base URL of this service, used for recording download links */
  publicBaseUrl: string;
  /** Zoom account id used when the webhook does not carry one */
  accountId: string;
}

/** One person to resolve and the note to attach once resolved */
interface NoteTarget {
  raw: JsonRecord;
  context: ParticipantContext;
  policy: ResolutionPolicy;
  render: (descriptor: PersonDescriptor) => string;
}

export class EventRouter {
  private readonly options: EventRouterOptions;

  private readonly handlers: Record<EventKind, (event: ZoomWebhookEvent) => Promise<RouteOutcome>> = {
    sms: (event) => this.handleSms(event),
    phone_call: (event) => this.handlePhoneCall(event),
    phone_recording: (event) => this.handlePhoneRecording(event),
    meeting_recording: (event) => this.handleMeetingRecording(event),
    meeting: (event) => this.handleMeeting(event),
  };

  constructor(options: EventRouterOptions) {
    this.options = options;
  }

  /** Runs the handler for the event's kind */
  async route(event: ZoomWebhookEvent): Promise<RouteOutcome> {
    const kind = classifyEvent(event.event);
    logger.info('Routing Zoom event', { eventType: event.event, kind });

    try {
      return await this.handlers[kind](event);
    } catch (err) {
      logger.error('Event handler failed', { eventType: event.event, kind, error: errorMessage(err) });
      return 'failed';
    }
  }

  // ─── Meetings ─────────────────────────────────────────────────────────

  private async handleMeeting(event: ZoomWebhookEvent): Promise<RouteOutcome> {
    const meeting = event.payload.object ?? {};
    let participants = recordList(meeting, 'participant');
    if (participants.length === 0) participants = recordList(meeting, 'host');

    const body = renderMeetingNote(event.event, meeting);
    return this.processTargets(
      event.event,
      participants.map((raw): NoteTarget => ({ raw, context: 'meeting', policy: 'general', render: () => body })),
    );
  }

  private async handleMeetingRecording(event: ZoomWebhookEvent): Promise<RouteOutcome> {
    const recording = event.payload.object ?? {};
    const participants = await this.options.eventSource.getMeetingParticipants(readString(recording, 'uuid'));

    if (participants.length === 0) {
      logger.info('No meeting participants found, falling back to host');
      const host: JsonRecord = {
        email: readString(recording, 'host_email'),
        first_name: 'Host',
        user_id: readString(recording, 'host_id'),
      };
      return this.processTargets(event.event, [
        { raw: host, context: 'meeting', policy: 'general', render: () => renderMeetingRecordingNote(recording, 'Host') },
      ]);
    }

    return this.processTargets(
      event.event,
      participants.map((raw): NoteTarget => ({
        raw,
        context: 'meeting',
        policy: 'general',
        render: (descriptor) => renderMeetingRecordingNote(recording, participantLabel(descriptor)),
      })),
    );
  }

  // ─── SMS ──────────────────────────────────────────────────────────────

  private async handleSms(event: ZoomWebhookEvent): Promise<RouteOutcome> {
    const sms = event.payload.object ?? {};
    const targets: NoteTarget[] = [];
    const smsTarget = (raw: JsonRecord, context: ParticipantContext, role: SmsRole): NoteTarget => ({
      raw,
      context,
      policy: 'general',
      render: () => renderSmsNote(event.event, sms, role),
    });

    const sender = childRecord(sms, 'sender');
    if (Object.keys(sender).length > 0) targets.push(smsTarget(sender, 'sms_sender', 'sender'));

    let recipients = recordList(sms, 'to_members');
    if (recipients.length === 0) recipients = recordList(sms, 'recipient');
    for (const recipient of recipients) targets.push(smsTarget(recipient, 'sms_recipient', 'recipient'));

    return this.processTargets(event.event, targets);
  }

  // ─── Zoom Phone ───────────────────────────────────────────────────────

  private async handlePhoneCall(event: ZoomWebhookEvent): Promise<RouteOutcome> {
    const call = event.payload.object ?? {};
    const lower = event.event.toLowerCase();
    const roles: CallRole[] = (['caller', 'callee'] as const).filter((role) => lower.includes(role));

    const targets: NoteTarget[] = [];
    for (const role of roles) {
      const phone = partyNumber(call, role);
      if (!phone) continue;
      targets.push({
        raw: { phone, name: readString(call, `${role}_name`) },
        context: role,
        policy: 'phoneOnly',
        render: () => renderPhoneCallNote(event.event, call, role),
      });
    }

    return this.processTargets(event.event, targets);
  }

  private async handlePhoneRecording(event: ZoomWebhookEvent): Promise<RouteOutcome> {
    const object = event.payload.object ?? {};
    let recordings = recordList(object, 'recordings');
    if (recordings.length === 0 && readString(object, 'id')) recordings = [object];
    if (recordings.length === 0) {
      logger.warn('Phone recording event carried no recordings', { eventType: event.event });
      return 'failed';
    }

    const accountId = event.payload.account_id || this.options.accountId;
    let outcome: RouteOutcome = 'done';

    for (const recording of recordings) {
      const fileId = extractDownloadFileId(readString(recording, 'download_url'), readString(recording, 'id'));
      const link = buildDownloadLink(this.options.publicBaseUrl, accountId, fileId);
      const roles: CallRole[] = readString(recording, 'direction') === 'inbound' ? ['caller'] : ['caller', 'callee'];

      const targets: NoteTarget[] = [];
      for (const role of roles) {
        const phone = partyNumber(recording, role);
        if (!phone) continue;
        targets.push({
          raw: { phone, name: readString(recording, `${role}_name`) },
          context: role,
          policy: 'phoneOnly',
          render: () => renderPhoneRecordingNote(event.event, recording, role, link),
        });
      }
      if ((await this.processTargets(event.event, targets)) === 'partial') outcome = 'partial';
    }
    return outcome;
  }

  // ─── Shared ───────────────────────────────────────────────────────────

  /**
   * Resolves each target and writes its note once per contact.
   * `partial` when a resolvable person could not be resolved or a note
   * write failed.
   */
  private async processTargets(eventType: string, targets: NoteTarget[]): Promise<RouteOutcome> {
    const processed = new Set<string>();
    let failures = 0;

    for (const target of targets) {
      const descriptor = normalizeParticipant(target.raw, target.context);
      const contactId = await this.options.resolver.resolveOrCreate(descriptor, target.policy);

      if (!contactId) {
        const resolvable = isResolvable(descriptor, target.policy);
        if (resolvable) failures++;
        logger.warn('No contact resolved for participant', {
          eventType,
          crmFailure: resolvable,
          descriptor: summarizeDescriptor(descriptor),
        });
        continue;
      }
      if (processed.has(contactId)) {
        logger.debug('Contact already handled for this event', { eventType, contactId });
        continue;
      }

      processed.add(contactId);
      if (!(await this.options.activity.logNote(contactId, target.render(descriptor)))) failures++;
    }

    logger.info('Event contacts processed', { eventType, contacts: processed.size, failures });
    return failures > 0 ? 'partial' : 'done';
  }
}

/** Email, else full name, else "User <id>" */
function participantLabel(descriptor: PersonDescriptor): string {
  if (descriptor.email) return descriptor.email;
  const name = [descriptor.displayName, descriptor.lastName].filter(Boolean).join(' ');
  if (name) return name;
  return descriptor.providerUserId ? `User ${descriptor.providerUserId}` : '';
}
