// =============================================================================
// Shared Type Definitions
// =============================================================================

/** Loose JSON object as delivered by Zoom webhooks and REST responses */
export type JsonRecord = Record<string, unknown>;

/** Which resolution policy the contact resolver applies */
export type ResolutionPolicy = 'general' | 'phoneOnly';

/** Where a descriptor came from; drives placeholder names */
export type ParticipantContext =
  | 'meeting'
  | 'caller'
  | 'callee'
  | 'sms_sender'
  | 'sms_recipient';

/** Router classification of an inbound event */
export type EventKind =
  | 'sms'
  | 'phone_call'
  | 'phone_recording'
  | 'meeting_recording'
  | 'meeting';

/**
 * Normalised identifying fields for one person. Phone and email keep their
 * raw form; comparison-time normalisation never mutates them.
 */
export interface PersonDescriptor {
  email?: string;
  phone?: string;
  displayName?: string;
  lastName?: string;
  providerUserId?: string;
  /** Synthetic `@placeholder.com` address, set when no real email exists */
  placeholderEmail?: string;
}

/** GoHighLevel contact (v1 REST), only the fields the resolver reads */
export interface CrmContact {
  id: string;
  email?: string | null;
  firstName?: string | null;
  lastName?: string | null;
  phone?: string | null;
  status?: string | null;
  deletedAt?: string | null;
  archivedAt?: string | null;
  dnd?: boolean;
}

/** GoHighLevel custom field as sent on create */
export interface CrmCustomField {
  key: string;
  value: string;
}

/** Payload sent on contact create / update */
export interface ContactInput {
  firstName: string;
  lastName: string;
  email: string;
  phone: string;
  /** Where a placeholder contact came from (`zoom_user_id`, `phone_source`) */
  customFields?: CrmCustomField[];
}

/** Zoom webhook envelope */
export interface ZoomWebhookEvent {
  event: string;
  event_ts?: number | string;
  payload: {
    account_id?: string;
    object?: JsonRecord;
    plainToken?: string;
    [key: string]: unknown;
  };
}

/** Zoom past-meeting participant (REST) */
export interface MeetingParticipant {
  id?: string;
  name?: string;
  user_id?: string;
  user_email?: string;
  email?: string;
  [key: string]: unknown;
}

/** Response body for Zoom's endpoint.url_validation challenge */
export interface UrlValidationResponse {
  plainToken: string;
  encryptedToken: string;
}

/**
 * CRM collaborator as seen by the resolver and activity logger.
 * Every method may throw a ProviderError.
 */
export interface CrmGateway {
  searchContactsByEmail(email: string): Promise<CrmContact[]>;
  searchContactsByPhone(phone: string): Promise<CrmContact[]>;
  searchContactsByName(name: string): Promise<CrmContact[]>;
  searchContactsGeneral(query: string): Promise<CrmContact[]>;
  createContact(input: ContactInput): Promise<CrmContact>;
  updateContact(contactId: string, input: Partial<ContactInput>): Promise<CrmContact>;
  addNote(contactId: string, body: string): Promise<void>;
}

/** Event-source collaborator as seen by the router */
export interface EventSourceGateway {
  getMeetingParticipants(meetingUuid: string): Promise<MeetingParticipant[]>;
}
