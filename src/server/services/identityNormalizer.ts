// =============================================================================
// Identity Normalizer
// =============================================================================
// Turns a raw Zoom person record (meeting participant, host, SMS sender,
// caller / callee) into a `PersonDescriptor`:
//
//   • name      — first_name, else user_name, else name, else display_name
//   • phone     — phone, else phone_number
//   • email     — email, else email_address, else user_email
//   • user id   — participant_uuid, participant_user_id, user_id, id
//
// When no real email exists a placeholder address is derived from the
// strongest identifier available so the CRM (which wants an email on every
// contact) can still store the person. Pure functions only.
// =============================================================================
import crypto from 'crypto';
import { JsonRecord, ParticipantContext, PersonDescriptor } from '../types';

export const PLACEHOLDER_DOMAIN = 'placeholder.com';

/** Names used when the real name is missing or is really a phone number */
export const CONTEXT_PLACEHOLDER_NAMES: Record<ParticipantContext, string> = {
  meeting: 'Meeting Participant',
  caller: 'Caller',
  callee: 'Callee',
  sms_sender: 'SMS Sender',
  sms_recipient: 'SMS Recipient',
};

const PLACEHOLDER_NAME_SET = new Set(Object.values(CONTEXT_PLACEHOLDER_NAMES));

/** Contexts that always carry a name, even when Zoom sent none */
const NAMED_BY_DEFAULT: ReadonlySet<ParticipantContext> = new Set([
  'caller',
  'callee',
  'sms_sender',
  'sms_recipient',
]);

// ─────────────────────────────────────────────────────────────────────────────
// Field helpers
// ─────────────────────────────────────────────────────────────────────────────

/** Reads a string-ish field, trimmed; numbers are stringified */
export function readString(raw: JsonRecord, key: string): string {
  const value = raw[key];
  if (typeof value === 'string') return value.trim();
  if (typeof value === 'number' && Number.isFinite(value)) return String(value);
  return '';
}

export function isRecord(value: unknown): value is JsonRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** `object.<key>` as a record, or an empty one */
export function childRecord(object: JsonRecord, key: string): JsonRecord {
  const value = object[key];
  return isRecord(value) ? value : {};
}

/** `object.<key>` as a list of records; a single record becomes a list of one */
export function recordList(object: JsonRecord, key: string): JsonRecord[] {
  const value = object[key];
  if (Array.isArray(value)) return value.filter(isRecord);
  return isRecord(value) ? [value] : [];
}

/** `caller_number`, else `caller.phone_number` */
export function partyNumber(object: JsonRecord, party: 'caller' | 'callee'): string {
  return readString(object, `${party}_number`) || readString(childRecord(object, party), 'phone_number');
}

function firstOf(raw: JsonRecord, keys: readonly string[]): string {
  for (const key of keys) {
    const value = readString(raw, key);
    if (value) return value;
  }
  return '';
}

/**
 * True when `text` only holds digits, `+`, `-`, spaces and parentheses and
 * has at least ten digits, i.e. a phone number typed into a name field.
 */
export function isPhoneLike(text: string): boolean {
  if (!text || !/^[\d+\-\s()]+$/.test(text)) return false;
  return text.replace(/\D/g, '').length >= 10;
}

/** Lower-case, underscores for whitespace, only `[a-z0-9._-]` kept */
export function slugify(text: string): string {
  return text
    .trim()
    .toLowerCase()
    .replace(/\s+/g, '_')
    .replace(/[^a-z0-9._-]/g, '');
}

export function isPlaceholderEmail(email: string | undefined): boolean {
  return !!email && email.toLowerCase().endsWith(`@${PLACEHOLDER_DOMAIN}`);
}

/** True for one of the generic context names ("Caller", …) */
export function isPlaceholderName(name: string | undefined): boolean {
  return !!name && PLACEHOLDER_NAME_SET.has(name);
}

export function placeholderEmail(kind: string, slug: string): string {
  return `${kind}_${slug}@${PLACEHOLDER_DOMAIN}`;
}

// ─────────────────────────────────────────────────────────────────────────────
// normalizeParticipant
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Builds a descriptor from a raw Zoom person record.
 *
 * @param raw     — The record as Zoom sent it
 * @param context — Role of the person in the event; picks placeholder names
 */
export function normalizeParticipant(raw: JsonRecord, context: ParticipantContext): PersonDescriptor {
  const email = firstOf(raw, ['email', 'email_address', 'user_email']);
  let phone = firstOf(raw, ['phone', 'phone_number']);

  const participantUuid = readString(raw, 'participant_uuid');
  const participantUserId = readString(raw, 'participant_user_id');
  const userId = readString(raw, 'user_id') || readString(raw, 'id');

  const firstName = readString(raw, 'first_name');
  let lastName = readString(raw, 'last_name');
  let displayName = firstName || firstOf(raw, ['user_name', 'name', 'display_name']);

  if (isPhoneLike(displayName)) {
    if (!phone) phone = displayName;
    displayName = CONTEXT_PLACEHOLDER_NAMES[context];
  } else if (!firstName && displayName && !lastName) {
    // Full name in a single field: split "Ada Lovelace King" → "Ada" / "Lovelace King"
    const parts = displayName.split(/\s+/);
    displayName = parts[0];
    lastName = parts.slice(1).join(' ');
  }

  if (!displayName && NAMED_BY_DEFAULT.has(context)) {
    displayName = CONTEXT_PLACEHOLDER_NAMES[context];
  }

  const descriptor: PersonDescriptor = {};
  if (email) descriptor.email = email;
  if (phone) descriptor.phone = phone;
  if (displayName) descriptor.displayName = displayName;
  if (lastName) descriptor.lastName = lastName;

  const providerUserId = participantUuid || participantUserId || userId;
  if (providerUserId) descriptor.providerUserId = providerUserId;

  if (!email) {
    descriptor.placeholderEmail = derivePlaceholderEmail(raw, {
      participantUuid,
      participantUserId,
      userId,
      displayName: isPlaceholderName(displayName) ? '' : displayName,
      lastName,
      phone,
    });
  }

  return descriptor;
}

interface PlaceholderSources {
  participantUuid: string;
  participantUserId: string;
  userId: string;
  displayName: string;
  lastName: string;
  phone: string;
}

/**
 * participant UUID > participant / user id > name > phone > record hash.
 * A source whose slug comes out empty is skipped.
 */
function derivePlaceholderEmail(raw: JsonRecord, src: PlaceholderSources): string {
  const candidates: Array<[string, string]> = [
    ['zoom_participant', slugify(src.participantUuid)],
    ['zoom_participant', slugify(src.participantUserId)],
    ['zoom_user', slugify(src.userId)],
    ['zoom_participant', slugify([src.displayName, src.lastName].filter(Boolean).join('_'))],
    ['phone', src.phone.replace(/\D/g, '')],
  ];

  for (const [kind, slug] of candidates) {
    if (slug) return placeholderEmail(kind, slug);
  }

  const digest = crypto.createHash('sha256').update(JSON.stringify(raw)).digest('hex').slice(0, 8);
  return placeholderEmail('zoom_unknown', digest);
}

// ─────────────────────────────────────────────────────────────────────────────
// Descriptor helpers
// ─────────────────────────────────────────────────────────────────────────────

/** Name usable for matching; generic context names never are */
export function matchableName(descriptor: PersonDescriptor): string | undefined {
  const name = descriptor.displayName;
  if (!name || isPlaceholderName(name)) return undefined;
  return [name, descriptor.lastName].filter(Boolean).join(' ');
}

/**
 * A descriptor can be resolved when it carries an email, a phone, a real
 * name or a provider id.
 */
export function hasIdentifyingData(descriptor: PersonDescriptor): boolean {
  return !!(
    descriptor.email ||
    descriptor.phone ||
    matchableName(descriptor) ||
    descriptor.providerUserId
  );
}

/** Log-safe summary: masked email, last four phone digits */
export function summarizeDescriptor(descriptor: PersonDescriptor): Record<string, string> {
  const summary: Record<string, string> = {};
  if (descriptor.email) {
    const [local, domain] = descriptor.email.split('@');
    summary.email = `${local.slice(0, 2)}***@${domain ?? ''}`;
  }
  if (descriptor.phone) summary.phone = `***${descriptor.phone.replace(/\D/g, '').slice(-4)}`;
  if (descriptor.displayName) summary.name = descriptor.displayName;
  if (descriptor.providerUserId) summary.providerUserId = descriptor.providerUserId;
  if (descriptor.placeholderEmail) summary.placeholderEmail = descriptor.placeholderEmail;
  return summary;
}
