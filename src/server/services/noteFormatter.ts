// =============================================================================
// Note Formatter — plain-text CRM note bodies
// =============================================================================
// One renderer per activity kind. Output depends only on the webhook object
// and the arguments (no "logged at" clock line), so the same activity for
// the same contact always renders the same text and the note deduplicator
// can recognise it. Missing values render as "N/A".
// =============================================================================
import { JsonRecord } from '../types';
import { childRecord, partyNumber, readString, recordList } from './identityNormalizer';

const NA = 'N/A';
const SOURCE_LINE = '- Source: Zoom Integration';
const PHONE_SOURCE_LINE = '- Source: Zoom Phone Integration';

export type SmsRole = 'sender' | 'recipient';
export type CallRole = 'caller' | 'callee';

function field(object: JsonRecord, ...keys: string[]): string {
  for (const key of keys) {
    const value = readString(object, key);
    if (value) return value;
  }
  return NA;
}

function seconds(object: JsonRecord, key: string): number {
  const raw = object[key];
  const value = typeof raw === 'number' ? raw : Number(readString(object, key));
  return Number.isFinite(value) && value > 0 ? Math.floor(value) : 0;
}

/** 125 → "2m 5s" */
export function formatDuration(totalSeconds: number): string {
  return `${Math.floor(totalSeconds / 60)}m ${totalSeconds % 60}s`;
}

/** "meeting.participant_joined" → "Meeting.Participant_Joined" */
export function titleCase(text: string): string {
  return text.toLowerCase().replace(/(^|[^a-z])([a-z])/g, (_m, sep: string, ch: string) => sep + ch.toUpperCase());
}

function meetingUrl(object: JsonRecord): string {
  const joinUrl = readString(object, 'join_url');
  if (joinUrl) return joinUrl;
  const id = readString(object, 'id') || readString(object, 'uuid');
  return id ? `https://zoom.us/j/${id}` : NA;
}

// ─────────────────────────────────────────────────────────────────────────────
// Meetings
// ─────────────────────────────────────────────────────────────────────────────

export function renderMeetingNote(eventType: string, meeting: JsonRecord): string {
  return [
    `Zoom ${titleCase(eventType)} Activity:`,
    `- Topic: ${field(meeting, 'topic')}`,
    `- Start Time: ${field(meeting, 'start_time')}`,
    `- Meeting ID: ${field(meeting, 'uuid')}`,
    `- Meeting URL: ${meetingUrl(meeting)}`,
    SOURCE_LINE,
  ].join('\n');
}

export function renderMeetingRecordingNote(recording: JsonRecord, participant: string): string {
  const fileLines: string[] = [];
  for (const file of recordList(recording, 'recording_files')) {
    const playUrl = readString(file, 'play_url');
    if (!playUrl) continue;
    const type = (readString(file, 'file_type') || 'unknown').toUpperCase();
    fileLines.push(`- ${type}: ${playUrl} (${seconds(file, 'file_size')} bytes)`);
  }

  const lines = [
    'Zoom Meeting Recording Completed:',
    `- Topic: ${field(recording, 'topic')}`,
    `- Meeting ID: ${field(recording, 'uuid')}`,
    `- Meeting URL: ${meetingUrl(recording)}`,
    `- Public Share URL: ${field(recording, 'share_url')}`,
  ];
  if (participant) lines.push(`- Participant: ${participant}`);
  lines.push('- Recording Files:');
  lines.push(...(fileLines.length > 0 ? fileLines : ['- No recording files available']));
  lines.push(SOURCE_LINE);
  return lines.join('\n');
}

// ─────────────────────────────────────────────────────────────────────────────
// SMS
// ─────────────────────────────────────────────────────────────────────────────

export function renderSmsNote(eventType: string, sms: JsonRecord, role: SmsRole): string {
  const senderPhone = role === 'sender' ? field(childRecord(sms, 'sender'), 'phone_number') : NA;
  return [
    `Zoom SMS Activity - ${eventType.toUpperCase()}:`,
    `- Message Content: ${field(sms, 'message', 'content')}`,
    `- Message Type: ${field(sms, 'message_type')}`,
    `- Direction: ${role}`,
    `- Timestamp: ${field(sms, 'date_time', 'timestamp')}`,
    `- Message ID: ${field(sms, 'message_id')}`,
    `- Phone Number: ${senderPhone}`,
    `- Event Type: ${eventType}`,
    SOURCE_LINE,
  ].join('\n');
}

// ─────────────────────────────────────────────────────────────────────────────
// Zoom Phone
// ─────────────────────────────────────────────────────────────────────────────

export function renderPhoneCallNote(eventType: string, call: JsonRecord, role: CallRole): string {
  return [
    `Zoom Phone Call Activity - ${eventType.toUpperCase()}:`,
    `- Caller Number: ${partyNumber(call, 'caller') || NA}`,
    `- Callee Number: ${partyNumber(call, 'callee') || NA}`,
    `- Call ID: ${field(call, 'call_id')}`,
    `- Duration: ${formatDuration(seconds(call, 'duration'))}`,
    `- Start Time: ${field(call, 'start_time')}`,
    `- End Time: ${field(call, 'end_time')}`,
    `- Role: ${role}`,
    `- Event Type: ${eventType}`,
    PHONE_SOURCE_LINE,
  ].join('\n');
}

/**
 * @param downloadLink — Proxy link for the audio, or `null` when the
 *                       recording has no usable file id
 */
export function renderPhoneRecordingNote(
  eventType: string,
  recording: JsonRecord,
  role: CallRole,
  downloadLink: string | null,
): string {
  return [
    `Zoom Phone Call Recording Completed - ${eventType.toUpperCase()}:`,
    `- Caller Number: ${partyNumber(recording, 'caller') || NA} (${field(recording, 'caller_name')})`,
    `- Callee Number: ${partyNumber(recording, 'callee') || NA} (${field(recording, 'callee_name')})`,
    `- Call ID: ${field(recording, 'call_id')}`,
    `- File ID: ${field(recording, 'id')}`,
    `- Call Log ID: ${field(recording, 'call_log_id')}`,
    `- Duration: ${formatDuration(seconds(recording, 'duration'))}`,
    `- Start Time: ${field(recording, 'date_time')}`,
    downloadLink ? `- Download Recording: ${downloadLink}` : '- No recording available for this call',
    `- Role: ${role}`,
    `- Event Type: ${eventType}`,
    PHONE_SOURCE_LINE,
  ].join('\n');
}
