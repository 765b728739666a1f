// =============================================================================
// Note Formatter Tests
// =============================================================================
import {
  formatDuration,
  renderMeetingNote,
  renderMeetingRecordingNote,
  renderPhoneCallNote,
  renderPhoneRecordingNote,
  renderSmsNote,
  titleCase,
} from '../services/noteFormatter';

describe('helpers', () => {
  it('formats seconds as minutes and seconds', () => {
    expect(formatDuration(125)).toBe('2m 5s');
    expect(formatDuration(0)).toBe('0m 0s');
  });

  it('title-cases event types', () => {
    expect(titleCase('meeting.participant_joined')).toBe('Meeting.Participant_Joined');
  });
});

describe('renderMeetingNote', () => {
  it('renders topic, start time, id and join link', () => {
    const body = renderMeetingNote('meeting.started', {
      topic: 'Weekly sync',
      start_time: '2024-01-01T10:00:00Z',
      uuid: 'abc==',
      id: 987654321,
    });
    expect(body).toBe(
      [
        'Zoom Meeting.Started Activity:',
        '- Topic: Weekly sync',
        '- Start Time: 2024-01-01T10:00:00Z',
        '- Meeting ID: abc==',
        '- Meeting URL: https://zoom.us/j/987654321',
        '- Source: Zoom Integration',
      ].join('\n'),
    );
  });

  it('renders N/A for missing values', () => {
    expect(renderMeetingNote('meeting.ended', {})).toBe(
      [
        'Zoom Meeting.Ended Activity:',
        '- Topic: N/A',
        '- Start Time: N/A',
        '- Meeting ID: N/A',
        '- Meeting URL: N/A',
        '- Source: Zoom Integration',
      ].join('\n'),
    );
  });

  it('renders identical text for identical input', () => {
    const meeting = { topic: 'Same', uuid: 'u1' };
    expect(renderMeetingNote('meeting.started', meeting)).toBe(renderMeetingNote('meeting.started', meeting));
  });
});

describe('renderMeetingRecordingNote', () => {
  it('lists playable files and the participant', () => {
    const body = renderMeetingRecordingNote(
      {
        topic: 'Demo',
        uuid: 'm-1',
        share_url: 'https://zoom.us/rec/share/abc',
        recording_files: [
          { file_type: 'mp4', play_url: 'https://zoom.us/rec/play/1', file_size: 2048 },
          { file_type: 'chat', file_size: 10 },
        ],
      },
      'ada@example.com',
    );
    expect(body).toBe(
      [
        'Zoom Meeting Recording Completed:',
        '- Topic: Demo',
        '- Meeting ID: m-1',
        '- Meeting URL: https://zoom.us/j/m-1',
        '- Public Share URL: https://zoom.us/rec/share/abc',
        '- Participant: ada@example.com',
        '- Recording Files:',
        '- MP4: https://zoom.us/rec/play/1 (2048 bytes)',
        '- Source: Zoom Integration',
      ].join('\n'),
    );
  });

  it('says so when there are no files', () => {
    expect(renderMeetingRecordingNote({}, '')).toContain('- Recording Files:\n- No recording files available\n');
  });
});

describe('renderSmsNote', () => {
  const sms = {
    message: 'Hi there',
    message_type: 'text',
    date_time: '2024-02-02T08:00:00Z',
    message_id: 'm-9',
    sender: { phone_number: '+15550007777' },
  };

  it('shows the sender phone only for the sender role', () => {
    expect(renderSmsNote('phone.sms_sent', sms, 'sender')).toBe(
      [
        'Zoom SMS Activity - PHONE.SMS_SENT:',
        '- Message Content: Hi there',
        '- Message Type: text',
        '- Direction: sender',
        '- Timestamp: 2024-02-02T08:00:00Z',
        '- Message ID: m-9',
        '- Phone Number: +15550007777',
        '- Event Type: phone.sms_sent',
        '- Source: Zoom Integration',
      ].join('\n'),
    );
    expect(renderSmsNote('phone.sms_sent', sms, 'recipient')).toContain('\n- Phone Number: N/A\n');
  });
});

describe('phone notes', () => {
  it('renders a call with duration and role', () => {
    expect(renderPhoneCallNote('phone.caller_ended', { caller_number: '+1555', call_id: 'c1', duration: 75 }, 'caller')).toBe(
      [
        'Zoom Phone Call Activity - PHONE.CALLER_ENDED:',
        '- Caller Number: +1555',
        '- Callee Number: N/A',
        '- Call ID: c1',
        '- Duration: 1m 15s',
        '- Start Time: N/A',
        '- End Time: N/A',
        '- Role: caller',
        '- Event Type: phone.caller_ended',
        '- Source: Zoom Phone Integration',
      ].join('\n'),
    );
  });

  it('renders a recording with or without a download link', () => {
    const recording = {
      id: 'rec-1',
      caller_number: '+1555',
      caller_name: 'Ada',
      callee_number: '+1666',
      duration: 61,
      date_time: '2024-03-03T09:00:00Z',
    };
    const withLink = renderPhoneRecordingNote('phone.recording_completed', recording, 'callee', 'https://sync.example.com/download/tok');
    expect(withLink).toBe(
      [
        'Zoom Phone Call Recording Completed - PHONE.RECORDING_COMPLETED:',
        '- Caller Number: +1555 (Ada)',
        '- Callee Number: +1666 (N/A)',
        '- Call ID: N/A',
        '- File ID: rec-1',
        '- Call Log ID: N/A',
        '- Duration: 1m 1s',
        '- Start Time: 2024-03-03T09:00:00Z',
        '- Download Recording: https://sync.example.com/download/tok',
        '- Role: callee',
        '- Event Type: phone.recording_completed',
        '- Source: Zoom Phone Integration',
      ].join('\n'),
    );
    expect(renderPhoneRecordingNote('phone.recording_completed', recording, 'caller', null)).toContain(
      '\n- No recording available for this call\n',
    );
  });
});
