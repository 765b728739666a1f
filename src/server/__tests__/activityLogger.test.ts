// =============================================================================
// Note Deduplicator + Activity Logger Tests
// =============================================================================

jest.mock('../utils/logger', () => ({
  __esModule: true,
  default: {
    info: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
    debug: jest.fn(),
  },
}));

import { computeNoteKey, NoteDeduplicator } from '../services/noteDeduplicator';
import { ActivityLogger } from '../services/activityLogger';
import { FakeCrm } from './helpers/fakeCrm';

describe('computeNoteKey', () => {
  it('is the contact id plus the first 16 hex of the body hash', () => {
    expect(computeNoteKey('c1', 'hello')).toBe('c1_2cf24dba5fb0a30e');
  });

  it('differs per contact and per body', () => {
    expect(computeNoteKey('c1', 'hello')).not.toBe(computeNoteKey('c2', 'hello'));
    expect(computeNoteKey('c1', 'hello')).not.toBe(computeNoteKey('c1', 'hello!'));
  });
});

describe('ActivityLogger', () => {
  let crm: FakeCrm;
  let notes: NoteDeduplicator;
  let activity: ActivityLogger;

  beforeEach(() => {
    crm = new FakeCrm();
    notes = new NoteDeduplicator();
    activity = new ActivityLogger(crm, notes);
  });

  it('writes identical text for the same contact once', async () => {
    await expect(activity.logNote('c1', 'Meeting note')).resolves.toBe(true);
    await expect(activity.logNote('c1', 'Meeting note')).resolves.toBe(true);

    expect(crm.notes).toEqual([{ contactId: 'c1', body: 'Meeting note' }]);
    expect(notes.size).toBe(1);
  });

  it('writes the same text to two different contacts', async () => {
    await activity.logNote('c1', 'Meeting note');
    await activity.logNote('c2', 'Meeting note');

    expect(crm.notes.map((n) => n.contactId)).toEqual(['c1', 'c2']);
  });

  it('does not mark a note the CRM rejected, so it is retried', async () => {
    crm.failing.add('addNote');
    await expect(activity.logNote('c1', 'Retry me')).resolves.toBe(false);
    expect(notes.seen(computeNoteKey('c1', 'Retry me'))).toBe(false);

    crm.failing.delete('addNote');
    await expect(activity.logNote('c1', 'Retry me')).resolves.toBe(true);
    expect(crm.notes).toEqual([{ contactId: 'c1', body: 'Retry me' }]);
  });
});
