// =============================================================================
// Activity Logger — writes one note per (contact, body)
// =============================================================================
// The note deduplicator is consulted before the CRM write; a note is marked
// only once the CRM accepted it, so a failed write is retried on the next
// delivery. Failures are logged and reported as `false`, never thrown.
// =============================================================================
import { computeNoteKey, NoteDeduplicator } from './noteDeduplicator';
import { errorMessage } from '../utils/sanitizeError';
import logger from '../utils/logger';
import { CrmGateway } from '../types';

export class ActivityLogger {
  private readonly crm: CrmGateway;
  private readonly notes: NoteDeduplicator;

  constructor(crm: CrmGateway, notes: NoteDeduplicator) {
    this.crm = crm;
    this.notes = notes;
  }

  /**
   * @returns `true` when the note is on the contact (written now or earlier)
   */
  async logNote(contactId: string, body: string): Promise<boolean> {
    const key = computeNoteKey(contactId, body);
    if (this.notes.seen(key)) {
      logger.debug('Duplicate note skipped', { contactId, noteKey: key });
      return true;
    }

    try {
      await this.crm.addNote(contactId, body);
      this.notes.mark(key);
      logger.info('Activity note written', { contactId, noteKey: key });
      return true;
    } catch (err) {
      logger.error('Failed to write activity note', { contactId, error: errorMessage(err) });
      return false;
    }
  }
}
