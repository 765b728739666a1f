// =============================================================================
// Note Deduplicator — second layer of duplicate prevention
// =============================================================================
// Even when two different events reach the same contact, the same rendered
// note must be written once. Key = `<contactId>_<16 hex of sha256(body)>`.
// Independent set from the event deduplicator.
// =============================================================================
import crypto from 'crypto';
import { BoundedSet } from '../utils/boundedSet';
import logger from '../utils/logger';
import { DEFAULT_DEDUPE_CAPACITY } from './eventDeduplicator';

export function computeNoteKey(contactId: string, body: string): string {
  const hash = crypto.createHash('sha256').update(body, 'utf8').digest('hex').slice(0, 16);
  return `${contactId}_${hash}`;
}

export class NoteDeduplicator {
  private readonly written: BoundedSet<string>;

  constructor(capacity = DEFAULT_DEDUPE_CAPACITY) {
    this.written = new BoundedSet<string>(capacity);
  }

  seen(key: string): boolean {
    return this.written.has(key);
  }

  /** Record a note the CRM accepted */
  mark(key: string): void {
    if (this.written.add(key)) {
      logger.info('Written-note set reached capacity, cleared');
    }
  }

  get size(): number {
    return this.written.size;
  }

  clear(): void {
    this.written.clear();
  }
}
