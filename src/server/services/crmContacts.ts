// =============================================================================
// GoHighLevel Contacts Wrapper
// =============================================================================
// Every contact operation the sync needs, behind the `CrmGateway` interface:
//
//   1. searchContactsByEmail / ByPhone / ByName — GET /contacts/search
//   2. searchContactsGeneral                    — GET /contacts?query=
//                                                 + local substring match
//   3. createContact / updateContact            — POST / PUT /contacts
//   4. addNote                                  — POST /contacts/{id}/notes
//
// Searches return every candidate, active or not; deciding what counts as a
// match is the resolver's job (see `isContactActive`). All calls run through
// `withRetry`, and every failure surfaces as a `ProviderError`.
// =============================================================================
import axios, { AxiosAdapter, AxiosInstance, AxiosResponse } from 'axios';
import { withRetry, RetryOptions } from './httpClient';
import { ProviderError, ProviderOperation } from '../utils/ProviderError';
import logger from '../utils/logger';
import { ContactInput, CrmContact, CrmCustomField, CrmGateway } from '../types';

/* ── Constants ── */
const GHL_API_BASE = 'https://rest.gohighlevel.com/v1';
const DEFAULT_TIMEOUT_MS = 15_000;
const GENERAL_SEARCH_LIMIT = 20;
export const CONTACT_SOURCE = 'Zoom Integration';

const INACTIVE_STATUSES = new Set(['deleted', 'archived', 'inactive']);

export interface CrmClientOptions {
  apiKey: string;
  locationId?: string;
  apiBase?: string;
  retry?: RetryOptions;
  /** Custom Axios adapter (tests route requests in-process) */
  adapter?: AxiosAdapter;
}

interface ContactListResponse {
  contacts?: CrmContact[];
}

interface ContactResponse {
  contact?: CrmContact;
}

// ─────────────────────────────────────────────────────────────────────────────
// Pure helpers
// ─────────────────────────────────────────────────────────────────────────────

/**
 * A contact is active unless its status is deleted / archived / inactive or
 * it carries a `deletedAt` / `archivedAt` stamp. `dnd` does not matter.
 */
export function isContactActive(contact: CrmContact): boolean {
  const status = (contact.status ?? '').toLowerCase();
  if (INACTIVE_STATUSES.has(status)) return false;
  if (contact.deletedAt) return false;
  if (contact.archivedAt) return false;
  return true;
}

/** Strips `+`, `-`, spaces and parentheses for comparison only */
export function normalizePhone(phone: string): string {
  return phone.replace(/[+\-\s()]/g, '');
}

/**
 * Substring match used by the broad search: the lower-cased query inside the
 * email or "first last", or the cleaned query inside the cleaned phone.
 * Short queries can match unrelated contacts.
 */
export function matchesGeneralQuery(contact: CrmContact, query: string): boolean {
  const q = query.toLowerCase().trim();
  if (!q) return false;
  const email = (contact.email ?? '').toLowerCase().trim();
  const name = `${contact.firstName ?? ''} ${contact.lastName ?? ''}`.toLowerCase().trim();
  const phone = normalizePhone(contact.phone ?? '');
  const cleanQuery = normalizePhone(q);

  return (
    email.includes(q) ||
    name.includes(q) ||
    (cleanQuery.length > 0 && phone.includes(cleanQuery))
  );
}

// ─────────────────────────────────────────────────────────────────────────────
// Client
// ─────────────────────────────────────────────────────────────────────────────

export class CrmContactsClient implements CrmGateway {
  private readonly options: CrmClientOptions;

  constructor(options: CrmClientOptions) {
    this.options = options;
  }

  async searchContactsByEmail(email: string): Promise<CrmContact[]> {
    return this.search('searchByEmail', { email });
  }

  async searchContactsByPhone(phone: string): Promise<CrmContact[]> {
    return this.search('searchByPhone', { phone });
  }

  async searchContactsByName(name: string): Promise<CrmContact[]> {
    return this.search('searchByName', { name });
  }

  /**
   * Broad search over the location, narrowed locally with
   * `matchesGeneralQuery`.
   */
  async searchContactsGeneral(query: string): Promise<CrmContact[]> {
    const contacts = await this.call<ContactListResponse>('searchGeneral', (client) =>
      client.get<ContactListResponse>('/contacts', { params: { query, limit: GENERAL_SEARCH_LIMIT } }),
    );
    const candidates = contacts.contacts ?? [];
    return candidates.filter((c) => matchesGeneralQuery(c, query));
  }

  async createContact(input: ContactInput): Promise<CrmContact> {
    const data = await this.call<ContactResponse>('createContact', (client) =>
      client.post<ContactResponse>('/contacts', this.toPayload(input)),
    );
    if (!data.contact?.id) {
      throw new ProviderError('crm', 'createContact', new Error('Response carried no contact id'));
    }
    logger.info('CRM contact created', { contactId: data.contact.id });
    return data.contact;
  }

  async updateContact(contactId: string, input: Partial<ContactInput>): Promise<CrmContact> {
    const data = await this.call<ContactResponse>('updateContact', (client) =>
      client.put<ContactResponse>(`/contacts/${encodeURIComponent(contactId)}`, this.toPayload(input)),
    );
    logger.info('CRM contact updated', { contactId, fields: Object.keys(input) });
    return data.contact ?? { id: contactId };
  }

  async addNote(contactId: string, body: string): Promise<void> {
    await this.call<unknown>('addNote', (client) =>
      client.post<unknown>(`/contacts/${encodeURIComponent(contactId)}/notes`, { body }),
    );
  }

  // ── internals ───────────────────────────────────────────────────────────

  private async search(
    operation: ProviderOperation,
    params: Record<string, string>,
  ): Promise<CrmContact[]> {
    const data = await this.call<ContactListResponse>(operation, (client) =>
      client.get<ContactListResponse>('/contacts/search', { params }),
    );
    const contacts = data.contacts ?? [];
    logger.debug('CRM search completed', { operation, found: contacts.length });
    return contacts;
  }

  private toPayload(input: Partial<ContactInput>): Record<string, string | CrmCustomField[]> {
    const payload: Record<string, string | CrmCustomField[]> = { source: CONTACT_SOURCE };
    for (const [key, value] of Object.entries(input)) {
      if (typeof value === 'string') payload[key] = value;
    }
    if (input.customFields && input.customFields.length > 0) payload.customFields = input.customFields;
    if (this.options.locationId) payload.locationId = this.options.locationId;
    return payload;
  }

  private async call<T>(
    operation: ProviderOperation,
    fn: (client: AxiosInstance) => Promise<AxiosResponse<T>>,
  ): Promise<T> {
    try {
      const res = await withRetry<T>('crm', async () => this.createClient(), fn, this.options.retry);
      return res.data;
    } catch (err) {
      throw new ProviderError('crm', operation, err);
    }
  }

  private createClient(): AxiosInstance {
    return axios.create({
      baseURL: this.options.apiBase ?? GHL_API_BASE,
      timeout: DEFAULT_TIMEOUT_MS,
      adapter: this.options.adapter,
      headers: {
        Authorization: `Bearer ${this.options.apiKey}`,
        'Content-Type': 'application/json',
        Accept: 'application/json',
      },
    });
  }
}
