// =============================================================================
// GoHighLevel Contacts Client Tests
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

import { CrmContactsClient, isContactActive, matchesGeneralQuery, normalizePhone } from '../services/crmContacts';
import { ProviderError } from '../utils/ProviderError';
import { requestBody, scriptedAdapter, ScriptedReply } from './helpers/scriptedAdapter';

function client(reply: () => ScriptedReply, locationId?: string) {
  const scripted = scriptedAdapter(reply);
  const crm = new CrmContactsClient({
    apiKey: 'test-key',
    locationId,
    adapter: scripted.adapter,
    retry: { backoffBaseMs: 0 },
  });
  return { crm, requests: scripted.requests };
}

describe('contact helpers', () => {
  it('treats deleted, archived and inactive contacts as inactive', () => {
    expect(isContactActive({ id: '1' })).toBe(true);
    expect(isContactActive({ id: '1', dnd: true })).toBe(true);
    expect(isContactActive({ id: '1', status: 'Deleted' })).toBe(false);
    expect(isContactActive({ id: '1', status: 'archived' })).toBe(false);
    expect(isContactActive({ id: '1', deletedAt: '2024-01-01' })).toBe(false);
    expect(isContactActive({ id: '1', archivedAt: '2024-01-01' })).toBe(false);
  });

  it('normalises phones for comparison', () => {
    expect(normalizePhone('+1 (555) 000-1111')).toBe('15550001111');
  });

  it('matches a query inside email, name or phone', () => {
    const contact = { id: '1', email: 'Ada@Example.com', firstName: 'Ada', lastName: 'Lovelace', phone: '+1 555 000 1111' };
    expect(matchesGeneralQuery(contact, 'ada@example')).toBe(true);
    expect(matchesGeneralQuery(contact, 'lovelace')).toBe(true);
    expect(matchesGeneralQuery(contact, '555-000')).toBe(true);
    expect(matchesGeneralQuery(contact, 'grace')).toBe(false);
    expect(matchesGeneralQuery(contact, '  ')).toBe(false);
  });
});

describe('CrmContactsClient', () => {
  it('searches by email with the API key as bearer token', async () => {
    const { crm, requests } = client(() => ({ status: 200, data: { contacts: [{ id: 'c1', email: 'ada@example.com' }] } }));

    await expect(crm.searchContactsByEmail('ada@example.com')).resolves.toEqual([
      { id: 'c1', email: 'ada@example.com' },
    ]);
    expect(requests[0].method).toBe('get');
    expect(requests[0].baseURL).toBe('https://rest.gohighlevel.com/v1');
    expect(requests[0].url).toBe('/contacts/search');
    expect(requests[0].params).toEqual({ email: 'ada@example.com' });
    expect(requests[0].headers.get('Authorization')).toBe('Bearer test-key');
  });

  it('returns an empty list when the response has no contacts', async () => {
    const { crm } = client(() => ({ status: 200, data: {} }));
    await expect(crm.searchContactsByPhone('+15550001111')).resolves.toEqual([]);
  });

  it('narrows the broad search locally', async () => {
    const { crm, requests } = client(() => ({
      status: 200,
      data: { contacts: [{ id: '1', email: 'ada@example.com' }, { id: '2', email: 'bob@example.com' }] },
    }));

    const found = await crm.searchContactsGeneral('ada');
    expect(found.map((c) => c.id)).toEqual(['1']);
    expect(requests[0].url).toBe('/contacts');
    expect(requests[0].params).toEqual({ query: 'ada', limit: 20 });
  });

  it('creates a contact tagged with its source and location', async () => {
    const { crm, requests } = client(() => ({ status: 200, data: { contact: { id: 'new-1' } } }), 'loc-1');

    const contact = await crm.createContact({ firstName: 'Ada', lastName: '', email: 'ada@example.com', phone: '' });
    expect(contact.id).toBe('new-1');
    expect(requests[0].method).toBe('post');
    expect(requestBody(requests[0])).toEqual({
      source: 'Zoom Integration',
      firstName: 'Ada',
      lastName: '',
      email: 'ada@example.com',
      phone: '',
      locationId: 'loc-1',
    });
  });

  it('sends custom fields with a created contact', async () => {
    const { crm, requests } = client(() => ({ status: 200, data: { contact: { id: 'new-2' } } }));

    await crm.createContact({
      firstName: '+15550001111',
      lastName: '',
      email: 'phone_15550001111@placeholder.com',
      phone: '+15550001111',
      customFields: [{ key: 'phone_source', value: 'zoom_phone' }],
    });
    expect(requestBody(requests[0])).toEqual({
      source: 'Zoom Integration',
      firstName: '+15550001111',
      lastName: '',
      email: 'phone_15550001111@placeholder.com',
      phone: '+15550001111',
      customFields: [{ key: 'phone_source', value: 'zoom_phone' }],
    });
  });

  it('rejects a create response without an id', async () => {
    const { crm } = client(() => ({ status: 200, data: {} }));
    await expect(crm.createContact({ firstName: 'Ada', lastName: '', email: 'ada@example.com', phone: '' })).rejects.toBeInstanceOf(ProviderError);
  });

  it('updates only the given fields', async () => {
    const { crm, requests } = client(() => ({ status: 200, data: { contact: { id: 'c1', phone: '+15550001111' } } }));

    await crm.updateContact('c1', { phone: '+15550001111' });
    expect(requests[0].method).toBe('put');
    expect(requests[0].url).toBe('/contacts/c1');
    expect(requestBody(requests[0])).toEqual({ source: 'Zoom Integration', phone: '+15550001111' });
  });

  it('posts notes to the contact', async () => {
    const { crm, requests } = client(() => ({ status: 200, data: { id: 'n1' } }));

    await crm.addNote('c1', 'Zoom Meeting.Started Activity:');
    expect(requests[0].url).toBe('/contacts/c1/notes');
    expect(requestBody(requests[0])).toEqual({ body: 'Zoom Meeting.Started Activity:' });
  });

  it('retries a 503 and then succeeds', async () => {
    const replies: ScriptedReply[] = [{ status: 503 }, { status: 200, data: { contacts: [] } }];
    const { crm, requests } = client(() => replies.shift() ?? { status: 500 });

    await expect(crm.searchContactsByName('Ada Lovelace')).resolves.toEqual([]);
    expect(requests).toHaveLength(2);
  });

  it('wraps a client error in a ProviderError with the status', async () => {
    const { crm, requests } = client(() => ({ status: 404, data: { message: 'ada@example.com not found' } }));

    const err = await crm.searchContactsByEmail('ada@example.com').catch((e: unknown) => e);
    expect(err).toBeInstanceOf(ProviderError);
    expect(err).toMatchObject({
      provider: 'crm',
      operation: 'searchByEmail',
      status: 404,
      message: 'crm searchByEmail failed (HTTP 404): Request failed with status code 404',
    });
    expect(requests).toHaveLength(1);
  });
});
