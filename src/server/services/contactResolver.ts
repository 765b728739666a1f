// =============================================================================
// Contact Resolver — descriptor → exactly one CRM contact id
// =============================================================================
// resolveOrCreate(descriptor, policy)
//
//   general   (meetings, recordings, SMS)
//     email (real or placeholder) → phone → name → broad search
//   phoneOnly (calls, phone recordings)
//     phone → broad search on the phone
//
// Each matcher runs in order and the first ACTIVE candidate wins. Inactive
// candidates (deleted / archived) are never returned; a matcher that only
// finds inactive ones records a collision so the contact we create next gets
// a unique, suffixed email and the CRM does not merge it back into the
// deleted record. Searches never find that suffixed address again, so the
// resolver remembers (bounded) which contact it created for which person
// and re-checks it is still active before reusing it.
//
// CRM failures never escape: they are logged and the result is `null`.
// =============================================================================
import { isContactActive, normalizePhone } from './crmContacts';
import {
  PLACEHOLDER_DOMAIN,
  hasIdentifyingData,
  isPlaceholderEmail,
  isPlaceholderName,
  matchableName,
  placeholderEmail,
  slugify,
  summarizeDescriptor,
} from './identityNormalizer';
import { BoundedMap } from '../utils/boundedSet';
import { errorMessage } from '../utils/sanitizeError';
import logger from '../utils/logger';
import {
  ContactInput,
  CrmContact,
  CrmCustomField,
  CrmGateway,
  PersonDescriptor,
  ResolutionPolicy,
} from '../types';

export type CollisionKind = 'email' | 'phone' | 'name';

/** One search strategy in the resolver's priority list */
export interface Matcher {
  /** Which identifier the matcher searches on; decides the collision rule */
  kind: CollisionKind;
  /** Search label used in log lines */
  label: string;
  search: (crm: CrmGateway) => Promise<CrmContact[]>;
}

export interface ContactResolverOptions {
  /** Clock in epoch milliseconds; used for unique email suffixes */
  now?: () => number;
  /** Entries in the created-under-a-unique-email cache (default 1000) */
  cacheCapacity?: number;
}

/** A contact this resolver created with a suffixed email */
interface CreatedContact {
  contactId: string;
  email: string;
}

/**
 * True when the resolver has something to search on under the policy.
 * A `null` from `resolveOrCreate` for such a descriptor means the CRM failed.
 */
export function isResolvable(descriptor: PersonDescriptor, policy: ResolutionPolicy): boolean {
  if (!hasIdentifyingData(descriptor)) return false;
  return policy !== 'phoneOnly' || !!descriptor.phone;
}

// ─────────────────────────────────────────────────────────────────────────────
// Matcher lists
// ─────────────────────────────────────────────────────────────────────────────

/** Builds the ordered matcher list for a descriptor under a policy */
export function buildMatchers(descriptor: PersonDescriptor, policy: ResolutionPolicy): Matcher[] {
  const matchers: Matcher[] = [];
  const phone = descriptor.phone;

  if (policy === 'phoneOnly') {
    if (!phone) return matchers;
    matchers.push({ kind: 'phone', label: 'phone', search: (crm) => crm.searchContactsByPhone(phone) });
    matchers.push({ kind: 'phone', label: 'general', search: (crm) => crm.searchContactsGeneral(phone) });
    return matchers;
  }

  const email = descriptor.email || descriptor.placeholderEmail;
  const name = matchableName(descriptor);

  if (email) {
    matchers.push({ kind: 'email', label: 'email', search: (crm) => crm.searchContactsByEmail(email) });
  }
  if (phone) {
    matchers.push({ kind: 'phone', label: 'phone', search: (crm) => crm.searchContactsByPhone(phone) });
  }
  if (name) {
    matchers.push({ kind: 'name', label: 'name', search: (crm) => crm.searchContactsByName(name) });
  }

  const broad: Array<[CollisionKind, string | undefined]> = [
    ['email', descriptor.email],
    ['phone', phone],
    ['name', name],
  ];
  const first = broad.find(([, value]) => !!value);
  if (first) {
    const [kind, query] = first;
    if (query) {
      matchers.push({ kind, label: 'general', search: (crm) => crm.searchContactsGeneral(query) });
    }
  }

  return matchers;
}

// ─────────────────────────────────────────────────────────────────────────────
// Email helpers
// ─────────────────────────────────────────────────────────────────────────────

/** `ada@example.com` → `ada_1700000000@example.com` */
export function suffixEmail(email: string, unixSeconds: number): string {
  const at = email.lastIndexOf('@');
  if (at <= 0) return `${email}_${unixSeconds}@${PLACEHOLDER_DOMAIN}`;
  return `${email.slice(0, at)}_${unixSeconds}${email.slice(at)}`;
}

/**
 * Unique email for a contact whose identifiers collide with an inactive
 * record. A real email is always suffixed; otherwise the rule depends on
 * which identifier collided.
 */
export function uniqueEmailFor(
  collision: CollisionKind,
  descriptor: PersonDescriptor,
  outgoingEmail: string,
  unixSeconds: number,
): string {
  const realEmail = descriptor.email && !isPlaceholderEmail(descriptor.email) ? descriptor.email : '';
  if (realEmail) return suffixEmail(realEmail, unixSeconds);

  switch (collision) {
    case 'email':
      return suffixEmail(outgoingEmail, unixSeconds);
    case 'phone':
      return placeholderEmail('phone', `${normalizePhone(descriptor.phone ?? '')}_${unixSeconds}`);
    case 'name':
      return placeholderEmail('name', `${slugify(descriptor.displayName ?? '')}_${unixSeconds}`);
  }
}

/** Outgoing email for a new contact before any collision rule applies */
function baseEmail(descriptor: PersonDescriptor, policy: ResolutionPolicy): string {
  if (descriptor.email) return descriptor.email;
  if (policy === 'phoneOnly' && descriptor.phone) {
    return placeholderEmail('phone', descriptor.phone.replace(/\D/g, ''));
  }
  return descriptor.placeholderEmail ?? '';
}

/** Cache key for one person under one policy */
function identityKey(descriptor: PersonDescriptor, policy: ResolutionPolicy): string {
  return [
    policy,
    baseEmail(descriptor, policy),
    descriptor.phone ? normalizePhone(descriptor.phone) : '',
    matchableName(descriptor) ?? '',
    descriptor.providerUserId ?? '',
  ].join('|');
}

/**
 * Custom fields recording where a contact without a real email came from:
 * phone-only contacts get `phone_source`, id-only ones `zoom_user_id`.
 */
export function sourceCustomFields(descriptor: PersonDescriptor, policy: ResolutionPolicy): CrmCustomField[] {
  const realEmail = !!descriptor.email && !isPlaceholderEmail(descriptor.email);
  if (policy === 'phoneOnly') return [{ key: 'phone_source', value: 'zoom_phone' }];
  if (realEmail) return [];
  if (descriptor.providerUserId) return [{ key: 'zoom_user_id', value: descriptor.providerUserId }];
  if (descriptor.phone) return [{ key: 'phone_source', value: 'zoom_phone' }];
  return [];
}

// ─────────────────────────────────────────────────────────────────────────────
// Resolver
// ─────────────────────────────────────────────────────────────────────────────

export class ContactResolver {
  private readonly crm: CrmGateway;
  private readonly now: () => number;
  private readonly created: BoundedMap<string, CreatedContact>;

  constructor(crm: CrmGateway, options: ContactResolverOptions = {}) {
    this.crm = crm;
    this.now = options.now ?? Date.now;
    this.created = new BoundedMap<string, CreatedContact>(options.cacheCapacity);
  }

  /**
   * Resolves the descriptor to a single active CRM contact, creating one when
   * none exists.
   *
   * @returns The contact id, or `null` when there is nothing to resolve on or
   *          the CRM failed
   */
  async resolveOrCreate(descriptor: PersonDescriptor, policy: ResolutionPolicy): Promise<string | null> {
    const summary = summarizeDescriptor(descriptor);

    if (!isResolvable(descriptor, policy)) {
      logger.debug('Descriptor has no identifying data, skipping', { policy, descriptor: summary });
      return null;
    }

    try {
      const collisions: CollisionKind[] = [];

      for (const matcher of buildMatchers(descriptor, policy)) {
        const candidates = await matcher.search(this.crm);
        const active = candidates.find(isContactActive);

        if (active) {
          logger.info('Matched existing CRM contact', { matcher: matcher.label, contactId: active.id });
          await this.fillMissingFields(active, descriptor);
          return active.id;
        }

        if (candidates.length > 0) {
          logger.warn('Only inactive contacts matched, will not reactivate', {
            matcher: matcher.label,
            inactive: candidates.map((c) => c.id),
          });
          collisions.push(matcher.kind);
        }
      }

      const key = identityKey(descriptor, policy);
      if (collisions.length > 0) {
        const reused = await this.findCreated(key);
        if (reused) {
          logger.info('Reusing contact created earlier with a unique email', { contactId: reused.id });
          await this.fillMissingFields(reused, descriptor);
          return reused.id;
        }
      }

      return await this.create(descriptor, policy, collisions, key);
    } catch (err) {
      logger.error('Contact resolution failed', { policy, descriptor: summary, error: errorMessage(err) });
      return null;
    }
  }

  private async create(
    descriptor: PersonDescriptor,
    policy: ResolutionPolicy,
    collisions: CollisionKind[],
    key: string,
  ): Promise<string> {
    let email = baseEmail(descriptor, policy);

    const collision = (['email', 'phone', 'name'] as const).find((kind) => collisions.includes(kind));
    if (collision) {
      email = uniqueEmailFor(collision, descriptor, email, Math.floor(this.now() / 1000));
      logger.info('Using unique email to avoid an inactive contact', { collision });
    }

    const name = descriptor.displayName && !isPlaceholderName(descriptor.displayName) ? descriptor.displayName : '';
    const input: ContactInput = {
      firstName: name || (policy === 'phoneOnly' ? descriptor.phone ?? '' : descriptor.displayName ?? ''),
      lastName: name ? descriptor.lastName ?? '' : '',
      email,
      phone: descriptor.phone ?? '',
    };
    const customFields = sourceCustomFields(descriptor, policy);
    if (customFields.length > 0) input.customFields = customFields;

    const contact = await this.crm.createContact(input);
    if (collision && this.created.set(key, { contactId: contact.id, email })) {
      logger.info('Created-contact cache reached capacity, cleared');
    }
    return contact.id;
  }

  /**
   * The contact created earlier for this person, if it is still active.
   * A stale entry is dropped.
   */
  private async findCreated(key: string): Promise<CrmContact | null> {
    const entry = this.created.get(key);
    if (!entry) return null;

    const candidates = await this.crm.searchContactsByEmail(entry.email);
    const match = candidates.find((c) => c.id === entry.contactId && isContactActive(c));
    if (!match) {
      this.created.delete(key);
      return null;
    }
    return match;
  }

  /**
   * Writes only the fields the matched contact lacks. A placeholder email is
   * replaced when the descriptor brings a real one.
   */
  private async fillMissingFields(contact: CrmContact, descriptor: PersonDescriptor): Promise<void> {
    const patch: Partial<ContactInput> = {};
    const name = descriptor.displayName && !isPlaceholderName(descriptor.displayName) ? descriptor.displayName : '';

    if (!contact.firstName && name) patch.firstName = name;
    if (!contact.lastName && name && descriptor.lastName) patch.lastName = descriptor.lastName;
    if (!contact.phone && descriptor.phone) patch.phone = descriptor.phone;
    if (
      descriptor.email &&
      !isPlaceholderEmail(descriptor.email) &&
      (!contact.email || isPlaceholderEmail(contact.email))
    ) {
      patch.email = descriptor.email;
    }

    if (Object.keys(patch).length === 0) {
      logger.debug('Matched contact already complete, no update', { contactId: contact.id });
      return;
    }
    await this.crm.updateContact(contact.id, patch);
  }
}
