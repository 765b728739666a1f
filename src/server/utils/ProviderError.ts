// =============================================================================
// ProviderError — Typed error for every Zoom / CRM API failure
// =============================================================================
// Wraps raw Axios errors so the resolver and router get one predictable type.
// The message never carries contact data — only the provider, the operation
// and the HTTP status.
// =============================================================================
import { AxiosError } from 'axios';
import { sanitizeMessage } from './sanitizeError';

export type Provider = 'zoom' | 'crm';

export type ProviderOperation =
  | 'token'
  | 'listParticipants'
  | 'downloadRecording'
  | 'searchByEmail'
  | 'searchByPhone'
  | 'searchByName'
  | 'searchGeneral'
  | 'createContact'
  | 'updateContact'
  | 'addNote';

export class ProviderError extends Error {
  public readonly provider: Provider;
  public readonly operation: ProviderOperation;
  /** HTTP status, when the provider answered at all */
  public readonly status: number | undefined;

  constructor(provider: Provider, operation: ProviderOperation, cause: unknown) {
    const status = cause instanceof AxiosError ? cause.response?.status : undefined;
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(
      `${provider} ${operation} failed${status ? ` (HTTP ${status})` : ''}: ${sanitizeMessage(reason)}`,
      { cause },
    );
    this.name = 'ProviderError';
    this.provider = provider;
    this.operation = operation;
    this.status = status;

    Object.setPrototypeOf(this, ProviderError.prototype);
  }
}

/** Raised when a webhook fails signature verification */
export class AuthenticationError extends Error {
  constructor(message = 'Webhook signature verification failed') {
    super(message);
    this.name = 'AuthenticationError';
    Object.setPrototypeOf(this, AuthenticationError.prototype);
  }
}
