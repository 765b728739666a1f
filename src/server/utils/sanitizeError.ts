// =============================================================================
// Error Sanitizer — strips PII & secrets from error messages
// =============================================================================
// Zoom and GoHighLevel error bodies echo back emails, phone numbers and
// bearer tokens. Anything that ends up in a log line or an HTTP response
// goes through `sanitizeMessage()` first.
// =============================================================================

/* ── Regex patterns for sensitive data ── */

const EMAIL_RE = /[a-zA-Z0-9._%+\-]+@[a-zA-Z0-9.\-]+\.[a-zA-Z]{2,}/g;

/**
 * Phone numbers: E.164, US domestic and international formats.
 * Examples: +12125551234, (212) 555-1234, 212-555-1234
 */
const PHONE_RE = /(?:\+?\d{1,3}[\s.-]?)?\(?\d{2,4}\)?[\s.-]?\d{3,4}[\s.-]?\d{3,4}/g;

const TOKEN_HEX_RE = /\b[0-9a-fA-F]{32,}\b/g;
const BEARER_RE = /Bearer\s+[A-Za-z0-9\-._~+/]+=*/g;
const JWT_RE = /\beyJ[A-Za-z0-9\-_]+\.eyJ[A-Za-z0-9\-_]+\.[A-Za-z0-9\-_.+/=]+\b/g;

/** Long opaque strings (GHL location keys, Zoom client secrets) */
const API_KEY_RE = /\b[A-Za-z0-9]{40,}\b/g;

/* ── Replacement placeholders; order matters (JWT before email/phone) ── */
const PLACEHOLDERS: Array<[RegExp, string]> = [
  [JWT_RE, '[token]'],
  [BEARER_RE, '[token]'],
  [EMAIL_RE, '[email]'],
  [PHONE_RE, '[phone]'],
  [TOKEN_HEX_RE, '[token]'],
  [API_KEY_RE, '[token]'],
];

/**
 * Strip sensitive data from a raw error message and cap its length.
 */
export function sanitizeMessage(message: string): string {
  let sanitized = message;
  for (const [pattern, placeholder] of PLACEHOLDERS) {
    sanitized = sanitized.replace(pattern, placeholder);
  }
  return sanitized.slice(0, 300);
}

/** Message of an unknown thrown value, sanitized for logging */
export function errorMessage(err: unknown): string {
  return sanitizeMessage(err instanceof Error ? err.message : String(err));
}
