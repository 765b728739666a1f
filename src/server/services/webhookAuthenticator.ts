// =============================================================================
// Webhook Authenticator
// =============================================================================
// Zoom signs each webhook with HMAC-SHA256 over the raw request body using
// the app's secret token, sent as `x-zm-signature: v0=<hex>`.
//
//   • verifySignature()            — constant-time check of that header
//   • buildUrlValidationResponse() — answer to the `endpoint.url_validation`
//                                    challenge Zoom sends when the endpoint
//                                    is registered
//
// The signature value itself is NEVER logged.
// =============================================================================
import crypto from 'crypto';
import { UrlValidationResponse } from '../types';

export const ZOOM_SIGNATURE_HEADER = 'x-zm-signature';
export const URL_VALIDATION_EVENT = 'endpoint.url_validation';

const SIGNATURE_PREFIXES = ['v0=', 'sha256='];

function stripPrefix(signature: string): string {
  for (const prefix of SIGNATURE_PREFIXES) {
    if (signature.startsWith(prefix)) return signature.slice(prefix.length);
  }
  return signature;
}

/**
 * Verifies a Zoom webhook signature.
 *
 * @returns `true` if the signature is valid, `false` for a missing header,
 *          missing secret or any mismatch.
 */
export function verifySignature(
  rawBody: Buffer | string,
  signature: string | undefined,
  secret: string,
): boolean {
  if (!signature || !secret) return false;

  const expected = crypto.createHmac('sha256', secret).update(rawBody).digest('hex');

  // Both must be the same length for timingSafeEqual
  const sigBuf = Buffer.from(stripPrefix(signature), 'utf8');
  const expBuf = Buffer.from(expected, 'utf8');

  if (sigBuf.length !== expBuf.length) return false;

  return crypto.timingSafeEqual(sigBuf, expBuf);
}

/** `encryptedToken` = base64(HMAC-SHA256(secret, plainToken)) */
export function buildUrlValidationResponse(plainToken: string, secret: string): UrlValidationResponse {
  const encryptedToken = crypto.createHmac('sha256', secret).update(plainToken).digest('base64');
  return { plainToken, encryptedToken };
}
