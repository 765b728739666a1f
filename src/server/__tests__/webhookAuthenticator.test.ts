// =============================================================================
// Webhook Authenticator Tests
// =============================================================================
import crypto from 'crypto';
import { buildUrlValidationResponse, verifySignature } from '../services/webhookAuthenticator';

const SECRET = 'test-secret';
const BODY = '{"event":"meeting.started","payload":{"object":{"uuid":"u1"}}}';

function hmac(body: string): string {
  return crypto.createHmac('sha256', SECRET).update(body).digest('hex');
}

describe('verifySignature', () => {
  it('accepts the v0= and sha256= prefixes', () => {
    expect(verifySignature(BODY, `v0=${hmac(BODY)}`, SECRET)).toBe(true);
    expect(verifySignature(BODY, `sha256=${hmac(BODY)}`, SECRET)).toBe(true);
  });

  it('accepts a Buffer body', () => {
    expect(verifySignature(Buffer.from(BODY, 'utf8'), `v0=${hmac(BODY)}`, SECRET)).toBe(true);
  });

  it('rejects a body with one flipped byte', () => {
    const tampered = BODY.replace('u1', 'u2');
    expect(verifySignature(tampered, `v0=${hmac(BODY)}`, SECRET)).toBe(false);
  });

  it('rejects a missing header, a missing secret and a wrong-length signature', () => {
    expect(verifySignature(BODY, undefined, SECRET)).toBe(false);
    expect(verifySignature(BODY, `v0=${hmac(BODY)}`, '')).toBe(false);
    expect(verifySignature(BODY, 'v0=abc', SECRET)).toBe(false);
  });

  it('rejects a signature made with another secret', () => {
    const other = crypto.createHmac('sha256', 'other-secret').update(BODY).digest('hex');
    expect(verifySignature(BODY, `v0=${other}`, SECRET)).toBe(false);
  });
});

describe('buildUrlValidationResponse', () => {
  it('echoes the plain token with its base64 HMAC', () => {
    const expected = crypto.createHmac('sha256', SECRET).update('plain-123').digest('base64');
    expect(buildUrlValidationResponse('plain-123', SECRET)).toEqual({
      plainToken: 'plain-123',
      encryptedToken: expected,
    });
  });
});
