import { createHmac, timingSafeEqual } from 'crypto';

const PREFIX = 'sha256=';
const HEX_DIGEST = /^[0-9a-f]{64}$/;

/**
 * Lowercase hex HMAC-SHA256 of the payload
 */
export function hmacHex(rawPayload: Buffer, secret: Buffer | string): string {
  return createHmac('sha256', secret).update(rawPayload).digest('hex');
}

/**
 * Header value a sender would attach to the payload
 */
export function sign(rawPayload: Buffer, secret: Buffer | string): string {
  return `${PREFIX}${hmacHex(rawPayload, secret)}`;
}

/**
 * Checks `providedSignature` against the HMAC of the exact bytes received.
 * Accepts the bare hex digest or the `sha256=` form. Returns false for any
 * missing or malformed value.
 */
export function verify(
  rawPayload: Buffer,
  providedSignature: string | undefined,
  secret: Buffer | string
): boolean {
  if (!providedSignature) {
    return false;
  }

  let candidate = providedSignature.trim();
  const separator = candidate.indexOf('=');
  if (separator !== -1) {
    if (candidate.slice(0, separator + 1).toLowerCase() !== PREFIX) {
      return false;
    }
    candidate = candidate.slice(separator + 1);
  }
  candidate = candidate.toLowerCase();

  if (!HEX_DIGEST.test(candidate)) {
    return false;
  }

  const expected = Buffer.from(hmacHex(rawPayload, secret), 'utf8');
  const provided = Buffer.from(candidate, 'utf8');
  return timingSafeEqual(expected, provided);
}
