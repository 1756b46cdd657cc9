/**
 * Memberful webhook signature verification
 *
 * The signature is an HMAC-SHA256 of the raw request body keyed with the
 * webhook secret, sent as `sha256=<hex>` or bare `<hex>` in
 * `X-Memberful-Webhook-Signature`. Verify the body exactly as received:
 * re-serialized JSON will not match.
 */

import { createHmac, timingSafeEqual } from 'node:crypto';

export const SIGNATURE_HEADER = 'x-memberful-webhook-signature';

const SIGNATURE_PREFIX = 'sha256=';
const HEX_DIGEST = /^[0-9a-f]+$/;

export type RawPayload = string | Buffer | Uint8Array;

/**
 * Hex HMAC-SHA256 of the payload, prefixed with `sha256=`
 */
export function computeSignature(payload: RawPayload, secret: string): string {
  const digest = createHmac('sha256', secret).update(payload).digest('hex');
  return `${SIGNATURE_PREFIX}${digest}`;
}

/**
 * Constant-time check of a signature token against the payload.
 *
 * Returns false for anything that does not match, including empty,
 * non-hex or wrong-length tokens. Never throws for a bad token.
 */
export function verifySignature(
  payload: RawPayload,
  signature: unknown,
  secret: string,
): boolean {
  if (typeof signature !== 'string') return false;

  let supplied = signature.trim();
  if (supplied.startsWith(SIGNATURE_PREFIX)) {
    supplied = supplied.slice(SIGNATURE_PREFIX.length);
  }
  supplied = supplied.toLowerCase();

  if (supplied.length === 0 || supplied.length % 2 !== 0 || !HEX_DIGEST.test(supplied)) {
    return false;
  }

  const expected = createHmac('sha256', secret).update(payload).digest();
  const provided = Buffer.from(supplied, 'hex');

  // timingSafeEqual requires equal lengths
  if (provided.length !== expected.length) {
    return false;
  }

  return timingSafeEqual(provided, expected);
}
