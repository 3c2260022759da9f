import crypto from 'crypto';
import { SignatureVerificationError } from './errors.js';

export const SIGNATURE_PREFIX = 'sha256=';

// HMAC-SHA256 -> 32 bytes
const DIGEST_LENGTH = 32;

const ASCII = /^[\x00-\x7f]*$/;
const HEX = /^(?:[0-9a-fA-F]{2})*$/;

export type VerificationResult =
  | { valid: true }
  | { valid: false; error: SignatureVerificationError };

function reject(error: SignatureVerificationError): VerificationResult {
  return { valid: false, error };
}

/**
 * Signature header value for a payload: `sha256=<lowercase hex>`.
 */
export function computeSignature(secret: string, payload: Buffer | string): string {
  return SIGNATURE_PREFIX + crypto.createHmac('sha256', secret).update(payload).digest('hex');
}

/**
 * Check an `X-Hub-Signature-256` value against the raw body.
 *
 * The payload must be the bytes exactly as received. The failure codes are
 * meant for logs; callers answer every failure the same way.
 */
export function verifySignature(
  secret: string,
  payload: Buffer,
  signatureHeader: string
): VerificationResult {
  if (!ASCII.test(signatureHeader)) {
    return reject(new SignatureVerificationError(
      'MALFORMED_SIGNATURE_ENCODING',
      'Signature contains non-ASCII characters'
    ));
  }

  if (signatureHeader.length < SIGNATURE_PREFIX.length || !signatureHeader.startsWith(SIGNATURE_PREFIX)) {
    return reject(new SignatureVerificationError(
      'MALFORMED_SIGNATURE_ENCODING',
      `Signature does not start with "${SIGNATURE_PREFIX}"`
    ));
  }

  const hex = signatureHeader.slice(SIGNATURE_PREFIX.length);

  // Buffer.from(hex, 'hex') stops at the first bad character instead of failing
  if (!HEX.test(hex)) {
    return reject(new SignatureVerificationError(
      'INVALID_HEX_ENCODING',
      hex.length % 2 === 1 ? 'Odd number of hex digits' : 'Invalid hex digit in signature'
    ));
  }

  const received = Buffer.from(hex, 'hex');
  const computed = crypto.createHmac('sha256', secret).update(payload).digest();

  // timingSafeEqual requires equal lengths
  if (received.length !== DIGEST_LENGTH || !crypto.timingSafeEqual(received, computed)) {
    return reject(new SignatureVerificationError('DIGEST_MISMATCH', 'Signature does not match payload'));
  }

  return { valid: true };
}
