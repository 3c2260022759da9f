import type { IncomingHttpHeaders } from 'http';

export const SIGNATURE_HEADER = 'X-Hub-Signature-256';

/**
 * Claimed signature from the request headers, or null when the header is
 * absent. Node lowercases incoming header names, so the lookup is
 * case-insensitive.
 */
export function extractSignatureHeader(
  headers: IncomingHttpHeaders,
  name: string = SIGNATURE_HEADER
): string | null {
  const value = headers[name.toLowerCase()];
  if (value === undefined) return null;
  // Node joins repeated custom headers into one string; arrays only come from
  // callers that build their own header objects
  if (Array.isArray(value)) return value[0] ?? null;
  return value;
}
