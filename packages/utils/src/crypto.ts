import { createHmac, timingSafeEqual } from 'crypto';

export type QueryValue = string | number | boolean;

/**
 * Ordered query parameters. Order is significant: the exchange recomputes
 * the signature over the bytes it receives.
 */
export type QueryParams = ReadonlyArray<readonly [string, QueryValue]>;

export interface SignedQuery {
  /** Canonical query string that was signed */
  payload: string;
  /** Hex HMAC-SHA256 of the payload */
  signature: string;
  /** Exact string to transmit: payload followed by the signature parameter */
  query: string;
}

/**
 * Serialize parameters as key=value pairs joined with '&', in the given order
 */
export function buildQueryString(params: QueryParams): string {
  return params
    .map(([key, value]) => `${encodeURIComponent(key)}=${encodeURIComponent(String(value))}`)
    .join('&');
}

/**
 * HMAC-SHA256 over the UTF-8 bytes of the query string, hex encoded
 */
export function signQueryString(secret: string, queryString: string): string {
  return createHmac('sha256', Buffer.from(secret, 'utf8'))
    .update(queryString, 'utf8')
    .digest('hex');
}

/**
 * Build, sign and append the signature in one step so the signed and the
 * transmitted strings cannot drift apart
 */
export function createSignedQuery(params: QueryParams, secret: string): SignedQuery {
  const payload = buildQueryString(params);
  const signature = signQueryString(secret, payload);
  const query = payload.length > 0 ? `${payload}&signature=${signature}` : `signature=${signature}`;
  return { payload, signature, query };
}

/**
 * Verify a query signature using timing-safe comparison
 */
export function verifyQuerySignature(secret: string, payload: string, signature: string): boolean {
  const expected = Buffer.from(signQueryString(secret, payload));
  const received = Buffer.from(signature);

  if (expected.length !== received.length) {
    return false;
  }

  return timingSafeEqual(expected, received);
}

/**
 * Split a transmitted query into the signed payload and its signature.
 * Returns null when the signature parameter is not the last one.
 */
export function splitSignedQuery(query: string): { payload: string; signature: string } | null {
  const match = /^(?:(.*)&)?signature=([0-9a-f]+)$/.exec(query);
  if (!match) {
    return null;
  }
  return { payload: match[1] ?? '', signature: match[2] };
}
