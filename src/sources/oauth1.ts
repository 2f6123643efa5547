/**
 * OAuth 1.0a request signing (RFC 5849, HMAC-SHA1).
 */

import { createHmac, timingSafeEqual } from 'node:crypto';
import { randomNonce } from 'openid-client';
import type { HttpRequestDescriptor } from '../http/types.js';
import { toFormParams } from '../http/codec.js';

export type OAuth1Consumer = { key: string; secret: string };

export type OAuth1SignOptions = {
  nonce?: string;
  /** Seconds since the epoch */
  timestamp?: number;
};

/**
 * RFC 3986 percent-encoding; encodeURIComponent leaves `!'()*` alone.
 */
export function percentEncode(value: string): string {
  return encodeURIComponent(value).replace(
    /[!'()*]/g,
    (c) => `%${c.charCodeAt(0).toString(16).toUpperCase()}`
  );
}

function comparePairs(a: [string, string], b: [string, string]): number {
  if (a[0] !== b[0]) return a[0] < b[0] ? -1 : 1;
  if (a[1] !== b[1]) return a[1] < b[1] ? -1 : 1;
  return 0;
}

export function signatureBaseString(
  method: string,
  url: string,
  params: Array<[string, string]>
): string {
  const parsed = new URL(url);
  const baseUrl = `${parsed.protocol}//${parsed.host}${parsed.pathname}`;
  const normalized = params
    .map(([key, value]): [string, string] => [
      percentEncode(key),
      percentEncode(value),
    ])
    .sort(comparePairs)
    .map(([key, value]) => `${key}=${value}`)
    .join('&');

  return [
    method.toUpperCase(),
    percentEncode(baseUrl),
    percentEncode(normalized),
  ].join('&');
}

export function signingKey(consumerSecret: string, tokenSecret = ''): string {
  return `${percentEncode(consumerSecret)}&${percentEncode(tokenSecret)}`;
}

function hmacSha1(base: string, key: string): string {
  return createHmac('sha1', key).update(base).digest('base64');
}

/**
 * Query, body and protocol parameters that take part in the signature.
 */
function collectParams(
  request: HttpRequestDescriptor,
  oauthParams: Record<string, string>
): Array<[string, string]> {
  const params: Array<[string, string]> = Object.entries(oauthParams);
  new URL(request.url).searchParams.forEach((value, key) => {
    params.push([key, value]);
  });
  for (const [key, value] of Object.entries(request.query ?? {})) {
    params.push([key, value]);
  }
  if (request.body?.encoding === 'form') {
    for (const [key, value] of toFormParams(request.body.data)) {
      params.push([key, value]);
    }
  }
  return params;
}

/**
 * Return a copy of `request` carrying an `Authorization: OAuth ...` header.
 */
export function signOAuth1Request(
  request: HttpRequestDescriptor,
  consumer: OAuth1Consumer,
  options: OAuth1SignOptions = {}
): HttpRequestDescriptor {
  const signing = request.oauth1 ?? {};
  const oauthParams: Record<string, string> = {
    oauth_consumer_key: consumer.key,
    oauth_nonce: options.nonce ?? randomNonce(),
    oauth_signature_method: 'HMAC-SHA1',
    oauth_timestamp: String(
      options.timestamp ?? Math.floor(Date.now() / 1000)
    ),
    oauth_version: '1.0',
    ...signing.params,
  };
  if (signing.token) {
    oauthParams.oauth_token = signing.token;
  }

  const base = signatureBaseString(
    request.method,
    request.url,
    collectParams(request, oauthParams)
  );
  const signature = hmacSha1(
    base,
    signingKey(consumer.secret, signing.tokenSecret)
  );

  const header = Object.entries({ ...oauthParams, oauth_signature: signature })
    .sort(comparePairs)
    .map(([key, value]) => `${percentEncode(key)}="${percentEncode(value)}"`)
    .join(', ');

  return {
    ...request,
    headers: { ...request.headers, Authorization: `OAuth ${header}` },
  };
}

/**
 * Parse an `Authorization: OAuth k="v", ...` header into decoded pairs.
 */
export function parseOAuthHeader(header: string): Record<string, string> {
  const params: Record<string, string> = {};
  const body = header.replace(/^OAuth\s+/i, '');
  for (const match of body.matchAll(/([^=,\s]+)="([^"]*)"/g)) {
    const [, key, value] = match;
    if (key !== undefined && value !== undefined) {
      params[decodeURIComponent(key)] = decodeURIComponent(value);
    }
  }
  return params;
}

/**
 * Check a signed request against the secrets a server would hold.
 */
export function verifyOAuth1Signature(
  request: HttpRequestDescriptor,
  consumerSecret: string,
  tokenSecret?: string
): boolean {
  const header = request.headers?.Authorization;
  if (!header) return false;

  const { oauth_signature: signature, ...oauthParams } =
    parseOAuthHeader(header);
  if (!signature) return false;

  const base = signatureBaseString(
    request.method,
    request.url,
    collectParams(request, oauthParams)
  );
  const expected = Buffer.from(
    hmacSha1(base, signingKey(consumerSecret, tokenSecret))
  );
  const actual = Buffer.from(signature);
  return (
    expected.length === actual.length && timingSafeEqual(expected, actual)
  );
}
