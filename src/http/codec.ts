import type { HttpRequestDescriptor, ResponseFormat } from './types.js';
import { asString, isRecord } from '../utils/guards.js';

export type PreparedRequest = {
  url: string;
  method: string;
  headers: Record<string, string>;
  body?: string;
};

const JSONP_EXPR = /^[^(]*\(\s*([\s\S]*?)\s*\)\s*;?\s*$/;

export function buildUrl(base: string, query?: Record<string, string>): string {
  const url = new URL(base);
  for (const [key, value] of Object.entries(query ?? {})) {
    url.searchParams.append(key, value);
  }
  return url.toString();
}

export function toFormParams(data: Record<string, unknown>): URLSearchParams {
  const params = new URLSearchParams();
  for (const [key, value] of Object.entries(data)) {
    const text = asString(value);
    if (text !== undefined) {
      params.append(key, text);
    }
  }
  return params;
}

/**
 * Turn a descriptor into the URL, headers and body string a transport sends.
 */
export function prepareRequest(request: HttpRequestDescriptor): PreparedRequest {
  const headers: Record<string, string> = {
    Accept: 'application/json',
    ...request.headers,
  };
  const prepared: PreparedRequest = {
    url: buildUrl(request.url, request.query),
    method: request.method,
    headers,
  };

  if (request.body) {
    if (request.body.encoding === 'json') {
      headers['Content-Type'] = 'application/json';
      prepared.body = JSON.stringify(request.body.data);
    } else {
      headers['Content-Type'] = 'application/x-www-form-urlencoded';
      prepared.body = toFormParams(request.body.data).toString();
    }
  }

  return prepared;
}

/**
 * Decode a provider response body into a record.
 * @throws Error when the body does not match the declared format
 */
export function decodeBody(
  text: string,
  format: ResponseFormat = 'json'
): Record<string, unknown> {
  switch (format) {
    case 'form':
      return Object.fromEntries(new URLSearchParams(text.trim()));
    case 'jsonp': {
      const match = JSONP_EXPR.exec(text.trim());
      return parseJsonRecord(match?.[1] ?? text);
    }
    default:
      return parseJsonRecord(text);
  }
}

function parseJsonRecord(text: string): Record<string, unknown> {
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (error) {
    throw new Error('Invalid JSON response body', { cause: error });
  }
  if (!isRecord(parsed)) {
    throw new Error('Expected a JSON object response body');
  }
  return parsed;
}
