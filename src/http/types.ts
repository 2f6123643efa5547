export type HttpMethod = 'GET' | 'POST';

export type BodyEncoding = 'form' | 'json';

/**
 * How a response body is decoded: JSON, urlencoded pairs, or a JSONP
 * wrapper such as `callback( {...} );`
 */
export type ResponseFormat = 'json' | 'form' | 'jsonp';

/**
 * Inputs for an OAuth 1.0a signed request. Consumer credentials come from
 * the AuthConfig; these are the per-request parts.
 */
export type OAuth1Signing = {
  token?: string;
  tokenSecret?: string;
  /** Extra `oauth_*` protocol parameters, e.g. oauth_callback or oauth_verifier */
  params?: Record<string, string>;
};

/**
 * Transport-agnostic description of one provider call.
 */
export interface HttpRequestDescriptor {
  method: HttpMethod;
  url: string;
  query?: Record<string, string>;
  headers?: Record<string, string>;
  body?: { encoding: BodyEncoding; data: Record<string, unknown> };
  /** Defaults to `json` */
  responseFormat?: ResponseFormat;
  oauth1?: OAuth1Signing;
}

export interface HttpResponse {
  status: number;
  statusText: string;
  headers: Record<string, string>;
  body: string;
}

export interface HttpSendOptions {
  signal?: AbortSignal;
}

/**
 * Sends descriptors over the wire. Hosts supply their own for pooling,
 * proxies or retries; {@link FetchTransport} is the default.
 */
export interface HttpTransport {
  send(
    request: HttpRequestDescriptor,
    options?: HttpSendOptions
  ): Promise<HttpResponse>;
}
