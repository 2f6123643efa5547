import type {
  HttpRequestDescriptor,
  HttpResponse,
  HttpSendOptions,
  HttpTransport,
} from './types.js';
import { prepareRequest } from './codec.js';

/**
 * Default transport over the global `fetch`.
 */
export class FetchTransport implements HttpTransport {
  async send(
    request: HttpRequestDescriptor,
    options: HttpSendOptions = {}
  ): Promise<HttpResponse> {
    const prepared = prepareRequest(request);
    const init: RequestInit = {
      method: prepared.method,
      headers: prepared.headers,
    };
    if (prepared.body !== undefined) init.body = prepared.body;
    if (options.signal) init.signal = options.signal;

    const response = await fetch(prepared.url, init);

    const headers: Record<string, string> = {};
    response.headers.forEach((value, key) => {
      headers[key] = value;
    });

    return {
      status: response.status,
      statusText: response.statusText,
      headers,
      body: await response.text(),
    };
  }
}
