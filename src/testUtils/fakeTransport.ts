import type {
  HttpRequestDescriptor,
  HttpResponse,
  HttpSendOptions,
  HttpTransport,
} from '../http/types.js';

export type FakeReply =
  | HttpResponse
  | ((request: HttpRequestDescriptor) => HttpResponse);

type Route = { url: string; reply: FakeReply | 'hang'; once: boolean };

export function jsonResponse(body: unknown, status = 200): HttpResponse {
  return {
    status,
    statusText: status === 200 ? 'OK' : 'Bad Request',
    headers: { 'content-type': 'application/json' },
    body: JSON.stringify(body),
  };
}

export function formResponse(
  body: Record<string, string>,
  status = 200
): HttpResponse {
  return {
    status,
    statusText: status === 200 ? 'OK' : 'Bad Request',
    headers: { 'content-type': 'application/x-www-form-urlencoded' },
    body: new URLSearchParams(body).toString(),
  };
}

/**
 * In-process HttpTransport. Routes match on the request URL (without query);
 * every request sent is recorded.
 */
export class FakeTransport implements HttpTransport {
  public readonly requests: HttpRequestDescriptor[] = [];
  private readonly routes: Route[] = [];

  on(url: string, reply: FakeReply): this {
    this.routes.push({ url, reply, once: false });
    return this;
  }

  once(url: string, reply: FakeReply): this {
    this.routes.push({ url, reply, once: true });
    return this;
  }

  /** Never answer `url`; the request settles only when aborted */
  hang(url: string): this {
    this.routes.push({ url, reply: 'hang', once: false });
    return this;
  }

  urls(): string[] {
    return this.requests.map((request) => request.url);
  }

  async send(
    request: HttpRequestDescriptor,
    options: HttpSendOptions = {}
  ): Promise<HttpResponse> {
    this.requests.push(request);
    const index = this.routes.findIndex((route) => route.url === request.url);
    const route = this.routes[index];
    if (!route) {
      throw new Error(`No fake response for ${request.method} ${request.url}`);
    }
    if (route.once) {
      this.routes.splice(index, 1);
    }

    const reply = route.reply;
    if (reply === 'hang') {
      return new Promise<HttpResponse>((_, reject) => {
        options.signal?.addEventListener('abort', () => {
          reject(options.signal?.reason);
        });
      });
    }
    return typeof reply === 'function' ? reply(request) : reply;
  }
}
