export type {
  HttpMethod,
  BodyEncoding,
  ResponseFormat,
  OAuth1Signing,
  HttpRequestDescriptor,
  HttpResponse,
  HttpSendOptions,
  HttpTransport,
} from './types.js';
export {
  buildUrl,
  decodeBody,
  prepareRequest,
  toFormParams,
  type PreparedRequest,
} from './codec.js';
export { FetchTransport } from './fetch-transport.js';
